export class InvalidArgumentError extends Error {
  override readonly name = 'InvalidArgumentError';

  constructor(message: string) {
    super(message);
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class IdentifierError extends Error {
  override readonly name = 'IdentifierError';

  constructor(
    message: string,
    readonly identifier?: unknown,
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class TableDefinitionError extends Error {
  override readonly name = 'TableDefinitionError';

  constructor(
    readonly table: string,
    message: string,
  ) {
    super(`Table "${table}": ${message}`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
