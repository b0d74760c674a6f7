import pg from 'pg';
import { InvalidArgumentError } from '../errors.js';
import type { CompiledQuery } from '../query/compiler.js';

export type IsolationLevel = 'READ COMMITTED' | 'REPEATABLE READ' | 'SERIALIZABLE';

export interface QueryEvent {
  sql: string;
  params: unknown[];
  durationMs: number;
  rowCount: number | null;
}

export interface QueryResult<Row> {
  rows: Row[];
  rowCount: number | null;
}

export interface TransactionOptions {
  readOnly?: boolean;
  /** Overrides the context's default isolation level for this transaction. */
  isolationLevel?: IsolationLevel;
}

export interface QueryContextConfig {
  pool: pg.Pool;
  /** Isolation level for transactions started by this context; server default when omitted. */
  isolationLevel?: IsolationLevel;
  /** Applied with SET LOCAL at the start of every transaction. */
  statementTimeoutMs?: number;
  lockTimeoutMs?: number;
  /** Called after every statement, transaction control included. */
  onQuery?: (event: QueryEvent) => void;
  /** Called for failures that cannot be rethrown, such as a failed ROLLBACK. */
  onError?: (message: string, error: unknown) => void;
}

interface ResolvedConfig {
  pool: pg.Pool;
  isolationLevel: IsolationLevel | null;
  statementTimeoutMs: number | null;
  lockTimeoutMs: number | null;
  onQuery: ((event: QueryEvent) => void) | null;
  onError: (message: string, error: unknown) => void;
}

function resolveTimeout(name: string, value: number | undefined): number | null {
  if (value === undefined) return null;
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidArgumentError(`${name} must be a non-negative integer, got ${value}`);
  }
  return value;
}

function beginStatement(readOnly: boolean, isolationLevel: IsolationLevel | null): string {
  const modes: string[] = [];
  if (isolationLevel !== null) modes.push(`ISOLATION LEVEL ${isolationLevel}`);
  if (readOnly) modes.push('READ ONLY');
  return modes.length === 0 ? 'BEGIN' : `BEGIN ${modes.join(', ')}`;
}

/**
 * Runs compiled statements against a pg pool and owns transaction
 * boundaries. A context handed to transaction() work is bound to one
 * pooled client until the transaction ends; transaction() called on it
 * joins the running transaction instead of starting a new one.
 */
export class QueryContext {
  private readonly resolved: ResolvedConfig;
  private client: pg.PoolClient | null = null;
  private finished = false;
  private undoSteps: Array<() => void> = [];

  constructor(private readonly config: QueryContextConfig) {
    this.resolved = {
      pool: config.pool,
      isolationLevel: config.isolationLevel ?? null,
      statementTimeoutMs: resolveTimeout('statementTimeoutMs', config.statementTimeoutMs),
      lockTimeoutMs: resolveTimeout('lockTimeoutMs', config.lockTimeoutMs),
      onQuery: config.onQuery ?? null,
      onError: config.onError ?? ((message, err) => {
        console.error(`[record-accessor] ${message}:`, err);
      }),
    };
  }

  /** Creates a context over a new pool for the given connection string. */
  static connect(
    connectionString: string,
    config: Omit<QueryContextConfig, 'pool'> = {},
  ): QueryContext {
    return new QueryContext({ ...config, pool: new pg.Pool({ connectionString }) });
  }

  get inTransaction(): boolean {
    return this.client !== null;
  }

  async query<Row extends object = Record<string, unknown>>(
    compiled: CompiledQuery,
  ): Promise<QueryResult<Row>> {
    if (this.finished) {
      throw new Error('Transaction context used after its transaction ended');
    }
    const started = Date.now();
    const result = this.client !== null
      ? await this.client.query(compiled.sql, compiled.params)
      : await this.resolved.pool.query(compiled.sql, compiled.params);
    this.notifyQuery({
      sql: compiled.sql,
      params: compiled.params,
      durationMs: Date.now() - started,
      rowCount: result.rowCount,
    });
    return { rows: result.rows, rowCount: result.rowCount };
  }

  /**
   * Runs work inside a transaction: COMMIT when it resolves, ROLLBACK when
   * it (or COMMIT) throws, in which case the steps registered with
   * onRollback() run and the original error is rethrown. The pooled client
   * is released on every path.
   */
  async transaction<T>(
    work: (tx: QueryContext) => Promise<T>,
    options: TransactionOptions = {},
  ): Promise<T> {
    if (this.finished) {
      throw new Error('Transaction context used after its transaction ended');
    }
    if (this.client !== null) {
      return work(this);
    }

    const client = await this.resolved.pool.connect();
    const tx = new QueryContext(this.config);
    tx.client = client;
    let releaseError: Error | undefined;
    try {
      const isolation = options.isolationLevel ?? this.resolved.isolationLevel;
      await tx.control(beginStatement(options.readOnly ?? false, isolation));
      // Session-local settings, reset automatically on COMMIT/ROLLBACK
      if (this.resolved.statementTimeoutMs !== null) {
        await tx.control(`SET LOCAL statement_timeout = ${this.resolved.statementTimeoutMs}`);
      }
      if (this.resolved.lockTimeoutMs !== null) {
        await tx.control(`SET LOCAL lock_timeout = ${this.resolved.lockTimeoutMs}`);
      }

      const result = await work(tx);
      await tx.control('COMMIT');
      return result;
    } catch (err) {
      try {
        await tx.control('ROLLBACK');
      } catch (rollbackErr) {
        this.resolved.onError('ROLLBACK failed', rollbackErr);
        // Destroy the connection rather than return it to the pool mid-transaction
        releaseError = rollbackErr instanceof Error ? rollbackErr : new Error(String(rollbackErr));
      }
      tx.undo();
      throw err;
    } finally {
      tx.undoSteps = [];
      tx.client = null;
      tx.finished = true;
      client.release(releaseError);
    }
  }

  // A throwing hook must not turn a statement that ran into a failure
  private notifyQuery(event: QueryEvent): void {
    if (this.resolved.onQuery === null) return;
    try {
      this.resolved.onQuery(event);
    } catch (err) {
      this.resolved.onError('onQuery hook failed', err);
    }
  }

  /**
   * Registers an undo step for in-memory state changed by the current
   * transaction. Steps run in reverse order after the outermost
   * transaction rolls back, and are dropped once it commits.
   */
  onRollback(undo: () => void): void {
    if (this.client === null) {
      throw new Error('onRollback() requires a context bound to a transaction');
    }
    this.undoSteps.push(undo);
  }

  private undo(): void {
    for (const step of this.undoSteps.reverse()) {
      try {
        step();
      } catch (err) {
        this.resolved.onError('rollback undo step failed', err);
      }
    }
  }

  private async control(sql: string): Promise<void> {
    await this.query({ sql, params: [] });
  }

  async close(): Promise<void> {
    if (this.client !== null || this.finished) {
      throw new Error('close() must be called on the root context, not inside a transaction');
    }
    await this.resolved.pool.end();
  }
}
