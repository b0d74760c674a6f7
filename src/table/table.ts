import { TableDefinitionError } from '../errors.js';
import { Field } from '../query/field.js';
import { quoteIdentifier } from '../query/compiler.js';

/** Record property names that can be mapped to columns. */
export type ColumnProperty<R> = Extract<keyof R, string>;

/** Record property → column name, one entry per property. */
export type ColumnMapping<R> = { readonly [K in ColumnProperty<R>]-?: string };

export interface TableOptions<R extends object> {
  name: string;
  schema?: string;
  columns: ColumnMapping<R>;
  /** Ordered key properties. Omit for tables without a primary key. */
  primaryKey?: readonly ColumnProperty<R>[];
  /** Properties whose columns the database fills in (identity, serial, defaults). */
  generated?: readonly ColumnProperty<R>[];
}

export interface PrimaryKey<R> {
  readonly properties: readonly ColumnProperty<R>[];
  readonly fields: readonly Field[];
}

/**
 * Immutable descriptor of one table: its name, the mapping between
 * record properties and columns, and its primary key if it has one.
 * Create instances with defineTable().
 */
export class Table<R extends object> {
  readonly name: string;
  readonly schema: string | null;
  readonly qualifiedName: string;
  /** Mapped properties in declaration order. */
  readonly properties: readonly ColumnProperty<R>[];
  readonly primaryKey: PrimaryKey<R> | null;

  private readonly columns: ColumnMapping<R>;
  private readonly generated: ReadonlySet<string>;

  constructor(options: TableOptions<R>) {
    if (!options.name || options.name.trim() === '') {
      throw new TableDefinitionError(String(options.name), 'name must be a non-empty string');
    }
    this.name = options.name;
    this.schema = options.schema ?? null;
    this.qualifiedName = this.schema === null
      ? quoteIdentifier(this.name)
      : `${quoteIdentifier(this.schema)}.${quoteIdentifier(this.name)}`;

    const columns = options.columns;
    this.properties = Object.keys(columns).filter(
      (key): key is ColumnProperty<R> => Object.hasOwn(columns, key),
    );
    if (this.properties.length === 0) {
      throw new TableDefinitionError(this.name, 'at least one column must be mapped');
    }

    const seen = new Set<string>();
    for (const property of this.properties) {
      const column = columns[property];
      if (typeof column !== 'string' || column.trim() === '') {
        throw new TableDefinitionError(this.name, `property "${property}" has an empty column name`);
      }
      if (seen.has(column)) {
        throw new TableDefinitionError(this.name, `column "${column}" is mapped more than once`);
      }
      seen.add(column);
    }
    this.columns = columns;

    this.primaryKey = options.primaryKey === undefined ? null : this.resolveKey(options.primaryKey);

    for (const property of options.generated ?? []) {
      this.assertMapped(property, 'generated');
    }
    this.generated = new Set(options.generated ?? []);
  }

  private resolveKey(properties: readonly ColumnProperty<R>[]): PrimaryKey<R> {
    if (properties.length === 0) {
      throw new TableDefinitionError(this.name, 'primary key must list at least one property');
    }
    if (new Set(properties).size !== properties.length) {
      throw new TableDefinitionError(this.name, 'primary key lists a property more than once');
    }
    for (const property of properties) {
      this.assertMapped(property, 'primary key');
    }
    return {
      properties: [...properties],
      fields: properties.map((p) => this.field(p)),
    };
  }

  private assertMapped(property: string, role: string): void {
    if (!Object.hasOwn(this.columns, property)) {
      throw new TableDefinitionError(this.name, `${role} property "${property}" is not a mapped column`);
    }
  }

  columnOf(property: ColumnProperty<R>): string {
    return this.columns[property];
  }

  field<K extends ColumnProperty<R>>(property: K): Field<R[K]> {
    return new Field<R[K]>(this.columns[property], property);
  }

  isGenerated(property: ColumnProperty<R>): boolean {
    return this.generated.has(property);
  }
}

export function defineTable<R extends object>(options: TableOptions<R>): Table<R> {
  return new Table<R>(options);
}
