import type { QueryContext } from '../context/query-context.js';
import { InvalidArgumentError } from '../errors.js';
import {
  compileCount,
  compileDelete,
  compileInsert,
  compileSelect,
  compileUpdate,
  compileUpsert,
} from '../query/compiler.js';
import type { ColumnValue, SelectOptions } from '../query/compiler.js';
import { Condition } from '../query/condition.js';
import { createKeyMatcher, keyCondition } from '../query/primary-key.js';
import type { KeyBinding, KeyMatcher } from '../query/primary-key.js';
import type { SortField } from '../query/types.js';
import { captureState, changedProperties, forget, isNew, markStored, storedValue } from '../table/record-state.js';
import type { ColumnProperty, PrimaryKey, Table } from '../table/table.js';
import type { DataAccess } from '../types.js';

const NO_PRIMARY_KEY = 'This method can only be called on tables with a primary key';

export interface RecordAccessorOptions<ID> {
  /** Explicit identifier → key value mapping; see createKeyMatcher() for the default. */
  key?: KeyBinding<ID>;
}

function pageBound(name: string, value: number | readonly SortField[] | undefined): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new InvalidArgumentError(`${name} must be a non-negative integer, got ${String(value)}`);
  }
  return value;
}

function sortList(value: number | readonly SortField[] | undefined): readonly SortField[] {
  return typeof value === 'object' ? value : [];
}

// pg reports null for statements without a row count
function affectedRows(rowCount: number | null): number {
  return rowCount ?? -1;
}

/**
 * Generic CRUD over one table.
 *
 * Reads run in a read-only transaction, writes in a read-write one. When
 * the context is already bound to a transaction (see
 * QueryContext.transaction()), every operation joins it.
 *
 * Writes update the record (generated values, stored state) as soon as
 * their statement returns. If the transaction they ran in rolls back,
 * whether the accessor's own or a surrounding one, the record is put back
 * the way it was before the write.
 *
 * @example
 * interface Athlete { id: number | null; name: string }
 *
 * const ATHLETE = defineTable<Athlete>({
 *   name: 'ATHLETE',
 *   columns: { id: 'ID', name: 'NAME' },
 *   primaryKey: ['id'],
 *   generated: ['id'],
 * });
 *
 * class AthleteAccessor extends RecordAccessor<typeof ATHLETE, Athlete, number> {
 *   findByName(name: string): Promise<Athlete[]> {
 *     return this.findAll(this.table.field('name').eq(name));
 *   }
 * }
 */
export class RecordAccessor<T extends Table<R>, R extends object, ID> implements DataAccess<R, ID> {
  private readonly matchKey: KeyMatcher<ID> | null;

  constructor(
    protected readonly ctx: QueryContext,
    protected readonly table: T,
    options: RecordAccessorOptions<ID> = {},
  ) {
    this.matchKey = createKeyMatcher<R, ID>(table, options.key);
  }

  /**
   * @throws InvalidArgumentError if the table has no primary key
   */
  async findById(id: ID): Promise<R | null> {
    const condition = this.idCondition(id);
    const [found] = await this.fetch({ condition });
    return found ?? null;
  }

  findAll(offset: number, limit: number, orderBy?: readonly SortField[]): Promise<R[]>;
  findAll(condition: Condition, offset: number, limit: number, orderBy?: readonly SortField[]): Promise<R[]>;
  findAll(condition: Condition, orderBy?: readonly SortField[]): Promise<R[]>;
  async findAll(
    first: Condition | number,
    second?: number | readonly SortField[],
    third?: number | readonly SortField[],
    fourth?: readonly SortField[],
  ): Promise<R[]> {
    if (typeof first === 'number') {
      return this.fetch({
        offset: pageBound('offset', first),
        limit: pageBound('limit', second),
        orderBy: sortList(third),
      });
    }
    if (typeof second === 'number') {
      return this.fetch({
        condition: first,
        offset: pageBound('offset', second),
        limit: pageBound('limit', third),
        orderBy: sortList(fourth),
      });
    }
    return this.fetch({ condition: first, orderBy: sortList(second) });
  }

  async count(condition?: Condition): Promise<number> {
    const compiled = compileCount(this.table, condition);
    const { rows } = await this.read((tx) => tx.query<{ count: string }>(compiled));
    // COUNT(*) is a bigint, which pg hands back as a string
    return Number(rows[0]?.count ?? 0);
  }

  async save(record: R): Promise<number> {
    return this.write((tx) => this.store(tx, record));
  }

  /** Stores each record in turn within one transaction; counts are in input order. */
  async saveAll(records: readonly R[]): Promise<number[]> {
    return this.write(async (tx) => {
      const counts: number[] = [];
      for (const record of records) {
        counts.push(await this.store(tx, record));
      }
      return counts;
    });
  }

  /**
   * @throws InvalidArgumentError if the table has no primary key
   */
  async merge(record: R): Promise<number> {
    const key = this.requireKey();
    const compiled = compileUpsert(
      this.table,
      this.insertValues(record),
      key.fields.map((f) => f.column),
    );
    return this.write(async (tx) => {
      tx.onRollback(captureState(this.table, record));
      const result = await tx.query<R>(compiled);
      this.refresh(record, result.rows[0]);
      return affectedRows(result.rowCount);
    });
  }

  delete(condition: Condition): Promise<number>;
  delete(record: R): Promise<number>;
  async delete(target: Condition | R): Promise<number> {
    if (target instanceof Condition) {
      const compiled = compileDelete(this.table, target);
      return this.write(async (tx) => affectedRows((await tx.query(compiled)).rowCount));
    }

    const record = target;
    const key = this.requireKey();
    const compiled = compileDelete(this.table, keyCondition(key, key.properties.map((p) => record[p])));
    return this.write(async (tx) => {
      tx.onRollback(captureState(this.table, record));
      const result = await tx.query(compiled);
      forget(record);
      return affectedRows(result.rowCount);
    });
  }

  /**
   * @throws InvalidArgumentError if the table has no primary key
   */
  async deleteById(id: ID): Promise<number> {
    const compiled = compileDelete(this.table, this.idCondition(id));
    return this.write(async (tx) => affectedRows((await tx.query(compiled)).rowCount));
  }

  protected read<V>(work: (tx: QueryContext) => Promise<V>): Promise<V> {
    return this.ctx.transaction(work, { readOnly: true });
  }

  protected write<V>(work: (tx: QueryContext) => Promise<V>): Promise<V> {
    return this.ctx.transaction(work);
  }

  private fetch(options: SelectOptions): Promise<R[]> {
    const compiled = compileSelect(this.table, options);
    return this.read(async (tx) => {
      const { rows } = await tx.query<R>(compiled);
      for (const row of rows) {
        markStored(this.table, row);
      }
      return rows;
    });
  }

  private async store(tx: QueryContext, record: R): Promise<number> {
    tx.onRollback(captureState(this.table, record));
    if (isNew(this.table, record)) {
      const result = await tx.query<R>(compileInsert(this.table, this.insertValues(record)));
      this.refresh(record, result.rows[0]);
      return affectedRows(result.rowCount);
    }

    // Not new implies a primary key whose values match the stored ones
    const key = this.requireKey();
    const changed = changedProperties(this.table, record);
    if (changed.length === 0) return 0;

    const condition = keyCondition(key, key.properties.map((p) => storedValue(record, p)));
    const result = await tx.query<R>(compileUpdate(this.table, this.columnValues(record, changed), condition));
    this.refresh(record, result.rows[0]);
    return affectedRows(result.rowCount);
  }

  /** Undefined values, and null generated values, are left to the database. */
  private insertValues(record: R): ColumnValue[] {
    const properties = this.table.properties.filter((p) => {
      const value = record[p];
      if (value === undefined) return false;
      return !(value === null && this.table.isGenerated(p));
    });
    return this.columnValues(record, properties);
  }

  private columnValues(record: R, properties: readonly ColumnProperty<R>[]): ColumnValue[] {
    return properties.map((p) => ({ column: this.table.columnOf(p), value: record[p] }));
  }

  /** Copies the row the database returned into the record and marks it stored. */
  private refresh(record: R, stored: R | undefined): void {
    if (stored !== undefined) {
      for (const property of this.table.properties) {
        record[property] = stored[property];
      }
    }
    markStored(this.table, record);
  }

  private idCondition(id: ID): Condition {
    if (this.matchKey === null) {
      throw new InvalidArgumentError(NO_PRIMARY_KEY);
    }
    return this.matchKey(id);
  }

  private requireKey(): PrimaryKey<R> {
    if (this.table.primaryKey === null) {
      throw new InvalidArgumentError(NO_PRIMARY_KEY);
    }
    return this.table.primaryKey;
  }
}
