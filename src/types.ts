import type { Condition } from './query/condition.js';
import type { SortField } from './query/types.js';

/**
 * CRUD contract over one table. R is the record type, ID the identifier
 * type: the key value for a single-column primary key, an object or a
 * tuple of key values for a composite one.
 */
export interface DataAccess<R, ID> {
  findById(id: ID): Promise<R | null>;

  findAll(offset: number, limit: number, orderBy?: readonly SortField[]): Promise<R[]>;
  findAll(condition: Condition, offset: number, limit: number, orderBy?: readonly SortField[]): Promise<R[]>;
  findAll(condition: Condition, orderBy?: readonly SortField[]): Promise<R[]>;

  count(condition?: Condition): Promise<number>;

  /** INSERT or UPDATE depending on whether the record is new. Returns affected rows. */
  save(record: R): Promise<number>;
  saveAll(records: readonly R[]): Promise<number[]>;
  /** INSERT … ON CONFLICT (primary key) DO UPDATE. Returns affected rows. */
  merge(record: R): Promise<number>;

  delete(condition: Condition): Promise<number>;
  delete(record: R): Promise<number>;
  deleteById(id: ID): Promise<number>;
}
