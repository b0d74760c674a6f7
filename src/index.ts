export { RecordAccessor } from './accessor/record-accessor.js';
export type { RecordAccessorOptions } from './accessor/record-accessor.js';
export type { DataAccess } from './types.js';
export { QueryContext } from './context/query-context.js';
export type {
  QueryContextConfig,
  TransactionOptions,
  IsolationLevel,
  QueryEvent,
  QueryResult,
} from './context/query-context.js';
export { defineTable, Table } from './table/table.js';
export type { TableOptions, ColumnMapping, ColumnProperty, PrimaryKey } from './table/table.js';
export { Condition, noCondition, and, or } from './query/condition.js';
export { Field, RowValue, row } from './query/field.js';
export type { SortField, SortDirection, NullOrdering } from './query/types.js';
export type { KeyBinding } from './query/primary-key.js';
export { InvalidArgumentError, IdentifierError, TableDefinitionError } from './errors.js';
