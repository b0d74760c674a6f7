import { InvalidArgumentError } from '../errors.js';
import type { Table } from '../table/table.js';
import type { Condition } from './condition.js';
import type { ConditionNode, SortField } from './types.js';

export interface CompiledQuery {
  sql: string;
  params: unknown[];
}

export interface ColumnValue {
  column: string;
  value: unknown;
}

export interface SelectOptions {
  condition?: Condition;
  orderBy?: readonly SortField[];
  offset?: number;
  limit?: number;
}

export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

function nextParam(value: unknown, params: unknown[], counter: { n: number }): string {
  params.push(value);
  counter.n += 1;
  return `$${counter.n}`;
}

/**
 * Compiles a ConditionNode into a SQL fragment and appends parameters.
 * Uses a shared counter object so recursive calls share the same sequence.
 */
function compileNode(node: ConditionNode, params: unknown[], counter: { n: number }): string {
  switch (node.kind) {
    case 'true':
      return 'TRUE';
    case 'compare':
      return `${quoteIdentifier(node.column)} ${node.operator} ${nextParam(node.value, params, counter)}`;
    case 'null':
      return `${quoteIdentifier(node.column)} ${node.negated ? 'IS NOT NULL' : 'IS NULL'}`;
    case 'in': {
      if (node.values.length === 0) return node.negated ? '1 = 1' : '1 = 0';
      const refs = node.values.map((v) => nextParam(v, params, counter));
      return `${quoteIdentifier(node.column)} ${node.negated ? 'NOT IN' : 'IN'} (${refs.join(', ')})`;
    }
    case 'between': {
      const low = nextParam(node.low, params, counter);
      const high = nextParam(node.high, params, counter);
      return `${quoteIdentifier(node.column)} BETWEEN ${low} AND ${high}`;
    }
    case 'row': {
      const columns = node.columns.map(quoteIdentifier);
      const refs = node.values.map((v) => nextParam(v, params, counter));
      return `(${columns.join(', ')}) = (${refs.join(', ')})`;
    }
    case 'not': {
      const inner = compileNode(node.condition, params, counter);
      // and/or fragments are already parenthesized
      const grouped = node.condition.kind === 'and' || node.condition.kind === 'or';
      return grouped ? `NOT ${inner}` : `NOT (${inner})`;
    }
    case 'and':
    case 'or': {
      const parts = node.conditions.map((c) => compileNode(c, params, counter));
      return `(${parts.join(node.kind === 'and' ? ' AND ' : ' OR ')})`;
    }
  }
}

export function compileCondition(
  condition: Condition,
  params: unknown[],
  counter: { n: number },
): string {
  return compileNode(condition._node, params, counter);
}

/** WHERE line, or null when the condition filters nothing. */
function compileWhereClause(
  condition: Condition | undefined,
  params: unknown[],
  counter: { n: number },
): string | null {
  if (condition === undefined || condition.isEmpty) return null;
  return `WHERE ${compileCondition(condition, params, counter)}`;
}

/** Column list aliased to record property names so rows come back shaped as records. */
function compileReturningList<R extends object>(table: Table<R>): string {
  return table.properties
    .map((p) => `${quoteIdentifier(table.columnOf(p))} AS ${quoteIdentifier(p)}`)
    .join(', ');
}

// Qualified so a column never resolves to a select-list alias of the same name
function compileOrderBy<R extends object>(table: Table<R>, orderBy: readonly SortField[]): string | null {
  if (orderBy.length === 0) return null;
  const parts = orderBy.map((s) => {
    const nulls = s.nulls === undefined ? '' : ` NULLS ${s.nulls}`;
    return `${table.qualifiedName}.${quoteIdentifier(s.column)} ${s.direction}${nulls}`;
  });
  return `ORDER BY ${parts.join(', ')}`;
}

function lines(...parts: Array<string | null>): string {
  return parts.filter((p): p is string => p !== null).join('\n');
}

export function compileSelect<R extends object>(
  table: Table<R>,
  options: SelectOptions = {},
): CompiledQuery {
  const params: unknown[] = [];
  const counter = { n: 0 };
  const where = compileWhereClause(options.condition, params, counter);
  const limit = options.limit === undefined ? null : `LIMIT ${nextParam(options.limit, params, counter)}`;
  const offset = options.offset === undefined ? null : `OFFSET ${nextParam(options.offset, params, counter)}`;

  const sql = lines(
    `SELECT ${compileReturningList(table)}`,
    `FROM ${table.qualifiedName}`,
    where,
    compileOrderBy(table, options.orderBy ?? []),
    limit,
    offset,
  );
  return { sql, params };
}

export function compileCount<R extends object>(table: Table<R>, condition?: Condition): CompiledQuery {
  const params: unknown[] = [];
  const counter = { n: 0 };
  const sql = lines(
    'SELECT COUNT(*) AS count',
    `FROM ${table.qualifiedName}`,
    compileWhereClause(condition, params, counter),
  );
  return { sql, params };
}

export function compileInsert<R extends object>(
  table: Table<R>,
  values: readonly ColumnValue[],
): CompiledQuery {
  const params: unknown[] = [];
  const counter = { n: 0 };
  const returning = `RETURNING ${compileReturningList(table)}`;

  if (values.length === 0) {
    const sql = lines(`INSERT INTO ${table.qualifiedName}`, 'DEFAULT VALUES', returning);
    return { sql, params };
  }

  const columns = values.map((v) => quoteIdentifier(v.column));
  const refs = values.map((v) => nextParam(v.value, params, counter));
  const sql = lines(
    `INSERT INTO ${table.qualifiedName} (${columns.join(', ')})`,
    `VALUES (${refs.join(', ')})`,
    returning,
  );
  return { sql, params };
}

export function compileUpdate<R extends object>(
  table: Table<R>,
  values: readonly ColumnValue[],
  condition: Condition,
): CompiledQuery {
  if (values.length === 0) {
    throw new InvalidArgumentError('UPDATE requires at least one column value');
  }
  const params: unknown[] = [];
  const counter = { n: 0 };
  const assignments = values.map(
    (v) => `${quoteIdentifier(v.column)} = ${nextParam(v.value, params, counter)}`,
  );
  const sql = lines(
    `UPDATE ${table.qualifiedName}`,
    `SET ${assignments.join(', ')}`,
    compileWhereClause(condition, params, counter),
    `RETURNING ${compileReturningList(table)}`,
  );
  return { sql, params };
}

/**
 * INSERT … ON CONFLICT on the given key columns. Non-key columns are
 * overwritten from the proposed row; with only key columns present the
 * conflicting row is left as it is.
 */
export function compileUpsert<R extends object>(
  table: Table<R>,
  values: readonly ColumnValue[],
  keyColumns: readonly string[],
): CompiledQuery {
  if (values.length === 0) {
    throw new InvalidArgumentError('UPSERT requires at least one column value');
  }
  const params: unknown[] = [];
  const counter = { n: 0 };
  const columns = values.map((v) => quoteIdentifier(v.column));
  const refs = values.map((v) => nextParam(v.value, params, counter));
  const conflictTarget = keyColumns.map(quoteIdentifier).join(', ');

  const updates = values
    .filter((v) => !keyColumns.includes(v.column))
    .map((v) => `${quoteIdentifier(v.column)} = EXCLUDED.${quoteIdentifier(v.column)}`);
  const action = updates.length === 0 ? 'DO NOTHING' : `DO UPDATE SET ${updates.join(', ')}`;

  const sql = lines(
    `INSERT INTO ${table.qualifiedName} (${columns.join(', ')})`,
    `VALUES (${refs.join(', ')})`,
    `ON CONFLICT (${conflictTarget}) ${action}`,
    `RETURNING ${compileReturningList(table)}`,
  );
  return { sql, params };
}

export function compileDelete<R extends object>(table: Table<R>, condition: Condition): CompiledQuery {
  const params: unknown[] = [];
  const counter = { n: 0 };
  const sql = lines(
    `DELETE FROM ${table.qualifiedName}`,
    compileWhereClause(condition, params, counter),
  );
  return { sql, params };
}
