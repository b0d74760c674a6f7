import { InvalidArgumentError } from '../errors.js';
import { Condition } from './condition.js';
import type { ComparisonOperator, NullOrdering, SortField } from './types.js';

/**
 * Typed reference to one column. V is the value type of the record
 * property the column is mapped to.
 */
export class Field<V = unknown> {
  constructor(
    readonly column: string,
    readonly property: string,
  ) {}

  private compare(operator: ComparisonOperator, value: unknown): Condition {
    return new Condition({ kind: 'compare', column: this.column, operator, value });
  }

  /** `= value`, or `IS NULL` when value is null. */
  eq(value: V | null): Condition {
    if (value === null) return this.isNull();
    return this.compare('=', value);
  }

  /** `<> value`, or `IS NOT NULL` when value is null. */
  ne(value: V | null): Condition {
    if (value === null) return this.isNotNull();
    return this.compare('<>', value);
  }

  lt(value: V): Condition {
    return this.compare('<', value);
  }

  le(value: V): Condition {
    return this.compare('<=', value);
  }

  gt(value: V): Condition {
    return this.compare('>', value);
  }

  ge(value: V): Condition {
    return this.compare('>=', value);
  }

  like(pattern: string): Condition {
    return this.compare('LIKE', pattern);
  }

  between(low: V, high: V): Condition {
    return new Condition({ kind: 'between', column: this.column, low, high });
  }

  in(values: readonly V[]): Condition {
    return new Condition({ kind: 'in', column: this.column, values: [...values], negated: false });
  }

  notIn(values: readonly V[]): Condition {
    return new Condition({ kind: 'in', column: this.column, values: [...values], negated: true });
  }

  isNull(): Condition {
    return new Condition({ kind: 'null', column: this.column, negated: false });
  }

  isNotNull(): Condition {
    return new Condition({ kind: 'null', column: this.column, negated: true });
  }

  asc(nulls?: NullOrdering): SortField {
    return nulls === undefined
      ? { column: this.column, direction: 'ASC' }
      : { column: this.column, direction: 'ASC', nulls };
  }

  desc(nulls?: NullOrdering): SortField {
    return nulls === undefined
      ? { column: this.column, direction: 'DESC' }
      : { column: this.column, direction: 'DESC', nulls };
  }
}

/**
 * Row value expression over several fields, e.g. for composite keys.
 */
export class RowValue {
  constructor(readonly fields: readonly Field[]) {}

  /** `(f1, f2, …) = (v1, v2, …)` */
  eq(values: readonly unknown[]): Condition {
    if (values.length !== this.fields.length) {
      throw new InvalidArgumentError(
        `Row of degree ${this.fields.length} cannot be compared with ${values.length} values`,
      );
    }
    return new Condition({
      kind: 'row',
      columns: this.fields.map((f) => f.column),
      values: [...values],
    });
  }
}

export function row(...fields: Field[]): RowValue {
  return new RowValue(fields);
}
