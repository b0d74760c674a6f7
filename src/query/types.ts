export type ComparisonOperator = '=' | '<>' | '<' | '<=' | '>' | '>=' | 'LIKE';

export type ConditionNode =
  | { kind: 'true' }
  | { kind: 'compare'; column: string; operator: ComparisonOperator; value: unknown }
  | { kind: 'null'; column: string; negated: boolean }
  | { kind: 'in'; column: string; values: readonly unknown[]; negated: boolean }
  | { kind: 'between'; column: string; low: unknown; high: unknown }
  | { kind: 'row'; columns: readonly string[]; values: readonly unknown[] }
  | { kind: 'not'; condition: ConditionNode }
  | { kind: 'and'; conditions: ConditionNode[] }
  | { kind: 'or'; conditions: ConditionNode[] };

export type SortDirection = 'ASC' | 'DESC';

export type NullOrdering = 'FIRST' | 'LAST';

export interface SortField {
  readonly column: string;
  readonly direction: SortDirection;
  readonly nulls?: NullOrdering;
}
