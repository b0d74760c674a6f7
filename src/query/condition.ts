import type { ConditionNode } from './types.js';

/**
 * Merges two nodes under the given combinator. An operand that is
 * already a node of the same kind is flattened into the result, and the
 * neutral 'true' node disappears.
 */
function _combine(kind: 'and' | 'or', left: ConditionNode, right: ConditionNode): ConditionNode {
  if (left.kind === 'true') return right;
  if (right.kind === 'true') return left;

  const parts = (node: ConditionNode): ConditionNode[] =>
    (node.kind === 'and' || node.kind === 'or') && node.kind === kind ? node.conditions : [node];

  return { kind, conditions: [...parts(left), ...parts(right)] };
}

/**
 * Immutable boolean predicate over the columns of one table. Every
 * operation returns a new Condition; existing instances are never
 * mutated.
 */
export class Condition {
  constructor(readonly _node: ConditionNode) {}

  /** Combine with another condition using AND. */
  and(other: Condition): Condition {
    return new Condition(_combine('and', this._node, other._node));
  }

  /** Combine with another condition using OR. */
  or(other: Condition): Condition {
    return new Condition(_combine('or', this._node, other._node));
  }

  /** Negate this condition. */
  not(): Condition {
    if (this._node.kind === 'not') return new Condition(this._node.condition);
    return new Condition({ kind: 'not', condition: this._node });
  }

  /** True when this condition filters nothing out. */
  get isEmpty(): boolean {
    return this._node.kind === 'true';
  }
}

const NO_CONDITION = new Condition({ kind: 'true' });

/**
 * Neutral condition: matches every row and vanishes when combined with
 * another condition.
 */
export function noCondition(): Condition {
  return NO_CONDITION;
}

export function and(...conditions: Condition[]): Condition {
  return conditions.reduce((acc, c) => acc.and(c), NO_CONDITION);
}

export function or(...conditions: Condition[]): Condition {
  const [first, ...rest] = conditions;
  if (first === undefined) return NO_CONDITION;
  return rest.reduce((acc, c) => acc.or(c), first);
}
