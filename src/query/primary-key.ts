import { IdentifierError, TableDefinitionError } from '../errors.js';
import type { PrimaryKey, Table } from '../table/table.js';
import type { Condition } from './condition.js';
import { row } from './field.js';

/**
 * Explicit identifier → key value mapping: one accessor per primary key
 * property. Overrides the default binding described on createKeyMatcher().
 */
export type KeyBinding<ID> = Readonly<Record<string, (id: ID) => unknown>>;

export type KeyMatcher<ID> = (id: ID) => Condition;

/**
 * `field = value` for a single-column key, `(f1, …, fn) = (v1, …, vn)`
 * for a composite one. Values are given in key order.
 */
export function keyCondition<R>(key: PrimaryKey<R>, values: readonly unknown[]): Condition {
  const [single] = key.fields;
  if (key.fields.length === 1 && single !== undefined) {
    return single.eq(values[0]);
  }
  return row(...key.fields).eq(values);
}

function readKeyPart(
  tableName: string,
  id: unknown,
  property: string,
  index: number,
  arity: number,
): unknown {
  if (Array.isArray(id)) {
    const parts: readonly unknown[] = id;
    if (parts.length !== arity) {
      throw new IdentifierError(
        `Identifier for "${tableName}" has ${parts.length} values, primary key has ${arity}`,
        id,
      );
    }
    return parts[index];
  }
  if (typeof id !== 'object' || id === null) {
    throw new IdentifierError(
      `Identifier for "${tableName}" must be an object or an array for a composite primary key`,
      id,
    );
  }
  if (!(property in id)) {
    throw new IdentifierError(`Identifier for "${tableName}" has no property "${property}"`, id);
  }
  return Reflect.get(id, property);
}

/**
 * Resolves once, up front, how an identifier turns into key values, and
 * returns the function building the key condition for an identifier.
 * Returns null for tables without a primary key.
 *
 * Default binding:
 * - single-column key: the identifier is the key value;
 * - composite key, object identifier: values are read by key property
 *   name, so the identifier's own property order does not matter;
 * - composite key, array identifier: values are taken in key order.
 */
export function createKeyMatcher<R extends object, ID>(
  table: Table<R>,
  binding?: KeyBinding<ID>,
): KeyMatcher<ID> | null {
  const key = table.primaryKey;
  if (key === null) {
    if (binding !== undefined) {
      throw new TableDefinitionError(table.name, 'key binding given for a table without primary key');
    }
    return null;
  }

  if (binding !== undefined) {
    for (const property of Object.keys(binding)) {
      if (!key.properties.some((p) => p === property)) {
        throw new TableDefinitionError(table.name, `key binding names "${property}", which is not a primary key property`);
      }
    }
  }

  const arity = key.properties.length;
  const extractors = key.properties.map((property, index): ((id: ID) => unknown) => {
    const bound = binding?.[property];
    if (bound !== undefined) return bound;
    if (binding !== undefined) {
      throw new TableDefinitionError(table.name, `key binding has no accessor for "${property}"`);
    }
    if (arity === 1) return (id) => id;
    return (id) => readKeyPart(table.name, id, property, index, arity);
  });

  return (id) => keyCondition(key, extractors.map((extract) => extract(id)));
}
