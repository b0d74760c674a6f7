import type { ColumnProperty, Table } from './table.js';

// Snapshot of the column values a record had when it was last read from
// or written to the database. Weak keys: a record is never kept alive here.
const snapshots = new WeakMap<object, ReadonlyMap<string, unknown>>();

function sameValue(a: unknown, b: unknown): boolean {
  if (a instanceof Date && b instanceof Date) return a.getTime() === b.getTime();
  return Object.is(a, b);
}

/** Remember the record's current column values as its stored state. */
export function markStored<R extends object>(table: Table<R>, record: R): void {
  const values = new Map<string, unknown>();
  for (const property of table.properties) {
    values.set(property, record[property]);
  }
  snapshots.set(record, values);
}

/** Forget the stored state, e.g. after the row was deleted. */
export function forget(record: object): void {
  snapshots.delete(record);
}

export function storedValue(record: object, property: string): unknown {
  return snapshots.get(record)?.get(property);
}

/**
 * A record is new when it was never stored, or when its key was changed
 * since it was stored: saving it then creates a new row.
 */
export function isNew<R extends object>(table: Table<R>, record: R): boolean {
  const snapshot = snapshots.get(record);
  if (snapshot === undefined) return true;
  if (table.primaryKey === null) return true;
  return table.primaryKey.properties.some((p) => !sameValue(snapshot.get(p), record[p]));
}

/** Properties whose value differs from the stored state, in declaration order. */
export function changedProperties<R extends object>(table: Table<R>, record: R): ColumnProperty<R>[] {
  const snapshot = snapshots.get(record);
  if (snapshot === undefined) return [...table.properties];
  return table.properties.filter((p) => !sameValue(snapshot.get(p), record[p]));
}

/**
 * Captures the record's column values and stored state; the returned
 * function puts both back.
 */
export function captureState<R extends object>(table: Table<R>, record: R): () => void {
  const snapshot = snapshots.get(record);
  const fields = table.properties.map((property) => ({
    property,
    present: Object.hasOwn(record, property),
    value: record[property],
  }));
  return () => {
    for (const { property, present, value } of fields) {
      if (present) {
        record[property] = value;
      } else {
        Reflect.deleteProperty(record, property);
      }
    }
    if (snapshot === undefined) {
      snapshots.delete(record);
    } else {
      snapshots.set(record, snapshot);
    }
  };
}
