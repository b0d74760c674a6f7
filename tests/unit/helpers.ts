import { vi } from 'vitest';
import type pg from 'pg';
import { defineTable } from '../../src/table/table.js';

export interface Athlete {
  id: number | null;
  name: string;
}

export interface Membership {
  clubId: number;
  athleteId: number;
  role: string;
}

export interface AuditEntry {
  message: string;
  createdAt: Date;
}

export const ATHLETE = defineTable<Athlete>({
  name: 'ATHLETE',
  columns: { id: 'ID', name: 'NAME' },
  primaryKey: ['id'],
  generated: ['id'],
});

export const MEMBERSHIP = defineTable<Membership>({
  name: 'MEMBERSHIP',
  columns: { clubId: 'CLUB_ID', athleteId: 'ATHLETE_ID', role: 'ROLE' },
  primaryKey: ['clubId', 'athleteId'],
});

export const AUDIT_LOG = defineTable<AuditEntry>({
  name: 'AUDIT_LOG',
  columns: { message: 'MESSAGE', createdAt: 'CREATED_AT' },
});

export interface FakeResult {
  rows?: object[];
  rowCount?: number | null;
}

const CONTROL = /^(BEGIN|COMMIT|ROLLBACK|SET LOCAL)/;

/**
 * Pool whose single client answers transaction control statements with an
 * empty result and every other statement with the next scripted result.
 */
export function makePool(results: FakeResult[] = []) {
  const queue = [...results];
  const client = {
    query: vi.fn(async (sql: string, _params?: unknown[]) => {
      if (CONTROL.test(sql)) return { rows: [], rowCount: null };
      const next = queue.shift() ?? {};
      const rows = next.rows ?? [];
      return { rows, rowCount: 'rowCount' in next ? next.rowCount : rows.length };
    }),
    release: vi.fn(),
  };
  const pool = {
    connect: vi.fn().mockResolvedValue(client),
    query: vi.fn(),
    end: vi.fn().mockResolvedValue(undefined),
  };
  return {
    pool: pool as unknown as pg.Pool,
    fakePool: pool,
    client,
    /** Every SQL string the client received, in order. */
    statements: (): string[] => client.query.mock.calls.map((c) => c[0]),
    /** Non-control statements with their parameters. */
    dataCalls: (): Array<{ sql: string; params: unknown[] }> =>
      client.query.mock.calls
        .filter((c) => !CONTROL.test(c[0]))
        .map((c) => ({ sql: c[0], params: c[1] ?? [] })),
  };
}
