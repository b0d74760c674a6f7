import { describe, it, expect } from 'vitest';
import { createKeyMatcher, keyCondition } from '../../src/query/primary-key.js';
import { compileCondition } from '../../src/query/compiler.js';
import type { Condition } from '../../src/query/condition.js';
import { IdentifierError, TableDefinitionError } from '../../src/errors.js';
import { ATHLETE, AUDIT_LOG, MEMBERSHIP } from './helpers.js';
import type { Athlete, Membership } from './helpers.js';

interface MembershipId {
  clubId: number;
  athleteId: number;
}

function render(condition: Condition): { sql: string; params: unknown[] } {
  const params: unknown[] = [];
  return { sql: compileCondition(condition, params, { n: 0 }), params };
}

describe('createKeyMatcher', () => {
  it('returns null for a table without primary key', () => {
    expect(createKeyMatcher(AUDIT_LOG)).toBeNull();
  });

  it('single-column key compares the identifier directly', () => {
    const match = createKeyMatcher<Athlete, number>(ATHLETE);
    expect(match).not.toBeNull();
    expect(render(match!(42))).toEqual({ sql: '"ID" = $1', params: [42] });
  });

  it('composite key builds a row comparison in key order', () => {
    const match = createKeyMatcher<Membership, MembershipId>(MEMBERSHIP);
    expect(render(match!({ clubId: 1, athleteId: 2 }))).toEqual({
      sql: '("CLUB_ID", "ATHLETE_ID") = ($1, $2)',
      params: [1, 2],
    });
  });

  it('reads composite identifier values by name, not by declaration order', () => {
    const match = createKeyMatcher<Membership, MembershipId>(MEMBERSHIP);
    expect(render(match!({ athleteId: 2, clubId: 1 })).params).toEqual([1, 2]);
  });

  it('takes tuple identifiers positionally', () => {
    const match = createKeyMatcher<Membership, [number, number]>(MEMBERSHIP);
    expect(render(match!([1, 2]))).toEqual({
      sql: '("CLUB_ID", "ATHLETE_ID") = ($1, $2)',
      params: [1, 2],
    });
  });

  it('uses an explicit binding', () => {
    const match = createKeyMatcher<Membership, string>(MEMBERSHIP, {
      clubId: (id) => Number(id.split('/')[0]),
      athleteId: (id) => Number(id.split('/')[1]),
    });
    expect(render(match!('3/4')).params).toEqual([3, 4]);
  });

  describe('identifier errors', () => {
    const match = createKeyMatcher<Membership, unknown>(MEMBERSHIP);

    it('missing property', () => {
      expect(() => match!({ clubId: 1 })).toThrow(IdentifierError);
      expect(() => match!({ clubId: 1 })).toThrow('Identifier for "MEMBERSHIP" has no property "athleteId"');
    });

    it('scalar for a composite key', () => {
      expect(() => match!(7)).toThrow(
        'Identifier for "MEMBERSHIP" must be an object or an array for a composite primary key',
      );
    });

    it('tuple of wrong arity', () => {
      expect(() => match!([1, 2, 3])).toThrow('Identifier for "MEMBERSHIP" has 3 values, primary key has 2');
    });

    it('keeps the offending identifier on the error', () => {
      const id = { clubId: 1 };
      try {
        match!(id);
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(IdentifierError);
        expect((err as IdentifierError).identifier).toBe(id);
      }
    });
  });

  describe('binding validation', () => {
    it('rejects a binding for a table without primary key', () => {
      expect(() => createKeyMatcher(AUDIT_LOG, { message: (id: string) => id })).toThrow(TableDefinitionError);
    });

    it('rejects a binding naming a non-key property', () => {
      expect(() =>
        createKeyMatcher(MEMBERSHIP, {
          clubId: (id: number) => id,
          athleteId: (id: number) => id,
          role: (id: number) => id,
        }),
      ).toThrow('Table "MEMBERSHIP": key binding names "role", which is not a primary key property');
    });

    it('rejects a binding missing a key property', () => {
      expect(() => createKeyMatcher(MEMBERSHIP, { clubId: (id: number) => id })).toThrow(
        'Table "MEMBERSHIP": key binding has no accessor for "athleteId"',
      );
    });
  });
});

describe('keyCondition', () => {
  it('single-column key', () => {
    expect(render(keyCondition(ATHLETE.primaryKey!, [7]))).toEqual({ sql: '"ID" = $1', params: [7] });
  });

  it('composite key', () => {
    expect(render(keyCondition(MEMBERSHIP.primaryKey!, [5, 6]))).toEqual({
      sql: '("CLUB_ID", "ATHLETE_ID") = ($1, $2)',
      params: [5, 6],
    });
  });
});
