/**
 * Unit tests for the UPDATE builder
 */

import { describe, expect, it } from 'vitest';

import { Postgres, Sqlite } from '@/infra/database/query-builders/dialect.js';
import { Value, or, simple } from '@/infra/database/query-builders/types.js';
import { update } from '@/infra/database/query-builders/update.js';

describe('UpdateBuilder', () => {
  it('binds SET values before WHERE values', () => {
    const result = update(Postgres, 'users')
      .set('name', Value.string('Alice'))
      .set('age', Value.int(31))
      .filter('id', 'eq', Value.int(7))
      .build();

    expect(result.sql).toBe('UPDATE users SET name = $1, age = $2 WHERE id = $3');
    expect(result.params).toEqual([Value.string('Alice'), Value.int(31), Value.int(7)]);
  });

  it('accepts several assignments at once', () => {
    const result = update(Sqlite, 'users')
      .setMany([
        ['active', Value.bool(false)],
        ['deleted_at', Value.null()],
      ])
      .build();

    expect(result.sql).toBe('UPDATE users SET active = ?1, deleted_at = ?2');
  });

  it('places the filter tree before plain filters and adds RETURNING', () => {
    const result = update(Postgres, 'users')
      .set('active', Value.bool(false))
      .filter('tenant_id', 'eq', Value.int(1))
      .filterExpr(
        or([
          simple('last_login', 'lt', Value.string('2020-01-01')),
          simple('banned', 'eq', Value.bool(true)),
        ])
      )
      .returning(['id'])
      .build();

    expect(result.sql).toBe(
      'UPDATE users SET active = $1 WHERE (last_login < $2 OR banned = $3) AND tenant_id = $4 ' +
        'RETURNING id'
    );
  });

  it('expands IN lists on SQLite after the SET placeholders', () => {
    const result = update(Sqlite, 'users')
      .set('active', Value.bool(true))
      .filter('id', 'in', Value.from([4, 5]))
      .build();

    expect(result.sql).toBe('UPDATE users SET active = ?1 WHERE id IN (?2, ?3)');
  });

  it('throws without assignments', () => {
    expect(() => update(Postgres, 'users').filter('id', 'eq', Value.int(1)).build()).toThrow(
      "UPDATE of 'users' needs at least one SET column"
    );
  });

  it('rejects invalid column names', () => {
    expect(() => update(Postgres, 'users').set('name = 1 --', Value.int(1))).toThrow(
      "Invalid SQL identifier for update column: 'name = 1 --'"
    );
    const pairs = [
      ['ok', Value.int(1)],
      ['x y', Value.int(2)],
    ] as const;
    expect(() => update(Postgres, 'users').setMany(pairs)).toThrow(
      "Invalid SQL identifier for update column: 'x y'"
    );
  });
});
