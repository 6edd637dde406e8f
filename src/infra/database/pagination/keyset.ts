/**
 * Keyset Pagination
 *
 * Turns a sort order plus the cursor of the last seen row into a seek predicate.
 * For sorts (a ASC, b ASC) after cursor (1, 2):
 *
 *   (a > 1) OR (a = 1 AND b > 2)
 *
 * Each sort field may carry its own direction.
 */

import {
  and,
  or,
  simple,
  type CursorDirection,
  type FilterExpr,
  type Operator,
  type SortDir,
  type SortField,
  type Value,
} from '../query-builders/types.js';

import type { Cursor } from './cursor.js';

function seekOperator(direction: CursorDirection, dir: SortDir): Operator {
  const forward = direction === 'after';
  return forward === (dir === 'asc') ? 'gt' : 'lt';
}

export class KeysetCondition {
  private constructor(
    readonly sorts: readonly SortField[],
    readonly values: readonly Value[],
    readonly direction: CursorDirection
  ) {}

  /**
   * Condition for rows after the cursor. Undefined when `sorts` is empty or the
   * cursor lacks a value for one of the sort fields.
   */
  static after(sorts: readonly SortField[], cursor: Cursor): KeysetCondition | undefined {
    return KeysetCondition.create(sorts, cursor, 'after');
  }

  static before(sorts: readonly SortField[], cursor: Cursor): KeysetCondition | undefined {
    return KeysetCondition.create(sorts, cursor, 'before');
  }

  private static create(
    sorts: readonly SortField[],
    cursor: Cursor,
    direction: CursorDirection
  ): KeysetCondition | undefined {
    if (sorts.length === 0) {
      return undefined;
    }

    const values: Value[] = [];
    for (const sort of sorts) {
      const value = cursor.get(sort.field);
      if (value === undefined) {
        return undefined;
      }
      values.push(value);
    }

    return new KeysetCondition(Object.freeze([...sorts]), Object.freeze(values), direction);
  }

  toFilterExpr(): FilterExpr {
    const branches: FilterExpr[] = [];

    this.sorts.forEach((sort, i) => {
      const terms: FilterExpr[] = [];
      for (let j = 0; j < i; j++) {
        terms.push(this.term(j, 'eq'));
      }
      terms.push(this.term(i, seekOperator(this.direction, sort.dir)));

      const [only] = terms;
      branches.push(terms.length === 1 && only !== undefined ? only : and(terms));
    });

    const [single] = branches;
    return branches.length === 1 && single !== undefined ? single : or(branches);
  }

  private term(index: number, op: Operator): FilterExpr {
    const sort = this.sorts[index];
    const value = this.values[index];
    if (sort === undefined || value === undefined) {
      throw new Error(`Keyset term ${String(index)} out of range`);
    }
    return simple(sort.field, op, value);
  }
}
