/**
 * Unit tests for pagination constants and helpers
 */

import { describe, expect, it } from 'vitest';

import {
  DEFAULT_PAGE_SIZE,
  MAX_PAGE_SIZE,
  clampLimit,
  normalizePage,
  normalizePagination,
} from '@/common/constants/pagination.js';

describe('clampLimit', () => {
  it('uses the default for missing values', () => {
    expect(clampLimit(undefined)).toBe(DEFAULT_PAGE_SIZE);
    expect(clampLimit(null)).toBe(20);
    expect(clampLimit(Number.NaN)).toBe(20);
    expect(clampLimit(undefined, 5, 10)).toBe(5);
  });

  it('clamps to the allowed range', () => {
    expect(clampLimit(50)).toBe(50);
    expect(clampLimit(500)).toBe(MAX_PAGE_SIZE);
    expect(clampLimit(0)).toBe(1);
    expect(clampLimit(-1)).toBe(1);
    expect(clampLimit(Number.POSITIVE_INFINITY)).toBe(100);
  });

  it('truncates fractional limits', () => {
    expect(clampLimit(7.9)).toBe(7);
  });
});

describe('normalizePage', () => {
  it('defaults to the first page', () => {
    expect(normalizePage(undefined)).toBe(1);
    expect(normalizePage(null)).toBe(1);
    expect(normalizePage(Number.NaN)).toBe(1);
  });

  it('truncates and clamps', () => {
    expect(normalizePage(3.5)).toBe(3);
    expect(normalizePage(0)).toBe(1);
    expect(normalizePage(2 ** 40)).toBe(4294967295);
  });
});

describe('normalizePagination', () => {
  it('normalizes both values', () => {
    expect(normalizePagination({ page: 2, limit: 1000 })).toEqual({ page: 2, limit: 100 });
    expect(normalizePagination({}, { defaultPageSize: 15, maxPageSize: 30 })).toEqual({
      page: 1,
      limit: 15,
    });
  });
});
