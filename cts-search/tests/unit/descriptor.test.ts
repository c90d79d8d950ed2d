import { describe, it, expect } from 'vitest';
import { searchQuery, toPagination } from '../../src/query/descriptor.js';
import { ascending, valueCriteria } from '../../src/query/criteria.js';
import { InvalidPaginationError } from '../../src/errors.js';

describe('toPagination', () => {
  it('no limit means no pagination', () => {
    expect(toPagination(undefined, undefined)).toBeUndefined();
  });

  it('skip without limit is dropped', () => {
    expect(toPagination(10, undefined)).toBeUndefined();
  });

  it('skip defaults to 0 when a limit is given', () => {
    expect(toPagination(undefined, 10)).toEqual({ skip: 0, limit: 10 });
  });

  it('keeps an explicit skip', () => {
    expect(toPagination(20, 5)).toEqual({ skip: 20, limit: 5 });
  });

  it.each([0, -1, 1.5, Number.NaN])('rejects limit %s', (limit) => {
    expect(() => toPagination(undefined, limit)).toThrow(InvalidPaginationError);
  });

  it.each([-1, 0.5, Number.POSITIVE_INFINITY])('rejects skip %s', (skip) => {
    expect(() => toPagination(skip, 10)).toThrow(InvalidPaginationError);
  });

  it('accepts the largest range that stays a safe integer', () => {
    expect(toPagination(Number.MAX_SAFE_INTEGER - 10, 10)).toEqual({
      skip: Number.MAX_SAFE_INTEGER - 10,
      limit: 10,
    });
  });

  it('rejects skip and limit beyond the safe integer range', () => {
    expect(() => toPagination(2 ** 53, 1)).toThrow(InvalidPaginationError);
    expect(() => toPagination(1e21, 10)).toThrow(InvalidPaginationError);
    expect(() => toPagination(0, 2 ** 53)).toThrow(InvalidPaginationError);
  });

  it('rejects a pair whose last position is not a safe integer', () => {
    expect(() => toPagination(Number.MAX_SAFE_INTEGER - 10, 11)).toThrow(
      `skip + limit must not exceed 9007199254740991, got skip 9007199254740981 and limit 11`,
    );
  });

  it('rejects a bad skip even without a limit', () => {
    expect(() => toPagination(-3, undefined)).toThrow(InvalidPaginationError);
  });
});

describe('searchQuery', () => {
  it('defaults to an empty query', () => {
    expect(searchQuery()).toEqual({
      collection: undefined,
      criteria: undefined,
      pagination: undefined,
      sort: undefined,
    });
  });

  it('carries every field', () => {
    const criteria = valueCriteria('a', 1);
    const sort = [ascending('a')];
    const q = searchQuery({ collection: 'c', criteria, skip: 2, limit: 4, sort });
    expect(q.collection).toBe('c');
    expect(q.criteria).toBe(criteria);
    expect(q.pagination).toEqual({ skip: 2, limit: 4 });
    expect(q.sort).toEqual(sort);
  });

  it('copies the sort list', () => {
    const sort = [ascending('a')];
    const q = searchQuery({ sort });
    sort.push(ascending('b'));
    expect(q.sort).toHaveLength(1);
  });

  it('is frozen', () => {
    expect(Object.isFrozen(searchQuery({ limit: 1 }))).toBe(true);
  });
});
