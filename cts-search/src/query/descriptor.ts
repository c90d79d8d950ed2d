import { InvalidPaginationError } from '../errors.js';
import type { Criteria, Pagination, SearchQuery, SortCriteria } from './types.js';

export interface SearchQueryInit {
  collection?: string | undefined;
  criteria?: Criteria | undefined;
  skip?: number | undefined;
  limit?: number | undefined;
  sort?: readonly SortCriteria[] | undefined;
}

/**
 * Validates skip/limit and returns the pagination they describe, or
 * undefined when no limit was requested. A skip without a limit has no
 * representation in the search expression and is dropped.
 *
 * Both bounds of the emitted range must stay safe integers, so
 * `skip + limit` may not exceed `Number.MAX_SAFE_INTEGER`.
 */
export function toPagination(
  skip: number | undefined,
  limit: number | undefined,
): Pagination | undefined {
  if (skip !== undefined && !(Number.isSafeInteger(skip) && skip >= 0)) {
    throw new InvalidPaginationError('skip', skip);
  }
  if (limit === undefined) {
    return undefined;
  }
  if (!(Number.isSafeInteger(limit) && limit > 0)) {
    throw new InvalidPaginationError('limit', limit);
  }
  const offset = skip ?? 0;
  if (offset > Number.MAX_SAFE_INTEGER - limit) {
    throw new InvalidPaginationError(
      'limit',
      limit,
      `skip + limit must not exceed ${Number.MAX_SAFE_INTEGER}, got skip ${offset} and limit ${limit}`,
    );
  }
  return Object.freeze({ skip: offset, limit });
}

/** Builds a frozen SearchQuery from loose optional fields. */
export function searchQuery(init: SearchQueryInit = {}): SearchQuery {
  return Object.freeze({
    collection: init.collection,
    criteria: init.criteria,
    pagination: toPagination(init.skip, init.limit),
    sort: init.sort === undefined ? undefined : Object.freeze([...init.sort]),
  });
}
