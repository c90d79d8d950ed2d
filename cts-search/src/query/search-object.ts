import { EMPTY_STATE, SearchBuilder } from './builder.js';

/**
 * Entry point for the search DSL.
 *
 * @example
 * search.inCollection('people')
 *   .where.element('name').equals('Me')
 *   .and.element('town').equals('Paris')
 *   .orderBy('age', 'descending')
 *   .limit(10)
 */
export const search = {
  /** Search across every collection. */
  all(): SearchBuilder {
    return new SearchBuilder(EMPTY_STATE);
  },
  inCollection(collection: string): SearchBuilder {
    return search.all().inCollection(collection);
  },
};
