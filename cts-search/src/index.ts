export { search } from './query/search-object.js';
export type { SearchBuilder } from './query/builder.js';
export {
  qname,
  valueCriteria,
  compositeCriteria,
  andCriteria,
  orCriteria,
  sortCriteria,
  ascending,
  descending,
} from './query/criteria.js';
export { searchQuery } from './query/descriptor.js';
export type { SearchQueryInit } from './query/descriptor.js';
export { compileSearchQuery } from './query/compiler.js';
export type { CompileOptions } from './query/compiler.js';
export { formatCriteriaValue } from './query/values.js';
export type {
  QName,
  ScalarValue,
  CriteriaValue,
  CompositeOperator,
  Criteria,
  SortDirection,
  SortCriteria,
  Pagination,
  SearchQuery,
} from './query/types.js';
export {
  SearchQueryError,
  InvalidCriteriaError,
  InvalidPaginationError,
  UnsupportedValueError,
} from './errors.js';
