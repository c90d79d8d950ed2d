import { InvalidCriteriaError } from '../errors.js';
import { formatCriteriaValue } from './values.js';
import type { Criteria, Pagination, QName, SearchQuery, SortCriteria } from './types.js';

export interface CompileOptions {
  /**
   * Emit the `cts:` and `fn:` function prefixes expected by the server.
   * Disable to get the bare structural form. Defaults to true.
   */
  prefixed?: boolean;
}

interface Lexicon {
  search: string;
  collection: string;
  andQuery: string;
  orQuery: string;
  elementValueQuery: string;
  qname: string;
  indexOrder: string;
  elementReference: string;
}

const PREFIXED: Lexicon = {
  search: 'cts:search',
  collection: 'fn:collection',
  andQuery: 'cts:and-query',
  orQuery: 'cts:or-query',
  elementValueQuery: 'cts:element-value-query',
  qname: 'fn:QName',
  indexOrder: 'cts:index-order',
  elementReference: 'cts:element-reference',
};

const BARE: Lexicon = {
  search: 'search',
  collection: 'collection',
  andQuery: 'and-query',
  orQuery: 'or-query',
  elementValueQuery: 'element-value-query',
  qname: 'QName',
  indexOrder: 'index-order',
  elementReference: 'element-reference',
};

function lexiconFor(options: CompileOptions): Lexicon {
  return options.prefixed === false ? BARE : PREFIXED;
}

function compileQName(name: QName, lex: Lexicon): string {
  return `${lex.qname}('${name.namespaceUri}', '${name.localName}')`;
}

function compileCollection(collection: string | undefined, lex: Lexicon): string {
  return collection === undefined ? `${lex.collection}()` : `${lex.collection}('${collection}')`;
}

function compileCriteriaNode(node: Criteria, lex: Lexicon): string {
  if (node.kind === 'value') {
    // Quotes inside the value are not escaped.
    const value = formatCriteriaValue(node.value);
    return `${lex.elementValueQuery}(${compileQName(node.name, lex)}, '${value}')`;
  }

  if (node.children.length === 0) {
    throw new InvalidCriteriaError(node.kind);
  }
  const fn = node.kind === 'and' ? lex.andQuery : lex.orQuery;
  const parts = node.children.map((child) => compileCriteriaNode(child, lex));
  return `${fn}((${parts.join(', ')}))`;
}

/**
 * Compiles a criteria tree into a cts query expression. An absent tree
 * compiles to the empty sequence `()`, which matches every document.
 */
export function compileCriteria(criteria: Criteria | undefined, options: CompileOptions = {}): string {
  if (criteria === undefined) return '()';
  return compileCriteriaNode(criteria, lexiconFor(options));
}

function compileSortEntry(entry: SortCriteria, lex: Lexicon): string {
  const direction = entry.descending ? 'descending' : 'ascending';
  return `${lex.indexOrder}(${lex.elementReference}(${compileQName(entry.name, lex)}), ('${direction}'))`;
}

/**
 * Compiles sort entries into the options sequence of `cts:search`, first
 * entry first. An empty or absent list yields `()`.
 */
export function compileSortOrder(
  sort: readonly SortCriteria[] | undefined,
  options: CompileOptions = {},
): string {
  if (sort === undefined || sort.length === 0) return '()';
  const lex = lexiconFor(options);
  return `(${sort.map((entry) => compileSortEntry(entry, lex)).join(', ')})`;
}

/** 1-based inclusive range: skip=0, limit=10 gives `[1 to 10]`. */
export function compilePaginationSuffix(pagination: Pagination | undefined): string {
  if (pagination === undefined) return '';
  const first = pagination.skip + 1;
  const last = pagination.skip + pagination.limit;
  return `[${first} to ${last}]`;
}

/**
 * Compiles a SearchQuery into a `cts:search` expression.
 *
 * @example
 * compileSearchQuery(search.inCollection('Collection1').limit(10))
 * // "cts:search(fn:collection('Collection1'), (), ())[1 to 10]"
 */
export function compileSearchQuery(query: SearchQuery, options: CompileOptions = {}): string {
  const lex = lexiconFor(options);
  const collection = compileCollection(query.collection, lex);
  const criteria = query.criteria === undefined ? '()' : compileCriteriaNode(query.criteria, lex);
  const sort = compileSortOrder(query.sort, options);
  return `${lex.search}(${collection}, ${criteria}, ${sort})${compilePaginationSuffix(query.pagination)}`;
}
