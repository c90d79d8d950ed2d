import { compileSearchQuery } from './compiler.js';
import type { CompileOptions } from './compiler.js';
import { compositeCriteria, qname, sortCriteria, toQName, valueCriteria } from './criteria.js';
import { toPagination } from './descriptor.js';
import type {
  Criteria,
  CriteriaValue,
  Pagination,
  QName,
  SearchQuery,
  SortCriteria,
  SortDirection,
} from './types.js';

type Combinator = 'where' | 'and' | 'or';

interface SearchState {
  readonly collection: string | undefined;
  readonly criteria: Criteria | undefined;
  readonly skip: number | undefined;
  readonly limit: number | undefined;
  readonly pagination: Pagination | undefined;
  readonly sort: readonly SortCriteria[];
}

export const EMPTY_STATE: SearchState = Object.freeze({
  collection: undefined,
  criteria: undefined,
  skip: undefined,
  limit: undefined,
  pagination: undefined,
  sort: Object.freeze([]),
});

/**
 * Combines a new leaf with the existing criteria using the given combinator.
 * Repeating the same combinator appends to the existing composite instead
 * of nesting it again.
 */
function _applyCriteria(
  existing: Criteria | undefined,
  combinator: Combinator,
  newNode: Criteria,
): Criteria {
  if (combinator === 'where' || existing === undefined) {
    return newNode;
  }
  if (existing.kind !== 'value' && existing.kind === combinator) {
    return compositeCriteria(combinator, [...existing.children, newNode]);
  }
  return compositeCriteria(combinator, [existing, newNode]);
}

/**
 * Fluent immutable search builder. Implements SearchQuery so it can be
 * passed straight to compileSearchQuery(). Every operation returns a new
 * SearchBuilder; existing instances are never mutated.
 */
export class SearchBuilder implements SearchQuery {
  constructor(private readonly _state: SearchState) {}

  get collection(): string | undefined {
    return this._state.collection;
  }

  get criteria(): Criteria | undefined {
    return this._state.criteria;
  }

  get pagination(): Pagination | undefined {
    return this._state.pagination;
  }

  get sort(): readonly SortCriteria[] {
    return this._state.sort;
  }

  /** Start a new criteria expression, replacing any existing one. */
  get where(): ElementSelector {
    return new ElementSelector(this._state, 'where');
  }

  /** Combine with the existing criteria using and-query. */
  get and(): ElementSelector {
    return new ElementSelector(this._state, 'and');
  }

  /** Combine with the existing criteria using or-query. */
  get or(): ElementSelector {
    return new ElementSelector(this._state, 'or');
  }

  /** Restrict the search to one collection. */
  inCollection(collection: string): SearchBuilder {
    return new SearchBuilder({ ...this._state, collection });
  }

  /** Append a sort key; earlier keys take precedence. */
  orderBy(name: string | QName, direction: SortDirection = 'ascending'): SearchBuilder {
    const entry = sortCriteria(name, direction === 'descending');
    return new SearchBuilder({ ...this._state, sort: Object.freeze([...this._state.sort, entry]) });
  }

  skip(skip: number): SearchBuilder {
    const pagination = toPagination(skip, this._state.limit);
    return new SearchBuilder({ ...this._state, skip, pagination });
  }

  limit(limit: number): SearchBuilder {
    const pagination = toPagination(this._state.skip, limit);
    return new SearchBuilder({ ...this._state, limit, pagination });
  }

  compile(options?: CompileOptions): string {
    return compileSearchQuery(this, options);
  }
}

/**
 * Intermediate builder step: holds the combinator and awaits an element name.
 */
export class ElementSelector {
  constructor(
    private readonly _state: SearchState,
    private readonly _combinator: Combinator,
  ) {}

  /** Select the element whose value is matched. */
  element(name: string | QName): ValueSetter;
  element(namespaceUri: string, localName: string): ValueSetter;
  element(first: string | QName, localName?: string): ValueSetter {
    const name = typeof first === 'string' && localName !== undefined
      ? qname(first, localName)
      : toQName(first);
    return new ValueSetter(this._state, this._combinator, name);
  }
}

/**
 * Intermediate builder step: holds the element name and awaits a value.
 */
export class ValueSetter {
  constructor(
    private readonly _state: SearchState,
    private readonly _combinator: Combinator,
    private readonly _name: QName,
  ) {}

  /** Complete the expression with the value to match. */
  equals(value: CriteriaValue): SearchBuilder {
    const newNode = valueCriteria(this._name, value);
    const criteria = _applyCriteria(this._state.criteria, this._combinator, newNode);
    return new SearchBuilder({ ...this._state, criteria });
  }
}
