/** Namespace-qualified element name, as `fn:QName(namespaceUri, localName)`. */
export interface QName {
  readonly namespaceUri: string;
  readonly localName: string;
}

export type ScalarValue = string | number | boolean | bigint;

/**
 * Value matched by a leaf criteria. Formatted to text when the query is
 * compiled, not when the node is built.
 */
export type CriteriaValue = ScalarValue | Date | null | readonly ScalarValue[];

export type CompositeOperator = 'and' | 'or';

export type Criteria =
  | { readonly kind: 'value'; readonly name: QName; readonly value: CriteriaValue }
  | { readonly kind: CompositeOperator; readonly children: readonly Criteria[] };

export type SortDirection = 'ascending' | 'descending';

export interface SortCriteria {
  readonly name: QName;
  readonly descending: boolean;
}

/** Present only when a limit was requested; skip defaults to 0. */
export interface Pagination {
  readonly skip: number;
  readonly limit: number;
}

/**
 * Input of the compiler. Every field is optional: no collection searches all
 * collections, no criteria matches everything, no sort keeps the database's
 * default order.
 */
export interface SearchQuery {
  readonly collection?: string | undefined;
  readonly criteria?: Criteria | undefined;
  readonly pagination?: Pagination | undefined;
  readonly sort?: readonly SortCriteria[] | undefined;
}
