import { InvalidCriteriaError } from '../errors.js';
import type {
  CompositeOperator,
  Criteria,
  CriteriaValue,
  QName,
  SortCriteria,
} from './types.js';

/**
 * Builds a qualified name. With one argument the name is in no namespace.
 *
 * @example
 * qname('lastname')                       // { namespaceUri: '', localName: 'lastname' }
 * qname('http://example.com/ns', 'town')
 */
export function qname(localName: string): QName;
export function qname(namespaceUri: string, localName: string): QName;
export function qname(first: string, second?: string): QName {
  return second === undefined
    ? Object.freeze({ namespaceUri: '', localName: first })
    : Object.freeze({ namespaceUri: first, localName: second });
}

/** Accepts either a bare local name or an already qualified name. */
export function toQName(name: string | QName): QName {
  return typeof name === 'string' ? qname(name) : name;
}

export function valueCriteria(name: string | QName, value: CriteriaValue): Criteria {
  return Object.freeze({ kind: 'value', name: toQName(name), value });
}

/**
 * Builds an and/or node over the given children. The child list is copied
 * and frozen; it must not be empty.
 */
export function compositeCriteria(
  operator: CompositeOperator,
  children: readonly Criteria[],
): Criteria {
  if (children.length === 0) {
    throw new InvalidCriteriaError(operator);
  }
  return Object.freeze({ kind: operator, children: Object.freeze([...children]) });
}

export function andCriteria(children: readonly Criteria[]): Criteria {
  return compositeCriteria('and', children);
}

export function orCriteria(children: readonly Criteria[]): Criteria {
  return compositeCriteria('or', children);
}

export function sortCriteria(name: string | QName, descending: boolean = false): SortCriteria {
  return Object.freeze({ name: toQName(name), descending });
}

export function ascending(name: string | QName): SortCriteria {
  return sortCriteria(name, false);
}

export function descending(name: string | QName): SortCriteria {
  return sortCriteria(name, true);
}
