import { z } from 'zod';
import {
  compositeCriteria,
  qname,
  searchQuery,
  sortCriteria,
  valueCriteria,
} from 'cts-search';
import type { Criteria, QName, SearchQuery } from 'cts-search';
import { CriteriaTooDeepError } from '../errors.js';

const ElementSchema = z.object({
  namespaceUri: z.string().optional(),
  localName: z.string().min(1),
}).strict();

const ScalarSchema = z.union([z.string(), z.number().finite(), z.boolean()]);

type ElementJson = z.infer<typeof ElementSchema>;
type ScalarJson = z.infer<typeof ScalarSchema>;

export type CriteriaJson =
  | { element: ElementJson; equals: ScalarJson | ScalarJson[] | null }
  | { and: CriteriaJson[] }
  | { or: CriteriaJson[] };

// Empty and/or lists pass here and are rejected by the criteria constructors.
export const CriteriaSchema: z.ZodType<CriteriaJson> = z.lazy(() =>
  z.union([
    z.object({
      element: ElementSchema,
      equals: z.union([ScalarSchema, z.array(ScalarSchema), z.null()]),
    }).strict(),
    z.object({ and: z.array(CriteriaSchema) }).strict(),
    z.object({ or: z.array(CriteriaSchema) }).strict(),
  ]),
);

export const CompileRequestSchema = z.object({
  collection: z.string().min(1).optional(),
  criteria: CriteriaSchema.optional(),
  skip: z.number().optional(),
  limit: z.number().optional(),
  sort: z.array(
    ElementSchema.extend({
      direction: z.enum(['ascending', 'descending']).optional(),
    }),
  ).optional(),
  prefixed: z.boolean().optional(),
}).strict();

export type CompileRequest = z.infer<typeof CompileRequestSchema>;

function toQName(element: ElementJson): QName {
  return qname(element.namespaceUri ?? '', element.localName);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Walks the raw `criteria` of a request body without recursion and throws
 * CriteriaTooDeepError once an and/or/leaf object sits deeper than
 * `maxDepth`. Runs before schema validation, which recurses per level.
 */
export function assertCriteriaDepth(body: unknown, maxDepth: number): void {
  if (!isRecord(body)) return;
  const pending: Array<{ node: unknown; depth: number }> = [{ node: body['criteria'], depth: 1 }];
  let entry = pending.pop();
  while (entry !== undefined) {
    const { node, depth } = entry;
    if (isRecord(node)) {
      if (depth > maxDepth) {
        throw new CriteriaTooDeepError(maxDepth);
      }
      for (const key of ['and', 'or']) {
        const children: unknown = node[key];
        if (Array.isArray(children)) {
          for (const child of children) {
            pending.push({ node: child, depth: depth + 1 });
          }
        }
      }
    }
    entry = pending.pop();
  }
}

/**
 * Converts criteria JSON into a criteria tree, depth first. The root is at
 * depth 1.
 */
export function toCriteria(json: CriteriaJson, maxDepth: number, depth: number = 1): Criteria {
  if (depth > maxDepth) {
    throw new CriteriaTooDeepError(maxDepth);
  }
  if ('element' in json) {
    return valueCriteria(toQName(json.element), json.equals);
  }
  if ('and' in json) {
    return compositeCriteria('and', json.and.map((child) => toCriteria(child, maxDepth, depth + 1)));
  }
  return compositeCriteria('or', json.or.map((child) => toCriteria(child, maxDepth, depth + 1)));
}

export function toSearchQuery(request: CompileRequest, maxDepth: number): SearchQuery {
  return searchQuery({
    collection: request.collection,
    criteria: request.criteria === undefined ? undefined : toCriteria(request.criteria, maxDepth),
    skip: request.skip,
    limit: request.limit,
    sort: request.sort?.map((entry) => sortCriteria(toQName(entry), entry.direction === 'descending')),
  });
}
