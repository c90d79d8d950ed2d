import { describe, it, expect } from 'vitest';

describe('Public API surface', () => {
  it('exports search object', async () => {
    const { search } = await import('../../src/index.js');
    expect(typeof search.all).toBe('function');
    expect(typeof search.inCollection).toBe('function');
  });

  it('exports compileSearchQuery', async () => {
    const { compileSearchQuery, searchQuery } = await import('../../src/index.js');
    expect(compileSearchQuery(searchQuery())).toBe('cts:search(fn:collection(), (), ())');
  });

  it('exports error classes usable with instanceof', async () => {
    const { InvalidCriteriaError, SearchQueryError } = await import('../../src/index.js');
    const err = new InvalidCriteriaError('and');
    expect(err).toBeInstanceOf(SearchQueryError);
    expect(err).toBeInstanceOf(Error);
  });

  it('does NOT export compileCriteria (internal)', async () => {
    const api = await import('../../src/index.js');
    expect((api as Record<string, unknown>)['compileCriteria']).toBeUndefined();
  });

  it('does NOT export SearchBuilder as a value (internal)', async () => {
    const api = await import('../../src/index.js');
    expect((api as Record<string, unknown>)['SearchBuilder']).toBeUndefined();
  });
});
