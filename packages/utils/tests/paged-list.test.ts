import { describe, expect, it } from 'vitest';
import { createPagedList, mapPagedList, normalizePage } from '../src/paged-list.js';

describe('normalizePage', () => {
  it('clamps negative index and non-positive size', () => {
    expect(normalizePage(-1, 0)).toEqual({ pageIndex: 0, pageSize: 1, offset: 0 });
  });

  it('computes the offset', () => {
    expect(normalizePage(2, 10)).toEqual({ pageIndex: 2, pageSize: 10, offset: 20 });
  });
});

describe('createPagedList', () => {
  it('reports the paging numbers', () => {
    const list = createPagedList(['a', 'b'], 5, 0, 2);
    expect(list.totalPages).toBe(3);
    expect(list.hasPreviousPage).toBe(false);
    expect(list.hasNextPage).toBe(true);
  });

  it('has no next page on the last page', () => {
    const list = createPagedList(['e'], 5, 2, 2);
    expect(list.hasPreviousPage).toBe(true);
    expect(list.hasNextPage).toBe(false);
  });

  it('handles an empty result', () => {
    const list = createPagedList([], 0, 0, 10);
    expect(list.totalPages).toBe(0);
    expect(list.hasNextPage).toBe(false);
  });
});

describe('mapPagedList', () => {
  it('maps items and keeps the numbers', () => {
    const mapped = mapPagedList(createPagedList([1, 2], 4, 0, 2), (n) => n * 10);
    expect(mapped.items).toEqual([10, 20]);
    expect(mapped.totalCount).toBe(4);
  });
});
