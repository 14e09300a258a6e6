/**
 * Paged list
 *
 * One page of a larger, ordered result set together with the numbers a
 * caller needs to render paging controls.
 */

export interface PagedList<T> {
  items: T[];
  /** Zero-based page index */
  pageIndex: number;
  pageSize: number;
  totalCount: number;
  totalPages: number;
  hasPreviousPage: boolean;
  hasNextPage: boolean;
}

export interface PageRequest {
  pageIndex: number;
  pageSize: number;
  offset: number;
}

/** Clamp paging input: negative index becomes 0, size below 1 becomes 1. */
export function normalizePage(pageIndex: number, pageSize: number): PageRequest {
  const index = Number.isFinite(pageIndex) ? Math.max(0, Math.floor(pageIndex)) : 0;
  const size = Number.isFinite(pageSize) ? Math.max(1, Math.floor(pageSize)) : 1;
  return { pageIndex: index, pageSize: size, offset: index * size };
}

export function createPagedList<T>(
  items: T[],
  totalCount: number,
  pageIndex: number,
  pageSize: number
): PagedList<T> {
  const totalPages = Math.ceil(totalCount / pageSize);
  return {
    items,
    pageIndex,
    pageSize,
    totalCount,
    totalPages,
    hasPreviousPage: pageIndex > 0,
    hasNextPage: pageIndex + 1 < totalPages
  };
}

/** Map the items of a page while keeping its paging numbers. */
export function mapPagedList<T, U>(list: PagedList<T>, fn: (item: T) => U): PagedList<U> {
  return { ...list, items: list.items.map(fn) };
}
