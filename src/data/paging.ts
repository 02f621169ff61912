/**
 * Pagination Contract
 * @module data/paging
 *
 * Paged listings ask the backend for one row more than the page holds. The
 * extra row only signals that a further page exists; it is stripped here so
 * every adapter hands callers the same shape.
 */

/**
 * One page of a listing
 */
export interface PagedList<T> {
  readonly items: T[];
  /** 1-based page number */
  readonly pageNbr: number;
  readonly pageSize: number;
  /** Whether at least one row exists beyond this page */
  readonly hasNext: boolean;
}

/**
 * Page size of the administrative page listing
 */
export const PAGES_PER_ADMIN_PAGE = 25;

/**
 * Row window for a page: `limit` is pageSize + 1
 */
export interface PageWindow {
  readonly offset: number;
  readonly limit: number;
}

/**
 * Whole number of at least 1; NaN and infinities become 1
 */
function atLeastOne(value: number): number {
  return Number.isFinite(value) && value >= 1 ? Math.trunc(value) : 1;
}

/**
 * Offset and look-ahead limit of a 1-based page
 */
export function pageWindow(pageNbr: number, pageSize: number): PageWindow {
  const page = atLeastOne(pageNbr);
  const size = atLeastOne(pageSize);
  return { offset: (page - 1) * size, limit: size + 1 };
}

/**
 * Strip the look-ahead row from a fetched window
 */
export function toPagedList<T>(rows: readonly T[], pageNbr: number, pageSize: number): PagedList<T> {
  const size = atLeastOne(pageSize);
  return {
    items: rows.slice(0, size),
    pageNbr: atLeastOne(pageNbr),
    pageSize: size,
    hasNext: rows.length > size,
  };
}
