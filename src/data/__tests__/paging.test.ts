/**
 * Pagination Tests
 * @module data/__tests__/paging.test
 */

import { describe, it, expect } from 'vitest';
import { pageWindow, toPagedList } from '../paging.js';

describe('pageWindow', () => {
  it('asks for one row beyond the page', () => {
    expect(pageWindow(1, 10)).toEqual({ offset: 0, limit: 11 });
    expect(pageWindow(3, 10)).toEqual({ offset: 20, limit: 11 });
  });

  it('clamps page numbers below one to the first page', () => {
    expect(pageWindow(0, 5)).toEqual({ offset: 0, limit: 6 });
    expect(pageWindow(-4, 5)).toEqual({ offset: 0, limit: 6 });
  });

  it('treats page numbers and sizes that are not finite or not positive as one', () => {
    expect(pageWindow(Number.NaN, 5)).toEqual({ offset: 0, limit: 6 });
    expect(pageWindow(Number.POSITIVE_INFINITY, 5)).toEqual({ offset: 0, limit: 6 });
    expect(pageWindow(2.7, 5)).toEqual({ offset: 5, limit: 6 });
    expect(pageWindow(3, 0)).toEqual({ offset: 2, limit: 2 });
    expect(pageWindow(3, Number.NaN)).toEqual({ offset: 2, limit: 2 });
  });
});

describe('toPagedList', () => {
  it('strips the look-ahead row and reports a next page', () => {
    expect(toPagedList([1, 2, 3], 1, 2)).toEqual({ items: [1, 2], pageNbr: 1, pageSize: 2, hasNext: true });
  });

  it('reports no next page for a short or exact window', () => {
    expect(toPagedList([1, 2], 2, 2).hasNext).toBe(false);
    expect(toPagedList([], 4, 2)).toEqual({ items: [], pageNbr: 4, pageSize: 2, hasNext: false });
  });

  it('reports the clamped page number and size', () => {
    expect(toPagedList(['a', 'b'], Number.NaN, -3)).toEqual({ items: ['a'], pageNbr: 1, pageSize: 1, hasNext: true });
  });
});
