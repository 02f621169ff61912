/**
 * Category Hierarchy Resolver Tests
 * @module data/__tests__/hierarchy.test
 */

import { describe, it, expect, vi } from 'vitest';
import { orderByHierarchy, withPostCounts } from '../hierarchy.js';
import { CategoryId, WebLogId } from '../../types/ids.js';
import type { Category } from '../../types/entities.js';

const webLogId = WebLogId.parse('wl-1');

function category(id: string, name: string, parent?: string): Category {
  return {
    id: CategoryId.parse(id),
    webLogId,
    name,
    slug: name.toLowerCase(),
    parentId: parent === undefined ? undefined : CategoryId.parse(parent),
  };
}

const summary = (categories: readonly Category[]) => orderByHierarchy(categories).map((entry) => ({
  id: entry.category.id,
  slug: entry.slug,
  parentNames: entry.parentNames,
  descendantIds: entry.descendantIds,
}));

describe('orderByHierarchy', () => {
  it('walks roots and siblings in case-insensitive name order', () => {
    const result = summary([
      category('t', 'Tech'),
      category('z', 'Zig', 't'),
      category('a', 'art'),
      category('g', 'Go', 't'),
    ]);

    expect(result).toEqual([
      { id: 'a', slug: 'art', parentNames: [], descendantIds: [] },
      { id: 't', slug: 'tech', parentNames: [], descendantIds: ['g', 'z'] },
      { id: 'g', slug: 'tech/go', parentNames: ['Tech'], descendantIds: [] },
      { id: 'z', slug: 'tech/zig', parentNames: ['Tech'], descendantIds: [] },
    ]);
  });

  it('collects descendants at every depth', () => {
    const result = summary([category('c', 'Cats', 'b'), category('b', 'Big', 'a'), category('a', 'Animals')]);

    expect(result.map((entry) => entry.slug)).toEqual(['animals', 'animals/big', 'animals/big/cats']);
    expect(result[0]?.descendantIds).toEqual(['b', 'c']);
    expect(result[2]?.parentNames).toEqual(['Animals', 'Big']);
  });

  it('treats a category with a missing parent as a root', () => {
    const result = summary([category('o', 'Orphan', 'gone'), category('m', 'Main')]);

    expect(result.map((entry) => [entry.id, entry.slug])).toEqual([['m', 'main'], ['o', 'orphan']]);
  });

  it('emits categories caught in a cycle exactly once', () => {
    const result = summary([category('y', 'Yankee', 'x'), category('x', 'X-ray', 'y'), category('r', 'Root')]);

    expect(result).toEqual([
      { id: 'r', slug: 'root', parentNames: [], descendantIds: [] },
      { id: 'x', slug: 'x-ray', parentNames: [], descendantIds: ['y'] },
      { id: 'y', slug: 'x-ray/yankee', parentNames: ['X-ray'], descendantIds: [] },
    ]);
  });

  it('breaks name ties by ID', () => {
    expect(summary([category('b', 'Same'), category('a', 'same')]).map((entry) => entry.id)).toEqual(['a', 'b']);
  });

  it('returns nothing for no categories', () => {
    expect(orderByHierarchy([])).toEqual([]);
  });
});

describe('withPostCounts', () => {
  it('counts each category together with its descendants', async () => {
    const counter = vi.fn(async (ids: readonly CategoryId[]) => ids.length * 10);
    const entries = orderByHierarchy([category('p', 'Parent'), category('c', 'Child', 'p')]);

    const result = await withPostCounts(entries, counter);

    expect(counter).toHaveBeenCalledWith(['p', 'c']);
    expect(counter).toHaveBeenCalledWith(['c']);
    expect(result).toEqual([
      { id: 'p', slug: 'parent', name: 'Parent', parentNames: [], postCount: 20 },
      { id: 'c', slug: 'parent/child', name: 'Child', parentNames: ['Parent'], postCount: 10 },
    ]);
  });
});
