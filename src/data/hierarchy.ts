/**
 * Category Hierarchy Resolver
 * @module data/hierarchy
 *
 * Flattens a web log's categories into display order: a pre-order walk with
 * roots first and siblings sorted by name, case-insensitively. Each entry
 * carries its full slug path, its ancestors' names, and the IDs of every
 * category below it, which the adapters use to roll post counts up.
 *
 * The stored data is not guaranteed to be a tree. A category whose parent is
 * missing is treated as a root. Categories caught in a parent cycle are never
 * reached from a root; once the roots are done, the first such category (in
 * name order) is walked as if it were a root, until every category has been
 * emitted exactly once.
 */

import type { CategoryId } from '../types/ids.js';
import type { Category } from '../types/entities.js';
import type { DisplayCategory } from '../types/display.js';

// ============================================================================
// Types
// ============================================================================

/**
 * A category in display order
 */
export interface HierarchyEntry {
  readonly category: Category;
  /** Ancestor slugs and own slug joined by "/" */
  readonly slug: string;
  /** Ancestor names, root first */
  readonly parentNames: readonly string[];
  /** Every category below this one in the resolved tree */
  readonly descendantIds: readonly CategoryId[];
}

/**
 * Counts distinct published posts in any of the given categories
 */
export type PostCounter = (categoryIds: readonly CategoryId[]) => Promise<number>;

// ============================================================================
// Ordering
// ============================================================================

function byName(a: Category, b: Category): number {
  const left = a.name.toLowerCase();
  const right = b.name.toLowerCase();
  if (left !== right) return left < right ? -1 : 1;
  if (a.id === b.id) return 0;
  return a.id < b.id ? -1 : 1;
}

/**
 * Resolve the display order and paths of a flat category list
 */
export function orderByHierarchy(categories: readonly Category[]): HierarchyEntry[] {
  const known = new Set<CategoryId>(categories.map((cat) => cat.id));
  const children = new Map<CategoryId, Category[]>();
  const roots: Category[] = [];

  for (const cat of categories) {
    if (cat.parentId !== undefined && known.has(cat.parentId)) {
      const siblings = children.get(cat.parentId) ?? [];
      siblings.push(cat);
      children.set(cat.parentId, siblings);
    } else {
      roots.push(cat);
    }
  }
  for (const siblings of children.values()) siblings.sort(byName);
  roots.sort(byName);

  const visited = new Set<CategoryId>();
  const ordered: HierarchyEntry[] = [];

  // Returns the IDs of the subtree below `cat` as emitted
  const visit = (cat: Category, slugBase: string, parentNames: readonly string[]): CategoryId[] => {
    visited.add(cat.id);
    const slug = slugBase === '' ? cat.slug : `${slugBase}/${cat.slug}`;
    const position = ordered.length;
    ordered.push({ category: cat, slug, parentNames, descendantIds: [] });

    const below: CategoryId[] = [];
    for (const child of children.get(cat.id) ?? []) {
      if (visited.has(child.id)) continue;
      below.push(child.id, ...visit(child, slug, [...parentNames, cat.name]));
    }
    ordered[position] = { category: cat, slug, parentNames, descendantIds: below };
    return below;
  };

  for (const root of roots) {
    if (!visited.has(root.id)) visit(root, '', []);
  }

  // Whatever is left hangs off a cycle
  const stranded = categories.filter((cat) => !visited.has(cat.id)).sort(byName);
  for (const cat of stranded) {
    if (!visited.has(cat.id)) visit(cat, '', []);
  }

  return ordered;
}

// ============================================================================
// Post Counts
// ============================================================================

/**
 * Annotate resolved categories with the count of published posts in each
 * category and its descendants; one count per category
 */
export async function withPostCounts(
  entries: readonly HierarchyEntry[],
  countPosts: PostCounter
): Promise<DisplayCategory[]> {
  return Promise.all(entries.map(async (entry) =>
    toDisplayCategory(entry, await countPosts([entry.category.id, ...entry.descendantIds]))));
}

/**
 * Project a resolved category into its display form
 */
export function toDisplayCategory(entry: HierarchyEntry, postCount: number): DisplayCategory {
  return {
    id: entry.category.id,
    slug: entry.slug,
    name: entry.category.name,
    description: entry.category.description,
    parentNames: [...entry.parentNames],
    postCount,
  };
}
