/**
 * Collection Diff Engine
 * @module data/diff
 *
 * Computes which members of a child collection must be deleted and which
 * inserted to turn the stored collection into the new one. Members present in
 * both (by key) are left alone, so saving an unchanged collection writes
 * nothing.
 */

import type { CategoryId } from '../types/ids.js';
import type { Revision, ThemeTemplate } from '../types/entities.js';

/**
 * Members to delete and members to insert
 */
export interface ListDiff<T> {
  readonly removed: T[];
  readonly added: T[];
}

/**
 * Set difference of two lists by a key extractor.
 * Order of either input does not matter; output keeps input order.
 */
export function diffLists<T, K>(
  oldItems: readonly T[],
  newItems: readonly T[],
  keyOf: (item: T) => K
): ListDiff<T> {
  const oldKeys = new Set(oldItems.map(keyOf));
  const newKeys = new Set(newItems.map(keyOf));

  return {
    removed: oldItems.filter((item) => !newKeys.has(keyOf(item))),
    added: newItems.filter((item) => !oldKeys.has(keyOf(item))),
  };
}

/**
 * Whether a diff contains any change
 */
export function hasChanges<T>(diff: ListDiff<T>): boolean {
  return diff.removed.length > 0 || diff.added.length > 0;
}

// ============================================================================
// Specializations
// ============================================================================

/**
 * Revisions are keyed by their timestamp
 */
export function diffRevisions(
  oldRevisions: readonly Revision[],
  newRevisions: readonly Revision[]
): ListDiff<Revision> {
  return diffLists(oldRevisions, newRevisions, (revision) => revision.asOf.getTime());
}

export function diffPermalinks(
  oldLinks: readonly string[],
  newLinks: readonly string[]
): ListDiff<string> {
  return diffLists(oldLinks, newLinks, (link) => link);
}

export function diffCategoryIds(
  oldIds: readonly CategoryId[],
  newIds: readonly CategoryId[]
): ListDiff<CategoryId> {
  return diffLists(oldIds, newIds, (id) => id);
}

/**
 * Templates are keyed by name and text, so an edited template is replaced
 */
export function diffTemplates(
  oldTemplates: readonly ThemeTemplate[],
  newTemplates: readonly ThemeTemplate[]
): ListDiff<ThemeTemplate> {
  return diffLists(oldTemplates, newTemplates, (template) => JSON.stringify([template.name, template.text]));
}
