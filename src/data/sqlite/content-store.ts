/**
 * SQLite Content Store Base
 * @module data/sqlite/content-store
 *
 * Child-table handling shared by pages and posts. Revisions, prior
 * permalinks and post categories are written by diff: only rows that were
 * removed or added since the stored version are touched.
 */

import { z } from 'zod';
import { MarkupTextSchema, type Revision } from '../../types/entities.js';
import { CategoryId } from '../../types/ids.js';
import { diffCategoryIds, diffPermalinks, diffRevisions, type ListDiff } from '../diff.js';
import { SqliteStore, sqlDate } from './sqlite-store.js';

const RevisionRow = z.object({
  as_of: sqlDate,
  revision_text: MarkupTextSchema,
}).transform((row): Revision => ({ asOf: row.as_of, text: row.revision_text }));

const ValueRow = z.object({ value: z.string() }).transform((row) => row.value);

/**
 * Names of one parent's child tables
 */
export interface ChildTable {
  /** Table name */
  readonly table: string;
  /** Column holding the parent's ID */
  readonly parentColumn: string;
}

export abstract class SqliteContentStore extends SqliteStore {
  // ==========================================================================
  // Revisions
  // ==========================================================================

  protected loadRevisions(child: ChildTable, parentId: string): Revision[] {
    return this.queryAll(RevisionRow,
      `SELECT as_of, revision_text FROM ${child.table}
        WHERE ${child.parentColumn} = @parentId ORDER BY as_of DESC`,
      { parentId });
  }

  protected syncRevisions(child: ChildTable, parentId: string, revisions: readonly Revision[]): void {
    const { removed, added } = diffRevisions(this.loadRevisions(child, parentId), revisions);
    for (const revision of removed) {
      this.execute(
        `DELETE FROM ${child.table} WHERE ${child.parentColumn} = @parentId AND as_of = @asOf`,
        { parentId, asOf: revision.asOf.toISOString() }
      );
    }
    for (const revision of added) {
      this.execute(
        `INSERT INTO ${child.table} (${child.parentColumn}, as_of, revision_text)
         VALUES (@parentId, @asOf, @text)`,
        { parentId, asOf: revision.asOf.toISOString(), text: revision.text }
      );
    }
  }

  // ==========================================================================
  // Value Lists
  // ==========================================================================

  protected loadValues(child: ChildTable, column: string, parentId: string): string[] {
    return this.queryAll(ValueRow,
      `SELECT ${column} AS value FROM ${child.table}
        WHERE ${child.parentColumn} = @parentId ORDER BY ${column}`,
      { parentId });
  }

  protected syncPermalinks(child: ChildTable, parentId: string, permalinks: readonly string[]): void {
    const stored = this.loadValues(child, 'permalink', parentId);
    this.writeValues(child, 'permalink', parentId, diffPermalinks(stored, permalinks));
  }

  protected syncCategoryIds(child: ChildTable, parentId: string, categoryIds: readonly CategoryId[]): void {
    const stored = this.loadValues(child, 'category_id', parentId).map((id) => CategoryId.parse(id));
    this.writeValues(child, 'category_id', parentId, diffCategoryIds(stored, categoryIds));
  }

  private writeValues(child: ChildTable, column: string, parentId: string, diff: ListDiff<string>): void {
    for (const value of diff.removed) {
      this.execute(
        `DELETE FROM ${child.table} WHERE ${child.parentColumn} = @parentId AND ${column} = @value`,
        { parentId, value }
      );
    }
    for (const value of new Set(diff.added)) {
      this.execute(
        `INSERT INTO ${child.table} (${child.parentColumn}, ${column}) VALUES (@parentId, @value)`,
        { parentId, value }
      );
    }
  }

  protected deleteChildren(child: ChildTable, parentId: string): void {
    this.execute(`DELETE FROM ${child.table} WHERE ${child.parentColumn} = @parentId`, { parentId });
  }
}
