/**
 * PostgreSQL Content Store Base
 * @module data/postgres/content-store
 *
 * Revision tables shared by pages and posts, written by diff.
 */

import type { MarkupText, Revision } from '../../types/entities.js';
import { diffRevisions } from '../diff.js';
import { PgStore, type QueryOptions } from './pg-store.js';

interface RevisionRow {
  as_of: Date;
  revision_text: MarkupText;
}

/**
 * A revision table and the column holding its parent's ID
 */
export interface RevisionTable {
  readonly table: string;
  readonly parentColumn: string;
}

/**
 * Prior permalinks come back sorted so every backend lists them alike
 */
export function sortedLinks(links: readonly string[]): string[] {
  return [...links].sort();
}

export abstract class PgContentStore extends PgStore {
  protected async loadRevisions(
    revisions: RevisionTable,
    parentId: string,
    options?: QueryOptions
  ): Promise<Revision[]> {
    const rows = await this.queryAll<RevisionRow>(
      `SELECT as_of, revision_text FROM ${revisions.table}
        WHERE ${revisions.parentColumn} = $1 ORDER BY as_of DESC`,
      [parentId],
      options
    );
    return rows.map((row) => ({ asOf: row.as_of, text: row.revision_text }));
  }

  protected async syncRevisions(
    revisions: RevisionTable,
    parentId: string,
    newRevisions: readonly Revision[],
    options: QueryOptions
  ): Promise<void> {
    const { removed, added } = diffRevisions(
      await this.loadRevisions(revisions, parentId, options),
      newRevisions
    );
    for (const revision of removed) {
      await this.execute(
        `DELETE FROM ${revisions.table} WHERE ${revisions.parentColumn} = $1 AND as_of = $2`,
        [parentId, revision.asOf],
        options
      );
    }
    for (const revision of added) {
      await this.execute(
        `INSERT INTO ${revisions.table} (${revisions.parentColumn}, as_of, revision_text) VALUES ($1, $2, $3)`,
        [parentId, revision.asOf, revision.text],
        options
      );
    }
  }
}
