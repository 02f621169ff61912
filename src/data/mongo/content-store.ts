/**
 * MongoDB Content Store Base
 * @module data/mongo/content-store
 *
 * Pages and posts embed their revisions. Saving an existing document sets its
 * scalar fields and patches the revision array with the removed and added
 * revisions computed by the diff engine, so unchanged history is never
 * rewritten.
 */

import { z } from 'zod';
import { RevisionSchema, type Revision } from '../../types/entities.js';
import { requireRevision } from '../../types/support.js';
import { diffRevisions } from '../diff.js';
import type { StoredDocument } from './collections.js';
import { MongoStore, setFields } from './mongo-store.js';

/**
 * Newest first, as every backend returns them
 */
export function newestFirst(revisions: readonly Revision[]): Revision[] {
  return [...revisions].sort((a, b) => b.asOf.getTime() - a.asOf.getTime());
}

const StoredRevisions = z.object({ revisions: z.array(RevisionSchema).default([]) });

export abstract class MongoContentStore extends MongoStore {
  /**
   * Insert or update a document whose `revisions` field is patched by diff;
   * `document` holds every other field
   */
  protected async saveWithRevisions(document: StoredDocument, revisions: readonly Revision[]): Promise<void> {
    const { _id, ...fields } = document;
    requireRevision(this.collectionName, { id: _id, revisions });
    const existing = await this.collection.findOne({ _id }, { projection: { revisions: 1 } });
    if (!existing) {
      await this.collection.upsert({ _id }, { ...document, revisions: [...revisions] });
      return;
    }

    await this.collection.updateOne({ _id }, setFields(fields));

    const stored = this.parse(StoredRevisions, existing);
    const { removed, added } = diffRevisions(stored.revisions, revisions);
    if (removed.length > 0) {
      await this.collection.updateOne({ _id }, {
        $pull: { revisions: { asOf: { $in: removed.map((revision) => revision.asOf) } } },
      });
    }
    if (added.length > 0) {
      await this.collection.updateOne({ _id }, { $push: { revisions: { $each: added } } });
    }
  }
}
