/**
 * MongoDB Tag Mapping Store
 * @module data/mongo/tag-map-data
 */

import type { TagMapId, WebLogId } from '../../types/ids.js';
import { TagMapSchema, type TagMap } from '../../types/entities.js';
import { DeleteOutcome, type ITagMapData } from '../interfaces.js';
import type { DocumentDatabase } from './collections.js';
import { Collections, MongoStore, toDocument } from './mongo-store.js';

const BY_TAG = { tag: 1, _id: 1 } as const;

/**
 * MongoDB implementation of {@link ITagMapData}
 */
export class MongoTagMapData extends MongoStore implements ITagMapData {
  constructor(db: DocumentDatabase) {
    super(db, Collections.TAG_MAP);
  }

  async delete(tagMapId: TagMapId, webLogId: WebLogId): Promise<DeleteOutcome> {
    const deleted = await this.collection.deleteOne({ _id: tagMapId, webLogId });
    return deleted > 0 ? DeleteOutcome.DELETED : DeleteOutcome.NOT_FOUND;
  }

  async findById(tagMapId: TagMapId, webLogId: WebLogId): Promise<TagMap | undefined> {
    const document = await this.collection.findOne({ _id: tagMapId, webLogId });
    return document && this.parse(TagMapSchema, document);
  }

  async findByUrlValue(urlValue: string, webLogId: WebLogId): Promise<TagMap | undefined> {
    const document = await this.collection.findOne({ webLogId, urlValue });
    return document && this.parse(TagMapSchema, document);
  }

  async findByWebLog(webLogId: WebLogId): Promise<TagMap[]> {
    return this.parseAll(TagMapSchema, await this.collection.find({ webLogId }, { sort: BY_TAG }));
  }

  async findMappingForTags(tags: readonly string[], webLogId: WebLogId): Promise<TagMap[]> {
    if (tags.length === 0) return [];
    const documents = await this.collection.find({ webLogId, tag: { $in: [...tags] } }, { sort: BY_TAG });
    return this.parseAll(TagMapSchema, documents);
  }

  async restore(tagMaps: readonly TagMap[]): Promise<void> {
    for (const tagMap of tagMaps) await this.save(tagMap);
  }

  async save(tagMap: TagMap): Promise<void> {
    await this.collection.upsert({ _id: tagMap.id }, toDocument(tagMap));
  }
}
