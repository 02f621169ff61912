/**
 * SQLite Tag Mapping Store
 * @module data/sqlite/tag-map-data
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';
import { TagMapId, WebLogId } from '../../types/ids.js';
import type { TagMap } from '../../types/entities.js';
import { DeleteOutcome, type ITagMapData } from '../interfaces.js';
import { SqliteStore } from './sqlite-store.js';

const TagMapRow = z.object({
  id: TagMapId,
  web_log_id: WebLogId,
  tag: z.string(),
  url_value: z.string(),
}).transform((row): TagMap => ({
  id: row.id,
  webLogId: row.web_log_id,
  tag: row.tag,
  urlValue: row.url_value,
}));

const UPSERT = `
  INSERT INTO tag_map (id, web_log_id, tag, url_value)
  VALUES (@id, @webLogId, @tag, @urlValue)
  ON CONFLICT (id) DO UPDATE SET
    web_log_id = excluded.web_log_id,
    tag        = excluded.tag,
    url_value  = excluded.url_value`;

/**
 * SQLite implementation of {@link ITagMapData}
 */
export class SqliteTagMapData extends SqliteStore implements ITagMapData {
  constructor(db: Database.Database) {
    super(db, 'tag_map');
  }

  private params(tagMap: TagMap) {
    return { id: tagMap.id, webLogId: tagMap.webLogId, tag: tagMap.tag, urlValue: tagMap.urlValue };
  }

  async delete(tagMapId: TagMapId, webLogId: WebLogId): Promise<DeleteOutcome> {
    const deleted = this.execute(
      'DELETE FROM tag_map WHERE id = @tagMapId AND web_log_id = @webLogId',
      { tagMapId, webLogId }
    );
    return deleted > 0 ? DeleteOutcome.DELETED : DeleteOutcome.NOT_FOUND;
  }

  async findById(tagMapId: TagMapId, webLogId: WebLogId): Promise<TagMap | undefined> {
    return this.queryOne(TagMapRow,
      'SELECT * FROM tag_map WHERE id = @tagMapId AND web_log_id = @webLogId',
      { tagMapId, webLogId });
  }

  async findByUrlValue(urlValue: string, webLogId: WebLogId): Promise<TagMap | undefined> {
    return this.queryOne(TagMapRow,
      'SELECT * FROM tag_map WHERE web_log_id = @webLogId AND url_value = @urlValue',
      { urlValue, webLogId });
  }

  async findByWebLog(webLogId: WebLogId): Promise<TagMap[]> {
    return this.queryAll(TagMapRow,
      'SELECT * FROM tag_map WHERE web_log_id = @webLogId ORDER BY tag, id',
      { webLogId });
  }

  async findMappingForTags(tags: readonly string[], webLogId: WebLogId): Promise<TagMap[]> {
    if (tags.length === 0) return [];
    return this.queryAll(TagMapRow,
      `SELECT * FROM tag_map
        WHERE web_log_id = @webLogId AND tag IN (SELECT value FROM json_each(@tags))
        ORDER BY tag, id`,
      { webLogId, tags: JSON.stringify(tags) });
  }

  async restore(tagMaps: readonly TagMap[]): Promise<void> {
    this.inTransaction(() => {
      for (const tagMap of tagMaps) this.execute(UPSERT, this.params(tagMap));
    });
  }

  async save(tagMap: TagMap): Promise<void> {
    this.execute(UPSERT, this.params(tagMap));
  }
}
