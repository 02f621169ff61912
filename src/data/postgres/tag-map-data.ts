/**
 * PostgreSQL Tag Mapping Store
 * @module data/postgres/tag-map-data
 */

import type pg from 'pg';
import type { TagMapId, WebLogId } from '../../types/ids.js';
import type { TagMap } from '../../types/entities.js';
import { DeleteOutcome, type ITagMapData } from '../interfaces.js';
import { PgStore } from './pg-store.js';

interface TagMapRow {
  id: TagMapId;
  web_log_id: WebLogId;
  tag: string;
  url_value: string;
}

function rowToTagMap(row: TagMapRow): TagMap {
  return { id: row.id, webLogId: row.web_log_id, tag: row.tag, urlValue: row.url_value };
}

const UPSERT = `
  INSERT INTO tag_map (id, web_log_id, tag, url_value) VALUES ($1, $2, $3, $4)
  ON CONFLICT (id) DO UPDATE SET
    web_log_id = EXCLUDED.web_log_id,
    tag        = EXCLUDED.tag,
    url_value  = EXCLUDED.url_value`;

/**
 * PostgreSQL implementation of {@link ITagMapData}
 */
export class PgTagMapData extends PgStore implements ITagMapData {
  constructor(pool: pg.Pool) {
    super(pool, 'tag_map');
  }

  async delete(tagMapId: TagMapId, webLogId: WebLogId): Promise<DeleteOutcome> {
    const deleted = await this.execute(
      'DELETE FROM tag_map WHERE id = $1 AND web_log_id = $2', [tagMapId, webLogId]);
    return deleted > 0 ? DeleteOutcome.DELETED : DeleteOutcome.NOT_FOUND;
  }

  async findById(tagMapId: TagMapId, webLogId: WebLogId): Promise<TagMap | undefined> {
    const row = await this.queryOne<TagMapRow>(
      'SELECT * FROM tag_map WHERE id = $1 AND web_log_id = $2', [tagMapId, webLogId]);
    return row && rowToTagMap(row);
  }

  async findByUrlValue(urlValue: string, webLogId: WebLogId): Promise<TagMap | undefined> {
    const row = await this.queryOne<TagMapRow>(
      'SELECT * FROM tag_map WHERE web_log_id = $1 AND url_value = $2', [webLogId, urlValue]);
    return row && rowToTagMap(row);
  }

  async findByWebLog(webLogId: WebLogId): Promise<TagMap[]> {
    const rows = await this.queryAll<TagMapRow>(
      'SELECT * FROM tag_map WHERE web_log_id = $1 ORDER BY tag, id', [webLogId]);
    return rows.map(rowToTagMap);
  }

  async findMappingForTags(tags: readonly string[], webLogId: WebLogId): Promise<TagMap[]> {
    if (tags.length === 0) return [];
    const rows = await this.queryAll<TagMapRow>(
      'SELECT * FROM tag_map WHERE web_log_id = $1 AND tag = ANY ($2) ORDER BY tag, id',
      [webLogId, tags]
    );
    return rows.map(rowToTagMap);
  }

  async restore(tagMaps: readonly TagMap[]): Promise<void> {
    await this.withTransaction(async (client) => {
      for (const tagMap of tagMaps) {
        await this.execute(UPSERT, [tagMap.id, tagMap.webLogId, tagMap.tag, tagMap.urlValue], { client });
      }
    });
  }

  async save(tagMap: TagMap): Promise<void> {
    await this.execute(UPSERT, [tagMap.id, tagMap.webLogId, tagMap.tag, tagMap.urlValue]);
  }
}
