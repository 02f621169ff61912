/**
 * PostgreSQL Upload Store
 * @module data/postgres/upload-data
 */

import type pg from 'pg';
import type { UploadId, WebLogId } from '../../types/ids.js';
import type { Upload } from '../../types/entities.js';
import type { IUploadData } from '../interfaces.js';
import { ok } from '../../utils/result.js';
import { notFound, type DomainResult } from '../../utils/domain-result.js';
import { PgStore } from './pg-store.js';

interface UploadRow {
  id: UploadId;
  web_log_id: WebLogId;
  path: string;
  updated_on: Date;
  data?: Buffer;
}

function rowToUpload(row: UploadRow): Upload {
  return {
    id: row.id,
    webLogId: row.web_log_id,
    path: row.path,
    updatedOn: row.updated_on,
    data: row.data ?? Buffer.alloc(0),
  };
}

const UPSERT = `
  INSERT INTO upload (id, web_log_id, path, updated_on, data) VALUES ($1, $2, $3, $4, $5)
  ON CONFLICT (id) DO UPDATE SET
    web_log_id = EXCLUDED.web_log_id,
    path       = EXCLUDED.path,
    updated_on = EXCLUDED.updated_on,
    data       = EXCLUDED.data`;

function uploadParams(upload: Upload): unknown[] {
  return [upload.id, upload.webLogId, upload.path, upload.updatedOn, upload.data];
}

/**
 * PostgreSQL implementation of {@link IUploadData}
 */
export class PgUploadData extends PgStore implements IUploadData {
  constructor(pool: pg.Pool) {
    super(pool, 'upload');
  }

  async add(upload: Upload): Promise<void> {
    await this.execute(UPSERT, uploadParams(upload));
  }

  async delete(uploadId: UploadId, webLogId: WebLogId): Promise<DomainResult<string>> {
    const row = await this.queryOne<{ path: string }>(
      'DELETE FROM upload WHERE id = $1 AND web_log_id = $2 RETURNING path',
      [uploadId, webLogId]
    );
    return row ? ok(row.path) : notFound('Upload', uploadId);
  }

  async findByPath(path: string, webLogId: WebLogId): Promise<Upload | undefined> {
    const row = await this.queryOne<UploadRow>(
      'SELECT * FROM upload WHERE web_log_id = $1 AND path = $2', [webLogId, path]);
    return row && rowToUpload(row);
  }

  async findByWebLog(webLogId: WebLogId): Promise<Upload[]> {
    const rows = await this.queryAll<UploadRow>(
      'SELECT id, web_log_id, path, updated_on FROM upload WHERE web_log_id = $1 ORDER BY path, id',
      [webLogId]
    );
    return rows.map(rowToUpload);
  }

  async findByWebLogWithData(webLogId: WebLogId): Promise<Upload[]> {
    const rows = await this.queryAll<UploadRow>(
      'SELECT * FROM upload WHERE web_log_id = $1 ORDER BY path, id', [webLogId]);
    return rows.map(rowToUpload);
  }

  async restore(uploads: readonly Upload[]): Promise<void> {
    await this.withTransaction(async (client) => {
      for (const upload of uploads) await this.execute(UPSERT, uploadParams(upload), { client });
    });
  }
}
