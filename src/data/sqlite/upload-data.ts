/**
 * SQLite Upload Store
 * @module data/sqlite/upload-data
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';
import { UploadId, WebLogId } from '../../types/ids.js';
import type { Upload } from '../../types/entities.js';
import type { IUploadData } from '../interfaces.js';
import { ok } from '../../utils/result.js';
import { notFound, type DomainResult } from '../../utils/domain-result.js';
import { SqliteStore, sqlBlob, sqlDate } from './sqlite-store.js';

const UploadRow = z.object({
  id: UploadId,
  web_log_id: WebLogId,
  path: z.string(),
  updated_on: sqlDate,
  data: sqlBlob.optional(),
}).transform((row): Upload => ({
  id: row.id,
  webLogId: row.web_log_id,
  path: row.path,
  updatedOn: row.updated_on,
  data: row.data ?? Buffer.alloc(0),
}));

const UPSERT = `
  INSERT INTO upload (id, web_log_id, path, updated_on, data)
  VALUES (@id, @webLogId, @path, @updatedOn, @data)
  ON CONFLICT (id) DO UPDATE SET
    web_log_id = excluded.web_log_id,
    path       = excluded.path,
    updated_on = excluded.updated_on,
    data       = excluded.data`;

/**
 * SQLite implementation of {@link IUploadData}
 */
export class SqliteUploadData extends SqliteStore implements IUploadData {
  constructor(db: Database.Database) {
    super(db, 'upload');
  }

  private params(upload: Upload) {
    return {
      id: upload.id,
      webLogId: upload.webLogId,
      path: upload.path,
      updatedOn: upload.updatedOn.toISOString(),
      data: upload.data,
    };
  }

  async add(upload: Upload): Promise<void> {
    this.execute(UPSERT, this.params(upload));
  }

  async delete(uploadId: UploadId, webLogId: WebLogId): Promise<DomainResult<string>> {
    return this.inTransaction(() => {
      const path = this.queryOne(z.object({ path: z.string() }).transform((row) => row.path),
        'SELECT path FROM upload WHERE id = @uploadId AND web_log_id = @webLogId',
        { uploadId, webLogId });
      if (path === undefined) return notFound('Upload', uploadId);
      this.execute('DELETE FROM upload WHERE id = @uploadId', { uploadId });
      return ok(path);
    });
  }

  async findByPath(path: string, webLogId: WebLogId): Promise<Upload | undefined> {
    return this.queryOne(UploadRow,
      'SELECT * FROM upload WHERE web_log_id = @webLogId AND path = @path',
      { path, webLogId });
  }

  async findByWebLog(webLogId: WebLogId): Promise<Upload[]> {
    return this.queryAll(UploadRow,
      'SELECT id, web_log_id, path, updated_on FROM upload WHERE web_log_id = @webLogId ORDER BY path, id',
      { webLogId });
  }

  async findByWebLogWithData(webLogId: WebLogId): Promise<Upload[]> {
    return this.queryAll(UploadRow,
      'SELECT * FROM upload WHERE web_log_id = @webLogId ORDER BY path, id',
      { webLogId });
  }

  async restore(uploads: readonly Upload[]): Promise<void> {
    this.inTransaction(() => {
      for (const upload of uploads) this.execute(UPSERT, this.params(upload));
    });
  }
}
