/**
 * MongoDB Upload Store
 * @module data/mongo/upload-data
 */

import type { UploadId, WebLogId } from '../../types/ids.js';
import { UploadSchema, type Upload } from '../../types/entities.js';
import type { IUploadData } from '../interfaces.js';
import { ok } from '../../utils/result.js';
import { notFound, type DomainResult } from '../../utils/domain-result.js';
import type { DocumentDatabase } from './collections.js';
import { Collections, MongoStore, toDocument } from './mongo-store.js';

const BY_PATH = { path: 1, _id: 1 } as const;

/**
 * MongoDB implementation of {@link IUploadData}
 */
export class MongoUploadData extends MongoStore implements IUploadData {
  constructor(db: DocumentDatabase) {
    super(db, Collections.UPLOAD);
  }

  async add(upload: Upload): Promise<void> {
    await this.collection.upsert({ _id: upload.id }, toDocument(upload));
  }

  async delete(uploadId: UploadId, webLogId: WebLogId): Promise<DomainResult<string>> {
    const document = await this.collection.findOne({ _id: uploadId, webLogId }, { projection: { path: 1 } });
    const path: unknown = document?.path;
    if (typeof path !== 'string') return notFound('Upload', uploadId);
    await this.collection.deleteOne({ _id: uploadId });
    return ok(path);
  }

  async findByPath(path: string, webLogId: WebLogId): Promise<Upload | undefined> {
    const document = await this.collection.findOne({ webLogId, path });
    return document && this.parse(UploadSchema, document);
  }

  async findByWebLog(webLogId: WebLogId): Promise<Upload[]> {
    const documents = await this.collection.find({ webLogId }, { sort: BY_PATH, projection: { data: 0 } });
    return this.parseAll(UploadSchema, documents, { data: Buffer.alloc(0) });
  }

  async findByWebLogWithData(webLogId: WebLogId): Promise<Upload[]> {
    return this.parseAll(UploadSchema, await this.collection.find({ webLogId }, { sort: BY_PATH }));
  }

  async restore(uploads: readonly Upload[]): Promise<void> {
    for (const upload of uploads) await this.add(upload);
  }
}
