/**
 * MongoDB Web Log Store
 * @module data/mongo/web-log-data
 */

import type { WebLogId } from '../../types/ids.js';
import { WebLogSchema, type WebLog } from '../../types/entities.js';
import type { IWebLogData } from '../interfaces.js';
import type { DocumentDatabase } from './collections.js';
import { Collections, MongoStore, setFields, toDocument } from './mongo-store.js';

/**
 * Collections holding tenant content, keyed by `webLogId`
 */
const TENANT_COLLECTIONS = [
  Collections.POST,
  Collections.PAGE,
  Collections.CATEGORY,
  Collections.TAG_MAP,
  Collections.UPLOAD,
  Collections.WEB_LOG_USER,
] as const;

/**
 * MongoDB implementation of {@link IWebLogData}
 */
export class MongoWebLogData extends MongoStore implements IWebLogData {
  constructor(db: DocumentDatabase) {
    super(db, Collections.WEB_LOG);
  }

  async add(webLog: WebLog): Promise<void> {
    await this.collection.insertOne(toDocument(webLog));
  }

  async all(): Promise<WebLog[]> {
    return this.parseAll(WebLogSchema, await this.collection.find({}, { sort: { _id: 1 } }));
  }

  async delete(webLogId: WebLogId): Promise<void> {
    for (const name of TENANT_COLLECTIONS) {
      const deleted = await this.db.collection(name).deleteMany({ webLogId });
      this.logger.debug({ collection: name, deleted, webLogId }, 'Tenant documents deleted');
    }
    await this.collection.deleteOne({ _id: webLogId });
  }

  async findByHost(urlBase: string): Promise<WebLog | undefined> {
    const document = await this.collection.findOne({ urlBase });
    return document && this.parse(WebLogSchema, document);
  }

  async findById(webLogId: WebLogId): Promise<WebLog | undefined> {
    const document = await this.collection.findOne({ _id: webLogId });
    return document && this.parse(WebLogSchema, document);
  }

  async updateRedirectRules(webLog: WebLog): Promise<void> {
    await this.collection.updateOne({ _id: webLog.id }, { $set: { redirectRules: webLog.redirectRules } });
  }

  async updateRssOptions(webLog: WebLog): Promise<void> {
    await this.collection.updateOne({ _id: webLog.id }, { $set: { rss: webLog.rss } });
  }

  async updateSettings(webLog: WebLog): Promise<void> {
    await this.collection.updateOne({ _id: webLog.id }, setFields({
      name: webLog.name,
      slug: webLog.slug,
      subtitle: webLog.subtitle,
      defaultPage: webLog.defaultPage,
      postsPerPage: webLog.postsPerPage,
      themeId: webLog.themeId,
      urlBase: webLog.urlBase,
      timeZone: webLog.timeZone,
      autoHtmx: webLog.autoHtmx,
      uploads: webLog.uploads,
    }));
  }
}
