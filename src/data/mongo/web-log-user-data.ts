/**
 * MongoDB Web Log User Store
 * @module data/mongo/web-log-user-data
 */

import type { WebLogId, WebLogUserId } from '../../types/ids.js';
import { WebLogUserSchema, type MetaItem, type WebLogUser } from '../../types/entities.js';
import { displayName } from '../../types/support.js';
import type { IWebLogUserData } from '../interfaces.js';
import { ok } from '../../utils/result.js';
import { conflictErr, notFound, type DomainResult } from '../../utils/domain-result.js';
import type { DocumentDatabase } from './collections.js';
import { Collections, MongoStore, toDocument } from './mongo-store.js';

/**
 * MongoDB implementation of {@link IWebLogUserData}
 */
export class MongoWebLogUserData extends MongoStore implements IWebLogUserData {
  constructor(db: DocumentDatabase) {
    super(db, Collections.WEB_LOG_USER);
  }

  private async save(user: WebLogUser): Promise<void> {
    await this.collection.upsert({ _id: user.id }, toDocument(user));
  }

  async add(user: WebLogUser): Promise<void> {
    await this.save(user);
  }

  async delete(userId: WebLogUserId, webLogId: WebLogId): Promise<DomainResult<WebLogUserId>> {
    if ((await this.collection.countDocuments({ _id: userId, webLogId })) === 0) {
      return notFound('WebLogUser', userId);
    }
    const authored = { webLogId, authorId: userId };
    const pages = await this.db.collection(Collections.PAGE).countDocuments(authored);
    const posts = await this.db.collection(Collections.POST).countDocuments(authored);
    if (pages + posts > 0) return conflictErr('WebLogUser', 'User has pages or posts; cannot delete');

    await this.collection.deleteOne({ _id: userId });
    return ok(userId);
  }

  async findByEmail(email: string, webLogId: WebLogId): Promise<WebLogUser | undefined> {
    const document = await this.collection.findOne({ webLogId, email });
    return document && this.parse(WebLogUserSchema, document);
  }

  async findById(userId: WebLogUserId, webLogId: WebLogId): Promise<WebLogUser | undefined> {
    const document = await this.collection.findOne({ _id: userId, webLogId });
    return document && this.parse(WebLogUserSchema, document);
  }

  async findByWebLog(webLogId: WebLogId): Promise<WebLogUser[]> {
    const documents = await this.collection.find(
      { webLogId },
      { sort: { preferredName: 1, lastName: 1, _id: 1 } }
    );
    return this.parseAll(WebLogUserSchema, documents);
  }

  async findNames(webLogId: WebLogId, userIds: readonly WebLogUserId[]): Promise<MetaItem[]> {
    if (userIds.length === 0) return [];
    const documents = await this.collection.find(
      { webLogId, _id: { $in: [...userIds] } },
      { sort: { _id: 1 } }
    );
    return this.parseAll(WebLogUserSchema, documents)
      .map((user) => ({ name: user.id, value: displayName(user) }));
  }

  async restore(users: readonly WebLogUser[]): Promise<void> {
    for (const user of users) await this.save(user);
  }

  async setLastSeen(userId: WebLogUserId, webLogId: WebLogId): Promise<void> {
    await this.collection.updateOne({ _id: userId, webLogId }, { $set: { lastSeenOn: new Date() } });
  }

  async update(user: WebLogUser): Promise<void> {
    await this.save(user);
  }
}
