/**
 * SQLite Web Log User Store
 * @module data/sqlite/web-log-user-data
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';
import { WebLogId, WebLogUserId } from '../../types/ids.js';
import { AccessLevel, type MetaItem, type WebLogUser } from '../../types/entities.js';
import { displayName } from '../../types/support.js';
import type { IWebLogUserData } from '../interfaces.js';
import { ok } from '../../utils/result.js';
import { conflictErr, notFound, type DomainResult } from '../../utils/domain-result.js';
import { SqliteStore, sqlDate, toDate, toNull } from './sqlite-store.js';

const WebLogUserRow = z.object({
  id: WebLogUserId,
  web_log_id: WebLogId,
  email: z.string(),
  first_name: z.string(),
  last_name: z.string(),
  preferred_name: z.string(),
  password_hash: z.string(),
  url: z.string().nullable(),
  access_level: AccessLevel,
  created_on: sqlDate,
  last_seen_on: sqlDate.nullable(),
}).transform((row): WebLogUser => ({
  id: row.id,
  webLogId: row.web_log_id,
  email: row.email,
  firstName: row.first_name,
  lastName: row.last_name,
  preferredName: row.preferred_name,
  passwordHash: row.password_hash,
  url: row.url ?? undefined,
  accessLevel: row.access_level,
  createdOn: row.created_on,
  lastSeenOn: row.last_seen_on ?? undefined,
}));

const UPSERT = `
  INSERT INTO web_log_user (
    id, web_log_id, email, first_name, last_name, preferred_name, password_hash, url,
    access_level, created_on, last_seen_on
  ) VALUES (
    @id, @webLogId, @email, @firstName, @lastName, @preferredName, @passwordHash, @url,
    @accessLevel, @createdOn, @lastSeenOn
  ) ON CONFLICT (id) DO UPDATE SET
    web_log_id     = excluded.web_log_id,
    email          = excluded.email,
    first_name     = excluded.first_name,
    last_name      = excluded.last_name,
    preferred_name = excluded.preferred_name,
    password_hash  = excluded.password_hash,
    url            = excluded.url,
    access_level   = excluded.access_level,
    created_on     = excluded.created_on,
    last_seen_on   = excluded.last_seen_on`;

/**
 * SQLite implementation of {@link IWebLogUserData}
 */
export class SqliteWebLogUserData extends SqliteStore implements IWebLogUserData {
  constructor(db: Database.Database) {
    super(db, 'web_log_user');
  }

  private params(user: WebLogUser) {
    return {
      id: user.id,
      webLogId: user.webLogId,
      email: user.email,
      firstName: user.firstName,
      lastName: user.lastName,
      preferredName: user.preferredName,
      passwordHash: user.passwordHash,
      url: toNull(user.url),
      accessLevel: user.accessLevel,
      createdOn: user.createdOn.toISOString(),
      lastSeenOn: toDate(user.lastSeenOn),
    };
  }

  async add(user: WebLogUser): Promise<void> {
    this.execute(UPSERT, this.params(user));
  }

  async delete(userId: WebLogUserId, webLogId: WebLogId): Promise<DomainResult<WebLogUserId>> {
    return this.inTransaction(() => {
      if (!this.queryExists('SELECT 1 FROM web_log_user WHERE id = @userId AND web_log_id = @webLogId', { userId, webLogId })) {
        return notFound('WebLogUser', userId);
      }
      const authored = this.queryExists(
        `SELECT 1 FROM page WHERE author_id = @userId AND web_log_id = @webLogId
         UNION ALL
         SELECT 1 FROM post WHERE author_id = @userId AND web_log_id = @webLogId`,
        { userId, webLogId }
      );
      if (authored) return conflictErr('WebLogUser', 'User has pages or posts; cannot delete');

      this.execute('DELETE FROM web_log_user WHERE id = @userId', { userId });
      return ok(userId);
    });
  }

  async findByEmail(email: string, webLogId: WebLogId): Promise<WebLogUser | undefined> {
    return this.queryOne(WebLogUserRow,
      'SELECT * FROM web_log_user WHERE web_log_id = @webLogId AND email = @email',
      { email, webLogId });
  }

  async findById(userId: WebLogUserId, webLogId: WebLogId): Promise<WebLogUser | undefined> {
    return this.queryOne(WebLogUserRow,
      'SELECT * FROM web_log_user WHERE id = @userId AND web_log_id = @webLogId',
      { userId, webLogId });
  }

  async findByWebLog(webLogId: WebLogId): Promise<WebLogUser[]> {
    return this.queryAll(WebLogUserRow,
      'SELECT * FROM web_log_user WHERE web_log_id = @webLogId ORDER BY preferred_name, last_name, id',
      { webLogId });
  }

  async findNames(webLogId: WebLogId, userIds: readonly WebLogUserId[]): Promise<MetaItem[]> {
    if (userIds.length === 0) return [];
    const users = this.queryAll(WebLogUserRow,
      `SELECT * FROM web_log_user
        WHERE web_log_id = @webLogId AND id IN (SELECT value FROM json_each(@userIds))
        ORDER BY id`,
      { webLogId, userIds: JSON.stringify(userIds) });
    return users.map((user) => ({ name: user.id, value: displayName(user) }));
  }

  async restore(users: readonly WebLogUser[]): Promise<void> {
    this.inTransaction(() => {
      for (const user of users) this.execute(UPSERT, this.params(user));
    });
  }

  async setLastSeen(userId: WebLogUserId, webLogId: WebLogId): Promise<void> {
    this.execute(
      'UPDATE web_log_user SET last_seen_on = @now WHERE id = @userId AND web_log_id = @webLogId',
      { userId, webLogId, now: new Date().toISOString() }
    );
  }

  async update(user: WebLogUser): Promise<void> {
    this.execute(UPSERT, this.params(user));
  }
}
