/**
 * PostgreSQL Web Log User Store
 * @module data/postgres/web-log-user-data
 */

import type pg from 'pg';
import type { WebLogId, WebLogUserId } from '../../types/ids.js';
import type { AccessLevel, MetaItem, WebLogUser } from '../../types/entities.js';
import { displayName } from '../../types/support.js';
import type { IWebLogUserData } from '../interfaces.js';
import { ok } from '../../utils/result.js';
import { conflictErr, notFound, type DomainResult } from '../../utils/domain-result.js';
import { PgStore } from './pg-store.js';

interface WebLogUserRow {
  id: WebLogUserId;
  web_log_id: WebLogId;
  email: string;
  first_name: string;
  last_name: string;
  preferred_name: string;
  password_hash: string;
  url: string | null;
  access_level: AccessLevel;
  created_on: Date;
  last_seen_on: Date | null;
}

function rowToUser(row: WebLogUserRow): WebLogUser {
  return {
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
  };
}

const UPSERT = `
  INSERT INTO web_log_user (
    id, web_log_id, email, first_name, last_name, preferred_name, password_hash, url,
    access_level, created_on, last_seen_on
  ) VALUES (
    $1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11
  ) ON CONFLICT (id) DO UPDATE SET
    web_log_id     = EXCLUDED.web_log_id,
    email          = EXCLUDED.email,
    first_name     = EXCLUDED.first_name,
    last_name      = EXCLUDED.last_name,
    preferred_name = EXCLUDED.preferred_name,
    password_hash  = EXCLUDED.password_hash,
    url            = EXCLUDED.url,
    access_level   = EXCLUDED.access_level,
    created_on     = EXCLUDED.created_on,
    last_seen_on   = EXCLUDED.last_seen_on`;

function userParams(user: WebLogUser): unknown[] {
  return [
    user.id,
    user.webLogId,
    user.email,
    user.firstName,
    user.lastName,
    user.preferredName,
    user.passwordHash,
    user.url ?? null,
    user.accessLevel,
    user.createdOn,
    user.lastSeenOn ?? null,
  ];
}

/**
 * PostgreSQL implementation of {@link IWebLogUserData}
 */
export class PgWebLogUserData extends PgStore implements IWebLogUserData {
  constructor(pool: pg.Pool) {
    super(pool, 'web_log_user');
  }

  async add(user: WebLogUser): Promise<void> {
    await this.execute(UPSERT, userParams(user));
  }

  async delete(userId: WebLogUserId, webLogId: WebLogId): Promise<DomainResult<WebLogUserId>> {
    return this.withTransaction(async (client) => {
      const exists = await this.queryExists(
        'SELECT 1 FROM web_log_user WHERE id = $1 AND web_log_id = $2', [userId, webLogId], { client });
      if (!exists) return notFound('WebLogUser', userId);

      const authored = await this.queryExists(
        `SELECT 1 FROM page WHERE author_id = $1 AND web_log_id = $2
         UNION ALL
         SELECT 1 FROM post WHERE author_id = $1 AND web_log_id = $2`,
        [userId, webLogId],
        { client }
      );
      if (authored) return conflictErr('WebLogUser', 'User has pages or posts; cannot delete');

      await this.execute('DELETE FROM web_log_user WHERE id = $1', [userId], { client });
      return ok(userId);
    });
  }

  async findByEmail(email: string, webLogId: WebLogId): Promise<WebLogUser | undefined> {
    const row = await this.queryOne<WebLogUserRow>(
      'SELECT * FROM web_log_user WHERE web_log_id = $1 AND email = $2', [webLogId, email]);
    return row && rowToUser(row);
  }

  async findById(userId: WebLogUserId, webLogId: WebLogId): Promise<WebLogUser | undefined> {
    const row = await this.queryOne<WebLogUserRow>(
      'SELECT * FROM web_log_user WHERE id = $1 AND web_log_id = $2', [userId, webLogId]);
    return row && rowToUser(row);
  }

  async findByWebLog(webLogId: WebLogId): Promise<WebLogUser[]> {
    const rows = await this.queryAll<WebLogUserRow>(
      'SELECT * FROM web_log_user WHERE web_log_id = $1 ORDER BY preferred_name, last_name, id',
      [webLogId]
    );
    return rows.map(rowToUser);
  }

  async findNames(webLogId: WebLogId, userIds: readonly WebLogUserId[]): Promise<MetaItem[]> {
    if (userIds.length === 0) return [];
    const rows = await this.queryAll<WebLogUserRow>(
      'SELECT * FROM web_log_user WHERE web_log_id = $1 AND id = ANY ($2) ORDER BY id',
      [webLogId, userIds]
    );
    return rows.map((row) => {
      const user = rowToUser(row);
      return { name: user.id, value: displayName(user) };
    });
  }

  async restore(users: readonly WebLogUser[]): Promise<void> {
    await this.withTransaction(async (client) => {
      for (const user of users) await this.execute(UPSERT, userParams(user), { client });
    });
  }

  async setLastSeen(userId: WebLogUserId, webLogId: WebLogId): Promise<void> {
    await this.execute(
      'UPDATE web_log_user SET last_seen_on = $3 WHERE id = $1 AND web_log_id = $2',
      [userId, webLogId, new Date()]
    );
  }

  async update(user: WebLogUser): Promise<void> {
    await this.execute(UPSERT, userParams(user));
  }
}
