/**
 * PostgreSQL Web Log Store
 * @module data/postgres/web-log-data
 */

import type pg from 'pg';
import type { ThemeId, WebLogId } from '../../types/ids.js';
import type { CustomFeed, RedirectRule, UploadDestination, WebLog } from '../../types/entities.js';
import type { IWebLogData } from '../interfaces.js';
import { PgStore } from './pg-store.js';

interface WebLogRow {
  id: WebLogId;
  name: string;
  slug: string;
  subtitle: string | null;
  default_page: string;
  posts_per_page: number;
  theme_id: ThemeId;
  url_base: string;
  time_zone: string;
  auto_htmx: boolean;
  uploads: UploadDestination;
  is_feed_enabled: boolean;
  feed_name: string;
  items_in_feed: number | null;
  is_category_enabled: boolean;
  is_tag_enabled: boolean;
  copyright: string | null;
  custom_feeds: CustomFeed[];
  redirect_rules: RedirectRule[];
}

function rowToWebLog(row: WebLogRow): WebLog {
  return {
    id: row.id,
    name: row.name,
    slug: row.slug,
    subtitle: row.subtitle ?? undefined,
    defaultPage: row.default_page,
    postsPerPage: row.posts_per_page,
    themeId: row.theme_id,
    urlBase: row.url_base,
    timeZone: row.time_zone,
    rss: {
      isFeedEnabled: row.is_feed_enabled,
      feedName: row.feed_name,
      itemsInFeed: row.items_in_feed ?? undefined,
      isCategoryEnabled: row.is_category_enabled,
      isTagEnabled: row.is_tag_enabled,
      copyright: row.copyright ?? undefined,
      customFeeds: row.custom_feeds,
    },
    autoHtmx: row.auto_htmx,
    uploads: row.uploads,
    redirectRules: row.redirect_rules,
  };
}

function settingsParams(webLog: WebLog): unknown[] {
  return [
    webLog.name,
    webLog.slug,
    webLog.subtitle ?? null,
    webLog.defaultPage,
    webLog.postsPerPage,
    webLog.themeId,
    webLog.urlBase,
    webLog.timeZone,
    webLog.autoHtmx,
    webLog.uploads,
  ];
}

function rssParams(webLog: WebLog): unknown[] {
  const { rss } = webLog;
  return [
    rss.isFeedEnabled,
    rss.feedName,
    rss.itemsInFeed ?? null,
    rss.isCategoryEnabled,
    rss.isTagEnabled,
    rss.copyright ?? null,
    JSON.stringify(rss.customFeeds),
  ];
}

/**
 * Tables holding tenant content, children before parents
 */
const TENANT_DELETES = [
  'DELETE FROM post_revision WHERE post_id IN (SELECT id FROM post WHERE web_log_id = $1)',
  'DELETE FROM post WHERE web_log_id = $1',
  'DELETE FROM page_revision WHERE page_id IN (SELECT id FROM page WHERE web_log_id = $1)',
  'DELETE FROM page WHERE web_log_id = $1',
  'DELETE FROM category WHERE web_log_id = $1',
  'DELETE FROM tag_map WHERE web_log_id = $1',
  'DELETE FROM upload WHERE web_log_id = $1',
  'DELETE FROM web_log_user WHERE web_log_id = $1',
  'DELETE FROM web_log WHERE id = $1',
] as const;

/**
 * PostgreSQL implementation of {@link IWebLogData}
 */
export class PgWebLogData extends PgStore implements IWebLogData {
  constructor(pool: pg.Pool) {
    super(pool, 'web_log');
  }

  async add(webLog: WebLog): Promise<void> {
    await this.execute(
      `INSERT INTO web_log (
         id, name, slug, subtitle, default_page, posts_per_page, theme_id, url_base, time_zone,
         auto_htmx, uploads, is_feed_enabled, feed_name, items_in_feed, is_category_enabled,
         is_tag_enabled, copyright, custom_feeds, redirect_rules
       ) VALUES (
         $1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16, $17, $18, $19
       )`,
      [webLog.id, ...settingsParams(webLog), ...rssParams(webLog), JSON.stringify(webLog.redirectRules)]
    );
  }

  async all(): Promise<WebLog[]> {
    const rows = await this.queryAll<WebLogRow>('SELECT * FROM web_log ORDER BY id');
    return rows.map(rowToWebLog);
  }

  async delete(webLogId: WebLogId): Promise<void> {
    await this.withTransaction(async (client) => {
      for (const sql of TENANT_DELETES) await this.execute(sql, [webLogId], { client });
    });
  }

  async findByHost(urlBase: string): Promise<WebLog | undefined> {
    const row = await this.queryOne<WebLogRow>('SELECT * FROM web_log WHERE url_base = $1', [urlBase]);
    return row && rowToWebLog(row);
  }

  async findById(webLogId: WebLogId): Promise<WebLog | undefined> {
    const row = await this.queryOne<WebLogRow>('SELECT * FROM web_log WHERE id = $1', [webLogId]);
    return row && rowToWebLog(row);
  }

  async updateRedirectRules(webLog: WebLog): Promise<void> {
    await this.execute('UPDATE web_log SET redirect_rules = $2 WHERE id = $1',
      [webLog.id, JSON.stringify(webLog.redirectRules)]);
  }

  async updateRssOptions(webLog: WebLog): Promise<void> {
    await this.execute(
      `UPDATE web_log SET
         is_feed_enabled     = $2,
         feed_name           = $3,
         items_in_feed       = $4,
         is_category_enabled = $5,
         is_tag_enabled      = $6,
         copyright           = $7,
         custom_feeds        = $8
       WHERE id = $1`,
      [webLog.id, ...rssParams(webLog)]
    );
  }

  async updateSettings(webLog: WebLog): Promise<void> {
    await this.execute(
      `UPDATE web_log SET
         name           = $2,
         slug           = $3,
         subtitle       = $4,
         default_page   = $5,
         posts_per_page = $6,
         theme_id       = $7,
         url_base       = $8,
         time_zone      = $9,
         auto_htmx      = $10,
         uploads        = $11
       WHERE id = $1`,
      [webLog.id, ...settingsParams(webLog)]
    );
  }
}
