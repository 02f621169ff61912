/**
 * SQLite Web Log Store
 * @module data/sqlite/web-log-data
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';
import { ThemeId, WebLogId } from '../../types/ids.js';
import {
  CustomFeedSchema,
  RedirectRuleSchema,
  UploadDestination,
  type WebLog,
} from '../../types/entities.js';
import type { IWebLogData } from '../interfaces.js';
import { SqliteStore, sqlBool, sqlJson, toBool, toNull } from './sqlite-store.js';

const WebLogRow = z.object({
  id: WebLogId,
  name: z.string(),
  slug: z.string(),
  subtitle: z.string().nullable(),
  default_page: z.string(),
  posts_per_page: z.number().int(),
  theme_id: ThemeId,
  url_base: z.string(),
  time_zone: z.string(),
  auto_htmx: sqlBool,
  uploads: UploadDestination,
  is_feed_enabled: sqlBool,
  feed_name: z.string(),
  items_in_feed: z.number().int().nullable(),
  is_category_enabled: sqlBool,
  is_tag_enabled: sqlBool,
  copyright: z.string().nullable(),
  custom_feeds: sqlJson(z.array(CustomFeedSchema)),
  redirect_rules: sqlJson(z.array(RedirectRuleSchema)),
}).transform((row): WebLog => ({
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
}));

const SETTINGS_COLUMNS = [
  'name', 'slug', 'subtitle', 'default_page', 'posts_per_page', 'theme_id', 'url_base',
  'time_zone', 'auto_htmx', 'uploads',
] as const;

const RSS_COLUMNS = [
  'is_feed_enabled', 'feed_name', 'items_in_feed', 'is_category_enabled', 'is_tag_enabled',
  'copyright', 'custom_feeds',
] as const;

/** `column = @camelCaseName` for each column */
function assignments(columns: readonly string[]): string {
  return columns
    .map((column) => `${column} = @${column.replace(/_([a-z])/g, (_, letter: string) => letter.toUpperCase())}`)
    .join(', ');
}

/**
 * Tables holding tenant content, children before parents
 */
const TENANT_DELETES = [
  'DELETE FROM post_revision WHERE post_id IN (SELECT id FROM post WHERE web_log_id = @webLogId)',
  'DELETE FROM post_permalink WHERE post_id IN (SELECT id FROM post WHERE web_log_id = @webLogId)',
  'DELETE FROM post_category WHERE post_id IN (SELECT id FROM post WHERE web_log_id = @webLogId)',
  'DELETE FROM post WHERE web_log_id = @webLogId',
  'DELETE FROM page_revision WHERE page_id IN (SELECT id FROM page WHERE web_log_id = @webLogId)',
  'DELETE FROM page_permalink WHERE page_id IN (SELECT id FROM page WHERE web_log_id = @webLogId)',
  'DELETE FROM page WHERE web_log_id = @webLogId',
  'DELETE FROM category WHERE web_log_id = @webLogId',
  'DELETE FROM tag_map WHERE web_log_id = @webLogId',
  'DELETE FROM upload WHERE web_log_id = @webLogId',
  'DELETE FROM web_log_user WHERE web_log_id = @webLogId',
  'DELETE FROM web_log WHERE id = @webLogId',
] as const;

/**
 * SQLite implementation of {@link IWebLogData}
 */
export class SqliteWebLogData extends SqliteStore implements IWebLogData {
  constructor(db: Database.Database) {
    super(db, 'web_log');
  }

  private settingsParams(webLog: WebLog) {
    return {
      id: webLog.id,
      name: webLog.name,
      slug: webLog.slug,
      subtitle: toNull(webLog.subtitle),
      defaultPage: webLog.defaultPage,
      postsPerPage: webLog.postsPerPage,
      themeId: webLog.themeId,
      urlBase: webLog.urlBase,
      timeZone: webLog.timeZone,
      autoHtmx: toBool(webLog.autoHtmx),
      uploads: webLog.uploads,
    };
  }

  private rssParams(webLog: WebLog) {
    const { rss } = webLog;
    return {
      id: webLog.id,
      isFeedEnabled: toBool(rss.isFeedEnabled),
      feedName: rss.feedName,
      itemsInFeed: toNull(rss.itemsInFeed),
      isCategoryEnabled: toBool(rss.isCategoryEnabled),
      isTagEnabled: toBool(rss.isTagEnabled),
      copyright: toNull(rss.copyright),
      customFeeds: JSON.stringify(rss.customFeeds),
    };
  }

  async add(webLog: WebLog): Promise<void> {
    const columns = ['id', ...SETTINGS_COLUMNS, ...RSS_COLUMNS, 'redirect_rules'];
    this.execute(
      `INSERT INTO web_log (${columns.join(', ')})
       VALUES (${columns.map((column) => `@${column}`).join(', ')})`,
      {
        id: webLog.id,
        name: webLog.name,
        slug: webLog.slug,
        subtitle: toNull(webLog.subtitle),
        default_page: webLog.defaultPage,
        posts_per_page: webLog.postsPerPage,
        theme_id: webLog.themeId,
        url_base: webLog.urlBase,
        time_zone: webLog.timeZone,
        auto_htmx: toBool(webLog.autoHtmx),
        uploads: webLog.uploads,
        is_feed_enabled: toBool(webLog.rss.isFeedEnabled),
        feed_name: webLog.rss.feedName,
        items_in_feed: toNull(webLog.rss.itemsInFeed),
        is_category_enabled: toBool(webLog.rss.isCategoryEnabled),
        is_tag_enabled: toBool(webLog.rss.isTagEnabled),
        copyright: toNull(webLog.rss.copyright),
        custom_feeds: JSON.stringify(webLog.rss.customFeeds),
        redirect_rules: JSON.stringify(webLog.redirectRules),
      }
    );
  }

  async all(): Promise<WebLog[]> {
    return this.queryAll(WebLogRow, 'SELECT * FROM web_log ORDER BY id');
  }

  async delete(webLogId: WebLogId): Promise<void> {
    this.inTransaction(() => {
      for (const sql of TENANT_DELETES) this.execute(sql, { webLogId });
    });
  }

  async findByHost(urlBase: string): Promise<WebLog | undefined> {
    return this.queryOne(WebLogRow, 'SELECT * FROM web_log WHERE url_base = @urlBase', { urlBase });
  }

  async findById(webLogId: WebLogId): Promise<WebLog | undefined> {
    return this.queryOne(WebLogRow, 'SELECT * FROM web_log WHERE id = @webLogId', { webLogId });
  }

  async updateRedirectRules(webLog: WebLog): Promise<void> {
    this.execute('UPDATE web_log SET redirect_rules = @redirectRules WHERE id = @id', {
      id: webLog.id,
      redirectRules: JSON.stringify(webLog.redirectRules),
    });
  }

  async updateRssOptions(webLog: WebLog): Promise<void> {
    this.execute(`UPDATE web_log SET ${assignments(RSS_COLUMNS)} WHERE id = @id`, this.rssParams(webLog));
  }

  async updateSettings(webLog: WebLog): Promise<void> {
    this.execute(`UPDATE web_log SET ${assignments(SETTINGS_COLUMNS)} WHERE id = @id`, this.settingsParams(webLog));
  }
}
