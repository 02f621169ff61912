/**
 * SQLite Schema
 * @module data/sqlite/schema
 *
 * Table definitions, created when missing. Many-valued children that are
 * synchronized by diff (revisions, prior permalinks, post categories) live in
 * their own tables; small value lists (tags, metadata, episodes, feeds) are
 * JSON text.
 */

import type Database from 'better-sqlite3';
import { SchemaError } from '../../errors/index.js';
import type { StructuredLogger } from '../../logging/index.js';

/**
 * Tables in creation order, with their indexes
 */
export const SQLITE_TABLES: ReadonlyArray<{ name: string; ddl: string }> = [
  {
    name: 'theme',
    ddl: `
      CREATE TABLE theme (
        id      TEXT PRIMARY KEY,
        name    TEXT NOT NULL,
        version TEXT NOT NULL)`,
  },
  {
    name: 'theme_template',
    ddl: `
      CREATE TABLE theme_template (
        theme_id TEXT NOT NULL REFERENCES theme (id),
        name     TEXT NOT NULL,
        template TEXT NOT NULL,
        PRIMARY KEY (theme_id, name))`,
  },
  {
    name: 'theme_asset',
    ddl: `
      CREATE TABLE theme_asset (
        theme_id   TEXT NOT NULL REFERENCES theme (id),
        path       TEXT NOT NULL,
        updated_on TEXT NOT NULL,
        data       BLOB NOT NULL,
        PRIMARY KEY (theme_id, path))`,
  },
  {
    name: 'web_log',
    ddl: `
      CREATE TABLE web_log (
        id                  TEXT PRIMARY KEY,
        name                TEXT NOT NULL,
        slug                TEXT NOT NULL,
        subtitle            TEXT,
        default_page        TEXT NOT NULL,
        posts_per_page      INTEGER NOT NULL,
        theme_id            TEXT NOT NULL REFERENCES theme (id),
        url_base            TEXT NOT NULL,
        time_zone           TEXT NOT NULL,
        auto_htmx           INTEGER NOT NULL DEFAULT 0,
        uploads             TEXT NOT NULL,
        is_feed_enabled     INTEGER NOT NULL DEFAULT 0,
        feed_name           TEXT NOT NULL,
        items_in_feed       INTEGER,
        is_category_enabled INTEGER NOT NULL DEFAULT 0,
        is_tag_enabled      INTEGER NOT NULL DEFAULT 0,
        copyright           TEXT,
        custom_feeds        TEXT NOT NULL DEFAULT '[]',
        redirect_rules      TEXT NOT NULL DEFAULT '[]');
      CREATE INDEX web_log_theme_idx ON web_log (theme_id);
      CREATE UNIQUE INDEX web_log_url_base_idx ON web_log (url_base)`,
  },
  {
    name: 'web_log_user',
    ddl: `
      CREATE TABLE web_log_user (
        id             TEXT PRIMARY KEY,
        web_log_id     TEXT NOT NULL REFERENCES web_log (id),
        email          TEXT NOT NULL,
        first_name     TEXT NOT NULL,
        last_name      TEXT NOT NULL,
        preferred_name TEXT NOT NULL,
        password_hash  TEXT NOT NULL,
        url            TEXT,
        access_level   TEXT NOT NULL,
        created_on     TEXT NOT NULL,
        last_seen_on   TEXT);
      CREATE INDEX web_log_user_web_log_idx ON web_log_user (web_log_id);
      CREATE INDEX web_log_user_email_idx ON web_log_user (web_log_id, email)`,
  },
  {
    name: 'category',
    ddl: `
      CREATE TABLE category (
        id          TEXT PRIMARY KEY,
        web_log_id  TEXT NOT NULL REFERENCES web_log (id),
        name        TEXT NOT NULL,
        slug        TEXT NOT NULL,
        description TEXT,
        parent_id   TEXT);
      CREATE INDEX category_web_log_idx ON category (web_log_id);
      CREATE INDEX category_parent_idx ON category (parent_id)`,
  },
  {
    name: 'page',
    ddl: `
      CREATE TABLE page (
        id              TEXT PRIMARY KEY,
        web_log_id      TEXT NOT NULL REFERENCES web_log (id),
        author_id       TEXT NOT NULL REFERENCES web_log_user (id),
        title           TEXT NOT NULL,
        permalink       TEXT NOT NULL,
        published_on    TEXT NOT NULL,
        updated_on      TEXT NOT NULL,
        is_in_page_list INTEGER NOT NULL DEFAULT 0,
        template        TEXT,
        page_text       TEXT NOT NULL,
        meta_items      TEXT NOT NULL DEFAULT '[]');
      CREATE INDEX page_web_log_idx ON page (web_log_id);
      CREATE INDEX page_author_idx ON page (author_id);
      CREATE INDEX page_permalink_idx ON page (web_log_id, permalink)`,
  },
  {
    name: 'page_permalink',
    ddl: `
      CREATE TABLE page_permalink (
        page_id   TEXT NOT NULL REFERENCES page (id),
        permalink TEXT NOT NULL,
        PRIMARY KEY (page_id, permalink))`,
  },
  {
    name: 'page_revision',
    ddl: `
      CREATE TABLE page_revision (
        page_id       TEXT NOT NULL REFERENCES page (id),
        as_of         TEXT NOT NULL,
        revision_text TEXT NOT NULL,
        PRIMARY KEY (page_id, as_of))`,
  },
  {
    name: 'post',
    ddl: `
      CREATE TABLE post (
        id           TEXT PRIMARY KEY,
        web_log_id   TEXT NOT NULL REFERENCES web_log (id),
        author_id    TEXT NOT NULL REFERENCES web_log_user (id),
        status       TEXT NOT NULL,
        title        TEXT NOT NULL,
        permalink    TEXT NOT NULL,
        published_on TEXT,
        updated_on   TEXT NOT NULL,
        template     TEXT,
        post_text    TEXT NOT NULL,
        tags         TEXT NOT NULL DEFAULT '[]',
        meta_items   TEXT NOT NULL DEFAULT '[]',
        episode      TEXT);
      CREATE INDEX post_web_log_idx ON post (web_log_id);
      CREATE INDEX post_author_idx ON post (author_id);
      CREATE INDEX post_status_idx ON post (web_log_id, status, published_on);
      CREATE INDEX post_permalink_idx ON post (web_log_id, permalink)`,
  },
  {
    name: 'post_category',
    ddl: `
      CREATE TABLE post_category (
        post_id     TEXT NOT NULL REFERENCES post (id),
        category_id TEXT NOT NULL REFERENCES category (id),
        PRIMARY KEY (post_id, category_id));
      CREATE INDEX post_category_category_idx ON post_category (category_id)`,
  },
  {
    name: 'post_permalink',
    ddl: `
      CREATE TABLE post_permalink (
        post_id   TEXT NOT NULL REFERENCES post (id),
        permalink TEXT NOT NULL,
        PRIMARY KEY (post_id, permalink))`,
  },
  {
    name: 'post_revision',
    ddl: `
      CREATE TABLE post_revision (
        post_id       TEXT NOT NULL REFERENCES post (id),
        as_of         TEXT NOT NULL,
        revision_text TEXT NOT NULL,
        PRIMARY KEY (post_id, as_of))`,
  },
  {
    name: 'tag_map',
    ddl: `
      CREATE TABLE tag_map (
        id         TEXT PRIMARY KEY,
        web_log_id TEXT NOT NULL REFERENCES web_log (id),
        tag        TEXT NOT NULL,
        url_value  TEXT NOT NULL);
      CREATE INDEX tag_map_web_log_idx ON tag_map (web_log_id)`,
  },
  {
    name: 'upload',
    ddl: `
      CREATE TABLE upload (
        id         TEXT PRIMARY KEY,
        web_log_id TEXT NOT NULL REFERENCES web_log (id),
        path       TEXT NOT NULL,
        updated_on TEXT NOT NULL,
        data       BLOB NOT NULL);
      CREATE INDEX upload_web_log_idx ON upload (web_log_id);
      CREATE INDEX upload_path_idx ON upload (web_log_id, path)`,
  },
];

/**
 * Create every table that does not exist yet
 */
export function ensureSqliteTables(db: Database.Database, logger: StructuredLogger): string[] {
  const existing = new Set(
    db.prepare("SELECT name FROM sqlite_master WHERE type = 'table'")
      .pluck()
      .all()
      .filter((name): name is string => typeof name === 'string')
  );

  const created: string[] = [];
  for (const table of SQLITE_TABLES) {
    if (existing.has(table.name)) continue;
    try {
      db.exec(table.ddl);
    } catch (error) {
      throw new SchemaError(`table ${table.name}`, { cause: error });
    }
    logger.tableCreated('sqlite', table.name);
    created.push(table.name);
  }
  return created;
}
