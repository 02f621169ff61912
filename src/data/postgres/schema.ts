/**
 * PostgreSQL Schema
 * @module data/postgres/schema
 *
 * Table definitions, created when missing. Category IDs, tags and prior
 * permalinks are TEXT[] columns; structured values are JSONB; revisions have
 * their own tables.
 */

import type pg from 'pg';
import { SchemaError } from '../../errors/index.js';
import type { StructuredLogger } from '../../logging/index.js';

/**
 * Tables in creation order, with their indexes
 */
export const POSTGRES_TABLES: ReadonlyArray<{ name: string; ddl: string }> = [
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
        updated_on TIMESTAMPTZ NOT NULL,
        data       BYTEA NOT NULL,
        PRIMARY KEY (theme_id, path))`,
  },
  {
    name: 'web_log',
    ddl: `
      CREATE TABLE web_log (
        id             TEXT PRIMARY KEY,
        name           TEXT NOT NULL,
        slug           TEXT NOT NULL,
        subtitle       TEXT,
        default_page   TEXT NOT NULL,
        posts_per_page INTEGER NOT NULL,
        theme_id       TEXT NOT NULL REFERENCES theme (id),
        url_base       TEXT NOT NULL,
        time_zone      TEXT NOT NULL,
        auto_htmx      BOOLEAN NOT NULL DEFAULT FALSE,
        uploads        TEXT NOT NULL,
        is_feed_enabled     BOOLEAN NOT NULL DEFAULT FALSE,
        feed_name           TEXT NOT NULL,
        items_in_feed       INTEGER,
        is_category_enabled BOOLEAN NOT NULL DEFAULT FALSE,
        is_tag_enabled      BOOLEAN NOT NULL DEFAULT FALSE,
        copyright           TEXT,
        custom_feeds        JSONB NOT NULL DEFAULT '[]',
        redirect_rules      JSONB NOT NULL DEFAULT '[]');
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
        created_on     TIMESTAMPTZ NOT NULL,
        last_seen_on   TIMESTAMPTZ);
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
      CREATE INDEX category_web_log_idx ON category (web_log_id)`,
  },
  {
    name: 'page',
    ddl: `
      CREATE TABLE page (
        id               TEXT PRIMARY KEY,
        web_log_id       TEXT NOT NULL REFERENCES web_log (id),
        author_id        TEXT NOT NULL REFERENCES web_log_user (id),
        title            TEXT NOT NULL,
        permalink        TEXT NOT NULL,
        prior_permalinks TEXT[] NOT NULL DEFAULT '{}',
        published_on     TIMESTAMPTZ NOT NULL,
        updated_on       TIMESTAMPTZ NOT NULL,
        is_in_page_list  BOOLEAN NOT NULL DEFAULT FALSE,
        template         TEXT,
        page_text        TEXT NOT NULL,
        meta_items       JSONB NOT NULL DEFAULT '[]');
      CREATE INDEX page_web_log_idx ON page (web_log_id);
      CREATE INDEX page_author_idx ON page (author_id);
      CREATE INDEX page_permalink_idx ON page (web_log_id, permalink)`,
  },
  {
    name: 'page_revision',
    ddl: `
      CREATE TABLE page_revision (
        page_id       TEXT NOT NULL REFERENCES page (id),
        as_of         TIMESTAMPTZ NOT NULL,
        revision_text TEXT NOT NULL,
        PRIMARY KEY (page_id, as_of))`,
  },
  {
    name: 'post',
    ddl: `
      CREATE TABLE post (
        id               TEXT PRIMARY KEY,
        web_log_id       TEXT NOT NULL REFERENCES web_log (id),
        author_id        TEXT NOT NULL REFERENCES web_log_user (id),
        status           TEXT NOT NULL,
        title            TEXT NOT NULL,
        permalink        TEXT NOT NULL,
        prior_permalinks TEXT[] NOT NULL DEFAULT '{}',
        published_on     TIMESTAMPTZ,
        updated_on       TIMESTAMPTZ NOT NULL,
        template         TEXT,
        post_text        TEXT NOT NULL,
        category_ids     TEXT[] NOT NULL DEFAULT '{}',
        tags             TEXT[] NOT NULL DEFAULT '{}',
        meta_items       JSONB NOT NULL DEFAULT '[]',
        episode          JSONB);
      CREATE INDEX post_web_log_idx ON post (web_log_id);
      CREATE INDEX post_author_idx ON post (author_id);
      CREATE INDEX post_status_idx ON post (web_log_id, status, published_on);
      CREATE INDEX post_permalink_idx ON post (web_log_id, permalink);
      CREATE INDEX post_category_idx ON post USING GIN (category_ids);
      CREATE INDEX post_tag_idx ON post USING GIN (tags)`,
  },
  {
    name: 'post_revision',
    ddl: `
      CREATE TABLE post_revision (
        post_id       TEXT NOT NULL REFERENCES post (id),
        as_of         TIMESTAMPTZ NOT NULL,
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
        updated_on TIMESTAMPTZ NOT NULL,
        data       BYTEA NOT NULL);
      CREATE INDEX upload_web_log_idx ON upload (web_log_id);
      CREATE INDEX upload_path_idx ON upload (web_log_id, path)`,
  },
];

/**
 * Create every table that does not exist yet in the current schema
 */
export async function ensurePostgresTables(pool: pg.Pool, logger: StructuredLogger): Promise<string[]> {
  const result = await pool.query<{ table_name: string }>(
    `SELECT table_name FROM information_schema.tables WHERE table_schema = current_schema()`
  );
  const existing = new Set(result.rows.map((row) => row.table_name));

  const created: string[] = [];
  for (const table of POSTGRES_TABLES) {
    if (existing.has(table.name)) continue;
    try {
      await pool.query(table.ddl);
    } catch (error) {
      throw new SchemaError(`table ${table.name}`, { cause: error });
    }
    logger.tableCreated('postgres', table.name);
    created.push(table.name);
  }
  return created;
}
