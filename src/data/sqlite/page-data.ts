/**
 * SQLite Page Store
 * @module data/sqlite/page-data
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';
import { PageId, WebLogId, WebLogUserId } from '../../types/ids.js';
import { MetaItemSchema, type Page } from '../../types/entities.js';
import { requireRevision } from '../../types/support.js';
import { DeleteOutcome, type IPageData } from '../interfaces.js';
import { PAGES_PER_ADMIN_PAGE, pageWindow, toPagedList, type PagedList } from '../paging.js';
import { sqlBool, sqlDate, sqlJson, toBool, toNull } from './sqlite-store.js';
import { SqliteContentStore, type ChildTable } from './content-store.js';

const PageRow = z.object({
  id: PageId,
  web_log_id: WebLogId,
  author_id: WebLogUserId,
  title: z.string(),
  permalink: z.string(),
  published_on: sqlDate,
  updated_on: sqlDate,
  is_in_page_list: sqlBool,
  template: z.string().nullable(),
  page_text: z.string(),
  meta_items: sqlJson(z.array(MetaItemSchema)),
}).transform((row): Page => ({
  id: row.id,
  webLogId: row.web_log_id,
  authorId: row.author_id,
  title: row.title,
  permalink: row.permalink,
  publishedOn: row.published_on,
  updatedOn: row.updated_on,
  isInPageList: row.is_in_page_list,
  template: row.template ?? undefined,
  text: row.page_text,
  metadata: row.meta_items,
  priorPermalinks: [],
  revisions: [],
}));

/** Columns of a listing: text and metadata left out */
const LIST_COLUMNS = `
  id, web_log_id, author_id, title, permalink, published_on, updated_on, is_in_page_list,
  template, '' AS page_text, '[]' AS meta_items`;

const PERMALINKS: ChildTable = { table: 'page_permalink', parentColumn: 'page_id' };
const REVISIONS: ChildTable = { table: 'page_revision', parentColumn: 'page_id' };

const UPSERT = `
  INSERT INTO page (
    id, web_log_id, author_id, title, permalink, published_on, updated_on, is_in_page_list,
    template, page_text, meta_items
  ) VALUES (
    @id, @webLogId, @authorId, @title, @permalink, @publishedOn, @updatedOn, @isInPageList,
    @template, @text, @metadata
  ) ON CONFLICT (id) DO UPDATE SET
    web_log_id      = excluded.web_log_id,
    author_id       = excluded.author_id,
    title           = excluded.title,
    permalink       = excluded.permalink,
    published_on    = excluded.published_on,
    updated_on      = excluded.updated_on,
    is_in_page_list = excluded.is_in_page_list,
    template        = excluded.template,
    page_text       = excluded.page_text,
    meta_items      = excluded.meta_items`;

/**
 * SQLite implementation of {@link IPageData}
 */
export class SqlitePageData extends SqliteContentStore implements IPageData {
  constructor(db: Database.Database) {
    super(db, 'page');
  }

  // ==========================================================================
  // Writes
  // ==========================================================================

  private params(page: Page) {
    return {
      id: page.id,
      webLogId: page.webLogId,
      authorId: page.authorId,
      title: page.title,
      permalink: page.permalink,
      publishedOn: page.publishedOn.toISOString(),
      updatedOn: page.updatedOn.toISOString(),
      isInPageList: toBool(page.isInPageList),
      template: toNull(page.template),
      text: page.text,
      metadata: JSON.stringify(page.metadata),
    };
  }

  private save(page: Page): void {
    requireRevision('page', page);
    this.inTransaction(() => {
      this.execute(UPSERT, this.params(page));
      this.syncPermalinks(PERMALINKS, page.id, page.priorPermalinks);
      this.syncRevisions(REVISIONS, page.id, page.revisions);
    });
  }

  async add(page: Page): Promise<void> {
    this.save(page);
  }

  async update(page: Page): Promise<void> {
    this.save(page);
  }

  async restore(pages: readonly Page[]): Promise<void> {
    this.inTransaction(() => {
      for (const page of pages) this.save(page);
    });
  }

  async delete(pageId: PageId, webLogId: WebLogId): Promise<DeleteOutcome> {
    return this.inTransaction(() => {
      if (!this.queryExists('SELECT 1 FROM page WHERE id = @pageId AND web_log_id = @webLogId', { pageId, webLogId })) {
        return DeleteOutcome.NOT_FOUND;
      }
      this.deleteChildren(REVISIONS, pageId);
      this.deleteChildren(PERMALINKS, pageId);
      this.execute('DELETE FROM page WHERE id = @pageId', { pageId });
      return DeleteOutcome.DELETED;
    });
  }

  async updatePriorPermalinks(
    pageId: PageId,
    webLogId: WebLogId,
    permalinks: readonly string[]
  ): Promise<boolean> {
    return this.inTransaction(() => {
      if (!this.queryExists('SELECT 1 FROM page WHERE id = @pageId AND web_log_id = @webLogId', { pageId, webLogId })) {
        return false;
      }
      this.syncPermalinks(PERMALINKS, pageId, permalinks);
      return true;
    });
  }

  // ==========================================================================
  // Reads
  // ==========================================================================

  private withChildren(page: Page): Page {
    return {
      ...page,
      priorPermalinks: this.loadValues(PERMALINKS, 'permalink', page.id),
      revisions: this.loadRevisions(REVISIONS, page.id),
    };
  }

  async all(webLogId: WebLogId): Promise<Page[]> {
    return this.queryAll(PageRow,
      `SELECT ${LIST_COLUMNS} FROM page WHERE web_log_id = @webLogId ORDER BY LOWER(title), id`,
      { webLogId });
  }

  async countAll(webLogId: WebLogId): Promise<number> {
    return this.queryCount('SELECT COUNT(*) AS count FROM page WHERE web_log_id = @webLogId', { webLogId });
  }

  async countListed(webLogId: WebLogId): Promise<number> {
    return this.queryCount(
      'SELECT COUNT(*) AS count FROM page WHERE web_log_id = @webLogId AND is_in_page_list = 1',
      { webLogId }
    );
  }

  async findById(pageId: PageId, webLogId: WebLogId): Promise<Page | undefined> {
    return this.queryOne(PageRow,
      'SELECT * FROM page WHERE id = @pageId AND web_log_id = @webLogId',
      { pageId, webLogId });
  }

  async findByPermalink(permalink: string, webLogId: WebLogId): Promise<Page | undefined> {
    return this.queryOne(PageRow,
      'SELECT * FROM page WHERE web_log_id = @webLogId AND permalink = @permalink',
      { permalink, webLogId });
  }

  async findCurrentPermalink(permalinks: readonly string[], webLogId: WebLogId): Promise<string | undefined> {
    if (permalinks.length === 0) return undefined;
    return this.queryOne(z.object({ permalink: z.string() }).transform((row) => row.permalink),
      `SELECT p.permalink
         FROM page p
              INNER JOIN page_permalink pp ON pp.page_id = p.id
        WHERE p.web_log_id = @webLogId
          AND pp.permalink IN (SELECT value FROM json_each(@permalinks))
        LIMIT 1`,
      { webLogId, permalinks: JSON.stringify(permalinks) });
  }

  async findFullById(pageId: PageId, webLogId: WebLogId): Promise<Page | undefined> {
    const page = await this.findById(pageId, webLogId);
    return page && this.withChildren(page);
  }

  async findFullByWebLog(webLogId: WebLogId): Promise<Page[]> {
    return this.queryAll(PageRow, 'SELECT * FROM page WHERE web_log_id = @webLogId ORDER BY id', { webLogId })
      .map((page) => this.withChildren(page));
  }

  async findListed(webLogId: WebLogId): Promise<Page[]> {
    return this.queryAll(PageRow,
      `SELECT ${LIST_COLUMNS} FROM page
        WHERE web_log_id = @webLogId AND is_in_page_list = 1
        ORDER BY LOWER(title), id`,
      { webLogId });
  }

  async findPageOfPages(webLogId: WebLogId, pageNbr: number): Promise<PagedList<Page>> {
    const { offset, limit } = pageWindow(pageNbr, PAGES_PER_ADMIN_PAGE);
    const rows = this.queryAll(PageRow,
      `SELECT * FROM page WHERE web_log_id = @webLogId
        ORDER BY LOWER(title), id
        LIMIT @limit OFFSET @offset`,
      { webLogId, limit, offset });
    return toPagedList(rows, pageNbr, PAGES_PER_ADMIN_PAGE);
  }
}
