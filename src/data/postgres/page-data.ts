/**
 * PostgreSQL Page Store
 * @module data/postgres/page-data
 */

import type pg from 'pg';
import type { PageId, WebLogId, WebLogUserId } from '../../types/ids.js';
import type { MetaItem, Page } from '../../types/entities.js';
import { requireRevision } from '../../types/support.js';
import { DeleteOutcome, type IPageData } from '../interfaces.js';
import { PAGES_PER_ADMIN_PAGE, pageWindow, toPagedList, type PagedList } from '../paging.js';
import { PgContentStore, sortedLinks, type RevisionTable } from './content-store.js';

interface PageRow {
  id: PageId;
  web_log_id: WebLogId;
  author_id: WebLogUserId;
  title: string;
  permalink: string;
  prior_permalinks: string[];
  published_on: Date;
  updated_on: Date;
  is_in_page_list: boolean;
  template: string | null;
  page_text: string;
  meta_items: MetaItem[];
}

function rowToPage(row: PageRow): Page {
  return {
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
  };
}

/** Columns of a listing: text, metadata and prior permalinks left out */
const LIST_COLUMNS = `
  id, web_log_id, author_id, title, permalink, '{}'::text[] AS prior_permalinks, published_on,
  updated_on, is_in_page_list, template, '' AS page_text, '[]'::jsonb AS meta_items`;

const REVISIONS: RevisionTable = { table: 'page_revision', parentColumn: 'page_id' };

const UPSERT = `
  INSERT INTO page (
    id, web_log_id, author_id, title, permalink, prior_permalinks, published_on, updated_on,
    is_in_page_list, template, page_text, meta_items
  ) VALUES (
    $1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12
  ) ON CONFLICT (id) DO UPDATE SET
    web_log_id       = EXCLUDED.web_log_id,
    author_id        = EXCLUDED.author_id,
    title            = EXCLUDED.title,
    permalink        = EXCLUDED.permalink,
    prior_permalinks = EXCLUDED.prior_permalinks,
    published_on     = EXCLUDED.published_on,
    updated_on       = EXCLUDED.updated_on,
    is_in_page_list  = EXCLUDED.is_in_page_list,
    template         = EXCLUDED.template,
    page_text        = EXCLUDED.page_text,
    meta_items       = EXCLUDED.meta_items`;

function pageParams(page: Page): unknown[] {
  return [
    page.id,
    page.webLogId,
    page.authorId,
    page.title,
    page.permalink,
    page.priorPermalinks,
    page.publishedOn,
    page.updatedOn,
    page.isInPageList,
    page.template ?? null,
    page.text,
    JSON.stringify(page.metadata),
  ];
}

/**
 * PostgreSQL implementation of {@link IPageData}
 */
export class PgPageData extends PgContentStore implements IPageData {
  constructor(pool: pg.Pool) {
    super(pool, 'page');
  }

  // ==========================================================================
  // Writes
  // ==========================================================================

  private async save(page: Page, client: pg.PoolClient): Promise<void> {
    requireRevision('page', page);
    await this.execute(UPSERT, pageParams(page), { client });
    await this.syncRevisions(REVISIONS, page.id, page.revisions, { client });
  }

  async add(page: Page): Promise<void> {
    await this.withTransaction((client) => this.save(page, client));
  }

  async update(page: Page): Promise<void> {
    await this.withTransaction((client) => this.save(page, client));
  }

  async restore(pages: readonly Page[]): Promise<void> {
    await this.withTransaction(async (client) => {
      for (const page of pages) await this.save(page, client);
    });
  }

  async delete(pageId: PageId, webLogId: WebLogId): Promise<DeleteOutcome> {
    return this.withTransaction(async (client) => {
      const exists = await this.queryExists(
        'SELECT 1 FROM page WHERE id = $1 AND web_log_id = $2', [pageId, webLogId], { client });
      if (!exists) return DeleteOutcome.NOT_FOUND;
      await this.execute('DELETE FROM page_revision WHERE page_id = $1', [pageId], { client });
      await this.execute('DELETE FROM page WHERE id = $1', [pageId], { client });
      return DeleteOutcome.DELETED;
    });
  }

  async updatePriorPermalinks(
    pageId: PageId,
    webLogId: WebLogId,
    permalinks: readonly string[]
  ): Promise<boolean> {
    const updated = await this.execute(
      'UPDATE page SET prior_permalinks = $3 WHERE id = $1 AND web_log_id = $2',
      [pageId, webLogId, permalinks]
    );
    return updated > 0;
  }

  // ==========================================================================
  // Reads
  // ==========================================================================

  private async withChildren(row: PageRow): Promise<Page> {
    return {
      ...rowToPage(row),
      priorPermalinks: sortedLinks(row.prior_permalinks),
      revisions: await this.loadRevisions(REVISIONS, row.id),
    };
  }

  async all(webLogId: WebLogId): Promise<Page[]> {
    const rows = await this.queryAll<PageRow>(
      `SELECT ${LIST_COLUMNS} FROM page WHERE web_log_id = $1 ORDER BY LOWER(title), id`,
      [webLogId]
    );
    return rows.map(rowToPage);
  }

  async countAll(webLogId: WebLogId): Promise<number> {
    return this.queryCount('SELECT COUNT(*) AS count FROM page WHERE web_log_id = $1', [webLogId]);
  }

  async countListed(webLogId: WebLogId): Promise<number> {
    return this.queryCount(
      'SELECT COUNT(*) AS count FROM page WHERE web_log_id = $1 AND is_in_page_list = TRUE',
      [webLogId]
    );
  }

  async findById(pageId: PageId, webLogId: WebLogId): Promise<Page | undefined> {
    const row = await this.queryOne<PageRow>(
      'SELECT * FROM page WHERE id = $1 AND web_log_id = $2', [pageId, webLogId]);
    return row && rowToPage(row);
  }

  async findByPermalink(permalink: string, webLogId: WebLogId): Promise<Page | undefined> {
    const row = await this.queryOne<PageRow>(
      'SELECT * FROM page WHERE web_log_id = $1 AND permalink = $2', [webLogId, permalink]);
    return row && rowToPage(row);
  }

  async findCurrentPermalink(permalinks: readonly string[], webLogId: WebLogId): Promise<string | undefined> {
    if (permalinks.length === 0) return undefined;
    const row = await this.queryOne<{ permalink: string }>(
      'SELECT permalink FROM page WHERE web_log_id = $1 AND prior_permalinks && $2::text[] LIMIT 1',
      [webLogId, permalinks]
    );
    return row?.permalink;
  }

  async findFullById(pageId: PageId, webLogId: WebLogId): Promise<Page | undefined> {
    const row = await this.queryOne<PageRow>(
      'SELECT * FROM page WHERE id = $1 AND web_log_id = $2', [pageId, webLogId]);
    return row && this.withChildren(row);
  }

  async findFullByWebLog(webLogId: WebLogId): Promise<Page[]> {
    const rows = await this.queryAll<PageRow>(
      'SELECT * FROM page WHERE web_log_id = $1 ORDER BY id', [webLogId]);
    return Promise.all(rows.map((row) => this.withChildren(row)));
  }

  async findListed(webLogId: WebLogId): Promise<Page[]> {
    const rows = await this.queryAll<PageRow>(
      `SELECT ${LIST_COLUMNS} FROM page
        WHERE web_log_id = $1 AND is_in_page_list = TRUE
        ORDER BY LOWER(title), id`,
      [webLogId]
    );
    return rows.map(rowToPage);
  }

  async findPageOfPages(webLogId: WebLogId, pageNbr: number): Promise<PagedList<Page>> {
    const { offset, limit } = pageWindow(pageNbr, PAGES_PER_ADMIN_PAGE);
    const rows = await this.queryAll<PageRow>(
      `SELECT * FROM page WHERE web_log_id = $1
        ORDER BY LOWER(title), id
        LIMIT $2 OFFSET $3`,
      [webLogId, limit, offset]
    );
    return toPagedList(rows.map(rowToPage), pageNbr, PAGES_PER_ADMIN_PAGE);
  }
}
