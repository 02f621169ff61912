/**
 * PostgreSQL Post Store
 * @module data/postgres/post-data
 */

import type pg from 'pg';
import type { CategoryId, PostId, WebLogId, WebLogUserId } from '../../types/ids.js';
import type { Episode, MetaItem, Post, PostStatus } from '../../types/entities.js';
import { requireRevision } from '../../types/support.js';
import { DeleteOutcome, type IPostData, type SurroundingPosts } from '../interfaces.js';
import { pageWindow, toPagedList, type PagedList } from '../paging.js';
import { PgContentStore, sortedLinks, type RevisionTable } from './content-store.js';

interface PostRow {
  id: PostId;
  web_log_id: WebLogId;
  author_id: WebLogUserId;
  status: PostStatus;
  title: string;
  permalink: string;
  prior_permalinks: string[];
  published_on: Date | null;
  updated_on: Date;
  template: string | null;
  post_text: string;
  category_ids: CategoryId[];
  tags: string[];
  meta_items: MetaItem[];
  episode: Episode | null;
}

function rowToPost(row: PostRow): Post {
  return {
    id: row.id,
    webLogId: row.web_log_id,
    authorId: row.author_id,
    status: row.status,
    title: row.title,
    permalink: row.permalink,
    publishedOn: row.published_on ?? undefined,
    updatedOn: row.updated_on,
    template: row.template ?? undefined,
    text: row.post_text,
    categoryIds: [...row.category_ids].sort(),
    tags: row.tags,
    episode: row.episode ?? undefined,
    metadata: row.meta_items,
    priorPermalinks: [],
    revisions: [],
  };
}

const REVISIONS: RevisionTable = { table: 'post_revision', parentColumn: 'post_id' };

const UPSERT = `
  INSERT INTO post (
    id, web_log_id, author_id, status, title, permalink, prior_permalinks, published_on,
    updated_on, template, post_text, category_ids, tags, meta_items, episode
  ) VALUES (
    $1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15
  ) ON CONFLICT (id) DO UPDATE SET
    web_log_id       = EXCLUDED.web_log_id,
    author_id        = EXCLUDED.author_id,
    status           = EXCLUDED.status,
    title            = EXCLUDED.title,
    permalink        = EXCLUDED.permalink,
    prior_permalinks = EXCLUDED.prior_permalinks,
    published_on     = EXCLUDED.published_on,
    updated_on       = EXCLUDED.updated_on,
    template         = EXCLUDED.template,
    post_text        = EXCLUDED.post_text,
    category_ids     = EXCLUDED.category_ids,
    tags             = EXCLUDED.tags,
    meta_items       = EXCLUDED.meta_items,
    episode          = EXCLUDED.episode`;

function postParams(post: Post): unknown[] {
  return [
    post.id,
    post.webLogId,
    post.authorId,
    post.status,
    post.title,
    post.permalink,
    post.priorPermalinks,
    post.publishedOn ?? null,
    post.updatedOn,
    post.template ?? null,
    post.text,
    post.categoryIds,
    post.tags,
    JSON.stringify(post.metadata),
    post.episode ? JSON.stringify(post.episode) : null,
  ];
}

const PUBLISHED = "web_log_id = $1 AND status = 'Published'";
const NEWEST_FIRST = 'ORDER BY published_on DESC, id';

/**
 * PostgreSQL implementation of {@link IPostData}
 */
export class PgPostData extends PgContentStore implements IPostData {
  constructor(pool: pg.Pool) {
    super(pool, 'post');
  }

  // ==========================================================================
  // Writes
  // ==========================================================================

  private async save(post: Post, client: pg.PoolClient): Promise<void> {
    requireRevision('post', post);
    await this.execute(UPSERT, postParams(post), { client });
    await this.syncRevisions(REVISIONS, post.id, post.revisions, { client });
  }

  async add(post: Post): Promise<void> {
    await this.withTransaction((client) => this.save(post, client));
  }

  async update(post: Post): Promise<void> {
    await this.withTransaction((client) => this.save(post, client));
  }

  async restore(posts: readonly Post[]): Promise<void> {
    await this.withTransaction(async (client) => {
      for (const post of posts) await this.save(post, client);
    });
  }

  async delete(postId: PostId, webLogId: WebLogId): Promise<DeleteOutcome> {
    return this.withTransaction(async (client) => {
      const exists = await this.queryExists(
        'SELECT 1 FROM post WHERE id = $1 AND web_log_id = $2', [postId, webLogId], { client });
      if (!exists) return DeleteOutcome.NOT_FOUND;
      await this.execute('DELETE FROM post_revision WHERE post_id = $1', [postId], { client });
      await this.execute('DELETE FROM post WHERE id = $1', [postId], { client });
      return DeleteOutcome.DELETED;
    });
  }

  async updatePriorPermalinks(
    postId: PostId,
    webLogId: WebLogId,
    permalinks: readonly string[]
  ): Promise<boolean> {
    const updated = await this.execute(
      'UPDATE post SET prior_permalinks = $3 WHERE id = $1 AND web_log_id = $2',
      [postId, webLogId, permalinks]
    );
    return updated > 0;
  }

  // ==========================================================================
  // Reads
  // ==========================================================================

  private async withChildren(row: PostRow): Promise<Post> {
    return {
      ...rowToPost(row),
      priorPermalinks: sortedLinks(row.prior_permalinks),
      revisions: await this.loadRevisions(REVISIONS, row.id),
    };
  }

  private async findPage(
    where: string,
    order: string,
    params: unknown[],
    pageNbr: number,
    postsPerPage: number
  ): Promise<PagedList<Post>> {
    const { offset, limit } = pageWindow(pageNbr, postsPerPage);
    const rows = await this.queryAll<PostRow>(
      `SELECT * FROM post WHERE ${where} ${order}
        LIMIT $${params.length + 1} OFFSET $${params.length + 2}`,
      [...params, limit, offset]
    );
    return toPagedList(rows.map(rowToPost), pageNbr, postsPerPage);
  }

  async countByStatus(status: PostStatus, webLogId: WebLogId): Promise<number> {
    return this.queryCount(
      'SELECT COUNT(*) AS count FROM post WHERE web_log_id = $1 AND status = $2',
      [webLogId, status]
    );
  }

  async findById(postId: PostId, webLogId: WebLogId): Promise<Post | undefined> {
    const row = await this.queryOne<PostRow>(
      'SELECT * FROM post WHERE id = $1 AND web_log_id = $2', [postId, webLogId]);
    return row && rowToPost(row);
  }

  async findByPermalink(permalink: string, webLogId: WebLogId): Promise<Post | undefined> {
    const row = await this.queryOne<PostRow>(
      'SELECT * FROM post WHERE web_log_id = $1 AND permalink = $2', [webLogId, permalink]);
    return row && rowToPost(row);
  }

  async findCurrentPermalink(permalinks: readonly string[], webLogId: WebLogId): Promise<string | undefined> {
    if (permalinks.length === 0) return undefined;
    const row = await this.queryOne<{ permalink: string }>(
      'SELECT permalink FROM post WHERE web_log_id = $1 AND prior_permalinks && $2::text[] LIMIT 1',
      [webLogId, permalinks]
    );
    return row?.permalink;
  }

  async findFullById(postId: PostId, webLogId: WebLogId): Promise<Post | undefined> {
    const row = await this.queryOne<PostRow>(
      'SELECT * FROM post WHERE id = $1 AND web_log_id = $2', [postId, webLogId]);
    return row && this.withChildren(row);
  }

  async findFullByWebLog(webLogId: WebLogId): Promise<Post[]> {
    const rows = await this.queryAll<PostRow>(
      'SELECT * FROM post WHERE web_log_id = $1 ORDER BY id', [webLogId]);
    return Promise.all(rows.map((row) => this.withChildren(row)));
  }

  async findPageOfCategorizedPosts(
    webLogId: WebLogId,
    categoryIds: readonly CategoryId[],
    pageNbr: number,
    postsPerPage: number
  ): Promise<PagedList<Post>> {
    return this.findPage(`${PUBLISHED} AND category_ids && $2::text[]`, NEWEST_FIRST,
      [webLogId, categoryIds], pageNbr, postsPerPage);
  }

  async findPageOfPosts(webLogId: WebLogId, pageNbr: number, postsPerPage: number): Promise<PagedList<Post>> {
    return this.findPage('web_log_id = $1', 'ORDER BY published_on DESC NULLS FIRST, updated_on DESC, id',
      [webLogId], pageNbr, postsPerPage);
  }

  async findPageOfPublishedPosts(
    webLogId: WebLogId,
    pageNbr: number,
    postsPerPage: number
  ): Promise<PagedList<Post>> {
    return this.findPage(PUBLISHED, NEWEST_FIRST, [webLogId], pageNbr, postsPerPage);
  }

  async findPageOfTaggedPosts(
    webLogId: WebLogId,
    tag: string,
    pageNbr: number,
    postsPerPage: number
  ): Promise<PagedList<Post>> {
    return this.findPage(`${PUBLISHED} AND $2 = ANY (tags)`, NEWEST_FIRST,
      [webLogId, tag], pageNbr, postsPerPage);
  }

  async findSurroundingPosts(webLogId: WebLogId, publishedOn: Date): Promise<SurroundingPosts> {
    const [older, newer] = await Promise.all([
      this.queryOne<PostRow>(
        `SELECT * FROM post WHERE ${PUBLISHED} AND published_on < $2
          ORDER BY published_on DESC, id LIMIT 1`,
        [webLogId, publishedOn]
      ),
      this.queryOne<PostRow>(
        `SELECT * FROM post WHERE ${PUBLISHED} AND published_on > $2
          ORDER BY published_on, id LIMIT 1`,
        [webLogId, publishedOn]
      ),
    ]);
    return {
      older: older && rowToPost(older),
      newer: newer && rowToPost(newer),
    };
  }
}
