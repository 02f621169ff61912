/**
 * SQLite Post Store
 * @module data/sqlite/post-data
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';
import { CategoryId, PostId, WebLogId, WebLogUserId } from '../../types/ids.js';
import {
  EpisodeSchema,
  MetaItemSchema,
  PostStatus,
  type Post,
} from '../../types/entities.js';
import { requireRevision } from '../../types/support.js';
import { DeleteOutcome, type IPostData, type SurroundingPosts } from '../interfaces.js';
import { pageWindow, toPagedList, type PagedList } from '../paging.js';
import { sqlDate, sqlJson, toDate, toNull, type SqlParams } from './sqlite-store.js';
import { SqliteContentStore, type ChildTable } from './content-store.js';

const PostRow = z.object({
  id: PostId,
  web_log_id: WebLogId,
  author_id: WebLogUserId,
  status: PostStatus,
  title: z.string(),
  permalink: z.string(),
  published_on: sqlDate.nullable(),
  updated_on: sqlDate,
  template: z.string().nullable(),
  post_text: z.string(),
  tags: sqlJson(z.array(z.string())),
  meta_items: sqlJson(z.array(MetaItemSchema)),
  episode: sqlJson(EpisodeSchema).nullable(),
}).transform((row): Post => ({
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
  categoryIds: [],
  tags: row.tags,
  episode: row.episode ?? undefined,
  metadata: row.meta_items,
  priorPermalinks: [],
  revisions: [],
}));

const CATEGORIES: ChildTable = { table: 'post_category', parentColumn: 'post_id' };
const PERMALINKS: ChildTable = { table: 'post_permalink', parentColumn: 'post_id' };
const REVISIONS: ChildTable = { table: 'post_revision', parentColumn: 'post_id' };

const UPSERT = `
  INSERT INTO post (
    id, web_log_id, author_id, status, title, permalink, published_on, updated_on,
    template, post_text, tags, meta_items, episode
  ) VALUES (
    @id, @webLogId, @authorId, @status, @title, @permalink, @publishedOn, @updatedOn,
    @template, @text, @tags, @metadata, @episode
  ) ON CONFLICT (id) DO UPDATE SET
    web_log_id   = excluded.web_log_id,
    author_id    = excluded.author_id,
    status       = excluded.status,
    title        = excluded.title,
    permalink    = excluded.permalink,
    published_on = excluded.published_on,
    updated_on   = excluded.updated_on,
    template     = excluded.template,
    post_text    = excluded.post_text,
    tags         = excluded.tags,
    meta_items   = excluded.meta_items,
    episode      = excluded.episode`;

const PUBLISHED_ORDER = 'ORDER BY published_on DESC, id';

/**
 * SQLite implementation of {@link IPostData}
 */
export class SqlitePostData extends SqliteContentStore implements IPostData {
  constructor(db: Database.Database) {
    super(db, 'post');
  }

  // ==========================================================================
  // Writes
  // ==========================================================================

  private params(post: Post) {
    return {
      id: post.id,
      webLogId: post.webLogId,
      authorId: post.authorId,
      status: post.status,
      title: post.title,
      permalink: post.permalink,
      publishedOn: toDate(post.publishedOn),
      updatedOn: post.updatedOn.toISOString(),
      template: toNull(post.template),
      text: post.text,
      tags: JSON.stringify(post.tags),
      metadata: JSON.stringify(post.metadata),
      episode: post.episode ? JSON.stringify(post.episode) : null,
    };
  }

  private save(post: Post): void {
    requireRevision('post', post);
    this.inTransaction(() => {
      this.execute(UPSERT, this.params(post));
      this.syncCategoryIds(CATEGORIES, post.id, post.categoryIds);
      this.syncPermalinks(PERMALINKS, post.id, post.priorPermalinks);
      this.syncRevisions(REVISIONS, post.id, post.revisions);
    });
  }

  async add(post: Post): Promise<void> {
    this.save(post);
  }

  async update(post: Post): Promise<void> {
    this.save(post);
  }

  async restore(posts: readonly Post[]): Promise<void> {
    this.inTransaction(() => {
      for (const post of posts) this.save(post);
    });
  }

  async delete(postId: PostId, webLogId: WebLogId): Promise<DeleteOutcome> {
    return this.inTransaction(() => {
      if (!this.queryExists('SELECT 1 FROM post WHERE id = @postId AND web_log_id = @webLogId', { postId, webLogId })) {
        return DeleteOutcome.NOT_FOUND;
      }
      this.deleteChildren(REVISIONS, postId);
      this.deleteChildren(PERMALINKS, postId);
      this.deleteChildren(CATEGORIES, postId);
      this.execute('DELETE FROM post WHERE id = @postId', { postId });
      return DeleteOutcome.DELETED;
    });
  }

  async updatePriorPermalinks(
    postId: PostId,
    webLogId: WebLogId,
    permalinks: readonly string[]
  ): Promise<boolean> {
    return this.inTransaction(() => {
      if (!this.queryExists('SELECT 1 FROM post WHERE id = @postId AND web_log_id = @webLogId', { postId, webLogId })) {
        return false;
      }
      this.syncPermalinks(PERMALINKS, postId, permalinks);
      return true;
    });
  }

  // ==========================================================================
  // Reads
  // ==========================================================================

  private withCategories(post: Post): Post {
    return {
      ...post,
      categoryIds: this.loadValues(CATEGORIES, 'category_id', post.id).map((id) => CategoryId.parse(id)),
    };
  }

  private withChildren(post: Post): Post {
    return {
      ...this.withCategories(post),
      priorPermalinks: this.loadValues(PERMALINKS, 'permalink', post.id),
      revisions: this.loadRevisions(REVISIONS, post.id),
    };
  }

  private findPage(where: string, order: string, params: SqlParams, pageNbr: number, postsPerPage: number) {
    const { offset, limit } = pageWindow(pageNbr, postsPerPage);
    const rows = this.queryAll(PostRow,
      `SELECT * FROM post WHERE ${where} ${order} LIMIT @limit OFFSET @offset`,
      { ...params, limit, offset });
    return toPagedList(rows.map((post) => this.withCategories(post)), pageNbr, postsPerPage);
  }

  async countByStatus(status: PostStatus, webLogId: WebLogId): Promise<number> {
    return this.queryCount(
      'SELECT COUNT(*) AS count FROM post WHERE web_log_id = @webLogId AND status = @status',
      { webLogId, status }
    );
  }

  async findById(postId: PostId, webLogId: WebLogId): Promise<Post | undefined> {
    const post = this.queryOne(PostRow,
      'SELECT * FROM post WHERE id = @postId AND web_log_id = @webLogId',
      { postId, webLogId });
    return post && this.withCategories(post);
  }

  async findByPermalink(permalink: string, webLogId: WebLogId): Promise<Post | undefined> {
    const post = this.queryOne(PostRow,
      'SELECT * FROM post WHERE web_log_id = @webLogId AND permalink = @permalink',
      { permalink, webLogId });
    return post && this.withCategories(post);
  }

  async findCurrentPermalink(permalinks: readonly string[], webLogId: WebLogId): Promise<string | undefined> {
    if (permalinks.length === 0) return undefined;
    return this.queryOne(z.object({ permalink: z.string() }).transform((row) => row.permalink),
      `SELECT p.permalink
         FROM post p
              INNER JOIN post_permalink pp ON pp.post_id = p.id
        WHERE p.web_log_id = @webLogId
          AND pp.permalink IN (SELECT value FROM json_each(@permalinks))
        LIMIT 1`,
      { webLogId, permalinks: JSON.stringify(permalinks) });
  }

  async findFullById(postId: PostId, webLogId: WebLogId): Promise<Post | undefined> {
    const post = this.queryOne(PostRow,
      'SELECT * FROM post WHERE id = @postId AND web_log_id = @webLogId',
      { postId, webLogId });
    return post && this.withChildren(post);
  }

  async findFullByWebLog(webLogId: WebLogId): Promise<Post[]> {
    return this.queryAll(PostRow, 'SELECT * FROM post WHERE web_log_id = @webLogId ORDER BY id', { webLogId })
      .map((post) => this.withChildren(post));
  }

  async findPageOfCategorizedPosts(
    webLogId: WebLogId,
    categoryIds: readonly CategoryId[],
    pageNbr: number,
    postsPerPage: number
  ): Promise<PagedList<Post>> {
    return this.findPage(
      `web_log_id = @webLogId AND status = 'Published'
         AND id IN (SELECT post_id FROM post_category
                     WHERE category_id IN (SELECT value FROM json_each(@categoryIds)))`,
      PUBLISHED_ORDER,
      { webLogId, categoryIds: JSON.stringify(categoryIds) },
      pageNbr,
      postsPerPage
    );
  }

  async findPageOfPosts(webLogId: WebLogId, pageNbr: number, postsPerPage: number): Promise<PagedList<Post>> {
    return this.findPage(
      'web_log_id = @webLogId',
      'ORDER BY published_on DESC NULLS FIRST, updated_on DESC, id',
      { webLogId },
      pageNbr,
      postsPerPage
    );
  }

  async findPageOfPublishedPosts(
    webLogId: WebLogId,
    pageNbr: number,
    postsPerPage: number
  ): Promise<PagedList<Post>> {
    return this.findPage(
      "web_log_id = @webLogId AND status = 'Published'",
      PUBLISHED_ORDER,
      { webLogId },
      pageNbr,
      postsPerPage
    );
  }

  async findPageOfTaggedPosts(
    webLogId: WebLogId,
    tag: string,
    pageNbr: number,
    postsPerPage: number
  ): Promise<PagedList<Post>> {
    return this.findPage(
      `web_log_id = @webLogId AND status = 'Published'
         AND EXISTS (SELECT 1 FROM json_each(post.tags) WHERE value = @tag)`,
      PUBLISHED_ORDER,
      { webLogId, tag },
      pageNbr,
      postsPerPage
    );
  }

  async findSurroundingPosts(webLogId: WebLogId, publishedOn: Date): Promise<SurroundingPosts> {
    const params = { webLogId, publishedOn: publishedOn.toISOString() };
    const older = this.queryOne(PostRow,
      `SELECT * FROM post
        WHERE web_log_id = @webLogId AND status = 'Published' AND published_on < @publishedOn
        ORDER BY published_on DESC, id LIMIT 1`,
      params);
    const newer = this.queryOne(PostRow,
      `SELECT * FROM post
        WHERE web_log_id = @webLogId AND status = 'Published' AND published_on > @publishedOn
        ORDER BY published_on, id LIMIT 1`,
      params);
    return {
      older: older && this.withCategories(older),
      newer: newer && this.withCategories(newer),
    };
  }
}
