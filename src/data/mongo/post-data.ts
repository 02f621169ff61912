/**
 * MongoDB Post Store
 * @module data/mongo/post-data
 */

import type { Document } from 'mongodb';
import type { CategoryId, PostId, WebLogId } from '../../types/ids.js';
import { PostSchema, type Post, type PostStatus } from '../../types/entities.js';
import { DeleteOutcome, type IPostData, type SurroundingPosts } from '../interfaces.js';
import { pageWindow, toPagedList, type PagedList } from '../paging.js';
import type { DocumentDatabase, DocumentFilter, DocumentProjection } from './collections.js';
import { Collections } from './mongo-store.js';
import { MongoContentStore, newestFirst } from './content-store.js';

/**
 * Every field but the revisions
 */
function postDocument(post: Post) {
  return {
    _id: post.id,
    webLogId: post.webLogId,
    authorId: post.authorId,
    status: post.status,
    title: post.title,
    permalink: post.permalink,
    publishedOn: post.publishedOn,
    updatedOn: post.updatedOn,
    template: post.template,
    text: post.text,
    categoryIds: post.categoryIds,
    tags: post.tags,
    episode: post.episode,
    metadata: post.metadata,
    priorPermalinks: post.priorPermalinks,
  };
}

const WITHOUT_CHILDREN: DocumentProjection = { priorPermalinks: 0, revisions: 0 };
const CHILD_DEFAULTS = { priorPermalinks: [], revisions: [] };
const NEWEST_FIRST = { publishedOn: -1, _id: 1 } as const;

/**
 * MongoDB implementation of {@link IPostData}
 */
export class MongoPostData extends MongoContentStore implements IPostData {
  constructor(db: DocumentDatabase) {
    super(db, Collections.POST);
  }

  private toPost(document: Document): Post {
    const post = this.parse(PostSchema, document, CHILD_DEFAULTS);
    return {
      ...post,
      categoryIds: [...post.categoryIds].sort(),
      priorPermalinks: [...post.priorPermalinks].sort(),
      revisions: newestFirst(post.revisions),
    };
  }

  private async findPosts(
    filter: DocumentFilter,
    sort: Record<string, 1 | -1>,
    skip: number,
    limit: number
  ): Promise<Post[]> {
    if (limit <= 0) return [];
    const documents = await this.collection.find(filter, { sort, skip, limit, projection: WITHOUT_CHILDREN });
    return documents.map((document) => this.toPost(document));
  }

  private async findPage(
    filter: DocumentFilter,
    pageNbr: number,
    postsPerPage: number
  ): Promise<PagedList<Post>> {
    const { offset, limit } = pageWindow(pageNbr, postsPerPage);
    return toPagedList(await this.findPosts(filter, NEWEST_FIRST, offset, limit), pageNbr, postsPerPage);
  }

  // ==========================================================================
  // Writes
  // ==========================================================================

  async add(post: Post): Promise<void> {
    await this.saveWithRevisions(postDocument(post), post.revisions);
  }

  async update(post: Post): Promise<void> {
    await this.saveWithRevisions(postDocument(post), post.revisions);
  }

  async restore(posts: readonly Post[]): Promise<void> {
    for (const post of posts) await this.saveWithRevisions(postDocument(post), post.revisions);
  }

  async delete(postId: PostId, webLogId: WebLogId): Promise<DeleteOutcome> {
    const deleted = await this.collection.deleteOne({ _id: postId, webLogId });
    return deleted > 0 ? DeleteOutcome.DELETED : DeleteOutcome.NOT_FOUND;
  }

  async updatePriorPermalinks(
    postId: PostId,
    webLogId: WebLogId,
    permalinks: readonly string[]
  ): Promise<boolean> {
    const matched = await this.collection.updateOne(
      { _id: postId, webLogId },
      { $set: { priorPermalinks: [...permalinks] } }
    );
    return matched > 0;
  }

  // ==========================================================================
  // Reads
  // ==========================================================================

  async countByStatus(status: PostStatus, webLogId: WebLogId): Promise<number> {
    return this.collection.countDocuments({ webLogId, status });
  }

  async findById(postId: PostId, webLogId: WebLogId): Promise<Post | undefined> {
    const document = await this.collection.findOne({ _id: postId, webLogId }, { projection: WITHOUT_CHILDREN });
    return document && this.toPost(document);
  }

  async findByPermalink(permalink: string, webLogId: WebLogId): Promise<Post | undefined> {
    const document = await this.collection.findOne({ webLogId, permalink }, { projection: WITHOUT_CHILDREN });
    return document && this.toPost(document);
  }

  async findCurrentPermalink(permalinks: readonly string[], webLogId: WebLogId): Promise<string | undefined> {
    if (permalinks.length === 0) return undefined;
    const document = await this.collection.findOne(
      { webLogId, priorPermalinks: { $in: [...permalinks] } },
      { projection: { permalink: 1 } }
    );
    return typeof document?.permalink === 'string' ? document.permalink : undefined;
  }

  async findFullById(postId: PostId, webLogId: WebLogId): Promise<Post | undefined> {
    const document = await this.collection.findOne({ _id: postId, webLogId });
    return document && this.toPost(document);
  }

  async findFullByWebLog(webLogId: WebLogId): Promise<Post[]> {
    const documents = await this.collection.find({ webLogId }, { sort: { _id: 1 } });
    return documents.map((document) => this.toPost(document));
  }

  async findPageOfCategorizedPosts(
    webLogId: WebLogId,
    categoryIds: readonly CategoryId[],
    pageNbr: number,
    postsPerPage: number
  ): Promise<PagedList<Post>> {
    return this.findPage(
      { webLogId, status: 'Published', categoryIds: { $in: [...categoryIds] } },
      pageNbr,
      postsPerPage
    );
  }

  /**
   * Unpublished posts sort before published ones, which the store cannot
   * express in one sort; the window is filled from the unpublished posts
   * first and from the published ones after them.
   */
  async findPageOfPosts(webLogId: WebLogId, pageNbr: number, postsPerPage: number): Promise<PagedList<Post>> {
    const { offset, limit } = pageWindow(pageNbr, postsPerPage);
    const unpublished = { webLogId, publishedOn: null };
    const unpublishedCount = await this.collection.countDocuments(unpublished);

    const first = await this.findPosts(unpublished, { updatedOn: -1, _id: 1 }, offset, limit);
    const rest = await this.findPosts(
      { webLogId, publishedOn: { $ne: null } },
      { publishedOn: -1, updatedOn: -1, _id: 1 },
      Math.max(0, offset - unpublishedCount),
      limit - first.length
    );
    return toPagedList([...first, ...rest], pageNbr, postsPerPage);
  }

  async findPageOfPublishedPosts(
    webLogId: WebLogId,
    pageNbr: number,
    postsPerPage: number
  ): Promise<PagedList<Post>> {
    return this.findPage({ webLogId, status: 'Published' }, pageNbr, postsPerPage);
  }

  async findPageOfTaggedPosts(
    webLogId: WebLogId,
    tag: string,
    pageNbr: number,
    postsPerPage: number
  ): Promise<PagedList<Post>> {
    return this.findPage({ webLogId, status: 'Published', tags: tag }, pageNbr, postsPerPage);
  }

  async findSurroundingPosts(webLogId: WebLogId, publishedOn: Date): Promise<SurroundingPosts> {
    const [older] = await this.findPosts(
      { webLogId, status: 'Published', publishedOn: { $lt: publishedOn } },
      NEWEST_FIRST, 0, 1
    );
    const [newer] = await this.findPosts(
      { webLogId, status: 'Published', publishedOn: { $gt: publishedOn } },
      { publishedOn: 1, _id: 1 }, 0, 1
    );
    return { older, newer };
  }
}
