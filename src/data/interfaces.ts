/**
 * Persistence Contract
 * @module data/interfaces
 *
 * One capability interface per aggregate. Every backend implements all of
 * them with identical observable results; callers only ever see {@link IData}.
 *
 * Conventions shared by every operation:
 * - a missing record is `undefined` (or an empty list), never an exception;
 * - tenant-scoped lookups take the web log ID and never cross tenants;
 * - `add` inserts; `update`, `save` and `restore` are idempotent upserts;
 * - paged listings return a {@link PagedList} built by `toPagedList`;
 * - backend failures propagate as thrown errors.
 */

import type {
  CategoryId,
  PageId,
  PostId,
  TagMapId,
  ThemeAssetId,
  ThemeId,
  UploadId,
  WebLogId,
  WebLogUserId,
} from '../types/ids.js';
import type {
  Category,
  MetaItem,
  Page,
  Post,
  PostStatus,
  TagMap,
  Theme,
  ThemeAsset,
  Upload,
  WebLog,
  WebLogUser,
} from '../types/entities.js';
import type { DisplayCategory } from '../types/display.js';
import type { DomainResult } from '../utils/domain-result.js';
import type { PagedList } from './paging.js';

// ============================================================================
// Outcomes
// ============================================================================

/**
 * Outcome of deleting a record
 */
export const DeleteOutcome = {
  DELETED: 'deleted',
  NOT_FOUND: 'not-found',
} as const;

export type DeleteOutcome = typeof DeleteOutcome[keyof typeof DeleteOutcome];

/**
 * Outcome of deleting a category; children, if any, move to its parent
 */
export const CategoryDeleteOutcome = {
  ...DeleteOutcome,
  REASSIGNED_CHILDREN: 'reassigned-children',
} as const;

export type CategoryDeleteOutcome = typeof CategoryDeleteOutcome[keyof typeof CategoryDeleteOutcome];

/**
 * Published neighbours of a post
 */
export interface SurroundingPosts {
  /** The next post published before the given instant */
  older?: Post;
  /** The next post published after the given instant */
  newer?: Post;
}

// ============================================================================
// Aggregate Interfaces
// ============================================================================

export interface ICategoryData {
  /** Fails with a QueryError when the ID is taken */
  add(category: Category): Promise<void>;
  countAll(webLogId: WebLogId): Promise<number>;
  countTopLevel(webLogId: WebLogId): Promise<number>;
  /** Hierarchy-ordered categories with rolled-up published post counts */
  findAllForView(webLogId: WebLogId): Promise<DisplayCategory[]>;
  findById(categoryId: CategoryId, webLogId: WebLogId): Promise<Category | undefined>;
  findByWebLog(webLogId: WebLogId): Promise<Category[]>;
  /** Moves children to the deleted category's parent and removes it from posts */
  delete(categoryId: CategoryId, webLogId: WebLogId): Promise<CategoryDeleteOutcome>;
  restore(categories: readonly Category[]): Promise<void>;
  update(category: Category): Promise<void>;
}

export interface IPageData {
  add(page: Page): Promise<void>;
  /** Every page, text and child collections omitted, sorted by title */
  all(webLogId: WebLogId): Promise<Page[]>;
  countAll(webLogId: WebLogId): Promise<number>;
  countListed(webLogId: WebLogId): Promise<number>;
  delete(pageId: PageId, webLogId: WebLogId): Promise<DeleteOutcome>;
  /** Without revisions and prior permalinks */
  findById(pageId: PageId, webLogId: WebLogId): Promise<Page | undefined>;
  findByPermalink(permalink: string, webLogId: WebLogId): Promise<Page | undefined>;
  /** Current permalink of a page that used to live at any of the given ones */
  findCurrentPermalink(permalinks: readonly string[], webLogId: WebLogId): Promise<string | undefined>;
  findFullById(pageId: PageId, webLogId: WebLogId): Promise<Page | undefined>;
  findFullByWebLog(webLogId: WebLogId): Promise<Page[]>;
  /** Pages in the page list, text omitted, sorted by title */
  findListed(webLogId: WebLogId): Promise<Page[]>;
  findPageOfPages(webLogId: WebLogId, pageNbr: number): Promise<PagedList<Page>>;
  restore(pages: readonly Page[]): Promise<void>;
  update(page: Page): Promise<void>;
  updatePriorPermalinks(pageId: PageId, webLogId: WebLogId, permalinks: readonly string[]): Promise<boolean>;
}

export interface IPostData {
  add(post: Post): Promise<void>;
  countByStatus(status: PostStatus, webLogId: WebLogId): Promise<number>;
  delete(postId: PostId, webLogId: WebLogId): Promise<DeleteOutcome>;
  /** Without revisions and prior permalinks */
  findById(postId: PostId, webLogId: WebLogId): Promise<Post | undefined>;
  findByPermalink(permalink: string, webLogId: WebLogId): Promise<Post | undefined>;
  findCurrentPermalink(permalinks: readonly string[], webLogId: WebLogId): Promise<string | undefined>;
  findFullById(postId: PostId, webLogId: WebLogId): Promise<Post | undefined>;
  findFullByWebLog(webLogId: WebLogId): Promise<Post[]>;
  /** Published posts in any of the given categories, newest first */
  findPageOfCategorizedPosts(
    webLogId: WebLogId,
    categoryIds: readonly CategoryId[],
    pageNbr: number,
    postsPerPage: number
  ): Promise<PagedList<Post>>;
  /** Every post, drafts first, then newest published */
  findPageOfPosts(webLogId: WebLogId, pageNbr: number, postsPerPage: number): Promise<PagedList<Post>>;
  findPageOfPublishedPosts(webLogId: WebLogId, pageNbr: number, postsPerPage: number): Promise<PagedList<Post>>;
  findPageOfTaggedPosts(
    webLogId: WebLogId,
    tag: string,
    pageNbr: number,
    postsPerPage: number
  ): Promise<PagedList<Post>>;
  findSurroundingPosts(webLogId: WebLogId, publishedOn: Date): Promise<SurroundingPosts>;
  restore(posts: readonly Post[]): Promise<void>;
  update(post: Post): Promise<void>;
  updatePriorPermalinks(postId: PostId, webLogId: WebLogId, permalinks: readonly string[]): Promise<boolean>;
}

export interface ITagMapData {
  delete(tagMapId: TagMapId, webLogId: WebLogId): Promise<DeleteOutcome>;
  findById(tagMapId: TagMapId, webLogId: WebLogId): Promise<TagMap | undefined>;
  findByUrlValue(urlValue: string, webLogId: WebLogId): Promise<TagMap | undefined>;
  findByWebLog(webLogId: WebLogId): Promise<TagMap[]>;
  findMappingForTags(tags: readonly string[], webLogId: WebLogId): Promise<TagMap[]>;
  restore(tagMaps: readonly TagMap[]): Promise<void>;
  save(tagMap: TagMap): Promise<void>;
}

export interface IThemeData {
  /** Installed themes except "admin", template text omitted */
  all(): Promise<Theme[]>;
  exists(themeId: ThemeId): Promise<boolean>;
  findById(themeId: ThemeId): Promise<Theme | undefined>;
  findByIdWithoutText(themeId: ThemeId): Promise<Theme | undefined>;
  /** Deletes the theme, its templates and its assets */
  delete(themeId: ThemeId): Promise<DeleteOutcome>;
  save(theme: Theme): Promise<void>;
}

export interface IThemeAssetData {
  /** Every asset, data omitted */
  all(): Promise<ThemeAsset[]>;
  deleteByTheme(themeId: ThemeId): Promise<void>;
  findById(assetId: ThemeAssetId): Promise<ThemeAsset | undefined>;
  /** Data omitted */
  findByTheme(themeId: ThemeId): Promise<ThemeAsset[]>;
  findByThemeWithData(themeId: ThemeId): Promise<ThemeAsset[]>;
  save(asset: ThemeAsset): Promise<void>;
}

export interface IUploadData {
  add(upload: Upload): Promise<void>;
  /** Ok with the deleted file's path */
  delete(uploadId: UploadId, webLogId: WebLogId): Promise<DomainResult<string>>;
  findByPath(path: string, webLogId: WebLogId): Promise<Upload | undefined>;
  /** Data omitted */
  findByWebLog(webLogId: WebLogId): Promise<Upload[]>;
  findByWebLogWithData(webLogId: WebLogId): Promise<Upload[]>;
  restore(uploads: readonly Upload[]): Promise<void>;
}

export interface IWebLogData {
  /** Fails with a QueryError when the ID is taken */
  add(webLog: WebLog): Promise<void>;
  all(): Promise<WebLog[]>;
  /** Deletes the web log and everything it owns */
  delete(webLogId: WebLogId): Promise<void>;
  findByHost(urlBase: string): Promise<WebLog | undefined>;
  findById(webLogId: WebLogId): Promise<WebLog | undefined>;
  updateRedirectRules(webLog: WebLog): Promise<void>;
  updateRssOptions(webLog: WebLog): Promise<void>;
  /** Every field except RSS options and redirect rules */
  updateSettings(webLog: WebLog): Promise<void>;
}

export interface IWebLogUserData {
  add(user: WebLogUser): Promise<void>;
  /** Conflict when the user authored any page or post */
  delete(userId: WebLogUserId, webLogId: WebLogId): Promise<DomainResult<WebLogUserId>>;
  findByEmail(email: string, webLogId: WebLogId): Promise<WebLogUser | undefined>;
  findById(userId: WebLogUserId, webLogId: WebLogId): Promise<WebLogUser | undefined>;
  findByWebLog(webLogId: WebLogId): Promise<WebLogUser[]>;
  /** ID and display name of each of the given users */
  findNames(webLogId: WebLogId, userIds: readonly WebLogUserId[]): Promise<MetaItem[]>;
  restore(users: readonly WebLogUser[]): Promise<void>;
  setLastSeen(userId: WebLogUserId, webLogId: WebLogId): Promise<void>;
  update(user: WebLogUser): Promise<void>;
}

// ============================================================================
// Data Root
// ============================================================================

/**
 * The persistence layer as a whole
 */
export interface IData {
  readonly backend: string;
  readonly category: ICategoryData;
  readonly page: IPageData;
  readonly post: IPostData;
  readonly tagMap: ITagMapData;
  readonly theme: IThemeData;
  readonly themeAsset: IThemeAssetData;
  readonly upload: IUploadData;
  readonly webLog: IWebLogData;
  readonly webLogUser: IWebLogUserData;

  /** Create any missing tables, collections and indexes */
  startUp(): Promise<void>;
  /** Release connections */
  close(): Promise<void>;
}
