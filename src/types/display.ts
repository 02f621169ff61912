/**
 * Display Types
 * @module types/display
 *
 * Read models kept in the caches and handed to templates.
 */

import type { CategoryId, PageId, WebLogUserId } from './ids.js';
import type { Page, WebLog } from './entities.js';
import { relativeUrl } from './support.js';

/**
 * A category with its place in the hierarchy resolved
 */
export interface DisplayCategory {
  id: CategoryId;
  /** Ancestor slugs and own slug joined by "/" */
  slug: string;
  name: string;
  description?: string;
  /** Names of the ancestors, root first */
  parentNames: string[];
  /** Published posts in this category or any descendant */
  postCount: number;
}

/**
 * A page as listed in a web log's page list
 */
export interface DisplayPage {
  id: PageId;
  authorId: WebLogUserId;
  title: string;
  permalink: string;
  relativeUrl: string;
  publishedOn: Date;
  updatedOn: Date;
  isInPageList: boolean;
  isDefault: boolean;
}

/**
 * Project a page into its list form
 */
export function toDisplayPage(webLog: WebLog, page: Page): DisplayPage {
  return {
    id: page.id,
    authorId: page.authorId,
    title: page.title,
    permalink: page.permalink,
    relativeUrl: relativeUrl(webLog, page.permalink),
    publishedOn: page.publishedOn,
    updatedOn: page.updatedOn,
    isInPageList: page.isInPageList,
    isDefault: webLog.defaultPage === page.id,
  };
}
