/**
 * MongoDB Page Store
 * @module data/mongo/page-data
 */

import type { Document } from 'mongodb';
import type { PageId, WebLogId } from '../../types/ids.js';
import { PageSchema, type Page } from '../../types/entities.js';
import { DeleteOutcome, type IPageData } from '../interfaces.js';
import { PAGES_PER_ADMIN_PAGE, pageWindow, toPagedList, type PagedList } from '../paging.js';
import type { DocumentDatabase, DocumentProjection } from './collections.js';
import { Collections } from './mongo-store.js';
import { MongoContentStore, newestFirst } from './content-store.js';

/**
 * Every field but the revisions, plus a lower-cased title to sort on
 */
function pageDocument(page: Page) {
  return {
    _id: page.id,
    webLogId: page.webLogId,
    authorId: page.authorId,
    title: page.title,
    titleSort: page.title.toLowerCase(),
    permalink: page.permalink,
    publishedOn: page.publishedOn,
    updatedOn: page.updatedOn,
    isInPageList: page.isInPageList,
    template: page.template,
    text: page.text,
    metadata: page.metadata,
    priorPermalinks: page.priorPermalinks,
  };
}

const WITHOUT_CHILDREN: DocumentProjection = { priorPermalinks: 0, revisions: 0 };
const LISTING: DocumentProjection = { text: 0, metadata: 0, priorPermalinks: 0, revisions: 0 };
const LISTING_DEFAULTS = { text: '', metadata: [], priorPermalinks: [], revisions: [] };
const BY_TITLE = { titleSort: 1, _id: 1 } as const;

/**
 * MongoDB implementation of {@link IPageData}
 */
export class MongoPageData extends MongoContentStore implements IPageData {
  constructor(db: DocumentDatabase) {
    super(db, Collections.PAGE);
  }

  private toPage(document: Document): Page {
    const page = this.parse(PageSchema, document, LISTING_DEFAULTS);
    return {
      ...page,
      priorPermalinks: [...page.priorPermalinks].sort(),
      revisions: newestFirst(page.revisions),
    };
  }

  // ==========================================================================
  // Writes
  // ==========================================================================

  async add(page: Page): Promise<void> {
    await this.saveWithRevisions(pageDocument(page), page.revisions);
  }

  async update(page: Page): Promise<void> {
    await this.saveWithRevisions(pageDocument(page), page.revisions);
  }

  async restore(pages: readonly Page[]): Promise<void> {
    for (const page of pages) await this.saveWithRevisions(pageDocument(page), page.revisions);
  }

  async delete(pageId: PageId, webLogId: WebLogId): Promise<DeleteOutcome> {
    const deleted = await this.collection.deleteOne({ _id: pageId, webLogId });
    return deleted > 0 ? DeleteOutcome.DELETED : DeleteOutcome.NOT_FOUND;
  }

  async updatePriorPermalinks(
    pageId: PageId,
    webLogId: WebLogId,
    permalinks: readonly string[]
  ): Promise<boolean> {
    const matched = await this.collection.updateOne(
      { _id: pageId, webLogId },
      { $set: { priorPermalinks: [...permalinks] } }
    );
    return matched > 0;
  }

  // ==========================================================================
  // Reads
  // ==========================================================================

  async all(webLogId: WebLogId): Promise<Page[]> {
    const documents = await this.collection.find({ webLogId }, { sort: BY_TITLE, projection: LISTING });
    return documents.map((document) => this.toPage(document));
  }

  async countAll(webLogId: WebLogId): Promise<number> {
    return this.collection.countDocuments({ webLogId });
  }

  async countListed(webLogId: WebLogId): Promise<number> {
    return this.collection.countDocuments({ webLogId, isInPageList: true });
  }

  async findById(pageId: PageId, webLogId: WebLogId): Promise<Page | undefined> {
    const document = await this.collection.findOne({ _id: pageId, webLogId }, { projection: WITHOUT_CHILDREN });
    return document && this.toPage(document);
  }

  async findByPermalink(permalink: string, webLogId: WebLogId): Promise<Page | undefined> {
    const document = await this.collection.findOne({ webLogId, permalink }, { projection: WITHOUT_CHILDREN });
    return document && this.toPage(document);
  }

  async findCurrentPermalink(permalinks: readonly string[], webLogId: WebLogId): Promise<string | undefined> {
    if (permalinks.length === 0) return undefined;
    const document = await this.collection.findOne(
      { webLogId, priorPermalinks: { $in: [...permalinks] } },
      { projection: { permalink: 1 } }
    );
    return typeof document?.permalink === 'string' ? document.permalink : undefined;
  }

  async findFullById(pageId: PageId, webLogId: WebLogId): Promise<Page | undefined> {
    const document = await this.collection.findOne({ _id: pageId, webLogId });
    return document && this.toPage(document);
  }

  async findFullByWebLog(webLogId: WebLogId): Promise<Page[]> {
    const documents = await this.collection.find({ webLogId }, { sort: { _id: 1 } });
    return documents.map((document) => this.toPage(document));
  }

  async findListed(webLogId: WebLogId): Promise<Page[]> {
    const documents = await this.collection.find(
      { webLogId, isInPageList: true },
      { sort: BY_TITLE, projection: LISTING }
    );
    return documents.map((document) => this.toPage(document));
  }

  async findPageOfPages(webLogId: WebLogId, pageNbr: number): Promise<PagedList<Page>> {
    const { offset, limit } = pageWindow(pageNbr, PAGES_PER_ADMIN_PAGE);
    const documents = await this.collection.find(
      { webLogId },
      { sort: BY_TITLE, skip: offset, limit, projection: WITHOUT_CHILDREN }
    );
    return toPagedList(documents.map((document) => this.toPage(document)), pageNbr, PAGES_PER_ADMIN_PAGE);
  }
}
