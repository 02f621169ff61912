/**
 * Page List Cache
 * @module cache/page-list-cache
 */

import type { WebLogId } from '../types/ids.js';
import type { WebLog } from '../types/entities.js';
import { toDisplayPage, type DisplayPage } from '../types/display.js';
import type { IData } from '../data/interfaces.js';
import { KeyedCache } from './keyed-cache.js';

export type PageList = readonly Readonly<DisplayPage>[];

/**
 * Pages shown in each web log's page list, loaded on first use. Readers share
 * one frozen list per web log.
 */
export class PageListCache {
  private readonly cache = new KeyedCache<PageList>('PageListCache');

  constructor(private readonly data: IData) {}

  private loader(webLog: WebLog) {
    return async () => {
      const pages = await this.data.page.findListed(webLog.id);
      return Object.freeze(pages.map((page) => Object.freeze(toDisplayPage(webLog, page))));
    };
  }

  tryGet(webLogId: WebLogId): PageList | undefined {
    return this.cache.tryGet(webLogId);
  }

  exists(webLogId: WebLogId): boolean {
    return this.cache.exists(webLogId);
  }

  async get(webLog: WebLog): Promise<PageList> {
    return this.cache.get(webLog.id, this.loader(webLog));
  }

  async refresh(webLog: WebLog): Promise<PageList> {
    return this.cache.refresh(webLog.id, this.loader(webLog));
  }

  remove(webLogId: WebLogId): void {
    this.cache.remove(webLogId);
  }
}
