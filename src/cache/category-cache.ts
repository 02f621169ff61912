/**
 * Category Cache
 * @module cache/category-cache
 */

import type { WebLogId } from '../types/ids.js';
import type { WebLog } from '../types/entities.js';
import type { DisplayCategory } from '../types/display.js';
import type { IData } from '../data/interfaces.js';
import { KeyedCache } from './keyed-cache.js';

export type CategoryList = readonly Readonly<DisplayCategory>[];

/**
 * Each web log's categories in hierarchy order with post counts, loaded on
 * first use. Readers share one frozen list per web log.
 */
export class CategoryCache {
  private readonly cache = new KeyedCache<CategoryList>('CategoryCache');

  constructor(private readonly data: IData) {}

  tryGet(webLogId: WebLogId): CategoryList | undefined {
    return this.cache.tryGet(webLogId);
  }

  exists(webLogId: WebLogId): boolean {
    return this.cache.exists(webLogId);
  }

  private loader(webLog: WebLog) {
    return async () => {
      const categories = await this.data.category.findAllForView(webLog.id);
      return Object.freeze(categories.map((category) => Object.freeze(category)));
    };
  }

  async get(webLog: WebLog): Promise<CategoryList> {
    return this.cache.get(webLog.id, this.loader(webLog));
  }

  async refresh(webLog: WebLog): Promise<CategoryList> {
    return this.cache.refresh(webLog.id, this.loader(webLog));
  }

  remove(webLogId: WebLogId): void {
    this.cache.remove(webLogId);
  }
}
