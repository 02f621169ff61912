/**
 * Web Log Cache
 * @module cache/web-log-cache
 *
 * Every web log, loaded at startup, resolved by request URL.
 */

import type { WebLogId } from '../types/ids.js';
import type { WebLog } from '../types/entities.js';
import type { IData } from '../data/interfaces.js';
import { KeyedCache } from './keyed-cache.js';

/**
 * Whether a URL falls under a web log's URL base: equal to it, or followed
 * by a path separator
 */
export function matchesUrlBase(urlBase: string, url: string): boolean {
  const base = urlBase.replace(/\/+$/, '');
  return url === base || url.startsWith(`${base}/`);
}

export class WebLogCache {
  private readonly cache = new KeyedCache<WebLog>('WebLogCache');

  constructor(private readonly data: IData) {}

  /**
   * Load every web log, replacing what is cached
   */
  async fill(): Promise<void> {
    const start = Date.now();
    const webLogs = await this.data.webLog.all();
    this.cache.fill(webLogs.map((webLog) => [webLog.id, webLog] as const), Date.now() - start);
  }

  all(): WebLog[] {
    return this.cache.values();
  }

  /**
   * The web log with the longest URL base the URL falls under
   */
  tryGet(url: string): WebLog | undefined {
    let found: WebLog | undefined;
    for (const webLog of this.cache.values()) {
      if (!matchesUrlBase(webLog.urlBase, url)) continue;
      if (!found || webLog.urlBase.length > found.urlBase.length) found = webLog;
    }
    return found;
  }

  exists(url: string): boolean {
    return this.tryGet(url) !== undefined;
  }

  tryGetById(webLogId: WebLogId): WebLog | undefined {
    return this.cache.tryGet(webLogId);
  }

  /**
   * The cached web log, loading it when it is not cached yet
   */
  async get(webLogId: WebLogId): Promise<WebLog | undefined> {
    const cached = this.cache.tryGet(webLogId);
    if (cached) return cached;
    return this.refresh(webLogId);
  }

  /**
   * Reload one web log; one that no longer exists is dropped
   */
  async refresh(webLogId: WebLogId): Promise<WebLog | undefined> {
    const webLog = await this.data.webLog.findById(webLogId);
    if (webLog) this.cache.set(webLogId, webLog);
    else this.cache.remove(webLogId);
    return webLog;
  }

  set(webLog: WebLog): void {
    this.cache.set(webLog.id, webLog);
  }

  remove(webLogId: WebLogId): void {
    this.cache.remove(webLogId);
  }
}
