/**
 * Application Caches
 * @module cache/app-caches
 */

import type { IData } from '../data/interfaces.js';
import { WebLogCache } from './web-log-cache.js';
import { PageListCache } from './page-list-cache.js';
import { CategoryCache } from './category-cache.js';
import { ThemeAssetCache } from './theme-asset-cache.js';
import { TemplateCache, type TemplateCompiler } from './template-cache.js';

/**
 * The five caches, created once at startup and passed to whoever needs them
 */
export class AppCaches<T = string> {
  readonly webLogs: WebLogCache;
  readonly pageLists: PageListCache;
  readonly categories: CategoryCache;
  readonly themeAssets: ThemeAssetCache;
  readonly templates: TemplateCache<T>;

  constructor(data: IData, compiler: TemplateCompiler<T>) {
    this.webLogs = new WebLogCache(data);
    this.pageLists = new PageListCache(data);
    this.categories = new CategoryCache(data);
    this.themeAssets = new ThemeAssetCache(data);
    this.templates = new TemplateCache(data, compiler);
  }
}

/**
 * Compiler that keeps the expanded template source as is
 */
export const sourceCompiler: TemplateCompiler<string> = {
  compile: (source) => source,
};
