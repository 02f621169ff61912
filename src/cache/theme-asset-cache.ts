/**
 * Theme Asset Cache
 * @module cache/theme-asset-cache
 *
 * Asset bytes by path for every installed theme. A theme's assets are
 * replaced as a whole, so a reader never sees half of a refresh.
 */

import { splitThemeAssetId, type ThemeId } from '../types/ids.js';
import type { IData } from '../data/interfaces.js';
import { KeyedCache } from './keyed-cache.js';

export type ThemeAssets = ReadonlyMap<string, Buffer>;

export class ThemeAssetCache {
  private readonly cache = new KeyedCache<ThemeAssets>('ThemeAssetCache');

  constructor(private readonly data: IData) {}

  private async load(themeId: ThemeId): Promise<ThemeAssets> {
    const assets = await this.data.themeAsset.findByThemeWithData(themeId);
    return new Map(assets.map((asset) => [splitThemeAssetId(asset.id).path, asset.data]));
  }

  /**
   * Load the assets of every theme that has any
   */
  async fill(): Promise<void> {
    const start = Date.now();
    const themeIds = new Set<ThemeId>();
    for (const asset of await this.data.themeAsset.all()) {
      themeIds.add(splitThemeAssetId(asset.id).themeId);
    }
    const entries: [string, ThemeAssets][] = [];
    for (const themeId of themeIds) entries.push([themeId, await this.load(themeId)]);
    this.cache.fill(entries, Date.now() - start);
  }

  tryGet(themeId: ThemeId, path: string): Buffer | undefined {
    return this.cache.tryGet(themeId)?.get(path);
  }

  exists(themeId: ThemeId, path: string): boolean {
    return this.tryGet(themeId, path) !== undefined;
  }

  /**
   * Asset bytes, loading the theme's assets when they are not cached yet
   */
  async get(themeId: ThemeId, path: string): Promise<Buffer | undefined> {
    const assets = await this.cache.get(themeId, () => this.load(themeId));
    return assets.get(path);
  }

  /**
   * Paths cached for a theme
   */
  paths(themeId: ThemeId): string[] {
    return [...(this.cache.tryGet(themeId)?.keys() ?? [])].sort();
  }

  async refreshTheme(themeId: ThemeId): Promise<void> {
    await this.cache.refresh(themeId, () => this.load(themeId));
  }

  removeTheme(themeId: ThemeId): void {
    this.cache.remove(themeId);
  }
}
