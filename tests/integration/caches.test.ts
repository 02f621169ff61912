/**
 * Cache Integration Tests
 * @module tests/integration/caches.test
 *
 * The application caches over the in-memory document store.
 */

import { beforeEach, describe, expect, it, vi } from 'vitest';
import { MongoData } from '../../src/data/mongo/index.js';
import { AppCaches, sourceCompiler } from '../../src/cache/index.js';
import { ThemeId } from '../../src/types/ids.js';
import { InMemoryDocumentDatabase } from '../mocks/document-store.mock.js';
import {
  OTHER_WEB_LOG_ID,
  THEME_ID,
  WEB_LOG_ID,
  createAsset,
  createCategory,
  createPage,
  createTheme,
  createWebLog,
} from '../factories/index.js';

describe('AppCaches', () => {
  let data: MongoData;
  let caches: AppCaches;

  beforeEach(async () => {
    data = new MongoData(new InMemoryDocumentDatabase());
    await data.theme.save(createTheme());
    await data.webLog.add(createWebLog({ defaultPage: 'pg-2' }));
    await data.webLog.add(createWebLog({ id: OTHER_WEB_LOG_ID, name: 'Deep Notes', urlBase: 'https://notes.example.com/deep' }));
    caches = new AppCaches(data, sourceCompiler);
  });

  describe('web logs', () => {
    beforeEach(async () => {
      await caches.webLogs.fill();
    });

    it('resolves a URL to the web log with the longest matching base', () => {
      expect(caches.webLogs.tryGet('https://notes.example.com/deep/post.html')?.id).toBe(OTHER_WEB_LOG_ID);
      expect(caches.webLogs.tryGet('https://notes.example.com/deeper.html')?.id).toBe(WEB_LOG_ID);
      expect(caches.webLogs.tryGet('https://notes.example.com')?.id).toBe(WEB_LOG_ID);
      expect(caches.webLogs.exists('https://notes.example.community/')).toBe(false);
    });

    it('picks up changes on refresh and drops deleted web logs', async () => {
      await data.webLog.updateSettings(createWebLog({ name: 'Renamed' }));
      expect(caches.webLogs.tryGetById(WEB_LOG_ID)?.name).toBe('Field Notes');

      expect((await caches.webLogs.refresh(WEB_LOG_ID))?.name).toBe('Renamed');
      expect(caches.webLogs.tryGetById(WEB_LOG_ID)?.name).toBe('Renamed');

      await data.webLog.delete(OTHER_WEB_LOG_ID);
      expect(await caches.webLogs.refresh(OTHER_WEB_LOG_ID)).toBeUndefined();
      expect(caches.webLogs.all().map((webLog) => webLog.id)).toEqual([WEB_LOG_ID]);
    });
  });

  describe('page lists', () => {
    it('holds the listed pages in display form until refreshed', async () => {
      const webLog = createWebLog({ defaultPage: 'pg-2' });
      await data.page.add(createPage('pg-1', 'Zebra'));
      await data.page.add(createPage('pg-2', 'about'));
      await data.page.add(createPage('pg-3', 'Contact', { isInPageList: false }));

      const pages = await caches.pageLists.get(webLog);
      expect(pages.map((page) => [page.id, page.relativeUrl, page.isDefault])).toEqual([
        ['pg-2', '/about.html', true],
        ['pg-1', '/zebra.html', false],
      ]);

      await data.page.add(createPage('pg-4', 'Archive'));
      expect(caches.pageLists.tryGet(WEB_LOG_ID)).toHaveLength(2);
      expect(await caches.pageLists.refresh(webLog)).toHaveLength(3);
    });
  });

  describe('categories', () => {
    it('loads the hierarchy once per web log', async () => {
      await data.category.add(createCategory('cat-b', 'Books'));
      await data.category.add(createCategory('cat-a', 'Audio', { parentId: createCategory('cat-b', 'Books').id }));
      const findAllForView = vi.spyOn(data.category, 'findAllForView');

      const categories = await caches.categories.get(createWebLog());
      await caches.categories.get(createWebLog());

      expect(categories.map((category) => category.slug)).toEqual(['books', 'books/audio']);
      expect(findAllForView).toHaveBeenCalledTimes(1);
      expect(caches.categories.exists(WEB_LOG_ID)).toBe(true);
      caches.categories.remove(WEB_LOG_ID);
      expect(caches.categories.exists(WEB_LOG_ID)).toBe(false);
    });

    it('hands out lists that readers cannot change', async () => {
      await data.category.add(createCategory('cat-b', 'Books'));
      await data.page.add(createPage('pg-1', 'Zebra'));
      const categories = await caches.categories.get(createWebLog());
      const pages = await caches.pageLists.get(createWebLog());

      expect(Object.isFrozen(categories)).toBe(true);
      expect(Object.isFrozen(categories[0])).toBe(true);
      expect(Object.isFrozen(pages)).toBe(true);
      expect(Object.isFrozen(pages[0])).toBe(true);
      expect(Reflect.set(categories, 'length', 0)).toBe(false);
      expect(Reflect.set(pages, 'length', 0)).toBe(false);
      expect(caches.categories.tryGet(WEB_LOG_ID)?.map((category) => category.name)).toEqual(['Books']);
      expect(caches.pageLists.tryGet(WEB_LOG_ID)).toHaveLength(1);
    });

    it('hands concurrent readers either the old or the new list in full', async () => {
      const webLog = createWebLog();
      await data.category.add(createCategory('cat-b', 'Books'));
      await data.category.add(createCategory('cat-a', 'Audio', { parentId: createCategory('cat-b', 'Books').id }));
      const before = await caches.categories.get(webLog);
      await data.category.add(createCategory('cat-c', 'Comics'));

      const reads = Array.from({ length: 10 }, () => caches.categories.get(webLog));
      const refresh = caches.categories.refresh(webLog);
      const laterReads = Array.from({ length: 10 }, () => caches.categories.get(webLog));
      const [after, ...results] = await Promise.all([refresh, ...reads, ...laterReads]);

      expect(before.map((category) => category.slug)).toEqual(['books', 'books/audio']);
      expect(after.map((category) => category.slug)).toEqual(['books', 'books/audio', 'comics']);
      for (const result of results) expect([before, after]).toContain(result);
      expect(caches.categories.tryGet(WEB_LOG_ID)).toBe(after);
    });
  });

  describe('theme assets', () => {
    const classic = ThemeId.parse('classic');

    beforeEach(async () => {
      await data.themeAsset.save(createAsset('style.css', 'body{}'));
      await data.themeAsset.save(createAsset('app.js', 'run()'));
      await data.themeAsset.save(createAsset('a.css', 'p{}', classic));
      await caches.themeAssets.fill();
    });

    it('caches the bytes of every theme with assets', () => {
      expect(caches.themeAssets.tryGet(THEME_ID, 'style.css')?.toString()).toBe('body{}');
      expect(caches.themeAssets.paths(THEME_ID)).toEqual(['app.js', 'style.css']);
      expect(caches.themeAssets.paths(classic)).toEqual(['a.css']);
      expect(caches.themeAssets.exists(THEME_ID, 'missing.png')).toBe(false);
    });

    it('swaps a theme\'s assets as a whole on refresh', async () => {
      await data.themeAsset.deleteByTheme(THEME_ID);
      await data.themeAsset.save(createAsset('site.css', 'main{}'));
      expect(caches.themeAssets.paths(THEME_ID)).toEqual(['app.js', 'style.css']);

      await caches.themeAssets.refreshTheme(THEME_ID);
      expect(caches.themeAssets.paths(THEME_ID)).toEqual(['site.css']);
    });

    it('loads a removed theme again on demand', async () => {
      caches.themeAssets.removeTheme(classic);
      expect(caches.themeAssets.tryGet(classic, 'a.css')).toBeUndefined();

      expect((await caches.themeAssets.get(classic, 'a.css'))?.toString()).toBe('p{}');
    });
  });
});
