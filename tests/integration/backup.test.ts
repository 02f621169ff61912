/**
 * Backup and Restore Integration Tests
 * @module tests/integration/backup.test
 *
 * Backs a web log up from SQLite and restores it into the other backends.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { BackupService, parseArchive, serializeArchive, type Archive } from '../../src/backup/index.js';
import { ArchiveError } from '../../src/errors/index.js';
import type { IData } from '../../src/data/interfaces.js';
import { MongoData } from '../../src/data/mongo/index.js';
import { SqliteData } from '../../src/data/sqlite/index.js';
import { WebLogId } from '../../src/types/ids.js';
import { InMemoryDocumentDatabase } from '../mocks/document-store.mock.js';
import {
  WEB_LOG_ID,
  createAsset,
  createCategory,
  createDraft,
  createPage,
  createPost,
  createTagMap,
  createTheme,
  createUpload,
  createUser,
  createWebLog,
  march,
  revision,
} from '../factories/index.js';

async function seed(data: IData): Promise<void> {
  const art = createCategory('cat-art', 'Art');
  const painting = createCategory('cat-paint', 'Painting', { parentId: art.id });

  await data.theme.save(createTheme());
  await data.themeAsset.save(createAsset('style.css', 'body{}'));
  await data.webLog.add(createWebLog({ redirectRules: [{ from: '/old', to: '/new', isRegex: false }] }));
  await data.webLogUser.add(createUser());
  await data.category.restore([art, painting]);
  await data.tagMap.save(createTagMap('tm-1', 'dotnet', 'dot-net'));
  await data.page.add(createPage('pg-1', 'About', {
    priorPermalinks: ['about-us.html'],
    revisions: [revision(3, 'About us'), revision(2, 'About')],
  }));
  await data.page.add(createPage('pg-2', 'Contact', { isInPageList: false }));
  await data.post.add(createPost('p1', {
    categoryIds: [painting.id, art.id],
    tags: ['web'],
    episode: { media: 'episodes/p1.mp3', length: 2048, duration: '00:31:00', seasonNumber: 2 },
    revisions: [revision(11, 'p1 edited'), revision(10, 'p1')],
  }));
  await data.post.add(createDraft('d1', march(20), { categoryIds: [art.id] }));
  await data.upload.add(createUpload('up-1', 'img/a.png', 'aaa'));
}

/** Everything a restore must reproduce */
async function snapshot(data: IData, webLogId = WEB_LOG_ID) {
  return {
    webLog: await data.webLog.findById(webLogId),
    users: await data.webLogUser.findByWebLog(webLogId),
    categories: await data.category.findByWebLog(webLogId),
    tagMaps: await data.tagMap.findByWebLog(webLogId),
    pages: await data.page.findFullByWebLog(webLogId),
    posts: await data.post.findFullByWebLog(webLogId),
    uploads: await data.upload.findByWebLogWithData(webLogId),
  };
}

describe('BackupService', () => {
  let source: SqliteData;
  let archive: Archive;

  beforeEach(async () => {
    source = SqliteData.open({ filename: ':memory:' });
    await source.startUp();
    await seed(source);
    archive = parseArchive(serializeArchive(await new BackupService(source).createBackup(WEB_LOG_ID)));
  });

  afterEach(async () => {
    await source.close();
  });

  describe('createBackup', () => {
    it('gathers the web log with everything it owns', () => {
      expect(archive.webLog.id).toBe(WEB_LOG_ID);
      expect(archive.theme.templates.map((template) => template.name)).toEqual(['layout', 'single-post']);
      expect(archive.assets.map((asset) => asset.data.toString())).toEqual(['body{}']);
      expect(archive.categories.map((category) => category.id)).toEqual(['cat-art', 'cat-paint']);
      expect(archive.pages.map((page) => page.revisions.length)).toEqual([2, 1]);
      expect(archive.posts.map((post) => post.categoryIds)).toEqual([['cat-art'], ['cat-art', 'cat-paint']]);
      expect(archive.posts.map((post) => post.revisions.length)).toEqual([1, 2]);
      expect(archive.posts[1].episode).toEqual({
        media: 'episodes/p1.mp3',
        length: 2048,
        duration: '00:31:00',
        seasonNumber: 2,
      });
      expect(archive.uploads.map((upload) => upload.data.toString())).toEqual(['aaa']);
    });

    it('fails for an unknown web log', async () => {
      await expect(new BackupService(source).createBackup(WebLogId.parse('nope')))
        .rejects.toMatchObject({ code: 'WEB_LOG_NOT_FOUND' });
    });
  });

  describe('restoreBackup', () => {
    it('recreates the web log on another backend', async () => {
      const target = new MongoData(new InMemoryDocumentDatabase());

      const summary = await new BackupService(target).restoreBackup(archive);

      expect(summary).toEqual([
        { step: 'theme', count: 2 },
        { step: 'webLog', count: 1 },
        { step: 'users', count: 1 },
        { step: 'categories', count: 2 },
        { step: 'tagMappings', count: 1 },
        { step: 'pages', count: 2 },
        { step: 'posts', count: 2 },
        { step: 'uploads', count: 1 },
      ]);
      expect(await snapshot(target)).toEqual(await snapshot(source));
      expect(await target.theme.findById(archive.theme.id)).toEqual(archive.theme);
    });

    it('can be run again over its own result', async () => {
      const target = SqliteData.open({ filename: ':memory:' });
      await target.startUp();
      const service = new BackupService(target);

      await service.restoreBackup(archive);
      await service.restoreBackup(archive);

      expect(await snapshot(target)).toEqual(await snapshot(source));
      expect(await target.page.countAll(WEB_LOG_ID)).toBe(2);
      await target.close();
    });

    it('serves the restored web log from a new URL base', async () => {
      const target = new MongoData(new InMemoryDocumentDatabase());

      await new BackupService(target).restoreBackup(archive, { newUrlBase: 'https://restored.example.com' });

      expect((await target.webLog.findByHost('https://restored.example.com'))?.id).toBe(WEB_LOG_ID);
      expect(await target.webLog.findByHost('https://notes.example.com')).toBeUndefined();
    });

    it('names the step that failed', async () => {
      const target = new MongoData(new InMemoryDocumentDatabase());
      const cause = new Error('disk full');
      vi.spyOn(target.category, 'restore').mockRejectedValue(cause);

      let caught: unknown;
      try {
        await new BackupService(target).restoreBackup(archive);
      } catch (error) {
        caught = error;
      }

      if (!(caught instanceof ArchiveError)) throw new Error('expected ArchiveError');
      expect(caught.code).toBe('RESTORE_FAILED');
      expect(caught.message).toBe('Restore failed at categories: disk full');
      expect(caught.context.operation).toBe('categories');
      expect(caught.cause).toBe(cause);
      expect(await target.webLogUser.findByWebLog(WEB_LOG_ID)).toHaveLength(1);
      expect(await target.page.countAll(WEB_LOG_ID)).toBe(0);
    });
  });
});
