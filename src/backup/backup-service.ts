/**
 * Backup and Restore
 * @module backup/backup-service
 *
 * Restore writes through the data layer only; callers refresh their caches
 * afterwards.
 */

import { ArchiveError, BackupErrorCodes, getErrorMessage } from '../errors/index.js';
import { createModuleLogger } from '../logging/index.js';
import type { WebLogId } from '../types/ids.js';
import type { IData } from '../data/interfaces.js';
import { ARCHIVE_VERSION, type Archive } from './archive.js';

export interface RestoreOptions {
  /** Serve the restored web log from this URL base instead of the archived one */
  newUrlBase?: string;
}

/**
 * Number of records written by each restore step, in order
 */
export type RestoreSummary = Array<{ step: RestoreStep; count: number }>;

export const RestoreSteps = [
  'theme',
  'webLog',
  'users',
  'categories',
  'tagMappings',
  'pages',
  'posts',
  'uploads',
] as const;

export type RestoreStep = typeof RestoreSteps[number];

export class BackupService {
  private readonly logger = createModuleLogger('backup');

  constructor(private readonly data: IData) {}

  /**
   * Gather a web log's content graph
   *
   * @throws {ArchiveError} when the web log or its theme does not exist
   */
  async createBackup(webLogId: WebLogId): Promise<Archive> {
    const webLog = await this.data.webLog.findById(webLogId);
    if (!webLog) {
      throw new ArchiveError(`Web log ${webLogId} not found`, BackupErrorCodes.WEB_LOG_NOT_FOUND, [], { webLogId });
    }
    const theme = await this.data.theme.findById(webLog.themeId);
    if (!theme) {
      throw new ArchiveError(`Theme ${webLog.themeId} not found`, BackupErrorCodes.THEME_NOT_FOUND, [], { webLogId });
    }

    const archive: Archive = {
      version: ARCHIVE_VERSION,
      createdOn: new Date(),
      webLog,
      users: await this.data.webLogUser.findByWebLog(webLogId),
      theme,
      assets: await this.data.themeAsset.findByThemeWithData(theme.id),
      categories: await this.data.category.findByWebLog(webLogId),
      tagMappings: await this.data.tagMap.findByWebLog(webLogId),
      pages: await this.data.page.findFullByWebLog(webLogId),
      posts: await this.data.post.findFullByWebLog(webLogId),
      uploads: await this.data.upload.findByWebLogWithData(webLogId),
    };

    this.logger.backupCreated(webLogId, {
      users: archive.users.length,
      assets: archive.assets.length,
      categories: archive.categories.length,
      tagMappings: archive.tagMappings.length,
      pages: archive.pages.length,
      posts: archive.posts.length,
      uploads: archive.uploads.length,
    });
    return archive;
  }

  /**
   * Write an archive's graph, theme first and posts and uploads last. Every
   * step is an upsert, so a restore that failed part way can be run again.
   *
   * @throws {ArchiveError} naming the step that failed, with the backend
   *   error as its cause
   */
  async restoreBackup(archive: Archive, options: RestoreOptions = {}): Promise<RestoreSummary> {
    const start = Date.now();
    const webLog = options.newUrlBase ? { ...archive.webLog, urlBase: options.newUrlBase } : archive.webLog;
    const summary: RestoreSummary = [];

    const run = async (step: RestoreStep, count: number, write: () => Promise<void>) => {
      try {
        await write();
      } catch (error) {
        throw new ArchiveError(`Restore failed at ${step}: ${getErrorMessage(error)}`,
          BackupErrorCodes.RESTORE_FAILED, [], { cause: error, webLogId: webLog.id, operation: step });
      }
      this.logger.restoreStepCompleted(webLog.id, step, count);
      summary.push({ step, count });
    };

    await run('theme', 1 + archive.assets.length, async () => {
      await this.data.theme.save(archive.theme);
      for (const asset of archive.assets) await this.data.themeAsset.save(asset);
    });
    await run('webLog', 1, async () => {
      if (await this.data.webLog.findById(webLog.id)) {
        await this.data.webLog.updateSettings(webLog);
        await this.data.webLog.updateRssOptions(webLog);
        await this.data.webLog.updateRedirectRules(webLog);
      } else {
        await this.data.webLog.add(webLog);
      }
    });
    await run('users', archive.users.length, () => this.data.webLogUser.restore(archive.users));
    await run('categories', archive.categories.length, () => this.data.category.restore(archive.categories));
    await run('tagMappings', archive.tagMappings.length, () => this.data.tagMap.restore(archive.tagMappings));
    await run('pages', archive.pages.length, () => this.data.page.restore(archive.pages));
    await run('posts', archive.posts.length, () => this.data.post.restore(archive.posts));
    await run('uploads', archive.uploads.length, () => this.data.upload.restore(archive.uploads));

    this.logger.restoreCompleted(webLog.id, Date.now() - start);
    return summary;
  }
}
