/**
 * Backup Archive Format
 * @module backup/archive
 *
 * A web log's whole content graph as one JSON document. Binary data is
 * base64 encoded and instants are ISO-8601 strings with milliseconds.
 */

import { z } from 'zod';
import { ArchiveError, BackupErrorCodes, getErrorMessage } from '../errors/index.js';
import {
  CategorySchema,
  PageSchema,
  PostSchema,
  TagMapSchema,
  ThemeAssetSchema,
  ThemeSchema,
  UploadSchema,
  WebLogSchema,
  WebLogUserSchema,
  type Category,
  type Page,
  type Post,
  type TagMap,
  type Theme,
  type ThemeAsset,
  type Upload,
  type WebLog,
  type WebLogUser,
} from '../types/entities.js';

/**
 * Format version written by this module
 */
export const ARCHIVE_VERSION = 1;

/**
 * A web log and everything it owns
 */
export interface Archive {
  version: number;
  createdOn: Date;
  webLog: WebLog;
  users: WebLogUser[];
  theme: Theme;
  assets: ThemeAsset[];
  categories: Category[];
  tagMappings: TagMap[];
  pages: Page[];
  posts: Post[];
  uploads: Upload[];
}

// ============================================================================
// Schema
// ============================================================================

const base64 = z
  .string()
  .regex(/^[A-Za-z0-9+/]*={0,2}$/, 'Expected base64 data')
  .transform((value) => Buffer.from(value, 'base64'));

const ArchiveSchema = z.object({
  version: z.literal(ARCHIVE_VERSION),
  createdOn: z.coerce.date(),
  webLog: WebLogSchema,
  users: z.array(WebLogUserSchema),
  theme: ThemeSchema,
  assets: z.array(ThemeAssetSchema.extend({ data: base64 })),
  categories: z.array(CategorySchema),
  tagMappings: z.array(TagMapSchema),
  pages: z.array(PageSchema),
  posts: z.array(PostSchema),
  uploads: z.array(UploadSchema.extend({ data: base64 })),
});

// ============================================================================
// Serialization
// ============================================================================

/**
 * Archive as JSON text
 */
export function serializeArchive(archive: Archive): string {
  return JSON.stringify(
    {
      ...archive,
      assets: archive.assets.map((asset) => ({ ...asset, data: asset.data.toString('base64') })),
      uploads: archive.uploads.map((upload) => ({ ...upload, data: upload.data.toString('base64') })),
    },
    null,
    2
  );
}

/**
 * Read and validate archive JSON
 *
 * @throws {ArchiveError} when the text is not JSON or not a valid archive
 */
export function parseArchive(text: string): Archive {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new ArchiveError(`Archive is not valid JSON: ${getErrorMessage(error)}`,
      BackupErrorCodes.INVALID_ARCHIVE, [], { cause: error });
  }

  const result = ArchiveSchema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    throw new ArchiveError(`Archive failed validation with ${issues.length} issue(s)`,
      BackupErrorCodes.INVALID_ARCHIVE, issues);
  }
  return result.data;
}
