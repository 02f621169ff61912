/**
 * Branded Identifier Types
 * @module types/ids
 *
 * Every aggregate has its own identifier type so IDs of different
 * aggregates cannot be mixed up at compile time. Each schema doubles as the
 * constructor: `WebLogId.parse('abc')`.
 */

import { randomBytes } from 'node:crypto';
import { z } from 'zod';
import { InvalidAssetIdError } from '../errors/index.js';

// ============================================================================
// ID Schemas
// ============================================================================

export const WebLogId = z.string().min(1).brand<'WebLogId'>();
export type WebLogId = z.infer<typeof WebLogId>;

export const WebLogUserId = z.string().min(1).brand<'WebLogUserId'>();
export type WebLogUserId = z.infer<typeof WebLogUserId>;

export const CategoryId = z.string().min(1).brand<'CategoryId'>();
export type CategoryId = z.infer<typeof CategoryId>;

export const PageId = z.string().min(1).brand<'PageId'>();
export type PageId = z.infer<typeof PageId>;

export const PostId = z.string().min(1).brand<'PostId'>();
export type PostId = z.infer<typeof PostId>;

export const TagMapId = z.string().min(1).brand<'TagMapId'>();
export type TagMapId = z.infer<typeof TagMapId>;

export const ThemeId = z.string().min(1).brand<'ThemeId'>();
export type ThemeId = z.infer<typeof ThemeId>;

export const ThemeAssetId = z.string().regex(/^[^/]+\/.+$/).brand<'ThemeAssetId'>();
export type ThemeAssetId = z.infer<typeof ThemeAssetId>;

export const UploadId = z.string().min(1).brand<'UploadId'>();
export type UploadId = z.infer<typeof UploadId>;

export const CustomFeedId = z.string().min(1).brand<'CustomFeedId'>();
export type CustomFeedId = z.infer<typeof CustomFeedId>;

// ============================================================================
// ID Generation
// ============================================================================

/**
 * New random identifier: 16 random bytes as 22 URL-safe base64 characters
 */
export function newId(): string {
  return randomBytes(16).toString('base64url');
}

// ============================================================================
// Theme Asset IDs
// ============================================================================

/**
 * Build the identifier of a theme asset
 */
export function themeAssetId(themeId: ThemeId, path: string): ThemeAssetId {
  return ThemeAssetId.parse(`${themeId}/${path}`);
}

/**
 * Split a theme asset identifier into its theme and path
 */
export function splitThemeAssetId(id: string): { themeId: ThemeId; path: string } {
  const slash = id.indexOf('/');
  if (slash <= 0 || slash === id.length - 1) {
    throw new InvalidAssetIdError(id);
  }
  return { themeId: ThemeId.parse(id.substring(0, slash)), path: id.substring(slash + 1) };
}
