/**
 * Core Entity Types
 * @module types/entities
 *
 * The content model shared by every storage backend. Each entity is defined
 * as a zod schema; the TypeScript type is inferred from it, and the schema is
 * what the document-store adapter and the backup reader validate with.
 */

import { z } from 'zod';
import {
  WebLogId,
  WebLogUserId,
  CategoryId,
  PageId,
  PostId,
  TagMapId,
  ThemeId,
  ThemeAssetId,
  UploadId,
  CustomFeedId,
} from './ids.js';

// ============================================================================
// Schema Helpers
// ============================================================================

/**
 * Optional field that also accepts null, as backends store absent values
 */
function optional<T extends z.ZodTypeAny>(schema: T) {
  return schema.nullish().transform((value) => value ?? undefined);
}

const instant = z.coerce.date();
const bytes = z.instanceof(Buffer);

// ============================================================================
// Markup Text
// ============================================================================

/**
 * Source type of a revision or page body
 */
export const MarkupSourceType = z.enum(['Markdown', 'HTML']);
export type MarkupSourceType = z.infer<typeof MarkupSourceType>;

/**
 * Text prefixed with its source type, e.g. "Markdown: # Title"
 */
export type MarkupText = `Markdown: ${string}` | `HTML: ${string}`;

export function isMarkupText(value: unknown): value is MarkupText {
  return typeof value === 'string' && (value.startsWith('Markdown: ') || value.startsWith('HTML: '));
}

export const MarkupTextSchema = z.custom<MarkupText>(isMarkupText, {
  message: 'Markup text must start with "Markdown: " or "HTML: "',
});

// ============================================================================
// Value Objects
// ============================================================================

export const MetaItemSchema = z.object({
  name: z.string(),
  value: z.string(),
});
export type MetaItem = z.infer<typeof MetaItemSchema>;

export const RedirectRuleSchema = z.object({
  from: z.string(),
  to: z.string(),
  isRegex: z.boolean(),
});
export type RedirectRule = z.infer<typeof RedirectRuleSchema>;

export const RevisionSchema = z.object({
  asOf: instant,
  text: MarkupTextSchema,
});
export type Revision = z.infer<typeof RevisionSchema>;

export const ExplicitRating = z.enum(['yes', 'no', 'clean']);
export type ExplicitRating = z.infer<typeof ExplicitRating>;

export const PodcastMedium = z.enum(['podcast', 'music', 'video', 'film', 'audiobook', 'newsletter', 'blog']);
export type PodcastMedium = z.infer<typeof PodcastMedium>;

export const PodcastOptionsSchema = z.object({
  title: z.string(),
  subtitle: optional(z.string()),
  itemsInFeed: z.number().int(),
  summary: z.string(),
  displayedAuthor: z.string(),
  email: z.string(),
  imageUrl: z.string(),
  appleCategory: z.string(),
  appleSubcategory: optional(z.string()),
  explicit: ExplicitRating,
  defaultMediaType: optional(z.string()),
  mediaBaseUrl: optional(z.string()),
  podcastGuid: optional(z.string()),
  fundingUrl: optional(z.string()),
  fundingText: optional(z.string()),
  medium: optional(PodcastMedium),
});
export type PodcastOptions = z.infer<typeof PodcastOptionsSchema>;

/**
 * Feed source: "category:<categoryId>" or "tag:<tag>"
 */
export const CustomFeedSource = z.string().regex(/^(category|tag):.+$/);

export const CustomFeedSchema = z.object({
  id: CustomFeedId,
  source: CustomFeedSource,
  path: z.string(),
  podcast: optional(PodcastOptionsSchema),
});
export type CustomFeed = z.infer<typeof CustomFeedSchema>;

export const RssOptionsSchema = z.object({
  isFeedEnabled: z.boolean(),
  feedName: z.string(),
  itemsInFeed: optional(z.number().int()),
  isCategoryEnabled: z.boolean(),
  isTagEnabled: z.boolean(),
  copyright: optional(z.string()),
  customFeeds: z.array(CustomFeedSchema),
});
export type RssOptions = z.infer<typeof RssOptionsSchema>;

export const EpisodeSchema = z.object({
  media: z.string(),
  length: z.number().int(),
  duration: optional(z.string()),
  mediaType: optional(z.string()),
  imageUrl: optional(z.string()),
  subtitle: optional(z.string()),
  explicit: optional(ExplicitRating),
  chapterFile: optional(z.string()),
  chapterType: optional(z.string()),
  transcriptUrl: optional(z.string()),
  transcriptType: optional(z.string()),
  transcriptLang: optional(z.string()),
  transcriptCaptions: optional(z.boolean()),
  seasonNumber: optional(z.number().int()),
  seasonDescription: optional(z.string()),
  episodeNumber: optional(z.number()),
  episodeDescription: optional(z.string()),
});
export type Episode = z.infer<typeof EpisodeSchema>;

// ============================================================================
// Web Log
// ============================================================================

/**
 * Where uploaded files are kept
 */
export const UploadDestination = z.enum(['Database', 'Disk']);
export type UploadDestination = z.infer<typeof UploadDestination>;

export const WebLogSchema = z.object({
  id: WebLogId,
  name: z.string(),
  slug: z.string(),
  subtitle: optional(z.string()),
  /** "posts" or the ID of a page */
  defaultPage: z.string(),
  postsPerPage: z.number().int().min(1),
  themeId: ThemeId,
  urlBase: z.string(),
  timeZone: z.string(),
  rss: RssOptionsSchema,
  autoHtmx: z.boolean(),
  uploads: UploadDestination,
  redirectRules: z.array(RedirectRuleSchema),
});
export type WebLog = z.infer<typeof WebLogSchema>;

// ============================================================================
// Users
// ============================================================================

/**
 * Access levels, lowest first; each level implies the ones before it
 */
export const AccessLevel = z.enum(['Author', 'Editor', 'WebLogAdmin', 'Administrator']);
export type AccessLevel = z.infer<typeof AccessLevel>;

export const WebLogUserSchema = z.object({
  id: WebLogUserId,
  webLogId: WebLogId,
  email: z.string(),
  firstName: z.string(),
  lastName: z.string(),
  preferredName: z.string(),
  passwordHash: z.string(),
  url: optional(z.string()),
  accessLevel: AccessLevel,
  createdOn: instant,
  lastSeenOn: optional(instant),
});
export type WebLogUser = z.infer<typeof WebLogUserSchema>;

// ============================================================================
// Categories
// ============================================================================

export const CategorySchema = z.object({
  id: CategoryId,
  webLogId: WebLogId,
  name: z.string(),
  slug: z.string(),
  description: optional(z.string()),
  parentId: optional(CategoryId),
});
export type Category = z.infer<typeof CategorySchema>;

// ============================================================================
// Pages and Posts
// ============================================================================

export const PageSchema = z.object({
  id: PageId,
  webLogId: WebLogId,
  authorId: WebLogUserId,
  title: z.string(),
  permalink: z.string(),
  publishedOn: instant,
  updatedOn: instant,
  isInPageList: z.boolean(),
  template: optional(z.string()),
  text: z.string(),
  metadata: z.array(MetaItemSchema),
  priorPermalinks: z.array(z.string()),
  revisions: z.array(RevisionSchema),
});
export type Page = z.infer<typeof PageSchema>;

export const PostStatus = z.enum(['Draft', 'Published']);
export type PostStatus = z.infer<typeof PostStatus>;

export const PostSchema = z.object({
  id: PostId,
  webLogId: WebLogId,
  authorId: WebLogUserId,
  status: PostStatus,
  title: z.string(),
  permalink: z.string(),
  publishedOn: optional(instant),
  updatedOn: instant,
  template: optional(z.string()),
  text: z.string(),
  categoryIds: z.array(CategoryId),
  tags: z.array(z.string()),
  episode: optional(EpisodeSchema),
  metadata: z.array(MetaItemSchema),
  priorPermalinks: z.array(z.string()),
  revisions: z.array(RevisionSchema),
});
export type Post = z.infer<typeof PostSchema>;

// ============================================================================
// Tag Mappings
// ============================================================================

export const TagMapSchema = z.object({
  id: TagMapId,
  webLogId: WebLogId,
  tag: z.string(),
  urlValue: z.string(),
});
export type TagMap = z.infer<typeof TagMapSchema>;

// ============================================================================
// Themes
// ============================================================================

export const ThemeTemplateSchema = z.object({
  name: z.string(),
  text: z.string(),
});
export type ThemeTemplate = z.infer<typeof ThemeTemplateSchema>;

export const ThemeSchema = z.object({
  id: ThemeId,
  name: z.string(),
  version: z.string(),
  templates: z.array(ThemeTemplateSchema),
});
export type Theme = z.infer<typeof ThemeSchema>;

export const ThemeAssetSchema = z.object({
  id: ThemeAssetId,
  updatedOn: instant,
  data: bytes,
});
export type ThemeAsset = z.infer<typeof ThemeAssetSchema>;

// ============================================================================
// Uploads
// ============================================================================

export const UploadSchema = z.object({
  id: UploadId,
  webLogId: WebLogId,
  path: z.string(),
  updatedOn: instant,
  data: bytes,
});
export type Upload = z.infer<typeof UploadSchema>;
