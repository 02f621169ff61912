/**
 * Content Model Helpers
 * @module types/support
 */

import { InvalidMarkupError, MissingRevisionError } from '../errors/index.js';
import type {
  AccessLevel,
  MarkupSourceType,
  MarkupText,
  Revision,
  WebLog,
  WebLogUser,
} from './entities.js';

// ============================================================================
// Access Levels
// ============================================================================

const accessWeights: Record<AccessLevel, number> = {
  Author: 10,
  Editor: 20,
  WebLogAdmin: 30,
  Administrator: 40,
};

/**
 * Whether a user holding `held` may do something that needs `needed`
 */
export function hasAccess(needed: AccessLevel, held: AccessLevel): boolean {
  return accessWeights[held] >= accessWeights[needed];
}

// ============================================================================
// Markup Text
// ============================================================================

export function markdown(text: string): MarkupText {
  return `Markdown: ${text}`;
}

export function html(text: string): MarkupText {
  return `HTML: ${text}`;
}

/**
 * Source type of stored markup text
 */
export function sourceTypeOf(value: MarkupText): MarkupSourceType {
  return value.startsWith('Markdown: ') ? 'Markdown' : 'HTML';
}

/**
 * Body of stored markup text without its source-type prefix
 */
export function textOf(value: MarkupText): string {
  return value.substring(sourceTypeOf(value).length + 2);
}

/**
 * Parse a stored "Type: text" string, rejecting unknown source types
 */
export function parseMarkupText(value: string): MarkupText {
  if (value.startsWith('Markdown: ')) return markdown(value.substring(10));
  if (value.startsWith('HTML: ')) return html(value.substring(6));
  throw new InvalidMarkupError(value);
}

// ============================================================================
// Revisions
// ============================================================================

/**
 * The newest revision, if any
 */
export function currentRevision(revisions: readonly Revision[]): Revision | undefined {
  let latest: Revision | undefined;
  for (const revision of revisions) {
    if (!latest || revision.asOf.getTime() > latest.asOf.getTime()) {
      latest = revision;
    }
  }
  return latest;
}

/**
 * Append a revision, newest first. The new revision's timestamp is strictly
 * greater than every existing one; a clock reading at or before the current
 * revision is moved to one millisecond after it.
 */
export function appendRevision(
  revisions: readonly Revision[],
  text: MarkupText,
  now: Date = new Date()
): Revision[] {
  const current = currentRevision(revisions);
  const asOf = current && now.getTime() <= current.asOf.getTime()
    ? new Date(current.asOf.getTime() + 1)
    : now;
  return [{ asOf, text }, ...revisions];
}

/**
 * A saved page or post keeps at least one revision
 *
 * @throws {MissingRevisionError} when `content` has none
 */
export function requireRevision(kind: string, content: { id: string; revisions: readonly Revision[] }): void {
  if (content.revisions.length === 0) throw new MissingRevisionError(kind, content.id);
}

// ============================================================================
// Users
// ============================================================================

/**
 * Name shown for a user: preferred name and last name
 */
export function displayName(user: Pick<WebLogUser, 'preferredName' | 'lastName'>): string {
  return `${user.preferredName} ${user.lastName}`.trim();
}

// ============================================================================
// Web Log URLs
// ============================================================================

/**
 * Scheme-less host and path of a web log's URL base, e.g. "example.com/blog"
 */
export function webLogHostAndPath(webLog: Pick<WebLog, 'urlBase'>): string {
  return webLog.urlBase.replace(/^[a-z]+:\/\//i, '');
}

/**
 * Path of the web log below the host, e.g. "/blog" or ""
 */
export function webLogExtraPath(webLog: Pick<WebLog, 'urlBase'>): string {
  const hostAndPath = webLogHostAndPath(webLog);
  const slash = hostAndPath.indexOf('/');
  return slash === -1 ? '' : hostAndPath.substring(slash).replace(/\/$/, '');
}

/**
 * Site-relative URL of a permalink, e.g. "/blog/about.html"
 */
export function relativeUrl(webLog: Pick<WebLog, 'urlBase'>, permalink: string): string {
  return `${webLogExtraPath(webLog)}/${permalink}`;
}

/**
 * Absolute URL of a permalink
 */
export function absoluteUrl(webLog: Pick<WebLog, 'urlBase'>, permalink: string): string {
  return `${webLog.urlBase.replace(/\/$/, '')}/${permalink}`;
}
