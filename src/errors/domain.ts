/**
 * Domain Error Classes
 * @module errors/domain
 *
 * Content-model and backup failures. Expected outcomes such as a missing
 * record or a user with authored content are not errors; they are returned
 * as options and discriminated outcomes by the data layer.
 */

import { BaseError, ErrorContext } from './base.js';
import { ContentErrorCodes, BackupErrorCodes, ErrorCode } from './codes.js';

// ============================================================================
// Content Errors
// ============================================================================

/**
 * Stored markup text without a recognized source-type prefix
 */
export class InvalidMarkupError extends BaseError {
  public readonly value: string;

  constructor(value: string, context: ErrorContext = {}) {
    super(`Cannot determine markup source type of "${value.substring(0, 40)}"`,
      ContentErrorCodes.INVALID_MARKUP, context);
    this.name = 'InvalidMarkupError';
    this.value = value;
  }
}

/**
 * Theme asset identifier that is not of the form themeId/path
 */
export class InvalidAssetIdError extends BaseError {
  constructor(value: string, context: ErrorContext = {}) {
    super(`Theme asset ID "${value}" must be of the form themeId/path`,
      ContentErrorCodes.INVALID_ASSET_ID, context);
    this.name = 'InvalidAssetIdError';
  }
}

/**
 * Template missing from its theme, directly or through an include
 */
export class TemplateNotFoundError extends BaseError {
  public readonly themeId: string;
  public readonly templateName: string;

  constructor(themeId: string, templateName: string, context: ErrorContext = {}) {
    super(`Template "${templateName}" not found in theme "${themeId}"`,
      ContentErrorCodes.TEMPLATE_NOT_FOUND, context);
    this.name = 'TemplateNotFoundError';
    this.themeId = themeId;
    this.templateName = templateName;
  }
}

/**
 * Page or post saved without any revision
 */
export class MissingRevisionError extends BaseError {
  constructor(kind: string, id: string, context: ErrorContext = {}) {
    super(`Cannot save ${kind} ${id} without a revision`, ContentErrorCodes.MISSING_REVISION, context);
    this.name = 'MissingRevisionError';
  }
}

// ============================================================================
// Backup Errors
// ============================================================================

/**
 * Single validation failure inside an archive
 */
export interface ArchiveIssue {
  path: string;
  message: string;
}

/**
 * Backup or restore failure
 */
export class ArchiveError extends BaseError {
  public readonly issues: ArchiveIssue[];

  constructor(
    message: string,
    code: ErrorCode = BackupErrorCodes.INVALID_ARCHIVE,
    issues: ArchiveIssue[] = [],
    context: ErrorContext = {}
  ) {
    super(message, code, { ...context, details: { ...context.details, issues } });
    this.name = 'ArchiveError';
    this.issues = issues;
  }
}
