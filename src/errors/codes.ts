/**
 * Error Codes Enumeration
 * @module errors/codes
 *
 * Centralized error codes for the web log persistence core.
 * Provides typed error codes for consistent error handling across adapters,
 * caches and the backup service.
 */

// ============================================================================
// Error Code Categories
// ============================================================================

/**
 * Code for failures that carry no code of their own
 */
export const GeneralErrorCodes = {
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type GeneralErrorCode = typeof GeneralErrorCodes[keyof typeof GeneralErrorCodes];

/**
 * Storage backend error codes
 */
export const DataErrorCodes = {
  DATABASE_ERROR: 'DATABASE_ERROR',
  CONNECTION_ERROR: 'CONNECTION_ERROR',
  BACKEND_UNAVAILABLE: 'BACKEND_UNAVAILABLE',
  QUERY_ERROR: 'QUERY_ERROR',
  SCHEMA_ERROR: 'SCHEMA_ERROR',
} as const;

export type DataErrorCode = typeof DataErrorCodes[keyof typeof DataErrorCodes];

/**
 * Content model error codes
 */
export const ContentErrorCodes = {
  INVALID_MARKUP: 'INVALID_MARKUP',
  INVALID_ASSET_ID: 'INVALID_ASSET_ID',
  TEMPLATE_NOT_FOUND: 'TEMPLATE_NOT_FOUND',
  MISSING_REVISION: 'MISSING_REVISION',
} as const;

export type ContentErrorCode = typeof ContentErrorCodes[keyof typeof ContentErrorCodes];

/**
 * Backup and restore error codes
 */
export const BackupErrorCodes = {
  INVALID_ARCHIVE: 'INVALID_ARCHIVE',
  WEB_LOG_NOT_FOUND: 'WEB_LOG_NOT_FOUND',
  THEME_NOT_FOUND: 'THEME_NOT_FOUND',
  RESTORE_FAILED: 'RESTORE_FAILED',
} as const;

export type BackupErrorCode = typeof BackupErrorCodes[keyof typeof BackupErrorCodes];

/**
 * Configuration error codes
 */
export const ConfigErrorCodes = {
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
} as const;

export type ConfigErrorCode = typeof ConfigErrorCodes[keyof typeof ConfigErrorCodes];

// ============================================================================
// Combined Error Code Type
// ============================================================================

export type ErrorCode =
  | GeneralErrorCode
  | DataErrorCode
  | ContentErrorCode
  | BackupErrorCode
  | ConfigErrorCode;

export const ErrorCodes = {
  ...GeneralErrorCodes,
  ...DataErrorCodes,
  ...ContentErrorCodes,
  ...BackupErrorCodes,
  ...ConfigErrorCodes,
} as const;
