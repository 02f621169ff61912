/**
 * Error Hierarchy Tests
 * @module errors/__tests__/errors.test
 */

import { describe, it, expect } from 'vitest';
import {
  ArchiveError,
  BackendUnavailableError,
  BackupErrorCodes,
  BaseError,
  ConfigurationError,
  ErrorCodes,
  QueryError,
  TemplateNotFoundError,
  getErrorMessage,
  isBaseError,
  wrapError,
} from '../index.js';

describe('BackendUnavailableError', () => {
  it('keeps the backend, the target and the driver failure', () => {
    const cause = new Error('ECONNREFUSED');
    const error = new BackendUnavailableError('postgres', 'postgres://localhost/weblog', cause);

    expect(error).toBeInstanceOf(BaseError);
    expect(error.message).toBe('Failed to connect to database: postgres://localhost/weblog');
    expect(error.code).toBe('BACKEND_UNAVAILABLE');
    expect(error.backend).toBe('postgres');
    expect(error.context.details).toEqual({ backend: 'postgres', reason: 'ECONNREFUSED' });
    expect(error.cause).toBe(cause);
  });
});

describe('QueryError', () => {
  it('truncates the statement it carries', () => {
    const error = new QueryError('syntax error', `SELECT ${'x, '.repeat(100)}1`);
    expect(error.query).toHaveLength(200);
    expect(error.toString()).toBe('QueryError [QUERY_ERROR]: syntax error');
  });
});

describe('content and backup errors', () => {
  it('names the theme and template that could not be found', () => {
    const error = new TemplateNotFoundError('default', 'sidebar');
    expect(error.message).toBe('Template "sidebar" not found in theme "default"');
    expect(isBaseError(error)).toBe(true);
  });

  it('carries archive validation issues in its details', () => {
    const issues = [{ path: 'webLog.urlBase', message: 'Required' }];
    const error = new ArchiveError('Archive is not valid', BackupErrorCodes.INVALID_ARCHIVE, issues);

    expect(error.issues).toEqual(issues);
    expect(error.toJSON()).toEqual({
      name: 'ArchiveError',
      message: 'Archive is not valid',
      code: 'INVALID_ARCHIVE',
      timestamp: error.timestamp.toISOString(),
      details: { issues },
    });
  });
});

describe('wrapError', () => {
  it('returns application errors unchanged', () => {
    const error = new ConfigurationError('data', 'bad');
    expect(wrapError(error)).toBe(error);
  });

  it('wraps foreign errors and values', () => {
    const cause = new TypeError('boom');
    const wrapped = wrapError(cause);
    expect(wrapped.message).toBe('boom');
    expect(wrapped.cause).toBe(cause);
    expect(wrapped.code).toBe(ErrorCodes.INTERNAL_ERROR);

    const plain = wrapError('plain', undefined, ErrorCodes.QUERY_ERROR);
    expect(plain.code).toBe('QUERY_ERROR');
    expect(plain.context.details).toEqual({ originalValue: 'plain' });
    expect(getErrorMessage(42)).toBe('42');
  });
});
