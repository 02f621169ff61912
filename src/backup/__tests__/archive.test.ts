/**
 * Archive Codec Tests
 * @module backup/__tests__/archive.test
 */

import { describe, it, expect } from 'vitest';
import { ARCHIVE_VERSION, parseArchive, serializeArchive, type Archive } from '../archive.js';
import { ArchiveError } from '../../errors/index.js';
import {
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
} from '../../../tests/factories/index.js';

function archive(): Archive {
  return {
    version: ARCHIVE_VERSION,
    createdOn: march(30),
    webLog: createWebLog(),
    users: [createUser()],
    theme: createTheme(),
    assets: [createAsset('style.css', 'body{}')],
    categories: [createCategory('cat-news', 'News')],
    tagMappings: [createTagMap('tm-1', 'dotnet', 'dot-net')],
    pages: [createPage('pg-1', 'About', { priorPermalinks: ['about-us.html'] })],
    posts: [createPost('p1', { tags: ['web'] }), createDraft('d1', march(20))],
    uploads: [createUpload('up-1', 'img/a.png', 'aaa')],
  };
}

function captureArchiveError(text: string): ArchiveError {
  try {
    parseArchive(text);
  } catch (error) {
    if (error instanceof ArchiveError) return error;
    throw error;
  }
  throw new Error('Archive was accepted');
}

describe('serializeArchive', () => {
  it('writes binary data as base64', () => {
    const text = serializeArchive(archive());

    expect(text).toContain('"data": "Ym9keXt9"');
    expect(text).toContain('"data": "YWFh"');
  });

  it('produces text that reads back to the same archive', () => {
    const original = archive();
    expect(parseArchive(serializeArchive(original))).toEqual(original);
  });
});

describe('parseArchive', () => {
  it('rejects text that is not JSON', () => {
    const error = captureArchiveError('{ "version": ');

    expect(error.code).toBe('INVALID_ARCHIVE');
    expect(error.message).toMatch(/^Archive is not valid JSON: /);
  });

  it('rejects an archive of another format version', () => {
    const error = captureArchiveError(serializeArchive(archive()).replace('"version": 1', '"version": 2'));

    expect(error.issues.map((issue) => issue.path)).toEqual(['version']);
  });

  it('lists every field that failed validation', () => {
    const text = serializeArchive(archive())
      .replace('"data": "Ym9keXt9"', '"data": "not base64!"')
      .replace('"urlBase": "https://notes.example.com"', '"urlBase": 42');

    const error = captureArchiveError(text);

    expect(error.message).toBe('Archive failed validation with 2 issue(s)');
    expect(error.issues).toEqual([
      { path: 'webLog.urlBase', message: 'Expected string, received number' },
      { path: 'assets.0.data', message: 'Expected base64 data' },
    ]);
  });
});
