/**
 * Content Model Helper Tests
 * @module types/__tests__/support.test
 */

import { describe, it, expect } from 'vitest';
import {
  absoluteUrl,
  appendRevision,
  currentRevision,
  displayName,
  hasAccess,
  html,
  markdown,
  parseMarkupText,
  relativeUrl,
  requireRevision,
  sourceTypeOf,
  textOf,
  webLogExtraPath,
  webLogHostAndPath,
} from '../support.js';
import { splitThemeAssetId, themeAssetId, ThemeId } from '../ids.js';
import { InvalidAssetIdError, InvalidMarkupError, MissingRevisionError } from '../../errors/index.js';

describe('access levels', () => {
  it('grants a level to itself and everything above it', () => {
    expect(hasAccess('Editor', 'Editor')).toBe(true);
    expect(hasAccess('Editor', 'Administrator')).toBe(true);
    expect(hasAccess('WebLogAdmin', 'Author')).toBe(false);
  });
});

describe('markup text', () => {
  it('splits stored text into source type and body', () => {
    expect(sourceTypeOf(markdown('# Hi'))).toBe('Markdown');
    expect(textOf(markdown('# Hi'))).toBe('# Hi');
    expect(sourceTypeOf(html('<p>Hi</p>'))).toBe('HTML');
    expect(textOf(html('<p>Hi</p>'))).toBe('<p>Hi</p>');
  });

  it('parses known source types and rejects others', () => {
    expect(parseMarkupText('HTML: <b>x</b>')).toBe('HTML: <b>x</b>');
    expect(() => parseMarkupText('Textile: x')).toThrow(InvalidMarkupError);
  });
});

describe('revisions', () => {
  const first = { asOf: new Date('2024-05-01T10:00:00.000Z'), text: markdown('one') };

  it('prepends the new revision at the given time', () => {
    const now = new Date('2024-05-02T10:00:00.000Z');
    expect(appendRevision([first], markdown('two'), now)).toEqual([{ asOf: now, text: 'Markdown: two' }, first]);
  });

  it('moves a clock reading at or before the current revision past it', () => {
    const [added] = appendRevision([first], markdown('two'), new Date('2024-04-30T00:00:00.000Z'));
    expect(added?.asOf.toISOString()).toBe('2024-05-01T10:00:00.001Z');
  });

  it('finds the newest revision regardless of order', () => {
    const later = { asOf: new Date('2024-06-01T00:00:00.000Z'), text: html('later') };
    expect(currentRevision([first, later])).toBe(later);
    expect(currentRevision([])).toBeUndefined();
  });

  it('insists that saved content has a revision', () => {
    expect(() => requireRevision('page', { id: 'pg-1', revisions: [first] })).not.toThrow();
    expect(() => requireRevision('post', { id: 'p1', revisions: [] }))
      .toThrow(new MissingRevisionError('post', 'p1'));
    expect(() => requireRevision('post', { id: 'p1', revisions: [] })).toThrow('Cannot save post p1 without a revision');
  });
});

describe('users', () => {
  it('shows the preferred name with the last name', () => {
    expect(displayName({ preferredName: 'Sam', lastName: 'Okafor' })).toBe('Sam Okafor');
    expect(displayName({ preferredName: 'Sam', lastName: '' })).toBe('Sam');
  });
});

describe('web log URLs', () => {
  const root = { urlBase: 'https://example.com' };
  const nested = { urlBase: 'https://example.com/blog/' };

  it('derives host and extra path', () => {
    expect(webLogHostAndPath(nested)).toBe('example.com/blog/');
    expect(webLogExtraPath(root)).toBe('');
    expect(webLogExtraPath(nested)).toBe('/blog');
  });

  it('builds relative and absolute URLs of a permalink', () => {
    expect(relativeUrl(root, 'about.html')).toBe('/about.html');
    expect(relativeUrl(nested, 'about.html')).toBe('/blog/about.html');
    expect(absoluteUrl(nested, 'about.html')).toBe('https://example.com/blog/about.html');
  });
});

describe('theme asset IDs', () => {
  it('joins and splits on the first slash', () => {
    const id = themeAssetId(ThemeId.parse('default'), 'css/site.css');
    expect(id).toBe('default/css/site.css');
    expect(splitThemeAssetId(id)).toEqual({ themeId: 'default', path: 'css/site.css' });
  });

  it('rejects IDs without a theme or a path', () => {
    expect(() => splitThemeAssetId('/site.css')).toThrow(InvalidAssetIdError);
    expect(() => splitThemeAssetId('default/')).toThrow(InvalidAssetIdError);
    expect(() => splitThemeAssetId('default')).toThrow(InvalidAssetIdError);
  });
});
