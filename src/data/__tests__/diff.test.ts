/**
 * Collection Diff Engine Tests
 * @module data/__tests__/diff.test
 */

import { describe, it, expect } from 'vitest';
import {
  diffCategoryIds,
  diffLists,
  diffPermalinks,
  diffRevisions,
  diffTemplates,
  hasChanges,
} from '../diff.js';
import { CategoryId } from '../../types/ids.js';
import { html, markdown } from '../../types/support.js';

const at = (iso: string) => new Date(iso);

describe('diffLists', () => {
  it('returns removed and added members in input order', () => {
    const diff = diffLists([3, 1, 2], [2, 4, 5, 3], (n) => n);
    expect(diff).toEqual({ removed: [1], added: [4, 5] });
  });

  it('finds nothing to do for the same members in another order', () => {
    const diff = diffLists(['a', 'b'], ['b', 'a'], (s) => s);
    expect(hasChanges(diff)).toBe(false);
  });

  it('treats everything as added when nothing was stored', () => {
    expect(diffLists([], ['x'], (s) => s)).toEqual({ removed: [], added: ['x'] });
  });
});

describe('diffRevisions', () => {
  it('keys revisions by timestamp, not by object identity', () => {
    const stored = [
      { asOf: at('2024-03-01T00:00:00Z'), text: markdown('one') },
      { asOf: at('2024-03-02T00:00:00Z'), text: markdown('two') },
    ];
    const incoming = [
      { asOf: at('2024-03-03T00:00:00Z'), text: markdown('three') },
      { asOf: at('2024-03-02T00:00:00Z'), text: markdown('two') },
    ];

    const diff = diffRevisions(stored, incoming);

    expect(diff.removed).toEqual([stored[0]]);
    expect(diff.added).toEqual([incoming[0]]);
  });

  it('leaves a revision whose text changed under the same timestamp alone', () => {
    const asOf = at('2024-03-01T00:00:00Z');
    expect(hasChanges(diffRevisions([{ asOf, text: markdown('a') }], [{ asOf, text: html('a') }]))).toBe(false);
  });
});

describe('keyed specializations', () => {
  it('diffs permalinks and category IDs by value', () => {
    expect(diffPermalinks(['a.html', 'b.html'], ['b.html', 'c.html'])).toEqual({
      removed: ['a.html'],
      added: ['c.html'],
    });
    const [news, art] = [CategoryId.parse('news'), CategoryId.parse('art')];
    expect(diffCategoryIds([news], [news, art])).toEqual({ removed: [], added: [art] });
  });

  it('replaces a template whose text changed', () => {
    const diff = diffTemplates(
      [{ name: 'layout', text: '<main/>' }, { name: 'post', text: '<article/>' }],
      [{ name: 'layout', text: '<body/>' }, { name: 'post', text: '<article/>' }]
    );
    expect(diff).toEqual({
      removed: [{ name: 'layout', text: '<main/>' }],
      added: [{ name: 'layout', text: '<body/>' }],
    });
  });

  it('does not confuse name and text boundaries', () => {
    const diff = diffTemplates([{ name: 'a|b', text: 'c' }], [{ name: 'a', text: 'b|c' }]);
    expect(hasChanges(diff)).toBe(true);
  });
});
