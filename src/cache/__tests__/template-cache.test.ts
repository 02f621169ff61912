/**
 * Template Cache Tests
 * @module cache/__tests__/template-cache.test
 */

import { describe, it, expect, vi } from 'vitest';
import { expandIncludes, TemplateCache, type TemplateCompiler } from '../template-cache.js';
import { TemplateNotFoundError } from '../../errors/index.js';
import { ThemeId } from '../../types/ids.js';
import type { Theme } from '../../types/entities.js';
import { MongoData } from '../../data/mongo/index.js';
import { InMemoryDocumentDatabase } from '../../../tests/mocks/document-store.mock.js';

const themeId = ThemeId.parse('plain');

function theme(templates: Record<string, string>): Theme {
  return {
    id: themeId,
    name: 'Plain',
    version: '1.0',
    templates: Object.entries(templates).map(([name, text]) => ({ name, text })),
  };
}

describe('expandIncludes', () => {
  it('inlines included templates recursively', () => {
    const source = theme({
      layout: '<body>{% include_template "header" %}<main/></body>',
      header: '<header>{%include_template "logo"%}</header>',
      logo: '<img>',
    });

    expect(expandIncludes(source, 'layout')).toBe('<body><header><img></header><main/></body>');
  });

  it('leaves a template without includes as is', () => {
    expect(expandIncludes(theme({ page: '{{ page.title }}' }), 'page')).toBe('{{ page.title }}');
  });

  it('reports a missing include with the chain that led to it', () => {
    const source = theme({ layout: '{% include_template "sidebar" %}' });

    let caught: unknown;
    try {
      expandIncludes(source, 'layout');
    } catch (error) {
      caught = error;
    }
    if (!(caught instanceof TemplateNotFoundError)) throw new Error('expected TemplateNotFoundError');
    expect(caught.templateName).toBe('sidebar');
    expect(caught.context.details).toEqual({ includedFrom: ['layout'] });
  });

  it('reports an include cycle as not found', () => {
    const source = theme({
      a: '{% include_template "b" %}',
      b: '{% include_template "a" %}',
    });

    expect(() => expandIncludes(source, 'a')).toThrow('Template "a" not found in theme "plain"');
  });
});

describe('TemplateCache', () => {
  async function setup(stored?: Theme) {
    const data = new MongoData(new InMemoryDocumentDatabase());
    if (stored) await data.theme.save(stored);
    const findById = vi.spyOn(data.theme, 'findById');
    const compiler: TemplateCompiler<string[]> = { compile: (source, name) => [name, source] };
    return { findById, cache: new TemplateCache(data, compiler) };
  }

  it('compiles a template on first use and reuses it', async () => {
    const { cache, findById } = await setup(theme({
      post: '<article>{% include_template "meta" %}</article>',
      meta: '<p/>',
    }));

    expect(await cache.get(themeId, 'post')).toEqual(['plain/post', '<article><p/></article>']);
    expect(await cache.get(themeId, 'post')).toEqual(['plain/post', '<article><p/></article>']);
    expect(findById).toHaveBeenCalledTimes(1);
    expect(cache.exists(themeId, 'post')).toBe(true);
  });

  it('fails for a theme that does not exist', async () => {
    const { cache } = await setup();

    await expect(cache.get(themeId, 'post')).rejects.toBeInstanceOf(TemplateNotFoundError);
    expect(cache.tryGet(themeId, 'post')).toBeUndefined();
  });

  it('recompiles on refresh', async () => {
    const { cache, findById } = await setup(theme({ post: 'v1' }));
    await cache.get(themeId, 'post');

    expect(await cache.refresh(themeId, 'post')).toEqual(['plain/post', 'v1']);
    expect(findById).toHaveBeenCalledTimes(2);
  });

  it('drops every template of a theme', async () => {
    const { cache } = await setup(theme({ post: 'p', page: 'q' }));
    await cache.get(themeId, 'post');
    await cache.get(themeId, 'page');

    expect(cache.invalidateTheme(themeId)).toBe(2);
    expect(cache.exists(themeId, 'post')).toBe(false);
  });
});
