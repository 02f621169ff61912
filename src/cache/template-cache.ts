/**
 * Template Cache
 * @module cache/template-cache
 *
 * Compiled theme templates keyed "themeId/templateName". Rendering is not
 * done here: the cache is given a compiler and holds whatever it produces.
 */

import type { ThemeId } from '../types/ids.js';
import type { Theme } from '../types/entities.js';
import type { IData } from '../data/interfaces.js';
import { TemplateNotFoundError } from '../errors/index.js';
import { KeyedCache } from './keyed-cache.js';

/**
 * Turns template source into a renderable form
 */
export interface TemplateCompiler<T> {
  compile(source: string, name: string): T;
}

const INCLUDE = /{%\s*include_template\s+"([^"]+)"\s*%}/g;

/**
 * Replace each `{% include_template "name" %}` with the named template's
 * text, recursively. A template that includes itself, directly or not, is
 * reported as not found.
 */
export function expandIncludes(theme: Theme, templateName: string, trail: readonly string[] = []): string {
  const template = theme.templates.find((candidate) => candidate.name === templateName);
  if (!template || trail.includes(templateName)) {
    throw new TemplateNotFoundError(theme.id, templateName, {
      details: trail.length > 0 ? { includedFrom: [...trail] } : undefined,
    });
  }
  return template.text.replace(INCLUDE, (_, child: string) =>
    expandIncludes(theme, child, [...trail, templateName]));
}

export class TemplateCache<T> {
  private readonly cache = new KeyedCache<T>('TemplateCache');

  constructor(
    private readonly data: IData,
    private readonly compiler: TemplateCompiler<T>
  ) {}

  private static key(themeId: ThemeId, templateName: string): string {
    return `${themeId}/${templateName}`;
  }

  private async load(themeId: ThemeId, templateName: string): Promise<T> {
    const theme = await this.data.theme.findById(themeId);
    if (!theme) throw new TemplateNotFoundError(themeId, templateName);
    return this.compiler.compile(expandIncludes(theme, templateName), TemplateCache.key(themeId, templateName));
  }

  tryGet(themeId: ThemeId, templateName: string): T | undefined {
    return this.cache.tryGet(TemplateCache.key(themeId, templateName));
  }

  exists(themeId: ThemeId, templateName: string): boolean {
    return this.cache.exists(TemplateCache.key(themeId, templateName));
  }

  /**
   * Compiled template, compiling it on first request
   */
  async get(themeId: ThemeId, templateName: string): Promise<T> {
    return this.cache.get(TemplateCache.key(themeId, templateName), () => this.load(themeId, templateName));
  }

  async refresh(themeId: ThemeId, templateName: string): Promise<T> {
    return this.cache.refresh(TemplateCache.key(themeId, templateName), () => this.load(themeId, templateName));
  }

  /**
   * Drop every compiled template of a theme
   */
  invalidateTheme(themeId: ThemeId): number {
    const prefix = `${themeId}/`;
    return this.cache.removeWhere((key) => key.startsWith(prefix));
  }
}
