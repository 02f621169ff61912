/**
 * PostgreSQL Theme Store
 * @module data/postgres/theme-data
 */

import type pg from 'pg';
import type { ThemeId } from '../../types/ids.js';
import type { Theme, ThemeTemplate } from '../../types/entities.js';
import { DeleteOutcome, type IThemeData } from '../interfaces.js';
import { diffTemplates } from '../diff.js';
import { PgStore, type QueryOptions } from './pg-store.js';

interface ThemeRow {
  id: ThemeId;
  name: string;
  version: string;
}

interface TemplateRow {
  name: string;
  template: string;
}

/**
 * PostgreSQL implementation of {@link IThemeData}
 */
export class PgThemeData extends PgStore implements IThemeData {
  constructor(pool: pg.Pool) {
    super(pool, 'theme');
  }

  private async templates(themeId: ThemeId, withText: boolean, options?: QueryOptions): Promise<ThemeTemplate[]> {
    const text = withText ? 'template' : "'' AS template";
    const rows = await this.queryAll<TemplateRow>(
      `SELECT name, ${text} FROM theme_template WHERE theme_id = $1 ORDER BY name`,
      [themeId],
      options
    );
    return rows.map((row) => ({ name: row.name, text: row.template }));
  }

  private async find(themeId: ThemeId, withText: boolean): Promise<Theme | undefined> {
    const row = await this.queryOne<ThemeRow>('SELECT * FROM theme WHERE id = $1', [themeId]);
    if (!row) return undefined;
    return { ...row, templates: await this.templates(row.id, withText) };
  }

  async all(): Promise<Theme[]> {
    const rows = await this.queryAll<ThemeRow>("SELECT * FROM theme WHERE id <> 'admin' ORDER BY id");
    return Promise.all(rows.map(async (row) => ({ ...row, templates: await this.templates(row.id, false) })));
  }

  async exists(themeId: ThemeId): Promise<boolean> {
    return this.queryExists('SELECT 1 FROM theme WHERE id = $1', [themeId]);
  }

  async findById(themeId: ThemeId): Promise<Theme | undefined> {
    return this.find(themeId, true);
  }

  async findByIdWithoutText(themeId: ThemeId): Promise<Theme | undefined> {
    return this.find(themeId, false);
  }

  async delete(themeId: ThemeId): Promise<DeleteOutcome> {
    return this.withTransaction(async (client) => {
      await this.execute('DELETE FROM theme_asset WHERE theme_id = $1', [themeId], { client });
      await this.execute('DELETE FROM theme_template WHERE theme_id = $1', [themeId], { client });
      const deleted = await this.execute('DELETE FROM theme WHERE id = $1', [themeId], { client });
      return deleted > 0 ? DeleteOutcome.DELETED : DeleteOutcome.NOT_FOUND;
    });
  }

  async save(theme: Theme): Promise<void> {
    await this.withTransaction(async (client) => {
      await this.execute(
        `INSERT INTO theme (id, name, version) VALUES ($1, $2, $3)
         ON CONFLICT (id) DO UPDATE SET name = EXCLUDED.name, version = EXCLUDED.version`,
        [theme.id, theme.name, theme.version],
        { client }
      );
      const { removed, added } = diffTemplates(await this.templates(theme.id, true, { client }), theme.templates);
      for (const template of removed) {
        await this.execute('DELETE FROM theme_template WHERE theme_id = $1 AND name = $2',
          [theme.id, template.name], { client });
      }
      for (const template of added) {
        await this.execute('INSERT INTO theme_template (theme_id, name, template) VALUES ($1, $2, $3)',
          [theme.id, template.name, template.text], { client });
      }
    });
  }
}
