/**
 * SQLite Theme Store
 * @module data/sqlite/theme-data
 *
 * Templates live in their own table and are synchronized by diff on save.
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';
import { ThemeId } from '../../types/ids.js';
import type { Theme, ThemeTemplate } from '../../types/entities.js';
import { DeleteOutcome, type IThemeData } from '../interfaces.js';
import { diffTemplates } from '../diff.js';
import { SqliteStore } from './sqlite-store.js';

const ThemeRow = z.object({
  id: ThemeId,
  name: z.string(),
  version: z.string(),
}).transform((row): Theme => ({ id: row.id, name: row.name, version: row.version, templates: [] }));

const TemplateRow = z.object({
  name: z.string(),
  template: z.string(),
}).transform((row): ThemeTemplate => ({ name: row.name, text: row.template }));

/**
 * SQLite implementation of {@link IThemeData}
 */
export class SqliteThemeData extends SqliteStore implements IThemeData {
  constructor(db: Database.Database) {
    super(db, 'theme');
  }

  private templates(themeId: ThemeId, withText: boolean): ThemeTemplate[] {
    const text = withText ? 'template' : "'' AS template";
    return this.queryAll(TemplateRow,
      `SELECT name, ${text} FROM theme_template WHERE theme_id = @themeId ORDER BY name`,
      { themeId });
  }

  private find(themeId: ThemeId, withText: boolean): Theme | undefined {
    const theme = this.queryOne(ThemeRow, 'SELECT * FROM theme WHERE id = @themeId', { themeId });
    return theme && { ...theme, templates: this.templates(theme.id, withText) };
  }

  async all(): Promise<Theme[]> {
    return this.queryAll(ThemeRow, "SELECT * FROM theme WHERE id <> 'admin' ORDER BY id")
      .map((theme) => ({ ...theme, templates: this.templates(theme.id, false) }));
  }

  async exists(themeId: ThemeId): Promise<boolean> {
    return this.queryExists('SELECT 1 FROM theme WHERE id = @themeId', { themeId });
  }

  async findById(themeId: ThemeId): Promise<Theme | undefined> {
    return this.find(themeId, true);
  }

  async findByIdWithoutText(themeId: ThemeId): Promise<Theme | undefined> {
    return this.find(themeId, false);
  }

  async delete(themeId: ThemeId): Promise<DeleteOutcome> {
    return this.inTransaction(() => {
      this.execute('DELETE FROM theme_asset WHERE theme_id = @themeId', { themeId });
      this.execute('DELETE FROM theme_template WHERE theme_id = @themeId', { themeId });
      const deleted = this.execute('DELETE FROM theme WHERE id = @themeId', { themeId });
      return deleted > 0 ? DeleteOutcome.DELETED : DeleteOutcome.NOT_FOUND;
    });
  }

  async save(theme: Theme): Promise<void> {
    this.inTransaction(() => {
      this.execute(
        `INSERT INTO theme (id, name, version) VALUES (@id, @name, @version)
         ON CONFLICT (id) DO UPDATE SET name = excluded.name, version = excluded.version`,
        { id: theme.id, name: theme.name, version: theme.version }
      );
      const { removed, added } = diffTemplates(this.templates(theme.id, true), theme.templates);
      for (const template of removed) {
        this.execute('DELETE FROM theme_template WHERE theme_id = @themeId AND name = @name',
          { themeId: theme.id, name: template.name });
      }
      for (const template of added) {
        this.execute(
          'INSERT INTO theme_template (theme_id, name, template) VALUES (@themeId, @name, @text)',
          { themeId: theme.id, name: template.name, text: template.text }
        );
      }
    });
  }
}
