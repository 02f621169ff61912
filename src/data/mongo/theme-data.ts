/**
 * MongoDB Theme Store
 * @module data/mongo/theme-data
 *
 * Templates are embedded in the theme document.
 */

import type { Document } from 'mongodb';
import type { ThemeId } from '../../types/ids.js';
import { ThemeSchema, type Theme } from '../../types/entities.js';
import { DeleteOutcome, type IThemeData } from '../interfaces.js';
import type { DocumentDatabase } from './collections.js';
import { Collections, MongoStore, toDocument } from './mongo-store.js';

/**
 * MongoDB implementation of {@link IThemeData}
 */
export class MongoThemeData extends MongoStore implements IThemeData {
  constructor(db: DocumentDatabase) {
    super(db, Collections.THEME);
  }

  private toTheme(document: Document, withText: boolean): Theme {
    const theme = this.parse(ThemeSchema, document);
    const templates = [...theme.templates]
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
      .map((template) => (withText ? template : { ...template, text: '' }));
    return { ...theme, templates };
  }

  async all(): Promise<Theme[]> {
    const documents = await this.collection.find({ _id: { $ne: 'admin' } }, { sort: { _id: 1 } });
    return documents.map((document) => this.toTheme(document, false));
  }

  async exists(themeId: ThemeId): Promise<boolean> {
    return (await this.collection.countDocuments({ _id: themeId })) > 0;
  }

  async findById(themeId: ThemeId): Promise<Theme | undefined> {
    const document = await this.collection.findOne({ _id: themeId });
    return document && this.toTheme(document, true);
  }

  async findByIdWithoutText(themeId: ThemeId): Promise<Theme | undefined> {
    const document = await this.collection.findOne({ _id: themeId });
    return document && this.toTheme(document, false);
  }

  async delete(themeId: ThemeId): Promise<DeleteOutcome> {
    await this.db.collection(Collections.THEME_ASSET).deleteMany({ themeId });
    const deleted = await this.collection.deleteOne({ _id: themeId });
    return deleted > 0 ? DeleteOutcome.DELETED : DeleteOutcome.NOT_FOUND;
  }

  async save(theme: Theme): Promise<void> {
    await this.collection.upsert({ _id: theme.id }, toDocument(theme));
  }
}
