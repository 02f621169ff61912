/**
 * SQLite Category Store
 * @module data/sqlite/category-data
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';
import { CategoryId, WebLogId } from '../../types/ids.js';
import type { Category } from '../../types/entities.js';
import type { DisplayCategory } from '../../types/display.js';
import { CategoryDeleteOutcome, type ICategoryData } from '../interfaces.js';
import { orderByHierarchy, withPostCounts } from '../hierarchy.js';
import { SqliteStore, toNull } from './sqlite-store.js';

const CategoryRow = z.object({
  id: CategoryId,
  web_log_id: WebLogId,
  name: z.string(),
  slug: z.string(),
  description: z.string().nullable(),
  parent_id: CategoryId.nullable(),
}).transform((row): Category => ({
  id: row.id,
  webLogId: row.web_log_id,
  name: row.name,
  slug: row.slug,
  description: row.description ?? undefined,
  parentId: row.parent_id ?? undefined,
}));

const UPSERT = `
  INSERT INTO category (id, web_log_id, name, slug, description, parent_id)
  VALUES (@id, @webLogId, @name, @slug, @description, @parentId)
  ON CONFLICT (id) DO UPDATE SET
    web_log_id  = excluded.web_log_id,
    name        = excluded.name,
    slug        = excluded.slug,
    description = excluded.description,
    parent_id   = excluded.parent_id`;

/**
 * SQLite implementation of {@link ICategoryData}
 */
export class SqliteCategoryData extends SqliteStore implements ICategoryData {
  constructor(db: Database.Database) {
    super(db, 'category');
  }

  private params(category: Category) {
    return {
      id: category.id,
      webLogId: category.webLogId,
      name: category.name,
      slug: category.slug,
      description: toNull(category.description),
      parentId: toNull(category.parentId),
    };
  }

  async add(category: Category): Promise<void> {
    this.execute(
      `INSERT INTO category (id, web_log_id, name, slug, description, parent_id)
       VALUES (@id, @webLogId, @name, @slug, @description, @parentId)`,
      this.params(category)
    );
  }

  async countAll(webLogId: WebLogId): Promise<number> {
    return this.queryCount('SELECT COUNT(*) AS count FROM category WHERE web_log_id = @webLogId', { webLogId });
  }

  async countTopLevel(webLogId: WebLogId): Promise<number> {
    return this.queryCount(
      'SELECT COUNT(*) AS count FROM category WHERE web_log_id = @webLogId AND parent_id IS NULL',
      { webLogId }
    );
  }

  async findAllForView(webLogId: WebLogId): Promise<DisplayCategory[]> {
    const ordered = orderByHierarchy(await this.findByWebLog(webLogId));
    return withPostCounts(ordered, async (categoryIds) => this.queryCount(
      `SELECT COUNT(DISTINCT p.id) AS count
         FROM post p
              INNER JOIN post_category pc ON pc.post_id = p.id
        WHERE p.web_log_id = @webLogId
          AND p.status     = 'Published'
          AND pc.category_id IN (SELECT value FROM json_each(@categoryIds))`,
      { webLogId, categoryIds: JSON.stringify(categoryIds) }
    ));
  }

  async findById(categoryId: CategoryId, webLogId: WebLogId): Promise<Category | undefined> {
    return this.queryOne(CategoryRow,
      'SELECT * FROM category WHERE id = @categoryId AND web_log_id = @webLogId',
      { categoryId, webLogId });
  }

  async findByWebLog(webLogId: WebLogId): Promise<Category[]> {
    return this.queryAll(CategoryRow,
      'SELECT * FROM category WHERE web_log_id = @webLogId ORDER BY LOWER(name), id',
      { webLogId });
  }

  async delete(categoryId: CategoryId, webLogId: WebLogId): Promise<CategoryDeleteOutcome> {
    return this.inTransaction(() => {
      const category = this.queryOne(CategoryRow,
        'SELECT * FROM category WHERE id = @categoryId AND web_log_id = @webLogId',
        { categoryId, webLogId });
      if (!category) return CategoryDeleteOutcome.NOT_FOUND;

      const moved = this.execute(
        `UPDATE category SET parent_id = @parentId
          WHERE parent_id = @categoryId AND web_log_id = @webLogId`,
        { categoryId, webLogId, parentId: toNull(category.parentId) }
      );
      this.execute(
        `DELETE FROM post_category
          WHERE category_id = @categoryId
            AND post_id IN (SELECT id FROM post WHERE web_log_id = @webLogId)`,
        { categoryId, webLogId }
      );
      this.execute('DELETE FROM category WHERE id = @categoryId', { categoryId });

      return moved > 0 ? CategoryDeleteOutcome.REASSIGNED_CHILDREN : CategoryDeleteOutcome.DELETED;
    });
  }

  async restore(categories: readonly Category[]): Promise<void> {
    this.inTransaction(() => {
      for (const category of categories) this.execute(UPSERT, this.params(category));
    });
  }

  async update(category: Category): Promise<void> {
    this.execute(UPSERT, this.params(category));
  }
}
