/**
 * PostgreSQL Category Store
 * @module data/postgres/category-data
 */

import type pg from 'pg';
import type { CategoryId, WebLogId } from '../../types/ids.js';
import type { Category } from '../../types/entities.js';
import type { DisplayCategory } from '../../types/display.js';
import { CategoryDeleteOutcome, type ICategoryData } from '../interfaces.js';
import { orderByHierarchy, withPostCounts } from '../hierarchy.js';
import { PgStore } from './pg-store.js';

interface CategoryRow {
  id: CategoryId;
  web_log_id: WebLogId;
  name: string;
  slug: string;
  description: string | null;
  parent_id: CategoryId | null;
}

function rowToCategory(row: CategoryRow): Category {
  return {
    id: row.id,
    webLogId: row.web_log_id,
    name: row.name,
    slug: row.slug,
    description: row.description ?? undefined,
    parentId: row.parent_id ?? undefined,
  };
}

function categoryParams(category: Category): unknown[] {
  return [
    category.id,
    category.webLogId,
    category.name,
    category.slug,
    category.description ?? null,
    category.parentId ?? null,
  ];
}

const INSERT = `
  INSERT INTO category (id, web_log_id, name, slug, description, parent_id)
  VALUES ($1, $2, $3, $4, $5, $6)`;

const UPSERT = `${INSERT}
  ON CONFLICT (id) DO UPDATE SET
    web_log_id  = EXCLUDED.web_log_id,
    name        = EXCLUDED.name,
    slug        = EXCLUDED.slug,
    description = EXCLUDED.description,
    parent_id   = EXCLUDED.parent_id`;

/**
 * PostgreSQL implementation of {@link ICategoryData}
 */
export class PgCategoryData extends PgStore implements ICategoryData {
  constructor(pool: pg.Pool) {
    super(pool, 'category');
  }

  async add(category: Category): Promise<void> {
    await this.execute(INSERT, categoryParams(category));
  }

  async countAll(webLogId: WebLogId): Promise<number> {
    return this.queryCount('SELECT COUNT(*) AS count FROM category WHERE web_log_id = $1', [webLogId]);
  }

  async countTopLevel(webLogId: WebLogId): Promise<number> {
    return this.queryCount(
      'SELECT COUNT(*) AS count FROM category WHERE web_log_id = $1 AND parent_id IS NULL',
      [webLogId]
    );
  }

  async findAllForView(webLogId: WebLogId): Promise<DisplayCategory[]> {
    const ordered = orderByHierarchy(await this.findByWebLog(webLogId));
    return withPostCounts(ordered, (categoryIds) => this.queryCount(
      `SELECT COUNT(DISTINCT id) AS count
         FROM post
        WHERE web_log_id = $1
          AND status     = 'Published'
          AND category_ids && $2::text[]`,
      [webLogId, categoryIds]
    ));
  }

  async findById(categoryId: CategoryId, webLogId: WebLogId): Promise<Category | undefined> {
    const row = await this.queryOne<CategoryRow>(
      'SELECT * FROM category WHERE id = $1 AND web_log_id = $2',
      [categoryId, webLogId]
    );
    return row && rowToCategory(row);
  }

  async findByWebLog(webLogId: WebLogId): Promise<Category[]> {
    const rows = await this.queryAll<CategoryRow>(
      'SELECT * FROM category WHERE web_log_id = $1 ORDER BY LOWER(name), id',
      [webLogId]
    );
    return rows.map(rowToCategory);
  }

  async delete(categoryId: CategoryId, webLogId: WebLogId): Promise<CategoryDeleteOutcome> {
    return this.withTransaction(async (client) => {
      const category = await this.queryOne<CategoryRow>(
        'SELECT * FROM category WHERE id = $1 AND web_log_id = $2',
        [categoryId, webLogId],
        { client }
      );
      if (!category) return CategoryDeleteOutcome.NOT_FOUND;

      const moved = await this.execute(
        'UPDATE category SET parent_id = $3 WHERE parent_id = $1 AND web_log_id = $2',
        [categoryId, webLogId, category.parent_id],
        { client }
      );
      await this.execute(
        `UPDATE post SET category_ids = array_remove(category_ids, $1)
          WHERE web_log_id = $2 AND $1 = ANY (category_ids)`,
        [categoryId, webLogId],
        { client }
      );
      await this.execute('DELETE FROM category WHERE id = $1', [categoryId], { client });

      return moved > 0 ? CategoryDeleteOutcome.REASSIGNED_CHILDREN : CategoryDeleteOutcome.DELETED;
    });
  }

  async restore(categories: readonly Category[]): Promise<void> {
    await this.withTransaction(async (client) => {
      for (const category of categories) {
        await this.execute(UPSERT, categoryParams(category), { client });
      }
    });
  }

  async update(category: Category): Promise<void> {
    await this.execute(UPSERT, categoryParams(category));
  }
}
