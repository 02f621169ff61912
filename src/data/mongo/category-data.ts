/**
 * MongoDB Category Store
 * @module data/mongo/category-data
 */

import type { CategoryId, WebLogId } from '../../types/ids.js';
import { CategorySchema, type Category } from '../../types/entities.js';
import type { DisplayCategory } from '../../types/display.js';
import { CategoryDeleteOutcome, type ICategoryData } from '../interfaces.js';
import { orderByHierarchy, withPostCounts } from '../hierarchy.js';
import type { DocumentDatabase } from './collections.js';
import { Collections, MongoStore, toDocument } from './mongo-store.js';

/** Categories carry a lower-cased name to sort on */
function categoryDocument(category: Category) {
  return { ...toDocument(category), nameSort: category.name.toLowerCase() };
}

/**
 * MongoDB implementation of {@link ICategoryData}
 */
export class MongoCategoryData extends MongoStore implements ICategoryData {
  constructor(db: DocumentDatabase) {
    super(db, Collections.CATEGORY);
  }

  async add(category: Category): Promise<void> {
    await this.collection.insertOne(categoryDocument(category));
  }

  async countAll(webLogId: WebLogId): Promise<number> {
    return this.collection.countDocuments({ webLogId });
  }

  async countTopLevel(webLogId: WebLogId): Promise<number> {
    return this.collection.countDocuments({ webLogId, parentId: { $exists: false } });
  }

  async findAllForView(webLogId: WebLogId): Promise<DisplayCategory[]> {
    const posts = this.db.collection(Collections.POST);
    const ordered = orderByHierarchy(await this.findByWebLog(webLogId));
    return withPostCounts(ordered, (categoryIds) => posts.countDocuments({
      webLogId,
      status: 'Published',
      categoryIds: { $in: [...categoryIds] },
    }));
  }

  async findById(categoryId: CategoryId, webLogId: WebLogId): Promise<Category | undefined> {
    const document = await this.collection.findOne({ _id: categoryId, webLogId });
    return document && this.parse(CategorySchema, document);
  }

  async findByWebLog(webLogId: WebLogId): Promise<Category[]> {
    const documents = await this.collection.find({ webLogId }, { sort: { nameSort: 1, _id: 1 } });
    return this.parseAll(CategorySchema, documents);
  }

  async delete(categoryId: CategoryId, webLogId: WebLogId): Promise<CategoryDeleteOutcome> {
    const category = await this.findById(categoryId, webLogId);
    if (!category) return CategoryDeleteOutcome.NOT_FOUND;

    const moved = await this.collection.updateMany(
      { webLogId, parentId: categoryId },
      category.parentId ? { $set: { parentId: category.parentId } } : { $unset: { parentId: '' } }
    );
    await this.db.collection(Collections.POST).updateMany(
      { webLogId, categoryIds: categoryId },
      { $pull: { categoryIds: categoryId } }
    );
    await this.collection.deleteOne({ _id: categoryId });

    return moved > 0 ? CategoryDeleteOutcome.REASSIGNED_CHILDREN : CategoryDeleteOutcome.DELETED;
  }

  async restore(categories: readonly Category[]): Promise<void> {
    for (const category of categories) {
      await this.collection.upsert({ _id: category.id }, categoryDocument(category));
    }
  }

  async update(category: Category): Promise<void> {
    await this.collection.upsert({ _id: category.id }, categoryDocument(category));
  }
}
