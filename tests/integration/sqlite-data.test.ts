/**
 * SQLite Backend Integration Tests
 * @module tests/integration/sqlite-data.test
 *
 * Runs the persistence contract against an in-memory SQLite database.
 */

import { describe, expect, it } from 'vitest';
import Database from 'better-sqlite3';
import { SqliteData, SQLITE_TABLES } from '../../src/data/sqlite/index.js';
import { describeDataContract } from './data-contract.js';
import { createCategory, createPost, createTheme, createUser, createWebLog } from '../factories/index.js';

describeDataContract('sqlite', async () => SqliteData.open({ filename: ':memory:' }));

describe('SqliteData.startUp', () => {
  const tableNames = (db: Database.Database): string[] =>
    db.prepare("SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name")
      .pluck()
      .all()
      .filter((name): name is string => typeof name === 'string');

  it('creates every table on an empty database', async () => {
    const db = new Database(':memory:');
    const data = new SqliteData(db);

    await data.startUp();

    expect(tableNames(db)).toEqual(SQLITE_TABLES.map((table) => table.name).sort());
    await data.close();
  });

  it('leaves existing tables alone when run again', async () => {
    const db = new Database(':memory:');
    const data = new SqliteData(db);
    await data.startUp();
    db.prepare("INSERT INTO theme (id, name, version) VALUES ('default', 'Default', '1')").run();

    await data.startUp();

    expect(db.prepare('SELECT COUNT(*) FROM theme').pluck().get()).toBe(1);
    await data.close();
  });
});

describe('SqliteData child rows', () => {
  it('touches only the category and permalink rows that changed', async () => {
    const db = new Database(':memory:');
    const data = new SqliteData(db);
    await data.startUp();
    await data.theme.save(createTheme());
    await data.webLog.add(createWebLog());
    await data.webLogUser.add(createUser());
    const [a, b, c] = [createCategory('cat-a', 'A'), createCategory('cat-b', 'B'), createCategory('cat-c', 'C')];
    await data.category.restore([a, b, c]);
    const rows = (table: string, column: string) =>
      db.prepare(`SELECT rowid AS row, ${column} AS value FROM ${table} ORDER BY ${column}`).all();

    await data.post.add(createPost('p1', { categoryIds: [a.id, b.id], priorPermalinks: ['one.html', 'two.html'] }));
    await data.post.update(createPost('p1', { categoryIds: [b.id, c.id], priorPermalinks: ['two.html'] }));

    expect(rows('post_category', 'category_id')).toEqual([{ row: 2, value: 'cat-b' }, { row: 3, value: 'cat-c' }]);
    expect(rows('post_permalink', 'permalink')).toEqual([{ row: 2, value: 'two.html' }]);
    await data.close();
  });
});
