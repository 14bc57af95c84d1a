import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import Database from 'better-sqlite3';
import { MigrationManager, TRACKING_MIGRATIONS, type Migration } from './migrations.js';

describe('MigrationManager', () => {
  let db: Database.Database;

  beforeEach(() => {
    db = new Database(':memory:');
  });

  afterEach(() => {
    db.close();
  });

  it('starts at version 0', () => {
    expect(new MigrationManager(db).getCurrentVersion()).toBe(0);
  });

  it('applies every tracking migration once', () => {
    const manager = new MigrationManager(db);
    expect(manager.runPendingMigrations()).toBe(TRACKING_MIGRATIONS.length);
    expect(manager.getCurrentVersion()).toBe(2);
    expect(manager.runPendingMigrations()).toBe(0);

    const tables = db
      .prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name")
      .all()
      .map(row => (row as { name: string }).name);
    expect(tables).toEqual(['deleted_files', 'errors', 'processed_files', 'processed_locations', 'schema_migrations']);
  });

  it('rolls back a failing migration and keeps the earlier ones', () => {
    const migrations: Migration[] = [
      { version: 1, name: 'one', up: (conn) => conn.exec('CREATE TABLE one (id INTEGER)') },
      {
        version: 2,
        name: 'two',
        up: (conn) => {
          conn.exec('CREATE TABLE two (id INTEGER)');
          conn.exec('INSERT INTO missing_table VALUES (1)');
        }
      }
    ];
    const manager = new MigrationManager(db);

    expect(() => manager.runPendingMigrations(migrations)).toThrow(/no such table/);
    expect(manager.getCurrentVersion()).toBe(1);
    expect(db.prepare("SELECT name FROM sqlite_master WHERE name = 'two'").get()).toBeUndefined();
  });
});
