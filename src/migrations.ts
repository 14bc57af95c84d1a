/**
 * Schema versioning for the tracking store
 */

import type Database from 'better-sqlite3';
import { Logger } from './logger.js';

export interface Migration {
  version: number;
  name: string;
  up: (db: Database.Database) => void;
}

const logger = new Logger({ context: 'MigrationManager' });

export const TRACKING_MIGRATIONS: Migration[] = [
  {
    version: 1,
    name: 'create_tracking_tables',
    up: (db) => {
      db.exec(`
        CREATE TABLE IF NOT EXISTS processed_locations (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          location_path TEXT NOT NULL,
          processed_at TEXT NOT NULL,
          duplicates_count INTEGER NOT NULL DEFAULT 0
        );

        CREATE TABLE IF NOT EXISTS processed_files (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          file_id TEXT UNIQUE NOT NULL,
          decision TEXT NOT NULL CHECK (decision IN ('kept', 'deleted')),
          processed_at TEXT NOT NULL,
          note TEXT,
          location_path TEXT
        );

        CREATE TABLE IF NOT EXISTS deleted_files (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          processed_file_id INTEGER NOT NULL,
          file_id TEXT NOT NULL,
          location_path TEXT NOT NULL,
          file_size INTEGER NOT NULL,
          deleted_at TEXT NOT NULL,
          gateway_ref TEXT,
          FOREIGN KEY (processed_file_id) REFERENCES processed_files(id)
        );

        CREATE TABLE IF NOT EXISTS errors (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          occurred_at TEXT NOT NULL,
          operation TEXT NOT NULL,
          file_id TEXT,
          message TEXT NOT NULL,
          context TEXT
        );
      `);
    }
  },
  {
    version: 2,
    name: 'index_lookups',
    up: (db) => {
      db.exec(`
        CREATE INDEX IF NOT EXISTS idx_deleted_files_file_id ON deleted_files(file_id);
        CREATE INDEX IF NOT EXISTS idx_processed_locations_path ON processed_locations(location_path);
      `);
    }
  }
];

export class MigrationManager {
  private db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
    this.ensureMigrationsTable();
  }

  private ensureMigrationsTable(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        version INTEGER PRIMARY KEY,
        name TEXT NOT NULL,
        executed_at TEXT NOT NULL
      )
    `);
  }

  /**
   * Get the current schema version
   */
  getCurrentVersion(): number {
    const result = this.db.prepare(`
      SELECT MAX(version) as version FROM schema_migrations
    `).get() as { version: number | null };

    return result.version ?? 0;
  }

  /**
   * Run all pending migrations, each in its own transaction.
   * Returns the number of migrations applied.
   */
  runPendingMigrations(migrations: Migration[] = TRACKING_MIGRATIONS): number {
    const currentVersion = this.getCurrentVersion();
    const pending = migrations
      .filter(m => m.version > currentVersion)
      .sort((a, b) => a.version - b.version);

    if (pending.length === 0) {
      logger.debug('No pending migrations', { currentVersion });
      return 0;
    }

    logger.info(`Running ${pending.length} migrations`, {
      from: currentVersion,
      to: pending[pending.length - 1].version
    });

    for (const migration of pending) {
      try {
        const transaction = this.db.transaction(() => {
          migration.up(this.db);
          this.db.prepare(`
            INSERT INTO schema_migrations (version, name, executed_at)
            VALUES (?, ?, ?)
          `).run(migration.version, migration.name, new Date().toISOString());
        });

        transaction();
        logger.debug(`Migration ${migration.version}: ${migration.name} applied`);
      } catch (error) {
        logger.error(
          `Migration ${migration.version} failed`,
          error instanceof Error ? error : new Error(String(error))
        );
        throw error;
      }
    }

    return pending.length;
  }
}
