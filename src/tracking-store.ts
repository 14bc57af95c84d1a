/**
 * Tracking store: the durable record of sweep decisions.
 *
 * The local SQLite file is authoritative. The shared copy on the network
 * location is a mirror: it is copied down when it is newer than the local
 * file, and only ever replaced whole via temp-file-and-rename.
 */

import Database from 'better-sqlite3';
import { copyFileSync, existsSync, rmSync, statSync } from 'fs';
import { open as openFile, rename, rm } from 'fs/promises';
import pLimit from 'p-limit';
import pRetry from 'p-retry';
import { ConsistencyViolationError, StoreAlreadyExistsError, StoreUnavailableError, SyncFailedError } from './errors.js';
import { Logger, errorMessage } from './logger.js';
import { MigrationManager } from './migrations.js';
import type {
  Decision,
  DeletedFileRecord,
  DeletedInstance,
  ErrorRecord,
  FileId,
  ProcessedFileRecord,
  ProcessedLocationRecord,
  StoreCounts,
  SyncResult
} from './types.js';

export interface TrackingStoreOptions {
  localPath: string;
  sharedPath: string;
  /** Extra publish attempts before a sync is reported as failed. */
  syncRetries?: number;
  retryDelayMs?: number;
}

export interface OpenOptions extends TrackingStoreOptions {
  /** Create an empty store when neither copy exists. */
  initialize?: boolean;
  /** Refresh the local copy from the shared one when it is stale. Defaults to true. */
  copyDown?: boolean;
}

/** Anything that can publish itself to the shared location. */
export interface Syncable {
  sync(): Promise<SyncResult>;
}

const SIDE_FILE_SUFFIXES = ['-journal', '-wal', '-shm'];

interface ProcessedFileRow {
  id: number;
  file_id: string;
  decision: Decision;
  processed_at: string;
  note: string | null;
  location_path: string | null;
}

interface DeletedFileRow {
  id: number;
  processed_file_id: number;
  file_id: string;
  location_path: string;
  file_size: number;
  deleted_at: string;
  gateway_ref: string | null;
}

interface ErrorRow {
  id: number;
  occurred_at: string;
  operation: string;
  file_id: string | null;
  message: string;
  context: string | null;
}

interface ProcessedLocationRow {
  id: number;
  location_path: string;
  processed_at: string;
  duplicates_count: number;
}

function now(): string {
  return new Date().toISOString();
}

function removeSideFiles(dbPath: string): void {
  for (const suffix of SIDE_FILE_SUFFIXES) {
    rmSync(`${dbPath}${suffix}`, { force: true });
  }
}

/**
 * Delete a local store file and its side files.
 */
export function removeStoreFiles(dbPath: string): void {
  rmSync(dbPath, { force: true });
  removeSideFiles(dbPath);
}

/**
 * True when the shared copy exists and is newer than the local one
 * (or the local one is missing).
 */
export function isLocalStale(localPath: string, sharedPath: string): boolean {
  if (!existsSync(sharedPath)) return false;
  if (!existsSync(localPath)) return true;
  return statSync(sharedPath).mtimeMs > statSync(localPath).mtimeMs;
}

export class TrackingStore implements Syncable {
  private db: Database.Database;
  private readonly localPath: string;
  private readonly sharedPath: string;
  private readonly syncRetries: number;
  private readonly retryDelayMs: number;
  private readonly publishQueue = pLimit(1);
  private readonly logger = new Logger({ context: 'TrackingStore' });

  private constructor(options: TrackingStoreOptions) {
    this.localPath = options.localPath;
    this.sharedPath = options.sharedPath;
    this.syncRetries = options.syncRetries ?? 2;
    this.retryDelayMs = options.retryDelayMs ?? 500;

    this.db = new Database(this.localPath);
    this.db.pragma('foreign_keys = ON');
    this.db.pragma('synchronous = FULL');
    new MigrationManager(this.db).runPendingMigrations();
  }

  /**
   * Create an empty store at the local path.
   */
  static initialize(options: TrackingStoreOptions): TrackingStore {
    if (existsSync(options.localPath)) {
      throw new StoreAlreadyExistsError(options.localPath);
    }
    const store = new TrackingStore(options);
    store.logger.info('Initialized tracking store', { path: options.localPath });
    return store;
  }

  /**
   * Open the local store, first copying the shared copy down verbatim when
   * the local one is missing or older.
   */
  static open(options: OpenOptions): TrackingStore {
    const logger = new Logger({ context: 'TrackingStore' });
    const localExists = existsSync(options.localPath);
    const sharedExists = existsSync(options.sharedPath);

    if (!localExists && !sharedExists) {
      if (options.initialize) {
        return TrackingStore.initialize(options);
      }
      throw new StoreUnavailableError(options.localPath, options.sharedPath);
    }

    if (options.copyDown !== false && isLocalStale(options.localPath, options.sharedPath)) {
      logger.info('Copying shared tracking store down', {
        from: options.sharedPath,
        to: options.localPath
      });
      // A leftover journal from the previous local copy would be replayed onto the new file.
      removeSideFiles(options.localPath);
      copyFileSync(options.sharedPath, options.localPath);
    } else if (!localExists) {
      throw new StoreUnavailableError(options.localPath, options.sharedPath);
    }

    return new TrackingStore(options);
  }

  isProcessed(fileId: FileId): boolean {
    const row = this.db.prepare('SELECT 1 FROM processed_files WHERE file_id = ?').get(fileId);
    return row !== undefined;
  }

  recordKept(fileId: FileId, note?: string, locationPath?: string): number {
    const write = this.db.transaction(() => this.insertProcessedFile(fileId, 'kept', note, locationPath));
    const id = write();
    this.logger.debug('Recorded kept decision', { fileId });
    return id;
  }

  /**
   * Record a deletion decision together with one row per deleted instance,
   * in a single transaction.
   */
  recordDeleted(fileId: FileId, instances: DeletedInstance[], note?: string, locationPath?: string): number {
    if (instances.length === 0) {
      throw new ConsistencyViolationError(
        `Refusing to mark ${fileId} deleted without any deleted instance`,
        { fileId }
      );
    }

    const insertDeleted = this.db.prepare(`
      INSERT INTO deleted_files (processed_file_id, file_id, location_path, file_size, deleted_at, gateway_ref)
      VALUES (?, ?, ?, ?, ?, ?)
    `);

    const write = this.db.transaction(() => {
      const processedId = this.insertProcessedFile(fileId, 'deleted', note, locationPath);
      const deletedAt = now();
      for (const instance of instances) {
        insertDeleted.run(processedId, fileId, instance.location, instance.size, deletedAt, instance.gatewayRef ?? null);
      }
      return processedId;
    });

    const id = write();
    this.logger.debug('Recorded deleted decision', { fileId, instances: instances.length });
    return id;
  }

  recordError(operation: string, fileId: FileId | null, message: string, context?: string): number {
    const result = this.db.prepare(`
      INSERT INTO errors (occurred_at, operation, file_id, message, context)
      VALUES (?, ?, ?, ?, ?)
    `).run(now(), operation, fileId, message, context ?? null);
    return Number(result.lastInsertRowid);
  }

  recordLocationComplete(locationPath: string, duplicatesCount = 0): number {
    const result = this.db.prepare(`
      INSERT INTO processed_locations (location_path, processed_at, duplicates_count)
      VALUES (?, ?, ?)
    `).run(locationPath, now(), duplicatesCount);
    this.logger.debug('Recorded location complete', { locationPath, duplicatesCount });
    return Number(result.lastInsertRowid);
  }

  /**
   * Publish the store to the shared location.
   *
   * The snapshot is taken synchronously here, so it reflects every mutation
   * applied before the call and none after it. Publishes run one at a time.
   */
  sync(): Promise<SyncResult> {
    const snapshot = this.db.serialize();
    return this.publishQueue(() => this.publish(snapshot));
  }

  private async publish(snapshot: Buffer): Promise<SyncResult> {
    const tempPath = `${this.sharedPath}.${process.pid}.tmp`;

    try {
      await pRetry(
        async () => {
          const handle = await openFile(tempPath, 'w');
          try {
            await handle.writeFile(snapshot);
            await handle.sync();
          } finally {
            await handle.close();
          }
          await rename(tempPath, this.sharedPath);
        },
        {
          retries: this.syncRetries,
          minTimeout: this.retryDelayMs,
          maxTimeout: this.retryDelayMs * 4,
          onFailedAttempt: (error) => {
            this.logger.warn(`Sync attempt ${error.attemptNumber} failed`, {
              error: error.message,
              retriesLeft: error.retriesLeft
            });
          }
        }
      );
    } catch (error) {
      await rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        this.logger.warn('Could not remove temporary sync file', {
          path: tempPath,
          error: errorMessage(cleanupError)
        });
      });
      throw new SyncFailedError(this.sharedPath, errorMessage(error));
    }

    const result: SyncResult = { sharedPath: this.sharedPath, bytes: snapshot.length, syncedAt: now() };
    this.logger.info('Synced tracking store', { sharedPath: this.sharedPath, bytes: snapshot.length });
    return result;
  }

  /**
   * The bytes a sync started now would publish.
   */
  serialize(): Buffer {
    return this.db.serialize();
  }

  getProcessedFile(fileId: FileId): ProcessedFileRecord | undefined {
    const row = this.db.prepare('SELECT * FROM processed_files WHERE file_id = ?').get(fileId) as ProcessedFileRow | undefined;
    return row ? this.mapProcessedFile(row) : undefined;
  }

  listDeletedFiles(fileId?: FileId): DeletedFileRecord[] {
    const rows = (fileId === undefined
      ? this.db.prepare('SELECT * FROM deleted_files ORDER BY id').all()
      : this.db.prepare('SELECT * FROM deleted_files WHERE file_id = ? ORDER BY id').all(fileId)) as DeletedFileRow[];

    return rows.map(row => ({
      id: row.id,
      processedFileId: row.processed_file_id,
      fileId: row.file_id,
      locationPath: row.location_path,
      fileSize: row.file_size,
      deletedAt: row.deleted_at,
      gatewayRef: row.gateway_ref
    }));
  }

  listErrors(): ErrorRecord[] {
    const rows = this.db.prepare('SELECT * FROM errors ORDER BY id').all() as ErrorRow[];
    return rows.map(row => ({
      id: row.id,
      occurredAt: row.occurred_at,
      operation: row.operation,
      fileId: row.file_id,
      message: row.message,
      context: row.context
    }));
  }

  listProcessedLocations(): ProcessedLocationRecord[] {
    const rows = this.db.prepare('SELECT * FROM processed_locations ORDER BY id').all() as ProcessedLocationRow[];
    return rows.map(row => ({
      id: row.id,
      locationPath: row.location_path,
      processedAt: row.processed_at,
      duplicatesCount: row.duplicates_count
    }));
  }

  getCounts(): StoreCounts {
    const count = (table: string): number =>
      (this.db.prepare(`SELECT COUNT(*) as count FROM ${table}`).get() as { count: number }).count;

    return {
      processedLocations: count('processed_locations'),
      processedFiles: count('processed_files'),
      deletedFiles: count('deleted_files'),
      errors: count('errors')
    };
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  private insertProcessedFile(
    fileId: FileId,
    decision: Decision,
    note: string | undefined,
    locationPath: string | undefined
  ): number {
    if (this.isProcessed(fileId)) {
      throw new ConsistencyViolationError(`File ${fileId} is already recorded as processed`, { fileId, decision });
    }
    const result = this.db.prepare(`
      INSERT INTO processed_files (file_id, decision, processed_at, note, location_path)
      VALUES (?, ?, ?, ?, ?)
    `).run(fileId, decision, now(), note ?? null, locationPath ?? null);
    return Number(result.lastInsertRowid);
  }

  private mapProcessedFile(row: ProcessedFileRow): ProcessedFileRecord {
    return {
      id: row.id,
      fileId: row.file_id,
      decision: row.decision,
      processedAt: row.processed_at,
      note: row.note,
      locationPath: row.location_path
    };
  }
}
