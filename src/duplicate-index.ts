/**
 * Duplicate index: answers which files under a directory have copies
 * elsewhere in the archive, and where every copy of a file lives.
 */

import pg from 'pg';
import { QueryFailureError } from './errors.js';
import { Logger, errorMessage } from './logger.js';
import type { DuplicateCandidate, FileId, FileLocation } from './types.js';

export interface DuplicateIndex {
  findDuplicatesUnder(directory: string): Promise<DuplicateCandidate[]>;
  findAllLocations(fileId: FileId): Promise<FileLocation[]>;
  close(): Promise<void>;
}

/** The slice of a pg client or pool this index needs. */
export interface Queryable {
  query(text: string, params?: unknown[]): Promise<{ rows: unknown[] }>;
  end?(): Promise<void>;
}

export interface ArchiveDatabaseConfig {
  host: string;
  port: number;
  name: string;
  user: string;
  password: string;
}

const FIND_DUPLICATES_SQL = `
  WITH counts AS (
    SELECT file_id, COUNT(*) AS loc_count
    FROM file_locations
    WHERE file_id IN (
      SELECT file_id FROM file_locations WHERE file_server_directories = $1
    )
    GROUP BY file_id
  )
  SELECT
    fl.file_id AS file_id,
    fl.file_server_directories AS directory,
    fl.filename AS filename,
    f.size AS size,
    c.loc_count AS loc_count
  FROM file_locations fl
  JOIN files f ON f.id = fl.file_id
  JOIN counts c ON c.file_id = fl.file_id
  WHERE fl.file_server_directories = $1
    AND c.loc_count > 1
  ORDER BY fl.filename
`;

const FIND_ALL_LOCATIONS_SQL = `
  SELECT
    fl.file_server_directories AS directory,
    fl.filename AS filename,
    f.size AS size
  FROM file_locations fl
  JOIN files f ON f.id = fl.file_id
  WHERE fl.file_id = $1
  ORDER BY fl.file_server_directories, fl.filename
`;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function readString(row: Record<string, unknown>, key: string, operation: string): string {
  const value = row[key];
  if (typeof value === 'string') return value;
  throw new QueryFailureError(operation, `column "${key}" is not text`);
}

// int8 and numeric columns arrive from pg as strings
function readCount(row: Record<string, unknown>, key: string, operation: string): number {
  const value = row[key];
  const parsed = typeof value === 'string' ? Number(value) : value;
  if (typeof parsed === 'number' && Number.isFinite(parsed) && parsed >= 0) return parsed;
  throw new QueryFailureError(operation, `column "${key}" is not a non-negative number`);
}

function readFileId(row: Record<string, unknown>, operation: string): FileId {
  const value = row.file_id;
  if (typeof value === 'string' && value.length > 0) return value;
  if (typeof value === 'number' && Number.isInteger(value)) return String(value);
  throw new QueryFailureError(operation, 'column "file_id" is missing');
}

export function parseDuplicateRow(row: unknown): DuplicateCandidate {
  const operation = 'findDuplicatesUnder';
  if (!isRecord(row)) {
    throw new QueryFailureError(operation, 'row is not an object');
  }
  return {
    fileId: readFileId(row, operation),
    directory: readString(row, 'directory', operation),
    filename: readString(row, 'filename', operation),
    size: readCount(row, 'size', operation),
    locationCount: readCount(row, 'loc_count', operation)
  };
}

export function parseLocationRow(row: unknown): FileLocation {
  const operation = 'findAllLocations';
  if (!isRecord(row)) {
    throw new QueryFailureError(operation, 'row is not an object');
  }
  return {
    directory: readString(row, 'directory', operation),
    filename: readString(row, 'filename', operation),
    size: readCount(row, 'size', operation)
  };
}

/**
 * Duplicate index backed by the archive's Postgres database.
 */
export class PostgresDuplicateIndex implements DuplicateIndex {
  private readonly client: Queryable;
  private readonly logger = new Logger({ context: 'DuplicateIndex' });

  constructor(client: Queryable) {
    this.client = client;
  }

  static connect(config: ArchiveDatabaseConfig): PostgresDuplicateIndex {
    const pool = new pg.Pool({
      host: config.host,
      port: config.port,
      database: config.name,
      user: config.user,
      password: config.password,
      max: 2
    });
    return new PostgresDuplicateIndex(pool);
  }

  async findDuplicatesUnder(directory: string): Promise<DuplicateCandidate[]> {
    const rows = await this.run('findDuplicatesUnder', FIND_DUPLICATES_SQL, [directory]);
    const candidates = rows.map(parseDuplicateRow);
    this.logger.debug('Duplicate query complete', { directory, instances: candidates.length });
    return candidates;
  }

  async findAllLocations(fileId: FileId): Promise<FileLocation[]> {
    const rows = await this.run('findAllLocations', FIND_ALL_LOCATIONS_SQL, [fileId]);
    return rows.map(parseLocationRow);
  }

  async close(): Promise<void> {
    if (this.client.end) {
      await this.client.end();
    }
  }

  private async run(operation: string, sql: string, params: unknown[]): Promise<unknown[]> {
    try {
      const result = await this.client.query(sql, params);
      return result.rows;
    } catch (error) {
      throw new QueryFailureError(operation, errorMessage(error));
    }
  }
}
