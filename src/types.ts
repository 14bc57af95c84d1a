/**
 * Core types for duplicate sweeps
 */

/** Archive-assigned identifier, stable across every physical copy of a file. */
export type FileId = string;

export type Decision = 'kept' | 'deleted';

/**
 * One physical copy of a file, as reported by the duplicate index.
 * `directory` is the archive-relative directory (always `/`-separated).
 */
export interface FileInstance {
  fileId: FileId;
  directory: string;
  filename: string;
  size: number;
}

/** A file instance under the swept location that has at least one copy elsewhere. */
export interface DuplicateCandidate extends FileInstance {
  locationCount: number;
}

export interface FileLocation {
  directory: string;
  filename: string;
  size: number;
}

// Tracking store records

export interface ProcessedLocationRecord {
  id: number;
  locationPath: string;
  processedAt: string;
  duplicatesCount: number;
}

export interface ProcessedFileRecord {
  id: number;
  fileId: FileId;
  decision: Decision;
  processedAt: string;
  note: string | null;
  locationPath: string | null;
}

export interface DeletedFileRecord {
  id: number;
  processedFileId: number;
  fileId: FileId;
  locationPath: string;
  fileSize: number;
  deletedAt: string;
  gatewayRef: string | null;
}

export interface ErrorRecord {
  id: number;
  occurredAt: string;
  operation: string;
  fileId: FileId | null;
  message: string;
  context: string | null;
}

/** A successful gateway deletion, as handed to the store. */
export interface DeletedInstance {
  location: string;
  size: number;
  gatewayRef?: string;
}

export interface StoreCounts {
  processedLocations: number;
  processedFiles: number;
  deletedFiles: number;
  errors: number;
}

export interface SyncResult {
  sharedPath: string;
  bytes: number;
  syncedAt: string;
}
