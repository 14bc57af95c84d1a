/**
 * Error taxonomy for sweeps and the tracking store
 */

import { AppError } from './logger.js';

export type SweepErrorCode =
  | 'STORE_UNAVAILABLE'
  | 'ALREADY_EXISTS'
  | 'SYNC_FAILED'
  | 'GATEWAY_FAILURE'
  | 'QUERY_FAILURE'
  | 'CONSISTENCY_VIOLATION'
  | 'INVALID_PATH'
  | 'CONFIGURATION_ERROR';

/** Neither a local nor a shared tracking store exists. Fatal at startup. */
export class StoreUnavailableError extends AppError {
  constructor(localPath: string, sharedPath: string) {
    super(
      `No tracking store found locally (${localPath}) or at the shared location (${sharedPath}). Run init-db first.`,
      'STORE_UNAVAILABLE',
      503,
      { localPath, sharedPath }
    );
    this.name = 'StoreUnavailableError';
  }
}

export class StoreAlreadyExistsError extends AppError {
  constructor(path: string) {
    super(`A tracking store already exists at ${path}`, 'ALREADY_EXISTS', 409, { path });
    this.name = 'StoreAlreadyExistsError';
  }
}

/** Publishing to the shared location failed. The local store is still authoritative. */
export class SyncFailedError extends AppError {
  constructor(sharedPath: string, cause: string) {
    super(`Sync to ${sharedPath} failed: ${cause}`, 'SYNC_FAILED', 503, { sharedPath, cause });
    this.name = 'SyncFailedError';
  }
}

export class GatewayFailureError extends AppError {
  constructor(path: string, cause: string) {
    super(`Deletion request for ${path} failed: ${cause}`, 'GATEWAY_FAILURE', 502, { path, cause });
    this.name = 'GatewayFailureError';
  }
}

export class QueryFailureError extends AppError {
  constructor(operation: string, cause: string) {
    super(`Duplicate index ${operation} failed: ${cause}`, 'QUERY_FAILURE', 502, { operation, cause });
    this.name = 'QueryFailureError';
  }
}

/** Programming error: a tracking write that would break the store's invariants. */
export class ConsistencyViolationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONSISTENCY_VIOLATION', 500, context);
    this.name = 'ConsistencyViolationError';
  }
}

export class InvalidPathError extends AppError {
  constructor(path: string, reason: string) {
    super(`Invalid path "${path}": ${reason}`, 'INVALID_PATH', 400, { path, reason });
    this.name = 'InvalidPathError';
  }
}

export class ConfigurationError extends AppError {
  constructor(public readonly problems: string[]) {
    super(`Invalid configuration:\n  - ${problems.join('\n  - ')}`, 'CONFIGURATION_ERROR', 500, { problems });
    this.name = 'ConfigurationError';
  }
}

export function isAppErrorCode(error: unknown, code: SweepErrorCode): error is AppError {
  return error instanceof AppError && error.code === code;
}
