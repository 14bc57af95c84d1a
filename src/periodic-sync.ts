/**
 * Background publisher: syncs the tracking store on a fixed interval while
 * the operator works, so a crash loses at most one interval of decisions.
 */

import { ConfigurationError } from './errors.js';
import { Logger } from './logger.js';
import type { Syncable } from './tracking-store.js';

export const DEFAULT_SYNC_INTERVAL_MS = 10 * 60 * 1000;

/** Largest delay setInterval honours; anything above fires after 1 ms. */
export const MAX_SYNC_INTERVAL_MS = 2147483647;

export interface PeriodicSyncOptions {
  target: Syncable;
  intervalMs?: number;
  onError?: (error: unknown) => void;
}

export class PeriodicSyncTimer {
  private readonly target: Syncable;
  private readonly intervalMs: number;
  private readonly onError: (error: unknown) => void;
  private handle: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;
  private completed = 0;
  private readonly logger = new Logger({ context: 'PeriodicSync' });

  constructor(options: PeriodicSyncOptions) {
    this.target = options.target;
    this.intervalMs = options.intervalMs ?? DEFAULT_SYNC_INTERVAL_MS;
    if (!(this.intervalMs >= 1 && this.intervalMs <= MAX_SYNC_INTERVAL_MS)) {
      throw new ConfigurationError([`sync interval must be between 1 and ${MAX_SYNC_INTERVAL_MS} ms, got ${this.intervalMs}`]);
    }
    this.onError = options.onError ?? (() => undefined);
  }

  start(): void {
    if (this.handle) return;
    this.handle = setInterval(() => this.tick(), this.intervalMs);
    this.handle.unref();
    this.logger.debug('Periodic sync started', { intervalMs: this.intervalMs });
  }

  /**
   * Stop scheduling. Resolves once a sync already under way has finished.
   */
  async stop(): Promise<void> {
    if (this.handle) {
      clearInterval(this.handle);
      this.handle = null;
      this.logger.debug('Periodic sync stopped', { completed: this.completed });
    }
    if (this.inFlight) {
      await this.inFlight;
    }
  }

  isRunning(): boolean {
    return this.handle !== null;
  }

  getCompletedCount(): number {
    return this.completed;
  }

  private tick(): void {
    // A slow share must not pile up overlapping publishes.
    if (this.inFlight) {
      this.logger.debug('Previous sync still running, skipping tick');
      return;
    }

    this.inFlight = this.target
      .sync()
      .then(() => {
        this.completed += 1;
      })
      .catch((error: unknown) => {
        try {
          this.onError(error);
        } catch (handlerError) {
          this.logger.error(
            'Sync error handler threw',
            handlerError instanceof Error ? handlerError : new Error(String(handlerError))
          );
        }
      })
      .finally(() => {
        this.inFlight = null;
      });
  }
}
