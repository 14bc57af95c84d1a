/**
 * Sweep session: one interactive deduplication pass over a single location.
 *
 * Query -> filter -> drop already-processed -> group by file id, then for
 * each group: present, await a decision, execute it, record the outcome.
 * A periodic sync runs alongside; a final sync always runs at the end.
 */

import { COMMAND_HELP, isConfirmation, outOfRange, parseCommand } from './commands.js';
import type { DeletionGateway, DeletionResult } from './deletion-gateway.js';
import type { DuplicateIndex } from './duplicate-index.js';
import { GatewayFailureError, QueryFailureError, SyncFailedError } from './errors.js';
import type { FileInspector } from './file-inspector.js';
import type { FilterPipeline } from './filters.js';
import { Logger, errorMessage } from './logger.js';
import type { OperatorConsole } from './operator-console.js';
import { toArchivePath, toOperatorPath } from './path-translator.js';
import { DEFAULT_SYNC_INTERVAL_MS, PeriodicSyncTimer } from './periodic-sync.js';
import { renderDeletionPlan, renderGroup, type PresentedInstance } from './sweep-render.js';
import type { DeletedInstance, DuplicateCandidate, FileId, FileLocation, SyncResult } from './types.js';

export type SessionState =
  | 'Start'
  | 'Querying'
  | 'Done'
  | 'GroupLoop'
  | 'Presenting'
  | 'AwaitingDecision'
  | 'Confirming'
  | 'Executing'
  | 'Recording'
  | 'FinalSync'
  | 'Terminated';

export type SweepOutcome = 'completed' | 'quit' | 'empty';

export interface SweepSummary {
  location: string;
  outcome: SweepOutcome;
  groups: number;
  kept: number;
  deleted: number;
  skipped: number;
  /** Groups abandoned because their locations could not be fetched. */
  aborted: number;
  failedDeletions: number;
  synced: boolean;
}

/** The tracking operations a session performs. */
export interface SweepTracking {
  isProcessed(fileId: FileId): boolean;
  recordKept(fileId: FileId, note?: string, locationPath?: string): number;
  recordDeleted(fileId: FileId, instances: DeletedInstance[], note?: string, locationPath?: string): number;
  recordError(operation: string, fileId: FileId | null, message: string, context?: string): number;
  recordLocationComplete(locationPath: string, duplicatesCount?: number): number;
  sync(): Promise<SyncResult>;
}

export interface SweepSessionOptions {
  store: SweepTracking;
  index: DuplicateIndex;
  gateway: DeletionGateway;
  filters: FilterPipeline;
  console: OperatorConsole;
  inspector: FileInspector;
  /** Operator-side mount point of the archive share. */
  mount: string;
  syncIntervalMs?: number;
}

type GroupOutcome = 'kept' | 'deleted' | 'unchanged' | 'skipped' | 'quit';

export class SweepSession {
  private readonly store: SweepTracking;
  private readonly index: DuplicateIndex;
  private readonly gateway: DeletionGateway;
  private readonly filters: FilterPipeline;
  private readonly console: OperatorConsole;
  private readonly inspector: FileInspector;
  private readonly mount: string;
  private readonly timer: PeriodicSyncTimer;
  private readonly logger = new Logger({ context: 'SweepSession' });
  private state: SessionState = 'Start';

  constructor(options: SweepSessionOptions) {
    this.store = options.store;
    this.index = options.index;
    this.gateway = options.gateway;
    this.filters = options.filters;
    this.console = options.console;
    this.inspector = options.inspector;
    this.mount = options.mount;
    this.timer = new PeriodicSyncTimer({
      target: this.store,
      intervalMs: options.syncIntervalMs ?? DEFAULT_SYNC_INTERVAL_MS,
      onError: (error) => this.handleSyncError(error, 'periodic')
    });
  }

  getState(): SessionState {
    return this.state;
  }

  async run(operatorLocation: string): Promise<SweepSummary> {
    if (this.state !== 'Start') {
      throw new Error('A sweep session runs only once');
    }

    const directory = toArchivePath(operatorLocation, this.mount);
    const summary: SweepSummary = {
      location: directory,
      outcome: 'empty',
      groups: 0,
      kept: 0,
      deleted: 0,
      skipped: 0,
      aborted: 0,
      failedDeletions: 0,
      synced: false
    };

    try {
      this.transition('Querying');
      this.console.print(`Querying for duplicates in: ${directory}`);
      const groups = await this.collectGroups(directory);
      summary.groups = groups.size;

      if (groups.size === 0) {
        this.transition('Done');
        this.console.print('No duplicate files left to review in this location.');
        this.store.recordLocationComplete(directory, 0);
      } else {
        this.console.print(`Ready to review ${groups.size} unique files.`);
        this.timer.start();
        const quit = await this.reviewGroups(directory, groups, summary);
        summary.outcome = quit ? 'quit' : 'completed';
        if (!quit) {
          this.console.print('All files in location processed.');
          this.store.recordLocationComplete(directory, groups.size);
        }
      }
    } catch (error) {
      this.logger.error('Sweep aborted', error instanceof Error ? error : new Error(String(error)));
      this.recordFailure('sweep', null, error, directory);
      await this.finish(summary);
      throw error;
    }

    await this.finish(summary);
    return summary;
  }

  private async collectGroups(directory: string): Promise<Map<FileId, DuplicateCandidate[]>> {
    const candidates = await this.index.findDuplicatesUnder(directory);
    this.console.print(`Found ${candidates.length} duplicate file instances.`);

    const filtered = this.filters.apply(candidates);
    this.console.print(`After filtering: ${filtered.length} file instances to review.`);

    const unprocessed = filtered.filter(candidate => !this.store.isProcessed(candidate.fileId));
    this.console.print(`Unprocessed: ${unprocessed.length} instances.`);

    const groups = new Map<FileId, DuplicateCandidate[]>();
    for (const candidate of unprocessed) {
      const group = groups.get(candidate.fileId);
      if (group) {
        group.push(candidate);
      } else {
        groups.set(candidate.fileId, [candidate]);
      }
    }
    return groups;
  }

  /**
   * Returns true when the operator quit before the last group.
   */
  private async reviewGroups(
    directory: string,
    groups: Map<FileId, DuplicateCandidate[]>,
    summary: SweepSummary
  ): Promise<boolean> {
    const fileIds = [...groups.keys()];

    for (let i = 0; i < fileIds.length; i += 1) {
      this.transition('GroupLoop');
      const fileId = fileIds[i];

      let locations: FileLocation[];
      try {
        locations = await this.index.findAllLocations(fileId);
      } catch (error) {
        if (!(error instanceof QueryFailureError)) throw error;
        this.recordFailure('locations', fileId, error, directory);
        this.console.print(`Could not load locations for file ${fileId}: ${error.message}`);
        summary.aborted += 1;
        continue;
      }

      if (locations.length < 2) {
        this.console.print(`File ${fileId} is no longer duplicated; skipping.`);
        summary.skipped += 1;
        continue;
      }

      const instances = this.present(locations, directory);
      const outcome = await this.decide(fileId, instances, directory, { current: i + 1, total: fileIds.length }, summary);

      switch (outcome) {
        case 'quit':
          this.console.print('Quitting; remaining files stay unreviewed.');
          return true;
        case 'kept':
          summary.kept += 1;
          break;
        case 'deleted':
          summary.deleted += 1;
          break;
        case 'skipped':
          summary.skipped += 1;
          break;
        case 'unchanged':
          break;
      }
    }

    return false;
  }

  private present(locations: FileLocation[], directory: string): PresentedInstance[] {
    return locations.map((location, position) => ({
      index: position + 1,
      directory: location.directory,
      filename: location.filename,
      size: location.size,
      path: toOperatorPath(this.mount, location.directory, location.filename),
      underSweepLocation: location.directory === directory
    }));
  }

  private async decide(
    fileId: FileId,
    instances: PresentedInstance[],
    directory: string,
    position: { current: number; total: number },
    summary: SweepSummary
  ): Promise<GroupOutcome> {
    let showTable = true;

    for (;;) {
      if (showTable) {
        this.transition('Presenting');
        this.console.print();
        renderGroup(fileId, instances, position).forEach(line => this.console.print(line));
        showTable = false;
      }

      this.transition('AwaitingDecision');
      this.console.print('Commands:');
      COMMAND_HELP.forEach(line => this.console.print(line));
      const answer = await this.console.prompt('Your choice: ');
      if (answer === null) {
        return 'quit';
      }

      const command = parseCommand(answer);
      switch (command.type) {
        case 'invalid':
          this.console.print(command.reason);
          continue;

        case 'quit':
          return 'quit';

        case 'skip':
          this.console.print('Skipping this file.');
          return 'skipped';

        case 'keep':
          this.transition('Recording');
          this.store.recordKept(fileId, command.note, directory);
          this.console.print('Marked as processed (all copies kept).');
          return 'kept';

        case 'open': {
          if (outOfRange([command.index], instances.length).length > 0) {
            this.console.print(`Invalid file number: ${command.index}`);
            continue;
          }
          const target = instances[command.index - 1];
          this.console.print(`Opening file: ${target.path}`);
          const opened = await this.inspector.open(target.path);
          this.console.print(opened ? 'File opened.' : 'Failed to open file.');
          showTable = true;
          continue;
        }

        case 'delete': {
          const invalid = outOfRange(command.indices, instances.length);
          if (invalid.length > 0) {
            this.console.print(`Invalid file number(s): ${invalid.join(', ')}. Choose between 1 and ${instances.length}.`);
            continue;
          }

          const selected = command.indices.map(index => instances[index - 1]);
          this.transition('Confirming');
          renderDeletionPlan(selected, instances.length).forEach(line => this.console.print(line));
          const confirmation = await this.console.prompt('Confirm deletion? (yes/no): ');
          if (!isConfirmation(confirmation)) {
            this.console.print('Deletion cancelled.');
            continue;
          }

          return this.executeDeletion(fileId, selected, instances.length, directory, summary);
        }
      }
    }
  }

  /**
   * One gateway call per selected instance. Failures are recorded and do not
   * stop the remaining calls. The decision is recorded only if something
   * was actually deleted.
   */
  private async executeDeletion(
    fileId: FileId,
    selected: PresentedInstance[],
    groupSize: number,
    directory: string,
    summary: SweepSummary
  ): Promise<GroupOutcome> {
    this.transition('Executing');
    const deleted: DeletedInstance[] = [];

    for (const instance of selected) {
      this.console.print(`Deleting: ${instance.path}`);
      const result = await this.requestDeletion(fileId, instance.path);

      if (result.success) {
        deleted.push({ location: instance.path, size: instance.size, gatewayRef: result.reference });
        this.console.print('Deletion task enqueued.');
      } else {
        const failure = new GatewayFailureError(instance.path, result.errorMessage);
        this.logger.warn(failure.message, { fileId });
        this.store.recordError('delete', fileId, result.errorMessage, instance.path);
        summary.failedDeletions += 1;
        this.console.print(`Error enqueuing deletion: ${result.errorMessage}`);
      }
    }

    this.transition('Recording');
    if (deleted.length === 0) {
      this.console.print('No instance was deleted; this file stays eligible for review.');
      return 'unchanged';
    }

    const note = `deleted ${deleted.length} of ${groupSize} instances`;
    this.store.recordDeleted(fileId, deleted, note, directory);
    this.console.print(`File processed (${note}).`);
    return 'deleted';
  }

  private async requestDeletion(fileId: FileId, path: string): Promise<DeletionResult> {
    try {
      return await this.gateway.requestDeletion(fileId, path);
    } catch (error) {
      return { success: false, errorMessage: errorMessage(error) };
    }
  }

  private async finish(summary: SweepSummary): Promise<void> {
    await this.timer.stop();

    this.transition('FinalSync');
    this.console.print('Syncing tracking store...');
    summary.synced = await this.syncNow();

    try {
      await this.inspector.cleanup();
    } catch (error) {
      this.logger.warn('Could not remove inspection copies', { error: errorMessage(error) });
    }

    this.transition('Terminated');
    this.console.print(summary.synced ? 'Sweep complete.' : 'Sweep complete; the shared copy was not updated.');
  }

  private async syncNow(): Promise<boolean> {
    try {
      await this.store.sync();
      return true;
    } catch (error) {
      this.handleSyncError(error, 'final');
      return false;
    }
  }

  private handleSyncError(error: unknown, trigger: 'periodic' | 'final'): void {
    const message = errorMessage(error);
    if (error instanceof SyncFailedError) {
      this.logger.warn(`${trigger} sync failed; local store remains authoritative`, { error: message });
    } else {
      this.logger.error(`${trigger} sync failed`, error instanceof Error ? error : new Error(message));
    }
    this.recordFailure('sync', null, error, trigger);
    if (trigger === 'final') {
      this.console.print(`Sync failed: ${message}`);
    }
  }

  private recordFailure(operation: string, fileId: FileId | null, error: unknown, context: string): void {
    try {
      this.store.recordError(operation, fileId, errorMessage(error), context);
    } catch (recordError) {
      this.logger.error(
        'Could not write error record',
        recordError instanceof Error ? recordError : new Error(String(recordError))
      );
    }
  }

  private transition(next: SessionState): void {
    this.logger.debug(`${this.state} -> ${next}`);
    this.state = next;
  }
}
