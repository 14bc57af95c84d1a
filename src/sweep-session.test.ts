import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { existsSync, mkdirSync, rmSync } from 'fs';
import { join } from 'path';
import { SweepSession } from './sweep-session.js';
import { TrackingStore } from './tracking-store.js';
import { FilterPipeline } from './filters.js';
import { InvalidPathError } from './errors.js';
import type { FileInstance } from './types.js';
import { FakeGateway, FakeInspector, InMemoryDuplicateIndex, ScriptedConsole } from '../tests/fakes.js';

const MOUNT = '/mnt/records';

function archive(): FileInstance[] {
  return [
    { fileId: 'F1', directory: 'A', filename: 'plan.pdf', size: 2048 },
    { fileId: 'F1', directory: 'B', filename: 'plan.pdf', size: 2048 },
    { fileId: 'F1', directory: 'C', filename: 'plan-copy.pdf', size: 2048 },
    { fileId: 'F2', directory: 'A', filename: 'notes.txt', size: 10 },
    { fileId: 'F2', directory: 'B', filename: 'notes.txt', size: 10 },
    { fileId: 'F3', directory: 'A', filename: 'only-here.txt', size: 5 }
  ];
}

/** Holds every prompt until the gate opens. */
class GatedConsole extends ScriptedConsole {
  constructor(answers: string[], private readonly gate: () => Promise<void>) {
    super(answers);
  }

  async prompt(question: string): Promise<string | null> {
    await this.gate();
    return super.prompt(question);
  }
}

describe('SweepSession', () => {
  const root = join(process.cwd(), '.test-tmp', 'sweep-session');
  let caseNumber = 0;
  let store: TrackingStore;
  let index: InMemoryDuplicateIndex;
  let gateway: FakeGateway;
  let inspector: FakeInspector;
  let sharedPath: string;

  beforeEach(() => {
    caseNumber += 1;
    const dir = join(root, String(caseNumber));
    rmSync(dir, { recursive: true, force: true });
    mkdirSync(join(dir, 'share'), { recursive: true });
    sharedPath = join(dir, 'share', 'sweep_db.sqlite');
    store = TrackingStore.initialize({ localPath: join(dir, 'local.sqlite'), sharedPath, syncRetries: 0 });
    index = new InMemoryDuplicateIndex(archive());
    gateway = new FakeGateway();
    inspector = new FakeInspector();
  });

  afterEach(() => {
    store.close();
  });

  function session(operator: ScriptedConsole, filters = new FilterPipeline()): SweepSession {
    return new SweepSession({ store, index, gateway, filters, console: operator, inspector, mount: MOUNT });
  }

  function onlyF1(): void {
    index.instances = index.instances.filter(instance => instance.fileId === 'F1');
  }

  it('groups by file id and records kept decisions with notes', async () => {
    const operator = new ScriptedConsole(['c intentional copy', 'c']);
    const sweep = session(operator);

    const summary = await sweep.run(`${MOUNT}/A`);

    expect(summary).toEqual({
      location: 'A',
      outcome: 'completed',
      groups: 2,
      kept: 2,
      deleted: 0,
      skipped: 0,
      aborted: 0,
      failedDeletions: 0,
      synced: true
    });
    expect(store.getProcessedFile('F2')).toMatchObject({ decision: 'kept', note: 'intentional copy', locationPath: 'A' });
    expect(store.getProcessedFile('F1')).toMatchObject({ decision: 'kept', note: null });
    expect(store.listProcessedLocations()).toMatchObject([{ locationPath: 'A', duplicatesCount: 2 }]);
    expect(sweep.getState()).toBe('Terminated');
    expect(operator.lines).toContain('File 1 of 2 | File ID: F2 (notes.txt)');
    expect(operator.lines).toContain('File 2 of 2 | File ID: F1 (plan.pdf)');
  });

  it('records only the instances the gateway accepted', async () => {
    onlyF1();
    gateway.failOn(`${MOUNT}/B/plan.pdf`, 'HTTP 500 Internal Server Error: file locked');
    const operator = new ScriptedConsole(['1 2 3', 'yes']);

    const summary = await session(operator).run(`${MOUNT}/A`);

    expect(gateway.calls.map(call => call.path)).toEqual([
      `${MOUNT}/A/plan.pdf`,
      `${MOUNT}/B/plan.pdf`,
      `${MOUNT}/C/plan-copy.pdf`
    ]);
    expect(store.listDeletedFiles('F1').map(row => row.locationPath)).toEqual([
      `${MOUNT}/A/plan.pdf`,
      `${MOUNT}/C/plan-copy.pdf`
    ]);
    expect(store.getProcessedFile('F1')).toMatchObject({ decision: 'deleted', note: 'deleted 2 of 3 instances' });
    expect(store.listErrors()).toMatchObject([
      {
        operation: 'delete',
        fileId: 'F1',
        message: 'HTTP 500 Internal Server Error: file locked',
        context: `${MOUNT}/B/plan.pdf`
      }
    ]);
    expect(summary).toMatchObject({ deleted: 1, failedDeletions: 1 });
    expect(operator.lines).toContain('Warning: this selects every copy. No instance of this file will remain.');
  });

  it('leaves the file unprocessed when every deletion fails', async () => {
    onlyF1();
    gateway.failOn(`${MOUNT}/A/plan.pdf`, 'HTTP 503 Service Unavailable');
    gateway.throwOn(`${MOUNT}/B/plan.pdf`, new Error('socket hang up'));
    const operator = new ScriptedConsole(['1 2', 'y']);

    const summary = await session(operator).run(`${MOUNT}/A`);

    expect(store.isProcessed('F1')).toBe(false);
    expect(store.listDeletedFiles()).toEqual([]);
    expect(store.listErrors()).toMatchObject([
      { operation: 'delete', fileId: 'F1', message: 'HTTP 503 Service Unavailable' },
      { operation: 'delete', fileId: 'F1', message: 'socket hang up' }
    ]);
    expect(summary).toMatchObject({ deleted: 0, failedDeletions: 2, outcome: 'completed' });
    expect(operator.lines).toContain('No instance was deleted; this file stays eligible for review.');
  });

  it('records and rethrows a failed duplicate query after a final sync', async () => {
    index.failDuplicatesQuery = true;
    const operator = new ScriptedConsole([]);
    const sweep = session(operator);

    await expect(sweep.run(`${MOUNT}/A`)).rejects.toMatchObject({ code: 'QUERY_FAILURE' });

    expect(store.listErrors()).toMatchObject([
      { operation: 'sweep', fileId: null, message: 'Duplicate index findDuplicatesUnder failed: connection refused', context: 'A' }
    ]);
    expect(store.listProcessedLocations()).toEqual([]);
    expect(sweep.getState()).toBe('Terminated');
    expect(operator.lines).toContain('Sweep complete.');
  });

  it('re-prompts after invalid input and cancelled confirmation', async () => {
    onlyF1();
    const operator = new ScriptedConsole(['x', '4', '2', 'no', 's']);

    const summary = await session(operator).run(`${MOUNT}/A`);

    expect(operator.lines).toContain('Unrecognised command "x".');
    expect(operator.lines).toContain('Invalid file number(s): 4. Choose between 1 and 3.');
    expect(operator.lines).toContain('Deletion cancelled.');
    expect(operator.prompts).toEqual([
      'Your choice: ',
      'Your choice: ',
      'Your choice: ',
      'Confirm deletion? (yes/no): ',
      'Your choice: '
    ]);
    expect(gateway.calls).toEqual([]);
    expect(summary).toMatchObject({ skipped: 1, deleted: 0 });
    expect(store.isProcessed('F1')).toBe(false);
  });

  it('opens an instance and shows the group again', async () => {
    onlyF1();
    const operator = new ScriptedConsole(['o 2', 'o 9', 's']);

    await session(operator).run(`${MOUNT}/A`);

    expect(inspector.opened).toEqual([`${MOUNT}/B/plan.pdf`]);
    expect(operator.lines).toContain('Invalid file number: 9');
    expect(operator.lines.filter(line => line === 'File 1 of 1 | File ID: F1 (plan.pdf)')).toHaveLength(2);
    expect(inspector.cleanedUp).toBe(1);
  });

  it('stops on quit without completing the location', async () => {
    const operator = new ScriptedConsole(['q']);

    const summary = await session(operator).run(`${MOUNT}/A`);

    expect(summary).toMatchObject({ outcome: 'quit', kept: 0, synced: true });
    expect(store.listProcessedLocations()).toEqual([]);
    expect(operator.prompts).toHaveLength(1);
  });

  it('treats end of input as quit', async () => {
    const summary = await session(new ScriptedConsole([])).run(`${MOUNT}/A`);
    expect(summary.outcome).toBe('quit');
    expect(store.getCounts().processedFiles).toBe(0);
  });

  it('aborts only the group whose locations cannot be fetched', async () => {
    index.failingLocations.add('F2');
    const operator = new ScriptedConsole(['c']);

    const summary = await session(operator).run(`${MOUNT}/A`);

    expect(summary).toMatchObject({ aborted: 1, kept: 1, outcome: 'completed' });
    expect(store.isProcessed('F2')).toBe(false);
    expect(store.isProcessed('F1')).toBe(true);
    expect(store.listErrors()).toMatchObject([
      { operation: 'locations', fileId: 'F2', message: 'Duplicate index findAllLocations failed: connection reset' }
    ]);
  });

  it('skips files already processed and files excluded by filters', async () => {
    store.recordKept('F2');
    index.instances.push(
      { fileId: 'F4', directory: 'A', filename: 'Thumbs.db', size: 1 },
      { fileId: 'F4', directory: 'B', filename: 'Thumbs.db', size: 1 }
    );
    const operator = new ScriptedConsole(['s']);

    const summary = await session(operator, FilterPipeline.fromNames(['exclude-system-files'])).run(`${MOUNT}/A`);

    expect(summary.groups).toBe(1);
    expect(operator.lines).toContain('Found 3 duplicate file instances.');
    expect(operator.lines).toContain('After filtering: 2 file instances to review.');
    expect(operator.lines).toContain('Unprocessed: 1 instances.');
  });

  it('completes an empty location without prompting', async () => {
    const operator = new ScriptedConsole([]);

    const summary = await session(operator).run(`${MOUNT}/D`);

    expect(summary).toMatchObject({ outcome: 'empty', groups: 0, synced: true });
    expect(operator.prompts).toEqual([]);
    expect(store.listProcessedLocations()).toMatchObject([{ locationPath: 'D', duplicatesCount: 0 }]);
  });

  it('reports a failed final sync without failing the sweep', async () => {
    store.close();
    const dir = join(root, `${caseNumber}-offline`);
    rmSync(dir, { recursive: true, force: true });
    mkdirSync(dir, { recursive: true });
    store = TrackingStore.initialize({
      localPath: join(dir, 'local.sqlite'),
      sharedPath: join(dir, 'missing-share', 'sweep_db.sqlite'),
      syncRetries: 0
    });
    const operator = new ScriptedConsole([]);

    const summary = await session(operator).run(`${MOUNT}/D`);

    expect(summary.synced).toBe(false);
    expect(store.listErrors()).toMatchObject([{ operation: 'sync', fileId: null, context: 'final' }]);
    expect(operator.lines.some(line => line.startsWith('Sync failed: '))).toBe(true);
    expect(operator.lines).toContain('Sweep complete; the shared copy was not updated.');
  });

  it('rejects a location outside the mount before touching the store', async () => {
    const sweep = session(new ScriptedConsole([]));
    await expect(sweep.run('/elsewhere/A')).rejects.toBeInstanceOf(InvalidPathError);
    expect(store.getCounts()).toEqual({ processedLocations: 0, processedFiles: 0, deletedFiles: 0, errors: 0 });
    expect(sweep.getState()).toBe('Start');
  });

  it('publishes on the interval while the operator decides', async () => {
    onlyF1();
    const publish = store.sync.bind(store);
    let active = 0;
    let maxActive = 0;
    const sync = vi.spyOn(store, 'sync').mockImplementation(async () => {
      active += 1;
      maxActive = Math.max(maxActive, active);
      try {
        return await publish();
      } finally {
        active -= 1;
      }
    });

    let syncsWhileWaiting = 0;
    let decidedBeforePublish = true;
    const operator = new GatedConsole(['c'], async () => {
      await vi.waitFor(() => expect(existsSync(sharedPath)).toBe(true), { timeout: 2000, interval: 5 });
      syncsWhileWaiting = sync.mock.calls.length;
      decidedBeforePublish = store.isProcessed('F1');
    });
    const sweep = new SweepSession({
      store,
      index,
      gateway,
      filters: new FilterPipeline(),
      console: operator,
      inspector,
      mount: MOUNT,
      syncIntervalMs: 10
    });

    const summary = await sweep.run(`${MOUNT}/A`);

    expect(summary).toMatchObject({ kept: 1, synced: true });
    expect(syncsWhileWaiting).toBeGreaterThanOrEqual(1);
    expect(decidedBeforePublish).toBe(false);
    expect(sync.mock.calls.length).toBeGreaterThan(syncsWhileWaiting);
    expect(maxActive).toBe(1);

    const afterRun = sync.mock.calls.length;
    await new Promise(resolve => setTimeout(resolve, 50));
    expect(sync.mock.calls.length).toBe(afterRun);
  });

  it('runs only once', async () => {
    const sweep = session(new ScriptedConsole([]));
    await sweep.run(`${MOUNT}/D`);
    await expect(sweep.run(`${MOUNT}/D`)).rejects.toThrow('A sweep session runs only once');
  });
});
