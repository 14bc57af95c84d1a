#!/usr/bin/env node
/**
 * sweep-deduper: interactive removal of duplicate files from the archive.
 */

import { config } from 'dotenv';
import { existsSync, realpathSync, statSync } from 'fs';
import { resolve } from 'path';
import { fileURLToPath } from 'url';
import { createInterface } from 'readline';
import { isConfirmation } from './commands.js';
import { ConfigManager, type AppConfig } from './config.js';
import { ArchivesAppGateway } from './deletion-gateway.js';
import { PostgresDuplicateIndex } from './duplicate-index.js';
import { TempCopyInspector } from './file-inspector.js';
import { FilterPipeline } from './filters.js';
import { AppError, Logger, errorMessage, setGlobalLogLevel } from './logger.js';
import { ReadlineConsole } from './operator-console.js';
import { SweepSession, type SweepSummary } from './sweep-session.js';
import { TrackingStore, removeStoreFiles } from './tracking-store.js';

export const VERSION = '0.1.0';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export type CliCommand = 'sweep' | 'init-db' | 'sync-db' | 'help' | 'version';

export interface CliOptions {
  command: CliCommand;
  location?: string;
  debug: boolean;
  force: boolean;
  configPath?: string;
}

export interface CliContext {
  env: NodeJS.ProcessEnv;
  out: (line: string) => void;
  err: (line: string) => void;
  confirm: (question: string) => Promise<boolean>;
}

const logger = new Logger({ context: 'cli' });

const USAGE = `
Usage:
  sweep-deduper sweep <location> [--debug] [--config PATH]
  sweep-deduper init-db [--force] [--config PATH]
  sweep-deduper sync-db [--config PATH]
  sweep-deduper help | --version

Commands:
  sweep     Review duplicates of files under <location> (an absolute path on the archive mount)
  init-db   Create a new tracking store and publish it to the shared location
  sync-db   Publish the local tracking store to the shared location

Options:
  --debug        Verbose logging and stack traces
  --force        init-db: replace an existing store without asking
  --config PATH  Config file (default: ./sweep.config.yaml or $SWEEP_CONFIG)
`;

export function parseArgs(argv: string[]): CliOptions | { error: string } {
  const options: CliOptions = { command: 'help', debug: false, force: false };
  const positionals: string[] = [];

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    switch (arg) {
      case '--debug':
        options.debug = true;
        break;
      case '--force':
        options.force = true;
        break;
      case '--config': {
        const value = argv[i + 1];
        if (!value) return { error: '--config needs a path' };
        i += 1;
        options.configPath = value;
        break;
      }
      case '--version':
      case '-v':
        options.command = 'version';
        return options;
      case '--help':
      case '-h':
        options.command = 'help';
        return options;
      default:
        if (arg.startsWith('--')) return { error: `Unknown option: ${arg}` };
        positionals.push(arg);
    }
  }

  const [command, ...rest] = positionals;
  switch (command) {
    case undefined:
    case 'help':
      options.command = 'help';
      return options;
    case 'sweep':
      if (rest.length !== 1) return { error: 'sweep needs exactly one <location>' };
      options.command = 'sweep';
      options.location = rest[0];
      return options;
    case 'init-db':
    case 'sync-db':
      if (rest.length > 0) return { error: `${command} takes no arguments` };
      options.command = command;
      return options;
    default:
      return { error: `Unknown command: ${command}` };
  }
}

function loadConfig(options: CliOptions, ctx: CliContext, scope: 'store' | 'sweep'): AppConfig | null {
  const manager = new ConfigManager(options.configPath ?? ctx.env.SWEEP_CONFIG ?? './sweep.config.yaml', ctx.env);
  const validation = manager.validate(scope);
  if (!validation.valid) {
    ctx.err('❌ Missing or invalid configuration:');
    validation.errors.forEach(error => ctx.err(`  - ${error}`));
    ctx.err('Set them in the config file or in .env (see .env.example).');
    return null;
  }
  const appConfig = manager.getAll();
  setGlobalLogLevel(options.debug ? 'debug' : appConfig.logLevel);
  return appConfig;
}

function reportFailure(ctx: CliContext, prefix: string, error: unknown, debug: boolean): void {
  ctx.err(`❌ ${prefix}: ${errorMessage(error)}`);
  if (debug && error instanceof Error && error.stack) {
    ctx.err(error.stack);
  }
}

function printSummary(ctx: CliContext, summary: SweepSummary): void {
  ctx.out('');
  ctx.out(`Location:          ${summary.location}`);
  ctx.out(`Outcome:           ${summary.outcome}`);
  ctx.out(`Files to review:   ${summary.groups}`);
  ctx.out(`Kept:              ${summary.kept}`);
  ctx.out(`Deleted:           ${summary.deleted}`);
  ctx.out(`Skipped:           ${summary.skipped}`);
  if (summary.aborted > 0) ctx.out(`Aborted:           ${summary.aborted}`);
  if (summary.failedDeletions > 0) ctx.out(`Failed deletions:  ${summary.failedDeletions}`);
  ctx.out(`Shared copy synced: ${summary.synced ? 'yes' : 'no'}`);
}

/**
 * The index stores directories with their on-disk spelling, so a location
 * typed in another case or through a link is resolved before it is matched.
 */
export function onDiskPaths(location: string, mount: string): { location: string; mount: string } {
  return {
    location: realpathSync.native(location),
    mount: existsSync(mount) ? realpathSync.native(mount) : mount
  };
}

async function runSweep(options: CliOptions, ctx: CliContext): Promise<number> {
  const appConfig = loadConfig(options, ctx, 'sweep');
  if (!appConfig || !options.location) return EXIT_FAILURE;

  try {
    if (!statSync(options.location).isDirectory()) {
      ctx.err(`❌ Location is not a directory: ${options.location}`);
      return EXIT_FAILURE;
    }
  } catch {
    ctx.err(`❌ Location does not exist: ${options.location}`);
    return EXIT_FAILURE;
  }
  const { location, mount } = onDiskPaths(options.location, appConfig.archive.fileServerMount);

  let store: TrackingStore;
  let filters: FilterPipeline;
  try {
    filters = FilterPipeline.fromNames(appConfig.sweep.filters);
    store = TrackingStore.open({
      localPath: appConfig.store.localPath,
      sharedPath: appConfig.store.sharedPath,
      syncRetries: appConfig.store.syncRetries
    });
  } catch (error) {
    reportFailure(ctx, 'Cannot start sweep', error, options.debug);
    return EXIT_FAILURE;
  }

  const index = PostgresDuplicateIndex.connect(appConfig.archive.database);
  const operator = new ReadlineConsole();
  operator.print('Initializing services...');

  try {
    const session = new SweepSession({
      store,
      index,
      gateway: new ArchivesAppGateway(appConfig.gateway),
      filters,
      console: operator,
      inspector: new TempCopyInspector(appConfig.sweep.tempDir),
      mount,
      syncIntervalMs: appConfig.sweep.syncIntervalMinutes * 60 * 1000
    });
    const summary = await session.run(location);
    printSummary(ctx, summary);
    return EXIT_OK;
  } catch (error) {
    reportFailure(ctx, 'Sweep failed', error, options.debug);
    return EXIT_FAILURE;
  } finally {
    operator.close();
    await index.close().catch((error: unknown) => {
      logger.warn('Closing the archive database failed', { error: errorMessage(error) });
    });
    store.close();
  }
}

async function runInitDb(options: CliOptions, ctx: CliContext): Promise<number> {
  const appConfig = loadConfig(options, ctx, 'store');
  if (!appConfig) return EXIT_FAILURE;
  const { localPath, sharedPath, syncRetries } = appConfig.store;

  const existing = [localPath, sharedPath].filter(path => existsSync(path));
  if (existing.length > 0 && !options.force) {
    ctx.out(`A tracking store already exists at: ${existing.join(', ')}`);
    const overwrite = await ctx.confirm('Do you want to overwrite it?');
    if (!overwrite) {
      ctx.out('Operation cancelled.');
      return EXIT_OK;
    }
  }

  try {
    removeStoreFiles(localPath);
    ctx.out(`Creating new tracking store at: ${sharedPath}`);
    const store = TrackingStore.initialize({ localPath, sharedPath, syncRetries });
    try {
      await store.sync();
    } finally {
      store.close();
    }
    ctx.out('✅ Tracking store created.');
    return EXIT_OK;
  } catch (error) {
    reportFailure(ctx, 'Error creating tracking store', error, options.debug);
    return EXIT_FAILURE;
  }
}

async function runSyncDb(options: CliOptions, ctx: CliContext): Promise<number> {
  const appConfig = loadConfig(options, ctx, 'store');
  if (!appConfig) return EXIT_FAILURE;
  const { localPath, sharedPath, syncRetries } = appConfig.store;

  try {
    const store = TrackingStore.open({ localPath, sharedPath, syncRetries, copyDown: false });
    try {
      ctx.out('Syncing tracking store to shared location...');
      const result = await store.sync();
      const counts = store.getCounts();
      ctx.out(`✅ Synced ${result.bytes} bytes to ${result.sharedPath}`);
      ctx.out(
        `   locations: ${counts.processedLocations}, files: ${counts.processedFiles}, ` +
        `deletions: ${counts.deletedFiles}, errors: ${counts.errors}`
      );
    } finally {
      store.close();
    }
    return EXIT_OK;
  } catch (error) {
    reportFailure(ctx, 'Error syncing tracking store', error, options.debug);
    return EXIT_FAILURE;
  }
}

export async function runCli(argv: string[], ctx: CliContext): Promise<number> {
  const parsed = parseArgs(argv);
  if ('error' in parsed) {
    ctx.err(parsed.error);
    ctx.err(USAGE);
    return EXIT_USAGE;
  }

  switch (parsed.command) {
    case 'help':
      ctx.out(USAGE);
      return EXIT_OK;
    case 'version':
      ctx.out(VERSION);
      return EXIT_OK;
    case 'sweep':
      return runSweep(parsed, ctx);
    case 'init-db':
      return runInitDb(parsed, ctx);
    case 'sync-db':
      return runSyncDb(parsed, ctx);
  }
}

async function confirm(message: string): Promise<boolean> {
  const rl = createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  return new Promise((resolve) => {
    rl.question(`${message} (y/N) `, (answer) => {
      rl.close();
      resolve(isConfirmation(answer));
    });
  });
}

async function main(): Promise<void> {
  config({ override: false });
  const code = await runCli(process.argv.slice(2), {
    env: process.env,
    out: (line) => console.log(line),
    err: (line) => console.error(line),
    confirm
  });
  process.exitCode = code;
}

function invokedDirectly(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  // npm installs the bin as a symlink
  const invoked = existsSync(entry) ? realpathSync(entry) : resolve(entry);
  return invoked === realpathSync(fileURLToPath(import.meta.url));
}

if (invokedDirectly()) {
  main().catch((error: unknown) => {
    const appError = error instanceof AppError ? error : new AppError(errorMessage(error));
    logger.error('Unexpected failure', appError);
    process.exitCode = EXIT_FAILURE;
  });
}
