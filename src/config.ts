/**
 * Configuration system with YAML and JSON support, overlaid by environment variables
 */

import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import YAML from 'js-yaml';
import { isKnownFilter } from './filters.js';
import { Logger, isLogLevel, type LogLevel } from './logger.js';
import { MAX_SYNC_INTERVAL_MS } from './periodic-sync.js';

export const SHARED_DB_FILENAME = 'sweep_db.sqlite';

export interface StoreConfig {
  localPath: string;
  sharedPath: string;
  syncRetries: number;
}

export interface ArchiveDatabaseSettings {
  host: string;
  port: number;
  name: string;
  user: string;
  password: string;
}

export interface ArchiveConfig {
  fileServerMount: string;
  database: ArchiveDatabaseSettings;
}

export interface GatewayConfig {
  url: string;
  user: string;
  password: string;
}

export interface SweepSettings {
  syncIntervalMinutes: number;
  filters: string[];
  tempDir?: string;
}

export interface AppConfig {
  store: StoreConfig;
  archive: ArchiveConfig;
  gateway: GatewayConfig;
  sweep: SweepSettings;
  logLevel: LogLevel;
}

/** What a command needs: `store` for init-db/sync-db, `sweep` for a full session. */
export type ValidationScope = 'store' | 'sweep';

export const DEFAULT_CONFIG: AppConfig = {
  store: {
    localPath: './sweep_db.sqlite',
    sharedPath: '',
    syncRetries: 2
  },
  archive: {
    fileServerMount: '',
    database: {
      host: '',
      port: 5432,
      name: '',
      user: '',
      password: ''
    }
  },
  gateway: {
    url: '',
    user: '',
    password: ''
  },
  sweep: {
    syncIntervalMinutes: 10,
    filters: []
  },
  logLevel: 'info'
};

const logger = new Logger({ context: 'ConfigManager' });

function cloneConfig(config: AppConfig): AppConfig {
  return structuredClone(config);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function pickString(source: Record<string, unknown>, key: string, fallback: string): string {
  const value = source[key];
  return typeof value === 'string' ? value : fallback;
}

function pickNumber(source: Record<string, unknown>, key: string, fallback: number): number {
  const value = source[key];
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) return Number(value);
  return fallback;
}

function section(source: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = source[key];
  return isRecord(value) ? value : {};
}

function parseFilterList(value: string): string[] {
  return value.split(',').map(name => name.trim()).filter(Boolean);
}

/**
 * Merge a parsed config file over the defaults, keeping only known keys of the right type.
 */
export function mergeConfig(defaults: AppConfig, user: unknown): AppConfig {
  const merged = cloneConfig(defaults);
  if (!isRecord(user)) return merged;

  const store = section(user, 'store');
  merged.store.localPath = pickString(store, 'localPath', merged.store.localPath);
  merged.store.sharedPath = pickString(store, 'sharedPath', merged.store.sharedPath);
  merged.store.syncRetries = pickNumber(store, 'syncRetries', merged.store.syncRetries);

  const archive = section(user, 'archive');
  merged.archive.fileServerMount = pickString(archive, 'fileServerMount', merged.archive.fileServerMount);
  const database = section(archive, 'database');
  merged.archive.database = {
    host: pickString(database, 'host', merged.archive.database.host),
    port: pickNumber(database, 'port', merged.archive.database.port),
    name: pickString(database, 'name', merged.archive.database.name),
    user: pickString(database, 'user', merged.archive.database.user),
    password: pickString(database, 'password', merged.archive.database.password)
  };

  const gateway = section(user, 'gateway');
  merged.gateway = {
    url: pickString(gateway, 'url', merged.gateway.url),
    user: pickString(gateway, 'user', merged.gateway.user),
    password: pickString(gateway, 'password', merged.gateway.password)
  };

  const sweep = section(user, 'sweep');
  merged.sweep.syncIntervalMinutes = pickNumber(sweep, 'syncIntervalMinutes', merged.sweep.syncIntervalMinutes);
  const filters = sweep.filters;
  if (Array.isArray(filters)) {
    merged.sweep.filters = filters.filter((name): name is string => typeof name === 'string');
  }
  const tempDir = sweep.tempDir;
  if (typeof tempDir === 'string') {
    merged.sweep.tempDir = tempDir;
  }

  if (isLogLevel(user.logLevel)) {
    merged.logLevel = user.logLevel;
  }

  return merged;
}

/**
 * Environment variables take precedence over the config file.
 */
export function applyEnvironment(config: AppConfig, env: NodeJS.ProcessEnv): AppConfig {
  const merged = cloneConfig(config);
  const read = (name: string): string | undefined => {
    const value = env[name]?.trim();
    return value ? value : undefined;
  };

  const db = merged.archive.database;
  db.host = read('ARCHIVES_DB_HOST') ?? db.host;
  db.port = pickNumber({ port: read('ARCHIVES_DB_PORT') }, 'port', db.port);
  db.name = read('ARCHIVES_DB_NAME') ?? db.name;
  db.user = read('ARCHIVES_DB_USER') ?? db.user;
  db.password = read('ARCHIVES_DB_PASSWORD') ?? db.password;

  merged.gateway.url = read('ARCHIVES_APP_URL') ?? merged.gateway.url;
  merged.gateway.user = read('ARCHIVES_APP_USER') ?? merged.gateway.user;
  merged.gateway.password = read('ARCHIVES_APP_PASSWORD') ?? merged.gateway.password;

  const sharedDir = read('SWEEP_DB_LOCATION');
  if (sharedDir) {
    merged.store.sharedPath = join(sharedDir, SHARED_DB_FILENAME);
  }
  merged.store.localPath = read('SWEEP_LOCAL_DB') ?? merged.store.localPath;

  merged.archive.fileServerMount = read('FILE_SERVER_MOUNT') ?? merged.archive.fileServerMount;

  const filters = read('SWEEP_FILTERS');
  if (filters) {
    merged.sweep.filters = parseFilterList(filters);
  }
  merged.sweep.syncIntervalMinutes = pickNumber(
    { minutes: read('SWEEP_SYNC_INTERVAL_MINUTES') },
    'minutes',
    merged.sweep.syncIntervalMinutes
  );

  const level = read('LOG_LEVEL');
  if (isLogLevel(level)) {
    merged.logLevel = level;
  }

  return merged;
}

/**
 * Configuration manager
 */
export class ConfigManager {
  private config: AppConfig;
  private configPath: string;

  constructor(configPath: string = './sweep.config.yaml', env: NodeJS.ProcessEnv = process.env) {
    this.configPath = configPath;
    this.config = applyEnvironment(this.loadConfig(), env);
  }

  /**
   * Load configuration from file or use defaults
   */
  private loadConfig(): AppConfig {
    if (!existsSync(this.configPath)) {
      logger.debug(`Config file not found: ${this.configPath}, using defaults and environment`);
      return cloneConfig(DEFAULT_CONFIG);
    }

    const content = readFileSync(this.configPath, 'utf-8');
    let parsed: unknown;

    if (this.configPath.endsWith('.json')) {
      parsed = JSON.parse(content);
    } else if (this.configPath.endsWith('.yaml') || this.configPath.endsWith('.yml')) {
      parsed = YAML.load(content);
    } else {
      throw new Error(`Unsupported config format: ${this.configPath}`);
    }

    logger.debug(`Loaded configuration from ${this.configPath}`);
    return mergeConfig(DEFAULT_CONFIG, parsed);
  }

  /**
   * Get complete configuration
   */
  getAll(): AppConfig {
    return cloneConfig(this.config);
  }

  get<K extends keyof AppConfig>(key: K): AppConfig[K] {
    return cloneConfig(this.config)[key];
  }

  /**
   * Validate what the given command needs
   */
  validate(scope: ValidationScope): { valid: boolean; errors: string[] } {
    const errors: string[] = [];
    const { store, archive, gateway, sweep } = this.config;

    if (!store.localPath) errors.push('store.localPath (SWEEP_LOCAL_DB) is required');
    if (!store.sharedPath) errors.push('store.sharedPath (SWEEP_DB_LOCATION) is required');
    if (!Number.isInteger(store.syncRetries) || store.syncRetries < 0) {
      errors.push('store.syncRetries must be a non-negative integer');
    }

    if (scope === 'sweep') {
      if (!archive.fileServerMount) errors.push('archive.fileServerMount (FILE_SERVER_MOUNT) is required');
      if (!archive.database.host) errors.push('archive.database.host (ARCHIVES_DB_HOST) is required');
      if (!archive.database.name) errors.push('archive.database.name (ARCHIVES_DB_NAME) is required');
      if (!archive.database.user) errors.push('archive.database.user (ARCHIVES_DB_USER) is required');
      if (!archive.database.password) errors.push('archive.database.password (ARCHIVES_DB_PASSWORD) is required');
      if (!Number.isInteger(archive.database.port) || archive.database.port < 1 || archive.database.port > 65535) {
        errors.push('archive.database.port must be 1-65535');
      }
      if (!gateway.url) errors.push('gateway.url (ARCHIVES_APP_URL) is required');
      if (!gateway.user) errors.push('gateway.user (ARCHIVES_APP_USER) is required');
      if (!gateway.password) errors.push('gateway.password (ARCHIVES_APP_PASSWORD) is required');
      if (!(sweep.syncIntervalMinutes > 0) || sweep.syncIntervalMinutes * (60 * 1000) > MAX_SYNC_INTERVAL_MS) {
        errors.push(`sweep.syncIntervalMinutes must be positive and at most ${Math.floor(MAX_SYNC_INTERVAL_MS / (60 * 1000))}`);
      }
      for (const name of sweep.filters) {
        if (!isKnownFilter(name)) errors.push(`Unknown filter "${name}"`);
      }
    }

    return {
      valid: errors.length === 0,
      errors
    };
  }

  /**
   * Get config file path
   */
  getPath(): string {
    return this.configPath;
  }
}
