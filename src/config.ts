/**
 * Configuration loaded from YAML, merged over defaults, with environment overrides
 */

import { readFileSync, existsSync } from 'fs';
import YAML from 'js-yaml';
import { AppError, isLogLevel } from './logger.js';
import type { Logger, LogLevel } from './logger.js';

export interface DropboxConfig {
  token: string;
}

export interface ZfsConfig {
  dataSet: string;
  /** Defaults to /<dataSet> */
  mountPoint: string;
}

export interface SnapshotConfig {
  prefix: string;
}

export interface DatabaseConfig {
  path: string;
}

export interface ReplayConfig {
  concurrency: number;
  hashBlockSize: number;
}

export interface RetryConfig {
  backoffMs: number;
}

export interface AppConfig {
  dropbox: DropboxConfig;
  zfs: ZfsConfig;
  snapshot: SnapshotConfig;
  database: DatabaseConfig;
  replay: ReplayConfig;
  retry: RetryConfig;
  logLevel: LogLevel;
  logFile: string;
}

export const DEFAULT_CONFIG: AppConfig = {
  dropbox: {
    token: ''
  },
  zfs: {
    dataSet: '',
    mountPoint: ''
  },
  snapshot: {
    prefix: 'dropbox'
  },
  database: {
    path: './packrat.sqlite'
  },
  replay: {
    concurrency: 4,
    hashBlockSize: 4 * 1024 * 1024
  },
  retry: {
    backoffMs: 10_000
  },
  logLevel: 'info',
  logFile: 'download.log'
};

type Environment = Record<string, string | undefined>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(section: Record<string, unknown>, key: string, fallback: string): string {
  const value = section[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  throw new AppError(`Config value "${key}" must be a string`, 'INVALID_CONFIG', { key });
}

function readNumber(section: Record<string, unknown>, key: string, fallback: number): number {
  const value = section[key];
  if (value === undefined || value === null) return fallback;
  const parsed = typeof value === 'string' ? Number(value) : value;
  if (typeof parsed !== 'number' || Number.isNaN(parsed)) {
    throw new AppError(`Config value "${key}" must be a number`, 'INVALID_CONFIG', { key });
  }
  return parsed;
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = raw[key];
  return isRecord(value) ? value : {};
}

/**
 * Configuration manager
 */
export class ConfigManager {
  private config: AppConfig;
  private configPath: string;

  constructor(configPath: string = './config.yml', env: Environment = process.env, logger?: Logger) {
    this.configPath = configPath;
    this.config = this.applyEnvironment(this.loadConfig(logger), env);
  }

  /**
   * Load configuration from file or use defaults
   */
  private loadConfig(logger?: Logger): AppConfig {
    if (!existsSync(this.configPath)) {
      logger?.info(
        `Config file not found: ${this.configPath}, using defaults`,
        { path: this.configPath },
        'ConfigManager'
      );
      return this.mergeConfigs({});
    }

    const content = readFileSync(this.configPath, 'utf-8');
    let parsed: unknown;
    try {
      parsed = this.configPath.endsWith('.json') ? JSON.parse(content) : YAML.load(content);
    } catch (error) {
      throw new AppError(
        `Failed to parse ${this.configPath}: ${error instanceof Error ? error.message : String(error)}`,
        'INVALID_CONFIG',
        { path: this.configPath }
      );
    }

    logger?.info(`Loaded configuration from ${this.configPath}`, undefined, 'ConfigManager');
    return this.mergeConfigs(isRecord(parsed) ? parsed : {});
  }

  /**
   * Merge user config with defaults (user config takes precedence)
   */
  private mergeConfigs(user: Record<string, unknown>): AppConfig {
    const dropbox = section(user, 'dropbox');
    const zfs = section(user, 'zfs');
    const snapshot = section(user, 'snapshot');
    const database = section(user, 'database');
    const replay = section(user, 'replay');
    const retry = section(user, 'retry');
    const logLevel = user.logLevel;

    // legacy flat keys: dropbox_token, zfs_data_set
    const dataSet = readString(zfs, 'dataSet', readString(user, 'zfs_data_set', DEFAULT_CONFIG.zfs.dataSet));

    return {
      dropbox: {
        token: readString(dropbox, 'token', readString(user, 'dropbox_token', DEFAULT_CONFIG.dropbox.token))
      },
      zfs: {
        dataSet,
        mountPoint: readString(zfs, 'mountPoint', DEFAULT_CONFIG.zfs.mountPoint)
      },
      snapshot: {
        prefix: readString(snapshot, 'prefix', DEFAULT_CONFIG.snapshot.prefix)
      },
      database: {
        path: readString(database, 'path', DEFAULT_CONFIG.database.path)
      },
      replay: {
        concurrency: readNumber(replay, 'concurrency', DEFAULT_CONFIG.replay.concurrency),
        hashBlockSize: readNumber(replay, 'hashBlockSize', DEFAULT_CONFIG.replay.hashBlockSize)
      },
      retry: {
        backoffMs: readNumber(retry, 'backoffMs', DEFAULT_CONFIG.retry.backoffMs)
      },
      logLevel: isLogLevel(logLevel) ? logLevel : DEFAULT_CONFIG.logLevel,
      logFile: readString(user, 'logFile', DEFAULT_CONFIG.logFile)
    };
  }

  private applyEnvironment(config: AppConfig, env: Environment): AppConfig {
    const logLevel = env.LOG_LEVEL;
    return {
      ...config,
      dropbox: { ...config.dropbox, token: env.DROPBOX_TOKEN || config.dropbox.token },
      zfs: { ...config.zfs, dataSet: env.ZFS_DATA_SET || config.zfs.dataSet },
      logLevel: isLogLevel(logLevel) ? logLevel : config.logLevel
    };
  }

  /**
   * Get complete configuration
   */
  getAll(): AppConfig {
    return structuredClone(this.config);
  }

  /**
   * Directory the dataset is mounted at
   */
  getMountPoint(): string {
    return this.config.zfs.mountPoint || `/${this.config.zfs.dataSet}`;
  }

  setLogLevel(level: LogLevel): void {
    this.config.logLevel = level;
  }

  /**
   * Validate configuration
   */
  validate(): { valid: boolean; errors: string[] } {
    const errors: string[] = [];

    if (!this.config.dropbox.token) {
      errors.push('Dropbox token is missing (dropbox.token or DROPBOX_TOKEN)');
    }

    if (!this.config.zfs.dataSet) {
      errors.push('ZFS data set is missing (zfs.dataSet or ZFS_DATA_SET)');
    }

    if (!Number.isInteger(this.config.replay.concurrency) || this.config.replay.concurrency < 1) {
      errors.push('Replay concurrency must be a positive integer');
    }

    if (!Number.isInteger(this.config.replay.hashBlockSize) || this.config.replay.hashBlockSize < 1) {
      errors.push('Hash block size must be a positive integer');
    }

    if (this.config.retry.backoffMs < 0) {
      errors.push('Retry backoff must not be negative');
    }

    if (!this.config.snapshot.prefix) {
      errors.push('Snapshot prefix must not be empty');
    }

    return {
      valid: errors.length === 0,
      errors
    };
  }

  /**
   * Throws INVALID_CONFIG listing every problem found by validate()
   */
  assertValid(): AppConfig {
    const { valid, errors } = this.validate();
    if (!valid) {
      throw new AppError(`Invalid configuration: ${errors.join('; ')}`, 'INVALID_CONFIG', { errors });
    }
    return this.getAll();
  }

  /**
   * Export configuration as YAML
   */
  toYAML(): string {
    return YAML.dump({ ...this.config, dropbox: { token: this.config.dropbox.token ? '***' : '' } });
  }
}
