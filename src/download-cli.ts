#!/usr/bin/env node
/**
 * Replay CLI - materialise the recorded revision history onto the ZFS dataset
 */

import { config } from 'dotenv';
import { realpathSync } from 'fs';
import { fileURLToPath } from 'url';
import { ConfigManager } from './config.js';
import { DropboxContentFetcher } from './content-fetcher.js';
import { EventApplier } from './event-applier.js';
import { EventStore } from './event-store.js';
import { AppError, handleError, isLogLevel, LOG_LEVELS, Logger } from './logger.js';
import type { LogLevel } from './logger.js';
import { ReplayEngine } from './replay-engine.js';
import { defaultRetryPolicy } from './retry.js';
import { SnapshotManager, ZfsSnapshotBackend } from './snapshot-manager.js';
import type { ReplaySummary } from './types.js';

config({ override: false });

export interface CliOptions {
  command: 'download' | 'help';
  configPath: string;
  logLevel?: LogLevel;
  progress: boolean;
}

const USAGE = `Usage: revision-replay <command> [options]

Commands:
  download              Replay the event log onto the dataset, snapshotting each day

Options:
  --config <path>       Configuration file (default: ./config.yml)
  --log-level <level>   One of ${LOG_LEVELS.join(', ')} (default: info)
  --no-progress         Do not draw per-batch progress
  --help                Show this message`;

export function parseArgs(argv: string[]): CliOptions {
  const options: CliOptions = { command: 'help', configPath: './config.yml', progress: true };
  let command: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--config') {
      const value = argv[++i];
      if (!value) {
        throw new AppError('--config needs a path', 'INVALID_CONFIG');
      }
      options.configPath = value;
    } else if (arg === '--log-level') {
      const value = argv[++i]?.toLowerCase();
      if (!isLogLevel(value)) {
        throw new AppError(`--log-level must be one of ${LOG_LEVELS.join(', ')}`, 'INVALID_CONFIG');
      }
      options.logLevel = value;
    } else if (arg === '--no-progress') {
      options.progress = false;
    } else if (arg === '--help' || arg === '-h') {
      return { ...options, command: 'help' };
    } else if (arg.startsWith('--')) {
      throw new AppError(`Unknown option ${arg}`, 'INVALID_CONFIG');
    } else if (command === undefined) {
      command = arg;
    } else {
      throw new AppError(`Unexpected argument ${arg}`, 'INVALID_CONFIG');
    }
  }

  if (command === undefined) {
    return options;
  }
  if (command !== 'download') {
    throw new AppError(`Unknown command "${command}"`, 'INVALID_CONFIG');
  }
  return { ...options, command };
}

export async function download(options: CliOptions): Promise<ReplaySummary> {
  const configManager = new ConfigManager(options.configPath);
  if (options.logLevel) {
    configManager.setLogLevel(options.logLevel);
  }
  const settings = configManager.getAll();
  const logger = new Logger({ minLevel: settings.logLevel, filePath: settings.logFile });
  logger.debug(`Configuration\n${configManager.toYAML()}`, undefined, 'cli');

  const appConfig = configManager.assertValid();
  const root = configManager.getMountPoint();
  const store = new EventStore(appConfig.database.path);

  try {
    logger.info(`Replaying ${store.countEvents()} events onto ${root}`, undefined, 'cli');

    const engine = new ReplayEngine({
      root,
      source: store,
      applier: new EventApplier({
        root,
        fetcher: DropboxContentFetcher.fromToken(appConfig.dropbox.token),
        retryPolicy: defaultRetryPolicy(appConfig.retry.backoffMs),
        logger,
        hashBlockSize: appConfig.replay.hashBlockSize,
      }),
      snapshots: new SnapshotManager(
        new ZfsSnapshotBackend(appConfig.zfs.dataSet),
        appConfig.snapshot.prefix,
        logger
      ),
      logger,
      concurrency: appConfig.replay.concurrency,
      showProgress: options.progress && process.stderr.isTTY === true,
    });

    return await engine.run();
  } catch (error) {
    throw handleError(error, logger, 'cli');
  } finally {
    store.close();
  }
}

async function main(argv: string[]): Promise<void> {
  const options = parseArgs(argv);

  if (options.command === 'help') {
    console.log(USAGE);
    return;
  }

  const summary = await download(options);
  console.log('\n📈 Summary:');
  console.log(`  - Initial state created: ${summary.bootstrapped ? `yes (${summary.placeholders} placeholders)` : 'no'}`);
  console.log(`  - Batches applied: ${summary.batchesApplied}`);
  console.log(`  - Batches skipped: ${summary.batchesSkipped}`);
  console.log(`  - Revisions applied: ${summary.eventsApplied}`);
  console.log(`  - Snapshots taken: ${summary.snapshotsTaken}`);
}

function isEntryPoint(): boolean {
  const invoked = process.argv[1];
  if (!invoked) return false;
  try {
    return realpathSync(invoked) === realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  main(process.argv.slice(2)).catch(error => {
    if (error instanceof AppError) {
      console.error(`❌ ${error.code}: ${error.message}`);
    } else {
      console.error(`❌ ${error instanceof Error ? error.stack ?? error.message : String(error)}`);
    }
    process.exit(1);
  });
}
