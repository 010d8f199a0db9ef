#!/usr/bin/env node
/**
 * Downloads Organizer CLI
 */

import { config } from 'dotenv';
import { existsSync, realpathSync } from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { ConfigManager, createExampleConfig } from './config.js';
import { getDownloadsPath } from './downloads-path.js';
import { describeError } from './errors.js';
import { logger, handleError, isLogLevel, type LogLevel } from './logger.js';
import { DownloadsOrganizer } from './organizer.js';
import { formatRunReport, toJsonReport } from './report.js';
import type { RunReport } from './types.js';
import { watchDownloads } from './watch.js';

export const DEFAULT_CONFIG_FILE = 'organizer.config.yaml';

export interface CliOptions {
  help: boolean;
  path?: string;
  concurrency?: number;
  configPath?: string;
  dryRun: boolean;
  json: boolean;
  watch: boolean;
  logLevel?: LogLevel;
  logFile?: string;
  initConfig?: string;
}

export const USAGE = `Usage: downloads-organizer [options]

Sort the files of a downloads folder into category subfolders.

Options:
  --path <dir>           Folder to organize (default: detected Downloads folder)
  --concurrency <n>      Files processed in parallel, 1 to 64 (default: 6)
  --config <file>        YAML or JSON config file (default: ./${DEFAULT_CONFIG_FILE} if present)
  --dry-run              Show what would be moved without touching any file
  --json                 Print the report as JSON
  --watch                Keep running and organize new files as they arrive
  --log-level <level>    debug, info, warn or error
  --log-file <file>      Also append log lines to this file
  --init-config [file]   Write the default configuration and exit
  --help                 Show this help`;

function requireValue(argv: string[], index: number, flag: string): string {
  const value = argv[index];
  if (value === undefined || value.startsWith('--')) {
    throw new Error(`Missing value for ${flag}`);
  }
  return value;
}

export function parseArgs(argv: string[]): CliOptions {
  const options: CliOptions = { help: false, dryRun: false, json: false, watch: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    switch (arg) {
      case '--help':
      case '-h':
        options.help = true;
        break;
      case '--path':
        options.path = requireValue(argv, ++i, arg);
        break;
      case '--concurrency': {
        const raw = requireValue(argv, ++i, arg);
        const value = Number(raw);
        if (!Number.isInteger(value) || value < 1) {
          throw new Error(`Invalid --concurrency value: ${raw}`);
        }
        options.concurrency = value;
        break;
      }
      case '--config':
        options.configPath = requireValue(argv, ++i, arg);
        break;
      case '--dry-run':
        options.dryRun = true;
        break;
      case '--json':
        options.json = true;
        break;
      case '--watch':
        options.watch = true;
        break;
      case '--log-level': {
        const value = requireValue(argv, ++i, arg);
        if (!isLogLevel(value)) {
          throw new Error(`Invalid --log-level value: ${value}`);
        }
        options.logLevel = value;
        break;
      }
      case '--log-file':
        options.logFile = requireValue(argv, ++i, arg);
        break;
      case '--init-config': {
        const next = argv[i + 1];
        if (next !== undefined && !next.startsWith('--')) {
          options.initConfig = next;
          i++;
        } else {
          options.initConfig = DEFAULT_CONFIG_FILE;
        }
        break;
      }
      default:
        throw new Error(`Unknown argument: ${arg}`);
    }
  }

  if (options.watch && options.json) {
    throw new Error('--json cannot be combined with --watch');
  }

  return options;
}

function resolveConfigPath(options: CliOptions): string | null {
  if (options.configPath) {
    return path.resolve(options.configPath);
  }
  const fallback = path.resolve(DEFAULT_CONFIG_FILE);
  return existsSync(fallback) ? fallback : null;
}

function buildConfig(options: CliOptions): ConfigManager {
  const manager = new ConfigManager(resolveConfigPath(options));

  if (options.path) manager.set('downloadsPath', options.path);
  if (options.concurrency !== undefined) manager.set('concurrency', options.concurrency);
  if (options.dryRun) manager.set('dryRun', true);
  if (options.logLevel) manager.set('logLevel', options.logLevel);
  if (options.logFile) manager.set('logFile', options.logFile);

  return manager;
}

function printReport(report: RunReport, json: boolean): void {
  console.log(json ? toJsonReport(report) : formatRunReport(report));
}

function waitForInterrupt(): Promise<void> {
  return new Promise(resolve => {
    process.once('SIGINT', () => resolve());
  });
}

/**
 * Run the CLI and return the process exit code
 */
export async function runCli(argv: string[]): Promise<number> {
  let options: CliOptions;
  try {
    options = parseArgs(argv);
  } catch (error) {
    console.error(`❌ ${describeError(error)}\n\n${USAGE}`);
    return 1;
  }

  if (options.help) {
    console.log(USAGE);
    return 0;
  }

  if (options.initConfig) {
    try {
      createExampleConfig(options.initConfig);
    } catch (error) {
      console.error(`❌ ${describeError(error)}`);
      return 1;
    }
    console.log(`✅ Wrote default configuration to ${options.initConfig}`);
    return 0;
  }

  const manager = buildConfig(options);
  logger.setMinLevel(manager.get('logLevel'));
  logger.setLogFile(manager.get('logFile'));

  let organizer: DownloadsOrganizer;
  try {
    organizer = new DownloadsOrganizer(manager.toOrganizerOptions(() => getDownloadsPath()));
  } catch (error) {
    console.error(`❌ ${describeError(error)}`);
    return 1;
  }

  if (options.watch) {
    const { debounceMs, retries } = manager.get('watch');
    const watcher = watchDownloads(organizer, {
      debounceMs,
      retries,
      onReport: report => printReport(report, false),
    });
    console.log('✅ Watcher active. Press Ctrl+C to stop.');
    await waitForInterrupt();
    await watcher.close();
    console.log('\n👋 Watcher stopped');
    return 0;
  }

  const controller = new AbortController();
  const onInterrupt = (): void => controller.abort();
  process.once('SIGINT', onInterrupt);

  let report: RunReport;
  try {
    report = await organizer.organize({ signal: controller.signal });
  } finally {
    process.off('SIGINT', onInterrupt);
  }

  printReport(report, options.json);

  if (controller.signal.aborted) {
    console.log('\n⚠️  Organization cancelled by user');
    return 1;
  }

  return report.status === 'failed' ? 1 : 0;
}

function realPath(filePath: string): string | null {
  try {
    return realpathSync(filePath);
  } catch {
    return null;
  }
}

/**
 * True when `scriptArg` (process.argv[1]) names this module, also when it is
 * reached through a symlink such as the one npm puts in node_modules/.bin.
 */
export function isMainModule(moduleUrl: string, scriptArg: string | undefined): boolean {
  if (!scriptArg) return false;

  const modulePath = fileURLToPath(moduleUrl);
  const invokedPath = path.resolve(scriptArg);
  if (modulePath === invokedPath) return true;

  const resolvedInvoked = realPath(invokedPath);
  return resolvedInvoked !== null && resolvedInvoked === realPath(modulePath);
}

if (isMainModule(import.meta.url, process.argv[1])) {
  config({ override: false });
  runCli(process.argv.slice(2))
    .then(code => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      const appError = handleError(error, 'CLI');
      console.error(`❌ Unexpected error: ${appError.message}`);
      process.exitCode = 1;
    });
}
