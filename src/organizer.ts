/**
 * Downloads organizer: lists the directory once, evaluates every file through
 * a bounded worker pool and aggregates outcomes in completion order.
 */

import path from 'path';
import fg from 'fast-glob';
import pLimit from 'p-limit';
import { logger } from './logger.js';
import { ConfigValidationError, DirectoryAccessError, describeError } from './errors.js';
import { FileMover } from './file-mover.js';
import { evaluateFile, SKIP_REASONS, type FileTaskContext } from './file-task.js';
import { normalizeExtension } from './categories.js';
import { ResultsAggregator } from './results.js';
import { nodeFileSystem, type FileSystemOps } from './fs-ops.js';
import type { FileEntry, OrganizerOptions, Outcome, RunReport } from './types.js';

export const MAX_CONCURRENCY = 64;

export interface OrganizeRunOptions {
  signal?: AbortSignal;
  onOutcome?: (file: string, outcome: Outcome) => void;
}

export interface OrganizerDependencies {
  fs?: FileSystemOps;
}

export function validateOrganizerOptions(options: OrganizerOptions): string[] {
  const errors: string[] = [];

  if (!options.directory || !options.directory.trim()) {
    errors.push('directory must be a non-empty path');
  }
  if (!Number.isInteger(options.concurrency) || options.concurrency < 1 || options.concurrency > MAX_CONCURRENCY) {
    errors.push(`concurrency must be an integer between 1 and ${MAX_CONCURRENCY}`);
  }
  if (!Number.isFinite(options.maxFileSizeBytes) || options.maxFileSizeBytes <= 0) {
    errors.push('maxFileSizeBytes must be a positive number');
  }
  if (options.categoryTable.length === 0) {
    errors.push('categoryTable must define at least one category');
  }

  return errors;
}

export class DownloadsOrganizer {
  private readonly options: OrganizerOptions;
  private readonly context: FileTaskContext;
  private readonly fs: FileSystemOps;

  constructor(options: OrganizerOptions, dependencies: OrganizerDependencies = {}) {
    const errors = validateOrganizerOptions(options);
    if (errors.length > 0) {
      throw new ConfigValidationError(errors);
    }

    this.options = { ...options, directory: path.resolve(options.directory) };
    this.fs = dependencies.fs ?? nodeFileSystem;
    this.context = {
      directory: this.options.directory,
      categoryTable: options.categoryTable,
      limits: {
        maxFileSizeBytes: options.maxFileSizeBytes,
        inProgressExtensions: new Set(options.inProgressExtensions.map(normalizeExtension)),
      },
      mover: new FileMover({ dryRun: options.dryRun, fs: this.fs }),
      fs: this.fs,
    };
  }

  getDirectory(): string {
    return this.options.directory;
  }

  /**
   * Immediate children of the directory that are files (symlinks followed).
   * Throws DirectoryAccessError when the directory cannot be read.
   */
  async listFiles(): Promise<FileEntry[]> {
    const directory = this.options.directory;

    try {
      const directoryStat = await this.fs.stat(directory);
      if (!directoryStat.isDirectory()) {
        throw new DirectoryAccessError(directory, `${directory} is not a directory`);
      }

      const entries = await fg('*', {
        cwd: directory,
        dot: true,
        deep: 1,
        onlyFiles: true,
        followSymbolicLinks: true,
        stats: true,
        suppressErrors: false,
      });

      return entries
        .map((entry): FileEntry => ({
          path: path.join(directory, entry.name),
          name: entry.name,
          extension: path.extname(entry.name).toLowerCase(),
          size: entry.stats?.size,
        }))
        .sort((left, right) => left.name.localeCompare(right.name));
    } catch (error) {
      if (error instanceof DirectoryAccessError) {
        throw error;
      }
      throw new DirectoryAccessError(directory, describeError(error));
    }
  }

  async organize(runOptions: OrganizeRunOptions = {}): Promise<RunReport> {
    const { directory, dryRun, concurrency } = this.options;
    const startedAt = Date.now();
    const aggregator = new ResultsAggregator();

    logger.info(`Starting organization of ${directory}`, { concurrency, dryRun }, 'Organizer');

    let entries: FileEntry[];
    try {
      entries = await this.listFiles();
    } catch (error) {
      const message = describeError(error);
      logger.error(message, error instanceof Error ? error : undefined, 'Organizer');
      return {
        status: 'failed',
        directory,
        dryRun,
        error: message,
        results: aggregator.finish(0, Date.now() - startedAt),
      };
    }

    if (entries.length === 0) {
      logger.info('No files found to organize', undefined, 'Organizer');
      return {
        status: 'empty',
        directory,
        dryRun,
        message: 'No files found to organize',
        results: aggregator.finish(0, Date.now() - startedAt),
      };
    }

    logger.info(`Found ${entries.length} files to process`, undefined, 'Organizer');

    const limit = pLimit(concurrency);
    const collect = (entry: FileEntry, outcome: Outcome): void => {
      aggregator.record(entry.name, outcome);
      if (!runOptions.onOutcome) return;
      try {
        runOptions.onOutcome(entry.name, outcome);
      } catch (error) {
        logger.warn(`Outcome listener failed for ${entry.name}`, { error: describeError(error) }, 'Organizer');
      }
    };

    await Promise.all(
      entries.map(entry =>
        limit(() => this.runTask(entry, runOptions.signal)).then(outcome => collect(entry, outcome))
      )
    );

    const results = aggregator.finish(entries.length, Date.now() - startedAt);

    if (runOptions.signal?.aborted) {
      logger.warn('Organization cancelled before all files were processed', undefined, 'Organizer');
    }

    logger.info('Organization complete', { ...results.stats }, 'Organizer');

    return { status: 'completed', directory, dryRun, results };
  }

  private async runTask(entry: FileEntry, signal?: AbortSignal): Promise<Outcome> {
    if (signal?.aborted) {
      return { status: 'skipped', reason: SKIP_REASONS.cancelled };
    }
    return evaluateFile(entry, this.context);
  }
}
