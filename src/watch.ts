/**
 * Watch mode: re-run the organizer when new files land in the directory.
 * Bursts of events are debounced into one run and runs never overlap.
 */

import { watch } from 'chokidar';
import pRetry from 'p-retry';
import { logger, AppError } from './logger.js';
import type { DownloadsOrganizer } from './organizer.js';
import type { RunReport } from './types.js';

export interface DebouncedRunner {
  trigger(): void;
  runNow(): void;
  cancel(): void;
  idle(): Promise<void>;
}

/**
 * `trigger` restarts the delay; a trigger that arrives while a run is in
 * progress schedules exactly one follow-up once it finishes.
 */
export function createDebouncedRunner(run: () => Promise<void>, delayMs: number): DebouncedRunner {
  let timer: NodeJS.Timeout | null = null;
  let running: Promise<void> | null = null;
  let pending = false;
  let cancelled = false;

  const start = (): void => {
    timer = null;
    if (cancelled) return;
    if (running) {
      pending = true;
      return;
    }

    running = run()
      .catch((error: unknown) => {
        logger.error('Scheduled organization failed', error instanceof Error ? error : undefined, 'Watch');
      })
      .finally(() => {
        running = null;
        if (pending && !cancelled) {
          pending = false;
          schedule();
        }
      });
  };

  const schedule = (): void => {
    if (cancelled) return;
    if (timer) clearTimeout(timer);
    timer = setTimeout(start, delayMs);
  };

  return {
    trigger: schedule,
    runNow: () => {
      if (timer) clearTimeout(timer);
      start();
    },
    cancel: () => {
      cancelled = true;
      pending = false;
      if (timer) clearTimeout(timer);
      timer = null;
    },
    idle: async () => {
      while (running) {
        await running;
      }
    },
  };
}

export interface WatchOptions {
  debounceMs: number;
  retries: number;
  runOnStart?: boolean;
  onReport?: (report: RunReport) => void;
}

export interface DownloadsWatcher {
  close(): Promise<void>;
}

export function watchDownloads(organizer: DownloadsOrganizer, options: WatchOptions): DownloadsWatcher {
  const directory = organizer.getDirectory();

  const runOnce = async (): Promise<void> => {
    const report = await pRetry(
      async () => {
        const result = await organizer.organize();
        if (result.status === 'failed') {
          throw new AppError(result.error ?? 'Organization failed', 'RUN_FAILED', 500, { directory });
        }
        return result;
      },
      {
        retries: options.retries,
        minTimeout: 500,
        factor: 2,
        onFailedAttempt: (error) => {
          logger.warn(
            `Organize attempt ${error.attemptNumber} failed: ${error.message}`,
            { retriesLeft: error.retriesLeft },
            'Watch'
          );
        },
      }
    );
    options.onReport?.(report);
  };

  const runner = createDebouncedRunner(runOnce, options.debounceMs);

  const watcher = watch(directory, {
    depth: 0,
    persistent: true,
    ignoreInitial: true, // Existing files are handled by the start-up run
    awaitWriteFinish: {
      stabilityThreshold: 2000,
      pollInterval: 200,
    },
  });

  watcher.on('add', (filePath: string) => {
    logger.debug(`File added: ${filePath}`, undefined, 'Watch');
    runner.trigger();
  });

  watcher.on('error', (error: unknown) => {
    logger.error('Watcher error', error instanceof Error ? error : undefined, 'Watch');
  });

  logger.info(`Watching ${directory} for new files`, { debounceMs: options.debounceMs }, 'Watch');

  if (options.runOnStart ?? true) {
    runner.runNow();
  }

  return {
    close: async () => {
      runner.cancel();
      await watcher.close();
      await runner.idle();
    },
  };
}
