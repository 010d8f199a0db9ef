/**
 * Single writer of RunResults. The dispatcher feeds it one outcome per file
 * as tasks complete.
 */

import type { Outcome, RunResults } from './types.js';

export function createEmptyResults(): RunResults {
  return {
    moved: {},
    skipped: [],
    errors: [],
    stats: {
      totalFiles: 0,
      moved: 0,
      skipped: 0,
      errors: 0,
      executionTimeSeconds: 0,
    },
  };
}

export class ResultsAggregator {
  private results: RunResults = createEmptyResults();
  private finished = false;

  record(file: string, outcome: Outcome): void {
    if (this.finished) {
      throw new Error(`Cannot record ${file}: results are already final`);
    }

    switch (outcome.status) {
      case 'moved': {
        const files = this.results.moved[outcome.category] ?? [];
        files.push(file);
        this.results.moved[outcome.category] = files;
        this.results.stats.moved++;
        break;
      }
      case 'skipped':
        this.results.skipped.push({ file, reason: outcome.reason });
        this.results.stats.skipped++;
        break;
      case 'error':
        this.results.errors.push({ file, message: outcome.message });
        this.results.stats.errors++;
        break;
    }
  }

  recorded(): number {
    const { moved, skipped, errors } = this.results.stats;
    return moved + skipped + errors;
  }

  /**
   * Stamp totals and timing, then freeze the report.
   */
  finish(totalFiles: number, elapsedMs: number): RunResults {
    if (!this.finished) {
      this.results.stats.totalFiles = totalFiles;
      this.results.stats.executionTimeSeconds = Math.round(elapsedMs / 10) / 100;
      this.finished = true;
      deepFreeze(this.results);
    }
    return this.results;
  }
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
