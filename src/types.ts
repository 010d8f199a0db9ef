/**
 * Core types for the downloads organizer
 */

import type { CategoryTable } from './categories.js';

/**
 * Snapshot of one candidate file, taken once when the directory is listed
 */
export interface FileEntry {
  path: string;
  name: string;
  extension: string;   // lowercased final suffix, e.g. ".gz"
  size?: number;       // absent when the listing could not stat the file
}

export type MovedOutcome = {
  status: 'moved';
  category: string;
  destination: string;
  planned: boolean;    // true for dry-run moves that did not touch the disk
};

export type SkippedOutcome = {
  status: 'skipped';
  reason: string;
};

export type ErrorOutcome = {
  status: 'error';
  message: string;
};

export type Outcome = MovedOutcome | SkippedOutcome | ErrorOutcome;

export type MoveResult = MovedOutcome | ErrorOutcome;

export interface SkippedFile {
  file: string;
  reason: string;
}

export interface FailedFile {
  file: string;
  message: string;
}

export interface RunStats {
  totalFiles: number;
  moved: number;
  skipped: number;
  errors: number;
  executionTimeSeconds: number;
}

export interface RunResults {
  moved: Record<string, string[]>;
  skipped: SkippedFile[];
  errors: FailedFile[];
  stats: RunStats;
}

export type RunStatus = 'completed' | 'empty' | 'failed';

export interface RunReport {
  status: RunStatus;
  directory: string;
  dryRun: boolean;
  results: RunResults;
  message?: string;
  error?: string;
}

export interface EvaluationLimits {
  maxFileSizeBytes: number;
  inProgressExtensions: ReadonlySet<string>;
}

export interface OrganizerOptions {
  directory: string;
  concurrency: number;
  categoryTable: CategoryTable;
  maxFileSizeBytes: number;
  inProgressExtensions: string[];
  dryRun: boolean;
}
