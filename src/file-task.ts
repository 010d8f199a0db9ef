/**
 * Per-file eligibility pipeline. Checks run in order and the first match
 * decides; files that pass every check go to the mover.
 */

import path from 'path';
import { classifyFile, type CategoryTable } from './categories.js';
import { describeError, errorCode } from './errors.js';
import type { FileMover } from './file-mover.js';
import { nodeFileSystem, type FileSystemOps } from './fs-ops.js';
import type { EvaluationLimits, FileEntry, Outcome } from './types.js';

export const SKIP_REASONS = {
  notRegularFile: 'Not a regular file',
  hidden: 'Hidden or temporary file',
  downloading: 'File currently downloading',
  unknownType: 'Unknown file type',
  cancelled: 'Run cancelled',
} as const;

export const DEFAULT_IN_PROGRESS_EXTENSIONS = ['.crdownload', '.part', '.tmp'];

export const DEFAULT_MAX_FILE_SIZE_BYTES = 10 * 1024 * 1024 * 1024; // 10GB

const GIB = 1024 * 1024 * 1024;
const MIB = 1024 * 1024;

export function formatSizeLimit(bytes: number): string {
  if (bytes >= GIB && bytes % GIB === 0) return `${bytes / GIB}GB`;
  if (bytes >= MIB && bytes % MIB === 0) return `${bytes / MIB}MB`;
  return `${bytes} bytes`;
}

export function tooLargeReason(maxFileSizeBytes: number): string {
  return `File too large (>${formatSizeLimit(maxFileSizeBytes)})`;
}

export interface FileTaskContext {
  directory: string;
  categoryTable: CategoryTable;
  limits: EvaluationLimits;
  mover: FileMover;
  fs?: Pick<FileSystemOps, 'stat'>;
}

function isHiddenOrTemporary(name: string): boolean {
  return name.startsWith('.') || name.startsWith('~');
}

/**
 * True for a regular file (symlinks followed); false when the path is gone.
 */
async function isRegularFile(filePath: string, fs: Pick<FileSystemOps, 'stat'>): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch (error) {
    const code = errorCode(error);
    if (code === 'ENOENT' || code === 'ENOTDIR' || code === 'ELOOP') {
      return false;
    }
    throw error;
  }
}

export async function evaluateFile(entry: FileEntry, context: FileTaskContext): Promise<Outcome> {
  try {
    if (!(await isRegularFile(entry.path, context.fs ?? nodeFileSystem))) {
      return { status: 'skipped', reason: SKIP_REASONS.notRegularFile };
    }

    if (isHiddenOrTemporary(entry.name)) {
      return { status: 'skipped', reason: SKIP_REASONS.hidden };
    }

    if (context.limits.inProgressExtensions.has(entry.extension.toLowerCase())) {
      return { status: 'skipped', reason: SKIP_REASONS.downloading };
    }

    // Size comes from the listing snapshot; an unknown size passes.
    if (entry.size !== undefined && entry.size > context.limits.maxFileSizeBytes) {
      return { status: 'skipped', reason: tooLargeReason(context.limits.maxFileSizeBytes) };
    }

    const category = classifyFile(entry.name, context.categoryTable);
    if (!category) {
      return { status: 'skipped', reason: SKIP_REASONS.unknownType };
    }

    return await context.mover.move(entry.path, path.join(context.directory, category), category);
  } catch (error) {
    return { status: 'error', message: describeError(error) };
  }
}
