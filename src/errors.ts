/**
 * Error taxonomy for an organization run.
 *
 * Only DirectoryAccessError aborts a run. The per-file errors are caught by
 * the file task and turned into that file's Error outcome.
 */

import { AppError } from './logger.js';

export class DirectoryAccessError extends AppError {
  constructor(directory: string, detail: string) {
    super(`Cannot access downloads folder: ${detail}`, 'DIRECTORY_ACCESS_FAILED', 500, { directory });
    this.name = 'DirectoryAccessError';
  }
}

export class FolderCreationError extends AppError {
  constructor(folder: string, detail: string) {
    super(`Failed to create folder ${folder}: ${detail}`, 'FOLDER_CREATION_FAILED', 500, { folder });
    this.name = 'FolderCreationError';
  }
}

export class MoveError extends AppError {
  constructor(source: string, destination: string, detail: string) {
    super(`Move operation failed: ${detail}`, 'MOVE_FAILED', 500, { source, destination });
    this.name = 'MoveError';
  }
}

export class ResolverExhaustedError extends AppError {
  constructor(desiredPath: string, attempts: number) {
    super(
      `No free destination name for ${desiredPath} after ${attempts} attempts`,
      'RESOLVER_EXHAUSTED',
      500,
      { desiredPath, attempts }
    );
    this.name = 'ResolverExhaustedError';
  }
}

export class ConfigValidationError extends AppError {
  constructor(public readonly errors: string[]) {
    super(`Invalid configuration: ${errors.join('; ')}`, 'INVALID_CONFIG', 400, { errors });
    this.name = 'ConfigValidationError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Node system errors carry a string `code` such as ENOENT or EXDEV.
 */
export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}
