import path from 'path';
import { errorCode, ResolverExhaustedError } from './errors.js';
import { nodeFileSystem, type FileSystemOps } from './fs-ops.js';

export const DEFAULT_MAX_RESOLVE_ATTEMPTS = 10_000;

export interface ResolveOptions {
  maxAttempts?: number;
  fs?: Pick<FileSystemOps, 'lstat'>;
}

/**
 * lstat-based, so a dangling symlink still occupies its name.
 */
export async function pathExists(
  targetPath: string,
  fs: Pick<FileSystemOps, 'lstat'> = nodeFileSystem
): Promise<boolean> {
  try {
    await fs.lstat(targetPath);
    return true;
  } catch (error) {
    const code = errorCode(error);
    if (code === 'ENOENT' || code === 'ENOTDIR') {
      return false;
    }
    throw error;
  }
}

/**
 * Return `desiredPath` if it is free, otherwise the first free
 * "{stem}_{n}{ext}" sibling counting from 1.
 *
 * Best effort: the answer can go stale before the caller uses it, so callers
 * that write must still refuse to overwrite.
 */
export async function resolveDestination(desiredPath: string, options: ResolveOptions = {}): Promise<string> {
  const fs = options.fs ?? nodeFileSystem;
  const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_RESOLVE_ATTEMPTS;

  if (!(await pathExists(desiredPath, fs))) {
    return desiredPath;
  }

  const { dir, name, ext } = path.parse(desiredPath);

  for (let counter = 1; counter <= maxAttempts; counter++) {
    const candidate = path.join(dir, `${name}_${counter}${ext}`);
    if (!(await pathExists(candidate, fs))) {
      return candidate;
    }
  }

  throw new ResolverExhaustedError(desiredPath, maxAttempts);
}
