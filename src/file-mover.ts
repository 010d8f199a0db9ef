/**
 * Relocates one file into its category folder without overwriting anything
 * already there.
 *
 * Same filesystem: hard link to the destination, then unlink the source. The
 * link fails with EEXIST if another writer claimed the name after it was
 * resolved, in which case the name is resolved again.
 * Different filesystem (EXDEV): exclusive copy, size check, then unlink the
 * source. The source is only removed once the copy is verified.
 * No hard link support: plain rename.
 */

import path from 'path';
import { logger, AppError } from './logger.js';
import { describeError, errorCode, FolderCreationError, MoveError } from './errors.js';
import { resolveDestination, DEFAULT_MAX_RESOLVE_ATTEMPTS } from './destination-resolver.js';
import { nodeFileSystem, type FileSystemOps } from './fs-ops.js';
import type { MoveResult } from './types.js';

type ClaimStrategy = 'link' | 'copy' | 'rename';

// Codes link(2) reports when the filesystem cannot hold hard links.
const LINK_UNSUPPORTED_CODES = new Set(['EPERM', 'ENOTSUP', 'EOPNOTSUPP', 'ENOSYS', 'EMLINK']);

const MAX_CLAIM_ATTEMPTS = 25;

export interface FileMoverOptions {
  dryRun?: boolean;
  fs?: FileSystemOps;
  maxResolveAttempts?: number;
}

export class FileMover {
  private readonly dryRun: boolean;
  private readonly fs: FileSystemOps;
  private readonly maxResolveAttempts: number;

  constructor(options: FileMoverOptions = {}) {
    this.dryRun = options.dryRun ?? false;
    this.fs = options.fs ?? nodeFileSystem;
    this.maxResolveAttempts = options.maxResolveAttempts ?? DEFAULT_MAX_RESOLVE_ATTEMPTS;
  }

  async move(source: string, categoryFolder: string, category: string): Promise<MoveResult> {
    const desired = path.join(categoryFolder, path.basename(source));

    try {
      const destination = this.dryRun
        ? await this.resolve(desired)
        : await this.relocate(source, categoryFolder, desired);

      logger.debug(
        this.dryRun ? 'Planned move' : 'Moved file',
        { source, destination, category },
        'FileMover'
      );

      return { status: 'moved', category, destination, planned: this.dryRun };
    } catch (error) {
      const failure = error instanceof AppError
        ? error
        : new MoveError(source, desired, describeError(error));

      logger.warn(`Failed to move ${source} to ${desired}: ${failure.message}`, { code: failure.code }, 'FileMover');
      return { status: 'error', message: failure.message };
    }
  }

  private resolve(desired: string): Promise<string> {
    return resolveDestination(desired, { fs: this.fs, maxAttempts: this.maxResolveAttempts });
  }

  private async ensureFolder(folder: string): Promise<void> {
    try {
      await this.fs.mkdir(folder);
    } catch (error) {
      throw new FolderCreationError(folder, describeError(error));
    }
  }

  private async relocate(source: string, categoryFolder: string, desired: string): Promise<string> {
    await this.ensureFolder(categoryFolder);

    let strategy: ClaimStrategy = 'link';
    let destination = await this.resolve(desired);

    for (let attempt = 1; attempt <= MAX_CLAIM_ATTEMPTS; attempt++) {
      try {
        await this.claim(strategy, source, destination);
        return destination;
      } catch (error) {
        if (error instanceof AppError) {
          throw error;
        }

        const code = errorCode(error);

        if (code === 'EEXIST') {
          destination = await this.resolve(desired);
          continue;
        }
        if (strategy === 'link' && code === 'EXDEV') {
          strategy = 'copy';
          continue;
        }
        if (strategy === 'link' && code !== undefined && LINK_UNSUPPORTED_CODES.has(code)) {
          strategy = 'rename';
          continue;
        }

        throw new MoveError(source, destination, describeError(error));
      }
    }

    throw new MoveError(
      source,
      desired,
      `destination ${desired} kept being taken by another writer after ${MAX_CLAIM_ATTEMPTS} attempts`
    );
  }

  private async claim(strategy: ClaimStrategy, source: string, destination: string): Promise<void> {
    switch (strategy) {
      case 'link':
        await this.fs.link(source, destination);
        await this.releaseSource(source, destination);
        return;
      case 'copy':
        await this.copyAcrossDevices(source, destination);
        return;
      case 'rename':
        await this.fs.rename(source, destination);
        return;
    }
  }

  /**
   * Remove the source once the destination holds the data. If that fails the
   * destination is dropped again so the file is not left in two places.
   */
  private async releaseSource(source: string, destination: string): Promise<void> {
    try {
      await this.fs.unlink(source);
    } catch (error) {
      await this.discard(destination);
      throw new MoveError(source, destination, describeError(error));
    }
  }

  private async copyAcrossDevices(source: string, destination: string): Promise<void> {
    const sourceStats = await this.fs.stat(source);

    try {
      await this.fs.copyFileExclusive(source, destination);
    } catch (error) {
      // EEXIST means someone else owns the name; anything else may have left a partial copy.
      if (errorCode(error) !== 'EEXIST') {
        await this.discard(destination);
      }
      throw error;
    }

    let copiedSize: number;
    try {
      copiedSize = (await this.fs.stat(destination)).size;
    } catch (error) {
      await this.discard(destination);
      throw new MoveError(source, destination, `could not verify copy: ${describeError(error)}`);
    }

    if (copiedSize !== sourceStats.size) {
      await this.discard(destination);
      throw new MoveError(
        source,
        destination,
        `copy verification failed (expected ${sourceStats.size} bytes, found ${copiedSize})`
      );
    }

    await this.releaseSource(source, destination);
  }

  private async discard(target: string): Promise<void> {
    try {
      await this.fs.removeIfPresent(target);
    } catch (error) {
      logger.error(`Could not remove ${target} after a failed move`, error instanceof Error ? error : undefined, 'FileMover');
    }
  }
}
