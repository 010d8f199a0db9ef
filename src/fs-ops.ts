/**
 * Filesystem primitives used by the resolver and the mover.
 * Tests swap individual calls to reproduce failures such as EXDEV.
 */

import * as fsp from 'fs/promises';
import type { Stats } from 'fs';

export interface FileSystemOps {
  stat(path: string): Promise<Stats>;
  lstat(path: string): Promise<Stats>;
  mkdir(path: string): Promise<void>;
  link(existingPath: string, newPath: string): Promise<void>;
  unlink(path: string): Promise<void>;
  rename(oldPath: string, newPath: string): Promise<void>;
  copyFileExclusive(source: string, destination: string): Promise<void>;
  removeIfPresent(path: string): Promise<void>;
}

export const nodeFileSystem: FileSystemOps = {
  stat: (path) => fsp.stat(path),
  lstat: (path) => fsp.lstat(path),
  mkdir: async (path) => {
    await fsp.mkdir(path, { recursive: true });
  },
  link: (existingPath, newPath) => fsp.link(existingPath, newPath),
  unlink: (path) => fsp.unlink(path),
  rename: (oldPath, newPath) => fsp.rename(oldPath, newPath),
  copyFileExclusive: (source, destination) => fsp.copyFile(source, destination, fsp.constants.COPYFILE_EXCL),
  removeIfPresent: (path) => fsp.rm(path, { force: true }),
};

export function withFileSystem(overrides: Partial<FileSystemOps>): FileSystemOps {
  return { ...nodeFileSystem, ...overrides };
}
