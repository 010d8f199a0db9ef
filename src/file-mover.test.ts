import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { link, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { FileMover } from './file-mover.js';
import { withFileSystem } from './fs-ops.js';

function systemError(code: string, message: string): Error {
  return Object.assign(new Error(message), { code });
}

describe('FileMover', () => {
  let dir: string;
  let images: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'organizer-mover-'));
    images = join(dir, 'images');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function seed(name: string, content: string): string {
    const filePath = join(dir, name);
    writeFileSync(filePath, content);
    return filePath;
  }

  it('moves a file into its category folder', async () => {
    const source = seed('photo.jpg', 'pixels');

    const result = await new FileMover().move(source, images, 'images');

    expect(result).toEqual({
      status: 'moved',
      category: 'images',
      destination: join(images, 'photo.jpg'),
      planned: false,
    });
    expect(existsSync(source)).toBe(false);
    expect(readFileSync(join(images, 'photo.jpg'), 'utf8')).toBe('pixels');
  });

  it('never overwrites an existing file', async () => {
    mkdirSync(images);
    writeFileSync(join(images, 'photo.jpg'), 'older');
    const source = seed('photo.jpg', 'newer');

    const result = await new FileMover().move(source, images, 'images');

    expect(result).toEqual({
      status: 'moved',
      category: 'images',
      destination: join(images, 'photo_1.jpg'),
      planned: false,
    });
    expect(readFileSync(join(images, 'photo.jpg'), 'utf8')).toBe('older');
    expect(readFileSync(join(images, 'photo_1.jpg'), 'utf8')).toBe('newer');
  });

  it('only plans the move in dry-run mode', async () => {
    const source = seed('photo.jpg', 'pixels');

    const result = await new FileMover({ dryRun: true }).move(source, images, 'images');

    expect(result).toEqual({
      status: 'moved',
      category: 'images',
      destination: join(images, 'photo.jpg'),
      planned: true,
    });
    expect(existsSync(source)).toBe(true);
    expect(existsSync(images)).toBe(false);
  });

  it('reports a folder that cannot be created', async () => {
    const source = seed('photo.jpg', 'pixels');
    const fs = withFileSystem({
      mkdir: async () => {
        throw systemError('EACCES', 'permission denied');
      },
    });

    const result = await new FileMover({ fs }).move(source, images, 'images');

    expect(result).toEqual({
      status: 'error',
      message: `Failed to create folder ${images}: permission denied`,
    });
    expect(existsSync(source)).toBe(true);
  });

  describe('across devices', () => {
    const crossDevice = {
      link: async () => {
        throw systemError('EXDEV', 'cross-device link not permitted');
      },
    };

    it('copies, verifies and removes the source', async () => {
      const source = seed('report.pdf', 'full-content');

      const result = await new FileMover({ fs: withFileSystem(crossDevice) }).move(source, join(dir, 'documents'), 'documents');

      expect(result).toEqual({
        status: 'moved',
        category: 'documents',
        destination: join(dir, 'documents', 'report.pdf'),
        planned: false,
      });
      expect(existsSync(source)).toBe(false);
      expect(readFileSync(join(dir, 'documents', 'report.pdf'), 'utf8')).toBe('full-content');
    });

    it('keeps the source when the copy is short', async () => {
      const source = seed('report.pdf', 'full-content');
      const documents = join(dir, 'documents');
      const fs = withFileSystem({
        ...crossDevice,
        copyFileExclusive: async (_from, to) => {
          await writeFile(to, 'partial');
        },
      });

      const result = await new FileMover({ fs }).move(source, documents, 'documents');

      expect(result).toEqual({
        status: 'error',
        message: 'Move operation failed: copy verification failed (expected 12 bytes, found 7)',
      });
      expect(readFileSync(source, 'utf8')).toBe('full-content');
      expect(existsSync(join(documents, 'report.pdf'))).toBe(false);
    });

    it('removes a partial copy when the copy fails', async () => {
      const source = seed('report.pdf', 'full-content');
      const documents = join(dir, 'documents');
      const fs = withFileSystem({
        ...crossDevice,
        copyFileExclusive: async (_from, to) => {
          await writeFile(to, 'full');
          throw systemError('ENOSPC', 'no space left on device');
        },
      });

      const result = await new FileMover({ fs }).move(source, documents, 'documents');

      expect(result).toEqual({
        status: 'error',
        message: 'Move operation failed: no space left on device',
      });
      expect(readFileSync(source, 'utf8')).toBe('full-content');
      expect(existsSync(join(documents, 'report.pdf'))).toBe(false);
    });
  });

  it('falls back to rename when hard links are unsupported', async () => {
    const source = seed('photo.jpg', 'pixels');
    const fs = withFileSystem({
      link: async () => {
        throw systemError('EPERM', 'operation not permitted');
      },
    });

    const result = await new FileMover({ fs }).move(source, images, 'images');

    expect(result).toMatchObject({ status: 'moved', destination: join(images, 'photo.jpg') });
    expect(existsSync(source)).toBe(false);
    expect(readFileSync(join(images, 'photo.jpg'), 'utf8')).toBe('pixels');
  });

  it('picks a new name when another writer takes the resolved one', async () => {
    const source = seed('photo.jpg', 'mine');
    let raced = false;
    const fs = withFileSystem({
      link: async (from, to) => {
        if (!raced) {
          raced = true;
          await writeFile(to, 'theirs');
          throw systemError('EEXIST', 'file already exists');
        }
        await link(from, to);
      },
    });

    const result = await new FileMover({ fs }).move(source, images, 'images');

    expect(result).toMatchObject({ status: 'moved', destination: join(images, 'photo_1.jpg') });
    expect(readFileSync(join(images, 'photo.jpg'), 'utf8')).toBe('theirs');
    expect(readFileSync(join(images, 'photo_1.jpg'), 'utf8')).toBe('mine');
  });

  it('gives up when other writers keep taking the destination', async () => {
    const source = seed('photo.jpg', 'mine');
    let claims = 0;
    const fs = withFileSystem({
      link: async () => {
        claims++;
        throw systemError('EEXIST', 'file already exists');
      },
    });

    const result = await new FileMover({ fs }).move(source, images, 'images');

    expect(result).toEqual({
      status: 'error',
      message: `Move operation failed: destination ${join(images, 'photo.jpg')} kept being taken by another writer after 25 attempts`,
    });
    expect(claims).toBe(25);
    expect(readFileSync(source, 'utf8')).toBe('mine');
  });

  it('undoes the link when the source cannot be removed', async () => {
    const source = seed('photo.jpg', 'pixels');
    const fs = withFileSystem({
      unlink: async () => {
        throw systemError('EACCES', 'permission denied');
      },
    });

    const result = await new FileMover({ fs }).move(source, images, 'images');

    expect(result).toEqual({ status: 'error', message: 'Move operation failed: permission denied' });
    expect(existsSync(source)).toBe(true);
    expect(existsSync(join(images, 'photo.jpg'))).toBe(false);
  });

  it('reports a source that vanished', async () => {
    const result = await new FileMover().move(join(dir, 'gone.jpg'), images, 'images');

    expect(result.status).toBe('error');
    if (result.status === 'error') {
      expect(result.message).toMatch(/^Move operation failed: ENOENT/);
    }
  });
});
