import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs/promises';
import path from 'node:path';
import os from 'node:os';
import { canonicalPath, moveFile, pathExists, removeFile } from './file.js';

describe('file operations', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'vidshift-file-')));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe('canonicalPath', () => {
    it('resolves relative segments of a missing path', async () => {
      const result = await canonicalPath(path.join(dir, 'a', '..', 'b', 'movie.mp4'));
      expect(result).toBe(path.join(dir, 'b', 'movie.mp4'));
    });

    it('resolves a symlinked directory for a file that does not exist yet', async () => {
      await fs.mkdir(path.join(dir, 'real'));
      await fs.symlink(path.join(dir, 'real'), path.join(dir, 'alias'));

      const result = await canonicalPath(path.join(dir, 'alias', 'new.mp4'));
      expect(result).toBe(path.join(dir, 'real', 'new.mp4'));
    });

    it('resolves a symlinked file to its target', async () => {
      await fs.writeFile(path.join(dir, 'movie.mp4'), 'x');
      await fs.symlink(path.join(dir, 'movie.mp4'), path.join(dir, 'link.mp4'));

      expect(await canonicalPath(path.join(dir, 'link.mp4'))).toBe(path.join(dir, 'movie.mp4'));
    });
  });

  describe('moveFile', () => {
    it('creates the destination directory and moves the file', async () => {
      const source = path.join(dir, 'in.mkv');
      const target = path.join(dir, 'failed', 'nested', 'in.mkv');
      await fs.writeFile(source, 'payload');

      await moveFile(source, target);

      expect(await pathExists(source)).toBe(false);
      expect(await fs.readFile(target, 'utf8')).toBe('payload');
    });

    it('rejects when the source is missing', async () => {
      await expect(moveFile(path.join(dir, 'missing.mkv'), path.join(dir, 'out.mkv'))).rejects.toThrow();
    });
  });

  describe('removeFile', () => {
    it('ignores files that do not exist', async () => {
      await expect(removeFile(path.join(dir, 'missing.mp4'))).resolves.toBeUndefined();
    });
  });
});
