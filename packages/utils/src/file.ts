/**
 * File Operations
 *
 * Safe file operations with proper error handling.
 */

import {
  mkdir,
  writeFile,
  rename,
  rm,
  access,
  realpath,
  copyFile as fsCopyFile,
  unlink,
} from 'node:fs/promises';
import { basename, dirname, join, resolve } from 'node:path';

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Ensure a directory exists, creating it if necessary
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await mkdir(dirPath, { recursive: true });
}

/**
 * Safely write a file, ensuring the directory exists
 */
export async function safeWriteFile(
  filePath: string,
  content: string | Buffer
): Promise<void> {
  await ensureDir(dirname(filePath));
  await writeFile(filePath, content, 'utf8');
}

export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Remove a file if present. Missing files are not an error.
 */
export async function removeFile(filePath: string): Promise<void> {
  await rm(filePath, { force: true });
}

/**
 * Move a file to a new location.
 * Falls back to copy + unlink when source and destination are on different devices.
 */
export async function moveFile(
  source: string,
  destination: string
): Promise<void> {
  await ensureDir(dirname(destination));
  try {
    await rename(source, destination);
  } catch (error) {
    if (errorCode(error) !== 'EXDEV') {
      throw error;
    }
    await fsCopyFile(source, destination);
    await unlink(source);
  }
}

/**
 * Canonical absolute form of a path.
 *
 * Symlinks are resolved through the nearest existing ancestor, so a path that
 * does not exist yet still compares equal to an existing alias of it.
 */
export async function canonicalPath(filePath: string): Promise<string> {
  const absolute = resolve(filePath);
  try {
    return await realpath(absolute);
  } catch (error) {
    const code = errorCode(error);
    if (code !== 'ENOENT' && code !== 'ENOTDIR') {
      throw error;
    }
    const parent = dirname(absolute);
    if (parent === absolute) {
      return absolute;
    }
    return join(await canonicalPath(parent), basename(absolute));
  }
}
