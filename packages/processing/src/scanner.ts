/**
 * Video discovery
 */

import { readdir } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { createLogger, getExtension, pathExists } from '@vidshift/utils';

const logger = createLogger({ module: 'scanner' });

/**
 * Recursively collect files under `root` whose extension is listed.
 * Entries are visited in lexical order so runs are reproducible.
 */
export async function scanForVideos(
  root: string,
  extensions: readonly string[]
): Promise<string[]> {
  const absoluteRoot = resolve(root);
  if (!(await pathExists(absoluteRoot))) {
    logger.warn({ root: absoluteRoot }, 'Input directory does not exist');
    return [];
  }

  const wanted = new Set(extensions.map((ext) => ext.toLowerCase()));
  const found: string[] = [];

  const walk = async (dir: string): Promise<void> => {
    const entries = await readdir(dir, { withFileTypes: true });
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      const fullPath = join(dir, entry.name);
      if (entry.isDirectory()) {
        await walk(fullPath);
      } else if (entry.isFile() && wanted.has(getExtension(entry.name))) {
        found.push(fullPath);
      }
    }
  };

  await walk(absoluteRoot);
  logger.info({ root: absoluteRoot, count: found.length }, 'Scan complete');
  return found;
}
