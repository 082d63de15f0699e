/**
 * Output Path Resolution
 *
 * Maps a source file to the path its converted copy is written to.
 * The result never canonically equals the source path.
 */

import { dirname, join, relative, isAbsolute, sep } from 'node:path';
import {
  canonicalPath,
  collapseWhitespace,
  ensureDir,
  getBasename,
} from '@vidshift/utils';
import { OutputDirectoryError, type ConversionProfile } from '@vidshift/core';

export const COLLISION_SUFFIX = '_converted';

type PathProfile = Pick<
  ConversionProfile,
  'outputPlacement' | 'inputRoot' | 'outputRoot' | 'renamePatterns' | 'container'
>;

/**
 * Strip every configured substring from a stem, in list order, then collapse
 * whitespace. An empty result falls back to the original stem.
 */
export function cleanStem(stem: string, patterns: readonly string[]): string {
  let cleaned = stem;
  for (const pattern of patterns) {
    if (pattern) {
      cleaned = cleaned.split(pattern).join('');
    }
  }
  cleaned = collapseWhitespace(cleaned);
  return cleaned || stem;
}

/**
 * Directory the output lands in, before any collision handling
 */
export function outputBaseDir(sourcePath: string, profile: PathProfile): string {
  const sourceDir = dirname(sourcePath);
  if (profile.outputPlacement === 'same-dir') {
    return sourceDir;
  }

  const rel = relative(profile.inputRoot, sourceDir);
  // Sources outside the input root have no subtree to mirror
  if (rel === '' || rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
    return profile.outputRoot;
  }
  return join(profile.outputRoot, rel);
}

/**
 * Output path before collision handling. No filesystem access.
 */
export function nominalOutputPath(sourcePath: string, profile: PathProfile): string {
  const stem = cleanStem(getBasename(sourcePath), profile.renamePatterns);
  return join(outputBaseDir(sourcePath, profile), `${stem}${profile.container.extension}`);
}

/**
 * Compute the output path without touching the filesystem beyond
 * resolving symlinks.
 */
export async function computeOutputPath(
  sourcePath: string,
  profile: PathProfile
): Promise<string> {
  const baseDir = outputBaseDir(sourcePath, profile);
  const stem = cleanStem(getBasename(sourcePath), profile.renamePatterns);
  const extension = profile.container.extension;
  const canonicalSource = await canonicalPath(sourcePath);

  let candidate = nominalOutputPath(sourcePath, profile);
  let counter = 1;
  while ((await canonicalPath(candidate)) === canonicalSource) {
    const suffix = counter === 1 ? COLLISION_SUFFIX : `${COLLISION_SUFFIX}_${counter}`;
    candidate = join(baseDir, `${stem}${suffix}${extension}`);
    counter += 1;
  }

  return candidate;
}

/**
 * Compute the output path and make sure its directory exists.
 * Throws OutputDirectoryError when the directory cannot be created.
 */
export async function resolveOutputPath(
  sourcePath: string,
  profile: PathProfile
): Promise<string> {
  const outputPath = await computeOutputPath(sourcePath, profile);
  const directory = dirname(outputPath);
  try {
    await ensureDir(directory);
  } catch (error) {
    throw new OutputDirectoryError(directory, error);
  }
  return outputPath;
}
