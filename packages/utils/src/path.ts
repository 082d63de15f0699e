/**
 * Path Utilities
 */

import { extname, basename } from 'node:path';

/**
 * Get file extension (lowercase, with leading dot)
 */
export function getExtension(filename: string): string {
  return extname(filename).toLowerCase();
}

/**
 * Get base filename without extension
 */
export function getBasename(filename: string): string {
  const ext = extname(filename);
  return basename(filename, ext);
}

/**
 * Collapse whitespace runs into single spaces and trim the ends
 */
export function collapseWhitespace(value: string): string {
  return value.split(/\s+/).filter(Boolean).join(' ');
}

/**
 * Mask the tail of a secret-bearing URL for logs
 */
export function maskUrl(url: string, visible: number = 30): string {
  return url.length <= visible ? url : `${url.substring(0, visible)}...`;
}
