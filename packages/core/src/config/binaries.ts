/**
 * Binary Configuration
 *
 * Centralized configuration for the external binaries vidshift drives.
 *
 * Priority order:
 * 1. Explicit override (CLI config)
 * 2. Environment variables (e.g., FFMPEG_PATH)
 * 3. System PATH
 */

import { existsSync } from 'node:fs';
import { spawn } from 'node:child_process';

export interface BinaryConfig {
  name: string;
  envVar: string;
  resolvedPath: string;
  source: 'override' | 'env' | 'path';
}

export interface BinariesConfig {
  ffmpeg: BinaryConfig;
  ffprobe: BinaryConfig;
}

export type BinaryName = keyof BinariesConfig;

/**
 * Get executable name for current OS
 */
function getExeName(name: string): string {
  return process.platform === 'win32' ? `${name}.exe` : name;
}

function resolveBinaryPath(
  name: string,
  envVar: string,
  override: string | undefined,
  env: NodeJS.ProcessEnv
): BinaryConfig {
  if (override) {
    return { name, envVar, resolvedPath: override, source: 'override' };
  }

  const envPath = env[envVar];
  if (envPath && existsSync(envPath)) {
    return { name, envVar, resolvedPath: envPath, source: 'env' };
  }

  // Let the system PATH resolve it; a missing binary fails at spawn time
  return { name, envVar, resolvedPath: getExeName(name), source: 'path' };
}

/**
 * Get all binary configurations
 */
export function getBinariesConfig(
  overrides: Partial<Record<BinaryName, string>> = {},
  env: NodeJS.ProcessEnv = process.env
): BinariesConfig {
  return {
    ffmpeg: resolveBinaryPath('ffmpeg', 'FFMPEG_PATH', overrides.ffmpeg, env),
    ffprobe: resolveBinaryPath('ffprobe', 'FFPROBE_PATH', overrides.ffprobe, env),
  };
}

/**
 * Check if a binary answers `-version`
 */
export async function isBinaryAvailable(binaryPath: string): Promise<boolean> {
  return new Promise((resolve) => {
    try {
      const proc = spawn(binaryPath, ['-version'], {
        stdio: 'ignore',
        timeout: 5000,
      });

      proc.on('close', (code) => {
        resolve(code === 0);
      });

      proc.on('error', () => {
        resolve(false);
      });
    } catch {
      resolve(false);
    }
  });
}
