/**
 * CLI Configuration
 *
 * Builds the session settings once, from (lowest to highest precedence):
 * schema defaults, an optional JSON config file, environment variables,
 * and command-line flags.
 */

import { z } from 'zod';
import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import {
  createProfile,
  getBinariesConfig,
  ValidationError,
  type BinariesConfig,
  type ConversionProfile,
} from '@vidshift/core';
import { isObject } from '@vidshift/utils';

// Environment schema
const envSchema = z.object({
  VIDSHIFT_INPUT_DIR: z.string().min(1).optional(),
  VIDSHIFT_OUTPUT_DIR: z.string().min(1).optional(),
  VIDSHIFT_WORK_DIR: z.string().min(1).optional(),
  VIDSHIFT_PROFILE: z.enum(['plex-friendly', 'archival']).optional(),
  VIDSHIFT_CONFIG: z.string().min(1).optional(),
  VIDSHIFT_WEBHOOK_URL: z.union([z.string().url(), z.literal('')]).optional(),
  VIDSHIFT_TOOL_TIMEOUT_MS: z.string().regex(/^\d+$/).transform(Number).optional(),
  FFMPEG_PATH: z.string().optional(),
  FFPROBE_PATH: z.string().optional(),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).optional(),
});

type Env = z.infer<typeof envSchema>;

/**
 * Flags shared by the commands that build a profile
 */
export interface ProfileFlags {
  input?: string;
  output?: string;
  workDir?: string;
  config?: string;
  sameDirOutput?: boolean;
  overwrite?: boolean;
  deleteOriginal?: boolean;
  maxRetries?: number;
  highQuality4k?: boolean;
  skipAudioValidation?: boolean;
  subtitles?: string;
  rename?: string[];
  profile?: string;
  timeout?: number;
}

export interface Settings {
  profile: ConversionProfile;
  binaries: BinariesConfig;
  webhookUrl?: string;
  configFile?: string;
}

export interface LoadSettingsOptions {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

function parseEnv(env: NodeJS.ProcessEnv): Env {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(
      issue?.path.join('.') || 'environment',
      issue?.message ?? 'invalid environment'
    );
  }
  return parsed.data;
}

// Load config from file
function loadConfigFile(filePath: string): Record<string, unknown> {
  if (!existsSync(filePath)) {
    throw new ValidationError('config', `file not found: ${filePath}`);
  }

  let content: unknown;
  try {
    content = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ValidationError(
      'config',
      `${filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  if (!isObject(content)) {
    throw new ValidationError('config', `${filePath} must contain a JSON object`);
  }
  return content;
}

/**
 * Drop undefined entries so they do not shadow lower-precedence values
 */
function defined(values: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(values).filter(([, value]) => value !== undefined)
  );
}

function envLayer(env: Env): Record<string, unknown> {
  return defined({
    inputRoot: env.VIDSHIFT_INPUT_DIR,
    outputRoot: env.VIDSHIFT_OUTPUT_DIR,
    workDir: env.VIDSHIFT_WORK_DIR,
    extensionProfile: env.VIDSHIFT_PROFILE,
    toolTimeoutMs: env.VIDSHIFT_TOOL_TIMEOUT_MS,
  });
}

function flagLayer(flags: ProfileFlags): Record<string, unknown> {
  return defined({
    inputRoot: flags.input,
    outputRoot: flags.output,
    workDir: flags.workDir,
    outputPlacement: flags.sameDirOutput ? 'same-dir' : undefined,
    overwriteExisting: flags.overwrite ? true : undefined,
    deleteAfterSuccess: flags.deleteOriginal ? true : undefined,
    maxRetries: flags.maxRetries,
    highQuality4k: flags.highQuality4k ? true : undefined,
    validateAudio: flags.skipAudioValidation ? false : undefined,
    subtitleMode: flags.subtitles,
    renamePatterns: flags.rename && flags.rename.length > 0 ? flags.rename : undefined,
    extensionProfile: flags.profile,
    toolTimeoutMs: flags.timeout,
  });
}

/**
 * Resolve the settings for one session. Throws ValidationError on bad input.
 */
export function loadSettings(
  flags: ProfileFlags = {},
  options: LoadSettingsOptions = {}
): Settings {
  const cwd = options.cwd ?? process.cwd();
  const env = parseEnv(options.env ?? process.env);

  const configPath = flags.config ?? env.VIDSHIFT_CONFIG;
  const configFile = configPath ? resolve(cwd, configPath) : undefined;
  const fileLayer = configFile ? loadConfigFile(configFile) : {};

  const profile = createProfile(
    { ...fileLayer, ...envLayer(env), ...flagLayer(flags) },
    cwd
  );

  return {
    profile,
    binaries: getBinariesConfig(
      {},
      { FFMPEG_PATH: env.FFMPEG_PATH, FFPROBE_PATH: env.FFPROBE_PATH }
    ),
    webhookUrl: env.VIDSHIFT_WEBHOOK_URL || undefined,
    configFile,
  };
}
