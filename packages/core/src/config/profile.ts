/**
 * Conversion Profile
 *
 * The single, immutable settings value for a conversion session.
 * Built once from partial input; every field gets an explicit default here
 * so no component ever probes for a missing setting at run time.
 */

import { resolve, join } from 'node:path';
import { z } from 'zod';
import { ValidationError } from '../errors/index.js';

// Supported input extensions per profile
export const EXTENSION_PROFILES = {
  'plex-friendly': ['.m4v', '.mp4', '.mov', '.mkv'],
  archival: ['.mkv', '.mov'],
} as const;

export type ExtensionProfileName = keyof typeof EXTENSION_PROFILES;

export const SUBTITLE_MODES = ['none', 'keep', 'burn-in'] as const;
export type SubtitleMode = (typeof SUBTITLE_MODES)[number];

export const OUTPUT_PLACEMENTS = ['same-dir', 'mirrored-tree'] as const;
export type OutputPlacement = (typeof OUTPUT_PLACEMENTS)[number];

export const videoCodecSchema = z.object({
  codec: z.enum(['libx264', 'libx265', 'libsvtav1', 'h264_nvenc', 'hevc_nvenc', 'h264_qsv', 'hevc_qsv', 'h264_videotoolbox', 'hevc_videotoolbox']),
  preset: z.string().optional(),
  crf: z.number().int().min(0).max(63).optional(),
  bitrate: z.string().optional(),
  maxrate: z.string().optional(),
  bufsize: z.string().optional(),
  profile: z.string().optional(),
  level: z.string().optional(),
  tune: z.string().optional(),
  pixFmt: z.string().optional(),
  extraArgs: z.array(z.string()).optional(),
});

export const audioCodecSchema = z.object({
  codec: z.enum(['aac', 'libfdk_aac', 'ac3', 'eac3', 'libopus', 'flac']),
  bitrate: z.string().optional(),
  sampleRate: z.number().int().positive().optional(),
  channels: z.number().int().positive().optional(),
  extraArgs: z.array(z.string()).optional(),
});

export type VideoCodecOptions = z.infer<typeof videoCodecSchema>;
export type AudioCodecOptions = z.infer<typeof audioCodecSchema>;

export const encodeParameterSetSchema = z.object({
  video: videoCodecSchema,
  audio: audioCodecSchema,
});

export type EncodeParameterSet = z.infer<typeof encodeParameterSetSchema>;

export const STANDARD_ENCODE: EncodeParameterSet = {
  video: { codec: 'libx264', preset: 'slow', crf: 18 },
  audio: { codec: 'aac' },
};

export const FOUR_K_ENCODE: EncodeParameterSet = {
  video: { codec: 'libx264', preset: 'slow', crf: 16 },
  audio: { codec: 'aac', bitrate: '640k' },
};

const remuxSchema = z.object({
  // Subtitle codec the target container can carry
  subtitleCodec: z.string().min(1).default('mov_text'),
  extraArgs: z.array(z.string()).default([]),
});

export type RemuxTemplate = z.infer<typeof remuxSchema>;

const containerSchema = z.object({
  format: z.string().min(1).default('mp4'),
  extension: z.string().regex(/^\.[a-z0-9]+$/, 'must look like ".mp4"').default('.mp4'),
});

export type ContainerTarget = z.infer<typeof containerSchema>;

const extensionSchema = z
  .string()
  .transform((ext) => ext.toLowerCase())
  .transform((ext) => (ext.startsWith('.') ? ext : `.${ext}`));

export const profileInputSchema = z.object({
  inputRoot: z.string().min(1).default('./input'),
  outputRoot: z.string().min(1).default('./output'),
  workDir: z.string().min(1).default('./temp'),
  failedDir: z.string().min(1).optional(),
  outputPlacement: z.enum(OUTPUT_PLACEMENTS).default('mirrored-tree'),
  overwriteExisting: z.boolean().default(false),
  deleteAfterSuccess: z.boolean().default(false),
  maxRetries: z.number().int().min(0).default(1),
  validateAudio: z.boolean().default(true),
  highQuality4k: z.boolean().default(false),
  fourKHeightThreshold: z.number().int().positive().default(2160),
  subtitleMode: z.enum(SUBTITLE_MODES).default('none'),
  renamePatterns: z.array(z.string().min(1)).default([]),
  extensionProfile: z.enum(['plex-friendly', 'archival']).default('plex-friendly'),
  extensions: z.array(extensionSchema).nonempty().optional(),
  container: containerSchema.default({}),
  remux: remuxSchema.default({}),
  encode: z
    .object({
      standard: encodeParameterSetSchema.default(STANDARD_ENCODE),
      fourK: encodeParameterSetSchema.default(FOUR_K_ENCODE),
    })
    .default({}),
  toolTimeoutMs: z.number().int().min(0).default(0),
});

export type ConversionProfileInput = z.input<typeof profileInputSchema>;

export interface ConversionProfile {
  readonly inputRoot: string;
  readonly outputRoot: string;
  readonly workDir: string;
  readonly failedDir: string;
  readonly outputPlacement: OutputPlacement;
  readonly overwriteExisting: boolean;
  readonly deleteAfterSuccess: boolean;
  readonly maxRetries: number;
  readonly validateAudio: boolean;
  readonly highQuality4k: boolean;
  readonly fourKHeightThreshold: number;
  readonly subtitleMode: SubtitleMode;
  readonly renamePatterns: readonly string[];
  readonly extensionProfile: ExtensionProfileName;
  readonly extensions: readonly string[];
  readonly container: Readonly<ContainerTarget>;
  readonly remux: Readonly<RemuxTemplate>;
  readonly encode: {
    readonly standard: EncodeParameterSet;
    readonly fourK: EncodeParameterSet;
  };
  readonly toolTimeoutMs: number;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Build the session profile. Relative directories resolve against `cwd`.
 * Throws ValidationError on the first invalid field.
 */
export function createProfile(
  input: unknown = {},
  cwd: string = process.cwd()
): ConversionProfile {
  const parsed = profileInputSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(
      issue?.path.join('.') || 'profile',
      issue?.message ?? 'invalid profile'
    );
  }

  const data = parsed.data;
  const workDir = resolve(cwd, data.workDir);

  return deepFreeze({
    inputRoot: resolve(cwd, data.inputRoot),
    outputRoot: resolve(cwd, data.outputRoot),
    workDir,
    failedDir: data.failedDir ? resolve(cwd, data.failedDir) : join(workDir, 'failed'),
    outputPlacement: data.outputPlacement,
    overwriteExisting: data.overwriteExisting,
    deleteAfterSuccess: data.deleteAfterSuccess,
    maxRetries: data.maxRetries,
    validateAudio: data.validateAudio,
    highQuality4k: data.highQuality4k,
    fourKHeightThreshold: data.fourKHeightThreshold,
    subtitleMode: data.subtitleMode,
    renamePatterns: [...data.renamePatterns],
    extensionProfile: data.extensionProfile,
    extensions: data.extensions ?? [...EXTENSION_PROFILES[data.extensionProfile]],
    container: data.container,
    remux: data.remux,
    encode: data.encode,
    toolTimeoutMs: data.toolTimeoutMs,
  });
}
