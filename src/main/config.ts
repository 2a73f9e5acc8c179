/**
 * Runtime configuration, read from the environment (and an optional `.env`
 * file) and validated with zod.
 */

import * as dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import type { LogLevel } from './utils/logger.js';

// ============================================================================
// Schema
// ============================================================================

/** Treat `FOO=` the same as an unset variable. */
const blankAsUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalString = z.preprocess(blankAsUndefined, z.string().trim().optional());

const EnvSchema = z.object({
  GOOGLE_API_KEY: optionalString,
  GEMINI_API_KEY: optionalString,
  SOPGEN_MODEL: optionalString,
  SOPGEN_POLL_INTERVAL_MS: z.preprocess(
    blankAsUndefined,
    z.coerce.number().int().positive().default(2000),
  ),
  SOPGEN_POLL_TIMEOUT_MS: z.preprocess(
    blankAsUndefined,
    z.coerce.number().int().positive().optional(),
  ),
  SOPGEN_SNAPSHOT_MAX_WIDTH: z.preprocess(
    blankAsUndefined,
    z.coerce.number().int().positive().default(400),
  ),
  SOPGEN_SNAPSHOT_QUALITY: z.preprocess(
    blankAsUndefined,
    z.coerce.number().int().min(1).max(100).default(85),
  ),
  FFMPEG_PATH: z.preprocess(blankAsUndefined, z.string().default('ffmpeg')),
  FFPROBE_PATH: z.preprocess(blankAsUndefined, z.string().default('ffprobe')),
  SOPGEN_LOG_LEVEL: z.preprocess(
    (value) => (typeof value === 'string' ? blankAsUndefined(value.toLowerCase()) : value),
    z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  ),
});

// ============================================================================
// Types
// ============================================================================

export interface SopConfig {
  /** Provider credential (GOOGLE_API_KEY, falling back to GEMINI_API_KEY) */
  apiKey?: string;
  /** Model to use instead of picking one from the provider's list */
  model?: string;
  pollIntervalMs: number;
  /** Unset means wait for asset processing indefinitely */
  pollTimeoutMs?: number;
  snapshotMaxWidth: number;
  snapshotQuality: number;
  ffmpegPath: string;
  ffprobePath: string;
  logLevel: LogLevel;
}

// ============================================================================
// Loading
// ============================================================================

/**
 * Load `.env` from the working directory into process.env. Existing variables
 * win over the file.
 */
export function loadDotenv(path?: string): void {
  dotenv.config(path ? { path } : undefined);
}

/**
 * Validate environment variables into a SopConfig.
 *
 * @throws ConfigurationError (INVALID_CONFIG) naming every offending variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): SopConfig {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${problems}`, 'INVALID_CONFIG', parsed.error);
  }

  const values = parsed.data;

  return {
    apiKey: values.GOOGLE_API_KEY ?? values.GEMINI_API_KEY,
    model: values.SOPGEN_MODEL,
    pollIntervalMs: values.SOPGEN_POLL_INTERVAL_MS,
    pollTimeoutMs: values.SOPGEN_POLL_TIMEOUT_MS,
    snapshotMaxWidth: values.SOPGEN_SNAPSHOT_MAX_WIDTH,
    snapshotQuality: values.SOPGEN_SNAPSHOT_QUALITY,
    ffmpegPath: values.FFMPEG_PATH,
    ffprobePath: values.FFPROBE_PATH,
    logLevel: values.SOPGEN_LOG_LEVEL,
  };
}
