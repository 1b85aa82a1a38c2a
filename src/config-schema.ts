/**
 * Config Schema Validation
 *
 * Zod schemas for the optional synced-lyrics.yml file.
 */

import { z } from 'zod';

// --- Reusable Validators ---

const playerNameSchema = z.string().trim().min(1, { message: 'Player name cannot be empty' });

const pollIntervalSchema = z.number().int().min(1).max(1000);

// --- Sections ---

const playerConfigSchema = z.object({
  preferred: z.array(playerNameSchema).optional(),
});

const playbackConfigSchema = z.object({
  // 0 means "repeat until interrupted"
  repeat: z.number().int().min(0).safe().default(1),
});

const timingConfigSchema = z.object({
  countdownPollMs: pollIntervalSchema.default(100),
  cuePollMs: pollIntervalSchema.default(50),
  finalHoldMs: z.number().int().min(0).max(10_000).default(500),
});

const displayConfigSchema = z.object({
  columns: z.number().int().min(1).default(80),
  rows: z.number().int().min(1).default(24),
});

const loggingConfigSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).optional(),
  pretty: z.boolean().optional(),
});

// --- Full Config Schema ---

export const configFileSchema = z.object({
  player: playerConfigSchema.optional(),
  playback: playbackConfigSchema.optional(),
  timing: timingConfigSchema.optional(),
  display: displayConfigSchema.optional(),
  logging: loggingConfigSchema.optional(),
});

// --- Type Exports ---

export type ConfigFileInput = z.input<typeof configFileSchema>;
export type ConfigFileOutput = z.output<typeof configFileSchema>;

/**
 * Validate a parsed config document. An empty YAML file parses to null and
 * counts as an empty config.
 */
export function validateConfigFile(data: unknown): ConfigFileOutput {
  return configFileSchema.parse(data ?? {});
}

/**
 * Format Zod errors into readable messages
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : 'config';
    return `  - ${path}: ${issue.message}`;
  }).join('\n');
}
