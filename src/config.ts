/**
 * Configuration loader
 *
 * Reads an optional YAML config file and fills in defaults. CLI flags are
 * applied on top of the result by the entry point.
 */

import * as fs from 'fs';
import * as path from 'path';
import { parse } from 'yaml';
import { ZodError } from 'zod';
import { ConfigFileOutput, validateConfigFile, formatZodError } from './config-schema';
import { ConfigError, systemErrorCode } from './errors';
import { getLogger, LogLevel } from './logger';
import { SchedulerTiming, DEFAULT_TIMING } from './scheduler/types';

const log = getLogger('Config');

export const DEFAULT_CONFIG_FILE = 'synced-lyrics.yml';

/** Runtime config */
export interface Config {
  player: {
    preferred: string[];
  };
  playback: {
    /** 0 = infinite */
    repeat: number;
  };
  timing: SchedulerTiming;
  display: {
    columns: number;
    rows: number;
  };
  logging: {
    level?: LogLevel;
    pretty?: boolean;
  };
}

export function defaultConfig(): Config {
  return {
    player: { preferred: [] },
    playback: { repeat: 1 },
    timing: { ...DEFAULT_TIMING },
    display: { columns: 80, rows: 24 },
    logging: {},
  };
}

/**
 * Load and normalize config from YAML.
 *
 * Without an explicit path, `synced-lyrics.yml` in the working directory is
 * used when present and defaults otherwise. An explicit path must exist.
 */
export function loadConfig(configPath?: string): Config {
  const resolvedPath = configPath ?? path.join(process.cwd(), DEFAULT_CONFIG_FILE);

  let raw: string;
  try {
    raw = fs.readFileSync(resolvedPath, 'utf-8');
  } catch (error) {
    if (systemErrorCode(error) === 'ENOENT' && configPath === undefined) {
      log.debug({ path: resolvedPath }, 'No config file found, using defaults');
      return defaultConfig();
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`[Config] Cannot read ${resolvedPath}: ${reason}`, { cause: error });
  }

  return parseConfig(raw, resolvedPath);
}

/** Parse YAML text into a runtime config */
export function parseConfig(raw: string, source = 'config'): Config {
  let document: unknown;
  try {
    document = parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`[Config] ${source} is not valid YAML: ${reason}`, { cause: error });
  }

  let validated: ConfigFileOutput;
  try {
    validated = validateConfigFile(document);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ConfigError(`[Config] Validation failed for ${source}:\n${formatZodError(error)}`, { cause: error });
    }
    throw error;
  }

  const defaults = defaultConfig();
  const config: Config = {
    player: {
      preferred: validated.player?.preferred ?? defaults.player.preferred,
    },
    playback: {
      repeat: validated.playback?.repeat ?? defaults.playback.repeat,
    },
    timing: validated.timing ?? defaults.timing,
    display: validated.display ?? defaults.display,
    logging: {},
  };
  if (validated.logging?.level !== undefined) config.logging.level = validated.logging.level;
  if (validated.logging?.pretty !== undefined) config.logging.pretty = validated.logging.pretty;

  log.debug({ source }, 'Loaded config');
  return config;
}
