/**
 * Configuration loading for Marquee.
 *
 * Precedence, lowest to highest: defaults, `config.json` in the data
 * directory, environment variables, explicit overrides (CLI flags).
 *
 * @module core/config/loader
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { formatIssues } from '../validation.js';
import {
  ConfigError,
  ContentType,
  StorageError,
  errorCode,
  describeError,
  type AppConfig,
  type PartialAppConfig,
} from '../types.js';
import { getDefaultDataDir, expandPath } from '../../utils/platform.js';
import { mergeWithDefaults } from './defaults.js';

/** Config file name */
export const CONFIG_FILE = 'config.json';

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

/**
 * Shape of config.json; every key optional, unknown keys rejected
 */
export const PartialConfigSchema = z
  .object({
    catalogUrl: z.string().url(),
    metaUrl: z.string().url(),
    contentTypes: z.array(z.nativeEnum(ContentType)).min(1),
    streamProviders: z.array(z.string().url()),
    trackerListUrl: z.string().url(),
    dhtBootstrapNodes: z.array(z.string()),
    http: z
      .object({
        timeout: z.number().int().positive(),
        userAgent: z.string(),
      })
      .partial()
      .strict(),
    playback: z
      .object({
        bufferThreshold: z.number().int().nonnegative(),
        pollInterval: z.number().int().positive(),
        deleteDataOnCleanup: z.boolean(),
      })
      .partial()
      .strict(),
    player: z
      .object({
        command: z.string().min(1),
        args: z.array(z.string()),
      })
      .partial()
      .strict(),
    logging: z
      .object({
        level: LogLevelSchema,
        file: z.string(),
      })
      .partial()
      .strict(),
  })
  .partial()
  .strict();

/**
 * Options for loading configuration
 */
export interface LoadConfigOptions {
  /** Environment to read MARQUEE_* variables from (default: process.env) */
  env?: NodeJS.ProcessEnv;

  /** Highest-precedence values, typically CLI flags */
  overrides?: PartialAppConfig;
}

/**
 * Reads and validates config.json from a data directory.
 *
 * @returns Parsed partial config, or an empty object if the file is absent
 * @throws {ConfigError} If the file is not valid JSON or has invalid values
 * @throws {StorageError} If the file exists but cannot be read
 */
export async function readConfigFile(dataDir: string): Promise<PartialAppConfig> {
  const configPath = path.join(dataDir, CONFIG_FILE);

  let raw: string;
  try {
    raw = await fs.readFile(configPath, 'utf-8');
  } catch (err) {
    if (errorCode(err) === 'ENOENT') {
      return {};
    }
    throw new StorageError(
      `Failed to read config: ${describeError(err)}`,
      configPath
    );
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`${configPath} is not valid JSON: ${describeError(err)}`);
  }

  const parsed = PartialConfigSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigError(`Invalid ${configPath}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Collects configuration from MARQUEE_* environment variables.
 *
 * @throws {ConfigError} If MARQUEE_LOG_LEVEL is not a known level
 */
export function configFromEnv(env: NodeJS.ProcessEnv): PartialAppConfig {
  const partial: PartialAppConfig = {};

  if (env.MARQUEE_LOG_FILE || env.MARQUEE_LOG_LEVEL) {
    partial.logging = {};
    if (env.MARQUEE_LOG_FILE) {
      partial.logging.file = expandPath(env.MARQUEE_LOG_FILE);
    }
    if (env.MARQUEE_LOG_LEVEL) {
      const level = LogLevelSchema.safeParse(env.MARQUEE_LOG_LEVEL.toLowerCase());
      if (!level.success) {
        throw new ConfigError(`Unknown MARQUEE_LOG_LEVEL "${env.MARQUEE_LOG_LEVEL}"`);
      }
      partial.logging.level = level.data;
    }
  }

  if (env.MARQUEE_PLAYER) {
    partial.player = { command: env.MARQUEE_PLAYER };
  }

  return partial;
}

/**
 * Merges two partial configs, nested sections key by key.
 */
function layer(base: PartialAppConfig, top: PartialAppConfig): PartialAppConfig {
  return {
    ...base,
    ...top,
    http: { ...base.http, ...top.http },
    playback: { ...base.playback, ...top.playback },
    player: { ...base.player, ...top.player },
    logging: { ...base.logging, ...top.logging },
  };
}

/**
 * Loads the complete application configuration.
 *
 * The data directory itself is resolved first (overrides, then
 * MARQUEE_DATA_DIR, then the platform default) because config.json lives in it.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<AppConfig> {
  const env = options.env ?? process.env;
  const overrides = options.overrides ?? {};

  const dataDir = expandPath(
    overrides.dataDir ?? env.MARQUEE_DATA_DIR ?? getDefaultDataDir()
  );

  const fromFile = await readConfigFile(dataDir);
  const merged = layer(layer(fromFile, configFromEnv(env)), overrides);

  const config = mergeWithDefaults({ ...merged, dataDir });
  if (config.logging.file) {
    config.logging.file = expandPath(config.logging.file);
  }
  return config;
}
