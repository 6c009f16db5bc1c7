/**
 * @fileoverview Settings Loader
 *
 * Loads user settings from a JSON file (default ~/.switchyard/settings.json),
 * merges them over defaults and applies environment overrides.
 * The merged result is cached after first load.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import { createLogger, getLogger } from '../logging/index.js';
import { DEFAULT_SETTINGS } from './defaults.js';
import { envBoolean, envInteger, envNonEmpty, parseEnvValue, type EnvSchema } from './env-parsing.js';
import type { LogLevel } from '../logging/index.js';
import type { SwitchyardSettings, UserSettings } from './types.js';

const logger = createLogger('settings');

// =============================================================================
// Constants
// =============================================================================

const SETTINGS_DIR = '.switchyard';
const SETTINGS_FILE = 'settings.json';

const logLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);
const envLogLevel: EnvSchema<LogLevel> = z.string().trim().toLowerCase().pipe(logLevelSchema);

const userSettingsSchema = z.object({
  rpc: z
    .object({
      handlerTimeoutMs: z.number().int().nonnegative(),
      maxBatchSize: z.number().int().nonnegative(),
    })
    .partial()
    .optional(),
  http: z
    .object({
      host: z.string().min(1),
      port: z.number().int().min(0).max(65535),
      cors: z.boolean(),
      maxBodyBytes: z.number().int().positive(),
    })
    .partial()
    .optional(),
  logging: z
    .object({
      level: logLevelSchema,
    })
    .partial()
    .optional(),
});

// =============================================================================
// Paths
// =============================================================================

/**
 * Get the path to the settings file
 */
export function getSettingsPath(homeDir?: string): string {
  return path.join(homeDir ?? os.homedir(), SETTINGS_DIR, SETTINGS_FILE);
}

// =============================================================================
// Loading
// =============================================================================

/**
 * Load user settings from file.
 * Returns null when the file is missing, unreadable or does not match the schema.
 */
export function loadUserSettings(settingsPath?: string): UserSettings | null {
  const filePath = settingsPath ?? getSettingsPath();

  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    logger.warn('Failed to read settings file, using defaults', {
      path: filePath,
      error: error instanceof Error ? error.message : String(error),
    });
    return null;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    logger.warn('Settings file is not valid JSON, using defaults', {
      path: filePath,
      error: error instanceof Error ? error.message : String(error),
    });
    return null;
  }

  const parsed = userSettingsSchema.safeParse(raw);
  if (!parsed.success) {
    logger.warn('Settings file failed validation, using defaults', {
      path: filePath,
      issues: parsed.error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
    return null;
  }

  return parsed.data;
}

/**
 * Merge user settings over a base. Sections merge key by key.
 */
export function mergeSettings(base: SwitchyardSettings, user: UserSettings): SwitchyardSettings {
  return {
    rpc: { ...base.rpc, ...user.rpc },
    http: { ...base.http, ...user.http },
    logging: { ...base.logging, ...user.logging },
  };
}

/**
 * Apply environment overrides on top of file settings
 */
export function applyEnvOverrides(
  settings: SwitchyardSettings,
  env: NodeJS.ProcessEnv = process.env
): SwitchyardSettings {
  const { rpc, http, logging } = settings;

  return {
    rpc: {
      handlerTimeoutMs: parseEnvValue(env.SWITCHYARD_RPC_TIMEOUT_MS, envInteger({ min: 0 }), {
        name: 'SWITCHYARD_RPC_TIMEOUT_MS',
        fallback: rpc.handlerTimeoutMs,
        logger,
      }),
      maxBatchSize: parseEnvValue(env.SWITCHYARD_MAX_BATCH_SIZE, envInteger({ min: 0 }), {
        name: 'SWITCHYARD_MAX_BATCH_SIZE',
        fallback: rpc.maxBatchSize,
        logger,
      }),
    },
    http: {
      ...http,
      host: parseEnvValue(env.SWITCHYARD_HTTP_HOST, envNonEmpty, {
        name: 'SWITCHYARD_HTTP_HOST',
        fallback: http.host,
        logger,
      }),
      port: parseEnvValue(env.SWITCHYARD_HTTP_PORT, envInteger({ min: 0, max: 65535 }), {
        name: 'SWITCHYARD_HTTP_PORT',
        fallback: http.port,
        logger,
      }),
      cors: parseEnvValue(env.SWITCHYARD_HTTP_CORS, envBoolean, {
        name: 'SWITCHYARD_HTTP_CORS',
        fallback: http.cors,
        logger,
      }),
    },
    logging: {
      level: parseEnvValue(env.LOG_LEVEL, envLogLevel, { name: 'LOG_LEVEL', fallback: logging.level, logger }),
    },
  };
}

/**
 * Load settings: defaults, then the settings file, then the environment
 */
export function loadSettings(
  settingsPath?: string,
  env: NodeJS.ProcessEnv = process.env
): SwitchyardSettings {
  const userSettings = loadUserSettings(settingsPath);
  const merged = userSettings ? mergeSettings(DEFAULT_SETTINGS, userSettings) : DEFAULT_SETTINGS;
  return applyEnvOverrides(merged, env);
}

// =============================================================================
// Cached Settings
// =============================================================================

let cachedSettings: SwitchyardSettings | null = null;

/**
 * Get settings, loading them on first access.
 * The first load also sets the root logger to `logging.level`, so loggers
 * created from then on use it.
 */
export function getSettings(): SwitchyardSettings {
  if (!cachedSettings) {
    const settings = loadSettings(process.env.SWITCHYARD_SETTINGS_PATH);
    getLogger().setLevel(settings.logging.level);
    cachedSettings = settings;
  }
  return cachedSettings;
}

/**
 * Clear the cached settings (for testing)
 */
export function clearSettingsCache(): void {
  cachedSettings = null;
}
