/**
 * @fileoverview Settings Module
 *
 * @example
 * ```typescript
 * import { getSettings } from '@switchyard/core';
 *
 * const { handlerTimeoutMs } = getSettings().rpc;
 * ```
 */

export type {
  SwitchyardSettings,
  UserSettings,
  DeepPartial,
  RpcSettings,
  HttpSettings,
  LoggingSettings,
} from './types.js';

export { DEFAULT_SETTINGS } from './defaults.js';

export {
  parseEnvValue,
  envInteger,
  envBoolean,
  envNonEmpty,
  type EnvParseLogger,
  type EnvValueOptions,
  type EnvSchema,
  type IntegerBounds,
} from './env-parsing.js';

export {
  getSettingsPath,
  loadUserSettings,
  mergeSettings,
  applyEnvOverrides,
  loadSettings,
  getSettings,
  clearSettingsCache,
} from './loader.js';
