/**
 * @fileoverview Default settings
 */

import type { SwitchyardSettings } from './types.js';

export const DEFAULT_SETTINGS: SwitchyardSettings = {
  rpc: {
    handlerTimeoutMs: 30_000,
    maxBatchSize: 0,
  },
  http: {
    host: '127.0.0.1',
    port: 8545,
    cors: false,
    maxBodyBytes: 1024 * 1024,
  },
  logging: {
    level: 'warn',
  },
};
