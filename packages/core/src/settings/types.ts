/**
 * @fileoverview Settings types
 */

import type { LogLevel } from '../logging/types.js';

export interface RpcSettings {
  /** Upper bound on a single handler invocation, in milliseconds */
  handlerTimeoutMs: number;
  /** Largest batch accepted; 0 means unlimited */
  maxBatchSize: number;
}

export interface HttpSettings {
  host: string;
  port: number;
  /** Emit permissive CORS headers and answer preflight requests */
  cors: boolean;
  maxBodyBytes: number;
}

export interface LoggingSettings {
  level: LogLevel;
}

export interface SwitchyardSettings {
  rpc: RpcSettings;
  http: HttpSettings;
  logging: LoggingSettings;
}

export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends object ? DeepPartial<T[P]> : T[P];
};

export type UserSettings = DeepPartial<SwitchyardSettings>;
