/**
 * @fileoverview Shared test fixtures
 */

import { vi, type Mock } from 'vitest';
import type { ISwitchyardLogger } from '@switchyard/core';

export interface StubLogger extends ISwitchyardLogger {
  trace: Mock;
  debug: Mock;
  info: Mock;
  warn: Mock;
  error: Mock;
  fatal: Mock;
  child: Mock;
}

export function createStubLogger(): StubLogger {
  const logger: StubLogger = {
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn(() => logger),
  };
  return logger;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
