/** Mock logger for testing */

import { vi, type Mock } from 'vitest';
import type { Logger } from './types.js';

export interface MockLogger extends Logger {
  child: Mock<[Record<string, unknown>], MockLogger>;
  debug: Mock<[string, Record<string, unknown>?], void>;
  info: Mock<[string, Record<string, unknown>?], void>;
  warn: Mock<[string, Record<string, unknown>?], void>;
  error: Mock<[string, Record<string, unknown>?], void>;
  fatal: Mock<[string, Record<string, unknown>?], void>;
  flush: Mock<[], Promise<void>>;
}

/**
 * Creates a mock logger for testing with Vitest spy functions.
 * All methods are no-ops but can be asserted against in tests.
 *
 * @example
 * ```typescript
 * import { createMockLogger } from '@avrodeck/logger/mock';
 *
 * const logger = createMockLogger();
 * const runtime = new Runtime({ gateways, logger, onChange });
 *
 * await runtime.start();
 *
 * expect(logger.info).toHaveBeenCalledWith('runtime_started', { mode: 'loading' });
 * ```
 */
export function createMockLogger(): MockLogger {
  return {
    // child() returns a fresh mock so nested loggers can be asserted independently
    child: vi.fn((_metadata: Record<string, unknown>) => createMockLogger()),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    flush: vi.fn(async (): Promise<void> => {}),
  };
}
