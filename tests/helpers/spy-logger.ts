/**
 * Logger double that records calls instead of printing.
 * @module tests/helpers/spy-logger
 */

import { vi, type Mock } from 'vitest';
import type { Logger } from '../../src/logger.ts';

export interface SpyLogger extends Logger {
  debug: Mock<Logger['debug']>;
  info: Mock<Logger['info']>;
  warn: Mock<Logger['warn']>;
  error: Mock<Logger['error']>;
}

export function createSpyLogger(namespace = 'test'): SpyLogger {
  return {
    namespace,
    debug: vi.fn<Logger['debug']>(),
    info: vi.fn<Logger['info']>(),
    warn: vi.fn<Logger['warn']>(),
    error: vi.fn<Logger['error']>(),
  };
}
