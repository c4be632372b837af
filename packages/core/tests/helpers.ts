/**
 * @fileoverview Shared Test Helpers
 *
 * @license Apache-2.0
 */

import { type Logger, createLogger, MemoryLogSink } from '../src';

/**
 * Logger writing every level to an in-memory sink instead of stdout.
 */
export function createTestLogger(label = 'test'): { logger: Logger; sink: MemoryLogSink } {
  const sink = new MemoryLogSink();
  const logger = createLogger({ level: 'trace', destinations: [sink] }, label);
  return { logger, sink };
}

/**
 * Run `fn` and return the error it throws, checking its type.
 */
export function captureError<E extends Error>(
  errorType: new (...args: never[]) => E,
  fn: () => unknown,
): E {
  try {
    fn();
  } catch (error) {
    if (error instanceof errorType) {
      return error;
    }
    throw error;
  }
  throw new Error(`Expected ${errorType.name} to be thrown`);
}
