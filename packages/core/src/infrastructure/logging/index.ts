/**
 * @fileoverview Infrastructure Logging Module Exports
 *
 * @module @scopelab/core/infrastructure/logging
 * @license Apache-2.0
 */

export {
  createLogger,
  LOGGER_TOKEN,
  type LoggingOptions,
  type DestinationStream,
  type Level,
  type LevelWithSilent,
  type Logger,
} from './logger';
export { MemoryLogSink, type LogRecord } from './memory-log-sink';
