/**
 * @fileoverview Logger - pino Logger Factory
 *
 * @packageDocumentation
 * @module @scopelab/core/infrastructure/logging
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Every logger is a pino child carrying a `$label` that names the part of
 * the application writing the record (`di`, `renderer`, `demo`, ...).
 *
 * @version 1.0.0
 */

import type { DestinationStream, Level, LevelWithSilent, Logger } from 'pino';
import pino from 'pino';

import { createToken } from '../../domain/di';

export type { DestinationStream, Level, LevelWithSilent, Logger } from 'pino';

/**
 * Token under which the application logger is registered.
 *
 * @example
 * ```typescript
 * services.addSingletonInstance(LOGGER_TOKEN, createLogger({ level: 'debug' }, 'demo'));
 * ```
 */
export const LOGGER_TOKEN = createToken<Logger>('ILogger');

export interface LoggingOptions {
  /**
   * Lowest level written. Default: `info`.
   */
  level?: LevelWithSilent;

  /**
   * Where records go. Default: stdout.
   */
  destinations?: DestinationStream[];
}

/**
 * Create a labelled pino logger writing JSON lines to every destination.
 */
export const createLogger = (options: LoggingOptions = {}, $label: string): Logger => {
  const level = options.level ?? 'info';
  const destinations =
    options.destinations && options.destinations.length > 0
      ? options.destinations
      : [pino.destination({ dest: 1, sync: true })];

  // multistream levels exclude 'silent'; the logger level already filters everything
  const streamLevel: Level = level === 'silent' ? 'fatal' : level;

  return pino(
    { level, base: null, timestamp: pino.stdTimeFunctions.isoTime },
    pino.multistream(destinations.map((stream) => ({ level: streamLevel, stream }))),
  ).child({ $label });
};
