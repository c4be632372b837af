/**
 * @fileoverview Demo Test Helpers
 *
 * @license Apache-2.0
 */

import { type Logger, createLogger, MemoryLogSink } from '@scopelab/core';

import { type Application, createApplication } from '../src/app';
import { type DemoConfig, defaultConfig } from '../src/config';

export interface TestApplication {
  app: Application;
  logger: Logger;
  sink: MemoryLogSink;
}

/**
 * Application whose records, down to debug, land in an in-memory sink.
 */
export function createTestApplication(overrides: Partial<DemoConfig> = {}): TestApplication {
  const sink = new MemoryLogSink();
  const logger = createLogger({ level: 'debug', destinations: [sink] }, 'test');
  const app = createApplication({ ...defaultConfig, ...overrides }, logger);
  return { app, logger, sink };
}

/**
 * `service` fields of the info records for one event, in write order.
 */
export function servicesFor(sink: MemoryLogSink, event: 'created' | 'disposed'): unknown[] {
  return sink.where({ event, level: 30 }).map((record) => record.service);
}
