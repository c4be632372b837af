/**
 * @fileoverview Composition Root and Scripted Demo Session
 *
 * @packageDocumentation
 * @module @scopelab/demo
 * @license Apache-2.0
 *
 * @version 1.0.0
 */

import {
  type DestinationStream,
  type IServiceProvider,
  type IServiceScope,
  type LogRecord,
  type Logger,
  type ServiceCollection,
  createLogger,
  createServiceCollection,
  LOGGER_TOKEN,
  MemoryLogSink,
  Renderer,
} from '@scopelab/core';

import { type DemoConfig, defaultConfig } from './config';
import { ScopeDemoPage } from './pages';
import {
  InstanceTrackerService,
  NotificationService,
  NotificationService1,
  NotificationService2,
  TransientService,
  ViewService,
} from './services';

/**
 * Register the demo services.
 */
export function configureServices(services: ServiceCollection): ServiceCollection {
  return services
    .addSingleton(InstanceTrackerService)
    .addScoped(NotificationService)
    .addScoped(NotificationService1)
    .addScoped(NotificationService2)
    .addTransient(TransientService)
    .addScoped(ViewService);
}

export interface Application {
  readonly provider: IServiceProvider;

  /**
   * The outer scope pages are activated in.
   */
  readonly appScope: IServiceScope;

  readonly logger: Logger;

  /**
   * Dispose the application scope, then the provider.
   */
  dispose(): Promise<void>;
}

/**
 * Build the provider and open the application scope.
 */
export function createApplication(config: DemoConfig, logger: Logger): Application {
  const services = configureServices(createServiceCollection()).addSingletonInstance(
    LOGGER_TOKEN,
    logger,
  );

  const provider = services.build({
    validateScopes: config.validateScopes,
    eagerSingletons: config.eagerSingletons,
    logger,
  });
  const appScope = provider.createScope();

  return {
    provider,
    appScope,
    logger,
    dispose: async () => {
      await appScope.dispose();
      await provider.dispose();
    },
  };
}

export interface DemoOptions {
  config?: DemoConfig;

  /**
   * Extra log destinations; records are always kept in memory as well.
   */
  destinations?: DestinationStream[];
}

export interface DemoResult {
  /**
   * Every frame the page rendered, oldest first.
   */
  readonly frames: readonly (readonly string[])[];

  readonly records: readonly LogRecord[];
}

/**
 * Mount the page, press both buttons, unmount it and shut the application down.
 */
export async function runDemo(options: DemoOptions = {}): Promise<DemoResult> {
  const config = options.config ?? defaultConfig;
  const sink = new MemoryLogSink();
  const logger = createLogger(
    { level: config.logLevel, destinations: [sink, ...(options.destinations ?? [])] },
    'demo',
  );

  const app = createApplication(config, logger);
  try {
    const page = await new Renderer(app.appScope, { logger }).mount(ScopeDemoPage);

    page.component.updateFromPage();
    page.component.updateFromView();
    await page.unmount();

    return { frames: page.frames, records: sink.records };
  } finally {
    await app.dispose();
  }
}
