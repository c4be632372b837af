/**
 * @fileoverview @scopelab/core - Main Entry Point
 *
 * Scoped dependency injection with explicit scopes, a headless component
 * model built on it, and pino logging helpers.
 *
 * @packageDocumentation
 * @module @scopelab/core
 * @version 1.0.0
 * @license Apache-2.0
 *
 * @example
 * ```typescript
 * import {
 *   createServiceCollection,
 *   createLogger,
 *   LOGGER_TOKEN,
 *   Renderer,
 * } from '@scopelab/core';
 *
 * const services = createServiceCollection();
 * services
 *   .addSingletonInstance(LOGGER_TOKEN, createLogger({ level: 'debug' }, 'demo'))
 *   .addScoped(NotificationService);
 *
 * const provider = services.build();
 * const appScope = provider.createScope();
 *
 * const page = await new Renderer(appScope).mount(ScopeDemoPage);
 * ```
 */

// ============================================================================
// Domain Layer Exports
// Container contracts, errors, signals - NO I/O
// ============================================================================
export * from './domain';

// ============================================================================
// Application Layer Exports
// Component model
// ============================================================================
export * from './application';

// ============================================================================
// Infrastructure Layer Exports
// Container implementation, logging
// ============================================================================
export * from './infrastructure';

// ============================================================================
// Version
// ============================================================================
export const VERSION = '1.0.0';
