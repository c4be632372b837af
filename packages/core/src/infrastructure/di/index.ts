/**
 * @fileoverview Infrastructure DI Module Exports
 *
 * @packageDocumentation
 * @module @scopelab/core/infrastructure/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * This module exports the concrete DI container implementations.
 * Use these in your application's composition root.
 *
 * ## Usage
 *
 * ```typescript
 * import { createServiceCollection, withScope } from '@scopelab/core';
 *
 * const services = createServiceCollection();
 * services
 *   .addSingleton(InstanceTrackerService)
 *   .addScoped(NotificationService)
 *   .addTransient(TransientService);
 *
 * const provider = services.build();
 *
 * await withScope(provider, (scope) => {
 *   scope.resolve(NotificationService).notifyChanged();
 * });
 * ```
 */

// ============================================================================
// ServiceCollection - Service Registration
// ============================================================================

export { ServiceCollection, createServiceCollection } from './service-collection';

// ============================================================================
// ServiceProvider - Service Resolution
// ============================================================================

export { ServiceProvider } from './service-provider';

// ============================================================================
// ScopedContainer - Scoped Service Management
// ============================================================================

export { ScopedContainer, withScope } from './scoped-container';
