/**
 * @fileoverview Infrastructure Layer Exports
 *
 * The Infrastructure layer contains the concrete DI container and the
 * pino logging adapters.
 *
 * @module @scopelab/core/infrastructure
 * @license Apache-2.0
 */

// ============================================================================
// DI - Dependency Injection implementation
// ============================================================================
export * from './di';

// ============================================================================
// Logging - pino
// ============================================================================
export * from './logging';
