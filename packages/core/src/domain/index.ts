/**
 * @fileoverview Domain Layer Exports
 *
 * The Domain layer contains the container contracts and the signal primitive.
 * Nothing here performs I/O; the only outside reference is the pino `Logger`
 * type accepted by the build options.
 *
 * @module @scopelab/core/domain
 * @license Apache-2.0
 */

// ============================================================================
// DI - Dependency Injection interfaces and types
// ============================================================================
export * from './di';

// ============================================================================
// Events - Observer lists
// ============================================================================
export * from './events';
