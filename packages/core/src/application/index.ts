/**
 * @fileoverview Application Layer Exports
 *
 * The Application layer holds the component model that pages are built on.
 *
 * @module @scopelab/core/application
 * @license Apache-2.0
 */

// ============================================================================
// Components - Headless rendering on top of DI scopes
// ============================================================================
export * from './components';
