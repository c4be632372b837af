/**
 * @fileoverview Domain Events Module Exports
 *
 * @module @scopelab/core/domain/events
 * @license Apache-2.0
 */

export { Signal, type SignalHandler } from './signal';
