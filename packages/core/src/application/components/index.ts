/**
 * @fileoverview Application Components Module Exports
 *
 * @packageDocumentation
 * @module @scopelab/core/application/components
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 *
 * Headless component model: components render text frames and are activated
 * from a DI scope.
 */

export { ComponentBase, type IRenderHandle } from './component-base';
export { OwningComponentBase } from './owning-component-base';
export {
  Renderer,
  type RendererOptions,
  type MountedComponent,
  type ComponentActivator,
} from './renderer';
