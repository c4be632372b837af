/**
 * @fileoverview @scopelab/demo - Main Entry Point
 *
 * A page that resolves the same service types from its own scope and from
 * the application scope, and shows that the two disagree.
 *
 * @packageDocumentation
 * @module @scopelab/demo
 * @version 1.0.0
 * @license Apache-2.0
 */

export {
  configureServices,
  createApplication,
  runDemo,
  type Application,
  type DemoOptions,
  type DemoResult,
} from './app';
export { loadConfig, defaultConfig, EnvSchema, type DemoConfig } from './config';
export { InvalidStateError, ConfigError, type ConfigIssue } from './errors';
export * from './pages';
export * from './services';
