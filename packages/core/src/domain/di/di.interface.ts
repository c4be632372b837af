/**
 * @fileoverview DI Interfaces - Core Dependency Injection Contracts
 *
 * @packageDocumentation
 * @module @scopelab/core/domain/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * This module defines the core interfaces for dependency injection.
 * These contracts are technology-agnostic and define WHAT the DI
 * system does, not HOW it does it.
 *
 * ## Explicit Scopes
 *
 * Every scope is created and passed around explicitly. A component that owns
 * a scope resolves from it; a component that only knows the outer scope
 * resolves from that one:
 *
 * ```
 * Root provider
 * ├─ Singletons: InstanceTrackerService
 * ├─ Application scope
 * │  ├─ NotificationService  (uid-1)
 * │  └─ NotificationService1 (uid-2)
 * └─ Page scope
 *    ├─ ViewService          (uid-3)
 *    └─ NotificationService1 (uid-4)
 * ```
 *
 * @version 1.0.0
 */

import type { Logger } from 'pino';

import {
  type IServiceDescriptor,
  type IServiceResolver,
  type ServiceFactory,
} from './service-descriptor';
import {
  type ServiceIdentifier,
  type Constructor,
  createToken,
} from './service-identifier';

// ============================================================================
// IDisposable - Resource Cleanup Interface
// ============================================================================

/**
 * Interface for objects that need cleanup when disposed.
 *
 * @remarks
 * - Scoped and scope-created Transient services: disposed when the scope is disposed
 * - Singleton services: disposed when the provider is disposed
 *
 * Implementations should be idempotent.
 */
export interface IDisposable {
  dispose(): void | Promise<void>;
}

/**
 * Check if an object implements IDisposable.
 */
export function isDisposable(obj: unknown): obj is IDisposable {
  return (
    typeof obj === 'object' &&
    obj !== null &&
    'dispose' in obj &&
    typeof obj.dispose === 'function'
  );
}

// ============================================================================
// IServiceCollection - Service Registration
// ============================================================================

/**
 * IServiceCollection - Fluent API for registering services.
 *
 * @example
 * ```typescript
 * const services = new ServiceCollection();
 *
 * services
 *   .addSingleton(InstanceTrackerService)
 *   .addScoped(NotificationService)
 *   .addTransient(TransientService);
 *
 * const provider = services.build();
 * ```
 */
export interface IServiceCollection {
  addSingleton<T>(implementation: Constructor<T>): this;
  addSingleton<T>(identifier: ServiceIdentifier<T>, implementation: Constructor<T>): this;
  addSingletonFactory<T>(identifier: ServiceIdentifier<T>, factory: ServiceFactory<T>): this;
  addSingletonInstance<T>(identifier: ServiceIdentifier<T>, instance: T): this;

  addScoped<T>(implementation: Constructor<T>): this;
  addScoped<T>(identifier: ServiceIdentifier<T>, implementation: Constructor<T>): this;
  addScopedFactory<T>(identifier: ServiceIdentifier<T>, factory: ServiceFactory<T>): this;

  addTransient<T>(implementation: Constructor<T>): this;
  addTransient<T>(identifier: ServiceIdentifier<T>, implementation: Constructor<T>): this;
  addTransientFactory<T>(identifier: ServiceIdentifier<T>, factory: ServiceFactory<T>): this;

  /**
   * Check if a service is registered.
   */
  has(identifier: ServiceIdentifier): boolean;

  /**
   * Get all registered descriptors, in registration order.
   */
  getDescriptors(): readonly IServiceDescriptor[];

  /**
   * Build the service provider.
   *
   * @remarks
   * After calling build(), no more services can be registered.
   * The collection is "sealed".
   */
  build(options?: IBuildOptions): IServiceProvider;
}

// ============================================================================
// IServiceProvider - Service Resolution
// ============================================================================

/**
 * IServiceProvider - Resolve services from the root container.
 *
 * @remarks
 * **Resolution Algorithm:**
 *
 * ```
 * resolve(identifier, scope?)
 *   1. Scope-local instance?          -> return it
 *   2. Built-in token?                -> return provider / scope factory
 *   3. Registered?                    -> ServiceNotRegisteredError if not
 *   4. Already on the resolution path -> CircularDependencyError
 *   5. By lifetime:
 *      - Singleton: root cache, created without a scope
 *      - Scoped:    scope cache, NoActiveScopeError without a scope
 *      - Transient: always new, tracked by the scope for disposal
 * ```
 */
export interface IServiceProvider extends IServiceResolver {
  /**
   * Resolve all services registered with the given identifier.
   *
   * @remarks
   * One registration per identifier is kept, so this is an empty or
   * single-element array.
   */
  resolveAll<T>(identifier: ServiceIdentifier<T>): T[];

  /**
   * Check if a service is registered.
   */
  isRegistered(identifier: ServiceIdentifier): boolean;

  /**
   * Construct a class that is not registered, injecting its `static inject`
   * dependencies. The instance is not cached or tracked.
   */
  activate<T>(ctor: Constructor<T>): T;

  /**
   * Create a new, independent scope for scoped services.
   */
  createScope(): IServiceScope;

  /**
   * Dispose the provider and all singleton services.
   */
  dispose(): Promise<void>;
}

// ============================================================================
// IServiceScope - Scoped Service Management
// ============================================================================

/**
 * IServiceScope - A bounded lifetime for scoped services.
 *
 * @remarks
 * Each scope has its own cache of scoped instances:
 *
 * ```typescript
 * const scope1 = provider.createScope();
 * const scope2 = provider.createScope();
 *
 * scope1.resolve(NotificationService) !== scope2.resolve(NotificationService)
 * ```
 *
 * @example Typical usage
 * ```typescript
 * const scope = provider.createScope();
 * try {
 *   const view = scope.resolve(ViewService);
 *   view.setServices(appScope);
 *   view.updateView();
 * } finally {
 *   await scope.dispose(); // disposes ViewService and its scoped/transient dependencies
 * }
 * ```
 */
export interface IServiceScope extends IServiceResolver {
  /**
   * Unique identifier of this scope, used in log records.
   */
  readonly id: string;

  /**
   * Construct an unregistered class with dependencies resolved in this scope.
   */
  activate<T>(ctor: Constructor<T>): T;

  /**
   * Register an instance that only this scope resolves.
   *
   * @remarks
   * Takes precedence over registrations in the provider. The instance is
   * owned by the caller and is not disposed with the scope.
   */
  provide<T>(identifier: ServiceIdentifier<T>, instance: T): this;

  /**
   * Get a provider view whose resolutions happen in this scope.
   */
  getServiceProvider(): IServiceProvider;

  /**
   * Check if the scope has been disposed.
   */
  isDisposed(): boolean;

  /**
   * Dispose every disposable instance this scope created, newest first.
   */
  dispose(): Promise<void>;
}

/**
 * Factory for creating service scopes.
 *
 * @remarks
 * Injected into components that own a scope:
 *
 * ```typescript
 * class ScopeDemoPage extends OwningComponentBase {
 *   static inject = [SERVICE_SCOPE_FACTORY_TOKEN] as const;
 * }
 * ```
 */
export interface IServiceScopeFactory {
  createScope(): IServiceScope;
}

// ============================================================================
// Built-in Tokens
// ============================================================================

/**
 * Resolves to the resolver that performs the resolution: the scope inside a
 * scope, the root provider outside of one.
 *
 * @remarks
 * This is the handle a component passes to services that must look things
 * up in the component's outer scope later:
 *
 * ```typescript
 * class ScopeDemoPage extends OwningComponentBase {
 *   static inject = [SERVICE_SCOPE_FACTORY_TOKEN, SERVICE_PROVIDER_TOKEN] as const;
 *
 *   protected override onInitialized(): void {
 *     this.viewService.setServices(this.services);
 *   }
 * }
 * ```
 */
export const SERVICE_PROVIDER_TOKEN = createToken<IServiceResolver>('IServiceProvider');

/**
 * Resolves to the current scope. Not available from the root provider.
 */
export const SERVICE_SCOPE_TOKEN = createToken<IServiceScope>('IServiceScope');

/**
 * Resolves to a factory creating scopes from the root provider.
 */
export const SERVICE_SCOPE_FACTORY_TOKEN = createToken<IServiceScopeFactory>('IServiceScopeFactory');

// ============================================================================
// Build Options
// ============================================================================

/**
 * Options for building the service provider.
 */
export interface IBuildOptions {
  /**
   * Validate scope dependencies at build time and on creation.
   *
   * @remarks
   * If true, a Singleton depending on a Scoped or Transient service throws
   * ScopeMismatchError.
   *
   * Default: true
   */
  validateScopes?: boolean;

  /**
   * Eagerly create all singleton instances at build time.
   *
   * Default: false
   */
  eagerSingletons?: boolean;

  /**
   * Allow resolving Scoped services without a scope.
   *
   * @remarks
   * If true, resolving a Scoped service from the root provider creates an
   * untracked instance instead of throwing.
   *
   * Default: false (strict mode)
   */
  allowScopedWithoutScope?: boolean;

  /**
   * Logger for scope lifecycle and disposal failures.
   *
   * Default: a logger created by `createLogger` with the `di` label.
   */
  logger?: Logger;
}
