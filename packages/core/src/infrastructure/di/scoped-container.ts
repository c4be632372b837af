/**
 * @fileoverview ScopedContainer - Scoped Service Management
 *
 * @packageDocumentation
 * @module @scopelab/core/infrastructure/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * This module implements scoped service management. A scope is an explicit
 * object created by the root provider; whoever holds it decides where scoped
 * services come from.
 *
 * ```
 * ServiceProvider (root)
 * │  singletons: InstanceTrackerService -> instance-1
 * │
 * ├─ ScopedContainer (application)
 * │    scoped:  NotificationService  -> instance-2
 * │             NotificationService1 -> instance-3
 * │
 * └─ ScopedContainer (page)
 *      scoped:  ViewService          -> instance-4
 *               NotificationService1 -> instance-5
 *      tracked: TransientService     -> instance-6
 * ```
 *
 * **Lifecycle:**
 *
 * 1. provider.createScope() creates a ScopedContainer
 * 2. Scoped services resolved within it are cached
 * 3. Disposable scoped and transient instances are tracked
 * 4. scope.dispose() disposes them, newest first
 *
 * @version 1.0.0
 */

import { v4 as uuidv4 } from 'uuid';
import type { Logger } from 'pino';

import {
  type ServiceIdentifier,
  type Constructor,
  type IDisposable,
  type IServiceDescriptor,
  type IServiceProvider,
  type IServiceScope,
  isDisposable,
  isServiceNotRegistered,
  ScopeDisposedError,
  SERVICE_PROVIDER_TOKEN,
  SERVICE_SCOPE_TOKEN,
} from '../../domain/di';

import { disposeInstances } from './disposal';
import { type CacheHit, InstanceCache } from './service-registry';
import type { ServiceProvider } from './service-provider';

/**
 * ScopedContainer - IServiceScope implementation.
 *
 * @remarks
 * **Responsibilities:**
 *
 * 1. Cache scoped service instances for this scope
 * 2. Delegate singleton resolution to root provider
 * 3. Track the disposable instances it created
 * 4. Dispose them when the scope ends
 *
 * Inside the scope, `SERVICE_PROVIDER_TOKEN` and `SERVICE_SCOPE_TOKEN` both
 * resolve to the scope itself.
 *
 * @example
 * ```typescript
 * const scope = provider.createScope();
 * try {
 *   const view = scope.resolve(ViewService);
 *   view.setServices(appScope);
 *   view.updateView();
 * } finally {
 *   await scope.dispose(); // disposes ViewService, its NotificationService1 and TransientService
 * }
 * ```
 */
export class ScopedContainer implements IServiceScope {
  readonly id: string = uuidv4();

  private readonly rootProvider: ServiceProvider;

  private readonly logger: Logger;

  private readonly scopedCache = new InstanceCache();

  /**
   * Instances that resolve only in this scope and are never disposed by it.
   */
  private readonly locals = new InstanceCache();

  /**
   * Disposable instances, in creation order.
   */
  private readonly disposables: IDisposable[] = [];

  private disposed = false;

  constructor(rootProvider: ServiceProvider) {
    this.rootProvider = rootProvider;
    this.logger = rootProvider.logger.child({ scopeId: this.id });

    this.locals.set(SERVICE_PROVIDER_TOKEN, this);
    this.locals.set(SERVICE_SCOPE_TOKEN, this);

    this.logger.debug('Scope created');
  }

  // ============================================================================
  // IServiceScope Implementation
  // ============================================================================

  resolve<T>(identifier: ServiceIdentifier<T>): T {
    this.ensureNotDisposed();
    return this.rootProvider.resolveIn(identifier, this, []);
  }

  tryResolve<T>(identifier: ServiceIdentifier<T>): T | undefined {
    try {
      return this.resolve(identifier);
    } catch (error) {
      if (isServiceNotRegistered(error, identifier)) {
        return undefined;
      }
      throw error;
    }
  }

  activate<T>(ctor: Constructor<T>): T {
    this.ensureNotDisposed();
    return this.rootProvider.activateIn(ctor, this);
  }

  provide<T>(identifier: ServiceIdentifier<T>, instance: T): this {
    this.ensureNotDisposed();
    this.locals.set(identifier, instance);
    return this;
  }

  /**
   * Get a provider view whose resolutions happen in this scope.
   *
   * @remarks
   * `createScope()` on the view creates a sibling scope from the root;
   * scopes do not nest.
   */
  getServiceProvider(): IServiceProvider {
    return {
      resolve: <T>(identifier: ServiceIdentifier<T>): T => this.resolve(identifier),
      tryResolve: <T>(identifier: ServiceIdentifier<T>): T | undefined =>
        this.tryResolve(identifier),
      resolveAll: <T>(identifier: ServiceIdentifier<T>): T[] => {
        const service = this.tryResolve(identifier);
        return service !== undefined ? [service] : [];
      },
      isRegistered: (identifier: ServiceIdentifier): boolean =>
        this.locals.has(identifier) || this.rootProvider.isRegistered(identifier),
      activate: <T>(ctor: Constructor<T>): T => this.activate(ctor),
      createScope: () => this.rootProvider.createScope(),
      dispose: () => this.dispose(),
    };
  }

  isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * Dispose the scope.
   *
   * @remarks
   * Every tracked instance is disposed, newest first. A failing `dispose()`
   * is logged and the rest still run. Calling this again does nothing.
   */
  async dispose(): Promise<void> {
    if (this.disposed) {
      return;
    }

    this.disposed = true;

    const instances = this.disposables.splice(0).reverse();
    this.scopedCache.clear();
    this.locals.clear();

    const count = await disposeInstances(instances, this.logger);
    this.logger.debug({ disposed: count }, 'Scope disposed');
  }

  // ============================================================================
  // Internal Methods (called by ServiceProvider)
  // ============================================================================

  /**
   * @internal
   */
  lookupLocal<T>(identifier: ServiceIdentifier<T>): CacheHit<T> | undefined {
    return this.locals.lookup(identifier);
  }

  /**
   * Return the cached scoped instance, creating it on first request.
   * @internal
   */
  resolveScoped<T>(descriptor: IServiceDescriptor<T>, create: () => T): T {
    const cached = this.scopedCache.lookup(descriptor.serviceIdentifier);
    if (cached) {
      return cached.instance;
    }

    const instance = create();
    this.scopedCache.set(descriptor.serviceIdentifier, instance);
    this.track(instance);

    return instance;
  }

  /**
   * Track an instance for disposal with this scope.
   * @internal
   */
  track(instance: unknown): void {
    if (isDisposable(instance)) {
      this.disposables.push(instance);
    }
  }

  private ensureNotDisposed(): void {
    if (this.disposed) {
      throw new ScopeDisposedError(this.id);
    }
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Run a function within a new scope.
 *
 * @remarks
 * Convenience function that creates a scope, runs the callback,
 * and ensures disposal.
 *
 * @example
 * ```typescript
 * const message = await withScope(provider, (scope) => {
 *   const notifications = scope.resolve(NotificationService);
 *   notifications.notifyChanged();
 *   return notifications.message;
 * });
 * ```
 */
export async function withScope<T>(
  provider: IServiceProvider,
  callback: (scope: IServiceScope) => T | Promise<T>,
): Promise<T> {
  const scope = provider.createScope();
  try {
    return await callback(scope);
  } finally {
    await scope.dispose();
  }
}
