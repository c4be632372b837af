/**
 * @fileoverview ServiceProvider - Core Dependency Resolution Engine
 *
 * @packageDocumentation
 * @module @scopelab/core/infrastructure/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * This module implements the core dependency resolution algorithm.
 * It handles singleton caching, scope delegation, and circular dependency detection.
 *
 * ## Resolution Algorithm
 *
 * ```
 * resolveIn(identifier, scope, path)
 *   1. Scope-local instance (provide(), IServiceProvider, IServiceScope)
 *   2. Built-in root instance (IServiceProvider, IServiceScopeFactory)
 *   3. Circular dependency check against the path
 *   4. Find descriptor
 *   5. Based on lifetime:
 *      - Singleton: root cache, created with no scope
 *      - Scoped: the scope's cache
 *      - Transient: always new, tracked by the scope
 *   6. If creating:
 *      a. Get dependencies from static inject
 *      b. Validate their lifetimes
 *      c. Recursively resolve them in the same scope
 *      d. Create instance (constructor or factory)
 * ```
 *
 * The scope is an argument of every internal call. Nothing about the current
 * scope is stored globally, so two scopes can be used side by side.
 *
 * ## Zero-Reflection Pattern
 *
 * Dependencies are read from `static inject` property:
 *
 * ```typescript
 * class ViewService {
 *   static inject = [LOGGER_TOKEN, InstanceTrackerService, NotificationService1] as const;
 *   constructor(logger: Logger, tracker: InstanceTrackerService, n1: NotificationService1) {}
 * }
 * ```
 *
 * @version 1.0.0
 */

import type { Logger } from 'pino';

import {
  type ServiceIdentifier,
  type Constructor,
  type IServiceDescriptor,
  type IServiceProvider,
  type IServiceResolver,
  type IServiceScopeFactory,
  type IBuildOptions,
  type ResolutionPath,
  ServiceLifetime,
  getServiceName,
  getInjectDependencies,
  canDependOn,
  isServiceNotRegistered,
  DIError,
  ServiceNotRegisteredError,
  CircularDependencyError,
  ScopeMismatchError,
  NoActiveScopeError,
  ServiceCreationError,
  ScopeDisposedError,
  ProviderDisposedError,
  SERVICE_PROVIDER_TOKEN,
  SERVICE_SCOPE_FACTORY_TOKEN,
} from '../../domain/di';
import { createLogger } from '../logging';

import { disposeInstances } from './disposal';
import { ScopedContainer } from './scoped-container';
import { type DescriptorRegistry, InstanceCache } from './service-registry';

/**
 * Identifiers currently being created, outermost first.
 * @internal
 */
export type ResolutionStack = readonly ServiceIdentifier[];

type ProviderOptions = Required<Omit<IBuildOptions, 'logger'>>;

/**
 * ServiceProvider - IServiceProvider implementation.
 *
 * @remarks
 * **Lifecycle Management:**
 *
 * - Singleton: Cached in `singletons`, disposed with the provider
 * - Scoped: Cached in the scope that resolves it
 * - Transient: Never cached; tracked by the scope that created it
 *
 * **Circular Dependency Detection:**
 *
 * Uses a resolution stack to track the current resolution path.
 * If the same identifier appears twice in the stack, it's circular.
 *
 * @example
 * ```typescript
 * const provider = services.build();
 *
 * // Resolve singleton
 * const tracker = provider.resolve(InstanceTrackerService);
 *
 * // Resolve scoped (requires scope)
 * const scope = provider.createScope();
 * const notifications = scope.resolve(NotificationService);
 * await scope.dispose();
 * ```
 */
export class ServiceProvider implements IServiceProvider {
  /**
   * Logger shared with every scope of this provider.
   * @internal
   */
  readonly logger: Logger;

  private readonly registry: DescriptorRegistry;

  private readonly singletons = new InstanceCache();

  /**
   * Instances the provider answers itself, never disposed.
   */
  private readonly builtins = new InstanceCache();

  private readonly options: ProviderOptions;

  private disposed = false;

  constructor(registry: DescriptorRegistry, options?: IBuildOptions) {
    this.registry = registry;
    this.logger = options?.logger ?? createLogger({}, 'di');
    this.options = {
      validateScopes: options?.validateScopes ?? true,
      eagerSingletons: options?.eagerSingletons ?? false,
      allowScopedWithoutScope: options?.allowScopedWithoutScope ?? false,
    };

    const scopeFactory: IServiceScopeFactory = { createScope: () => this.createScope() };
    this.builtins.set(SERVICE_PROVIDER_TOKEN, this);
    this.builtins.set(SERVICE_SCOPE_FACTORY_TOKEN, scopeFactory);

    if (this.options.validateScopes) {
      this.validateScopeDependencies();
    }

    if (this.options.eagerSingletons) {
      this.createEagerSingletons();
    }
  }

  // ============================================================================
  // IServiceProvider Implementation
  // ============================================================================

  resolve<T>(identifier: ServiceIdentifier<T>): T {
    this.ensureNotDisposed();
    return this.resolveIn(identifier, undefined, []);
  }

  /**
   * Try to resolve a service, returning undefined if it is not registered.
   *
   * @remarks
   * An unregistered dependency of a registered service still throws.
   */
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

  resolveAll<T>(identifier: ServiceIdentifier<T>): T[] {
    const service = this.tryResolve(identifier);
    return service !== undefined ? [service] : [];
  }

  isRegistered(identifier: ServiceIdentifier): boolean {
    return this.registry.has(identifier) || this.builtins.has(identifier);
  }

  activate<T>(ctor: Constructor<T>): T {
    this.ensureNotDisposed();
    return this.activateIn(ctor, undefined);
  }

  /**
   * Create a new scope. Scopes are independent of each other and of the
   * scope (if any) that asked for them.
   */
  createScope(): ScopedContainer {
    this.ensureNotDisposed();
    return new ScopedContainer(this);
  }

  /**
   * Dispose the provider and its singletons, newest first.
   */
  async dispose(): Promise<void> {
    if (this.disposed) {
      return;
    }

    this.disposed = true;

    const instances = this.singletons.values().reverse();
    this.singletons.clear();
    await disposeInstances(instances, this.logger);
  }

  isDisposed(): boolean {
    return this.disposed;
  }

  // ============================================================================
  // Internal Resolution
  // ============================================================================

  /**
   * Resolve `identifier` on behalf of `scope`, or of the root when undefined.
   * @internal
   */
  resolveIn<T>(
    identifier: ServiceIdentifier<T>,
    scope: ScopedContainer | undefined,
    stack: ResolutionStack,
  ): T {
    this.ensureNotDisposed();
    if (scope?.isDisposed()) {
      throw new ScopeDisposedError(scope.id);
    }

    const local = scope?.lookupLocal(identifier);
    if (local) {
      return local.instance;
    }

    const builtin = this.builtins.lookup(identifier);
    if (builtin) {
      return builtin.instance;
    }

    if (stack.includes(identifier)) {
      throw new CircularDependencyError(identifier, toPath(stack));
    }

    const descriptor = this.registry.get(identifier);
    if (!descriptor) {
      throw new ServiceNotRegisteredError(identifier, toPath(stack));
    }

    switch (descriptor.lifetime) {
      case ServiceLifetime.Singleton:
        return this.resolveSingleton(descriptor, stack);

      case ServiceLifetime.Scoped:
        if (scope) {
          return scope.resolveScoped(descriptor, () => this.createInstance(descriptor, scope, stack));
        }
        if (this.options.allowScopedWithoutScope) {
          return this.createInstance(descriptor, undefined, stack);
        }
        throw new NoActiveScopeError(identifier, toPath(stack));

      case ServiceLifetime.Transient: {
        const instance = this.createInstance(descriptor, scope, stack);
        scope?.track(instance);
        return instance;
      }

      default:
        throw new Error(`Unknown lifetime: ${String(descriptor.lifetime)}`);
    }
  }

  /**
   * Construct an unregistered class with dependencies resolved in `scope`.
   * @internal
   */
  activateIn<T>(ctor: Constructor<T>, scope: ScopedContainer | undefined): T {
    return this.withCreationErrors(ctor, [], () =>
      this.createFromConstructor(ctor, undefined, scope, [ctor]),
    );
  }

  private resolveSingleton<T>(descriptor: IServiceDescriptor<T>, stack: ResolutionStack): T {
    const cached = this.singletons.lookup(descriptor.serviceIdentifier);
    if (cached) {
      return cached.instance;
    }

    // Singletons never see a scope, so they cannot capture scoped instances.
    const instance = this.createInstance(descriptor, undefined, stack);
    this.singletons.set(descriptor.serviceIdentifier, instance);

    return instance;
  }

  private createInstance<T>(
    descriptor: IServiceDescriptor<T>,
    scope: ScopedContainer | undefined,
    stack: ResolutionStack,
  ): T {
    const identifier = descriptor.serviceIdentifier;
    const nextStack = [...stack, identifier];

    return this.withCreationErrors(identifier, stack, () => {
      if (descriptor.factory) {
        const result = descriptor.factory(this.createResolver(scope, nextStack));

        if (result instanceof Promise) {
          throw new Error(
            `Async factories are not supported. ` +
              `Resolve the async dependency before registering '${getServiceName(identifier)}'.`,
          );
        }

        return result;
      }

      if (descriptor.implementationType) {
        return this.createFromConstructor(
          descriptor.implementationType,
          descriptor,
          scope,
          nextStack,
        );
      }

      throw new Error(`No factory or implementation type for '${getServiceName(identifier)}'`);
    });
  }

  /**
   * Run `create`, passing DI errors through and wrapping anything else in
   * ServiceCreationError.
   */
  private withCreationErrors<T>(
    identifier: ServiceIdentifier,
    stack: ResolutionStack,
    create: () => T,
  ): T {
    try {
      return create();
    } catch (error) {
      if (error instanceof DIError) {
        throw error;
      }

      throw new ServiceCreationError(
        identifier,
        error instanceof Error ? error : new Error(String(error)),
        toPath(stack),
      );
    }
  }

  private createFromConstructor<T>(
    ctor: Constructor<T>,
    descriptor: IServiceDescriptor<T> | undefined,
    scope: ScopedContainer | undefined,
    stack: ResolutionStack,
  ): T {
    const dependencies = getInjectDependencies(ctor);

    if (descriptor && this.options.validateScopes) {
      this.validateDependencyScopes(descriptor, dependencies, toPath(stack));
    }

    const resolved = dependencies.map((dependency) => this.resolveIn(dependency, scope, stack));

    return new ctor(...resolved);
  }

  /**
   * Create the resolver handed to factory functions, bound to the scope and
   * path of the instance being created.
   */
  private createResolver(
    scope: ScopedContainer | undefined,
    stack: ResolutionStack,
  ): IServiceResolver {
    return {
      resolve: <T>(identifier: ServiceIdentifier<T>): T => {
        return this.resolveIn(identifier, scope, stack);
      },
      tryResolve: <T>(identifier: ServiceIdentifier<T>): T | undefined => {
        try {
          return this.resolveIn(identifier, scope, stack);
        } catch (error) {
          if (isServiceNotRegistered(error, identifier)) {
            return undefined;
          }
          throw error;
        }
      },
    };
  }

  // ============================================================================
  // Validation
  // ============================================================================

  /**
   * Validate scope dependencies at build time.
   */
  private validateScopeDependencies(): void {
    for (const descriptor of this.registry.values()) {
      if (descriptor.implementationType) {
        const dependencies = getInjectDependencies(descriptor.implementationType);
        this.validateDependencyScopes(descriptor, dependencies, []);
      }
    }
  }

  private validateDependencyScopes(
    descriptor: IServiceDescriptor,
    dependencies: readonly ServiceIdentifier[],
    path: ResolutionPath,
  ): void {
    for (const dependency of dependencies) {
      const dependencyDescriptor = this.registry.get(dependency);

      if (!dependencyDescriptor) {
        // Will be caught during resolution
        continue;
      }

      if (!canDependOn(descriptor.lifetime, dependencyDescriptor.lifetime)) {
        throw new ScopeMismatchError(
          descriptor.serviceIdentifier,
          dependency,
          descriptor.lifetime,
          dependencyDescriptor.lifetime,
          path,
        );
      }
    }
  }

  private createEagerSingletons(): void {
    for (const descriptor of this.registry.values()) {
      if (descriptor.lifetime === ServiceLifetime.Singleton) {
        this.resolveSingleton(descriptor, []);
      }
    }
  }

  private ensureNotDisposed(): void {
    if (this.disposed) {
      throw new ProviderDisposedError();
    }
  }
}

function toPath(stack: ResolutionStack): ResolutionPath {
  return stack.map((identifier) => getServiceName(identifier));
}
