/**
 * @fileoverview ServiceCollection - Service Registration Implementation
 *
 * @packageDocumentation
 * @module @scopelab/core/infrastructure/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Registrations are keyed by identifier object, so two tokens created with
 * the same description, or two classes that share a name, stay separate.
 * `build()` seals the collection and hands the provider its own copy.
 *
 * @version 1.0.0
 */

import {
  type ServiceIdentifier,
  type Constructor,
  type IServiceDescriptor,
  type ServiceFactory,
  type IServiceCollection,
  type IServiceProvider,
  type IBuildOptions,
  ServiceLifetime,
  createClassDescriptor,
  createFactoryDescriptor,
  createInstanceDescriptor,
  validateDescriptor,
  ContainerSealedError,
} from '../../domain/di';

import { ServiceProvider } from './service-provider';
import { DescriptorRegistry } from './service-registry';

/**
 * ServiceCollection - Fluent API for service registration.
 *
 * @remarks
 * Registering an identifier again replaces the earlier registration but
 * keeps its position in `getDescriptors()`.
 *
 * ```typescript
 * const services = new ServiceCollection();
 *
 * services
 *   .addSingleton(InstanceTrackerService)
 *   .addSingletonInstance(LOGGER_TOKEN, logger)
 *   .addScoped(NotificationService)
 *   .addScoped(ViewService)
 *   .addTransient(TransientService);
 *
 * const provider = services.build();
 * ```
 */
export class ServiceCollection implements IServiceCollection {
  private readonly registry = new DescriptorRegistry();

  private sealed = false;

  // ============================================================================
  // Singleton Registration
  // ============================================================================

  /**
   * One instance per provider, created outside any scope and disposed with
   * the provider.
   */
  addSingleton<T>(implementation: Constructor<T>): this;
  addSingleton<T>(identifier: ServiceIdentifier<T>, implementation: Constructor<T>): this;
  addSingleton<T>(identifierOrImpl: ServiceIdentifier<T>, implementation?: Constructor<T>): this {
    return this.registerClass(ServiceLifetime.Singleton, identifierOrImpl, implementation);
  }

  addSingletonFactory<T>(identifier: ServiceIdentifier<T>, factory: ServiceFactory<T>): this {
    return this.register(createFactoryDescriptor(identifier, ServiceLifetime.Singleton, factory));
  }

  /**
   * The provider disposes a disposable instance registered here, like any
   * other singleton.
   */
  addSingletonInstance<T>(identifier: ServiceIdentifier<T>, instance: T): this {
    return this.register(createInstanceDescriptor(identifier, instance));
  }

  // ============================================================================
  // Scoped Registration
  // ============================================================================

  /**
   * One instance per scope. Resolving it from the root provider throws
   * NoActiveScopeError unless `allowScopedWithoutScope` is set.
   */
  addScoped<T>(implementation: Constructor<T>): this;
  addScoped<T>(identifier: ServiceIdentifier<T>, implementation: Constructor<T>): this;
  addScoped<T>(identifierOrImpl: ServiceIdentifier<T>, implementation?: Constructor<T>): this {
    return this.registerClass(ServiceLifetime.Scoped, identifierOrImpl, implementation);
  }

  addScopedFactory<T>(identifier: ServiceIdentifier<T>, factory: ServiceFactory<T>): this {
    return this.register(createFactoryDescriptor(identifier, ServiceLifetime.Scoped, factory));
  }

  // ============================================================================
  // Transient Registration
  // ============================================================================

  /**
   * A new instance per resolution; the resolving scope tracks it for disposal.
   */
  addTransient<T>(implementation: Constructor<T>): this;
  addTransient<T>(identifier: ServiceIdentifier<T>, implementation: Constructor<T>): this;
  addTransient<T>(identifierOrImpl: ServiceIdentifier<T>, implementation?: Constructor<T>): this {
    return this.registerClass(ServiceLifetime.Transient, identifierOrImpl, implementation);
  }

  addTransientFactory<T>(identifier: ServiceIdentifier<T>, factory: ServiceFactory<T>): this {
    return this.register(createFactoryDescriptor(identifier, ServiceLifetime.Transient, factory));
  }

  // ============================================================================
  // Inspection
  // ============================================================================

  has(identifier: ServiceIdentifier): boolean {
    return this.registry.has(identifier);
  }

  /**
   * Descriptors in registration order.
   */
  getDescriptors(): readonly IServiceDescriptor[] {
    return this.registry.values();
  }

  getDescriptor<T>(identifier: ServiceIdentifier<T>): IServiceDescriptor<T> | undefined {
    return this.registry.get(identifier);
  }

  remove(identifier: ServiceIdentifier): boolean {
    this.ensureNotSealed();
    return this.registry.delete(identifier);
  }

  clear(): void {
    this.ensureNotSealed();
    this.registry.clear();
  }

  /**
   * Seal the collection and create the root provider. With `validateScopes`
   * (the default), a Singleton depending on a Scoped or Transient service
   * fails here with ScopeMismatchError.
   */
  build(options?: IBuildOptions): IServiceProvider {
    this.sealed = true;

    return new ServiceProvider(new DescriptorRegistry(this.registry.values()), options);
  }

  // ============================================================================
  // Private Helpers
  // ============================================================================

  private ensureNotSealed(): void {
    if (this.sealed) {
      throw new ContainerSealedError();
    }
  }

  private register<T>(descriptor: IServiceDescriptor<T>): this {
    this.ensureNotSealed();
    validateDescriptor(descriptor);

    this.registry.set(descriptor);

    return this;
  }

  /**
   * `add*(Implementation)` registers the class under itself;
   * `add*(identifier, Implementation)` under the identifier.
   */
  private registerClass<T>(
    lifetime: ServiceLifetime,
    identifierOrImpl: ServiceIdentifier<T>,
    implementation: Constructor<T> | undefined,
  ): this {
    if (implementation !== undefined) {
      return this.register(createClassDescriptor(identifierOrImpl, lifetime, implementation));
    }

    if (typeof identifierOrImpl === 'function') {
      return this.register(createClassDescriptor(identifierOrImpl, lifetime, identifierOrImpl));
    }

    throw new TypeError(
      `Invalid registration: expected a constructor or [identifier, implementation], ` +
        `got ${String(identifierOrImpl)}`,
    );
  }
}

/**
 * Create an empty ServiceCollection.
 */
export function createServiceCollection(): ServiceCollection {
  return new ServiceCollection();
}
