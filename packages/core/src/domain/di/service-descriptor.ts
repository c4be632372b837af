/**
 * @fileoverview IServiceDescriptor - Service Registration Metadata
 *
 * @packageDocumentation
 * @module @scopelab/core/domain/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * This module defines the metadata structure for registered services.
 * IServiceDescriptor holds all information needed to resolve a service.
 *
 * @version 1.0.0
 */

import { type ServiceIdentifier, type Constructor, getServiceName } from './service-identifier';
import { ServiceLifetime } from './service-lifetime';

/**
 * Factory function type for creating service instances.
 *
 * @template T - The service instance type
 *
 * @remarks
 * The resolver is bound to the scope performing the resolution, so a factory
 * registered as Scoped sees the same scoped instances as a class would.
 * Factories must be synchronous.
 *
 * @example
 * ```typescript
 * const viewFactory: ServiceFactory<ViewService> = (resolver) =>
 *   new ViewService(
 *     resolver.resolve(LOGGER_TOKEN),
 *     resolver.resolve(InstanceTrackerService),
 *     resolver.resolve(NotificationService1),
 *     resolver.resolve(TransientService),
 *   );
 * ```
 */
export type ServiceFactory<T> = (resolver: IServiceResolver) => T;

/**
 * Minimal resolver interface, shared by the root provider, scopes and the
 * resolvers handed to factories.
 */
export interface IServiceResolver {
  /**
   * Resolve a service by its identifier.
   */
  resolve<T>(identifier: ServiceIdentifier<T>): T;

  /**
   * Try to resolve a service, returning undefined if not registered.
   */
  tryResolve<T>(identifier: ServiceIdentifier<T>): T | undefined;
}

/**
 * IServiceDescriptor - Complete metadata for a registered service.
 *
 * @template T - The service instance type
 *
 * @remarks
 * **Invariants:**
 *
 * - Either `implementationType` OR `factory` must be provided (not both, not neither)
 * - `implementationType` must have a constructor
 */
export interface IServiceDescriptor<T = unknown> {
  /**
   * The identifier used to request this service.
   */
  readonly serviceIdentifier: ServiceIdentifier<T>;

  /**
   * The lifecycle scope of this service.
   */
  readonly lifetime: ServiceLifetime;

  /**
   * The concrete implementation class.
   *
   * @remarks
   * Mutually exclusive with `factory`.
   */
  readonly implementationType?: Constructor<T>;

  /**
   * Factory function for creating instances.
   *
   * @remarks
   * Mutually exclusive with `implementationType`.
   */
  readonly factory?: ServiceFactory<T>;
}

/**
 * Create a IServiceDescriptor for a class-based registration.
 *
 * @example
 * ```typescript
 * const descriptor = createClassDescriptor(ViewService, ServiceLifetime.Scoped, ViewService);
 * ```
 */
export function createClassDescriptor<T>(
  serviceIdentifier: ServiceIdentifier<T>,
  lifetime: ServiceLifetime,
  implementationType: Constructor<T>,
): IServiceDescriptor<T> {
  return {
    serviceIdentifier,
    lifetime,
    implementationType,
  };
}

/**
 * Create a IServiceDescriptor for a factory-based registration.
 */
export function createFactoryDescriptor<T>(
  serviceIdentifier: ServiceIdentifier<T>,
  lifetime: ServiceLifetime,
  factory: ServiceFactory<T>,
): IServiceDescriptor<T> {
  return {
    serviceIdentifier,
    lifetime,
    factory,
  };
}

/**
 * Create a IServiceDescriptor for a pre-created instance.
 *
 * @remarks
 * Instance registrations are always Singleton (the instance already exists).
 *
 * @example
 * ```typescript
 * const descriptor = createInstanceDescriptor(LOGGER_TOKEN, logger);
 * ```
 */
export function createInstanceDescriptor<T>(
  serviceIdentifier: ServiceIdentifier<T>,
  instance: T,
): IServiceDescriptor<T> {
  return {
    serviceIdentifier,
    lifetime: ServiceLifetime.Singleton,
    factory: () => instance,
  };
}

/**
 * Validate a IServiceDescriptor.
 *
 * @throws Error if descriptor is invalid
 *
 * @internal
 */
export function validateDescriptor<T>(descriptor: IServiceDescriptor<T>): void {
  const name = getServiceName(descriptor.serviceIdentifier);
  const hasImplementation = descriptor.implementationType !== undefined;
  const hasFactory = descriptor.factory !== undefined;

  if (!hasImplementation && !hasFactory) {
    throw new Error(`IServiceDescriptor for '${name}' must have either implementationType or factory`);
  }

  if (hasImplementation && hasFactory) {
    throw new Error(`IServiceDescriptor for '${name}' cannot have both implementationType and factory`);
  }

  if (hasImplementation && typeof descriptor.implementationType !== 'function') {
    throw new Error(`implementationType for '${name}' must be a constructor function`);
  }

  if (hasFactory && typeof descriptor.factory !== 'function') {
    throw new Error(`factory for '${name}' must be a function`);
  }

  if (!Object.values(ServiceLifetime).includes(descriptor.lifetime)) {
    throw new Error(`Unknown lifetime '${String(descriptor.lifetime)}' for '${name}'`);
  }
}
