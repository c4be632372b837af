/**
 * @fileoverview DI Errors - Dependency Injection Error Classes
 *
 * @packageDocumentation
 * @module @scopelab/core/domain/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * This module defines error classes for DI-related failures.
 * Each error carries the resolution path that led to it.
 *
 * @version 1.0.0
 */

import { type ServiceIdentifier, getServiceName } from './service-identifier';
import { type ServiceLifetime, getLifetimeName } from './service-lifetime';

/**
 * Resolution path as a list of service names, outermost first.
 */
export type ResolutionPath = readonly string[];

/**
 * Base error class for all DI-related errors.
 *
 * @remarks
 * ```typescript
 * try {
 *   scope.resolve(ViewService);
 * } catch (error) {
 *   if (error instanceof DIError) {
 *     logger.error({ path: error.resolutionPath }, error.message);
 *   }
 * }
 * ```
 */
export abstract class DIError extends Error {
  /**
   * The resolution path leading to this error.
   *
   * @remarks
   * ```
   * ScopeDemoPage -> ViewService -> NotificationService1 (UNREGISTERED)
   * ```
   */
  public readonly resolutionPath: ResolutionPath;

  /**
   * Indented rendering of the resolution path.
   *
   * @remarks
   * ```
   * ViewService
   *   └─ NotificationService1 (UNREGISTERED)
   * ```
   */
  public readonly dependencyGraph: string;

  constructor(message: string, resolutionPath: ResolutionPath = [], options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.resolutionPath = resolutionPath;
    this.dependencyGraph = this.buildDependencyGraph();

    Object.setPrototypeOf(this, new.target.prototype);
  }

  private buildDependencyGraph(): string {
    return this.resolutionPath
      .map((entry, i) => `${'  '.repeat(i)}${i === 0 ? '' : '└─ '}${entry}`)
      .join('\n');
  }
}

/**
 * Error thrown when a requested service is not registered.
 */
export class ServiceNotRegisteredError extends DIError {
  public readonly serviceIdentifier: ServiceIdentifier;

  constructor(identifier: ServiceIdentifier, resolutionPath: ResolutionPath = []) {
    const name = getServiceName(identifier);
    const message =
      `Service '${name}' is not registered in the container. ` +
      `Did you forget to call services.add*(${name})?`;

    super(message, [...resolutionPath, `${name} (UNREGISTERED)`]);
    this.serviceIdentifier = identifier;
  }
}

/**
 * Check whether `error` reports that `identifier` itself is unregistered,
 * as opposed to one of its dependencies.
 */
export function isServiceNotRegistered(error: unknown, identifier: ServiceIdentifier): boolean {
  return error instanceof ServiceNotRegisteredError && error.serviceIdentifier === identifier;
}

/**
 * Error thrown when a circular dependency is detected.
 *
 * @remarks
 * Break the cycle by resolving one side lazily, the way `ViewService`
 * receives its outer `NotificationService` through `setServices(resolver)`
 * instead of its constructor.
 */
export class CircularDependencyError extends DIError {
  public readonly serviceIdentifier: ServiceIdentifier;

  /**
   * The full cycle path, ending with the repeated service.
   */
  public readonly cyclePath: ResolutionPath;

  constructor(identifier: ServiceIdentifier, resolutionPath: ResolutionPath) {
    const name = getServiceName(identifier);
    const cyclePath = [...resolutionPath, name];

    super(`Circular dependency detected: ${cyclePath.join(' -> ')}`, [
      ...resolutionPath,
      `${name} (CIRCULAR!)`,
    ]);
    this.serviceIdentifier = identifier;
    this.cyclePath = cyclePath;
  }
}

/**
 * Error thrown when a longer-lived service depends on a shorter-lived one.
 *
 * @remarks
 * A Singleton holding a Scoped instance would keep serving the instance of
 * whichever scope happened to create it first, long after that scope is gone.
 */
export class ScopeMismatchError extends DIError {
  public readonly dependentIdentifier: ServiceIdentifier;
  public readonly dependencyIdentifier: ServiceIdentifier;
  public readonly dependentLifetime: ServiceLifetime;
  public readonly dependencyLifetime: ServiceLifetime;

  constructor(
    dependentId: ServiceIdentifier,
    dependencyId: ServiceIdentifier,
    dependentLifetime: ServiceLifetime,
    dependencyLifetime: ServiceLifetime,
    resolutionPath: ResolutionPath = [],
  ) {
    const dependentName = getServiceName(dependentId);
    const dependencyName = getServiceName(dependencyId);
    const dependentLifetimeName = getLifetimeName(dependentLifetime);
    const dependencyLifetimeName = getLifetimeName(dependencyLifetime);

    const message =
      `Scope mismatch: ${dependentLifetimeName} service '${dependentName}' ` +
      `cannot depend on ${dependencyLifetimeName} service '${dependencyName}'.`;

    super(message, [
      ...resolutionPath,
      `${dependencyName} (${dependencyLifetimeName}) ← SCOPE MISMATCH`,
    ]);

    this.dependentIdentifier = dependentId;
    this.dependencyIdentifier = dependencyId;
    this.dependentLifetime = dependentLifetime;
    this.dependencyLifetime = dependencyLifetime;
  }
}

/**
 * Error thrown when resolving a Scoped service outside of a scope.
 *
 * @remarks
 * Resolve from a scope instead:
 *
 * ```typescript
 * const scope = provider.createScope();
 * scope.resolve(NotificationService);
 * ```
 */
export class NoActiveScopeError extends DIError {
  public readonly serviceIdentifier: ServiceIdentifier;

  constructor(identifier: ServiceIdentifier, resolutionPath: ResolutionPath = []) {
    const name = getServiceName(identifier);

    super(
      `Cannot resolve service '${name}' from the root provider: it requires a scope. ` +
        `Resolve it from provider.createScope() instead.`,
      [...resolutionPath, `${name} (NO SCOPE)`],
    );
    this.serviceIdentifier = identifier;
  }
}

/**
 * Error thrown when instance creation fails.
 *
 * @remarks
 * Wraps errors thrown by constructors and factories. The original error is
 * preserved as `cause`.
 */
export class ServiceCreationError extends DIError {
  public readonly serviceIdentifier: ServiceIdentifier;

  constructor(identifier: ServiceIdentifier, cause: Error, resolutionPath: ResolutionPath = []) {
    const name = getServiceName(identifier);

    super(
      `Failed to create service '${name}': ${cause.message}`,
      [...resolutionPath, `${name} (CREATION FAILED)`],
      { cause },
    );
    this.serviceIdentifier = identifier;
  }
}

/**
 * Error thrown when trying to use a disposed scope.
 */
export class ScopeDisposedError extends DIError {
  constructor(scopeId?: string) {
    super(
      `Cannot resolve services from a disposed scope${scopeId ? ` (${scopeId})` : ''}. ` +
        'Create a new scope with provider.createScope().',
    );
  }
}

/**
 * Error thrown when trying to use a disposed provider.
 */
export class ProviderDisposedError extends DIError {
  constructor() {
    super('Cannot use a ServiceProvider after it has been disposed.');
  }
}

/**
 * Error thrown when trying to modify a sealed collection.
 */
export class ContainerSealedError extends DIError {
  constructor() {
    super(
      'Cannot register services after the container has been built. ' +
        'Register all services before calling build().',
    );
  }
}
