/**
 * @fileoverview ServiceLifetime - Service Lifecycle Management
 *
 * @packageDocumentation
 * @module @scopelab/core/domain/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * This module defines the service lifecycle scopes that control when
 * service instances are created and destroyed.
 *
 * ## Scopes are passed, not looked up
 *
 * A scope is an explicit object. Whatever resolves a service decides which
 * scope it lands in:
 *
 * ```
 * const appScope = provider.createScope();
 * const pageScope = provider.createScope();
 *
 * appScope.resolve(NotificationService1) !== pageScope.resolve(NotificationService1)
 * ```
 *
 * @version 1.0.0
 */

/**
 * ServiceLifetime - Defines when service instances are created and destroyed.
 *
 * @remarks
 * **Lifecycle Overview:**
 *
 * | Lifetime | Created | Shared | Destroyed |
 * |----------|---------|--------|-----------|
 * | Singleton | First request | Whole provider | Provider disposal |
 * | Scoped | First request in scope | Within scope | Scope disposal |
 * | Transient | Every request | Never | Disposal of the scope that created it |
 *
 * **Dependency Rules:**
 *
 * - ✅ Singleton can inject: Singleton
 * - ✅ Scoped can inject: Singleton, Scoped, Transient
 * - ✅ Transient can inject: Singleton, Scoped, Transient
 * - ❌ Singleton CANNOT inject: Scoped, Transient
 *
 * A Scoped service holding a Transient is fine: the transient was created by
 * the same scope and dies with it.
 *
 * @example Choosing the right lifetime
 * ```typescript
 * // SINGLETON: one per application
 * services.addSingleton(InstanceTrackerService);
 *
 * // SCOPED: one per scope (the application scope, or a component's own scope)
 * services.addScoped(NotificationService);
 * services.addScoped(ViewService);
 *
 * // TRANSIENT: a new instance on every request
 * services.addTransient(TransientService);
 * ```
 */
export enum ServiceLifetime {
  /**
   * Singleton: Single instance shared across the entire provider.
   *
   * @remarks
   * Created once on first resolution, always outside of any scope, so it
   * can never capture a scoped instance.
   */
  Singleton = 'singleton',

  /**
   * Scoped: One instance per scope.
   *
   * @remarks
   * **Characteristics:**
   * - Created once per scope
   * - Lives until scope is disposed
   * - Shared within the same scope
   * - Disposed with the scope when it implements `IDisposable`
   *
   * Resolving a Scoped service from the root provider throws
   * `NoActiveScopeError` unless `allowScopedWithoutScope` is set.
   */
  Scoped = 'scoped',

  /**
   * Transient: New instance created on every resolution.
   *
   * @remarks
   * Disposable transients created inside a scope are tracked by that scope
   * and disposed with it. Transients created by the root provider are not
   * tracked.
   */
  Transient = 'transient',
}

/**
 * Check if a service with `from` lifetime can depend on a service with `to` lifetime.
 *
 * @example
 * ```typescript
 * canDependOn(ServiceLifetime.Singleton, ServiceLifetime.Singleton); // true
 * canDependOn(ServiceLifetime.Singleton, ServiceLifetime.Scoped); // false!
 * canDependOn(ServiceLifetime.Scoped, ServiceLifetime.Transient); // true
 * canDependOn(ServiceLifetime.Transient, ServiceLifetime.Scoped); // true
 * ```
 */
export function canDependOn(from: ServiceLifetime, to: ServiceLifetime): boolean {
  return from !== ServiceLifetime.Singleton || to === ServiceLifetime.Singleton;
}

/**
 * Get a human-readable name for a lifetime.
 */
export function getLifetimeName(lifetime: ServiceLifetime): string {
  switch (lifetime) {
    case ServiceLifetime.Singleton:
      return 'Singleton';
    case ServiceLifetime.Scoped:
      return 'Scoped';
    case ServiceLifetime.Transient:
      return 'Transient';
    default:
      return 'Unknown';
  }
}
