/**
 * @fileoverview ServiceIdentifier - Unified Service Identification
 *
 * @packageDocumentation
 * @module @scopelab/core/domain/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * Services are identified either by their class constructor or by a typed
 * {@link ServiceToken}. Both forms carry the instance type, so
 * `resolve(identifier)` is typed without annotations:
 *
 * ```typescript
 * const ILogger = createToken<Logger>('ILogger');
 *
 * services.addSingletonInstance(ILogger, logger);
 * services.addScoped(ViewService);
 *
 * scope.resolve(ILogger);     // Logger
 * scope.resolve(ViewService); // ViewService
 * ```
 *
 * Identifiers are compared by reference. Two classes that share a name are
 * still two distinct services.
 *
 * @version 1.0.0
 */

/**
 * Type representing a constructor function.
 *
 * @template T - The instance type created by the constructor
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type Constructor<T = unknown> = new (...args: any[]) => T;

/**
 * Typed token for services that are not identified by their class, such as
 * interfaces, configuration objects or third-party instances.
 *
 * @template T - The service type this token stands for
 */
export class ServiceToken<T> {
  /** Phantom field carrying `T`; never assigned. */
  declare readonly __type?: T;

  constructor(public readonly description: string) {}

  toString(): string {
    return `Token(${this.description})`;
  }
}

/**
 * ServiceIdentifier - Unified type for identifying services in the container.
 *
 * @template T - The service instance type
 */
export type ServiceIdentifier<T = unknown> = Constructor<T> | ServiceToken<T>;

/**
 * Check if a value is a valid ServiceIdentifier.
 *
 * @example
 * ```typescript
 * isServiceIdentifier(ViewService); // true
 * isServiceIdentifier(createToken('ILogger')); // true
 * isServiceIdentifier('view-service'); // false
 * ```
 */
export function isServiceIdentifier(value: unknown): value is ServiceIdentifier {
  return value instanceof ServiceToken || typeof value === 'function';
}

/**
 * Get a human-readable name for a ServiceIdentifier.
 *
 * @remarks
 * Used for log records, error messages and resolution paths.
 *
 * @example
 * ```typescript
 * getServiceName(ViewService); // 'ViewService'
 * getServiceName(createToken('ILogger')); // 'Token(ILogger)'
 * ```
 */
export function getServiceName(identifier: ServiceIdentifier): string {
  if (identifier instanceof ServiceToken) {
    return identifier.toString();
  }

  return identifier.name || 'AnonymousClass';
}

// ============================================================================
// Static Inject Pattern
// ============================================================================

/**
 * Read the dependencies a class declares through its `static inject` property.
 *
 * @remarks
 * The array order must match the constructor parameter order. Static
 * properties are inherited, so a subclass with the same constructor
 * signature does not need to repeat the declaration:
 *
 * ```typescript
 * class IdentifiedService {
 *   static readonly inject: readonly ServiceIdentifier[] = [LOGGER_TOKEN, InstanceTrackerService];
 *   constructor(logger: Logger, tracker: InstanceTrackerService) {}
 * }
 *
 * class NotificationService1 extends IdentifiedService {}
 * ```
 *
 * @returns The declared identifiers, or an empty array when nothing is declared
 * @throws TypeError when `inject` is not an array of identifiers
 */
export function getInjectDependencies(ctor: Constructor): readonly ServiceIdentifier[] {
  const inject: unknown = Reflect.get(ctor, 'inject');

  if (inject === undefined) {
    return [];
  }

  if (!Array.isArray(inject)) {
    throw new TypeError(`'${getServiceName(ctor)}.inject' must be an array of service identifiers`);
  }

  const dependencies: ServiceIdentifier[] = [];
  inject.forEach((entry: unknown, index) => {
    if (!isServiceIdentifier(entry)) {
      throw new TypeError(
        `'${getServiceName(ctor)}.inject[${index}]' is not a service identifier ` +
          `(got ${entry === undefined ? 'undefined, check for a circular import' : typeof entry})`,
      );
    }
    dependencies.push(entry);
  });

  return dependencies;
}

// ============================================================================
// Token Creation Helpers
// ============================================================================

/**
 * Create a typed service token for interface abstraction.
 *
 * @example
 * ```typescript
 * const LOGGER_TOKEN = createToken<Logger>('ILogger');
 *
 * class ViewService {
 *   static inject = [LOGGER_TOKEN] as const;
 *   constructor(private logger: Logger) {}
 * }
 * ```
 */
export function createToken<T>(description: string): ServiceToken<T> {
  return new ServiceToken<T>(description);
}
