/**
 * @fileoverview ServiceProvider Unit Tests
 *
 * Tests for the dependency resolution engine.
 *
 * @license Apache-2.0
 */

import { describe, it, expect, beforeEach } from 'vitest';

import {
  createToken,
  ServiceNotRegisteredError,
  CircularDependencyError,
  ScopeMismatchError,
  NoActiveScopeError,
  ServiceCreationError,
  ProviderDisposedError,
  SERVICE_PROVIDER_TOKEN,
  SERVICE_SCOPE_FACTORY_TOKEN,
  SERVICE_SCOPE_TOKEN,
  type IServiceProvider,
  type IDisposable,
} from '../../../src/domain/di';
import { ServiceCollection } from '../../../src/infrastructure/di';
import { captureError, createTestLogger } from '../../helpers';

// ============================================================================
// Test Fixtures
// ============================================================================

// Interface tokens
const ILogger = createToken<ILoggerInterface>('ILogger');
const IClock = createToken<IClockInterface>('IClock');
const IConfig = createToken<IConfigInterface>('IConfig');

interface ILoggerInterface {
  log(message: string): void;
}

interface IClockInterface {
  now(): number;
}

interface IConfigInterface {
  label: string;
  retries: number;
}

// Concrete implementations
class MemoryLogger implements ILoggerInterface {
  readonly messages: string[] = [];

  log(message: string): void {
    this.messages.push(message);
  }
}

class FixedClock implements IClockInterface {
  now(): number {
    return 1000;
  }
}

class ConfigService implements IConfigInterface {
  label = 'default';
  retries = 3;
}

// Service with dependencies
class GreetingService {
  static inject = [ILogger, IClock] as const;

  constructor(
    public readonly logger: ILoggerInterface,
    public readonly clock: IClockInterface,
  ) {}
}

// Service with nested dependencies
class WelcomeService {
  static inject = [GreetingService, ILogger] as const;

  constructor(
    public readonly greetingService: GreetingService,
    public readonly logger: ILoggerInterface,
  ) {}
}

// Disposable service
class DisposableService implements IDisposable {
  disposed = false;

  dispose(): void {
    this.disposed = true;
  }
}

// ============================================================================
// Tests
// ============================================================================

describe('ServiceProvider', () => {
  let services: ServiceCollection;
  let provider: IServiceProvider;

  beforeEach(() => {
    services = new ServiceCollection();
  });

  // ============================================================================
  // Basic Resolution Tests
  // ============================================================================

  describe('resolve - basic', () => {
    it('should resolve singleton service', () => {
      services.addSingleton(ConfigService);
      provider = services.build();

      const config = provider.resolve(ConfigService);

      expect(config).toBeInstanceOf(ConfigService);
      expect(config.retries).toBe(3);
    });

    it('should resolve token-to-implementation', () => {
      services.addSingleton(ILogger, MemoryLogger);
      provider = services.build();

      const logger = provider.resolve(ILogger);

      expect(logger).toBeInstanceOf(MemoryLogger);
    });

    it('should resolve factory-based service', () => {
      services.addSingletonFactory(IConfig, () => ({
        label: 'factory',
        retries: 5,
      }));
      provider = services.build();

      const config = provider.resolve(IConfig);

      expect(config.label).toBe('factory');
      expect(config.retries).toBe(5);
    });

    it('should resolve instance registration', () => {
      const instance = new ConfigService();
      instance.retries = 9;

      services.addSingletonInstance(ConfigService, instance);
      provider = services.build();

      const config = provider.resolve(ConfigService);

      expect(config).toBe(instance);
      expect(config.retries).toBe(9);
    });

    it('should keep two classes with the same name apart', () => {
      const First = class Twin {
        readonly which = 'first';
      };
      const Second = class Twin {
        readonly which = 'second';
      };

      services.addSingleton(First).addSingleton(Second);
      provider = services.build();

      expect(provider.resolve(First).which).toBe('first');
      expect(provider.resolve(Second).which).toBe('second');
    });
  });

  // ============================================================================
  // Dependency Injection Tests
  // ============================================================================

  describe('resolve - dependencies', () => {
    it('should inject dependencies from static inject', () => {
      services
        .addSingleton(ILogger, MemoryLogger)
        .addSingleton(IClock, FixedClock)
        .addSingleton(GreetingService);

      provider = services.build();

      const greetingService = provider.resolve(GreetingService);

      expect(greetingService).toBeInstanceOf(GreetingService);
      expect(greetingService.logger).toBeInstanceOf(MemoryLogger);
      expect(greetingService.clock).toBeInstanceOf(FixedClock);
    });

    it('should inject nested dependencies', () => {
      services
        .addSingleton(ILogger, MemoryLogger)
        .addSingleton(IClock, FixedClock)
        .addSingleton(GreetingService)
        .addSingleton(WelcomeService);

      provider = services.build();

      const welcomeService = provider.resolve(WelcomeService);

      expect(welcomeService.greetingService).toBeInstanceOf(GreetingService);
      expect(welcomeService.logger).toBeInstanceOf(MemoryLogger);
      expect(welcomeService.greetingService.clock).toBeInstanceOf(FixedClock);
    });

    it('should inject inherited static inject into subclasses', () => {
      class Base {
        static inject = [ILogger] as const;
        constructor(public readonly logger: ILoggerInterface) {}
      }
      class Derived extends Base {}

      services.addSingleton(ILogger, MemoryLogger).addTransient(Derived);
      provider = services.build();

      expect(provider.resolve(Derived).logger).toBe(provider.resolve(ILogger));
    });

    it('should resolve factory dependencies', () => {
      services.addSingleton(IConfig, ConfigService).addSingletonFactory(ILogger, (resolver) => {
        const logger = new MemoryLogger();
        logger.log(resolver.resolve(IConfig).label);
        return logger;
      });

      provider = services.build();

      const logger = provider.resolve(ILogger);
      expect(logger).toBeInstanceOf(MemoryLogger);
    });
  });

  // ============================================================================
  // Singleton Caching Tests
  // ============================================================================

  describe('singleton caching', () => {
    it('should return same instance for singleton', () => {
      services.addSingleton(ConfigService);
      provider = services.build();

      const config1 = provider.resolve(ConfigService);
      const config2 = provider.resolve(ConfigService);

      expect(config1).toBe(config2);
    });

    it('should share singleton across resolutions', () => {
      services
        .addSingleton(ILogger, MemoryLogger)
        .addSingleton(IClock, FixedClock)
        .addSingleton(GreetingService);

      provider = services.build();

      const greetingService = provider.resolve(GreetingService);
      const logger = provider.resolve(ILogger);

      expect(greetingService.logger).toBe(logger);
    });

    it('should create singletons at build time when eagerSingletons is set', () => {
      let created = 0;
      services.addSingletonFactory(IConfig, () => {
        created++;
        return new ConfigService();
      });

      provider = services.build({ eagerSingletons: true });

      expect(created).toBe(1);
      provider.resolve(IConfig);
      expect(created).toBe(1);
    });
  });

  // ============================================================================
  // Transient Tests
  // ============================================================================

  describe('transient resolution', () => {
    it('should create new instance each time', () => {
      services.addTransient(ConfigService);
      provider = services.build();

      const config1 = provider.resolve(ConfigService);
      const config2 = provider.resolve(ConfigService);

      expect(config1).not.toBe(config2);
    });
  });

  // ============================================================================
  // Scoped Resolution Tests
  // ============================================================================

  describe('scoped resolution', () => {
    beforeEach(() => {
      services
        .addSingleton(ILogger, MemoryLogger)
        .addScoped(IClock, FixedClock)
        .addScoped(GreetingService);

      provider = services.build({ logger: createTestLogger().logger });
    });

    it('should throw NoActiveScopeError when resolving scoped from the root', () => {
      expect(() => {
        provider.resolve(IClock);
      }).toThrow(NoActiveScopeError);
    });

    it('should create an untracked instance from the root when allowScopedWithoutScope is set', () => {
      provider = services.build({ allowScopedWithoutScope: true });

      const clock1 = provider.resolve(IClock);
      const clock2 = provider.resolve(IClock);

      expect(clock1).toBeInstanceOf(FixedClock);
      expect(clock1).not.toBe(clock2);
    });

    it('should cache scoped service within scope', async () => {
      const scope = provider.createScope();

      const clock1 = scope.resolve(IClock);
      const clock2 = scope.resolve(IClock);

      expect(clock1).toBe(clock2);

      await scope.dispose();
    });

    it('should create different instances in different scopes', async () => {
      const scope1 = provider.createScope();
      const scope2 = provider.createScope();

      expect(scope1).not.toBe(scope2);
      expect(scope1.id).not.toBe(scope2.id);
      expect(scope1.resolve(IClock)).not.toBe(scope2.resolve(IClock));

      await scope1.dispose();
      await scope2.dispose();
    });

    it('should share singleton between provider and scope', async () => {
      const rootLogger = provider.resolve(ILogger);

      const scope = provider.createScope();
      const scopeLogger = scope.resolve(ILogger);

      expect(scopeLogger).toBe(rootLogger);

      await scope.dispose();
    });

    it('should inject scoped into scoped from the same scope', async () => {
      const scope = provider.createScope();

      const greetingService = scope.resolve(GreetingService);

      expect(greetingService.clock).toBe(scope.resolve(IClock));

      await scope.dispose();
    });
  });

  // ============================================================================
  // Built-in Tokens
  // ============================================================================

  describe('built-in tokens', () => {
    beforeEach(() => {
      provider = services.build({ logger: createTestLogger().logger });
    });

    it('should resolve SERVICE_PROVIDER_TOKEN to the root outside of a scope', () => {
      expect(provider.resolve(SERVICE_PROVIDER_TOKEN)).toBe(provider);
    });

    it('should resolve SERVICE_SCOPE_FACTORY_TOKEN to a factory creating new scopes', async () => {
      const factory = provider.resolve(SERVICE_SCOPE_FACTORY_TOKEN);

      const scope1 = factory.createScope();
      const scope2 = factory.createScope();

      expect(scope1).not.toBe(scope2);

      await scope1.dispose();
      await scope2.dispose();
    });

    it('should not resolve SERVICE_SCOPE_TOKEN from the root', () => {
      expect(provider.tryResolve(SERVICE_SCOPE_TOKEN)).toBeUndefined();
    });

    it('should report built-in tokens as registered', () => {
      expect(provider.isRegistered(SERVICE_PROVIDER_TOKEN)).toBe(true);
      expect(provider.isRegistered(SERVICE_SCOPE_FACTORY_TOKEN)).toBe(true);
    });
  });

  // ============================================================================
  // activate
  // ============================================================================

  describe('activate', () => {
    it('should construct an unregistered class with its dependencies', () => {
      services.addSingleton(ILogger, MemoryLogger).addSingleton(IClock, FixedClock);
      provider = services.build();

      const greetingService = provider.activate(GreetingService);

      expect(greetingService.logger).toBe(provider.resolve(ILogger));
      expect(provider.activate(GreetingService)).not.toBe(greetingService);
      expect(provider.isRegistered(GreetingService)).toBe(false);
    });

    it('should throw ServiceNotRegisteredError for a missing dependency', () => {
      provider = services.build();

      expect(() => provider.activate(GreetingService)).toThrow(ServiceNotRegisteredError);
    });
  });

  // ============================================================================
  // Error Handling Tests
  // ============================================================================

  describe('error handling', () => {
    it('should throw ServiceNotRegisteredError for unregistered service', () => {
      provider = services.build();

      expect(() => {
        provider.resolve(ILogger);
      }).toThrow(ServiceNotRegisteredError);
    });

    it('should include resolution path in error', () => {
      services.addSingleton(GreetingService); // Missing ILogger and IClock

      provider = services.build();

      const error = captureError(ServiceNotRegisteredError, () => provider.resolve(GreetingService));
      expect(error.resolutionPath).toEqual(['GreetingService', 'Token(ILogger) (UNREGISTERED)']);
      expect(error.dependencyGraph).toBe('GreetingService\n  └─ Token(ILogger) (UNREGISTERED)');
    });

    it('should wrap constructor errors in ServiceCreationError', () => {
      class ExplodingService {
        constructor() {
          throw new RangeError('boom');
        }
      }
      services.addTransient(ExplodingService);
      provider = services.build();

      const error = captureError(ServiceCreationError, () => provider.resolve(ExplodingService));
      expect(error.message).toBe("Failed to create service 'ExplodingService': boom");
      expect(error.cause).toBeInstanceOf(RangeError);
    });

    it('should reject async factories', () => {
      const IAsyncConfig = createToken<Promise<IConfigInterface>>('IAsyncConfig');
      services.addSingletonFactory(IAsyncConfig, async () => new ConfigService());
      provider = services.build();

      const error = captureError(ServiceCreationError, () => provider.resolve(IAsyncConfig));
      expect(error.message).toContain('Async factories are not supported');
    });

    it('should reject a malformed static inject', () => {
      class BrokenInject {
        static inject = ['ILogger'];
      }
      services.addTransient(BrokenInject);
      provider = services.build({ validateScopes: false });

      const error = captureError(ServiceCreationError, () => provider.resolve(BrokenInject));
      expect(error.cause).toBeInstanceOf(TypeError);
    });

    it('should throw ProviderDisposedError after dispose', async () => {
      services.addSingleton(ConfigService);
      provider = services.build();

      await provider.dispose();

      expect(() => provider.resolve(ConfigService)).toThrow(ProviderDisposedError);
      expect(() => provider.createScope()).toThrow(ProviderDisposedError);
    });
  });

  // ============================================================================
  // Circular Dependency Tests
  // ============================================================================

  describe('circular dependency detection', () => {
    it('should detect direct circular dependency', () => {
      // A -> B -> A
      const IServiceA = createToken('IServiceA');
      const IServiceB = createToken('IServiceB');

      class ServiceA {
        static inject = [IServiceB] as const;
        constructor(public b: unknown) {}
      }

      class ServiceB {
        static inject = [IServiceA] as const;
        constructor(public a: unknown) {}
      }

      services.addSingleton(IServiceA, ServiceA).addSingleton(IServiceB, ServiceB);

      provider = services.build();

      expect(() => {
        provider.resolve(IServiceA);
      }).toThrow(CircularDependencyError);
    });

    it('should detect indirect circular dependency', () => {
      // A -> B -> C -> A
      const IServiceA = createToken('IServiceA');
      const IServiceB = createToken('IServiceB');
      const IServiceC = createToken('IServiceC');

      class ServiceA {
        static inject = [IServiceB] as const;
        constructor(public b: unknown) {}
      }

      class ServiceB {
        static inject = [IServiceC] as const;
        constructor(public c: unknown) {}
      }

      class ServiceC {
        static inject = [IServiceA] as const;
        constructor(public a: unknown) {}
      }

      services
        .addSingleton(IServiceA, ServiceA)
        .addSingleton(IServiceB, ServiceB)
        .addSingleton(IServiceC, ServiceC);

      provider = services.build();

      expect(() => {
        provider.resolve(IServiceA);
      }).toThrow(CircularDependencyError);
    });

    it('should include cycle path in error', () => {
      const IServiceA = createToken('IServiceA');
      const IServiceB = createToken('IServiceB');

      class ServiceA {
        static inject = [IServiceB] as const;
        constructor(public b: unknown) {}
      }

      class ServiceB {
        static inject = [IServiceA] as const;
        constructor(public a: unknown) {}
      }

      services.addSingleton(IServiceA, ServiceA).addSingleton(IServiceB, ServiceB);

      provider = services.build();

      const error = captureError(CircularDependencyError, () => provider.resolve(IServiceA));
      expect(error.cyclePath).toEqual(['Token(IServiceA)', 'Token(IServiceB)', 'Token(IServiceA)']);
    });
  });

  // ============================================================================
  // Scope Mismatch Tests
  // ============================================================================

  describe('scope mismatch validation', () => {
    it('should throw ScopeMismatchError for Singleton -> Scoped', () => {
      class SingletonService {
        static inject = [IClock] as const;
        constructor(public clock: IClockInterface) {}
      }

      services.addScoped(IClock, FixedClock).addSingleton(SingletonService);

      expect(() => {
        services.build({ validateScopes: true });
      }).toThrow(ScopeMismatchError);
    });

    it('should throw ScopeMismatchError for Singleton -> Transient', () => {
      class SingletonService {
        static inject = [IClock] as const;
        constructor(public clock: IClockInterface) {}
      }

      services.addTransient(IClock, FixedClock).addSingleton(SingletonService);

      expect(() => {
        services.build();
      }).toThrow(ScopeMismatchError);
    });

    it('should allow Scoped -> Transient', async () => {
      class ScopedService {
        static inject = [IClock] as const;
        constructor(public clock: IClockInterface) {}
      }

      services.addTransient(IClock, FixedClock).addScoped(ScopedService);
      provider = services.build({ logger: createTestLogger().logger });

      const scope = provider.createScope();
      expect(scope.resolve(ScopedService).clock).toBeInstanceOf(FixedClock);
      await scope.dispose();
    });

    it('should allow Scoped -> Singleton', async () => {
      class ScopedService {
        static inject = [ILogger] as const;
        constructor(public logger: ILoggerInterface) {}
      }

      services.addSingleton(ILogger, MemoryLogger).addScoped(ScopedService);

      // Should not throw
      provider = services.build({ validateScopes: true, logger: createTestLogger().logger });

      const scope = provider.createScope();
      const service = scope.resolve(ScopedService);
      expect(service.logger).toBeInstanceOf(MemoryLogger);
      await scope.dispose();
    });

    it('should skip validation when validateScopes is false', () => {
      class SingletonService {
        static inject = [IClock] as const;
        constructor(public clock: IClockInterface) {}
      }

      services.addScoped(IClock, FixedClock).addSingleton(SingletonService);

      // Should not throw with validation disabled
      provider = services.build({ validateScopes: false });
      expect(provider).toBeDefined();
    });

    it('should still refuse to hand a scoped instance to a singleton without validation', async () => {
      class SingletonService {
        static inject = [IClock] as const;
        constructor(public clock: IClockInterface) {}
      }

      services.addScoped(IClock, FixedClock).addSingleton(SingletonService);
      provider = services.build({ validateScopes: false, logger: createTestLogger().logger });

      const scope = provider.createScope();
      expect(() => scope.resolve(SingletonService)).toThrow(NoActiveScopeError);
      await scope.dispose();
    });
  });

  // ============================================================================
  // tryResolve Tests
  // ============================================================================

  describe('tryResolve', () => {
    it('should return undefined for unregistered service', () => {
      provider = services.build();

      const result = provider.tryResolve(ILogger);

      expect(result).toBeUndefined();
    });

    it('should return instance for registered service', () => {
      services.addSingleton(ILogger, MemoryLogger);
      provider = services.build();

      const result = provider.tryResolve(ILogger);

      expect(result).toBeInstanceOf(MemoryLogger);
    });

    it('should throw when a dependency of a registered service is missing', () => {
      services.addSingleton(GreetingService);
      provider = services.build();

      expect(() => provider.tryResolve(GreetingService)).toThrow(ServiceNotRegisteredError);
    });

    it('should return an empty array from resolveAll for unregistered service', () => {
      provider = services.build();

      expect(provider.resolveAll(ILogger)).toEqual([]);
    });
  });

  // ============================================================================
  // isRegistered Tests
  // ============================================================================

  describe('isRegistered', () => {
    it('should return true for registered service', () => {
      services.addSingleton(ILogger, MemoryLogger);
      provider = services.build();

      expect(provider.isRegistered(ILogger)).toBe(true);
    });

    it('should return false for unregistered service', () => {
      provider = services.build();

      expect(provider.isRegistered(ILogger)).toBe(false);
    });
  });

  // ============================================================================
  // Disposal Tests
  // ============================================================================

  describe('dispose', () => {
    it('should dispose singleton services', async () => {
      const IDisposable = createToken<DisposableService>('IDisposable');
      services.addSingleton(IDisposable, DisposableService);
      provider = services.build();

      const instance = provider.resolve(IDisposable);
      expect(instance.disposed).toBe(false);

      await provider.dispose();

      expect(instance.disposed).toBe(true);
    });

    it('should dispose singletons newest first', async () => {
      const order: string[] = [];
      class First {
        dispose(): void {
          order.push('first');
        }
      }
      class Second {
        dispose(): void {
          order.push('second');
        }
      }

      services.addSingleton(First).addSingleton(Second);
      provider = services.build();
      provider.resolve(First);
      provider.resolve(Second);

      await provider.dispose();

      expect(order).toEqual(['second', 'first']);
    });

    it('should be idempotent', async () => {
      let calls = 0;
      class CountingService {
        dispose(): void {
          calls++;
        }
      }

      services.addSingleton(CountingService);
      provider = services.build();
      provider.resolve(CountingService);

      await provider.dispose();
      await provider.dispose();

      expect(calls).toBe(1);
    });

    it('should dispose scoped services when scope ends', async () => {
      const IDisposable = createToken<DisposableService>('IDisposable');
      services.addScoped(IDisposable, DisposableService);
      provider = services.build({ logger: createTestLogger().logger });

      const scope = provider.createScope();
      const instance = scope.resolve(IDisposable);

      expect(instance.disposed).toBe(false);

      await scope.dispose();

      expect(instance.disposed).toBe(true);
    });
  });
});
