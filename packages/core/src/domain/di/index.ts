/**
 * @fileoverview Domain DI Module Exports
 *
 * @packageDocumentation
 * @module @scopelab/core/domain/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * This module exports DI-related interfaces, types, and error classes.
 * These are technology-agnostic contracts that the Infrastructure layer implements.
 */

// ============================================================================
// Service Identifier
// ============================================================================

export {
  type ServiceIdentifier,
  type Constructor,
  ServiceToken,
  isServiceIdentifier,
  getServiceName,
  getInjectDependencies,
  createToken,
} from './service-identifier';

// ============================================================================
// Service Lifetime
// ============================================================================

export { ServiceLifetime, canDependOn, getLifetimeName } from './service-lifetime';

// ============================================================================
// Service Descriptor
// ============================================================================

export {
  type IServiceDescriptor,
  type ServiceFactory,
  type IServiceResolver,
  createClassDescriptor,
  createFactoryDescriptor,
  createInstanceDescriptor,
  validateDescriptor,
} from './service-descriptor';

// ============================================================================
// DI Interfaces
// ============================================================================

export {
  type IDisposable,
  type IServiceCollection,
  type IServiceProvider,
  type IServiceScope,
  type IServiceScopeFactory,
  type IBuildOptions,
  isDisposable,
  SERVICE_PROVIDER_TOKEN,
  SERVICE_SCOPE_TOKEN,
  SERVICE_SCOPE_FACTORY_TOKEN,
} from './di.interface';

// ============================================================================
// DI Errors
// ============================================================================

export {
  type ResolutionPath,
  DIError,
  ServiceNotRegisteredError,
  isServiceNotRegistered,
  CircularDependencyError,
  ScopeMismatchError,
  NoActiveScopeError,
  ServiceCreationError,
  ScopeDisposedError,
  ProviderDisposedError,
  ContainerSealedError,
} from './di.errors';
