/**
 * @fileoverview Service Registry - Identifier-Keyed Storage
 *
 * @packageDocumentation
 * @module @scopelab/core/infrastructure/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Descriptors and instances are keyed by the identifier object itself, so two
 * classes that share a name never collide.
 *
 * @version 1.0.0
 */

import type { IServiceDescriptor, ServiceIdentifier } from '../../domain/di';

/**
 * Registered descriptors, one per identifier, in registration order.
 *
 * @internal
 */
export class DescriptorRegistry {
  private readonly descriptors = new Map<ServiceIdentifier, IServiceDescriptor>();

  constructor(descriptors: Iterable<IServiceDescriptor> = []) {
    for (const descriptor of descriptors) {
      this.set(descriptor);
    }
  }

  /**
   * Store a descriptor, replacing any earlier one for the same identifier.
   */
  set<T>(descriptor: IServiceDescriptor<T>): void {
    this.descriptors.set(descriptor.serviceIdentifier, descriptor);
  }

  get<T>(identifier: ServiceIdentifier<T>): IServiceDescriptor<T> | undefined {
    // Entries are stored under their own serviceIdentifier.
    return this.descriptors.get(identifier) as IServiceDescriptor<T> | undefined;
  }

  has(identifier: ServiceIdentifier): boolean {
    return this.descriptors.has(identifier);
  }

  delete(identifier: ServiceIdentifier): boolean {
    return this.descriptors.delete(identifier);
  }

  clear(): void {
    this.descriptors.clear();
  }

  values(): IServiceDescriptor[] {
    return Array.from(this.descriptors.values());
  }
}

/**
 * Result of a cache lookup. Wrapping the instance keeps a cached `undefined`
 * distinguishable from a miss.
 */
export interface CacheHit<T> {
  readonly instance: T;
}

/**
 * Instances keyed by service identifier.
 *
 * @internal
 */
export class InstanceCache {
  private readonly instances = new Map<ServiceIdentifier, unknown>();

  lookup<T>(identifier: ServiceIdentifier<T>): CacheHit<T> | undefined {
    if (!this.instances.has(identifier)) {
      return undefined;
    }
    // Entries are only written through set(), which ties the instance to its identifier's type.
    return { instance: this.instances.get(identifier) as T };
  }

  set<T>(identifier: ServiceIdentifier<T>, instance: T): void {
    this.instances.set(identifier, instance);
  }

  has(identifier: ServiceIdentifier): boolean {
    return this.instances.has(identifier);
  }

  /**
   * Cached instances in insertion order.
   */
  values(): unknown[] {
    return Array.from(this.instances.values());
  }

  clear(): void {
    this.instances.clear();
  }
}
