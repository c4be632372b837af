/**
 * @fileoverview InstanceTrackerService - Live Instance Registry
 *
 * @packageDocumentation
 * @module @scopelab/demo/services
 * @license Apache-2.0
 *
 * @version 1.0.0
 */

/**
 * A live service instance.
 */
export interface TrackedInstance {
  readonly uid: string;
  readonly name: string;
}

/**
 * Singleton registry of every identified service that has been created and
 * not yet disposed.
 */
export class InstanceTrackerService {
  private readonly instances = new Map<string, string>();

  /**
   * Record an instance. A uid that is already present keeps its first name.
   */
  addInstance(uid: string, name: string): void {
    if (!this.instances.has(uid)) {
      this.instances.set(uid, name);
    }
  }

  /**
   * @returns True if the uid was tracked
   */
  removeInstance(uid: string): boolean {
    return this.instances.delete(uid);
  }

  has(uid: string): boolean {
    return this.instances.has(uid);
  }

  get instanceCount(): number {
    return this.instances.size;
  }

  /**
   * Number of live instances of one service.
   */
  countOf(name: string): number {
    let count = 0;
    for (const instanceName of this.instances.values()) {
      if (instanceName === name) {
        count++;
      }
    }
    return count;
  }

  /**
   * Live instances in creation order.
   */
  getInstances(): TrackedInstance[] {
    return Array.from(this.instances, ([uid, name]) => ({ uid, name }));
  }
}
