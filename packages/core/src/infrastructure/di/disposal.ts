/**
 * @fileoverview Disposal - Ordered Cleanup of Owned Instances
 *
 * @packageDocumentation
 * @module @scopelab/core/infrastructure/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * @version 1.0.0
 */

import type { Logger } from 'pino';

import { isDisposable } from '../../domain/di';

/**
 * Dispose every disposable instance, in the order given.
 *
 * @remarks
 * A failing `dispose()` is logged and does not stop the remaining instances
 * from being disposed.
 *
 * @returns Number of instances whose `dispose()` completed
 */
export async function disposeInstances(
  instances: readonly unknown[],
  logger: Logger,
): Promise<number> {
  let disposed = 0;

  for (const instance of instances) {
    if (!isDisposable(instance)) {
      continue;
    }

    try {
      await instance.dispose();
      disposed++;
    } catch (error) {
      logger.error(
        { err: error, service: instance.constructor.name },
        'Error disposing service instance',
      );
    }
  }

  return disposed;
}
