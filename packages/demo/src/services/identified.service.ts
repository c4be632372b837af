/**
 * @fileoverview IdentifiedService - Base Class for Traceable Services
 *
 * @packageDocumentation
 * @module @scopelab/demo/services
 * @license Apache-2.0
 *
 * Every demo service carries a uid generated at construction, so the page
 * can show which instance each scope handed out.
 *
 * @version 1.0.0
 */

import { v4 as uuidv4 } from 'uuid';
import {
  type IDisposable,
  type Logger,
  type ServiceIdentifier,
  LOGGER_TOKEN,
} from '@scopelab/core';

import { InstanceTrackerService } from './instance-tracker.service';

/**
 * IdentifiedService - A disposable service with an immutable uid.
 *
 * @remarks
 * Construction and the first `dispose()` each write one `info` record:
 *
 * ```
 * { service: 'TransientService', uid: '…', event: 'created', msg: 'TransientService - created instance: …' }
 * { service: 'TransientService', uid: '…', event: 'disposed', msg: 'TransientService - disposed instance: …' }
 * ```
 *
 * Subclasses inherit `static inject`; a subclass with more dependencies
 * redeclares it with these two first.
 */
export abstract class IdentifiedService implements IDisposable {
  static readonly inject: readonly ServiceIdentifier[] = [LOGGER_TOKEN, InstanceTrackerService];

  readonly uid: string = uuidv4();

  protected readonly logger: Logger;

  private readonly tracker: InstanceTrackerService;

  private isDisposed = false;

  constructor(logger: Logger, tracker: InstanceTrackerService) {
    this.logger = logger;
    this.tracker = tracker;

    tracker.addInstance(this.uid, this.serviceName);
    logger.info(
      { service: this.serviceName, uid: this.uid, event: 'created' },
      `${this.serviceName} - created instance: ${this.uid}`,
    );
  }

  get serviceName(): string {
    return this.constructor.name;
  }

  get disposed(): boolean {
    return this.isDisposed;
  }

  dispose(): void {
    if (this.isDisposed) {
      return;
    }

    this.isDisposed = true;
    this.tracker.removeInstance(this.uid);
    this.logger.info(
      { service: this.serviceName, uid: this.uid, event: 'disposed' },
      `${this.serviceName} - disposed instance: ${this.uid}`,
    );
  }
}
