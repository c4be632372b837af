/**
 * @fileoverview ViewService - Aggregate Resolved From a Component Scope
 *
 * @packageDocumentation
 * @module @scopelab/demo/services
 * @license Apache-2.0
 *
 * ViewService collects services from two places:
 *
 * ```
 * constructor injection (the scope that resolves ViewService)
 *   ├─ NotificationService1
 *   └─ TransientService
 * setServices(resolver) (whatever resolver the caller hands over)
 *   └─ NotificationService
 * ```
 *
 * Resolved from a page's own scope, the first two are NOT the instances the
 * page sees, while the third is, provided the page passes its outer resolver.
 *
 * @version 1.0.0
 */

import { type IServiceResolver, type Logger, LOGGER_TOKEN } from '@scopelab/core';

import { InvalidStateError } from '../errors';

import { IdentifiedService } from './identified.service';
import { InstanceTrackerService } from './instance-tracker.service';
import { NotificationService } from './notification.service';
import { NotificationService1 } from './notification-variants.service';
import { TransientService } from './transient.service';

export class ViewService extends IdentifiedService {
  static override readonly inject = [
    LOGGER_TOKEN,
    InstanceTrackerService,
    NotificationService1,
    TransientService,
  ] as const;

  readonly notificationService1: NotificationService1;

  readonly transientService: TransientService;

  private outerNotificationService: NotificationService | undefined;

  constructor(
    logger: Logger,
    tracker: InstanceTrackerService,
    notificationService1: NotificationService1,
    transientService: TransientService,
  ) {
    super(logger, tracker);
    this.notificationService1 = notificationService1;
    this.transientService = transientService;

    logger.debug(
      { service: this.serviceName, dependency: 'NotificationService1', uid: notificationService1.uid },
      `${this.serviceName} - NotificationService1 instance: ${notificationService1.uid}`,
    );
    logger.debug(
      { service: this.serviceName, dependency: 'TransientService', uid: transientService.uid },
      `${this.serviceName} - TransientService instance: ${transientService.uid}`,
    );
  }

  /**
   * Resolve the services that must come from the caller's scope. Calling it
   * again replaces the earlier reference.
   */
  setServices(resolver: IServiceResolver): void {
    const notificationService = resolver.resolve(NotificationService);
    this.outerNotificationService = notificationService;

    this.logger.debug(
      { service: this.serviceName, dependency: 'NotificationService', uid: notificationService.uid },
      `${this.serviceName} - NotificationService instance: ${notificationService.uid}`,
    );
  }

  get hasServices(): boolean {
    return this.outerNotificationService !== undefined;
  }

  /**
   * @throws InvalidStateError before setServices has been called
   */
  get notificationService(): NotificationService {
    if (!this.outerNotificationService) {
      throw new InvalidStateError(
        'ViewService.setServices must be called before accessing notificationService',
      );
    }
    return this.outerNotificationService;
  }

  updateView(): void {
    this.notificationService.notifyChanged();
  }
}
