/**
 * @fileoverview NotificationService - Shared Message With Change Signal
 *
 * @packageDocumentation
 * @module @scopelab/demo/services
 * @license Apache-2.0
 *
 * @version 1.0.0
 */

import { Signal } from '@scopelab/core';

import { IdentifiedService } from './identified.service';

/**
 * NotificationService - Holds the latest message and announces changes.
 *
 * @example
 * ```typescript
 * const unsubscribe = notifications.updated.subscribe(() => page.stateHasChanged());
 * notifications.notifyChanged(); // message: 'Updated at 14:03:27'
 * unsubscribe();
 * ```
 */
export class NotificationService extends IdentifiedService {
  readonly updated = new Signal<[sender: NotificationService]>();

  private currentMessage = '';

  get message(): string {
    return this.currentMessage;
  }

  /**
   * Stamp the message with the current UTC time and notify every subscriber.
   * A subscriber that throws stops the dispatch and the error reaches the caller.
   */
  notifyChanged(): void {
    this.currentMessage = `Updated at ${new Date().toISOString().slice(11, 19)}`;
    this.logger.debug(
      { service: this.serviceName, uid: this.uid, subscribers: this.updated.subscriberCount },
      this.currentMessage,
    );
    this.updated.emit(this);
  }
}
