/**
 * @fileoverview Signal - Synchronous Observer List
 *
 * @packageDocumentation
 * @module @scopelab/core/domain/events
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * A publisher owns a `Signal` and emits on it; observers subscribe and keep
 * the returned function to unsubscribe.
 *
 * ```typescript
 * class NotificationService {
 *   readonly updated = new Signal<[sender: NotificationService]>();
 *
 *   notifyChanged(): void {
 *     this.updated.emit(this);
 *   }
 * }
 *
 * const unsubscribe = notifications.updated.subscribe(() => page.stateHasChanged());
 * // ...
 * unsubscribe();
 * ```
 *
 * @version 1.0.0
 */

/**
 * Handler invoked on every emission.
 */
export type SignalHandler<TArgs extends unknown[] = []> = (...args: TArgs) => void;

/**
 * Signal - Explicit list of subscribers with synchronous dispatch.
 *
 * @remarks
 * - Dispatch runs over a snapshot of the subscribers taken when `emit` starts.
 * - A handler subscribed twice runs twice; `unsubscribe` removes one registration.
 * - An exception thrown by a handler stops the dispatch and propagates to the emitter.
 */
export class Signal<TArgs extends unknown[] = []> {
  private readonly handlers: SignalHandler<TArgs>[] = [];

  /**
   * Register a handler.
   *
   * @returns Function that removes this registration
   */
  subscribe(handler: SignalHandler<TArgs>): () => void {
    this.handlers.push(handler);

    let subscribed = true;
    return () => {
      if (subscribed) {
        subscribed = false;
        this.unsubscribe(handler);
      }
    };
  }

  /**
   * Remove the most recent registration of a handler.
   *
   * @returns True if a registration was removed
   */
  unsubscribe(handler: SignalHandler<TArgs>): boolean {
    const index = this.handlers.lastIndexOf(handler);
    if (index === -1) {
      return false;
    }

    this.handlers.splice(index, 1);
    return true;
  }

  /**
   * Invoke every registered handler with the given arguments.
   */
  emit(...args: TArgs): void {
    for (const handler of [...this.handlers]) {
      handler(...args);
    }
  }

  get subscriberCount(): number {
    return this.handlers.length;
  }

  clear(): void {
    this.handlers.length = 0;
  }
}
