/**
 * @fileoverview NotificationService1 / NotificationService2
 *
 * @module @scopelab/demo/services
 * @license Apache-2.0
 */

import { IdentifiedService } from './identified.service';

/**
 * Scoped service injected into both the page and ViewService. Their uids
 * differ whenever the two were resolved from different scopes.
 */
export class NotificationService1 extends IdentifiedService {}

/**
 * Scoped service that nothing injects; resolve it to see a third scoped
 * instance appear in the tracker.
 */
export class NotificationService2 extends IdentifiedService {}
