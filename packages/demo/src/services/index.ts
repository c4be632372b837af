/**
 * @fileoverview Demo Services Exports
 *
 * @module @scopelab/demo/services
 * @license Apache-2.0
 */

export { InstanceTrackerService, type TrackedInstance } from './instance-tracker.service';
export { IdentifiedService } from './identified.service';
export { TransientService } from './transient.service';
export { NotificationService1, NotificationService2 } from './notification-variants.service';
export { NotificationService } from './notification.service';
export { ViewService } from './view.service';
