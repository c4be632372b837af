/**
 * @fileoverview TransientService
 *
 * @module @scopelab/demo/services
 * @license Apache-2.0
 */

import { IdentifiedService } from './identified.service';

/**
 * Registered as Transient: every resolution produces a new uid.
 */
export class TransientService extends IdentifiedService {}
