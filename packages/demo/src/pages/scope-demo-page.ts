/**
 * @fileoverview ScopeDemoPage - Two Scopes Side by Side
 *
 * @packageDocumentation
 * @module @scopelab/demo/pages
 * @license Apache-2.0
 *
 * The page is activated in the application scope and owns a second,
 * component-local scope. It resolves ViewService from the local scope and
 * hands ViewService the application scope for NotificationService:
 *
 * ```
 * application scope                      page scope
 * ├─ NotificationService  <─────────┐    ├─ ViewService
 * ├─ NotificationService1 (uid-a)   └────┤   setServices(application scope)
 * └─ TransientService     (uid-t1)       ├─ NotificationService1 (uid-b)
 *                                        └─ TransientService     (uid-t2)
 * ```
 *
 * Both buttons therefore update the same message, but the two
 * NotificationService1 uids never match.
 *
 * @version 1.0.0
 */

import {
  type IServiceResolver,
  type IServiceScopeFactory,
  type Logger,
  OwningComponentBase,
  LOGGER_TOKEN,
  SERVICE_PROVIDER_TOKEN,
  SERVICE_SCOPE_FACTORY_TOKEN,
} from '@scopelab/core';

import { InvalidStateError } from '../errors';
import {
  InstanceTrackerService,
  NotificationService,
  NotificationService1,
  TransientService,
  ViewService,
} from '../services';

export const UPDATE_FROM_PAGE_BUTTON = '[Update from page]';
export const UPDATE_FROM_VIEW_BUTTON = '[Update from view]';

export class ScopeDemoPage extends OwningComponentBase {
  static inject = [
    SERVICE_SCOPE_FACTORY_TOKEN,
    SERVICE_PROVIDER_TOKEN,
    NotificationService,
    NotificationService1,
    TransientService,
    InstanceTrackerService,
    LOGGER_TOKEN,
  ] as const;

  readonly notificationService: NotificationService;

  readonly notificationService1: NotificationService1;

  readonly transientService: TransientService;

  private readonly services: IServiceResolver;

  private readonly tracker: InstanceTrackerService;

  private readonly logger: Logger;

  private view: ViewService | undefined;

  private unsubscribe: (() => void) | undefined;

  constructor(
    scopeFactory: IServiceScopeFactory,
    services: IServiceResolver,
    notificationService: NotificationService,
    notificationService1: NotificationService1,
    transientService: TransientService,
    tracker: InstanceTrackerService,
    logger: Logger,
  ) {
    super(scopeFactory);
    this.services = services;
    this.notificationService = notificationService;
    this.notificationService1 = notificationService1;
    this.transientService = transientService;
    this.tracker = tracker;
    this.logger = logger;
  }

  /**
   * The ViewService resolved from this page's own scope.
   *
   * @throws InvalidStateError before the page is initialized
   */
  get viewService(): ViewService {
    if (!this.view) {
      throw new InvalidStateError('ScopeDemoPage has not been initialized');
    }
    return this.view;
  }

  protected override onInitialized(): void {
    const view = this.scopedServices.resolve(ViewService);
    view.setServices(this.services);
    this.view = view;

    this.unsubscribe = this.notificationService.updated.subscribe(this.handleUpdated);
    this.logger.debug({ viewService: view.uid }, 'ScopeDemoPage initialized');
  }

  render(): string[] {
    const view = this.viewService;
    const outer1 = this.notificationService1.uid;
    const inner1 = view.notificationService1.uid;
    const outerNotification = this.notificationService.uid;
    const viewNotification = view.notificationService.uid;

    return [
      'Scope Demo',
      `Page NotificationService1: ${outer1}`,
      `View NotificationService1: ${inner1}`,
      `NotificationService1 match: ${outer1 === inner1 ? 'yes' : 'no'}`,
      `Page NotificationService: ${outerNotification}`,
      `View NotificationService: ${viewNotification}`,
      `NotificationService match: ${outerNotification === viewNotification ? 'yes' : 'no'}`,
      `Page TransientService: ${this.transientService.uid}`,
      `View TransientService: ${view.transientService.uid}`,
      `Message: ${this.notificationService.message}`,
      `Live instances: ${this.tracker.instanceCount}`,
      UPDATE_FROM_PAGE_BUTTON,
      UPDATE_FROM_VIEW_BUTTON,
    ];
  }

  updateFromPage(): void {
    this.notificationService.notifyChanged();
  }

  updateFromView(): void {
    this.viewService.updateView();
  }

  /**
   * Unsubscribe from NotificationService, then dispose the owned scope.
   */
  override async dispose(): Promise<void> {
    this.unsubscribe?.();
    this.unsubscribe = undefined;
    await super.dispose();
  }

  private readonly handleUpdated = (): void => {
    this.stateHasChanged();
  };
}
