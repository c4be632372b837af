/**
 * @fileoverview OwningComponentBase - Component With Its Own Scope
 *
 * @packageDocumentation
 * @module @scopelab/core/application/components
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 *
 * @version 1.0.0
 */

import {
  type IDisposable,
  type IServiceScope,
  type IServiceScopeFactory,
  ScopeDisposedError,
} from '../../domain/di';

import { ComponentBase } from './component-base';

/**
 * OwningComponentBase - A component that owns a DI scope.
 *
 * @remarks
 * The scope is created from the injected factory on first access to
 * `scopedServices` and disposed with the component. Services resolved from
 * it are separate from the instances of the scope the component was
 * activated in:
 *
 * ```
 * outer scope:     NotificationService1 (uid-a)  <- constructor injection
 * scopedServices:  NotificationService1 (uid-b)  <- this.scopedServices.resolve(...)
 * ```
 *
 * Subclasses that override `dispose()` must call `super.dispose()`, or the
 * owned scope and everything it tracks is never disposed.
 *
 * @example
 * ```typescript
 * class ViewPage extends OwningComponentBase {
 *   static inject = [SERVICE_SCOPE_FACTORY_TOKEN] as const;
 *
 *   private view: ViewService | undefined;
 *
 *   protected override onInitialized(): void {
 *     this.view = this.scopedServices.resolve(ViewService);
 *   }
 *
 *   render(): string[] {
 *     return [`View: ${this.view?.uid ?? '-'}`];
 *   }
 * }
 * ```
 */
export abstract class OwningComponentBase extends ComponentBase implements IDisposable {
  private readonly scopeFactory: IServiceScopeFactory;

  private scope: IServiceScope | undefined;

  private disposed = false;

  constructor(scopeFactory: IServiceScopeFactory) {
    super();
    this.scopeFactory = scopeFactory;
  }

  /**
   * The component-local scope.
   *
   * @throws ScopeDisposedError after the component has been disposed
   */
  protected get scopedServices(): IServiceScope {
    if (this.disposed) {
      throw new ScopeDisposedError(this.scope?.id);
    }

    this.scope ??= this.scopeFactory.createScope();
    return this.scope;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * Dispose the component-local scope. Only the first call has an effect.
   */
  async dispose(): Promise<void> {
    if (this.disposed) {
      return;
    }

    this.disposed = true;
    await this.scope?.dispose();
  }
}
