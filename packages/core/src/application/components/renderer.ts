/**
 * @fileoverview Renderer - Mounts Components Into a Scope
 *
 * @packageDocumentation
 * @module @scopelab/core/application/components
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 *
 * The renderer is bound to the scope components are activated in. For a page
 * that is the application scope; an OwningComponentBase then creates its own
 * scope beside it.
 *
 * @version 1.0.0
 */

import type { Logger } from 'pino';

import { type Constructor, type IServiceProvider, isDisposable } from '../../domain/di';

import type { ComponentBase } from './component-base';

/**
 * Anything that can construct a class with its `static inject` dependencies:
 * the root provider or a scope.
 */
export type ComponentActivator = Pick<IServiceProvider, 'activate'>;

/**
 * A component attached to a renderer.
 */
export interface MountedComponent<TComponent extends ComponentBase> {
  readonly component: TComponent;

  /**
   * Latest frame.
   */
  readonly output: readonly string[];

  /**
   * Every frame produced, oldest first.
   */
  readonly frames: readonly (readonly string[])[];

  readonly renderCount: number;

  /**
   * Stop rendering and dispose the component if it is disposable.
   * Only the first call has an effect.
   */
  unmount(): Promise<void>;
}

export interface RendererOptions {
  logger?: Logger;
}

/**
 * Renderer - Activates components and collects their frames.
 *
 * @example
 * ```typescript
 * const renderer = new Renderer(appScope, { logger });
 * const page = await renderer.mount(ScopeDemoPage);
 *
 * page.component.updateFromPage();
 * console.log(page.output.join('\n'));
 *
 * await page.unmount();
 * ```
 */
export class Renderer {
  private readonly activator: ComponentActivator;

  private readonly logger: Logger | undefined;

  constructor(activator: ComponentActivator, options: RendererOptions = {}) {
    this.activator = activator;
    this.logger = options.logger;
  }

  /**
   * Activate, initialize and render a component.
   *
   * @remarks
   * When initialization or the first render throws, the component is
   * disposed (if disposable) before the error is rethrown.
   */
  async mount<TComponent extends ComponentBase>(
    componentType: Constructor<TComponent>,
  ): Promise<MountedComponent<TComponent>> {
    const component = this.activator.activate(componentType);
    const componentName = componentType.name;
    const frames: string[][] = [];
    let mounted = true;

    const renderFrame = (): void => {
      if (!mounted) {
        return;
      }
      frames.push(component.renderFrame());
      this.logger?.debug(
        { component: componentName, renderCount: component.renderCount },
        'Component rendered',
      );
    };

    try {
      component.attach({ render: renderFrame });
      component.initialize();
      renderFrame();
    } catch (error) {
      mounted = false;
      this.logger?.error({ component: componentName, err: error }, 'Component failed to mount');
      if (isDisposable(component)) {
        await component.dispose();
      }
      throw error;
    }

    return {
      component,
      frames,
      get output(): readonly string[] {
        return frames[frames.length - 1] ?? [];
      },
      get renderCount(): number {
        return component.renderCount;
      },
      unmount: async (): Promise<void> => {
        if (!mounted) {
          return;
        }
        mounted = false;
        if (isDisposable(component)) {
          await component.dispose();
        }
        this.logger?.debug({ component: componentName }, 'Component unmounted');
      },
    };
  }
}
