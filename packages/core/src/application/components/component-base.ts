/**
 * @fileoverview ComponentBase - Headless Render Component
 *
 * @packageDocumentation
 * @module @scopelab/core/application/components
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 *
 * A component produces its output as text lines. It does not render itself:
 * the Renderer attaches a handle, and `stateHasChanged()` asks that handle for
 * a new frame.
 *
 * ## Lifecycle
 *
 * ```
 * Renderer.mount(Component)
 *   1. activate   -> constructor receives `static inject` dependencies
 *   2. attach     -> render handle stored
 *   3. initialize -> onInitialized() runs once
 *   4. render     -> first frame
 *   ...
 *   stateHasChanged() -> another frame
 *   ...
 * MountedComponent.unmount() -> dispose() when the component is disposable
 * ```
 *
 * @version 1.0.0
 */

/**
 * Handle through which a component requests a re-render.
 */
export interface IRenderHandle {
  render(): void;
}

/**
 * ComponentBase - Base class for headless components.
 *
 * @example
 * ```typescript
 * class CounterComponent extends ComponentBase {
 *   private count = 0;
 *
 *   increment(): void {
 *     this.count++;
 *     this.stateHasChanged();
 *   }
 *
 *   render(): string[] {
 *     return [`Count: ${this.count}`, '[Increment]'];
 *   }
 * }
 * ```
 */
export abstract class ComponentBase {
  private renderHandle: IRenderHandle | undefined;

  private initialized = false;

  private renders = 0;

  /**
   * Number of frames produced so far.
   */
  get renderCount(): number {
    return this.renders;
  }

  /**
   * Produce the current output.
   */
  abstract render(): string[];

  /**
   * Called once, after the render handle is attached and before the first frame.
   */
  protected onInitialized(): void {}

  /**
   * Request a new frame. Ignored until the component is attached.
   */
  protected stateHasChanged(): void {
    this.renderHandle?.render();
  }

  /**
   * @internal
   */
  attach(handle: IRenderHandle): void {
    if (this.renderHandle) {
      throw new Error(`${this.constructor.name} is already attached to a renderer`);
    }
    this.renderHandle = handle;
  }

  /**
   * Run `onInitialized()` the first time only.
   * @internal
   */
  initialize(): void {
    if (this.initialized) {
      return;
    }
    this.initialized = true;
    this.onInitialized();
  }

  /**
   * Render and count the frame.
   * @internal
   */
  renderFrame(): string[] {
    const output = this.render();
    this.renders++;
    return output;
  }
}
