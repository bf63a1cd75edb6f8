import type { Size } from "./geometry";
import { RenderProxyBox, type RenderBox } from "./renderBox";

export type LayoutObserverCallbacks = {
  onHeightChanged?: ((height: number) => void) | null;
  onLayoutMarkedDirty?: (() => void) | null;
};

/**
 * Proxy that reports when its child's height changes and when its layout is
 * marked dirty.
 */
export class RenderLayoutObserver extends RenderProxyBox {
  onHeightChanged: ((height: number) => void) | null;
  onLayoutMarkedDirty: (() => void) | null;
  private lastHeight: number | null = null;

  constructor(child: RenderBox | null, callbacks: LayoutObserverCallbacks = {}) {
    super(child);
    this.onHeightChanged = callbacks.onHeightChanged ?? null;
    this.onLayoutMarkedDirty = callbacks.onLayoutMarkedDirty ?? null;
  }

  protected override setSize(size: Size): void {
    super.setSize(size);
    if (size.height !== this.lastHeight) {
      this.lastHeight = size.height;
      this.onHeightChanged?.(size.height);
    }
  }

  override markNeedsLayout(): void {
    super.markNeedsLayout();
    this.onLayoutMarkedDirty?.();
  }
}
