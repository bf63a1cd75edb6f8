/**
 * Sheet Dimensions
 *
 * Reference cells through which a sheet publishes its measurements to
 * dependent layouts (a compositor placeholder, a floating button, ...)
 * within the same layout pass.
 */

import { Reference } from "@docksheet/shared";

export type DimensionsListener = () => void;

export class SheetDimensions {
  private readonly listeners = new Set<DimensionsListener>();
  private readonly notify = (): void => {
    for (const listener of [...this.listeners]) {
      listener();
    }
  };

  /** Measured height of the drag handle */
  readonly dragHandleHeight = new Reference<number | null>(null, this.notify);
  /** Extent of the sheet when collapsed */
  readonly minHeight = new Reference<number | null>(null, this.notify);
  /** Max-height constraint the expanded sheet is laid out with */
  readonly maxHeight = new Reference<number | null>(null, this.notify);
  /** Measured height of the sheet's content */
  readonly contentHeight = new Reference<number | null>(null, this.notify);

  /** Called after any cell changes value */
  addListener(listener: DimensionsListener): void {
    this.listeners.add(listener);
  }

  removeListener(listener: DimensionsListener): void {
    this.listeners.delete(listener);
  }

  get hasListeners(): boolean {
    return this.listeners.size > 0;
  }

  snapshot(): {
    dragHandleHeight: number | null;
    minHeight: number | null;
    maxHeight: number | null;
    contentHeight: number | null;
  } {
    return {
      dragHandleHeight: this.dragHandleHeight.value,
      minHeight: this.minHeight.value,
      maxHeight: this.maxHeight.value,
      contentHeight: this.contentHeight.value,
    };
  }
}
