import type { Reference } from "@docksheet/shared";

import type { BoxConstraints, Size } from "./geometry";
import { RenderProxyBox, type RenderBox } from "./renderBox";

type HeightCell = Reference<number | null>;

export type MeasureHeightCells = {
  /** Receives the child's laid-out height */
  height?: HeightCell | null;
  /** Receives the min height constraint the child was given */
  minHeight?: HeightCell | null;
  /** Receives the max height constraint the child was given */
  maxHeight?: HeightCell | null;
};

/**
 * Proxy that writes its child's height and height constraints into reference
 * cells on every layout, so a node laid out later in the same pass can read
 * them.
 *
 * Swapping in a new cell copies the old cell's value into it.
 */
export class RenderMeasureHeight extends RenderProxyBox {
  private heightCell: HeightCell | null;
  private minHeightCell: HeightCell | null;
  private maxHeightCell: HeightCell | null;

  constructor(child: RenderBox | null, cells: MeasureHeightCells = {}) {
    super(child);
    this.heightCell = cells.height ?? null;
    this.minHeightCell = cells.minHeight ?? null;
    this.maxHeightCell = cells.maxHeight ?? null;
  }

  get height(): HeightCell | null {
    return this.heightCell;
  }

  set height(cell: HeightCell | null) {
    this.heightCell = carryOver(this.heightCell, cell);
  }

  get minHeight(): HeightCell | null {
    return this.minHeightCell;
  }

  set minHeight(cell: HeightCell | null) {
    this.minHeightCell = carryOver(this.minHeightCell, cell);
  }

  get maxHeight(): HeightCell | null {
    return this.maxHeightCell;
  }

  set maxHeight(cell: HeightCell | null) {
    this.maxHeightCell = carryOver(this.maxHeightCell, cell);
  }

  override layout(constraints: BoxConstraints): Size {
    const size = super.layout(constraints);
    if (this.minHeightCell) {
      this.minHeightCell.value = constraints.minHeight;
    }
    if (this.maxHeightCell) {
      this.maxHeightCell.value = constraints.maxHeight;
    }
    return size;
  }

  protected override setSize(size: Size): void {
    super.setSize(size);
    if (this.heightCell) {
      this.heightCell.value = size.height;
    }
  }
}

function carryOver(previous: HeightCell | null, next: HeightCell | null): HeightCell | null {
  if (previous && next && previous !== next) {
    next.value = previous.value;
  }
  return next;
}
