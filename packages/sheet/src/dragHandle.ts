import type { DragHandleState } from "./dragController";
import { Offset, Size, type BoxConstraints } from "./geometry";
import { RenderBox, type PaintContext } from "./renderBox";

/** Material 3 drag handle bar */
export const DEFAULT_DRAG_HANDLE_SIZE = new Size(32, 4);

/** Smallest edge of a touch target */
export const MIN_INTERACTIVE_DIMENSION = 48;

export type RenderDragHandleOptions = {
  /** Size of the painted bar */
  barSize?: Size;
  state: DragHandleState;
  /** Invoked by `activate()`, e.g. from an accessibility tap */
  onActivate?: () => void;
};

/**
 * Default drag handle: a full-width strip with a bar centered in a touch
 * target of at least 48x48.
 */
export class RenderDragHandle extends RenderBox {
  readonly barSize: Size;
  readonly state: DragHandleState;
  private readonly onActivate: (() => void) | undefined;

  constructor(options: RenderDragHandleOptions) {
    super();
    this.debugLabel = "dragHandle";
    this.barSize = options.barSize ?? DEFAULT_DRAG_HANDLE_SIZE;
    this.state = options.state;
    this.onActivate = options.onActivate;
    this.state.addListener(this.handleStateChanged);
  }

  /** Touch target around the bar */
  get hitSize(): Size {
    return new Size(
      Math.max(this.barSize.width, MIN_INTERACTIVE_DIMENSION),
      Math.max(this.barSize.height, MIN_INTERACTIVE_DIMENSION)
    );
  }

  activate(): void {
    this.onActivate?.();
  }

  protected performLayout(constraints: BoxConstraints): Size {
    const hit = this.hitSize;
    const width = Number.isFinite(constraints.maxWidth) ? constraints.maxWidth : hit.width;
    return new Size(width, hit.height);
  }

  override paint(context: PaintContext, offset: Offset): void {
    const barOffset = offset.plus(
      new Offset(
        (this.size.width - this.barSize.width) / 2,
        (this.size.height - this.barSize.height) / 2
      )
    );
    context.drawHandleBar(barOffset, this.barSize, this.state.value);
  }

  override dispose(): void {
    this.state.removeListener(this.handleStateChanged);
    super.dispose();
  }

  private readonly handleStateChanged = (): void => {
    this.markNeedsPaint();
  };
}
