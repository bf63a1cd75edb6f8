/**
 * Render Nodes
 *
 * The minimum box-layout plumbing the sheet and the compositor need:
 * constraints go down, sizes come up, parents position children, and a
 * pipeline owner coalesces dirty marks into one layout + paint per frame.
 */

import type { FrameScheduler } from "@docksheet/motion";
import { getLogger, type RuntimeLogger } from "@docksheet/shared";

import { BoxConstraints, Offset, Size } from "./geometry";
import type { DragHandleInteraction } from "./types";

// ============================================================================
// Painting
// ============================================================================

/** Drawing surface handed down the tree during a paint pass */
export interface PaintContext {
  /** Paint `child` with its origin at `offset` */
  paintChild(child: RenderBox, offset: Offset): void;
  drawScrim(offset: Offset, size: Size, opacity: number): void;
  drawHandleBar(offset: Offset, size: Size, states: ReadonlySet<DragHandleInteraction>): void;
}

export type PaintOp =
  | { type: "child"; node: RenderBox; offset: Offset }
  | { type: "scrim"; offset: Offset; size: Size; opacity: number }
  | { type: "handleBar"; offset: Offset; size: Size; states: DragHandleInteraction[] };

/**
 * Paint context that records every operation in order.
 */
export class RecordingPaintContext implements PaintContext {
  readonly ops: PaintOp[] = [];

  paintChild(child: RenderBox, offset: Offset): void {
    this.ops.push({ type: "child", node: child, offset });
    child.paint(this, offset);
  }

  drawScrim(offset: Offset, size: Size, opacity: number): void {
    this.ops.push({ type: "scrim", offset, size, opacity });
  }

  drawHandleBar(offset: Offset, size: Size, states: ReadonlySet<DragHandleInteraction>): void {
    this.ops.push({ type: "handleBar", offset, size, states: [...states].sort() });
  }

  /** Nodes passed to `paintChild`, in paint order */
  get paintedNodes(): RenderBox[] {
    const nodes: RenderBox[] = [];
    for (const op of this.ops) {
      if (op.type === "child") {
        nodes.push(op.node);
      }
    }
    return nodes;
  }
}

// ============================================================================
// RenderBox
// ============================================================================

export abstract class RenderBox {
  debugLabel: string | undefined;
  parent: RenderBox | null = null;
  /** Position within the parent, assigned by the parent during its layout */
  offset: Offset = Offset.zero;

  private owner: PipelineOwner | null = null;
  private currentSize: Size | null = null;
  private lastConstraints: BoxConstraints | null = null;
  private dirty = true;

  get size(): Size {
    return this.currentSize ?? Size.zero;
  }

  get hasSize(): boolean {
    return this.currentSize !== null;
  }

  /** Constraints of the most recent layout */
  get constraints(): BoxConstraints | null {
    return this.lastConstraints;
  }

  get needsLayout(): boolean {
    return this.dirty;
  }

  /**
   * Lay this node out and return its size.
   * A clean node given equal constraints returns its cached size.
   */
  layout(constraints: BoxConstraints): Size {
    if (
      !this.dirty &&
      this.currentSize !== null &&
      this.lastConstraints !== null &&
      this.lastConstraints.equals(constraints)
    ) {
      return this.currentSize;
    }
    this.lastConstraints = constraints;
    const size = constraints.constrain(this.performLayout(constraints));
    this.dirty = false;
    this.setSize(size);
    return size;
  }

  /** Compute this node's size, laying out and positioning children */
  protected abstract performLayout(constraints: BoxConstraints): Size;

  protected setSize(size: Size): void {
    this.currentSize = size;
  }

  /** Paint this node with its origin at `offset`; the default paints children */
  paint(context: PaintContext, offset: Offset): void {
    this.visitChildren((child) => {
      context.paintChild(child, offset.plus(child.offset));
    });
  }

  /**
   * Mark this node dirty and propagate to the root, which asks its owner for a
   * frame. Marking an already dirty node stops the walk.
   */
  markNeedsLayout(): void {
    if (this.dirty) {
      return;
    }
    this.dirty = true;
    if (this.parent) {
      this.parent.markNeedsLayout();
    } else {
      this.owner?.requestVisualUpdate();
    }
  }

  /** Request a repaint without a layout */
  markNeedsPaint(): void {
    let node: RenderBox = this;
    while (node.parent) {
      node = node.parent;
    }
    node.owner?.requestVisualUpdate();
  }

  visitChildren(_visitor: (child: RenderBox) => void): void {}

  /**
   * Release listeners. The default disposes the children this node still
   * parents; a child adopted elsewhere since belongs to its new parent.
   */
  dispose(): void {
    this.visitChildren((child) => {
      if (child.parent === this) {
        child.dispose();
      }
    });
  }

  protected adoptChild(child: RenderBox): void {
    child.parent = this;
    this.markNeedsLayout();
  }

  protected dropChild(child: RenderBox): void {
    if (child.parent === this) {
      child.parent = null;
    }
    this.markNeedsLayout();
  }

  /** @internal */
  attachOwner(owner: PipelineOwner | null): void {
    this.owner = owner;
  }

  toString(): string {
    return this.debugLabel ?? this.constructor.name;
  }
}

/**
 * Leaf with an optional fixed width and height.
 * A missing width fills a bounded max width; a missing height takes the min.
 */
export class RenderSizedBox extends RenderBox {
  private fixedWidth: number | undefined;
  private fixedHeight: number | undefined;

  constructor(options: { width?: number; height?: number; debugLabel?: string } = {}) {
    super();
    this.fixedWidth = options.width;
    this.fixedHeight = options.height;
    this.debugLabel = options.debugLabel;
  }

  get width(): number | undefined {
    return this.fixedWidth;
  }

  set width(value: number | undefined) {
    if (value === this.fixedWidth) {
      return;
    }
    this.fixedWidth = value;
    this.markNeedsLayout();
  }

  get height(): number | undefined {
    return this.fixedHeight;
  }

  set height(value: number | undefined) {
    if (value === this.fixedHeight) {
      return;
    }
    this.fixedHeight = value;
    this.markNeedsLayout();
  }

  protected performLayout(constraints: BoxConstraints): Size {
    const width =
      this.fixedWidth ??
      (Number.isFinite(constraints.maxWidth) ? constraints.maxWidth : constraints.minWidth);
    const height = this.fixedHeight ?? constraints.minHeight;
    return new Size(width, height);
  }
}

/** Node with a single optional child that takes its child's size */
export class RenderProxyBox extends RenderBox {
  private currentChild: RenderBox | null = null;

  constructor(child: RenderBox | null = null) {
    super();
    this.child = child;
  }

  get child(): RenderBox | null {
    return this.currentChild;
  }

  set child(value: RenderBox | null) {
    if (value === this.currentChild) {
      return;
    }
    if (this.currentChild) {
      this.dropChild(this.currentChild);
    }
    this.currentChild = value;
    if (value) {
      this.adoptChild(value);
    }
  }

  protected performLayout(constraints: BoxConstraints): Size {
    if (!this.currentChild) {
      return constraints.smallest;
    }
    this.currentChild.offset = Offset.zero;
    return this.currentChild.layout(constraints);
  }

  override visitChildren(visitor: (child: RenderBox) => void): void {
    if (this.currentChild) {
      visitor(this.currentChild);
    }
  }
}

// ============================================================================
// PipelineOwner
// ============================================================================

export type PipelineOwnerOptions = {
  scheduler: FrameScheduler;
  /** Constraints for the root, usually tight to the viewport */
  constraints: BoxConstraints;
  /** Context for the paint pass; no paint pass runs without one */
  createPaintContext?: () => PaintContext;
  logger?: RuntimeLogger;
};

/**
 * Owns the root node and turns dirty marks into at most one frame request;
 * each frame lays out then paints the root.
 */
export class PipelineOwner {
  private readonly scheduler: FrameScheduler;
  private readonly createPaintContext: (() => PaintContext) | undefined;
  private readonly logger: RuntimeLogger;
  private rootNode: RenderBox | null = null;
  private rootConstraints: BoxConstraints;
  private frameId: number | null = null;
  private frames = 0;

  constructor(options: PipelineOwnerOptions) {
    this.scheduler = options.scheduler;
    this.rootConstraints = options.constraints;
    this.createPaintContext = options.createPaintContext;
    this.logger = options.logger ?? getLogger("pipeline");
  }

  get root(): RenderBox | null {
    return this.rootNode;
  }

  set root(node: RenderBox | null) {
    if (node === this.rootNode) {
      return;
    }
    this.rootNode?.attachOwner(null);
    this.rootNode = node;
    node?.attachOwner(this);
    this.requestVisualUpdate();
  }

  get constraints(): BoxConstraints {
    return this.rootConstraints;
  }

  set constraints(value: BoxConstraints) {
    if (value.equals(this.rootConstraints)) {
      return;
    }
    this.rootConstraints = value;
    this.requestVisualUpdate();
  }

  /** Frames drawn so far */
  get frameCount(): number {
    return this.frames;
  }

  get hasScheduledFrame(): boolean {
    return this.frameId !== null;
  }

  requestVisualUpdate(): void {
    if (this.frameId !== null || this.rootNode === null) {
      return;
    }
    this.frameId = this.scheduler.requestFrame(() => {
      this.frameId = null;
      this.drawFrame();
    });
  }

  /** Lay out and paint now, cancelling any scheduled frame */
  drawFrame(): PaintContext | null {
    if (this.frameId !== null) {
      this.scheduler.cancelFrame(this.frameId);
      this.frameId = null;
    }
    const root = this.rootNode;
    if (!root) {
      return null;
    }
    this.frames++;
    root.layout(this.rootConstraints);
    this.logger.trace("frame", { frame: this.frames, size: root.size.toString() });
    if (!this.createPaintContext) {
      return null;
    }
    const context = this.createPaintContext();
    context.paintChild(root, Offset.zero);
    return context;
  }

  dispose(): void {
    if (this.frameId !== null) {
      this.scheduler.cancelFrame(this.frameId);
      this.frameId = null;
    }
    this.root = null;
  }
}
