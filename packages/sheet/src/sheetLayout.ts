/**
 * Sheet Layout
 *
 * Lays out the five slots of a persistent sheet in dependency order:
 *
 *   navigation bar -> drag handle -> content -> scrim -> child
 *
 * Later steps consume heights measured by earlier ones, so the order is fixed.
 * Paint order is child, scrim, content, drag handle, navigation bar.
 */

import type { Animation } from "@docksheet/motion";
import { getLogger, type RuntimeLogger } from "@docksheet/shared";

import { SHEET_DEFAULTS } from "./config";
import type { SheetDimensions } from "./dimensions";
import { BoxConstraints, Offset, Size } from "./geometry";
import { RenderBox, type PaintContext } from "./renderBox";
import type { SheetLayoutVariant } from "./types";

// ============================================================================
// Pure geometry
// ============================================================================

export type ScrimOptions = {
  dominatesFraction?: number;
  maxOpacity?: number;
};

/**
 * Scrim opacity for an animation value: zero until the sheet passes
 * `dominatesFraction`, then a linear ramp to `maxOpacity` at 1.
 */
export function scrimOpacity(t: number, options: ScrimOptions = {}): number {
  const dominates = options.dominatesFraction ?? SHEET_DEFAULTS.scrimDominatesFraction;
  const maxOpacity = options.maxOpacity ?? SHEET_DEFAULTS.scrimMaxOpacity;
  if (t <= dominates) {
    return 0;
  }
  return ((t - dominates) / (1 - dominates)) * maxOpacity;
}

export type SheetExtentInput = {
  variant: SheetLayoutVariant;
  /** Curved animation value */
  t: number;
  /** Height of the whole layout box */
  boxHeight: number;
  navigationBarHeight: number;
  dragHandleHeight: number;
  /** Measured content height (companion variant only) */
  contentHeight: number;
  /** Min height of the sheet constraints (standalone variant only) */
  minHeightConstraint: number;
  /** Max height of the sheet constraints (standalone variant only) */
  maxHeight: number;
  minContentHeight: number;
};

export type SheetExtent = {
  /** Travel between collapsed and fully open, never negative */
  dragExtent: number;
  /** Height the sheet occupies (handle and navigation bar included) when collapsed */
  collapsedExtent: number;
  /** Height from the top of the drag handle to the bottom of the box */
  sheetHeight: number;
  /** Y of the content's top edge */
  contentTop: number;
};

/**
 * Both variants follow one law: the collapsed sheet sits at its minimum
 * extent and the open sheet adds the full drag extent, scaled by `t`.
 */
export function resolveSheetExtent(input: SheetExtentInput): SheetExtent {
  const { t, boxHeight, navigationBarHeight: navH, dragHandleHeight: handleH } = input;

  if (input.variant === "companion") {
    const dragExtent = Math.max(0, input.contentHeight - navH);
    const contentTop = boxHeight - navH - dragExtent * t;
    return {
      dragExtent,
      collapsedExtent: handleH + navH,
      sheetHeight: boxHeight - contentTop + handleH,
      contentTop,
    };
  }

  const minExtent = Math.max(input.minHeightConstraint, handleH + input.minContentHeight);
  const dragExtent = Number.isFinite(input.maxHeight)
    ? Math.max(0, input.maxHeight - minExtent)
    : 0;
  const sheetHeight = minExtent + dragExtent * t;
  return {
    dragExtent,
    collapsedExtent: minExtent,
    sheetHeight,
    contentTop: boxHeight - sheetHeight + handleH,
  };
}

// ============================================================================
// Metrics
// ============================================================================

/** Everything one layout pass computed */
export type SheetMetrics = {
  variant: SheetLayoutVariant;
  animationValue: number;
  size: Size;
  navigationBarHeight: number;
  navigationBarVisibleHeight: number;
  dragHandleHeight: number;
  minContentHeight: number;
  measuredContentHeight: number;
  dragExtent: number;
  collapsedExtent: number;
  sheetHeight: number;
  contentOffset: Offset;
  dragHandleOffset: Offset | null;
  scrimOpacity: number;
};

// ============================================================================
// Nodes
// ============================================================================

/** Full-box backdrop painted between the child and the sheet */
export class RenderScrim extends RenderBox {
  opacity = 0;

  constructor() {
    super();
    this.debugLabel = "scrim";
  }

  /** The scrim lets pointers through while it is invisible */
  get ignoresPointer(): boolean {
    return this.opacity === 0;
  }

  protected performLayout(constraints: BoxConstraints): Size {
    return constraints.biggest;
  }

  override paint(context: PaintContext, offset: Offset): void {
    if (this.opacity > 0) {
      context.drawScrim(offset, this.size, this.opacity);
    }
  }
}

export type RenderSheetLayoutOptions = {
  /** Curved sheet animation */
  animation: Animation;
  content: RenderBox;
  child?: RenderBox | null;
  dragHandle?: RenderBox | null;
  navigationBar?: RenderBox | null;
  /** Caller constraints for the sheet, enforced into the box */
  sheetConstraints?: BoxConstraints | null;
  minContentHeight?: number;
  /** Defaults to `companion` with a navigation bar, `standalone` without */
  variant?: SheetLayoutVariant;
  /** Cells to publish measurements into */
  dimensions?: SheetDimensions | null;
  scrim?: ScrimOptions;
  logger?: RuntimeLogger;
};

export class RenderSheetLayout extends RenderBox {
  private currentAnimation: Animation;
  private contentNode: RenderBox;
  private childNode: RenderBox | null = null;
  private dragHandleNode: RenderBox | null = null;
  private navigationBarNode: RenderBox | null = null;
  private readonly scrimNode = new RenderScrim();
  private callerConstraints: BoxConstraints | null;
  private currentMinContentHeight: number;
  private explicitVariant: SheetLayoutVariant | undefined;
  private readonly scrimOptions: ScrimOptions;
  private readonly logger: RuntimeLogger;
  private metrics: SheetMetrics | null = null;
  dimensions: SheetDimensions | null;

  constructor(options: RenderSheetLayoutOptions) {
    super();
    this.debugLabel = "sheet";
    this.currentAnimation = options.animation;
    this.callerConstraints = options.sheetConstraints ?? null;
    this.currentMinContentHeight = options.minContentHeight ?? 0;
    this.explicitVariant = options.variant;
    this.dimensions = options.dimensions ?? null;
    this.scrimOptions = options.scrim ?? {};
    this.logger = options.logger ?? getLogger("sheet-layout");

    this.contentNode = options.content;
    this.adoptChild(this.contentNode);
    this.adoptChild(this.scrimNode);
    this.child = options.child ?? null;
    this.dragHandle = options.dragHandle ?? null;
    this.navigationBar = options.navigationBar ?? null;

    this.currentAnimation.addListener(this.handleAnimationTick);
  }

  // ============================================================================
  // Inputs
  // ============================================================================

  get animation(): Animation {
    return this.currentAnimation;
  }

  set animation(value: Animation) {
    if (value === this.currentAnimation) {
      return;
    }
    this.currentAnimation.removeListener(this.handleAnimationTick);
    this.currentAnimation = value;
    value.addListener(this.handleAnimationTick);
    this.handleAnimationTick();
  }

  get content(): RenderBox {
    return this.contentNode;
  }

  set content(node: RenderBox) {
    if (node === this.contentNode) {
      return;
    }
    this.dropChild(this.contentNode);
    this.contentNode = node;
    this.adoptChild(node);
  }

  get child(): RenderBox | null {
    return this.childNode;
  }

  set child(node: RenderBox | null) {
    this.childNode = this.replaceSlot(this.childNode, node);
  }

  get dragHandle(): RenderBox | null {
    return this.dragHandleNode;
  }

  set dragHandle(node: RenderBox | null) {
    this.dragHandleNode = this.replaceSlot(this.dragHandleNode, node);
  }

  get navigationBar(): RenderBox | null {
    return this.navigationBarNode;
  }

  set navigationBar(node: RenderBox | null) {
    this.navigationBarNode = this.replaceSlot(this.navigationBarNode, node);
  }

  get sheetConstraints(): BoxConstraints | null {
    return this.callerConstraints;
  }

  set sheetConstraints(value: BoxConstraints | null) {
    const previous = this.callerConstraints;
    if (value === previous || (value && previous && value.equals(previous))) {
      return;
    }
    this.callerConstraints = value;
    this.markNeedsLayout();
  }

  get minContentHeight(): number {
    return this.currentMinContentHeight;
  }

  set minContentHeight(value: number) {
    if (value === this.currentMinContentHeight) {
      return;
    }
    this.currentMinContentHeight = value;
    this.markNeedsLayout();
  }

  get variant(): SheetLayoutVariant {
    return this.explicitVariant ?? (this.navigationBarNode ? "companion" : "standalone");
  }

  set variant(value: SheetLayoutVariant | undefined) {
    if (value === this.explicitVariant) {
      return;
    }
    this.explicitVariant = value;
    this.markNeedsLayout();
  }

  // ============================================================================
  // Outputs
  // ============================================================================

  /** Metrics of the most recent pass */
  get lastMetrics(): SheetMetrics | null {
    return this.metrics;
  }

  /** Drag extent of the most recent pass (0 before the first) */
  get dragExtent(): number {
    return this.metrics?.dragExtent ?? 0;
  }

  /** Scrim opacity for the animation's current value */
  get scrimOpacity(): number {
    return scrimOpacity(this.currentAnimation.value, this.scrimOptions);
  }

  get scrimIgnoresPointer(): boolean {
    return this.scrimOpacity === 0;
  }

  // ============================================================================
  // Layout
  // ============================================================================

  protected performLayout(constraints: BoxConstraints): Size {
    const size = constraints.biggest;
    const t = this.currentAnimation.value;
    const variant = this.variant;

    // 1. Navigation bar: full width, any height, sliding out as t grows.
    let navH = 0;
    let navVisible = 0;
    if (this.navigationBarNode) {
      navH = this.navigationBarNode.layout(
        BoxConstraints.tight(size).copyWith({ minHeight: 0 })
      ).height;
      navVisible = navH * (1 - t);
      this.navigationBarNode.offset = new Offset(0, size.height - navVisible);
    }

    // 2. Sheet constraints.
    const box = BoxConstraints.loose(size);
    const outerConstraints = this.callerConstraints ? this.callerConstraints.enforce(box) : box;
    let sheetConstraints = outerConstraints;

    // 3. Drag handle, capped above the visible navigation bar.
    let handleSize = Size.zero;
    if (this.dragHandleNode) {
      handleSize = this.dragHandleNode.layout(
        sheetConstraints.copyWith({
          minHeight: 0,
          maxHeight: Math.max(0, sheetConstraints.maxHeight - navVisible),
        })
      );
      sheetConstraints = sheetConstraints.deflateTop(handleSize.height);
    }
    const handleH = handleSize.height;

    // 4-6. Content and extent.
    let contentSize: Size;
    let extent: SheetExtent;
    if (variant === "companion") {
      contentSize = this.contentNode.layout(sheetConstraints);
      extent = resolveSheetExtent({
        variant,
        t,
        boxHeight: size.height,
        navigationBarHeight: navH,
        dragHandleHeight: handleH,
        contentHeight: contentSize.height,
        minHeightConstraint: 0,
        maxHeight: 0,
        minContentHeight: this.currentMinContentHeight,
      });
    } else {
      extent = resolveSheetExtent({
        variant,
        t,
        boxHeight: size.height,
        navigationBarHeight: navH,
        dragHandleHeight: handleH,
        contentHeight: 0,
        minHeightConstraint: outerConstraints.minHeight,
        maxHeight: outerConstraints.maxHeight,
        minContentHeight: this.currentMinContentHeight,
      });
      contentSize = this.contentNode.layout(
        sheetConstraints.tighten({ height: Math.max(0, extent.sheetHeight - handleH) })
      );
    }

    const contentOffset = new Offset((size.width - contentSize.width) / 2, extent.contentTop);
    this.contentNode.offset = contentOffset;

    // 7. Drag handle directly above the content.
    let dragHandleOffset: Offset | null = null;
    if (this.dragHandleNode) {
      dragHandleOffset = new Offset((size.width - handleSize.width) / 2, contentOffset.dy - handleH);
      this.dragHandleNode.offset = dragHandleOffset;
    }

    if (this.dimensions) {
      this.dimensions.dragHandleHeight.value = handleH;
      this.dimensions.minHeight.value = extent.collapsedExtent;
      this.dimensions.maxHeight.value = outerConstraints.maxHeight;
      this.dimensions.contentHeight.value = contentSize.height;
    }

    // 8. Scrim.
    const opacity = scrimOpacity(t, this.scrimOptions);
    this.scrimNode.opacity = opacity;
    this.scrimNode.layout(BoxConstraints.tight(size));
    this.scrimNode.offset = Offset.zero;

    // 9. Base child, above the collapsed sheet.
    if (this.childNode) {
      this.childNode.layout(
        BoxConstraints.tightFor({
          width: size.width,
          height: Math.max(0, size.height - extent.collapsedExtent),
        })
      );
      this.childNode.offset = Offset.zero;
    }

    this.metrics = {
      variant,
      animationValue: t,
      size,
      navigationBarHeight: navH,
      navigationBarVisibleHeight: navVisible,
      dragHandleHeight: handleH,
      minContentHeight: this.currentMinContentHeight,
      measuredContentHeight: contentSize.height,
      dragExtent: extent.dragExtent,
      collapsedExtent: extent.collapsedExtent,
      sheetHeight: extent.sheetHeight,
      contentOffset,
      dragHandleOffset,
      scrimOpacity: opacity,
    };
    this.logger.debug("layout", {
      variant,
      t,
      dragExtent: extent.dragExtent,
      contentTop: extent.contentTop,
    });
    return size;
  }

  override paint(context: PaintContext, offset: Offset): void {
    for (const node of this.paintOrder()) {
      context.paintChild(node, offset.plus(node.offset));
    }
  }

  /** Children in paint order */
  paintOrder(): RenderBox[] {
    const nodes: RenderBox[] = [];
    if (this.childNode) {
      nodes.push(this.childNode);
    }
    nodes.push(this.scrimNode, this.contentNode);
    if (this.dragHandleNode) {
      nodes.push(this.dragHandleNode);
    }
    if (this.navigationBarNode) {
      nodes.push(this.navigationBarNode);
    }
    return nodes;
  }

  override visitChildren(visitor: (child: RenderBox) => void): void {
    for (const node of this.paintOrder()) {
      visitor(node);
    }
  }

  override dispose(): void {
    this.currentAnimation.removeListener(this.handleAnimationTick);
    super.dispose();
  }

  private readonly handleAnimationTick = (): void => {
    if (this.metrics && this.metrics.animationValue === this.currentAnimation.value) {
      return;
    }
    this.markNeedsLayout();
  };

  private replaceSlot(previous: RenderBox | null, next: RenderBox | null): RenderBox | null {
    if (previous === next) {
      return previous;
    }
    if (previous) {
      this.dropChild(previous);
    }
    if (next) {
      this.adoptChild(next);
    }
    return next;
  }
}
