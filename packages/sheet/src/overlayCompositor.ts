/**
 * Overlay Compositor
 *
 * Stacks any number of overlay layers (typically a persistent sheet) above a
 * single base layer. Layers are laid out in ascending order with the base
 * last, and painted in the exact reverse order with the base first.
 *
 * Measuring overlays first lets the base depend on their measurements in the
 * same pass: the base receives a placeholder node as tall as the collapsed
 * sheet, read from the shared `SheetDimensions` cells.
 */

import { getLogger, type RuntimeLogger } from "@docksheet/shared";

import { SheetDimensions } from "./dimensions";
import { BoxConstraints, Offset, type Size } from "./geometry";
import { RenderBox, type PaintContext } from "./renderBox";

/** Called with 0, 1, 2, ... until it returns null */
export type OverlayFactory = (index: number, dimensions: SheetDimensions) => RenderBox | null;

/** Builds the base layer around the collapsed-sheet placeholder */
export type BaseFactory = (placeholder: RenderBox) => RenderBox;

/**
 * Transparent node as tall as `dimensions.minHeight`, or as small as its
 * constraints allow while that cell is unset.
 */
export class RenderSheetPlaceholder extends RenderBox {
  private lastHeight: number | null = null;

  constructor(readonly dimensions: SheetDimensions) {
    super();
    this.debugLabel = "placeholder";
    dimensions.addListener(this.handleDimensionsChanged);
  }

  protected performLayout(constraints: BoxConstraints): Size {
    const height = this.dimensions.minHeight.value;
    this.lastHeight = height;
    return height !== null ? constraints.tighten({ height }).biggest : constraints.smallest;
  }

  override dispose(): void {
    this.dimensions.removeListener(this.handleDimensionsChanged);
    super.dispose();
  }

  private readonly handleDimensionsChanged = (): void => {
    if (this.dimensions.minHeight.value !== this.lastHeight) {
      this.markNeedsLayout();
    }
  };
}

export type OverlayCompositorOptions = {
  overlayFactory: OverlayFactory;
  baseFactory: BaseFactory;
  dimensions?: SheetDimensions;
  logger?: RuntimeLogger;
};

export class OverlayCompositor extends RenderBox {
  readonly dimensions: SheetDimensions;
  readonly placeholder: RenderSheetPlaceholder;

  private readonly overlayFactory: OverlayFactory;
  private readonly baseFactory: BaseFactory;
  private readonly logger: RuntimeLogger;
  private layers: RenderBox[] = [];

  constructor(options: OverlayCompositorOptions) {
    super();
    this.debugLabel = "compositor";
    this.overlayFactory = options.overlayFactory;
    this.baseFactory = options.baseFactory;
    this.dimensions = options.dimensions ?? new SheetDimensions();
    this.logger = options.logger ?? getLogger("overlay-compositor");
    this.placeholder = new RenderSheetPlaceholder(this.dimensions);
    this.dimensions.addListener(this.handleDimensionsChanged);
    this.build();
  }

  /**
   * Regenerate the layer list from the factories.
   * Layers from the previous build that are not returned again are detached;
   * disposing them is up to whoever created them. The placeholder moves to the
   * new base, so disposing a dropped base leaves it in place.
   */
  build(): void {
    const next: RenderBox[] = [];
    for (let index = 0; ; index++) {
      const overlay = this.overlayFactory(index, this.dimensions);
      if (overlay === null) {
        break;
      }
      next.push(overlay);
    }
    next.push(this.baseFactory(this.placeholder));

    for (const previous of this.layers) {
      if (!next.includes(previous)) {
        this.dropChild(previous);
      }
    }
    for (const layer of next) {
      if (!this.layers.includes(layer)) {
        this.adoptChild(layer);
      }
    }
    this.layers = next;
    this.markNeedsLayout();
    this.logger.debug("build", { overlays: next.length - 1 });
  }

  /** Overlays in ascending index, then the base */
  get layoutOrder(): RenderBox[] {
    return [...this.layers];
  }

  /** The base, then overlays in descending index */
  get paintOrder(): RenderBox[] {
    return [...this.layers].reverse();
  }

  protected performLayout(constraints: BoxConstraints): Size {
    const size = constraints.biggest;
    const layerConstraints = BoxConstraints.loose(size);
    for (const layer of this.layoutOrder) {
      layer.layout(layerConstraints);
      layer.offset = Offset.zero;
    }
    return size;
  }

  override paint(context: PaintContext, offset: Offset): void {
    for (const layer of this.paintOrder) {
      context.paintChild(layer, offset.plus(layer.offset));
    }
  }

  override visitChildren(visitor: (child: RenderBox) => void): void {
    for (const layer of this.layers) {
      visitor(layer);
    }
  }

  override dispose(): void {
    this.dimensions.removeListener(this.handleDimensionsChanged);
    this.placeholder.dispose();
    super.dispose();
  }

  private readonly handleDimensionsChanged = (): void => {
    this.markNeedsLayout();
  };
}
