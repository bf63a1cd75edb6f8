import { createRuntimeLogger } from "@docksheet/shared";
import { describe, expect, it, vi } from "vitest";

import { SheetDimensions } from "../dimensions.js";
import { BoxConstraints, Offset, Size } from "../geometry.js";
import { OverlayCompositor } from "../overlayCompositor.js";
import { RecordingPaintContext, RenderBox, RenderProxyBox } from "../renderBox.js";

const logger = createRuntimeLogger({ level: "silent" });
const viewport = BoxConstraints.tight(new Size(400, 800));

class LoggingBox extends RenderBox {
  constructor(
    label: string,
    private readonly log: string[]
  ) {
    super();
    this.debugLabel = label;
  }

  protected performLayout(constraints: BoxConstraints): Size {
    this.log.push(this.toString());
    return constraints.smallest;
  }
}

class LoggingProxy extends RenderProxyBox {
  constructor(
    label: string,
    private readonly log: string[],
    child: RenderBox
  ) {
    super(child);
    this.debugLabel = label;
  }

  protected override performLayout(constraints: BoxConstraints): Size {
    this.log.push(this.toString());
    return super.performLayout(constraints);
  }
}

/** Publishes a collapsed height the way a sheet layout does */
class CollapsedSheetStub extends RenderBox {
  collapsedHeight = 128;

  constructor(private readonly dimensions: SheetDimensions) {
    super();
  }

  protected performLayout(constraints: BoxConstraints): Size {
    this.dimensions.minHeight.value = this.collapsedHeight;
    return constraints.biggest;
  }
}

describe("OverlayCompositor", () => {
  it("should lay out overlays first and paint them last", () => {
    const log: string[] = [];
    const overlays = [new LoggingBox("overlay0", log), new LoggingBox("overlay1", log)];
    const compositor = new OverlayCompositor({
      overlayFactory: (index) => overlays[index] ?? null,
      baseFactory: (placeholder) => new LoggingProxy("base", log, placeholder),
      logger,
    });

    compositor.layout(viewport);
    const context = new RecordingPaintContext();
    compositor.paint(context, Offset.zero);

    expect(log).toEqual(["overlay0", "overlay1", "base"]);
    expect(compositor.layoutOrder.map((node) => node.toString())).toEqual([
      "overlay0",
      "overlay1",
      "base",
    ]);
    expect(context.paintedNodes.map((node) => node.toString())).toEqual([
      "base",
      "placeholder",
      "overlay1",
      "overlay0",
    ]);
  });

  it("should call the overlay factory with increasing indices until it returns null", () => {
    const overlay = new LoggingBox("overlay0", []);
    const overlayFactory = vi.fn((index: number) => (index === 0 ? overlay : null));
    const compositor = new OverlayCompositor({
      overlayFactory,
      baseFactory: (placeholder) => new RenderProxyBox(placeholder),
      logger,
    });

    expect(overlayFactory.mock.calls).toEqual([
      [0, compositor.dimensions],
      [1, compositor.dimensions],
    ]);
  });

  it("should size the placeholder from the collapsed sheet in the same pass", () => {
    const dimensions = new SheetDimensions();
    const sheet = new CollapsedSheetStub(dimensions);
    const compositor = new OverlayCompositor({
      dimensions,
      overlayFactory: (index) => (index === 0 ? sheet : null),
      baseFactory: (placeholder) => new RenderProxyBox(placeholder),
      logger,
    });

    compositor.layout(viewport);
    expect(compositor.placeholder.size).toEqual(new Size(400, 128));

    sheet.collapsedHeight = 200;
    sheet.markNeedsLayout();
    compositor.layout(viewport);

    expect(compositor.placeholder.size).toEqual(new Size(400, 200));
    expect(compositor.needsLayout).toBe(false);
  });

  it("should keep the placeholder empty until a collapsed height is published", () => {
    const compositor = new OverlayCompositor({
      overlayFactory: () => null,
      baseFactory: (placeholder) => new RenderProxyBox(placeholder),
      logger,
    });

    expect(compositor.layout(viewport)).toEqual(new Size(400, 800));
    expect(compositor.placeholder.size).toEqual(Size.zero);
  });

  it("should detach overlays that a rebuild no longer returns", () => {
    let count = 2;
    const overlays = [new LoggingBox("overlay0", []), new LoggingBox("overlay1", [])];
    const compositor = new OverlayCompositor({
      overlayFactory: (index) => (index < count ? overlays[index] ?? null : null),
      baseFactory: (placeholder) => new RenderProxyBox(placeholder),
      logger,
    });
    compositor.layout(viewport);

    count = 1;
    compositor.build();

    expect(compositor.layoutOrder).toHaveLength(2);
    expect(overlays[1]?.parent).toBeNull();
    expect(overlays[0]?.parent).toBe(compositor);
    expect(compositor.needsLayout).toBe(true);
  });

  it("should keep the placeholder following the dimensions after a dropped base is disposed", () => {
    const bases: RenderProxyBox[] = [];
    const compositor = new OverlayCompositor({
      overlayFactory: () => null,
      baseFactory: (placeholder) => {
        const base = new RenderProxyBox(placeholder);
        bases.push(base);
        return base;
      },
      logger,
    });
    compositor.dimensions.minHeight.value = 100;
    compositor.layout(viewport);
    expect(compositor.placeholder.size).toEqual(new Size(400, 100));

    compositor.build();
    bases[0]?.dispose();
    compositor.dimensions.minHeight.value = 250;
    compositor.layout(viewport);

    expect(bases).toHaveLength(2);
    expect(compositor.placeholder.parent).toBe(bases[1]);
    expect(compositor.placeholder.size).toEqual(new Size(400, 250));
  });

  it("should relayout when the shared dimensions change", () => {
    const compositor = new OverlayCompositor({
      overlayFactory: () => null,
      baseFactory: (placeholder) => new RenderProxyBox(placeholder),
      logger,
    });
    compositor.layout(viewport);

    compositor.dimensions.maxHeight.value = 600;

    expect(compositor.needsLayout).toBe(true);
  });

  it("should stop listening to the dimensions on dispose", () => {
    const compositor = new OverlayCompositor({
      overlayFactory: () => null,
      baseFactory: (placeholder) => new RenderProxyBox(placeholder),
      logger,
    });

    compositor.dispose();

    expect(compositor.dimensions.hasListeners).toBe(false);
  });
});
