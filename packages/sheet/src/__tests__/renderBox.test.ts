import { ManualFrameScheduler } from "@docksheet/motion";
import { createRuntimeLogger } from "@docksheet/shared";
import { describe, expect, it } from "vitest";

import { BoxConstraints, Offset, Size } from "../geometry.js";
import {
  PipelineOwner,
  RecordingPaintContext,
  RenderBox,
  RenderProxyBox,
  RenderSizedBox,
} from "../renderBox.js";

const logger = createRuntimeLogger({ level: "silent" });
const viewport = BoxConstraints.tight(new Size(400, 800));

class CountingBox extends RenderBox {
  layouts = 0;

  constructor(private readonly preferred: Size) {
    super();
  }

  protected performLayout(): Size {
    this.layouts++;
    return this.preferred;
  }
}

describe("RenderBox", () => {
  it("should reuse the cached size for equal constraints", () => {
    const box = new CountingBox(new Size(10, 20));
    const constraints = BoxConstraints.loose(new Size(100, 100));

    box.layout(constraints);
    box.layout(new BoxConstraints({ maxWidth: 100, maxHeight: 100 }));

    expect(box.layouts).toBe(1);
    expect(box.size).toEqual(new Size(10, 20));
  });

  it("should lay out again when constraints change or it is marked dirty", () => {
    const box = new CountingBox(new Size(10, 20));

    box.layout(BoxConstraints.loose(new Size(100, 100)));
    box.layout(BoxConstraints.loose(new Size(50, 50)));
    box.markNeedsLayout();
    box.layout(BoxConstraints.loose(new Size(50, 50)));

    expect(box.layouts).toBe(3);
  });

  it("should constrain the size a node reports", () => {
    const box = new CountingBox(new Size(500, 20));
    expect(box.layout(BoxConstraints.loose(new Size(100, 100)))).toEqual(new Size(100, 20));
  });

  it("should propagate dirty marks to the parent", () => {
    const child = new CountingBox(new Size(10, 20));
    const parent = new RenderProxyBox(child);
    parent.layout(viewport);
    expect(parent.needsLayout).toBe(false);

    child.markNeedsLayout();

    expect(parent.needsLayout).toBe(true);
  });
});

describe("RenderSizedBox", () => {
  it("should fill a bounded max width and take the min height when unspecified", () => {
    const box = new RenderSizedBox();
    expect(box.layout(new BoxConstraints({ maxWidth: 300, minHeight: 12 }))).toEqual(
      new Size(300, 12)
    );
  });

  it("should relayout when its height changes", () => {
    const box = new RenderSizedBox({ height: 50 });
    box.layout(BoxConstraints.loose(new Size(100, 100)));

    box.height = 70;

    expect(box.needsLayout).toBe(true);
    expect(box.layout(BoxConstraints.loose(new Size(100, 100)))).toEqual(new Size(100, 70));
  });
});

describe("RenderProxyBox", () => {
  it("should take the smallest size without a child", () => {
    expect(new RenderProxyBox().layout(BoxConstraints.loose(new Size(100, 100)))).toEqual(
      Size.zero
    );
  });
});

describe("PipelineOwner", () => {
  it("should coalesce dirty marks into one frame", () => {
    const scheduler = new ManualFrameScheduler();
    const child = new CountingBox(new Size(10, 20));
    const owner = new PipelineOwner({ scheduler, constraints: viewport, logger });
    owner.root = new RenderProxyBox(child);

    scheduler.pump();
    expect(owner.frameCount).toBe(1);
    expect(child.layouts).toBe(1);

    child.markNeedsLayout();
    child.markNeedsLayout();
    expect(owner.hasScheduledFrame).toBe(true);

    scheduler.pumpUntilIdle();
    expect(owner.frameCount).toBe(2);
    expect(child.layouts).toBe(2);
  });

  it("should paint the root through the paint context", () => {
    const scheduler = new ManualFrameScheduler();
    const leaf = new RenderSizedBox({ height: 20, debugLabel: "leaf" });
    const root = new RenderProxyBox(leaf);
    const owner = new PipelineOwner({
      scheduler,
      constraints: viewport,
      createPaintContext: () => new RecordingPaintContext(),
      logger,
    });
    owner.root = root;

    const context = owner.drawFrame();

    if (!(context instanceof RecordingPaintContext)) {
      throw new Error("expected a recording paint context");
    }
    expect(context.paintedNodes).toEqual([root, leaf]);
    expect(scheduler.hasPendingFrames).toBe(false);
  });

  it("should request a frame when the root constraints change", () => {
    const scheduler = new ManualFrameScheduler();
    const owner = new PipelineOwner({ scheduler, constraints: viewport, logger });
    owner.root = new RenderSizedBox();
    scheduler.pump();

    owner.constraints = BoxConstraints.tight(new Size(300, 600));

    expect(owner.hasScheduledFrame).toBe(true);
    scheduler.pump();
    expect(owner.root?.size).toEqual(new Size(300, 600));
  });

  it("should cancel the pending frame on dispose", () => {
    const scheduler = new ManualFrameScheduler();
    const owner = new PipelineOwner({ scheduler, constraints: viewport, logger });
    owner.root = new RenderSizedBox();

    owner.dispose();

    expect(scheduler.hasPendingFrames).toBe(false);
    expect(owner.root).toBeNull();
  });
});

describe("RecordingPaintContext", () => {
  it("should record paint operations in order", () => {
    const context = new RecordingPaintContext();
    context.drawScrim(Offset.zero, new Size(10, 10), 0.2);
    context.drawHandleBar(new Offset(1, 2), new Size(32, 4), new Set(["hovered", "dragged"]));

    expect(context.ops).toEqual([
      { type: "scrim", offset: Offset.zero, size: new Size(10, 10), opacity: 0.2 },
      { type: "handleBar", offset: new Offset(1, 2), size: new Size(32, 4), states: ["dragged", "hovered"] },
    ]);
  });
});
