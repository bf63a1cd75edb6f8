import { Reference } from "@docksheet/shared";
import { describe, expect, it, vi } from "vitest";

import { SheetDimensions } from "../dimensions.js";
import { BoxConstraints, Size } from "../geometry.js";
import { RenderLayoutObserver } from "../layoutObserver.js";
import { RenderMeasureHeight } from "../measureHeight.js";
import { RenderSizedBox } from "../renderBox.js";

describe("SheetDimensions", () => {
  it("should notify once per changed cell", () => {
    const dimensions = new SheetDimensions();
    const listener = vi.fn();
    dimensions.addListener(listener);

    dimensions.minHeight.value = 128;
    dimensions.minHeight.value = 128;
    dimensions.contentHeight.value = 300;

    expect(listener).toHaveBeenCalledTimes(2);
    expect(dimensions.snapshot()).toEqual({
      dragHandleHeight: null,
      minHeight: 128,
      maxHeight: null,
      contentHeight: 300,
    });
  });

  it("should stop notifying removed listeners", () => {
    const dimensions = new SheetDimensions();
    const listener = vi.fn();
    dimensions.addListener(listener);
    dimensions.removeListener(listener);

    dimensions.maxHeight.value = 800;

    expect(listener).not.toHaveBeenCalled();
    expect(dimensions.hasListeners).toBe(false);
  });
});

describe("RenderMeasureHeight", () => {
  const constraints = new BoxConstraints({ minHeight: 10, maxHeight: 500, maxWidth: 300 });

  it("should publish the child's height and height constraints", () => {
    const height = new Reference<number | null>(null);
    const minHeight = new Reference<number | null>(null);
    const maxHeight = new Reference<number | null>(null);
    const measure = new RenderMeasureHeight(new RenderSizedBox({ height: 120 }), {
      height,
      minHeight,
      maxHeight,
    });

    expect(measure.layout(constraints)).toEqual(new Size(300, 120));
    expect(height.value).toBe(120);
    expect(minHeight.value).toBe(10);
    expect(maxHeight.value).toBe(500);
  });

  it("should carry the old value into a swapped-in cell", () => {
    const measure = new RenderMeasureHeight(new RenderSizedBox({ height: 120 }), {
      height: new Reference<number | null>(null),
    });
    measure.layout(constraints);

    const next = new Reference<number | null>(null);
    measure.height = next;

    expect(next.value).toBe(120);
  });
});

describe("RenderLayoutObserver", () => {
  const constraints = BoxConstraints.loose(new Size(300, 500));

  it("should report height changes only when the height differs", () => {
    const child = new RenderSizedBox({ height: 120 });
    const onHeightChanged = vi.fn();
    const onLayoutMarkedDirty = vi.fn();
    const observer = new RenderLayoutObserver(child, { onHeightChanged, onLayoutMarkedDirty });

    observer.layout(constraints);
    observer.markNeedsLayout();
    observer.layout(constraints);

    expect(onHeightChanged).toHaveBeenCalledTimes(1);
    expect(onHeightChanged).toHaveBeenCalledWith(120);
    expect(onLayoutMarkedDirty).toHaveBeenCalledTimes(1);
  });

  it("should hear about dirty marks coming from its child", () => {
    const child = new RenderSizedBox({ height: 120 });
    const onHeightChanged = vi.fn();
    const onLayoutMarkedDirty = vi.fn();
    const observer = new RenderLayoutObserver(child, { onHeightChanged, onLayoutMarkedDirty });
    observer.layout(constraints);

    child.height = 200;
    observer.layout(constraints);

    expect(onLayoutMarkedDirty).toHaveBeenCalledTimes(1);
    expect(onHeightChanged).toHaveBeenLastCalledWith(200);
  });
});
