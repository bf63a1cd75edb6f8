import { describe, expect, it } from "vitest";

import { BoxConstraints, Offset, Size } from "../geometry.js";

describe("BoxConstraints", () => {
  const viewport = new Size(400, 800);

  it("should build loose and tight constraints from a size", () => {
    expect(BoxConstraints.loose(viewport).smallest).toEqual(new Size(0, 0));
    expect(BoxConstraints.loose(viewport).biggest).toEqual(viewport);
    expect(BoxConstraints.tight(viewport).smallest).toEqual(viewport);
  });

  it("should leave unspecified dimensions open in tightFor", () => {
    const constraints = BoxConstraints.tightFor({ width: 400 });
    expect(constraints.minWidth).toBe(400);
    expect(constraints.maxWidth).toBe(400);
    expect(constraints.minHeight).toBe(0);
    expect(constraints.maxHeight).toBe(Number.POSITIVE_INFINITY);
  });

  it("should enforce caller constraints into the available box", () => {
    const enforced = new BoxConstraints({ maxWidth: 640 }).enforce(BoxConstraints.loose(viewport));
    expect(enforced.equals(new BoxConstraints({ maxWidth: 400, maxHeight: 800 }))).toBe(true);
  });

  it("should tighten a height within the existing bounds", () => {
    const loose = BoxConstraints.loose(viewport);
    expect(loose.tighten({ height: 100 }).biggest).toEqual(new Size(400, 100));
    expect(loose.tighten({ height: 900 }).biggest).toEqual(new Size(400, 800));
  });

  it("should deflate the height budget from the top without going negative", () => {
    const deflated = new BoxConstraints({ minHeight: 100, maxHeight: 120 }).deflateTop(48);
    expect(deflated.minHeight).toBe(52);
    expect(deflated.maxHeight).toBe(72);

    const exhausted = new BoxConstraints({ maxHeight: 100 }).deflateTop(200);
    expect(exhausted.minHeight).toBe(0);
    expect(exhausted.maxHeight).toBe(0);
  });

  it("should constrain sizes and override single bounds with copyWith", () => {
    const constraints = BoxConstraints.tight(viewport).copyWith({ minHeight: 0 });
    expect(constraints.constrain(new Size(10, 80))).toEqual(new Size(400, 80));
    expect(constraints.constrain(new Size(10, 1000))).toEqual(new Size(400, 800));
  });
});

describe("Offset", () => {
  it("should add offsets", () => {
    expect(new Offset(1, 2).plus(new Offset(3, 4))).toEqual(new Offset(4, 6));
    expect(new Offset(1, 2).equals(new Offset(1, 2))).toBe(true);
  });
});
