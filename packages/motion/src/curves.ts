/**
 * Easing Curves
 *
 * Pure mappings of normalized progress to normalized output. Every curve maps
 * 0 to 0 and 1 to 1; monotonicity in between is not part of the contract.
 */

import { cubicBezier } from "framer-motion/dom";

import type { BezierTuple } from "./types";

/** A curve mapping progress in [0, 1] to output */
export interface Curve {
  transform(t: number): number;
}

/**
 * Base class pinning the endpoints; subclasses only handle the open interval.
 */
export abstract class ParametricCurve implements Curve {
  transform(t: number): number {
    if (t === 0 || t === 1) {
      return t;
    }
    return this.transformInternal(t);
  }

  protected abstract transformInternal(t: number): number;
}

class LinearCurve extends ParametricCurve {
  protected transformInternal(t: number): number {
    return t;
  }

  toString(): string {
    return "linear";
  }
}

/**
 * Cubic Bézier through (0, 0), (a, b), (c, d) and (1, 1).
 */
export class Cubic extends ParametricCurve {
  private readonly easing: (t: number) => number;

  constructor(
    readonly a: number,
    readonly b: number,
    readonly c: number,
    readonly d: number
  ) {
    super();
    this.easing = cubicBezier(a, b, c, d);
  }

  static fromBezier([x1, y1, x2, y2]: BezierTuple): Cubic {
    return new Cubic(x1, y1, x2, y2);
  }

  protected transformInternal(t: number): number {
    return this.easing(t);
  }

  toString(): string {
    return `cubic(${this.a}, ${this.b}, ${this.c}, ${this.d})`;
  }
}

/** 2D control point */
export type Point = { readonly x: number; readonly y: number };

/**
 * Two cubic Béziers joined at `midpoint`, each scaled into its half of the
 * unit square.
 */
export class ThreePointCubic extends ParametricCurve {
  constructor(
    readonly a1: Point,
    readonly b1: Point,
    readonly midpoint: Point,
    readonly a2: Point,
    readonly b2: Point
  ) {
    super();
  }

  protected transformInternal(t: number): number {
    const firstCurve = t < this.midpoint.x;
    const scaleX = firstCurve ? this.midpoint.x : 1 - this.midpoint.x;
    const scaleY = firstCurve ? this.midpoint.y : 1 - this.midpoint.y;
    const scaledT = (t - (firstCurve ? 0 : this.midpoint.x)) / scaleX;
    if (firstCurve) {
      return (
        new Cubic(
          this.a1.x / scaleX,
          this.a1.y / scaleY,
          this.b1.x / scaleX,
          this.b1.y / scaleY
        ).transform(scaledT) * scaleY
      );
    }
    return (
      new Cubic(
        (this.a2.x - this.midpoint.x) / scaleX,
        (this.a2.y - this.midpoint.y) / scaleY,
        (this.b2.x - this.midpoint.x) / scaleX,
        (this.b2.y - this.midpoint.y) / scaleY
      ).transform(scaledT) *
        scaleY +
      this.midpoint.y
    );
  }
}

/**
 * Curve that is `beginCurve` on [0, split] and `endCurve` on [split, 1], each
 * rescaled into its own segment so that `transform(split) === split`.
 *
 * With the default linear `beginCurve`, installing a split anchored at the
 * current progress continues a finger-tracked trajectory without a jump.
 */
export class SplitCurve implements Curve {
  readonly split: number;
  readonly beginCurve: Curve;
  readonly endCurve: Curve;

  constructor(split: number, options: { beginCurve?: Curve; endCurve?: Curve } = {}) {
    this.split = Math.min(Math.max(split, 0), 1);
    this.beginCurve = options.beginCurve ?? Curves.linear;
    this.endCurve = options.endCurve ?? Curves.easeOutCubic;
  }

  transform(t: number): number {
    if (t === 0 || t === 1 || t === this.split) {
      return t;
    }
    if (t < this.split) {
      const progress = this.beginCurve.transform(t / this.split);
      return this.split * progress;
    }
    const progress = this.endCurve.transform((t - this.split) / (1 - this.split));
    return this.split + (1 - this.split) * progress;
  }
}

/** Common curves */
export const Curves = {
  linear: new LinearCurve(),
  easeOutCubic: new Cubic(0.215, 0.61, 0.355, 1.0),
  /** Material 3 emphasized easing, used for sheet enter/exit */
  easeInOutCubicEmphasized: new ThreePointCubic(
    { x: 0.05, y: 0 },
    { x: 0.133333, y: 0.06 },
    { x: 0.166666, y: 0.4 },
    { x: 0.208333, y: 0.82 },
    { x: 0.25, y: 1 }
  ),
} as const;
