/**
 * Geometry
 *
 * Immutable sizes, offsets and box constraints for the render-node layer.
 * All lengths are logical pixels; the y axis grows downwards.
 */

export class Size {
  static readonly zero = new Size(0, 0);

  constructor(
    readonly width: number,
    readonly height: number
  ) {}

  equals(other: Size): boolean {
    return this.width === other.width && this.height === other.height;
  }

  toString(): string {
    return `Size(${this.width}, ${this.height})`;
  }
}

export class Offset {
  static readonly zero = new Offset(0, 0);

  constructor(
    readonly dx: number,
    readonly dy: number
  ) {}

  translate(dx: number, dy: number): Offset {
    return new Offset(this.dx + dx, this.dy + dy);
  }

  plus(other: Offset): Offset {
    return this.translate(other.dx, other.dy);
  }

  equals(other: Offset): boolean {
    return this.dx === other.dx && this.dy === other.dy;
  }

  toString(): string {
    return `Offset(${this.dx}, ${this.dy})`;
  }
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

type ConstraintValues = {
  minWidth?: number;
  maxWidth?: number;
  minHeight?: number;
  maxHeight?: number;
};

/**
 * Min/max width and height a node must fit in.
 * `max*` may be `Infinity`; `min*` never is.
 */
export class BoxConstraints {
  readonly minWidth: number;
  readonly maxWidth: number;
  readonly minHeight: number;
  readonly maxHeight: number;

  constructor(values: ConstraintValues = {}) {
    this.minWidth = values.minWidth ?? 0;
    this.maxWidth = values.maxWidth ?? Number.POSITIVE_INFINITY;
    this.minHeight = values.minHeight ?? 0;
    this.maxHeight = values.maxHeight ?? Number.POSITIVE_INFINITY;
  }

  /** Anything from zero up to `size` */
  static loose(size: Size): BoxConstraints {
    return new BoxConstraints({ maxWidth: size.width, maxHeight: size.height });
  }

  /** Exactly `size` */
  static tight(size: Size): BoxConstraints {
    return new BoxConstraints({
      minWidth: size.width,
      maxWidth: size.width,
      minHeight: size.height,
      maxHeight: size.height,
    });
  }

  /** Tight in the given dimensions, unconstrained in the others */
  static tightFor(dimensions: { width?: number; height?: number }): BoxConstraints {
    return new BoxConstraints({
      minWidth: dimensions.width ?? 0,
      maxWidth: dimensions.width ?? Number.POSITIVE_INFINITY,
      minHeight: dimensions.height ?? 0,
      maxHeight: dimensions.height ?? Number.POSITIVE_INFINITY,
    });
  }

  get biggest(): Size {
    return new Size(this.constrainWidth(), this.constrainHeight());
  }

  get smallest(): Size {
    return new Size(this.constrainWidth(0), this.constrainHeight(0));
  }

  get hasBoundedHeight(): boolean {
    return this.maxHeight < Number.POSITIVE_INFINITY;
  }

  copyWith(values: ConstraintValues): BoxConstraints {
    return new BoxConstraints({
      minWidth: values.minWidth ?? this.minWidth,
      maxWidth: values.maxWidth ?? this.maxWidth,
      minHeight: values.minHeight ?? this.minHeight,
      maxHeight: values.maxHeight ?? this.maxHeight,
    });
  }

  /** These constraints clamped so that they lie within `other` */
  enforce(other: BoxConstraints): BoxConstraints {
    return new BoxConstraints({
      minWidth: clamp(this.minWidth, other.minWidth, other.maxWidth),
      maxWidth: clamp(this.maxWidth, other.minWidth, other.maxWidth),
      minHeight: clamp(this.minHeight, other.minHeight, other.maxHeight),
      maxHeight: clamp(this.maxHeight, other.minHeight, other.maxHeight),
    });
  }

  /** Tight in the given dimensions, kept within these constraints */
  tighten(dimensions: { width?: number; height?: number }): BoxConstraints {
    const { width, height } = dimensions;
    return new BoxConstraints({
      minWidth: width === undefined ? this.minWidth : clamp(width, this.minWidth, this.maxWidth),
      maxWidth: width === undefined ? this.maxWidth : clamp(width, this.minWidth, this.maxWidth),
      minHeight:
        height === undefined ? this.minHeight : clamp(height, this.minHeight, this.maxHeight),
      maxHeight:
        height === undefined ? this.maxHeight : clamp(height, this.minHeight, this.maxHeight),
    });
  }

  /** Remove `top` from the height budget, never going below zero */
  deflateTop(top: number): BoxConstraints {
    const deflatedMinHeight = Math.max(0, this.minHeight - top);
    return new BoxConstraints({
      minWidth: this.minWidth,
      maxWidth: this.maxWidth,
      minHeight: deflatedMinHeight,
      maxHeight: Math.max(deflatedMinHeight, this.maxHeight - top),
    });
  }

  constrainWidth(width = Number.POSITIVE_INFINITY): number {
    return clamp(width, this.minWidth, this.maxWidth);
  }

  constrainHeight(height = Number.POSITIVE_INFINITY): number {
    return clamp(height, this.minHeight, this.maxHeight);
  }

  constrain(size: Size): Size {
    return new Size(this.constrainWidth(size.width), this.constrainHeight(size.height));
  }

  equals(other: BoxConstraints): boolean {
    return (
      this.minWidth === other.minWidth &&
      this.maxWidth === other.maxWidth &&
      this.minHeight === other.minHeight &&
      this.maxHeight === other.maxHeight
    );
  }

  toString(): string {
    return `BoxConstraints(w: ${this.minWidth}..${this.maxWidth}, h: ${this.minHeight}..${this.maxHeight})`;
  }
}
