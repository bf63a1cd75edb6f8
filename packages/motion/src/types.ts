/**
 * Animation Types
 *
 * Shared shapes for anything that exposes a normalized animation value.
 */

/**
 * Animation status.
 * - `forward` / `reverse`: running (or last moved) toward 1 / toward 0
 * - `completed`: settled at 1 (or snapped while running forward)
 * - `dismissed`: settled at 0 (or snapped while running in reverse)
 */
export type AnimationStatus = "forward" | "reverse" | "completed" | "dismissed";

/** Direction of the most recent command */
export type AnimationDirection = "forward" | "reverse";

/** Value change listener */
export type AnimationListener = () => void;

/** Status change listener */
export type AnimationStatusListener = (status: AnimationStatus) => void;

/** A listenable normalized value */
export interface Animation {
  readonly value: number;
  readonly status: AnimationStatus;
  addListener(listener: AnimationListener): void;
  removeListener(listener: AnimationListener): void;
  addStatusListener(listener: AnimationStatusListener): void;
  removeStatusListener(listener: AnimationStatusListener): void;
}

/** Animation permanently stopped at 1 */
export const ALWAYS_COMPLETE_ANIMATION: Animation = Object.freeze({
  value: 1,
  status: "completed" as const,
  addListener: () => {},
  removeListener: () => {},
  addStatusListener: () => {},
  removeStatusListener: () => {},
});

/** Cubic-bezier control points `[x1, y1, x2, y2]` */
export type BezierTuple = readonly [number, number, number, number];
