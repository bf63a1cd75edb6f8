/**
 * Sheet Motion Constants
 * Material 3 bottom sheet timing and the fling spring.
 */

import { Curves } from "./curves";
import { springWithDampingRatio, type Tolerance } from "./simulation";

export const DURATIONS = {
  /** Slide-in duration (ms) */
  sheetEnter: 400,
  /** Slide-out duration (ms) */
  sheetExit: 350,
} as const;

export const SPRINGS = {
  // Critically damped, for flings released by a drag
  fling: springWithDampingRatio({ mass: 1, stiffness: 500, ratio: 1 }),
} as const;

/** Flings aim this far past the bound so they settle exactly on it */
export const FLING_TOLERANCE: Tolerance = { distance: 0.01, velocity: Number.POSITIVE_INFINITY };

/** Long-run easing for the sheet when it is not tracking a finger */
export const SHEET_CURVE = Curves.easeInOutCubicEmphasized;
