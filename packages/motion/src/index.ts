export {
  AnimationDriver,
  type AnimateOptions,
  type AnimationDriverOptions,
  type FlingOptions,
} from "./animationDriver";
export { CurvedAnimation } from "./curvedAnimation";
export {
  Cubic,
  Curves,
  ParametricCurve,
  SplitCurve,
  ThreePointCubic,
  type Curve,
  type Point,
} from "./curves";
export { AnimationDriverError, type AnimationDriverErrorCode } from "./errors";
export {
  ManualFrameScheduler,
  createTimerFrameScheduler,
  type FrameCallback,
  type FrameScheduler,
} from "./frameScheduler";
export { DURATIONS, FLING_TOLERANCE, SHEET_CURVE, SPRINGS } from "./presets";
export {
  DEFAULT_TOLERANCE,
  InterpolationSimulation,
  SpringSimulation,
  springWithDampingRatio,
  type Simulation,
  type SpringDescription,
  type Tolerance,
} from "./simulation";
export {
  ALWAYS_COMPLETE_ANIMATION,
  type Animation,
  type AnimationDirection,
  type AnimationListener,
  type AnimationStatus,
  type AnimationStatusListener,
  type BezierTuple,
} from "./types";
