/**
 * Animation Driver
 *
 * Owns a normalized value in [0, 1] and moves it with duration-based
 * interpolation or a velocity-seeded spring, one frame at a time.
 * The most recent command always wins; starting a new animation, or assigning
 * `value` directly, supersedes whatever was running.
 */

import { getLogger, type RuntimeLogger } from "@docksheet/shared";

import { Curves, type Curve } from "./curves";
import { AnimationDriverError } from "./errors";
import type { FrameScheduler } from "./frameScheduler";
import { FLING_TOLERANCE, SPRINGS } from "./presets";
import {
  InterpolationSimulation,
  SpringSimulation,
  type Simulation,
  type SpringDescription,
} from "./simulation";
import type {
  Animation,
  AnimationDirection,
  AnimationListener,
  AnimationStatus,
  AnimationStatusListener,
} from "./types";

export type AnimationDriverOptions = {
  scheduler: FrameScheduler;
  /** Initial value (default 0) */
  value?: number;
  /** Default duration (ms) for `forward()` and `animateTo` */
  duration?: number;
  /** Default duration (ms) for `reverse()` and `animateBack` */
  reverseDuration?: number;
  debugLabel?: string;
  logger?: RuntimeLogger;
};

export type AnimateOptions = {
  /** Duration in ms; omitted means the default duration scaled by distance */
  duration?: number;
  curve?: Curve;
};

export type FlingOptions = {
  /** Units per second; the sign picks the bound to settle on */
  velocity?: number;
  spring?: SpringDescription;
};

function clampUnit(value: number): number {
  return Math.min(Math.max(value, 0), 1);
}

export class AnimationDriver implements Animation {
  duration: number | undefined;
  reverseDuration: number | undefined;
  readonly debugLabel: string | undefined;

  private readonly scheduler: FrameScheduler;
  private readonly logger: RuntimeLogger;
  private readonly listeners = new Set<AnimationListener>();
  private readonly statusListeners = new Set<AnimationStatusListener>();

  private currentValue = 0;
  private currentStatus: AnimationStatus = "dismissed";
  private lastReportedStatus: AnimationStatus = "dismissed";
  private direction: AnimationDirection = "forward";
  private simulation: Simulation | null = null;
  private frameId: number | null = null;
  private startTimestamp: number | null = null;
  private disposed = false;

  constructor(options: AnimationDriverOptions) {
    this.scheduler = options.scheduler;
    this.duration = options.duration;
    this.reverseDuration = options.reverseDuration;
    this.debugLabel = options.debugLabel;
    this.logger = (options.logger ?? getLogger("animation-driver")).child({
      driver: options.debugLabel ?? "anonymous",
    });
    this.internalSetValue(options.value ?? 0);
    this.lastReportedStatus = this.currentStatus;
  }

  // ============================================================================
  // State
  // ============================================================================

  get value(): number {
    this.assertNotDisposed();
    return this.currentValue;
  }

  /**
   * Set the value directly, stopping any running animation.
   * Bounds are not enforced; callers clamp. Assigning the current value is a
   * no-op and leaves a running animation alone.
   */
  set value(next: number) {
    this.assertNotDisposed();
    if (next === this.currentValue) {
      return;
    }
    this.stop();
    this.internalSetValue(next);
    this.notifyListeners();
    this.checkStatusChanged();
  }

  get status(): AnimationStatus {
    this.assertNotDisposed();
    return this.currentStatus;
  }

  get isAnimating(): boolean {
    return this.simulation !== null;
  }

  get isDismissed(): boolean {
    return this.status === "dismissed";
  }

  get isCompleted(): boolean {
    return this.status === "completed";
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  // ============================================================================
  // Commands
  // ============================================================================

  /** Animate toward 1 */
  forward(): void {
    this.assertNotDisposed();
    this.direction = "forward";
    this.animateToInternal(1);
  }

  /** Animate toward 0 */
  reverse(): void {
    this.assertNotDisposed();
    this.direction = "reverse";
    this.animateToInternal(0);
  }

  /** Animate toward `target` in the forward direction; duration 0 snaps */
  animateTo(target: number, options: AnimateOptions = {}): void {
    this.assertNotDisposed();
    this.direction = "forward";
    this.animateToInternal(target, options.duration, options.curve);
  }

  /** Animate toward `target` in the reverse direction; duration 0 snaps */
  animateBack(target: number, options: AnimateOptions = {}): void {
    this.assertNotDisposed();
    this.direction = "reverse";
    this.animateToInternal(target, options.duration, options.curve);
  }

  /**
   * Run a spring seeded with `velocity` that settles on 1 (velocity >= 0) or
   * on 0 (velocity < 0).
   */
  fling(options: FlingOptions = {}): void {
    this.assertNotDisposed();
    const velocity = options.velocity ?? 1;
    this.direction = velocity < 0 ? "reverse" : "forward";
    const target = velocity < 0 ? -FLING_TOLERANCE.distance : 1 + FLING_TOLERANCE.distance;
    const simulation = new SpringSimulation(
      options.spring ?? SPRINGS.fling,
      this.currentValue,
      target,
      velocity,
      FLING_TOLERANCE
    );
    this.logger.debug("fling", { from: this.currentValue, velocity });
    this.stop();
    this.startSimulation(simulation);
  }

  /** Reverse when moving (or settled) forward, otherwise go forward */
  toggle(): void {
    const status = this.status;
    if (status === "forward" || status === "completed") {
      this.reverse();
    } else {
      this.forward();
    }
  }

  /** Stop the running animation, leaving value and status as they are */
  stop(): void {
    if (this.frameId !== null) {
      this.scheduler.cancelFrame(this.frameId);
      this.frameId = null;
    }
    this.simulation = null;
    this.startTimestamp = null;
  }

  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.stop();
    this.listeners.clear();
    this.statusListeners.clear();
    this.disposed = true;
  }

  // ============================================================================
  // Listeners
  // ============================================================================

  addListener(listener: AnimationListener): void {
    this.assertNotDisposed();
    this.listeners.add(listener);
  }

  removeListener(listener: AnimationListener): void {
    this.listeners.delete(listener);
  }

  addStatusListener(listener: AnimationStatusListener): void {
    this.assertNotDisposed();
    this.statusListeners.add(listener);
  }

  removeStatusListener(listener: AnimationStatusListener): void {
    this.statusListeners.delete(listener);
  }

  // ============================================================================
  // Internals
  // ============================================================================

  private animateToInternal(target: number, duration?: number, curve: Curve = Curves.linear): void {
    let simulationDuration = duration;
    if (simulationDuration === undefined) {
      const directionDuration =
        this.direction === "reverse" && this.reverseDuration !== undefined
          ? this.reverseDuration
          : this.duration;
      if (directionDuration === undefined) {
        throw new AnimationDriverError(
          "NO_DURATION",
          `AnimationDriver ${this.direction === "forward" ? "forward()" : "reverse()"} called with no default duration`,
          this.debugLabel
        );
      }
      simulationDuration = directionDuration * Math.abs(target - this.currentValue);
    } else if (target === this.currentValue) {
      simulationDuration = 0;
    }

    this.stop();

    if (simulationDuration === 0) {
      const settled = clampUnit(target);
      if (this.currentValue !== settled) {
        this.currentValue = settled;
        this.notifyListeners();
      }
      this.currentStatus = this.direction === "forward" ? "completed" : "dismissed";
      this.checkStatusChanged();
      return;
    }

    this.startSimulation(
      new InterpolationSimulation(this.currentValue, target, simulationDuration / 1000, curve)
    );
  }

  private startSimulation(simulation: Simulation): void {
    this.simulation = simulation;
    this.startTimestamp = null;
    this.currentValue = clampUnit(simulation.x(0));
    this.currentStatus = this.direction === "forward" ? "forward" : "reverse";
    this.frameId = this.scheduler.requestFrame(this.tick);
    this.checkStatusChanged();
  }

  private readonly tick = (timestampMs: number): void => {
    this.frameId = null;
    const simulation = this.simulation;
    if (simulation === null || this.disposed) {
      return;
    }
    if (this.startTimestamp === null) {
      this.startTimestamp = timestampMs;
    }
    const elapsed = (timestampMs - this.startTimestamp) / 1000;
    this.currentValue = clampUnit(simulation.x(elapsed));
    if (simulation.isDone(elapsed)) {
      this.currentStatus = this.direction === "forward" ? "completed" : "dismissed";
      this.simulation = null;
      this.startTimestamp = null;
      this.logger.debug("settled", { value: this.currentValue, status: this.currentStatus });
    } else {
      this.frameId = this.scheduler.requestFrame(this.tick);
    }
    this.notifyListeners();
    this.checkStatusChanged();
  };

  private internalSetValue(value: number): void {
    this.currentValue = value;
    if (value === 0) {
      this.currentStatus = "dismissed";
    } else if (value === 1) {
      this.currentStatus = "completed";
    } else {
      this.currentStatus = this.direction === "forward" ? "forward" : "reverse";
    }
  }

  private notifyListeners(): void {
    for (const listener of [...this.listeners]) {
      listener();
    }
  }

  private checkStatusChanged(): void {
    if (this.currentStatus === this.lastReportedStatus) {
      return;
    }
    this.lastReportedStatus = this.currentStatus;
    for (const listener of [...this.statusListeners]) {
      listener(this.currentStatus);
    }
  }

  private assertNotDisposed(): void {
    if (this.disposed) {
      throw new AnimationDriverError(
        "DISPOSED",
        "AnimationDriver used after dispose()",
        this.debugLabel
      );
    }
  }
}
