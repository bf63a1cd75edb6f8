/**
 * Simulations
 *
 * Time-parameterized motion: position `x(t)` and a settle predicate, with `t`
 * in seconds since the simulation started.
 */

import { spring } from "framer-motion/dom";

import { Curves, type Curve } from "./curves";

/** Thresholds under which a simulation counts as settled */
export type Tolerance = {
  /** Position distance */
  distance: number;
  /** Velocity magnitude (units per second) */
  velocity: number;
};

export const DEFAULT_TOLERANCE: Tolerance = { distance: 1e-3, velocity: 1e-3 };

export interface Simulation {
  x(time: number): number;
  isDone(time: number): boolean;
}

// ============================================================================
// Duration-based interpolation
// ============================================================================

/**
 * Moves from `begin` to `end` over `durationSeconds`, shaped by `curve`.
 */
export class InterpolationSimulation implements Simulation {
  constructor(
    private readonly begin: number,
    private readonly end: number,
    private readonly durationSeconds: number,
    private readonly curve: Curve = Curves.linear
  ) {}

  x(time: number): number {
    const t = Math.min(Math.max(time / this.durationSeconds, 0), 1);
    if (t === 0) {
      return this.begin;
    }
    if (t === 1) {
      return this.end;
    }
    return this.begin + (this.end - this.begin) * this.curve.transform(t);
  }

  isDone(time: number): boolean {
    return time > this.durationSeconds;
  }
}

// ============================================================================
// Spring physics
// ============================================================================

/** Damped harmonic oscillator parameters */
export type SpringDescription = {
  mass: number;
  stiffness: number;
  damping: number;
};

/** Build a spring from a damping ratio (1 = critically damped) */
export function springWithDampingRatio(options: {
  mass: number;
  stiffness: number;
  ratio?: number;
}): SpringDescription {
  const ratio = options.ratio ?? 1;
  return {
    mass: options.mass,
    stiffness: options.stiffness,
    damping: ratio * 2 * Math.sqrt(options.mass * options.stiffness),
  };
}

type SpringGenerator = ReturnType<typeof spring>;

/**
 * Spring pulling from `start` toward `end`, seeded with `velocity` in units
 * per second. Settles once within `tolerance` of `end`.
 */
export class SpringSimulation implements Simulation {
  private readonly generator: SpringGenerator;

  constructor(
    description: SpringDescription,
    start: number,
    end: number,
    velocity: number,
    tolerance: Tolerance = DEFAULT_TOLERANCE
  ) {
    this.generator = spring({
      keyframes: [start, end],
      velocity,
      mass: description.mass,
      stiffness: description.stiffness,
      damping: description.damping,
      restDelta: tolerance.distance,
      restSpeed: tolerance.velocity,
    });
  }

  x(time: number): number {
    return this.generator.next(time * 1000).value;
  }

  isDone(time: number): boolean {
    return this.generator.next(time * 1000).done;
  }
}
