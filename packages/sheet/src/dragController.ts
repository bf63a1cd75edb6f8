/**
 * Drag Controller
 *
 * Maps vertical drag gestures onto the sheet's animation driver and decides,
 * on release, whether the sheet settles open or starts closing.
 */

import {
  Curves,
  SHEET_CURVE,
  SplitCurve,
  type AnimationDriver,
  type Curve,
  type CurvedAnimation,
} from "@docksheet/motion";
import { getLogger, type RuntimeLogger } from "@docksheet/shared";

import { SHEET_DEFAULTS } from "./config";
import { SheetConfigurationError } from "./errors";
import type {
  DragEndCallback,
  DragEndDetails,
  DragHandleInteraction,
  DragStartCallback,
  DragStartDetails,
  DragUpdateDetails,
} from "./types";

// ============================================================================
// Release policy
// ============================================================================

export type DragEndInput = {
  /** Release velocity along the drag axis (px/s, down is positive) */
  velocityY: number;
  /** Driver value at release */
  value: number;
  dragExtent: number;
  flingVelocityThreshold?: number;
  closeProgressThreshold?: number;
};

export type DragEndDecision =
  | { action: "fling"; velocity: number; isClosing: boolean }
  | { action: "forward"; isClosing: false }
  /** Nothing to run: already at zero, or no extent to fling across */
  | { action: "none"; isClosing: boolean };

/**
 * Decide what a released drag does. Rules, first match wins:
 * 1. fast downward release: fling at `-velocityY / dragExtent`
 * 2. released below the close threshold: fling closed at unit speed
 * 3. otherwise: run forward to fully open
 */
export function decideDragEnd(input: DragEndInput): DragEndDecision {
  const flingThreshold = input.flingVelocityThreshold ?? SHEET_DEFAULTS.flingVelocityThreshold;
  const closeThreshold = input.closeProgressThreshold ?? SHEET_DEFAULTS.closeProgressThreshold;

  if (input.velocityY > flingThreshold) {
    const flingVelocity = -input.velocityY / input.dragExtent;
    const isClosing = flingVelocity < 0;
    if (input.value > 0 && Number.isFinite(flingVelocity)) {
      return { action: "fling", velocity: flingVelocity, isClosing };
    }
    return { action: "none", isClosing };
  }

  if (input.value < closeThreshold) {
    if (input.value > 0) {
      return { action: "fling", velocity: -1, isClosing: true };
    }
    return { action: "none", isClosing: true };
  }

  return { action: "forward", isClosing: false };
}

// ============================================================================
// Drag handle state
// ============================================================================

export type DragHandleStateListener = (states: ReadonlySet<DragHandleInteraction>) => void;

/**
 * Interaction states of the drag handle, for handles that restyle themselves
 * while dragged or hovered.
 */
export class DragHandleState {
  private states: ReadonlySet<DragHandleInteraction> = new Set();
  private readonly listeners = new Set<DragHandleStateListener>();

  get value(): ReadonlySet<DragHandleInteraction> {
    return this.states;
  }

  has(state: DragHandleInteraction): boolean {
    return this.states.has(state);
  }

  add(state: DragHandleInteraction): void {
    if (this.states.has(state)) {
      return;
    }
    this.update(new Set([...this.states, state]));
  }

  delete(state: DragHandleInteraction): void {
    if (!this.states.has(state)) {
      return;
    }
    const next = new Set(this.states);
    next.delete(state);
    this.update(next);
  }

  addListener(listener: DragHandleStateListener): void {
    this.listeners.add(listener);
  }

  removeListener(listener: DragHandleStateListener): void {
    this.listeners.delete(listener);
  }

  private update(next: ReadonlySet<DragHandleInteraction>): void {
    this.states = next;
    for (const listener of [...this.listeners]) {
      listener(next);
    }
  }
}

// ============================================================================
// Controller
// ============================================================================

/**
 * Throw `MISSING_ANIMATION_DRIVER` when drag or the drag handle is enabled
 * without a driver to move.
 */
export function assertDriverForDrag(
  driver: AnimationDriver | null | undefined,
  options: { enableDrag?: boolean; showDragHandle?: boolean },
  logger: RuntimeLogger
): void {
  const enableDrag = options.enableDrag ?? SHEET_DEFAULTS.enableDrag;
  const showDragHandle = options.showDragHandle ?? false;
  if (driver || !(enableDrag || showDragHandle)) {
    return;
  }
  const error = new SheetConfigurationError(
    "MISSING_ANIMATION_DRIVER",
    "An animation driver is required when drag or the drag handle is enabled. " +
      "Use PersistentSheet.createAnimationDriver to create one, or provide another driver."
  );
  logger.error("missing animation driver", error);
  throw error;
}

export type GestureState = "idle" | "dragging";

export type SheetDragControllerOptions = {
  /** Required whenever drag or the drag handle is enabled */
  driver: AnimationDriver | null;
  /** Curved view of `driver` whose curve is swapped around drags */
  animation: CurvedAnimation;
  /** Drag extent of the latest layout pass */
  dragExtent: () => number;
  enableDrag?: boolean;
  showDragHandle?: boolean;
  onClosing: () => void;
  onDragStart?: DragStartCallback;
  onDragEnd?: DragEndCallback;
  handleState?: DragHandleState;
  flingVelocityThreshold?: number;
  closeProgressThreshold?: number;
  /** End curve installed after a release */
  settleCurve?: Curve;
  logger?: RuntimeLogger;
};

export class SheetDragController {
  readonly handleState: DragHandleState;

  private readonly driver: AnimationDriver | null;
  private readonly animation: CurvedAnimation;
  private readonly dragExtent: () => number;
  private readonly onClosing: () => void;
  private readonly onDragStartCallback: DragStartCallback | undefined;
  private readonly onDragEndCallback: DragEndCallback | undefined;
  private readonly flingVelocityThreshold: number;
  private readonly closeProgressThreshold: number;
  private readonly settleCurve: Curve;
  private readonly logger: RuntimeLogger;
  private gestureState: GestureState = "idle";

  constructor(options: SheetDragControllerOptions) {
    this.logger = options.logger ?? getLogger("drag-controller");
    assertDriverForDrag(options.driver, options, this.logger);

    this.driver = options.driver;
    this.animation = options.animation;
    this.dragExtent = options.dragExtent;
    this.onClosing = options.onClosing;
    this.onDragStartCallback = options.onDragStart;
    this.onDragEndCallback = options.onDragEnd;
    this.handleState = options.handleState ?? new DragHandleState();
    this.flingVelocityThreshold =
      options.flingVelocityThreshold ?? SHEET_DEFAULTS.flingVelocityThreshold;
    this.closeProgressThreshold =
      options.closeProgressThreshold ?? SHEET_DEFAULTS.closeProgressThreshold;
    this.settleCurve = options.settleCurve ?? SHEET_CURVE;
  }

  get state(): GestureState {
    return this.gestureState;
  }

  /** A closing animation is running; drags are ignored until it ends */
  get isDismissUnderway(): boolean {
    return this.driver?.status === "reverse";
  }

  readonly handleDragStart = (details: DragStartDetails): void => {
    this.gestureState = "dragging";
    this.handleState.add("dragged");
    this.onDragStartCallback?.(details);
    this.animation.curve = Curves.linear;
  };

  readonly handleDragUpdate = (details: DragUpdateDetails): void => {
    const driver = this.driver;
    if (!driver || this.isDismissUnderway) {
      return;
    }
    const unitDelta = details.primaryDelta / this.dragExtent();
    if (!Number.isFinite(unitDelta)) {
      return;
    }
    const value = driver.value;
    if ((value <= 0 && unitDelta > 0) || (value >= 1 && unitDelta < 0)) {
      return;
    }
    if (driver.isDismissed) {
      // A dismissed driver still points in reverse; reopening must not read
      // as a dismiss in progress.
      this.logger.debug("re-anchor", { value });
      driver.animateTo(value, { duration: 0 });
    }
    driver.value = Math.min(Math.max(value - unitDelta, 0), 1);
  };

  readonly handleDragEnd = (details: DragEndDetails): DragEndDecision | null => {
    this.gestureState = "idle";
    const driver = this.driver;
    if (!driver || this.isDismissUnderway) {
      return null;
    }
    this.handleState.delete("dragged");

    const decision = decideDragEnd({
      velocityY: details.velocity.pixelsPerSecond.dy,
      value: driver.value,
      dragExtent: this.dragExtent(),
      flingVelocityThreshold: this.flingVelocityThreshold,
      closeProgressThreshold: this.closeProgressThreshold,
    });
    if (decision.action === "fling") {
      driver.fling({ velocity: decision.velocity });
    } else if (decision.action === "forward") {
      driver.forward();
    }
    this.logger.debug("drag end", { ...decision, value: driver.value });

    this.onDragEndCallback?.(details, { isClosing: decision.isClosing });
    this.animation.curve = new SplitCurve(driver.value, { endCurve: this.settleCurve });
    if (decision.isClosing) {
      this.onClosing();
    }
    return decision;
  };

  readonly setHovered = (hovering: boolean): void => {
    if (hovering) {
      this.handleState.add("hovered");
    } else {
      this.handleState.delete("hovered");
    }
  };

  /** Open a closed sheet or close an open one */
  readonly handleToggle = (): void => {
    this.driver?.toggle();
    if (this.isDismissUnderway) {
      this.onClosing();
    }
  };
}
