/**
 * Persistent Sheet
 *
 * Wires a driver, its curved view, the sheet layout and the drag controller
 * into one object. The host forwards pointer events to the gesture handlers,
 * mounts `layout` in its render tree (directly or as a compositor overlay),
 * and calls `dispose()` when the sheet goes away.
 */

import {
  ALWAYS_COMPLETE_ANIMATION,
  AnimationDriver,
  CurvedAnimation,
  SHEET_CURVE,
  type Animation,
  type FrameScheduler,
} from "@docksheet/motion";
import { getLogger, resolveFirst, resolveFirstOr, type RuntimeLogger } from "@docksheet/shared";

import { SHEET_DEFAULTS, parseSheetConfig, type SheetConfig, type SheetConfigInput } from "./config";
import type { SheetDimensions } from "./dimensions";
import {
  DragHandleState,
  SheetDragController,
  assertDriverForDrag,
  type DragEndDecision,
} from "./dragController";
import { DEFAULT_DRAG_HANDLE_SIZE, RenderDragHandle } from "./dragHandle";
import { BoxConstraints, type Size } from "./geometry";
import type { RenderBox } from "./renderBox";
import { RenderSheetLayout } from "./sheetLayout";
import type {
  DragEndCallback,
  DragEndDetails,
  DragSource,
  DragStartCallback,
  DragStartDetails,
  DragUpdateDetails,
  SheetLayoutVariant,
} from "./types";

/** Theme-level fallbacks, consulted after the sheet's own options */
export type SheetTheme = {
  showDragHandle?: boolean;
  dragHandleSize?: Size;
  constraints?: BoxConstraints;
};

export type PersistentSheetOptions = {
  /** Driver moving the sheet; see `PersistentSheet.createAnimationDriver` */
  driver?: AnimationDriver | null;
  /** Without a driver, build and own one on this scheduler */
  scheduler?: FrameScheduler;
  content: RenderBox;
  /** Node the sheet is overlaid on */
  child?: RenderBox | null;
  navigationBar?: RenderBox | null;
  /** Custom drag handle, used instead of the default one when the handle is shown */
  dragHandle?: RenderBox | null;
  /** Bar size of the default drag handle */
  dragHandleSize?: Size;
  constraints?: BoxConstraints | null;
  variant?: SheetLayoutVariant;
  dimensions?: SheetDimensions | null;
  theme?: SheetTheme;
  config?: SheetConfigInput;
  /** Called whenever a release starts closing the sheet; may repeat */
  onClosing: () => void;
  onDragStart?: DragStartCallback;
  onDragEnd?: DragEndCallback;
  logger?: RuntimeLogger;
};

export type CreateAnimationDriverOptions = {
  duration?: number;
  reverseDuration?: number;
  logger?: RuntimeLogger;
};

export class PersistentSheet {
  /**
   * Driver with the Material 3 sheet timing (400 ms in, 350 ms out).
   */
  static createAnimationDriver(
    scheduler: FrameScheduler,
    options: CreateAnimationDriverOptions = {}
  ): AnimationDriver {
    return new AnimationDriver({
      scheduler,
      duration: options.duration ?? SHEET_DEFAULTS.enterDurationMs,
      reverseDuration: options.reverseDuration ?? SHEET_DEFAULTS.exitDurationMs,
      debugLabel: "PersistentSheet",
      logger: options.logger,
    });
  }

  readonly config: SheetConfig;
  readonly driver: AnimationDriver | null;
  /** Animation the layout follows; the curved driver, or always complete */
  readonly animation: Animation;
  readonly layout: RenderSheetLayout;
  readonly handleState: DragHandleState;
  readonly controller: SheetDragController | null;
  readonly showDragHandle: boolean;

  private readonly curved: CurvedAnimation | null;
  private readonly ownsDriver: boolean;
  private readonly logger: RuntimeLogger;
  private disposed = false;

  constructor(options: PersistentSheetOptions) {
    this.logger = options.logger ?? getLogger("persistent-sheet");
    this.config = parseSheetConfig(options.config ?? {}, this.logger);
    const theme = options.theme ?? {};
    const config = this.config;

    this.showDragHandle = resolveFirstOr(
      false,
      config.showDragHandle,
      () => config.enableDrag && (theme.showDragHandle ?? false)
    );

    const suppliedDriver = options.driver ?? null;
    this.ownsDriver = suppliedDriver === null && options.scheduler !== undefined;
    this.driver =
      suppliedDriver ??
      (options.scheduler
        ? PersistentSheet.createAnimationDriver(options.scheduler, {
            duration: config.enterDurationMs,
            reverseDuration: config.exitDurationMs,
            logger: options.logger,
          })
        : null);
    assertDriverForDrag(
      this.driver,
      { enableDrag: config.enableDrag, showDragHandle: this.showDragHandle },
      this.logger
    );

    this.curved = this.driver ? new CurvedAnimation(this.driver, SHEET_CURVE) : null;
    this.animation = this.curved ?? ALWAYS_COMPLETE_ANIMATION;
    this.handleState = new DragHandleState();

    this.controller = this.curved
      ? new SheetDragController({
          driver: this.driver,
          animation: this.curved,
          dragExtent: () => this.layout.dragExtent,
          enableDrag: config.enableDrag,
          showDragHandle: this.showDragHandle,
          onClosing: options.onClosing,
          onDragStart: options.onDragStart,
          onDragEnd: options.onDragEnd,
          handleState: this.handleState,
          flingVelocityThreshold: config.flingVelocityThreshold,
          closeProgressThreshold: config.closeProgressThreshold,
          logger: options.logger,
        })
      : null;

    let dragHandle: RenderBox | null = null;
    if (this.showDragHandle) {
      dragHandle =
        options.dragHandle ??
        new RenderDragHandle({
          barSize: resolveFirstOr(
            DEFAULT_DRAG_HANDLE_SIZE,
            options.dragHandleSize,
            theme.dragHandleSize
          ),
          state: this.handleState,
          onActivate: this.toggle,
        });
    }

    const constraints =
      resolveFirst<BoxConstraints>(
        options.constraints,
        theme.constraints,
        () => new BoxConstraints({ maxWidth: config.maxWidth })
      ) ?? null;

    this.layout = new RenderSheetLayout({
      animation: this.animation,
      content: options.content,
      child: options.child ?? null,
      dragHandle,
      navigationBar: options.navigationBar ?? null,
      sheetConstraints: constraints,
      minContentHeight: config.minContentHeight,
      variant: options.variant,
      dimensions: options.dimensions ?? null,
      scrim: {
        dominatesFraction: config.scrimDominatesFraction,
        maxOpacity: config.scrimMaxOpacity,
      },
      logger: options.logger,
    });

    this.logger.debug("created", {
      hasDriver: this.driver !== null,
      showDragHandle: this.showDragHandle,
      enableDrag: config.enableDrag,
    });
  }

  // ============================================================================
  // Gestures
  // ============================================================================

  /**
   * Drags on the handle work whenever the handle is shown; drags on the
   * content only while `enableDrag` is set.
   */
  readonly handleDragStart = (details: DragStartDetails, source: DragSource = "content"): void => {
    if (this.acceptsDragFrom(source)) {
      this.controller?.handleDragStart(details);
    }
  };

  readonly handleDragUpdate = (details: DragUpdateDetails, source: DragSource = "content"): void => {
    if (this.acceptsDragFrom(source)) {
      this.controller?.handleDragUpdate(details);
    }
  };

  readonly handleDragEnd = (
    details: DragEndDetails,
    source: DragSource = "content"
  ): DragEndDecision | null => {
    if (!this.acceptsDragFrom(source)) {
      return null;
    }
    return this.controller?.handleDragEnd(details) ?? null;
  };

  readonly setHovered = (hovering: boolean): void => {
    this.controller?.setHovered(hovering);
  };

  /** Open a closed sheet or close an open one */
  readonly toggle = (): void => {
    this.controller?.handleToggle();
  };

  // ============================================================================
  // State
  // ============================================================================

  get scrimOpacity(): number {
    return this.layout.scrimOpacity;
  }

  get scrimIgnoresPointer(): boolean {
    return this.layout.scrimIgnoresPointer;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /** Detach from the driver; a driver built from `scheduler` is disposed too */
  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    this.layout.dispose();
    this.curved?.dispose();
    if (this.ownsDriver) {
      this.driver?.dispose();
    }
  }

  private acceptsDragFrom(source: DragSource): boolean {
    return source === "handle" ? this.showDragHandle : this.config.enableDrag;
  }
}

export function createPersistentSheet(options: PersistentSheetOptions): PersistentSheet {
  return new PersistentSheet(options);
}
