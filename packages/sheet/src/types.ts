/**
 * Sheet Types
 *
 * Gesture payloads delivered by the host's pointer dispatch, plus small
 * shared unions.
 */

import type { Offset } from "./geometry";

/** Interaction states of the drag handle */
export type DragHandleInteraction = "dragged" | "hovered";

/**
 * Which extent law the layout uses.
 * - `companion`: content slides up past a navigation bar by `contentH − navH`
 * - `standalone`: the sheet grows from its minimum extent to the max height
 */
export type SheetLayoutVariant = "companion" | "standalone";

/** Where a drag began: the drag handle strip or the sheet content */
export type DragSource = "handle" | "content";

export type DragStartDetails = {
  /** Pointer position where the drag was recognized */
  globalPosition: Offset;
};

export type DragUpdateDetails = {
  /** Movement along the vertical axis since the last update (down is positive) */
  primaryDelta: number;
  globalPosition?: Offset;
};

export type DragEndDetails = {
  /** Release velocity; `pixelsPerSecond.dy` is positive when moving down */
  velocity: { pixelsPerSecond: Offset };
  globalPosition?: Offset;
};

export type DragStartCallback = (details: DragStartDetails) => void;

export type DragEndCallback = (details: DragEndDetails, info: { isClosing: boolean }) => void;
