export {
  SHEET_DEFAULTS,
  SheetConfigSchema,
  parseSheetConfig,
  type SheetConfig,
  type SheetConfigInput,
} from "./config";
export { SheetDimensions, type DimensionsListener } from "./dimensions";
export {
  DragHandleState,
  SheetDragController,
  assertDriverForDrag,
  decideDragEnd,
  type DragEndDecision,
  type DragEndInput,
  type DragHandleStateListener,
  type GestureState,
  type SheetDragControllerOptions,
} from "./dragController";
export {
  DEFAULT_DRAG_HANDLE_SIZE,
  MIN_INTERACTIVE_DIMENSION,
  RenderDragHandle,
  type RenderDragHandleOptions,
} from "./dragHandle";
export { SheetConfigurationError, type SheetConfigurationErrorCode } from "./errors";
export { BoxConstraints, Offset, Size } from "./geometry";
export { RenderLayoutObserver, type LayoutObserverCallbacks } from "./layoutObserver";
export { RenderMeasureHeight, type MeasureHeightCells } from "./measureHeight";
export {
  OverlayCompositor,
  RenderSheetPlaceholder,
  type BaseFactory,
  type OverlayCompositorOptions,
  type OverlayFactory,
} from "./overlayCompositor";
export {
  PersistentSheet,
  createPersistentSheet,
  type CreateAnimationDriverOptions,
  type PersistentSheetOptions,
  type SheetTheme,
} from "./persistentSheet";
export {
  PipelineOwner,
  RecordingPaintContext,
  RenderBox,
  RenderProxyBox,
  RenderSizedBox,
  type PaintContext,
  type PaintOp,
  type PipelineOwnerOptions,
} from "./renderBox";
export {
  RenderScrim,
  RenderSheetLayout,
  resolveSheetExtent,
  scrimOpacity,
  type RenderSheetLayoutOptions,
  type ScrimOptions,
  type SheetExtent,
  type SheetExtentInput,
  type SheetMetrics,
} from "./sheetLayout";
export type {
  DragEndCallback,
  DragEndDetails,
  DragHandleInteraction,
  DragSource,
  DragStartCallback,
  DragStartDetails,
  DragUpdateDetails,
  SheetLayoutVariant,
} from "./types";
