// Data model
export type {
  Id,
  FrameIndex,
  LayerFrame,
  FrameMap,
  FrameWindow,
  LayerTrack,
  LayerGroup,
  PatternMeta,
  EditContext,
  PatternState,
} from "./timeline/types.js";

export {
  pixelIndex,
  isBlack,
  clampChannel,
  blackBuffer,
  cloneBuffer,
  solidBuffer,
  assertDimensions,
  assertBufferLength,
  assertPixel,
  toHex,
  type Pixel,
  type PixelBuffer,
  type ReadonlyPixelBuffer,
} from "./pixel/types.js";

// Automation
export {
  ACTION_DEFINITIONS,
  ACTION_KINDS,
  isActionKind,
  actionPriority,
  isTimeBased,
  createAction,
  SCROLL_DIRECTIONS,
  ROTATE_MODES,
  AXES,
  WIPE_MODES,
  REVEAL_DIRECTIONS,
  RADIAL_MODES,
  COLOUR_CYCLE_MODES,
  type ActionParams,
  type ActionKind,
  type ParamsOf,
  type LayerAction,
  type LayerActionInput,
  type ActionDefinition,
  type ScrollDirection,
  type RotateMode,
  type Axis,
  type WipeMode,
  type RevealDirection,
  type RadialMode,
  type ColourCycleMode,
} from "./automation/types.js";
export { actionStep, isActionActive } from "./automation/step.js";
export { applyAction, applyOpacity } from "./automation/transforms.js";
export {
  evaluateTrack,
  sortByPriority,
  storedFrame,
  storedFrameIndices,
  isInWindow,
  type EvaluationContext,
} from "./automation/pipeline.js";
export { validateAction, validateParams, validateWindow } from "./automation/validate.js";

// Rendering
export {
  render,
  renderRange,
  compositingOrder,
  type RenderOptions,
  type RenderObserver,
} from "./render/compositor.js";

// Editing
export type { EditToken, EditScope } from "./edit/context.js";
export {
  LoomError,
  StructuralError,
  IsolationViolationError,
  MissingFrameError,
  FrameExistsError,
  RenderInProgressError,
  TrackNotFoundError,
  GroupNotFoundError,
  TrackLockedError,
  InvalidActionError,
  isLoomError,
  type LoomErrorCode,
} from "./edit/errors.js";

// Store
export {
  createPatternStore,
  createPatternState,
  validatePatternState,
  generateId,
  type PatternStore,
  type PatternStoreApi,
  type PatternInit,
  type TrackInput,
  type TrackPatch,
  type GroupPatch,
  type FramePatch,
} from "./timeline/store.js";

// Migration
export {
  tracksFromLegacyLayers,
  mergeLegacyGroups,
  type LegacyLayer,
  type LegacyLayerMap,
  type LegacyGroup,
  type LegacyGroupMap,
  type MigrationOptions,
  type MigrationResult,
} from "./migration/legacy.js";
