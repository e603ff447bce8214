import type { FrameIndex, Id } from "../timeline/types.js";

export const SCROLL_DIRECTIONS = ["up", "down", "left", "right"] as const;
export const ROTATE_MODES = ["clockwise", "counterclockwise"] as const;
export const AXES = ["horizontal", "vertical"] as const;
export const WIPE_MODES = ["left-to-right", "right-to-left", "top-to-bottom", "bottom-to-top"] as const;
export const REVEAL_DIRECTIONS = ["left", "right", "top", "bottom"] as const;
export const RADIAL_MODES = ["spiral", "pulse"] as const;
export const COLOUR_CYCLE_MODES = ["rgb", "ryb"] as const;

export type ScrollDirection = (typeof SCROLL_DIRECTIONS)[number];
export type RotateMode = (typeof ROTATE_MODES)[number];
export type Axis = (typeof AXES)[number];
export type WipeMode = (typeof WIPE_MODES)[number];
export type RevealDirection = (typeof REVEAL_DIRECTIONS)[number];
export type RadialMode = (typeof RADIAL_MODES)[number];
export type ColourCycleMode = (typeof COLOUR_CYCLE_MODES)[number];

/** Kind-specific parameters, discriminated on `kind`. */
export type ActionParams =
  | { kind: "scroll"; direction: ScrollDirection; offset: number }
  | { kind: "rotate"; mode: RotateMode }
  | { kind: "mirror"; axis: Axis }
  | { kind: "bounce"; axis: Axis }
  | { kind: "wipe"; mode: WipeMode; offset: number }
  | { kind: "reveal"; direction: RevealDirection; offset: number }
  | { kind: "radial"; mode: RadialMode }
  | { kind: "colourCycle"; mode: ColourCycleMode }
  | { kind: "invert" };

export type ActionKind = ActionParams["kind"];

/** Params for one specific kind. */
export type ParamsOf<K extends ActionKind> = Extract<ActionParams, { kind: K }>;

/** Render-time automation attached to a layer track. */
export interface LayerAction {
  id: Id;
  name?: string;
  /** First frame the action is active (inclusive) */
  startFrame: FrameIndex;
  /** Last active frame (inclusive); `null` runs to the end of the pattern */
  endFrame: FrameIndex | null;
  params: ActionParams;
}

/** Action as supplied by callers; the store assigns the id when missing. */
export type LayerActionInput = Omit<LayerAction, "id"> & { id?: Id };

/** Static description of an action kind */
export interface ActionDefinition<K extends ActionKind = ActionKind> {
  kind: K;
  name: string;
  description: string;
  /** Fixed evaluation order; lower runs first */
  priority: number;
  /** Magnitude grows with the local step (vs. on/off) */
  timeBased: boolean;
  defaultParams: ParamsOf<K>;
}

type DefinitionTable = { [K in ActionKind]: ActionDefinition<K> };

/**
 * Built-in action definitions.
 *
 * Priorities fix the execution order and are not configurable per action.
 */
export const ACTION_DEFINITIONS: DefinitionTable = {
  scroll: {
    kind: "scroll",
    name: "Scroll",
    description: "Shift content by offset pixels per frame, without wrapping",
    priority: 10,
    timeBased: true,
    defaultParams: { kind: "scroll", direction: "right", offset: 1 },
  },
  rotate: {
    kind: "rotate",
    name: "Rotate",
    description: "Rotate by 90 degrees per frame",
    priority: 20,
    timeBased: true,
    defaultParams: { kind: "rotate", mode: "clockwise" },
  },
  mirror: {
    kind: "mirror",
    name: "Mirror",
    description: "Flip along an axis while active",
    priority: 30,
    timeBased: false,
    defaultParams: { kind: "mirror", axis: "horizontal" },
  },
  bounce: {
    kind: "bounce",
    name: "Bounce",
    description: "Flip along an axis on every other frame",
    priority: 40,
    timeBased: true,
    defaultParams: { kind: "bounce", axis: "horizontal" },
  },
  wipe: {
    kind: "wipe",
    name: "Wipe",
    description: "Fade content beyond a moving edge",
    priority: 50,
    timeBased: true,
    defaultParams: { kind: "wipe", mode: "left-to-right", offset: 1 },
  },
  reveal: {
    kind: "reveal",
    name: "Reveal",
    description: "Show content up to a moving edge, black beyond it",
    priority: 60,
    timeBased: true,
    defaultParams: { kind: "reveal", direction: "left", offset: 1 },
  },
  radial: {
    kind: "radial",
    name: "Radial",
    description: "Twist content about the centre (spiral) or dim it by distance from the centre (pulse)",
    priority: 70,
    timeBased: true,
    defaultParams: { kind: "radial", mode: "spiral" },
  },
  colourCycle: {
    kind: "colourCycle",
    name: "Colour Cycle",
    description: "Rotate colour channels",
    priority: 80,
    timeBased: false,
    defaultParams: { kind: "colourCycle", mode: "rgb" },
  },
  invert: {
    kind: "invert",
    name: "Invert",
    description: "Replace each channel c with 255 - c",
    priority: 90,
    timeBased: false,
    defaultParams: { kind: "invert" },
  },
};

export const ACTION_KINDS: readonly ActionKind[] = [
  "scroll",
  "rotate",
  "mirror",
  "bounce",
  "wipe",
  "reveal",
  "radial",
  "colourCycle",
  "invert",
];

export function isActionKind(value: string): value is ActionKind {
  return Object.prototype.hasOwnProperty.call(ACTION_DEFINITIONS, value);
}

export function actionPriority(action: Pick<LayerAction, "params">): number {
  return ACTION_DEFINITIONS[action.params.kind].priority;
}

export function isTimeBased(action: Pick<LayerAction, "params">): boolean {
  return ACTION_DEFINITIONS[action.params.kind].timeBased;
}

/** Create a new action input with default parameters */
export function createAction<K extends ActionKind>(
  kind: K,
  startFrame: FrameIndex = 0,
  endFrame: FrameIndex | null = null,
  params?: Partial<Omit<ParamsOf<K>, "kind">>
): LayerActionInput {
  const definition: ActionDefinition<K> = ACTION_DEFINITIONS[kind];
  const merged: ParamsOf<K> = { ...definition.defaultParams, ...params, kind };
  return {
    startFrame,
    endFrame,
    params: merged,
  };
}
