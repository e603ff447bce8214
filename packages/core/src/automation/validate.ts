import { InvalidActionError } from "../edit/errors.js";
import type { FrameWindow } from "../timeline/types.js";
import {
  AXES,
  COLOUR_CYCLE_MODES,
  RADIAL_MODES,
  REVEAL_DIRECTIONS,
  ROTATE_MODES,
  SCROLL_DIRECTIONS,
  WIPE_MODES,
  isActionKind,
  type ActionParams,
  type LayerActionInput,
} from "./types.js";

function expectOneOf(kind: string, field: string, value: string, allowed: readonly string[]): void {
  if (!allowed.includes(value)) {
    throw new InvalidActionError(`${kind}: ${field} must be one of ${allowed.join(", ")} (got "${value}")`);
  }
}

/** Any finite offset is accepted; rendering truncates it and raises it to at least 1. */
function expectOffset(kind: string, offset: number): void {
  if (typeof offset !== "number" || !Number.isFinite(offset)) {
    throw new InvalidActionError(`${kind}: offset must be a finite number (got ${String(offset)})`);
  }
}

/** Inclusive window check shared by actions and tracks. */
export function validateWindow(window: FrameWindow, what: string): void {
  if (!Number.isInteger(window.startFrame)) {
    throw new InvalidActionError(`${what}: start frame must be an integer`);
  }
  if (window.endFrame !== null) {
    if (!Number.isInteger(window.endFrame)) {
      throw new InvalidActionError(`${what}: end frame must be an integer`);
    }
    if (window.endFrame < window.startFrame) {
      throw new InvalidActionError(
        `${what}: end frame ${window.endFrame} is before start frame ${window.startFrame}`
      );
    }
  }
}

export function validateParams(params: ActionParams): void {
  if (!isActionKind(params.kind)) {
    throw new InvalidActionError(`Unknown action kind: ${String(params.kind)}`);
  }
  switch (params.kind) {
    case "scroll":
      expectOneOf("scroll", "direction", params.direction, SCROLL_DIRECTIONS);
      expectOffset("scroll", params.offset);
      return;
    case "rotate":
      expectOneOf("rotate", "mode", params.mode, ROTATE_MODES);
      return;
    case "mirror":
    case "bounce":
      expectOneOf(params.kind, "axis", params.axis, AXES);
      return;
    case "wipe":
      expectOneOf("wipe", "mode", params.mode, WIPE_MODES);
      expectOffset("wipe", params.offset);
      return;
    case "reveal":
      expectOneOf("reveal", "direction", params.direction, REVEAL_DIRECTIONS);
      expectOffset("reveal", params.offset);
      return;
    case "radial":
      expectOneOf("radial", "mode", params.mode, RADIAL_MODES);
      return;
    case "colourCycle":
      expectOneOf("colourCycle", "mode", params.mode, COLOUR_CYCLE_MODES);
      return;
    case "invert":
      return;
  }
}

/** Reject malformed actions before they reach a track. */
export function validateAction(action: LayerActionInput): void {
  validateWindow({ startFrame: action.startFrame, endFrame: action.endFrame }, `${action.params.kind} action`);
  validateParams(action.params);
}
