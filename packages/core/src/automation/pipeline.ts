import { assertBufferLength, cloneBuffer, type PixelBuffer } from "../pixel/types.js";
import type { FrameIndex, LayerFrame, LayerGroup, LayerTrack } from "../timeline/types.js";
import { actionStep } from "./step.js";
import { applyAction, applyOpacity } from "./transforms.js";
import { actionPriority, type LayerAction } from "./types.js";

/** What a track evaluation needs beyond the track itself */
export interface EvaluationContext {
  width: number;
  height: number;
  /** Groups by id; a track whose `groupId` is absent here is ungrouped */
  groups?: ReadonlyMap<string, LayerGroup>;
}

export function isInWindow(track: Pick<LayerTrack, "window">, frameIndex: FrameIndex): boolean {
  const { startFrame, endFrame } = track.window;
  if (frameIndex < startFrame) return false;
  if (endFrame !== null && frameIndex > endFrame) return false;
  return true;
}

/** Stored frame at an index, ignoring the window. Never creates one. */
export function storedFrame(track: Pick<LayerTrack, "frames">, frameIndex: FrameIndex): LayerFrame | undefined {
  if (!Object.prototype.hasOwnProperty.call(track.frames, frameIndex)) return undefined;
  return track.frames[frameIndex];
}

/** Frame indices that hold content, ascending. */
export function storedFrameIndices(track: Pick<LayerTrack, "frames">): FrameIndex[] {
  return Object.keys(track.frames)
    .map(Number)
    .filter((index) => track.frames[index] !== undefined)
    .sort((a, b) => a - b);
}

/** Automation in fixed priority order; equal priorities keep list order. */
export function sortByPriority(actions: readonly LayerAction[]): LayerAction[] {
  return actions
    .map((action, position) => ({ action, position }))
    .sort((a, b) => actionPriority(a.action) - actionPriority(b.action) || a.position - b.position)
    .map(({ action }) => action);
}

function findGroup(track: LayerTrack, context: EvaluationContext): LayerGroup | undefined {
  if (track.groupId === null) return undefined;
  return context.groups?.get(track.groupId);
}

export function effectiveVisibility(track: LayerTrack, frame: LayerFrame, group?: LayerGroup): boolean {
  const visible = frame.visibleOverride ?? track.visible;
  return visible && (group?.visible ?? true);
}

export function effectiveOpacity(track: LayerTrack, frame: LayerFrame, group?: LayerGroup): number {
  const own = frame.opacityOverride ?? track.opacity;
  return Math.max(0, Math.min(1, own)) * (group?.opacity ?? 1);
}

/**
 * Run a track's automation for one frame.
 *
 * Returns `null` when the track contributes nothing: no stored frame, frame
 * outside the track window, or hidden. Otherwise each active action transforms
 * the output of the previous one, starting from this frame's own stored
 * pixels. Nothing carries over from other frames.
 */
export function evaluateTrack(
  track: LayerTrack,
  frameIndex: FrameIndex,
  context: EvaluationContext
): PixelBuffer | null {
  if (!isInWindow(track, frameIndex)) return null;

  const frame = storedFrame(track, frameIndex);
  if (!frame) return null;

  const group = findGroup(track, context);
  if (!effectiveVisibility(track, frame, group)) return null;

  const { width, height } = context;
  assertBufferLength(frame.pixels, width, height);

  let buffer = cloneBuffer(frame.pixels);
  for (const action of sortByPriority(track.automation)) {
    const step = actionStep(action, frameIndex);
    if (step === null) continue;
    buffer = applyAction(buffer, action.params, step, width, height);
  }

  return applyOpacity(buffer, effectiveOpacity(track, frame, group));
}
