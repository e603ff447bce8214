import type { FrameIndex } from "../timeline/types.js";
import type { LayerAction } from "./types.js";

/**
 * Frame-relative progress of an action.
 *
 * Returns `null` outside the action's inclusive window, otherwise
 * `frameIndex - startFrame`. Depends only on its arguments, so the same frame
 * always yields the same step no matter the render order.
 */
export function actionStep(
  action: Pick<LayerAction, "startFrame" | "endFrame">,
  frameIndex: FrameIndex
): number | null {
  if (frameIndex < action.startFrame) return null;
  if (action.endFrame !== null && frameIndex > action.endFrame) return null;
  return frameIndex - action.startFrame;
}

/** Whether the action participates in the given frame at all */
export function isActionActive(
  action: Pick<LayerAction, "startFrame" | "endFrame">,
  frameIndex: FrameIndex
): boolean {
  return actionStep(action, frameIndex) !== null;
}
