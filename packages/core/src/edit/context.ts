/**
 * @module edit/context
 * @description Single-writer edit discipline.
 *
 * Authoring goes through one active (track, frame) pair. `beginEdit` hands out
 * an {@link EditToken} for that pair; mutators take the token and reject it
 * unless it still names the active context. Starting a new edit bumps the
 * epoch, which retires every older token.
 */

import type { EditContext, FrameIndex, Id } from "../timeline/types.js";
import { IsolationViolationError } from "./errors.js";

/** Capability for mutating one track/frame. Only `beginEdit` mints these. */
export interface EditToken {
  readonly trackId: Id;
  readonly frameIndex: FrameIndex;
  readonly epoch: number;
}

const minted = new WeakSet<EditToken>();

/** Frame-scoped mutators check the frame index too; track-scoped ones don't. */
export type EditScope = "frame" | "track";

/** Epochs only ever grow, even across `endEdit`, so no old token can match again. */
export function nextEditContext(lastEpoch: number, trackId: Id, frameIndex: FrameIndex): EditContext {
  return { trackId, frameIndex, epoch: lastEpoch + 1 };
}

/** Mint the token for a context. Kept internal to the store. */
export function tokenFor(context: EditContext): EditToken {
  const token: EditToken = Object.freeze({
    trackId: context.trackId,
    frameIndex: context.frameIndex,
    epoch: context.epoch,
  });
  minted.add(token);
  return token;
}

/**
 * Throw unless `token` matches the active context for the given scope.
 */
export function assertEditToken(
  active: EditContext | null,
  token: EditToken,
  scope: EditScope,
  operation: string
): void {
  if (!minted.has(token)) {
    throw new IsolationViolationError(`${operation}: edit token was not issued by beginEdit`);
  }
  if (active === null) {
    throw new IsolationViolationError(`${operation}: no active edit context`);
  }
  if (token.epoch !== active.epoch) {
    throw new IsolationViolationError(
      `${operation}: edit token is stale (epoch ${token.epoch}, active ${active.epoch})`
    );
  }
  if (token.trackId !== active.trackId) {
    throw new IsolationViolationError(
      `${operation}: attempted to write to track ${token.trackId}, but active track is ${active.trackId}`
    );
  }
  if (scope === "frame" && token.frameIndex !== active.frameIndex) {
    throw new IsolationViolationError(
      `${operation}: attempted to write to frame ${token.frameIndex}, but active frame is ${active.frameIndex}`
    );
  }
}
