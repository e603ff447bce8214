/**
 * @module edit/errors
 * @description Typed failures raised by the engine and the authoring store.
 *
 * Every failure is local and synchronous: it points at a caller-side logic bug,
 * so nothing here is retried. Callers surface {@link LoomError.code} to users.
 */

import type { FrameIndex, Id } from "../timeline/types.js";

/** Machine-readable error codes. */
export type LoomErrorCode =
  | "STRUCTURAL"
  | "ISOLATION_VIOLATION"
  | "MISSING_FRAME"
  | "FRAME_EXISTS"
  | "RENDER_IN_PROGRESS"
  | "TRACK_NOT_FOUND"
  | "GROUP_NOT_FOUND"
  | "TRACK_LOCKED"
  | "INVALID_ACTION";

/** Base class for all engine errors. */
export class LoomError extends Error {
  readonly code: LoomErrorCode;

  constructor(code: LoomErrorCode, message: string) {
    super(message);
    this.name = "LoomError";
    this.code = code;
  }
}

/** Pixel buffer length or matrix dimensions do not line up. */
export class StructuralError extends LoomError {
  constructor(message: string) {
    super("STRUCTURAL", message);
    this.name = "StructuralError";
  }
}

/** A mutation targeted something other than the active edit context. */
export class IsolationViolationError extends LoomError {
  constructor(message: string) {
    super("ISOLATION_VIOLATION", `ISOLATION VIOLATION: ${message}`);
    this.name = "IsolationViolationError";
  }
}

/** Editing a frame that was never created. */
export class MissingFrameError extends LoomError {
  readonly trackId: Id;
  readonly frameIndex: FrameIndex;

  constructor(trackId: Id, frameIndex: FrameIndex) {
    super("MISSING_FRAME", `Track ${trackId} has no frame at index ${frameIndex}; create it first`);
    this.name = "MissingFrameError";
    this.trackId = trackId;
    this.frameIndex = frameIndex;
  }
}

/** Creating a frame where one already exists. */
export class FrameExistsError extends LoomError {
  readonly trackId: Id;
  readonly frameIndex: FrameIndex;

  constructor(trackId: Id, frameIndex: FrameIndex) {
    super("FRAME_EXISTS", `Track ${trackId} already has a frame at index ${frameIndex}`);
    this.name = "FrameExistsError";
    this.trackId = trackId;
    this.frameIndex = frameIndex;
  }
}

/** Any pattern mutation attempted while a render is running. */
export class RenderInProgressError extends LoomError {
  constructor(operation: string) {
    super("RENDER_IN_PROGRESS", `ISOLATION VIOLATION: cannot ${operation} during rendering`);
    this.name = "RenderInProgressError";
  }
}

export class TrackNotFoundError extends LoomError {
  constructor(trackId: Id) {
    super("TRACK_NOT_FOUND", `Track not found: ${trackId}`);
    this.name = "TrackNotFoundError";
  }
}

export class GroupNotFoundError extends LoomError {
  constructor(groupId: Id) {
    super("GROUP_NOT_FOUND", `Group not found: ${groupId}`);
    this.name = "GroupNotFoundError";
  }
}

/** Frame content edits on a locked track. */
export class TrackLockedError extends LoomError {
  constructor(trackId: Id) {
    super("TRACK_LOCKED", `Track ${trackId} is locked`);
    this.name = "TrackLockedError";
  }
}

export class InvalidActionError extends LoomError {
  constructor(message: string) {
    super("INVALID_ACTION", message);
    this.name = "InvalidActionError";
  }
}

/** Narrow an unknown thrown value to a {@link LoomError}. */
export function isLoomError(error: unknown): error is LoomError {
  return error instanceof LoomError;
}
