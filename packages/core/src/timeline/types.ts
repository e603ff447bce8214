/**
 * @module timeline/types
 * @description Core data types for LEDLoom patterns.
 *
 * A pattern is a fixed-size LED matrix animated over a number of frames. Its
 * content lives in layer tracks, each spanning the whole timeline:
 * - Track -> layer (vertical stack, composited bottom to top by `zIndex`)
 * - LayerFrame -> the explicit pixels a track has at one frame index
 * - Action -> automation evaluated at render time (scroll, rotate, ...)
 * - Group -> collective visibility/opacity for a set of tracks
 *
 * All frame values are integer frame indices. Relations are plain ids; nothing
 * holds a back-reference.
 */

import type { PixelBuffer } from "../pixel/types.js";
import type { LayerAction } from "../automation/types.js";

/** Unique identifier string (e.g., `"1718000000000-k3j2h1g0f"`). */
export type Id = string;

/** Zero-based frame index on the pattern timeline. */
export type FrameIndex = number;

/**
 * Pixel content a track has at one frame index.
 *
 * Created only by an explicit create-frame call; a read never materializes
 * one. A missing frame means "no content" and is skipped during compositing,
 * which is not the same as an all-black frame.
 */
export interface LayerFrame {
  /** Row-major pixels, exactly `width * height` long */
  pixels: PixelBuffer;
  /** `null` inherits {@link LayerTrack.visible} */
  visibleOverride: boolean | null;
  /** `null` inherits {@link LayerTrack.opacity}; clamped to [0, 1] */
  opacityOverride: number | null;
}

/** Sparse frame storage keyed by frame index. */
export type FrameMap = Record<FrameIndex, LayerFrame | undefined>;

/** Inclusive activity range; `endFrame: null` is unbounded. */
export interface FrameWindow {
  startFrame: FrameIndex;
  endFrame: FrameIndex | null;
}

/**
 * A layer spanning the whole pattern timeline.
 *
 * Tracks composite in ascending `zIndex`; equal values keep insertion order.
 */
export interface LayerTrack {
  /** Stable identity, independent of position */
  id: Id;
  name: string;
  /** Compositing order key (lower = bottom) */
  zIndex: number;
  /** Default visibility, overridable per frame */
  visible: boolean;
  /** Default opacity in [0, 1], overridable per frame */
  opacity: number;
  /** Locked tracks reject frame content edits */
  locked: boolean;
  groupId: Id | null;
  /** Coarse activity bound; outside it the track contributes nothing */
  window: FrameWindow;
  frames: FrameMap;
  /** Evaluated in fixed priority order, not list order */
  automation: LayerAction[];
}

/** Gates and scales a set of tracks collectively. */
export interface LayerGroup {
  id: Id;
  name: string;
  visible: boolean;
  /** Multiplies the effective opacity of every member track */
  opacity: number;
}

/** Pattern metadata (stored in `.loom.json`). */
export interface PatternMeta {
  id: Id;
  name: string;
  /** Matrix width in LEDs */
  width: number;
  /** Matrix height in LEDs */
  height: number;
  /** Total frames on the timeline */
  frameCount: number;
  createdAt: Date;
  updatedAt: Date;
}

/** The single active authoring target. */
export interface EditContext {
  trackId: Id;
  frameIndex: FrameIndex;
  /** Bumped on every `beginEdit`, so older tokens go stale */
  epoch: number;
}

/**
 * Complete pattern document held by the store and serialized to project files.
 */
export interface PatternState {
  meta: PatternMeta;
  /** Tracks in insertion order (compositing order comes from `zIndex`) */
  tracks: LayerTrack[];
  groups: LayerGroup[];
  editContext: EditContext | null;
}
