/**
 * Timeline editing helpers: shifting sparse frames, automation windows and
 * track windows when frames are inserted, removed or moved.
 *
 * These mutate the track they are given and are meant to run on an Immer
 * draft inside a store update.
 */

import { blackBuffer, type Pixel, type PixelBuffer } from "../pixel/types.js";
import { storedFrame } from "../automation/pipeline.js";
import type { FrameIndex, FrameMap, FrameWindow, LayerFrame, LayerTrack } from "./types.js";

function remapFrames(frames: FrameMap, map: (index: FrameIndex) => FrameIndex | null): FrameMap {
  const next: FrameMap = {};
  for (const [key, frame] of Object.entries(frames)) {
    if (frame === undefined) continue;
    const target = map(Number(key));
    if (target !== null) next[target] = frame;
  }
  return next;
}

/** Make room for `count` frames at `index`. */
export function shiftForInsert(track: LayerTrack, index: FrameIndex, count: number): void {
  track.frames = remapFrames(track.frames, (f) => (f >= index ? f + count : f));

  for (const action of track.automation) {
    if (action.startFrame >= index) action.startFrame += count;
    if (action.endFrame !== null && action.endFrame >= index) action.endFrame += count;
  }

  if (track.window.startFrame >= index) track.window.startFrame += count;
  if (track.window.endFrame !== null && track.window.endFrame >= index) track.window.endFrame += count;
}

/**
 * Shift one window for a deletion of `[index, end)`. A start inside the range
 * moves to `index`; an end inside it is clipped to just before the range,
 * never before the start.
 */
function clipWindow(window: FrameWindow, index: FrameIndex, count: number): void {
  const end = index + count;
  if (window.startFrame >= end) {
    window.startFrame -= count;
  } else if (window.startFrame >= index) {
    window.startFrame = index;
  }
  if (window.endFrame === null) return;
  if (window.endFrame >= end) {
    window.endFrame -= count;
  } else if (window.endFrame >= index) {
    window.endFrame = Math.max(window.startFrame, index - 1);
  }
}

/**
 * Remove `[index, index + count)`. Frames in the range are discarded; action
 * and track windows are shifted back and clipped so that `end >= start` holds.
 */
export function shiftForDelete(track: LayerTrack, index: FrameIndex, count: number): void {
  const end = index + count;
  track.frames = remapFrames(track.frames, (f) => {
    if (f < index) return f;
    if (f >= end) return f - count;
    return null;
  });

  for (const action of track.automation) clipWindow(action, index, count);
  clipWindow(track.window, index, count);
}

/**
 * Move the frame at `src` to `dest`; frames in between slide by one toward
 * `src`. Windows are left as they are.
 */
export function moveFrameIn(track: LayerTrack, src: FrameIndex, dest: FrameIndex): void {
  if (src === dest) return;
  const moving = storedFrame(track, src);
  const next = remapFrames(track.frames, (f) => {
    if (f === src) return null;
    if (src < dest && f > src && f <= dest) return f - 1;
    if (src > dest && f >= dest && f < src) return f + 1;
    return f;
  });
  if (moving) next[dest] = moving;
  track.frames = next;
}

export function copyFrame(frame: LayerFrame): LayerFrame {
  return {
    pixels: frame.pixels.map((p): Pixel => [p[0], p[1], p[2]]),
    visibleOverride: frame.visibleOverride,
    opacityOverride: frame.opacityOverride,
  };
}

/**
 * Insert a copy of `src` at `dest`. `src` is given in pre-insert indices; it
 * moves up by one when it sits at or after `dest`.
 */
export function duplicateInto(track: LayerTrack, src: FrameIndex, dest: FrameIndex): void {
  shiftForInsert(track, dest, 1);
  const actualSrc = src < dest ? src : src + 1;
  const source = storedFrame(track, actualSrc);
  if (source) track.frames[dest] = copyFrame(source);
}

/**
 * Re-lay a buffer for new dimensions. Each pixel keeps its (x, y) if it is
 * still on the grid; new cells are black.
 */
export function resizeBuffer(
  pixels: PixelBuffer,
  fromWidth: number,
  fromHeight: number,
  toWidth: number,
  toHeight: number
): PixelBuffer {
  const out = blackBuffer(toWidth, toHeight);
  const width = Math.min(fromWidth, toWidth);
  const height = Math.min(fromHeight, toHeight);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const [r, g, b] = pixels[y * fromWidth + x];
      out[y * toWidth + x] = [r, g, b];
    }
  }
  return out;
}
