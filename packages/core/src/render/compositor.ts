/**
 * @module render/compositor
 * @description Final multi-layer compositing.
 *
 * Tracks composite bottom to top. A non-black pixel overwrites whatever is
 * below it; black is transparent. There is no blending between layers, so the
 * last non-black pixel wins. A pixel that opacity scaling turned fully black
 * therefore disappears instead of rendering dim.
 */

import { evaluateTrack } from "../automation/pipeline.js";
import { assertDimensions, blackBuffer, isBlack, type PixelBuffer } from "../pixel/types.js";
import type { FrameIndex, Id, LayerGroup, LayerTrack } from "../timeline/types.js";

/** Called once per contributing track, after its pixels are evaluated. */
export type RenderObserver = (trackId: Id, pixels: Readonly<PixelBuffer>) => void;

export interface RenderOptions {
  width: number;
  height: number;
  groups?: readonly LayerGroup[];
  observer?: RenderObserver;
}

/** Tracks in compositing order: ascending `zIndex`, then insertion order. */
export function compositingOrder(tracks: readonly LayerTrack[]): LayerTrack[] {
  return tracks
    .map((track, position) => ({ track, position }))
    .sort((a, b) => a.track.zIndex - b.track.zIndex || a.position - b.position)
    .map(({ track }) => track);
}

/**
 * Render one frame.
 *
 * Pure: repeated or out-of-order calls for the same frame give identical
 * buffers, and neither the tracks nor their frames are modified.
 */
export function render(
  tracks: readonly LayerTrack[],
  frameIndex: FrameIndex,
  options: RenderOptions
): PixelBuffer {
  const { width, height } = options;
  assertDimensions(width, height);

  const groups = new Map((options.groups ?? []).map((group) => [group.id, group] as const));
  const output = blackBuffer(width, height);

  for (const track of compositingOrder(tracks)) {
    const pixels = evaluateTrack(track, frameIndex, { width, height, groups });
    if (pixels === null) continue;

    options.observer?.(track.id, pixels);

    for (let i = 0; i < output.length; i++) {
      const pixel = pixels[i];
      if (!isBlack(pixel)) {
        output[i] = [pixel[0], pixel[1], pixel[2]];
      }
    }
  }

  return output;
}

/** Render `[start, end)` in order. */
export function renderRange(
  tracks: readonly LayerTrack[],
  start: FrameIndex,
  end: FrameIndex,
  options: RenderOptions
): PixelBuffer[] {
  const frames: PixelBuffer[] = [];
  for (let frameIndex = start; frameIndex < end; frameIndex++) {
    frames.push(render(tracks, frameIndex, options));
  }
  return frames;
}
