/**
 * Legacy layer migration.
 *
 * Older documents stored an independent list of layers per frame. This groups
 * same-named layers across frames into tracks that span the timeline.
 */

import { assertBufferLength, assertDimensions, type Pixel, type PixelBuffer } from "../pixel/types.js";
import type { FrameIndex, Id, LayerFrame, LayerGroup, LayerTrack } from "../timeline/types.js";

/** One layer as stored by the per-frame format */
export interface LegacyLayer {
  name: string;
  pixels: PixelBuffer;
  visible: boolean;
  opacity: number;
  locked?: boolean;
  groupId?: Id | null;
}

/** Per-frame layer lists keyed by frame index */
export type LegacyLayerMap = Record<FrameIndex, LegacyLayer[]>;

/** Per-frame groups keyed by frame index, then group id */
export type LegacyGroupMap = Record<FrameIndex, Record<Id, LegacyGroup>>;

export interface LegacyGroup {
  name: string;
  visible: boolean;
  opacity: number;
}

export interface MigrationOptions {
  width: number;
  height: number;
  groups?: LegacyGroupMap;
  /** Id factory; defaults to a counter-based `track-N` scheme */
  createId?: (index: number) => Id;
}

export interface MigrationResult {
  tracks: LayerTrack[];
  groups: LayerGroup[];
}

/** Opacity differences below this are treated as "same as the track" */
const OPACITY_TOLERANCE = 0.001;

function sortedFrameIndices(map: Record<FrameIndex, unknown>): FrameIndex[] {
  return Object.keys(map)
    .map(Number)
    .sort((a, b) => a - b);
}

function clamp01(value: number): number {
  return Math.max(0, Math.min(1, value));
}

/**
 * Build tracks from a legacy per-frame layer map.
 *
 * Tracks appear in order of each name's first appearance (frames visited in
 * ascending index, layers in list order) and get z-indices 0, 1, 2, ... The
 * first-seen layer sets the track defaults; other frames carry a visibility or
 * opacity override only where they differ from it.
 */
export function tracksFromLegacyLayers(legacy: LegacyLayerMap, options: MigrationOptions): MigrationResult {
  const { width, height } = options;
  assertDimensions(width, height);
  const createId = options.createId ?? ((index: number) => `track-${index + 1}`);

  const tracks: LayerTrack[] = [];
  const byName = new Map<string, { track: LayerTrack; baseline: LegacyLayer }>();

  for (const frameIndex of sortedFrameIndices(legacy)) {
    for (const layer of legacy[frameIndex]) {
      assertBufferLength(layer.pixels, width, height);

      let entry = byName.get(layer.name);
      if (!entry) {
        const track: LayerTrack = {
          id: createId(tracks.length),
          name: layer.name,
          zIndex: tracks.length,
          visible: layer.visible,
          opacity: clamp01(layer.opacity),
          locked: layer.locked ?? false,
          groupId: layer.groupId ?? null,
          window: { startFrame: 0, endFrame: null },
          frames: {},
          automation: [],
        };
        entry = { track, baseline: layer };
        byName.set(layer.name, entry);
        tracks.push(track);
      }

      // A name repeated within one frame keeps its first occurrence
      if (entry.track.frames[frameIndex] !== undefined) continue;

      const { baseline } = entry;
      const frame: LayerFrame = {
        pixels: layer.pixels.map((p): Pixel => [p[0], p[1], p[2]]),
        visibleOverride: layer.visible === baseline.visible ? null : layer.visible,
        opacityOverride:
          Math.abs(layer.opacity - baseline.opacity) < OPACITY_TOLERANCE ? null : clamp01(layer.opacity),
      };
      entry.track.frames[frameIndex] = frame;
    }
  }

  return { tracks, groups: mergeLegacyGroups(options.groups) };
}

/** Groups now span the timeline; the first definition of each id wins. */
export function mergeLegacyGroups(groups: LegacyGroupMap | undefined): LayerGroup[] {
  if (!groups) return [];
  const merged = new Map<Id, LayerGroup>();
  for (const frameIndex of sortedFrameIndices(groups)) {
    for (const [id, group] of Object.entries(groups[frameIndex])) {
      if (merged.has(id)) continue;
      merged.set(id, { id, name: group.name, visible: group.visible, opacity: clamp01(group.opacity) });
    }
  }
  return [...merged.values()];
}
