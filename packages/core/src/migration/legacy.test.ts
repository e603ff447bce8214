import { describe, it, expect } from "vitest";
import type { Pixel } from "../pixel/types.js";
import { StructuralError } from "../edit/errors.js";
import { mergeLegacyGroups, tracksFromLegacyLayers, type LegacyLayer } from "./legacy.js";

const RED: Pixel = [255, 0, 0];
const BLUE: Pixel = [0, 0, 255];

function layer(name: string, overrides: Partial<LegacyLayer> = {}): LegacyLayer {
  return { name, pixels: [RED], visible: true, opacity: 1, ...overrides };
}

describe("tracksFromLegacyLayers", () => {
  it("groups same-named layers into one track in order of first appearance", () => {
    const { tracks } = tracksFromLegacyLayers(
      {
        2: [layer("Text"), layer("Background")],
        0: [layer("Background")],
      },
      { width: 1, height: 1 }
    );

    expect(tracks.map((t) => [t.id, t.name, t.zIndex])).toEqual([
      ["track-1", "Background", 0],
      ["track-2", "Text", 1],
    ]);
    expect(Object.keys(tracks[0].frames)).toEqual(["0", "2"]);
    expect(Object.keys(tracks[1].frames)).toEqual(["2"]);
  });

  it("stores overrides only where a frame differs from the first-seen layer", () => {
    const { tracks } = tracksFromLegacyLayers(
      {
        0: [layer("Glow", { opacity: 0.5 })],
        1: [layer("Glow", { opacity: 0.5004 })],
        2: [layer("Glow", { opacity: 0.8, visible: false })],
      },
      { width: 1, height: 1 }
    );
    const [glow] = tracks;

    expect(glow.opacity).toBe(0.5);
    expect(glow.visible).toBe(true);
    expect(glow.frames[0]).toEqual({ pixels: [RED], visibleOverride: null, opacityOverride: null });
    expect(glow.frames[1]?.opacityOverride).toBeNull();
    expect(glow.frames[2]).toEqual({ pixels: [RED], visibleOverride: false, opacityOverride: 0.8 });
  });

  it("keeps the first of duplicate names within a frame", () => {
    const { tracks } = tracksFromLegacyLayers(
      { 0: [layer("Dup"), layer("Dup", { pixels: [BLUE] })] },
      { width: 1, height: 1 }
    );
    expect(tracks).toHaveLength(1);
    expect(tracks[0].frames[0]?.pixels).toEqual([RED]);
  });

  it("carries lock and group from the first-seen layer", () => {
    const { tracks } = tracksFromLegacyLayers(
      { 0: [layer("Locked", { locked: true, groupId: "g1" })] },
      { width: 1, height: 1, createId: (i) => `legacy-${i}` }
    );
    expect(tracks[0]).toMatchObject({ id: "legacy-0", locked: true, groupId: "g1" });
  });

  it("rejects buffers of the wrong size", () => {
    expect(() => tracksFromLegacyLayers({ 0: [layer("Wide")] }, { width: 2, height: 1 })).toThrow(StructuralError);
  });
});

describe("mergeLegacyGroups", () => {
  it("keeps the first definition of each group id", () => {
    const groups = mergeLegacyGroups({
      3: { g1: { name: "Later", visible: false, opacity: 0.2 } },
      1: {
        g1: { name: "Scenery", visible: true, opacity: 0.5 },
        g2: { name: "Text", visible: true, opacity: 4 },
      },
    });
    expect(groups).toEqual([
      { id: "g1", name: "Scenery", visible: true, opacity: 0.5 },
      { id: "g2", name: "Text", visible: true, opacity: 1 },
    ]);
  });

  it("returns no groups when none are given", () => {
    expect(mergeLegacyGroups(undefined)).toEqual([]);
  });
});
