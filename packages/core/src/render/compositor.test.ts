import { describe, it, expect } from "vitest";
import { blackBuffer, type Pixel, type PixelBuffer } from "../pixel/types.js";
import type { LayerFrame, LayerTrack } from "../timeline/types.js";
import { compositingOrder, render, renderRange } from "./compositor.js";

const RED: Pixel = [255, 0, 0];
const GREEN: Pixel = [0, 255, 0];
const BLUE: Pixel = [0, 0, 255];
const K: Pixel = [0, 0, 0];

function frame(pixels: PixelBuffer): LayerFrame {
  return { pixels, visibleOverride: null, opacityOverride: null };
}

function makeTrack(id: string, overrides: Partial<LayerTrack> = {}): LayerTrack {
  return {
    id,
    name: id,
    zIndex: 0,
    visible: true,
    opacity: 1,
    locked: false,
    groupId: null,
    window: { startFrame: 0, endFrame: null },
    frames: {},
    automation: [],
    ...overrides,
  };
}

/** Index of the single lit pixel, or -1 when the row is dark. */
function litIndex(buffer: PixelBuffer): number {
  return buffer.findIndex((p) => p[0] !== 0 || p[1] !== 0 || p[2] !== 0);
}

describe("render", () => {
  it("starts from black with no tracks", () => {
    expect(render([], 0, { width: 2, height: 2 })).toEqual(blackBuffer(2, 2));
  });

  it("scrolls across an 8-wide row without wrapping", () => {
    const leftmost = (): LayerFrame => frame([RED, K, K, K, K, K, K, K]);
    const track = makeTrack("scroller", {
      frames: { 0: leftmost(), 1: leftmost(), 7: leftmost(), 8: leftmost() },
      automation: [
        { id: "s", startFrame: 0, endFrame: null, params: { kind: "scroll", direction: "right", offset: 1 } },
      ],
    });
    const options = { width: 8, height: 1 };

    expect(litIndex(render([track], 0, options))).toBe(0);
    expect(litIndex(render([track], 1, options))).toBe(1);
    expect(litIndex(render([track], 7, options))).toBe(7);
    expect(litIndex(render([track], 8, options))).toBe(-1);
  });

  it("scales brightness instead of blending", () => {
    const track = makeTrack("dim", { opacity: 0.5, frames: { 0: frame([[255, 255, 255]]) } });
    expect(render([track], 0, { width: 1, height: 1 })).toEqual([[127, 127, 127]]);
  });

  it("treats black as transparent", () => {
    const bottom = makeTrack("bottom", { zIndex: 0, frames: { 0: frame([RED, RED]) } });
    const top = makeTrack("top", { zIndex: 1, frames: { 0: frame([K, GREEN]) } });
    expect(render([top, bottom], 0, { width: 2, height: 1 })).toEqual([RED, GREEN]);
  });

  it("lets a pixel dimmed to black disappear", () => {
    const bottom = makeTrack("bottom", { frames: { 0: frame([RED]) } });
    const top = makeTrack("top", { zIndex: 1, opacity: 0.001, frames: { 0: frame([BLUE]) } });
    expect(render([bottom, top], 0, { width: 1, height: 1 })).toEqual([RED]);
  });

  it("breaks zIndex ties by insertion order", () => {
    const first = makeTrack("first", { zIndex: 3, frames: { 0: frame([RED]) } });
    const second = makeTrack("second", { zIndex: 3, frames: { 0: frame([BLUE]) } });
    expect(render([first, second], 0, { width: 1, height: 1 })).toEqual([BLUE]);
    expect(render([second, first], 0, { width: 1, height: 1 })).toEqual([RED]);
    expect(compositingOrder([second, first]).map((t) => t.id)).toEqual(["second", "first"]);
  });

  it("runs scroll before invert whatever the list order", () => {
    const track = makeTrack("ordered", {
      frames: { 1: frame([RED, K, K]) },
      automation: [
        { id: "i", startFrame: 0, endFrame: null, params: { kind: "invert" } },
        { id: "s", startFrame: 0, endFrame: null, params: { kind: "scroll", direction: "right", offset: 1 } },
      ],
    });
    expect(render([track], 1, { width: 3, height: 1 })).toEqual([
      [255, 255, 255],
      [0, 255, 255],
      [255, 255, 255],
    ]);
  });

  it("skips tracks outside their window", () => {
    const track = makeTrack("windowed", {
      window: { startFrame: 2, endFrame: 3 },
      frames: { 1: frame([RED]), 2: frame([RED]), 4: frame([RED]) },
    });
    const frames = renderRange([track], 0, 5, { width: 1, height: 1 });
    expect(frames).toEqual([[K], [K], [RED], [K], [K]]);
  });

  it("is deterministic and order independent", () => {
    const track = makeTrack("rotor", {
      frames: { 0: frame([RED, K, K, K]), 1: frame([RED, K, K, K]), 2: frame([RED, K, K, K]) },
      automation: [{ id: "r", startFrame: 0, endFrame: null, params: { kind: "rotate", mode: "clockwise" } }],
    });
    const options = { width: 2, height: 2 };

    const forward = [0, 1, 2].map((f) => render([track], f, options));
    const reversed = [2, 1, 0].map((f) => render([track], f, options)).reverse();
    expect(reversed).toEqual(forward);
    expect(render([track], 1, options)).toEqual(render([track], 1, options));
    expect(forward[1]).toEqual([K, RED, K, K]);
    expect(forward[2]).toEqual([K, K, K, RED]);
  });

  it("reports each contributing track to the observer", () => {
    const seen: string[] = [];
    const lit = makeTrack("lit", { frames: { 0: frame([RED]) } });
    const empty = makeTrack("empty");
    const hidden = makeTrack("hidden", { visible: false, frames: { 0: frame([BLUE]) } });
    render([lit, empty, hidden], 0, { width: 1, height: 1, observer: (id) => seen.push(id) });
    expect(seen).toEqual(["lit"]);
  });

  it("does not mutate the tracks", () => {
    const stored = frame([RED, K]);
    const track = makeTrack("static", {
      frames: { 0: stored },
      automation: [{ id: "i", startFrame: 0, endFrame: null, params: { kind: "invert" } }],
    });
    render([track], 0, { width: 2, height: 1 });
    expect(stored.pixels).toEqual([RED, K]);
    expect(Object.keys(track.frames)).toEqual(["0"]);
  });
});
