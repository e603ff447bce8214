import { describe, it, expect } from "vitest";
import type { Pixel, PixelBuffer } from "../pixel/types.js";
import {
  applyAction,
  applyOpacity,
  colourCyclePixels,
  invertPixels,
  mirrorPixels,
  normalizeOffset,
  radialPixels,
  revealPixels,
  rotatePixels,
  rotateQuarter,
  scrollPixels,
  wipePixels,
} from "./transforms.js";

const A: Pixel = [1, 0, 0];
const B: Pixel = [2, 0, 0];
const C: Pixel = [3, 0, 0];
const D: Pixel = [4, 0, 0];
const K: Pixel = [0, 0, 0];

function grey(count: number, level: number): PixelBuffer {
  return Array.from({ length: count }, (): Pixel => [level, level, level]);
}

function levels(buffer: PixelBuffer): number[] {
  return buffer.map((p) => p[0]);
}

describe("scroll", () => {
  const row: PixelBuffer = [A, B, K, K];

  it("shifts right and left without wrapping", () => {
    expect(scrollPixels(row, 4, 1, "right", 1)).toEqual([K, A, B, K]);
    expect(scrollPixels(row, 4, 1, "left", 1)).toEqual([B, K, K, K]);
  });

  it("moves everything off the grid at distance >= width", () => {
    expect(scrollPixels(row, 4, 1, "right", 4)).toEqual([K, K, K, K]);
  });

  it("shifts rows for up and down", () => {
    const column: PixelBuffer = [A, B, C];
    expect(scrollPixels(column, 1, 3, "down", 1)).toEqual([K, A, B]);
    expect(scrollPixels(column, 1, 3, "up", 2)).toEqual([C, K, K]);
  });

  it("leaves the input untouched", () => {
    scrollPixels(row, 4, 1, "right", 2);
    expect(row).toEqual([A, B, K, K]);
  });

  it("normalizes offsets to whole pixels of at least one", () => {
    expect(normalizeOffset(0.5)).toBe(1);
    expect(normalizeOffset(2.9)).toBe(2);
    expect(normalizeOffset(-3)).toBe(1);
  });
});

describe("rotate", () => {
  const square: PixelBuffer = [A, B, C, D];

  it("turns a square clockwise", () => {
    expect(rotateQuarter(square, 2, 2, "clockwise")).toEqual([C, A, D, B]);
  });

  it("turns a square counterclockwise", () => {
    expect(rotateQuarter(square, 2, 2, "counterclockwise")).toEqual([B, D, A, C]);
  });

  it("applies step mod 4 turns", () => {
    expect(rotatePixels(square, 2, 2, "clockwise", 4)).toEqual(square);
    expect(rotatePixels(square, 2, 2, "clockwise", 5)).toEqual([C, A, D, B]);
    expect(rotatePixels(square, 2, 2, "clockwise", 2)).toEqual([D, C, B, A]);
  });

  it("drops pixels rotated off a non-square grid", () => {
    expect(rotateQuarter([A, B, C], 3, 1, "clockwise")).toEqual([A, K, K]);
  });

  it("re-lays a single column on a tall grid", () => {
    expect(rotateQuarter([A, B, C], 1, 3, "clockwise")).toEqual([C, B, A]);
    expect(rotateQuarter([A, B, C], 1, 3, "counterclockwise")).toEqual([A, B, C]);
  });
});

describe("radial", () => {
  it("twists a spiral about the centre, later pixels winning a shared cell", () => {
    expect(radialPixels([A, B, C, D], 2, 2, "spiral", 0)).toEqual([C, B, K, D]);
    expect(radialPixels([A, B, C, D], 2, 2, "spiral", 7)).toEqual([C, B, K, D]);
  });

  it("pulses brightness on a ten-step cycle", () => {
    const pixel: Pixel = [200, 100, 40];
    expect(radialPixels([pixel], 1, 1, "pulse", 0)).toEqual([[50, 25, 10]]);
    expect(radialPixels([pixel], 1, 1, "pulse", 5)).toEqual([[100, 50, 20]]);
    expect(radialPixels([pixel], 1, 1, "pulse", 15)).toEqual([[100, 50, 20]]);
  });

  it("is reachable through applyAction", () => {
    expect(applyAction([[200, 100, 40]], { kind: "radial", mode: "pulse" }, 5, 1, 1)).toEqual([[100, 50, 20]]);
  });
});

describe("mirror, invert and colour cycle", () => {
  it("mirrors horizontally and vertically", () => {
    expect(mirrorPixels([A, B, C], 3, 1, "horizontal")).toEqual([C, B, A]);
    expect(mirrorPixels([A, B, C, D], 2, 2, "vertical")).toEqual([C, D, A, B]);
  });

  it("inverts each channel", () => {
    expect(invertPixels([[10, 20, 30]])).toEqual([[245, 235, 225]]);
  });

  it("cycles channels", () => {
    expect(colourCyclePixels([[1, 2, 3]], "rgb")).toEqual([[2, 3, 1]]);
    expect(colourCyclePixels([[1, 2, 3]], "ryb")).toEqual([[3, 1, 2]]);
  });
});

describe("wipe", () => {
  it("fades linearly past the edge", () => {
    expect(levels(wipePixels(grey(4, 200), 4, 1, "left-to-right", 0))).toEqual([200, 150, 100, 50]);
    expect(levels(wipePixels(grey(4, 200), 4, 1, "left-to-right", 2))).toEqual([200, 200, 200, 100]);
  });

  it("measures from the leading edge of the mode", () => {
    expect(levels(wipePixels(grey(4, 200), 4, 1, "right-to-left", 0))).toEqual([50, 100, 150, 200]);
    expect(levels(wipePixels(grey(2, 200), 1, 2, "bottom-to-top", 0))).toEqual([100, 200]);
  });

  it("keeps full brightness once the edge passes the extent", () => {
    expect(levels(wipePixels(grey(4, 200), 4, 1, "left-to-right", 9))).toEqual([200, 200, 200, 200]);
  });
});

describe("reveal", () => {
  const row: PixelBuffer = [A, B, C, D];

  it("shows columns counted from the given edge", () => {
    expect(revealPixels(row, 4, 1, "left", 1)).toEqual([A, K, K, K]);
    expect(revealPixels(row, 4, 1, "right", 2)).toEqual([K, K, C, D]);
  });

  it("shows rows for top and bottom", () => {
    expect(revealPixels([A, B, C], 1, 3, "top", 2)).toEqual([A, B, K]);
    expect(revealPixels([A, B, C], 1, 3, "bottom", 1)).toEqual([K, K, C]);
  });

  it("hides everything at position 0 and shows everything past the extent", () => {
    expect(revealPixels(row, 4, 1, "left", 0)).toEqual([K, K, K, K]);
    expect(revealPixels(row, 4, 1, "left", 10)).toEqual(row);
  });
});

describe("applyOpacity", () => {
  it("scales brightness with truncation", () => {
    expect(applyOpacity([[255, 255, 255]], 0.5)).toEqual([[127, 127, 127]]);
    expect(applyOpacity([[3, 100, 255]], 0.25)).toEqual([[0, 25, 63]]);
  });

  it("returns full-opacity buffers as they are", () => {
    const buffer: PixelBuffer = [[9, 9, 9]];
    expect(applyOpacity(buffer, 1)).toBe(buffer);
  });

  it("blacks out at zero", () => {
    expect(applyOpacity([[200, 10, 40]], 0)).toEqual([[0, 0, 0]]);
  });
});

describe("applyAction", () => {
  it("multiplies the step by the scroll offset", () => {
    const row: PixelBuffer = [A, K, K, K, K];
    expect(applyAction(row, { kind: "scroll", direction: "right", offset: 2 }, 1, 5, 1)).toEqual([K, K, A, K, K]);
    expect(applyAction(row, { kind: "scroll", direction: "right", offset: 2 }, 0, 5, 1)).toEqual(row);
  });

  it("bounces on odd steps only", () => {
    const row: PixelBuffer = [A, B];
    const bounce = { kind: "bounce", axis: "horizontal" } as const;
    expect(applyAction(row, bounce, 0, 2, 1)).toEqual([A, B]);
    expect(applyAction(row, bounce, 1, 2, 1)).toEqual([B, A]);
    expect(applyAction(row, bounce, 2, 2, 1)).toEqual([A, B]);
  });

  it("applies non-time-based actions regardless of step", () => {
    expect(applyAction([[0, 0, 0]], { kind: "invert" }, 7, 1, 1)).toEqual([[255, 255, 255]]);
  });
});
