import { describe, it, expect } from "vitest";
import {
  assertBufferLength,
  assertDimensions,
  assertPixel,
  blackBuffer,
  clampChannel,
  cloneBuffer,
  isBlack,
  pixelIndex,
  solidBuffer,
  toHex,
} from "./types.js";
import { StructuralError } from "../edit/errors.js";

describe("pixel buffers", () => {
  it("indexes row-major", () => {
    expect(pixelIndex(0, 0, 8)).toBe(0);
    expect(pixelIndex(3, 2, 8)).toBe(19);
  });

  it("creates black buffers of width * height", () => {
    const buffer = blackBuffer(3, 2);
    expect(buffer).toHaveLength(6);
    expect(buffer.every(isBlack)).toBe(true);
  });

  it("clones without sharing tuples", () => {
    const source = solidBuffer(2, 1, [10, 20, 30]);
    const copy = cloneBuffer(source);
    copy[0][0] = 99;
    expect(source[0]).toEqual([10, 20, 30]);
    expect(copy[1]).toEqual([10, 20, 30]);
  });

  it("clamps and truncates channels", () => {
    expect(clampChannel(127.5)).toBe(127);
    expect(clampChannel(-4)).toBe(0);
    expect(clampChannel(300)).toBe(255);
  });

  it("formats hex", () => {
    expect(toHex([255, 8, 0])).toBe("ff0800");
  });
});

describe("structural checks", () => {
  it("rejects non-positive or fractional dimensions", () => {
    expect(() => assertDimensions(0, 4)).toThrow(StructuralError);
    expect(() => assertDimensions(2.5, 4)).toThrow(StructuralError);
    expect(() => assertDimensions(8, 8)).not.toThrow();
  });

  it("rejects buffers of the wrong length", () => {
    expect(() => assertBufferLength(blackBuffer(2, 2), 2, 3)).toThrow("Expected 6 pixels, got 4");
  });

  it("rejects out-of-range channels", () => {
    expect(() => assertPixel([0, 256, 0])).toThrow(StructuralError);
    expect(() => assertPixel([1, 2])).toThrow(StructuralError);
    expect(() => assertPixel([0, 128, 255])).not.toThrow();
  });
});
