import { StructuralError } from "../edit/errors.js";

/** One LED: red, green, blue channels, each an integer 0-255. No alpha. */
export type Pixel = [r: number, g: number, b: number];

/** Row-major pixel grid of exactly `width * height` entries. */
export type PixelBuffer = Pixel[];

/** Read-only view used where a buffer must not be touched. */
export type ReadonlyPixelBuffer = readonly (readonly [number, number, number])[];

/** Row-major index for (x, y). */
export function pixelIndex(x: number, y: number, width: number): number {
  return y * width + x;
}

export function isBlack(pixel: readonly [number, number, number]): boolean {
  return pixel[0] === 0 && pixel[1] === 0 && pixel[2] === 0;
}

/** Clamp to an integer channel value. */
export function clampChannel(value: number): number {
  return Math.max(0, Math.min(255, Math.trunc(value)));
}

export function blackBuffer(width: number, height: number): PixelBuffer {
  const buffer: PixelBuffer = [];
  for (let i = 0; i < width * height; i++) {
    buffer.push([0, 0, 0]);
  }
  return buffer;
}

/** Deep copy, so the result shares no tuples with the input. */
export function cloneBuffer(buffer: ReadonlyPixelBuffer): PixelBuffer {
  return buffer.map((p): Pixel => [p[0], p[1], p[2]]);
}

/** Filled buffer of a single colour. */
export function solidBuffer(width: number, height: number, color: Readonly<Pixel>): PixelBuffer {
  return blackBuffer(width, height).map((): Pixel => [color[0], color[1], color[2]]);
}

export function assertDimensions(width: number, height: number): void {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new StructuralError(`Invalid matrix dimensions ${width}x${height}`);
  }
}

export function assertBufferLength(buffer: ReadonlyPixelBuffer, width: number, height: number): void {
  const expected = width * height;
  if (buffer.length !== expected) {
    throw new StructuralError(`Expected ${expected} pixels, got ${buffer.length}`);
  }
}

/** Validate every pixel is a triple of 0-255 integers. */
export function assertPixel(pixel: readonly number[]): void {
  if (pixel.length !== 3 || !pixel.every((c) => Number.isInteger(c) && c >= 0 && c <= 255)) {
    throw new StructuralError(`Invalid pixel [${pixel.join(", ")}]`);
  }
}

/** Packed 0xRRGGBB, handy for byte-level comparisons. */
export function toHex(pixel: readonly [number, number, number]): string {
  return pixel.map((c) => c.toString(16).padStart(2, "0")).join("");
}
