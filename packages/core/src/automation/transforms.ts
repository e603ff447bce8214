/**
 * Pixel transforms behind each automation kind.
 *
 * All functions are pure: they return a new buffer (or the input unchanged)
 * and never write to the buffer they are given. Geometry is row-major with
 * (0, 0) at the top-left; right and down increase x and y.
 */

import { blackBuffer, clampChannel, type Pixel, type PixelBuffer } from "../pixel/types.js";
import type {
  ActionParams,
  Axis,
  ColourCycleMode,
  RadialMode,
  RevealDirection,
  RotateMode,
  ScrollDirection,
  WipeMode,
} from "./types.js";

/** Per-frame offsets are whole pixels, at least one. */
export function normalizeOffset(offset: number): number {
  return Math.max(1, Math.trunc(offset));
}

/**
 * Shift by (dx, dy). Pixels pushed outside the grid are dropped and vacated
 * cells become black; there is no wraparound.
 */
export function shiftPixels(
  pixels: PixelBuffer,
  width: number,
  height: number,
  dx: number,
  dy: number
): PixelBuffer {
  if (dx === 0 && dy === 0) return pixels;

  const out = blackBuffer(width, height);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const srcX = x - dx;
      const srcY = y - dy;
      if (srcX >= 0 && srcX < width && srcY >= 0 && srcY < height) {
        out[y * width + x] = pixels[srcY * width + srcX];
      }
    }
  }
  return out;
}

export function scrollPixels(
  pixels: PixelBuffer,
  width: number,
  height: number,
  direction: ScrollDirection,
  distance: number
): PixelBuffer {
  switch (direction) {
    case "right":
      return shiftPixels(pixels, width, height, distance, 0);
    case "left":
      return shiftPixels(pixels, width, height, -distance, 0);
    case "down":
      return shiftPixels(pixels, width, height, 0, distance);
    case "up":
      return shiftPixels(pixels, width, height, 0, -distance);
  }
}

/**
 * One quarter turn in place on the row-major buffer. A pixel at (x, y) goes
 * to (nx, ny) when `nx < height` and `ny < width`, written at
 * `ny * width + nx` if that index is on the buffer. Cells nothing maps to stay
 * black, so on non-square matrices content is dropped or re-laid.
 */
export function rotateQuarter(
  pixels: PixelBuffer,
  width: number,
  height: number,
  mode: RotateMode
): PixelBuffer {
  const out = blackBuffer(width, height);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const nx = mode === "clockwise" ? height - 1 - y : y;
      const ny = mode === "clockwise" ? x : width - 1 - x;
      const target = ny * width + nx;
      if (nx < height && ny < width && target < out.length) {
        out[target] = pixels[y * width + x];
      }
    }
  }
  return out;
}

/** Rotate `turns mod 4` quarter turns, starting from the buffer given. */
export function rotatePixels(
  pixels: PixelBuffer,
  width: number,
  height: number,
  mode: RotateMode,
  turns: number
): PixelBuffer {
  let result = pixels;
  for (let i = 0; i < turns % 4; i++) {
    result = rotateQuarter(result, width, height, mode);
  }
  return result;
}

export function mirrorPixels(pixels: PixelBuffer, width: number, height: number, axis: Axis): PixelBuffer {
  const out: PixelBuffer = [];
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const srcX = axis === "horizontal" ? width - 1 - x : x;
      const srcY = axis === "vertical" ? height - 1 - y : y;
      out.push(pixels[srcY * width + srcX]);
    }
  }
  return out;
}

export function invertPixels(pixels: PixelBuffer): PixelBuffer {
  return pixels.map(([r, g, b]): Pixel => [255 - r, 255 - g, 255 - b]);
}

export function colourCyclePixels(pixels: PixelBuffer, mode: ColourCycleMode): PixelBuffer {
  if (mode === "rgb") {
    return pixels.map(([r, g, b]): Pixel => [g, b, r]);
  }
  return pixels.map(([r, g, b]): Pixel => [b, r, g]);
}

function scalePixel([r, g, b]: Pixel, factor: number): Pixel {
  return [clampChannel(r * factor), clampChannel(g * factor), clampChannel(b * factor)];
}

/**
 * Wipe: cells closer to the leading edge than `position` keep full
 * brightness; the rest fade linearly toward the trailing edge.
 */
export function wipePixels(
  pixels: PixelBuffer,
  width: number,
  height: number,
  mode: WipeMode,
  position: number
): PixelBuffer {
  const horizontal = mode === "left-to-right" || mode === "right-to-left";
  const forward = mode === "left-to-right" || mode === "top-to-bottom";
  const extent = horizontal ? width : height;
  const edge = Math.min(position, extent);
  const span = Math.max(1, extent - edge);

  const out: PixelBuffer = [];
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const coord = horizontal ? x : y;
      const distance = forward ? coord : extent - 1 - coord;
      const fade = distance < edge ? 1 : Math.max(0, 1 - (distance - edge) / span);
      const pixel = pixels[y * width + x];
      out.push(fade === 1 ? pixel : scalePixel(pixel, fade));
    }
  }
  return out;
}

function isRevealed(
  x: number,
  y: number,
  width: number,
  height: number,
  direction: RevealDirection,
  position: number
): boolean {
  switch (direction) {
    case "left":
      return x < Math.min(position, width);
    case "right":
      return x >= width - Math.min(position, width);
    case "top":
      return y < Math.min(position, height);
    case "bottom":
      return y >= height - Math.min(position, height);
  }
}

/** Reveal: show the first `position` columns/rows from `direction`'s edge. */
export function revealPixels(
  pixels: PixelBuffer,
  width: number,
  height: number,
  direction: RevealDirection,
  position: number
): PixelBuffer {
  const out = blackBuffer(width, height);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      if (isRevealed(x, y, width, height, direction, position)) {
        out[y * width + x] = pixels[y * width + x];
      }
    }
  }
  return out;
}

/**
 * Radial effects about the grid centre `(width / 2, height / 2)`.
 *
 * `spiral` twists each pixel a fixed amount about the centre (it does not
 * advance with the step); where several land on one cell the later one wins.
 * `pulse` dims pixels by their distance from the centre, the whole grid
 * breathing between half and full strength over a 10-step cycle.
 */
export function radialPixels(
  pixels: PixelBuffer,
  width: number,
  height: number,
  mode: RadialMode,
  step: number
): PixelBuffer {
  const cx = width / 2;
  const cy = height / 2;

  if (mode === "spiral") {
    const out = blackBuffer(width, height);
    for (let y = 0; y < height; y++) {
      for (let x = 0; x < width; x++) {
        const dx = x - cx;
        const dy = y - cy;
        const nx = Math.trunc(cx + dx * 0.9 - dy * 0.1);
        const ny = Math.trunc(cy + dy * 0.9 + dx * 0.1);
        if (nx >= 0 && nx < width && ny >= 0 && ny < height) {
          out[ny * width + nx] = pixels[y * width + x];
        }
      }
    }
    return out;
  }

  const maxDistance = Math.sqrt(cx * cx + cy * cy);
  const phase = (step % 10) / 10;
  const pulse = 0.5 + 0.5 * (1 - Math.abs(phase - 0.5) * 2);
  return pixels.map((pixel, i) => {
    const dx = (i % width) - cx;
    const dy = Math.floor(i / width) - cy;
    const falloff = maxDistance > 0 ? Math.sqrt(dx * dx + dy * dy) / maxDistance : 0;
    return scalePixel(pixel, (1 - falloff * 0.5) * pulse);
  });
}

/**
 * Brightness-only opacity: channels scale toward black, never toward the
 * layer beneath. Channels truncate, so 255 at 0.5 becomes 127.
 */
export function applyOpacity(pixels: PixelBuffer, opacity: number): PixelBuffer {
  if (opacity >= 1) return pixels;
  const factor = Math.max(0, opacity);
  return pixels.map((p) => scalePixel(p, factor));
}

/**
 * Apply one action at a resolved local step.
 *
 * Exhaustive over {@link ActionParams}; adding a kind without a case here is a
 * compile error.
 */
export function applyAction(
  pixels: PixelBuffer,
  params: ActionParams,
  step: number,
  width: number,
  height: number
): PixelBuffer {
  switch (params.kind) {
    case "scroll":
      return scrollPixels(pixels, width, height, params.direction, step * normalizeOffset(params.offset));
    case "rotate":
      return rotatePixels(pixels, width, height, params.mode, step);
    case "mirror":
      return mirrorPixels(pixels, width, height, params.axis);
    case "bounce":
      return step % 2 === 1 ? mirrorPixels(pixels, width, height, params.axis) : pixels;
    case "wipe":
      return wipePixels(pixels, width, height, params.mode, step * normalizeOffset(params.offset));
    case "reveal":
      return revealPixels(pixels, width, height, params.direction, step * normalizeOffset(params.offset));
    case "radial":
      return radialPixels(pixels, width, height, params.mode, step);
    case "colourCycle":
      return colourCyclePixels(pixels, params.mode);
    case "invert":
      return invertPixels(pixels);
  }
}
