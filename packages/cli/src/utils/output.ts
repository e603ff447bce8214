/**
 * Terminal and machine-readable renderings of a pixel buffer.
 */

import chalk from "chalk";
import { toHex, type PixelBuffer } from "@ledloom/core";

/** Rows of the buffer, top to bottom */
export function rows(pixels: PixelBuffer, width: number): PixelBuffer[] {
  const out: PixelBuffer[] = [];
  for (let i = 0; i < pixels.length; i += width) {
    out.push(pixels.slice(i, i + width));
  }
  return out;
}

/** Two terminal cells per LED so the matrix keeps its aspect */
export function formatAnsi(pixels: PixelBuffer, width: number): string {
  return rows(pixels, width)
    .map((row) => row.map(([r, g, b]) => chalk.bgRgb(r, g, b)("  ")).join(""))
    .join("\n");
}

/** One line per row, `rrggbb` per pixel separated by spaces */
export function formatHex(pixels: PixelBuffer, width: number): string {
  return rows(pixels, width)
    .map((row) => row.map(toHex).join(" "))
    .join("\n");
}

export function formatJson(pixels: PixelBuffer, width: number, height: number, frame: number): string {
  return JSON.stringify({ frame, width, height, pixels });
}

/** Raw RGB bytes, frames back to back */
export function toBytes(frames: readonly PixelBuffer[]): Uint8Array {
  const bytes: number[] = [];
  for (const frame of frames) {
    for (const [r, g, b] of frame) bytes.push(r, g, b);
  }
  return Uint8Array.from(bytes);
}
