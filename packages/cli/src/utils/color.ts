/**
 * Colour argument parsing for the paint/fill commands.
 * Accepts `#rrggbb`, `rrggbb`, `r,g,b` and a handful of names.
 */

import type { Pixel } from "@ledloom/core";

export const NAMED_COLORS: Readonly<Record<string, Pixel>> = {
  black: [0, 0, 0],
  white: [255, 255, 255],
  red: [255, 0, 0],
  green: [0, 255, 0],
  blue: [0, 0, 255],
  yellow: [255, 255, 0],
  cyan: [0, 255, 255],
  magenta: [255, 0, 255],
  orange: [255, 165, 0],
  purple: [128, 0, 128],
};

export function parseColor(input: string): Pixel {
  const value = input.trim().toLowerCase();

  const named = NAMED_COLORS[value];
  if (named) return [named[0], named[1], named[2]];

  const hex = /^#?([0-9a-f]{6})$/.exec(value);
  if (hex) {
    const n = parseInt(hex[1], 16);
    return [(n >> 16) & 0xff, (n >> 8) & 0xff, n & 0xff];
  }

  const parts = value.split(",").map((part) => part.trim());
  if (parts.length === 3 && parts.every((part) => /^\d{1,3}$/.test(part))) {
    const [r, g, b] = parts.map(Number);
    if (r <= 255 && g <= 255 && b <= 255) return [r, g, b];
  }

  throw new Error(`Invalid colour "${input}" (use #rrggbb, r,g,b or a colour name)`);
}

/** Parse `x,y` coordinates */
export function parsePoint(input: string): { x: number; y: number } {
  const match = /^\s*(\d+)\s*,\s*(\d+)\s*$/.exec(input);
  if (!match) throw new Error(`Invalid point "${input}" (use x,y)`);
  return { x: Number(match[1]), y: Number(match[2]) };
}
