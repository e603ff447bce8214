import { describe, it, expect } from "vitest";
import { InvalidActionError } from "../edit/errors.js";
import { createAction, type ActionParams } from "./types.js";
import { validateAction, validateParams, validateWindow } from "./validate.js";

describe("validateWindow", () => {
  it("accepts open and ordered windows", () => {
    expect(() => validateWindow({ startFrame: 0, endFrame: null }, "track")).not.toThrow();
    expect(() => validateWindow({ startFrame: 3, endFrame: 3 }, "track")).not.toThrow();
  });

  it("rejects an end before the start", () => {
    expect(() => validateWindow({ startFrame: 5, endFrame: 4 }, "track")).toThrow(
      "track: end frame 4 is before start frame 5"
    );
  });

  it("rejects fractional frames", () => {
    expect(() => validateWindow({ startFrame: 0.5, endFrame: null }, "track")).toThrow(InvalidActionError);
  });
});

describe("validateParams", () => {
  it("accepts every default action", () => {
    for (const kind of ["scroll", "rotate", "mirror", "bounce", "wipe", "reveal", "radial", "colourCycle", "invert"] as const) {
      expect(() => validateAction(createAction(kind))).not.toThrow();
    }
  });

  it("rejects unknown enum values from untyped input", () => {
    const parsed: ActionParams = JSON.parse('{"kind":"rotate","mode":"sideways"}');
    expect(() => validateParams(parsed)).toThrow('rotate: mode must be one of clockwise, counterclockwise (got "sideways")');
  });

  it("rejects unknown kinds", () => {
    const parsed: ActionParams = JSON.parse('{"kind":"sparkle"}');
    expect(() => validateParams(parsed)).toThrow("Unknown action kind: sparkle");
  });

  it("rejects unknown radial modes", () => {
    const parsed: ActionParams = JSON.parse('{"kind":"radial","mode":"burst"}');
    expect(() => validateParams(parsed)).toThrow('radial: mode must be one of spiral, pulse (got "burst")');
  });

  it("accepts any finite offset, leaving normalization to rendering", () => {
    expect(() => validateParams({ kind: "reveal", direction: "top", offset: -1 })).not.toThrow();
    expect(() => validateParams({ kind: "scroll", direction: "left", offset: 0.5 })).not.toThrow();
    expect(() => validateParams({ kind: "wipe", mode: "left-to-right", offset: Number.NaN })).toThrow(
      InvalidActionError
    );
  });

  it("rejects offsets that are not numbers", () => {
    const parsed: ActionParams = JSON.parse('{"kind":"scroll","direction":"up","offset":"2"}');
    expect(() => validateParams(parsed)).toThrow('scroll: offset must be a finite number (got 2)');
  });
});
