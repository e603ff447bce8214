import { describe, it, expect } from "vitest";
import { actionStep, isActionActive } from "./step.js";

describe("actionStep", () => {
  const bounded = { startFrame: 2, endFrame: 5 };
  const open = { startFrame: 3, endFrame: null };

  it.each([
    [0, null],
    [1, null],
    [2, 0],
    [3, 1],
    [5, 3],
    [6, null],
  ])("bounded window [2, 5] at frame %i gives %s", (frame, expected) => {
    expect(actionStep(bounded, frame)).toBe(expected);
  });

  it.each([
    [2, null],
    [3, 0],
    [10, 7],
    [1000, 997],
  ])("open-ended window from 3 at frame %i gives %s", (frame, expected) => {
    expect(actionStep(open, frame)).toBe(expected);
  });

  it("treats a single-frame window as active only on that frame", () => {
    const single = { startFrame: 4, endFrame: 4 };
    expect(actionStep(single, 4)).toBe(0);
    expect(isActionActive(single, 3)).toBe(false);
    expect(isActionActive(single, 5)).toBe(false);
  });

  it("does not depend on call order", () => {
    const forward = [0, 1, 2, 3, 4, 5, 6].map((f) => actionStep(bounded, f));
    const backward = [6, 5, 4, 3, 2, 1, 0].map((f) => actionStep(bounded, f)).reverse();
    expect(backward).toEqual(forward);
  });
});
