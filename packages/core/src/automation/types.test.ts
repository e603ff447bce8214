import { describe, it, expect } from "vitest";
import { ACTION_KINDS, actionPriority, createAction, isActionKind, isTimeBased } from "./types.js";

describe("action definitions", () => {
  it("marks step-driven kinds as time-based", () => {
    const timeBased = ACTION_KINDS.filter((kind) => isTimeBased(createAction(kind)));
    expect(timeBased).toEqual(["scroll", "rotate", "bounce", "wipe", "reveal", "radial"]);
    expect(isTimeBased(createAction("mirror"))).toBe(false);
    expect(isTimeBased(createAction("invert"))).toBe(false);
  });

  it("recognizes kinds by name", () => {
    expect(isActionKind("radial")).toBe(true);
    expect(isActionKind("flip")).toBe(false);
  });

  it("builds actions from defaults and overrides", () => {
    const action = createAction("scroll", 2, 5, { direction: "up" });
    expect(action).toEqual({
      startFrame: 2,
      endFrame: 5,
      params: { kind: "scroll", direction: "up", offset: 1 },
    });
    expect(actionPriority(createAction("radial"))).toBe(70);
  });
});
