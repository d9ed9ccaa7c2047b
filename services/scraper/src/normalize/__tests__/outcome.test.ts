import { describe, it, expect } from "vitest";
import { normalizeOutcome } from "../outcome";

describe("normalizeOutcome", () => {
  it.each([
    ["Goal", "goal"],
    ["SavedShot", "savedshot"],
    ["Saved", "saved"],
    ["Blocked", "blocked"],
    ["Missed", "off_target"],
    ["Shot On Post", "off_target"],
    ["shot_on_post", "off_target"],
  ])("maps %s to %s", (raw, expected) => {
    expect(normalizeOutcome(raw)).toBe(expected);
  });

  it("passes unmapped labels through in lower_snake form", () => {
    expect(normalizeOutcome("own_goal")).toBe("own_goal");
    expect(normalizeOutcome("Own Goal")).toBe("own_goal");
  });

  it("returns unknown for empty or missing labels", () => {
    expect(normalizeOutcome("")).toBe("unknown");
    expect(normalizeOutcome(null)).toBe("unknown");
    expect(normalizeOutcome(undefined)).toBe("unknown");
  });

  it("returns unknown for unmapped labels in strict mode", () => {
    expect(normalizeOutcome("Own Goal", { strict: true })).toBe("unknown");
    expect(normalizeOutcome("Missed", { strict: true })).toBe("off_target");
  });
});
