import { describe, it, expect } from "vitest";
import type { JsonObject } from "../../lib/json";
import { normalizeShots, parseShot, toPitchMeters } from "../shots";

function rawShot(overrides: JsonObject = {}): JsonObject {
  return {
    id: "500001",
    minute: "23",
    result: "Goal",
    X: "ignored",
    x: "0.885",
    y: "0.5",
    xG: "0.4312",
    player: "Test Striker",
    h_a: "h",
    player_id: "9001",
    situation: "OpenPlay",
    season: "2024",
    shotType: "RightFoot",
    match_id: "999",
    h_team: "Home FC",
    a_team: "Away FC",
    date: "2024-08-17 14:00:00",
    player_assisted: "Test Winger",
    lastAction: "Pass",
    isPenalty: "0",
    team: "Home FC",
    ...overrides,
  };
}

describe("toPitchMeters", () => {
  it("scales to meters and flips y", () => {
    expect(toPitchMeters(1, 0)).toEqual({ x: 105, y: 68 });
    expect(toPitchMeters(0, 1)).toEqual({ x: 0, y: 0 });
  });

  it("round-trips raw coordinates to 4 decimal places", () => {
    for (const raw of [0.0123, 0.5, 0.885, 0.9731]) {
      const { x, y } = toPitchMeters(raw, raw);
      expect(x / 105).toBeCloseTo(raw, 4);
      expect(1 - y / 68).toBeCloseTo(raw, 4);
    }
  });
});

describe("parseShot", () => {
  it("coerces a complete record", () => {
    const result = parseShot(42, rawShot());
    expect(result).toEqual({
      ok: true,
      shot: {
        match_id: 42,
        date: "2024-08-17 14:00:00",
        player: "Test Striker",
        team: "Home FC",
        minute: 23,
        x: 92.925,
        y: 34,
        xg: 0.4312,
        outcome: "goal",
        is_penalty: false,
        player_id: 9001,
        h_a: "h",
        situation: "OpenPlay",
        shotType: "RightFoot",
        assisted_by: "Test Winger",
        lastAction: "Pass",
      },
    });
  });

  it.each([
    ["1", true],
    ["0", false],
    ["yes", false],
    ["", false],
  ])("reads isPenalty %j as %s", (flag, expected) => {
    const result = parseShot(1, rawShot({ isPenalty: flag }));
    expect(result.ok && result.shot.is_penalty).toBe(expected);
  });

  it("treats an absent penalty flag as false", () => {
    const { isPenalty: _omit, ...raw } = rawShot();
    const result = parseShot(1, raw);
    expect(result.ok && result.shot.is_penalty).toBe(false);
  });

  it("keeps player_id only for digit strings", () => {
    const withLetters = parseShot(1, rawShot({ player_id: "p-12" }));
    expect(withLetters.ok && withLetters.shot.player_id).toBeNull();
  });

  it("defaults optional text fields to empty strings", () => {
    const result = parseShot(1, { x: 0.9, y: 0.4, minute: 88, xG: 0.05 });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.shot.player).toBe("");
    expect(result.shot.assisted_by).toBe("");
    expect(result.shot.h_a).toBe("");
    expect(result.shot.outcome).toBe("unknown");
  });

  it("drops records with missing or non-numeric required fields", () => {
    expect(parseShot(1, rawShot({ x: null }))).toEqual({ ok: false, field: "x", reason: "missing x" });
    expect(parseShot(1, rawShot({ xG: "n/a" }))).toEqual({
      ok: false,
      field: "xG",
      reason: 'xG is not numeric: "n/a"',
    });
    expect(parseShot(1, rawShot({ minute: "-4" }))).toEqual({
      ok: false,
      field: "minute",
      reason: "minute is negative: -4",
    });
    expect(parseShot(1, "shot")).toEqual({ ok: false, field: null, reason: "record is not an object" });
  });
});

describe("normalizeShots", () => {
  it("concatenates home then away and reports dropped records", () => {
    const { shots, dropped } = normalizeShots(7, {
      a: [rawShot({ player: "Away One", h_a: "a" })],
      h: [rawShot({ player: "Home One" }), rawShot({ y: "bad" }), rawShot({ player: "Home Two" })],
    });

    expect(shots.map((s) => s.player)).toEqual(["Home One", "Home Two", "Away One"]);
    expect(dropped).toEqual([{ side: "h", index: 1, field: "y", reason: 'y is not numeric: "bad"' }]);
  });

  it("ignores a side that is not an array", () => {
    const { shots, dropped } = normalizeShots(7, { h: [rawShot()], a: null });
    expect(shots).toHaveLength(1);
    expect(dropped).toEqual([]);
  });
});
