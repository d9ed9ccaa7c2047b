import { describe, it, expect } from "vitest";
import { ValidationError } from "../../lib/errors";
import { calcConversion } from "../conversion";
import { aggregateByPlayer, topShooters } from "../playerTotals";
import { calcShotMap, markerFor, markerSize } from "../shotMap";
import { calcXgVsGoals } from "../xgVsGoals";
import { chartShot, playerShots } from "./helpers";

const rows = [
  ...playerShots("Player Ay", 10, 3),
  ...playerShots("Player Bee", 12, 6),
  ...playerShots("Player Cee", 2, 2),
];

describe("aggregateByPlayer / topShooters", () => {
  it("totals shots, goals and xG per player", () => {
    const totals = aggregateByPlayer(rows);
    expect(totals.map(({ player, shots, goals }) => [player, shots, goals])).toEqual([
      ["Player Ay", 10, 3],
      ["Player Bee", 12, 6],
      ["Player Cee", 2, 2],
    ]);
    expect(totals[1].totalXg).toBeCloseTo(1.2, 10);
  });

  it("ranks by shot count with name order on ties", () => {
    expect(topShooters(rows, 2)).toEqual(["Player Bee", "Player Ay"]);
    expect(topShooters([...playerShots("Zed", 2, 0), ...playerShots("Abe", 2, 0)])).toEqual(["Abe", "Zed"]);
  });
});

describe("calcConversion", () => {
  it("keeps players over the threshold, best first", () => {
    expect(calcConversion(rows, { minShots: 10 })).toEqual([
      { player: "Player Bee", shots: 12, goals: 6, conversion: 0.5 },
      { player: "Player Ay", shots: 10, goals: 3, conversion: 0.3 },
    ]);
  });

  it("limits to topN", () => {
    expect(calcConversion(rows, { minShots: 1, topN: 1 }).map((e) => e.player)).toEqual(["Player Cee"]);
  });

  it("fails when nobody qualifies", () => {
    expect(() => calcConversion(rows, { minShots: 20 })).toThrow(ValidationError);
  });
});

describe("calcXgVsGoals", () => {
  it("flags the top scorers for labels", () => {
    const entries = calcXgVsGoals(rows, { minShots: 10, labelTop: 1 });
    expect(entries.map(({ player, goals, labelled }) => [player, goals, labelled])).toEqual([
      ["Player Ay", 3, false],
      ["Player Bee", 6, true],
    ]);
  });
});

describe("calcShotMap", () => {
  it("folds shots onto one half and sizes markers by xG", () => {
    const points = calcShotMap(
      [
        chartShot("Player Ay", "goal", { x: 95, xg: 0.5 }),
        chartShot("Player Ay", "blocked", { x: 40, xg: 2 }),
        chartShot("Player Bee", "goal"),
      ],
      "Player Ay"
    );
    expect(points).toEqual([
      { x: 10, y: 34, outcome: "goal", marker: "circle", size: 90, xg: 0.5 },
      { x: 40, y: 34, outcome: "blocked", marker: "cross", size: 150, xg: 2 },
    ]);
  });

  it("maps outcomes to markers", () => {
    expect(["goal", "saved", "blocked", "off_target", "savedshot"].map(markerFor)).toEqual([
      "circle",
      "square",
      "cross",
      "triangle",
      "circle",
    ]);
    expect(markerSize(-1)).toBe(30);
  });

  it("fails for a player without shots", () => {
    expect(() => calcShotMap(rows, "Nobody")).toThrow("no shots found for player: Nobody");
  });
});
