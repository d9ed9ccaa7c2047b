import { describe, it, expect } from "vitest";
import { extractMatchList, extractMatchShots } from "../pages";

const shot = (player: string, result: string) => ({
  x: "0.9",
  y: "0.5",
  minute: "10",
  xG: "0.3",
  player,
  result,
  h_a: "h",
});

describe("extractMatchList", () => {
  it("prefers the legacy block", () => {
    const markup = `var datesData = JSON.parse('[{"id":"11","round":"1","datetime":"2024-08-17"}]');`;
    expect(extractMatchList(markup)).toEqual({
      source: "escaped:datesData",
      matches: [{ id: 11, round: 1, date: "2024-08-17" }],
    });
  });

  it("moves past legacy blocks that normalize to nothing", () => {
    const markup = [
      `var matchesData = JSON.parse('[{"round":"1"}]');`,
      `var matches = [{"id":"12","round":"2","date":"2024-08-24"}];`,
    ].join("\n");
    expect(extractMatchList(markup)).toEqual({
      source: "literal:matches",
      matches: [{ id: 12, round: 2, date: "2024-08-24" }],
    });
  });

  it("falls back to the hydration blob", () => {
    const markup = `window.__NUXT__ = {"league": {"fixtures": [{"id": 13, "week": 3, "date": "2024-08-31"}]}};`;
    expect(extractMatchList(markup)).toEqual({
      source: "hydration",
      matches: [{ id: 13, round: 3, date: "2024-08-31" }],
    });
  });

  it("returns undefined when no strategy yields a match", () => {
    expect(extractMatchList("<html>maintenance</html>")).toBeUndefined();
  });
});

describe("extractMatchShots", () => {
  it("reads shotsData and reports its source", () => {
    const payload = JSON.stringify({ h: [shot("A", "Goal")], a: [] });
    const extracted = extractMatchShots(`var shotsData = JSON.parse('${payload}');`, 5);
    expect(extracted?.source).toBe("escaped:shotsData");
    expect(extracted?.shots.map((s) => [s.match_id, s.player, s.outcome])).toEqual([[5, "A", "goal"]]);
  });

  it("falls back to the hydration blob when the legacy block is empty", () => {
    const blob = JSON.stringify({ match: { shots: { h: [], a: [shot("B", "Missed")] } } });
    const markup = `var shotsData = JSON.parse('{"h":[],"a":[]}');\nwindow.__NUXT__ = ${blob};`;
    const extracted = extractMatchShots(markup, 6);
    expect(extracted?.source).toBe("hydration");
    expect(extracted?.shots.map((s) => s.outcome)).toEqual(["off_target"]);
  });

  it("passes strict outcome handling through", () => {
    const payload = JSON.stringify({ h: [shot("C", "Own Goal")], a: [] });
    const extracted = extractMatchShots(`var shotsData = JSON.parse('${payload}');`, 7, { strict: true });
    expect(extracted?.shots[0].outcome).toBe("unknown");
  });

  it("returns undefined when nothing parses", () => {
    expect(extractMatchShots("var shotsData = JSON.parse('not json');", 8)).toBeUndefined();
  });
});
