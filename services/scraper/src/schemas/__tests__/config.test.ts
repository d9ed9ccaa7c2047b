import { describe, it, expect } from "vitest";
import { ValidationError } from "../../lib/errors";
import { ChartConfigSchema, FetchConfigSchema, parseConfig } from "../config";

describe("FetchConfigSchema", () => {
  it("coerces flag strings and fills defaults", () => {
    const config = parseConfig(FetchConfigSchema, { season: "2024", toRound: "10", debug: "true" });
    expect(config).toEqual({
      season: 2024,
      league: "EPL",
      toRound: 10,
      outputPath: "data/shots_2024.csv",
      debug: true,
      debugDir: ".",
      delayMs: 600,
      jitterMs: 400,
      strictOutcomes: false,
      baseUrl: "https://understat.com",
    });
  });

  it("rejects an inverted round range", () => {
    expect(() => parseConfig(FetchConfigSchema, { season: 2024, fromRound: 5, toRound: 2 })).toThrow(
      "invalid configuration: fromRound: fromRound must not exceed toRound"
    );
  });

  it("lists every invalid field", () => {
    let caught: unknown;
    try {
      parseConfig(FetchConfigSchema, { season: "abc", limitMostRecent: "0", league: "MLS" });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ValidationError);
    const message = caught instanceof ValidationError ? caught.message : "";
    expect(message).toMatch(/^invalid configuration: /);
    expect(message).toContain("season: ");
    expect(message).toContain("league: ");
    expect(message).toContain("limitMostRecent: ");
  });

  it("does not read an unknown boolean word as true", () => {
    expect(() => parseConfig(FetchConfigSchema, { season: 2024, debug: "yes" })).toThrow(ValidationError);
  });
});

describe("ChartConfigSchema", () => {
  it("requires the csv path and defaults the rest", () => {
    expect(parseConfig(ChartConfigSchema, { csv: "data/shots_2024.csv" })).toEqual({
      csv: "data/shots_2024.csv",
      minShots: 10,
      outDir: "out",
    });
    expect(() => parseConfig(ChartConfigSchema, {})).toThrow(ValidationError);
  });
});
