import { describe, it, expect } from "vitest";
import type { JsonValue } from "../../lib/json";
import { looksLikeMatchList, looksLikeShotPair, searchAll, searchFirst } from "../deepSearch";

const isNumber = (node: JsonValue) => typeof node === "number";

describe("searchFirst", () => {
  it("walks depth-first in document order", () => {
    const doc: JsonValue = { a: { b: [1, 2] }, c: 3 };
    expect(searchFirst(doc, isNumber)).toBe(1);
  });

  it("tests interior nodes before their children", () => {
    const outer: JsonValue = { h: [], a: [], inner: { h: [], a: [] } };
    expect(searchFirst({ outer }, looksLikeShotPair)).toBe(outer);
  });

  it("treats a throwing predicate as no match and keeps walking", () => {
    const doc: JsonValue = [{ bad: true }, { good: 1 }];
    const found = searchFirst(doc, (node) => {
      if (typeof node === "object" && node !== null && "bad" in node) throw new Error("boom");
      return typeof node === "object" && node !== null && "good" in node;
    });
    expect(found).toEqual({ good: 1 });
  });

  it("returns undefined when nothing matches", () => {
    expect(searchFirst({ a: "x" }, isNumber)).toBeUndefined();
  });
});

describe("searchAll", () => {
  it("collects every match in pre-order", () => {
    const doc: JsonValue = { a: 1, b: [2, { c: 3 }], d: 4 };
    expect(searchAll(doc, isNumber)).toEqual([1, 2, 3, 4]);
  });
});

describe("shape predicates", () => {
  it("recognizes a match list by its first element", () => {
    expect(looksLikeMatchList([{ id: "1", week: 2 }])).toBe(true);
    expect(looksLikeMatchList([{ id: "1" }])).toBe(false);
    expect(looksLikeMatchList([])).toBe(false);
    expect(looksLikeMatchList({ id: "1", round: 1 })).toBe(false);
  });

  it("recognizes a home/away shot pair", () => {
    expect(looksLikeShotPair({ h: [], a: [] })).toBe(true);
    expect(looksLikeShotPair({ h: [], a: {} })).toBe(false);
  });

  it("finds a match list nested in a hydration state", () => {
    const doc: JsonValue = {
      data: [
        { teams: [{ id: 1, title: "Home FC" }] },
        { fixtures: [{ id: "11", round: "1", date: "2024-08-17" }] },
      ],
    };
    expect(searchFirst(doc, looksLikeMatchList)).toEqual([{ id: "11", round: "1", date: "2024-08-17" }]);
  });
});
