import { describe, it, expect } from "vitest";
import { firstTruthy, roundTo, toDigitString, toFloat, toInteger, toText } from "../coerce";

describe("toInteger", () => {
  it("reads integer text and truncates numbers", () => {
    expect(toInteger("12")).toBe(12);
    expect(toInteger(" -3 ")).toBe(-3);
    expect(toInteger(7.9)).toBe(7);
  });

  it("rejects decimal text, empty text and non-finite numbers", () => {
    expect(toInteger("7.5")).toBeUndefined();
    expect(toInteger("")).toBeUndefined();
    expect(toInteger(Number.NaN)).toBeUndefined();
    expect(toInteger(null)).toBeUndefined();
  });
});

describe("toFloat", () => {
  it("reads decimal text", () => {
    expect(toFloat("0.0761")).toBe(0.0761);
    expect(toFloat(".5")).toBe(0.5);
    expect(toFloat("1e-2")).toBe(0.01);
  });

  it("rejects text that is not a number", () => {
    expect(toFloat("abc")).toBeUndefined();
    expect(toFloat("")).toBeUndefined();
    expect(toFloat("Infinity")).toBeUndefined();
    expect(toFloat({})).toBeUndefined();
  });
});

describe("toDigitString", () => {
  it("accepts digit-only text and non-negative integers", () => {
    expect(toDigitString("8865")).toBe("8865");
    expect(toDigitString(42)).toBe("42");
  });

  it("rejects signs, spaces and words", () => {
    expect(toDigitString("-1")).toBeUndefined();
    expect(toDigitString(" 1")).toBeUndefined();
    expect(toDigitString("yes")).toBeUndefined();
    expect(toDigitString(1.5)).toBeUndefined();
  });
});

describe("toText / firstTruthy / roundTo", () => {
  it("stringifies finite numbers and blanks everything else", () => {
    expect(toText("Head")).toBe("Head");
    expect(toText(3)).toBe("3");
    expect(toText(null)).toBe("");
  });

  it("skips falsy values like an or-chain", () => {
    expect(firstTruthy({ round: 0, round_number: "", week: 5 }, ["round", "round_number", "week"])).toBe(5);
    expect(firstTruthy({}, ["round"])).toBeUndefined();
  });

  it("rounds to the requested decimals", () => {
    expect(roundTo(92.92500001, 4)).toBe(92.925);
  });
});
