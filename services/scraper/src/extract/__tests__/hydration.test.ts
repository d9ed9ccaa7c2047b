import { describe, it, expect } from "vitest";
import { replaceUndefinedTokens, stripTrailingCommas } from "../../lib/json";
import { extractHydrationBlob, parseHydrationText } from "../hydration";

describe("hydration repair", () => {
  it("turns undefined values into null and drops trailing commas", () => {
    const parsed = parseHydrationText('{"foo": undefined, "list": [1, 2,], "bar": 1,}');
    expect(parsed).toEqual({ foo: null, list: [1, 2], bar: 1 });
  });

  it("leaves string contents alone", () => {
    expect(replaceUndefinedTokens('{"a":"undefined","b":undefined}')).toBe('{"a":"undefined","b":null}');
    expect(stripTrailingCommas('{"a":"x,]","b":[1,]}')).toBe('{"a":"x,]","b":[1]}');
  });

  it("does not touch identifiers that merely contain the word", () => {
    expect(replaceUndefinedTokens("[undefinedValue, undefined]")).toBe("[undefinedValue, null]");
  });

  it("yields undefined when the text cannot be repaired", () => {
    expect(parseHydrationText("{foo: 1}")).toBeUndefined();
  });
});

describe("extractHydrationBlob", () => {
  it("parses the global assignment", () => {
    const markup = '<script>window.__NUXT__ = {"state": {"shots": {"h": [], "a": [],}}, "x": undefined};</script>';
    expect(extractHydrationBlob(markup)).toEqual({ state: { shots: { h: [], a: [] } }, x: null });
  });

  it("honours a custom global name", () => {
    expect(extractHydrationBlob('window.__STATE__ = {"ok": true};', "__STATE__")).toEqual({ ok: true });
  });

  it("yields undefined without a blob", () => {
    expect(extractHydrationBlob("<html></html>")).toBeUndefined();
  });
});
