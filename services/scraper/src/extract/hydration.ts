/**
 * Framework hydration blob extraction
 *
 * Newer pages drop the per-variable script blocks and instead ship one big
 * state object, e.g. `window.__NUXT__ = {...};`. It is JavaScript rather than
 * JSON, so it is repaired before parsing.
 */

import {
  replaceUndefinedTokens,
  stripTrailingCommas,
  tryParseJson,
  type JsonValue,
} from "../lib/json";
import { escapeRegExp } from "./jsonBlock";

export const DEFAULT_HYDRATION_GLOBAL = "__NUXT__";

export function findHydrationText(markup: string, globalName = DEFAULT_HYDRATION_GLOBAL): string | undefined {
  const pattern = new RegExp(`window\\.${escapeRegExp(globalName)}\\s*=\\s*(\\{.*?\\});`, "s");
  const match = pattern.exec(markup);
  return match ? match[1] : undefined;
}

/**
 * Parse hydration text: `undefined` values become `null`; if that still does
 * not parse, trailing commas are dropped and parsing is retried once.
 */
export function parseHydrationText(text: string): JsonValue | undefined {
  const withNulls = replaceUndefinedTokens(text);
  const parsed = tryParseJson(withNulls);
  if (parsed !== undefined) return parsed;
  return tryParseJson(stripTrailingCommas(withNulls));
}

/**
 * Locate, repair and parse the hydration blob. Never throws; a page without
 * a usable blob yields undefined.
 */
export function extractHydrationBlob(
  markup: string,
  globalName = DEFAULT_HYDRATION_GLOBAL
): JsonValue | undefined {
  const text = findHydrationText(markup, globalName);
  return text === undefined ? undefined : parseHydrationText(text);
}
