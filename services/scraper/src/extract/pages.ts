/**
 * Page-level extraction: league pages -> match refs, match pages -> shots.
 *
 * Each tries the legacy script variables first and falls back to the
 * hydration blob. A strategy only wins if it yields at least one row.
 */

import type { MatchRef } from "@shotmaps/shared";
import { isJsonObject, tryParseJson, type JsonValue } from "../lib/json";
import { normalizeMatches } from "../normalize/matches";
import { normalizeShots, type NormalizedShots } from "../normalize/shots";
import type { OutcomeOptions } from "../normalize/outcome";
import { looksLikeMatchList, looksLikeShotPair, searchFirst } from "./deepSearch";
import { DEFAULT_HYDRATION_GLOBAL, extractHydrationBlob } from "./hydration";
import { locateJsonBlock } from "./jsonBlock";

export const MATCH_LIST_VARIABLES = ["matchesData", "matches", "datesData"] as const;
export const SHOTS_VARIABLE = "shotsData";

export type ExtractionSource = `${"escaped" | "literal"}:${string}` | "hydration";

export type ExtractedMatchList = {
  source: ExtractionSource;
  matches: MatchRef[];
};

export type ExtractedShots = NormalizedShots & {
  source: ExtractionSource;
};

export type PageExtractionOptions = OutcomeOptions & {
  hydrationGlobal?: string;
  matchListVariables?: readonly string[];
};

function readBlock(markup: string, variableName: string): { source: ExtractionSource; value: JsonValue } | undefined {
  const block = locateJsonBlock(markup, variableName);
  if (!block) return undefined;
  const value = tryParseJson(block.text);
  if (value === undefined) return undefined;
  return { source: `${block.encoding}:${variableName}`, value };
}

export function extractMatchList(
  markup: string,
  options: PageExtractionOptions = {}
): ExtractedMatchList | undefined {
  for (const variableName of options.matchListVariables ?? MATCH_LIST_VARIABLES) {
    const block = readBlock(markup, variableName);
    if (!block || !Array.isArray(block.value)) continue;
    const matches = normalizeMatches(block.value);
    if (matches.length > 0) return { source: block.source, matches };
  }

  const blob = extractHydrationBlob(markup, options.hydrationGlobal ?? DEFAULT_HYDRATION_GLOBAL);
  if (blob === undefined) return undefined;
  const found = searchFirst(blob, looksLikeMatchList);
  if (!Array.isArray(found)) return undefined;
  const matches = normalizeMatches(found);
  return matches.length > 0 ? { source: "hydration", matches } : undefined;
}

export function extractMatchShots(
  markup: string,
  matchId: number,
  options: PageExtractionOptions = {}
): ExtractedShots | undefined {
  const block = readBlock(markup, SHOTS_VARIABLE);
  if (block && isJsonObject(block.value)) {
    const normalized = normalizeShots(matchId, block.value, options);
    if (normalized.shots.length > 0) return { source: block.source, ...normalized };
  }

  const blob = extractHydrationBlob(markup, options.hydrationGlobal ?? DEFAULT_HYDRATION_GLOBAL);
  if (blob === undefined) return undefined;
  const found = searchFirst(blob, looksLikeShotPair);
  if (!isJsonObject(found)) return undefined;
  const normalized = normalizeShots(matchId, found, options);
  return normalized.shots.length > 0 ? { source: "hydration", ...normalized } : undefined;
}
