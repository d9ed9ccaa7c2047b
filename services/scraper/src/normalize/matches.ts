import type { MatchRef } from "@shotmaps/shared";
import { isJsonObject, type JsonValue } from "../lib/json";
import { firstTruthy, toInteger, toText } from "./coerce";

const ROUND_KEYS = ["round", "round_number", "week"] as const;
const DATE_KEYS = ["datetime", "date"] as const;

/**
 * Convert raw fixture records into match refs, in input order. Records
 * without a usable integer `id` are dropped; an unreadable round is kept as
 * null.
 */
export function normalizeMatches(rawMatches: readonly JsonValue[]): MatchRef[] {
  const out: MatchRef[] = [];
  for (const raw of rawMatches) {
    if (!isJsonObject(raw)) continue;

    const id = toInteger(raw.id);
    if (id === undefined) continue;

    const round = toInteger(firstTruthy(raw, ROUND_KEYS));
    out.push({
      id,
      round: round ?? null,
      date: toText(firstTruthy(raw, DATE_KEYS)),
    });
  }
  return out;
}
