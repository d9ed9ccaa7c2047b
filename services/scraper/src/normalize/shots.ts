/**
 * Raw shot records -> shot table rows
 *
 * Page coordinates are fractions of the pitch measured from the attacking
 * side's own goal line (x) and from the far touchline (y); rows carry meters
 * with y flipped so that 0 is the near touchline.
 */

import { PITCH_LENGTH, PITCH_WIDTH, type Shot } from "@shotmaps/shared";
import { isJsonObject, type JsonObject, type JsonValue } from "../lib/json";
import { roundTo, toDigitString, toFloat, toText } from "./coerce";
import { normalizeOutcome, type OutcomeOptions } from "./outcome";

export type RequiredShotField = "x" | "y" | "minute" | "xG";

export type ShotParseResult =
  | { ok: true; shot: Shot }
  | { ok: false; field: RequiredShotField | null; reason: string };

export type DroppedShot = {
  side: "h" | "a";
  index: number;
  field: RequiredShotField | null;
  reason: string;
};

export type NormalizedShots = {
  shots: Shot[];
  dropped: DroppedShot[];
};

const SIDES = ["h", "a"] as const;
const COORDINATE_DECIMALS = 4;

export function toPitchMeters(xRaw: number, yRaw: number): { x: number; y: number } {
  return {
    x: roundTo(xRaw * PITCH_LENGTH, COORDINATE_DECIMALS),
    y: roundTo((1 - yRaw) * PITCH_WIDTH, COORDINATE_DECIMALS),
  };
}

function readNumber(
  raw: JsonObject,
  field: RequiredShotField
): { ok: true; value: number } | { ok: false; field: RequiredShotField; reason: string } {
  if (!(field in raw) || raw[field] === null) {
    return { ok: false, field, reason: `missing ${field}` };
  }
  const value = toFloat(raw[field]);
  if (value === undefined) {
    return { ok: false, field, reason: `${field} is not numeric: ${JSON.stringify(raw[field])}` };
  }
  return { ok: true, value };
}

/**
 * Coerce one raw shot record. Any required numeric field that is missing or
 * unreadable yields a dropped result naming the field.
 */
export function parseShot(matchId: number, raw: JsonValue, options: OutcomeOptions = {}): ShotParseResult {
  if (!isJsonObject(raw)) {
    return { ok: false, field: null, reason: "record is not an object" };
  }

  const x = readNumber(raw, "x");
  if (!x.ok) return x;
  const y = readNumber(raw, "y");
  if (!y.ok) return y;
  const minute = readNumber(raw, "minute");
  if (!minute.ok) return minute;
  if (minute.value < 0) {
    return { ok: false, field: "minute", reason: `minute is negative: ${minute.value}` };
  }
  const xg = readNumber(raw, "xG");
  if (!xg.ok) return xg;

  const position = toPitchMeters(x.value, y.value);
  const playerId = toDigitString(raw.player_id);

  return {
    ok: true,
    shot: {
      match_id: matchId,
      date: toText(raw.date),
      player: toText(raw.player),
      team: toText(raw.team),
      minute: Math.trunc(minute.value),
      x: position.x,
      y: position.y,
      xg: xg.value,
      outcome: normalizeOutcome(raw.result, options),
      is_penalty: Number(toDigitString(raw.isPenalty) ?? 0) !== 0,
      player_id: playerId === undefined ? null : Number.parseInt(playerId, 10),
      h_a: toText(raw.h_a),
      situation: toText(raw.situation),
      shotType: toText(raw.shotType),
      assisted_by: toText(raw.player_assisted),
      lastAction: toText(raw.lastAction),
    },
  };
}

/**
 * Normalize a match's home then away shot arrays, keeping input order and
 * collecting every dropped record with its reason.
 */
export function normalizeShots(
  matchId: number,
  container: JsonObject,
  options: OutcomeOptions = {}
): NormalizedShots {
  const shots: Shot[] = [];
  const dropped: DroppedShot[] = [];

  for (const side of SIDES) {
    const records = container[side];
    if (!Array.isArray(records)) continue;

    records.forEach((raw, index) => {
      const result = parseShot(matchId, raw, options);
      if (result.ok) {
        shots.push(result.shot);
      } else {
        dropped.push({ side, index, field: result.field, reason: result.reason });
      }
    });
  }

  return { shots, dropped };
}
