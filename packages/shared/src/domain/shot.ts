export type ShotOutcome = "goal" | "saved" | "blocked" | "off_target" | "unknown";

/**
 * Outcome column value. Labels the normalizer does not map are passed
 * through as-is unless strict mode is on, so the column is open-ended.
 */
export type OutcomeLabel = ShotOutcome | (string & {});

export type Shot = {
  readonly match_id: number;
  readonly date: string;
  readonly player: string;
  readonly team: string;
  readonly minute: number; // >= 0
  readonly x: number; // meters from own goal line, 0..105
  readonly y: number; // meters, 0..68
  readonly xg: number; // 0..1 nominal
  readonly outcome: OutcomeLabel;
  readonly is_penalty: boolean;
  readonly player_id: number | null;
  readonly h_a: string; // "h" | "a" | ""
  readonly situation: string;
  readonly shotType: string;
  readonly assisted_by: string;
  readonly lastAction: string;
};

export type ShotColumn = keyof Shot;

/** Canonical column order of the persisted shot table. */
export const SHOT_COLUMNS = [
  "match_id",
  "date",
  "player",
  "team",
  "minute",
  "x",
  "y",
  "xg",
  "outcome",
  "is_penalty",
  "player_id",
  "h_a",
  "situation",
  "shotType",
  "assisted_by",
  "lastAction",
] as const satisfies readonly ShotColumn[];

/** Minimum columns the chart builders read. */
export const REQUIRED_CHART_COLUMNS = [
  "player",
  "team",
  "minute",
  "x",
  "y",
  "xg",
  "outcome",
] as const satisfies readonly ShotColumn[];

export type ChartColumn = (typeof REQUIRED_CHART_COLUMNS)[number];
