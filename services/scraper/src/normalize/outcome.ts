import type { OutcomeLabel, ShotOutcome } from "@shotmaps/shared";

const OUTCOME_MAP: Record<string, ShotOutcome> = {
  goal: "goal",
  saved: "saved",
  blocked: "blocked",
  missed: "off_target",
  shot_on_post: "off_target",
};

export type OutcomeOptions = {
  /** Map unrecognized labels to "unknown" instead of passing them through */
  strict?: boolean;
};

/**
 * Map a raw shot result label ("Goal", "Missed", "Shot On Post", ...) to
 * the outcome vocabulary. Unmapped non-empty labels are passed through in
 * their lower_snake form unless `strict` is set.
 */
export function normalizeOutcome(raw: unknown, options: OutcomeOptions = {}): OutcomeLabel {
  const key = typeof raw === "string" ? raw.toLowerCase().replaceAll(" ", "_") : "";
  const mapped = OUTCOME_MAP[key];
  if (mapped) return mapped;
  if (!key || options.strict) return "unknown";
  return key;
}
