/**
 * Field coercion for loosely typed page records. Each helper returns
 * undefined when the value cannot be read as the requested type.
 */

const INTEGER_TEXT = /^\s*[+-]?\d+\s*$/;
const DECIMAL_TEXT = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const DIGITS = /^\d+$/;

/** Integer, truncating numbers; strings must be plain integer text. */
export function toInteger(value: unknown): number | undefined {
  if (typeof value === "number") {
    return Number.isFinite(value) ? Math.trunc(value) : undefined;
  }
  if (typeof value === "boolean") return value ? 1 : 0;
  if (typeof value === "string" && INTEGER_TEXT.test(value)) {
    return Number.parseInt(value, 10);
  }
  return undefined;
}

/** Finite float from a number, boolean or decimal text. */
export function toFloat(value: unknown): number | undefined {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === "boolean") return value ? 1 : 0;
  if (typeof value === "string") {
    const trimmed = value.trim();
    if (!DECIMAL_TEXT.test(trimmed)) return undefined;
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

/** The value's text when it is made of ASCII digits only. */
export function toDigitString(value: unknown): string | undefined {
  if (typeof value === "number" && Number.isInteger(value) && value >= 0) {
    return String(value);
  }
  if (typeof value === "string" && DIGITS.test(value)) return value;
  return undefined;
}

/** Strings as-is, finite numbers as text, anything else "". */
export function toText(value: unknown): string {
  if (typeof value === "string") return value;
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return "";
}

/** First truthy value among `keys`, the way `a || b || c` reads. */
export function firstTruthy(record: Record<string, unknown>, keys: readonly string[]): unknown {
  for (const key of keys) {
    if (record[key]) return record[key];
  }
  return undefined;
}

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}
