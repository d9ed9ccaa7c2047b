/**
 * JSON utilities for page-embedded data
 */

export type JsonPrimitive = null | boolean | number | string;
export type JsonArray = JsonValue[];
export type JsonObject = { [key: string]: JsonValue };
export type JsonValue = JsonPrimitive | JsonArray | JsonObject;

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parse JSON text, returning undefined instead of throwing on bad input.
 */
export function tryParseJson(text: string): JsonValue | undefined {
  try {
    const value: JsonValue = JSON.parse(text);
    return value;
  } catch {
    return undefined;
  }
}

/**
 * Rewrite `text` outside of double-quoted string literals. `rewrite` is asked
 * at every position and returns a replacement plus how many characters it
 * consumed, or undefined to copy one character through.
 */
function rewriteOutsideStrings(
  text: string,
  rewrite: (text: string, index: number) => { replacement: string; consumed: number } | undefined
): string {
  let out = "";
  let inString = false;
  let i = 0;

  while (i < text.length) {
    const ch = text[i];

    if (inString) {
      out += ch;
      if (ch === "\\" && i + 1 < text.length) {
        out += text[i + 1];
        i += 2;
        continue;
      }
      if (ch === '"') inString = false;
      i += 1;
      continue;
    }

    if (ch === '"') {
      inString = true;
      out += ch;
      i += 1;
      continue;
    }

    const result = rewrite(text, i);
    if (result) {
      out += result.replacement;
      i += result.consumed;
      continue;
    }

    out += ch;
    i += 1;
  }

  return out;
}

const IDENTIFIER_CHAR = /[A-Za-z0-9_$]/;
const UNDEFINED = "undefined";

/**
 * Replace the bare JavaScript token `undefined` with `null`.
 */
export function replaceUndefinedTokens(text: string): string {
  return rewriteOutsideStrings(text, (source, index) => {
    if (!source.startsWith(UNDEFINED, index)) return undefined;
    const prev = source.charAt(index - 1);
    const next = source.charAt(index + UNDEFINED.length);
    if ((prev && IDENTIFIER_CHAR.test(prev)) || (next && IDENTIFIER_CHAR.test(next))) return undefined;
    return { replacement: "null", consumed: UNDEFINED.length };
  });
}

/**
 * Drop commas that directly precede a closing brace or bracket.
 */
export function stripTrailingCommas(text: string): string {
  const trailingComma = /,\s*(?=[}\]])/y;
  return rewriteOutsideStrings(text, (source, index) => {
    trailingComma.lastIndex = index;
    const match = trailingComma.exec(source);
    return match ? { replacement: "", consumed: match[0].length } : undefined;
  });
}
