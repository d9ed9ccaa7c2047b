/**
 * Embedded JSON block extraction
 *
 * Legacy stats pages declare their data as page-level script variables in
 * one of two shapes:
 *
 *   var shotsData = JSON.parse('\x7B\x22h\x22\x3A...');   (escaped string)
 *   var shotsData = {"h": [...], "a": [...]};             (object/array literal)
 *
 * Both are tried in that order; the first match for the variable wins.
 */

export type JsonBlockEncoding = "escaped" | "literal";

export type JsonBlock = {
  encoding: JsonBlockEncoding;
  text: string;
};

const SIMPLE_ESCAPES: Record<string, string> = {
  n: "\n",
  t: "\t",
  r: "\r",
  b: "\b",
  f: "\f",
  v: "\v",
  a: "\x07",
  "\\": "\\",
  "'": "'",
  '"': '"',
  "\n": "",
};

const ESCAPE_PATTERN = /\\(x[0-9a-fA-F]{2}|u[0-9a-fA-F]{4}|U[0-9a-fA-F]{8}|[0-7]{1,3}|[\s\S])/g;

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Decode backslash escapes inside a single-quoted script string:
 * \xHH, \uHHHH, \UHHHHHHHH, octal \ooo and the single-character escapes.
 * Unknown escapes are left as written.
 */
export function unescapeScriptString(value: string): string {
  return value.replace(ESCAPE_PATTERN, (whole, body: string) => {
    const head = body[0];
    if (head === "x" || head === "u") {
      return String.fromCharCode(parseInt(body.slice(1), 16));
    }
    if (head === "U") {
      const codePoint = parseInt(body.slice(1), 16);
      return codePoint <= 0x10ffff ? String.fromCodePoint(codePoint) : whole;
    }
    if (/^[0-7]+$/.test(body)) {
      return String.fromCharCode(parseInt(body, 8));
    }
    return SIMPLE_ESCAPES[body] ?? whole;
  });
}

export function findEscapedBlock(markup: string, variableName: string): string | undefined {
  const pattern = new RegExp(
    `var\\s+${escapeRegExp(variableName)}\\s*=\\s*JSON\\.parse\\('(.+?)'\\);`,
    "s"
  );
  const match = pattern.exec(markup);
  return match ? unescapeScriptString(match[1]) : undefined;
}

export function findLiteralBlock(markup: string, variableName: string): string | undefined {
  const pattern = new RegExp(
    `var\\s+${escapeRegExp(variableName)}\\s*=\\s*(\\{.*?\\}|\\[.*?\\]);`,
    "s"
  );
  const match = pattern.exec(markup);
  return match ? match[1] : undefined;
}

/**
 * Locate the JSON text declared for `variableName`, along with the encoding
 * it was found in. Returns undefined when the page declares no such block.
 */
export function locateJsonBlock(markup: string, variableName: string): JsonBlock | undefined {
  const escaped = findEscapedBlock(markup, variableName);
  if (escaped !== undefined) {
    return { encoding: "escaped", text: escaped };
  }
  const literal = findLiteralBlock(markup, variableName);
  if (literal !== undefined) {
    return { encoding: "literal", text: literal };
  }
  return undefined;
}

export function extractJsonBlock(markup: string, variableName: string): string | undefined {
  return locateJsonBlock(markup, variableName)?.text;
}
