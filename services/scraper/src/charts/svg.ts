/**
 * Minimal SVG element builders shared by the chart renderers.
 */

import he from "he";

export type Attributes = Record<string, string | number | undefined>;

/** Numbers trimmed to two decimals, without trailing zeros. */
export function fmt(value: number): string {
  return String(Number(value.toFixed(2)));
}

function renderAttributes(attributes: Attributes): string {
  return Object.entries(attributes)
    .filter((entry): entry is [string, string | number] => entry[1] !== undefined)
    .map(([key, value]) => `${key}="${he.escape(typeof value === "number" ? fmt(value) : value)}"`)
    .join(" ");
}

export function element(tag: string, attributes: Attributes, children: string[] = []): string {
  const attrs = renderAttributes(attributes);
  const open = attrs ? `<${tag} ${attrs}` : `<${tag}`;
  return children.length === 0 ? `${open}/>` : `${open}>${children.join("")}</${tag}>`;
}

export function text(content: string, attributes: Attributes): string {
  return `<text ${renderAttributes(attributes)}>${he.escape(content)}</text>`;
}

export function line(x1: number, y1: number, x2: number, y2: number, attributes: Attributes = {}): string {
  return element("line", { x1, y1, x2, y2, stroke: "#333", "stroke-width": 1, ...attributes });
}

export function svgDocument(width: number, height: number, children: string[]): string {
  return (
    `<?xml version="1.0" encoding="UTF-8"?>\n` +
    element(
      "svg",
      {
        xmlns: "http://www.w3.org/2000/svg",
        width,
        height,
        viewBox: `0 0 ${fmt(width)} ${fmt(height)}`,
        "font-family": "sans-serif",
        "font-size": 12,
      },
      [element("rect", { width, height, fill: "#fff" }), ...children]
    ) +
    "\n"
  );
}

/** Round an axis maximum up to a multiple of `step`. */
export function niceMax(value: number, step: number): number {
  return Math.max(step, Math.ceil(value / step) * step);
}
