/**
 * Shape search over parsed JSON documents
 *
 * Hydration blobs nest the data we want at unpredictable paths, so the
 * lookup is structural: walk the tree and test every node against a shape
 * predicate.
 */

import { isJsonObject, type JsonArray, type JsonObject, type JsonValue } from "../lib/json";

export type JsonPredicate = (node: JsonValue) => boolean;

function safeTest(predicate: JsonPredicate, node: JsonValue): boolean {
  try {
    return predicate(node);
  } catch {
    // a predicate that trips over an odd node simply does not match it
    return false;
  }
}

function children(node: JsonValue): JsonValue[] {
  if (Array.isArray(node)) return node;
  if (isJsonObject(node)) return Object.values(node);
  return [];
}

/**
 * Pre-order walk (node before its children; object values, then array
 * elements, in document order). Iterative so deeply nested blobs cannot
 * exhaust the call stack. `visit` returns true to stop the walk.
 */
function walk(root: JsonValue, visit: (node: JsonValue) => boolean): void {
  const stack: JsonValue[] = [root];
  for (let node = stack.pop(); node !== undefined; node = stack.pop()) {
    if (visit(node)) return;
    const kids = children(node);
    for (let i = kids.length - 1; i >= 0; i--) {
      stack.push(kids[i]);
    }
  }
}

export function searchFirst(document: JsonValue, predicate: JsonPredicate): JsonValue | undefined {
  let found: JsonValue | undefined;
  walk(document, (node) => {
    if (safeTest(predicate, node)) {
      found = node;
      return true;
    }
    return false;
  });
  return found;
}

export function searchAll(document: JsonValue, predicate: JsonPredicate): JsonValue[] {
  const found: JsonValue[] = [];
  walk(document, (node) => {
    if (safeTest(predicate, node)) found.push(node);
    return false;
  });
  return found;
}

const ROUND_KEYS = ["round", "round_number", "week"] as const;

/**
 * Non-empty array whose first element is an object carrying `id` and a
 * round-like key.
 */
export function looksLikeMatchList(node: JsonValue): node is JsonArray {
  if (!Array.isArray(node) || node.length === 0) return false;
  const first = node[0];
  return isJsonObject(first) && "id" in first && ROUND_KEYS.some((key) => key in first);
}

/**
 * Object with home (`h`) and away (`a`) shot arrays.
 */
export function looksLikeShotPair(node: JsonValue): node is JsonObject & { h: JsonArray; a: JsonArray } {
  return isJsonObject(node) && Array.isArray(node.h) && Array.isArray(node.a);
}
