import type { MatchRef } from "@shotmaps/shared";

export type MatchFilters = {
  fromRound?: number;
  toRound?: number;
  limitMostRecent?: number;
};

/**
 * Inclusive round bounds. An unknown round counts as 0 for `fromRound` and
 * always passes `toRound`, so it survives an upper bound alone but never a
 * lower one.
 */
export function filterByRound(matches: readonly MatchRef[], filters: MatchFilters): MatchRef[] {
  let selected = [...matches];
  const { fromRound, toRound } = filters;
  if (fromRound !== undefined) {
    selected = selected.filter((m) => (m.round ?? 0) >= fromRound);
  }
  if (toRound !== undefined) {
    selected = selected.filter((m) => m.round === null || m.round <= toRound);
  }
  return selected;
}

/**
 * Round filters, then a stable lexical sort on date, then the most recent N.
 */
export function selectMatches(matches: readonly MatchRef[], filters: MatchFilters): MatchRef[] {
  const sorted = filterByRound(matches, filters).sort((a, b) =>
    a.date < b.date ? -1 : a.date > b.date ? 1 : 0
  );
  const limit = filters.limitMostRecent;
  return limit && limit > 0 ? sorted.slice(-limit) : sorted;
}
