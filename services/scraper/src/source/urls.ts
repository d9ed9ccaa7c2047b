export const DEFAULT_BASE_URL = "https://understat.com";

export const LEAGUES = ["EPL", "La_liga", "Bundesliga", "Serie_A", "Ligue_1", "RFPL"] as const;

export type League = (typeof LEAGUES)[number];

function trimBase(baseUrl: string): string {
  return baseUrl.replace(/\/+$/, "");
}

export function buildLeagueUrl(baseUrl: string, league: League, season: number): string {
  return `${trimBase(baseUrl)}/league/${league}/${season}`;
}

export function buildMatchUrl(baseUrl: string, matchId: number): string {
  return `${trimBase(baseUrl)}/match/${matchId}`;
}
