/**
 * A fixture as listed on a league season page.
 */
export type MatchRef = {
  id: number; // unique within a season
  round: number | null; // null when the page carries no usable round
  date: string; // ISO-ish "YYYY-MM-DD HH:mm:ss", may be ""
};
