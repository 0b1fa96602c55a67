/**
 * Fuzzy Matcher
 *
 * Scores every market question against a normalized query with a token-set
 * similarity: both strings become sets of unique words, and the score
 * compares the shared words against each side's leftovers. Word order does
 * not matter, and a query whose words all appear in a longer question
 * scores 100.
 */

import type { CatalogSnapshot } from "../api/gamma/types";
import { normalizeText } from "./normalizer";
import type { MatchCandidate, MatchOptions } from "./types";

export const DEFAULT_MATCH_OPTIONS: MatchOptions = {
  scoreCutoff: 60,
  maxCandidates: 5,
};

/**
 * Length of the longest common subsequence, one DP row at a time
 */
function lcsLength(a: string, b: string): number {
  const left = Array.from(a);
  const right = Array.from(b);
  let previous = new Array<number>(right.length + 1).fill(0);
  let current = new Array<number>(right.length + 1).fill(0);

  for (const char of left) {
    for (let j = 1; j <= right.length; j++) {
      const diagonal = previous[j - 1] ?? 0;
      current[j] =
        right[j - 1] === char ? diagonal + 1 : Math.max(previous[j] ?? 0, current[j - 1] ?? 0);
    }
    [previous, current] = [current, previous];
  }

  return previous[right.length] ?? 0;
}

/**
 * Indel similarity scaled to 0-100: 100 * 2 * LCS / (|a| + |b|),
 * i.e. one minus the insertions and deletions needed over the total length
 */
export function ratio(a: string, b: string): number {
  const total = Array.from(a).length + Array.from(b).length;
  if (total === 0) {
    return 0;
  }
  return (200 * lcsLength(a, b)) / total;
}

function tokenSet(text: string): Set<string> {
  return new Set(text.split(" ").filter((token) => token !== ""));
}

function joinSorted(tokens: Iterable<string>): string {
  return Array.from(tokens).sort().join(" ");
}

function withPrefix(prefix: string, rest: string): string {
  if (prefix === "") {
    return rest;
  }
  return rest === "" ? prefix : `${prefix} ${rest}`;
}

/**
 * Token-set similarity of two already-normalized strings
 *
 * With `sect` the sorted shared words and `a`/`b` each side's sorted
 * leftovers, the score is the best of ratio(sect, sect+a),
 * ratio(sect, sect+b) and ratio(sect+a, sect+b).
 */
export function tokenSetScore(left: string, right: string): number {
  const leftTokens = tokenSet(left);
  const rightTokens = tokenSet(right);

  if (leftTokens.size === 0 || rightTokens.size === 0) {
    return 0;
  }

  const shared: string[] = [];
  const leftOnly: string[] = [];
  for (const token of leftTokens) {
    if (rightTokens.has(token)) {
      shared.push(token);
    } else {
      leftOnly.push(token);
    }
  }
  const rightOnly = Array.from(rightTokens).filter((token) => !leftTokens.has(token));

  if (shared.length > 0 && (leftOnly.length === 0 || rightOnly.length === 0)) {
    return 100;
  }

  const sect = joinSorted(shared);
  const combinedLeft = withPrefix(sect, joinSorted(leftOnly));
  const combinedRight = withPrefix(sect, joinSorted(rightOnly));

  const scores = [ratio(combinedLeft, combinedRight)];
  if (sect !== "") {
    scores.push(ratio(sect, combinedLeft), ratio(sect, combinedRight));
  }
  return Math.round(Math.max(...scores) * 10) / 10;
}

/**
 * Rank the catalog against a normalized query
 *
 * @returns Candidates at or above the cutoff, best first, ties in catalog
 * order, at most `maxCandidates`
 */
export function matchMarkets(
  query: string,
  catalog: CatalogSnapshot,
  options: Partial<MatchOptions> = {}
): MatchCandidate[] {
  const { scoreCutoff, maxCandidates } = { ...DEFAULT_MATCH_OPTIONS, ...options };

  if (query === "" || catalog.markets.length === 0 || maxCandidates <= 0) {
    return [];
  }

  const scored: MatchCandidate[] = [];
  for (const market of catalog.markets) {
    const score = tokenSetScore(query, normalizeText(market.question));
    if (score >= scoreCutoff) {
      scored.push({ market, score });
    }
  }

  // Array.prototype.sort is stable, so equal scores keep catalog order
  scored.sort((a, b) => b.score - a.score);
  return scored.slice(0, maxCandidates);
}
