/**
 * Result Classifier
 *
 * Decides whether a ranked candidate list is one confident match, a
 * disambiguation list, or nothing. A very high score is trusted even among
 * weaker candidates; a cluster of medium scores is returned as a list.
 */

import type { ClassifiedResult, ClassifyOptions, MatchCandidate } from "./types";

export const DEFAULT_CLASSIFY_OPTIONS: ClassifyOptions = {
  scoreCutoff: 60,
  maxCandidates: 5,
  highConfidenceThreshold: 85,
  ambiguityMargin: 1,
};

/**
 * Classify ranked candidates for `query`
 *
 * Candidates below the cutoff are dropped and the rest capped at
 * `maxCandidates` before the rules apply:
 * 1. nothing left: none
 * 2. one left, or the top clears the high-confidence threshold with the
 *    runner-up more than `ambiguityMargin` behind: single
 * 3. otherwise: multiple
 */
export function classifyMatches(
  candidates: readonly MatchCandidate[],
  query: string,
  options: Partial<ClassifyOptions> = {}
): ClassifiedResult {
  const { scoreCutoff, maxCandidates, highConfidenceThreshold, ambiguityMargin } = {
    ...DEFAULT_CLASSIFY_OPTIONS,
    ...options,
  };

  const eligible = candidates
    .filter((candidate) => candidate.score >= scoreCutoff)
    .sort((a, b) => b.score - a.score)
    .slice(0, Math.max(0, maxCandidates));

  const [top, runnerUp] = eligible;
  if (top === undefined) {
    return { kind: "none", query };
  }

  if (
    runnerUp === undefined ||
    (top.score > highConfidenceThreshold && top.score - runnerUp.score > ambiguityMargin)
  ) {
    return { kind: "single", candidate: top };
  }

  return { kind: "multiple", candidates: eligible };
}
