/**
 * Query Normalizer
 *
 * Canonical text form shared by queries and market questions: NFC
 * composed, lowercase, punctuation removed, whitespace collapsed. Letters,
 * combining marks and digits of any script are kept, so vowel signs in
 * Devanagari and decomposed accents survive.
 */

import { QueryValidationError, ValidationReason } from "../lib/errors";

export const DEFAULT_MIN_QUERY_LENGTH = 3;

const DISALLOWED_CHARS = /[^\p{L}\p{M}\p{N}\s]/gu;
const WHITESPACE_RUN = /\s+/g;

export type NormalizeResult =
  | { success: true; query: string }
  | { success: false; error: QueryValidationError };

/**
 * Canonicalize text without validating it
 */
export function normalizeText(raw: string): string {
  return raw
    .normalize("NFC")
    .trim()
    .toLowerCase()
    .replace(DISALLOWED_CHARS, "")
    .replace(WHITESPACE_RUN, " ")
    .trim();
}

/**
 * Canonicalize a user query and check its length
 *
 * @example
 * ```typescript
 * normalizeQuery("  Bitcoin $200k?? ");
 * // { success: true, query: "bitcoin 200k" }
 * normalizeQuery("?!");
 * // { success: false, error: QueryValidationError (TOO_SHORT) }
 * ```
 */
export function normalizeQuery(raw: string, minLength: number = DEFAULT_MIN_QUERY_LENGTH): NormalizeResult {
  if (raw.trim() === "") {
    return {
      success: false,
      error: new QueryValidationError(ValidationReason.EMPTY, "", minLength),
    };
  }

  const query = normalizeText(raw);
  // Length in code points, not UTF-16 units
  if (Array.from(query).length < minLength) {
    return {
      success: false,
      error: new QueryValidationError(ValidationReason.TOO_SHORT, query, minLength),
    };
  }

  return { success: true, query };
}
