/**
 * Tests for the Fuzzy Matcher
 */

import { describe, it, expect } from "vitest";
import { matchMarkets, ratio, tokenSetScore } from "@/search/matcher";
import { normalizeText } from "@/search/normalizer";
import { createSnapshot, REALISTIC_QUESTIONS, SHUTDOWN_QUESTIONS } from "../fixtures/markets";

describe("ratio", () => {
  it("should score identical strings 100", () => {
    expect(ratio("bitcoin", "bitcoin")).toBe(100);
  });

  it("should score twice the common subsequence over the combined length", () => {
    // "ittn" is common: 2 * 4 / 13
    expect(ratio("kitten", "sitting")).toBeCloseTo(61.538462, 5);
    expect(ratio("shutdown", "shutdown 2025")).toBeCloseTo(76.190476, 5);
  });

  it("should score two empty strings 0", () => {
    expect(ratio("", "")).toBe(0);
  });
});

describe("tokenSetScore", () => {
  it("should ignore word order", () => {
    expect(tokenSetScore("bitcoin 2027", "2027 bitcoin")).toBe(100);
    expect(tokenSetScore("2027 bitcoin", "will bitcoin hit 200k in 2027")).toBe(
      tokenSetScore("bitcoin 2027", "will bitcoin hit 200k in 2027")
    );
  });

  it("should score 100 when every query word is in the question", () => {
    expect(
      tokenSetScore("trump department education", "will trump end department of education in 2025")
    ).toBe(100);
  });

  it("should ignore repeated words", () => {
    expect(tokenSetScore("fed fed rates", "fed rates")).toBe(100);
  });

  it("should score partial overlap from the shared words", () => {
    // ratio("shutdown", "shutdown 2025") = 2 * 8 / 21
    expect(tokenSetScore("shutdown 2025", "government shutdown in october")).toBe(76.2);
  });

  it("should reward a partial keyword match above the cutoff", () => {
    // ratio("cut fed", "cut fed rate") = 2 * 7 / 19
    expect(tokenSetScore("fed rate cut", normalizeText("Will the Fed cut rates in December?"))).toBe(73.7);
  });

  it("should compare the leftovers when they are close", () => {
    // "shutdown 2025" vs "shutdown 2024 in": 12 common characters over 29
    expect(tokenSetScore("shutdown 2025", "shutdown in 2024")).toBe(82.8);
    // "shutdown 2025" vs "shutdown 2024 end": 12 common characters over 30
    expect(tokenSetScore("shutdown 2025", "shutdown end 2024")).toBe(80);
  });

  it("should score unrelated text low", () => {
    expect(tokenSetScore("alien invasion xyz123", "will bitcoin reach 200k by end of 2027")).toBeLessThan(60);
  });

  it("should score empty input 0", () => {
    expect(tokenSetScore("", "bitcoin")).toBe(0);
    expect(tokenSetScore("bitcoin", "")).toBe(0);
  });
});

describe("matchMarkets", () => {
  it("should rank candidates by descending score", () => {
    const catalog = createSnapshot(SHUTDOWN_QUESTIONS);
    const candidates = matchMarkets("shutdown 2025", catalog);

    expect(candidates.map((c) => c.market.id)).toEqual(["m5", "m3", "m1", "m4", "m2"]);
    expect(candidates.map((c) => c.score)).toEqual([80, 78.8, 77.4, 76.5, 76.2]);
  });

  it("should normalize question text before scoring", () => {
    const catalog = createSnapshot(["Will Trump end Department of Education in 2025?"]);
    const [top] = matchMarkets("trump department education", catalog);
    expect(top?.score).toBe(100);
  });

  it("should drop candidates below the cutoff", () => {
    const catalog = createSnapshot(SHUTDOWN_QUESTIONS);
    const candidates = matchMarkets("shutdown 2025", catalog, { scoreCutoff: 77 });
    expect(candidates.map((c) => c.score)).toEqual([80, 78.8, 77.4]);
  });

  it("should cap the number of candidates", () => {
    const catalog = createSnapshot(SHUTDOWN_QUESTIONS);
    const candidates = matchMarkets("shutdown 2025", catalog, { maxCandidates: 2 });
    expect(candidates.map((c) => c.market.id)).toEqual(["m5", "m3"]);
  });

  it("should keep catalog order for equal scores", () => {
    const catalog = createSnapshot([
      "Bitcoin above 100k in 2027?",
      "Will Bitcoin hit 200k in 2027?",
      "Bitcoin 2027 all time high?",
    ]);
    const candidates = matchMarkets("bitcoin 2027", catalog);
    expect(candidates.map((c) => c.market.id)).toEqual(["m1", "m2", "m3"]);
    expect(candidates.every((c) => c.score === 100)).toBe(true);
  });

  it("should produce the same ranking for reordered queries", () => {
    const catalog = createSnapshot([...REALISTIC_QUESTIONS, "Bitcoin above 100k in 2027?"]);
    expect(matchMarkets("2027 bitcoin", catalog)).toEqual(matchMarkets("bitcoin 2027", catalog));
  });

  it("should return nothing for an unrelated query", () => {
    const catalog = createSnapshot(REALISTIC_QUESTIONS);
    expect(matchMarkets("alien invasion xyz123", catalog)).toEqual([]);
  });

  it("should match a keyword query against a longer question", () => {
    const catalog = createSnapshot(["Will the Fed cut rates in December?"]);
    expect(matchMarkets("fed rate cut", catalog)).toEqual([{ market: catalog.markets[0], score: 73.7 }]);
  });

  it("should return nothing for an empty catalog", () => {
    expect(matchMarkets("bitcoin", createSnapshot([]))).toEqual([]);
  });
});
