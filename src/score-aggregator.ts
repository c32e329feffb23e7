// Interview Coach Engine - Score Aggregator

import type { Metrics, ScoringWeights } from "./types.js";

/** Answers shorter than this (after trimming) skip analysis entirely. */
export const SHORT_ANSWER_MIN_CHARS = 30;

export const SHORT_ANSWER_METRICS: Readonly<Metrics> = Object.freeze({
  relevance: 5,
  confidence: 15,
  clarity: 20,
  score: 13,
});

export const SHORT_ANSWER_FEEDBACK =
  "Response too brief - please provide a detailed answer (at least 45 seconds of speech).";

export function isTooShort(answer: string): boolean {
  return answer.trim().length < SHORT_ANSWER_MIN_CHARS;
}

/**
 * Weighted sum of the three dimensions, truncated (not rounded) to an integer
 * and kept within [0, 100].
 */
export function aggregateScore(
  weights: ScoringWeights,
  dimensions: Pick<Metrics, "relevance" | "confidence" | "clarity">,
): number {
  const weighted =
    weights.relevanceWeight * dimensions.relevance +
    weights.confidenceWeight * dimensions.confidence +
    weights.clarityWeight * dimensions.clarity;
  return Math.max(0, Math.min(100, Math.floor(weighted)));
}
