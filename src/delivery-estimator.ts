// Interview Coach Engine - Clarity & Confidence Estimator
// Lexical proxies for delivery. These are not acoustic measurements; the
// coefficients and clamp bounds are fixed so scores stay comparable across runs.

import type { DeliveryScores, LexicalFeatures } from "./types.js";

// ─── Clarity ────────────────────────────────────────────────────────────────────

export const CLARITY_BASE = 90;
export const CLARITY_FILLER_PENALTY = 5;
export const CLARITY_PAUSE_PENALTY = 7;
export const CLARITY_SHORT_ANSWER_WORDS = 70;
export const CLARITY_SHORT_ANSWER_PENALTY = 20;
export const CLARITY_MIN = 15;
export const CLARITY_MAX = 98;

// ─── Confidence ─────────────────────────────────────────────────────────────────

export const CONFIDENCE_BASE = 55;
export const CONFIDENCE_FULL_LENGTH_WORDS = 140;
export const CONFIDENCE_FULL_LENGTH_BONUS = 35;
export const CONFIDENCE_LENGTH_OFFSET_WORDS = 60;
export const CONFIDENCE_LENGTH_RATE = 0.6;
export const CONFIDENCE_EXAMPLE_BONUS = 20;
export const CONFIDENCE_FILLER_PENALTY = 3;
export const CONFIDENCE_MIN = 20;
export const CONFIDENCE_MAX = 98;

export function estimateClarity(
  features: Pick<LexicalFeatures, "fillerCount" | "pauseCount" | "wordCount">,
): number {
  let penalty =
    features.fillerCount * CLARITY_FILLER_PENALTY + features.pauseCount * CLARITY_PAUSE_PENALTY;
  if (features.wordCount < CLARITY_SHORT_ANSWER_WORDS) {
    penalty += CLARITY_SHORT_ANSWER_PENALTY;
  }
  return clamp(CLARITY_BASE - penalty, CLARITY_MIN, CLARITY_MAX);
}

export function estimateConfidence(
  features: Pick<LexicalFeatures, "wordCount" | "usesExamples" | "fillerCount">,
): number {
  const lengthBonus =
    features.wordCount > CONFIDENCE_FULL_LENGTH_WORDS
      ? CONFIDENCE_FULL_LENGTH_BONUS
      : Math.max(0, (features.wordCount - CONFIDENCE_LENGTH_OFFSET_WORDS) * CONFIDENCE_LENGTH_RATE);
  const exampleBonus = features.usesExamples ? CONFIDENCE_EXAMPLE_BONUS : 0;
  const fillerPenalty = features.fillerCount * CONFIDENCE_FILLER_PENALTY;

  // Truncate toward zero before clamping
  const raw = Math.trunc(CONFIDENCE_BASE + lengthBonus + exampleBonus - fillerPenalty);
  return clamp(raw, CONFIDENCE_MIN, CONFIDENCE_MAX);
}

export function estimateDelivery(features: LexicalFeatures): DeliveryScores {
  return {
    clarity: estimateClarity(features),
    confidence: estimateConfidence(features),
  };
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}
