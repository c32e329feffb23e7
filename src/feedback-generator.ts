// Interview Coach Engine - Feedback Generator
// Turns per-answer metrics and the answer text into short feedback statements.
//
// Each rule contributes at most one statement. Which statements are generated
// depends only on (metrics, answer); only the final display order is random.

import {
  countFillerWords,
  countWords,
  detectExampleUsage,
  detectStarStructure,
} from "./lexical-features.js";
import { defaultRandomSource, shuffle, type RandomSource } from "./random.js";
import type { EngineConfig, Metrics } from "./types.js";

export const FEEDBACK_SEPARATOR = " • ";
export const MAX_FEEDBACK_STATEMENTS = 6;

// ─── Statement ladders ──────────────────────────────────────────────────────────

export const EXCEPTIONAL_RELEVANCE_PHRASES = [
  "Exceptional relevance - perfectly aligned with the question.",
  "Outstanding understanding of the core topic.",
] as const;

const RELEVANCE_TIERS: ReadonlyArray<{ min: number; text: string }> = [
  { min: 88, text: "Strong relevance with excellent focus on key points." },
  { min: 80, text: "Good relevance and clear connection to the question." },
  { min: 65, text: "Moderate relevance - mostly on track with room for tighter focus." },
];
const LIMITED_RELEVANCE = "Limited relevance - consider addressing the question more directly.";

export const STAR_STATEMENT = "Effective use of structured response framework (STAR method).";
export const DETAILED_EXAMPLES_STATEMENT = "Strong incorporation of detailed real-world examples.";
export const APPROPRIATE_EXAMPLES_STATEMENT = "Appropriate use of examples to support points.";
const DETAILED_EXAMPLES_MIN_WORDS = 120;

const OVERALL_TIERS: ReadonlyArray<{ min: number; text: string }> = [
  { min: 92, text: "Outstanding overall performance." },
  { min: 85, text: "Strong performance suitable for advanced rounds." },
  { min: 75, text: "Solid performance with clear potential." },
];

// ─── Generator ──────────────────────────────────────────────────────────────────

export class FeedbackGenerator {
  private readonly config: EngineConfig;
  private readonly rng: RandomSource;

  constructor(config: EngineConfig, rng: RandomSource = defaultRandomSource) {
    this.config = config;
    this.rng = rng;
  }

  /**
   * Statements for one answer, in rule order (relevance, STAR, examples,
   * length, fillers, overall).
   */
  buildStatements(metrics: Pick<Metrics, "relevance" | "score">, answer: string): string[] {
    const statements: string[] = [relevanceStatement(metrics.relevance, answer)];
    const wordCount = countWords(answer);

    if (detectStarStructure(answer, this.config.starMethodKeywords)) {
      statements.push(STAR_STATEMENT);
    }

    if (detectExampleUsage(answer, this.config.exampleKeywords)) {
      statements.push(
        wordCount > DETAILED_EXAMPLES_MIN_WORDS ? DETAILED_EXAMPLES_STATEMENT : APPROPRIATE_EXAMPLES_STATEMENT,
      );
    }

    statements.push(lengthStatement(wordCount));
    statements.push(fillerStatement(countFillerWords(answer, this.config.fillerWords)));

    const closing = overallStatement(metrics.score);
    if (closing) {
      statements.push(closing);
    }

    return statements;
  }

  /** Statements shuffled for display and capped at six. */
  generate(metrics: Pick<Metrics, "relevance" | "score">, answer: string): string[] {
    return shuffle(this.buildStatements(metrics, answer), this.rng).slice(0, MAX_FEEDBACK_STATEMENTS);
  }
}

// ─── Rules ──────────────────────────────────────────────────────────────────────

export function relevanceStatement(relevance: number, answer: string): string {
  if (relevance >= 95) {
    // Stable choice between equivalent phrasings, keyed on the answer text
    const index = stringHash(answer) % EXCEPTIONAL_RELEVANCE_PHRASES.length;
    return EXCEPTIONAL_RELEVANCE_PHRASES[index];
  }
  for (const tier of RELEVANCE_TIERS) {
    if (relevance >= tier.min) return tier.text;
  }
  return LIMITED_RELEVANCE;
}

export function lengthStatement(wordCount: number): string {
  if (wordCount >= 180) return "Excellent depth and comprehensive coverage.";
  if (wordCount >= 130) return "Solid depth with good level of detail.";
  if (wordCount >= 90) return "Adequate content - consider expanding with examples.";
  return `Response length: ${wordCount} words - aim for more elaboration.`;
}

export function fillerStatement(fillerCount: number): string {
  if (fillerCount === 0) return "Excellent fluency with no filler words.";
  if (fillerCount <= 2) return `High fluency with minimal fillers (${fillerCount}).`;
  if (fillerCount <= 6) return `Moderate filler word usage (${fillerCount}) - practice confident pauses.`;
  return `Significant filler usage (${fillerCount}) - focus on reducing for stronger delivery.`;
}

/** Closing statement for strong answers; null below 75. */
export function overallStatement(score: number): string | null {
  for (const tier of OVERALL_TIERS) {
    if (score >= tier.min) return tier.text;
  }
  return null;
}

// ─── Display helpers ────────────────────────────────────────────────────────────

export function joinFeedback(statements: readonly string[]): string {
  return statements.join(FEEDBACK_SEPARATOR);
}

/** Split a joined feedback string back into trimmed, non-empty statements. */
export function splitFeedback(feedbackText: string): string[] {
  return feedbackText
    .split(FEEDBACK_SEPARATOR.trim())
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function stringHash(value: string): number {
  let hash = 0;
  for (let i = 0; i < value.length; i++) {
    hash = (Math.imul(hash, 31) + value.charCodeAt(i)) >>> 0;
  }
  return hash;
}
