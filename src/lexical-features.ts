// Interview Coach Engine - Lexical Feature Extractor
// Pure string analysis over the transcribed answer: fillers, pause markers,
// example usage, STAR structure and technical vocabulary.

import type { EngineConfig, LexicalFeatures } from "./types.js";

/** Minimum number of distinct STAR keywords for an answer to count as structured. */
export const STAR_KEYWORD_THRESHOLD = 3;

/** Whitespace tokenization; runs of whitespace never produce empty tokens. */
export function countWords(text: string): number {
  const trimmed = text.trim();
  if (trimmed.length === 0) return 0;
  return trimmed.split(/\s+/).length;
}

/**
 * Count case-insensitive occurrences of each filler phrase and sum them.
 * Overlapping phrases are additive: "um" and "umm" both count inside "umm".
 * Matches are substrings, so "so" also counts inside "also".
 */
export function countFillerWords(text: string, fillers: readonly string[]): number {
  const lowered = text.toLowerCase();
  let total = 0;
  for (const filler of fillers) {
    total += countOccurrences(lowered, filler.toLowerCase());
  }
  return total;
}

/** Literal, case-sensitive count of pause markers in the raw text. */
export function countPauseIndicators(text: string, markers: readonly string[]): number {
  let total = 0;
  for (const marker of markers) {
    total += countOccurrences(text, marker);
  }
  return total;
}

/** True if any example keyword appears as a whole word (case-insensitive). */
export function detectExampleUsage(text: string, keywords: readonly string[]): boolean {
  const alternatives = keywords.filter((kw) => kw.length > 0).map(escapeRegExp);
  if (alternatives.length === 0) return false;
  const pattern = new RegExp(`\\b(?:${alternatives.join("|")})\\b`, "i");
  return pattern.test(text);
}

/**
 * True if at least three distinct STAR keywords appear in the lowered text.
 * Substring match, not whole-word: "goal" inside "goaltender" counts.
 */
export function detectStarStructure(text: string, keywords: readonly string[]): boolean {
  return countDistinctPresent(text, keywords) >= STAR_KEYWORD_THRESHOLD;
}

/** Number of distinct technical keywords present; repeats count once. */
export function countTechnicalVocabulary(text: string, keywords: readonly string[]): number {
  return countDistinctPresent(text, keywords);
}

export function extractLexicalFeatures(text: string, config: EngineConfig): LexicalFeatures {
  return {
    wordCount: countWords(text),
    fillerCount: countFillerWords(text, config.fillerWords),
    pauseCount: countPauseIndicators(text, config.pauseIndicators),
    usesExamples: detectExampleUsage(text, config.exampleKeywords),
    followsStarStructure: detectStarStructure(text, config.starMethodKeywords),
    technicalTermCount: countTechnicalVocabulary(text, config.technicalKeywords),
  };
}

// ─── Internal helpers ───────────────────────────────────────────────────────────

/** Non-overlapping occurrences of `needle` in `haystack`; an empty needle never matches. */
function countOccurrences(haystack: string, needle: string): number {
  if (needle.length === 0) return 0;
  let count = 0;
  let from = haystack.indexOf(needle);
  while (from !== -1) {
    count++;
    from = haystack.indexOf(needle, from + needle.length);
  }
  return count;
}

function countDistinctPresent(text: string, keywords: readonly string[]): number {
  const lowered = text.toLowerCase();
  const distinct = new Set(keywords.map((kw) => kw.toLowerCase()).filter((kw) => kw.length > 0));
  let present = 0;
  for (const kw of distinct) {
    if (lowered.includes(kw)) present++;
  }
  return present;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
