// Interview Coach Engine - Session Statistics & Insight Engine
// Aggregates a completed session's records into statistics, strengths,
// weaknesses, recommendations and report text.
//
// Everything here is a pure function of the record list: the same records
// always give the same report. Empty sessions are an error, never zero-filled.

import { EmptySessionError } from "./errors.js";
import { countFillerWords, countWords } from "./lexical-features.js";
import type {
  AnswerInsights,
  EngineConfig,
  MetricDimension,
  ResponseRecord,
  SessionReport,
  SessionStatistics,
  StrengthsAndWeaknesses,
} from "./types.js";

/** Iteration order doubles as the tie-break order for strongest/weakest. */
export const METRIC_DIMENSIONS: readonly MetricDimension[] = ["relevance", "confidence", "clarity"];

export const SUMMARY_SEPARATOR = " | ";

// ─── Thresholds ─────────────────────────────────────────────────────────────────

const WEAK_RELEVANCE = 70;
const WEAK_CONFIDENCE = 60;
const WEAK_CLARITY = 70;
const STRONG_SCORE = 85;
const CONSISTENT_RELEVANCE = 80;

const RECOMMEND_RELEVANCE_BELOW = 75;
const RECOMMEND_CONFIDENCE_BELOW = 70;
const RECOMMEND_CLARITY_BELOW = 75;

const SPEAKING_WORDS_PER_MINUTE = 140;
const BRIEF_ANSWER_WORDS = 80;
const FILLER_PRACTICE_THRESHOLD = 5;

// ─── Statistics ─────────────────────────────────────────────────────────────────

/**
 * Mean rounded to one decimal place, ties to even (70.25 → 70.2, 70.75 → 70.8).
 * Metrics are integers, so the tie test runs on the exact remainder of sum·10 / n.
 */
function roundedMean(values: readonly number[]): number {
  const sum = values.reduce((acc, v) => acc + v, 0);
  const scaled = sum * 10;
  const n = values.length;
  const quotient = Math.floor(scaled / n);
  const twiceRemainder = 2 * (scaled - quotient * n);
  const tenths =
    twiceRemainder > n || (twiceRemainder === n && quotient % 2 !== 0) ? quotient + 1 : quotient;
  return tenths / 10;
}

/**
 * @throws EmptySessionError when `records` is empty
 */
export function computeSessionStatistics(records: readonly ResponseRecord[]): SessionStatistics {
  assertNonEmpty(records);

  const scores = records.map((r) => r.metrics.score);
  const averages: Record<MetricDimension, number> = {
    relevance: roundedMean(records.map((r) => r.metrics.relevance)),
    confidence: roundedMean(records.map((r) => r.metrics.confidence)),
    clarity: roundedMean(records.map((r) => r.metrics.clarity)),
  };

  let strongest = METRIC_DIMENSIONS[0];
  let weakest = METRIC_DIMENSIONS[0];
  for (const dimension of METRIC_DIMENSIONS) {
    // Strict comparisons keep the first dimension on ties
    if (averages[dimension] > averages[strongest]) strongest = dimension;
    if (averages[dimension] < averages[weakest]) weakest = dimension;
  }

  return {
    overallAverageScore: roundedMean(scores),
    highestScore: Math.max(...scores),
    lowestScore: Math.min(...scores),
    averageRelevance: averages.relevance,
    averageConfidence: averages.confidence,
    averageClarity: averages.clarity,
    totalQuestions: records.length,
    strongestArea: strongest,
    areaForImprovement: weakest,
  };
}

// ─── Strengths & Weaknesses ─────────────────────────────────────────────────────

/**
 * Scan records by 1-based position for recurring strengths and weaknesses.
 *
 * @throws EmptySessionError when `records` is empty
 */
export function extractStrengthsAndWeaknesses(records: readonly ResponseRecord[]): StrengthsAndWeaknesses {
  assertNonEmpty(records);

  const positionsWhere = (predicate: (record: ResponseRecord) => boolean): number[] =>
    records.flatMap((record, i) => (predicate(record) ? [i + 1] : []));

  const weaknesses: string[] = [];
  const lowRelevance = positionsWhere((r) => r.metrics.relevance < WEAK_RELEVANCE);
  const lowConfidence = positionsWhere((r) => r.metrics.confidence < WEAK_CONFIDENCE);
  const lowClarity = positionsWhere((r) => r.metrics.clarity < WEAK_CLARITY);

  if (lowRelevance.length > 0) {
    weaknesses.push(`Stay on topic more closely ${questionList(lowRelevance)}`);
  }
  if (lowConfidence.length > 0) {
    weaknesses.push(`Project more confidence through pacing and examples ${questionList(lowConfidence)}`);
  }
  if (lowClarity.length > 0) {
    weaknesses.push(`Reduce fillers and pauses for smoother delivery ${questionList(lowClarity)}`);
  }

  const strengths: string[] = [];
  const highScores = positionsWhere((r) => r.metrics.score >= STRONG_SCORE);
  if (highScores.length > 0) {
    strengths.push(`Excellent structured responses ${questionList(highScores)}`);
  }
  if (records.every((r) => r.metrics.relevance >= CONSISTENT_RELEVANCE)) {
    strengths.push("Consistently high relevance across all answers");
  }

  return {
    strengths: strengths.length > 0 ? strengths : ["Consistent effort shown"],
    weaknesses: weaknesses.length > 0 ? weaknesses : ["Continue practicing regularly"],
  };
}

function questionList(positions: readonly number[]): string {
  return `(Questions ${positions.join(", ")})`;
}

// ─── Recommendations & Summary ──────────────────────────────────────────────────

/** Practice areas from session averages; independent of strengths/weaknesses. */
export function recommendPracticeAreas(statistics: SessionStatistics): string[] {
  const recommendations: string[] = [];

  if (statistics.averageRelevance < RECOMMEND_RELEVANCE_BELOW) {
    recommendations.push("Practice directly addressing the question prompt");
  }
  if (statistics.averageConfidence < RECOMMEND_CONFIDENCE_BELOW) {
    recommendations.push("Build confidence through structured examples (STAR method)");
  }
  if (statistics.averageClarity < RECOMMEND_CLARITY_BELOW) {
    recommendations.push("Work on fluency and reducing filler words");
  }

  if (recommendations.length === 0) {
    recommendations.push("Continue refining advanced communication skills");
  }
  return recommendations;
}

export function buildPerformanceSummary(statistics: SessionStatistics): string {
  const average = statistics.overallAverageScore;
  const lines = [
    `Overall Performance: ${average.toFixed(1)}/100`,
    `Your strongest dimension was ${capitalize(statistics.strongestArea)}.`,
    `Greatest opportunity lies in improving ${capitalize(statistics.areaForImprovement)}.`,
  ];

  if (average >= 85) {
    lines.push("Excellent performance - ready for senior-level interviews.");
  } else if (average >= 70) {
    lines.push("Strong performance with clear strengths.");
  } else {
    lines.push("Solid foundation - focused practice will yield rapid improvement.");
  }

  return lines.join(SUMMARY_SEPARATOR);
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

// ─── Per-answer insights ────────────────────────────────────────────────────────

/** Spoken duration at an average rate of 140 words per minute. */
export function estimateSpeakingTime(wordCount: number): string {
  const minutes = wordCount / SPEAKING_WORDS_PER_MINUTE;
  if (minutes < 1) {
    return `${Math.trunc(minutes * 60)} seconds`;
  }
  return `${minutes.toFixed(1)} minutes`;
}

export function buildAnswerInsights(answer: string, config: EngineConfig): string[] {
  const wordCount = countWords(answer);
  const [, recommendedMax] = config.recommendedAnswerWordRange;
  const insights = [`Estimated speaking time: ${estimateSpeakingTime(wordCount)}`];

  if (wordCount < config.minimumAnswerWordsForAnalysis) {
    insights.push(
      `Below the ${config.minimumAnswerWordsForAnalysis}-word minimum for a reliable analysis - treat these scores as provisional.`,
    );
  }
  if (wordCount < BRIEF_ANSWER_WORDS) {
    insights.push("Consider expanding with specific examples or details.");
  } else if (wordCount > recommendedMax) {
    insights.push("Strong depth - ensure conciseness in real interviews.");
  }

  if (countFillerWords(answer, config.fillerWords) > FILLER_PRACTICE_THRESHOLD) {
    insights.push("Practice replacing fillers with brief pauses.");
  }

  return insights;
}

export function compileAnswerInsights(
  records: readonly ResponseRecord[],
  config: EngineConfig,
): AnswerInsights[] {
  return records.map((record, i) => ({
    questionNumber: i + 1,
    insights: buildAnswerInsights(record.answer, config),
  }));
}

// ─── Session report ─────────────────────────────────────────────────────────────

/**
 * Full end-of-session report. Recomputed from the records on every call.
 *
 * @throws EmptySessionError when `records` is empty
 */
export function buildSessionReport(records: readonly ResponseRecord[], config: EngineConfig): SessionReport {
  const statistics = computeSessionStatistics(records);
  const { strengths, weaknesses } = extractStrengthsAndWeaknesses(records);

  return {
    statistics,
    strengths,
    weaknesses,
    recommendations: recommendPracticeAreas(statistics),
    summaryText: buildPerformanceSummary(statistics),
    answerInsights: compileAnswerInsights(records, config),
  };
}

export function renderRecommendationReport(report: SessionReport): string {
  const lines = ["Performance Recommendations", "", "Strengths:"];
  for (const s of report.strengths) lines.push(`  - ${s}`);

  lines.push("", "Areas for Improvement:");
  for (const w of report.weaknesses) lines.push(`  - ${w}`);

  lines.push("", "Next Steps:");
  for (const r of report.recommendations) lines.push(`  - ${r}`);

  return lines.join("\n");
}

/** Plain-text summary suitable for copying or saving. */
export function renderSummaryExport(report: SessionReport, date: Date = new Date()): string {
  const lines = [
    "Interview Performance Summary",
    "=".repeat(50),
    `Overall Score: ${report.statistics.overallAverageScore.toFixed(1)}/100`,
    `Date: ${formatDateTime(date)}`,
    "",
    "Key Strengths:",
  ];
  for (const s of report.strengths) lines.push(`• ${s}`);

  lines.push("", "Areas to Improve:");
  for (const w of report.weaknesses) lines.push(`• ${w}`);

  lines.push("", "Recommendations:");
  for (const r of report.recommendations) lines.push(`• ${r}`);

  lines.push("", "Keep practicing - every session sharpens your delivery.");
  return lines.join("\n");
}

/** Local time as `YYYY-MM-DD HH:mm:ss`. */
export function formatDateTime(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

function assertNonEmpty(records: readonly ResponseRecord[]): void {
  if (records.length === 0) {
    throw new EmptySessionError();
  }
}
