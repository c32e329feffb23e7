// Interview Coach Engine - Response Analyzer
// Per-answer pipeline:
//   Relevance → Lexical features → Clarity/Confidence → Aggregator → Feedback
//
// Stateless between calls apart from the shared read-only config, so answers
// can be analyzed in parallel.

import { estimateDelivery } from "./delivery-estimator.js";
import { FeedbackGenerator, joinFeedback } from "./feedback-generator.js";
import { extractLexicalFeatures } from "./lexical-features.js";
import type { RelevanceScorer } from "./relevance-scorer.js";
import {
  SHORT_ANSWER_FEEDBACK,
  SHORT_ANSWER_METRICS,
  aggregateScore,
  isTooShort,
} from "./score-aggregator.js";
import type { AnswerAnalysis, EngineConfig, Metrics, ResponseRecord } from "./types.js";

export interface AnalysisItem {
  question: string;
  answer: string;
}

export type BatchResult =
  | { ok: true; record: ResponseRecord }
  | { ok: false; error: Error };

export interface BatchOptions {
  /** Maximum analyses in flight at once. Default 4. */
  concurrency?: number;
}

const DEFAULT_BATCH_CONCURRENCY = 4;

export class ResponseAnalyzer {
  private readonly config: EngineConfig;
  private readonly relevanceScorer: RelevanceScorer;
  private readonly feedbackGenerator: FeedbackGenerator;
  private readonly clock: () => Date;

  constructor(
    config: EngineConfig,
    relevanceScorer: RelevanceScorer,
    feedbackGenerator: FeedbackGenerator = new FeedbackGenerator(config),
    clock: () => Date = () => new Date(),
  ) {
    this.config = config;
    this.relevanceScorer = relevanceScorer;
    this.feedbackGenerator = feedbackGenerator;
    this.clock = clock;
  }

  /**
   * Score one answer. Answers under 30 characters after trimming take the
   * degenerate path without calling the embedding service.
   *
   * @throws AnalysisError when relevance scoring fails
   */
  async analyze(question: string, answer: string): Promise<AnswerAnalysis> {
    const cleaned = answer.trim();

    if (isTooShort(cleaned)) {
      return {
        metrics: { ...SHORT_ANSWER_METRICS },
        feedback: [SHORT_ANSWER_FEEDBACK],
        feedbackText: SHORT_ANSWER_FEEDBACK,
        features: null,
        tooShort: true,
      };
    }

    const relevance = await this.relevanceScorer.score(question, cleaned);
    const features = extractLexicalFeatures(cleaned, this.config);
    const { clarity, confidence } = estimateDelivery(features);
    const score = aggregateScore(this.config, { relevance, confidence, clarity });

    const metrics: Metrics = { relevance, confidence, clarity, score };
    const feedback = this.feedbackGenerator.generate(metrics, cleaned);

    return {
      metrics,
      feedback,
      feedbackText: joinFeedback(feedback),
      features,
      tooShort: false,
    };
  }

  /** Analyze and wrap the result as an immutable ResponseRecord. */
  async createRecord(question: string, answer: string): Promise<ResponseRecord> {
    const analysis = await this.analyze(question, answer);
    return Object.freeze({
      question,
      answer,
      metrics: Object.freeze({ ...analysis.metrics }),
      feedbackText: analysis.feedbackText,
      timestamp: this.clock().toISOString(),
    });
  }

  /**
   * Analyze many answers with bounded parallelism. Results keep input order;
   * a failure is reported in its own slot and never affects the others.
   */
  async analyzeBatch(items: readonly AnalysisItem[], options: BatchOptions = {}): Promise<BatchResult[]> {
    const concurrency = Math.max(1, Math.floor(options.concurrency ?? DEFAULT_BATCH_CONCURRENCY));
    const results = new Array<BatchResult>(items.length);
    let nextIndex = 0;

    const worker = async (): Promise<void> => {
      while (nextIndex < items.length) {
        const index = nextIndex++;
        const { question, answer } = items[index];
        try {
          results[index] = { ok: true, record: await this.createRecord(question, answer) };
        } catch (err) {
          results[index] = { ok: false, error: err instanceof Error ? err : new Error(String(err)) };
        }
      }
    };

    const workerCount = Math.min(concurrency, items.length);
    await Promise.all(Array.from({ length: workerCount }, () => worker()));
    return results;
  }
}
