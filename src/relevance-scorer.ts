// Interview Coach Engine - Semantic Relevance Scorer
// Embeds question and answer, then scales their cosine similarity to 0-100.

import type { EmbeddingService } from "./embedding-service.js";
import { AnalysisError } from "./errors.js";

// ─── Cosine Similarity ──────────────────────────────────────────────────────────

/**
 * Compute cosine similarity between two vectors of equal dimension.
 *
 * Returns dot(a, b) / (norm(a) * norm(b)).
 * Returns 0 for zero-length vectors, vectors of different lengths, or a
 * zero-norm vector. Result is in the range [-1, 1] up to floating-point noise.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length || a.length === 0) return 0;
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/** Clamp similarity to [0, 1] before scaling; noise can push it slightly outside. */
export function similarityToScore(similarity: number): number {
  const clamped = Math.max(0, Math.min(1, similarity));
  return Math.round(clamped * 100);
}

// ─── Scorer ─────────────────────────────────────────────────────────────────────

export class RelevanceScorer {
  private readonly embeddings: EmbeddingService;

  constructor(embeddings: EmbeddingService) {
    this.embeddings = embeddings;
  }

  /**
   * Relevance of `answer` to `question` as an integer in [0, 100].
   *
   * @throws AnalysisError (stage "relevance") when the embedding service fails
   *         or returns unusable vectors; no fallback score is produced
   */
  async score(question: string, answer: string): Promise<number> {
    let questionVector: number[];
    let answerVector: number[];
    try {
      [questionVector, answerVector] = await Promise.all([
        this.embeddings.embed(question),
        this.embeddings.embed(answer),
      ]);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new AnalysisError("relevance", `Embedding service failed: ${reason}`, { cause: err });
    }

    this.assertUsable(questionVector, "question");
    this.assertUsable(answerVector, "answer");
    if (questionVector.length !== answerVector.length) {
      throw new AnalysisError(
        "relevance",
        `Embedding dimensions differ: question ${questionVector.length}, answer ${answerVector.length}`,
      );
    }

    return similarityToScore(cosineSimilarity(questionVector, answerVector));
  }

  private assertUsable(vector: number[], label: string): void {
    if (vector.length === 0) {
      throw new AnalysisError("relevance", `Embedding service returned an empty vector for the ${label}`);
    }
    if (!vector.every(Number.isFinite)) {
      throw new AnalysisError("relevance", `Embedding for the ${label} contains non-finite values`);
    }
    const squaredNorm = vector.reduce((sum, v) => sum + v * v, 0);
    if (squaredNorm === 0 || !Number.isFinite(squaredNorm)) {
      throw new AnalysisError("relevance", `Embedding for the ${label} has no usable magnitude`);
    }
  }
}
