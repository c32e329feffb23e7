// Interview Coach Engine - Error types
// Each class marks one failure the caller is expected to tell apart from the
// others. Protocol and state-machine misuse stays a plain Error.

export type AnalysisStage = "relevance";

/**
 * A per-answer analysis stage failed. The answer has no score; callers mark it
 * as "analysis unavailable" or retry.
 */
export class AnalysisError extends Error {
  readonly stage: AnalysisStage;

  constructor(stage: AnalysisStage, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AnalysisError";
    this.stage = stage;
  }
}

/** Session statistics were requested for a session with no answers. */
export class EmptySessionError extends Error {
  constructor(message = "Cannot compute session statistics: no responses recorded") {
    super(message);
    this.name = "EmptySessionError";
  }
}

/** Engine configuration is malformed. Raised at load time, never mid-analysis. */
export class ConfigError extends Error {
  readonly field: string | null;

  constructor(message: string, field: string | null = null) {
    super(message);
    this.name = "ConfigError";
    this.field = field;
  }
}
