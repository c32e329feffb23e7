// Interview Coach Engine - Shared TypeScript interfaces and types

// ─── Engine Configuration ───────────────────────────────────────────────────────

export interface ScoringWeights {
  relevanceWeight: number;
  confidenceWeight: number;
  clarityWeight: number;
}

/**
 * Immutable engine configuration, constructed once per process and handed to
 * every component at construction time.
 */
export interface EngineConfig extends ScoringWeights {
  fillerWords: readonly string[];
  pauseIndicators: readonly string[];
  exampleKeywords: readonly string[];
  starMethodKeywords: readonly string[];
  technicalKeywords: readonly string[];
  minimumAnswerWordsForAnalysis: number;
  recommendedAnswerWordRange: readonly [number, number];
  maxQuestionsPerInterview: number;
}

/** Process-level settings read from the environment. */
export interface RuntimeSettings {
  port: number;
  openaiApiKey: string | null;
  embeddingProvider: "openai" | "lexical";
  embeddingModel: string;
  configFile: string | null;
  questionBankFile: string | null; // null: the bundled data/question-bank.json
  outputDir: string;
}

// ─── Metrics ────────────────────────────────────────────────────────────────────

export type MetricDimension = "relevance" | "confidence" | "clarity";

/** All four fields are always populated together; `score` derives from the other three. */
export interface Metrics {
  relevance: number; // 0-100
  confidence: number; // 0-100 (20-98 when scored)
  clarity: number; // 0-100 (15-98 when scored)
  score: number; // 0-100
}

export interface LexicalFeatures {
  wordCount: number;
  fillerCount: number;
  pauseCount: number;
  usesExamples: boolean;
  followsStarStructure: boolean;
  technicalTermCount: number;
}

export interface DeliveryScores {
  clarity: number;
  confidence: number;
}

export interface AnswerAnalysis {
  metrics: Metrics;
  feedback: string[];
  feedbackText: string;
  /** null on the short-answer path, where no lexical analysis runs */
  features: LexicalFeatures | null;
  tooShort: boolean;
}

// ─── Records ────────────────────────────────────────────────────────────────────

export interface ResponseRecord {
  readonly question: string;
  readonly answer: string;
  readonly metrics: Readonly<Metrics>;
  readonly feedbackText: string;
  readonly timestamp: string; // ISO 8601
}

export interface SessionStatistics {
  overallAverageScore: number;
  highestScore: number;
  lowestScore: number;
  averageRelevance: number;
  averageConfidence: number;
  averageClarity: number;
  totalQuestions: number;
  strongestArea: MetricDimension;
  areaForImprovement: MetricDimension;
}

export interface AnswerInsights {
  questionNumber: number; // 1-based position in the session
  insights: string[];
}

export interface StrengthsAndWeaknesses {
  strengths: string[];
  weaknesses: string[];
}

export interface SessionReport {
  statistics: SessionStatistics;
  strengths: string[];
  weaknesses: string[];
  recommendations: string[];
  summaryText: string;
  answerInsights: AnswerInsights[];
}

// ─── Transcription Boundary ─────────────────────────────────────────────────────

export type TranscriptionOutcome =
  | { ok: true; text: string }
  | { ok: false; reason: string };

// ─── Question Bank ──────────────────────────────────────────────────────────────

export type Difficulty = "Easy" | "Medium" | "Hard";

export interface RoleQuestions {
  questions: string[];
  byDifficulty?: Partial<Record<Difficulty, string[]>>;
}

export type QuestionBankData = Record<string, RoleQuestions>;

// ─── Interview Session State Machine ────────────────────────────────────────────

export enum SessionState {
  IDLE = "idle",
  INTERVIEWING = "interviewing",
  COMPLETED = "completed",
}

export interface InterviewSession {
  id: string;
  state: SessionState;
  candidateName: string | null;
  role: string | null;
  difficulty: Difficulty | null;
  questions: string[];
  currentQuestionIndex: number;
  responses: ResponseRecord[]; // arrival order; position drives "Question N" labels
  report: SessionReport | null; // cache, recomputed from responses
  startedAt: Date | null;
  completedAt: Date | null;
  outputsSaved: boolean;
}

export interface StartInterviewOptions {
  candidateName: string;
  role: string;
  questionCount?: number;
  difficulty?: Difficulty;
  seed?: number;
}

export type SubmitAnswerResult =
  | { status: "recorded"; record: ResponseRecord; questionNumber: number; finished: boolean }
  | { status: "transcription_failed"; reason: string };

// ─── WebSocket Protocol ─────────────────────────────────────────────────────────

// Client → Server messages
export type ClientMessage =
  | {
      type: "start_interview";
      candidateName: string;
      role: string;
      questionCount?: number;
      difficulty?: Difficulty;
      seed?: number;
    }
  | { type: "submit_answer"; text: string }
  | { type: "transcription_failed"; reason: string }
  | { type: "finish_interview" }
  | { type: "save_outputs" }
  | { type: "reset" };

// Server → Client messages
export type ServerMessage =
  | { type: "state_change"; state: SessionState }
  | { type: "question"; index: number; total: number; text: string }
  | { type: "answer_analyzed"; questionNumber: number; record: ResponseRecord }
  | { type: "transcription_error"; message: string }
  | { type: "analysis_error"; stage: string; message: string }
  | { type: "session_report"; report: SessionReport }
  | { type: "outputs_saved"; paths: string[] }
  | { type: "error"; message: string; recoverable: boolean };
