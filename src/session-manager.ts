// Interview Coach Engine - Session Manager
// Central orchestrator managing interview state transitions and coordination.
//
// Records are appended in arrival order and are the only source of truth for
// a session; the report is a cache rebuilt from them.

import { v4 as uuidv4 } from "uuid";
import { SessionState } from "./types.js";
import type {
  EngineConfig,
  InterviewSession,
  SessionReport,
  StartInterviewOptions,
  SubmitAnswerResult,
  TranscriptionOutcome,
} from "./types.js";
import type { ResponseAnalyzer } from "./response-analyzer.js";
import type { QuestionBank } from "./question-bank.js";
import type { FilePersistence } from "./file-persistence.js";
import { buildSessionReport } from "./session-insights.js";

// ─── Dependency injection interface ─────────────────────────────────────────────

export interface SessionManagerDeps {
  config: EngineConfig;
  analyzer: ResponseAnalyzer;
  questionBank: QuestionBank;
  filePersistence?: FilePersistence;
}

export interface CurrentQuestion {
  index: number; // 0-based
  total: number;
  text: string;
}

/**
 * Valid state transitions for the interview state machine.
 *
 * IDLE → INTERVIEWING:      startInterview()
 * INTERVIEWING → COMPLETED: completeInterview()
 *
 * resetSession() can transition from ANY state → IDLE
 */
const VALID_TRANSITIONS: ReadonlyMap<SessionState, SessionState> = new Map([
  [SessionState.IDLE, SessionState.INTERVIEWING],
  [SessionState.INTERVIEWING, SessionState.COMPLETED],
]);

export class SessionManager {
  private sessions: Map<string, InterviewSession> = new Map();
  private analyzing: Set<string> = new Set();
  private runs: Map<string, number> = new Map(); // bumped on start and reset
  private readonly deps: SessionManagerDeps;

  private log(level: string, msg: string): void {
    console.log(`[${level}] [SessionManager] ${msg}`);
  }

  constructor(deps: SessionManagerDeps) {
    this.deps = deps;
    this.log(
      "INIT",
      `Roles: ${deps.questionBank.listRoles().length}, persistence: ${deps.filePersistence ? "enabled" : "disabled"}`,
    );
  }

  /** Creates a new session in the IDLE state. */
  createSession(): InterviewSession {
    const session = emptySession(uuidv4());
    this.sessions.set(session.id, session);
    return session;
  }

  /** @throws Error if the session does not exist */
  getSession(sessionId: string): InterviewSession {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new Error(`Session not found: ${sessionId}`);
    }
    return session;
  }

  /**
   * Select the question set and move IDLE → INTERVIEWING.
   * The question count defaults to, and is capped at, the configured maximum.
   *
   * @returns the first question
   */
  startInterview(sessionId: string, options: StartInterviewOptions): CurrentQuestion {
    const session = this.getSession(sessionId);
    this.assertTransition(session, SessionState.INTERVIEWING, "startInterview");

    const candidateName = options.candidateName.trim();
    if (candidateName.length === 0) {
      throw new Error("Candidate name is required to start an interview");
    }
    if (!this.deps.questionBank.hasRole(options.role)) {
      throw new Error(
        `Unknown interview role: "${options.role}". Available roles: ${this.deps.questionBank.listRoles().join(", ")}`,
      );
    }

    const max = this.deps.config.maxQuestionsPerInterview;
    const requested = options.questionCount ?? max;
    if (!Number.isInteger(requested) || requested < 1) {
      throw new Error(`Question count must be a positive integer, got ${requested}`);
    }
    if (requested > max) {
      this.log("WARN", `Session ${sessionId}: ${requested} questions requested, capped at ${max}`);
    }
    const count = Math.min(requested, max);

    const selection = { seed: options.seed };
    const questions = options.difficulty
      ? this.deps.questionBank.selectQuestionsByDifficulty(options.role, options.difficulty, count, selection)
      : this.deps.questionBank.selectQuestions(options.role, count, selection);

    if (questions.length < count) {
      this.log("WARN", `Session ${sessionId}: role "${options.role}" only has ${questions.length} questions`);
    }

    session.candidateName = candidateName;
    session.role = options.role;
    session.difficulty = options.difficulty ?? null;
    session.questions = questions;
    session.currentQuestionIndex = 0;
    session.responses = [];
    session.report = null;
    session.startedAt = new Date();
    session.completedAt = null;
    session.outputsSaved = false;
    session.state = SessionState.INTERVIEWING;
    this.bumpRun(sessionId);

    this.log("INFO", `Session ${sessionId} started: ${questions.length} ${options.role} questions`);
    return { index: 0, total: questions.length, text: questions[0] };
  }

  /** The question awaiting an answer, or null once every question is answered. */
  currentQuestion(sessionId: string): CurrentQuestion | null {
    const session = this.getSession(sessionId);
    if (session.state !== SessionState.INTERVIEWING) {
      return null;
    }
    const index = session.currentQuestionIndex;
    if (index >= session.questions.length) {
      return null;
    }
    return { index, total: session.questions.length, text: session.questions[index] };
  }

  /**
   * Record an answer to the current question.
   *
   * A failed transcription records nothing and leaves the question current.
   * An analysis failure propagates (AnalysisError) and also leaves the
   * question current, so the answer can be submitted again.
   */
  async submitAnswer(sessionId: string, outcome: TranscriptionOutcome): Promise<SubmitAnswerResult> {
    const session = this.getSession(sessionId);

    if (session.state !== SessionState.INTERVIEWING) {
      throw new Error(
        `Invalid state: cannot call submitAnswer() in "${session.state}" state. ` +
          `Expected state: "${SessionState.INTERVIEWING}".`,
      );
    }
    const index = session.currentQuestionIndex;
    if (index >= session.questions.length) {
      throw new Error("All questions have been answered; finish the interview to see the report");
    }

    if (!outcome.ok) {
      this.log("WARN", `Session ${sessionId}: transcription failed for question ${index + 1}: ${outcome.reason}`);
      return { status: "transcription_failed", reason: outcome.reason };
    }

    if (this.analyzing.has(sessionId)) {
      throw new Error("An answer is already being analyzed for this session");
    }

    const run = this.runs.get(sessionId) ?? 0;
    this.analyzing.add(sessionId);
    const record = await this.deps.analyzer
      .createRecord(session.questions[index], outcome.text)
      .finally(() => this.analyzing.delete(sessionId));

    // The session may have been reset, restarted or removed while the analysis ran
    if (this.sessions.get(sessionId) !== session || this.runs.get(sessionId) !== run) {
      throw new Error(`Session ${sessionId} changed while the answer was being analyzed; answer discarded`);
    }

    session.responses.push(record);
    session.currentQuestionIndex = index + 1;
    session.report = null;

    const questionNumber = session.responses.length;
    this.log("INFO", `Session ${sessionId}: question ${questionNumber} scored ${record.metrics.score}`);

    return {
      status: "recorded",
      record,
      questionNumber,
      finished: session.currentQuestionIndex >= session.questions.length,
    };
  }

  /**
   * Move INTERVIEWING → COMPLETED and build the report. The candidate may stop
   * before answering every question, but at least one answer is required.
   *
   * @throws EmptySessionError when no answer was recorded
   */
  completeInterview(sessionId: string): SessionReport {
    const session = this.getSession(sessionId);
    this.assertTransition(session, SessionState.COMPLETED, "completeInterview");

    if (this.analyzing.has(sessionId)) {
      throw new Error("Cannot finish the interview while an answer is being analyzed");
    }

    const report = buildSessionReport(session.responses, this.deps.config);
    session.report = report;
    session.completedAt = new Date();
    session.state = SessionState.COMPLETED;

    this.log(
      "INFO",
      `Session ${sessionId} completed: ${session.responses.length}/${session.questions.length} answered, ` +
        `average ${report.statistics.overallAverageScore.toFixed(1)}`,
    );
    return report;
  }

  /**
   * The session report, rebuilt from the records when the cache is stale.
   * @throws EmptySessionError when no answer was recorded
   */
  getReport(sessionId: string): SessionReport {
    const session = this.getSession(sessionId);
    if (!session.report) {
      session.report = buildSessionReport(session.responses, this.deps.config);
    }
    return session.report;
  }

  /**
   * Save session outputs to disk via FilePersistence.
   * This is the only path to persistence.
   *
   * @returns Array of saved file paths, or empty array if no persistence engine.
   */
  async saveOutputs(sessionId: string): Promise<string[]> {
    const session = this.getSession(sessionId);

    if (!this.deps.filePersistence) {
      this.log("WARN", `Session ${sessionId}: save requested but persistence is disabled`);
      return [];
    }

    this.getReport(sessionId);
    const paths = await this.deps.filePersistence.saveSession(session);
    this.log("INFO", `Session ${sessionId}: saved ${paths.length} files`);
    return paths;
  }

  /** Return any state to IDLE, discarding questions and records. */
  resetSession(sessionId: string): void {
    const session = this.getSession(sessionId);
    const previous = session.state;
    Object.assign(session, emptySession(session.id));
    this.bumpRun(sessionId);
    this.log("INFO", `Session ${sessionId} reset from "${previous}"`);
  }

  removeSession(sessionId: string): void {
    this.sessions.delete(sessionId);
    this.analyzing.delete(sessionId);
    this.runs.delete(sessionId);
  }

  private bumpRun(sessionId: string): void {
    this.runs.set(sessionId, (this.runs.get(sessionId) ?? 0) + 1);
  }

  // ─── State Machine Helpers ──────────────────────────────────────────────────

  /**
   * Asserts that the session can transition to the target state.
   * Throws a descriptive error if the transition is invalid.
   */
  private assertTransition(
    session: InterviewSession,
    targetState: SessionState,
    methodName: string,
  ): void {
    const allowedTarget = VALID_TRANSITIONS.get(session.state);

    if (allowedTarget !== targetState) {
      throw new Error(
        `Invalid state transition: cannot call ${methodName}() in "${session.state}" state. ` +
          `Expected state: "${this.getExpectedStateForTarget(targetState)}". ` +
          `Current state: "${session.state}".`,
      );
    }
  }

  /** Returns the expected source state for a given target state. */
  private getExpectedStateForTarget(targetState: SessionState): string {
    for (const [from, to] of VALID_TRANSITIONS) {
      if (to === targetState) return from;
    }
    return "unknown";
  }
}

function emptySession(id: string): InterviewSession {
  return {
    id,
    state: SessionState.IDLE,
    candidateName: null,
    role: null,
    difficulty: null,
    questions: [],
    currentQuestionIndex: 0,
    responses: [],
    report: null,
    startedAt: null,
    completedAt: null,
    outputsSaved: false,
  };
}
