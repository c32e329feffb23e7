// Interview Coach Engine - WebSocket Handler and Express Server
//
// Privacy: Session data lives in server memory only. Files are written only
// when the client asks to save outputs.

import express, { type ErrorRequestHandler, type Express } from "express";
import { createServer, type Server as HttpServer } from "node:http";
import { WebSocketServer, WebSocket, type RawData } from "ws";
import { SessionManager } from "./session-manager.js";
import type { ResponseAnalyzer } from "./response-analyzer.js";
import type { QuestionBank } from "./question-bank.js";
import type { FilePersistence } from "./file-persistence.js";
import { isDifficulty } from "./question-bank.js";
import { parseResponseRecord } from "./file-persistence.js";
import { buildSessionReport } from "./session-insights.js";
import { fromLegacyTranscript, transcriptionFailed } from "./transcription.js";
import { AnalysisError, EmptySessionError } from "./errors.js";
import {
  type ClientMessage,
  type EngineConfig,
  type ServerMessage,
  type SubmitAnswerResult,
  SessionState,
} from "./types.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

/** Max accepted JSON body size for the REST endpoints */
const MAX_BODY_SIZE = "1mb";

// ─── Logging ────────────────────────────────────────────────────────────────────

export interface ServerLogger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const defaultLogger: ServerLogger = {
  info: (msg, ...args) => console.log(`[INFO] ${msg}`, ...args),
  warn: (msg, ...args) => console.warn(`[WARN] ${msg}`, ...args),
  error: (msg, ...args) => console.error(`[ERROR] ${msg}`, ...args),
};

// ─── Server Factory ─────────────────────────────────────────────────────────────

export interface CreateServerOptions {
  config: EngineConfig;
  analyzer: ResponseAnalyzer;
  questionBank: QuestionBank;
  /** Enables save_outputs. Without it saving is a no-op. */
  filePersistence?: FilePersistence;
  /** Custom logger. Defaults to console-based logger. */
  logger?: ServerLogger;
  /** Externally provided SessionManager (for testing). Created internally if omitted. */
  sessionManager?: SessionManager;
}

export interface AppServer {
  app: Express;
  httpServer: HttpServer;
  wss: WebSocketServer;
  sessionManager: SessionManager;
  /** Start listening on the given port. Returns a promise that resolves when listening. */
  listen(port: number): Promise<void>;
  /** Gracefully shut down the server. */
  close(): Promise<void>;
}

/**
 * Creates the Express app, HTTP server, and WebSocket server.
 * Does NOT start listening; call `listen(port)` explicitly.
 */
export function createAppServer(options: CreateServerOptions): AppServer {
  const { config, analyzer, questionBank, filePersistence, logger = defaultLogger } = options;
  const sessionManager =
    options.sessionManager ?? new SessionManager({ config, analyzer, questionBank, filePersistence });

  const app = express();
  const httpServer = createServer(app);

  app.use(express.json({ limit: MAX_BODY_SIZE }));

  // Health check endpoint
  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.get("/api/roles", (_req, res) => {
    res.json({ roles: questionBank.listRoles() });
  });

  app.post("/api/analyze", (req, res, next) => {
    const body: unknown = req.body;
    if (!isRecord(body) || typeof body.question !== "string" || typeof body.answer !== "string") {
      res.status(400).json({ error: "Body must be {question: string, answer: string}" });
      return;
    }
    if (body.question.trim().length === 0) {
      res.status(400).json({ error: "Question must not be empty" });
      return;
    }

    // A blank answer still takes the short-answer path; a provider failure marker is not an answer
    let answer = body.answer;
    if (answer.trim().length > 0) {
      const outcome = fromLegacyTranscript(answer);
      if (!outcome.ok) {
        logger.warn(`Rejected analyze request: ${outcome.reason}`);
        res.status(422).json({ error: outcome.reason });
        return;
      }
      answer = outcome.text;
    }

    analyzer
      .analyze(body.question, answer)
      .then((analysis) => {
        res.json(analysis);
      })
      .catch((err: unknown) => {
        if (err instanceof AnalysisError) {
          logger.error(`Analysis failed at ${err.stage}: ${err.message}`);
          res.status(502).json({ error: err.message, stage: err.stage });
          return;
        }
        next(err);
      });
  });

  app.post("/api/report", (req, res) => {
    const body: unknown = req.body;
    if (!isRecord(body) || !Array.isArray(body.records)) {
      res.status(400).json({ error: "Body must be {records: ResponseRecord[]}" });
      return;
    }

    try {
      const records = body.records.map((entry: unknown, i: number) => parseResponseRecord(entry, i + 1));
      res.json(buildSessionReport(records, config));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      if (!(err instanceof EmptySessionError)) {
        logger.warn(`Rejected report request: ${message}`);
      }
      res.status(400).json({ error: message });
    }
  });

  const handleHttpError: ErrorRequestHandler = (err: unknown, _req, res, _next) => {
    const message = err instanceof Error ? err.message : String(err);
    // body-parser marks malformed JSON with a 4xx status
    const status = isRecord(err) && typeof err.status === "number" && err.status < 500 ? err.status : 500;
    if (status >= 500) {
      logger.error(`Unhandled request error: ${message}`);
    }
    res.status(status).json({ error: message });
  };
  app.use(handleHttpError);

  // WebSocket server attached to the HTTP server
  const wss = new WebSocketServer({ server: httpServer });

  wss.on("connection", (ws: WebSocket) => {
    handleConnection(ws, sessionManager, logger);
  });

  return {
    app,
    httpServer,
    wss,
    sessionManager,
    listen(port: number): Promise<void> {
      return new Promise((resolve, reject) => {
        httpServer.listen(port, () => {
          logger.info(`Server listening on port ${port}`);
          resolve();
        });
        httpServer.on("error", reject);
      });
    },
    close(): Promise<void> {
      return new Promise((resolve, reject) => {
        // Close all WebSocket connections
        for (const client of wss.clients) {
          client.close();
        }
        wss.close(() => {
          httpServer.close((err) => {
            if (err) reject(err);
            else resolve();
          });
        });
      });
    },
  };
}

// ─── WebSocket Connection Handler ───────────────────────────────────────────────

function handleConnection(
  ws: WebSocket,
  sessionManager: SessionManager,
  logger: ServerLogger,
): void {
  // Each WebSocket connection gets its own session
  const session = sessionManager.createSession();
  const sessionId = session.id;

  logger.info(`New WebSocket connection, session ${sessionId}`);

  // Send initial state
  sendMessage(ws, { type: "state_change", state: session.state });

  ws.on("message", (data: RawData, isBinary: boolean) => {
    try {
      if (isBinary) {
        throw new Error("Binary frames are not supported; send JSON messages.");
      }
      const message = parseClientMessage(JSON.parse(rawDataToString(data)));
      handleClientMessage(ws, message, sessionId, sessionManager, logger);
    } catch (err) {
      const errorMessage = err instanceof Error ? err.message : String(err);
      logger.error(`Error handling message for session ${sessionId}: ${errorMessage}`);
      sendMessage(ws, {
        type: "error",
        message: errorMessage,
        recoverable: true,
      });
    }
  });

  ws.on("close", () => {
    logger.info(`WebSocket closed, session ${sessionId}`);
    sessionManager.removeSession(sessionId);
  });

  ws.on("error", (err) => {
    logger.error(`WebSocket error for session ${sessionId}: ${err.message}`);
  });
}

// ─── JSON Client Message Handler ────────────────────────────────────────────────

function handleClientMessage(
  ws: WebSocket,
  message: ClientMessage,
  sessionId: string,
  sessionManager: SessionManager,
  logger: ServerLogger,
): void {
  // Helper to catch errors from async handlers and send them to the client
  const catchAsync = (promise: Promise<void>) => {
    promise.catch((err: unknown) => {
      if (err instanceof AnalysisError) {
        logger.error(`Analysis failed for session ${sessionId} at ${err.stage}: ${err.message}`);
        sendMessage(ws, { type: "analysis_error", stage: err.stage, message: err.message });
        return;
      }
      const errorMessage = err instanceof Error ? err.message : String(err);
      logger.error(`Async error for session ${sessionId}: ${errorMessage}`);
      sendMessage(ws, {
        type: "error",
        message: errorMessage,
        recoverable: true,
      });
    });
  };

  switch (message.type) {
    case "start_interview":
      handleStartInterview(ws, message, sessionId, sessionManager, logger);
      break;

    case "submit_answer":
      catchAsync(
        handleSubmission(ws, sessionId, sessionManager, logger, () =>
          sessionManager.submitAnswer(sessionId, fromLegacyTranscript(message.text)),
        ),
      );
      break;

    case "transcription_failed":
      catchAsync(
        handleSubmission(ws, sessionId, sessionManager, logger, () =>
          sessionManager.submitAnswer(sessionId, transcriptionFailed(message.reason)),
        ),
      );
      break;

    case "finish_interview":
      handleFinishInterview(ws, sessionId, sessionManager);
      break;

    case "save_outputs":
      catchAsync(handleSaveOutputs(ws, sessionId, sessionManager, logger));
      break;

    case "reset":
      sessionManager.resetSession(sessionId);
      sendMessage(ws, { type: "state_change", state: SessionState.IDLE });
      break;

    default: {
      const exhaustiveCheck: never = message;
      throw new Error(`Unhandled message: ${JSON.stringify(exhaustiveCheck)}`);
    }
  }
}

// ─── Start Interview ────────────────────────────────────────────────────────────

function handleStartInterview(
  ws: WebSocket,
  message: Extract<ClientMessage, { type: "start_interview" }>,
  sessionId: string,
  sessionManager: SessionManager,
  logger: ServerLogger,
): void {
  const first = sessionManager.startInterview(sessionId, {
    candidateName: message.candidateName,
    role: message.role,
    questionCount: message.questionCount,
    difficulty: message.difficulty,
    seed: message.seed,
  });
  logger.info(`Interview started for session ${sessionId} (${message.role})`);

  sendMessage(ws, { type: "state_change", state: SessionState.INTERVIEWING });
  sendMessage(ws, { type: "question", ...first });
}

// ─── Answers ────────────────────────────────────────────────────────────────────

/**
 * Runs one submission and reports the outcome. After the last question the
 * interview completes on its own and the report follows.
 */
async function handleSubmission(
  ws: WebSocket,
  sessionId: string,
  sessionManager: SessionManager,
  logger: ServerLogger,
  submit: () => Promise<SubmitAnswerResult>,
): Promise<void> {
  const result = await submit();

  if (result.status === "transcription_failed") {
    sendMessage(ws, { type: "transcription_error", message: result.reason });
    return;
  }

  sendMessage(ws, { type: "answer_analyzed", questionNumber: result.questionNumber, record: result.record });

  if (result.finished) {
    logger.info(`All questions answered for session ${sessionId}`);
    handleFinishInterview(ws, sessionId, sessionManager);
    return;
  }

  const next = sessionManager.currentQuestion(sessionId);
  if (next) {
    sendMessage(ws, { type: "question", ...next });
  }
}

// ─── Finish / Save ──────────────────────────────────────────────────────────────

function handleFinishInterview(ws: WebSocket, sessionId: string, sessionManager: SessionManager): void {
  const report = sessionManager.completeInterview(sessionId);
  sendMessage(ws, { type: "state_change", state: SessionState.COMPLETED });
  sendMessage(ws, { type: "session_report", report });
}

async function handleSaveOutputs(
  ws: WebSocket,
  sessionId: string,
  sessionManager: SessionManager,
  logger: ServerLogger,
): Promise<void> {
  const paths = await sessionManager.saveOutputs(sessionId);
  logger.info(`Outputs saved for session ${sessionId}: ${paths.length} files`);
  sendMessage(ws, { type: "outputs_saved", paths });
}

// ─── Message Parsing ────────────────────────────────────────────────────────────

function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf-8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf-8");
  return data.toString("utf-8");
}

/**
 * Validates an incoming JSON value as a ClientMessage.
 * @throws Error describing what is wrong with the message
 */
export function parseClientMessage(raw: unknown): ClientMessage {
  if (!isRecord(raw) || typeof raw.type !== "string") {
    throw new Error("Message must be a JSON object with a string \"type\"");
  }

  switch (raw.type) {
    case "start_interview": {
      if (typeof raw.candidateName !== "string" || typeof raw.role !== "string") {
        throw new Error("start_interview requires string candidateName and role");
      }
      if (raw.questionCount !== undefined && typeof raw.questionCount !== "number") {
        throw new Error("start_interview questionCount must be a number");
      }
      if (raw.seed !== undefined && typeof raw.seed !== "number") {
        throw new Error("start_interview seed must be a number");
      }
      if (raw.difficulty !== undefined && !isDifficulty(raw.difficulty)) {
        throw new Error("start_interview difficulty must be Easy, Medium or Hard");
      }
      return {
        type: "start_interview",
        candidateName: raw.candidateName,
        role: raw.role,
        questionCount: raw.questionCount,
        difficulty: raw.difficulty,
        seed: raw.seed,
      };
    }
    case "submit_answer":
      if (typeof raw.text !== "string") {
        throw new Error("submit_answer requires a string text");
      }
      return { type: "submit_answer", text: raw.text };
    case "transcription_failed":
      return {
        type: "transcription_failed",
        reason: typeof raw.reason === "string" ? raw.reason : "",
      };
    case "finish_interview":
    case "save_outputs":
    case "reset":
      return { type: raw.type };
    default:
      throw new Error(`Unknown message type: ${raw.type}`);
  }
}

// ─── Message Sending ────────────────────────────────────────────────────────────

/**
 * Sends a ServerMessage to the client as JSON text.
 * Silently ignores if the WebSocket is not in OPEN state.
 */
export function sendMessage(ws: WebSocket, message: ServerMessage): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(message));
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
