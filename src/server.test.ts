// Interview Coach Engine - Server Unit Tests
// REST endpoints and the WebSocket interview protocol

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import WebSocket from "ws";
import { createAppServer, parseClientMessage, type AppServer } from "./server.js";
import { SessionState, type ServerMessage } from "./types.js";
import { DEFAULT_CONFIG } from "./config.js";
import { ResponseAnalyzer } from "./response-analyzer.js";
import { RelevanceScorer } from "./relevance-scorer.js";
import { QuestionBank } from "./question-bank.js";
import type { EmbeddingService } from "./embedding-service.js";

// ─── Test Helpers ───────────────────────────────────────────────────────────────

const TEST_PORT = 0; // Let OS assign a random port

// Fewer questions than the default count, so both are asked in bank order
const QUESTIONS = ["Tell me about a system you built.", "How do you handle code review?"];
const DETAILED = `I built it. ${Array.from({ length: 125 }, () => "word").join(" ")}`;

/** Silent logger for tests */
function createSilentLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

const alignedEmbeddings: EmbeddingService = { embed: async () => [1, 0] };
const failingEmbeddings: EmbeddingService = {
  embed: async () => {
    throw new Error("rate limited");
  },
};

function createTestServer(
  logger: ReturnType<typeof createSilentLogger>,
  embeddings: EmbeddingService = alignedEmbeddings,
): AppServer {
  return createAppServer({
    config: DEFAULT_CONFIG,
    analyzer: new ResponseAnalyzer(DEFAULT_CONFIG, new RelevanceScorer(embeddings)),
    questionBank: new QuestionBank({ Engineer: { questions: QUESTIONS } }),
    logger,
  });
}

type MessageOfType<T extends ServerMessage["type"]> = Extract<ServerMessage, { type: T }>;

function isMessageOfType<T extends ServerMessage["type"]>(msg: ServerMessage, type: T): msg is MessageOfType<T> {
  return msg.type === type;
}

/**
 * A test WebSocket client that queues all incoming messages.
 * Messages are buffered so none are lost to race conditions.
 */
class TestClient {
  ws: WebSocket;
  private messageQueue: ServerMessage[] = [];
  private waiters: Array<(msg: ServerMessage) => void> = [];

  constructor(url: string) {
    this.ws = new WebSocket(url);
    this.ws.on("message", (data: WebSocket.RawData) => {
      const text = Buffer.isBuffer(data) ? data.toString("utf-8") : String(data);
      const msg: ServerMessage = JSON.parse(text);
      // If someone is waiting for a message, deliver immediately
      const waiter = this.waiters.shift();
      if (waiter) {
        waiter(msg);
      } else {
        this.messageQueue.push(msg);
      }
    });
  }

  /** Wait for the WebSocket to open */
  async waitForOpen(): Promise<void> {
    if (this.ws.readyState === WebSocket.OPEN) return;
    return new Promise((resolve, reject) => {
      this.ws.on("open", resolve);
      this.ws.on("error", reject);
    });
  }

  /** Get the next message (from queue or wait for one) */
  nextMessage(timeoutMs = 3000): Promise<ServerMessage> {
    const queued = this.messageQueue.shift();
    if (queued) {
      return Promise.resolve(queued);
    }
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        const idx = this.waiters.indexOf(waiterFn);
        if (idx >= 0) this.waiters.splice(idx, 1);
        reject(new Error(`nextMessage timed out after ${timeoutMs}ms`));
      }, timeoutMs);

      const waiterFn = (msg: ServerMessage) => {
        clearTimeout(timer);
        resolve(msg);
      };
      this.waiters.push(waiterFn);
    });
  }

  /** Get the next message matching a specific type (skips non-matching messages) */
  async nextMessageOfType<T extends ServerMessage["type"]>(type: T, timeoutMs = 3000): Promise<MessageOfType<T>> {
    const deadline = Date.now() + timeoutMs;
    while (Date.now() < deadline) {
      const msg = await this.nextMessage(deadline - Date.now());
      if (isMessageOfType(msg, type)) return msg;
    }
    throw new Error(`nextMessageOfType("${type}") timed out after ${timeoutMs}ms`);
  }

  sendJson(message: unknown): void {
    this.ws.send(JSON.stringify(message));
  }

  close(): void {
    if (this.ws.readyState === WebSocket.OPEN || this.ws.readyState === WebSocket.CONNECTING) {
      this.ws.close();
    }
  }
}

function getPort(server: AppServer): number {
  const addr = server.httpServer.address();
  if (typeof addr === "string" || addr === null) {
    throw new Error("Unexpected server address format");
  }
  return addr.port;
}

/** Creates a connected TestClient and consumes the initial state_change message */
async function createClient(server: AppServer): Promise<TestClient> {
  const client = new TestClient(`ws://127.0.0.1:${getPort(server)}`);
  await client.waitForOpen();
  const initial = await client.nextMessage();
  expect(initial).toEqual({ type: "state_change", state: SessionState.IDLE });
  return client;
}

// ─── Tests ──────────────────────────────────────────────────────────────────────

describe("Server", () => {
  let server: AppServer;
  let silentLogger: ReturnType<typeof createSilentLogger>;
  let clients: TestClient[];

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    silentLogger = createSilentLogger();
    server = createTestServer(silentLogger);
    await server.listen(TEST_PORT);
    clients = [];
  });

  afterEach(async () => {
    for (const c of clients) c.close();
    await server.close();
    vi.restoreAllMocks();
  });

  function track(client: TestClient): TestClient {
    clients.push(client);
    return client;
  }

  function post(path: string, body: string): Promise<Response> {
    return fetch(`http://127.0.0.1:${getPort(server)}${path}`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body,
    });
  }

  // ─── REST ───────────────────────────────────────────────────────────────────

  describe("REST endpoints", () => {
    it("GET /health reports ok", async () => {
      const res = await fetch(`http://127.0.0.1:${getPort(server)}/health`);
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ status: "ok" });
    });

    it("GET /api/roles lists the bank roles", async () => {
      const res = await fetch(`http://127.0.0.1:${getPort(server)}/api/roles`);
      expect(await res.json()).toEqual({ roles: ["Engineer"] });
    });

    it("POST /api/analyze scores one answer", async () => {
      const res = await post("/api/analyze", JSON.stringify({ question: QUESTIONS[0], answer: DETAILED }));
      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        metrics: { relevance: 100, confidence: 98, clarity: 90, score: 97 },
        tooShort: false,
      });
    });

    it.each([
      [JSON.stringify({ question: "Q" }), "Body must be {question: string, answer: string}"],
      [JSON.stringify({ question: "  ", answer: "A" }), "Question must not be empty"],
    ])("POST /api/analyze rejects %s", async (body, error) => {
      const res = await post("/api/analyze", body);
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error });
    });

    it("POST /api/analyze refuses a transcription failure marker", async () => {
      const res = await post(
        "/api/analyze",
        JSON.stringify({ question: QUESTIONS[0], answer: "[Transcription service error: recognition request failed]" }),
      );
      expect(res.status).toBe(422);
      expect(await res.json()).toEqual({ error: "Transcription service error: recognition request failed" });
    });

    it("POST /api/analyze still scores a blank answer on the short path", async () => {
      const res = await post("/api/analyze", JSON.stringify({ question: QUESTIONS[0], answer: "" }));
      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        metrics: { relevance: 5, confidence: 15, clarity: 20, score: 13 },
        tooShort: true,
      });
    });

    it("POST /api/analyze rejects malformed JSON", async () => {
      const res = await post("/api/analyze", "{ nope");
      expect(res.status).toBe(400);
    });

    it("POST /api/report builds a report from records", async () => {
      const records = [
        {
          question: "Q1",
          answer: "A1",
          metrics: { relevance: 82, confidence: 70, clarity: 90, score: 81 },
          feedbackText: "Good.",
          timestamp: "2026-03-02T14:05:09.000Z",
        },
        {
          question: "Q2",
          answer: "A2",
          metrics: { relevance: 5, confidence: 15, clarity: 20, score: 13 },
          feedbackText: "Short.",
          timestamp: "2026-03-02T14:07:30.000Z",
        },
      ];
      const res = await post("/api/report", JSON.stringify({ records }));
      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        statistics: { overallAverageScore: 47, highestScore: 81, lowestScore: 13, totalQuestions: 2 },
      });
    });

    it.each([
      [{ records: [] }, "Cannot compute session statistics: no responses recorded"],
      [{ records: [{ question: "Q" }] }, "Response 1 is malformed"],
      [{}, "Body must be {records: ResponseRecord[]}"],
    ])("POST /api/report rejects %o", async (body, error) => {
      const res = await post("/api/report", JSON.stringify(body));
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error });
    });
  });

  // ─── WebSocket protocol ─────────────────────────────────────────────────────

  describe("interview flow", () => {
    it("runs an interview to its report", async () => {
      const client = track(await createClient(server));

      client.sendJson({ type: "start_interview", candidateName: "Sam", role: "Engineer" });
      expect(await client.nextMessage()).toEqual({ type: "state_change", state: SessionState.INTERVIEWING });
      expect(await client.nextMessage()).toEqual({ type: "question", index: 0, total: 2, text: QUESTIONS[0] });

      client.sendJson({ type: "submit_answer", text: DETAILED });
      const first = await client.nextMessageOfType("answer_analyzed");
      expect(first.questionNumber).toBe(1);
      expect(first.record.metrics).toEqual({ relevance: 100, confidence: 98, clarity: 90, score: 97 });
      expect(await client.nextMessage()).toEqual({ type: "question", index: 1, total: 2, text: QUESTIONS[1] });

      client.sendJson({ type: "submit_answer", text: "Too short." });
      const second = await client.nextMessageOfType("answer_analyzed");
      expect(second.record.metrics.score).toBe(13);
      expect(await client.nextMessage()).toEqual({ type: "state_change", state: SessionState.COMPLETED });

      const { report } = await client.nextMessageOfType("session_report");
      expect(report.statistics.overallAverageScore).toBe(55);
      expect(report.statistics.totalQuestions).toBe(2);
    });

    it("finishes early on request", async () => {
      const client = track(await createClient(server));
      client.sendJson({ type: "start_interview", candidateName: "Sam", role: "Engineer" });
      await client.nextMessageOfType("question");

      client.sendJson({ type: "submit_answer", text: "Too short." });
      await client.nextMessageOfType("question");
      client.sendJson({ type: "finish_interview" });

      expect(await client.nextMessage()).toEqual({ type: "state_change", state: SessionState.COMPLETED });
      const { report } = await client.nextMessageOfType("session_report");
      expect(report.statistics.totalQuestions).toBe(1);
    });

    it("reports transcription failures without recording", async () => {
      const client = track(await createClient(server));
      client.sendJson({ type: "start_interview", candidateName: "Sam", role: "Engineer" });
      await client.nextMessageOfType("question");

      client.sendJson({ type: "transcription_failed", reason: "Microphone disconnected" });
      expect(await client.nextMessage()).toEqual({ type: "transcription_error", message: "Microphone disconnected" });

      client.sendJson({ type: "submit_answer", text: "[No speech detected]" });
      expect(await client.nextMessage()).toEqual({ type: "transcription_error", message: "No speech detected" });

      client.sendJson({ type: "finish_interview" });
      expect(await client.nextMessage()).toEqual({
        type: "error",
        message: "Cannot compute session statistics: no responses recorded",
        recoverable: true,
      });
    });

    it("resets to IDLE", async () => {
      const client = track(await createClient(server));
      client.sendJson({ type: "start_interview", candidateName: "Sam", role: "Engineer" });
      await client.nextMessageOfType("question");

      client.sendJson({ type: "reset" });
      expect(await client.nextMessage()).toEqual({ type: "state_change", state: SessionState.IDLE });
    });

    it("saves nothing when persistence is disabled", async () => {
      const client = track(await createClient(server));
      client.sendJson({ type: "start_interview", candidateName: "Sam", role: "Engineer" });
      await client.nextMessageOfType("question");
      client.sendJson({ type: "submit_answer", text: "Too short." });
      await client.nextMessageOfType("question");

      client.sendJson({ type: "save_outputs" });
      expect(await client.nextMessage()).toEqual({ type: "outputs_saved", paths: [] });
    });
  });

  describe("protocol errors", () => {
    it("rejects malformed JSON as recoverable", async () => {
      const client = track(await createClient(server));
      client.ws.send("not json");
      const msg = await client.nextMessageOfType("error");
      expect(msg.recoverable).toBe(true);
    });

    it("rejects binary frames", async () => {
      const client = track(await createClient(server));
      client.ws.send(Buffer.from([1, 2, 3]));
      expect(await client.nextMessage()).toEqual({
        type: "error",
        message: "Binary frames are not supported; send JSON messages.",
        recoverable: true,
      });
    });

    it("rejects answers before the interview starts", async () => {
      const client = track(await createClient(server));
      client.sendJson({ type: "submit_answer", text: DETAILED });
      expect(await client.nextMessage()).toEqual({
        type: "error",
        message: 'Invalid state: cannot call submitAnswer() in "idle" state. Expected state: "interviewing".',
        recoverable: true,
      });
    });

    it("rejects an unknown role", async () => {
      const client = track(await createClient(server));
      client.sendJson({ type: "start_interview", candidateName: "Sam", role: "Pilot" });
      expect(await client.nextMessage()).toEqual({
        type: "error",
        message: 'Unknown interview role: "Pilot". Available roles: Engineer',
        recoverable: true,
      });
    });
  });
});

describe("Server with a failing embedding service", () => {
  let server: AppServer;

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    server = createTestServer(createSilentLogger(), failingEmbeddings);
    await server.listen(TEST_PORT);
  });

  afterEach(async () => {
    await server.close();
    vi.restoreAllMocks();
  });

  it("sends analysis_error and keeps the question open", async () => {
    const client = await createClient(server);
    client.sendJson({ type: "start_interview", candidateName: "Sam", role: "Engineer" });
    await client.nextMessageOfType("question");

    client.sendJson({ type: "submit_answer", text: DETAILED });
    expect(await client.nextMessage()).toEqual({
      type: "analysis_error",
      stage: "relevance",
      message: "Embedding service failed: rate limited",
    });

    // Short answers skip the embedder, so the same question can still be answered
    client.sendJson({ type: "submit_answer", text: "Too short." });
    const analyzed = await client.nextMessageOfType("answer_analyzed");
    expect(analyzed.record.question).toBe(QUESTIONS[0]);
    client.close();
  });

  it("answers POST /api/analyze with 502", async () => {
    const res = await fetch(`http://127.0.0.1:${getPort(server)}/api/analyze`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ question: QUESTIONS[0], answer: DETAILED }),
    });
    expect(res.status).toBe(502);
    expect(await res.json()).toEqual({ error: "Embedding service failed: rate limited", stage: "relevance" });
  });
});

// ─── parseClientMessage ─────────────────────────────────────────────────────────

describe("parseClientMessage", () => {
  it("accepts a full start_interview message", () => {
    expect(
      parseClientMessage({
        type: "start_interview",
        candidateName: "Sam",
        role: "Engineer",
        questionCount: 2,
        difficulty: "Hard",
        seed: 7,
      }),
    ).toEqual({
      type: "start_interview",
      candidateName: "Sam",
      role: "Engineer",
      questionCount: 2,
      difficulty: "Hard",
      seed: 7,
    });
  });

  it("defaults a missing failure reason to empty", () => {
    expect(parseClientMessage({ type: "transcription_failed" })).toEqual({ type: "transcription_failed", reason: "" });
  });

  it.each([
    [null, 'Message must be a JSON object with a string "type"'],
    [{ type: "start_interview", role: "Engineer" }, "start_interview requires string candidateName and role"],
    [
      { type: "start_interview", candidateName: "Sam", role: "Engineer", difficulty: "Brutal" },
      "start_interview difficulty must be Easy, Medium or Hard",
    ],
    [{ type: "submit_answer" }, "submit_answer requires a string text"],
    [{ type: "dance" }, "Unknown message type: dance"],
  ])("rejects %o", (raw, message) => {
    expect(() => parseClientMessage(raw)).toThrow(message);
  });
});
