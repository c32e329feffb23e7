// Interview Coach Engine - File Persistence
// Opt-in saving of interview outputs to disk.
//
// Privacy: Persistence is opt-in only. Files are only written when the client
// asks to save. Session data lives in server memory only until then.

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { buildSessionReport, renderSummaryExport } from "./session-insights.js";
import type { EngineConfig, InterviewSession, Metrics, ResponseRecord, SessionReport } from "./types.js";

export const RESPONSES_JSON = "responses.json";
export const RESPONSES_TEXT = "responses.txt";
export const REPORT_JSON = "report.json";
export const SUMMARY_TEXT = "summary.txt";

/** Contents of responses.json. */
export interface SavedSession {
  sessionId: string;
  candidateName: string | null;
  role: string | null;
  difficulty: string | null;
  startedAt: string | null;
  completedAt: string | null;
  responses: ResponseRecord[];
}

export interface LoadedSession {
  session: SavedSession;
  report: SessionReport;
}

/**
 * Renders records into the responses.txt format:
 *   Question 1: ...
 *   Answer: ...
 *   Scores: relevance 80 | confidence 70 | clarity 90 | overall 80
 *   Feedback: ...
 */
export function formatResponsesText(records: readonly ResponseRecord[]): string {
  return records
    .map((record, i) => {
      const m = record.metrics;
      return [
        `Question ${i + 1}: ${record.question}`,
        `Answer: ${record.answer}`,
        `Scores: relevance ${m.relevance} | confidence ${m.confidence} | clarity ${m.clarity} | overall ${m.score}`,
        `Feedback: ${record.feedbackText}`,
      ].join("\n");
    })
    .join("\n\n");
}

export function toSavedSession(session: InterviewSession): SavedSession {
  return {
    sessionId: session.id,
    candidateName: session.candidateName,
    role: session.role,
    difficulty: session.difficulty,
    startedAt: session.startedAt?.toISOString() ?? null,
    completedAt: session.completedAt?.toISOString() ?? null,
    responses: [...session.responses],
  };
}

/**
 * Generates the output directory name from a session.
 * Format: `{YYYY-MM-DD_HH-mm-ss}_{sessionId}`
 */
export function buildDirectoryName(session: InterviewSession): string {
  const date = session.startedAt ?? new Date();
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  const hours = String(date.getHours()).padStart(2, "0");
  const minutes = String(date.getMinutes()).padStart(2, "0");
  const seconds = String(date.getSeconds()).padStart(2, "0");

  const timestamp = `${year}-${month}-${day}_${hours}-${minutes}-${seconds}`;
  return `${timestamp}_${session.id}`;
}

/**
 * FilePersistence handles opt-in saving of interview outputs to disk.
 *
 * Output directory structure:
 *   {baseDir}/{YYYY-MM-DD_HH-mm-ss}_{sessionId}/
 *     responses.json
 *     responses.txt
 *     report.json
 *     summary.txt
 */
export class FilePersistence {
  private baseDir: string;

  constructor(baseDir: string = "output") {
    this.baseDir = baseDir;
  }

  /**
   * Saves session outputs to disk. The session must already carry its report.
   * Sets session.outputsSaved = true after a successful save.
   *
   * @returns Array of file paths that were written.
   */
  async saveSession(session: InterviewSession): Promise<string[]> {
    const report = session.report;
    if (!report) {
      throw new Error(`Session ${session.id} has no report to save`);
    }

    const dirPath = join(this.baseDir, buildDirectoryName(session));
    await mkdir(dirPath, { recursive: true });

    const files: Array<[string, string]> = [
      [RESPONSES_JSON, JSON.stringify(toSavedSession(session), null, 2)],
      [RESPONSES_TEXT, formatResponsesText(session.responses)],
      [REPORT_JSON, JSON.stringify(report, null, 2)],
      [SUMMARY_TEXT, renderSummaryExport(report, session.completedAt ?? new Date())],
    ];

    const savedPaths: string[] = [];
    for (const [name, content] of files) {
      const path = join(dirPath, name);
      await writeFile(path, content, "utf-8");
      savedPaths.push(path);
    }

    session.outputsSaved = true;
    return savedPaths;
  }
}

/**
 * Read a saved session back and rebuild its report from the records.
 * The saved report.json is never trusted: statistics are a cache.
 *
 * @throws Error when responses.json is missing or malformed
 */
export async function loadSavedReport(dirPath: string, config: EngineConfig): Promise<LoadedSession> {
  const raw: unknown = JSON.parse(await readFile(join(dirPath, RESPONSES_JSON), "utf-8"));
  const session = parseSavedSession(raw);
  return { session, report: buildSessionReport(session.responses, config) };
}

// ─── Validation ─────────────────────────────────────────────────────────────────

export function parseSavedSession(raw: unknown): SavedSession {
  if (!isRecord(raw) || typeof raw.sessionId !== "string" || !Array.isArray(raw.responses)) {
    throw new Error(`${RESPONSES_JSON} must contain a sessionId and a responses array`);
  }

  return {
    sessionId: raw.sessionId,
    candidateName: optionalString(raw.candidateName),
    role: optionalString(raw.role),
    difficulty: optionalString(raw.difficulty),
    startedAt: optionalString(raw.startedAt),
    completedAt: optionalString(raw.completedAt),
    responses: raw.responses.map((entry: unknown, i: number) => parseResponseRecord(entry, i + 1)),
  };
}

/** @param position 1-based, used in error messages */
export function parseResponseRecord(raw: unknown, position: number): ResponseRecord {
  if (
    !isRecord(raw) ||
    typeof raw.question !== "string" ||
    typeof raw.answer !== "string" ||
    typeof raw.feedbackText !== "string" ||
    typeof raw.timestamp !== "string" ||
    !isRecord(raw.metrics)
  ) {
    throw new Error(`Response ${position} is malformed`);
  }

  const metrics: Metrics = {
    relevance: readMetric(raw.metrics.relevance, "relevance", position),
    confidence: readMetric(raw.metrics.confidence, "confidence", position),
    clarity: readMetric(raw.metrics.clarity, "clarity", position),
    score: readMetric(raw.metrics.score, "score", position),
  };

  return {
    question: raw.question,
    answer: raw.answer,
    metrics,
    feedbackText: raw.feedbackText,
    timestamp: raw.timestamp,
  };
}

function readMetric(value: unknown, name: string, position: number): number {
  if (typeof value !== "number" || !Number.isFinite(value) || value < 0 || value > 100) {
    throw new Error(`Response ${position} has an invalid ${name} metric`);
  }
  return value;
}

function optionalString(value: unknown): string | null {
  return typeof value === "string" ? value : null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
