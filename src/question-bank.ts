// Interview Coach Engine - Question Bank
// Role-specific interview questions loaded from JSON, with random or seeded
// selection.

import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { ConfigError } from "./errors.js";
import { createSeededRandom, defaultRandomSource, sample, type RandomSource } from "./random.js";
import type { Difficulty, QuestionBankData, RoleQuestions } from "./types.js";

export const DIFFICULTIES: readonly Difficulty[] = ["Easy", "Medium", "Hard"];

/** The bank shipped with the project, resolved relative to this module. */
export const BUNDLED_QUESTION_BANK_PATH = fileURLToPath(
  new URL("../data/question-bank.json", import.meta.url),
);

export interface SelectionOptions {
  /** Reproducible selection. Ignored when `rng` is given. */
  seed?: number;
  rng?: RandomSource;
}

export class QuestionBank {
  private readonly roles: ReadonlyMap<string, RoleQuestions>;

  constructor(data: QuestionBankData) {
    this.roles = new Map(Object.entries(data));
  }

  static async fromFile(path: string = BUNDLED_QUESTION_BANK_PATH): Promise<QuestionBank> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(await readFile(path, "utf-8"));
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ConfigError(`Cannot load question bank ${path}: ${reason}`);
    }
    return new QuestionBank(parseQuestionBank(parsed));
  }

  listRoles(): string[] {
    return [...this.roles.keys()];
  }

  hasRole(role: string): boolean {
    return this.roles.has(role);
  }

  /** @throws Error for an unknown role */
  questionsFor(role: string): readonly string[] {
    return this.getRole(role).questions;
  }

  /**
   * Pick `count` distinct questions for `role`. When the role has fewer than
   * `count` questions, all of them are returned in bank order.
   *
   * @throws Error for an unknown role
   */
  selectQuestions(role: string, count: number, options: SelectionOptions = {}): string[] {
    const available = this.getRole(role).questions;
    if (available.length < count) {
      return [...available];
    }
    return sample(available, count, resolveRandom(options));
  }

  /**
   * Prefer questions tagged with `difficulty`; when there are not enough,
   * sample from the difficulty pool combined with the role's general questions.
   *
   * @throws Error for an unknown role
   */
  selectQuestionsByDifficulty(
    role: string,
    difficulty: Difficulty,
    count: number,
    options: SelectionOptions = {},
  ): string[] {
    const entry = this.getRole(role);
    const pool = entry.byDifficulty?.[difficulty] ?? [];
    const rng = resolveRandom(options);

    if (pool.length >= count) {
      return sample(pool, count, rng);
    }

    const combined = [...new Set([...pool, ...entry.questions])];
    return sample(combined, Math.min(count, combined.length), rng);
  }

  private getRole(role: string): RoleQuestions {
    const entry = this.roles.get(role);
    if (!entry) {
      throw new Error(`Unknown interview role: "${role}". Available roles: ${this.listRoles().join(", ")}`);
    }
    return entry;
  }
}

function resolveRandom(options: SelectionOptions): RandomSource {
  if (options.rng) return options.rng;
  if (options.seed !== undefined) return createSeededRandom(options.seed);
  return defaultRandomSource;
}

export function isDifficulty(value: unknown): value is Difficulty {
  return typeof value === "string" && (DIFFICULTIES as readonly string[]).includes(value);
}

// ─── Parsing ────────────────────────────────────────────────────────────────────

/**
 * Validate raw JSON as a question bank.
 * @throws ConfigError describing the first malformed entry
 */
export function parseQuestionBank(raw: unknown): QuestionBankData {
  if (!isRecord(raw)) {
    throw new ConfigError("Question bank must be a JSON object keyed by role");
  }

  const bank: QuestionBankData = {};
  for (const [role, value] of Object.entries(raw)) {
    if (!isRecord(value)) {
      throw new ConfigError(`Question bank entry for "${role}" must be an object`, role);
    }

    const questions = readQuestionList(value.questions, `${role}.questions`);
    if (questions.length === 0) {
      throw new ConfigError(`Role "${role}" has no questions`, role);
    }

    const entry: RoleQuestions = { questions };
    if (value.byDifficulty !== undefined) {
      if (!isRecord(value.byDifficulty)) {
        throw new ConfigError(`${role}.byDifficulty must be an object`, role);
      }
      const byDifficulty: Partial<Record<Difficulty, string[]>> = {};
      for (const [level, list] of Object.entries(value.byDifficulty)) {
        if (!isDifficulty(level)) {
          throw new ConfigError(`Unknown difficulty "${level}" for role "${role}"`, role);
        }
        byDifficulty[level] = readQuestionList(list, `${role}.byDifficulty.${level}`);
      }
      entry.byDifficulty = byDifficulty;
    }

    bank[role] = entry;
  }
  return bank;
}

function readQuestionList(value: unknown, field: string): string[] {
  if (!Array.isArray(value) || !value.every((q) => typeof q === "string" && q.trim().length > 0)) {
    throw new ConfigError(`${field} must be an array of non-empty strings`, field);
  }
  return value.map((q: string) => q.trim());
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
