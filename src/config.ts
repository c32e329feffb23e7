// Interview Coach Engine - Configuration
// Builds the immutable EngineConfig shared by every component, and reads the
// process-level settings from the environment.

import { readFile } from "node:fs/promises";
import { ConfigError } from "./errors.js";
import type { EngineConfig, RuntimeSettings } from "./types.js";

// ─── Defaults ───────────────────────────────────────────────────────────────────

export const DEFAULT_CONFIG: EngineConfig = deepFreeze<EngineConfig>({
  fillerWords: [
    "um", "uh", "like", "you know", "so", "well", "basically",
    "literally", "sort of", "kind of", "right", "okay", "actually",
    "honestly", "essentially", "pretty much", "I mean",
  ],
  pauseIndicators: ["...", "--", "——", "…"],
  exampleKeywords: [
    "example", "case", "project", "worked on", "built", "created",
    "implemented", "developed", "designed", "led", "managed",
  ],
  starMethodKeywords: [
    "situation", "task", "action", "result", "challenge", "goal",
    "achieved", "impact", "outcome", "delivered", "responsibility",
    "objective",
  ],
  technicalKeywords: [
    "api", "algorithm", "database", "system", "architecture",
    "performance", "debug", "deploy", "scale", "cache", "index",
    "query", "framework", "pattern", "microservice", "cloud",
    "container", "orchestration", "pipeline", "testing", "refactor",
  ],
  relevanceWeight: 0.5,
  confidenceWeight: 0.25,
  clarityWeight: 0.25,
  minimumAnswerWordsForAnalysis: 60,
  recommendedAnswerWordRange: [90, 200],
  maxQuestionsPerInterview: 4,
});

export const DEFAULT_EMBEDDING_MODEL = "text-embedding-3-small";

const KEYWORD_LIST_FIELDS = [
  "fillerWords",
  "pauseIndicators",
  "exampleKeywords",
  "starMethodKeywords",
  "technicalKeywords",
] as const;

const WEIGHT_FIELDS = ["relevanceWeight", "confidenceWeight", "clarityWeight"] as const;

// ─── Construction ───────────────────────────────────────────────────────────────

/**
 * Merge `input` over the defaults field by field and validate the result.
 * Absent fields keep their default; an explicitly empty keyword list is kept
 * (the feature it drives never triggers).
 *
 * @throws ConfigError naming the first malformed field
 */
export function createConfig(input: unknown = {}): EngineConfig {
  if (!isRecord(input)) {
    throw new ConfigError("Engine configuration must be a JSON object");
  }
  const overrides: Record<string, unknown> = input;

  const list = (field: (typeof KEYWORD_LIST_FIELDS)[number]): readonly string[] =>
    field in overrides ? readStringList(overrides[field], field) : DEFAULT_CONFIG[field];
  const weight = (field: (typeof WEIGHT_FIELDS)[number]): number =>
    field in overrides ? readWeight(overrides[field], field) : DEFAULT_CONFIG[field];

  const minimumAnswerWordsForAnalysis =
    "minimumAnswerWordsForAnalysis" in overrides
      ? readNonNegativeInteger(overrides.minimumAnswerWordsForAnalysis, "minimumAnswerWordsForAnalysis")
      : DEFAULT_CONFIG.minimumAnswerWordsForAnalysis;

  const maxQuestionsPerInterview =
    "maxQuestionsPerInterview" in overrides
      ? readNonNegativeInteger(overrides.maxQuestionsPerInterview, "maxQuestionsPerInterview")
      : DEFAULT_CONFIG.maxQuestionsPerInterview;
  if (maxQuestionsPerInterview === 0) {
    throw new ConfigError("maxQuestionsPerInterview must be at least 1", "maxQuestionsPerInterview");
  }

  const recommendedAnswerWordRange =
    "recommendedAnswerWordRange" in overrides
      ? readWordRange(overrides.recommendedAnswerWordRange)
      : DEFAULT_CONFIG.recommendedAnswerWordRange;

  return deepFreeze<EngineConfig>({
    fillerWords: list("fillerWords"),
    pauseIndicators: list("pauseIndicators"),
    exampleKeywords: list("exampleKeywords"),
    starMethodKeywords: list("starMethodKeywords"),
    technicalKeywords: list("technicalKeywords"),
    relevanceWeight: weight("relevanceWeight"),
    confidenceWeight: weight("confidenceWeight"),
    clarityWeight: weight("clarityWeight"),
    minimumAnswerWordsForAnalysis,
    recommendedAnswerWordRange,
    maxQuestionsPerInterview,
  });
}

/**
 * Load engine configuration from a JSON file. Without a path, the defaults
 * are returned.
 *
 * @throws ConfigError if the file cannot be read, is not valid JSON, or fails validation
 */
export async function loadConfig(path?: string | null): Promise<EngineConfig> {
  if (!path) {
    return DEFAULT_CONFIG;
  }

  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot read configuration file ${path}: ${reason}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Configuration file ${path} is not valid JSON: ${reason}`);
  }

  return createConfig(parsed);
}

/** Sum of the three scoring weights. Expected to be 1.0 but not enforced. */
export function weightSum(config: EngineConfig): number {
  return config.relevanceWeight + config.confidenceWeight + config.clarityWeight;
}

// ─── Runtime Settings ───────────────────────────────────────────────────────────

export function loadRuntimeSettings(env: NodeJS.ProcessEnv = process.env): RuntimeSettings {
  const port = parseInt(env.PORT || "3000", 10);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigError(`PORT must be an integer between 0 and 65535, got "${env.PORT}"`, "PORT");
  }

  const provider = (env.EMBEDDING_PROVIDER || "openai").toLowerCase();
  if (provider !== "openai" && provider !== "lexical") {
    throw new ConfigError(
      `EMBEDDING_PROVIDER must be "openai" or "lexical", got "${env.EMBEDDING_PROVIDER}"`,
      "EMBEDDING_PROVIDER",
    );
  }

  return {
    port,
    openaiApiKey: env.OPENAI_API_KEY || null,
    embeddingProvider: provider,
    embeddingModel: env.EMBEDDING_MODEL || DEFAULT_EMBEDDING_MODEL,
    configFile: env.CONFIG_FILE || null,
    questionBankFile: env.QUESTION_BANK_FILE || null,
    outputDir: env.OUTPUT_DIR || "output",
  };
}

// ─── Field readers ──────────────────────────────────────────────────────────────

function readStringList(value: unknown, field: string): readonly string[] {
  if (!Array.isArray(value)) {
    throw new ConfigError(`${field} must be an array of strings`, field);
  }
  const items: string[] = [];
  for (const item of value) {
    if (typeof item !== "string") {
      throw new ConfigError(`${field} must contain only strings`, field);
    }
    items.push(item);
  }
  return items;
}

function readWeight(value: unknown, field: string): number {
  if (typeof value !== "number" || !Number.isFinite(value) || value < 0) {
    throw new ConfigError(`${field} must be a non-negative finite number`, field);
  }
  return value;
}

function readNonNegativeInteger(value: unknown, field: string): number {
  if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
    throw new ConfigError(`${field} must be a non-negative integer`, field);
  }
  return value;
}

function readWordRange(value: unknown): readonly [number, number] {
  const field = "recommendedAnswerWordRange";
  if (!Array.isArray(value) || value.length !== 2) {
    throw new ConfigError(`${field} must be a [min, max] pair`, field);
  }
  const min = readNonNegativeInteger(value[0], field);
  const max = readNonNegativeInteger(value[1], field);
  if (min > max) {
    throw new ConfigError(`${field} minimum exceeds maximum`, field);
  }
  return [min, max];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null) {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}
