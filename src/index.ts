// Interview Coach Engine - Entry point
// Wires up all pipeline dependencies and starts the server.

import "dotenv/config";
import path from "node:path";
import { fileURLToPath } from "node:url";
import OpenAI from "openai";
import { createAppServer, type AppServer } from "./server.js";
import { loadConfig, loadRuntimeSettings, weightSum } from "./config.js";
import { ConfigError } from "./errors.js";
import { LexicalEmbeddingService, OpenAIEmbeddingService, type EmbeddingService } from "./embedding-service.js";
import { RelevanceScorer } from "./relevance-scorer.js";
import { ResponseAnalyzer } from "./response-analyzer.js";
import { QuestionBank } from "./question-bank.js";
import { FilePersistence } from "./file-persistence.js";
import type { RuntimeSettings } from "./types.js";

export const APP_NAME = "Interview Coach Engine";
export const APP_VERSION = "0.1.0";

const ts = () => new Date().toISOString();
const logInit = (msg: string) => console.log(`[INIT] [${ts()}] ${msg}`);
const logWarn = (msg: string) => console.warn(`[WARN] [${ts()}] ${msg}`);
const logFatal = (msg: string) => console.error(`[FATAL] [${ts()}] ${msg}`);

/**
 * The embedding backend for relevance scoring. "lexical" runs offline;
 * "openai" needs OPENAI_API_KEY.
 */
export function createEmbeddingService(settings: RuntimeSettings): EmbeddingService {
  if (settings.embeddingProvider === "lexical") {
    return new LexicalEmbeddingService();
  }
  if (!settings.openaiApiKey) {
    throw new ConfigError(
      "OPENAI_API_KEY is not set. Add it to your .env file or set EMBEDDING_PROVIDER=lexical.",
      "OPENAI_API_KEY",
    );
  }
  return new OpenAIEmbeddingService(new OpenAI({ apiKey: settings.openaiApiKey }), settings.embeddingModel);
}

/** Load settings, build the pipeline and start listening. */
export async function main(env: NodeJS.ProcessEnv = process.env): Promise<AppServer> {
  const settings = loadRuntimeSettings(env);
  logInit("Runtime settings loaded");

  const config = await loadConfig(settings.configFile);
  logInit(settings.configFile ? `Engine config loaded from ${settings.configFile}` : "Using default engine config");

  const sum = weightSum(config);
  if (Math.abs(sum - 1) > 1e-9) {
    logWarn(`Scoring weights sum to ${sum}, not 1.0; overall scores will be scaled accordingly`);
  }

  logInit(`Initializing embeddings (${settings.embeddingProvider})...`);
  const embeddings = createEmbeddingService(settings);

  logInit("Loading question bank...");
  const questionBank = settings.questionBankFile
    ? await QuestionBank.fromFile(settings.questionBankFile)
    : await QuestionBank.fromFile();
  logInit(`Question bank ready: ${questionBank.listRoles().join(", ")}`);

  const analyzer = new ResponseAnalyzer(config, new RelevanceScorer(embeddings));

  logInit(`Initializing FilePersistence (${settings.outputDir}/)...`);
  const filePersistence = new FilePersistence(settings.outputDir);

  const server = createAppServer({ config, analyzer, questionBank, filePersistence });
  await server.listen(settings.port);

  logInit(`${APP_NAME} v${APP_VERSION} running at http://localhost:${settings.port}`);
  logInit("Pipeline: Relevance → Lexical features → Clarity/Confidence → Score → Feedback");
  logInit("Ready for connections");
  return server;
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  return entry !== undefined && path.resolve(entry) === fileURLToPath(import.meta.url);
}

if (isEntryPoint()) {
  main().catch((err: unknown) => {
    logFatal(err instanceof Error ? err.message : String(err));
    process.exit(1);
  });
}
