import { config as loadEnv } from "dotenv";
import { z } from "zod";

import { ConfigurationError } from "../errors/agent_errors";

if (process.env.NODE_ENV !== "production") {
  loadEnv();
}

// Blank variables (FOO= in .env) count as unset.
const blankAsUnset = (value: unknown) => (typeof value === "string" && value.trim() === "" ? undefined : value);

const optionalString = z.preprocess(blankAsUnset, z.string().trim().optional());
const flag = z.preprocess(blankAsUnset, z.enum(["0", "1", "true", "false"]).optional());
const positiveInt = (fallback: number) => z.preprocess(blankAsUnset, z.coerce.number().int().positive().default(fallback));
const nonNegativeInt = (fallback: number) =>
  z.preprocess(blankAsUnset, z.coerce.number().int().nonnegative().default(fallback));

const EnvSchema = z.object({
  NODE_ENV: optionalString,
  PORT: positiveInt(3333),
  HOST: z.preprocess(blankAsUnset, z.string().default("0.0.0.0")),
  LOG_LEVEL: z.preprocess(
    blankAsUnset,
    z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).optional()
  ),
  PINO_PRETTY: flag,
  AGENT_DB_PATH: z.preprocess(blankAsUnset, z.string().default("./data/agent_checkpoints.db")),
  AGENT_API_KEY: optionalString,
  LLM_PROVIDER: z.preprocess(blankAsUnset, z.enum(["fake", "openai"]).default("fake")),
  OPENAI_API_KEY: optionalString,
  OPENAI_MODEL: optionalString,
  OPENAI_BASE_URL: z.preprocess(blankAsUnset, z.string().url().default("https://api.openai.com/v1")),
  AZURE_OPENAI_ENDPOINT: optionalString,
  AZURE_OPENAI_API_KEY: optionalString,
  AZURE_OPENAI_DEPLOYMENT: optionalString,
  AZURE_OPENAI_API_VERSION: z.preprocess(blankAsUnset, z.string().default("2024-10-21")),
  AGENT_MAX_ITERATIONS: positiveInt(8),
  AGENT_TOOL_FANOUT: positiveInt(4),
  AGENT_TOOL_TIMEOUT_MS: positiveInt(15_000),
  AGENT_MODEL_TIMEOUT_MS: positiveInt(60_000),
  AGENT_TURN_TIMEOUT_MS: positiveInt(180_000),
  AGENT_MODEL_MAX_RETRIES: nonNegativeInt(2),
  AGENT_MODEL_BACKOFF_MS: nonNegativeInt(500),
  AGENT_COMMIT_MAX_RETRIES: nonNegativeInt(3),
  AGENT_PROMPTS_PATH: z.preprocess(blankAsUnset, z.string().default("config/agent_prompts.json")),
  PORTFOLIO_FIXTURE_PATH: z.preprocess(blankAsUnset, z.string().default("data/demo_portfolio.json")),
});

export type OrchestratorLimits = {
  maxIterations: number;
  toolFanout: number;
  toolTimeoutMs: number;
  modelTimeoutMs: number;
  turnTimeoutMs: number;
  modelMaxRetries: number;
  modelBackoffMs: number;
  commitMaxRetries: number;
};

export type ProviderSettings = {
  provider: "fake" | "openai";
  openai: { apiKey?: string; model?: string; baseUrl: string };
  azure: { endpoint?: string; apiKey?: string; deployment?: string; apiVersion: string };
};

export type AppConfig = {
  nodeEnv: string;
  port: number;
  host: string;
  logLevel?: string;
  prettyLogs: boolean;
  dbPath: string;
  apiKey?: string;
  providers: ProviderSettings;
  limits: OrchestratorLimits;
  promptsPath: string;
  portfolioFixturePath: string;
};

export const DEFAULT_LIMITS: OrchestratorLimits = {
  maxIterations: 8,
  toolFanout: 4,
  toolTimeoutMs: 15_000,
  modelTimeoutMs: 60_000,
  turnTimeoutMs: 180_000,
  modelMaxRetries: 2,
  modelBackoffMs: 500,
  commitMaxRetries: 3,
};

export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new ConfigurationError(`invalid environment: ${details}`);
  }
  const e = parsed.data;

  return {
    nodeEnv: e.NODE_ENV ?? "development",
    port: e.PORT,
    host: e.HOST,
    logLevel: e.LOG_LEVEL,
    prettyLogs: e.PINO_PRETTY === "1" || e.PINO_PRETTY === "true",
    dbPath: e.AGENT_DB_PATH,
    apiKey: e.AGENT_API_KEY,
    providers: {
      provider: e.LLM_PROVIDER,
      openai: { apiKey: e.OPENAI_API_KEY, model: e.OPENAI_MODEL, baseUrl: e.OPENAI_BASE_URL },
      azure: {
        endpoint: e.AZURE_OPENAI_ENDPOINT,
        apiKey: e.AZURE_OPENAI_API_KEY,
        deployment: e.AZURE_OPENAI_DEPLOYMENT,
        apiVersion: e.AZURE_OPENAI_API_VERSION,
      },
    },
    limits: {
      maxIterations: e.AGENT_MAX_ITERATIONS,
      toolFanout: e.AGENT_TOOL_FANOUT,
      toolTimeoutMs: e.AGENT_TOOL_TIMEOUT_MS,
      modelTimeoutMs: e.AGENT_MODEL_TIMEOUT_MS,
      turnTimeoutMs: e.AGENT_TURN_TIMEOUT_MS,
      modelMaxRetries: e.AGENT_MODEL_MAX_RETRIES,
      modelBackoffMs: e.AGENT_MODEL_BACKOFF_MS,
      commitMaxRetries: e.AGENT_COMMIT_MAX_RETRIES,
    },
    promptsPath: e.AGENT_PROMPTS_PATH,
    portfolioFixturePath: e.PORTFOLIO_FIXTURE_PATH,
  };
}
