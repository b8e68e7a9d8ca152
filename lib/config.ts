// lib/config.ts
// Environment-driven settings. Read on every call so route handlers pick up
// changes to process.env (Next.js loads .env.local before the first request).

export type LLMProvider = "openai" | "anthropic";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type AppConfig = {
  llm: {
    provider: string;
    model: string;
    apiKey: string | undefined;
    maxTokens: number;
    temperature: number;
  };
  embedding: {
    model: string;
    apiKey: string | undefined;
    dimension: number;
  };
  vectorIndexPath: string;
  logLevel: LogLevel;
  corsOrigins: string[];
  adminToken: string | undefined;
  postgresUrl: string | undefined;
  queryLogDir: string;
};

export const DEFAULT_TOP_K = 5;

const LOG_LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];

function envInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const n = Number.parseInt(raw, 10);
  return Number.isFinite(n) && n > 0 ? n : fallback;
}

function envFloat(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const n = Number.parseFloat(raw);
  return Number.isFinite(n) ? n : fallback;
}

function nonEmpty(value: string | undefined): string | undefined {
  const v = value?.trim();
  return v ? v : undefined;
}

function parseLogLevel(raw: string | undefined): LogLevel {
  const v = (raw ?? "").toLowerCase();
  return LOG_LEVELS.find((l) => l === v) ?? "info";
}

export function getConfig(): AppConfig {
  const provider = (process.env.LLM_PROVIDER ?? "openai").toLowerCase();

  return {
    llm: {
      provider,
      model: process.env.LLM_MODEL ?? "gpt-4",
      apiKey: nonEmpty(process.env.LLM_API_KEY) ?? nonEmpty(process.env[`${provider.toUpperCase()}_API_KEY`]),
      maxTokens: envInt("MAX_TOKENS", 1000),
      temperature: envFloat("TEMPERATURE", 0.1),
    },
    embedding: {
      model: process.env.EMBEDDING_MODEL ?? "text-embedding-3-small",
      apiKey: nonEmpty(process.env.EMBEDDING_API_KEY) ?? nonEmpty(process.env.OPENAI_API_KEY),
      dimension: envInt("VECTOR_DIMENSION", 1536),
    },
    vectorIndexPath: process.env.VECTOR_INDEX_PATH ?? "./data/vector_index",
    logLevel: parseLogLevel(process.env.LOG_LEVEL),
    corsOrigins: (process.env.CORS_ORIGINS ?? "http://localhost:3000,http://127.0.0.1:3000")
      .split(",")
      .map((o) => o.trim())
      .filter(Boolean),
    adminToken: nonEmpty(process.env.ADMIN_TOKEN),
    postgresUrl: nonEmpty(process.env.POSTGRES_URL),
    queryLogDir: process.env.QUERY_LOG_DIR ?? "./data/logs",
  };
}
