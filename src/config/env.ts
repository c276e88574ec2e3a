import * as dotenv from "dotenv";
dotenv.config();

/** Numeric setting; unset, blank or non-numeric values fall back to the default. */
export function readNumber(name: string, fallback: number, source: NodeJS.ProcessEnv = process.env): number {
  const raw = source[name]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    console.warn(`[Config] ${name}=${JSON.stringify(raw)} is not a number; using ${fallback}`);
    return fallback;
  }
  return value;
}

export const env = {
  OPENAI_API_KEY: process.env.OPENAI_API_KEY || "",
  OPENAI_API_BASE: process.env.OPENAI_API_BASE || "",
  DEFAULT_MODEL: process.env.DEFAULT_MODEL || "gpt-4o-mini",
  ANALYSIS_MODEL: process.env.ANALYSIS_MODEL || process.env.DEFAULT_MODEL || "gpt-4o-mini",
  LLM_TIMEOUT_MS: readNumber("LLM_TIMEOUT_MS", 20_000),
  LLM_MAX_RETRIES: readNumber("LLM_MAX_RETRIES", 0),

  MOCK_OPENAI: readNumber("MOCK_OPENAI", 0),

  DOCSTORE_API_URL: process.env.DOCSTORE_API_URL || "https://docs.getgrist.com/api",
  DOCSTORE_API_KEY: process.env.DOCSTORE_API_KEY || "",
  DOCSTORE_TIMEOUT_MS: readNumber("DOCSTORE_TIMEOUT_MS", 30_000),

  SQL_AGENT_MAX_ATTEMPTS: readNumber("SQL_AGENT_MAX_ATTEMPTS", 3),
  SQL_AGENT_MAX_TOKENS: readNumber("SQL_AGENT_MAX_TOKENS", 500),
  ROUTER_MAX_TOKENS: readNumber("ROUTER_MAX_TOKENS", 20),
  GENERIC_MAX_TOKENS: readNumber("GENERIC_MAX_TOKENS", 300),
  ANALYSIS_MAX_TOKENS: readNumber("ANALYSIS_MAX_TOKENS", 150),
  ANALYSIS_MAX_ROWS: readNumber("ANALYSIS_MAX_ROWS", 20),
  ANALYSIS_MAX_COLUMNS: readNumber("ANALYSIS_MAX_COLUMNS", 12),
  SCHEMA_PROMPT_MAX_CHARS: readNumber("SCHEMA_PROMPT_MAX_CHARS", 12_000),

  // Conversation history shared with the agents
  HISTORY_ENABLED: process.env.HISTORY_ENABLED !== "false",
  HISTORY_MAX_MESSAGES: readNumber("HISTORY_MAX_MESSAGES", 6),

  CORS_ORIGIN: process.env.CORS_ORIGIN || "*",
  PORT: readNumber("PORT_BACKEND", 8787)
};
