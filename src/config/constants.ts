import { env } from "./env";

export const PROJECT_NAME = "sheetchat";
export const PORT_BACKEND = env.PORT;
export const CORS_ORIGIN = env.CORS_ORIGIN;

export const DEFAULT_MODEL = env.DEFAULT_MODEL;
export const ANALYSIS_MODEL = env.ANALYSIS_MODEL;
export const LLM_TIMEOUT_MS = env.LLM_TIMEOUT_MS;
export const LLM_MAX_RETRIES = Math.max(0, env.LLM_MAX_RETRIES);
export const OPENAI_API_BASE = env.OPENAI_API_BASE || undefined;

export const MOCK_OPENAI = !!env.MOCK_OPENAI;

export const DOCSTORE_API_URL = env.DOCSTORE_API_URL.replace(/\/+$/, "");
export const DOCSTORE_API_KEY = env.DOCSTORE_API_KEY;
export const DOCSTORE_TIMEOUT_MS = env.DOCSTORE_TIMEOUT_MS;

// The SQL agent re-prompts at most this many times before giving up.
export const SQL_AGENT_MAX_ATTEMPTS = Math.max(1, env.SQL_AGENT_MAX_ATTEMPTS);
export const SQL_AGENT_MAX_TOKENS = env.SQL_AGENT_MAX_TOKENS;
export const ROUTER_MAX_TOKENS = env.ROUTER_MAX_TOKENS;
export const GENERIC_MAX_TOKENS = env.GENERIC_MAX_TOKENS;
export const ANALYSIS_MAX_TOKENS = env.ANALYSIS_MAX_TOKENS;
export const ANALYSIS_MAX_ROWS = env.ANALYSIS_MAX_ROWS;
export const ANALYSIS_MAX_COLUMNS = env.ANALYSIS_MAX_COLUMNS;
export const ANALYSIS_MAX_CELL_CHARS = 30;
export const SCHEMA_PROMPT_MAX_CHARS = env.SCHEMA_PROMPT_MAX_CHARS;

export const HISTORY_ENABLED = env.HISTORY_ENABLED;
export const HISTORY_MAX_MESSAGES = env.HISTORY_MAX_MESSAGES;

// Per-agent history windows, in complete user/assistant pairs.
export const AGENT_HISTORY_WINDOWS = {
  router: 2,
  generic: 3,
  sql: 2,
  analysis: 2
} as const;
