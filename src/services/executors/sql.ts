// Layer 3: SQL Executor - Generate, validate, retry, execute
import { openaiClient, type LLMClient, type Message } from "../../config/openai";
import {
  DEFAULT_MODEL,
  SCHEMA_PROMPT_MAX_CHARS,
  SQL_AGENT_MAX_ATTEMPTS,
  SQL_AGENT_MAX_TOKENS
} from "../../config/constants";
import { trackAgent, usageStats, type UsageStats } from "../usageStats";
import { formatHistory, historyWindow, lastUserMessage } from "../orchestration/context";
import { formatSchemaForPrompt, sqlGenerationPrompt, SQL_INSTRUCTION } from "../orchestration/prompts";
import type {
  ConversationContext,
  QueryCapability,
  QueryExecutor,
  QueryFailure,
  SchemaSnapshot,
  SqlAgentResult
} from "../orchestration/types";
import { validateQuery } from "./sql.validator";

const FENCE = /```([A-Za-z0-9_+-]*)[^\S\n]*\n?([\s\S]*?)```/g;
const SQL_FENCE_TAG = /^(?:sql|sqlite3?|postgres(?:ql)?|psql|mysql|mariadb|tsql|plsql)?$/i;
const QUERY_START = /\b(?:SELECT\b|WITH\s+(?:RECURSIVE\s+)?\S+(?:\s*\([^)]*\))?\s+AS\s*\()/i;

export const NO_QUERY_REASON = "No SQL query was found in the model output";

/**
 * Pulls the candidate query out of a completion: the first bare or SQL-tagged
 * fenced block, otherwise the first SELECT/WITH run up to a blank line or fence.
 * One trailing semicolon is dropped.
 */
export function extractQuery(completion: string): string | null {
  let candidate: string | null = null;

  for (const match of completion.matchAll(FENCE)) {
    if (SQL_FENCE_TAG.test(match[1] ?? "")) {
      candidate = match[2] ?? "";
      break;
    }
  }

  if (candidate === null) {
    const start = QUERY_START.exec(completion);
    if (start) {
      const rest = completion.slice(start.index);
      const blank = /\n[^\S\n]*\n|```/.exec(rest);
      candidate = blank ? rest.slice(0, blank.index) : rest;
    }
  }

  if (candidate === null) return null;
  const trimmed = candidate.trim().replace(/;\s*$/, "").trim();
  return trimmed || null;
}

export interface SqlAgentOptions {
  executor: QueryExecutor;
  llm?: LLMClient;
  model?: string;
  stats?: UsageStats;
  maxAttempts?: number;
}

export class SqlAgent implements QueryCapability {
  readonly name = "sql";
  static readonly description = "Writes a read-only SQL query for the question, checks it against the schema and runs it.";
  readonly description = SqlAgent.description;

  private readonly executor: QueryExecutor;
  private readonly llm: LLMClient;
  private readonly model: string;
  private readonly stats: UsageStats;
  private readonly maxAttempts: number;

  constructor(opts: SqlAgentOptions) {
    this.executor = opts.executor;
    this.llm = opts.llm ?? openaiClient;
    this.model = opts.model ?? DEFAULT_MODEL;
    this.stats = opts.stats ?? usageStats;
    this.maxAttempts = Math.max(1, opts.maxAttempts ?? SQL_AGENT_MAX_ATTEMPTS);
  }

  buildMessages(context: ConversationContext, schema: SchemaSnapshot): Message[] {
    const prompt = sqlGenerationPrompt.render({
      schema: formatSchemaForPrompt(schema, { maxChars: SCHEMA_PROMPT_MAX_CHARS }),
      history: formatHistory(historyWindow(context, "sql")),
      question: lastUserMessage(context),
      instruction: SQL_INSTRUCTION
    });
    return [{ role: "user", content: prompt }];
  }

  async generateAndExecute(
    context: ConversationContext,
    schema: SchemaSnapshot,
    signal?: AbortSignal
  ): Promise<SqlAgentResult> {
    return await trackAgent(
      "sql",
      () => this.run(context, schema, signal),
      (result) => !result.outcome.ok,
      this.stats
    );
  }

  private async run(
    context: ConversationContext,
    schema: SchemaSnapshot,
    signal?: AbortSignal
  ): Promise<SqlAgentResult> {
    const messages = this.buildMessages(context, schema);
    let text = "";
    let attempts = 0;
    let failure: QueryFailure = { ok: false, kind: "generation", reason: NO_QUERY_REASON };

    while (attempts < this.maxAttempts) {
      attempts++;
      const completion = await this.llm.complete({
        model: this.model,
        messages,
        maxTokens: SQL_AGENT_MAX_TOKENS,
        temperature: 0.1,
        signal
      });

      const candidate = extractQuery(completion.text);
      if (candidate !== null) text = candidate;
      const check = candidate === null
        ? { ok: false as const, kind: "generation" as const, reason: NO_QUERY_REASON }
        : validateQuery(candidate, schema);

      if (check.ok) {
        console.log(`[SQLAgent] ${context.requestId} query accepted on attempt ${attempts}`);
        const outcome = await this.executor.run(context.documentId, text, context.requestId, signal);
        if (!outcome.ok) {
          console.warn(`[SQLAgent] ${context.requestId} execution failed: ${outcome.reason}`);
        }
        return { query: { text, schema, attempts }, outcome };
      }

      failure = { ok: false, kind: check.kind, reason: check.reason };
      console.warn(
        `[SQLAgent] ${context.requestId} attempt ${attempts}/${this.maxAttempts} rejected (${check.kind}): ${check.reason}`
      );
      messages.push(
        { role: "assistant", content: completion.text },
        {
          role: "user",
          content: `That query was rejected: ${check.reason}\nWrite a corrected query that follows every rule above.`
        }
      );
    }

    return { query: { text, schema, attempts }, outcome: failure };
  }
}
