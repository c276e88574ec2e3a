import type { Completion, CompletionRequest, LLMClient } from "../src/config/openai";
import { createConversationContext, type ConversationInput } from "../src/services/orchestration/context";
import type {
  ConversationContext,
  QueryExecutor,
  QueryOutcome,
  SchemaProvider,
  SchemaSnapshot
} from "../src/services/orchestration/types";

type Reply = string | Error | ((request: CompletionRequest) => string);

/** LLM double that answers from a script, one entry per call; the last entry repeats. */
export function scriptedLLM(...replies: Reply[]): LLMClient & { calls: CompletionRequest[] } {
  const calls: CompletionRequest[] = [];
  return {
    calls,
    async complete(request: CompletionRequest): Promise<Completion> {
      calls.push({ ...request, messages: request.messages.map((m) => ({ ...m })) });
      const reply = replies[Math.min(calls.length, replies.length) - 1];
      if (reply === undefined) throw new Error("scriptedLLM has no replies");
      if (reply instanceof Error) throw reply;
      const text = typeof reply === "function" ? reply(request) : reply;
      return { text, tokensUsed: text.length };
    }
  };
}

export function recordingExecutor(outcome: QueryOutcome): QueryExecutor & { calls: string[] } {
  const calls: string[] = [];
  return {
    calls,
    async run(_documentId: string, queryText: string): Promise<QueryOutcome> {
      calls.push(queryText);
      return outcome;
    }
  };
}

export function staticSchema(schema: SchemaSnapshot): SchemaProvider & { calls: number } {
  const provider = {
    calls: 0,
    async fetch(): Promise<SchemaSnapshot> {
      provider.calls++;
      return schema;
    }
  };
  return provider;
}

export function userContext(text: string, overrides: Partial<ConversationInput> = {}): ConversationContext {
  return createConversationContext({
    documentId: "doc-1",
    messages: [{ role: "user", content: text }],
    requestId: "req-1",
    ...overrides
  });
}

export const AGES_SCHEMA: SchemaSnapshot = {
  Data: [
    { name: "id", type: "Id" },
    { name: "age", type: "Int" },
    { name: "name", type: "Text" }
  ]
};
