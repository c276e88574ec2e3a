// Layer 2: Orchestration - Conversation context
import { v4 as uuidv4 } from "uuid";
import { AGENT_HISTORY_WINDOWS, HISTORY_ENABLED, HISTORY_MAX_MESSAGES } from "../../config/constants";
import { ValidationError } from "./errors";
import type { AgentName, ConversationContext, ConversationMessage, MessageRole } from "./types";

export interface ConversationInput {
  documentId: string;
  messages: ReadonlyArray<{ role: MessageRole; content: string; timestamp?: string }>;
  requestId?: string;
}

/**
 * Builds the immutable per-request context.
 * Throws ValidationError for a blank document id or a conversation without
 * any non-blank user message.
 */
export function createConversationContext(input: ConversationInput): ConversationContext {
  const documentId = input.documentId.trim();
  if (!documentId) {
    throw new ValidationError("documentId is required");
  }
  if (input.messages.length === 0) {
    throw new ValidationError("messages must not be empty");
  }
  if (!input.messages.some((m) => m.role === "user" && m.content.trim())) {
    throw new ValidationError("conversation has no user message");
  }

  const messages = input.messages.map((m) => {
    const message: ConversationMessage =
      m.timestamp === undefined
        ? { role: m.role, content: m.content }
        : { role: m.role, content: m.content, timestamp: m.timestamp };
    return Object.freeze(message);
  });

  return Object.freeze({
    documentId,
    messages: Object.freeze(messages),
    requestId: input.requestId?.trim() || uuidv4()
  });
}

function lastUserIndex(messages: readonly ConversationMessage[]): number {
  for (let i = messages.length - 1; i >= 0; i--) {
    const m = messages[i];
    if (m && m.role === "user" && m.content.trim()) return i;
  }
  return -1;
}

/** The question being answered: the most recent non-blank user message. */
export function lastUserMessage(context: ConversationContext): string {
  return context.messages[lastUserIndex(context.messages)]?.content.trim() ?? "";
}

/**
 * Complete user/assistant pairs preceding the current question, most recent
 * last, limited to the agent's window and the global cap.
 */
export function historyWindow(context: ConversationContext, agent: AgentName): ConversationMessage[] {
  if (!HISTORY_ENABLED) return [];

  const prior = context.messages.slice(0, Math.max(0, lastUserIndex(context.messages)));
  const pairs: [ConversationMessage, ConversationMessage][] = [];
  for (let i = 0; i < prior.length - 1; i++) {
    const current = prior[i];
    const next = prior[i + 1];
    if (current?.role === "user" && next?.role === "assistant") {
      pairs.push([current, next]);
      i++;
    }
  }

  const maxPairs = Math.min(AGENT_HISTORY_WINDOWS[agent], Math.floor(HISTORY_MAX_MESSAGES / 2));
  if (maxPairs <= 0) return [];
  return pairs.slice(-maxPairs).flat();
}

/** Renders history as `role: content` lines for prompt slots. */
export function formatHistory(messages: readonly ConversationMessage[]): string {
  if (messages.length === 0) return "(no previous messages)";
  return messages.map((m) => `${m.role}: ${m.content}`).join("\n");
}
