import type OpenAI from "openai";
import {
  LLM_MAX_RETRIES,
  LLM_TIMEOUT_MS,
  MOCK_OPENAI,
  OPENAI_API_BASE
} from "./constants";
import { env } from "./env";
import {
  LLMUpstreamError,
  RequestCancelledError,
  errorMessage
} from "../services/orchestration/errors";
import { deadline } from "../utils/timeout";

export type Message = { role: "system" | "user" | "assistant"; content: string };

export interface CompletionRequest {
  model: string;
  messages: Message[];
  maxTokens: number;
  temperature?: number;
  signal?: AbortSignal;
  timeoutMs?: number;
}

export interface Completion {
  text: string;
  tokensUsed: number;
}

export interface LLMClient {
  complete: (request: CompletionRequest) => Promise<Completion>;
}

function estimateTokens(text: string) {
  return Math.ceil(text.length / 4);
}

async function mockComplete(request: CompletionRequest): Promise<Completion> {
  if (request.signal?.aborted) {
    throw new RequestCancelledError("LLM call cancelled");
  }
  const last = request.messages[request.messages.length - 1]?.content || "";
  const text = `MOCK_RESPONSE: ${last.slice(0, 120)}`;
  const prompt = request.messages.map((m) => m.content).join("\n");
  return { text, tokensUsed: estimateTokens(prompt) + estimateTokens(text) };
}

let realOpenAI: OpenAI | null = null;

async function getOpenAI(): Promise<OpenAI> {
  if (!realOpenAI) {
    const { OpenAI } = await import("openai");
    realOpenAI = new OpenAI({
      apiKey: env.OPENAI_API_KEY,
      baseURL: OPENAI_API_BASE,
      maxRetries: LLM_MAX_RETRIES
    });
  }
  return realOpenAI;
}

async function realComplete(request: CompletionRequest): Promise<Completion> {
  const client = await getOpenAI();
  const { signal, timedOut } = deadline(request.timeoutMs ?? LLM_TIMEOUT_MS, request.signal);

  try {
    const response = await client.chat.completions.create(
      {
        model: request.model,
        messages: request.messages,
        max_tokens: request.maxTokens,
        temperature: request.temperature
      },
      { signal }
    );
    return {
      text: response.choices[0]?.message?.content?.trim() ?? "",
      tokensUsed: response.usage?.total_tokens ?? 0
    };
  } catch (err) {
    if (request.signal?.aborted) {
      throw new RequestCancelledError("LLM call cancelled", { cause: err });
    }
    if (timedOut()) {
      throw new LLMUpstreamError(`LLM call timed out after ${request.timeoutMs ?? LLM_TIMEOUT_MS}ms`, {
        cause: err
      });
    }
    throw new LLMUpstreamError(`LLM call failed: ${errorMessage(err)}`, { cause: err });
  }
}

export const openaiClient: LLMClient = {
  complete: (request) => (MOCK_OPENAI ? mockComplete(request) : realComplete(request))
};
