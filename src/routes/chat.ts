// Layer 1: Chat Routes (JSON and SSE)
import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";
import type { ChatResponse, ErrorResponse, SSEOutEvent } from "../../shared/types";
import { createConversationContext } from "../services/orchestration/context";
import type { HandleOptions } from "../services/orchestration/coordinator";
import { ValidationError } from "../services/orchestration/errors";
import { createOrchestrator, type OrchestratorOptions } from "../services/orchestration/registry";
import type { AgentResponse, ConversationContext } from "../services/orchestration/types";
import { addEvent } from "../config/otel";

const ChatBody = z.object({
  documentId: z.string(),
  messages: z
    .array(
      z.object({
        role: z.enum(["user", "assistant"]),
        content: z.string(),
        timestamp: z.string().optional()
      })
    )
    .min(1, "messages must not be empty"),
  requestId: z.string().optional()
});

export interface ChatHandler {
  handle(context: ConversationContext, opts?: HandleOptions): Promise<AgentResponse>;
}

export interface ChatRouteOptions {
  createOrchestrator?: (opts: OrchestratorOptions) => ChatHandler;
}

export function toWire(result: AgentResponse): ChatResponse {
  return {
    response: result.response,
    agent_used: result.agentUsed,
    sql_query: result.sqlQuery,
    data_analyzed: result.dataAnalyzed,
    error: result.error
  };
}

function parseContext(body: unknown): ConversationContext | ValidationError {
  const parsed = ChatBody.safeParse(body);
  if (!parsed.success) {
    return new ValidationError(
      parsed.error.issues.map((i) => `${i.path.join(".") || "body"}: ${i.message}`).join("; ")
    );
  }
  try {
    return createConversationContext(parsed.data);
  } catch (err) {
    if (err instanceof ValidationError) return err;
    throw err;
  }
}

function apiKeyOverride(req: FastifyRequest): string | undefined {
  const header = req.headers["x-api-key"];
  const value = Array.isArray(header) ? header[0] : header;
  return value?.trim() || undefined;
}

/** Aborts when the client goes away before the response was fully written. */
function abortOnDisconnect(reply: FastifyReply): AbortController {
  const controller = new AbortController();
  reply.raw.on("close", () => {
    if (!reply.raw.writableEnded) controller.abort();
  });
  return controller;
}

function sseWrite(reply: FastifyReply, event: SSEOutEvent) {
  reply.raw.write(`event: ${event.type}\n`);
  reply.raw.write(`data: ${JSON.stringify(event)}\n\n`);
}

export async function chatRoutes(app: FastifyInstance, opts: ChatRouteOptions = {}) {
  const orchestratorFor = opts.createOrchestrator ?? createOrchestrator;

  app.post("/api/chat", { logLevel: "info" }, async (req, reply) => {
    const context = parseContext(req.body);
    if (context instanceof ValidationError) {
      const body: ErrorResponse = { error: context.message };
      return reply.code(400).send(body);
    }

    addEvent("chat.request", { "request.id": context.requestId, "document.id": context.documentId });
    const controller = abortOnDisconnect(reply);
    const result = await orchestratorFor({ docStoreApiKey: apiKeyOverride(req) }).handle(context, {
      signal: controller.signal
    });

    reply.header("x-request-id", result.requestId);
    return toWire(result);
  });

  app.post("/api/chat/stream", { logLevel: "info" }, async (req, reply) => {
    const context = parseContext(req.body);
    if (context instanceof ValidationError) {
      const body: ErrorResponse = { error: context.message };
      return reply.code(400).send(body);
    }

    addEvent("chat.request", { "request.id": context.requestId, "document.id": context.documentId, stream: true });
    reply.hijack();

    // SSE connection setup: detect client disconnect and keep-alive pings
    let aborted = false;
    const controller = abortOnDisconnect(reply);
    controller.signal.addEventListener("abort", () => {
      aborted = true;
    });

    reply.raw.writeHead(200, {
      "Content-Type": "text/event-stream",
      "Cache-Control": "no-cache, no-transform",
      Connection: "keep-alive",
      "X-Accel-Buffering": "no",
      "X-Request-Id": context.requestId
    });
    reply.raw.flushHeaders?.();
    reply.raw.write(`retry: 15000\n\n`);
    // Keep-alive ping to keep proxies from buffering
    const keepAlive = setInterval(() => {
      if (aborted) return;
      reply.raw.write(`event: ping\ndata: {}\n\n`);
    }, 15000);

    const sender = (e: SSEOutEvent) => {
      if (aborted) return;
      sseWrite(reply, e);
    };

    try {
      const result = await orchestratorFor({ docStoreApiKey: apiKeyOverride(req) }).handle(context, {
        signal: controller.signal,
        onTransition: (t) =>
          sender({ type: "agent_log", from: t.from, to: t.to, message: t.detail, ts: t.ts })
      });
      sender({ type: "final", ...toWire(result), request_id: result.requestId, ts: Date.now() });
    } finally {
      clearInterval(keepAlive);
      if (!aborted) reply.raw.end();
    }
  });
}
