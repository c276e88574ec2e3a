// Health Check Routes
import type { FastifyInstance } from "fastify";
import { openaiClient, type LLMClient } from "../config/openai";
import { DEFAULT_MODEL, MOCK_OPENAI } from "../config/constants";
import { errorMessage } from "../services/orchestration/errors";

const PING_TIMEOUT_MS = 5_000;

export interface HealthRouteOptions {
  llm?: LLMClient;
}

export async function healthRoutes(app: FastifyInstance, opts: HealthRouteOptions = {}) {
  const llm = opts.llm ?? openaiClient;

  /**
   * Health check endpoint
   * GET /api/health?deep=true also pings the language model
   */
  app.get<{ Querystring: { deep?: string } }>("/api/health", async (req, reply) => {
    const health = {
      status: "healthy",
      timestamp: new Date().toISOString(),
      llm: { mock: MOCK_OPENAI, model: DEFAULT_MODEL }
    };
    if (req.query.deep !== "true") return health;

    const started = Date.now();
    try {
      await llm.complete({
        model: DEFAULT_MODEL,
        messages: [{ role: "user", content: "ping" }],
        maxTokens: 5,
        timeoutMs: PING_TIMEOUT_MS
      });
      return { ...health, llm: { ...health.llm, reachable: true, latencyMs: Date.now() - started } };
    } catch (err) {
      app.log.warn({ err }, "LLM health ping failed");
      return reply.code(503).send({
        ...health,
        status: "unhealthy",
        llm: { ...health.llm, reachable: false, error: errorMessage(err) }
      });
    }
  });
}
