// Layer 1: Usage, catalog and Prometheus routes
import type { FastifyInstance } from "fastify";
import type { AgentInfo } from "../../shared/types";
import { getContentType, getMetrics } from "../config/metrics";
import { AGENT_CATALOG } from "../services/orchestration/registry";
import { usageStats, type UsageSnapshot, type UsageStats } from "../services/usageStats";

export interface StatsRouteOptions {
  stats?: UsageStats;
}

export async function statsRoutes(app: FastifyInstance, opts: StatsRouteOptions = {}) {
  const stats = opts.stats ?? usageStats;

  app.get("/api/stats", async (): Promise<{ status: "success"; data: UsageSnapshot }> => {
    return { status: "success", data: await stats.snapshot() };
  });

  app.get("/api/agents", async (): Promise<{ status: "success"; agents: AgentInfo[] }> => {
    return {
      status: "success",
      agents: AGENT_CATALOG.map(({ name, description }) => ({ name, description }))
    };
  });

  app.get("/metrics", async (_req, reply) => {
    reply.header("Content-Type", getContentType());
    return await getMetrics();
  });
}
