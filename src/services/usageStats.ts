// Layer 10: Observability - Process-wide agent usage counters
import { Mutex } from "async-mutex";
import type { AgentName, Intent } from "./orchestration/types";
import { isCancellation } from "./orchestration/errors";
import {
  agentErrorsCounter,
  agentInvocationsCounter,
  agentLatencyHistogram,
  requestCounter
} from "../config/metrics";

export interface AgentUsage {
  invocations: number;
  errors: number;
  totalLatencyMs: number;
}

export interface UsageSnapshot {
  startedAt: string;
  agents: Record<AgentName, AgentUsage & { averageLatencyMs: number }>;
  requests: {
    total: number;
    failed: number;
    byIntent: Record<Intent, number>;
  };
}

function emptyAgents(): Record<AgentName, AgentUsage> {
  return {
    router: { invocations: 0, errors: 0, totalLatencyMs: 0 },
    generic: { invocations: 0, errors: 0, totalLatencyMs: 0 },
    sql: { invocations: 0, errors: 0, totalLatencyMs: 0 },
    analysis: { invocations: 0, errors: 0, totalLatencyMs: 0 }
  };
}

function withAverage({ invocations, errors, totalLatencyMs }: AgentUsage) {
  return {
    invocations,
    errors,
    totalLatencyMs,
    averageLatencyMs: invocations ? Math.round(totalLatencyMs / invocations) : 0
  };
}

/**
 * Counters shared by every concurrent request. All updates go through the
 * mutex; critical sections are synchronous so the lock is never held across
 * an await.
 */
export class UsageStats {
  private readonly lock = new Mutex();
  private agents = emptyAgents();
  private requests = { total: 0, failed: 0, byIntent: { DATA_REQUEST: 0, GENERIC: 0 } };
  private startedAt = new Date();

  async record(agent: AgentName, latencyMs: number, failed: boolean): Promise<void> {
    await this.lock.runExclusive(() => {
      const entry = this.agents[agent];
      entry.invocations += 1;
      entry.totalLatencyMs += latencyMs;
      if (failed) entry.errors += 1;
    });
    agentInvocationsCounter.inc({ agent });
    agentLatencyHistogram.observe({ agent }, latencyMs / 1000);
    if (failed) agentErrorsCounter.inc({ agent });
  }

  async recordRequest(intent: Intent | null, failed: boolean): Promise<void> {
    await this.lock.runExclusive(() => {
      this.requests.total += 1;
      if (failed) this.requests.failed += 1;
      if (intent) this.requests.byIntent[intent] += 1;
    });
    requestCounter.inc({ intent: intent ?? "none", outcome: failed ? "failed" : "ok" });
  }

  async snapshot(): Promise<UsageSnapshot> {
    return await this.lock.runExclusive(() => ({
      startedAt: this.startedAt.toISOString(),
      agents: {
        router: withAverage(this.agents.router),
        generic: withAverage(this.agents.generic),
        sql: withAverage(this.agents.sql),
        analysis: withAverage(this.agents.analysis)
      },
      requests: {
        total: this.requests.total,
        failed: this.requests.failed,
        byIntent: { ...this.requests.byIntent }
      }
    }));
  }
}

export const usageStats = new UsageStats();

/**
 * Times `fn` and records one invocation for `agent`. Cancellations are not
 * counted as agent errors.
 */
export async function trackAgent<T>(
  agent: AgentName,
  fn: () => Promise<T>,
  isFailure: (result: T) => boolean = () => false,
  stats: UsageStats = usageStats
): Promise<T> {
  const started = Date.now();
  try {
    const result = await fn();
    await stats.record(agent, Date.now() - started, isFailure(result));
    return result;
  } catch (err) {
    await stats.record(agent, Date.now() - started, !isCancellation(err));
    throw err;
  }
}
