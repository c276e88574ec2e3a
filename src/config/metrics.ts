import { register, Counter, Histogram } from "prom-client";

// Agent Metrics
export const agentInvocationsCounter = new Counter({
  name: "sheetchat_agent_invocations_total",
  help: "Total completed agent invocations.",
  labelNames: ["agent"],
});

export const agentErrorsCounter = new Counter({
  name: "sheetchat_agent_errors_total",
  help: "Total agent invocations that ended in an error.",
  labelNames: ["agent"],
});

export const agentLatencyHistogram = new Histogram({
  name: "sheetchat_agent_latency_seconds",
  help: "Agent invocation latency",
  labelNames: ["agent"],
  buckets: [0.1, 0.5, 1, 2, 5, 10, 30],
});

// Request Metrics
export const requestCounter = new Counter({
  name: "sheetchat_requests_total",
  help: "Total pipeline requests by routed intent and outcome.",
  labelNames: ["intent", "outcome"],
});

// Expose metrics endpoint
export async function getMetrics() {
  return await register.metrics();
}

export function getContentType() {
  return register.contentType;
}
