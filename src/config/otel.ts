// Layer 10: Observability & Monitoring
import { context, trace, type Attributes, type AttributeValue } from "@opentelemetry/api";

import { NodeSDK } from "@opentelemetry/sdk-node";
import { getNodeAutoInstrumentations } from "@opentelemetry/auto-instrumentations-node";
import { Resource } from "@opentelemetry/resources";
import { SemanticResourceAttributes } from "@opentelemetry/semantic-conventions";
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-http";

export interface TracingOptions {
  serviceName: string;
  endpoint: string;
}

export function tracingOptionsFromEnv(source: NodeJS.ProcessEnv = process.env): TracingOptions | null {
  if (source.ENABLE_OTEL !== "true") return null;
  return {
    serviceName: source.OTEL_SERVICE_NAME || "sheetchat-backend",
    endpoint: source.OTEL_EXPORTER_OTLP_ENDPOINT || "http://localhost:4318/v1/traces"
  };
}

/**
 * Starts the NodeSDK with HTTP and Fastify auto-instrumentation. Pipeline
 * stages add their own spans through `withSpan`. Returns null when the SDK
 * fails to start.
 */
export function startTracing({ serviceName, endpoint }: TracingOptions): NodeSDK | null {
  const sdk = new NodeSDK({
    resource: new Resource({ [SemanticResourceAttributes.SERVICE_NAME]: serviceName }),
    traceExporter: new OTLPTraceExporter({ url: endpoint }),
    instrumentations: [getNodeAutoInstrumentations({ "@opentelemetry/instrumentation-fs": { enabled: false } })]
  });
  try {
    sdk.start();
  } catch (err) {
    console.error(`[OTel] tracing disabled, NodeSDK failed to start for ${serviceName}`, err);
    return null;
  }
  console.log(`[OTel] exporting traces for ${serviceName} to ${endpoint}`);
  return sdk;
}

const tracingOptions = tracingOptionsFromEnv();
const sdk = tracingOptions ? startTracing(tracingOptions) : null;

/** Flushes pending spans; called from the server's shutdown path. */
export async function stopTracing(): Promise<void> {
  if (!sdk) return;
  try {
    await sdk.shutdown();
  } catch (err) {
    console.error("[OTel] NodeSDK shutdown failed", err);
  }
}

// Tracer utility + helpers
export const tracer = trace.getTracer("sheetchat");

function toAttributes(attrs: Record<string, unknown>): Attributes {
  const out: Attributes = {};
  for (const [k, v] of Object.entries(attrs)) {
    if (isAttributeValue(v)) out[k] = v;
    else if (v !== undefined && v !== null) out[k] = JSON.stringify(v);
  }
  return out;
}

function isAttributeValue(v: unknown): v is AttributeValue {
  return typeof v === "string" || typeof v === "number" || typeof v === "boolean";
}

export async function withSpan<T>(
  name: string,
  fn: () => Promise<T> | T,
  attrs?: Record<string, unknown>
): Promise<T> {
  return await tracer.startActiveSpan(name, async (span) => {
    if (attrs) span.setAttributes(toAttributes(attrs));
    try {
      return await fn();
    } catch (e) {
      span.recordException(e instanceof Error ? e : String(e));
      span.setAttribute("error", true);
      throw e;
    } finally {
      span.end();
    }
  });
}

export function addEvent(name: string, attrs?: Record<string, unknown>) {
  const span = trace.getSpan(context.active());
  span?.addEvent(name, attrs ? toAttributes(attrs) : undefined);
}
