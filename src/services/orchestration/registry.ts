// Layer 2/3: Agent Registry
import { DocStoreClient } from "../../docstore/client";
import { DocStoreSchemaProvider } from "../../docstore/schema";
import { DocStoreQueryExecutor } from "../../docstore/sqlRunner";
import { SqlAgent } from "../executors/sql";
import { AnalysisAgent } from "./analysis";
import { Orchestrator } from "./coordinator";
import { GenericAgent } from "./generic";
import { RouterAgent } from "./router";
import type { Agent } from "./types";

const router = new RouterAgent();
const generic = new GenericAgent();
const analysis = new AnalysisAgent();

export const AGENT_CATALOG: readonly Agent[] = [
  { name: "router", description: RouterAgent.description },
  { name: "generic", description: GenericAgent.description },
  { name: "sql", description: SqlAgent.description },
  { name: "analysis", description: AnalysisAgent.description }
];

export interface OrchestratorOptions {
  /** Document store key for this request; falls back to DOCSTORE_API_KEY. */
  docStoreApiKey?: string;
}

/**
 * Wires the production agents. The store-facing collaborators are built per
 * call so a caller-supplied key never leaks into another request.
 */
export function createOrchestrator(opts: OrchestratorOptions = {}): Orchestrator {
  const client = new DocStoreClient({ apiKey: opts.docStoreApiKey });
  return new Orchestrator({
    router,
    generic,
    sql: new SqlAgent({ executor: new DocStoreQueryExecutor(client) }),
    analysis,
    schemaProvider: new DocStoreSchemaProvider(client)
  });
}
