// Layer 2: Orchestration - Shared data model and agent contracts

export type MessageRole = "user" | "assistant";

export interface ConversationMessage {
  readonly role: MessageRole;
  readonly content: string;
  readonly timestamp?: string;
}

/**
 * One inbound conversation. Built once per request and frozen; every stage
 * sees the exact message set the router classified.
 */
export interface ConversationContext {
  readonly documentId: string;
  readonly messages: readonly ConversationMessage[];
  readonly requestId: string;
}

export interface SchemaColumn {
  readonly name: string;
  readonly type: string;
}

/** Table name -> ordered columns, as fetched for a single request. */
export type SchemaSnapshot = Readonly<Record<string, readonly SchemaColumn[]>>;

export type Intent = "DATA_REQUEST" | "GENERIC";

export interface RoutingDecision {
  readonly intent: Intent;
  readonly rationale: string;
}

export interface GeneratedQuery {
  /** Last candidate produced; empty when the model never yielded one. */
  readonly text: string;
  readonly schema: SchemaSnapshot;
  readonly attempts: number;
}

export type Row = Record<string, unknown>;

export interface QuerySuccess {
  readonly ok: true;
  readonly rows: Row[];
  readonly columns: string[];
}

export type QueryFailureKind = "generation" | "validation" | "execution";

export interface QueryFailure {
  readonly ok: false;
  readonly kind: QueryFailureKind;
  readonly reason: string;
}

export type QueryOutcome = QuerySuccess | QueryFailure;

export interface SqlAgentResult {
  query: GeneratedQuery;
  outcome: QueryOutcome;
}

export type AgentName = "router" | "generic" | "sql" | "analysis";
export type RespondingAgent = Exclude<AgentName, "router">;

export type WorkflowState =
  | "Init"
  | "Routed"
  | "Querying"
  | "Analyzed"
  | "QueryFailed"
  | "Done"
  | "Failed";

/** Exactly one per request, whatever happened inside the pipeline. */
export interface AgentResponse {
  response: string;
  agentUsed: RespondingAgent;
  sqlQuery: string | null;
  dataAnalyzed: boolean;
  error: string | null;
  requestId: string;
  path: WorkflowState[];
}

// Agent capabilities, as seen by the orchestrator.

export interface Agent {
  readonly name: AgentName;
  readonly description: string;
}

export interface RouterCapability extends Agent {
  classify(context: ConversationContext, signal?: AbortSignal): Promise<RoutingDecision>;
}

export interface ResponderCapability extends Agent {
  respond(context: ConversationContext, signal?: AbortSignal): Promise<string>;
}

export interface QueryCapability extends Agent {
  generateAndExecute(
    context: ConversationContext,
    schema: SchemaSnapshot,
    signal?: AbortSignal
  ): Promise<SqlAgentResult>;
}

export interface SummarizerCapability extends Agent {
  summarize(
    context: ConversationContext,
    query: GeneratedQuery,
    outcome: QuerySuccess,
    signal?: AbortSignal
  ): Promise<string>;
}

// External collaborators

export interface SchemaProvider {
  fetch(documentId: string, requestId: string, signal?: AbortSignal): Promise<SchemaSnapshot>;
}

export interface QueryExecutor {
  run(documentId: string, queryText: string, requestId: string, signal?: AbortSignal): Promise<QueryOutcome>;
}
