// Layer 2: Orchestration - Master Coordinator
import { withSpan, addEvent } from "../../config/otel";
import { usageStats, type UsageStats } from "../usageStats";
import {
  AnalysisError,
  RequestCancelledError,
  SchemaFetchError,
  errorMessage,
  isCancellation,
  queryFailureErrorName
} from "./errors";
import type {
  AgentName,
  AgentResponse,
  ConversationContext,
  Intent,
  QueryCapability,
  QueryFailureKind,
  ResponderCapability,
  RouterCapability,
  SchemaProvider,
  SummarizerCapability,
  WorkflowState
} from "./types";

export const USER_MESSAGES = {
  schemaUnavailable:
    "I couldn't read the structure of this document, so I can't answer questions about its data right now. Please check the document id and your access rights.",
  generation: "I couldn't understand that as a question about your data. Could you rephrase it?",
  validation:
    "I couldn't build a safe query for that question. Try rephrasing it, or name the table and columns you have in mind.",
  execution: "The query failed to run against your document. Please try rephrasing your question.",
  unavailable: "Sorry, something went wrong while answering. Please try again in a moment.",
  cancelled: "The request was cancelled."
} as const;

const QUERY_FAILURE_TEXT: Record<QueryFailureKind, string> = {
  generation: USER_MESSAGES.generation,
  validation: USER_MESSAGES.validation,
  execution: USER_MESSAGES.execution
};

const TRANSITIONS: Record<WorkflowState, readonly WorkflowState[]> = {
  Init: ["Routed", "Failed"],
  Routed: ["Querying", "Done", "Failed"],
  Querying: ["Analyzed", "QueryFailed", "Failed"],
  Analyzed: ["Done", "Failed"],
  QueryFailed: ["Done", "Failed"],
  Done: [],
  Failed: []
};

export interface TransitionEvent {
  requestId: string;
  from: WorkflowState;
  to: WorkflowState;
  detail: string;
  ts: number;
}

export interface HandleOptions {
  signal?: AbortSignal;
  onTransition?: (event: TransitionEvent) => void;
}

/** Per-request state. Nothing here outlives a single `handle` call. */
class WorkflowRun {
  state: WorkflowState = "Init";
  readonly path: WorkflowState[] = ["Init"];
  intent: Intent | null = null;
  /** Agent whose stage is running; decides `agentUsed` when something throws. */
  stage: AgentName = "router";

  constructor(
    readonly requestId: string,
    private readonly onTransition?: (event: TransitionEvent) => void
  ) {}

  get terminal() {
    return TRANSITIONS[this.state].length === 0;
  }

  transition(to: WorkflowState, detail: string) {
    const from = this.state;
    if (!TRANSITIONS[from].includes(to)) {
      throw new Error(`Illegal workflow transition ${from} -> ${to}`);
    }
    this.state = to;
    this.path.push(to);
    console.log(`[Orchestrator] ${this.requestId} ${from} -> ${to}: ${detail}`);
    addEvent("workflow.transition", { "request.id": this.requestId, from, to, detail });
    this.onTransition?.({ requestId: this.requestId, from, to, detail, ts: Date.now() });
  }

  respond(fields: Omit<AgentResponse, "requestId" | "path">): AgentResponse {
    return { ...fields, requestId: this.requestId, path: [...this.path] };
  }
}

function throwIfCancelled(signal?: AbortSignal) {
  if (signal?.aborted) throw new RequestCancelledError();
}

export interface OrchestratorDeps {
  router: RouterCapability;
  generic: ResponderCapability;
  sql: QueryCapability;
  analysis: SummarizerCapability;
  schemaProvider: SchemaProvider;
  stats?: UsageStats;
}

/**
 * Drives one conversation through routing, querying and analysis.
 * `handle` never throws: every failure becomes a well-formed AgentResponse.
 */
export class Orchestrator {
  private readonly stats: UsageStats;

  constructor(private readonly deps: OrchestratorDeps) {
    this.stats = deps.stats ?? usageStats;
  }

  async handle(context: ConversationContext, opts: HandleOptions = {}): Promise<AgentResponse> {
    const run = new WorkflowRun(context.requestId, opts.onTransition);
    let response: AgentResponse;
    try {
      response = await this.execute(context, run, opts.signal);
    } catch (err) {
      response = this.translateError(err, run);
    }
    await this.stats.recordRequest(run.intent, response.error !== null);
    return response;
  }

  private async execute(context: ConversationContext, run: WorkflowRun, signal?: AbortSignal): Promise<AgentResponse> {
    const attrs = { "request.id": context.requestId, "document.id": context.documentId };

    throwIfCancelled(signal);
    const decision = await withSpan("agent.router", () => this.deps.router.classify(context, signal), attrs);
    run.intent = decision.intent;
    run.transition("Routed", `intent=${decision.intent} (${decision.rationale})`);

    if (decision.intent === "GENERIC") {
      run.stage = "generic";
      throwIfCancelled(signal);
      const text = await withSpan("agent.generic", () => this.deps.generic.respond(context, signal), attrs);
      run.transition("Done", "generic reply");
      return run.respond({ response: text, agentUsed: "generic", sqlQuery: null, dataAnalyzed: false, error: null });
    }

    run.stage = "sql";
    throwIfCancelled(signal);
    const schema = await withSpan(
      "schema.fetch",
      () => this.deps.schemaProvider.fetch(context.documentId, context.requestId, signal),
      attrs
    ).catch((err: unknown) => {
      if (err instanceof SchemaFetchError) return err;
      throw err;
    });
    if (schema instanceof SchemaFetchError) {
      run.transition("Failed", `${schema.name}: ${schema.message}`);
      return run.respond({
        response: USER_MESSAGES.schemaUnavailable,
        agentUsed: "sql",
        sqlQuery: null,
        dataAnalyzed: false,
        error: schema.message
      });
    }
    run.transition("Querying", `${Object.keys(schema).length} table(s) in schema`);

    throwIfCancelled(signal);
    const { query, outcome } = await withSpan(
      "agent.sql",
      () => this.deps.sql.generateAndExecute(context, schema, signal),
      attrs
    );

    if (!outcome.ok) {
      run.transition("QueryFailed", `${queryFailureErrorName(outcome.kind)} after ${query.attempts} attempt(s): ${outcome.reason}`);
      run.transition("Done", "query failure reported");
      return run.respond({
        response: QUERY_FAILURE_TEXT[outcome.kind],
        agentUsed: "sql",
        // Only a query that actually ran is reported back
        sqlQuery: outcome.kind === "execution" ? query.text : null,
        dataAnalyzed: false,
        error: outcome.reason
      });
    }

    run.stage = "analysis";
    throwIfCancelled(signal);
    let summary: string;
    try {
      summary = await withSpan(
        "agent.analysis",
        () => this.deps.analysis.summarize(context, query, outcome, signal),
        { ...attrs, "result.rows": outcome.rows.length }
      );
    } catch (err) {
      if (isCancellation(err)) throw err;
      const analysisError = new AnalysisError(
        `Summarization failed: ${errorMessage(err)}`,
        { query: query.text, columns: outcome.columns, rows: outcome.rows },
        { cause: err }
      );
      console.error(
        `[Orchestrator] ${context.requestId} ${analysisError.message}; ${outcome.rows.length} row(s) kept for inspection`,
        analysisError.context
      );
      run.transition("Failed", `${analysisError.name}: ${analysisError.message}`);
      return run.respond({
        response: USER_MESSAGES.unavailable,
        agentUsed: "analysis",
        sqlQuery: query.text,
        dataAnalyzed: false,
        error: analysisError.message
      });
    }

    run.transition("Analyzed", `${outcome.rows.length} row(s) summarized`);
    run.transition("Done", "analysis reply");
    return run.respond({ response: summary, agentUsed: "analysis", sqlQuery: query.text, dataAnalyzed: true, error: null });
  }

  private translateError(err: unknown, run: WorkflowRun): AgentResponse {
    const cancelled = isCancellation(err);
    const message = errorMessage(err);
    const name = err instanceof Error ? err.name : "Error";
    if (cancelled) {
      console.warn(`[Orchestrator] ${run.requestId} cancelled during ${run.stage}`);
    } else {
      console.error(`[Orchestrator] ${run.requestId} ${name} during ${run.stage}: ${message}`);
    }
    if (!run.terminal) run.transition("Failed", `${name}: ${message}`);

    return run.respond({
      response: cancelled ? USER_MESSAGES.cancelled : USER_MESSAGES.unavailable,
      agentUsed: run.stage === "router" ? "generic" : run.stage,
      sqlQuery: null,
      dataAnalyzed: false,
      error: message
    });
  }
}
