// Layer 2: Orchestration - Error taxonomy
import type { QueryFailureKind, Row } from "./types";

export type PipelineErrorKind =
  | "validation"
  | "routing"
  | "schema_fetch"
  | "sql_generation"
  | "sql_validation"
  | "sql_execution"
  | "llm_upstream"
  | "analysis"
  | "docstore_unavailable"
  | "cancelled";

export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed or empty inbound request, rejected before the workflow starts. */
export class ValidationError extends PipelineError {
  readonly kind = "validation";
}

/** Classification call failed. Resolved by the router's GENERIC default. */
export class RoutingError extends PipelineError {
  readonly kind = "routing";
}

export class SchemaFetchError extends PipelineError {
  readonly kind = "schema_fetch";

  constructor(
    message: string,
    readonly documentId: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class SQLGenerationError extends PipelineError {
  readonly kind = "sql_generation";
}

export class SQLValidationError extends PipelineError {
  readonly kind = "sql_validation";
}

export class SQLExecutionError extends PipelineError {
  readonly kind = "sql_execution";
}

/** Timeout or transport failure of a language-model call. */
export class LLMUpstreamError extends PipelineError {
  readonly kind = "llm_upstream";
}

/**
 * Summarization failed after a successful query. The rows stay attached so
 * operators can inspect them; callers only see a generic failure text.
 */
export class AnalysisError extends PipelineError {
  readonly kind = "analysis";

  constructor(
    message: string,
    readonly context: { query: string; columns: string[]; rows: Row[] },
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** The document store could not be reached at all (network failure or timeout). */
export class DocStoreUnavailableError extends PipelineError {
  readonly kind = "docstore_unavailable";
}

export class RequestCancelledError extends PipelineError {
  readonly kind = "cancelled";

  constructor(message = "Request cancelled", options?: { cause?: unknown }) {
    super(message, options);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function isCancellation(err: unknown): err is RequestCancelledError {
  return err instanceof RequestCancelledError;
}

/** Error class name reported for a failed query outcome. */
export function queryFailureErrorName(kind: QueryFailureKind): string {
  switch (kind) {
    case "generation":
      return SQLGenerationError.name;
    case "validation":
      return SQLValidationError.name;
    case "execution":
      return SQLExecutionError.name;
  }
}
