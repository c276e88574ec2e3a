// Layer 4: Document store - REST client
import { z } from "zod";
import { DOCSTORE_API_KEY, DOCSTORE_API_URL, DOCSTORE_TIMEOUT_MS } from "../config/constants";
import { DocStoreUnavailableError, RequestCancelledError, errorMessage } from "../services/orchestration/errors";
import type { Row } from "../services/orchestration/types";
import { deadline, type DeadlineSignal } from "../utils/timeout";

/** The store answered, but not with a usable 2xx payload. */
export class DocStoreHttpError extends Error {
  constructor(
    message: string,
    readonly status: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "DocStoreHttpError";
  }
}

const TablesResponse = z.object({
  tables: z.array(z.object({ id: z.string() }))
});

const ColumnsResponse = z.object({
  columns: z.array(
    z.object({
      id: z.string(),
      type: z.string().optional(),
      fields: z
        .object({
          type: z.string().optional(),
          label: z.string().optional()
        })
        .optional()
    })
  )
});

const SqlResponse = z.object({
  records: z.array(z.record(z.unknown())),
  columns: z.array(z.string()).optional()
});

const WrappedRecord = z.object({ fields: z.record(z.unknown()) });

const ErrorBody = z.object({ error: z.string() });

export interface DocStoreColumn {
  id: string;
  type: string;
  label: string;
}

export interface SqlResult {
  rows: Row[];
  columns: string[];
}

export interface DocStoreClientOptions {
  baseUrl?: string;
  apiKey?: string;
  timeoutMs?: number;
}

function parseJsonOrNull(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

function columnsOf(rows: Row[]): string[] {
  const seen = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) seen.add(key);
  }
  return [...seen];
}

export class DocStoreClient {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly timeoutMs: number;

  constructor(opts: DocStoreClientOptions = {}) {
    this.baseUrl = (opts.baseUrl ?? DOCSTORE_API_URL).replace(/\/+$/, "");
    this.apiKey = opts.apiKey || DOCSTORE_API_KEY;
    this.timeoutMs = opts.timeoutMs ?? DOCSTORE_TIMEOUT_MS;
  }

  private async getJson<T>(path: string, schema: z.ZodType<T>, requestId: string, signal?: AbortSignal): Promise<T> {
    const url = `${this.baseUrl}${path}`;
    const timer = deadline(this.timeoutMs, signal);
    const started = Date.now();

    let res: Response;
    try {
      res = await fetch(url, {
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          Accept: "application/json"
        },
        signal: timer.signal
      });
    } catch (err) {
      throw this.transportError(err, timer, signal);
    }

    console.log(`[DocStore] ${requestId} GET ${path.split("?")[0]} -> ${res.status} (${Date.now() - started}ms)`);

    // The deadline also covers the body, which may still be streaming
    let text: string;
    try {
      text = await res.text();
    } catch (err) {
      throw this.transportError(err, timer, signal);
    }
    if (!res.ok) {
      throw new DocStoreHttpError(this.describeFailure(res.status, text), res.status);
    }

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch (err) {
      throw new DocStoreHttpError("Document store returned invalid JSON", res.status, { cause: err });
    }
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new DocStoreHttpError(
        `Unexpected document store response: ${parsed.error.issues[0]?.message ?? "invalid shape"}`,
        res.status,
        { cause: parsed.error }
      );
    }
    return parsed.data;
  }

  private transportError(err: unknown, timer: DeadlineSignal, signal?: AbortSignal): Error {
    if (signal?.aborted) return new RequestCancelledError("Document store call cancelled", { cause: err });
    if (timer.timedOut()) {
      return new DocStoreUnavailableError(`Document store timed out after ${this.timeoutMs}ms`, { cause: err });
    }
    return new DocStoreUnavailableError(`Document store unreachable: ${errorMessage(err)}`, { cause: err });
  }

  private describeFailure(status: number, text: string): string {
    const body = ErrorBody.safeParse(parseJsonOrNull(text));
    const detail = body.success ? body.data.error : text.trim();
    return `HTTP ${status}${detail ? `: ${detail.slice(0, 300)}` : ""}`;
  }

  private docPath(documentId: string) {
    return `/docs/${encodeURIComponent(documentId)}`;
  }

  async listTables(documentId: string, requestId: string, signal?: AbortSignal): Promise<string[]> {
    const body = await this.getJson(`${this.docPath(documentId)}/tables`, TablesResponse, requestId, signal);
    return body.tables.map((t) => t.id);
  }

  async listColumns(
    documentId: string,
    tableId: string,
    requestId: string,
    signal?: AbortSignal
  ): Promise<DocStoreColumn[]> {
    const body = await this.getJson(
      `${this.docPath(documentId)}/tables/${encodeURIComponent(tableId)}/columns`,
      ColumnsResponse,
      requestId,
      signal
    );
    return body.columns.map((c) => ({
      id: c.id,
      type: c.fields?.type ?? c.type ?? "Any",
      label: c.fields?.label ?? c.id
    }));
  }

  async runSql(documentId: string, sql: string, requestId: string, signal?: AbortSignal): Promise<SqlResult> {
    const body = await this.getJson(
      `${this.docPath(documentId)}/sql?q=${encodeURIComponent(sql)}`,
      SqlResponse,
      requestId,
      signal
    );
    const rows = body.records.map((record) => {
      const wrapped = WrappedRecord.safeParse(record);
      return wrapped.success ? wrapped.data.fields : record;
    });
    return { rows, columns: body.columns ?? columnsOf(rows) };
  }
}
