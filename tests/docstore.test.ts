import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { DocStoreClient, DocStoreHttpError } from "../src/docstore/client";
import { DocStoreSchemaProvider } from "../src/docstore/schema";
import { DocStoreQueryExecutor } from "../src/docstore/sqlRunner";
import {
  DocStoreUnavailableError,
  RequestCancelledError,
  SchemaFetchError
} from "../src/services/orchestration/errors";

type Route = (url: URL) => Response;

function json(body: unknown, status = 200) {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

let requests: { url: URL; headers: Headers }[] = [];

function stubFetch(route: Route) {
  requests = [];
  vi.stubGlobal(
    "fetch",
    vi.fn(async (input: string | URL | Request, init?: RequestInit) => {
      const url = new URL(input instanceof Request ? input.url : input.toString());
      requests.push({ url, headers: new Headers(init?.headers) });
      return route(url);
    })
  );
}

describe("document store client", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it("builds a schema snapshot with the implicit row id", async () => {
    stubFetch((url) => {
      if (url.pathname === "/api/docs/doc-1/tables") return json({ tables: [{ id: "People" }, { id: "Orders" }] });
      if (url.pathname === "/api/docs/doc-1/tables/People/columns") {
        return json({
          columns: [
            { id: "Name", fields: { type: "Text", label: "Name" } },
            { id: "Age", fields: { type: "Int", label: "Age" } }
          ]
        });
      }
      if (url.pathname === "/api/docs/doc-1/tables/Orders/columns") {
        return json({ columns: [{ id: "Total", type: "Numeric" }, { id: "Note" }] });
      }
      return json({ error: "not found" }, 404);
    });

    const schema = await new DocStoreSchemaProvider(new DocStoreClient()).fetch("doc-1", "req-1");

    expect(schema).toEqual({
      People: [
        { name: "id", type: "Id" },
        { name: "Name", type: "Text" },
        { name: "Age", type: "Int" }
      ],
      Orders: [
        { name: "id", type: "Id" },
        { name: "Total", type: "Numeric" },
        { name: "Note", type: "Any" }
      ]
    });
    expect(requests[0]?.headers.get("Authorization")).toBe("Bearer test-key");
    expect(requests[0]?.url.origin).toBe("http://docstore.test");
  });

  it("uses a per-request key when one is given", async () => {
    stubFetch(() => json({ tables: [{ id: "T" }] }));
    await new DocStoreClient({ apiKey: "other-key" }).listTables("doc-1", "req-1");
    expect(requests[0]?.headers.get("Authorization")).toBe("Bearer other-key");
  });

  it("turns an unknown document into a schema fetch error", async () => {
    stubFetch(() => json({ error: "document not found" }, 404));

    const fetching = new DocStoreSchemaProvider().fetch("nope", "req-1");

    await expect(fetching).rejects.toBeInstanceOf(SchemaFetchError);
    await expect(fetching).rejects.toThrow('Could not read the schema of document "nope" (HTTP 404: document not found)');
  });

  it("treats a document without tables as a schema fetch error", async () => {
    stubFetch(() => json({ tables: [] }));
    await expect(new DocStoreSchemaProvider().fetch("empty", "req-1")).rejects.toThrow('Document "empty" has no tables');
  });

  it("runs SQL and unwraps records in either shape", async () => {
    stubFetch((url) => {
      expect(url.pathname).toBe("/api/docs/doc-1/sql");
      expect(url.searchParams.get("q")).toBe("SELECT AVG(age) AS moyenne_age FROM Data");
      return json({ statement: "SELECT ...", records: [{ fields: { moyenne_age: 35 } }] });
    });

    const outcome = await new DocStoreQueryExecutor().run("doc-1", "SELECT AVG(age) AS moyenne_age FROM Data", "req-1");

    expect(outcome).toEqual({ ok: true, rows: [{ moyenne_age: 35 }], columns: ["moyenne_age"] });
  });

  it("accepts flat records with explicit columns", async () => {
    stubFetch(() => json({ records: [{ a: 1, b: "x" }], columns: ["b", "a"] }));
    const outcome = await new DocStoreQueryExecutor().run("doc-1", "SELECT b, a FROM T", "req-1");
    expect(outcome).toEqual({ ok: true, rows: [{ a: 1, b: "x" }], columns: ["b", "a"] });
  });

  it("returns engine rejections as execution failures", async () => {
    stubFetch(() => json({ error: "no such column: agee" }, 400));
    const outcome = await new DocStoreQueryExecutor().run("doc-1", "SELECT agee FROM Data", "req-1");
    expect(outcome).toEqual({ ok: false, kind: "execution", reason: "HTTP 400: no such column: agee" });
  });

  it("rejects malformed payloads", async () => {
    stubFetch(() => json({ rows: [] }));
    await expect(new DocStoreClient().runSql("doc-1", "SELECT 1", "req-1")).rejects.toBeInstanceOf(DocStoreHttpError);
  });

  it("throws when the store cannot be reached", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        throw new TypeError("fetch failed");
      })
    );
    await expect(new DocStoreQueryExecutor().run("doc-1", "SELECT 1", "req-1")).rejects.toThrow(
      new DocStoreUnavailableError("Document store unreachable: fetch failed")
    );
  });

  it("throws a cancellation when the caller aborts", async () => {
    const controller = new AbortController();
    controller.abort();
    vi.stubGlobal(
      "fetch",
      vi.fn(async (_input: string, init?: RequestInit) => {
        throw init?.signal?.reason ?? new Error("aborted");
      })
    );
    await expect(new DocStoreClient().listTables("doc-1", "req-1", controller.signal)).rejects.toBeInstanceOf(
      RequestCancelledError
    );
  });

  it("throws a cancellation when the caller aborts while the body is streaming", async () => {
    const controller = new AbortController();
    vi.stubGlobal(
      "fetch",
      vi.fn(async (_input: string, init?: RequestInit) => {
        const signal = init?.signal;
        const body = new ReadableStream<Uint8Array>({
          start(stream) {
            stream.enqueue(new TextEncoder().encode('{"records": ['));
            if (signal) signal.addEventListener("abort", () => stream.error(signal.reason));
          }
        });
        return new Response(body, { status: 200 });
      })
    );
    setTimeout(() => controller.abort(), 20);

    await expect(
      new DocStoreQueryExecutor().run("doc-1", "SELECT 1", "req-1", controller.signal)
    ).rejects.toBeInstanceOf(RequestCancelledError);
  });
});
