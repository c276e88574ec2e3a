// Layer 4: Document store - Query execution
import type { QueryExecutor, QueryOutcome } from "../services/orchestration/types";
import { DocStoreClient, DocStoreHttpError } from "./client";

/**
 * Engine rejections come back as failed outcomes; only an unreachable store,
 * a timeout or a cancellation throws.
 */
export class DocStoreQueryExecutor implements QueryExecutor {
  constructor(private readonly client: DocStoreClient = new DocStoreClient()) {}

  async run(documentId: string, queryText: string, requestId: string, signal?: AbortSignal): Promise<QueryOutcome> {
    try {
      const { rows, columns } = await this.client.runSql(documentId, queryText, requestId, signal);
      console.log(`[SqlRunner] ${requestId} ${rows.length} row(s)`);
      return { ok: true, rows, columns };
    } catch (err) {
      if (err instanceof DocStoreHttpError) {
        return { ok: false, kind: "execution", reason: err.message };
      }
      throw err;
    }
  }
}
