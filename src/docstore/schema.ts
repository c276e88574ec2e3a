// Layer 4: Document store - Live schema
import { SchemaFetchError } from "../services/orchestration/errors";
import type { SchemaColumn, SchemaProvider, SchemaSnapshot } from "../services/orchestration/types";
import { DocStoreClient, DocStoreHttpError } from "./client";

// Every table carries a row id the columns endpoint does not list
const ROW_ID_COLUMN: SchemaColumn = { name: "id", type: "Id" };

export class DocStoreSchemaProvider implements SchemaProvider {
  constructor(private readonly client: DocStoreClient = new DocStoreClient()) {}

  async fetch(documentId: string, requestId: string, signal?: AbortSignal): Promise<SchemaSnapshot> {
    try {
      const tables = await this.client.listTables(documentId, requestId, signal);
      if (tables.length === 0) {
        throw new SchemaFetchError(`Document "${documentId}" has no tables`, documentId);
      }

      const entries = await Promise.all(
        tables.map(async (table) => {
          const columns = await this.client.listColumns(documentId, table, requestId, signal);
          const mapped = columns.map((c) => ({ name: c.id, type: c.type }));
          const hasId = mapped.some((c) => c.name.toLowerCase() === ROW_ID_COLUMN.name);
          return [table, hasId ? mapped : [ROW_ID_COLUMN, ...mapped]] as const;
        })
      );

      const snapshot: Record<string, readonly SchemaColumn[]> = {};
      for (const [table, columns] of entries) snapshot[table] = columns;
      console.log(`[Schema] ${requestId} ${documentId}: ${tables.length} table(s)`);
      return snapshot;
    } catch (err) {
      if (err instanceof DocStoreHttpError) {
        throw new SchemaFetchError(`Could not read the schema of document "${documentId}" (${err.message})`, documentId, {
          cause: err
        });
      }
      throw err;
    }
  }
}
