// Layer 2: Orchestration - Prompt templates and token-budget truncation
import { ANALYSIS_MAX_CELL_CHARS } from "../../config/constants";
import type { Row, SchemaColumn, SchemaSnapshot } from "./types";

const SLOT_PATTERN = /\{\{\s*([a-zA-Z_][a-zA-Z0-9_]*)\s*\}\}/g;

/**
 * A prompt with named `{{slot}}` placeholders. Rendering requires exactly the
 * declared slots: a missing or unknown value is a programming error.
 */
export class PromptTemplate<Slot extends string> {
  readonly slots: ReadonlySet<Slot>;

  constructor(
    readonly name: string,
    private readonly text: string,
    slots: readonly Slot[]
  ) {
    this.slots = new Set(slots);
    for (const match of text.matchAll(SLOT_PATTERN)) {
      const slot = match[1];
      if (slot === undefined || !this.hasSlot(slot)) {
        throw new Error(`Template ${name} uses undeclared slot "${slot}"`);
      }
    }
  }

  private hasSlot(name: string): name is Slot {
    return [...this.slots].some((s) => s === name);
  }

  render(values: Record<Slot, string>): string {
    const provided = Object.keys(values);
    for (const key of provided) {
      if (!this.hasSlot(key)) {
        throw new Error(`Template ${this.name} has no slot "${key}"`);
      }
    }
    for (const slot of this.slots) {
      if (typeof values[slot] !== "string") {
        throw new Error(`Template ${this.name} is missing slot "${slot}"`);
      }
    }
    return this.text.replace(SLOT_PATTERN, (_whole, slot: string) =>
      this.hasSlot(slot) ? values[slot] : ""
    );
  }
}

export const routerPrompt = `You classify the latest user message in a chat about a spreadsheet document.

Categories:
- data_request: the user asks for facts, figures, lists, counts, totals, comparisons or trends that must be read from the document's tables.
- generic: greetings, thanks, questions about how you work, or anything that does not need the table data.

Reply with exactly one word: data_request or generic.`;

export const genericPrompt = `You are a friendly assistant built into a spreadsheet application.
You can answer questions about the data in the user's document by querying its tables, and you can chat about anything else.
Keep replies short and answer in the user's language.
When the user seems to want numbers from their tables, invite them to ask a concrete question about the data.`;

export const sqlGenerationPrompt = new PromptTemplate(
  "sqlGeneration",
  `You write SQLite queries against a spreadsheet document.

Tables and columns:
{{schema}}

Recent conversation:
{{history}}

Question: {{question}}

{{instruction}}`,
  ["schema", "history", "question", "instruction"]
);

export const SQL_INSTRUCTION = `Write a single read-only SELECT statement (a WITH clause is allowed) that answers the question.
Use only the tables and columns listed above and quote identifiers with double quotes when they contain spaces.
Put string values in single quotes.
Return only the query inside a \`\`\`sql fenced block.`;

export const analysisPrompt = new PromptTemplate(
  "analysis",
  `You explain query results to the person who asked the question.

Question: {{question}}

Recent conversation:
{{history}}

Query that was run:
{{query}}

Results:
{{results}}

Numeric summary:
{{summary}}

Answer in one or two sentences, in the same language as the question. State the key figures directly and do not describe the query.`,
  ["question", "history", "query", "results", "summary"]
);

export interface SchemaPromptOptions {
  maxChars: number;
}

/**
 * One line per table. Tables that do not fit within `maxChars` are dropped
 * whole and listed in a trailing note. The first table is always kept; when it
 * alone is too long, its column list is cut instead.
 */
export function formatSchemaForPrompt(schema: SchemaSnapshot, { maxChars }: SchemaPromptOptions): string {
  const lines: string[] = [];
  const omitted: string[] = [];
  let used = 0;

  for (const [table, columns] of Object.entries(schema)) {
    const line = tableLine(table, columns.map(columnText));
    if (lines.length === 0 && line.length + 1 > maxChars) {
      lines.push(cutTableLine(table, columns.map(columnText), maxChars));
      used = maxChars;
    } else if (omitted.length === 0 && used + line.length + 1 <= maxChars) {
      lines.push(line);
      used += line.length + 1;
    } else {
      omitted.push(table);
    }
  }

  if (omitted.length > 0) {
    lines.push(`(${omitted.length} more table(s) omitted: ${omitted.join(", ")})`);
  }
  return lines.join("\n");
}

function columnText(column: SchemaColumn): string {
  return `"${column.name}" (${column.type})`;
}

function tableLine(table: string, columns: readonly string[]): string {
  return `- "${table}": ${columns.join(", ")}`;
}

function cutTableLine(table: string, columns: readonly string[], maxChars: number): string {
  const kept: string[] = [];
  for (const column of columns) {
    const rest = columns.length - kept.length - 1;
    const note = rest > 0 ? `, (${rest} more column(s) omitted)` : "";
    if (kept.length > 0 && tableLine(table, [...kept, column]).length + note.length + 1 > maxChars) break;
    kept.push(column);
  }
  const omittedColumns = columns.length - kept.length;
  const line = tableLine(table, kept);
  return omittedColumns > 0 ? `${line}, (${omittedColumns} more column(s) omitted)` : line;
}

function cellText(value: unknown): string {
  if (value === null || value === undefined) return "";
  return typeof value === "string" ? value : JSON.stringify(value);
}

export function truncateCell(value: unknown, maxChars = ANALYSIS_MAX_CELL_CHARS): string {
  const chars = Array.from(cellText(value));
  return chars.length > maxChars ? `${chars.slice(0, maxChars - 3).join("")}...` : chars.join("");
}

export interface RowSample {
  text: string;
  partial: boolean;
}

/** Pipe-separated table of at most `maxRows` x `maxColumns`, cells truncated. */
export function sampleRows(
  rows: readonly Row[],
  columns: readonly string[],
  { maxRows, maxColumns }: { maxRows: number; maxColumns: number }
): RowSample {
  const keptColumns = columns.slice(0, maxColumns);
  const keptRows = rows.slice(0, maxRows);
  let partial = keptColumns.length < columns.length || keptRows.length < rows.length;

  const body = keptRows.map((row) =>
    keptColumns
      .map((col) => {
        if (cellText(row[col]).length > ANALYSIS_MAX_CELL_CHARS) partial = true;
        return truncateCell(row[col]);
      })
      .join(" | ")
  );

  const lines = [keptColumns.join(" | "), ...body];
  if (partial) {
    lines.push(
      `(sample may be partial: showing ${keptRows.length} of ${rows.length} rows and ${keptColumns.length} of ${columns.length} columns)`
    );
  }
  return { text: lines.join("\n"), partial };
}

export interface ColumnStats {
  column: string;
  count: number;
  sum: number;
  average: number;
  min: number;
  max: number;
}

function toNumber(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "string" && value.trim() !== "") {
    const n = Number(value);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

/**
 * Stats over every row for columns whose non-empty values are all numeric.
 */
export function numericSummary(rows: readonly Row[], columns: readonly string[]): ColumnStats[] {
  const stats: ColumnStats[] = [];
  for (const column of columns) {
    const values: number[] = [];
    let numeric = true;
    for (const row of rows) {
      const raw = row[column];
      if (raw === null || raw === undefined || raw === "") continue;
      const n = toNumber(raw);
      if (n === null) {
        numeric = false;
        break;
      }
      values.push(n);
    }
    if (!numeric || values.length === 0) continue;
    const sum = values.reduce((a, b) => a + b, 0);
    stats.push({
      column,
      count: values.length,
      sum,
      average: sum / values.length,
      min: values.reduce((a, b) => Math.min(a, b)),
      max: values.reduce((a, b) => Math.max(a, b))
    });
  }
  return stats;
}

function round(n: number): string {
  return Number.isInteger(n) ? String(n) : n.toFixed(2);
}

export function formatNumericSummary(stats: readonly ColumnStats[]): string {
  if (stats.length === 0) return "(no numeric columns)";
  return stats
    .map(
      (s) =>
        `${s.column}: count=${s.count}, sum=${round(s.sum)}, avg=${round(s.average)}, min=${round(s.min)}, max=${round(s.max)}`
    )
    .join("\n");
}
