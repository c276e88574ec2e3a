// Layer 3: SQL Executor - Static checks on generated queries
import type { SchemaSnapshot } from "../orchestration/types";

export type ValidationResult =
  | { ok: true }
  | { ok: false; kind: "generation" | "validation"; reason: string };

type TokenType = "word" | "quoted" | "string" | "number" | "punct";

interface Token {
  type: TokenType;
  value: string;
  upper: string;
  quote?: string;
}

export const MUTATING_KEYWORDS = /\b(insert|update|delete|drop|alter|truncate|create)\b/i;

const KEYWORDS = new Set([
  "ALL", "AND", "AS", "ASC", "BETWEEN", "BY", "CASE", "CAST", "COLLATE", "CROSS", "CURRENT",
  "CURRENT_DATE", "CURRENT_TIME", "CURRENT_TIMESTAMP", "DESC", "DISTINCT", "ELSE", "END", "ESCAPE",
  "EXCEPT", "EXISTS", "FALSE", "FILTER", "FIRST", "FOLLOWING", "FROM", "FULL", "GLOB", "GROUP",
  "HAVING", "IN", "INNER", "INTERSECT", "IS", "ISNULL", "JOIN", "LAST", "LEFT", "LIKE", "LIMIT",
  "MATERIALIZED", "NATURAL", "NOCASE", "NOT", "NOTNULL", "NULL", "NULLS", "OFFSET", "ON", "OR",
  "ORDER", "OUTER", "OVER", "PARTITION", "PRECEDING", "RANGE", "RECURSIVE", "REGEXP", "RIGHT",
  "ROW", "ROWS", "SELECT", "THEN", "TRUE", "UNBOUNDED", "UNION", "USING", "VALUES", "WHEN",
  "WHERE", "WINDOW", "WITH",
  // type names, as seen in CAST(x AS ...)
  "BLOB", "BOOLEAN", "DECIMAL", "DOUBLE", "FLOAT", "INT", "INTEGER", "NUMERIC", "REAL", "TEXT",
  "VARCHAR"
]);

const TABLE_FUNCTIONS = new Set(["json_each", "json_tree", "pragma_table_info", "generate_series"]);

const TWO_CHAR_OPERATORS = new Set(["<=", ">=", "<>", "!=", "==", "||"]);
const CLOSING_QUOTE: Record<string, string> = { '"': '"', "`": "`", "[": "]" };

class TokenizeError extends Error {}

function tokenize(sql: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;
  const push = (type: TokenType, value: string, quote?: string) =>
    tokens.push({ type, value, upper: value.toUpperCase(), quote });

  while (i < sql.length) {
    const ch = sql.charAt(i);
    const rest = sql.slice(i);

    if (/\s/.test(ch)) {
      i++;
    } else if (rest.startsWith("--")) {
      const end = sql.indexOf("\n", i);
      i = end === -1 ? sql.length : end + 1;
    } else if (rest.startsWith("/*")) {
      const end = sql.indexOf("*/", i + 2);
      if (end === -1) throw new TokenizeError("Unterminated block comment");
      i = end + 2;
    } else if (ch === "'") {
      let value = "";
      let j = i + 1;
      for (;;) {
        if (j >= sql.length) throw new TokenizeError("Unterminated string literal");
        const c = sql.charAt(j);
        if (c === "'" && sql.charAt(j + 1) === "'") {
          value += "'";
          j += 2;
        } else if (c === "'") {
          break;
        } else {
          value += c;
          j++;
        }
      }
      push("string", value);
      i = j + 1;
    } else if (ch in CLOSING_QUOTE) {
      const close = CLOSING_QUOTE[ch] ?? ch;
      let value = "";
      let j = i + 1;
      for (;;) {
        if (j >= sql.length) throw new TokenizeError(`Unterminated quoted identifier starting with ${ch}`);
        const c = sql.charAt(j);
        if (c === close && sql.charAt(j + 1) === close && close !== "]") {
          value += close;
          j += 2;
        } else if (c === close) {
          break;
        } else {
          value += c;
          j++;
        }
      }
      push("quoted", value, ch);
      i = j + 1;
    } else {
      const number = /^\d+(\.\d+)?([eE][+-]?\d+)?/.exec(rest);
      const word = /^[\p{L}_][\p{L}\p{N}_$]*/u.exec(rest);
      if (number) {
        push("number", number[0]);
        i += number[0].length;
      } else if (word) {
        push("word", word[0]);
        i += word[0].length;
      } else if (TWO_CHAR_OPERATORS.has(rest.slice(0, 2))) {
        push("punct", rest.slice(0, 2));
        i += 2;
      } else {
        push("punct", ch);
        i++;
      }
    }
  }
  return tokens;
}

function isIdentifier(t: Token | undefined): t is Token {
  return !!t && (t.type === "quoted" || (t.type === "word" && !KEYWORDS.has(t.upper)));
}

function isPunct(t: Token | undefined, value: string): boolean {
  return !!t && t.type === "punct" && t.value === value;
}

function isKeyword(t: Token | undefined, upper: string): boolean {
  return !!t && t.type === "word" && t.upper === upper;
}

/** Index of the parenthesis closing the one at `open`, or the last index. */
function matchingParen(tokens: Token[], open: number): number {
  let depth = 0;
  for (let i = open; i < tokens.length; i++) {
    if (isPunct(tokens[i], "(")) depth++;
    else if (isPunct(tokens[i], ")")) {
      depth--;
      if (depth === 0) return i;
    }
  }
  return tokens.length - 1;
}

interface TableInfo {
  name: string;
  columns: Map<string, string>;
}

type Scope = { kind: "table"; table: TableInfo } | { kind: "opaque" };

interface QueryShape {
  /** Indices of tokens naming tables, aliases or CTEs. */
  names: Set<number>;
  tableRefs: { name: string; index: number }[];
  /** Lower-cased qualifier -> what it refers to. */
  scopes: Map<string, Scope>;
  cteNames: Set<string>;
  /** Output aliases and CTE column names, lower-cased. */
  aliases: Set<string>;
  usesOpaqueSource: boolean;
}

function describeCtes(tokens: Token[], shape: QueryShape) {
  if (!isKeyword(tokens[0], "WITH")) return;
  let i = 1;
  if (isKeyword(tokens[i], "RECURSIVE")) i++;
  while (i < tokens.length) {
    const name = tokens[i];
    if (!isIdentifier(name)) return;
    shape.names.add(i);
    shape.cteNames.add(name.value.toLowerCase());
    shape.scopes.set(name.value.toLowerCase(), { kind: "opaque" });
    i++;
    if (isPunct(tokens[i], "(")) {
      const close = matchingParen(tokens, i);
      for (let j = i + 1; j < close; j++) {
        const col = tokens[j];
        if (isIdentifier(col)) {
          shape.names.add(j);
          shape.aliases.add(col.value.toLowerCase());
        }
      }
      i = close + 1;
    }
    if (!isKeyword(tokens[i], "AS")) return;
    i++;
    if (isKeyword(tokens[i], "NOT")) i++;
    if (isKeyword(tokens[i], "MATERIALIZED")) i++;
    if (!isPunct(tokens[i], "(")) return;
    i = matchingParen(tokens, i) + 1;
    if (!isPunct(tokens[i], ",")) return;
    i++;
  }
}

/** Reads an optional `[AS] alias` at `i`; returns the index after it. */
function readAlias(tokens: Token[], i: number, shape: QueryShape, scope: Scope): number {
  let j = i;
  if (isKeyword(tokens[j], "AS")) j++;
  const alias = tokens[j];
  if (isIdentifier(alias) && !isPunct(tokens[j + 1], "(") && !isPunct(tokens[j + 1], ".")) {
    shape.names.add(j);
    shape.scopes.set(alias.value.toLowerCase(), scope);
    return j + 1;
  }
  return i;
}

function describeSources(tokens: Token[], tables: Map<string, TableInfo>, shape: QueryShape) {
  for (let i = 0; i < tokens.length; i++) {
    const isFrom = isKeyword(tokens[i], "FROM");
    if (!isFrom && !isKeyword(tokens[i], "JOIN")) continue;

    let j = i + 1;
    for (;;) {
      if (isPunct(tokens[j], "(")) {
        // Subquery or parenthesized join; its own FROM clauses are visited by the outer loop
        shape.usesOpaqueSource = true;
        j = readAlias(tokens, matchingParen(tokens, j) + 1, shape, { kind: "opaque" });
      } else {
        let nameIndex = j;
        if (isIdentifier(tokens[j]) && isPunct(tokens[j + 1], ".") && isIdentifier(tokens[j + 2])) {
          nameIndex = j + 2;
        }
        const nameToken = tokens[nameIndex];
        if (!isIdentifier(nameToken)) break;

        for (let k = j; k <= nameIndex; k++) shape.names.add(k);
        j = nameIndex + 1;

        if (isPunct(tokens[j], "(") && TABLE_FUNCTIONS.has(nameToken.value.toLowerCase())) {
          shape.usesOpaqueSource = true;
          j = readAlias(tokens, matchingParen(tokens, j) + 1, shape, { kind: "opaque" });
        } else {
          const lower = nameToken.value.toLowerCase();
          const table = tables.get(lower);
          const scope: Scope =
            table && !shape.cteNames.has(lower) ? { kind: "table", table } : { kind: "opaque" };
          if (scope.kind === "opaque") shape.usesOpaqueSource = true;
          shape.tableRefs.push({ name: nameToken.value, index: nameIndex });
          shape.scopes.set(lower, scope);
          // `name(...)` that is not a table function is reported as an unknown table
          if (isPunct(tokens[j], "(")) j = matchingParen(tokens, j) + 1;
          j = readAlias(tokens, j, shape, scope);
        }
      }
      if (!isFrom || !isPunct(tokens[j], ",")) break;
      j++;
    }
  }
}

function describeOutputAliases(tokens: Token[], shape: QueryShape) {
  tokens.forEach((t, i) => {
    if (!isIdentifier(t) || shape.names.has(i)) return;
    if (isPunct(tokens[i + 1], "(") || isPunct(tokens[i + 1], ".")) return;
    const prev = tokens[i - 1];
    if (!prev) return;

    // `expr AS name` or `expr name`
    const isAlias =
      isKeyword(prev, "AS") ||
      isKeyword(prev, "END") ||
      isPunct(prev, ")") ||
      prev.type === "string" ||
      prev.type === "number" ||
      isIdentifier(prev);
    if (isAlias) {
      shape.aliases.add(t.value.toLowerCase());
      shape.names.add(i);
    }
  });
}

function unknownColumnReason(column: Token, candidates: TableInfo[]): string {
  const listed = candidates
    .map((t) => `${t.name}(${[...t.columns.values()].join(", ")})`)
    .join("; ");
  let reason = `Unknown column "${column.value}". Available columns: ${listed || "none"}`;
  if (column.quote === '"') {
    reason += `. If "${column.value}" is meant as a text value, use single quotes: '${column.value}'`;
  }
  return reason;
}

/**
 * Checks a candidate query against safety rules and the live schema.
 * Identifier comparison is case-insensitive.
 */
export function validateQuery(text: string, schema: SchemaSnapshot): ValidationResult {
  const sql = text.trim();
  if (!sql) {
    return { ok: false, kind: "generation", reason: "No SQL query was found in the model output" };
  }

  const mutating = MUTATING_KEYWORDS.exec(sql);
  if (mutating) {
    return {
      ok: false,
      kind: "validation",
      reason: `Only read-only queries are allowed; found forbidden keyword "${mutating[1]?.toUpperCase()}"`
    };
  }

  let tokens: Token[];
  try {
    tokens = tokenize(sql);
  } catch (err) {
    if (err instanceof TokenizeError) return { ok: false, kind: "validation", reason: err.message };
    throw err;
  }

  const first = tokens[0];
  if (!first || !(isKeyword(first, "SELECT") || isKeyword(first, "WITH"))) {
    return { ok: false, kind: "generation", reason: "The output is not a SELECT query" };
  }
  if (isKeyword(first, "WITH") && !tokens.some((t) => isKeyword(t, "SELECT"))) {
    return { ok: false, kind: "generation", reason: "The WITH clause is not followed by a SELECT" };
  }
  if (tokens.some((t) => isPunct(t, ";"))) {
    return { ok: false, kind: "validation", reason: "Multiple statements are not allowed; remove the ';'" };
  }

  const tables = new Map<string, TableInfo>();
  for (const [name, columns] of Object.entries(schema)) {
    tables.set(name.toLowerCase(), {
      name,
      columns: new Map(columns.map((c) => [c.name.toLowerCase(), c.name]))
    });
  }

  const shape: QueryShape = {
    names: new Set(),
    tableRefs: [],
    scopes: new Map(),
    cteNames: new Set(),
    aliases: new Set(),
    usesOpaqueSource: false
  };
  describeCtes(tokens, shape);
  describeSources(tokens, tables, shape);

  for (const ref of shape.tableRefs) {
    const lower = ref.name.toLowerCase();
    if (!tables.has(lower) && !shape.cteNames.has(lower)) {
      const available = [...tables.values()].map((t) => t.name).join(", ");
      return {
        ok: false,
        kind: "validation",
        reason: `Unknown table "${ref.name}". Available tables: ${available || "none"}`
      };
    }
  }

  describeOutputAliases(tokens, shape);

  const referenced: TableInfo[] = [];
  for (const scope of shape.scopes.values()) {
    if (scope.kind === "table" && !referenced.includes(scope.table)) referenced.push(scope.table);
  }
  const allTables = [...tables.values()];

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (!isIdentifier(token) || shape.names.has(i)) continue;
    if (isPunct(tokens[i + 1], "(")) continue;

    if (isPunct(tokens[i + 1], ".")) {
      const column = tokens[i + 2];
      const scope = shape.scopes.get(token.value.toLowerCase());
      if (!scope) {
        return {
          ok: false,
          kind: "validation",
          reason: `Unknown table or alias "${token.value}" in "${token.value}.${column?.value ?? ""}"`
        };
      }
      if (scope.kind === "table" && isIdentifier(column) && !scope.table.columns.has(column.value.toLowerCase())) {
        return { ok: false, kind: "validation", reason: unknownColumnReason(column, [scope.table]) };
      }
      i += 2;
      continue;
    }

    const lower = token.value.toLowerCase();
    if (shape.aliases.has(lower)) continue;
    const candidates = shape.usesOpaqueSource ? allTables : referenced;
    if (!candidates.some((t) => t.columns.has(lower))) {
      return {
        ok: false,
        kind: "validation",
        reason: unknownColumnReason(token, shape.usesOpaqueSource ? allTables : referenced)
      };
    }
  }

  return { ok: true };
}
