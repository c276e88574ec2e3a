import { describe, expect, it } from "vitest";
import { validateQuery } from "../src/services/executors/sql.validator";
import type { SchemaSnapshot } from "../src/services/orchestration/types";

const schema: SchemaSnapshot = {
  Data: [
    { name: "id", type: "Id" },
    { name: "age", type: "Int" },
    { name: "name", type: "Text" },
    { name: "city", type: "Text" }
  ],
  Orders: [
    { name: "id", type: "Id" },
    { name: "customer", type: "Ref:Data" },
    { name: "total", type: "Numeric" }
  ],
  "Sales Log": [{ name: "Amount", type: "Numeric" }]
};

describe("validateQuery accepts", () => {
  it.each([
    "SELECT AVG(age) AS moyenne_age FROM Data",
    "select avg(AGE) from data",
    "SELECT age a FROM Data ORDER BY a DESC",
    "SELECT d.name, SUM(o.total) AS spent FROM Data d JOIN Orders AS o ON o.customer = d.id GROUP BY d.name ORDER BY spent DESC LIMIT 5",
    "SELECT COUNT(*) FROM Data WHERE city = 'Paris' AND name LIKE 'A%'",
    'SELECT SUM("Amount") FROM "Sales Log"',
    "SELECT Data.age FROM Data, Orders WHERE Orders.customer = Data.id",
    "WITH adults AS (SELECT name, age FROM Data WHERE age >= 18) SELECT COUNT(*) AS n FROM adults",
    "SELECT t.age FROM (SELECT age FROM Data) t",
    "SELECT CAST(age AS INTEGER) FROM Data -- trailing note",
    "SELECT name FROM Data WHERE name = 'it''s; fine'",
    "SELECT CASE WHEN age > 30 THEN 'old' ELSE 'young' END bucket FROM Data",
    "SELECT j.value FROM Data, json_each(Data.name) j"
  ])("%s", (sql) => {
    expect(validateQuery(sql, schema)).toEqual({ ok: true });
  });
});

describe("validateQuery rejects", () => {
  it("an empty candidate as a generation failure", () => {
    expect(validateQuery("   ", schema)).toEqual({
      ok: false,
      kind: "generation",
      reason: "No SQL query was found in the model output"
    });
  });

  it("text that is not a query as a generation failure", () => {
    expect(validateQuery("EXPLAIN SELECT 1", schema)).toMatchObject({ ok: false, kind: "generation" });
  });

  it.each(["insert", "UPDATE", "Delete", "drop", "alter", "truncate", "create"])(
    "the mutating keyword %s regardless of surrounding read-only syntax",
    (keyword) => {
      const result = validateQuery(`SELECT age FROM Data WHERE name = '${keyword}'`, schema);
      expect(result).toEqual({
        ok: false,
        kind: "validation",
        reason: `Only read-only queries are allowed; found forbidden keyword "${keyword.toUpperCase()}"`
      });
    }
  );

  it("keywords only as whole words", () => {
    expect(validateQuery("SELECT name FROM Data WHERE city = 'updated'", schema)).toEqual({ ok: true });
  });

  it("multiple statements", () => {
    expect(validateQuery("SELECT age FROM Data; SELECT name FROM Data", schema)).toEqual({
      ok: false,
      kind: "validation",
      reason: "Multiple statements are not allowed; remove the ';'"
    });
  });

  it("unknown tables", () => {
    expect(validateQuery("SELECT * FROM Candidates", schema)).toEqual({
      ok: false,
      kind: "validation",
      reason: 'Unknown table "Candidates". Available tables: Data, Orders, Sales Log'
    });
  });

  it("unknown names called like table functions", () => {
    expect(validateQuery("SELECT * FROM Missing(1)", schema)).toEqual({
      ok: false,
      kind: "validation",
      reason: 'Unknown table "Missing". Available tables: Data, Orders, Sales Log'
    });
  });

  it("unknown tables in joins", () => {
    expect(validateQuery("SELECT d.age FROM Data d JOIN Payments p ON p.id = d.id", schema)).toMatchObject({
      ok: false,
      reason: 'Unknown table "Payments". Available tables: Data, Orders, Sales Log'
    });
  });

  it("unknown bare columns", () => {
    expect(validateQuery("SELECT salary FROM Data", schema)).toEqual({
      ok: false,
      kind: "validation",
      reason: 'Unknown column "salary". Available columns: Data(id, age, name, city)'
    });
  });

  it("columns of a table the query does not read", () => {
    expect(validateQuery("SELECT total FROM Data", schema)).toMatchObject({
      ok: false,
      reason: 'Unknown column "total". Available columns: Data(id, age, name, city)'
    });
  });

  it("unknown qualified columns", () => {
    expect(validateQuery("SELECT o.amount FROM Orders o", schema)).toEqual({
      ok: false,
      kind: "validation",
      reason: 'Unknown column "amount". Available columns: Orders(id, customer, total)'
    });
  });

  it("unknown qualifiers", () => {
    expect(validateQuery("SELECT x.age FROM Data d", schema)).toEqual({
      ok: false,
      kind: "validation",
      reason: 'Unknown table or alias "x" in "x.age"'
    });
  });

  it("double-quoted text values with a hint", () => {
    expect(validateQuery('SELECT age FROM Data WHERE city = "Paris"', schema)).toEqual({
      ok: false,
      kind: "validation",
      reason:
        'Unknown column "Paris". Available columns: Data(id, age, name, city). If "Paris" is meant as a text value, use single quotes: \'Paris\''
    });
  });

  it("unterminated strings", () => {
    expect(validateQuery("SELECT age FROM Data WHERE city = 'Paris", schema)).toEqual({
      ok: false,
      kind: "validation",
      reason: "Unterminated string literal"
    });
  });
});
