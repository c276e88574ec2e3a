import { describe, expect, it } from "vitest";
import { SqlAgent, extractQuery } from "../src/services/executors/sql";
import { LLMUpstreamError } from "../src/services/orchestration/errors";
import { UsageStats } from "../src/services/usageStats";
import { AGES_SCHEMA, recordingExecutor, scriptedLLM, userContext } from "./helpers";

describe("extractQuery", () => {
  it("takes the first sql fence", () => {
    expect(extractQuery("Here you go:\n```sql\nSELECT AVG(age) FROM Data;\n```\n```sql\nSELECT 2\n```")).toBe(
      "SELECT AVG(age) FROM Data"
    );
  });

  it("accepts a bare fence and skips fences in other languages", () => {
    expect(extractQuery("```bash\necho 1\n```\n```\nSELECT name FROM Data\n```")).toBe("SELECT name FROM Data");
  });

  it.each(["sqlite", "postgresql", "MySQL"])("accepts a fence tagged %s", (tag) => {
    expect(extractQuery(`\`\`\`${tag}\nSELECT AVG(age) FROM Data\n\`\`\``)).toBe("SELECT AVG(age) FROM Data");
  });

  it("cuts the fallback candidate at a closing fence", () => {
    expect(extractQuery("```text\nSELECT name FROM Data\n```\nDone.")).toBe("SELECT name FROM Data");
    expect(extractQuery("Query:\nSELECT age FROM Data\n```")).toBe("SELECT age FROM Data");
  });

  it("falls back to the first SELECT run up to a blank line", () => {
    expect(extractQuery("Sure.\nSELECT age\nFROM Data;\n\nThis returns ages.")).toBe("SELECT age\nFROM Data");
  });

  it("recognizes a leading WITH clause", () => {
    expect(extractQuery("Query with a CTE: WITH t AS (SELECT age FROM Data) SELECT MAX(age) FROM t")).toBe(
      "WITH t AS (SELECT age FROM Data) SELECT MAX(age) FROM t"
    );
  });

  it("returns null when there is no query", () => {
    expect(extractQuery("I am not sure what you mean.")).toBeNull();
    expect(extractQuery("```sql\n;\n```")).toBeNull();
  });
});

describe("SqlAgent", () => {
  it("executes a valid first candidate", async () => {
    const llm = scriptedLLM("```sql\nSELECT AVG(age) AS moyenne_age FROM Data\n```");
    const executor = recordingExecutor({ ok: true, rows: [{ moyenne_age: 35 }], columns: ["moyenne_age"] });
    const stats = new UsageStats();
    const agent = new SqlAgent({ llm, executor, stats });

    const { query, outcome } = await agent.generateAndExecute(userContext("Average age?"), AGES_SCHEMA);

    expect(query).toEqual({ text: "SELECT AVG(age) AS moyenne_age FROM Data", schema: AGES_SCHEMA, attempts: 1 });
    expect(outcome).toEqual({ ok: true, rows: [{ moyenne_age: 35 }], columns: ["moyenne_age"] });
    expect(executor.calls).toEqual(["SELECT AVG(age) AS moyenne_age FROM Data"]);
    expect(llm.calls[0]?.messages[0]?.content).toContain('- "Data": "id" (Id), "age" (Int), "name" (Text)');
    expect(llm.calls[0]?.messages[0]?.content).toContain("Question: Average age?");
    expect((await stats.snapshot()).agents.sql).toMatchObject({ invocations: 1, errors: 0 });
  });

  it("re-prompts with the validation reason and succeeds on a later attempt", async () => {
    const llm = scriptedLLM("SELECT AVG(age) FROM Candidates", "SELECT AVG(age) FROM Data");
    const executor = recordingExecutor({ ok: true, rows: [{ "AVG(age)": 35 }], columns: ["AVG(age)"] });
    const agent = new SqlAgent({ llm, executor, stats: new UsageStats() });

    const { query } = await agent.generateAndExecute(userContext("Average age?"), AGES_SCHEMA);

    expect(query.attempts).toBe(2);
    expect(executor.calls).toEqual(["SELECT AVG(age) FROM Data"]);
    const retry = llm.calls[1]?.messages ?? [];
    expect(retry.map((m) => m.role)).toEqual(["user", "assistant", "user"]);
    expect(retry[1]?.content).toBe("SELECT AVG(age) FROM Candidates");
    expect(retry[2]?.content).toBe(
      'That query was rejected: Unknown table "Candidates". Available tables: Data\nWrite a corrected query that follows every rule above.'
    );
  });

  it("runs a query fenced with a dialect tag on the first attempt", async () => {
    const llm = scriptedLLM("```sqlite\nSELECT AVG(age) FROM Data\n```");
    const executor = recordingExecutor({ ok: true, rows: [{ "AVG(age)": 35 }], columns: ["AVG(age)"] });
    const agent = new SqlAgent({ llm, executor, stats: new UsageStats() });

    const { query, outcome } = await agent.generateAndExecute(userContext("Average age?"), AGES_SCHEMA);

    expect(query.attempts).toBe(1);
    expect(outcome.ok).toBe(true);
    expect(executor.calls).toEqual(["SELECT AVG(age) FROM Data"]);
  });

  it("stops at the attempt bound without executing anything", async () => {
    const llm = scriptedLLM("SELECT * FROM Missing");
    const executor = recordingExecutor({ ok: true, rows: [], columns: [] });
    const stats = new UsageStats();
    const agent = new SqlAgent({ llm, executor, stats, maxAttempts: 3 });

    const { query, outcome } = await agent.generateAndExecute(userContext("Show missing"), AGES_SCHEMA);

    expect(llm.calls).toHaveLength(3);
    expect(executor.calls).toEqual([]);
    expect(query).toMatchObject({ text: "SELECT * FROM Missing", attempts: 3 });
    expect(outcome).toEqual({
      ok: false,
      kind: "validation",
      reason: 'Unknown table "Missing". Available tables: Data'
    });
    expect((await stats.snapshot()).agents.sql).toMatchObject({ invocations: 1, errors: 1 });
  });

  it("reports a generation failure when the model never writes a query", async () => {
    const llm = scriptedLLM("Sorry, I cannot help with that.");
    const executor = recordingExecutor({ ok: true, rows: [], columns: [] });
    const agent = new SqlAgent({ llm, executor, stats: new UsageStats(), maxAttempts: 2 });

    const { query, outcome } = await agent.generateAndExecute(userContext("???"), AGES_SCHEMA);

    expect(query.text).toBe("");
    expect(query.attempts).toBe(2);
    expect(outcome).toEqual({ ok: false, kind: "generation", reason: "No SQL query was found in the model output" });
  });

  it("returns execution failures without retrying", async () => {
    const llm = scriptedLLM("SELECT age FROM Data");
    const executor = recordingExecutor({ ok: false, kind: "execution", reason: "HTTP 400: no such function" });
    const agent = new SqlAgent({ llm, executor, stats: new UsageStats() });

    const { query, outcome } = await agent.generateAndExecute(userContext("ages"), AGES_SCHEMA);

    expect(llm.calls).toHaveLength(1);
    expect(query.attempts).toBe(1);
    expect(outcome).toEqual({ ok: false, kind: "execution", reason: "HTTP 400: no such function" });
  });

  it("propagates model failures", async () => {
    const stats = new UsageStats();
    const agent = new SqlAgent({
      llm: scriptedLLM(new LLMUpstreamError("LLM call timed out after 20000ms")),
      executor: recordingExecutor({ ok: true, rows: [], columns: [] }),
      stats
    });

    await expect(agent.generateAndExecute(userContext("ages"), AGES_SCHEMA)).rejects.toBeInstanceOf(LLMUpstreamError);
    expect((await stats.snapshot()).agents.sql).toMatchObject({ invocations: 1, errors: 1 });
  });
});
