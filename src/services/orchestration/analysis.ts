// Layer 2: Orchestration - Result summarization
import { openaiClient, type LLMClient } from "../../config/openai";
import {
  ANALYSIS_MAX_COLUMNS,
  ANALYSIS_MAX_ROWS,
  ANALYSIS_MAX_TOKENS,
  ANALYSIS_MODEL
} from "../../config/constants";
import { trackAgent, usageStats, type UsageStats } from "../usageStats";
import { formatHistory, historyWindow, lastUserMessage } from "./context";
import { analysisPrompt, formatNumericSummary, numericSummary, sampleRows } from "./prompts";
import type { ConversationContext, GeneratedQuery, QuerySuccess, SummarizerCapability } from "./types";

export const NO_ROWS_MESSAGE = "The query ran successfully but no rows matched your question.";

export interface AnalysisAgentOptions {
  llm?: LLMClient;
  model?: string;
  stats?: UsageStats;
  maxRows?: number;
  maxColumns?: number;
}

export class AnalysisAgent implements SummarizerCapability {
  readonly name = "analysis";
  static readonly description = "Summarizes query results in one or two sentences.";
  readonly description = AnalysisAgent.description;

  private readonly llm: LLMClient;
  private readonly model: string;
  private readonly stats: UsageStats;
  private readonly maxRows: number;
  private readonly maxColumns: number;

  constructor(opts: AnalysisAgentOptions = {}) {
    this.llm = opts.llm ?? openaiClient;
    this.model = opts.model ?? ANALYSIS_MODEL;
    this.stats = opts.stats ?? usageStats;
    this.maxRows = opts.maxRows ?? ANALYSIS_MAX_ROWS;
    this.maxColumns = opts.maxColumns ?? ANALYSIS_MAX_COLUMNS;
  }

  buildPrompt(context: ConversationContext, query: GeneratedQuery, outcome: QuerySuccess): string {
    const sample = sampleRows(outcome.rows, outcome.columns, {
      maxRows: this.maxRows,
      maxColumns: this.maxColumns
    });
    return analysisPrompt.render({
      question: lastUserMessage(context),
      history: formatHistory(historyWindow(context, "analysis")),
      query: query.text,
      results: sample.text,
      summary: formatNumericSummary(numericSummary(outcome.rows, outcome.columns))
    });
  }

  async summarize(
    context: ConversationContext,
    query: GeneratedQuery,
    outcome: QuerySuccess,
    signal?: AbortSignal
  ): Promise<string> {
    return await trackAgent(
      "analysis",
      async () => {
        if (outcome.rows.length === 0) return NO_ROWS_MESSAGE;

        const completion = await this.llm.complete({
          model: this.model,
          messages: [{ role: "user", content: this.buildPrompt(context, query, outcome) }],
          maxTokens: ANALYSIS_MAX_TOKENS,
          temperature: 0.1,
          signal
        });
        return completion.text.trim();
      },
      undefined,
      this.stats
    );
  }
}
