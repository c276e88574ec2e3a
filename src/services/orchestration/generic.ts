// Layer 2: Orchestration - Conversational replies
import { openaiClient, type LLMClient, type Message } from "../../config/openai";
import { DEFAULT_MODEL, GENERIC_MAX_TOKENS } from "../../config/constants";
import { trackAgent, usageStats, type UsageStats } from "../usageStats";
import { historyWindow, lastUserMessage } from "./context";
import { genericPrompt } from "./prompts";
import type { ConversationContext, ResponderCapability } from "./types";

export interface GenericAgentOptions {
  llm?: LLMClient;
  model?: string;
  stats?: UsageStats;
}

export class GenericAgent implements ResponderCapability {
  readonly name = "generic";
  static readonly description = "Answers greetings and questions that do not need the document's data.";
  readonly description = GenericAgent.description;

  private readonly llm: LLMClient;
  private readonly model: string;
  private readonly stats: UsageStats;

  constructor(opts: GenericAgentOptions = {}) {
    this.llm = opts.llm ?? openaiClient;
    this.model = opts.model ?? DEFAULT_MODEL;
    this.stats = opts.stats ?? usageStats;
  }

  buildMessages(context: ConversationContext): Message[] {
    return [
      { role: "system", content: genericPrompt },
      ...historyWindow(context, "generic").map((m) => ({ role: m.role, content: m.content })),
      { role: "user", content: lastUserMessage(context) }
    ];
  }

  async respond(context: ConversationContext, signal?: AbortSignal): Promise<string> {
    return await trackAgent(
      "generic",
      async () => {
        const completion = await this.llm.complete({
          model: this.model,
          messages: this.buildMessages(context),
          maxTokens: GENERIC_MAX_TOKENS,
          temperature: 0.7,
          signal
        });
        return completion.text.trim();
      },
      undefined,
      this.stats
    );
  }
}
