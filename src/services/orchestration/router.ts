// Layer 2: Orchestration - Intent router
import { openaiClient, type LLMClient, type Message } from "../../config/openai";
import { DEFAULT_MODEL, ROUTER_MAX_TOKENS } from "../../config/constants";
import { usageStats, type UsageStats } from "../usageStats";
import { formatHistory, historyWindow, lastUserMessage } from "./context";
import { errorMessage, isCancellation, RoutingError } from "./errors";
import { routerPrompt } from "./prompts";
import type { ConversationContext, Intent, RouterCapability, RoutingDecision } from "./types";

const DATA_LABELS = new Set(["data_request", "data_query", "data"]);
const GENERIC_LABELS = new Set(["generic"]);

/**
 * Maps a raw completion to an intent. Anything that does not name exactly
 * one category falls back to GENERIC.
 */
export function parseIntent(completion: string): { intent: Intent; label: string | null } {
  const words = completion.toLowerCase().match(/[a-z_]+/g) ?? [];
  const dataLabel = words.find((w) => DATA_LABELS.has(w));
  const genericLabel = words.find((w) => GENERIC_LABELS.has(w));

  if (dataLabel && !genericLabel) return { intent: "DATA_REQUEST", label: dataLabel };
  if (genericLabel && !dataLabel) return { intent: "GENERIC", label: genericLabel };
  return { intent: "GENERIC", label: null };
}

export interface RouterAgentOptions {
  llm?: LLMClient;
  model?: string;
  stats?: UsageStats;
}

export class RouterAgent implements RouterCapability {
  readonly name = "router";
  static readonly description = "Classifies each conversation as a data request or a generic message.";
  readonly description = RouterAgent.description;

  private readonly llm: LLMClient;
  private readonly model: string;
  private readonly stats: UsageStats;

  constructor(opts: RouterAgentOptions = {}) {
    this.llm = opts.llm ?? openaiClient;
    this.model = opts.model ?? DEFAULT_MODEL;
    this.stats = opts.stats ?? usageStats;
  }

  buildMessages(context: ConversationContext): Message[] {
    const messages: Message[] = [{ role: "system", content: routerPrompt }];
    const history = historyWindow(context, "router");
    if (history.length > 0) {
      messages.push({ role: "system", content: `Recent conversation:\n${formatHistory(history)}` });
    }
    messages.push({ role: "user", content: lastUserMessage(context) });
    return messages;
  }

  async classify(context: ConversationContext, signal?: AbortSignal): Promise<RoutingDecision> {
    const started = Date.now();
    try {
      const completion = await this.llm.complete({
        model: this.model,
        messages: this.buildMessages(context),
        maxTokens: ROUTER_MAX_TOKENS,
        temperature: 0.1,
        signal
      });
      const { intent, label } = parseIntent(completion.text);
      await this.stats.record("router", Date.now() - started, false);
      return {
        intent,
        rationale: label ? `model answered "${label}"` : `unrecognized completion "${completion.text.slice(0, 40)}"; defaulting to GENERIC`
      };
    } catch (err) {
      if (isCancellation(err)) {
        await this.stats.record("router", Date.now() - started, false);
        throw err;
      }
      const routingError = new RoutingError(`Classification failed: ${errorMessage(err)}`, { cause: err });
      console.warn(`[Router] ${context.requestId} ${routingError.message}; defaulting to GENERIC`);
      await this.stats.record("router", Date.now() - started, true);
      return { intent: "GENERIC", rationale: routingError.message };
    }
  }
}
