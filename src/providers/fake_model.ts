import { setTimeout as sleep } from "node:timers/promises";

import { z } from "zod";

import type { ToolCallRequest, TranscriptMessage } from "../contracts/conversation";
import type { ToolName } from "../tools/tool_types";
import type { ChatModel, GenerateInput, ModelStep } from "./model";

export const FAKE_FALLBACK_REPLY =
  "I can look up your holdings, analyse or compare your portfolio performance, and fetch market prices.";

type CurrentTurn = {
  userText: string;
  toolMessages: Extract<TranscriptMessage, { role: "tool" }>[];
};

// Everything after the last user message belongs to the turn in progress.
function currentTurn(messages: TranscriptMessage[]): CurrentTurn {
  let userIndex = -1;
  for (let i = messages.length - 1; i >= 0; i--) {
    if (messages[i].role === "user") {
      userIndex = i;
      break;
    }
  }
  const user = userIndex >= 0 ? messages[userIndex] : undefined;
  const toolMessages: CurrentTurn["toolMessages"] = [];
  for (const message of messages.slice(userIndex + 1)) {
    if (message.role === "tool") toolMessages.push(message);
  }
  return { userText: user && user.role === "user" ? user.content : "", toolMessages };
}

function isoDates(text: string): string[] {
  return text.match(/\b\d{4}-\d{2}-\d{2}\b/g) ?? [];
}

function route(userText: string, available: Set<string>): { name: ToolName; arguments: Record<string, unknown> } | null {
  const lower = userText.toLowerCase();
  const dates = isoDates(userText);
  const offer = (name: ToolName, args: Record<string, unknown>) => (available.has(name) ? { name, arguments: args } : null);

  if (/\b(price|prices|quote)\b/.test(lower)) {
    const tickers = userText.match(/\b[A-Z]{1,5}\.[A-Z]{1,4}\b/g);
    if (tickers) return offer("get_real_time_prices", { tickers: [...new Set(tickers)] });
  }
  if (/compar|between/.test(lower)) {
    return offer("compare_portfolio_performance", {
      startDate: dates[0] ?? "yesterday",
      endDate: dates[1] ?? "today",
    });
  }
  if (/perform|analy|return/.test(lower)) {
    return offer("analyze_portfolio_performance", { analysisDate: dates[0] ?? "today" });
  }
  if (/sentiment/.test(lower)) return offer("get_market_sentiment", {});
  if (/holding|portfolio|largest|biggest|\bown\b|invest/.test(lower)) {
    return offer("get_portfolio_holdings", { date: dates[0] ?? "today" });
  }
  if (/market/.test(lower)) return offer("get_market_context", {});
  return null;
}

function readJson(content: string): unknown {
  try {
    return JSON.parse(content);
  } catch {
    return null;
  }
}

const money = (value: number) => value.toFixed(2);
const signedPercent = (value: number) => `${value >= 0 ? "+" : ""}${value.toFixed(2)}%`;

const HoldingsResult = z.object({
  date: z.string(),
  totalValue: z.number().optional(),
  holdings: z.array(z.object({ ticker: z.string(), instrumentName: z.string(), currentValue: z.number() })),
});

const AnalysisResult = z.object({
  totalValue: z.number(),
  dayChange: z.number(),
  metrics: z.object({
    topPerformers: z.array(z.object({ instrumentName: z.string(), gainLossPercentage: z.number() })),
  }),
});

const ComparisonResult = z.object({
  startDate: z.string(),
  endDate: z.string(),
  startValue: z.number(),
  endValue: z.number(),
  totalChange: z.number(),
  totalChangePercentage: z.number(),
});

const PricesResult = z.object({ prices: z.record(z.number()) });

function describeToolResult(message: CurrentTurn["toolMessages"][number]): string {
  const body = readJson(message.content);
  if (message.status === "error") {
    const error = z.object({ error: z.string() }).safeParse(body);
    return `I could not complete ${message.name}: ${error.success ? error.data.error : "unknown error"}.`;
  }

  switch (message.name) {
    case "get_portfolio_holdings": {
      const parsed = HoldingsResult.safeParse(body);
      if (!parsed.success) break;
      const { holdings, totalValue, date } = parsed.data;
      if (holdings.length === 0) return `You have no holdings on record for ${date}.`;
      const largest = holdings.reduce((best, holding) => (holding.currentValue > best.currentValue ? holding : best));
      return (
        `Your largest holding is ${largest.instrumentName} (${largest.ticker}) worth ${money(largest.currentValue)}, ` +
        `out of a total portfolio value of ${money(totalValue ?? 0)} across ${holdings.length} holdings.`
      );
    }
    case "analyze_portfolio_performance": {
      const parsed = AnalysisResult.safeParse(body);
      if (!parsed.success) break;
      const { totalValue, dayChange, metrics } = parsed.data;
      const best = metrics.topPerformers[0];
      const lead = `Your portfolio is worth ${money(totalValue)}, a day change of ${money(dayChange)}.`;
      return best ? `${lead} Best performer: ${best.instrumentName} (${signedPercent(best.gainLossPercentage)}).` : lead;
    }
    case "compare_portfolio_performance": {
      const parsed = ComparisonResult.safeParse(body);
      if (!parsed.success) break;
      const c = parsed.data;
      return (
        `Between ${c.startDate} and ${c.endDate} your portfolio moved from ${money(c.startValue)} to ${money(c.endValue)} ` +
        `(${money(c.totalChange)}, ${signedPercent(c.totalChangePercentage)}).`
      );
    }
    case "get_real_time_prices": {
      const parsed = PricesResult.safeParse(body);
      if (!parsed.success) break;
      const entries = Object.entries(parsed.data.prices);
      if (entries.length === 0) return "I found no prices for those tickers.";
      return `Latest prices: ${entries.map(([ticker, price]) => `${ticker} ${money(price)}`).join(", ")}.`;
    }
  }
  return `${message.name} returned no live data.`;
}

/**
 * Deterministic stand-in for a chat model: routes the latest user message to
 * a tool by keyword, then answers from the tool results. Streams its answer
 * word by word through onToken.
 */
export class FakeChatModel implements ChatModel {
  readonly provider = "fake";
  readonly model: string;
  private tokenDelayMs: number;

  constructor(opts: { model?: string; tokenDelayMs?: number } = {}) {
    this.model = opts.model ?? "fake-portfolio-agent";
    this.tokenDelayMs = opts.tokenDelayMs ?? 0;
  }

  async generate(input: GenerateInput): Promise<ModelStep> {
    input.signal.throwIfAborted();
    const turn = currentTurn(input.messages);

    if (turn.toolMessages.length === 0) {
      const routed = route(turn.userText, new Set(input.tools.map((tool) => tool.name)));
      if (routed) {
        const call: ToolCallRequest = { id: `call_${input.messages.length}_0`, ...routed };
        return { type: "tool_calls", text: "", toolCalls: [call] };
      }
    }

    const text =
      turn.toolMessages.length > 0 ? turn.toolMessages.map(describeToolResult).join(" ") : FAKE_FALLBACK_REPLY;
    await this.stream(text, input);
    return { type: "final", text };
  }

  private async stream(text: string, input: GenerateInput) {
    for (const chunk of text.match(/\S+\s*/g) ?? []) {
      input.signal.throwIfAborted();
      input.onToken?.(chunk);
      if (this.tokenDelayMs > 0) {
        await sleep(this.tokenDelayMs, undefined, { signal: input.signal });
      }
    }
  }
}
