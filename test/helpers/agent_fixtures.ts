import type { AgentEvent } from "../../src/contracts/agent_events";
import type { PortfolioFixtureInput } from "../../src/domain/fixture_portfolio";
import type { ChatModel, GenerateInput, ModelStep } from "../../src/providers/model";
import type { ToolSet } from "../../src/tools/tool_factory";
import type { ToolName, ToolSpec } from "../../src/tools/tool_types";

/** 2026-10-16, midday UTC. */
export const fixedNow = () => new Date("2026-10-16T12:00:00Z");

export const testPortfolio: PortfolioFixtureInput = {
  accounts: {
    "42": {
      snapshots: [
        {
          date: "2026-10-15",
          holdings: [
            { ticker: "AAA.LSE", instrumentName: "Alpha Fund", units: 10, price: 100, boughtValue: 900 },
            { ticker: "BBB.US", instrumentName: "Beta Corp", units: 5, price: 50, boughtValue: 300 },
          ],
        },
        {
          date: "2026-10-16",
          holdings: [
            { ticker: "AAA.LSE", instrumentName: "Alpha Fund", units: 10, price: 110, boughtValue: 900 },
            { ticker: "BBB.US", instrumentName: "Beta Corp", units: 5, price: 40, boughtValue: 300 },
          ],
        },
      ],
    },
    "99": {
      snapshots: [
        {
          date: "2026-10-16",
          holdings: [{ ticker: "ZZZ.US", instrumentName: "Zeta Inc", units: 1, price: 10, boughtValue: 10 }],
        },
      ],
    },
  },
  prices: { "AAA.LSE": 110, "BBB.US": 40 },
};

export type ScriptStep = ModelStep | Error | ((input: GenerateInput) => Promise<ModelStep>);

/** Plays back a fixed list of model steps; `fallback` supplies steps once the list runs out. */
export class ScriptedModel implements ChatModel {
  readonly provider = "scripted";
  readonly model = "scripted-1";
  readonly calls: GenerateInput[] = [];
  private steps: ScriptStep[];
  private fallback?: (call: number) => ScriptStep;

  constructor(steps: ScriptStep[], fallback?: (call: number) => ScriptStep) {
    this.steps = [...steps];
    this.fallback = fallback;
  }

  async generate(input: GenerateInput): Promise<ModelStep> {
    this.calls.push({ ...input, messages: [...input.messages] });
    const step = this.steps.shift() ?? this.fallback?.(this.calls.length);
    if (!step) throw new Error("script exhausted");
    if (step instanceof Error) throw step;
    if (typeof step === "function") return step(input);
    if (step.type === "final") input.onToken?.(step.text);
    return step;
  }
}

export const final = (text: string): ModelStep => ({ type: "final", text });

export const toolCalls = (...calls: Array<{ id: string; name: ToolName; arguments?: unknown }>): ModelStep => ({
  type: "tool_calls",
  text: "",
  toolCalls: calls.map((call) => ({ id: call.id, name: call.name, arguments: call.arguments ?? {} })),
});

/** Never settles on its own; rejects with the signal's reason once it aborts. */
export function untilAborted(signal: AbortSignal): Promise<never> {
  return new Promise<never>((_, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    signal.addEventListener("abort", () => reject(signal.reason), { once: true });
  });
}

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

type Handler = (args: unknown, signal: AbortSignal) => Promise<unknown>;

/** A ToolSet over plain handlers, for driving the orchestrator without domain services. */
export function handlerToolSet(accountId: string, handlers: Partial<Record<ToolName, Handler>>): ToolSet {
  const specs: ToolSpec[] = [];
  for (const name of Object.keys(handlers)) {
    const spec = toolSpec(name);
    if (spec) specs.push(spec);
  }
  return {
    accountId,
    specs,
    has: (name) => specs.some((spec) => spec.name === name),
    invoke: async (name, rawArgs, signal) => {
      const spec = toolSpec(name);
      const handler = spec ? handlers[spec.name] : undefined;
      if (!handler) throw new Error(`unknown tool: ${name}`);
      return handler(rawArgs, signal);
    },
  };
}

const TOOL_NAMES: readonly ToolName[] = [
  "get_portfolio_holdings",
  "analyze_portfolio_performance",
  "compare_portfolio_performance",
  "get_real_time_prices",
  "get_market_context",
  "get_market_sentiment",
];

function toolSpec(name: string): ToolSpec | undefined {
  const match = TOOL_NAMES.find((candidate) => candidate === name);
  if (!match) return undefined;
  return {
    name: match,
    description: `${match} (test)`,
    parameters: { type: "object", properties: {}, required: [], additionalProperties: false },
  };
}

export function eventTypes(events: AgentEvent[]): string[] {
  return events.map((event) => event.type);
}
