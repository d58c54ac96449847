import type { z } from "zod";

import type { AgentLogger } from "../logger";

export type ToolName =
  | "get_portfolio_holdings"
  | "analyze_portfolio_performance"
  | "compare_portfolio_performance"
  | "get_real_time_prices"
  | "get_market_context"
  | "get_market_sentiment";

export type ToolParameterProperty =
  | { type: "string"; description: string }
  | { type: "array"; description: string; items: { type: "string" }; minItems: number; maxItems: number };

/** JSON schema handed to the model. Never declares an account field. */
export type ToolParameters = {
  type: "object";
  properties: Record<string, ToolParameterProperty>;
  required: string[];
  additionalProperties: false;
};

export type ToolSpec = {
  name: ToolName;
  description: string;
  parameters: ToolParameters;
};

export type ToolContext = {
  accountId: string;
  signal: AbortSignal;
  now: () => Date;
  log: AgentLogger;
};

export type ToolDefinition<TArgs> = ToolSpec & {
  argsSchema: z.ZodType<TArgs, z.ZodTypeDef, unknown>;
  run(args: TArgs, ctx: ToolContext): Promise<unknown>;
};

export type BoundTool = ToolSpec & {
  invoke(rawArgs: unknown, signal: AbortSignal): Promise<unknown>;
};

/** A definition with its argument type erased; binding an account yields a callable tool. */
export type ToolBlueprint = ToolSpec & {
  bind(ctx: Omit<ToolContext, "signal">): BoundTool;
};
