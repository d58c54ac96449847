import { z } from "zod";

import { parseDateInput } from "../domain/dates";
import type {
  HoldingsService,
  MarketDataService,
  PortfolioAnalysisService,
} from "../domain/portfolio_services";
import { ToolExecutionError, describeError, isAgentError } from "../errors/agent_errors";
import type { ToolBlueprint, ToolContext, ToolDefinition, ToolName, ToolParameters } from "./tool_types";

export const MAX_PRICE_TICKERS = 20;

const DATE_HINT =
  "Use 'today' for current data, or a date as YYYY-MM-DD, DD/MM/YYYY, '5 March 2026' or 'March 5, 2026'.";

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

function resolveDate(toolName: ToolName, field: string, raw: string, ctx: ToolContext): string {
  const parsed = parseDateInput(raw, ctx.now());
  if (!parsed) {
    throw new ToolExecutionError({
      toolName,
      reason: "validation",
      message: `${field}: unrecognised date "${raw.slice(0, 40)}"`,
    });
  }
  return parsed;
}

/**
 * Validates model arguments against the tool's schema before running it.
 * Domain failures become ToolExecutionError; an aborted signal propagates as is.
 */
export function defineTool<TArgs>(definition: ToolDefinition<TArgs>): ToolBlueprint {
  const { argsSchema, run, ...spec } = definition;
  return {
    ...spec,
    bind: (bound) => ({
      ...spec,
      invoke: async (rawArgs, signal) => {
        const parsed = argsSchema.safeParse(rawArgs);
        if (!parsed.success) {
          throw new ToolExecutionError({
            toolName: spec.name,
            reason: "validation",
            message: `invalid arguments: ${formatIssues(parsed.error)}`,
          });
        }
        try {
          return await run(parsed.data, { ...bound, signal });
        } catch (error) {
          if (isAgentError(error) || signal.aborted) throw error;
          throw new ToolExecutionError({
            toolName: spec.name,
            reason: "execution",
            message: describeError(error),
            cause: error,
          });
        }
      },
    }),
  };
}

export function holdingsTool(holdings: HoldingsService): ToolBlueprint {
  return defineTool({
    name: "get_portfolio_holdings",
    description:
      "Retrieve the authenticated user's portfolio holdings on a date: ticker, name, platform, units, price, value and gain/loss, with totals.",
    parameters: {
      type: "object",
      properties: { date: { type: "string", description: `Date of the holdings. ${DATE_HINT}` } },
      required: ["date"],
      additionalProperties: false,
    },
    argsSchema: z.object({ date: z.string().trim().min(1).default("today") }).strict(),
    run: async (args, ctx) => {
      const date = resolveDate("get_portfolio_holdings", "date", args.date, ctx);
      ctx.log.info({ evt: "tool.holdings", date }, "tool.holdings");
      const summary = await holdings.getHoldings(ctx.accountId, date, ctx.signal);
      if (!summary) {
        return {
          accountId: ctx.accountId,
          date,
          totalHoldings: 0,
          holdings: [],
          message: "No holdings found for the specified date",
        };
      }
      return summary;
    },
  });
}

export function analysisTool(analysis: PortfolioAnalysisService): ToolBlueprint {
  return defineTool({
    name: "analyze_portfolio_performance",
    description:
      "Analyze the authenticated user's portfolio performance on a date: total value, day change, per-holding performance, top and bottom performers.",
    parameters: {
      type: "object",
      properties: { analysisDate: { type: "string", description: `Date to analyze. ${DATE_HINT}` } },
      required: ["analysisDate"],
      additionalProperties: false,
    },
    argsSchema: z.object({ analysisDate: z.string().trim().min(1).default("today") }).strict(),
    run: async (args, ctx) => {
      const analysisDate = resolveDate("analyze_portfolio_performance", "analysisDate", args.analysisDate, ctx);
      return analysis.analyzePerformance(ctx.accountId, analysisDate, ctx.signal);
    },
  });
}

export function comparisonTool(analysis: PortfolioAnalysisService): ToolBlueprint {
  return defineTool({
    name: "compare_portfolio_performance",
    description:
      "Compare the authenticated user's portfolio value between two dates, overall and per holding.",
    parameters: {
      type: "object",
      properties: {
        startDate: { type: "string", description: `Start of the period. ${DATE_HINT}` },
        endDate: { type: "string", description: `End of the period. ${DATE_HINT}` },
      },
      required: ["startDate", "endDate"],
      additionalProperties: false,
    },
    argsSchema: z.object({ startDate: z.string().trim().min(1), endDate: z.string().trim().min(1) }).strict(),
    run: async (args, ctx) => {
      const startDate = resolveDate("compare_portfolio_performance", "startDate", args.startDate, ctx);
      const endDate = resolveDate("compare_portfolio_performance", "endDate", args.endDate, ctx);
      if (startDate > endDate) {
        throw new ToolExecutionError({
          toolName: "compare_portfolio_performance",
          reason: "validation",
          message: `startDate ${startDate} is after endDate ${endDate}`,
        });
      }
      return analysis.comparePerformance(ctx.accountId, startDate, endDate, ctx.signal);
    },
  });
}

export function pricesTool(marketData: MarketDataService): ToolBlueprint {
  return defineTool({
    name: "get_real_time_prices",
    description: "Fetch current market prices for ticker symbols such as AAPL.US or VWRL.LSE.",
    parameters: {
      type: "object",
      properties: {
        tickers: {
          type: "array",
          description: "Ticker symbols to price.",
          items: { type: "string" },
          minItems: 1,
          maxItems: MAX_PRICE_TICKERS,
        },
      },
      required: ["tickers"],
      additionalProperties: false,
    },
    argsSchema: z.object({ tickers: z.array(z.string().trim().min(1)).min(1).max(MAX_PRICE_TICKERS) }).strict(),
    run: async (args, ctx) => {
      const prices = await marketData.getPrices(args.tickers, ctx.signal);
      const found = Object.keys(prices).length;
      return {
        status: "success",
        prices,
        message: `Retrieved ${found} real-time prices out of ${args.tickers.length} requested tickers`,
      };
    },
  });
}

const noParameters = (): ToolParameters => ({
  type: "object",
  properties: {},
  required: [],
  additionalProperties: false,
});

export function marketContextTool(): ToolBlueprint {
  return defineTool({
    name: "get_market_context",
    description: "Overview of current market conditions. Placeholder: no live market intelligence source is connected.",
    parameters: noParameters(),
    argsSchema: z.object({}).strict(),
    run: async () => ({
      status: "unavailable",
      message: "Market intelligence is not connected; this is placeholder data.",
      marketSummary: "No market summary available",
    }),
  });
}

export function marketSentimentTool(): ToolBlueprint {
  return defineTool({
    name: "get_market_sentiment",
    description: "Market sentiment score. Placeholder: always neutral until a sentiment source is connected.",
    parameters: noParameters(),
    argsSchema: z.object({}).strict(),
    run: async () => ({
      status: "unavailable",
      message: "Sentiment analysis is not connected; this is placeholder data.",
      overallScore: 0,
      label: "neutral",
    }),
  });
}
