import type { PortfolioServices } from "../domain/portfolio_services";
import { ToolExecutionError } from "../errors/agent_errors";
import { silentLogger, type AgentLogger } from "../logger";
import {
  analysisTool,
  comparisonTool,
  holdingsTool,
  marketContextTool,
  marketSentimentTool,
  pricesTool,
} from "./portfolio_tools";
import type { BoundTool, ToolBlueprint, ToolSpec } from "./tool_types";

/** Request-scoped tools; every executor is bound to `accountId`. */
export type ToolSet = {
  readonly accountId: string;
  readonly specs: ToolSpec[];
  has(name: string): boolean;
  invoke(name: string, rawArgs: unknown, signal: AbortSignal): Promise<unknown>;
};

const ACCOUNT_LIKE_KEYS = new Set(["account", "accountid", "accountnumber", "accountref"]);

const normalizeKey = (key: string) => key.toLowerCase().replace(/[_-]/g, "");

export function isAccountLikeKey(key: string): boolean {
  return ACCOUNT_LIKE_KEYS.has(normalizeKey(key));
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Drops account-like keys from model arguments. The bound account is the only
 * account a tool ever sees, whatever the model asked for.
 */
export function stripAccountArgs(rawArgs: unknown): { args: unknown; stripped: string[] } {
  if (rawArgs === undefined || rawArgs === null) return { args: {}, stripped: [] };
  if (!isPlainObject(rawArgs)) return { args: rawArgs, stripped: [] };

  const args: Record<string, unknown> = {};
  const stripped: string[] = [];
  for (const [key, value] of Object.entries(rawArgs)) {
    if (isAccountLikeKey(key)) {
      stripped.push(key);
    } else {
      args[key] = value;
    }
  }
  return { args, stripped };
}

export class ToolFactory {
  private blueprints: ToolBlueprint[];
  private log: AgentLogger;
  private now: () => Date;

  constructor(services: PortfolioServices, opts: { log?: AgentLogger; now?: () => Date } = {}) {
    this.log = opts.log ?? silentLogger;
    this.now = opts.now ?? (() => new Date());
    this.blueprints = [
      holdingsTool(services.holdings),
      analysisTool(services.analysis),
      comparisonTool(services.analysis),
      ...(services.marketData ? [pricesTool(services.marketData)] : []),
      marketContextTool(),
      marketSentimentTool(),
    ];
  }

  build(accountId: string): ToolSet {
    const log = this.log;
    const tools = new Map<string, BoundTool>();
    for (const blueprint of this.blueprints) {
      tools.set(blueprint.name, blueprint.bind({ accountId, now: this.now, log }));
    }

    return {
      accountId,
      specs: [...tools.values()].map(({ name, description, parameters }) => ({ name, description, parameters })),
      has: (name) => tools.has(name),
      invoke: async (name, rawArgs, signal) => {
        const tool = tools.get(name);
        if (!tool) {
          throw new ToolExecutionError({ toolName: name, reason: "unknown_tool", message: `unknown tool: ${name}` });
        }
        const { args, stripped } = stripAccountArgs(rawArgs);
        if (stripped.length > 0) {
          log.warn({ evt: "tool.account_arg_stripped", tool: name, keys: stripped }, "tool.account_arg_stripped");
        }
        return tool.invoke(args, signal);
      },
    };
  }
}
