import type { OrchestratorLimits } from "../../src/config/app_config";
import type { AgentEvent } from "../../src/contracts/agent_events";
import { AgentOrchestrator, type RunTurnInput } from "../../src/control-plane/orchestrator";
import { FixturePortfolioServices } from "../../src/domain/fixture_portfolio";
import type { ChatModel } from "../../src/providers/model";
import { MemoryCheckpointStore, type CheckpointStore } from "../../src/store/checkpoint_store";
import { ThreadManager } from "../../src/threads/thread_manager";
import { ToolFactory, type ToolSet } from "../../src/tools/tool_factory";
import { fixedNow, testPortfolio } from "./agent_fixtures";

export const THREAD_ID = "account_42_thread_7";

export function harness(opts: {
  model: ChatModel;
  limits?: Partial<OrchestratorLimits>;
  tools?: ToolSet;
  store?: CheckpointStore;
}) {
  const store = opts.store ?? new MemoryCheckpointStore();
  const threads = new ThreadManager(store);
  const thread = threads.resolve(THREAD_ID, "42");
  const services = new FixturePortfolioServices(testPortfolio);
  const tools =
    opts.tools ??
    new ToolFactory({ holdings: services, analysis: services, marketData: services }, { now: fixedNow }).build("42");
  const orchestrator = new AgentOrchestrator({ model: opts.model, limits: opts.limits, now: fixedNow });
  const events: AgentEvent[] = [];

  const run = (userMessage: string, extra: Partial<Omit<RunTurnInput, "thread" | "tools" | "userMessage">> = {}) =>
    orchestrator.runTurn({ thread, tools, userMessage, emit: (event) => events.push(event), ...extra });

  return { store, threads, thread, tools, orchestrator, events, run };
}
