import type { OrchestratorLimits } from "../config/app_config";
import type { EventSink } from "../contracts/agent_events";
import { ConfigurationError } from "../errors/agent_errors";
import { silentLogger, type AgentLogger } from "../logger";
import type { ModelResolution } from "../providers/provider_config";
import type { Checkpoint } from "../store/checkpoint_store";
import type { ThreadManager } from "../threads/thread_manager";
import type { ThreadRecord } from "../threads/thread_registry";
import type { ToolFactory } from "../tools/tool_factory";
import { compactThread, type CompactionOptions, type CompactionResult } from "./compaction";
import { AgentOrchestrator, type TurnResult } from "./orchestrator";
import type { PromptConfig } from "./prompt_pack";

export type AgentHealth = {
  status: "healthy" | "not_configured";
  provider: string;
  model: string | null;
};

export type PreparedTurn = {
  threadId: string;
  run(args: { message: string; signal?: AbortSignal; emit?: EventSink }): Promise<TurnResult>;
};

export type AgentServiceDeps = {
  threads: ThreadManager;
  tools: ToolFactory;
  model: ModelResolution;
  promptConfig?: PromptConfig;
  limits?: Partial<OrchestratorLimits>;
  log?: AgentLogger;
  now?: () => Date;
};

/**
 * Entry point for the transport layer. Every operation takes the
 * authenticated account id and resolves the thread through ThreadManager
 * first, so ownership is checked before anything else runs.
 */
export class AgentService {
  private threads: ThreadManager;
  private tools: ToolFactory;
  private model: ModelResolution;
  private orchestrator: AgentOrchestrator | null;
  private log: AgentLogger;

  constructor(deps: AgentServiceDeps) {
    this.threads = deps.threads;
    this.tools = deps.tools;
    this.model = deps.model;
    this.log = deps.log ?? silentLogger;
    this.orchestrator =
      deps.model.status === "ready"
        ? new AgentOrchestrator({
            model: deps.model.model,
            promptConfig: deps.promptConfig,
            limits: deps.limits,
            log: this.log,
            now: deps.now,
          })
        : null;
  }

  health(): AgentHealth {
    if (this.model.status === "ready") {
      return { status: "healthy", provider: this.model.model.provider, model: this.model.model.model };
    }
    return { status: "not_configured", provider: this.model.provider, model: null };
  }

  /**
   * Opens the thread and binds tools for one turn. Rejects before any store
   * access when the agent is disabled or the thread is not the caller's.
   */
  async prepareTurn(accountId: string, rawThreadId?: string | null): Promise<PreparedTurn> {
    const orchestrator = this.orchestrator;
    if (!orchestrator) {
      throw this.model.status === "not_configured"
        ? this.model.error
        : new ConfigurationError("chat model is not configured");
    }
    const thread = await this.threads.open(rawThreadId, accountId);
    const tools = this.tools.build(accountId);

    return {
      threadId: thread.threadId,
      run: (args) =>
        orchestrator.runTurn({
          thread,
          tools,
          userMessage: args.message,
          signal: args.signal,
          emit: args.emit,
        }),
    };
  }

  async listThreads(accountId: string, limit: number): Promise<ThreadRecord[]> {
    return this.threads.listThreads(accountId, limit);
  }

  async closeThread(accountId: string, rawThreadId: string): Promise<boolean> {
    return this.threads.close(rawThreadId, accountId);
  }

  async history(accountId: string, rawThreadId: string, limit?: number): Promise<Checkpoint[]> {
    return this.threads.resolve(rawThreadId, accountId).history(limit);
  }

  async compact(accountId: string, rawThreadId: string, opts: Omit<CompactionOptions, "log"> = {}): Promise<CompactionResult> {
    const thread = this.threads.resolve(rawThreadId, accountId);
    return compactThread(thread, { ...opts, log: this.log });
  }
}
