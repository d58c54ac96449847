import { randomUUID } from "node:crypto";

import { DEFAULT_LIMITS, type OrchestratorLimits } from "../config/app_config";
import type { EventSink } from "../contracts/agent_events";
import type {
  ChannelName,
  ToolCallRequest,
  ToolInvocationRecord,
  TranscriptMessage,
  TurnRecord,
} from "../contracts/conversation";
import { toIsoDate } from "../domain/dates";
import {
  CheckpointConflict,
  InternalAgentError,
  ModelTimeoutError,
  ModelUnavailableError,
  StorageError,
  ToolExecutionError,
  ToolLoopExceeded,
  TurnCancelledError,
  TurnTimeoutError,
  describeError,
  isAgentError,
  type AgentError,
} from "../errors/agent_errors";
import { preview, silentLogger, type AgentLogger } from "../logger";
import type { ChatModel, ModelStep } from "../providers/model";
import type { Checkpoint, CheckpointMetadata, PendingWrite } from "../store/checkpoint_store";
import type { LoadedThreadState, ThreadHandle } from "../threads/thread_manager";
import type { ToolSet } from "../tools/tool_factory";
import { callWithTimeout, delay, runWithConcurrency } from "./concurrency";
import { FALLBACK_PROMPT_CONFIG, buildSystemPrompt, type PromptConfig } from "./prompt_pack";

export type TurnPhase =
  | "AWAITING_INPUT"
  | "MODEL_GENERATING"
  | "TOOL_EXECUTING"
  | "COMMITTING"
  | "DONE"
  | "FAILED";

export type TurnStatus = "completed" | "failed" | "cancelled";

export type RunTurnInput = {
  thread: ThreadHandle;
  tools: ToolSet;
  userMessage: string;
  signal?: AbortSignal;
  emit?: EventSink;
  turnId?: string;
};

export type TurnResult = {
  turnId: string;
  threadId: string;
  status: TurnStatus;
  text: string;
  iterations: number;
  checkpoint: Checkpoint | null;
  toolInvocations: ToolInvocationRecord[];
  error?: AgentError;
};

export type OrchestratorDeps = {
  model: ChatModel;
  promptConfig?: PromptConfig;
  limits?: Partial<OrchestratorLimits>;
  log?: AgentLogger;
  now?: () => Date;
};

type TurnContext = {
  turnId: string;
  thread: ThreadHandle;
  tools: ToolSet;
  emit: EventSink;
  signal: AbortSignal;
  base: LoadedThreadState;
  startedAt: string;
  startedMs: number;
  phase: TurnPhase;
  iterations: number;
  modelSteps: number;
  roundStartedMs: number;
  transcript: TranscriptMessage[];
  writes: PendingWrite[];
  invocations: ToolInvocationRecord[];
};

type ToolOutcome = {
  message: Extract<TranscriptMessage, { role: "tool" }>;
  record: ToolInvocationRecord;
};

type LoopOutcome = { status: "completed"; text: string } | { status: "failed"; error: AgentError };

function cancellationReason(reason: unknown): string {
  if (typeof reason === "string") return reason;
  if (reason instanceof Error && reason.name !== "AbortError") return reason.message;
  return "client disconnected";
}

/**
 * Runs one user turn: model and tool rounds until the model answers, then a
 * single checkpoint commit. Completed and failed turns both commit; a
 * cancelled turn commits nothing and discards its staged writes.
 */
export class AgentOrchestrator {
  private model: ChatModel;
  private promptConfig: PromptConfig;
  private limits: OrchestratorLimits;
  private log: AgentLogger;
  private now: () => Date;

  constructor(deps: OrchestratorDeps) {
    this.model = deps.model;
    this.promptConfig = deps.promptConfig ?? FALLBACK_PROMPT_CONFIG;
    this.limits = { ...DEFAULT_LIMITS, ...deps.limits };
    this.log = deps.log ?? silentLogger;
    this.now = deps.now ?? (() => new Date());
  }

  async runTurn(input: RunTurnInput): Promise<TurnResult> {
    const controller = new AbortController();
    const onCancel = () => controller.abort(new TurnCancelledError(cancellationReason(input.signal?.reason)));
    if (input.signal?.aborted) {
      onCancel();
    } else {
      input.signal?.addEventListener("abort", onCancel, { once: true });
    }
    const turnTimer = setTimeout(
      () => controller.abort(new TurnTimeoutError(this.limits.turnTimeoutMs)),
      this.limits.turnTimeoutMs
    );

    try {
      return await this.execute(input, controller.signal);
    } finally {
      clearTimeout(turnTimer);
      input.signal?.removeEventListener("abort", onCancel);
    }
  }

  private async execute(input: RunTurnInput, signal: AbortSignal): Promise<TurnResult> {
    const turnId = input.turnId ?? randomUUID();
    const emit = input.emit ?? (() => undefined);
    const threadId = input.thread.threadId;
    const startedMs = Date.now();

    this.log.info(
      { evt: "agent.turn_started", threadId, turnId, messageLength: input.userMessage.length },
      "agent.turn_started"
    );

    let base: LoadedThreadState;
    try {
      if (signal.aborted) throw signal.reason;
      base = await input.thread.loadState();
    } catch (error) {
      const failure = this.classify(error, signal);
      if (failure instanceof TurnCancelledError) {
        this.log.info({ evt: "agent.turn_cancelled", threadId, turnId, phase: "AWAITING_INPUT" }, "agent.turn_cancelled");
        return this.result({ turnId, threadId, status: "cancelled", error: failure });
      }
      return this.reportUncommitted({ turnId, threadId, emit, iterations: 0, error: failure });
    }

    const ctx: TurnContext = {
      turnId,
      thread: input.thread,
      tools: input.tools,
      emit,
      signal,
      base,
      startedAt: new Date(startedMs).toISOString(),
      startedMs,
      phase: "AWAITING_INPUT",
      iterations: 0,
      modelSteps: 0,
      roundStartedMs: startedMs,
      transcript: [...base.state.messages],
      writes: [],
      invocations: [],
    };

    const userMessage: TranscriptMessage = { role: "user", content: input.userMessage };
    ctx.transcript.push(userMessage);
    this.record(ctx, "input", [["messages", [userMessage]]]);

    let outcome: LoopOutcome;
    try {
      outcome = { status: "completed", text: await this.loop(ctx) };
    } catch (error) {
      const failure = this.classify(error, signal);
      if (failure instanceof TurnCancelledError) {
        return this.cancel(ctx, failure);
      }
      if (failure instanceof StorageError) {
        ctx.phase = "FAILED";
        await this.discardStaged(ctx);
        return this.reportUncommitted({ turnId, threadId, emit, iterations: ctx.iterations, error: failure });
      }
      this.closeOpenCalls(ctx, failure);
      outcome = { status: "failed", error: failure };
    }

    return this.commitTurn(ctx, outcome);
  }

  private async loop(ctx: TurnContext): Promise<string> {
    const systemPrompt = buildSystemPrompt(this.promptConfig, {
      today: toIsoDate(this.now()),
      tools: ctx.tools.specs,
    });

    for (;;) {
      ctx.phase = "MODEL_GENERATING";
      const step = await this.generate(ctx, systemPrompt);
      ctx.modelSteps += 1;

      if (step.type === "final") {
        const reply: TranscriptMessage = { role: "assistant", content: step.text };
        ctx.transcript.push(reply);
        await this.stage(ctx, this.record(ctx, `model:${ctx.modelSteps}`, [["messages", [reply]]]));
        return step.text;
      }

      // The rejected round is neither executed nor recorded.
      if (ctx.iterations >= this.limits.maxIterations) {
        throw new ToolLoopExceeded(this.limits.maxIterations);
      }
      ctx.iterations += 1;

      const request: TranscriptMessage = { role: "assistant", content: step.text, toolCalls: step.toolCalls };
      ctx.transcript.push(request);
      await this.stage(ctx, this.record(ctx, `model:${ctx.modelSteps}`, [["messages", [request]]]));

      ctx.phase = "TOOL_EXECUTING";
      ctx.roundStartedMs = Date.now();
      const outcomes = await runWithConcurrency(step.toolCalls, this.limits.toolFanout, (call) =>
        this.invokeTool(ctx, call)
      );
      if (ctx.signal.aborted) throw ctx.signal.reason;

      const messages = outcomes.map((outcome) => outcome.message);
      const records = outcomes.map((outcome) => outcome.record);
      ctx.transcript.push(...messages);
      ctx.invocations.push(...records);
      await this.stage(
        ctx,
        this.record(ctx, `tools:${ctx.iterations}`, [
          ["messages", messages],
          ["toolInvocations", records],
        ])
      );
    }
  }

  private async generate(ctx: TurnContext, systemPrompt: string): Promise<ModelStep> {
    const { modelTimeoutMs, modelMaxRetries, modelBackoffMs } = this.limits;

    for (let attempt = 0; ; attempt++) {
      let streamed = false;
      try {
        return await callWithTimeout(
          (signal) =>
            this.model.generate({
              systemPrompt,
              messages: [...ctx.transcript],
              tools: ctx.tools.specs,
              signal,
              onToken: (text) => {
                streamed = true;
                ctx.emit({ type: "token", turnId: ctx.turnId, text });
              },
            }),
          { timeoutMs: modelTimeoutMs, parent: ctx.signal, onTimeout: () => new ModelTimeoutError(modelTimeoutMs) }
        );
      } catch (error) {
        if (ctx.signal.aborted) throw error;
        if (isAgentError(error) && !(error instanceof ModelUnavailableError)) throw error;

        const failure =
          error instanceof ModelUnavailableError
            ? error
            : new ModelUnavailableError(`model call failed: ${describeError(error)}`, { cause: error });
        if (!failure.retryable || attempt >= modelMaxRetries) throw failure;
        // Tokens already sent cannot be taken back, so a retry would repeat them.
        if (streamed) {
          this.log.warn(
            { evt: "agent.model_failed_mid_stream", threadId: ctx.thread.threadId, turnId: ctx.turnId, code: failure.code },
            "agent.model_failed_mid_stream"
          );
          throw failure;
        }

        const waitMs = failure.retryAfterMs ?? modelBackoffMs * 2 ** attempt;
        this.log.warn(
          {
            evt: "agent.model_retry",
            threadId: ctx.thread.threadId,
            turnId: ctx.turnId,
            attempt: attempt + 1,
            waitMs,
            code: failure.code,
            providerStatus: failure.providerStatus,
          },
          "agent.model_retry"
        );
        await delay(waitMs, ctx.signal);
      }
    }
  }

  private async invokeTool(ctx: TurnContext, call: ToolCallRequest): Promise<ToolOutcome> {
    const { toolTimeoutMs } = this.limits;
    ctx.emit({ type: "tool_call_started", turnId: ctx.turnId, callId: call.id, name: call.name, arguments: call.arguments });
    const started = Date.now();

    let outcome: { status: "ok"; result: unknown } | { status: "error" | "timeout"; error: string };
    try {
      const result = await callWithTimeout((signal) => ctx.tools.invoke(call.name, call.arguments, signal), {
        timeoutMs: toolTimeoutMs,
        parent: ctx.signal,
        onTimeout: () =>
          new ToolExecutionError({
            toolName: call.name,
            reason: "timeout",
            message: `${call.name} timed out after ${toolTimeoutMs}ms`,
          }),
      });
      outcome = { status: "ok", result };
    } catch (error) {
      if (ctx.signal.aborted) throw error;
      const failure =
        error instanceof ToolExecutionError
          ? error
          : new ToolExecutionError({ toolName: call.name, reason: "execution", message: describeError(error), cause: error });
      this.log.warn(
        {
          evt: "agent.tool_failed",
          threadId: ctx.thread.threadId,
          turnId: ctx.turnId,
          tool: call.name,
          reason: failure.reason,
          error: failure.message,
        },
        "agent.tool_failed"
      );
      outcome = { status: failure.reason === "timeout" ? "timeout" : "error", error: failure.message };
    }

    const durationMs = Date.now() - started;
    const base = { turnId: ctx.turnId, callId: call.id, name: call.name, durationMs };

    if (outcome.status === "ok") {
      ctx.emit({ type: "tool_call_result", ...base, status: "ok", result: outcome.result });
      return {
        message: { role: "tool", toolCallId: call.id, name: call.name, content: JSON.stringify(outcome.result ?? null), status: "ok" },
        record: { ...base, arguments: call.arguments, status: "ok", result: outcome.result },
      };
    }

    ctx.emit({ type: "tool_call_result", ...base, status: outcome.status, error: outcome.error });
    return {
      message: {
        role: "tool",
        toolCallId: call.id,
        name: call.name,
        content: JSON.stringify({ error: outcome.error }),
        status: "error",
      },
      record: { ...base, arguments: call.arguments, status: outcome.status, error: outcome.error },
    };
  }

  private async commitTurn(ctx: TurnContext, outcome: LoopOutcome): Promise<TurnResult> {
    ctx.phase = "COMMITTING";
    const error = outcome.status === "failed" ? outcome.error : undefined;
    const turnRecord: TurnRecord = {
      turnId: ctx.turnId,
      status: outcome.status,
      iterations: ctx.iterations,
      ...(error ? { errorCode: error.code, errorMessage: error.message } : {}),
      startedAt: ctx.startedAt,
      finishedAt: this.now().toISOString(),
    };
    this.record(ctx, "commit", [["turns", [turnRecord]]]);

    const metadata: Omit<CheckpointMetadata, "step"> = {
      source: "turn",
      status: outcome.status,
      turnId: ctx.turnId,
      ...(error ? { errorCode: error.code } : {}),
    };

    let checkpoint: Checkpoint;
    try {
      checkpoint = await this.commitWithRetry(ctx, metadata);
    } catch (commitError) {
      ctx.phase = "FAILED";
      await this.discardStaged(ctx);
      const failure = isAgentError(commitError)
        ? commitError
        : new StorageError(`checkpoint commit failed: ${describeError(commitError)}`, commitError);
      return this.reportUncommitted({
        turnId: ctx.turnId,
        threadId: ctx.thread.threadId,
        emit: ctx.emit,
        iterations: ctx.iterations,
        error: failure,
        toolInvocations: ctx.invocations,
      });
    }

    ctx.phase = outcome.status === "completed" ? "DONE" : "FAILED";
    const text = outcome.status === "completed" ? outcome.text : "";
    if (error) {
      ctx.emit({ type: "error", turnId: ctx.turnId, code: error.code, message: error.message, retryable: error.retryable });
    }
    ctx.emit({
      type: "turn_complete",
      turnId: ctx.turnId,
      threadId: ctx.thread.threadId,
      status: outcome.status,
      checkpointId: checkpoint.checkpointId,
      iterations: ctx.iterations,
      text,
    });

    this.log.info(
      {
        evt: "agent.turn_completed",
        threadId: ctx.thread.threadId,
        turnId: ctx.turnId,
        status: outcome.status,
        iterations: ctx.iterations,
        checkpointId: checkpoint.checkpointId,
        errorCode: error?.code,
        durationMs: Date.now() - ctx.startedMs,
        replyPreview: preview(text),
      },
      "agent.turn_completed"
    );

    return this.result({
      turnId: ctx.turnId,
      threadId: ctx.thread.threadId,
      status: outcome.status,
      text,
      iterations: ctx.iterations,
      checkpoint,
      toolInvocations: ctx.invocations,
      error,
    });
  }

  /**
   * A round cut short by a turn-level failure leaves the model's tool calls
   * unanswered. Each gets an error result so the committed transcript stays
   * valid input for the next turn.
   */
  private closeOpenCalls(ctx: TurnContext, error: AgentError) {
    const last = ctx.transcript.at(-1);
    if (!last || last.role !== "assistant" || !last.toolCalls?.length) return;

    const status = error instanceof TurnTimeoutError ? "timeout" : "error";
    const reason = `${error.code}: ${error.message}`;
    const durationMs = Date.now() - ctx.roundStartedMs;
    const messages: TranscriptMessage[] = [];
    const records: ToolInvocationRecord[] = [];
    for (const call of last.toolCalls) {
      messages.push({
        role: "tool",
        toolCallId: call.id,
        name: call.name,
        content: JSON.stringify({ error: reason }),
        status: "error",
      });
      records.push({
        turnId: ctx.turnId,
        callId: call.id,
        name: call.name,
        arguments: call.arguments,
        status,
        error: reason,
        durationMs,
      });
    }
    ctx.transcript.push(...messages);
    ctx.invocations.push(...records);
    this.record(ctx, `tools:${ctx.iterations}`, [
      ["messages", messages],
      ["toolInvocations", records],
    ]);
  }

  /** Appends on the latest checkpoint, reloading and replaying the same writes after a conflict. */
  private async commitWithRetry(ctx: TurnContext, metadata: Omit<CheckpointMetadata, "step">): Promise<Checkpoint> {
    let base = ctx.base;
    for (let attempt = 0; ; attempt++) {
      try {
        const checkpoint = await ctx.thread.commit({
          parentCheckpointId: base.checkpoint?.checkpointId ?? null,
          state: base.state,
          writes: ctx.writes,
          metadata,
        });
        if (base !== ctx.base) {
          await this.discardStaged(ctx);
        }
        return checkpoint;
      } catch (error) {
        if (!(error instanceof CheckpointConflict) || attempt >= this.limits.commitMaxRetries) throw error;
        this.log.warn(
          {
            evt: "checkpoint.conflict",
            threadId: ctx.thread.threadId,
            turnId: ctx.turnId,
            attempt: attempt + 1,
            expectedParentId: error.expectedParentId,
            actualLatestId: error.actualLatestId,
          },
          "checkpoint.conflict"
        );
        base = await ctx.thread.loadState();
      }
    }
  }

  private async cancel(ctx: TurnContext, error: TurnCancelledError): Promise<TurnResult> {
    this.log.info(
      { evt: "agent.turn_cancelled", threadId: ctx.thread.threadId, turnId: ctx.turnId, phase: ctx.phase },
      "agent.turn_cancelled"
    );
    await this.discardStaged(ctx);
    return this.result({
      turnId: ctx.turnId,
      threadId: ctx.thread.threadId,
      status: "cancelled",
      iterations: ctx.iterations,
      toolInvocations: ctx.invocations,
      error,
    });
  }

  private async discardStaged(ctx: TurnContext) {
    try {
      const discarded = await ctx.thread.discard(ctx.turnId);
      this.log.debug({ evt: "checkpoint.writes_discarded", turnId: ctx.turnId, discarded }, "checkpoint.writes_discarded");
    } catch (error) {
      this.log.warn(
        { evt: "checkpoint.discard_failed", turnId: ctx.turnId, error: describeError(error) },
        "checkpoint.discard_failed"
      );
    }
  }

  /** Reports a failure that left no checkpoint behind. */
  private reportUncommitted(args: {
    turnId: string;
    threadId: string;
    emit: EventSink;
    iterations: number;
    error: AgentError;
    toolInvocations?: ToolInvocationRecord[];
  }): TurnResult {
    this.log.error(
      { evt: "agent.turn_failed", threadId: args.threadId, turnId: args.turnId, code: args.error.code, error: args.error.message },
      "agent.turn_failed"
    );
    args.emit({ type: "error", turnId: args.turnId, code: args.error.code, message: args.error.message, retryable: args.error.retryable });
    args.emit({
      type: "turn_complete",
      turnId: args.turnId,
      threadId: args.threadId,
      status: "failed",
      checkpointId: null,
      iterations: args.iterations,
      text: "",
    });
    return this.result({
      turnId: args.turnId,
      threadId: args.threadId,
      status: "failed",
      iterations: args.iterations,
      toolInvocations: args.toolInvocations ?? [],
      error: args.error,
    });
  }

  private record(ctx: TurnContext, task: string, entries: Array<[ChannelName, unknown[]]>): PendingWrite[] {
    const taskId = `${ctx.turnId}:${task}`;
    const writes = entries.map(([channel, value], idx): PendingWrite => ({ taskId, idx, channel, op: "append", value }));
    ctx.writes.push(...writes);
    return writes;
  }

  private async stage(ctx: TurnContext, writes: PendingWrite[]) {
    await ctx.thread.stage(ctx.base.checkpoint?.checkpointId ?? null, writes);
  }

  /** Normalizes whatever ended the loop: the turn signal's reason wins over the error it caused. */
  private classify(error: unknown, signal: AbortSignal): AgentError {
    if (signal.aborted && isAgentError(signal.reason)) return signal.reason;
    if (isAgentError(error)) return error;
    return new InternalAgentError(describeError(error), error);
  }

  private result(
    args: Pick<TurnResult, "turnId" | "threadId" | "status"> & Partial<Omit<TurnResult, "turnId" | "threadId" | "status">>
  ): TurnResult {
    return {
      text: "",
      iterations: 0,
      checkpoint: null,
      toolInvocations: [],
      ...args,
    };
  }
}
