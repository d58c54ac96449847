import { describe, it, expect } from "vitest";

import type { AgentEvent } from "../src/contracts/agent_events";
import { ToolLoopExceeded } from "../src/errors/agent_errors";
import { FakeChatModel } from "../src/providers/fake_model";
import { ScriptedModel, final, handlerToolSet, sleep, toolCalls, untilAborted } from "./helpers/agent_fixtures";
import { THREAD_ID, harness } from "./helpers/orchestrator_harness";

function ofType<T extends AgentEvent["type"]>(events: AgentEvent[], type: T): Extract<AgentEvent, { type: T }>[] {
  return events.filter((event): event is Extract<AgentEvent, { type: T }> => event.type === type);
}

describe("AgentOrchestrator: holdings conversation", () => {
  it("commits one checkpoint per turn, each on top of the previous one", async () => {
    const h = harness({ model: new FakeChatModel() });

    const first = await h.run("What's my largest holding?");

    expect(first.status).toBe("completed");
    expect(first.iterations).toBe(1);
    expect(first.text).toBe(
      "Your largest holding is Alpha Fund (AAA.LSE) worth 1100.00, out of a total portfolio value of 1300.00 across 2 holdings."
    );
    expect(first.checkpoint?.parentCheckpointId).toBeNull();
    expect(first.checkpoint?.metadata).toEqual({ source: "turn", status: "completed", turnId: first.turnId, step: 1 });
    expect(first.checkpoint?.state.messages.map((message) => message.role)).toEqual(["user", "assistant", "tool", "assistant"]);
    expect(first.toolInvocations).toHaveLength(1);
    expect(first.toolInvocations[0]).toMatchObject({
      callId: "call_1_0",
      name: "get_portfolio_holdings",
      arguments: { date: "today" },
      status: "ok",
      result: { accountId: "42", date: "2026-10-16", totalValue: 1300 },
    });

    const second = await h.run("How is my portfolio performing?");

    expect(second.status).toBe("completed");
    expect(second.text).toBe("Your portfolio is worth 1300.00, a day change of 50.00. Best performer: Alpha Fund (+22.22%).");
    expect(second.checkpoint?.parentCheckpointId).toBe(first.checkpoint?.checkpointId);
    expect(second.checkpoint?.metadata.step).toBe(2);
    expect(second.toolInvocations[0].callId).toBe("call_5_0");
    expect(second.checkpoint?.state.messages).toHaveLength(8);
    expect(second.checkpoint?.state.turns.map((turn) => turn.status)).toEqual(["completed", "completed"]);

    const history = await h.thread.history();
    expect(history.map((checkpoint) => checkpoint.checkpointId)).toEqual([
      second.checkpoint?.checkpointId,
      first.checkpoint?.checkpointId,
    ]);
  });

  it("emits tool events, streamed tokens and a final turn_complete", async () => {
    const h = harness({ model: new FakeChatModel() });

    const result = await h.run("What's my largest holding?");

    expect(h.events[0]).toEqual({
      type: "tool_call_started",
      turnId: result.turnId,
      callId: "call_1_0",
      name: "get_portfolio_holdings",
      arguments: { date: "today" },
    });
    expect(h.events[1]).toMatchObject({ type: "tool_call_result", callId: "call_1_0", status: "ok" });
    expect(
      ofType(h.events, "token")
        .map((event) => event.text)
        .join("")
    ).toBe(result.text);
    expect(h.events.at(-1)).toEqual({
      type: "turn_complete",
      turnId: result.turnId,
      threadId: THREAD_ID,
      status: "completed",
      checkpointId: result.checkpoint?.checkpointId,
      iterations: 1,
      text: result.text,
    });
    expect(ofType(h.events, "error")).toEqual([]);
  });

  it("gives the model a system prompt dated today and the bound tools", async () => {
    const model = new ScriptedModel([final("hello")]);
    const h = harness({ model });

    await h.run("hi");

    expect(model.calls[0].systemPrompt).toContain("Today is 2026-10-16.");
    expect(model.calls[0].tools.map((tool) => tool.name)).toContain("get_portfolio_holdings");
    expect(model.calls[0].messages).toEqual([{ role: "user", content: "hi" }]);
  });
});

describe("AgentOrchestrator: tool rounds", () => {
  it("fails the 9th tool round with ToolLoopExceeded and commits a failure checkpoint", async () => {
    const model = new ScriptedModel([final("hello")], (call) =>
      toolCalls({ id: `c${call}`, name: "get_market_sentiment" })
    );
    const h = harness({ model });
    const before = await h.run("hi");
    h.events.length = 0;

    const result = await h.run("keep going");

    expect(result.status).toBe("failed");
    expect(result.error).toBeInstanceOf(ToolLoopExceeded);
    expect(result.iterations).toBe(8);
    expect(result.toolInvocations).toHaveLength(8);
    expect(model.calls).toHaveLength(10);

    expect(result.checkpoint?.parentCheckpointId).toBe(before.checkpoint?.checkpointId);
    expect(result.checkpoint?.metadata).toMatchObject({ status: "failed", errorCode: "tool_loop_exceeded" });
    expect(result.checkpoint?.state.messages).toHaveLength(19);
    expect(result.checkpoint?.state.turns[1]).toMatchObject({
      status: "failed",
      iterations: 8,
      errorCode: "tool_loop_exceeded",
    });

    const prior = before.checkpoint ? await h.store.getCheckpoint(THREAD_ID, "", before.checkpoint.checkpointId) : null;
    expect(prior?.state.messages).toEqual([
      { role: "user", content: "hi" },
      { role: "assistant", content: "hello" },
    ]);

    expect(ofType(h.events, "tool_call_started")).toHaveLength(8);
    expect(h.events.slice(-2)).toEqual([
      {
        type: "error",
        turnId: result.turnId,
        code: "tool_loop_exceeded",
        message: "model requested more than 8 tool rounds in one turn",
        retryable: false,
      },
      {
        type: "turn_complete",
        turnId: result.turnId,
        threadId: THREAD_ID,
        status: "failed",
        checkpointId: result.checkpoint?.checkpointId,
        iterations: 8,
        text: "",
      },
    ]);
  });

  it("honours a lower iteration limit", async () => {
    const model = new ScriptedModel([], (call) => toolCalls({ id: `c${call}`, name: "get_market_context" }));
    const h = harness({ model, limits: { maxIterations: 2 } });

    const result = await h.run("loop");

    expect(result.error?.code).toBe("tool_loop_exceeded");
    expect(result.iterations).toBe(2);
    expect(model.calls).toHaveLength(3);
  });

  it("runs tool calls concurrently and keeps their results in request order", async () => {
    const model = new ScriptedModel([
      toolCalls({ id: "slow", name: "get_market_context" }, { id: "fast", name: "get_market_sentiment" }),
      final("done"),
    ]);
    const tools = handlerToolSet("42", {
      get_market_context: async () => {
        await sleep(40);
        return { which: "slow" };
      },
      get_market_sentiment: async () => ({ which: "fast" }),
    });
    const h = harness({ model, tools });

    const result = await h.run("both please");

    expect(ofType(h.events, "tool_call_started").map((event) => event.callId)).toEqual(["slow", "fast"]);
    expect(ofType(h.events, "tool_call_result").map((event) => event.callId)).toEqual(["fast", "slow"]);
    expect(result.toolInvocations.map((record) => record.callId)).toEqual(["slow", "fast"]);

    const toolMessages = result.checkpoint?.state.messages.filter((message) => message.role === "tool") ?? [];
    expect(toolMessages).toEqual([
      { role: "tool", toolCallId: "slow", name: "get_market_context", content: '{"which":"slow"}', status: "ok" },
      { role: "tool", toolCallId: "fast", name: "get_market_sentiment", content: '{"which":"fast"}', status: "ok" },
    ]);
  });

  it("runs tool calls one at a time when the fan-out is 1", async () => {
    const model = new ScriptedModel([
      toolCalls({ id: "slow", name: "get_market_context" }, { id: "fast", name: "get_market_sentiment" }),
      final("done"),
    ]);
    const tools = handlerToolSet("42", {
      get_market_context: async () => {
        await sleep(20);
        return "slow";
      },
      get_market_sentiment: async () => "fast",
    });
    const h = harness({ model, tools, limits: { toolFanout: 1 } });

    await h.run("both please");

    expect(ofType(h.events, "tool_call_result").map((event) => event.callId)).toEqual(["slow", "fast"]);
  });

  it("records a timed-out tool as an error result and lets the model continue", async () => {
    const model = new ScriptedModel([toolCalls({ id: "t1", name: "get_market_context" }), final("That source is slow today.")]);
    const tools = handlerToolSet("42", {
      get_market_context: (_args, signal) => untilAborted(signal),
    });
    const h = harness({ model, tools, limits: { toolTimeoutMs: 20 } });

    const result = await h.run("market?");

    expect(result.status).toBe("completed");
    expect(result.toolInvocations[0]).toMatchObject({
      callId: "t1",
      status: "timeout",
      error: "get_market_context timed out after 20ms",
    });
    expect(model.calls[1].messages.at(-1)).toEqual({
      role: "tool",
      toolCallId: "t1",
      name: "get_market_context",
      content: '{"error":"get_market_context timed out after 20ms"}',
      status: "error",
    });
    expect(ofType(h.events, "tool_call_result")[0]).toMatchObject({ status: "timeout" });
  });

  it("feeds argument validation errors back to the model", async () => {
    const model = new ScriptedModel([
      toolCalls({ id: "v1", name: "compare_portfolio_performance", arguments: { startDate: "2026-10-15" } }),
      final("Which end date?"),
    ]);
    const h = harness({ model });

    const result = await h.run("compare please");

    expect(result.status).toBe("completed");
    expect(result.toolInvocations[0]).toMatchObject({ status: "error", error: "invalid arguments: endDate: Required" });
  });

  it("never lets a tool see an account other than the bound one", async () => {
    const model = new ScriptedModel([
      toolCalls({ id: "h1", name: "get_portfolio_holdings", arguments: { date: "today", accountId: "99" } }),
      final("done"),
    ]);
    const h = harness({ model });

    const result = await h.run("show account 99");

    expect(result.toolInvocations[0].result).toMatchObject({ accountId: "42", totalValue: 1300 });
  });
});
