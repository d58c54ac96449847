import { describe, it, expect } from "vitest";

import { SUMMARY_PREFIX, compactThread } from "../src/control-plane/compaction";
import { ScriptedModel, final } from "./helpers/agent_fixtures";
import { harness } from "./helpers/orchestrator_harness";

async function conversation(turns: number) {
  const steps = Array.from({ length: turns + 1 }, (_, i) => final(`a${i + 1}`));
  const model = new ScriptedModel(steps);
  const h = harness({ model });
  for (let i = 1; i <= turns; i++) {
    await h.run(`q${i}`);
  }
  return { h, model };
}

describe("compactThread", () => {
  it("does nothing for a thread without checkpoints", async () => {
    const { h } = await conversation(0);
    expect(await compactThread(h.thread)).toEqual({ compacted: false, reason: "empty" });
  });

  it("does nothing when there are no older turns to fold", async () => {
    const { h } = await conversation(2);
    expect(await compactThread(h.thread, { keepRecentTurns: 2 })).toEqual({ compacted: false, reason: "too_short" });
  });

  it("replaces older turns with a summary in a new checkpoint", async () => {
    const { h } = await conversation(3);
    const before = await h.thread.loadState();

    const result = await compactThread(h.thread, { keepRecentTurns: 2 });

    if (!result.compacted) throw new Error("expected compaction");
    expect(result.removedMessages).toBe(2);
    expect(result.keptMessages).toBe(4);
    expect(result.checkpoint.parentCheckpointId).toBe(before.checkpoint?.checkpointId);
    expect(result.checkpoint.metadata).toEqual({ source: "compaction", status: "completed", step: 4 });
    expect(result.checkpoint.state.messages).toEqual([
      { role: "system", content: `${SUMMARY_PREFIX}\n- user: q1\n- assistant: a1` },
      { role: "user", content: "q2" },
      { role: "assistant", content: "a2" },
      { role: "user", content: "q3" },
      { role: "assistant", content: "a3" },
    ]);
    expect(result.checkpoint.channelVersions.turns).toBe(before.checkpoint?.channelVersions.turns);

    const beforeId = before.checkpoint?.checkpointId ?? "";
    const original = await h.store.getCheckpoint(h.thread.threadId, h.thread.namespace, beforeId);
    expect(original?.state.messages).toHaveLength(6);
  });

  it("folds an earlier summary into the next one", async () => {
    const { h, model } = await conversation(3);
    await compactThread(h.thread, { keepRecentTurns: 2 });
    await h.run("q4");

    expect(model.calls.at(-1)?.messages[0]).toEqual({
      role: "system",
      content: `${SUMMARY_PREFIX}\n- user: q1\n- assistant: a1`,
    });

    const result = await compactThread(h.thread, { keepRecentTurns: 2 });
    if (!result.compacted) throw new Error("expected compaction");
    expect(result.checkpoint.state.messages[0]).toEqual({
      role: "system",
      content: `${SUMMARY_PREFIX}\n- user: q1\n- assistant: a1\n- user: q2\n- assistant: a2`,
    });
    expect(result.checkpoint.state.messages.slice(1).map((message) => message.content)).toEqual(["q3", "a3", "q4", "a4"]);
  });

  it("clips long messages in the summary", async () => {
    const model = new ScriptedModel([final("short"), final("ok")]);
    const h = harness({ model });
    await h.run("hello   wide\nworld");
    await h.run("next");

    const result = await compactThread(h.thread, { keepRecentTurns: 1, previewChars: 10 });
    if (!result.compacted) throw new Error("expected compaction");
    expect(result.checkpoint.state.messages[0].content).toBe(`${SUMMARY_PREFIX}\n- user: hello wide…\n- assistant: short`);
  });
});
