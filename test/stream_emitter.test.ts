import { describe, it, expect } from "vitest";

import type { SequencedEvent } from "../src/contracts/agent_events";
import { SSE_DONE_MESSAGE, StreamEmitter, sseMessages, toSseMessage } from "../src/sse/stream_emitter";

async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) items.push(item);
  return items;
}

describe("StreamEmitter", () => {
  it("delivers events in order with sequence numbers", async () => {
    const emitter = new StreamEmitter();
    const consumed = collect(emitter.events());

    emitter.emit({ type: "token", turnId: "t1", text: "Hel" });
    emitter.emit({ type: "token", turnId: "t1", text: "lo" });
    emitter.close();

    expect(await consumed).toEqual([
      { type: "token", turnId: "t1", text: "Hel", seq: 1 },
      { type: "token", turnId: "t1", text: "lo", seq: 2 },
    ]);
  });

  it("delivers events queued before the consumer starts", async () => {
    const emitter = new StreamEmitter();
    emitter.emit({ type: "token", turnId: "t1", text: "early" });
    emitter.close();
    emitter.emit({ type: "token", turnId: "t1", text: "after close" });

    expect((await collect(emitter.events())).map((event) => event.seq)).toEqual([1]);
  });

  it("aborts its signal and drops later events when cancelled", async () => {
    const emitter = new StreamEmitter();
    emitter.emit({ type: "token", turnId: "t1", text: "queued" });

    emitter.cancel();
    emitter.emit({ type: "token", turnId: "t1", text: "dropped" });

    expect(emitter.signal.aborted).toBe(true);
    expect(emitter.signal.reason).toBe("client disconnected");
    expect(await collect(emitter.events())).toEqual([]);
  });

  it("treats a consumer that stops early as a disconnect", async () => {
    const emitter = new StreamEmitter();
    emitter.emit({ type: "token", turnId: "t1", text: "one" });

    for await (const _event of emitter.events()) {
      break;
    }

    expect(emitter.isCancelled).toBe(true);
    expect(emitter.signal.aborted).toBe(true);
  });

  it("ignores cancel after the producer closed", () => {
    const emitter = new StreamEmitter();
    emitter.close();
    emitter.cancel();
    expect(emitter.signal.aborted).toBe(false);
  });
});

describe("SSE messages", () => {
  it("maps an event to its SSE id, type and JSON data", () => {
    const event: SequencedEvent = { type: "token", turnId: "t1", text: "Hi", seq: 3 };
    expect(toSseMessage(event)).toEqual({
      id: "3",
      event: "token",
      data: '{"type":"token","turnId":"t1","text":"Hi","seq":3}',
    });
  });

  it("ends a completed stream with a done message", async () => {
    const emitter = new StreamEmitter();
    emitter.emit({
      type: "turn_complete",
      turnId: "t1",
      threadId: "account_42_thread_7",
      status: "completed",
      checkpointId: "c1",
      iterations: 0,
      text: "ok",
    });
    emitter.close();

    const messages = await collect(sseMessages(emitter));
    expect(messages.map((message) => message.event)).toEqual(["turn_complete", "done"]);
    expect(messages[0].id).toBe("1");
    expect(messages[1]).toEqual(SSE_DONE_MESSAGE);
  });

  it("omits the done message after a cancel", async () => {
    const emitter = new StreamEmitter();
    emitter.cancel();
    expect(await collect(sseMessages(emitter))).toEqual([]);
  });
});
