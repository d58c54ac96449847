import type { AgentEvent, SequencedEvent } from "../contracts/agent_events";

/**
 * Ordered, cancellable event channel between one running turn and one
 * consumer. Events are numbered as they are emitted. When the consumer goes
 * away, `signal` aborts (so the turn is cancelled) and later events are
 * dropped.
 */
export class StreamEmitter {
  private queue: SequencedEvent[] = [];
  private seq = 0;
  private closed = false;
  private cancelled = false;
  private wake: (() => void) | null = null;
  private controller = new AbortController();

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get isCancelled(): boolean {
    return this.cancelled;
  }

  /** Bound so it can be handed to the orchestrator as an EventSink. */
  readonly emit = (event: AgentEvent): void => {
    if (this.closed || this.cancelled) return;
    this.seq += 1;
    this.queue.push({ ...event, seq: this.seq });
    this.notify();
  };

  /** Producer side: no more events. Queued events are still delivered. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.notify();
  }

  /** Consumer side: stop delivery and cancel the producer. */
  cancel(reason: string = "client disconnected"): void {
    if (this.closed || this.cancelled) return;
    this.cancelled = true;
    this.queue = [];
    this.controller.abort(reason);
    this.notify();
  }

  async *events(): AsyncGenerator<SequencedEvent> {
    try {
      for (;;) {
        const next = this.queue.shift();
        if (next) {
          yield next;
          continue;
        }
        if (this.closed || this.cancelled) return;
        await new Promise<void>((resolve) => {
          this.wake = resolve;
        });
      }
    } finally {
      // A consumer that stops iterating early counts as a disconnect.
      if (!this.closed) this.cancel();
    }
  }

  private notify() {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }
}

/** One SSE message as `reply.sse` takes it: `event` is the event type, `data` its JSON. */
export type SseMessage = {
  id?: string;
  event: string;
  data: string;
};

export function toSseMessage(event: SequencedEvent): SseMessage {
  return { id: String(event.seq), event: event.type, data: JSON.stringify(event) };
}

export const SSE_DONE_MESSAGE: SseMessage = { event: "done", data: "{}" };

/** Every event as an SSE message, then a final `done` unless the consumer cancelled. */
export async function* sseMessages(emitter: StreamEmitter): AsyncGenerator<SseMessage> {
  for await (const event of emitter.events()) {
    yield toSseMessage(event);
  }
  if (!emitter.isCancelled) yield SSE_DONE_MESSAGE;
}
