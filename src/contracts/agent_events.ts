import type { ToolInvocationStatus } from "./conversation";

export type TurnOutcomeStatus = "completed" | "failed";

export type AgentEvent =
  | { type: "token"; turnId: string; text: string }
  | { type: "tool_call_started"; turnId: string; callId: string; name: string; arguments: unknown }
  | {
      type: "tool_call_result";
      turnId: string;
      callId: string;
      name: string;
      status: ToolInvocationStatus;
      result?: unknown;
      error?: string;
      durationMs: number;
    }
  | {
      type: "turn_complete";
      turnId: string;
      threadId: string;
      status: TurnOutcomeStatus;
      checkpointId: string | null;
      iterations: number;
      text: string;
    }
  | { type: "error"; turnId: string; code: string; message: string; retryable: boolean };

export type AgentEventType = AgentEvent["type"];

/** An event as delivered to a consumer; `seq` starts at 1 and increases by one per event. */
export type SequencedEvent = AgentEvent & { seq: number };

export type EventSink = (event: AgentEvent) => void;
