import { z } from "zod";

export const ToolCallRequestSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  // Model-generated; validated per tool before invoke, never trusted here.
  arguments: z.unknown(),
});

export type ToolCallRequest = z.infer<typeof ToolCallRequestSchema>;

export const TranscriptMessageSchema = z.discriminatedUnion("role", [
  z.object({ role: z.literal("system"), content: z.string() }),
  z.object({ role: z.literal("user"), content: z.string() }),
  z.object({
    role: z.literal("assistant"),
    content: z.string(),
    toolCalls: z.array(ToolCallRequestSchema).optional(),
  }),
  z.object({
    role: z.literal("tool"),
    toolCallId: z.string(),
    name: z.string(),
    content: z.string(),
    status: z.enum(["ok", "error"]),
  }),
]);

export type TranscriptMessage = z.infer<typeof TranscriptMessageSchema>;

export const ToolInvocationStatus = z.enum(["ok", "error", "timeout"]);
export type ToolInvocationStatus = z.infer<typeof ToolInvocationStatus>;

export const ToolInvocationRecordSchema = z.object({
  turnId: z.string(),
  callId: z.string(),
  name: z.string(),
  arguments: z.unknown(),
  status: ToolInvocationStatus,
  result: z.unknown().optional(),
  error: z.string().optional(),
  durationMs: z.number().nonnegative(),
});

export type ToolInvocationRecord = z.infer<typeof ToolInvocationRecordSchema>;

export const TurnRecordSchema = z.object({
  turnId: z.string(),
  status: z.enum(["completed", "failed"]),
  iterations: z.number().int().nonnegative(),
  errorCode: z.string().optional(),
  errorMessage: z.string().optional(),
  startedAt: z.string(),
  finishedAt: z.string(),
});

export type TurnRecord = z.infer<typeof TurnRecordSchema>;

/**
 * Conversation state is split into channels; each channel is stored as its own
 * versioned blob so an unchanged channel is shared with the parent checkpoint.
 */
export const ConversationStateSchema = z.object({
  messages: z.array(TranscriptMessageSchema),
  toolInvocations: z.array(ToolInvocationRecordSchema),
  turns: z.array(TurnRecordSchema),
});

export type ConversationState = z.infer<typeof ConversationStateSchema>;

export type ChannelName = keyof ConversationState;

export const CHANNEL_NAMES: readonly ChannelName[] = ["messages", "toolInvocations", "turns"];

export const CHANNEL_SCHEMAS = {
  messages: TranscriptMessageSchema,
  toolInvocations: ToolInvocationRecordSchema,
  turns: TurnRecordSchema,
} as const;

export function emptyConversationState(): ConversationState {
  return { messages: [], toolInvocations: [], turns: [] };
}

export function isChannelName(value: string): value is ChannelName {
  return CHANNEL_NAMES.some((name) => name === value);
}
