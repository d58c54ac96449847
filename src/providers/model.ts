import type { ToolCallRequest, TranscriptMessage } from "../contracts/conversation";
import type { ToolSpec } from "../tools/tool_types";

export type ModelStep =
  | { type: "final"; text: string }
  | { type: "tool_calls"; text: string; toolCalls: ToolCallRequest[] };

export type GenerateInput = {
  systemPrompt: string;
  messages: TranscriptMessage[];
  tools: ToolSpec[];
  signal: AbortSignal;
  onToken?: (text: string) => void;
};

export interface ChatModel {
  readonly provider: string;
  readonly model: string;
  generate(input: GenerateInput): Promise<ModelStep>;
}
