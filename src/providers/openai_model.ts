import { z } from "zod";

import type { ToolCallRequest, TranscriptMessage } from "../contracts/conversation";
import { ModelUnavailableError, describeError } from "../errors/agent_errors";
import { silentLogger, type AgentLogger } from "../logger";
import type { ToolSpec } from "../tools/tool_types";
import type { ChatModel, GenerateInput, ModelStep } from "./model";

export type OpenAIEndpoint =
  | { kind: "openai"; apiKey: string; baseUrl: string; model: string }
  | { kind: "azure"; apiKey: string; endpoint: string; deployment: string; apiVersion: string };

type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

const StreamChunkSchema = z.object({
  choices: z.array(
    z.object({
      delta: z
        .object({
          content: z.string().nullish(),
          tool_calls: z
            .array(
              z.object({
                index: z.number().int(),
                id: z.string().optional(),
                function: z.object({ name: z.string().optional(), arguments: z.string().optional() }).optional(),
              })
            )
            .nullish(),
        })
        .optional(),
      finish_reason: z.string().nullish(),
    })
  ),
});

const ErrorBodySchema = z.object({
  error: z.object({
    type: z.string().nullish(),
    code: z.string().nullish(),
    message: z.string().nullish(),
  }),
});

export function parseRetryAfter(header: string | null, nowMs: number = Date.now()): number | undefined {
  if (!header) return undefined;
  const seconds = Number(header);
  if (!Number.isNaN(seconds)) {
    return Math.max(0, Math.floor(seconds * 1000));
  }
  const retryDate = Date.parse(header);
  if (!Number.isNaN(retryDate)) {
    return Math.max(0, retryDate - nowMs);
  }
  return undefined;
}

// 408, 409, 429 and 5xx are transient; other 4xx mean the request itself is wrong.
export function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 409 || status === 429 || status >= 500;
}

function toWireMessage(message: TranscriptMessage): Record<string, unknown> {
  switch (message.role) {
    case "system":
    case "user":
      return { role: message.role, content: message.content };
    case "assistant":
      if (!message.toolCalls?.length) return { role: "assistant", content: message.content };
      return {
        role: "assistant",
        content: message.content || null,
        tool_calls: message.toolCalls.map((call) => ({
          id: call.id,
          type: "function",
          function: { name: call.name, arguments: JSON.stringify(call.arguments ?? {}) },
        })),
      };
    case "tool":
      return { role: "tool", tool_call_id: message.toolCallId, content: message.content };
  }
}

function toWireTool(tool: ToolSpec) {
  return {
    type: "function",
    function: { name: tool.name, description: tool.description, parameters: tool.parameters },
  };
}

function parseArguments(raw: string): unknown {
  if (!raw.trim()) return {};
  try {
    return JSON.parse(raw);
  } catch {
    // Left as text; tool argument validation reports it back to the model.
    return raw;
  }
}

/** Yields the `data:` payloads of a server-sent event stream. */
async function* sseData(body: AsyncIterable<Uint8Array>): AsyncGenerator<string> {
  const decoder = new TextDecoder();
  let buffer = "";
  for await (const chunk of body) {
    buffer += decoder.decode(chunk, { stream: true });
    let newline = buffer.indexOf("\n");
    while (newline !== -1) {
      const line = buffer.slice(0, newline).replace(/\r$/, "");
      buffer = buffer.slice(newline + 1);
      if (line.startsWith("data:")) yield line.slice(5).trim();
      newline = buffer.indexOf("\n");
    }
  }
  const rest = buffer.trim();
  if (rest.startsWith("data:")) yield rest.slice(5).trim();
}

/**
 * Streaming chat-completions client for OpenAI and Azure OpenAI. Tokens are
 * forwarded through onToken as they arrive; tool-call fragments are
 * reassembled by index.
 */
export class OpenAIChatModel implements ChatModel {
  readonly provider: string;
  readonly model: string;
  private endpoint: OpenAIEndpoint;
  private fetchImpl: FetchLike;
  private log: AgentLogger;

  constructor(endpoint: OpenAIEndpoint, opts: { fetchImpl?: FetchLike; log?: AgentLogger } = {}) {
    this.endpoint = endpoint;
    this.provider = endpoint.kind;
    this.model = endpoint.kind === "openai" ? endpoint.model : endpoint.deployment;
    this.fetchImpl = opts.fetchImpl ?? ((url, init) => fetch(url, init));
    this.log = opts.log ?? silentLogger;
  }

  private request(): { url: string; headers: Record<string, string> } {
    if (this.endpoint.kind === "azure") {
      const base = this.endpoint.endpoint.replace(/\/+$/, "");
      return {
        url: `${base}/openai/deployments/${encodeURIComponent(this.endpoint.deployment)}/chat/completions?api-version=${encodeURIComponent(this.endpoint.apiVersion)}`,
        headers: { "content-type": "application/json", "api-key": this.endpoint.apiKey },
      };
    }
    return {
      url: `${this.endpoint.baseUrl.replace(/\/+$/, "")}/chat/completions`,
      headers: { "content-type": "application/json", authorization: `Bearer ${this.endpoint.apiKey}` },
    };
  }

  async generate(input: GenerateInput): Promise<ModelStep> {
    const { url, headers } = this.request();
    const body: Record<string, unknown> = {
      stream: true,
      messages: [{ role: "system", content: input.systemPrompt }, ...input.messages.map(toWireMessage)],
    };
    if (this.endpoint.kind === "openai") body.model = this.endpoint.model;
    if (input.tools.length > 0) {
      body.tools = input.tools.map(toWireTool);
      body.tool_choice = "auto";
    }

    let res: Response;
    try {
      res = await this.fetchImpl(url, {
        method: "POST",
        headers,
        body: JSON.stringify(body),
        signal: input.signal,
      });
    } catch (error) {
      if (input.signal.aborted) throw input.signal.reason;
      throw new ModelUnavailableError(`model request failed: ${describeError(error)}`, { retryable: true, cause: error });
    }

    if (!res.ok) {
      throw await this.toProviderError(res);
    }
    if (!res.body) {
      throw new ModelUnavailableError("model response has no body", { retryable: true });
    }

    try {
      return await this.readStream(res.body, input);
    } catch (error) {
      if (input.signal.aborted) throw input.signal.reason;
      if (error instanceof ModelUnavailableError) throw error;
      throw new ModelUnavailableError(`model stream failed: ${describeError(error)}`, { retryable: true, cause: error });
    }
  }

  private async readStream(body: AsyncIterable<Uint8Array>, input: GenerateInput): Promise<ModelStep> {
    let text = "";
    const calls = new Map<number, { id: string; name: string; arguments: string }>();

    for await (const data of sseData(body)) {
      if (data === "[DONE]") break;
      if (!data) continue;
      const chunk = StreamChunkSchema.safeParse(JSON.parse(data));
      if (!chunk.success) {
        this.log.warn({ evt: "openai.chunk_unrecognised", issues: chunk.error.issues.length }, "openai.chunk_unrecognised");
        continue;
      }
      for (const choice of chunk.data.choices) {
        const delta = choice.delta;
        if (delta?.content) {
          text += delta.content;
          input.onToken?.(delta.content);
        }
        for (const fragment of delta?.tool_calls ?? []) {
          const call = calls.get(fragment.index) ?? { id: "", name: "", arguments: "" };
          if (fragment.id) call.id = fragment.id;
          if (fragment.function?.name) call.name += fragment.function.name;
          if (fragment.function?.arguments) call.arguments += fragment.function.arguments;
          calls.set(fragment.index, call);
        }
      }
    }

    if (calls.size === 0) {
      return { type: "final", text };
    }

    const toolCalls: ToolCallRequest[] = [...calls.entries()]
      .sort(([a], [b]) => a - b)
      .map(([index, call]) => ({
        id: call.id || `call_${index}`,
        name: call.name,
        arguments: parseArguments(call.arguments),
      }));
    return { type: "tool_calls", text, toolCalls };
  }

  private async toProviderError(res: Response): Promise<ModelUnavailableError> {
    const text = await res.text();
    const parsed = ErrorBodySchema.safeParse(parseArguments(text));
    const errorType = parsed.success ? parsed.data.error.type ?? undefined : undefined;
    const errorCode = parsed.success ? parsed.data.error.code ?? undefined : undefined;
    const errorMessage = parsed.success ? parsed.data.error.message ?? undefined : undefined;
    const bodySnippet = (errorMessage ?? text).slice(0, 500);
    const requestId = res.headers.get("x-request-id") ?? res.headers.get("apim-request-id") ?? undefined;
    const retryable = isRetryableStatus(res.status);

    this.log.error(
      { evt: "openai.request_failed", statusCode: res.status, requestId, bodySnippet, errorType, errorCode },
      "openai.request_failed"
    );
    return new ModelUnavailableError(`model provider error ${res.status}: ${bodySnippet}`, {
      retryable,
      providerStatus: res.status,
      retryAfterMs: retryable ? parseRetryAfter(res.headers.get("retry-after")) : undefined,
      errorType,
    });
  }
}
