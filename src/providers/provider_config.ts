import type { ProviderSettings } from "../config/app_config";
import { ConfigurationError } from "../errors/agent_errors";
import { silentLogger, type AgentLogger } from "../logger";
import { FakeChatModel } from "./fake_model";
import type { ChatModel } from "./model";
import { OpenAIChatModel, type OpenAIEndpoint } from "./openai_model";

export type ModelResolution =
  | { status: "ready"; model: ChatModel }
  | { status: "not_configured"; provider: string; error: ConfigurationError };

type ProviderOptions = {
  log?: AgentLogger;
  fetchImpl?: (url: string, init: RequestInit) => Promise<Response>;
};

function missing(names: Array<[string, string | undefined]>): string[] {
  return names.filter(([, value]) => !value).map(([name]) => name);
}

/** Azure wins when its endpoint is set; otherwise the plain OpenAI API. */
export function selectEndpoint(settings: ProviderSettings): OpenAIEndpoint {
  const { azure, openai } = settings;
  if (azure.endpoint) {
    const absent = missing([
      ["AZURE_OPENAI_API_KEY", azure.apiKey],
      ["AZURE_OPENAI_DEPLOYMENT", azure.deployment],
    ]);
    if (!azure.apiKey || !azure.deployment) {
      throw new ConfigurationError(`Azure OpenAI is not configured: missing ${absent.join(", ")}`);
    }
    return {
      kind: "azure",
      endpoint: azure.endpoint,
      apiKey: azure.apiKey,
      deployment: azure.deployment,
      apiVersion: azure.apiVersion,
    };
  }

  const absent = missing([
    ["OPENAI_API_KEY", openai.apiKey],
    ["OPENAI_MODEL", openai.model],
  ]);
  if (!openai.apiKey || !openai.model) {
    throw new ConfigurationError(`OpenAI is not configured: missing ${absent.join(", ")}`);
  }
  return { kind: "openai", apiKey: openai.apiKey, model: openai.model, baseUrl: openai.baseUrl };
}

export function createChatModel(settings: ProviderSettings, opts: ProviderOptions = {}): ChatModel {
  if (settings.provider === "fake") {
    return new FakeChatModel();
  }
  return new OpenAIChatModel(selectEndpoint(settings), {
    log: opts.log,
    ...(opts.fetchImpl ? { fetchImpl: opts.fetchImpl } : {}),
  });
}

/**
 * Resolves the model once at startup. A missing credential disables the
 * agent instead of failing inside a turn.
 */
export function resolveChatModel(settings: ProviderSettings, opts: ProviderOptions = {}): ModelResolution {
  const log = opts.log ?? silentLogger;
  try {
    const model = createChatModel(settings, opts);
    log.info({ evt: "agent.model_selected", provider: model.provider, model: model.model }, "agent.model_selected");
    return { status: "ready", model };
  } catch (error) {
    if (!(error instanceof ConfigurationError)) throw error;
    log.warn({ evt: "agent.disabled", provider: settings.provider, reason: error.message }, "agent.disabled");
    return { status: "not_configured", provider: settings.provider, error };
  }
}
