import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import { FastifySSEPlugin } from "fastify-sse-v2";

import type { AppConfig } from "./config/app_config";
import { AgentService } from "./control-plane/agent_service";
import { loadPromptConfig } from "./control-plane/prompt_pack";
import { FixturePortfolioServices, loadPortfolioFixture } from "./domain/fixture_portfolio";
import type { PortfolioServices } from "./domain/portfolio_services";
import { defaultLogLevel } from "./logger";
import { resolveChatModel, type ModelResolution } from "./providers/provider_config";
import { chatRoutes } from "./routes/chat";
import { healthRoutes } from "./routes/healthz";
import { threadRoutes } from "./routes/threads";
import type { CheckpointStore } from "./store/checkpoint_store";
import { SqliteCheckpointStore } from "./store/sqlite_checkpoint_store";
import { ThreadManager } from "./threads/thread_manager";
import { MemoryThreadRegistry, type ThreadRegistry } from "./threads/thread_registry";
import { ToolFactory } from "./tools/tool_factory";

export type AppOverrides = {
  store?: CheckpointStore;
  registry?: ThreadRegistry;
  services?: PortfolioServices;
  model?: ModelResolution;
  now?: () => Date;
  logger?: boolean;
};

/** Wires config into the agent service and registers every route. */
export function buildApp(config: AppConfig, overrides: AppOverrides = {}): FastifyInstance {
  const level = config.logLevel ?? defaultLogLevel();
  const app = Fastify({
    logger:
      overrides.logger === false
        ? false
        : config.prettyLogs
          ? { level, transport: { target: "pino-pretty", options: { colorize: true } } }
          : { level },
  });
  const log = app.log;

  let store = overrides.store;
  let registry = overrides.registry;
  if (!store) {
    const sqlite = new SqliteCheckpointStore(config.dbPath, log);
    app.addHook("onClose", async () => sqlite.close());
    store = sqlite;
    registry ??= sqlite;
  }

  const services =
    overrides.services ?? new FixturePortfolioServices(loadPortfolioFixture(config.portfolioFixturePath, log));

  const agent = new AgentService({
    threads: new ThreadManager(store, { log, registry: registry ?? new MemoryThreadRegistry(), now: overrides.now }),
    tools: new ToolFactory(services, { log, now: overrides.now }),
    model: overrides.model ?? resolveChatModel(config.providers, { log }),
    promptConfig: loadPromptConfig(config.promptsPath, log),
    limits: config.limits,
    log,
    now: overrides.now,
  });

  // CORS (v0/dev): permissive. Tighten before prod.
  app.register(cors, { origin: true });
  app.register(FastifySSEPlugin);

  app.register(healthRoutes);
  app.register(chatRoutes, { prefix: "/v1", agent, apiKey: config.apiKey });
  app.register(threadRoutes, { prefix: "/v1", agent, apiKey: config.apiKey });

  return app;
}
