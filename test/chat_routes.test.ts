import { afterEach, describe, it, expect, vi } from "vitest";
import type { FastifyInstance } from "fastify";

import { buildApp } from "../src/app";
import { loadAppConfig } from "../src/config/app_config";
import { FixturePortfolioServices } from "../src/domain/fixture_portfolio";
import { ConfigurationError } from "../src/errors/agent_errors";
import type { ModelResolution } from "../src/providers/provider_config";
import { MemoryCheckpointStore } from "../src/store/checkpoint_store";
import { fixedNow, testPortfolio } from "./helpers/agent_fixtures";

const ACCOUNT = { "x-account-id": "42" };

let app: FastifyInstance | null = null;

function build(opts: { env?: NodeJS.ProcessEnv; model?: ModelResolution } = {}) {
  const store = new MemoryCheckpointStore();
  app = buildApp(loadAppConfig(opts.env ?? {}), {
    store,
    services: new FixturePortfolioServices(testPortfolio),
    model: opts.model,
    now: () => fixedNow,
    logger: false,
  });
  return { app, store };
}

type SseFrame = { id?: string; event?: string; data?: string };

function parseSse(payload: string): SseFrame[] {
  const frames: SseFrame[] = [];
  for (const block of payload.split("\n\n")) {
    const frame: SseFrame = {};
    for (const line of block.split("\n")) {
      const colon = line.indexOf(": ");
      if (colon < 0) continue;
      const field = line.slice(0, colon);
      const value = line.slice(colon + 2);
      if (field === "id" || field === "event" || field === "data") frame[field] = value;
    }
    // The reconnect hint frame carries no event.
    if (frame.event) frames.push(frame);
  }
  return frames;
}

afterEach(async () => {
  await app?.close();
  app = null;
});

describe("health", () => {
  it("GET /healthz reports the service", async () => {
    const { app } = build();
    const res = await app.inject({ method: "GET", url: "/healthz" });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ ok: true, service: "portfolio-agent-server" });
  });

  it("GET /v1/chat/health reports the configured model", async () => {
    const { app } = build();
    const res = await app.inject({ method: "GET", url: "/v1/chat/health" });
    expect(res.json()).toEqual({ status: "healthy", provider: "fake", model: "fake-portfolio-agent" });
  });
});

describe("POST /v1/chat", () => {
  it("requires an account id", async () => {
    const { app } = build();
    const res = await app.inject({ method: "POST", url: "/v1/chat", payload: { message: "hi" } });
    expect(res.statusCode).toBe(401);
    expect(res.json()).toEqual({ error: "unauthorized" });
  });

  it("rejects an empty message", async () => {
    const { app } = build();
    const res = await app.inject({ method: "POST", url: "/v1/chat", headers: ACCOUNT, payload: { message: "   " } });
    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe("invalid_request");
  });

  it("runs a turn and returns the answer with its checkpoint", async () => {
    const { app } = build();
    const res = await app.inject({
      method: "POST",
      url: "/v1/chat",
      headers: ACCOUNT,
      payload: { message: "What is my largest holding?", threadId: "7" },
    });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.threadId).toBe("account_42_thread_7");
    expect(body.status).toBe("completed");
    expect(body.iterations).toBe(1);
    expect(typeof body.checkpointId).toBe("string");
    expect(body.toolEvents).toHaveLength(1);
    expect(body.toolEvents[0]).toMatchObject({ name: "get_portfolio_holdings", status: "ok" });
  });

  it("mints a thread when none is given", async () => {
    const { app } = build();
    const res = await app.inject({ method: "POST", url: "/v1/chat", headers: ACCOUNT, payload: { message: "Hello!" } });
    expect(res.json().threadId).toMatch(/^account_42_thread_[0-9a-f]{16}$/);
  });

  it("continues the active thread when none is given", async () => {
    const { app } = build();
    const first = await app.inject({ method: "POST", url: "/v1/chat", headers: ACCOUNT, payload: { message: "Hello!" } });
    const second = await app.inject({
      method: "POST",
      url: "/v1/chat",
      headers: ACCOUNT,
      payload: { message: "What is my largest holding?" },
    });

    expect(second.json().threadId).toBe(first.json().threadId);
    const history = await app.inject({
      method: "GET",
      url: `/v1/threads/${first.json().threadId}/checkpoints`,
      headers: ACCOUNT,
    });
    expect(history.json().checkpoints[0]).toMatchObject({ turnCount: 2 });
  });

  it("refuses another account's thread without touching the store", async () => {
    const { app, store } = build();
    const loadLatest = vi.spyOn(store, "loadLatest");
    const res = await app.inject({
      method: "POST",
      url: "/v1/chat",
      headers: { "x-account-id": "99" },
      payload: { message: "Show my holdings", threadId: "account_42_thread_7" },
    });

    expect(res.statusCode).toBe(403);
    expect(res.json()).toEqual({
      error: "authorization_error",
      code: "authorization_error",
      message: "thread does not belong to the authenticated account",
      retryable: false,
    });
    expect(loadLatest).not.toHaveBeenCalled();
  });

  it("rejects a malformed thread id", async () => {
    const { app } = build();
    const res = await app.inject({
      method: "POST",
      url: "/v1/chat",
      headers: ACCOUNT,
      payload: { message: "hi", threadId: "account_42_thread_7!" },
    });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({ code: "invalid_thread_id", message: "invalid thread id: account_42_thread_7!" });
  });

  it("returns 503 when no model is configured", async () => {
    const { app } = build({
      model: {
        status: "not_configured",
        provider: "openai",
        error: new ConfigurationError("OpenAI is not configured: missing OPENAI_API_KEY"),
      },
    });
    const res = await app.inject({ method: "POST", url: "/v1/chat", headers: ACCOUNT, payload: { message: "hi" } });
    expect(res.statusCode).toBe(503);
    expect(res.json()).toMatchObject({ code: "configuration_error", retryable: false });

    const health = await app.inject({ method: "GET", url: "/v1/chat/health" });
    expect(health.json()).toEqual({ status: "not_configured", provider: "openai", model: null });
  });
});

describe("API key", () => {
  it("rejects a missing or wrong bearer token", async () => {
    const { app } = build({ env: { AGENT_API_KEY: "test-secret" } });
    const missing = await app.inject({ method: "POST", url: "/v1/chat", headers: ACCOUNT, payload: { message: "Hello!" } });
    const wrong = await app.inject({
      method: "POST",
      url: "/v1/chat",
      headers: { ...ACCOUNT, authorization: "Bearer nope" },
      payload: { message: "Hello!" },
    });

    expect(missing.statusCode).toBe(401);
    expect(missing.headers["www-authenticate"]).toBe("Bearer");
    expect(wrong.statusCode).toBe(401);
  });

  it("accepts the configured token", async () => {
    const { app } = build({ env: { AGENT_API_KEY: "test-secret" } });
    const res = await app.inject({
      method: "POST",
      url: "/v1/chat",
      headers: { ...ACCOUNT, authorization: "Bearer test-secret" },
      payload: { message: "Hello!" },
    });
    expect(res.statusCode).toBe(200);
  });
});

describe("POST /v1/chat/stream", () => {
  it("streams tool and token events then a done frame", async () => {
    const { app } = build();
    const res = await app.inject({
      method: "POST",
      url: "/v1/chat/stream",
      headers: ACCOUNT,
      payload: { message: "What is my largest holding?", threadId: "7" },
    });

    expect(res.statusCode).toBe(200);
    expect(res.headers["content-type"]).toMatch(/^text\/event-stream/);
    expect(res.headers["x-thread-id"]).toBe("account_42_thread_7");

    const frames = parseSse(res.payload);
    const types = frames.map((frame) => frame.event);
    expect(types.slice(0, 2)).toEqual(["tool_call_started", "tool_call_result"]);
    expect(types).toContain("token");
    expect(types.slice(-2)).toEqual(["turn_complete", "done"]);
    expect(frames[0].id).toBe("1");
    expect(frames.at(-1)).toEqual({ event: "done", data: "{}" });
    expect(JSON.parse(frames.at(-2)?.data ?? "null")).toMatchObject({
      type: "turn_complete",
      threadId: "account_42_thread_7",
      status: "completed",
    });
  });

  it("answers authorization failures before the stream opens", async () => {
    const { app } = build();
    const res = await app.inject({
      method: "POST",
      url: "/v1/chat/stream",
      headers: { "x-account-id": "99" },
      payload: { message: "hi", threadId: "account_42_thread_7" },
    });
    expect(res.statusCode).toBe(403);
    expect(res.headers["content-type"]).toMatch(/^application\/json/);
  });
});

describe("thread routes", () => {
  it("lists checkpoint history newest first", async () => {
    const { app } = build();
    for (const message of ["Hello!", "What is my largest holding?"]) {
      await app.inject({ method: "POST", url: "/v1/chat", headers: ACCOUNT, payload: { message, threadId: "7" } });
    }

    const res = await app.inject({ method: "GET", url: "/v1/threads/7/checkpoints", headers: ACCOUNT });
    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.checkpoints).toHaveLength(2);
    expect(body.checkpoints[0]).toMatchObject({ messageCount: 6, turnCount: 2 });
    expect(body.checkpoints[1]).toMatchObject({ messageCount: 2, turnCount: 1, parentCheckpointId: null });
    expect(body.checkpoints[0].parentCheckpointId).toBe(body.checkpoints[1].checkpointId);
  });

  it("rejects an out-of-range limit", async () => {
    const { app } = build();
    const res = await app.inject({ method: "GET", url: "/v1/threads/7/checkpoints?limit=0", headers: ACCOUNT });
    expect(res.statusCode).toBe(400);
  });

  it("compacts older turns", async () => {
    const { app } = build();
    for (let i = 0; i < 3; i++) {
      await app.inject({ method: "POST", url: "/v1/chat", headers: ACCOUNT, payload: { message: "Hello!", threadId: "7" } });
    }

    const res = await app.inject({
      method: "POST",
      url: "/v1/threads/account_42_thread_7/compact",
      headers: ACCOUNT,
      payload: { keepRecentTurns: 2 },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({
      compacted: true,
      removedMessages: 2,
      keptMessages: 4,
      checkpoint: { messageCount: 5, turnCount: 3 },
    });
  });

  it("reports when there is nothing to compact", async () => {
    const { app } = build();
    const res = await app.inject({ method: "POST", url: "/v1/threads/7/compact", headers: ACCOUNT });
    expect(res.json()).toEqual({ threadId: "7", compacted: false, reason: "empty" });
  });

  it("lists the caller's active threads", async () => {
    const { app } = build();
    await app.inject({ method: "POST", url: "/v1/chat", headers: ACCOUNT, payload: { message: "Hello!", threadId: "7" } });
    await app.inject({ method: "POST", url: "/v1/chat", headers: { "x-account-id": "99" }, payload: { message: "Hello!" } });

    const res = await app.inject({ method: "GET", url: "/v1/threads", headers: ACCOUNT });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      threads: [
        {
          threadId: "account_42_thread_7",
          accountId: "42",
          title: "Conversation 2026-10-16 12:00",
          createdAt: "2026-10-16T12:00:00.000Z",
          lastActivityAt: "2026-10-16T12:00:00.000Z",
          active: true,
        },
      ],
    });
  });

  it("closes a thread so the next message starts a new one", async () => {
    const { app } = build();
    await app.inject({ method: "POST", url: "/v1/chat", headers: ACCOUNT, payload: { message: "Hello!", threadId: "7" } });

    const closed = await app.inject({ method: "POST", url: "/v1/threads/7/close", headers: ACCOUNT });
    expect(closed.statusCode).toBe(200);
    expect(closed.json()).toEqual({ threadId: "7", closed: true });

    const listed = await app.inject({ method: "GET", url: "/v1/threads", headers: ACCOUNT });
    expect(listed.json()).toEqual({ threads: [] });

    const next = await app.inject({ method: "POST", url: "/v1/chat", headers: ACCOUNT, payload: { message: "Hello!" } });
    expect(next.json().threadId).not.toBe("account_42_thread_7");
  });

  it("answers 404 when closing an unknown thread", async () => {
    const { app } = build();
    const res = await app.inject({ method: "POST", url: "/v1/threads/nope/close", headers: ACCOUNT });
    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ error: "not_found" });
  });

  it("refuses to close another account's thread", async () => {
    const { app } = build();
    const res = await app.inject({
      method: "POST",
      url: "/v1/threads/account_42_thread_7/close",
      headers: { "x-account-id": "99" },
    });
    expect(res.statusCode).toBe(403);
  });

  it("refuses another account's history", async () => {
    const { app } = build();
    const res = await app.inject({
      method: "GET",
      url: "/v1/threads/account_42_thread_7/checkpoints",
      headers: { "x-account-id": "99" },
    });
    expect(res.statusCode).toBe(403);
  });
});
