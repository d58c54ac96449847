import type { FastifyInstance } from "fastify";
import "fastify-sse-v2";
import { z } from "zod";

import type { AgentService, PreparedTurn } from "../control-plane/agent_service";
import { describeError } from "../errors/agent_errors";
import { StreamEmitter, sseMessages } from "../sse/stream_emitter";
import { getAccountId, registerApiKeyGuard, sendAgentError, type AgentRouteOptions } from "./request_auth";

export const ChatRequest = z.object({
  message: z.string().trim().min(1).max(8000),
  threadId: z.string().max(200).nullish(),
});

export async function chatRoutes(app: FastifyInstance, opts: AgentRouteOptions & { agent: AgentService }) {
  const { agent } = opts;
  registerApiKeyGuard(app, opts.apiKey);

  app.options("/chat", async (_req, reply) => reply.code(204).send());
  app.options("/chat/stream", async (_req, reply) => reply.code(204).send());

  app.get("/chat/health", async () => agent.health());

  app.post("/chat/stream", async (req, reply) => {
    const accountId = getAccountId(req);
    if (!accountId) return reply.code(401).send({ error: "unauthorized" });

    const parsed = ChatRequest.safeParse(req.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: "invalid_request", details: parsed.error.flatten() });
    }

    // Ownership and configuration are checked here, before the stream opens.
    let turn: PreparedTurn;
    try {
      turn = await agent.prepareTurn(accountId, parsed.data.threadId);
    } catch (error) {
      return sendAgentError(reply, error);
    }

    const log = req.log.child({ threadId: turn.threadId });
    const emitter = new StreamEmitter();

    reply.raw.on("close", () => {
      if (!emitter.isCancelled && !reply.raw.writableFinished) {
        log.info({ evt: "chat.stream_disconnected" }, "chat.stream_disconnected");
      }
      emitter.cancel();
    });

    void turn.run({ message: parsed.data.message, signal: emitter.signal, emit: emitter.emit }).then(
      () => emitter.close(),
      (error: unknown) => {
        log.error({ evt: "chat.turn_crashed", error: describeError(error) }, "chat.turn_crashed");
        emitter.close();
      }
    );

    reply
      .header("Content-Type", "text/event-stream")
      .header("Cache-Control", "no-cache")
      .header("Connection", "keep-alive")
      .header("X-Accel-Buffering", "no")
      .header("X-Thread-Id", turn.threadId);
    reply.sse(sseMessages(emitter));
    return reply;
  });

  app.post("/chat", async (req, reply) => {
    const accountId = getAccountId(req);
    if (!accountId) return reply.code(401).send({ error: "unauthorized" });

    const parsed = ChatRequest.safeParse(req.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: "invalid_request", details: parsed.error.flatten() });
    }

    let turn: PreparedTurn;
    try {
      turn = await agent.prepareTurn(accountId, parsed.data.threadId);
    } catch (error) {
      return sendAgentError(reply, error);
    }

    const controller = new AbortController();
    reply.raw.on("close", () => {
      if (!reply.raw.writableFinished) controller.abort("client disconnected");
    });

    const result = await turn.run({ message: parsed.data.message, signal: controller.signal });
    const body = {
      threadId: result.threadId,
      turnId: result.turnId,
      status: result.status,
      text: result.text,
      checkpointId: result.checkpoint?.checkpointId ?? null,
      iterations: result.iterations,
      toolEvents: result.toolInvocations,
    };

    if (result.error) {
      return reply.code(result.error.statusCode).send({ ...body, ...result.error.toJSON() });
    }
    return reply.send(body);
  });
}
