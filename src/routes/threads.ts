import type { FastifyInstance } from "fastify";
import { z } from "zod";

import type { AgentService } from "../control-plane/agent_service";
import type { Checkpoint } from "../store/checkpoint_store";
import { ThreadParams, getAccountId, registerApiKeyGuard, sendAgentError, type AgentRouteOptions } from "./request_auth";

const HistoryQuery = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

const ListQuery = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

const CompactBody = z
  .object({
    keepRecentTurns: z.number().int().min(1).max(50).optional(),
  })
  .default({});

function checkpointView(checkpoint: Checkpoint) {
  return {
    checkpointId: checkpoint.checkpointId,
    parentCheckpointId: checkpoint.parentCheckpointId,
    createdAt: checkpoint.createdAt,
    metadata: checkpoint.metadata,
    channelVersions: checkpoint.channelVersions,
    messageCount: checkpoint.state.messages.length,
    turnCount: checkpoint.state.turns.length,
  };
}

export async function threadRoutes(app: FastifyInstance, opts: AgentRouteOptions & { agent: AgentService }) {
  const { agent } = opts;
  registerApiKeyGuard(app, opts.apiKey);

  app.get("/threads", async (req, reply) => {
    const accountId = getAccountId(req);
    if (!accountId) return reply.code(401).send({ error: "unauthorized" });

    const query = ListQuery.safeParse(req.query);
    if (!query.success) return reply.code(400).send({ error: "invalid_request" });

    try {
      return reply.send({ threads: await agent.listThreads(accountId, query.data.limit) });
    } catch (error) {
      return sendAgentError(reply, error);
    }
  });

  app.post("/threads/:threadId/close", async (req, reply) => {
    const accountId = getAccountId(req);
    if (!accountId) return reply.code(401).send({ error: "unauthorized" });

    const params = ThreadParams.safeParse(req.params);
    if (!params.success) return reply.code(400).send({ error: "invalid_request" });

    try {
      const closed = await agent.closeThread(accountId, params.data.threadId);
      if (!closed) return reply.code(404).send({ error: "not_found" });
      return reply.send({ threadId: params.data.threadId, closed: true });
    } catch (error) {
      return sendAgentError(reply, error);
    }
  });

  app.get("/threads/:threadId/checkpoints", async (req, reply) => {
    const accountId = getAccountId(req);
    if (!accountId) return reply.code(401).send({ error: "unauthorized" });

    const params = ThreadParams.safeParse(req.params);
    const query = HistoryQuery.safeParse(req.query);
    if (!params.success || !query.success) {
      return reply.code(400).send({ error: "invalid_request" });
    }

    try {
      const history = await agent.history(accountId, params.data.threadId, query.data.limit);
      return reply.send({ threadId: params.data.threadId, checkpoints: history.map(checkpointView) });
    } catch (error) {
      return sendAgentError(reply, error);
    }
  });

  app.post("/threads/:threadId/compact", async (req, reply) => {
    const accountId = getAccountId(req);
    if (!accountId) return reply.code(401).send({ error: "unauthorized" });

    const params = ThreadParams.safeParse(req.params);
    const body = CompactBody.safeParse(req.body ?? undefined);
    if (!params.success || !body.success) {
      return reply.code(400).send({ error: "invalid_request" });
    }

    try {
      const result = await agent.compact(accountId, params.data.threadId, body.data);
      if (!result.compacted) {
        return reply.send({ threadId: params.data.threadId, compacted: false, reason: result.reason });
      }
      req.log.info(
        { evt: "thread.compact_requested", threadId: params.data.threadId, removedMessages: result.removedMessages },
        "thread.compact_requested"
      );
      return reply.send({
        threadId: params.data.threadId,
        compacted: true,
        removedMessages: result.removedMessages,
        keptMessages: result.keptMessages,
        checkpoint: checkpointView(result.checkpoint),
      });
    } catch (error) {
      return sendAgentError(reply, error);
    }
  });
}
