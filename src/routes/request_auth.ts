import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";

import { isAgentError } from "../errors/agent_errors";

export type AgentRouteOptions = {
  /** When set, every route requires `Authorization: Bearer <apiKey>`. */
  apiKey?: string;
};

export function registerApiKeyGuard(app: FastifyInstance, apiKey: string | undefined) {
  app.addHook("preHandler", async (req, reply) => {
    if (!apiKey) return;
    if (req.method === "OPTIONS") return;

    const authHeader = req.headers.authorization;
    const token = authHeader?.startsWith("Bearer ")
      ? authHeader.slice("Bearer ".length).trim()
      : undefined;
    if (!token || token !== apiKey) {
      reply.header("WWW-Authenticate", "Bearer");
      return reply.code(401).send({ error: "unauthorized" });
    }
  });
}

/** Account id forwarded by the upstream auth layer. */
export function getAccountId(req: FastifyRequest): string | null {
  const header = req.headers["x-account-id"];
  const value = Array.isArray(header) ? header[0] : header;
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

export const ThreadParams = z.object({
  threadId: z.string().min(1).max(200),
});

/** Sends an AgentError as its JSON body; anything else is rethrown to Fastify. */
export function sendAgentError(reply: FastifyReply, error: unknown) {
  if (!isAgentError(error)) throw error;
  return reply.code(error.statusCode).send(error.toJSON());
}
