import type { FastifyInstance } from "fastify";

export async function healthRoutes(app: FastifyInstance) {
  app.get("/healthz", async () => ({
    ok: true,
    service: "portfolio-agent-server",
    ts: new Date().toISOString(),
  }));
}
