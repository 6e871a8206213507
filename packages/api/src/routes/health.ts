import type { FastifyPluginAsync } from "fastify";

export const healthRoutes: FastifyPluginAsync = async (app) => {
  app.get("/", async (_request, reply) => {
    const state = app.supervisor.state;
    const ok = state === "running";

    const payload = {
      status: ok ? "ok" : "degraded",
      state,
      targets: app.supervisor.status().length,
      timestamp: new Date().toISOString(),
    };

    return reply.status(ok ? 200 : 503).send(payload);
  });
};
