import type { FastifyPluginAsync } from "fastify";

export const healthRoutes: FastifyPluginAsync = async (app) => {
  app.get("/", async (_request, reply) => {
    const payload = {
      status: "ok",
      exporter: app.explorer.metricsUrl,
      snapshotLoaded: app.explorer.isLoaded,
      timestamp: new Date().toISOString(),
    };

    return reply.status(200).send(payload);
  });
};
