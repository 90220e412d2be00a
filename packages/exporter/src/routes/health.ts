import type { FastifyPluginAsync } from "fastify";

export const healthRoutes: FastifyPluginAsync = async (app) => {
  app.get("/", async (_request, reply) => {
    const payload = {
      status: "ok",
      organizations: app.exporterConfig.organizations,
      metricFamilies: app.collector.describe().length,
      timestamp: new Date().toISOString(),
    };

    return reply.status(200).send(payload);
  });
};
