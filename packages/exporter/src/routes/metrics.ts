/**
 * Scrape endpoint — runs one collection cycle per request.
 */

import type { FastifyPluginAsync } from "fastify";

export interface MetricsRoutesOptions {
  /** Path to serve the exposition on, e.g. "/metrics" */
  path: string;
}

export const metricsRoutes: FastifyPluginAsync<MetricsRoutesOptions> = async (app, opts) => {
  // -------------------------------------------------------------------------
  // GET /metrics
  // -------------------------------------------------------------------------
  app.get(opts.path, async (_request, reply) => {
    const body = await app.exporter.render();
    return reply.type(app.exporter.contentType).send(body);
  });
};
