import Fastify, { type FastifyServerOptions, type FastifyError } from "fastify";
import type { ExporterConfig } from "@org-stats-exporter/shared";

import { GraphqlQueryExecutor, type QueryExecutor } from "./github/index.js";
import { OrganizationCollector, PrometheusExporter } from "./metrics/index.js";
import { metricsRoutes } from "./routes/metrics.js";
import { healthRoutes } from "./routes/health.js";
import { landingRoutes } from "./routes/landing.js";

const isDev = process.env.NODE_ENV !== "production";

export interface BuildAppOptions extends FastifyServerOptions {
  config: ExporterConfig;
  /** Override the query executor (for testing) */
  queryExecutor?: QueryExecutor;
}

/**
 * Build and configure the Fastify application.
 * Exported separately from the server start so tests can use `app.inject()`.
 */
export async function buildApp(opts: BuildAppOptions) {
  const { config, queryExecutor: customExecutor, ...fastifyOpts } = opts;

  const app = Fastify(
    Object.keys(fastifyOpts).length > 0
      ? fastifyOpts
      : {
          logger: isDev
            ? {
                level: config.debug ? "debug" : "info",
                transport: {
                  target: "pino-pretty",
                  options: { colorize: true },
                },
              }
            : {
                // Production: structured JSON logging with redaction
                level: config.debug ? "debug" : "info",
                redact: ["req.headers.authorization"],
              },
        },
  );

  // Executor + Collector + Exporter (decorated so routes can access them)
  const queryExecutor = customExecutor ?? new GraphqlQueryExecutor({
    token: config.githubToken,
    baseUrl: config.githubApiUrl,
    userAgent: `org-stats-exporter/${config.build.version}`,
  });
  const collector = new OrganizationCollector(
    queryExecutor,
    config,
    app.log.child({ component: "organization-collector" }),
  );
  const exporter = new PrometheusExporter(collector, {
    processMetrics: config.processMetrics,
  });
  app.decorate("exporterConfig", config);
  app.decorate("collector", collector);
  app.decorate("exporter", exporter);

  for (const descriptor of collector.describe()) {
    app.log.debug({ metric: descriptor.name, labels: descriptor.labelNames }, "registered metric family");
  }

  // ---------------------------------------------------------------------------
  // Global error handler — normalise error responses
  // ---------------------------------------------------------------------------
  app.setErrorHandler((error: FastifyError, request, reply) => {
    // Known HTTP errors (4xx)
    if (error.statusCode && error.statusCode < 500) {
      reply.status(error.statusCode).send({ error: error.message });
      return;
    }

    // Unexpected errors — log full details, return generic message
    request.log.error({ err: error }, "request failed");
    reply.status(error.statusCode ?? 500).send({
      error: isDev ? error.message : "Internal server error",
    });
  });

  // ---------------------------------------------------------------------------
  // Routes
  // ---------------------------------------------------------------------------
  await app.register(metricsRoutes, { path: config.metricsPath });
  await app.register(healthRoutes, { prefix: "/health" });
  if (config.metricsPath !== "/") {
    await app.register(landingRoutes);
  }

  return app;
}
