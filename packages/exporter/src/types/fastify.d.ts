import "fastify";
import type { ExporterConfig } from "@org-stats-exporter/shared";
import type { OrganizationCollector } from "../metrics/organization-collector.js";
import type { PrometheusExporter } from "../metrics/prometheus-exporter.js";

declare module "fastify" {
  interface FastifyInstance {
    exporterConfig: ExporterConfig;
    collector: OrganizationCollector;
    exporter: PrometheusExporter;
  }
}
