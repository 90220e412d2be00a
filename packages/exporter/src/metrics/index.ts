/**
 * Metrics Module
 *
 * Converts organization query results into metric samples and renders
 * them for Prometheus scrapes.
 */

export { OrganizationCollector } from "./organization-collector.js";
export type { CollectorLogger } from "./organization-collector.js";
export { PrometheusExporter } from "./prometheus-exporter.js";
export type { PrometheusExporterOptions } from "./prometheus-exporter.js";
