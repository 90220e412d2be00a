/**
 * Prometheus exposition for the OrganizationCollector.
 *
 * Every render builds a fresh prom-client Registry from that cycle's
 * samples, so nothing from a previous scrape can leak into the next one
 * and concurrent scrapes do not share gauges. Process metrics live in a
 * separate long-lived registry that is merged in at render time.
 */

import { Gauge, Registry, collectDefaultMetrics } from "prom-client";
import type { MetricDescriptor, MetricSample } from "@org-stats-exporter/shared";
import type { OrganizationCollector } from "./organization-collector.js";

export interface PrometheusExporterOptions {
  /** Include Node.js process metrics (default: true) */
  processMetrics?: boolean;
}

export class PrometheusExporter {
  private collector: OrganizationCollector;
  private processRegistry: Registry | null;

  constructor(collector: OrganizationCollector, options?: PrometheusExporterOptions) {
    this.collector = collector;
    this.processRegistry = null;
    if (options?.processMetrics ?? true) {
      this.processRegistry = new Registry();
      collectDefaultMetrics({ register: this.processRegistry });
    }
  }

  /** Content type of the rendered text */
  get contentType(): string {
    return Registry.PROMETHEUS_CONTENT_TYPE;
  }

  /** Run one collection cycle and render it in the text exposition format */
  async render(): Promise<string> {
    const samples = await this.collector.collect();
    const registry = toRegistry(samples);
    if (!this.processRegistry) return registry.metrics();
    return Registry.merge([this.processRegistry, registry]).metrics();
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Register one gauge per descriptor, in the order descriptors first appear */
export function toRegistry(samples: readonly MetricSample[]): Registry {
  const registry = new Registry();
  const gauges = new Map<MetricDescriptor, Gauge>();

  for (const sample of samples) {
    const { descriptor } = sample;
    let gauge = gauges.get(descriptor);
    if (!gauge) {
      gauge = new Gauge({
        name: descriptor.name,
        help: descriptor.help,
        labelNames: [...descriptor.labelNames],
        registers: [registry],
      });
      gauges.set(descriptor, gauge);
    }

    if (descriptor.labelNames.length === 0) {
      gauge.set(sample.value);
    } else {
      gauge.set(labelMap(sample), sample.value);
    }
  }

  return registry;
}

function labelMap(sample: MetricSample): Record<string, string> {
  const labels: Record<string, string> = {};
  sample.descriptor.labelNames.forEach((name, i) => {
    labels[name] = sample.labelValues[i];
  });
  return labels;
}
