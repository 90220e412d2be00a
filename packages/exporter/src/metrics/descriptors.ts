/**
 * Helpers for building metric descriptors and constant samples.
 */

import type { MetricDescriptor, MetricSample } from "@org-stats-exporter/shared";
import { LabelArityError } from "../errors.js";

/** Join namespace, subsystem and name with "_", skipping empty parts */
export function buildFQName(namespace: string, subsystem: string, name: string): string {
  return [namespace, subsystem, name].filter((part) => part !== "").join("_");
}

/** Create a frozen descriptor */
export function newDescriptor(
  name: string,
  help: string,
  labelNames: readonly string[] = [],
): MetricDescriptor {
  return Object.freeze({ name, help, labelNames: Object.freeze([...labelNames]) });
}

/**
 * Create a sample for `descriptor`.
 * Throws LabelArityError when the label values don't match the descriptor.
 */
export function constSample(
  descriptor: MetricDescriptor,
  value: number,
  ...labelValues: string[]
): MetricSample {
  if (labelValues.length !== descriptor.labelNames.length) {
    throw new LabelArityError(descriptor.name, descriptor.labelNames.length, labelValues.length);
  }
  return { descriptor, value, labelValues };
}

/** Unix epoch seconds (fractional) of an instant */
export function toUnixSeconds(date: Date): number {
  return date.getTime() / 1000;
}
