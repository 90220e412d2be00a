/**
 * Types for the metric families exposed by the exporter.
 *
 * Descriptors are created once by the OrganizationCollector; samples are
 * produced per scrape and handed to the exposition layer.
 */

// ---------------------------------------------------------------------------
// Descriptors
// ---------------------------------------------------------------------------

/** Immutable definition of a metric family */
export interface MetricDescriptor {
  /** Fully-qualified name, e.g. "github_repo_forks" */
  readonly name: string;
  readonly help: string;
  /** Label names, in the order sample label values are given */
  readonly labelNames: readonly string[];
}

// ---------------------------------------------------------------------------
// Samples
// ---------------------------------------------------------------------------

/** One observation of a descriptor */
export interface MetricSample {
  readonly descriptor: MetricDescriptor;
  readonly value: number;
  /** Same length and order as `descriptor.labelNames` */
  readonly labelValues: readonly string[];
}
