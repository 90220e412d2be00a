/** Settings the OrganizationCollector is constructed with */
export interface CollectorConfig {
  /** Metric name prefix, e.g. "github" */
  readonly namespace: string;
  /** Organization logins, queried in this order */
  readonly organizations: readonly string[];
  /** Deadline for each organization query in ms */
  readonly queryTimeoutMs: number;
}

/** Build metadata reported at startup */
export interface BuildInfo {
  readonly version: string;
  readonly revision: string;
  readonly buildDate: string;
}

/** Complete exporter configuration, loaded once from the environment */
export interface ExporterConfig extends CollectorConfig {
  readonly githubToken: string;
  /** REST base URL; the GraphQL endpoint is `${githubApiUrl}/graphql` */
  readonly githubApiUrl: string;
  readonly listenHost: string;
  readonly listenPort: number;
  /** Path the scrape endpoint is served on */
  readonly metricsPath: string;
  readonly debug: boolean;
  /** Include Node.js process metrics in every scrape */
  readonly processMetrics: boolean;
  readonly build: BuildInfo;
}
