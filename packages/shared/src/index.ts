export type { MetricDescriptor, MetricSample } from "./types/metrics.js";
export type {
  IssueState,
  PullRequestState,
  RepositoryStats,
  RateLimitSnapshot,
  OrganizationQueryResult,
} from "./types/github.js";
export type { CollectorConfig, BuildInfo, ExporterConfig } from "./types/config.js";
