/**
 * Organization Collector — turns organization query results into metric
 * samples on every scrape.
 *
 * Organizations are queried one after another. The first failed query ends
 * the cycle: samples already gathered are kept, the remaining organizations
 * and the rate-limit gauges are skipped until the next scrape.
 *
 * Like the GitHub module, this is independent of the web framework. It
 * receives the executor and logger via constructor injection.
 */

import type { BaseLogger } from "pino";
import type {
  CollectorConfig,
  MetricDescriptor,
  MetricSample,
  OrganizationQueryResult,
  RateLimitSnapshot,
} from "@org-stats-exporter/shared";
import type { QueryExecutor } from "../github/query-executor.js";
import { buildFQName, constSample, newDescriptor, toUnixSeconds } from "./descriptors.js";

export type CollectorLogger = Pick<BaseLogger, "warn" | "debug">;

const REPO_LABELS = ["owner", "name"] as const;
const REPO_STATE_LABELS = ["owner", "name", "state"] as const;

export class OrganizationCollector {
  private executor: QueryExecutor;
  private config: CollectorConfig;
  private logger: CollectorLogger;

  private created: MetricDescriptor;
  private diskUsage: MetricDescriptor;
  private forks: MetricDescriptor;
  private issues: MetricDescriptor;
  private pullRequests: MetricDescriptor;
  private pushed: MetricDescriptor;
  private stargazers: MetricDescriptor;
  private watchers: MetricDescriptor;

  private rateLimit: MetricDescriptor;
  private rateLimitRemaining: MetricDescriptor;
  private rateLimitReset: MetricDescriptor;

  private descriptors: readonly MetricDescriptor[];

  constructor(executor: QueryExecutor, config: CollectorConfig, logger: CollectorLogger) {
    this.executor = executor;
    this.config = config;
    this.logger = logger;

    const repo = (name: string) => buildFQName(config.namespace, "repo", name);
    const rate = (name: string) => buildFQName(config.namespace, "rate_limit", name);

    this.created = newDescriptor(repo("created"), "Unix timestamp of when the repo was created", REPO_LABELS);
    this.diskUsage = newDescriptor(repo("disk_usage_kilobytes"), "Kilobytes of the repository used on disk", REPO_LABELS);
    this.forks = newDescriptor(repo("forks"), "Number of forks of the repo", REPO_LABELS);
    this.issues = newDescriptor(repo("issues"), "Number of issues with a state of open or closed", REPO_STATE_LABELS);
    this.pullRequests = newDescriptor(
      repo("pull_requests"),
      "Number of pull requests with a state of open, closed or merged",
      REPO_STATE_LABELS,
    );
    this.pushed = newDescriptor(repo("pushed"), "Unix timestamp of when the repo was last pushed to", REPO_LABELS);
    this.stargazers = newDescriptor(repo("stargazers"), "Number of users that star the repo", REPO_LABELS);
    this.watchers = newDescriptor(repo("watchers"), "Number of users that watch the repo", REPO_LABELS);

    this.rateLimit = newDescriptor(rate("limit"), "The rate limit");
    this.rateLimitRemaining = newDescriptor(rate("remaining"), "The remaining requests left until hitting the rate limit");
    this.rateLimitReset = newDescriptor(rate("reset_seconds"), "Unix timestamp when the rate limit will be reset");

    this.descriptors = Object.freeze([
      this.created,
      this.diskUsage,
      this.forks,
      this.issues,
      this.pullRequests,
      this.pushed,
      this.stargazers,
      this.watchers,
      this.rateLimit,
      this.rateLimitRemaining,
      this.rateLimitReset,
    ]);
  }

  /** Every descriptor this collector can produce samples for */
  describe(): readonly MetricDescriptor[] {
    return this.descriptors;
  }

  /** Run one collection cycle */
  async collect(): Promise<MetricSample[]> {
    const samples: MetricSample[] = [];
    let rateLimit: RateLimitSnapshot | null = null;

    for (const organization of this.config.organizations) {
      let result: OrganizationQueryResult;
      try {
        result = await this.executor.execute(
          organization,
          AbortSignal.timeout(this.config.queryTimeoutMs),
        );
      } catch (err) {
        this.logger.warn({ organization, err }, "failed to execute organization query");
        return samples;
      }

      // Rate limits are per token; the last organization's snapshot wins,
      // including a missing one
      rateLimit = result.rateLimit;

      this.collectOrganization(result, samples);
      this.logger.debug(
        { organization, repositories: result.repositories.length },
        "collected organization",
      );
    }

    if (rateLimit) {
      samples.push(
        constSample(this.rateLimit, rateLimit.limit),
        constSample(this.rateLimitRemaining, rateLimit.remaining),
        constSample(this.rateLimitReset, toUnixSeconds(rateLimit.resetAt)),
      );
    }

    return samples;
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  /** Append samples for every repository of one organization */
  private collectOrganization(result: OrganizationQueryResult, samples: MetricSample[]): void {
    const owner = result.login;

    for (const repo of result.repositories) {
      samples.push(
        constSample(this.created, toUnixSeconds(repo.createdAt), owner, repo.name),
        constSample(this.diskUsage, repo.diskUsageKb, owner, repo.name),
        constSample(this.forks, repo.forks, owner, repo.name),
        constSample(this.issues, repo.issues.open, owner, repo.name, "open"),
        constSample(this.issues, repo.issues.closed, owner, repo.name, "closed"),
        constSample(this.pullRequests, repo.pullRequests.open, owner, repo.name, "open"),
        constSample(this.pullRequests, repo.pullRequests.closed, owner, repo.name, "closed"),
        constSample(this.pullRequests, repo.pullRequests.merged, owner, repo.name, "merged"),
      );
      if (repo.pushedAt) {
        samples.push(constSample(this.pushed, toUnixSeconds(repo.pushedAt), owner, repo.name));
      }
      samples.push(
        constSample(this.stargazers, repo.stargazers, owner, repo.name),
        constSample(this.watchers, repo.watchers, owner, repo.name),
      );
    }
  }
}
