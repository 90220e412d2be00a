import { describe, it, expect, vi } from "vitest";
import { PrometheusExporter, toRegistry } from "./prometheus-exporter.js";
import { OrganizationCollector } from "./organization-collector.js";
import { constSample, newDescriptor } from "./descriptors.js";
import { QueryExecutionError } from "../errors.js";
import type { QueryExecutor } from "../github/query-executor.js";
import type { OrganizationQueryResult } from "@org-stats-exporter/shared";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const ACME: OrganizationQueryResult = {
  login: "acme",
  repositories: [
    {
      name: "widget",
      diskUsageKb: 42,
      createdAt: new Date("2020-03-01T10:00:00Z"),
      pushedAt: new Date("2024-05-20T08:30:00Z"),
      forks: 3,
      stargazers: 11,
      watchers: 4,
      issues: { open: 5, closed: 7 },
      pullRequests: { open: 1, closed: 2, merged: 9 },
    },
  ],
  rateLimit: { limit: 5000, remaining: 4990, resetAt: new Date("2024-05-20T09:00:00Z") },
};

function createExporter(
  organizations: string[],
  results: Record<string, OrganizationQueryResult>,
  processMetrics = false,
) {
  const executor: QueryExecutor = {
    execute: async (organization) => {
      const result = results[organization];
      if (!result) throw new QueryExecutionError(organization, new Error("HTTP 502"));
      return result;
    },
  };
  const collector = new OrganizationCollector(
    executor,
    { namespace: "github", organizations, queryTimeoutMs: 5_000 },
    { warn: vi.fn(), debug: vi.fn() },
  );
  return new PrometheusExporter(collector, { processMetrics });
}

// ---------------------------------------------------------------------------
// toRegistry
// ---------------------------------------------------------------------------

describe("toRegistry", () => {
  it("writes labeled and unlabeled samples", async () => {
    const issues = newDescriptor("github_repo_issues", "Issues", ["owner", "name", "state"]);
    const limit = newDescriptor("github_rate_limit_limit", "The rate limit");

    const text = await toRegistry([
      constSample(issues, 5, "acme", "widget", "open"),
      constSample(issues, 7, "acme", "widget", "closed"),
      constSample(limit, 5000),
    ]).metrics();

    expect(text.split("\n")).toEqual(
      expect.arrayContaining([
        "# HELP github_repo_issues Issues",
        "# TYPE github_repo_issues gauge",
        'github_repo_issues{owner="acme",name="widget",state="open"} 5',
        'github_repo_issues{owner="acme",name="widget",state="closed"} 7',
        "# HELP github_rate_limit_limit The rate limit",
        "# TYPE github_rate_limit_limit gauge",
        "github_rate_limit_limit 5000",
      ]),
    );
  });

  it("only registers families that have samples", async () => {
    const forks = newDescriptor("github_repo_forks", "Forks", ["owner", "name"]);
    const registry = toRegistry([constSample(forks, 1, "acme", "widget")]);

    expect(registry.getMetricsAsArray().map((m) => m.name)).toEqual(["github_repo_forks"]);
  });
});

// ---------------------------------------------------------------------------
// PrometheusExporter
// ---------------------------------------------------------------------------

describe("PrometheusExporter", () => {
  it("reports the Prometheus text content type", () => {
    const exporter = createExporter([], {});
    expect(exporter.contentType).toBe("text/plain; version=0.0.4; charset=utf-8");
  });

  it("renders one scrape", async () => {
    const exporter = createExporter(["acme"], { acme: ACME });

    const lines = (await exporter.render()).split("\n");

    expect(lines).toEqual(
      expect.arrayContaining([
        'github_repo_created{owner="acme",name="widget"} 1583056800',
        'github_repo_disk_usage_kilobytes{owner="acme",name="widget"} 42',
        'github_repo_forks{owner="acme",name="widget"} 3',
        'github_repo_issues{owner="acme",name="widget",state="open"} 5',
        'github_repo_issues{owner="acme",name="widget",state="closed"} 7',
        'github_repo_pull_requests{owner="acme",name="widget",state="merged"} 9',
        'github_repo_pushed{owner="acme",name="widget"} 1716193800',
        'github_repo_stargazers{owner="acme",name="widget"} 11',
        'github_repo_watchers{owner="acme",name="widget"} 4',
        "github_rate_limit_limit 5000",
        "github_rate_limit_remaining 4990",
        "github_rate_limit_reset_seconds 1716195600",
      ]),
    );
  });

  it("omits rate-limit gauges when a query fails", async () => {
    const exporter = createExporter(["acme", "broken"], { acme: ACME });

    const lines = (await exporter.render()).split("\n");

    expect(lines).toContain('github_repo_forks{owner="acme",name="widget"} 3');
    expect(lines.filter((line) => line.startsWith("github_rate_limit"))).toEqual([]);
  });

  it("does not carry samples over between scrapes", async () => {
    const results: Record<string, OrganizationQueryResult> = { acme: ACME };
    const exporter = createExporter(["acme"], results);

    await exporter.render();
    results.acme = { ...ACME, repositories: [{ ...ACME.repositories[0], name: "gadget" }] };
    const lines = (await exporter.render()).split("\n");

    expect(lines).toContain('github_repo_forks{owner="acme",name="gadget"} 3');
    expect(lines.filter((line) => line.includes('name="widget"'))).toEqual([]);
  });

  it("includes process metrics when enabled", async () => {
    const exporter = createExporter(["acme"], { acme: ACME }, true);

    const lines = (await exporter.render()).split("\n");

    expect(lines).toContain("# TYPE process_cpu_user_seconds_total counter");
    expect(lines).toContain('github_repo_forks{owner="acme",name="widget"} 3');
  });
});
