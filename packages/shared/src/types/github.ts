/** Issue states counted per repository */
export type IssueState = "open" | "closed";

/** Pull request states counted per repository */
export type PullRequestState = "open" | "closed" | "merged";

/** Statistics for a single repository, decoded from the organization query */
export interface RepositoryStats {
  name: string;
  /** Disk usage as reported by GitHub (kilobytes) */
  diskUsageKb: number;
  createdAt: Date;
  /** null for repositories that were never pushed to */
  pushedAt: Date | null;
  forks: number;
  stargazers: number;
  watchers: number;
  issues: Record<IssueState, number>;
  pullRequests: Record<PullRequestState, number>;
}

/** API rate limit status of the token at query time */
export interface RateLimitSnapshot {
  limit: number;
  remaining: number;
  resetAt: Date;
}

/** Decoded result of one organization query */
export interface OrganizationQueryResult {
  login: string;
  /** First page of repositories only (see ORGANIZATION_PAGE_SIZE) */
  repositories: RepositoryStats[];
  rateLimit: RateLimitSnapshot | null;
}
