/**
 * Query Executor — runs the organization query against the GitHub GraphQL API.
 *
 * One call, one organization, no retries. Every failure is reported as a
 * QueryExecutionError so the collector only has to handle one kind.
 */

import { graphql } from "@octokit/graphql";
import type { OrganizationQueryResult } from "@org-stats-exporter/shared";
import { QueryExecutionError } from "../errors.js";
import { ORGANIZATION_QUERY, decodeOrganizationResponse } from "./organization-query.js";

/** Executes the organization query; implemented by fakes in tests */
export interface QueryExecutor {
  execute(organization: string, signal: AbortSignal): Promise<OrganizationQueryResult>;
}

export interface GraphqlQueryExecutorOptions {
  token: string;
  /** API base URL (default: https://api.github.com) */
  baseUrl?: string;
  userAgent?: string;
}

export class GraphqlQueryExecutor implements QueryExecutor {
  private client: typeof graphql;

  constructor(options: GraphqlQueryExecutorOptions) {
    this.client = graphql.defaults({
      baseUrl: options.baseUrl ?? "https://api.github.com",
      headers: {
        authorization: `token ${options.token}`,
        "user-agent": options.userAgent ?? "org-stats-exporter",
      },
    });
  }

  async execute(organization: string, signal: AbortSignal): Promise<OrganizationQueryResult> {
    try {
      const data = await this.client<unknown>(ORGANIZATION_QUERY, {
        organization,
        request: { signal },
      });
      return decodeOrganizationResponse(data);
    } catch (err) {
      throw new QueryExecutionError(organization, err);
    }
  }
}
