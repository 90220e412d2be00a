/**
 * The organization statistics query and the decoding of its response.
 *
 * State-filtered counts are requested under fixed aliases; the alias maps
 * below are the only place the GraphQL field names are tied to a
 * (metric, state) pair.
 */

import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type {
  IssueState,
  OrganizationQueryResult,
  PullRequestState,
  RepositoryStats,
} from "@org-stats-exporter/shared";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Repositories fetched per organization. Only the first page is read. */
export const ORGANIZATION_PAGE_SIZE = 100;

export const ISSUE_STATE_ALIASES = {
  open: "issuesOpen",
  closed: "issuesClosed",
} as const satisfies Record<IssueState, string>;

export const PULL_REQUEST_STATE_ALIASES = {
  open: "pullRequestsOpen",
  closed: "pullRequestsClosed",
  merged: "pullRequestsMerged",
} as const satisfies Record<PullRequestState, string>;

// ---------------------------------------------------------------------------
// Query
// ---------------------------------------------------------------------------

function stateCountFields(field: string, aliases: Record<string, string>): string[] {
  return Object.entries(aliases).map(
    ([state, alias]) => `${alias}: ${field}(states: ${state.toUpperCase()}) { totalCount }`,
  );
}

/** Build the query text; `$organization` is the only variable */
export function buildOrganizationQuery(pageSize: number = ORGANIZATION_PAGE_SIZE): string {
  const repositoryFields = [
    "name",
    "diskUsage",
    "createdAt",
    "pushedAt",
    "forks { totalCount }",
    "stargazers { totalCount }",
    "watchers { totalCount }",
    ...stateCountFields("issues", ISSUE_STATE_ALIASES),
    ...stateCountFields("pullRequests", PULL_REQUEST_STATE_ALIASES),
  ];

  return [
    "query ($organization: String!) {",
    "  organization(login: $organization) {",
    "    login",
    `    repositories(first: ${pageSize}) {`,
    "      nodes {",
    ...repositoryFields.map((field) => `        ${field}`),
    "      }",
    "    }",
    "  }",
    "  rateLimit {",
    "    limit",
    "    remaining",
    "    resetAt",
    "  }",
    "}",
  ].join("\n");
}

export const ORGANIZATION_QUERY = buildOrganizationQuery();

// ---------------------------------------------------------------------------
// Response schema
// ---------------------------------------------------------------------------

const Count = Type.Object({ totalCount: Type.Integer({ minimum: 0 }) });

const Nullable = <T extends TSchema>(schema: T) => Type.Union([schema, Type.Null()]);

const RepositoryNode = Type.Object({
  name: Type.String(),
  diskUsage: Nullable(Type.Integer()),
  createdAt: Type.String(),
  pushedAt: Nullable(Type.String()),
  forks: Count,
  stargazers: Count,
  watchers: Count,
  [ISSUE_STATE_ALIASES.open]: Count,
  [ISSUE_STATE_ALIASES.closed]: Count,
  [PULL_REQUEST_STATE_ALIASES.open]: Count,
  [PULL_REQUEST_STATE_ALIASES.closed]: Count,
  [PULL_REQUEST_STATE_ALIASES.merged]: Count,
});

type RepositoryNode = Static<typeof RepositoryNode>;

export const OrganizationResponse = Type.Object({
  organization: Type.Object({
    login: Type.String(),
    repositories: Type.Object({
      nodes: Type.Array(RepositoryNode),
    }),
  }),
  rateLimit: Nullable(
    Type.Object({
      limit: Type.Integer(),
      remaining: Type.Integer(),
      resetAt: Type.String(),
    }),
  ),
});

export type OrganizationResponse = Static<typeof OrganizationResponse>;

// ---------------------------------------------------------------------------
// Decoding
// ---------------------------------------------------------------------------

function parseDateTime(value: string, path: string): Date {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new Error(`unexpected response at ${path}: invalid date-time "${value}"`);
  }
  return date;
}

function decodeRepository(node: RepositoryNode, index: number): RepositoryStats {
  const path = `/organization/repositories/nodes/${index}`;
  return {
    name: node.name,
    diskUsageKb: node.diskUsage ?? 0,
    createdAt: parseDateTime(node.createdAt, `${path}/createdAt`),
    pushedAt: node.pushedAt === null ? null : parseDateTime(node.pushedAt, `${path}/pushedAt`),
    forks: node.forks.totalCount,
    stargazers: node.stargazers.totalCount,
    watchers: node.watchers.totalCount,
    issues: {
      open: node[ISSUE_STATE_ALIASES.open].totalCount,
      closed: node[ISSUE_STATE_ALIASES.closed].totalCount,
    },
    pullRequests: {
      open: node[PULL_REQUEST_STATE_ALIASES.open].totalCount,
      closed: node[PULL_REQUEST_STATE_ALIASES.closed].totalCount,
      merged: node[PULL_REQUEST_STATE_ALIASES.merged].totalCount,
    },
  };
}

/**
 * Validate a GraphQL `data` payload and convert it to an
 * OrganizationQueryResult. Throws on any shape mismatch.
 */
export function decodeOrganizationResponse(data: unknown): OrganizationQueryResult {
  if (!Value.Check(OrganizationResponse, data)) {
    const first = Value.Errors(OrganizationResponse, data).First();
    throw new Error(
      first
        ? `unexpected response at ${first.path || "/"}: ${first.message}`
        : "unexpected response",
    );
  }

  const { organization, rateLimit } = data;
  return {
    login: organization.login,
    repositories: organization.repositories.nodes.map(decodeRepository),
    rateLimit: rateLimit && {
      limit: rateLimit.limit,
      remaining: rateLimit.remaining,
      resetAt: parseDateTime(rateLimit.resetAt, "/rateLimit/resetAt"),
    },
  };
}
