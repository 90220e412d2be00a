/**
 * Configuration — read once from the environment at startup.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { ExporterConfig } from "@org-stats-exporter/shared";
import { ConfigError } from "./errors.js";

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_NAMESPACE = "github";
export const DEFAULT_QUERY_TIMEOUT_MS = 5_000;
export const DEFAULT_WEB_ADDR = ":9276";
export const DEFAULT_WEB_PATH = "/metrics";
export const DEFAULT_GITHUB_API_URL = "https://api.github.com";

/** Paths served by other routes */
const RESERVED_PATHS = ["/health", "/health/"];

// ---------------------------------------------------------------------------
// Environment schema
// ---------------------------------------------------------------------------

export const ExporterEnv = Type.Object({
  GITHUB_TOKEN: Type.String({ minLength: 1 }),
  ORGS: Type.String({ minLength: 1 }),
  DEBUG: Type.Optional(Type.String()),
  WEB_ADDR: Type.Optional(Type.String()),
  WEB_PATH: Type.Optional(Type.String({ pattern: "^(/.*)?$" })),
  GITHUB_API_URL: Type.Optional(Type.String()),
  PROCESS_METRICS: Type.Optional(Type.String()),
  VERSION: Type.Optional(Type.String()),
  REVISION: Type.Optional(Type.String()),
  BUILD_DATE: Type.Optional(Type.String()),
});

export type ExporterEnv = Static<typeof ExporterEnv>;

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/** Split "a, b,,c" into ["a", "b", "c"] */
export function parseOrganizations(value: string): string[] {
  return value
    .split(",")
    .map((org) => org.trim())
    .filter((org) => org !== "");
}

/** Parse "host:port" (host may be empty or a bracketed IPv6 address) */
export function parseListenAddress(addr: string): { host: string; port: number } {
  const sep = addr.lastIndexOf(":");
  if (sep === -1) {
    throw new ConfigError(`WEB_ADDR must be "host:port", got "${addr}"`);
  }

  const rawHost = addr.slice(0, sep);
  const rawPort = addr.slice(sep + 1);
  const port = Number(rawPort);
  if (!/^\d+$/.test(rawPort) || port > 65_535) {
    throw new ConfigError(`WEB_ADDR has an invalid port: "${rawPort}"`);
  }

  const host = rawHost.replace(/^\[(.*)\]$/, "$1");
  return { host: host === "" ? "0.0.0.0" : host, port };
}

function parseFlag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === "") return fallback;
  return ["1", "true", "yes", "on"].includes(value.toLowerCase());
}

/**
 * Build the exporter configuration from environment variables.
 * Throws ConfigError when a required variable is missing or invalid.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ExporterConfig {
  if (!Value.Check(ExporterEnv, env)) {
    const first = Value.Errors(ExporterEnv, env).First();
    const variable = first?.path.replace(/^\//, "") || "environment";
    throw new ConfigError(`${variable}: ${first?.message ?? "invalid value"}`);
  }

  const organizations = parseOrganizations(env.ORGS);
  if (organizations.length === 0) {
    throw new ConfigError("ORGS must name at least one organization");
  }

  const metricsPath = env.WEB_PATH || DEFAULT_WEB_PATH;
  if (RESERVED_PATHS.includes(metricsPath)) {
    throw new ConfigError(`WEB_PATH: "${metricsPath}" is reserved for the health route`);
  }

  const { host, port } = parseListenAddress(env.WEB_ADDR || DEFAULT_WEB_ADDR);

  return Object.freeze({
    namespace: DEFAULT_NAMESPACE,
    organizations: Object.freeze(organizations),
    queryTimeoutMs: DEFAULT_QUERY_TIMEOUT_MS,
    githubToken: env.GITHUB_TOKEN,
    githubApiUrl: (env.GITHUB_API_URL || DEFAULT_GITHUB_API_URL).replace(/\/+$/, ""),
    listenHost: host,
    listenPort: port,
    metricsPath,
    debug: parseFlag(env.DEBUG, false),
    processMetrics: parseFlag(env.PROCESS_METRICS, true),
    build: Object.freeze({
      version: env.VERSION || "unknown",
      revision: env.REVISION || "unknown",
      buildDate: env.BUILD_DATE || "unknown",
    }),
  });
}
