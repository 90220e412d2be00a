/**
 * Error types raised by the exporter.
 *
 * Only QueryExecutionError is handled at run time (by the collector);
 * the others indicate a broken deployment or a programming error.
 */

/** An organization query failed: transport, auth, timeout or bad payload */
export class QueryExecutionError extends Error {
  readonly organization: string;

  constructor(organization: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`query for organization "${organization}" failed: ${reason}`, { cause });
    this.name = "QueryExecutionError";
    this.organization = organization;
  }
}

/** The environment does not describe a usable configuration */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** A sample was built with the wrong number of label values */
export class LabelArityError extends Error {
  constructor(metric: string, expected: number, actual: number) {
    super(`metric "${metric}" expects ${expected} label value(s), got ${actual}`);
    this.name = "LabelArityError";
  }
}
