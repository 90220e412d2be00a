/**
 * GitHub Module
 *
 * The executor that sends the organization query. Independent of the web
 * framework and of the metric layer.
 */

export { GraphqlQueryExecutor } from "./query-executor.js";
export type { QueryExecutor, GraphqlQueryExecutorOptions } from "./query-executor.js";
