import { failed, ok, type GeneratedQuery, type QueryExecution, type QueryRow, type StageResult } from "../types/pipeline";
import type { ExecutionOptions } from "../types/orchestrator";
import type { Logger } from "../utils/logger";
import { messageOf } from "../utils/errors";
import { classifyGraphError, type GraphStore } from "./graphStore";
import { checkReadOnly } from "./queryGuard";

export async function executeQuery(params: {
  generated: StageResult<GeneratedQuery>;
  store: GraphStore;
  options: ExecutionOptions;
  logger?: Logger;
}): Promise<StageResult<QueryExecution>> {
  const { generated, store, options, logger } = params;
  if (generated.status === "failed") return generated;

  const query = generated.value.query.trim();
  if (!query) {
    return failed("execute", "empty_query", "No usable query was generated.");
  }

  const offending = checkReadOnly(query);
  if (offending) {
    logger?.warn(`execute: rejected query with write clause ${offending}`);
    return failed("execute", "unsafe_query", `Query rejected: ${offending} is not allowed in read-only mode.`);
  }

  if (options.dryRun) {
    try {
      await store.explain(query);
    } catch (e) {
      const kind = classifyGraphError(e);
      logger?.warn(`execute: dry-run validation failed kind=${kind} message=${messageOf(e)}`);
      return failed("execute", kind, `Cypher validation error: ${messageOf(e)}`);
    }
  }

  let rows: QueryRow[];
  try {
    rows = await store.run(query);
  } catch (e) {
    const kind = classifyGraphError(e);
    logger?.error(`execute: query failed kind=${kind} message=${messageOf(e)}`);
    return failed("execute", kind, `Cypher query error: ${messageOf(e)}`);
  }

  const truncated = rows.length > options.maxRows;
  const kept = truncated ? rows.slice(0, options.maxRows) : rows;
  return ok({ rows: kept, payload: JSON.stringify(kept), truncated, validated: options.dryRun });
}
