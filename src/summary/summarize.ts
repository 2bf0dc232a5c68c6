import { isBackendUnreachable, type TextCompletion } from "../model/completion";
import {
  describeFailure,
  failed,
  ok,
  type QueryExecution,
  type QueryRow,
  type ResultSummary,
  type StageResult,
} from "../types/pipeline";
import type { SummaryOptions } from "../types/orchestrator";
import type { Logger } from "../utils/logger";
import { messageOf } from "../utils/errors";

const FALLBACK_ROW_LIMIT = 10;

function formatCell(v: unknown): string {
  if (v === null || v === undefined) return "null";
  if (typeof v === "string") return v;
  return JSON.stringify(v);
}

export function fallbackSummary(execution: QueryExecution): string {
  const { rows, truncated } = execution;
  if (rows.length === 0) return "The query returned no results.";
  const lines = [`The query returned ${rows.length} row(s)${truncated ? " (truncated)" : ""}:`];
  for (const row of rows.slice(0, FALLBACK_ROW_LIMIT)) {
    lines.push(`- ${formatRow(row)}`);
  }
  if (rows.length > FALLBACK_ROW_LIMIT) {
    lines.push(`- … ${rows.length - FALLBACK_ROW_LIMIT} more`);
  }
  return lines.join("\n");
}

function formatRow(row: QueryRow): string {
  return Object.entries(row)
    .map(([k, v]) => `${k}: ${formatCell(v)}`)
    .join(", ");
}

export function buildSummaryPrompt(question: string, execution: QueryExecution, maxChars: number): string {
  const payloadTruncated = execution.payload.length > maxChars;
  const snippet = payloadTruncated ? execution.payload.slice(0, maxChars) : execution.payload;
  const lines = [
    "Summarize the following graph query results and describe them in a descriptive way.",
    `QUESTION=${question}`,
    `ROW_COUNT=${execution.rows.length}`,
  ];
  if (payloadTruncated || execution.truncated) lines.push("RESULTS_TRUNCATED=true");
  lines.push(`RESULTS_JSON=${snippet}`);
  return lines.join("\n");
}

export async function summarizeResults(params: {
  question: string;
  execution: StageResult<QueryExecution>;
  completion: TextCompletion | null;
  options: SummaryOptions;
  logger?: Logger;
}): Promise<StageResult<ResultSummary>> {
  const { question, execution, completion, options, logger } = params;

  if (execution.status === "failed") {
    return ok({ text: describeFailure(execution), source: "failure" });
  }

  if (!completion) {
    return ok({ text: fallbackSummary(execution.value), source: "fallback" });
  }

  try {
    const text = await completion.complete({
      agent: "result-summarizer",
      prompt: buildSummaryPrompt(question, execution.value, options.maxPayloadChars),
    });
    if (text.trim()) return ok({ text: text.trim(), source: "model" });
    logger?.warn("summarize: model returned no content, using fallback summary");
    return ok({ text: fallbackSummary(execution.value), source: "fallback" });
  } catch (e) {
    const message = messageOf(e);
    if (isBackendUnreachable(e)) {
      logger?.warn(`summarize: model backend unreachable (${message}), using fallback summary`);
      return ok({ text: fallbackSummary(execution.value), source: "fallback" });
    }
    logger?.error(`summarize: model call failed: ${message}`);
    return failed("summarize", "unexpected", `Summarizer error: ${message}`);
  }
}
