import type { DateFilterSet } from "../temporal/dateFilters";

export type StageName = "prompt" | "generate" | "execute" | "summarize";

export type FailureKind =
  | "backend_unavailable"
  | "malformed_query"
  | "unsafe_query"
  | "permission_denied"
  | "empty_query"
  | "unexpected";

export type StageFailure = {
  status: "failed";
  stage: StageName;
  kind: FailureKind;
  message: string;
};

export type StageResult<T> = { status: "ok"; value: T } | StageFailure;

export function ok<T>(value: T): StageResult<T> {
  return { status: "ok", value };
}

export function failed(stage: StageName, kind: FailureKind, message: string): StageFailure {
  return { status: "failed", stage, kind, message };
}

export function describeFailure(f: StageFailure): string {
  return `Error: ${f.stage} failed (${f.kind}): ${f.message}`;
}

export type QueryRow = Record<string, unknown>;

export type GeneratedQuery = {
  query: string;
  source: "model" | "fallback";
  rawOutput?: string;
  rule?: string;
};

export type QueryExecution = {
  rows: QueryRow[];
  payload: string;
  truncated: boolean;
  validated: boolean;
};

export type ResultSummary = {
  text: string;
  source: "model" | "fallback" | "failure";
};

export type PipelineState = {
  question: string;
  dateFilters?: DateFilterSet;
  prompt?: StageResult<string>;
  generated?: StageResult<GeneratedQuery>;
  execution?: StageResult<QueryExecution>;
  summary?: StageResult<ResultSummary>;
};
