import type { EventListener, PipelineDeps } from "../types/orchestrator";
import type { PipelineState } from "../types/pipeline";
import { summarizeResults } from "../summary/summarize";
import { safeEmit } from "../utils/events";
import { internal } from "../utils/errors";

export async function summarizePhase(params: {
  state: PipelineState;
  deps: PipelineDeps;
  onEvent?: EventListener;
}): Promise<Pick<PipelineState, "summary">> {
  const { state, deps, onEvent } = params;
  if (!state.execution) throw internal("summarizePhase requires state.execution");

  safeEmit(
    onEvent,
    { type: "summarize:start", detail: { rows: state.execution.status === "ok" ? state.execution.value.rows.length : 0 } },
    deps.logger
  );
  const summary = await summarizeResults({
    question: state.question,
    execution: state.execution,
    completion: deps.completion,
    options: deps.summary,
    logger: deps.logger,
  });
  return { summary };
}
