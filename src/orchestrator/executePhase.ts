import type { EventListener, PipelineDeps } from "../types/orchestrator";
import type { PipelineState } from "../types/pipeline";
import { executeQuery } from "../execution/executeQuery";
import { safeEmit } from "../utils/events";
import { internal } from "../utils/errors";

export async function executePhase(params: {
  state: PipelineState;
  deps: PipelineDeps;
  onEvent?: EventListener;
}): Promise<Pick<PipelineState, "execution">> {
  const { state, deps, onEvent } = params;
  if (!state.generated) throw internal("executePhase requires state.generated");

  safeEmit(onEvent, { type: "execute:start", detail: { dryRun: deps.execution.dryRun } }, deps.logger);
  const started = Date.now();
  const execution = await executeQuery({
    generated: state.generated,
    store: deps.store,
    options: deps.execution,
    logger: deps.logger,
  });

  if (execution.status === "failed") {
    safeEmit(
      onEvent,
      {
        type: "execute:error",
        detail: { stage: execution.stage, kind: execution.kind, message: execution.message, durationMs: Date.now() - started },
      },
      deps.logger
    );
  } else {
    safeEmit(
      onEvent,
      {
        type: "execute:done",
        detail: { rows: execution.value.rows.length, truncated: execution.value.truncated, durationMs: Date.now() - started },
      },
      deps.logger
    );
  }
  return { execution };
}
