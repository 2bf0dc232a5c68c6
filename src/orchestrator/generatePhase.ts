import type { EventListener, PipelineDeps } from "../types/orchestrator";
import type { PipelineState } from "../types/pipeline";
import { generateQuery } from "../generation/generateQuery";
import { safeEmit } from "../utils/events";
import { internal } from "../utils/errors";

export async function generatePhase(params: {
  state: PipelineState;
  deps: PipelineDeps;
  onEvent?: EventListener;
}): Promise<Pick<PipelineState, "generated">> {
  const { state, deps, onEvent } = params;
  if (!state.prompt) throw internal("generatePhase requires state.prompt");
  if (state.prompt.status === "failed") return { generated: state.prompt };

  safeEmit(onEvent, { type: "generate:start" }, deps.logger);
  const started = Date.now();
  const generated = await generateQuery({
    prompt: state.prompt.value,
    question: state.question,
    completion: deps.completion,
    logger: deps.logger,
  });

  if (generated.status === "failed") {
    safeEmit(
      onEvent,
      { type: "generate:error", detail: { kind: generated.kind, message: generated.message, durationMs: Date.now() - started } },
      deps.logger
    );
    return { generated };
  }
  if (generated.value.source === "fallback") {
    safeEmit(onEvent, { type: "generate:fallback", detail: { rule: generated.value.rule } }, deps.logger);
  }
  safeEmit(
    onEvent,
    { type: "generate:done", detail: { query: generated.value.query, source: generated.value.source, durationMs: Date.now() - started } },
    deps.logger
  );
  return { generated };
}
