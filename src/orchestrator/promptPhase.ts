import type { EventListener } from "../types/orchestrator";
import { ok, type PipelineState } from "../types/pipeline";
import { buildQueryPrompt } from "../prompts/queryPrompt";
import { resolveDateFilters } from "../temporal/dateFilters";
import { safeEmit } from "../utils/events";
import type { Logger } from "../utils/logger";

export async function promptPhase(params: {
  state: PipelineState;
  now: Date;
  onEvent?: EventListener;
  logger?: Logger;
}): Promise<Pick<PipelineState, "dateFilters" | "prompt">> {
  const { state, now, onEvent, logger } = params;
  safeEmit(onEvent, { type: "prompt:start", detail: { question: state.question } }, logger);
  const started = Date.now();

  const dateFilters = resolveDateFilters(state.question, now);
  const prompt = buildQueryPrompt({ question: state.question, dateFilters });

  safeEmit(
    onEvent,
    { type: "prompt:done", detail: { periods: Object.keys(dateFilters), chars: prompt.length, durationMs: Date.now() - started } },
    logger
  );
  return { dateFilters, prompt: ok(prompt) };
}
