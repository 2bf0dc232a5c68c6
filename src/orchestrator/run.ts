import type { EventListener, PipelineDeps } from "../types/orchestrator";
import { describeFailure, failed, type PipelineState, type StageName } from "../types/pipeline";
import { fallbackSummary } from "../summary/summarize";
import { safeEmit } from "../utils/events";
import { badRequest, CODES, isAppError, messageOf } from "../utils/errors";
import { promptPhase } from "./promptPhase";
import { generatePhase } from "./generatePhase";
import { executePhase } from "./executePhase";
import { summarizePhase } from "./summarizePhase";

export type PipelineOutcome = {
  result: string;
  state: PipelineState;
};

function failedUpdate(stage: StageName, message: string): Partial<PipelineState> {
  const f = failed(stage, "unexpected", message);
  switch (stage) {
    case "prompt":
      return { prompt: f };
    case "generate":
      return { generated: f };
    case "execute":
      return { execution: f };
    case "summarize":
      return { summary: f };
  }
}

// Runs one phase; anything it throws becomes a failed result for that stage, except defects.
async function guarded(
  stage: StageName,
  phase: () => Promise<Partial<PipelineState>>,
  deps: PipelineDeps
): Promise<Partial<PipelineState>> {
  try {
    return await phase();
  } catch (e) {
    if (isAppError(e) && e.code === CODES.internal) throw e;
    deps.logger?.error(`pipeline: ${stage} phase threw: ${messageOf(e)}`);
    return failedUpdate(stage, messageOf(e));
  }
}

function finalText(state: PipelineState): string {
  const { summary, execution } = state;
  if (!summary) return "Error: no summary was produced.";
  if (summary.status === "ok") return summary.value.text;
  if (execution?.status === "ok") {
    return `${fallbackSummary(execution.value)}\n\nNote: ${describeFailure(summary)}`;
  }
  return describeFailure(summary);
}

export async function runPipeline(params: {
  question: string;
  deps: PipelineDeps;
  onEvent?: EventListener;
  now?: Date;
}): Promise<PipelineOutcome> {
  const { question, deps, onEvent, now = new Date() } = params;
  if (typeof question !== "string" || !question.trim()) {
    throw badRequest("question is required", { required: ["question"], next: "Pass a non-empty question string." });
  }

  let state: PipelineState = { question: question.trim() };
  const started = Date.now();

  state = { ...state, ...(await guarded("prompt", () => promptPhase({ state, now, onEvent, logger: deps.logger }), deps)) };
  state = { ...state, ...(await guarded("generate", () => generatePhase({ state, deps, onEvent }), deps)) };
  state = { ...state, ...(await guarded("execute", () => executePhase({ state, deps, onEvent }), deps)) };
  state = { ...state, ...(await guarded("summarize", () => summarizePhase({ state, deps, onEvent }), deps)) };

  const result = finalText(state);
  safeEmit(onEvent, { type: "final", detail: { reply: result, durationMs: Date.now() - started } }, deps.logger);
  return { result, state };
}
