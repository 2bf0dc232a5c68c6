import { runPipeline } from "../orchestrator/run";
import type { EventListener, PipelineDeps } from "../types/orchestrator";
import { createLogger, type Logger } from "../utils/logger";

export interface QuestionAnswerer {
  runQuery(question: string, opts?: { onEvent?: EventListener; traceId?: string }): Promise<string>;
}

// Entry point used by the HTTP API and the CLI.
export class QueryService implements QuestionAnswerer {
  constructor(private readonly deps: Omit<PipelineDeps, "logger">) {}

  async runQuery(question: string, opts: { onEvent?: EventListener; traceId?: string } = {}): Promise<string> {
    const logger: Logger = createLogger(opts.traceId);
    logger.info(`query:start question=${JSON.stringify(question)}`);
    const started = Date.now();
    const { result, state } = await runPipeline({
      question,
      deps: { ...this.deps, logger },
      onEvent: opts.onEvent,
    });
    const source = state.summary?.status === "ok" ? state.summary.value.source : "failure";
    logger.info(`query:done durationMs=${Date.now() - started} summary=${source}`);
    return result;
  }
}
