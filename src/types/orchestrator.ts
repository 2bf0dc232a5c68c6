import type { GraphStore } from "../execution/graphStore";
import type { TextCompletion } from "../model/completion";
import type { Logger } from "../utils/logger";

export type EventDetail = Record<string, unknown>;

export type OrchestratorEvent = { type: string; detail?: EventDetail };

export type EventListener = (ev: OrchestratorEvent) => void;

export type ExecutionOptions = {
  dryRun: boolean;
  maxRows: number;
};

export type SummaryOptions = {
  maxPayloadChars: number;
};

// Collaborators handed to the pipeline per call; their lifecycle belongs to the caller.
export type PipelineDeps = {
  store: GraphStore;
  completion: TextCompletion | null;
  execution: ExecutionOptions;
  summary: SummaryOptions;
  logger?: Logger;
};
