import type { EventListener, OrchestratorEvent } from "../types/orchestrator";
import { formatEventMessage } from "../i18n/messages";
import { appendAnalysisLog, type Logger } from "./logger";

// Emits event to callback and appends a line to the analysis log.
// A throwing listener never interrupts the pipeline.
export function safeEmit(cb: EventListener | undefined, ev: OrchestratorEvent, logger?: Logger) {
  if (typeof cb === "function") {
    try {
      cb(ev);
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      if (logger) logger.warn(`[event] listener failed type=${ev.type} message=${msg}`);
      else appendAnalysisLog(`[event] listener failed type=${ev.type} message=${msg}`);
    }
  }
  const detail = ev.detail ? JSON.stringify(ev.detail) : "";
  const line = `[event] ${ev.type}${detail ? ` detail=${detail}` : ""}`;
  if (logger) logger.debug(line);
  else appendAnalysisLog(line);
}

// Convenience: render a human message for UI from event type/detail.
export function renderMessage(ev: OrchestratorEvent): string {
  return formatEventMessage(ev.type, ev.detail);
}
