// Event message templates for progress output.
// Keep content concise; callers render these strings as-is.

import type { EventDetail } from "../types/orchestrator";

type Template = string | ((detail: EventDetail) => string);

function num(v: unknown): number | undefined {
  return typeof v === "number" && Number.isFinite(v) ? v : undefined;
}

function str(v: unknown): string {
  return typeof v === "string" ? v : "";
}

const templates: Record<string, Record<string, Template>> = {
  en: {
    "prompt:start": "Reading the question…",
    "prompt:done": ({ periods }) => {
      const list = Array.isArray(periods) ? periods.filter((p): p is string => typeof p === "string") : [];
      return list.length ? `Prompt ready (date filters: ${list.join(", ")}).` : "Prompt ready.";
    },
    "generate:start": "Generating Cypher query…",
    "generate:fallback": ({ rule }) => `Model unavailable, using canned query${str(rule) ? ` (${str(rule)})` : ""}.`,
    "generate:done": ({ query }) => `Query: ${str(query).slice(0, 160)}`,
    "generate:error": ({ message }) => `Query generation failed: ${str(message) || "unknown"}`,
    "execute:start": "Executing query…",
    "execute:done": ({ rows }) => `Query done${num(rows) !== undefined ? ` (${num(rows)} rows)` : ""}.`,
    "execute:error": ({ kind, message }) => `Query failed (${str(kind) || "unknown"}): ${str(message)}`,
    "summarize:start": "Summarizing results…",
    final: "Answer is ready.",
    error: ({ message }) => `Error: ${str(message) || "unknown"}`,
  },
};

function getLocale(): string {
  const v = String(process.env.LOCALE || "en").toLowerCase();
  return templates[v] ? v : "en";
}

export function formatEventMessage(type?: string, detail?: EventDetail): string {
  const dict = templates[getLocale()] ?? templates.en;
  const tmpl = type ? dict[type] : undefined;
  if (!tmpl) return "";
  if (typeof tmpl === "function") return tmpl(detail ?? {});
  return tmpl;
}
