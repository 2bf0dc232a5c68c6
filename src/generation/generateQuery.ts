import { isBackendUnreachable, type TextCompletion } from "../model/completion";
import { failed, ok, type GeneratedQuery, type StageResult } from "../types/pipeline";
import type { Logger } from "../utils/logger";
import { messageOf } from "../utils/errors";
import { extractCypherQuery } from "./extractQuery";
import { fallbackQuery } from "./fallbackRules";

function fromFallback(question: string): StageResult<GeneratedQuery> {
  const { rule, query } = fallbackQuery(question);
  return ok({ query, source: "fallback", rule });
}

export async function generateQuery(params: {
  prompt: string;
  question: string;
  completion: TextCompletion | null;
  logger?: Logger;
}): Promise<StageResult<GeneratedQuery>> {
  const { prompt, question, completion, logger } = params;

  if (!completion) {
    logger?.warn("generate: no model backend configured, using fallback heuristic");
    return fromFallback(question);
  }

  let rawOutput: string;
  try {
    rawOutput = await completion.complete({ agent: "query-generator", prompt });
  } catch (e) {
    const message = messageOf(e);
    if (isBackendUnreachable(e)) {
      logger?.warn(`generate: model backend unreachable (${message}), using fallback heuristic`);
      return fromFallback(question);
    }
    logger?.error(`generate: model call failed: ${message}`);
    return failed("generate", "unexpected", `Error calling the language model: ${message}`);
  }

  const query = extractCypherQuery(rawOutput);
  if (!query) {
    return failed("generate", "empty_query", "The language model returned no query.");
  }
  logger?.debug(`generate: model query=${query}`);
  return ok({ query, source: "model", rawOutput });
}
