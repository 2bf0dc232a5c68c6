import { extractAllTextOutput, OpenAIProvider, Runner } from "@openai/agents";
import { buildAgent } from "../agents/builders";
import { errorField } from "../utils/errors";
import type { AgentName } from "./resolveModels";

export type CompletionRequest = {
  agent: AgentName;
  prompt: string;
};

// Text-completion boundary: one prompt in, generated text out; throws when the backend fails.
export interface TextCompletion {
  complete(request: CompletionRequest): Promise<string>;
}

export type AgentsCompletionOptions = {
  baseURL?: string;
  apiKey?: string;
};

const CONNECTION_CODES = new Set(["ECONNREFUSED", "ECONNRESET", "ENOTFOUND", "EAI_AGAIN", "ETIMEDOUT", "EHOSTUNREACH", "UND_ERR_CONNECT_TIMEOUT"]);
const CONNECTION_ERROR_NAMES = new Set(["APIConnectionError", "APIConnectionTimeoutError", "FetchError"]);

/**
 * True when the error means the model backend could not be reached at all
 * (refused, DNS failure, reset, connect timeout), as opposed to a failed generation.
 */
export function isBackendUnreachable(err: unknown): boolean {
  let current: unknown = err;
  for (let depth = 0; depth < 4 && current; depth += 1) {
    const code = errorField(current, "code");
    if (typeof code === "string" && CONNECTION_CODES.has(code)) return true;
    const name = current instanceof Error ? current.name : errorField(current, "name");
    if (typeof name === "string" && CONNECTION_ERROR_NAMES.has(name)) return true;
    if (current instanceof Error && /fetch failed|connection error/i.test(current.message)) return true;
    current = errorField(current, "cause");
  }
  return false;
}

export class AgentsTextCompletion implements TextCompletion {
  private readonly runner: Runner;

  constructor(opts: AgentsCompletionOptions) {
    const provider = new OpenAIProvider({
      baseURL: opts.baseURL,
      // OpenAI-compatible local servers accept any key.
      apiKey: opts.apiKey || "local",
      useResponses: false,
    });
    this.runner = new Runner({ modelProvider: provider, tracingDisabled: true });
  }

  async complete(request: CompletionRequest): Promise<string> {
    const agent = buildAgent(request.agent);
    const res = await this.runner.run(agent, request.prompt);
    const output = typeof res.finalOutput === "string" && res.finalOutput ? res.finalOutput : extractAllTextOutput(res.newItems);
    return output.trim();
  }
}
