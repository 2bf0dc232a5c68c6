import { Agent } from "@openai/agents";
import { getAgentModelConfig, type AgentName } from "../model/resolveModels";
import { loadPrompt } from "../prompts/loadPrompt";
import { appendAnalysisLog } from "../utils/logger";

export function buildAgent(name: AgentName) {
  const { model, modelSettings } = getAgentModelConfig(name);
  appendAnalysisLog(`[agent] ${name} model=${model}`);
  return new Agent({
    name,
    model,
    instructions: loadPrompt(name),
    ...(modelSettings && Object.keys(modelSettings).length > 0 ? { modelSettings } : {}),
  });
}
