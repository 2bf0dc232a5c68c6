// Model resolver for Agents SDK-based agents.
// Reads config/models.json and resolves per-agent model names with a fallback to default.

import fs from "fs";
import path from "path";
import { z } from "zod";
import { preconditionFailed } from "../utils/errors";

export type AgentName = "query-generator" | "result-summarizer";

const ModelSettingsSchema = z
  .object({
    temperature: z.number().min(0).max(2).optional(),
    topP: z.number().min(0).max(1).optional(),
    maxTokens: z.number().int().positive().optional(),
  })
  .strict();

const AgentEntrySchema = z.union([
  z.string().trim().min(1),
  z.object({
    model: z.string().trim().min(1).optional(),
    modelSettings: ModelSettingsSchema.optional(),
  }),
]);

const ModelsConfigSchema = z.object({
  default: z.string().trim().min(1, "config.default must be a non-empty string"),
  agents: z.record(AgentEntrySchema).default({}),
});

export type ModelSettings = z.infer<typeof ModelSettingsSchema>;
export type ModelsConfig = z.infer<typeof ModelsConfigSchema>;
export type AgentModelConfig = { model: string; modelSettings?: ModelSettings };

let cachedConfig: ModelsConfig | null = null;
let cachedPath = "";
let cachedMtimeMs = 0;

function configPath(): string {
  const override = process.env.MODELS_CONFIG_PATH;
  if (override && override.trim()) return path.resolve(override);
  return path.resolve(process.cwd(), "config", "models.json");
}

export function loadModelsConfig(): ModelsConfig {
  const file = configPath();
  let mtimeMs: number;
  let raw: string;
  try {
    mtimeMs = fs.statSync(file).mtimeMs;
    if (cachedConfig && cachedPath === file && cachedMtimeMs === mtimeMs) {
      return cachedConfig;
    }
    raw = fs.readFileSync(file, { encoding: "utf8" });
  } catch (e) {
    throw preconditionFailed(`Failed to read model configuration at ${file}`, {
      required: [file],
      next: "Create config/models.json or set MODELS_CONFIG_PATH.",
      details: e,
    });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (e) {
    throw preconditionFailed(`Invalid JSON in ${file}`, { details: e });
  }

  const parsed = ModelsConfigSchema.safeParse(json);
  if (!parsed.success) {
    throw preconditionFailed(
      `models.json validation failed: ${parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}`
    );
  }
  cachedConfig = parsed.data;
  cachedPath = file;
  cachedMtimeMs = mtimeMs;
  return parsed.data;
}

export function getAgentModelConfig(agentName: AgentName): AgentModelConfig {
  const cfg = loadModelsConfig();
  const entry = cfg.agents[agentName];
  if (entry === undefined) return { model: cfg.default };
  if (typeof entry === "string") return { model: entry };
  return { model: entry.model ?? cfg.default, modelSettings: entry.modelSettings };
}

export function getModelForAgent(agentName: AgentName): string {
  return getAgentModelConfig(agentName).model;
}
