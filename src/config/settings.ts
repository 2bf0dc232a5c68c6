import { z } from "zod";
import { preconditionFailed } from "../utils/errors";

const booleanFlag = z
  .string()
  .trim()
  .toLowerCase()
  .refine((v) => ["1", "0", "true", "false", "yes", "no", "on", "off"].includes(v), {
    message: "expected a boolean flag (true/false, 1/0, yes/no, on/off)",
  })
  .transform((v) => v === "1" || v === "true" || v === "yes" || v === "on");

const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : undefined));

const EnvSchema = z.object({
  NEO4J_URI: z.string().trim().url().default("bolt://localhost:7687"),
  NEO4J_USER: z.string().trim().min(1).default("neo4j"),
  NEO4J_PASSWORD: z.string().default(""),
  NEO4J_DATABASE: optionalText,
  LLM_BASE_URL: z.string().trim().url().optional().or(z.literal("").transform(() => undefined)),
  LLM_API_KEY: optionalText,
  OPENAI_API_KEY: optionalText,
  API_SECRET: optionalText,
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  QUERY_DRY_RUN: booleanFlag.default("true"),
  QUERY_MAX_ROWS: z.coerce.number().int().positive().default(100),
  SUMMARY_MAX_CHARS: z.coerce.number().int().positive().default(8000),
});

export type AppSettings = {
  neo4j: { uri: string; user: string; password: string; database?: string };
  // null when no model endpoint or key is configured: the pipeline then uses its heuristics.
  llm: { baseURL?: string; apiKey?: string } | null;
  apiSecret?: string;
  port: number;
  dryRun: boolean;
  maxRows: number;
  summaryMaxChars: number;
};

export function loadSettings(env: NodeJS.ProcessEnv = process.env): AppSettings {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw preconditionFailed(`Invalid configuration: ${issues.join("; ")}`, {
      required: parsed.error.issues.map((i) => i.path.join(".")),
      next: "Fix the listed environment variables (or .env entries) and restart.",
    });
  }
  const e = parsed.data;
  const apiKey = e.LLM_API_KEY ?? e.OPENAI_API_KEY;
  return Object.freeze({
    neo4j: { uri: e.NEO4J_URI, user: e.NEO4J_USER, password: e.NEO4J_PASSWORD, database: e.NEO4J_DATABASE },
    llm: e.LLM_BASE_URL || apiKey ? { baseURL: e.LLM_BASE_URL, apiKey } : null,
    apiSecret: e.API_SECRET,
    port: e.PORT,
    dryRun: e.QUERY_DRY_RUN,
    maxRows: e.QUERY_MAX_ROWS,
    summaryMaxChars: e.SUMMARY_MAX_CHARS,
  });
}
