// Loader for agent instruction XML files.
// - Default directory: <project>/prompts
// - Override via env PROMPTS_PATH
// - Strict by default: throws when the file is missing or empty
// - PROMPTS_DEV_RELOAD=true bypasses the in-process cache

import fs from "fs";
import path from "path";
import { preconditionFailed } from "../utils/errors";

const cache = new Map<string, string>();

function promptsDir(): string {
  const p = process.env.PROMPTS_PATH;
  if (p && p.trim()) return path.resolve(p);
  return path.resolve(process.cwd(), "prompts");
}

export function loadPrompt(agentName: string, opts: { strict?: boolean; fallback?: string } = {}): string {
  const { strict = true, fallback } = opts;
  const preferReload = String(process.env.PROMPTS_DEV_RELOAD || "").toLowerCase() === "true";
  const filePath = path.join(promptsDir(), `${agentName}.xml`);

  const cached = cache.get(filePath);
  if (!preferReload && cached !== undefined) return cached;

  let text = "";
  try {
    text = fs.readFileSync(filePath, "utf8").replace(/^\uFEFF/, "").trim();
  } catch (e) {
    if (strict && fallback === undefined) {
      throw preconditionFailed(`Prompt XML not found or unreadable for ${agentName}: ${filePath}`, {
        required: [filePath],
        next: "Create the prompt file or set PROMPTS_PATH.",
        details: e,
      });
    }
  }

  const chosen = text || fallback || "";
  if (!chosen && strict) {
    throw preconditionFailed(`Prompt XML for ${agentName} is empty: ${filePath}`, { required: [filePath] });
  }
  if (!preferReload) cache.set(filePath, chosen);
  return chosen;
}

export function clearPromptCache(): void {
  cache.clear();
}
