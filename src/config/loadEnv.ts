import fs from "fs";
import path from "path";

// Minimal .env loader.
// - Ignores commented/blank lines
// - Parses key=value and strips surrounding quotes from value
// - Does not overwrite existing process.env values
export function parseEnvLine(line: string): { key: string; value: string } | null {
  const trimmed = line.trim();
  if (!trimmed || trimmed.startsWith("#")) return null;
  const idx = trimmed.indexOf("=");
  if (idx <= 0) return null;
  const key = trimmed.slice(0, idx).replace(/^export\s+/, "").trim();
  let value = trimmed.slice(idx + 1).trim();
  if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
    value = value.slice(1, -1);
  }
  return key ? { key, value } : null;
}

export function loadEnv(customPath?: string, env: NodeJS.ProcessEnv = process.env): boolean {
  const envPath = path.resolve(process.cwd(), customPath || ".env");
  if (!fs.existsSync(envPath)) return false;
  const raw = fs.readFileSync(envPath, "utf-8");
  for (const line of raw.split(/\r?\n/)) {
    const kv = parseEnvLine(line);
    if (!kv) continue;
    if (!(kv.key in env)) {
      env[kv.key] = kv.value;
    }
  }
  return true;
}
