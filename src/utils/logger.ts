import fs from "fs";
import path from "path";
import { randomUUID } from "crypto";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type Logger = {
  traceId: string;
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
};

const LEVELS: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

function ts() {
  return new Date().toISOString();
}

function analysisLogPath(): string | null {
  const out = process.env.ANALYSIS_LOG_FILE;
  if (out && out.trim().toLowerCase() === "off") return null;
  return out && out.trim() ? out : path.join("logs", "analysis.txt");
}

function appendLine(filePath: string, line: string) {
  try {
    fs.mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
  } catch (e) {
    process.stderr.write(`analysis log directory unavailable: ${String(e)}\n`);
    return;
  }
  fs.appendFile(filePath, line + "\n", { encoding: "utf8" }, (err) => {
    if (err) process.stderr.write(`analysis log write failed: ${err.message}\n`);
  });
}

/**
 * Append analysis/debug text into a simple txt file.
 * - Path: env ANALYSIS_LOG_FILE (default: logs/analysis.txt, "off" disables)
 * - Adds ISO timestamp prefix per line.
 */
export function appendAnalysisLog(text: string) {
  const out = analysisLogPath();
  if (!out) return;
  appendLine(out, `${ts()} ${text}`);
}

function isLogLevel(v: string): v is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVELS, v);
}

function currentLevel(): LogLevel {
  const v = String(process.env.LOG_LEVEL || "info").toLowerCase();
  return isLogLevel(v) ? v : "info";
}

export function createLogger(traceId?: string): Logger {
  const id = traceId && traceId.trim() ? traceId.trim() : randomUUID().slice(0, 8);
  const emit = (level: Exclude<LogLevel, "silent">, message: string) => {
    const line = `[${level}] [${id}] ${message}`;
    appendAnalysisLog(line);
    if (LEVELS[level] < LEVELS[currentLevel()]) return;
    if (level === "error") console.error(`${ts()} ${line}`);
    else if (level === "warn") console.warn(`${ts()} ${line}`);
    else console.log(`${ts()} ${line}`);
  };
  return {
    traceId: id,
    debug: (m) => emit("debug", m),
    info: (m) => emit("info", m),
    warn: (m) => emit("warn", m),
    error: (m) => emit("error", m),
  };
}
