#!/usr/bin/env node
/*
 CLI runner:
 - Parses CLI args (--question, --trace, --no-dry-run, --help)
 - Loads .env and validates settings
 - Runs the question pipeline once, printing progress messages and the final answer
*/

import { loadEnv } from "./config/loadEnv";
import { loadSettings } from "./config/settings";
import { createRuntime, type Runtime } from "./bootstrap";
import type { OrchestratorEvent } from "./types/orchestrator";
import { renderMessage } from "./utils/events";
import { formatForUser, logWithDetails } from "./utils/errors";
import { createLogger } from "./utils/logger";

export type CliArgs = {
  help: boolean;
  question?: string;
  trace?: string;
  dryRun: boolean;
  rest: string[];
};

export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { help: false, dryRun: true, rest: [] };
  for (let i = 2; i < argv.length; i += 1) {
    const a = argv[i];
    if (a === "--help" || a === "-h") {
      args.help = true;
    } else if (a === "--question" || a === "-q") {
      args.question = argv[i + 1];
      i += 1;
    } else if (a === "--trace" || a === "-t") {
      args.trace = argv[i + 1];
      i += 1;
    } else if (a === "--no-dry-run") {
      args.dryRun = false;
    } else {
      args.rest.push(a);
    }
  }
  // A bare positional question is accepted too: social-lineage-ask "who shared ..."
  if (!args.question && args.rest.length > 0) {
    args.question = args.rest.join(" ");
  }
  return args;
}

function printUsage() {
  console.log(
    'Usage: social-lineage-ask --question "<text>" [--trace <trace-id>] [--no-dry-run]\n' +
      "Translates the question into a read-only Cypher query, runs it against Neo4j and prints a summary."
  );
}

export async function main(argv: string[] = process.argv): Promise<number> {
  loadEnv(".env");
  const args = parseArgs(argv);
  if (args.help) {
    printUsage();
    return 0;
  }
  if (!args.question || !args.question.trim()) {
    console.error("Error: --question <text> is required.");
    printUsage();
    return 2;
  }

  const logger = createLogger(args.trace);
  let runtime: Runtime;
  try {
    const settings = { ...loadSettings(), ...(args.dryRun ? {} : { dryRun: false }) };
    runtime = createRuntime(settings, logger);
  } catch (e) {
    logWithDetails(logger, e);
    console.error(formatForUser(e));
    return 1;
  }

  const onEvent = (ev: OrchestratorEvent) => {
    const msg = renderMessage(ev);
    if (msg) console.log("-", msg);
  };
  try {
    const reply = await runtime.service.runQuery(args.question, { onEvent, traceId: logger.traceId });
    console.log("\nFinal answer:\n" + reply);
    return 0;
  } finally {
    await runtime.close();
  }
}

if (require.main === module) {
  main()
    .then((code) => process.exit(code))
    .catch((e: unknown) => {
      console.error(formatForUser(e));
      process.exit(1);
    });
}
