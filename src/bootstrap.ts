import { setTracingDisabled } from "@openai/agents";
import type { AppSettings } from "./config/settings";
import { createNeo4jDriver, Neo4jGraphStore } from "./execution/graphStore";
import { AgentsTextCompletion, type TextCompletion } from "./model/completion";
import { QueryService } from "./service/queryService";
import type { Logger } from "./utils/logger";

export type Runtime = {
  service: QueryService;
  close(): Promise<void>;
};

// Builds the long-lived backend handles once; callers own their lifecycle through close().
export function createRuntime(settings: AppSettings, logger: Logger): Runtime {
  setTracingDisabled(true);

  const driver = createNeo4jDriver(settings.neo4j);
  const store = new Neo4jGraphStore(driver, settings.neo4j.database);
  logger.info(`neo4j driver created uri=${settings.neo4j.uri}${settings.neo4j.database ? ` database=${settings.neo4j.database}` : ""}`);

  let completion: TextCompletion | null = null;
  if (settings.llm) {
    completion = new AgentsTextCompletion(settings.llm);
    logger.info(`model backend configured${settings.llm.baseURL ? ` baseURL=${settings.llm.baseURL}` : ""}`);
  } else {
    logger.warn("no model backend configured (LLM_BASE_URL / LLM_API_KEY); canned queries will be used");
  }

  const service = new QueryService({
    store,
    completion,
    execution: { dryRun: settings.dryRun, maxRows: settings.maxRows },
    summary: { maxPayloadChars: settings.summaryMaxChars },
  });

  return {
    service,
    async close() {
      await store.close();
      logger.info("neo4j driver closed");
    },
  };
}
