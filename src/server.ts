import http from "http";
import { timingSafeEqual } from "crypto";
import { URL } from "url";
import { z } from "zod";
import { loadEnv } from "./config/loadEnv";
import { loadSettings, type AppSettings } from "./config/settings";
import { createRuntime } from "./bootstrap";
import type { QuestionAnswerer } from "./service/queryService";
import type { OrchestratorEvent } from "./types/orchestrator";
import { formatForUser, messageOf } from "./utils/errors";
import { createLogger, type Logger } from "./utils/logger";

const MAX_BODY_BYTES = 64 * 1024;

const QueryRequest = z.object({ question: z.string({ required_error: "question is required" }) });

export type HttpReply = { status: number; body: Record<string, unknown> };

export function isAuthorized(headers: http.IncomingHttpHeaders, apiSecret?: string): boolean {
  if (!apiSecret) return true;
  const provided = headers["x-api-key"];
  if (typeof provided !== "string") return false;
  const a = Buffer.from(provided);
  const b = Buffer.from(apiSecret);
  return a.length === b.length && timingSafeEqual(a, b);
}

export async function handleQuery(params: {
  rawBody: string;
  headers: http.IncomingHttpHeaders;
  service: QuestionAnswerer;
  apiSecret?: string;
  logger: Logger;
}): Promise<HttpReply> {
  const { rawBody, headers, service, apiSecret, logger } = params;
  if (!isAuthorized(headers, apiSecret)) {
    logger.warn("api: rejected request with missing or wrong x-api-key");
    return { status: 401, body: { error: "Unauthorized" } };
  }

  let json: unknown;
  try {
    json = JSON.parse(rawBody || "{}");
  } catch {
    return { status: 400, body: { error: "Request body must be valid JSON" } };
  }
  const parsed = QueryRequest.safeParse(json);
  if (!parsed.success) {
    return { status: 400, body: { error: parsed.error.issues[0]?.message ?? "Invalid request" } };
  }
  const question = parsed.data.question.trim();
  if (!question) {
    logger.warn("api: empty question submitted");
    return { status: 400, body: { error: "Question must not be empty" } };
  }

  try {
    const result = await service.runQuery(question, { traceId: logger.traceId });
    logger.info("api: query processed");
    return { status: 200, body: { result } };
  } catch (e) {
    logger.error(`api: error processing query: ${messageOf(e)}`);
    return { status: 500, body: { error: `Internal server error: ${messageOf(e)}` } };
  }
}

function sendJson(res: http.ServerResponse, reply: HttpReply) {
  res.writeHead(reply.status, { "Content-Type": "application/json; charset=utf-8" });
  res.end(JSON.stringify(reply.body));
}

function readBody(req: http.IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    let size = 0;
    const chunks: Buffer[] = [];
    req.on("data", (chunk: Buffer) => {
      size += chunk.length;
      if (size > MAX_BODY_BYTES) {
        reject(new Error("request body too large"));
        req.destroy();
        return;
      }
      chunks.push(chunk);
    });
    req.on("end", () => resolve(Buffer.concat(chunks).toString("utf8")));
    req.on("error", reject);
  });
}

function handleSse(req: http.IncomingMessage, res: http.ServerResponse, u: URL, service: QuestionAnswerer, logger: Logger) {
  const question = String(u.searchParams.get("question") || "").trim();
  res.writeHead(200, {
    "Content-Type": "text/event-stream",
    "Cache-Control": "no-cache",
    Connection: "keep-alive",
  });
  const send = (ev: OrchestratorEvent) => {
    if (!res.writableEnded) res.write("data: " + JSON.stringify(ev) + "\n\n");
  };
  if (!question) {
    send({ type: "error", detail: { message: "question is required" } });
    res.end();
    return;
  }

  const hb = setInterval(() => {
    if (!res.writableEnded) res.write(": ping\n\n");
  }, 15000);
  req.on("close", () => clearInterval(hb));

  service
    .runQuery(question, { onEvent: send, traceId: logger.traceId })
    .catch((e: unknown) => send({ type: "error", detail: { message: messageOf(e) } }))
    .finally(() => {
      clearInterval(hb);
      res.end();
    });
}

export function createServer(service: QuestionAnswerer, settings: Pick<AppSettings, "apiSecret">): http.Server {
  return http.createServer((req, res) => {
    const logger = createLogger();
    const method = (req.method || "GET").toUpperCase();
    const u = new URL(req.url || "/", "http://localhost");

    if (method === "GET" && u.pathname === "/health") {
      return sendJson(res, { status: 200, body: { status: "ok" } });
    }
    if (method === "GET" && u.pathname === "/query/stream") {
      if (!isAuthorized(req.headers, settings.apiSecret)) {
        return sendJson(res, { status: 401, body: { error: "Unauthorized" } });
      }
      return handleSse(req, res, u, service, logger);
    }
    if (method === "POST" && u.pathname === "/query") {
      readBody(req)
        .then((rawBody) => handleQuery({ rawBody, headers: req.headers, service, apiSecret: settings.apiSecret, logger }))
        .then((reply) => sendJson(res, reply))
        .catch((e: unknown) => sendJson(res, { status: 400, body: { error: messageOf(e) } }));
      return;
    }
    return sendJson(res, { status: 404, body: { error: "Not Found" } });
  });
}

export async function main() {
  loadEnv(".env");
  const logger = createLogger("server");
  let settings: AppSettings;
  try {
    settings = loadSettings();
  } catch (e) {
    console.error(formatForUser(e));
    process.exit(1);
  }

  const runtime = createRuntime(settings, logger);
  const server = createServer(runtime.service, settings);

  server.on("error", (err: NodeJS.ErrnoException) => {
    if (err.code === "EADDRINUSE") logger.error(`Port ${settings.port} is already in use.`);
    else logger.error(`Server error: ${err.message}`);
    process.exit(1);
  });

  server.listen(settings.port, () => {
    logger.info(`server:listening url=http://localhost:${settings.port}`);
  });

  // Graceful shutdown on Ctrl+C / SIGTERM
  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`server:shutdown signal=${signal}`);
    server.close((err) => {
      if (err) logger.error(`Error during server close: ${err.message}`);
      runtime
        .close()
        .catch((e: unknown) => logger.error(`runtime close failed: ${messageOf(e)}`))
        .finally(() => process.exit(err ? 1 : 0));
    });
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

if (require.main === module) {
  main().catch((e: unknown) => {
    console.error(messageOf(e));
    process.exit(1);
  });
}
