import { describe, it, expect, vi } from "vitest";
import { handleQuery, isAuthorized } from "../../src/server";
import type { QuestionAnswerer } from "../../src/service/queryService";
import { createLogger } from "../../src/utils/logger";

const logger = createLogger("test");

function service(answer: () => Promise<string>) {
  const runQuery = vi.fn(answer);
  const svc: QuestionAnswerer = { runQuery };
  return { svc, runQuery };
}

describe("isAuthorized", () => {
  it("allows everything without a configured secret", () => {
    expect(isAuthorized({}, undefined)).toBe(true);
  });

  it("compares the x-api-key header", () => {
    expect(isAuthorized({ "x-api-key": "test-secret" }, "test-secret")).toBe(true);
    expect(isAuthorized({ "x-api-key": "test-secreT" }, "test-secret")).toBe(false);
    expect(isAuthorized({ "x-api-key": "short" }, "test-secret")).toBe(false);
    expect(isAuthorized({}, "test-secret")).toBe(false);
  });
});

describe("handleQuery", () => {
  it("rejects a wrong api key", async () => {
    const { svc, runQuery } = service(async () => "answer");
    const reply = await handleQuery({
      rawBody: JSON.stringify({ question: "viral posts" }),
      headers: { "x-api-key": "nope" },
      service: svc,
      apiSecret: "test-secret",
      logger,
    });
    expect(reply).toEqual({ status: 401, body: { error: "Unauthorized" } });
    expect(runQuery).not.toHaveBeenCalled();
  });

  it("validates the request body", async () => {
    const { svc, runQuery } = service(async () => "answer");
    const call = (rawBody: string) => handleQuery({ rawBody, headers: {}, service: svc, logger });
    expect(await call("{")).toEqual({ status: 400, body: { error: "Request body must be valid JSON" } });
    expect(await call("{}")).toEqual({ status: 400, body: { error: "question is required" } });
    expect(await call(JSON.stringify({ question: "   " }))).toEqual({ status: 400, body: { error: "Question must not be empty" } });
    expect(runQuery).not.toHaveBeenCalled();
  });

  it("returns the pipeline answer", async () => {
    const { svc, runQuery } = service(async () => "Three posts went viral.");
    const reply = await handleQuery({
      rawBody: JSON.stringify({ question: " Which posts went viral? " }),
      headers: { "x-api-key": "test-secret" },
      service: svc,
      apiSecret: "test-secret",
      logger,
    });
    expect(reply).toEqual({ status: 200, body: { result: "Three posts went viral." } });
    expect(runQuery).toHaveBeenCalledWith("Which posts went viral?", { traceId: "test" });
  });

  it("maps unexpected failures to 500", async () => {
    const { svc } = service(async () => {
      throw new Error("driver closed");
    });
    const reply = await handleQuery({ rawBody: JSON.stringify({ question: "q" }), headers: {}, service: svc, logger });
    expect(reply).toEqual({ status: 500, body: { error: "Internal server error: driver closed" } });
  });
});
