import { describe, it, expect } from "vitest";
import { generateQuery } from "../../../src/generation/generateQuery";
import { VIRAL_POSTS_QUERY } from "../../../src/generation/fallbackRules";
import { connectionRefused, FakeCompletion } from "../../helpers/fakes";

const PROMPT = "prompt text";

describe("generateQuery", () => {
  it("uses the fallback heuristic without a model backend", async () => {
    const res = await generateQuery({ prompt: PROMPT, question: "viral posts", completion: null });
    expect(res).toEqual({ status: "ok", value: { query: VIRAL_POSTS_QUERY, source: "fallback", rule: "viral" } });
  });

  it("extracts the query from the model reply", async () => {
    const raw = "```cypher\nMATCH (p:Post) RETURN p.id LIMIT 5\n```";
    const completion = new FakeCompletion({ "query-generator": raw });
    const res = await generateQuery({ prompt: PROMPT, question: "anything", completion });
    expect(res).toEqual({ status: "ok", value: { query: "MATCH (p:Post) RETURN p.id LIMIT 5", source: "model", rawOutput: raw } });
    expect(completion.requests).toEqual([{ agent: "query-generator", prompt: PROMPT }]);
  });

  it("falls back when the backend refuses connections", async () => {
    const completion = new FakeCompletion({ "query-generator": connectionRefused() });
    const res = await generateQuery({ prompt: PROMPT, question: "viral posts", completion });
    expect(res.status === "ok" && res.value.source).toBe("fallback");
  });

  it("falls back when the connection failure is wrapped", async () => {
    const wrapped = new Error("request failed", { cause: { code: "ENOTFOUND" } });
    const completion = new FakeCompletion({ "query-generator": wrapped });
    const res = await generateQuery({ prompt: PROMPT, question: "viral posts", completion });
    expect(res.status === "ok" && res.value.query).toBe(VIRAL_POSTS_QUERY);
  });

  it("fails on other model errors", async () => {
    const completion = new FakeCompletion({ "query-generator": new Error("model 'llama9' not found") });
    const res = await generateQuery({ prompt: PROMPT, question: "viral posts", completion });
    expect(res).toEqual({
      status: "failed",
      stage: "generate",
      kind: "unexpected",
      message: "Error calling the language model: model 'llama9' not found",
    });
  });

  it("fails when the model returns nothing usable", async () => {
    const completion = new FakeCompletion({ "query-generator": "  " });
    const res = await generateQuery({ prompt: PROMPT, question: "viral posts", completion });
    expect(res).toEqual({ status: "failed", stage: "generate", kind: "empty_query", message: "The language model returned no query." });
  });
});
