import { describe, it, expect } from "vitest";
import { buildSummaryPrompt, fallbackSummary, summarizeResults } from "../../../src/summary/summarize";
import { failed, ok, type QueryExecution, type QueryRow } from "../../../src/types/pipeline";
import { connectionRefused, FakeCompletion } from "../../helpers/fakes";

function execution(rows: QueryRow[], truncated = false): QueryExecution {
  return { rows, payload: JSON.stringify(rows), truncated, validated: true };
}

const TWO_ROWS = execution([
  { "p.id": "p1", "p.shares": 150 },
  { "p.id": "p2", "p.shares": null },
]);
const options = { maxPayloadChars: 8000 };

describe("fallbackSummary", () => {
  it("reports an empty result", () => {
    expect(fallbackSummary(execution([]))).toBe("The query returned no results.");
  });

  it("lists rows", () => {
    expect(fallbackSummary(TWO_ROWS)).toBe("The query returned 2 row(s):\n- p.id: p1, p.shares: 150\n- p.id: p2, p.shares: null");
  });

  it("caps the listing and flags truncation", () => {
    const rows = Array.from({ length: 12 }, (_, i) => ({ n: i }));
    const lines = fallbackSummary(execution(rows, true)).split("\n");
    expect(lines[0]).toBe("The query returned 12 row(s) (truncated):");
    expect(lines).toHaveLength(12);
    expect(lines[10]).toBe("- n: 9");
    expect(lines[11]).toBe("- … 2 more");
  });
});

describe("buildSummaryPrompt", () => {
  it("carries the question, row count and payload", () => {
    expect(buildSummaryPrompt("viral posts?", TWO_ROWS, 8000).split("\n")).toEqual([
      "Summarize the following graph query results and describe them in a descriptive way.",
      "QUESTION=viral posts?",
      "ROW_COUNT=2",
      `RESULTS_JSON=${TWO_ROWS.payload}`,
    ]);
  });

  it("clips an oversized payload", () => {
    const prompt = buildSummaryPrompt("q", TWO_ROWS, 10);
    expect(prompt).toContain("\nRESULTS_TRUNCATED=true\n");
    expect(prompt.endsWith(`RESULTS_JSON=${TWO_ROWS.payload.slice(0, 10)}`)).toBe(true);
  });
});

describe("summarizeResults", () => {
  it("describes an upstream failure without calling the model", async () => {
    const completion = new FakeCompletion({ "result-summarizer": "unused" });
    const res = await summarizeResults({
      question: "q",
      execution: failed("execute", "unsafe_query", "Query rejected: SET is not allowed in read-only mode."),
      completion,
      options,
    });
    expect(res).toEqual(
      ok({ text: "Error: execute failed (unsafe_query): Query rejected: SET is not allowed in read-only mode.", source: "failure" })
    );
    expect(completion.requests).toEqual([]);
  });

  it("summarizes locally without a model backend", async () => {
    const res = await summarizeResults({ question: "q", execution: ok(TWO_ROWS), completion: null, options });
    expect(res).toEqual(ok({ text: fallbackSummary(TWO_ROWS), source: "fallback" }));
  });

  it("returns the trimmed model summary", async () => {
    const completion = new FakeCompletion({ "result-summarizer": "  Two posts matched. \n" });
    const res = await summarizeResults({ question: "viral posts?", execution: ok(TWO_ROWS), completion, options });
    expect(res).toEqual(ok({ text: "Two posts matched.", source: "model" }));
    expect(completion.promptsFor("result-summarizer")[0]).toContain("\nROW_COUNT=2\n");
  });

  it("falls back on an empty reply or an unreachable backend", async () => {
    const empty = await summarizeResults({
      question: "q",
      execution: ok(TWO_ROWS),
      completion: new FakeCompletion({ "result-summarizer": "" }),
      options,
    });
    expect(empty).toEqual(ok({ text: fallbackSummary(TWO_ROWS), source: "fallback" }));

    const down = await summarizeResults({
      question: "q",
      execution: ok(TWO_ROWS),
      completion: new FakeCompletion({ "result-summarizer": connectionRefused() }),
      options,
    });
    expect(down).toEqual(ok({ text: fallbackSummary(TWO_ROWS), source: "fallback" }));
  });

  it("fails on other model errors", async () => {
    const res = await summarizeResults({
      question: "q",
      execution: ok(TWO_ROWS),
      completion: new FakeCompletion({ "result-summarizer": new Error("context length exceeded") }),
      options,
    });
    expect(res).toEqual(failed("summarize", "unexpected", "Summarizer error: context length exceeded"));
  });
});
