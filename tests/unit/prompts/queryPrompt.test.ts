import { describe, it, expect } from "vitest";
import { buildQueryPrompt, FEW_SHOT_EXAMPLES, NO_DATE_FILTERS } from "../../../src/prompts/queryPrompt";
import { describeSchema, relationshipPattern, GRAPH_SCHEMA } from "../../../src/graph/schema";

describe("buildQueryPrompt", () => {
  it("marks the absence of date filters and uses default example timestamps", () => {
    const prompt = buildQueryPrompt({ question: "Show viral posts", dateFilters: {} });
    expect(prompt).toContain(`Date filters to apply where relevant:\n${NO_DATE_FILTERS}\n`);
    expect(prompt).toContain("p.timestamp >= datetime('2023-01-01T00:00:00')");
    expect(prompt.endsWith("Q: Show viral posts\nA:")).toBe(true);
  });

  it("embeds the resolved date clause and period starts in the examples", () => {
    const prompt = buildQueryPrompt({
      question: "viral posts this week",
      dateFilters: { week: { relative: "this", start: "2024-05-06T00:00:00" } },
    });
    expect(prompt).toContain("Date filters to apply where relevant:\nAND (p.timestamp >= datetime('2024-05-06T00:00:00'))\n");
    expect(prompt).toContain(
      "A: MATCH (p:Post) WHERE p.shares > 100 AND p.platform = 'Twitter' AND p.timestamp >= datetime('2024-05-06T00:00:00') "
    );
    expect(prompt).not.toContain(NO_DATE_FILTERS);
  });

  it("includes the graph schema and the read-only rule", () => {
    const prompt = buildQueryPrompt({ question: "q", dateFilters: {} });
    expect(prompt).toContain(describeSchema());
    expect(prompt).toContain(
      "5. Never use Cypher clauses that modify data: CREATE, MERGE, DELETE, DETACH DELETE, SET, REMOVE, DROP."
    );
  });

  it("lists every few-shot example", () => {
    const prompt = buildQueryPrompt({ question: "q", dateFilters: {} });
    for (const ex of FEW_SHOT_EXAMPLES) {
      expect(prompt).toContain(`Q: ${ex.question}\nA: `);
    }
  });
});

describe("graph schema", () => {
  it("describes SHARED from user to post", () => {
    const shared = GRAPH_SCHEMA.relationships.find((r) => r.type === "SHARED");
    expect(shared && relationshipPattern(shared)).toBe("(u:User)-[:SHARED]->(p:Post)");
  });

  it("renders nodes with typed properties", () => {
    const lines = describeSchema().split("\n");
    expect(lines[0]).toBe("Nodes:");
    expect(lines).toContain("FactCheck: {id (string), status (string), comments (string)}");
    expect(lines).toContain("(p:Post)-[:VERIFIED_BY]->(f:FactCheck)");
  });
});
