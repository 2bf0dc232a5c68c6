import { describeSchema, GRAPH_SCHEMA, type GraphSchemaDescriptor } from "../graph/schema";
import { buildDateFilterClause, periodStart, type DateFilterSet } from "../temporal/dateFilters";

export const NO_DATE_FILTERS = "No date filters requested.";

export type FewShotExample = {
  question: string;
  query: (filters: DateFilterSet) => string;
};

export const FEW_SHOT_EXAMPLES: readonly FewShotExample[] = [
  {
    question: "Show me the most viral posts on Twitter this week",
    query: (f) =>
      `MATCH (p:Post) WHERE p.shares > 100 AND p.platform = 'Twitter' AND p.timestamp >= datetime('${periodStart(f, "week")}') ` +
      "RETURN p.id, p.content, p.shares, p.timestamp ORDER BY p.shares DESC LIMIT 5",
  },
  {
    question: "Find posts verified as false news this month",
    query: (f) =>
      `MATCH (p:Post)-[:VERIFIED_BY]->(f:FactCheck {status: 'False'}) WHERE p.timestamp >= datetime('${periodStart(f, "month")}') ` +
      "RETURN p.id, p.content, f.comments LIMIT 5",
  },
  {
    question: "Who shared the COVID variant news?",
    query: () =>
      "MATCH (u:User)-[:SHARED]->(p:Post) WHERE toLower(p.content) CONTAINS 'covid variant' " +
      "RETURN u.id, u.name, p.content, p.timestamp LIMIT 5",
  },
  {
    question: "List posts created by user john_doe this year",
    query: (f) =>
      `MATCH (u:User {username: 'john_doe'})-[:CREATED]->(p:Post) WHERE p.timestamp >= datetime('${periodStart(f, "year")}') ` +
      "RETURN p.id, p.content, p.timestamp LIMIT 5",
  },
];

const SAFETY_RULES = [
  "Only output the Cypher query. Do not add explanations, comments or Markdown fences.",
  "Use the graph schema below.",
  "Use explicit datetime literals in ISO 8601 format like: datetime('2023-08-10T00:00:00')",
  "For natural language dates like 'this week', 'last month' or 'this year', filter posts by timestamp.",
  "Never use Cypher clauses that modify data: CREATE, MERGE, DELETE, DETACH DELETE, SET, REMOVE, DROP.",
  "Prefer read-only queries (MATCH, OPTIONAL MATCH, WHERE, RETURN, ORDER BY).",
  "Return relevant fields only, e.g. p.id, p.content, p.shares, p.timestamp, u.id, u.name.",
  "Always LIMIT results to a reasonable number (5 or 10).",
];

export function buildQueryPrompt(params: {
  question: string;
  dateFilters: DateFilterSet;
  schema?: GraphSchemaDescriptor;
}): string {
  const { question, dateFilters, schema = GRAPH_SCHEMA } = params;
  const clause = buildDateFilterClause(dateFilters);

  const rules = SAFETY_RULES.map((r, i) => `${i + 1}. ${r}`);
  const examples = FEW_SHOT_EXAMPLES.map((ex) => `Q: ${ex.question}\nA: ${ex.query(dateFilters)}`);

  return [
    "You are a Cypher query generation assistant.",
    "Given a question about social media posts, viral content and fact-check lineage, generate a single valid Neo4j Cypher query.",
    "",
    "Rules:",
    ...rules,
    "",
    "Date filters to apply where relevant:",
    clause ? clause.trim() : NO_DATE_FILTERS,
    "",
    "Graph database schema:",
    "",
    describeSchema(schema),
    "",
    "Examples:",
    "",
    examples.join("\n\n"),
    "",
    "Now generate a Cypher query for the following question. Output only the Cypher query.",
    "",
    `Q: ${question}`,
    "A:",
  ].join("\n");
}
