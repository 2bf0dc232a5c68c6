// Canned queries used when no model backend is reachable.

export type FallbackRule = {
  name: string;
  matches: (lowerQuestion: string) => boolean;
  query: (question: string) => string;
};

export const VIRAL_POSTS_QUERY =
  "MATCH (p:Post) WHERE p.shares > 100 RETURN p.id, p.content, p.shares ORDER BY p.shares DESC LIMIT 5";

export const FACT_CHECK_QUERY =
  "MATCH (p:Post)-[:VERIFIED_BY]->(f:FactCheck {status: 'False'}) RETURN p.id, p.content, f.comments LIMIT 5";

export const SHARE_LINEAGE_QUERY =
  "MATCH (u:User)-[:SHARED]->(p:Post) RETURN u.id, u.name, p.id, p.content, p.timestamp LIMIT 5";

// Escapes text for use inside a single-quoted Cypher string literal.
export function escapeCypherString(text: string): string {
  return text.replace(/\\/g, "\\\\").replace(/'/g, "\\'");
}

export function contentSearchQuery(question: string): string {
  return (
    `MATCH (p:Post) WHERE toLower(p.content) CONTAINS toLower('${escapeCypherString(question)}') ` +
    "RETURN p.id, p.content, p.timestamp LIMIT 5"
  );
}

// Order matters: the first matching rule wins.
export const FALLBACK_RULES: readonly FallbackRule[] = [
  { name: "viral", matches: (q) => q.includes("viral"), query: () => VIRAL_POSTS_QUERY },
  { name: "fake-news", matches: (q) => q.includes("fake news"), query: () => FACT_CHECK_QUERY },
  { name: "shared", matches: (q) => q.includes("shared") || q.includes("share"), query: () => SHARE_LINEAGE_QUERY },
];

export const CONTENT_SEARCH_RULE: FallbackRule = {
  name: "content-search",
  matches: () => true,
  query: contentSearchQuery,
};

export function selectFallbackRule(question: string): FallbackRule {
  const lower = question.toLowerCase();
  return FALLBACK_RULES.find((rule) => rule.matches(lower)) ?? CONTENT_SEARCH_RULE;
}

export function fallbackQuery(question: string): { rule: string; query: string } {
  const rule = selectFallbackRule(question);
  return { rule: rule.name, query: rule.query(question) };
}
