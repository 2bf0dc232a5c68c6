// Keywords a Cypher statement can start with; OPTIONAL MATCH listed first so it wins over MATCH.
export const QUERY_LEADING_KEYWORDS = ["OPTIONAL MATCH", "MATCH", "WITH", "CREATE", "MERGE", "UNWIND", "CALL"] as const;

const KEYWORD_PATTERN = new RegExp(
  `\\b(${QUERY_LEADING_KEYWORDS.map((k) => k.replace(" ", "\\s+")).join("|")})\\b`,
  "i"
);

/**
 * Extract the Cypher statement from model output that may carry prose or a Markdown fence.
 * Returns the text from the earliest query-leading keyword on; the whole trimmed text when none is found.
 */
export function extractCypherQuery(text: string): string {
  const match = KEYWORD_PATTERN.exec(text);
  const candidate = match ? text.slice(match.index) : text;
  return candidate.replace(/```\s*$/, "").trim();
}
