// Pre-execution read-only check for generated Cypher.
// Returns the first offending clause, or null when the query only reads.

const WRITE_CLAUSES: ReadonlyArray<{ clause: string; pattern: RegExp }> = [
  { clause: "CREATE", pattern: /(?<![.$\w])CREATE\b/i },
  { clause: "MERGE", pattern: /(?<![.$\w])MERGE\b/i },
  { clause: "DELETE", pattern: /(?<![.$\w])DELETE\b/i },
  { clause: "SET", pattern: /(?<![.$\w])SET\b/i },
  { clause: "REMOVE", pattern: /(?<![.$\w])REMOVE\b/i },
  { clause: "DROP", pattern: /(?<![.$\w])DROP\b/i },
  { clause: "FOREACH", pattern: /(?<![.$\w])FOREACH\b/i },
  { clause: "LOAD CSV", pattern: /(?<![.$\w])LOAD\s+CSV\b/i },
  { clause: "IN TRANSACTIONS", pattern: /\bIN\s+TRANSACTIONS\b/i },
  { clause: "CALL apoc write procedure", pattern: /\bCALL\s+apoc\.(create|merge|refactor|periodic|do|atomic|trigger|nodes\.delete|load)\b/i },
  { clause: "CALL dbms", pattern: /\bCALL\s+dbms\./i },
];

// Blanks out string literals, quoted identifiers and comments so keywords inside them are ignored.
const LITERAL_OR_COMMENT = /'(?:\\.|[^'\\])*'|"(?:\\.|[^"\\])*"|`[^`]*`|\/\*[\s\S]*?\*\/|\/\/[^\n]*/g;

export function stripLiteralsAndComments(query: string): string {
  return query.replace(LITERAL_OR_COMMENT, (token) => {
    const first = token.charAt(0);
    if (first === "'" || first === '"' || first === "`") return first + first;
    return " ";
  });
}

export function checkReadOnly(query: string): string | null {
  const code = stripLiteralsAndComments(query);
  for (const { clause, pattern } of WRITE_CLAUSES) {
    if (pattern.test(code)) return clause;
  }
  return null;
}
