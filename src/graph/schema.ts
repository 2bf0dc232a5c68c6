// Graph schema of the social-media lineage dataset, as described to the model.

export type PropertySpec = { name: string; type: string };

export type NodeSpec = { label: string; properties: readonly PropertySpec[] };

export type RelationshipSpec = { type: string; from: string; to: string };

export type GraphSchemaDescriptor = {
  nodes: readonly NodeSpec[];
  relationships: readonly RelationshipSpec[];
};

const p = (name: string, type: string): PropertySpec => ({ name, type });

export const GRAPH_SCHEMA: GraphSchemaDescriptor = Object.freeze({
  nodes: Object.freeze([
    {
      label: "User",
      properties: [
        p("id", "string"),
        p("name", "string"),
        p("username", "string"),
        p("email", "string"),
        p("followers", "integer"),
        p("account_created", "date"),
        p("verified", "boolean"),
        p("location", "string"),
      ],
    },
    {
      label: "Post",
      properties: [
        p("id", "string"),
        p("content", "string"),
        p("likes", "integer"),
        p("shares", "integer"),
        p("comments", "integer"),
        p("platform", "string"),
        p("timestamp", "datetime"),
        p("author_id", "string"),
        p("tags", "list of strings"),
      ],
    },
    {
      label: "FactCheck",
      properties: [p("id", "string"), p("status", "string"), p("comments", "string")],
    },
  ]),
  // SHARED always points from the sharing user to the post.
  relationships: Object.freeze([
    { type: "CREATED", from: "User", to: "Post" },
    { type: "VERIFIED_BY", from: "Post", to: "FactCheck" },
    { type: "SHARED", from: "User", to: "Post" },
  ]),
});

function variableFor(label: string): string {
  return label.charAt(0).toLowerCase();
}

export function relationshipPattern(rel: RelationshipSpec): string {
  return `(${variableFor(rel.from)}:${rel.from})-[:${rel.type}]->(${variableFor(rel.to)}:${rel.to})`;
}

export function describeSchema(schema: GraphSchemaDescriptor = GRAPH_SCHEMA): string {
  const nodes = schema.nodes.map((n) => {
    const props = n.properties.map((prop) => `${prop.name} (${prop.type})`).join(", ");
    return `${n.label}: {${props}}`;
  });
  const rels = schema.relationships.map(relationshipPattern);
  return ["Nodes:", "", ...nodes, "", "Relationships:", "", ...rels].join("\n");
}
