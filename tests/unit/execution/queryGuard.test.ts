import { describe, it, expect } from "vitest";
import { checkReadOnly, stripLiteralsAndComments } from "../../../src/execution/queryGuard";

describe("checkReadOnly", () => {
  it("accepts plain reads", () => {
    expect(checkReadOnly("MATCH (p:Post) WHERE p.shares > 100 RETURN p.id ORDER BY p.shares DESC LIMIT 5")).toBeNull();
    expect(checkReadOnly("MATCH (u:User)-[:CREATED]->(p:Post) RETURN p")).toBeNull();
  });

  it("rejects write clauses", () => {
    expect(checkReadOnly("MATCH (p:Post) DETACH DELETE p")).toBe("DELETE");
    expect(checkReadOnly("MATCH (p:Post) SET p.shares = 0")).toBe("SET");
    expect(checkReadOnly("merge (u:User {id: '1'})")).toBe("MERGE");
    expect(checkReadOnly("CREATE (p:Post)")).toBe("CREATE");
    expect(checkReadOnly("MATCH (n) REMOVE n.verified")).toBe("REMOVE");
    expect(checkReadOnly("LOAD CSV FROM 'file:///posts.csv' AS row RETURN row")).toBe("LOAD CSV");
  });

  it("rejects write procedures", () => {
    expect(checkReadOnly("CALL apoc.create.node(['Post'], {})")).toBe("CALL apoc write procedure");
    expect(checkReadOnly("CALL dbms.security.createUser('x', 'y', false)")).toBe("CALL dbms");
  });

  it("ignores keywords inside literals, comments and property names", () => {
    expect(checkReadOnly("MATCH (p:Post) WHERE p.content CONTAINS 'create a set' RETURN p")).toBeNull();
    expect(checkReadOnly("// DROP everything\nMATCH (n) RETURN n")).toBeNull();
    expect(checkReadOnly("MATCH (n) RETURN n.set, n.delete")).toBeNull();
    expect(checkReadOnly("MATCH (n) RETURN n.content AS `DELETE`")).toBeNull();
  });
});

describe("stripLiteralsAndComments", () => {
  it("blanks literals and comments in one pass", () => {
    expect(stripLiteralsAndComments("RETURN 'it\\'s' // note")).toBe("RETURN ''  ");
    expect(stripLiteralsAndComments("RETURN \"a // b\" /* c */")).toBe('RETURN ""  ');
  });
});
