import { describe, it, expect } from "vitest";
import neo4j, { Node } from "neo4j-driver";
import { classifyGraphError, toPlainRow, toPlainValue } from "../../../src/execution/graphStore";
import { neo4jError } from "../../helpers/fakes";

describe("toPlainValue", () => {
  it("converts integers", () => {
    expect(toPlainValue(neo4j.int(42))).toBe(42);
    expect(toPlainValue(neo4j.int("9007199254740993"))).toBe("9007199254740993");
  });

  it("flattens nodes to their properties", () => {
    const node = new Node(neo4j.int(1), ["Post"], { id: "p1", shares: neo4j.int(150) });
    expect(toPlainValue(node)).toEqual({ id: "p1", shares: 150 });
  });

  it("recurses through lists and maps", () => {
    expect(toPlainValue([neo4j.int(1), "x", null])).toEqual([1, "x", null]);
    expect(toPlainRow({ "p.id": "p1", stats: { likes: neo4j.int(3) }, missing: undefined })).toEqual({
      "p.id": "p1",
      stats: { likes: 3 },
      missing: null,
    });
  });
});

describe("classifyGraphError", () => {
  it("maps driver error codes to failure kinds", () => {
    expect(classifyGraphError(neo4jError("ServiceUnavailable", "no route"))).toBe("backend_unavailable");
    expect(classifyGraphError(neo4jError("Neo.ClientError.Statement.SyntaxError", "Invalid input"))).toBe("malformed_query");
    expect(classifyGraphError(neo4jError("Neo.ClientError.Security.Forbidden", "denied"))).toBe("permission_denied");
    expect(classifyGraphError(neo4jError("Neo.TransientError.General.DatabaseUnavailable", "starting"))).toBe(
      "backend_unavailable"
    );
  });

  it("treats anything else as unexpected", () => {
    expect(classifyGraphError(new Error("boom"))).toBe("unexpected");
    expect(classifyGraphError("boom")).toBe("unexpected");
  });
});
