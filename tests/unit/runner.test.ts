import { describe, it, expect } from "vitest";
import { parseArgs } from "../../src/runner";

describe("parseArgs", () => {
  it("reads flags", () => {
    expect(parseArgs(["node", "runner", "--question", "who shared it", "--trace", "abc", "--no-dry-run"])).toEqual({
      help: false,
      question: "who shared it",
      trace: "abc",
      dryRun: false,
      rest: [],
    });
  });

  it("joins a positional question", () => {
    const args = parseArgs(["node", "runner", "viral", "posts", "this", "week"]);
    expect(args.question).toBe("viral posts this week");
    expect(args.dryRun).toBe(true);
  });

  it("prefers --question over positionals", () => {
    expect(parseArgs(["node", "runner", "-q", "fake news", "ignored"]).question).toBe("fake news");
  });

  it("recognizes help", () => {
    expect(parseArgs(["node", "runner", "-h"]).help).toBe(true);
  });
});
