// Unit tests for utility functions
import { describe, it, expect } from "vitest";
import { formatToolResults, formatToolUse, stripThinkingTags, truncate, resolvePath } from "../src/utils";
import type { ToolUseContent } from "../src/types";
import * as fixtures from "./fixtures/events";

type ToolCase = [label: string, tool: Pick<ToolUseContent, "name" | "input">, expected: string];

describe("formatToolUse", () => {
  it.each<ToolCase>([
    ["Bash", fixtures.bashToolUse, "`npm install`"],
    ["Read", fixtures.readToolUse, "Reading `/src/index.ts`"],
    ["Read with a path input", { name: "Read", input: { path: "Cargo.toml" } }, "Reading `Cargo.toml`"],
    ["Edit", fixtures.editToolUse, "Editing `/src/session.ts`"],
    ["Glob", fixtures.globToolUse, "Searching `**/*.ts`"],
    ["Grep", { name: "Grep", input: { pattern: "function.*test" } }, "Grepping `function.*test`"],
    ["Task", fixtures.taskToolUse, "Running task..."],
    ["an unknown tool", { name: "UnknownTool", input: {} }, "UnknownTool"],
  ])("describes %s", (_label, tool, expected) => {
    expect(formatToolUse(tool)).toBe(expected);
  });

  it("shortens long shell commands to 50 characters", () => {
    const tool = { ...fixtures.bashToolUse, input: { command: "a".repeat(100) } };
    expect(formatToolUse(tool)).toBe("`" + "a".repeat(50) + "...`");
  });

  it("renders non-string inputs as empty", () => {
    expect(formatToolUse({ name: "Bash", input: { command: 42 } })).toBe("``");
  });
});

describe("stripThinkingTags", () => {
  it("removes thinking tags", () => {
    const input = "<thinking>internal thought</thinking>Visible response";
    const result = stripThinkingTags(input);
    expect(result).toBe("Visible response");
  });

  it("handles multiline thinking tags", () => {
    const input = `<thinking>
    Line 1
    Line 2
    </thinking>Response here`;
    const result = stripThinkingTags(input);
    expect(result).toBe("Response here");
  });

  it("handles multiple thinking tags", () => {
    const input = "<thinking>first</thinking>Middle<thinking>second</thinking>End";
    const result = stripThinkingTags(input);
    expect(result).toBe("MiddleEnd");
  });

  it("returns original if no thinking tags", () => {
    const input = "Just a normal response";
    const result = stripThinkingTags(input);
    expect(result).toBe("Just a normal response");
  });

  it("trims whitespace", () => {
    const input = "  <thinking>thought</thinking>  Response  ";
    const result = stripThinkingTags(input);
    expect(result).toBe("Response");
  });
});

describe("truncate", () => {
  it("returns original if under max length", () => {
    const result = truncate("short", 10);
    expect(result).toBe("short");
  });

  it("truncates and adds ellipsis", () => {
    const result = truncate("this is a long string", 10);
    expect(result).toBe("this is a ...");
  });

  it("handles exact length", () => {
    const result = truncate("exact", 5);
    expect(result).toBe("exact");
  });

  it("handles empty strings", () => {
    expect(truncate("", 3)).toBe("");
  });

  it("never splits a character outside the basic plane", () => {
    expect(truncate("ab\u{1F600}cd", 3)).toBe("ab\u{1F600}...");
    expect(truncate("\u{1F600}\u{1F600}", 2)).toBe("\u{1F600}\u{1F600}");
  });
});

describe("resolvePath", () => {
  const cwd = "/Users/test/project";
  const home = "/Users/test";

  it("expands ~ to home directory", () => {
    const result = resolvePath("~/documents", cwd, home);
    expect(result).toBe("/Users/test/documents");
  });

  it("resolves relative paths from cwd", () => {
    const result = resolvePath("src/index.ts", cwd, home);
    expect(result).toBe("/Users/test/project/src/index.ts");
  });

  it("keeps absolute paths unchanged", () => {
    const result = resolvePath("/absolute/path", cwd, home);
    expect(result).toBe("/absolute/path");
  });

  it("resolves .. in paths", () => {
    const result = resolvePath("../other", cwd, home);
    expect(result).toBe("/Users/test/other");
  });

  it("resolves multiple .. in paths", () => {
    const result = resolvePath("../../sibling", cwd, home);
    expect(result).toBe("/Users/sibling");
  });

  it("handles . in paths", () => {
    const result = resolvePath("./src", cwd, home);
    expect(result).toBe("/Users/test/project/src");
  });

  it("handles complex paths", () => {
    const result = resolvePath("~/projects/../documents/./file.txt", cwd, home);
    expect(result).toBe("/Users/test/documents/file.txt");
  });
});

describe("formatToolResults", () => {
  it("renders one line per result and flags errors", () => {
    const text = formatToolResults([
      { toolUseId: "tool_0", content: "sent" },
      { toolUseId: "tool_1", content: "chat not found", isError: true },
    ]);
    expect(text).toBe("Tool results:\n- tool_0: sent\n- tool_1: chat not found (ERROR)\n");
  });

  it("renders just the header for no results", () => {
    expect(formatToolResults([])).toBe("Tool results:\n");
  });
});
