// Small formatting helpers shared by the presentation layer and the CLI
import type { ToolUseContent } from "./types";

function stringField(input: Record<string, unknown>, key: string): string {
  const value = input[key];
  return typeof value === "string" ? value : "";
}

/**
 * Short human description of a tool invocation
 */
export function formatToolUse(tool: Pick<ToolUseContent, "name" | "input">): string {
  const { name, input } = tool;

  switch (name) {
    case "Bash":
      return `\`${truncate(stringField(input, "command"), 50)}\``;
    case "Read":
      return `Reading \`${stringField(input, "file_path") || stringField(input, "path")}\``;
    case "Edit":
      return `Editing \`${stringField(input, "file_path")}\``;
    case "Write":
      return `Writing \`${stringField(input, "file_path")}\``;
    case "Glob":
      return `Searching \`${stringField(input, "pattern")}\``;
    case "Grep":
      return `Grepping \`${stringField(input, "pattern")}\``;
    case "Task":
      return `Running task...`;
    default:
      return name;
  }
}

/**
 * Strip thinking tags from assistant responses
 */
export function stripThinkingTags(text: string): string {
  return text.replace(/<thinking>[\s\S]*?<\/thinking>/g, "").trim();
}

/**
 * Truncate text with ellipsis
 */
export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  // Count code points so a surrogate pair is never cut in half
  const chars = Array.from(text);
  if (chars.length <= maxLength) return text;
  return chars.slice(0, maxLength).join("") + "...";
}

/**
 * Resolve a path, handling ~ and relative paths
 */
export function resolvePath(inputPath: string, cwd: string, home: string): string {
  let path = inputPath;

  if (path.startsWith("~")) {
    path = path.replace("~", home);
  }

  if (!path.startsWith("/")) {
    path = `${cwd}/${path}`;
  }

  const parts = path.split("/").filter(Boolean);
  const resolved: string[] = [];
  for (const part of parts) {
    if (part === "..") resolved.pop();
    else if (part !== ".") resolved.push(part);
  }

  return "/" + resolved.join("/");
}

export interface ToolResultInput {
  toolUseId: string;
  content: string;
  isError?: boolean;
}

/**
 * Render tool results as a single user turn
 */
export function formatToolResults(results: ToolResultInput[]): string {
  let text = "Tool results:\n";
  for (const r of results) {
    text += `- ${r.toolUseId}: ${r.content}${r.isError ? " (ERROR)" : ""}\n`;
  }
  return text;
}
