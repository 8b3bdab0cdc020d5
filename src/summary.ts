// Presentation layer: turns decoded stream messages into bounded console lines
import type { DecodeError } from "./errors";
import type { SessionRecord } from "./session";
import type { AssistantStreamMessage, ContentBlock, ToolResultContent } from "./types";
import { formatToolUse, stripThinkingTags, truncate } from "./utils";

export interface PreviewLimits {
  text: number;
  tool: number;
  raw: number;
}

export const DEFAULT_PREVIEW_LIMITS: PreviewLimits = {
  text: 200,
  tool: 150,
  raw: 100,
};

/**
 * Remembers tool invocations so results can be matched back to them by id.
 */
export class ToolCallTracker {
  private calls = new Map<string, string>();

  recordUse(id: string, name: string): void {
    this.calls.set(id, name);
  }

  /** Returns the tool name and forgets the call, or undefined when the id was never seen. */
  resolve(toolUseId: string): string | undefined {
    const name = this.calls.get(toolUseId);
    this.calls.delete(toolUseId);
    return name;
  }

  get pending(): string[] {
    return [...this.calls.keys()];
  }
}

export function toolResultText(block: ToolResultContent): string {
  if (typeof block.content === "string") return block.content;
  return block.content
    .map((part) => {
      if (typeof part === "object" && part !== null && "text" in part && typeof part.text === "string") {
        return part.text;
      }
      return JSON.stringify(part);
    })
    .join("\n");
}

function oneLine(text: string): string {
  return text.replace(/\s*\n\s*/g, " ");
}

function summarizeBlock(block: ContentBlock, limits: PreviewLimits, tracker: ToolCallTracker): string[] {
  switch (block.type) {
    case "text": {
      const text = stripThinkingTags(block.text);
      return text ? [`[assistant] ${truncate(text, limits.text)}`] : [];
    }

    case "tool_use": {
      tracker.recordUse(block.id, block.name);
      const detail = formatToolUse(block);
      const header = `[tool_use] ${block.name} (id: ${block.id})`;
      return [
        detail === block.name ? header : `${header} ${detail}`,
        `  input: ${truncate(JSON.stringify(block.input), limits.tool)}`,
      ];
    }

    case "tool_result": {
      const name = tracker.resolve(block.tool_use_id) ?? "?";
      const flag = block.is_error ? " (error)" : "";
      return [
        `[tool_result] ${name} (id: ${block.tool_use_id})${flag}`,
        `  content: ${truncate(oneLine(toolResultText(block)), limits.tool)}`,
      ];
    }

    case "unknown":
      return [`[${block.kind}]`];
  }
}

export function summarizeMessage(
  message: AssistantStreamMessage,
  limits: PreviewLimits = DEFAULT_PREVIEW_LIMITS,
  tracker: ToolCallTracker = new ToolCallTracker()
): string[] {
  switch (message.type) {
    case "system": {
      const lines = [message.subtype && message.subtype !== "init" ? `[system] ${message.subtype}` : "[system] ready"];
      if (message.session_id) lines.push(`  session_id: ${message.session_id}`);
      if (message.model) lines.push(`  model: ${message.model}`);
      if (message.tools) lines.push(`  tools: ${message.tools.length ? message.tools.join(", ") : "(none)"}`);
      return lines;
    }

    case "assistant":
      return message.message.content.flatMap((block) => summarizeBlock(block, limits, tracker));

    case "user": {
      const { content } = message.message;
      if (typeof content === "string") {
        return [`[user] ${truncate(content, limits.text)}`];
      }
      return content.flatMap((block) => summarizeBlock(block, limits, tracker));
    }

    case "result": {
      const cost = (message.total_cost_usd ?? 0).toFixed(4);
      const turns = message.num_turns ?? "?";
      const lines = [`[result] ${message.subtype ?? "unknown"} cost=$${cost} turns=${turns}`];
      if (message.result) lines.push(`  result: ${truncate(message.result, limits.text)}`);
      return lines;
    }

    case "unknown":
      return [message.subtype ? `[${message.kind}] ${message.subtype}` : `[${message.kind}]`];
  }
}

export function summarizeDecodeError(error: DecodeError, limits: PreviewLimits = DEFAULT_PREVIEW_LIMITS): string {
  return `[parse error] ${truncate(error.line.trim(), limits.raw)}`;
}

export type LinePrinter = (line: string) => void;

/**
 * Consumes session records and prints their summaries.
 * Keeps one ToolCallTracker across records so results pair with earlier uses.
 */
export class ConsolePresenter {
  private readonly tracker = new ToolCallTracker();
  private readonly limits: PreviewLimits;
  private readonly print: LinePrinter;

  constructor(options: { limits?: PreviewLimits; print?: LinePrinter } = {}) {
    this.limits = options.limits ?? DEFAULT_PREVIEW_LIMITS;
    this.print = options.print ?? ((line) => console.log(line));
  }

  present(record: SessionRecord): void {
    const lines = record.ok
      ? summarizeMessage(record.message, this.limits, this.tracker)
      : [summarizeDecodeError(record.error, this.limits)];
    for (const line of lines) {
      this.print(line);
    }
  }
}
