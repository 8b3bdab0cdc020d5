// NDJSON codec: line splitting, decoding and encoding of stream messages
import type { ZodError } from "zod";
import { DecodeError } from "./errors";
import {
  assistantMessageSchema,
  resultMessageSchema,
  systemMessageSchema,
  textBlockSchema,
  toolResultBlockSchema,
  toolUseBlockSchema,
  userMessageSchema,
  type AssistantStreamMessage,
  type ContentBlock,
  type OutboundUserMessage,
} from "./types";

/**
 * Accumulates stdout chunks and hands back complete lines.
 * The unterminated tail is kept until more data (or `flush`) arrives.
 */
export class LineSplitter {
  private buffer = "";

  push(chunk: string): string[] {
    this.buffer += chunk;
    const lines = this.buffer.split("\n");
    this.buffer = lines.pop() || "";
    return lines.filter((line) => line.trim());
  }

  flush(): string[] {
    const rest = this.buffer;
    this.buffer = "";
    return rest.trim() ? [rest] : [];
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function issues(error: ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`).join("; ");
}

export function decodeBlock(raw: Record<string, unknown>): ContentBlock {
  switch (raw.type) {
    case "text": {
      const parsed = textBlockSchema.safeParse(raw);
      if (parsed.success) return parsed.data;
      break;
    }
    case "tool_use": {
      const parsed = toolUseBlockSchema.safeParse(raw);
      if (parsed.success) return parsed.data;
      break;
    }
    case "tool_result": {
      const parsed = toolResultBlockSchema.safeParse(raw);
      if (parsed.success) return parsed.data;
      break;
    }
  }

  // Unrecognized or malformed blocks are kept, not dropped
  return {
    type: "unknown",
    kind: typeof raw.type === "string" ? raw.type : "unknown",
    raw,
  };
}

/**
 * Decode one line of assistant output.
 * Unknown message types decode to an `unknown` message; anything that is not a
 * JSON object with a string `type`, or a known type with the wrong shape,
 * throws a DecodeError.
 */
export function decodeLine(line: string): AssistantStreamMessage {
  const text = line.trim();
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (e) {
    throw new DecodeError(line, e instanceof Error ? e.message : "invalid JSON", { cause: e });
  }

  if (!isRecord(value)) {
    throw new DecodeError(line, "expected a JSON object");
  }
  if (typeof value.type !== "string") {
    throw new DecodeError(line, "missing string field 'type'");
  }

  switch (value.type) {
    case "system": {
      const parsed = systemMessageSchema.safeParse(value);
      if (!parsed.success) throw new DecodeError(line, issues(parsed.error));
      return parsed.data;
    }

    case "assistant": {
      const parsed = assistantMessageSchema.safeParse(value);
      if (!parsed.success) throw new DecodeError(line, issues(parsed.error));
      return {
        ...parsed.data,
        message: { ...parsed.data.message, content: parsed.data.message.content.map(decodeBlock) },
      };
    }

    case "user": {
      const parsed = userMessageSchema.safeParse(value);
      if (!parsed.success) throw new DecodeError(line, issues(parsed.error));
      const { content } = parsed.data.message;
      return {
        ...parsed.data,
        message: {
          role: parsed.data.message.role,
          content: typeof content === "string" ? content : content.map(decodeBlock),
        },
      };
    }

    case "result": {
      const parsed = resultMessageSchema.safeParse(value);
      if (!parsed.success) throw new DecodeError(line, issues(parsed.error));
      return parsed.data;
    }

    default:
      return {
        type: "unknown",
        kind: value.type,
        subtype: typeof value.subtype === "string" ? value.subtype : undefined,
        raw: value,
      };
  }
}

export function userMessage(content: string): OutboundUserMessage {
  return {
    type: "user",
    message: {
      role: "user",
      content,
    },
  };
}

/** Serialize a message as one newline-terminated JSON line. */
export function encodeLine(message: object): string {
  return JSON.stringify(message) + "\n";
}
