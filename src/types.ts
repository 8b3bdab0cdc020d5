// Assistant CLI streaming JSON message types
import { z } from "zod";

export const textBlockSchema = z.object({
  type: z.literal("text"),
  text: z.string(),
});

export const toolUseBlockSchema = z.object({
  type: z.literal("tool_use"),
  id: z.string(),
  name: z.string(),
  input: z.record(z.unknown()).default({}),
});

export const toolResultBlockSchema = z.object({
  type: z.literal("tool_result"),
  tool_use_id: z.string(),
  content: z.union([z.string(), z.array(z.unknown())]).default(""),
  is_error: z.boolean().optional(),
});

export type TextContent = z.infer<typeof textBlockSchema>;
export type ToolUseContent = z.infer<typeof toolUseBlockSchema>;
export type ToolResultContent = z.infer<typeof toolResultBlockSchema>;

// Block kinds this client does not know (thinking, image, ...)
export interface UnknownContent {
  type: "unknown";
  kind: string;
  raw: Record<string, unknown>;
}

export type ContentBlock = TextContent | ToolUseContent | ToolResultContent | UnknownContent;

export const systemMessageSchema = z.object({
  type: z.literal("system"),
  subtype: z.string().optional(),
  session_id: z.string().optional(),
  model: z.string().optional(),
  cwd: z.string().optional(),
  tools: z.array(z.string()).optional(),
  permissionMode: z.string().optional(),
});

const contextManagementSchema = z.object({
  truncated_content_length: z.number().optional(),
});

export const assistantMessageSchema = z.object({
  type: z.literal("assistant"),
  subtype: z.string().optional(),
  session_id: z.string().optional(),
  message: z.object({
    id: z.string().optional(),
    model: z.string().optional(),
    role: z.string().optional(),
    content: z.array(z.record(z.unknown())),
    stop_reason: z.string().nullable().optional(),
    context_management: contextManagementSchema.nullable().optional(),
  }),
});

export const userMessageSchema = z.object({
  type: z.literal("user"),
  subtype: z.string().optional(),
  session_id: z.string().optional(),
  message: z.object({
    role: z.string().optional(),
    content: z.union([z.string(), z.array(z.record(z.unknown()))]),
  }),
  tool_use_result: z.unknown().optional(),
});

export const resultMessageSchema = z.object({
  type: z.literal("result"),
  subtype: z.string().optional(),
  is_error: z.boolean().optional(),
  duration_ms: z.number().optional(),
  num_turns: z.number().optional(),
  result: z.string().optional(),
  session_id: z.string().optional(),
  total_cost_usd: z.number().optional(),
  structured_output: z.unknown().optional(),
});

export type SystemMessage = z.infer<typeof systemMessageSchema>;
export type ResultMessage = z.infer<typeof resultMessageSchema>;

type RawAssistantMessage = z.infer<typeof assistantMessageSchema>;
type RawUserMessage = z.infer<typeof userMessageSchema>;

export interface AssistantMessage extends Omit<RawAssistantMessage, "message"> {
  message: Omit<RawAssistantMessage["message"], "content"> & { content: ContentBlock[] };
}

export interface UserMessage extends Omit<RawUserMessage, "message"> {
  message: {
    role?: string;
    content: string | ContentBlock[];
  };
}

export interface UnknownMessage {
  type: "unknown";
  kind: string;
  subtype?: string;
  raw: Record<string, unknown>;
}

export type AssistantStreamMessage =
  | SystemMessage
  | AssistantMessage
  | UserMessage
  | ResultMessage
  | UnknownMessage;

// Parent -> child
export interface OutboundUserMessage {
  type: "user";
  message: {
    role: "user";
    content: string;
  };
}
