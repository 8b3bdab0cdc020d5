export * from "./agent";
export { parseArgs } from "./args";
export type { CliOptions } from "./args";
export { loadConfig, previewLimits } from "./config";
export type { ProbeConfig } from "./config";
export * from "./errors";
export { LineSplitter, decodeBlock, decodeLine, encodeLine, userMessage } from "./protocol";
export { AsyncQueue } from "./queue";
export { USAGE, makePrinter, run } from "./run";
export type { RunIO } from "./run";
export { NdjsonSession, DEFAULT_STDERR_BUDGET } from "./session";
export type { ChildHandle, ExitStatus, SessionOptions, SessionRecord, SpawnFunction } from "./session";
export {
  ConsolePresenter,
  DEFAULT_PREVIEW_LIMITS,
  ToolCallTracker,
  summarizeDecodeError,
  summarizeMessage,
  toolResultText,
} from "./summary";
export type { LinePrinter, PreviewLimits } from "./summary";
export type * from "./types";
export { formatToolResults, formatToolUse, resolvePath, stripThinkingTags, truncate } from "./utils";
export type { ToolResultInput } from "./utils";
