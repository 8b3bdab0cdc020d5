// Turn-driven client interface over an NDJSON session
import type { SessionRecord, SpawnFunction } from "../session";
import type { ToolResultInput } from "../utils";

export interface AgentOptions {
  cwd?: string;
  command?: string;
  model?: string;
  permissionMode?: "default" | "acceptEdits" | "bypassPermissions" | "plan";
  /** `[]` disables every built-in tool and turns on the tool restriction check. */
  tools?: string[];
  allowedTools?: string[];
  /** A session id to resume, or "continue" for the most recent session. */
  sessionId?: string;
  /** File holding the session id between runs. */
  sessionFile?: string;
  jsonSchema?: Record<string, unknown>;
  env?: Record<string, string | undefined>;
  stderrBudget?: number;
  spawn?: SpawnFunction;
}

export type AgentState = "idle" | "starting" | "ready" | "turn_active" | "closed";

export interface TurnResult {
  subtype: string;
  isError: boolean;
  result: string;
  costUsd: number;
  numTurns?: number;
  durationMs?: number;
  sessionId?: string;
  structuredOutput?: unknown;
  /** Assistant text blocks seen during the turn, in order. */
  texts: string[];
  /** The assistant compacted its context during the turn. */
  compacted: boolean;
}

export type MessageCallback = (record: SessionRecord) => void;

export interface CodingAgent {
  start(prompt?: string): Promise<TurnResult | null>;
  sendMessage(text: string): Promise<TurnResult>;
  sendToolResults(results: ToolResultInput[]): Promise<TurnResult>;
  close(): Promise<void>;
  stop(): Promise<void>;
  isRunning(): boolean;
  readonly state: AgentState;
}
