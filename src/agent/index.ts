export { ClaudeAgent, TurnCollector, buildAssistantArgs, runOnce, unexpectedTools, DEFAULT_COMMAND } from "./claude";
export type { InvocationMode } from "./claude";
export { loadSessionId, saveSessionId } from "./session-store";
export type { AgentOptions, AgentState, CodingAgent, MessageCallback, TurnResult } from "./types";
