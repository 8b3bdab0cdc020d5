import { ProcessExitError, SpawnError, ToolRestrictionError, TurnInProgressError, WriteError } from "../errors";
import { userMessage } from "../protocol";
import { NdjsonSession } from "../session";
import type { AssistantMessage, AssistantStreamMessage, ResultMessage, SystemMessage } from "../types";
import { formatToolResults, type ToolResultInput } from "../utils";
import { loadSessionId, saveSessionId } from "./session-store";
import type { AgentOptions, AgentState, CodingAgent, MessageCallback, TurnResult } from "./types";

export const DEFAULT_COMMAND = "claude";

// Reported even when every built-in tool is disabled, when a JSON schema is set
const SCHEMA_TOOL = "StructuredOutput";

export interface InvocationMode {
  /** Keep stdin open for stream-json input. */
  interactive: boolean;
  /** Single-shot prompt, passed after `--`. Ignored in interactive mode. */
  prompt?: string;
  resume?: string | null;
}

export function buildAssistantArgs(options: AgentOptions, mode: InvocationMode): string[] {
  const args = ["--print", "--output-format", "stream-json", "--verbose"];

  if (mode.interactive) {
    args.push("--input-format", "stream-json");
  }

  if (options.model) {
    args.push("--model", options.model);
  }

  if (options.permissionMode) {
    args.push("--permission-mode", options.permissionMode);
  }

  // An empty list disables all tools
  if (options.tools) {
    args.push("--tools", options.tools.join(","));
  }

  if (options.allowedTools?.length) {
    args.push("--allowedTools", options.allowedTools.join(","));
  }

  if (mode.resume === "continue") {
    args.push("--continue");
  } else if (mode.resume) {
    args.push("--resume", mode.resume);
  }

  if (options.jsonSchema) {
    args.push("--json-schema", JSON.stringify(options.jsonSchema));
  }

  if (!mode.interactive && mode.prompt !== undefined) {
    args.push("--", mode.prompt);
  }

  return args;
}

/** Tools the assistant reported although the options disabled all of them. */
export function unexpectedTools(options: AgentOptions, system: SystemMessage): string[] {
  if (!options.tools || options.tools.length > 0) return [];
  return (system.tools ?? []).filter((tool) => tool !== SCHEMA_TOOL);
}

/**
 * Accumulates what one turn produced until its result message arrives.
 */
export class TurnCollector {
  private texts: string[] = [];
  private compacted = false;

  addAssistant(message: AssistantMessage): void {
    for (const block of message.message.content) {
      if (block.type === "text" && block.text.trim()) {
        this.texts.push(block.text);
      }
    }
    if (message.message.context_management?.truncated_content_length !== undefined) {
      this.compacted = true;
    }
  }

  finish(result: ResultMessage): TurnResult {
    const subtype = result.subtype ?? "unknown";
    const turn: TurnResult = {
      subtype,
      isError: result.is_error ?? subtype !== "success",
      result: result.result ?? "",
      costUsd: result.total_cost_usd ?? 0,
      numTurns: result.num_turns,
      durationMs: result.duration_ms,
      sessionId: result.session_id,
      structuredOutput: result.structured_output,
      texts: this.texts,
      compacted: this.compacted,
    };
    this.texts = [];
    this.compacted = false;
    return turn;
  }
}

interface PendingTurn {
  resolve: (result: TurnResult) => void;
  reject: (error: Error) => void;
}

/** Write the id only when it differs from what the file already holds. */
function storeSessionId(file: string, saved: string | null, sessionId: string): string {
  if (sessionId !== saved) {
    saveSessionId(file, sessionId);
  }
  return sessionId;
}

function resolveResume(options: AgentOptions): string | null {
  if (options.sessionId) return options.sessionId;
  if (options.sessionFile) return loadSessionId(options.sessionFile);
  return null;
}

/**
 * Drives the assistant CLI in stream-json input mode, one turn at a time.
 *
 * A turn ends when a `result` message arrives; only then may the next message
 * be sent. Every decoded record is also handed to `onMessage`.
 */
export class ClaudeAgent implements CodingAgent {
  private session: NdjsonSession | null = null;
  private pump: Promise<void> | null = null;
  private pending: PendingTurn | null = null;
  private failure: Error | null = null;
  private collector = new TurnCollector();
  private currentState: AgentState = "idle";
  private savedSessionId: string | null = null;
  private options: AgentOptions;
  private onMessage?: MessageCallback;

  sessionId: string | null = null;
  model: string | null = null;
  tools: string[] = [];

  constructor(options: AgentOptions, onMessage?: MessageCallback) {
    this.options = options;
    this.onMessage = onMessage;
  }

  get state(): AgentState {
    return this.currentState;
  }

  async start(prompt?: string): Promise<TurnResult | null> {
    const command = this.options.command ?? DEFAULT_COMMAND;
    if (this.session) {
      throw new SpawnError(command, "agent already started");
    }

    const resume = resolveResume(this.options);
    if (this.options.sessionFile) {
      this.savedSessionId = loadSessionId(this.options.sessionFile);
    }
    const session = new NdjsonSession({
      command,
      args: buildAssistantArgs(this.options, { interactive: true, resume }),
      cwd: this.options.cwd,
      env: this.options.env,
      stderrBudget: this.options.stderrBudget,
      spawn: this.options.spawn,
    });
    this.session = session;
    this.currentState = "starting";

    try {
      await session.start();
    } catch (e) {
      this.currentState = "closed";
      throw e;
    }

    this.pump = this.consume(session);

    if (prompt === undefined) {
      return null;
    }
    return this.sendMessage(prompt);
  }

  private async consume(session: NdjsonSession): Promise<void> {
    try {
      for await (const record of session.messages()) {
        this.onMessage?.(record);
        if (record.ok) {
          this.handleMessage(record.message);
        }
      }
      const status = await session.wait();
      if (this.pending) {
        this.fail(new ProcessExitError(status.code, status.signal, session.drainStderr()));
      }
    } catch (e) {
      this.fail(e instanceof Error ? e : new Error(String(e)));
    } finally {
      this.currentState = "closed";
    }
  }

  private handleMessage(message: AssistantStreamMessage): void {
    switch (message.type) {
      case "system": {
        if (message.session_id) this.sessionId = message.session_id;
        if (message.model) this.model = message.model;
        if (message.tools) this.tools = message.tools;

        const unexpected = unexpectedTools(this.options, message);
        if (unexpected.length) {
          this.fail(new ToolRestrictionError(unexpected));
          this.session?.kill();
          return;
        }

        if (this.currentState === "starting") {
          this.currentState = "ready";
        }
        break;
      }

      case "assistant":
        this.collector.addAssistant(message);
        break;

      case "result": {
        const turn = this.collector.finish(message);
        this.rememberSession(turn.sessionId);
        const pending = this.pending;
        this.pending = null;
        if (this.currentState === "turn_active") {
          this.currentState = "ready";
        }
        pending?.resolve(turn);
        break;
      }

      default:
        break;
    }
  }

  private rememberSession(sessionId: string | undefined): void {
    if (!sessionId) return;
    this.sessionId = sessionId;
    if (this.options.sessionFile) {
      this.savedSessionId = storeSessionId(this.options.sessionFile, this.savedSessionId, sessionId);
    }
  }

  private fail(error: Error): void {
    if (!this.failure) {
      this.failure = error;
    }
    const pending = this.pending;
    this.pending = null;
    pending?.reject(error);
  }

  async sendMessage(text: string): Promise<TurnResult> {
    const session = this.session;
    if (this.failure) {
      throw this.failure;
    }
    if (!session || this.currentState === "closed" || !session.isInputOpen) {
      throw new WriteError("Session is closed");
    }
    if (this.pending) {
      throw new TurnInProgressError();
    }

    const turn = new Promise<TurnResult>((resolve, reject) => {
      this.pending = { resolve, reject };
    });
    // The process may fail the turn while the write is still in flight
    void turn.catch(() => undefined);
    this.currentState = "turn_active";

    try {
      await session.send(userMessage(text));
    } catch (e) {
      const pending = this.pending;
      this.pending = null;
      this.currentState = "closed";
      pending?.reject(e instanceof Error ? e : new Error(String(e)));
      throw e;
    }
    return turn;
  }

  async sendToolResults(results: ToolResultInput[]): Promise<TurnResult> {
    return this.sendMessage(formatToolResults(results));
  }

  /** Close stdin and wait for a clean exit. */
  async close(): Promise<void> {
    const session = this.session;
    if (!session) return;

    session.closeInput();
    await this.pump;
    this.currentState = "closed";
    if (this.failure) {
      throw this.failure;
    }
    await session.finish();
  }

  async stop(): Promise<void> {
    this.session?.kill();
    this.currentState = "closed";
  }

  isRunning(): boolean {
    return this.session?.isRunning() ?? false;
  }
}

/**
 * Single-shot run: the prompt goes on the command line, stdin is closed at
 * once and the output is streamed until the process exits.
 * Returns the last turn result, or null when none arrived.
 */
export async function runOnce(
  prompt: string,
  options: AgentOptions,
  onMessage?: MessageCallback
): Promise<TurnResult | null> {
  const session = new NdjsonSession({
    command: options.command ?? DEFAULT_COMMAND,
    args: buildAssistantArgs(options, { interactive: false, prompt, resume: resolveResume(options) }),
    cwd: options.cwd,
    env: options.env,
    stderrBudget: options.stderrBudget,
    spawn: options.spawn,
  });

  await session.start();
  session.closeInput();

  const collector = new TurnCollector();
  let last: TurnResult | null = null;
  let restriction: ToolRestrictionError | null = null;
  let savedSessionId = options.sessionFile ? loadSessionId(options.sessionFile) : null;

  for await (const record of session.messages()) {
    onMessage?.(record);
    if (!record.ok) continue;

    const message = record.message;
    if (message.type === "system") {
      const unexpected = unexpectedTools(options, message);
      if (unexpected.length && !restriction) {
        restriction = new ToolRestrictionError(unexpected);
        session.kill();
      }
    } else if (message.type === "assistant") {
      collector.addAssistant(message);
    } else if (message.type === "result") {
      last = collector.finish(message);
      if (options.sessionFile && last.sessionId) {
        savedSessionId = storeSessionId(options.sessionFile, savedSessionId, last.sessionId);
      }
    }
  }

  if (restriction) {
    throw restriction;
  }
  await session.finish();
  return last;
}
