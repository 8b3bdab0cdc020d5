// Run modes behind the assistant-probe binary
import * as fs from "fs";
import { z } from "zod";
import { ClaudeAgent, runOnce, type AgentOptions, type TurnResult } from "./agent";
import type { CliOptions } from "./args";
import { loadConfig, previewLimits } from "./config";
import { ProcessExitError, describeError } from "./errors";
import type { SessionRecord, SpawnFunction } from "./session";
import { ConsolePresenter, type LinePrinter } from "./summary";
import { stripThinkingTags } from "./utils";

export const USAGE = `
Usage: assistant-probe [options] <prompt...>

Options:
  --chat                Multi-turn run; each prompt is one turn
  --no-tools            Disable every built-in tool
  --tools <a,b>         Restrict the built-in tools
  --model <name>        Model to request
  --cwd <path>          Working directory (default: current directory)
  --continue            Continue most recent session
  --resume <id>         Resume a specific session
  --session-file <path> Load and store the session id in a file
  --json-schema <path>  Ask for structured output matching a JSON schema file
  --json                Print raw JSON lines instead of summaries
  --quiet               Only print assistant text and errors
  -h, --help            Show this help

Examples:
  assistant-probe "What is 2 + 2? Reply with just the number."
  assistant-probe --no-tools "Hey, what's up?"
  assistant-probe --chat "Say hello briefly" "Now say goodbye"
  echo "explain the codebase" | assistant-probe --cwd ~/project
`;

/** Where a run reads its environment and writes its output. */
export interface RunIO {
  out: LinePrinter;
  err: LinePrinter;
  env: NodeJS.ProcessEnv;
  /** Prompt text piped on stdin, used when no prompt arguments are given. */
  readStdin: () => Promise<string>;
  /** Registers the chat-mode interrupt handler. */
  onInterrupt?: (stop: () => Promise<void>) => void;
  spawn?: SpawnFunction;
}

function readJsonSchema(file: string): Record<string, unknown> {
  const parsed = z.record(z.unknown()).safeParse(JSON.parse(fs.readFileSync(file, "utf-8")));
  if (!parsed.success) {
    throw new Error(`${file} does not contain a JSON object`);
  }
  return parsed.data;
}

export function makePrinter(
  cli: Pick<CliOptions, "json" | "quiet">,
  io: Pick<RunIO, "out" | "err">,
  presenter: ConsolePresenter
): (record: SessionRecord) => void {
  return (record) => {
    if (cli.json) {
      if (!record.ok) {
        io.out(record.error.line);
      } else {
        const { message } = record;
        io.out(JSON.stringify(message.type === "unknown" ? message.raw : message));
      }
      return;
    }
    if (cli.quiet) {
      if (!record.ok) {
        io.err(`[parse error] ${record.error.message}`);
      } else if (record.message.type === "assistant") {
        for (const block of record.message.message.content) {
          if (block.type !== "text") continue;
          const text = stripThinkingTags(block.text);
          if (text) io.out(text);
        }
      }
      return;
    }
    presenter.present(record);
  };
}

function reportTurn(turn: TurnResult, cli: CliOptions, io: RunIO): void {
  if (cli.json || cli.quiet) return;
  const parts = [`$${turn.costUsd.toFixed(4)}`];
  if (turn.durationMs !== undefined) parts.unshift(`${turn.durationMs}ms`);
  if (turn.compacted) parts.push("context compacted");
  io.out(`[${turn.isError ? "error" : "done"}] ${parts.join(" | ")}`);
}

async function execute(cli: CliOptions, io: RunIO): Promise<number> {
  const config = loadConfig(io.env);

  const agentOptions: AgentOptions = {
    ...cli.agent,
    command: config.bin,
    model: cli.agent.model ?? config.model,
    sessionFile: cli.agent.sessionFile ?? config.sessionFile,
    stderrBudget: config.stderrBudgetChars,
    jsonSchema: cli.jsonSchemaPath ? readJsonSchema(cli.jsonSchemaPath) : undefined,
    spawn: io.spawn,
  };

  const presenter = new ConsolePresenter({ limits: previewLimits(config), print: io.out });
  const onMessage = makePrinter(cli, io, presenter);

  let prompts = cli.prompts;
  if (!prompts.length) {
    const piped = await io.readStdin();
    prompts = piped ? [piped] : [];
  }
  if (!prompts.length) {
    io.out(USAGE);
    return 1;
  }

  if (!cli.chat) {
    const turn = await runOnce(prompts.join(" "), agentOptions, onMessage);
    if (!turn) {
      io.err("[error] no result message received");
      return 1;
    }
    reportTurn(turn, cli, io);
    if (turn.isError) {
      io.err(turn.result);
      return 1;
    }
    return 0;
  }

  const agent = new ClaudeAgent(agentOptions, onMessage);
  io.onInterrupt?.(() => agent.stop());

  await agent.start();
  let failed = false;
  try {
    for (const prompt of prompts) {
      if (!cli.quiet && !cli.json) {
        io.out(`\n[sending] ${prompt}`);
      }
      // Resolves on the turn's result message, not on a timer
      const turn = await agent.sendMessage(prompt);
      reportTurn(turn, cli, io);
      if (turn.isError) {
        failed = true;
        io.err(turn.result);
        break;
      }
    }
  } catch (e) {
    await agent.stop();
    throw e;
  }
  await agent.close();
  return failed ? 1 : 0;
}

/**
 * Run the parsed command line and return the process exit code.
 * Failures are reported on `io.err`; a process that exited abnormally also
 * gets its captured stderr printed.
 */
export async function run(cli: CliOptions, io: RunIO): Promise<number> {
  try {
    return await execute(cli, io);
  } catch (e) {
    io.err(`Error: ${describeError(e)}`);
    if (e instanceof ProcessExitError && e.stderr) {
      io.err(`\n[stderr]\n${e.stderr}`);
    }
    return 1;
  }
}
