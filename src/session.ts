import { spawn } from "child_process";
import type { EventEmitter } from "events";
import type { Readable, Writable } from "stream";
import { DecodeError, ProcessExitError, SpawnError, WriteError, describeError } from "./errors";
import { LineSplitter, decodeLine, encodeLine } from "./protocol";
import { AsyncQueue } from "./queue";
import type { AssistantStreamMessage } from "./types";
import { truncate } from "./utils";

/** The subset of ChildProcess a session relies on. */
export interface ChildHandle extends EventEmitter {
  readonly stdin: Writable | null;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  readonly pid?: number;
  kill(signal?: NodeJS.Signals | number): boolean;
}

export type SpawnFunction = (
  command: string,
  args: string[],
  options: { cwd?: string; env: NodeJS.ProcessEnv; stdio: ["pipe", "pipe", "pipe"] }
) => ChildHandle;

export interface SessionOptions {
  command: string;
  args: string[];
  cwd?: string;
  env?: Record<string, string | undefined>;
  stderrBudget?: number;
  spawn?: SpawnFunction;
}

export interface ExitStatus {
  code: number | null;
  signal: NodeJS.Signals | null;
}

export type SessionRecord =
  | { ok: true; message: AssistantStreamMessage }
  | { ok: false; error: DecodeError };

export const DEFAULT_STDERR_BUDGET = 500;

const defaultSpawn: SpawnFunction = (command, args, options) => spawn(command, args, options);

/**
 * A child process speaking NDJSON on stdout and, optionally, on stdin.
 *
 * stdout is read by stream handlers running alongside the caller; every
 * non-empty line is decoded and queued in emission order. Malformed lines are
 * queued as DecodeErrors and reading carries on.
 */
export class NdjsonSession {
  private proc: ChildHandle | null = null;
  private readonly splitter = new LineSplitter();
  private readonly queue = new AsyncQueue<SessionRecord>();
  private stderrBuffer = "";
  private inputClosed = false;
  private exitStatus: ExitStatus | null = null;
  private exited: Promise<ExitStatus> | null = null;
  private readonly options: SessionOptions;

  constructor(options: SessionOptions) {
    this.options = options;
  }

  async start(): Promise<void> {
    const { command, args } = this.options;
    if (this.proc) {
      throw new SpawnError(command, "session already started");
    }

    const spawnFn = this.options.spawn ?? defaultSpawn;
    let proc: ChildHandle;
    try {
      proc = spawnFn(command, args, {
        cwd: this.options.cwd,
        stdio: ["pipe", "pipe", "pipe"],
        env: {
          ...process.env,
          ...this.options.env,
        },
      });
    } catch (e) {
      throw new SpawnError(command, describeError(e), { cause: e });
    }
    this.proc = proc;

    // Decode across chunk boundaries so split multi-byte characters survive
    proc.stdout?.setEncoding("utf8");
    proc.stderr?.setEncoding("utf8");

    proc.stdout?.on("data", (data: string) => {
      for (const line of this.splitter.push(data)) {
        this.handleLine(line);
      }
    });

    proc.stdout?.on("end", () => this.endOfOutput());

    proc.stderr?.on("data", (data: string) => {
      this.stderrBuffer += data;
    });

    // EPIPE and friends surface through the write callback in send()
    proc.stdin?.on("error", (err: Error) => {
      this.inputClosed = true;
      this.stderrBuffer += `[stdin] ${err.message}\n`;
    });

    this.exited = new Promise<ExitStatus>((resolve) => {
      proc.once("close", (code: number | null, signal: NodeJS.Signals | null) => {
        this.exitStatus = { code, signal };
        this.inputClosed = true;
        this.endOfOutput();
        resolve(this.exitStatus);
      });
    });

    await new Promise<void>((resolve, reject) => {
      const onSpawn = (): void => {
        proc.off("error", onError);
        proc.on("error", (err: Error) => {
          console.error(`[${command}] ${err.message}`);
        });
        resolve();
      };
      const onError = (err: Error): void => {
        proc.off("spawn", onSpawn);
        this.inputClosed = true;
        reject(new SpawnError(command, err.message, { cause: err }));
      };
      proc.once("spawn", onSpawn);
      proc.once("error", onError);
    });
  }

  private handleLine(line: string): void {
    try {
      this.queue.push({ ok: true, message: decodeLine(line) });
    } catch (e) {
      if (!(e instanceof DecodeError)) throw e;
      this.queue.push({ ok: false, error: e });
    }
  }

  private endOfOutput(): void {
    if (this.queue.isClosed) return;
    for (const line of this.splitter.flush()) {
      this.handleLine(line);
    }
    this.queue.close();
  }

  /** Decoded stdout lines in the order the child wrote them. Single consumer. */
  messages(): AsyncIterableIterator<SessionRecord> {
    return this.queue;
  }

  async send(message: object): Promise<void> {
    const stdin = this.proc?.stdin;
    if (!stdin) {
      throw new WriteError("Process not started");
    }
    if (this.inputClosed || stdin.destroyed || stdin.writableEnded) {
      throw new WriteError("stdin is closed");
    }

    const line = encodeLine(message);
    await new Promise<void>((resolve, reject) => {
      stdin.write(line, (err) => {
        if (err) {
          reject(new WriteError(`Write failed: ${err.message}`, { cause: err }));
        } else {
          resolve();
        }
      });
    });
  }

  /** Tell the child no more input is coming. */
  closeInput(): void {
    if (this.inputClosed) return;
    this.inputClosed = true;
    this.proc?.stdin?.end();
  }

  get isInputOpen(): boolean {
    return this.proc !== null && !this.inputClosed;
  }

  isRunning(): boolean {
    return this.proc !== null && this.exitStatus === null;
  }

  get pid(): number | undefined {
    return this.proc?.pid;
  }

  async wait(): Promise<ExitStatus> {
    if (!this.exited) {
      throw new SpawnError(this.options.command, "session not started");
    }
    return this.exited;
  }

  drainStderr(): string {
    const text = this.stderrBuffer;
    this.stderrBuffer = "";
    return truncate(text, this.options.stderrBudget ?? DEFAULT_STDERR_BUDGET);
  }

  /** Close stdin, wait for exit and fail on a non-zero status. */
  async finish(): Promise<{ status: ExitStatus; stderr: string }> {
    this.closeInput();
    const status = await this.wait();
    const stderr = this.drainStderr();
    if (status.code !== 0) {
      throw new ProcessExitError(status.code, status.signal, stderr);
    }
    return { status, stderr };
  }

  kill(signal: NodeJS.Signals = "SIGTERM"): void {
    if (this.proc && this.exitStatus === null) {
      this.proc.kill(signal);
    }
  }
}
