// Error taxonomy for the NDJSON session and the turn client

export class ProbeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The executable could not be found or launched. */
export class SpawnError extends ProbeError {
  readonly command: string;

  constructor(command: string, reason: string, options?: { cause?: unknown }) {
    super(`Failed to spawn ${command}: ${reason}`, options);
    this.command = command;
  }
}

/** One output line could not be decoded. Never fatal to the read loop. */
export class DecodeError extends ProbeError {
  readonly line: string;

  constructor(line: string, reason: string, options?: { cause?: unknown }) {
    super(`Failed to decode line: ${reason}`, options);
    this.line = line;
  }
}

export class WriteError extends ProbeError {}

export class ProcessExitError extends ProbeError {
  readonly code: number | null;
  readonly signal: NodeJS.Signals | null;
  readonly stderr: string;

  constructor(code: number | null, signal: NodeJS.Signals | null, stderr: string) {
    const status = signal ? `signal ${signal}` : `code ${code}`;
    super(`Process exited with ${status}`);
    this.code = code;
    this.signal = signal;
    this.stderr = stderr;
  }
}

export class TurnInProgressError extends ProbeError {
  constructor() {
    super("A turn is already in progress; wait for its result before sending");
  }
}

export class ToolRestrictionError extends ProbeError {
  readonly tools: string[];

  constructor(tools: string[]) {
    super(`Tools were disabled but the assistant reported: ${tools.join(", ")}`);
    this.tools = tools;
  }
}

export class ConfigError extends ProbeError {}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
