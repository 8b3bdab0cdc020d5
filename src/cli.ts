#!/usr/bin/env node
// CLI for probing the assistant's NDJSON protocol from a terminal

import * as dotenv from "dotenv";
import * as os from "os";
import { parseArgs, type CliOptions } from "./args";
import { describeError } from "./errors";
import { USAGE, run } from "./run";

async function readStdin(): Promise<string> {
  if (process.stdin.isTTY) return "";
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString().trim();
}

async function main(): Promise<void> {
  let cli: CliOptions;
  try {
    cli = parseArgs(process.argv.slice(2), process.cwd(), os.homedir());
  } catch (e) {
    console.error(`Error: ${describeError(e)}`);
    console.log(USAGE);
    process.exit(1);
  }

  if (cli.help) {
    console.log(USAGE);
    process.exit(0);
  }

  dotenv.config();
  process.exitCode = await run(cli, {
    out: (line) => console.log(line),
    err: (line) => console.error(line),
    env: process.env,
    readStdin,
    onInterrupt: (stop) => {
      process.once("SIGINT", () => {
        console.log("\n[interrupted]");
        void stop().finally(() => process.exit(130));
      });
    },
  });
}

if (require.main === module) {
  main().catch((e: unknown) => {
    console.error(`Error: ${describeError(e)}`);
    process.exit(1);
  });
}
