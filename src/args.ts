// Command-line argument parsing for the probe CLI
import type { AgentOptions } from "./agent";
import { resolvePath } from "./utils";

export interface CliOptions {
  chat: boolean;
  json: boolean;
  quiet: boolean;
  help: boolean;
  prompts: string[];
  agent: AgentOptions;
  jsonSchemaPath?: string;
}

export function parseArgs(argv: string[], cwd: string, home: string): CliOptions {
  const options: CliOptions = {
    chat: false,
    json: false,
    quiet: false,
    help: false,
    prompts: [],
    agent: { cwd },
  };

  const value = (i: number, flag: string): string => {
    const next = argv[i];
    if (next === undefined) {
      throw new Error(`${flag} requires a value`);
    }
    return next;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case "-h":
      case "--help":
        options.help = true;
        break;
      case "--chat":
        options.chat = true;
        break;
      case "--no-tools":
        options.agent.tools = [];
        break;
      case "--tools":
        options.agent.tools = value(++i, arg)
          .split(",")
          .map((tool) => tool.trim())
          .filter(Boolean);
        break;
      case "--model":
        options.agent.model = value(++i, arg);
        break;
      case "--cwd":
        options.agent.cwd = resolvePath(value(++i, arg), cwd, home);
        break;
      case "--continue":
        options.agent.sessionId = "continue";
        break;
      case "--resume":
        options.agent.sessionId = value(++i, arg);
        break;
      case "--session-file":
        options.agent.sessionFile = resolvePath(value(++i, arg), cwd, home);
        break;
      case "--json-schema":
        options.jsonSchemaPath = resolvePath(value(++i, arg), cwd, home);
        break;
      case "--json":
        options.json = true;
        break;
      case "--quiet":
        options.quiet = true;
        break;
      case "--":
        options.prompts.push(...argv.slice(i + 1));
        i = argv.length;
        break;
      default:
        if (arg.startsWith("-")) {
          throw new Error(`Unknown option: ${arg}`);
        }
        options.prompts.push(arg);
    }
  }

  return options;
}
