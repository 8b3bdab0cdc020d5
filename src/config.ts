import { z } from "zod";
import { ConfigError } from "./errors";
import type { PreviewLimits } from "./summary";

const positiveInt = (fallback: number) =>
  z
    .union([z.string(), z.number()])
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value === "") return fallback;
      const parsed = typeof value === "number" ? value : Number(value);
      if (!Number.isInteger(parsed) || parsed <= 0) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: "must be a positive integer" });
        return z.NEVER;
      }
      return parsed;
    });

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const configSchema = z.object({
  bin: z.string().min(1).default("claude"),
  model: optionalString,
  sessionFile: optionalString,
  previewTextChars: positiveInt(200),
  previewToolChars: positiveInt(150),
  previewRawChars: positiveInt(100),
  stderrBudgetChars: positiveInt(500),
});

export type ProbeConfig = z.infer<typeof configSchema>;

const ENV_KEYS: Record<keyof ProbeConfig, string> = {
  bin: "ASSISTANT_BIN",
  model: "ASSISTANT_MODEL",
  sessionFile: "ASSISTANT_SESSION_FILE",
  previewTextChars: "PREVIEW_TEXT_CHARS",
  previewToolChars: "PREVIEW_TOOL_CHARS",
  previewRawChars: "PREVIEW_RAW_CHARS",
  stderrBudgetChars: "STDERR_BUDGET_CHARS",
};

function isConfigKey(key: unknown): key is keyof ProbeConfig {
  return typeof key === "string" && Object.prototype.hasOwnProperty.call(ENV_KEYS, key);
}

/**
 * Read configuration from the environment. The CLI loads `.env` into
 * process.env with dotenv before calling this.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ProbeConfig {
  const parsed = configSchema.safeParse({
    bin: env.ASSISTANT_BIN || undefined,
    model: env.ASSISTANT_MODEL,
    sessionFile: env.ASSISTANT_SESSION_FILE,
    previewTextChars: env.PREVIEW_TEXT_CHARS,
    previewToolChars: env.PREVIEW_TOOL_CHARS,
    previewRawChars: env.PREVIEW_RAW_CHARS,
    stderrBudgetChars: env.STDERR_BUDGET_CHARS,
  });

  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => {
      const key = issue.path[0];
      const name = isConfigKey(key) ? ENV_KEYS[key] : String(key);
      return `${name} ${issue.message}`;
    });
    throw new ConfigError(`Invalid configuration: ${problems.join("; ")}`);
  }
  return parsed.data;
}

export function previewLimits(config: ProbeConfig): PreviewLimits {
  return {
    text: config.previewTextChars,
    tool: config.previewToolChars,
    raw: config.previewRawChars,
  };
}
