import { z } from "zod";

import { ConfigError, UserInputError } from "./errors.js";
import type { OutputMode } from "./log/formatter.js";
import type { RunCommandOptions } from "./types.js";

const DEFAULT_PROMPT_TIMEOUT_MS = 200;
const MIN_PROMPT_TIMEOUT_MS = 10;
const MAX_PROMPT_TIMEOUT_MS = 10_000;
const PROMPT_TIMEOUT_ENV = "HUSHTEX_PROMPT_TIMEOUT_MS";

// TeX hard-wraps log lines at max_print_line characters, which splits file and page markers.
export const COMPILER_ENV_OVERRIDES = {
  max_print_line: "1000000000"
} as const;

const runConfigSchema = z.object({
  mode: z.enum(["quiet", "verbose"]),
  bell: z.boolean(),
  statusBar: z.boolean(),
  colorize: z.boolean(),
  partialLines: z.boolean(),
  promptTimeoutMs: z.number().int().min(MIN_PROMPT_TIMEOUT_MS).max(MAX_PROMPT_TIMEOUT_MS)
});

export type RunConfig = z.infer<typeof runConfigSchema>;

export interface TerminalCapabilities {
  isTTY: boolean;
  env: NodeJS.ProcessEnv;
}

function parseTimeout(raw: number | string | undefined, source: string): number | undefined {
  if (raw === undefined) return undefined;
  const text = String(raw).trim();
  if (!/^\d+$/.test(text)) {
    throw new UserInputError(`Invalid ${source} value "${text}". Expected a whole number of milliseconds.`);
  }
  return Number.parseInt(text, 10);
}

function resolveMode(options: RunCommandOptions): OutputMode {
  if (options.quiet && options.verbose) {
    throw new UserInputError("Use --quiet or --verbose, not both.");
  }
  return options.verbose ? "verbose" : "quiet";
}

export function resolveRunConfig(
  options: RunCommandOptions,
  terminal: TerminalCapabilities = { isTTY: Boolean(process.stdout.isTTY), env: process.env }
): RunConfig {
  const colorSupported = terminal.isTTY && terminal.env.NO_COLOR === undefined && terminal.env.TERM !== "dumb";
  const promptTimeoutMs =
    parseTimeout(options.promptTimeout, "--prompt-timeout") ??
    parseTimeout(terminal.env[PROMPT_TIMEOUT_ENV], PROMPT_TIMEOUT_ENV) ??
    DEFAULT_PROMPT_TIMEOUT_MS;

  const parsed = runConfigSchema.safeParse({
    mode: resolveMode(options),
    bell: options.bell ?? true,
    statusBar: (options.status ?? true) && terminal.isTTY && terminal.env.TERM !== "dumb",
    colorize: (options.color ?? true) && colorSupported,
    partialLines: options.partial ?? true,
    promptTimeoutMs
  });
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new ConfigError(`Invalid run configuration: ${issues}`, { details: { issues: parsed.error.issues } });
  }
  return parsed.data;
}
