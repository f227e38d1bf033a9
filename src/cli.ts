import { log } from "@clack/prompts";
import { CommanderError } from "commander";

import { runCompile } from "./commands/run.js";
import { CompilerExitError, normalizeError } from "./core/errors.js";
import { createProgram } from "./program.js";

async function main(): Promise<void> {
  const program = createProgram((command, args, options) => runCompile(command, args, options));
  program.exitOverride();
  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    // commander has already printed its own usage errors, help and version.
    if (error instanceof CommanderError) {
      process.exitCode = error.exitCode === 0 ? 0 : normalizeError(error).exitCode;
      return;
    }
    const normalized = normalizeError(error);
    // The compiler has printed its own errors; its exit status only gets a warning.
    if (normalized instanceof CompilerExitError) log.warn(normalized.message);
    else log.error(normalized.message);
    process.exitCode = normalized.exitCode;
  }
}

void main();
