import { Command } from "commander";

import type { RunCommandOptions } from "./core/types.js";
import packageJson from "../package.json" with { type: "json" };

export type CompileRunner = (command: string, args: string[], options: RunCommandOptions) => Promise<unknown>;

const CLI_VERSION = packageJson.version;

export function createProgram(runner: CompileRunner): Command {
  const program = new Command();

  program
    .name("hushtex")
    .description("Run a TeX compiler and show only the output that matters, with a live page and file status line.")
    .version(CLI_VERSION)
    .argument("<command>", "Compiler to run, e.g. pdflatex or lualatex")
    .argument("[args...]", "Arguments passed to the compiler unchanged")
    .option("-q, --quiet", "Hide file, image and aux traffic (default)")
    .option("-v, --verbose", "Show file, image and aux traffic dimmed")
    .option("--no-bell", "Do not ring the terminal bell on errors")
    .option("--no-status", "Do not pin a status line below the output")
    .option("--no-color", "Disable colours")
    .option("--no-partial", "Only process complete lines")
    .option("--prompt-timeout <ms>", "Idle time before a bare \"? \" counts as an input prompt (10-10000)")
    .passThroughOptions()
    .showHelpAfterError()
    .action(async (command: string, args: string[], options: RunCommandOptions) => {
      await runner(command, args, options);
    });

  return program;
}
