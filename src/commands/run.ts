import { log } from "@clack/prompts";

import { runCompiler, type CompilerResult, type SpawnCompiler } from "../core/compiler/process-runner.js";
import { createOperatorInput } from "../core/compiler/operator-input.js";
import type { OperatorInput } from "../core/compiler/prompt-relay.js";
import { resolveRunConfig, type TerminalCapabilities } from "../core/config.js";
import { CompilerExitError } from "../core/errors.js";
import { createRenderer, type OutputRenderer } from "../core/terminal/renderer.js";
import type { RunCommandOptions } from "../core/types.js";

export interface RunCompileDependencies {
  terminal?: TerminalCapabilities | undefined;
  spawn?: SpawnCompiler | undefined;
  operator?: OperatorInput | undefined;
  write?: ((chunk: string) => void) | undefined;
  cwd?: string | undefined;
}

export async function runCompile(
  command: string,
  args: readonly string[],
  options: RunCommandOptions,
  dependencies: RunCompileDependencies = {}
): Promise<CompilerResult> {
  const terminal = dependencies.terminal ?? { isTTY: Boolean(process.stdout.isTTY), env: process.env };
  const config = resolveRunConfig(options, terminal);
  const renderer: OutputRenderer = createRenderer({
    statusBar: config.statusBar,
    colorize: config.colorize,
    bell: config.bell,
    write: dependencies.write
  });

  if (config.mode === "verbose") {
    log.info(`Running ${[command, ...args].join(" ")}`);
    renderer.log("hushtex enabled");
  }

  const result = await runCompiler({
    command,
    args,
    config,
    renderer,
    operator: dependencies.operator ?? createOperatorInput(),
    cwd: dependencies.cwd,
    env: terminal.env,
    spawn: dependencies.spawn
  });

  if (result.exitCode !== 0) throw new CompilerExitError(command, result.exitCode, result.signal);
  return result;
}
