import { spawn, type SpawnOptions } from "node:child_process";
import { constants } from "node:os";
import type { Readable, Writable } from "node:stream";

import { COMPILER_ENV_OVERRIDES, type RunConfig } from "../config.js";
import { CompilerStartError, normalizeError } from "../errors.js";
import { consumeCompleteLines, createLogStream } from "../log/stream.js";
import type { OutputRenderer } from "../terminal/renderer.js";
import { PromptRelay, type CompilerInput, type OperatorInput } from "./prompt-relay.js";

export interface CompilerProcess {
  readonly stdin: Writable | null;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals): boolean;
  on(event: "error", listener: (error: Error) => void): this;
  on(event: "close", listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
}

export type SpawnCompiler = (command: string, args: readonly string[], options: SpawnOptions) => CompilerProcess;

export interface RunCompilerOptions {
  command: string;
  args: readonly string[];
  config: RunConfig;
  renderer: OutputRenderer;
  operator: OperatorInput;
  cwd?: string | undefined;
  env?: NodeJS.ProcessEnv | undefined;
  spawn?: SpawnCompiler | undefined;
}

export interface CompilerResult {
  exitCode: number;
  signal: NodeJS.Signals | null;
}

const spawnProcess: SpawnCompiler = (command, args, options) => spawn(command, args, options);

function exitCodeForSignal(signal: NodeJS.Signals): number {
  const match = Object.entries(constants.signals).find(([name]) => name === signal);
  const value: unknown = match?.[1];
  return typeof value === "number" ? 128 + value : 1;
}

/**
 * Runs the compiler with its stdout fed through the log stream and its stdin reserved for the
 * prompt relay.
 *
 * Resolves with the compiler's exit status; rejects only when the compiler could not be started or
 * the operator prompt failed.
 */
export function runCompiler(options: RunCompilerOptions): Promise<CompilerResult> {
  const { command, config, renderer } = options;
  const spawnCompiler = options.spawn ?? spawnProcess;

  return new Promise((resolveResult, rejectResult) => {
    let done = false;
    let idleTimer: NodeJS.Timeout | undefined;
    let stderrPending = "";

    const stream = createLogStream({
      mode: config.mode,
      partialLines: config.partialLines,
      onUpdate: (update) => renderer.render(update)
    });

    const child = spawnCompiler(command, options.args, {
      cwd: options.cwd,
      env: { ...(options.env ?? process.env), ...COMPILER_ENV_OVERRIDES },
      stdio: ["pipe", "pipe", "pipe"]
    });

    const compilerInput: CompilerInput = {
      write: (text) => {
        child.stdin?.write(text);
      },
      sendInterrupt: () => {
        child.kill("SIGINT");
      },
      sendEndOfTransmission: () => {
        child.stdin?.end();
      }
    };
    const relay = new PromptRelay(options.operator, compilerInput);

    const clearIdleTimer = (): void => {
      if (idleTimer === undefined) return;
      clearTimeout(idleTimer);
      idleTimer = undefined;
    };

    const fail = (error: unknown): void => {
      if (done) return;
      done = true;
      clearIdleTimer();
      renderer.finish();
      rejectResult(normalizeError(error));
    };

    const onIdle = (): void => {
      idleTimer = undefined;
      if (done || !relay.shouldPrompt(stream.pending())) return;
      renderer.beforePrompt();
      const prompt = stream.takePending();
      void relay.relay(prompt).catch((error: unknown) => {
        child.kill("SIGTERM");
        fail(error);
      });
    };

    const scheduleIdleCheck = (): void => {
      clearIdleTimer();
      idleTimer = setTimeout(onIdle, config.promptTimeoutMs);
    };

    const relayStderrLine = (line: string): void => {
      if (line.trim().length === 0) return;
      renderer.log(line, "none");
    };

    if (child.stdout) {
      child.stdout.setEncoding("utf8");
      child.stdout.on("data", (chunk: string) => {
        if (done) return;
        stream.push(chunk);
        scheduleIdleCheck();
      });
    }

    if (child.stderr) {
      child.stderr.setEncoding("utf8");
      child.stderr.on("data", (chunk: string) => {
        if (done) return;
        stderrPending = consumeCompleteLines(stderrPending + chunk, relayStderrLine);
      });
    }

    // Writes after the compiler exited fail with EPIPE; the close handler reports the exit instead.
    child.stdin?.on("error", (error: Error) => {
      if (done) return;
      renderer.log(`Could not write to the compiler: ${error.message}`, "warning");
    });

    child.on("error", (error) => {
      fail(new CompilerStartError(command, error));
    });

    child.on("close", (code, signal) => {
      if (done) return;
      done = true;
      clearIdleTimer();
      stream.flush();
      relayStderrLine(stderrPending);
      stderrPending = "";
      renderer.finish();
      resolveResult({
        exitCode: code ?? (signal ? exitCodeForSignal(signal) : 1),
        signal
      });
    });
  });
}
