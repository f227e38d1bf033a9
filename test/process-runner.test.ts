import { EventEmitter } from "node:events";
import { PassThrough } from "node:stream";

import { afterEach, describe, expect, it, vi } from "vitest";

import { runCompiler } from "../src/core/compiler/process-runner.js";
import type { OperatorReply } from "../src/core/compiler/prompt-relay.js";
import type { RunConfig } from "../src/core/config.js";
import { CompilerStartError, ExecutionError } from "../src/core/errors.js";
import { PlainRenderer } from "../src/core/terminal/renderer.js";

class FakeCompiler extends EventEmitter {
  readonly stdin = new PassThrough();
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly kill = vi.fn<(signal?: NodeJS.Signals) => boolean>(() => true);
}

const CONFIG: RunConfig = {
  mode: "quiet",
  bell: false,
  statusBar: false,
  colorize: false,
  partialLines: true,
  promptTimeoutMs: 200
};

function setup(replies: OperatorReply[] = []) {
  const child = new FakeCompiler();
  const chunks: string[] = [];
  const read = vi.fn<(prompt: string) => Promise<OperatorReply>>();
  for (const reply of replies) read.mockResolvedValueOnce(reply);
  const spawn = vi.fn(() => child);
  const run = runCompiler({
    command: "pdflatex",
    args: ["-interaction=scrollmode", "main.tex"],
    config: CONFIG,
    renderer: new PlainRenderer({ write: (chunk) => chunks.push(chunk) }),
    operator: { read },
    env: { PATH: "/usr/bin" },
    spawn
  });
  return { child, read, spawn, run, output: () => chunks.join("") };
}

describe("runCompiler", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("starts the compiler with piped stdio and unwrapped log lines", async () => {
    const { child, spawn, run } = setup();
    child.emit("close", 0, null);

    await expect(run).resolves.toEqual({ exitCode: 0, signal: null });
    expect(spawn).toHaveBeenCalledWith(
      "pdflatex",
      ["-interaction=scrollmode", "main.tex"],
      expect.objectContaining({
        env: { PATH: "/usr/bin", max_print_line: "1000000000" },
        stdio: ["pipe", "pipe", "pipe"]
      })
    );
  });

  it("renders stdout through the log stream and flushes the last line on exit", async () => {
    const { child, run, output } = setup();
    child.stdout.emit("data", "(./main.tex\n! Undefined control sequence.\n");
    child.stdout.emit("data", "Transcript written on main.log.");
    child.emit("close", 1, null);

    await expect(run).resolves.toEqual({ exitCode: 1, signal: null });
    expect(output()).toBe("(./main.tex)\n! Undefined control sequence.\nTranscript written on main.log.\n");
  });

  it("relays stderr lines as they complete", async () => {
    const { child, run, output } = setup();
    child.stderr.emit("data", "kpathsea: running mktexpk\n\nlast");
    child.emit("close", 0, null);

    await run;
    expect(output()).toBe("kpathsea: running mktexpk\nlast\n");
  });

  it("forwards the operator's answer when the compiler waits at a bare prompt", async () => {
    vi.useFakeTimers();
    const { child, read, run, output } = setup([{ type: "line", text: "article.sty" }]);
    const write = vi.spyOn(child.stdin, "write");

    child.stdout.emit("data", "! LaTeX Error: File `missing.sty' not found.\n");
    child.stdout.emit("data", "? ");
    await vi.advanceTimersByTimeAsync(200);
    await vi.waitFor(() => expect(write).toHaveBeenCalledWith("article.sty\n"));

    expect(read).toHaveBeenCalledWith("? ");
    child.emit("close", 0, null);
    await run;
    expect(output()).toBe("! LaTeX Error: File `missing.sty' not found.\n");
  });

  it("does not prompt while output is still arriving", async () => {
    vi.useFakeTimers();
    const { child, read, run, output } = setup();

    child.stdout.emit("data", "? ");
    await vi.advanceTimersByTimeAsync(150);
    child.stdout.emit("data", "not a prompt after all\n");
    await vi.advanceTimersByTimeAsync(400);

    expect(read).not.toHaveBeenCalled();
    child.emit("close", 0, null);
    await run;
    expect(output()).toBe("? not a prompt after all\n");
  });

  it("ignores a question mark that is not the whole pending text", async () => {
    vi.useFakeTimers();
    const { child, read, run } = setup();

    child.stdout.emit("data", "Continue? ");
    await vi.advanceTimersByTimeAsync(400);

    expect(read).not.toHaveBeenCalled();
    child.emit("close", 0, null);
    await run;
  });

  it("interrupts the compiler and prompts again on cancel", async () => {
    vi.useFakeTimers();
    const { child, read, run } = setup([{ type: "interrupt" }, { type: "line", text: "x" }]);
    const write = vi.spyOn(child.stdin, "write");

    child.stdout.emit("data", "? ");
    await vi.advanceTimersByTimeAsync(200);
    await vi.waitFor(() => expect(write).toHaveBeenCalledWith("x\n"));

    expect(child.kill).toHaveBeenCalledWith("SIGINT");
    expect(read.mock.calls).toEqual([["? "], [""]]);
    child.emit("close", 0, null);
    await run;
  });

  it("closes the compiler's stdin on end of input", async () => {
    vi.useFakeTimers();
    const { child, run } = setup([{ type: "end-of-input" }]);
    const end = vi.spyOn(child.stdin, "end");

    child.stdout.emit("data", "? ");
    await vi.advanceTimersByTimeAsync(200);
    await vi.waitFor(() => expect(end).toHaveBeenCalledTimes(1));

    child.emit("close", 1, null);
    await expect(run).resolves.toEqual({ exitCode: 1, signal: null });
  });

  it("reports a signal exit as 128 plus the signal number", async () => {
    const { child, run } = setup();
    child.emit("close", null, "SIGTERM");
    await expect(run).resolves.toEqual({ exitCode: 143, signal: "SIGTERM" });
  });

  it("rejects with a readable error when the compiler is not installed", async () => {
    const { child, run } = setup();
    child.emit("error", Object.assign(new Error("spawn pdflatex ENOENT"), { code: "ENOENT" }));
    child.emit("close", -2, null);

    await expect(run).rejects.toBeInstanceOf(CompilerStartError);
    await expect(run).rejects.toBeInstanceOf(ExecutionError);
    await expect(run).rejects.toThrow('Compiler command "pdflatex" was not found on PATH.');
  });

  it("stops the compiler when the operator prompt fails", async () => {
    vi.useFakeTimers();
    const { child, read, run } = setup();
    read.mockRejectedValueOnce(new Error("stdin closed"));

    child.stdout.emit("data", "? ");
    const settled = expect(run).rejects.toThrow("stdin closed");
    await vi.advanceTimersByTimeAsync(200);
    await settled;

    expect(child.kill).toHaveBeenCalledWith("SIGTERM");
  });
});
