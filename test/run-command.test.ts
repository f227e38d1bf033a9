import { EventEmitter } from "node:events";
import { PassThrough } from "node:stream";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

const mocks = vi.hoisted(() => ({
  info: vi.fn(),
  warn: vi.fn()
}));

vi.mock("@clack/prompts", () => ({
  log: { info: mocks.info, warn: mocks.warn },
  text: vi.fn(),
  isCancel: () => false
}));

import { runCompile } from "../src/commands/run.js";
import { CompilerExitError } from "../src/core/errors.js";

class FakeCompiler extends EventEmitter {
  readonly stdin = new PassThrough();
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly kill = vi.fn<(signal?: NodeJS.Signals) => boolean>(() => true);
}

function start(options: Parameters<typeof runCompile>[2], lines: string[], exitCode: number) {
  const child = new FakeCompiler();
  const chunks: string[] = [];
  const running = runCompile("pdflatex", ["main.tex"], options, {
    terminal: { isTTY: false, env: {} },
    spawn: () => child,
    operator: { read: vi.fn() },
    write: (chunk) => chunks.push(chunk)
  });
  for (const line of lines) child.stdout.emit("data", `${line}\n`);
  child.emit("close", exitCode, null);
  return { running, output: () => chunks.join("") };
}

describe("runCompile", () => {
  beforeEach(() => {
    mocks.info.mockReset();
    mocks.warn.mockReset();
  });

  afterEach(() => {
    process.exitCode = undefined;
  });

  it("prints only the lines that matter in quiet mode", async () => {
    const { running, output } = start({}, ["(./main.tex", "Chapter 1.", "(./main.aux)"], 0);
    await expect(running).resolves.toEqual({ exitCode: 0, signal: null });

    expect(output()).toBe("(./main.tex)\nChapter 1.\n");
    expect(mocks.warn).not.toHaveBeenCalled();
    expect(process.exitCode).toBeUndefined();
  });

  it("announces itself and shows file traffic in verbose mode", async () => {
    const { running, output } = start({ verbose: true }, ["(./main.aux)"], 0);
    await running;

    expect(mocks.info).toHaveBeenCalledWith("Running pdflatex main.tex");
    expect(output()).toBe("hushtex enabled\n(./main.aux)\n");
  });

  it("fails with the compiler's exit code when the compiler fails", async () => {
    const { running, output } = start({ bell: false }, ["! Emergency stop."], 1);

    await expect(running).rejects.toBeInstanceOf(CompilerExitError);
    await expect(running).rejects.toMatchObject({
      code: "COMPILER_EXIT",
      exitCode: 1,
      signal: null,
      message: "pdflatex exited with code 1."
    });
    expect(output()).toBe("! Emergency stop.\n");
  });
});
