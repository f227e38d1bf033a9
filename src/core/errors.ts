const EXIT_CODE_FAILURE = 1;
const EXIT_CODE_USAGE = 2;

interface HushtexErrorOptions {
  cause?: unknown;
  details?: Record<string, unknown>;
}

/** Base for every failure hushtex reports; `exitCode` is what the process exits with. */
export class HushtexError extends Error {
  readonly code: string;
  readonly exitCode: number;
  readonly details?: Record<string, unknown>;

  constructor(message: string, code: string, exitCode: number, options: HushtexErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.code = code;
    this.exitCode = exitCode;
    if (options.details !== undefined) {
      this.details = options.details;
    }
  }
}

export class UserInputError extends HushtexError {
  constructor(message: string, options: HushtexErrorOptions = {}) {
    super(message, "USER_INPUT", EXIT_CODE_USAGE, options);
  }
}

export class ConfigError extends HushtexError {
  constructor(message: string, options: HushtexErrorOptions = {}) {
    super(message, "CONFIG", EXIT_CODE_USAGE, options);
  }
}

export class ExecutionError extends HushtexError {
  constructor(message: string, options: HushtexErrorOptions = {}) {
    super(message, "EXECUTION", EXIT_CODE_FAILURE, options);
  }
}

function hasStringCode(error: unknown): error is { code: string } {
  if (!error || typeof error !== "object") return false;
  if (!("code" in error)) return false;
  return typeof error.code === "string";
}

/** The compiler could not be started at all. */
export class CompilerStartError extends ExecutionError {
  readonly command: string;

  constructor(command: string, spawnError: unknown) {
    const message =
      hasStringCode(spawnError) && spawnError.code === "ENOENT"
        ? `Compiler command "${command}" was not found on PATH.`
        : `Could not run "${command}": ${spawnError instanceof Error ? spawnError.message : String(spawnError)}`;
    super(message, { cause: spawnError, details: { command } });
    this.command = command;
  }
}

/** The compiler ran and failed; hushtex exits with the compiler's own status. */
export class CompilerExitError extends HushtexError {
  readonly command: string;
  readonly signal: NodeJS.Signals | null;

  constructor(command: string, exitCode: number, signal: NodeJS.Signals | null) {
    super(
      signal
        ? `${command} was stopped by ${signal} (exit code ${exitCode}).`
        : `${command} exited with code ${exitCode}.`,
      "COMPILER_EXIT",
      exitCode
    );
    this.command = command;
    this.signal = signal;
  }
}

export function normalizeError(error: unknown): HushtexError {
  if (error instanceof HushtexError) return error;
  if (hasStringCode(error) && error.code.startsWith("commander.")) {
    const message = error instanceof Error ? error.message : error.code;
    return new UserInputError(message, {
      cause: error,
      details: {
        commanderCode: error.code
      }
    });
  }
  if (error instanceof Error) {
    return new ExecutionError(error.message, { cause: error });
  }
  return new ExecutionError(String(error));
}
