import { renderTokens, type OutputMode, type StyledFragment } from "./formatter.js";
import { StatusTracker } from "./status.js";
import { LogTokenizer } from "./tokenizer.js";
import { containsError, newlineToken, type Token } from "./tokens.js";

export interface LogUpdate {
  tokens: Token[];
  fragments: StyledFragment[];
  /** False when the fragments are the start of a line whose newline has not arrived. */
  lineComplete: boolean;
  containsError: boolean;
  status: string;
  statusChanged: boolean;
}

export interface CreateLogStreamOptions {
  mode: OutputMode;
  partialLines?: boolean | undefined;
  onUpdate: (update: LogUpdate) => void;
}

export interface LogStream {
  push: (chunk: string) => void;
  flush: () => void;
  /** Text received after the last newline that has not been emitted yet. */
  pending: () => string;
  /** Remove and return the pending text, e.g. when it turned out to be an input prompt. */
  takePending: () => string;
}

export function consumeCompleteLines(buffer: string, onLine: (line: string) => void): string {
  let lineStart = 0;
  for (let index = 0; index < buffer.length; index += 1) {
    const char = buffer[index];
    if (char !== "\n" && char !== "\r") continue;
    onLine(buffer.slice(lineStart, index));
    if (char === "\r" && buffer[index + 1] === "\n") {
      index += 1;
    }
    lineStart = index + 1;
  }
  return buffer.slice(lineStart);
}

export function createLogStream(options: CreateLogStreamOptions): LogStream {
  const partialLines = options.partialLines ?? true;
  const tokenizer = new LogTokenizer();
  const tracker = new StatusTracker();
  let pending = "";

  const emit = (tokens: Token[], lineComplete: boolean): void => {
    tracker.update(tokens);
    const statusChanged = tracker.isDirty();
    const status = statusChanged ? tracker.formatStatus() : tracker.currentStatus();
    const emitted = lineComplete ? [...tokens, newlineToken()] : tokens;
    options.onUpdate({
      tokens: emitted,
      fragments: renderTokens(emitted, options.mode),
      lineComplete,
      containsError: containsError(tokens),
      status,
      statusChanged
    });
  };

  const push = (chunk: string): void => {
    pending = consumeCompleteLines(pending + chunk, (line) => emit(tokenizer.tokenizeLine(line), true));
    if (!partialLines || pending.length === 0) return;

    const partial = tokenizer.tokenizePartial(pending);
    if (partial.tokens.length === 0) return;
    pending = partial.remainder;
    emit(partial.tokens, false);
  };

  const flush = (): void => {
    if (pending.length === 0) return;
    const line = pending;
    pending = "";
    emit(tokenizer.tokenizeLine(line), true);
  };

  const takePending = (): string => {
    const taken = pending;
    pending = "";
    tokenizer.endLine();
    return taken;
  };

  return { push, flush, pending: () => pending, takePending };
}
