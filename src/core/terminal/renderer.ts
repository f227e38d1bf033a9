import { ANSI, hasVisibleText, paint, paintFragments, type FragmentStyle } from "../log/formatter.js";
import type { LogUpdate } from "../log/stream.js";

export interface OutputRenderer {
  render: (update: LogUpdate) => void;
  /** A message of our own, kept clear of the status bar. */
  log: (message: string, style?: FragmentStyle) => void;
  /** Called before the operator is prompted; the status bar comes back with the next output. */
  beforePrompt: () => void;
  finish: () => void;
}

interface RendererOptions {
  write?: ((chunk: string) => void) | undefined;
  colorize?: boolean | undefined;
  bell?: boolean | undefined;
}

interface TerminalRendererOptions extends RendererOptions {
  columns?: (() => number) | undefined;
}

const CURSOR_UP = "\u001B[A";
const CURSOR_TO_START = "\u001B[G";
const DELETE_WHOLE_LINE = "\u001B[2K";
const BELL = "\u0007";

const MESSAGE_CODES: Record<FragmentStyle, string> = {
  none: "",
  dim: ANSI.dim,
  error: ANSI.red,
  warning: ANSI.yellow
};

function defaultWrite(chunk: string): void {
  process.stdout.write(chunk);
}

/**
 * Renders compiler output with the status line pinned below it.
 *
 * Owns all cursor bookkeeping for one run. A status line that changed together with a completed
 * line is left in the scrollback; otherwise it is erased and redrawn under the new output.
 */
export class TerminalRenderer implements OutputRenderer {
  private readonly write: (chunk: string) => void;
  private readonly colorize: boolean;
  private readonly bell: boolean;
  private readonly columns: () => number;
  private status = "";
  private statusVisible = false;
  private drawnStatusLength = 0;
  private keepLastStatus = false;
  private pendingLine = "";
  private pendingVisible = false;

  constructor(options: TerminalRendererOptions = {}) {
    this.write = options.write ?? defaultWrite;
    this.colorize = options.colorize ?? true;
    this.bell = options.bell ?? true;
    this.columns = options.columns ?? (() => process.stdout.columns ?? 80);
  }

  render(update: LogUpdate): void {
    if (this.bell && update.containsError) this.write(BELL);
    this.status = update.status;

    // Partial lines wait for their newline so the status line can stay last.
    this.pendingLine += paintFragments(update.fragments, this.colorize);
    this.pendingVisible = this.pendingVisible || hasVisibleText(update.fragments);
    if (!update.lineComplete) {
      if (update.statusChanged) {
        this.clearStatus();
        this.drawStatus();
      }
      return;
    }

    this.clearStatus();
    if (this.pendingVisible) this.write(this.pendingLine);
    this.pendingLine = "";
    this.pendingVisible = false;
    if (update.statusChanged) this.keepLastStatus = true;
    this.drawStatus();
  }

  log(message: string, style: FragmentStyle = "dim"): void {
    this.clearStatus();
    this.write(`${paint(message, MESSAGE_CODES[style], this.colorize)}\n`);
    this.drawStatus();
  }

  beforePrompt(): void {
    this.clearStatus();
    if (!this.pendingVisible) return;
    this.write(this.pendingLine);
    this.pendingLine = "";
    this.pendingVisible = false;
  }

  finish(): void {
    if (this.pendingVisible) {
      this.clearStatus();
      this.write(`${this.pendingLine}\n`);
      this.pendingLine = "";
      this.pendingVisible = false;
      this.drawStatus();
    }
    if (this.statusVisible) {
      this.write("\n");
      this.statusVisible = false;
    }
    this.keepLastStatus = false;
  }

  private clearStatus(): void {
    if (!this.statusVisible) return;
    this.statusVisible = false;
    if (this.keepLastStatus) {
      this.write("\n");
      this.keepLastStatus = false;
      return;
    }
    this.write(CURSOR_TO_START + DELETE_WHOLE_LINE);
    // A status longer than the terminal wrapped onto extra rows.
    const wrappedRows = Math.floor(this.drawnStatusLength / Math.max(1, this.columns()));
    for (let row = 0; row < wrappedRows; row += 1) {
      this.write(CURSOR_UP + DELETE_WHOLE_LINE);
    }
  }

  private drawStatus(): void {
    if (this.status.length === 0) {
      this.keepLastStatus = false;
      return;
    }
    this.write(paint(this.status, ANSI.blue, this.colorize));
    this.statusVisible = true;
    this.drawnStatusLength = this.status.length;
  }
}

/** Renderer for pipes and dumb terminals: no cursor movement, changed statuses on their own line. */
export class PlainRenderer implements OutputRenderer {
  private readonly write: (chunk: string) => void;
  private readonly colorize: boolean;
  private readonly bell: boolean;
  private lineOpen = false;
  private statusDue = false;
  // Whitespace that started a line; written once the line turns out to have visible text.
  private heldWhitespace = "";

  constructor(options: RendererOptions = {}) {
    this.write = options.write ?? defaultWrite;
    this.colorize = options.colorize ?? false;
    this.bell = options.bell ?? true;
  }

  render(update: LogUpdate): void {
    if (this.bell && update.containsError) this.write(BELL);

    const painted = paintFragments(update.fragments, this.colorize);
    if (this.lineOpen || hasVisibleText(update.fragments)) {
      this.write(this.heldWhitespace + painted);
      this.heldWhitespace = "";
      this.lineOpen = !update.lineComplete;
    } else if (update.lineComplete) {
      this.heldWhitespace = "";
    } else {
      this.heldWhitespace += painted;
    }
    if (update.statusChanged) this.statusDue = true;
    if (!update.lineComplete || !this.statusDue) return;
    this.statusDue = false;
    if (update.status.length > 0) {
      this.write(`${paint(update.status, ANSI.blue, this.colorize)}\n`);
    }
  }

  log(message: string, style: FragmentStyle = "dim"): void {
    this.closeLine();
    this.write(`${paint(message, MESSAGE_CODES[style], this.colorize)}\n`);
  }

  beforePrompt(): void {}

  finish(): void {
    this.closeLine();
    this.heldWhitespace = "";
  }

  private closeLine(): void {
    if (!this.lineOpen) return;
    this.write("\n");
    this.lineOpen = false;
  }
}

export function createRenderer(options: TerminalRendererOptions & { statusBar: boolean }): OutputRenderer {
  if (options.statusBar) return new TerminalRenderer(options);
  return new PlainRenderer(options);
}
