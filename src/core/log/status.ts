import type { Token } from "./tokens.js";

export interface AppState {
  currentPage: number | null;
  fileStack: string[];
}

export function formatStatusLine(page: number | null, file: string | null): string {
  const parts: string[] = [];
  if (page !== null) parts.push(`[${page}]`);
  if (file !== null) parts.push(`(${file})`);
  return parts.join(" ");
}

function parsePageNumber(token: Token): number | null {
  if (token.value === undefined) return null;
  const page = Number.parseInt(token.value, 10);
  return Number.isNaN(page) ? null : page;
}

export class StatusTracker {
  private readonly state: AppState = { currentPage: null, fileStack: [] };
  private lastPrintedPage: number | null = null;
  private lastPrintedFile: string | null = null;

  get currentPage(): number | null {
    return this.state.currentPage;
  }

  get currentFile(): string | null {
    return this.state.fileStack.at(-1) ?? null;
  }

  get fileStack(): readonly string[] {
    return this.state.fileStack;
  }

  update(tokens: readonly Token[]): void {
    for (const token of tokens) {
      if (token.kind === "open-file" && token.value !== undefined) {
        this.state.fileStack.push(token.value);
      } else if (token.kind === "close-file") {
        // More closes than opens is normal when a file was opened before logging began.
        this.state.fileStack.pop();
      } else if (token.kind === "start-page") {
        const page = parsePageNumber(token);
        if (page !== null) this.state.currentPage = page;
      }
    }
  }

  isDirty(): boolean {
    return this.state.currentPage !== this.lastPrintedPage || this.currentFile !== this.lastPrintedFile;
  }

  currentStatus(): string {
    return formatStatusLine(this.state.currentPage, this.currentFile);
  }

  /** Status line text; the values shown become the baseline for {@link isDirty}. */
  formatStatus(): string {
    this.lastPrintedPage = this.state.currentPage;
    this.lastPrintedFile = this.currentFile;
    return this.currentStatus();
  }
}
