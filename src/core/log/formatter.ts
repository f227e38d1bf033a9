import type { Token, TokenKind } from "./tokens.js";

export type OutputMode = "quiet" | "verbose";
export type FragmentStyle = "none" | "dim" | "error" | "warning";

export interface StyledFragment {
  text: string;
  style: FragmentStyle;
}

export const ANSI = {
  reset: "\u001B[0m",
  dim: "\u001B[2m",
  red: "\u001B[31m",
  brightRed: "\u001B[91m",
  yellow: "\u001B[33m",
  blue: "\u001B[34m"
} as const;

// null hides the token. Page markers only feed the status bar.
export const TOKEN_STYLES: Record<OutputMode, Record<TokenKind, FragmentStyle | null>> = {
  verbose: {
    "open-file": "dim",
    "close-file": "dim",
    "read-aux": "dim",
    "read-image": "dim",
    "start-page": null,
    "end-page": null,
    error: "error",
    warning: "warning",
    other: "none",
    newline: "none"
  },
  quiet: {
    "open-file": null,
    "close-file": null,
    "read-aux": null,
    "read-image": null,
    "start-page": null,
    "end-page": null,
    error: "error",
    warning: "warning",
    other: "none",
    newline: "none"
  }
};

const STYLE_CODES: Record<FragmentStyle, string> = {
  none: "",
  dim: ANSI.dim,
  error: ANSI.brightRed,
  warning: ANSI.yellow
};

export function paint(text: string, code: string, colorize: boolean): string {
  if (!colorize || code.length === 0 || text.length === 0) return text;
  return `${code}${text}${ANSI.reset}`;
}

export function renderTokens(tokens: readonly Token[], mode: OutputMode): StyledFragment[] {
  const styles = TOKEN_STYLES[mode];
  const fragments: StyledFragment[] = [];
  for (const token of tokens) {
    const style = styles[token.kind];
    if (style === null) continue;
    fragments.push({ text: token.text, style });
  }
  return fragments;
}

export function paintFragments(fragments: readonly StyledFragment[], colorize: boolean): string {
  return fragments.map((fragment) => paint(fragment.text, STYLE_CODES[fragment.style], colorize)).join("");
}

export function fragmentsText(fragments: readonly StyledFragment[]): string {
  return fragments.map((fragment) => fragment.text).join("");
}

export function hasVisibleText(fragments: readonly StyledFragment[]): boolean {
  return fragments.some((fragment) => fragment.text.trim().length > 0);
}
