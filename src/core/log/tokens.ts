export type TokenKind =
  | "open-file"
  | "close-file"
  | "read-aux"
  | "read-image"
  | "start-page"
  | "end-page"
  | "error"
  | "warning"
  | "other"
  | "newline";

export interface Token {
  readonly kind: TokenKind;
  /** Exact text consumed from the log, including leading whitespace and delimiters. */
  readonly text: string;
  /** File path for `open-file`, page number digits for `start-page`. */
  readonly value?: string;
}

export function createToken(kind: TokenKind, text: string, value?: string): Token {
  return value === undefined ? { kind, text } : { kind, text, value };
}

export function otherToken(text: string): Token {
  return { kind: "other", text };
}

export function closeFileToken(text = ")"): Token {
  return { kind: "close-file", text };
}

export function newlineToken(): Token {
  return { kind: "newline", text: "\n" };
}

export function joinTokenText(tokens: readonly Token[]): string {
  return tokens.map((token) => token.text).join("");
}

export function containsError(tokens: readonly Token[]): boolean {
  return tokens.some((token) => token.kind === "error");
}
