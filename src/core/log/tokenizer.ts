import { closeFileToken, createToken, newlineToken, otherToken, type Token, type TokenKind } from "./tokens.js";

interface TokenRule {
  kind: TokenKind;
  pattern: RegExp;
  /** More text arriving after a match that ends the chunk could extend it. */
  openEnded: boolean;
  valueGroup?: number;
  requiresOpenPage?: boolean;
}

interface ScanContext {
  insidePage: boolean;
  lineStart: boolean;
}

interface ScanStep {
  tokens: Token[];
  length: number;
  openEnded: boolean;
}

export interface PartialTokenization {
  tokens: Token[];
  remainder: string;
}

// Paths contain no whitespace and none of ( ) { }. Known to miss names with spaces or brackets.
const PATH = String.raw`\.?\/[^\s(){}]+`;

const TOKEN_RULES: readonly TokenRule[] = [
  { kind: "open-file", pattern: new RegExp(`^ ?\\((${PATH})`), openEnded: true, valueGroup: 1 },
  { kind: "close-file", pattern: /^\s*\)/, openEnded: false },
  { kind: "read-aux", pattern: new RegExp(`^ ?\\{${PATH}\\}`), openEnded: false },
  { kind: "read-image", pattern: new RegExp(`^ ?<${PATH}(?: \\([^()]*\\))?>`), openEnded: false },
  { kind: "start-page", pattern: /^\[(\d+)\s?/, openEnded: true, valueGroup: 1 },
  { kind: "end-page", pattern: /^\]/, openEnded: false, requiresOpenPage: true }
];

const OPEN_FILE_SEARCH = new RegExp(` ?\\((${PATH})`);
const START_PAGE_SEARCH = /\[(\d+)\s?/;
const END_PAGE_SEARCH = /\]/;

function countChar(value: string, char: "(" | ")"): number {
  let total = 0;
  for (const current of value) {
    if (current === char) total += 1;
  }
  return total;
}

export function classifyMessage(text: string): "error" | "warning" | null {
  if (text.startsWith("!")) return "error";
  if (text.startsWith("Overfull") || text.startsWith("Underfull")) return "warning";
  if (text.toLowerCase().includes("warning")) return "warning";
  return null;
}

/**
 * Splits free text into an `other` token followed by one `close-file` per unmatched trailing `)`.
 *
 * Package banners are printed between the `(` and `)` of the package file, so text such as
 * `" v1.0 (tvz))"` ends with the close of a file opened earlier.
 */
export function splitTrailingCloses(text: string): Token[] {
  let body = text;
  let closes = 0;
  while (body.endsWith(")") && countChar(body, "(") < countChar(body, ")")) {
    body = body.slice(0, -1);
    closes += 1;
  }

  const tokens: Token[] = body ? [otherToken(body)] : [];
  for (let index = 0; index < closes; index += 1) {
    tokens.push(closeFileToken());
  }
  return tokens;
}

function matchRuleAt(text: string, insidePage: boolean): { rule: TokenRule; match: RegExpMatchArray } | null {
  for (const rule of TOKEN_RULES) {
    if (rule.requiresOpenPage && !insidePage) continue;
    const match = text.match(rule.pattern);
    if (match) return { rule, match };
  }
  return null;
}

function findNextTokenStart(text: string, insidePage: boolean): number {
  // Anything matching at index 0 was already tried as a rule.
  const searchable = text.slice(1);
  const candidates = [OPEN_FILE_SEARCH, START_PAGE_SEARCH];
  if (insidePage) candidates.push(END_PAGE_SEARCH);

  let best = -1;
  for (const pattern of candidates) {
    const match = pattern.exec(searchable);
    if (!match) continue;
    if (best === -1 || match.index < best) best = match.index;
  }
  return best === -1 ? -1 : best + 1;
}

function scanSteps(text: string, context: ScanContext): ScanStep[] {
  const steps: ScanStep[] = [];
  let insidePage = context.insidePage;
  let cursor = 0;

  if (context.lineStart) {
    // Only the text before a page marker can be an error or warning: "Underfull ... [2]".
    const pageMatch = START_PAGE_SEARCH.exec(text);
    const prefixEnd = pageMatch ? pageMatch.index : text.length;
    const prefix = text.slice(0, prefixEnd);
    const kind = classifyMessage(prefix);
    if (kind) {
      steps.push({ tokens: [createToken(kind, prefix)], length: prefixEnd, openEnded: pageMatch === null });
      cursor = prefixEnd;
    }
  }

  while (cursor < text.length) {
    const rest = text.slice(cursor);
    const ruled = matchRuleAt(rest, insidePage);
    if (ruled) {
      const consumed = ruled.match[0];
      const value = ruled.rule.valueGroup === undefined ? undefined : ruled.match[ruled.rule.valueGroup];
      if (ruled.rule.kind === "start-page") insidePage = true;
      if (ruled.rule.kind === "end-page") insidePage = false;
      cursor += consumed.length;
      steps.push({
        tokens: [createToken(ruled.rule.kind, consumed, value)],
        length: consumed.length,
        openEnded: ruled.rule.openEnded && cursor === text.length
      });
      continue;
    }

    const nextStart = findNextTokenStart(rest, insidePage);
    const skipped = nextStart === -1 ? rest : rest.slice(0, nextStart);
    steps.push({ tokens: splitTrailingCloses(skipped), length: skipped.length, openEnded: nextStart === -1 });
    cursor += skipped.length;
  }

  return steps;
}

/**
 * Incremental tokenizer for TeX compiler output.
 *
 * Keeps two pieces of state between calls: whether a `[n` page marker is waiting for its `]`,
 * and whether part of the current physical line was already emitted by {@link tokenizePartial}.
 */
export class LogTokenizer {
  private insidePage = false;
  private midLine = false;

  /** Tokenize the rest of a physical line; `line` must not contain its newline. */
  tokenizeLine(line: string): Token[] {
    const tokens = scanSteps(line, this.context()).flatMap((step) => step.tokens);
    this.commit(tokens);
    this.midLine = false;
    return tokens;
  }

  /**
   * Tokenize as much of an unterminated chunk as can no longer change, returning the rest.
   * The caller prepends the remainder to the next chunk.
   */
  tokenizePartial(text: string): PartialTokenization {
    // Error and warning classification of a line needs either a page marker or the line end.
    if (!this.midLine && !START_PAGE_SEARCH.test(text)) {
      return { tokens: [], remainder: text };
    }

    const tokens: Token[] = [];
    let consumed = 0;
    for (const step of scanSteps(text, this.context())) {
      if (step.openEnded) break;
      tokens.push(...step.tokens);
      consumed += step.length;
    }

    this.commit(tokens);
    if (tokens.length > 0) this.midLine = true;
    return { tokens, remainder: text.slice(consumed) };
  }

  /** Forget that the current line was partially emitted, e.g. after its tail was consumed as a prompt. */
  endLine(): void {
    this.midLine = false;
  }

  private context(): ScanContext {
    return { insidePage: this.insidePage, lineStart: !this.midLine };
  }

  private commit(tokens: readonly Token[]): void {
    for (const token of tokens) {
      if (token.kind === "start-page") this.insidePage = true;
      if (token.kind === "end-page") this.insidePage = false;
    }
  }
}

export function tokenize(line: string): Token[] {
  return new LogTokenizer().tokenizeLine(line);
}

/** Tokenize a block of complete lines, with a `newline` token after each. */
export function tokenizeText(text: string, tokenizer: LogTokenizer = new LogTokenizer()): Token[] {
  const lines = text.split(/\r?\n/);
  const tokens: Token[] = [];
  lines.forEach((line, index) => {
    tokens.push(...tokenizer.tokenizeLine(line));
    if (index < lines.length - 1) tokens.push(newlineToken());
  });
  return tokens;
}
