/** The compiler prints this and then blocks on stdin when it cannot find an input file. */
export const PROMPT_MARKER = "? ";

export type PromptRelayState = "normal" | "awaiting-response";

export type OperatorReply = { type: "line"; text: string } | { type: "interrupt" } | { type: "end-of-input" };

export interface OperatorInput {
  read: (prompt: string) => Promise<OperatorReply>;
}

export interface CompilerInput {
  write: (text: string) => void;
  sendInterrupt: () => void;
  sendEndOfTransmission: () => void;
}

export type RelayOutcome = "answered" | "end-of-input";

/**
 * Forwards the compiler's "? " prompt to the operator.
 *
 * Output that stops mid-line is usually the compiler still working; only a buffer that is exactly
 * the prompt marker after an idle period counts as a prompt.
 */
export class PromptRelay {
  private currentState: PromptRelayState = "normal";

  constructor(
    private readonly operator: OperatorInput,
    private readonly compiler: CompilerInput
  ) {}

  get state(): PromptRelayState {
    return this.currentState;
  }

  /** Called once the compiler's output has gone idle, with the text of its unfinished line. */
  shouldPrompt(buffer: string): boolean {
    return this.currentState === "normal" && buffer === PROMPT_MARKER;
  }

  async relay(prompt: string): Promise<RelayOutcome> {
    this.currentState = "awaiting-response";
    try {
      let message = prompt;
      for (;;) {
        const reply = await this.operator.read(message);
        if (reply.type === "line") {
          this.compiler.write(`${reply.text}\n`);
          return "answered";
        }
        if (reply.type === "end-of-input") {
          this.compiler.sendEndOfTransmission();
          return "end-of-input";
        }
        // The compiler answers an interrupt with a fresh prompt of its own.
        this.compiler.sendInterrupt();
        message = "";
      }
    } finally {
      this.currentState = "normal";
    }
  }
}
