import type { EventEmitter } from "node:events";

import { isCancel, text } from "@clack/prompts";

import { PROMPT_MARKER, type OperatorInput, type OperatorReply } from "./prompt-relay.js";

const DEFAULT_MESSAGE = "Compiler is waiting for input";
const END_OF_TRANSMISSION = "\u0004";

interface OperatorInputOptions {
  /** Stream clack reads keys from; watched for Ctrl+D and end of input. */
  input?: EventEmitter | undefined;
}

function isEndOfInputKey(char: unknown, key: unknown): boolean {
  if (char === END_OF_TRANSMISSION) return true;
  if (!key || typeof key !== "object") return false;
  return "ctrl" in key && key.ctrl === true && "name" in key && key.name === "d";
}

// clack reports Ctrl+C and Esc alike as a cancel; both reach the compiler as an interrupt.
// Ctrl+D and a closed stdin abort the prompt and reach it as end of input.
export function createOperatorInput(options: OperatorInputOptions = {}): OperatorInput {
  const input = options.input ?? process.stdin;

  return {
    async read(prompt: string): Promise<OperatorReply> {
      const controller = new AbortController();
      let endOfInput = false;
      const onKeypress = (char: unknown, key: unknown): void => {
        if (!isEndOfInputKey(char, key)) return;
        endOfInput = true;
        controller.abort();
      };
      const onEnd = (): void => {
        endOfInput = true;
        controller.abort();
      };
      input.on("keypress", onKeypress);
      input.on("end", onEnd);

      try {
        const shown = prompt.trim();
        const value = await text({
          message: shown.length === 0 || shown === PROMPT_MARKER.trim() ? DEFAULT_MESSAGE : shown,
          placeholder: "file name, or Enter to skip",
          signal: controller.signal
        });
        if (isCancel(value)) return endOfInput ? { type: "end-of-input" } : { type: "interrupt" };
        return { type: "line", text: typeof value === "string" ? value : "" };
      } finally {
        input.off("keypress", onKeypress);
        input.off("end", onEnd);
      }
    }
  };
}
