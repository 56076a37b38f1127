import readline from "node:readline";
import type { Readable, Writable } from "node:stream";
import { PromptInterruptedError, PromptIO } from "./runInsightPrompt.js";

export type LinePrompt = {
  ask: PromptIO["ask"];
  close(): void;
};

/**
 * Question/answer over a line stream. Lines are queued as they arrive, so a
 * piped chunk holding several answers feeds the following questions in order.
 * End of input or Ctrl-C rejects the pending question with
 * PromptInterruptedError.
 */
export function createLinePrompt(input: Readable, output: Writable): LinePrompt {
  const rl = readline.createInterface({ input, output });
  const lines = rl[Symbol.asyncIterator]();
  rl.on("SIGINT", () => rl.close());

  return {
    ask: async (question) => {
      // Terminal redraws repaint the prompt, so it must hold the question.
      rl.setPrompt(question);
      output.write(question);
      const next = await lines.next();
      if (next.done) throw new PromptInterruptedError();
      return next.value;
    },
    close: () => rl.close(),
  };
}
