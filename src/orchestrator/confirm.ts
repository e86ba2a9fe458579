/**
 * Typed confirmation prompts.
 *
 * Destructive steps ask the operator to type a phrase such as
 * `destroy staging`; anything else, including end of input, declines.
 */

import { createInterface } from "node:readline";

export type Confirm = (warning: string, phrase: string) => Promise<boolean>;

export type PromptStreams = {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
};

export function createPromptConfirm(streams: PromptStreams = {}): Confirm {
  const input = streams.input ?? process.stdin;
  const output = streams.output ?? process.stderr;

  return (warning, phrase) =>
    new Promise<boolean>((resolve) => {
      const rl = createInterface({ input, output, terminal: false });
      let settled = false;
      const finish = (confirmed: boolean) => {
        if (settled) return;
        settled = true;
        rl.close();
        resolve(confirmed);
      };
      rl.once("close", () => finish(false));
      output.write(`${warning}\n`);
      rl.question(`Type "${phrase}" to continue: `, (answer) => finish(answer.trim() === phrase));
    });
}

/** Answers every prompt the same way. */
export function fixedConfirm(answer: boolean): Confirm {
  return async () => answer;
}
