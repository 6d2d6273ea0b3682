import * as readline from "readline";
import { ConfigError } from "./errors";

export type Ask = (question: string) => Promise<string>;

/**
 * Build a one-question-at-a-time prompt over the given streams.
 * Rejects with ConfigError when the input ends before an answer arrives,
 * e.g. stdin redirected from /dev/null.
 */
export function createPrompt(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Ask {
  return (question) => {
    const rl = readline.createInterface({ input, output });
    return new Promise((resolve, reject) => {
      let answered = false;
      rl.once("close", () => {
        if (!answered) reject(new ConfigError(`No answer on stdin to: ${question.trim()}`));
      });
      rl.question(question, (answer) => {
        answered = true;
        rl.close();
        resolve(answer.trim());
      });
    });
  };
}
