import readline from "node:readline";
import type { Readable } from "node:stream";
import { answerWeatherQuestion, formatOutcome, type PipelineDeps } from "../../../lib/chat/pipeline";

export const PROMPT = "You: ";
export const REPLY_PREFIX = "Chatbot: ";
export const FAREWELL = "Goodbye!";
export const EXIT_KEYWORD = "exit";

export const WELCOME_LINES = [
  "Welcome to the weather chatbot!",
  "You can ask questions like: 'What's the weather in Munich on 2024-09-30?'",
  "Type 'exit' to quit.",
];

export type LoopState = "reading" | "processing" | "terminated";

export type ReplIo = {
  input: Readable;
  output: { write(chunk: string): unknown };
};

export function isExitCommand(line: string) {
  return line.trim().toLowerCase() === EXIT_KEYWORD;
}

/**
 * Reads one question per line until "exit" (any case) or end of input.
 * No turn can end the loop: the pipeline reports failures as outcomes.
 */
export async function runRepl(deps: PipelineDeps, io: ReplIo): Promise<void> {
  const rl = readline.createInterface({ input: io.input, terminal: false });
  const lines = rl[Symbol.asyncIterator]();
  const say = (text: string) => io.output.write(`${REPLY_PREFIX}${text}\n`);

  for (const line of WELCOME_LINES) io.output.write(`${line}\n`);

  let state: LoopState = "reading";
  try {
    while (state !== "terminated") {
      io.output.write(PROMPT);
      const next = await lines.next();
      if (next.done || isExitCommand(next.value)) {
        if (next.done) io.output.write("\n");
        say(FAREWELL);
        state = "terminated";
        continue;
      }

      const text = next.value.trim();
      if (!text) continue;

      state = "processing";
      const outcome = await answerWeatherQuestion(deps, text);
      say(formatOutcome(outcome));
      state = "reading";
    }
  } finally {
    rl.close();
  }
}
