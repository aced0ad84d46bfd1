import { createInterface } from "node:readline";
import type { Readable, Writable } from "node:stream";

/** Asks one question; resolves null once input has ended. */
export interface Prompter {
  ask: (question: string) => Promise<string | null>;
  close: () => void;
}

// Lines are queued as they arrive; piped input may hold many answers at once.
export function createLinePrompter(
  input: Readable = process.stdin,
  output: Writable = process.stdout,
): Prompter {
  const rl = createInterface({ input, terminal: false });
  const queued: string[] = [];
  const waiting: Array<(line: string | null) => void> = [];
  let ended = false;

  rl.on("line", (line) => {
    const next = waiting.shift();
    if (next) next(line);
    else queued.push(line);
  });
  rl.on("close", () => {
    ended = true;
    for (const next of waiting.splice(0)) next(null);
  });

  return {
    ask: (question) => {
      output.write(question);
      const line = queued.shift();
      if (line !== undefined) return Promise.resolve(line);
      if (ended) return Promise.resolve(null);
      return new Promise((done) => {
        waiting.push(done);
      });
    },
    close: () => {
      rl.close();
    },
  };
}
