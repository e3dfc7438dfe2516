import readline from "node:readline";

/**
 * One prompt, one line. Resolves to null once input is exhausted.
 */
export interface LineSource {
  ask(prompt: string): Promise<string | null>;
  close(): void;
}

/**
 * readline-backed source. The line iterator is created up front so lines that
 * arrive before the first prompt (piped input) are buffered, not dropped.
 */
export function createLineSource(input: NodeJS.ReadableStream, output: NodeJS.WritableStream): LineSource {
  const rl = readline.createInterface({ input, terminal: false });
  const lines = rl[Symbol.asyncIterator]();
  let exhausted = false;

  return {
    async ask(prompt: string): Promise<string | null> {
      if (exhausted) return null;
      output.write(prompt);
      const next = await lines.next();
      if (next.done) {
        exhausted = true;
        return null;
      }
      return next.value;
    },
    close(): void {
      rl.close();
    },
  };
}
