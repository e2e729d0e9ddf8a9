import { createInterface, type Interface } from "node:readline";

export interface PromptStreams {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

export interface Prompter {
  /** Asks a yes/no question, defaulting to "no". End of input counts as "no". */
  confirm: (question: string) => Promise<boolean>;
  close: () => void;
}

export function isAffirmative(answer: string): boolean {
  const normalized = answer.trim().toLowerCase();
  return normalized === "y" || normalized === "yes";
}

/**
 * One line reader shared by every question of a run. Lines that arrive
 * before they are asked for are queued, so piped answers are consumed in
 * order. The input is only touched once the first question is asked.
 */
export function createPrompter(
  streams: PromptStreams = { input: process.stdin, output: process.stdout }
): Prompter {
  let rl: Interface | undefined;
  let ended = false;
  const lines: string[] = [];
  const waiting: ((line: string | null) => void)[] = [];

  const open = (): void => {
    if (rl || ended) {
      return;
    }

    rl = createInterface({ input: streams.input, terminal: false });
    rl.on("line", (line) => {
      const next = waiting.shift();
      if (next) {
        next(line);
      } else {
        lines.push(line);
      }
    });
    rl.once("close", () => {
      ended = true;
      waiting.splice(0).forEach((resolve) => resolve(null));
    });
  };

  const nextLine = (): Promise<string | null> => {
    const queued = lines.shift();
    if (queued !== undefined) {
      return Promise.resolve(queued);
    }

    if (ended) {
      return Promise.resolve(null);
    }

    return new Promise((resolve) => {
      waiting.push(resolve);
    });
  };

  return {
    confirm: async (question) => {
      open();
      streams.output.write(`${question} [y/N] `);

      const answer = await nextLine();
      return answer !== null && isAffirmative(answer);
    },
    close: () => {
      ended = true;
      rl?.close();
    }
  };
}
