import { createInterface, Interface } from "node:readline";

export interface Prompter {
  ask(question: string): Promise<string>;
  close(): void;
}

/** Operator-facing output. Diagnostics go through `log` instead. */
export interface Reporter {
  info(message: string): void;
  error(message: string): void;
}

export const consoleReporter: Reporter = {
  info: (message) => console.log(message),
  error: (message) => console.error(message),
};

export function createConsolePrompter(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Prompter {
  let rl: Interface | null = null;

  const ensure = (): Interface => {
    if (!rl) {
      rl = createInterface({ input, output });
    }
    return rl;
  };

  return {
    ask: (question) =>
      new Promise<string>((resolve) => {
        ensure().question(`${question}\n`, (answer) => resolve(answer));
      }),
    close: () => {
      rl?.close();
      rl = null;
    },
  };
}
