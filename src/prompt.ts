import * as readline from 'node:readline';

/** Operator I/O. `ask` is the only suspension point of an interactive run. */
export interface Prompter {
  ask(question: string): Promise<string>;
  say(line: string): void;
}

export interface ClosablePrompter extends Prompter {
  close(): void;
}

/** Terminal prompter over stdin/stdout. Blocks until a line is entered. */
export function createTerminalPrompter(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): ClosablePrompter {
  const rl = readline.createInterface({ input, output });
  let closed = false;
  let pending: ((err: Error) => void) | undefined;
  rl.on('close', () => {
    closed = true;
    pending?.(new Error('Input closed'));
    pending = undefined;
  });

  return {
    ask: (question) =>
      new Promise((resolve, reject) => {
        if (closed) {
          reject(new Error('Input closed'));
          return;
        }
        pending = reject;
        rl.question(question, (answer: string) => {
          pending = undefined;
          resolve(answer);
        });
      }),
    say: (line) => {
      output.write(line + '\n');
    },
    close: () => rl.close(),
  };
}

/** Ask a yes/no question; anything but y/yes is no. */
export async function confirm(prompter: Prompter, question: string): Promise<boolean> {
  const answer = (await prompter.ask(`${question} [y/N] `)).trim().toLowerCase();
  return answer === 'y' || answer === 'yes';
}
