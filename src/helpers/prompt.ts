import * as readline from 'readline';
import type { ImageFile } from '../types/models';

/**
 * Line-based console input. `ask` resolves to null once input has ended.
 */
export interface Prompter {
  ask(question: string): Promise<string | null>;
  close(): void;
}

export type Print = (line: string) => void;

export function createTerminalPrompter(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Prompter {
  const rl = readline.createInterface({ input, terminal: false });
  // Piped input can arrive before a question is asked, so lines are queued
  const lines: string[] = [];
  const waiting: Array<(line: string | null) => void> = [];
  let closed = false;

  rl.on('line', line => {
    const next = waiting.shift();
    if (next) next(line);
    else lines.push(line);
  });
  rl.once('close', () => {
    closed = true;
    waiting.splice(0).forEach(resolve => resolve(null));
  });

  return {
    ask(question: string) {
      output.write(question);

      const queued = lines.shift();
      if (queued !== undefined) return Promise.resolve(queued);
      if (closed) return Promise.resolve(null);

      return new Promise<string | null>(resolve => {
        waiting.push(resolve);
      });
    },
    close() {
      rl.close();
    },
  };
}

/**
 * Ask a yes/no question until the answer is usable.
 * Empty input (or end of input) returns `defaultAnswer`.
 */
export async function confirm(
  prompter: Prompter,
  question: string,
  defaultAnswer: boolean = false,
  print: Print = console.log
): Promise<boolean> {
  const prompt = `${question} ${defaultAnswer ? '[Y/n]' : '[y/N]'} > `;

  for (;;) {
    const answer = await prompter.ask(prompt);
    const normalized = (answer ?? '').trim().toLowerCase();

    if (normalized.startsWith('y')) return true;
    if (normalized.startsWith('n')) return false;
    if (normalized === '') return defaultAnswer;

    print('Invalid input. Please try again.');
  }
}

/**
 * Show the upload order before anything is sent
 */
export function presentPlan(files: readonly ImageFile[], print: Print = console.log): void {
  print('The following images will be uploaded in order:');
  files.forEach(file => print(file.name));
  print(`\nFound ${files.length} ${files.length === 1 ? 'image' : 'images'}.`);
}
