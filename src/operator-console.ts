/**
 * Operator I/O seam. The sweep prints and prompts only through this.
 */

import { createInterface, type Interface } from 'readline';

export interface OperatorConsole {
  print(line?: string): void;
  /** Resolves to null once input is closed. */
  prompt(question: string): Promise<string | null>;
}

export class ReadlineConsole implements OperatorConsole {
  private rl: Interface;
  private closed = false;
  private pending: Array<(answer: string | null) => void> = [];

  constructor(input: NodeJS.ReadableStream = process.stdin, private output: NodeJS.WritableStream = process.stdout) {
    this.rl = createInterface({ input, output });
    // Ctrl-C at the prompt ends input, which the sweep treats as quit.
    this.rl.on('SIGINT', () => this.rl.close());
    this.rl.on('close', () => {
      this.closed = true;
      const waiting = this.pending;
      this.pending = [];
      waiting.forEach(resolve => resolve(null));
    });
  }

  print(line = ''): void {
    this.output.write(`${line}\n`);
  }

  prompt(question: string): Promise<string | null> {
    if (this.closed) {
      return Promise.resolve(null);
    }
    return new Promise((resolve) => {
      this.pending.push(resolve);
      this.rl.question(question, (answer) => {
        this.pending = this.pending.filter(waiting => waiting !== resolve);
        resolve(answer);
      });
    });
  }

  close(): void {
    this.rl.close();
  }
}
