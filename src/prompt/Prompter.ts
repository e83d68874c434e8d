/**
 * Line prompts on the terminal
 */

import * as readline from 'readline';
import { InterruptedError } from '../core/errors.js';

export interface Prompter {
  /** Ask one question; resolves with the trimmed answer ('' on end of input) */
  ask(question: string): Promise<string>;
  close(): void;
}

interface PendingAnswer {
  resolve: (answer: string) => void;
  reject: (error: Error) => void;
}

/**
 * readline-backed prompter. The interface is opened on the first question so
 * runs that never prompt leave stdin alone.
 *
 * Lines are queued as they arrive: piped input delivers several answers in one
 * chunk, and each one must reach the question asked after it.
 */
export class ReadlinePrompter implements Prompter {
  private rl: readline.Interface | null = null;
  private readonly lines: string[] = [];
  private pending: PendingAnswer | null = null;
  private ended = false;
  private closed = false;

  constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout
  ) {}

  ask(question: string): Promise<string> {
    if (this.closed) {
      return Promise.resolve('');
    }

    const rl = this.getInterface();

    const queued = this.lines.shift();
    if (queued !== undefined) {
      this.output.write(question);
      return Promise.resolve(queued.trim());
    }
    if (this.ended) {
      return Promise.resolve('');
    }

    return new Promise<string>((resolve, reject) => {
      this.pending = { resolve, reject };
      rl.setPrompt(question);
      rl.prompt();
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.rl?.close();
  }

  private getInterface(): readline.Interface {
    if (this.rl) {
      return this.rl;
    }

    const rl = readline.createInterface({ input: this.input, output: this.output });

    rl.on('line', (line) => {
      const pending = this.takePending();
      if (pending) {
        pending.resolve(line.trim());
      } else {
        this.lines.push(line);
      }
    });

    rl.on('close', () => {
      this.ended = true;
      this.takePending()?.resolve('');
    });

    rl.on('SIGINT', () => {
      const pending = this.takePending();
      if (pending) {
        pending.reject(new InterruptedError());
      } else {
        // Not waiting on the user: hand the interrupt to the process handler
        process.kill(process.pid, 'SIGINT');
      }
    });

    this.rl = rl;
    return rl;
  }

  private takePending(): PendingAnswer | null {
    const pending = this.pending;
    this.pending = null;
    return pending;
  }
}
