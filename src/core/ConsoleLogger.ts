/**
 * ConsoleLogger
 *
 * Single-line, prefixed status output. Colour is applied only when stdout is a
 * terminal unless forced either way.
 */

import { Chalk, type ChalkInstance } from 'chalk';
import ora, { type Ora } from 'ora';

export type OutputStream = NodeJS.WritableStream & { isTTY?: boolean };

export interface ConsoleLoggerConfig {
  /** Defaults to process.stdout */
  stdout?: OutputStream;
  /** Defaults to process.stderr */
  stderr?: OutputStream;
  /** Force colour on or off (default: stdout is a TTY) */
  color?: boolean;
}

export class ConsoleLogger {
  readonly stdout: OutputStream;
  readonly stderr: OutputStream;
  readonly colors: ChalkInstance;
  private readonly interactive: boolean;

  constructor(config: ConsoleLoggerConfig = {}) {
    this.stdout = config.stdout ?? process.stdout;
    this.stderr = config.stderr ?? process.stderr;
    this.interactive = config.color ?? Boolean(this.stdout.isTTY);
    this.colors = new Chalk({ level: this.interactive ? 1 : 0 });
  }

  info(message: string): void {
    this.line(`${this.colors.blue('[INFO]')} ${message}`);
  }

  ok(message: string): void {
    this.line(`${this.colors.green('[OK]')} ${message}`);
  }

  warn(message: string): void {
    this.line(`${this.colors.yellow('[WARN]')} ${message}`);
  }

  error(message: string): void {
    this.stderr.write(`${this.colors.red('[ERROR]')} ${message}\n`);
  }

  line(message = ''): void {
    this.stdout.write(`${message}\n`);
  }

  /**
   * Write text as-is (usage blocks already carry their own newlines)
   */
  write(text: string, target: 'stdout' | 'stderr' = 'stdout'): void {
    (target === 'stdout' ? this.stdout : this.stderr).write(text);
  }

  /**
   * Spinner on stderr; animates only when attached to a terminal
   */
  spinner(text: string): Ora {
    return ora({ text, stream: this.stderr, isEnabled: this.interactive && Boolean(this.stderr.isTTY) });
  }
}
