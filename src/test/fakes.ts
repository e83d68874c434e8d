/**
 * In-process stand-ins for tests
 */

import { Writable } from 'stream';
import { ConsoleLogger } from '../core/ConsoleLogger.js';
import type { ExecutionEnvironment, LauncherSettings } from '../core/types.js';
import { MODERN_FEATURES } from '../core/constants.js';
import type { ProcessResult, ProcessRunner, RunOptions } from '../process/ProcessRunner.js';
import type { Prompter } from '../prompt/Prompter.js';

export interface RecordedCall {
  command: string;
  args: string[];
  options: RunOptions;
}

type Responder = (call: RecordedCall) => Partial<ProcessResult>;

/**
 * Records every launch; results come from a responder (default: exit 0)
 */
export class FakeProcessRunner implements ProcessRunner {
  readonly calls: RecordedCall[] = [];
  private responder: Responder;

  constructor(responder: Responder = () => ({})) {
    this.responder = responder;
  }

  respondWith(responder: Responder): void {
    this.responder = responder;
  }

  async run(command: string, args: readonly string[], options: RunOptions): Promise<ProcessResult> {
    const call = { command, args: [...args], options };
    this.calls.push(call);
    const result = this.responder(call);
    return { exitCode: result.exitCode ?? 0, stdout: result.stdout ?? '', stderr: result.stderr ?? '' };
  }
}

/**
 * Answers questions from a fixed list; '' once it runs out
 */
export class ScriptedPrompter implements Prompter {
  readonly questions: string[] = [];
  closed = false;

  constructor(private readonly answers: string[] = []) {}

  async ask(question: string): Promise<string> {
    this.questions.push(question);
    return this.answers.shift() ?? '';
  }

  close(): void {
    this.closed = true;
  }
}

export class CaptureStream extends Writable {
  private chunks: string[] = [];

  _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.chunks.push(chunk.toString());
    callback();
  }

  get text(): string {
    return this.chunks.join('');
  }

  get lines(): string[] {
    return this.text.split('\n').filter((line) => line !== '');
  }
}

export function captureLogger(): { logger: ConsoleLogger; stdout: CaptureStream; stderr: CaptureStream } {
  const stdout = new CaptureStream();
  const stderr = new CaptureStream();
  return { logger: new ConsoleLogger({ stdout, stderr, color: false }), stdout, stderr };
}

export function testSettings(overrides: Partial<LauncherSettings> = {}): LauncherSettings {
  return {
    appDir: '/srv/api-football',
    pythonOverride: null,
    minPython: { major: 3, minor: 9 },
    defaultLimit: 5,
    season: null,
    features: { ...MODERN_FEATURES },
    env: { PATH: '/usr/bin' },
    ...overrides
  };
}

export function testEnvironment(overrides: Partial<ExecutionEnvironment> = {}): ExecutionEnvironment {
  return {
    cwd: '/srv/api-football',
    python: '/usr/bin/python3',
    pythonVersion: '3.11.4',
    virtualEnv: null,
    env: { PATH: '/usr/bin' },
    ...overrides
  };
}
