/**
 * ProcessRunner
 *
 * Runs one child process to completion. Actions depend on the interface so
 * tests can swap in an in-process stand-in.
 */

import { spawn } from 'child_process';
import { constants as osConstants } from 'os';
import { EnvironmentError } from '../core/errors.js';

export type StdioMode = 'inherit' | 'capture';

export interface RunOptions {
  cwd: string;
  env: NodeJS.ProcessEnv;
  /** inherit: child writes to our terminal; capture: stdout/stderr are collected */
  stdio: StdioMode;
}

export interface ProcessResult {
  exitCode: number;
  /** Empty when stdio is 'inherit' */
  stdout: string;
  stderr: string;
}

export interface ProcessRunner {
  run(command: string, args: readonly string[], options: RunOptions): Promise<ProcessResult>;
}

/**
 * Exit status for a child that was killed by a signal, shell style (128 + n)
 */
export function signalExitCode(signal: NodeJS.Signals | null): number {
  if (!signal) return 1;
  const entry = Object.entries(osConstants.signals).find(([name]) => name === signal);
  return entry ? 128 + entry[1] : 1;
}

export class SpawnProcessRunner implements ProcessRunner {
  run(command: string, args: readonly string[], options: RunOptions): Promise<ProcessResult> {
    return new Promise<ProcessResult>((resolve, reject) => {
      // No shell: arguments go to the child untouched
      const child = spawn(command, [...args], {
        cwd: options.cwd,
        env: options.env,
        shell: false,
        windowsHide: true,
        stdio: options.stdio === 'inherit' ? 'inherit' : ['ignore', 'pipe', 'pipe']
      });

      let stdout = '';
      let stderr = '';

      child.stdout?.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      child.stderr?.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      child.on('error', (error) => {
        reject(new EnvironmentError(`Failed to start ${command}: ${error.message}`));
      });

      child.on('close', (code, signal) => {
        resolve({
          exitCode: code ?? signalExitCode(signal),
          stdout,
          stderr
        });
      });
    });
  }
}
