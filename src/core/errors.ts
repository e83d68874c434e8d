/**
 * Custom Error Classes for the launcher
 *
 * Every error the launcher raises on purpose extends LauncherError and carries
 * the process exit code it maps to. Launcher.run is the only place that turns
 * them into exit codes.
 */

import type { ActionKind } from './types.js';
import { EXIT_CODES } from './constants.js';

/**
 * Base class for errors that end (or abort part of) a launcher run
 */
export abstract class LauncherError extends Error {
  public readonly exitCode: number;

  constructor(message: string, exitCode: number) {
    super(message);
    this.name = new.target.name;
    this.exitCode = exitCode;

    // Maintains proper stack trace for where error was thrown (only in V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Missing interpreter, interpreter too old, or missing application directory
 */
export class EnvironmentError extends LauncherError {
  constructor(message: string) {
    super(message, EXIT_CODES.FAILURE);
  }
}

/**
 * Malformed user input (numeric flags, menu choices)
 */
export class ValidationError extends LauncherError {
  public readonly value: string;

  constructor(message: string, value: string) {
    super(message, EXIT_CODES.FAILURE);
    this.value = value;
  }
}

/**
 * The user declined a confirmation prompt.
 *
 * Not fatal by itself: the interactive menu swallows it, the flag path turns it
 * into exit code 1.
 */
export class ConfirmationDeclinedError extends LauncherError {
  constructor(message = 'Operation cancelled by user.') {
    super(message, EXIT_CODES.FAILURE);
  }
}

/**
 * A delegated action exited with a non-zero status. The status becomes ours.
 */
export class ChildProcessFailure extends LauncherError {
  public readonly action: ActionKind;
  public readonly status: number;

  constructor(action: ActionKind, status: number, detail?: string) {
    super(
      `Action '${action}' failed with exit code ${status}` + (detail ? `: ${detail}` : ''),
      status
    );
    this.action = action;
    this.status = status;
  }
}

/**
 * Unrecognised flag, stray argument or unsupported --report value
 */
export class UnsupportedOptionError extends LauncherError {
  /** Usage text to print after the error line, when the error came from parsing */
  public readonly usage: string | null;

  constructor(message: string, usage: string | null = null) {
    super(message, EXIT_CODES.USAGE);
    this.usage = usage;
  }
}

/**
 * Ctrl+C while the launcher was waiting on the user
 */
export class InterruptedError extends LauncherError {
  constructor() {
    super('Interrupted by user', EXIT_CODES.INTERRUPTED);
  }
}
