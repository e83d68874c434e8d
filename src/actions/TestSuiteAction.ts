/**
 * Tests action
 *
 * Runs pytest with the requested report options; when pytest fails the
 * standalone test script runs once in its place.
 */

import { mkdirSync } from 'fs';
import { join } from 'path';
import { FALLBACK_TEST_SCRIPT, REPORT_FILE, REPORT_KINDS, REPORTS_DIR } from '../core/constants.js';
import { UnsupportedOptionError } from '../core/errors.js';
import type { ReportKind } from '../core/types.js';
import type { RunOptions } from '../process/ProcessRunner.js';
import type { ActionContext } from './types.js';

export interface TestSuiteOptions {
  reportKind: string;
  noSugar: boolean;
}

export function isReportKind(value: string): value is ReportKind {
  return REPORT_KINDS.some((kind) => kind === value);
}

/**
 * pytest arguments (after the interpreter) for a report kind
 */
export function buildPytestArgs(reportKind: ReportKind, noSugar: boolean): string[] {
  const args = ['-m', 'pytest', '-q'];
  if (noSugar) {
    args.push('-p', 'no:sugar');
  }

  switch (reportKind) {
    case 'html':
      args.push(`--html=${REPORT_FILE}`);
      break;
    case 'html-standalone':
      args.push(`--html=${REPORT_FILE}`, '--self-contained-html');
      break;
    case 'none':
      break;
  }

  return args;
}

export class TestSuiteAction {
  /**
   * @returns Exit status of pytest, or of the fallback script when pytest failed
   */
  async run(context: ActionContext, options: TestSuiteOptions): Promise<number> {
    const { environment, runner, logger } = context;

    if (!isReportKind(options.reportKind)) {
      throw new UnsupportedOptionError(`Unsupported report type: ${options.reportKind}`);
    }
    const reportKind = options.reportKind;

    logger.info('Running tests...');

    if (reportKind !== 'none') {
      mkdirSync(join(environment.cwd, REPORTS_DIR), { recursive: true });
      logger.info(
        reportKind === 'html'
          ? `Generating HTML report: ${REPORT_FILE}`
          : `Generating self-contained HTML report: ${REPORT_FILE}`
      );
    }

    const runOptions: RunOptions = { cwd: environment.cwd, env: environment.env, stdio: 'inherit' };

    const pytest = await runner.run(
      environment.python,
      buildPytestArgs(reportKind, options.noSugar),
      runOptions
    );
    if (pytest.exitCode === 0) {
      return 0;
    }

    logger.warn(`pytest exited with code ${pytest.exitCode}, running ${FALLBACK_TEST_SCRIPT}`);
    const fallback = await runner.run(environment.python, [FALLBACK_TEST_SCRIPT], runOptions);
    return fallback.exitCode;
  }
}
