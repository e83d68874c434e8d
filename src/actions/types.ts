/**
 * Action Types
 */

import type { ConsoleLogger } from '../core/ConsoleLogger.js';
import type { ExecutionEnvironment } from '../core/types.js';
import type { ProcessRunner } from '../process/ProcessRunner.js';

/**
 * What every action needs to launch its child process
 */
export interface ActionContext {
  environment: ExecutionEnvironment;
  runner: ProcessRunner;
  logger: ConsoleLogger;
}
