/**
 * Yes/no confirmation before long-running work
 */

import { AFFIRMATIVE_ANSWER } from '../core/constants.js';
import type { ConsoleLogger } from '../core/ConsoleLogger.js';
import type { Prompter } from './Prompter.js';

export class ConfirmationGate {
  constructor(
    private readonly prompter: Prompter,
    private readonly logger: ConsoleLogger
  ) {}

  /**
   * @returns true when confirmed or bypassed; false (after a warning) otherwise
   */
  async confirm(message: string, assumeYes: boolean): Promise<boolean> {
    if (assumeYes) {
      return true;
    }

    const answer = await this.prompter.ask(`${message} (s/n): `);
    if (answer.toLowerCase() !== AFFIRMATIVE_ANSWER) {
      this.logger.warn('Operation cancelled by user.');
      return false;
    }
    return true;
  }
}
