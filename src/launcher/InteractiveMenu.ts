/**
 * InteractiveMenu
 *
 * One prompt cycle: show the options, read a choice, run it. An invalid choice
 * ends the run; it is not asked again.
 */

import { ConfirmationDeclinedError, ValidationError } from '../core/errors.js';
import type { ReportKind, RunConfig } from '../core/types.js';
import type { ActionRunner } from '../actions/ActionRunner.js';
import type { ActionContext } from '../actions/types.js';
import type { Prompter } from '../prompt/Prompter.js';

const REPORT_CHOICES = new Map<string, ReportKind>([
  ['1', 'none'],
  ['2', 'html'],
  ['3', 'html-standalone']
]);

export interface InteractiveMenuConfig {
  defaultLimit: number;
  season: string | null;
}

export class InteractiveMenu {
  constructor(
    private readonly prompter: Prompter,
    private readonly runner: ActionRunner,
    private readonly config: InteractiveMenuConfig
  ) {}

  async run(context: ActionContext): Promise<void> {
    const { logger } = context;
    const bold = (text: string) => logger.colors.bold(text);

    logger.line(bold('===================================='));
    logger.line(bold('API-FOOTBALL MODULE'));
    logger.line(bold('===================================='));
    logger.line();
    logger.line('Options:');
    logger.line('1. Run tests');
    logger.line('2. Process all leagues');
    logger.line(`3. Process ${this.config.defaultLimit} leagues (test mode)`);
    logger.line('4. Process a specific league');
    logger.line('5. Show database statistics');
    logger.line();

    const option = await this.prompter.ask('Select an option (1-5): ');
    const runConfig = this.baseConfig();

    switch (option) {
      case '1': {
        logger.line();
        runConfig.reportKind = await this.askReportKind(context);
        await this.runner.run(context, 'tests', runConfig);
        break;
      }
      case '2': {
        logger.line();
        try {
          await this.runner.run(context, 'all', runConfig);
        } catch (error) {
          // A declined confirmation is not an error here
          if (!(error instanceof ConfirmationDeclinedError)) throw error;
        }
        break;
      }
      case '3': {
        logger.line();
        await this.runner.run(context, 'limit', runConfig);
        break;
      }
      case '4': {
        logger.line();
        runConfig.leagueId = await this.prompter.ask('Enter the league ID (e.g. 140 for La Liga): ');
        await this.runner.run(context, 'league', runConfig);
        break;
      }
      case '5': {
        logger.line();
        await this.runner.run(context, 'stats', runConfig);
        break;
      }
      default:
        throw new ValidationError('Invalid option', option);
    }

    logger.ok('Finished.');
  }

  private async askReportKind(context: ActionContext): Promise<ReportKind> {
    const { logger } = context;
    logger.line('Report format:');
    logger.line('  1) No report (console)');
    logger.line('  2) HTML');
    logger.line('  3) Self-contained HTML');

    const answer = await this.prompter.ask('Choose (1-3): ');
    return REPORT_CHOICES.get(answer) ?? 'none';
  }

  private baseConfig(): RunConfig {
    return {
      reportKind: 'none',
      noSugar: false,
      assumeYes: false,
      limit: String(this.config.defaultLimit),
      leagueId: null,
      season: this.config.season
    };
  }
}
