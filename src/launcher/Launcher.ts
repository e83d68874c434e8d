/**
 * Launcher
 *
 * Top-level orchestration for one run:
 *   parse → (help | nothing to do | resolve environment → menu or actions)
 *
 * run() never exits the process; it returns the exit code. Errors become exit
 * codes here and nowhere else.
 */

import { ActionRunner } from '../actions/ActionRunner.js';
import { LeagueActions } from '../actions/LeagueActions.js';
import { StatsAction } from '../actions/StatsAction.js';
import { TestSuiteAction } from '../actions/TestSuiteAction.js';
import type { ActionContext } from '../actions/types.js';
import { parseInvocation } from '../cli/program.js';
import { EXIT_CODES } from '../core/constants.js';
import { ConsoleLogger } from '../core/ConsoleLogger.js';
import { ConfirmationDeclinedError, InterruptedError, LauncherError, UnsupportedOptionError } from '../core/errors.js';
import type { ExecutionEnvironment, LauncherSettings } from '../core/types.js';
import { EnvironmentResolver } from '../environment/EnvironmentResolver.js';
import { SpawnProcessRunner, type ProcessRunner } from '../process/ProcessRunner.js';
import { ConfirmationGate } from '../prompt/ConfirmationGate.js';
import { ReadlinePrompter, type Prompter } from '../prompt/Prompter.js';
import { InteractiveMenu } from './InteractiveMenu.js';

export interface LauncherDependencies {
  runner?: ProcessRunner;
  logger?: ConsoleLogger;
  prompter?: Prompter;
  /** Replaces EnvironmentResolver.resolve() */
  resolveEnvironment?: () => Promise<ExecutionEnvironment>;
}

export class Launcher {
  private readonly settings: LauncherSettings;
  private readonly runner: ProcessRunner;
  private readonly logger: ConsoleLogger;
  private readonly prompter: Prompter;
  private readonly resolveEnvironment: () => Promise<ExecutionEnvironment>;
  private readonly actions: ActionRunner;

  constructor(settings: LauncherSettings, dependencies: LauncherDependencies = {}) {
    this.settings = settings;
    this.runner = dependencies.runner ?? new SpawnProcessRunner();
    this.logger = dependencies.logger ?? new ConsoleLogger();
    this.prompter = dependencies.prompter ?? new ReadlinePrompter();

    const resolver = new EnvironmentResolver(settings, this.runner, this.logger);
    this.resolveEnvironment = dependencies.resolveEnvironment ?? (() => resolver.resolve());

    const gate = new ConfirmationGate(this.prompter, this.logger);
    this.actions = new ActionRunner({
      tests: new TestSuiteAction(),
      leagues: new LeagueActions(gate),
      stats: new StatsAction()
    });
  }

  /**
   * @param argv - Arguments without node and script path
   * @returns Process exit code
   */
  async run(argv: readonly string[]): Promise<number> {
    try {
      const invocation = parseInvocation(argv, this.settings);

      if (invocation.kind === 'help') {
        this.logger.write(invocation.usage);
        return EXIT_CODES.SUCCESS;
      }

      if (invocation.kind === 'actions' && invocation.actions.length === 0) {
        this.logger.warn('Nothing to run: no action flag given (see --help).');
        return EXIT_CODES.SUCCESS;
      }

      const environment = await this.resolveEnvironment();
      const context: ActionContext = { environment, runner: this.runner, logger: this.logger };

      if (invocation.kind === 'interactive') {
        const menu = new InteractiveMenu(this.prompter, this.actions, {
          defaultLimit: this.settings.defaultLimit,
          season: this.settings.season
        });
        await menu.run(context);
      } else {
        await this.actions.runAll(context, invocation.actions, invocation.config);
      }

      return EXIT_CODES.SUCCESS;
    } catch (error) {
      return this.handleError(error);
    } finally {
      this.prompter.close();
    }
  }

  private handleError(error: unknown): number {
    // Already reported as a warning by the confirmation gate
    if (error instanceof ConfirmationDeclinedError) {
      return error.exitCode;
    }

    if (error instanceof InterruptedError) {
      this.logger.line();
      this.logger.warn(error.message);
      return error.exitCode;
    }

    if (error instanceof LauncherError) {
      this.logger.error(error.message);
      if (error instanceof UnsupportedOptionError && error.usage) {
        this.logger.write(error.usage, 'stderr');
      }
      return error.exitCode;
    }

    this.logger.error(error instanceof Error ? error.message : String(error));
    return EXIT_CODES.FAILURE;
  }
}
