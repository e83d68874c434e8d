/**
 * League processing actions
 *
 * All three delegate to `python -m api_football.main`; they differ only in
 * the filter they pass and in the confirmation required for a full run.
 */

import { MAIN_MODULE } from '../core/constants.js';
import { ConfirmationDeclinedError } from '../core/errors.js';
import { parseLeagueId, parseLimit } from '../core/validation.js';
import type { ConfirmationGate } from '../prompt/ConfirmationGate.js';
import type { ActionContext } from './types.js';

/**
 * Arguments (after the interpreter) for one api_football.main run
 */
export function buildMainArgs(filter: string[], season: string | null): string[] {
  const args = ['-m', MAIN_MODULE, ...filter];
  if (season) {
    args.push('--season', season);
  }
  return args;
}

export class LeagueActions {
  constructor(private readonly gate: ConfirmationGate) {}

  /**
   * Process every league, after confirmation unless assumeYes
   *
   * @throws ConfirmationDeclinedError when the user says no; nothing is launched
   */
  async processAll(context: ActionContext, assumeYes: boolean, season: string | null): Promise<number> {
    context.logger.info('Processing ALL leagues.');

    const confirmed = await this.gate.confirm('Are you sure? This can take several hours.', assumeYes);
    if (!confirmed) {
      throw new ConfirmationDeclinedError();
    }

    return this.runMain(context, [], season);
  }

  /**
   * Process the first N leagues (test mode). `limit` is validated again because
   * the menu passes it through unchecked.
   */
  async processLimit(context: ActionContext, limit: string, season: string | null): Promise<number> {
    const n = parseLimit(limit);
    context.logger.info(`Processing ${n} leagues (test mode)...`);
    return this.runMain(context, ['--limit', n], season);
  }

  async processLeague(context: ActionContext, leagueId: string, season: string | null): Promise<number> {
    const id = parseLeagueId(leagueId);
    context.logger.info(`Processing league ${id}...`);
    return this.runMain(context, ['--league-id', id], season);
  }

  private async runMain(context: ActionContext, filter: string[], season: string | null): Promise<number> {
    const { environment, runner } = context;
    const result = await runner.run(environment.python, buildMainArgs(filter, season), {
      cwd: environment.cwd,
      env: environment.env,
      stdio: 'inherit'
    });
    return result.exitCode;
  }
}
