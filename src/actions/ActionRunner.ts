/**
 * ActionRunner
 *
 * Executes requested actions one at a time, in the order given, and turns a
 * non-zero child status into ChildProcessFailure. The first failure stops the
 * run.
 */

import { ChildProcessFailure } from '../core/errors.js';
import type { ActionKind, RunConfig } from '../core/types.js';
import type { LeagueActions } from './LeagueActions.js';
import type { StatsAction } from './StatsAction.js';
import type { TestSuiteAction } from './TestSuiteAction.js';
import type { ActionContext } from './types.js';

export interface ActionSet {
  tests: TestSuiteAction;
  leagues: LeagueActions;
  stats: StatsAction;
}

export class ActionRunner {
  constructor(private readonly actions: ActionSet) {}

  async runAll(context: ActionContext, kinds: readonly ActionKind[], config: RunConfig): Promise<void> {
    for (const kind of kinds) {
      await this.run(context, kind, config);
    }
  }

  async run(context: ActionContext, kind: ActionKind, config: RunConfig): Promise<void> {
    const status = await this.dispatch(context, kind, config);
    if (status !== 0) {
      throw new ChildProcessFailure(kind, status);
    }
  }

  private dispatch(context: ActionContext, kind: ActionKind, config: RunConfig): Promise<number> {
    switch (kind) {
      case 'tests':
        return this.actions.tests.run(context, { reportKind: config.reportKind, noSugar: config.noSugar });
      case 'all':
        return this.actions.leagues.processAll(context, config.assumeYes, config.season);
      case 'limit':
        return this.actions.leagues.processLimit(context, config.limit, config.season);
      case 'league':
        return this.actions.leagues.processLeague(context, config.leagueId ?? '', config.season);
      case 'stats':
        return this.actions.stats.run(context);
    }
  }
}
