/**
 * api-football launcher
 *
 * Programmatic entry points for the launcher CLI.
 */

export { Launcher } from './launcher/Launcher.js';
export type { LauncherDependencies } from './launcher/Launcher.js';
export { InteractiveMenu } from './launcher/InteractiveMenu.js';

export { parseInvocation, renderUsage, scanArguments, PROGRAM_NAME } from './cli/program.js';
export { loadSettings } from './config/ConfigLoader.js';

export { EnvironmentResolver, parsePythonVersion, meetsMinimum } from './environment/EnvironmentResolver.js';
export { findExecutable } from './environment/executables.js';

export { ActionRunner } from './actions/ActionRunner.js';
export { TestSuiteAction, buildPytestArgs, isReportKind } from './actions/TestSuiteAction.js';
export { LeagueActions, buildMainArgs } from './actions/LeagueActions.js';
export { StatsAction, STATS_SCRIPT, parseStatistics, formatStatistics } from './actions/StatsAction.js';
export type { ActionContext } from './actions/types.js';

export { SpawnProcessRunner } from './process/ProcessRunner.js';
export type { ProcessRunner, ProcessResult, RunOptions } from './process/ProcessRunner.js';
export { ReadlinePrompter } from './prompt/Prompter.js';
export type { Prompter } from './prompt/Prompter.js';
export { ConfirmationGate } from './prompt/ConfirmationGate.js';

export { ConsoleLogger } from './core/ConsoleLogger.js';
export * from './core/errors.js';
export * from './core/constants.js';
export type * from './core/types.js';
