/**
 * Launcher Types
 */

/**
 * Delegated actions a run can request
 */
export type ActionKind = 'tests' | 'all' | 'limit' | 'league' | 'stats';

/**
 * Test report formats
 */
export type ReportKind = 'none' | 'html' | 'html-standalone';

/**
 * Per-invocation configuration built by the flag parser or the menu
 */
export interface RunConfig {
  /** Raw --report value; checked when the tests action runs */
  reportKind: string;
  /** Run pytest without the sugar plugin */
  noSugar: boolean;
  /** Skip the confirmation prompt for 'all' */
  assumeYes: boolean;
  /** League count for 'limit', as the validated digit string */
  limit: string;
  /** Numeric league ID for 'league' */
  leagueId: string | null;
  /** Season forwarded to the processing module */
  season: string | null;
}

/**
 * What a single invocation does, decided once per run
 */
export type Invocation =
  | { kind: 'help'; usage: string }
  | { kind: 'interactive' }
  | { kind: 'actions'; actions: ActionKind[]; config: RunConfig };

/**
 * Optional behaviours that separate the current CLI from the legacy one
 */
export interface LauncherFeatures {
  /** --report and --no-sugar are accepted */
  reporting: boolean;
  /** Several action flags may run in one invocation */
  combinableFlags: boolean;
}

export interface PythonVersion {
  major: number;
  minor: number;
}

/**
 * Settings resolved from the process environment
 */
export interface LauncherSettings {
  /** Directory the delegated commands run in */
  appDir: string;
  /** PYTHON_BIN override */
  pythonOverride: string | null;
  minPython: PythonVersion;
  defaultLimit: number;
  season: string | null;
  features: LauncherFeatures;
  /** Base environment for child processes */
  env: NodeJS.ProcessEnv;
}

/**
 * Where and with what the delegated commands run.
 *
 * Computed once by EnvironmentResolver and passed to every action.
 */
export interface ExecutionEnvironment {
  cwd: string;
  python: string;
  pythonVersion: string;
  /** venv root when one was applied */
  virtualEnv: string | null;
  env: NodeJS.ProcessEnv;
}
