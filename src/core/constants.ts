/**
 * Launcher Constants
 */

import type { ActionKind, LauncherFeatures, PythonVersion, ReportKind } from './types.js';

export const EXIT_CODES = {
  SUCCESS: 0,
  FAILURE: 1,
  USAGE: 2,
  INTERRUPTED: 130
} as const;

export const DEFAULT_LIMIT = 5;

export const DEFAULT_MIN_PYTHON: PythonVersion = { major: 3, minor: 9 };

/** Probed in order when PYTHON_BIN is not set */
export const PYTHON_CANDIDATES = ['python3', 'python'] as const;

/** Execution order when several actions are requested together */
export const ACTION_ORDER: readonly ActionKind[] = ['tests', 'all', 'limit', 'league', 'stats'];

export const REPORT_KINDS: readonly ReportKind[] = ['none', 'html', 'html-standalone'];

export const MODERN_FEATURES: LauncherFeatures = { reporting: true, combinableFlags: true };
export const LEGACY_FEATURES: LauncherFeatures = { reporting: false, combinableFlags: false };

export const VENV_DIR = 'venv';

export const MAIN_MODULE = 'api_football.main';
export const FALLBACK_TEST_SCRIPT = 'test_api_football.py';
export const REPORTS_DIR = 'reports';
export const REPORT_FILE = 'reports/pytest_report.html';

/** Only this answer (case-insensitive) confirms a prompt */
export const AFFIRMATIVE_ANSWER = 's';

/** Leagues shown by the stats action */
export const STATS_TOP_LEAGUES = 10;
