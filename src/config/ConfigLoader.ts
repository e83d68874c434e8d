/**
 * Configuration Loader
 *
 * Builds LauncherSettings from environment variables. The CLI entry point
 * loads `.env` into the environment before calling loadSettings.
 */

import { resolve } from 'path';
import { z } from 'zod';
import { DEFAULT_LIMIT, DEFAULT_MIN_PYTHON, LEGACY_FEATURES, MODERN_FEATURES } from '../core/constants.js';
import { EnvironmentError } from '../core/errors.js';
import type { LauncherSettings } from '../core/types.js';

const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const EnvSchema = z.object({
  PYTHON_BIN: z.preprocess(blankToUndefined, z.string().optional()),
  API_FOOTBALL_APP_DIR: z.preprocess(blankToUndefined, z.string().optional()),
  API_FOOTBALL_DEFAULT_LIMIT: z.preprocess(
    blankToUndefined,
    z.string().regex(/^[0-9]+$/, 'must be a positive integer').optional()
  ),
  API_FOOTBALL_MIN_PYTHON: z.preprocess(
    blankToUndefined,
    z.string().regex(/^[0-9]+\.[0-9]+$/, 'must look like 3.9').optional()
  ),
  API_FOOTBALL_SEASON: z.preprocess(
    blankToUndefined,
    z.string().regex(/^[0-9]{4}$/, 'must be a four-digit year').optional()
  ),
  API_FOOTBALL_LEGACY_CLI: z.preprocess(
    blankToUndefined,
    z.enum(['1', '0', 'true', 'false']).optional()
  )
});

/**
 * Read launcher settings from an environment map
 *
 * @param env - Usually process.env
 * @param cwd - Base for a relative API_FOOTBALL_APP_DIR and the default app dir
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): LauncherSettings {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new EnvironmentError(`Invalid configuration: ${issue.path.join('.')} ${issue.message}`);
  }

  const vars = parsed.data;

  const defaultLimit = vars.API_FOOTBALL_DEFAULT_LIMIT !== undefined
    ? Number(vars.API_FOOTBALL_DEFAULT_LIMIT)
    : DEFAULT_LIMIT;
  if (defaultLimit <= 0) {
    throw new EnvironmentError('Invalid configuration: API_FOOTBALL_DEFAULT_LIMIT must be greater than 0');
  }

  let minPython = DEFAULT_MIN_PYTHON;
  if (vars.API_FOOTBALL_MIN_PYTHON !== undefined) {
    const [major, minor] = vars.API_FOOTBALL_MIN_PYTHON.split('.').map(Number);
    minPython = { major, minor };
  }

  const legacy = vars.API_FOOTBALL_LEGACY_CLI === '1' || vars.API_FOOTBALL_LEGACY_CLI === 'true';

  return {
    appDir: resolve(cwd, vars.API_FOOTBALL_APP_DIR ?? '.'),
    pythonOverride: vars.PYTHON_BIN ?? null,
    minPython,
    defaultLimit,
    season: vars.API_FOOTBALL_SEASON ?? null,
    features: legacy ? { ...LEGACY_FEATURES } : { ...MODERN_FEATURES },
    env: { ...env }
  };
}
