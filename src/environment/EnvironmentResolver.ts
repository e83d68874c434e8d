/**
 * EnvironmentResolver
 *
 * Works out where and with which interpreter the delegated commands run:
 *   1. application directory
 *   2. virtual environment (optional)
 *   3. interpreter (venv, PYTHON_BIN, then python3 / python)
 *   4. minimum interpreter version
 *
 * The result is an ExecutionEnvironment value. Nothing here touches
 * process.env or the process working directory.
 */

import { existsSync, statSync } from 'fs';
import { delimiter, join } from 'path';
import { PYTHON_CANDIDATES, VENV_DIR } from '../core/constants.js';
import { EnvironmentError } from '../core/errors.js';
import type { ConsoleLogger } from '../core/ConsoleLogger.js';
import type { ExecutionEnvironment, LauncherSettings, PythonVersion } from '../core/types.js';
import type { ProcessRunner } from '../process/ProcessRunner.js';
import { findExecutable } from './executables.js';

const VERSION_SCRIPT = 'import sys; print(".".join(map(str, sys.version_info[:3])))';

export interface VirtualEnvOverride {
  root: string;
  /** venv-local interpreter, null when the venv has none we can execute */
  python: string | null;
  env: NodeJS.ProcessEnv;
}

/**
 * Parse "3.11.4" (or "3.11") into major/minor
 */
export function parsePythonVersion(output: string): PythonVersion | null {
  const match = output.trim().match(/^(\d+)\.(\d+)(?:\.\d+)?/);
  if (!match) return null;
  return { major: Number(match[1]), minor: Number(match[2]) };
}

export function meetsMinimum(version: PythonVersion, minimum: PythonVersion): boolean {
  return version.major > minimum.major ||
    (version.major === minimum.major && version.minor >= minimum.minor);
}

export class EnvironmentResolver {
  private readonly settings: LauncherSettings;
  private readonly runner: ProcessRunner;
  private readonly logger: ConsoleLogger;
  private readonly platform: NodeJS.Platform;

  constructor(
    settings: LauncherSettings,
    runner: ProcessRunner,
    logger: ConsoleLogger,
    platform: NodeJS.Platform = process.platform
  ) {
    this.settings = settings;
    this.runner = runner;
    this.logger = logger;
    this.platform = platform;
  }

  async resolve(): Promise<ExecutionEnvironment> {
    const cwd = this.enterAppDir();
    const venv = this.detectVirtualEnv(cwd);

    let env = this.settings.env;
    if (venv) {
      env = venv.env;
      this.logger.ok(`Virtual environment ${VENV_DIR} activated`);
    }

    const python = this.locateInterpreter(cwd, env, venv);
    const pythonVersion = await this.checkVersion(python, cwd, env);
    this.logger.ok(`Using ${python} (Python ${pythonVersion})`);

    return {
      cwd,
      python,
      pythonVersion,
      virtualEnv: venv ? venv.root : null,
      env
    };
  }

  private enterAppDir(): string {
    const dir = this.settings.appDir;
    if (!existsSync(dir) || !statSync(dir).isDirectory()) {
      throw new EnvironmentError(`Directory not found: ${dir}`);
    }
    this.logger.ok(`Working directory: ${dir}`);
    return dir;
  }

  /**
   * The activate script is only a marker: its effect is reproduced on a copy
   * of the environment.
   */
  detectVirtualEnv(cwd: string): VirtualEnvOverride | null {
    const root = join(cwd, VENV_DIR);
    const binDir = join(root, this.platform === 'win32' ? 'Scripts' : 'bin');

    if (!existsSync(join(binDir, 'activate'))) {
      return null;
    }

    const env: NodeJS.ProcessEnv = { ...this.settings.env, VIRTUAL_ENV: root };
    const currentPath = env.PATH;
    env.PATH = currentPath ? `${binDir}${delimiter}${currentPath}` : binDir;
    delete env.PYTHONHOME;

    return {
      root,
      python: findExecutable(join(binDir, 'python'), env, cwd, this.platform),
      env
    };
  }

  private locateInterpreter(
    cwd: string,
    env: NodeJS.ProcessEnv,
    venv: VirtualEnvOverride | null
  ): string {
    if (venv?.python) {
      return venv.python;
    }

    const override = this.settings.pythonOverride;
    if (override) {
      const found = findExecutable(override, env, cwd, this.platform);
      if (!found) {
        throw new EnvironmentError(`PYTHON_BIN points to a missing executable: ${override}`);
      }
      return found;
    }

    for (const candidate of PYTHON_CANDIDATES) {
      const found = findExecutable(candidate, env, cwd, this.platform);
      if (found) return found;
    }

    throw new EnvironmentError(
      `No Python interpreter (${PYTHON_CANDIDATES.join(' or ')}) found on PATH.`
    );
  }

  private async checkVersion(python: string, cwd: string, env: NodeJS.ProcessEnv): Promise<string> {
    const result = await this.runner.run(python, ['-c', VERSION_SCRIPT], { cwd, env, stdio: 'capture' });
    const reported = result.stdout.trim();
    const version = result.exitCode === 0 ? parsePythonVersion(reported) : null;

    if (!version) {
      throw new EnvironmentError(`Could not determine the Python version of ${python}`);
    }

    const { major, minor } = this.settings.minPython;
    if (!meetsMinimum(version, this.settings.minPython)) {
      throw new EnvironmentError(`Python >= ${major}.${minor} is required, found ${reported} at ${python}`);
    }

    return reported;
  }
}
