/**
 * Executable lookup, the `command -v` equivalent
 */

import { accessSync, constants, statSync } from 'fs';
import { delimiter, isAbsolute, join, resolve } from 'path';

function isExecutableFile(candidate: string): boolean {
  try {
    if (!statSync(candidate).isFile()) return false;
    accessSync(candidate, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Resolve a command name or path to an executable file.
 *
 * Names containing a path separator are checked directly (relative to `cwd`);
 * bare names are searched on `env.PATH`. On Windows every PATHEXT extension
 * is tried as well.
 *
 * @returns Absolute path, or null when nothing executable was found
 */
export function findExecutable(
  command: string,
  env: NodeJS.ProcessEnv,
  cwd: string = process.cwd(),
  platform: NodeJS.Platform = process.platform
): string | null {
  const extensions = platform === 'win32'
    ? ['', ...(env.PATHEXT ?? '.EXE;.CMD;.BAT').split(';').filter(Boolean)]
    : [''];

  if (command.includes('/') || command.includes('\\')) {
    const base = isAbsolute(command) ? command : resolve(cwd, command);
    for (const extension of extensions) {
      if (isExecutableFile(base + extension)) return base + extension;
    }
    return null;
  }

  const dirs = (env.PATH ?? '').split(delimiter).filter(Boolean);
  for (const dir of dirs) {
    for (const extension of extensions) {
      const candidate = join(dir, command + extension);
      if (isExecutableFile(candidate)) return resolve(candidate);
    }
  }

  return null;
}
