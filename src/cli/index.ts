#!/usr/bin/env node
/**
 * api-football launcher CLI
 *
 * Entry point: loads .env, wires interrupt handling and exits with the code
 * Launcher.run returns.
 */

import { config as loadDotenv } from 'dotenv';
import { join } from 'path';
import { loadSettings } from '../config/ConfigLoader.js';
import { EXIT_CODES } from '../core/constants.js';
import { ConsoleLogger } from '../core/ConsoleLogger.js';
import { LauncherError } from '../core/errors.js';
import { Launcher } from '../launcher/Launcher.js';

/**
 * Ctrl+C anywhere ends the run with 130; no further actions are started
 */
function setupInterrupt(logger: ConsoleLogger): void {
  process.on('SIGINT', () => {
    logger.line();
    logger.warn('Interrupted by user');
    process.exit(EXIT_CODES.INTERRUPTED);
  });
}

async function main(): Promise<number> {
  loadDotenv({ path: join(process.cwd(), '.env') });

  const logger = new ConsoleLogger();
  setupInterrupt(logger);

  try {
    const settings = loadSettings(process.env);
    return await new Launcher(settings, { logger }).run(process.argv.slice(2));
  } catch (error) {
    logger.error(error instanceof Error ? error.message : String(error));
    return error instanceof LauncherError ? error.exitCode : EXIT_CODES.FAILURE;
  }
}

main()
  .then((code) => process.exit(code))
  .catch((error) => {
    console.error('[Fatal]', error);
    process.exit(EXIT_CODES.FAILURE);
  });
