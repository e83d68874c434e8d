/**
 * Flag parser
 *
 * Turns the argument list into an Invocation without side effects: nothing is
 * printed, nothing exits. Value validation happens here so a malformed value
 * never reaches environment resolution.
 */

import { Command, CommanderError } from 'commander';
import { ACTION_ORDER } from '../core/constants.js';
import { UnsupportedOptionError, ValidationError } from '../core/errors.js';
import type { ActionKind, Invocation, LauncherSettings, RunConfig } from '../core/types.js';
import { parseLeagueId, parseLimit, parseSeason } from '../core/validation.js';

export const PROGRAM_NAME = 'run-api-football';

type RawOptions = {
  tests?: boolean;
  report?: string;
  sugar?: boolean;
  all?: boolean;
  yes?: boolean;
  limit?: string | boolean;
  league?: string;
  season?: string;
  stats?: boolean;
};

const ACTION_FLAGS = new Map<string, ActionKind>([
  ['--tests', 'tests'],
  ['--all', 'all'],
  ['--limit', 'limit'],
  ['--league', 'league'],
  ['--stats', 'stats']
]);

/** Options whose next token is always their value */
const VALUE_FLAGS = new Set(['--report', '--league', '--season']);

const looksLikeFlag = (token: string | undefined) => token !== undefined && token.length > 1 && token.startsWith('-');

interface ArgumentScan {
  /** Action flags in the order they appear */
  actionOrder: ActionKind[];
  /** A -y/--yes that does not directly follow --all */
  strayAssumeYes: string | null;
  /** --league given as the last token */
  leagueMissingValue: boolean;
}

/**
 * Walk the raw tokens once, skipping option values the same way the parser
 * consumes them. --limit only takes the next token when it does not look like
 * a flag.
 */
export function scanArguments(argv: readonly string[]): ArgumentScan {
  const actionOrder: ActionKind[] = [];
  let strayAssumeYes: string | null = null;
  let leagueMissingValue = false;

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];

    if (token === '--') break;

    const action = ACTION_FLAGS.get(token);
    if (action && !actionOrder.includes(action)) {
      actionOrder.push(action);
    }

    if (VALUE_FLAGS.has(token)) {
      if (token === '--league' && i + 1 >= argv.length) {
        leagueMissingValue = true;
      }
      i++;
    } else if (token === '--limit') {
      if (i + 1 < argv.length && !looksLikeFlag(argv[i + 1])) i++;
    } else if (token === '--all') {
      if (argv[i + 1] === '-y' || argv[i + 1] === '--yes') i++;
    } else if ((token === '-y' || token === '--yes') && strayAssumeYes === null) {
      strayAssumeYes = token;
    }
  }

  return { actionOrder, strayAssumeYes, leagueMissingValue };
}

/**
 * Commander program for the flag surface
 */
export function createProgram(settings: LauncherSettings): Command {
  const program = new Command()
    .name(PROGRAM_NAME)
    .description('Launcher for the api_football module: tests, league processing and database statistics')
    .usage('[options]')
    .helpOption('-h, --help', 'Show this help')
    .option('--tests', 'Run the automated tests');

  if (settings.features.reporting) {
    program
      .option('--report <kind>', 'Report type for --tests: html (reports/pytest_report.html) or html-standalone (single self-contained file)')
      .option('--no-sugar', 'Run pytest without the pytest-sugar plugin (classic output)');
  }

  program
    .option('--all', 'Process ALL leagues (takes hours)')
    .option('-y, --yes', 'Skip the confirmation for --all (only right after --all)')
    .option('--limit [n]', `Process N leagues (test mode). Default: ${settings.defaultLimit}`)
    .option('--league <id>', 'Process one league (numeric ID)')
    .option('--season <year>', 'Season forwarded to the processing module')
    .option('--stats', 'Show database statistics')
    .allowExcessArguments(false)
    .exitOverride()
    .addHelpText('after', [
      '',
      'Without options an interactive menu is shown.',
      '',
      'Examples:',
      `  ${PROGRAM_NAME} --tests --report html`,
      `  ${PROGRAM_NAME} --all -y`,
      `  ${PROGRAM_NAME} --limit 10`,
      `  ${PROGRAM_NAME} --league 140 --stats`,
      '',
      'Environment:',
      '  PYTHON_BIN              Python interpreter to use (default: python3, then python)',
      '  API_FOOTBALL_APP_DIR    Directory the commands run in (default: current directory)',
      ''
    ].join('\n'));

  return program;
}

/**
 * Full help text, as printed by --help
 */
export function renderUsage(settings: LauncherSettings): string {
  let text = '';
  const program = createProgram(settings);
  program.configureOutput({
    writeOut: (chunk) => {
      text += chunk;
    }
  });
  program.outputHelp();
  return text;
}

/**
 * Parse the argument list (without node and script path)
 *
 * @throws UnsupportedOptionError for unknown flags, stray arguments and -y outside --all
 * @throws ValidationError for malformed --limit, --league or --season values
 */
export function parseInvocation(argv: readonly string[], settings: LauncherSettings): Invocation {
  if (argv.length === 0) {
    return { kind: 'interactive' };
  }

  const program = createProgram(settings);
  let helpText = '';
  program.configureOutput({
    writeOut: (chunk) => {
      helpText += chunk;
    },
    writeErr: () => undefined,
    outputError: () => undefined
  });

  const scan = scanArguments(argv);

  try {
    program.parse([...argv], { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      if (error.code === 'commander.helpDisplayed' || error.code === 'commander.help') {
        return { kind: 'help', usage: helpText };
      }
      if (error.code === 'commander.optionMissingArgument' && scan.leagueMissingValue) {
        throw new ValidationError('Missing league ID for --league', '');
      }
      throw new UnsupportedOptionError(
        error.message.replace(/^error: /, ''),
        renderUsage(settings)
      );
    }
    throw error;
  }

  if (scan.strayAssumeYes) {
    throw new UnsupportedOptionError(
      `unknown option '${scan.strayAssumeYes}' (only valid right after --all)`,
      renderUsage(settings)
    );
  }

  const options = program.opts<RawOptions>();

  // The legacy CLI runs only the first action flag it sees
  const actions = settings.features.combinableFlags
    ? ACTION_ORDER.filter((kind) => scan.actionOrder.includes(kind))
    : scan.actionOrder.slice(0, 1);

  const season = options.season !== undefined
    ? parseSeason(options.season)
    : settings.season;

  const config: RunConfig = {
    reportKind: options.report ?? 'none',
    noSugar: options.sugar === false,
    assumeYes: options.yes === true,
    limit: actions.includes('limit') && typeof options.limit === 'string'
      ? parseLimit(options.limit)
      : String(settings.defaultLimit),
    leagueId: actions.includes('league') && options.league !== undefined
      ? parseLeagueId(options.league)
      : null,
    season
  };

  return { kind: 'actions', actions, config };
}
