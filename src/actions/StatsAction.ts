/**
 * Stats Action
 *
 * Asks the database manager for aggregate counts through a short inline
 * Python snippet, then prints them.
 */

import { z } from 'zod';
import { STATS_TOP_LEAGUES } from '../core/constants.js';
import type { ActionContext } from './types.js';

/**
 * Reads get_statistics(), closes the connection, then prints the result as
 * JSON; the launcher formats it after the snippet has exited. Exits non-zero
 * without querying or closing when connect() fails.
 */
export const STATS_SCRIPT = [
  'import json, sys',
  'from api_football.db_manager import DatabaseManager',
  'db = DatabaseManager()',
  'if not db.connect():',
  '    sys.exit("Could not connect to the database.")',
  'stats = db.get_statistics()',
  'db.close()',
  'print(json.dumps(stats, default=str))'
].join('\n');

const LeagueCountSchema = z.object({
  liga_nombre: z.string().nullish(),
  _id: z.union([z.string(), z.number()]).nullish(),
  count: z.number().nullish()
});

export const StatisticsSchema = z.object({
  total_partidos: z.number().nullish(),
  total_ligas: z.number().nullish(),
  partidos_por_liga: z.array(LeagueCountSchema).nullish()
});

export type Statistics = z.infer<typeof StatisticsSchema>;

export class StatsParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StatsParseError';
  }
}

/**
 * The snippet's JSON is the last non-empty stdout line; anything before it is
 * log output from the module.
 */
export function parseStatistics(stdout: string): Statistics {
  const lines = stdout.split('\n').map((line) => line.trim()).filter(Boolean);
  const last = lines[lines.length - 1];
  if (!last) {
    throw new StatsParseError('Statistics script produced no output');
  }

  let payload: unknown;
  try {
    payload = JSON.parse(last);
  } catch (error) {
    throw new StatsParseError(`Statistics output is not JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  const parsed = StatisticsSchema.safeParse(payload);
  if (!parsed.success) {
    throw new StatsParseError(`Unexpected statistics shape: ${parsed.error.issues[0].message}`);
  }
  return parsed.data;
}

/**
 * Plain-text lines for a statistics mapping (top leagues numbered from 1)
 */
export function formatStatistics(stats: Statistics): string[] {
  const lines = [
    '',
    `Total matches: ${stats.total_partidos ?? 0}`,
    `Total leagues: ${stats.total_ligas ?? 0}`,
    '',
    `Top ${STATS_TOP_LEAGUES} leagues by match count:`
  ];

  const leagues = (stats.partidos_por_liga ?? []).slice(0, STATS_TOP_LEAGUES);
  leagues.forEach((league, index) => {
    lines.push(`  ${index + 1}. ${league.liga_nombre ?? 'N/A'} (${league._id ?? 'N/A'}): ${league.count ?? 0} matches`);
  });

  return lines;
}

export class StatsAction {
  /**
   * @returns 0 after printing, or the snippet's exit status when it failed
   */
  async run(context: ActionContext): Promise<number> {
    const { environment, runner, logger } = context;

    logger.info('Fetching statistics...');
    const spinner = logger.spinner('Querying database...').start();

    const result = await runner.run(environment.python, ['-c', STATS_SCRIPT], {
      cwd: environment.cwd,
      env: environment.env,
      stdio: 'capture'
    });

    if (result.exitCode !== 0) {
      spinner.fail('Statistics query failed');
      const detail = result.stderr.trim().split('\n').pop();
      if (detail) {
        logger.error(detail);
      }
      return result.exitCode;
    }

    let stats: Statistics;
    try {
      stats = parseStatistics(result.stdout);
    } catch (error) {
      spinner.fail('Statistics query failed');
      throw error;
    }
    spinner.succeed('Statistics gathered');

    for (const line of formatStatistics(stats)) {
      logger.line(line);
    }
    return 0;
  }
}
