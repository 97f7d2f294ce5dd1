/**
 * CLI definition using Commander.js
 */

import { Command, InvalidArgumentError } from 'commander';

import type { CliOptions } from './config/schema.js';
import { analysisProfileSchema } from './config/validation.js';
import { InputError } from './errors/index.js';

export const VERSION = '0.1.0';

/**
 * Profile descriptions for help text
 */
const PROFILE_HELP = `Analysis profile:
    quick    - Fast engine fallback (50 visits on 19x19, 150 on smaller boards)
    standard - Balanced (150 / 500 visits) [default]
    deep     - Thorough (600 / 2000 visits)`;

const MOVES_HELP = `Moves played, e.g. "B E5, W C3" or "B[E5];W[C3]"`;

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

/**
 * Options shared by every command
 */
function withCommonOptions(command: Command): Command {
  return command
    .option('-c, --config <file>', 'Path to config file')
    .option('--no-color', 'Disable colored output (useful for piping)');
}

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command()
    .name('gobook')
    .description(
      'Go move suggestions from an opening book, a local analysis cache and a live KataGo engine',
    )
    .version(VERSION);

  withCommonOptions(
    program
      .command('analyze')
      .description('Suggest moves for a position')
      .option('-s, --size <n>', 'Board size (9, 13 or 19)', parseInteger, 19)
      .option('-k, --komi <komi>', 'Komi (default: configured komi, 0.5 with handicap)', parseNumber)
      .option('-m, --moves <moves>', MOVES_HELP)
      .option('--handicap <stones>', 'Handicap stones (2-9)', parseInteger)
      .option('-p, --profile <profile>', PROFILE_HELP)
      .option('--lookup-visits <n>', 'Minimum visits a cached analysis needs', parseInteger)
      .option('--visits <n>', 'Engine visits when the engine runs', parseInteger)
      .option('--timeout <ms>', 'Engine wall-clock limit in milliseconds', parseInteger)
      .option('--no-engine', 'Never start the live engine')
      .option('--refresh', 'Ignore the opening book and cache and run the engine')
      .option('--json', 'Print the result as JSON')
      .option('--show-config', 'Print resolved configuration and exit'),
  ).action(async (options: Record<string, unknown>) => {
    const { analyzeCommand } = await import('./commands/analyze.js');
    await analyzeCommand(options);
  });

  withCommonOptions(
    program.command('stats').description('Show opening book and cache entry counts'),
  ).action(async (options: Record<string, unknown>) => {
    const { statsCommand } = await import('./commands/stats.js');
    await statsCommand(options);
  });

  withCommonOptions(
    program
      .command('merge')
      .description('Merge another analysis cache database into the local cache')
      .argument('<source-db>', 'Cache database to merge from'),
  ).action(async (sourceDb: string, options: Record<string, unknown>) => {
    const { mergeCommand } = await import('./commands/merge.js');
    await mergeCommand(sourceDb, options);
  });

  withCommonOptions(
    program
      .command('clear-cache')
      .description('Delete every entry from the analysis cache')
      .option('-y, --yes', 'Do not ask for confirmation'),
  ).action(async (options: Record<string, unknown>) => {
    const { clearCacheCommand } = await import('./commands/clear-cache.js');
    await clearCacheCommand(options);
  });

  return program;
}

function stringOption(options: Record<string, unknown>, key: string): string | undefined {
  const value = options[key];
  return typeof value === 'string' ? value : undefined;
}

function numberOption(options: Record<string, unknown>, key: string): number | undefined {
  const value = options[key];
  return typeof value === 'number' ? value : undefined;
}

/**
 * Parse CLI options from command options object
 */
export function parseCliOptions(options: Record<string, unknown>): CliOptions {
  const result: CliOptions = {};

  const config = stringOption(options, 'config');
  if (config !== undefined) result.config = config;

  const profile = options['profile'];
  if (profile !== undefined) {
    const parsed = analysisProfileSchema.safeParse(profile);
    if (!parsed.success) {
      throw new InputError(
        `Unknown profile: ${String(profile)}`,
        `Use one of: ${analysisProfileSchema.options.join(', ')}`,
      );
    }
    result.profile = parsed.data;
  }

  const size = numberOption(options, 'size');
  if (size !== undefined) result.size = size;
  const komi = numberOption(options, 'komi');
  if (komi !== undefined) result.komi = komi;
  const moves = stringOption(options, 'moves');
  if (moves !== undefined) result.moves = moves;
  const handicap = numberOption(options, 'handicap');
  if (handicap !== undefined) result.handicap = handicap;
  const lookupVisits = numberOption(options, 'lookupVisits');
  if (lookupVisits !== undefined) result.lookupVisits = lookupVisits;
  const visits = numberOption(options, 'visits');
  if (visits !== undefined) result.visits = visits;
  const timeout = numberOption(options, 'timeout');
  if (timeout !== undefined) result.timeout = timeout;

  // Commander.js sets 'engine' and 'color' to false for --no-engine and --no-color
  if (options['engine'] === false) result.noEngine = true;
  if (options['color'] === false) result.noColor = true;
  if (options['refresh'] === true) result.refresh = true;
  if (options['json'] === true) result.json = true;
  if (options['showConfig'] === true) result.showConfig = true;

  return result;
}
