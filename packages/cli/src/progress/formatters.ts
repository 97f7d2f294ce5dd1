/**
 * Output formatting utilities
 */

import chalk from 'chalk';

import {
  SUPPORTED_BOARD_SIZES,
  type AnalysisResult,
  type AnalyzerStats,
  type SourceLabel,
} from '@gobook/types';

import type { GobookConfig } from '../config/schema.js';

import type { ColorFunctions } from './types.js';

/**
 * Build color functions; without color every function returns its input
 */
export function createColorFns(useColor: boolean): ColorFunctions {
  if (useColor) {
    return {
      bold: (text: string) => chalk.bold(text),
      dim: (text: string) => chalk.dim(text),
      green: (text: string) => chalk.green(text),
      red: (text: string) => chalk.red(text),
      yellow: (text: string) => chalk.yellow(text),
      cyan: (text: string) => chalk.cyan(text),
    };
  }
  const identity = (text: string): string => text;
  return {
    bold: identity,
    dim: identity,
    green: identity,
    red: identity,
    yellow: identity,
    cyan: identity,
  };
}

const PLAIN = createColorFns(false);

/**
 * Display names of answer sources
 */
export const SOURCE_NAMES: Record<SourceLabel, string> = {
  openingBook: 'opening book',
  localCache: 'local cache',
  liveEngine: 'live engine',
};

/**
 * Format configuration for display
 */
export function formatConfigDisplay(config: GobookConfig, c: ColorFunctions = PLAIN): string {
  const lines: string[] = [];

  lines.push(c.bold('Configuration:'));
  lines.push('');

  lines.push(c.dim('Analysis:'));
  lines.push(`  Profile: ${config.analysis.profile}`);
  lines.push(`  Visits (19x19): ${config.analysis.visits19}`);
  lines.push(`  Visits (9x9, 13x13): ${config.analysis.visitsSmall}`);
  lines.push(`  Lookup visits: ${config.analysis.lookupVisits}`);
  lines.push(`  Top moves: ${config.analysis.topMovesCount}`);
  lines.push(`  Engine timeout: ${formatDuration(config.analysis.engineTimeoutMs)}`);
  lines.push(`  Default komi: ${config.analysis.defaultKomi}`);
  lines.push('');

  lines.push(c.dim('Engine:'));
  if (config.engine.enabled) {
    lines.push(`  Command: ${config.engine.command}`);
    lines.push(`  Model: ${config.engine.modelPath}`);
    lines.push(`  Config: ${config.engine.configPath}`);
  } else {
    lines.push(`  Enabled: ${c.yellow('no')}`);
  }
  lines.push('');

  lines.push(c.dim('Databases:'));
  lines.push(`  Cache: ${config.databases.cachePath}`);
  lines.push(`  Opening book: ${config.databases.openingBookPath}`);
  if (!config.openingBook.enabled) {
    lines.push(`  Opening book enabled: ${c.yellow('no')}`);
  }
  lines.push('');

  lines.push(c.dim('Output:'));
  lines.push(`  Format: ${config.output.format}`);

  return lines.join('\n');
}

/**
 * Format a time duration in human-readable format
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60000);
  const seconds = Math.round((ms % 60000) / 1000);
  return `${minutes}m ${seconds}s`;
}

/**
 * Format a file size in human-readable format
 */
export function formatFileSize(bytes: number): string {
  if (bytes < 1024) {
    return `${bytes} B`;
  }
  if (bytes < 1024 * 1024) {
    return `${(bytes / 1024).toFixed(1)} KB`;
  }
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

/**
 * Format a win probability as a percentage, e.g. 0.523 -> "52.3%"
 */
export function formatWinProbability(winProbability: number): string {
  return `${(winProbability * 100).toFixed(1)}%`;
}

/**
 * Format a score lead with its sign, e.g. 0.8 -> "+0.8"
 */
export function formatScoreLead(scoreLead: number): string {
  const text = scoreLead.toFixed(1);
  return scoreLead >= 0 ? `+${text}` : text;
}

function tableRow(rank: string, move: string, win: string, lead: string, visits: string): string {
  return `${rank.padStart(3)}  ${move.padEnd(6)}${win.padStart(7)}${lead.padStart(8)}${visits.padStart(8)}`;
}

/**
 * Format an analysis result as a header and a ranked move table
 */
export function formatResultTable(result: AnalysisResult, c: ColorFunctions = PLAIN): string {
  const lines: string[] = [];

  lines.push(`${c.bold('Source:')} ${SOURCE_NAMES[result.sourceLabel]} (${result.modelLabel})`);
  lines.push(
    `${c.bold('Board:')} ${result.boardSize}x${result.boardSize}, komi ${result.komi}, ${result.effortVisits} visits`,
  );
  lines.push(`${c.bold('Moves:')} ${result.movesSequence === '' ? '(empty board)' : result.movesSequence}`);
  if (result.completeness === 'partial') {
    lines.push(c.yellow('Partial result: the engine stopped before reaching the requested visits'));
  }
  lines.push('');

  if (result.topMoves.length === 0) {
    lines.push(c.dim('  (no candidate moves)'));
    return lines.join('\n');
  }

  lines.push(c.dim(tableRow('#', 'Move', 'Win%', 'Lead', 'Visits')));
  result.topMoves.forEach((candidate, index) => {
    lines.push(
      tableRow(
        String(index + 1),
        candidate.move,
        formatWinProbability(candidate.winProbability),
        formatScoreLead(candidate.scoreLead),
        String(candidate.visitCount),
      ),
    );
  });

  return lines.join('\n');
}

/**
 * Format an analysis result as JSON
 */
export function formatResultJson(result: AnalysisResult): string {
  return JSON.stringify(result, null, 2);
}

/**
 * Format book and cache entry counts per board size
 */
export function formatStatsTable(stats: AnalyzerStats, c: ColorFunctions = PLAIN): string {
  const lines: string[] = [];

  lines.push(`${c.bold('Opening book entries:')} ${stats.bookEntries}`);
  lines.push(`${c.bold('Cache entries:')} ${stats.cacheEntries}`);
  lines.push('');
  lines.push(c.dim(`${'Board'.padEnd(7)}${'Book'.padStart(8)}${'Cache'.padStart(8)}`));
  for (const size of SUPPORTED_BOARD_SIZES) {
    const counts = stats.byBoardSize[size] ?? { book: 0, cache: 0 };
    lines.push(
      `${`${size}x${size}`.padEnd(7)}${String(counts.book).padStart(8)}${String(counts.cache).padStart(8)}`,
    );
  }

  return lines.join('\n');
}
