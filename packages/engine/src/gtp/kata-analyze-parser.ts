/**
 * Parser for KataGo kata-analyze output
 *
 * Each report is a single line holding every root child:
 *   info move Q3 visits 45 winrate 0.523445 scoreLead 0.312 prior 0.0892 order 0 pv Q3 R4 ... info move R4 ...
 *
 * winrate is a probability for the player to move; scoreLead is in points,
 * positive when the player to move is ahead.
 */

import type { MoveCandidate } from '@gobook/types';

const NUMBER = '(-?\\d+(?:\\.\\d+)?(?:[eE][-+]?\\d+)?)';
const VISITS_PATTERN = /\bvisits\s+(\d+)/;
const WINRATE_PATTERN = new RegExp(`\\bwinrate\\s+${NUMBER}`);
const SCORE_LEAD_PATTERN = new RegExp(`\\bscoreLead\\s+${NUMBER}`);

/**
 * Normalize an engine vertex: uppercase, except "pass"
 */
function normalizeMove(move: string): string {
  const upper = move.toUpperCase();
  return upper === 'PASS' ? 'pass' : upper;
}

/**
 * Parse one kata-analyze report line into candidates sorted by descending visits
 *
 * @param topN - Keep only the N most visited moves
 * @returns Empty list for lines that carry no move info
 */
export function parseKataAnalyzeLine(line: string, topN = Number.POSITIVE_INFINITY): MoveCandidate[] {
  const candidates: MoveCandidate[] = [];

  for (const part of line.split(/\binfo move\s+/).slice(1)) {
    const move = part.trim().split(/\s+/)[0];
    const visits = VISITS_PATTERN.exec(part)?.[1];
    const winrate = WINRATE_PATTERN.exec(part)?.[1];
    if (!move || visits === undefined || winrate === undefined) {
      continue;
    }
    const scoreLead = SCORE_LEAD_PATTERN.exec(part)?.[1];

    candidates.push({
      move: normalizeMove(move),
      visitCount: parseInt(visits, 10),
      winProbability: parseFloat(winrate),
      scoreLead: scoreLead === undefined ? 0 : parseFloat(scoreLead),
    });
  }

  candidates.sort((a, b) => b.visitCount - a.visitCount);
  return candidates.slice(0, topN);
}

/**
 * Root visits of a report: the sum of child visits
 */
export function totalVisits(candidates: readonly MoveCandidate[]): number {
  return candidates.reduce((sum, candidate) => sum + candidate.visitCount, 0);
}
