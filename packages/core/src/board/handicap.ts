/**
 * Standard handicap stone placements (star points)
 */

import type { BoardSize } from '@gobook/types';

import { UnsupportedPositionError } from '../errors.js';

const HANDICAP_9: Record<number, readonly string[]> = {
  2: ['C3', 'G7'],
  3: ['C3', 'G7', 'C7'],
  4: ['C3', 'G7', 'C7', 'G3'],
  5: ['C3', 'G7', 'C7', 'G3', 'E5'],
  6: ['C3', 'G7', 'C7', 'G3', 'C5', 'G5'],
  7: ['C3', 'G7', 'C7', 'G3', 'C5', 'G5', 'E5'],
  8: ['C3', 'G7', 'C7', 'G3', 'C5', 'G5', 'E3', 'E7'],
  9: ['C3', 'G7', 'C7', 'G3', 'C5', 'G5', 'E3', 'E7', 'E5'],
};

const HANDICAP_13: Record<number, readonly string[]> = {
  2: ['D4', 'K10'],
  3: ['D4', 'K10', 'D10'],
  4: ['D4', 'K10', 'D10', 'K4'],
  5: ['D4', 'K10', 'D10', 'K4', 'G7'],
  6: ['D4', 'K10', 'D10', 'K4', 'D7', 'K7'],
  7: ['D4', 'K10', 'D10', 'K4', 'D7', 'K7', 'G7'],
  8: ['D4', 'K10', 'D10', 'K4', 'D7', 'K7', 'G4', 'G10'],
  9: ['D4', 'K10', 'D10', 'K4', 'D7', 'K7', 'G4', 'G10', 'G7'],
};

const HANDICAP_19: Record<number, readonly string[]> = {
  2: ['D4', 'Q16'],
  3: ['D4', 'Q16', 'D16'],
  4: ['D4', 'Q16', 'D16', 'Q4'],
  5: ['D4', 'Q16', 'D16', 'Q4', 'K10'],
  6: ['D4', 'Q16', 'D16', 'Q4', 'D10', 'Q10'],
  7: ['D4', 'Q16', 'D16', 'Q4', 'D10', 'Q10', 'K10'],
  8: ['D4', 'Q16', 'D16', 'Q4', 'D10', 'Q10', 'K4', 'K16'],
  9: ['D4', 'Q16', 'D16', 'Q4', 'D10', 'Q10', 'K4', 'K16', 'K10'],
};

const HANDICAP_TABLES: Record<BoardSize, Record<number, readonly string[]>> = {
  9: HANDICAP_9,
  13: HANDICAP_13,
  19: HANDICAP_19,
};

/**
 * Get standard handicap stone vertices for a board size.
 * Handicap 0 and 1 place no stones.
 *
 * @throws UnsupportedPositionError for handicap outside 0-9
 */
export function getHandicapVertices(boardSize: BoardSize, handicap: number): readonly string[] {
  if (!Number.isInteger(handicap) || handicap < 0 || handicap > 9) {
    throw new UnsupportedPositionError(`Handicap must be 0-9, got ${handicap}`);
  }
  if (handicap < 2) {
    return [];
  }
  return HANDICAP_TABLES[boardSize][handicap] ?? [];
}
