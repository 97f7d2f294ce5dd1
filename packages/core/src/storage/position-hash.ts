/**
 * Position hashing using Zobrist tables
 *
 * The hash covers board size, stones by color, side to move and komi
 * quantized to a half point. Move order does not matter: transpositions
 * hash to the same value.
 */

import type { SymmetryIndex } from '@gobook/types';

import type { Position } from '../board/position.js';
import { transformCoordinate } from '../symmetry/transforms.js';

import {
  ZOBRIST_SIDE_TO_MOVE,
  getZobristBoardSize,
  getZobristKomi,
  getZobristStone,
} from './zobrist-tables.js';

/**
 * Compute the Zobrist hash of a position, optionally as seen under a symmetry
 *
 * @param symmetry - Transform applied to every stone before hashing
 */
export function computePositionHash(position: Position, symmetry: SymmetryIndex = 0): bigint {
  let hash = getZobristBoardSize(position.boardSize);

  for (const { point, color } of position.stones.values()) {
    const mapped = transformCoordinate(point.x, point.y, position.boardSize, symmetry);
    hash ^= getZobristStone(color, mapped.x, mapped.y);
  }

  if (position.nextPlayer === 'W') {
    hash ^= ZOBRIST_SIDE_TO_MOVE;
  }

  hash ^= getZobristKomi(position.komi);

  return hash;
}

/**
 * Format a 64-bit hash as 16 lowercase hex characters
 */
export function hashToHex(hash: bigint): string {
  return hash.toString(16).padStart(16, '0');
}

/**
 * Check whether a string looks like a hash produced by hashToHex
 */
export function isHashHex(value: string): boolean {
  return /^[0-9a-f]{16}$/.test(value);
}
