/**
 * Canonical position identity
 *
 * Geometrically equivalent positions (rotations, mirrors, diagonal
 * reflections) share one canonical key. Results are stored in canonical
 * orientation and mapped back into the caller's orientation on read.
 */

import type { CanonicalKey, MoveCandidate, Move, SymmetryIndex } from '@gobook/types';

import { pointKey } from '../board/coordinates.js';
import { formatMoveKey, type Position } from '../board/position.js';
import { computePositionHash, hashToHex } from '../storage/position-hash.js';

import {
  ALL_SYMMETRIES,
  inverseSymmetry,
  transformCoordinate,
  transformMove,
  transformVertex,
} from './transforms.js';

/**
 * Move key variant under one symmetry
 */
export interface MoveKeyVariant {
  symmetry: SymmetryIndex;
  key: string;
}

/**
 * Build a move key: "<size>:<komi>:B[E5];W[C3]"
 *
 * @example
 * canonicalMoveKey(9, 7.5, []) // '9:7.5:'
 */
export function canonicalMoveKey(boardSize: number, komi: number, moves: readonly Move[]): string {
  return `${boardSize}:${komi}:${moves.map(formatMoveKey).join(';')}`;
}

/**
 * Move keys of the sequence under every symmetry, identity first.
 * Symmetries producing an already seen key are dropped.
 */
export function moveKeyVariants(
  boardSize: number,
  komi: number,
  moves: readonly Move[],
): MoveKeyVariant[] {
  const seen = new Set<string>();
  const variants: MoveKeyVariant[] = [];
  for (const symmetry of ALL_SYMMETRIES) {
    const key = canonicalMoveKey(
      boardSize,
      komi,
      moves.map((move) => transformMove(move, boardSize, symmetry)),
    );
    if (!seen.has(key)) {
      seen.add(key);
      variants.push({ symmetry, key });
    }
  }
  return variants;
}

/**
 * Symmetries that map the colored stone set onto itself.
 * Always contains the identity; all eight for an empty board.
 */
export function validSymmetries(position: Position): SymmetryIndex[] {
  return ALL_SYMMETRIES.filter((symmetry) => {
    for (const { point, color } of position.stones.values()) {
      const mapped = transformCoordinate(point.x, point.y, position.boardSize, symmetry);
      if (position.stones.get(pointKey(mapped))?.color !== color) {
        return false;
      }
    }
    return true;
  });
}

/**
 * Compute the canonical key of a position: the minimum Zobrist digest over
 * all eight orientations. symmetryIndex is the first symmetry reaching it.
 */
export function canonicalKey(position: Position): CanonicalKey {
  let bestSymmetry: SymmetryIndex = 0;
  let bestDigest = computePositionHash(position, 0);
  for (const symmetry of ALL_SYMMETRIES) {
    if (symmetry === 0) continue;
    const digest = computePositionHash(position, symmetry);
    if (digest < bestDigest) {
      bestDigest = digest;
      bestSymmetry = symmetry;
    }
  }

  return {
    symmetryIndex: bestSymmetry,
    hashDigest: bestDigest,
    hashHex: hashToHex(bestDigest),
    moveSequenceKey: canonicalMoveKey(
      position.boardSize,
      position.komi,
      position.sequence.map((move) => transformMove(move, position.boardSize, bestSymmetry)),
    ),
  };
}

function mapCandidates(
  candidates: readonly MoveCandidate[],
  boardSize: number,
  symmetry: SymmetryIndex,
): MoveCandidate[] {
  return candidates.map((candidate) => ({
    ...candidate,
    move: transformVertex(candidate.move, boardSize, symmetry),
  }));
}

/**
 * Map candidates from the caller's orientation into canonical orientation
 */
export function toCanonicalOrientation(
  candidates: readonly MoveCandidate[],
  boardSize: number,
  symmetryIndex: SymmetryIndex,
): MoveCandidate[] {
  return mapCandidates(candidates, boardSize, symmetryIndex);
}

/**
 * Map candidates stored in canonical orientation back into the caller's orientation
 */
export function fromCanonicalOrientation(
  candidates: readonly MoveCandidate[],
  boardSize: number,
  symmetryIndex: SymmetryIndex,
): MoveCandidate[] {
  return mapCandidates(candidates, boardSize, inverseSymmetry(symmetryIndex));
}

/**
 * Add the image of every candidate under each symmetry.
 * Duplicates are dropped, first occurrence wins.
 */
export function expandCandidates(
  candidates: readonly MoveCandidate[],
  boardSize: number,
  symmetries: readonly SymmetryIndex[],
): MoveCandidate[] {
  const expanded: MoveCandidate[] = [];
  for (const candidate of candidates) {
    for (const symmetry of symmetries) {
      expanded.push({ ...candidate, move: transformVertex(candidate.move, boardSize, symmetry) });
    }
  }
  return dedupeCandidates(expanded);
}

/**
 * Sort candidates by descending win probability (stable)
 */
export function sortCandidates(candidates: readonly MoveCandidate[]): MoveCandidate[] {
  return [...candidates].sort((a, b) => b.winProbability - a.winProbability);
}

/**
 * Drop candidates on occupied points
 */
export function excludeOccupied(
  candidates: readonly MoveCandidate[],
  position: Position,
): MoveCandidate[] {
  return candidates.filter((candidate) => !position.occupied.has(candidate.move.toUpperCase()));
}

/**
 * Drop repeated moves, keeping the first occurrence
 */
export function dedupeCandidates(candidates: readonly MoveCandidate[]): MoveCandidate[] {
  const seen = new Set<string>();
  return candidates.filter((candidate) => {
    const key = candidate.move.toUpperCase();
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}
