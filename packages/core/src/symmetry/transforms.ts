/**
 * The eight dihedral symmetries of a square board
 *
 * For board size n, symmetry t maps (x, y) to:
 *   0 (x, y)              identity
 *   1 (y, n-1-x)          rotate 90 clockwise
 *   2 (n-1-x, n-1-y)      rotate 180
 *   3 (n-1-y, x)          rotate 270 clockwise
 *   4 (n-1-x, y)          mirror left-right
 *   5 (x, n-1-y)          mirror top-bottom
 *   6 (y, x)              main diagonal
 *   7 (n-1-y, n-1-x)      anti-diagonal
 */

import type { Coordinate, Move, Point, SymmetryIndex } from '@gobook/types';

import { formatVertex, parseVertex } from '../board/coordinates.js';

/**
 * All symmetries, identity first
 */
export const ALL_SYMMETRIES: readonly SymmetryIndex[] = [0, 1, 2, 3, 4, 5, 6, 7];

/**
 * Apply a symmetry to a point
 */
export function transformCoordinate(
  x: number,
  y: number,
  boardSize: number,
  symmetry: SymmetryIndex,
): Point {
  const max = boardSize - 1;
  switch (symmetry) {
    case 0:
      return { x, y };
    case 1:
      return { x: y, y: max - x };
    case 2:
      return { x: max - x, y: max - y };
    case 3:
      return { x: max - y, y: x };
    case 4:
      return { x: max - x, y };
    case 5:
      return { x, y: max - y };
    case 6:
      return { x: y, y: x };
    case 7:
      return { x: max - y, y: max - x };
  }
}

/**
 * Inverse of a symmetry: the two quarter turns swap, everything else is an involution
 */
export function inverseSymmetry(symmetry: SymmetryIndex): SymmetryIndex {
  if (symmetry === 1) return 3;
  if (symmetry === 3) return 1;
  return symmetry;
}

/**
 * Apply a symmetry to a coordinate (pass is invariant)
 */
export function transformPoint(
  coordinate: Coordinate,
  boardSize: number,
  symmetry: SymmetryIndex,
): Coordinate {
  if (coordinate === 'pass') {
    return 'pass';
  }
  return transformCoordinate(coordinate.x, coordinate.y, boardSize, symmetry);
}

/**
 * Apply a symmetry to a move
 */
export function transformMove(move: Move, boardSize: number, symmetry: SymmetryIndex): Move {
  return { color: move.color, coordinate: transformPoint(move.coordinate, boardSize, symmetry) };
}

/**
 * Apply a symmetry to a GTP vertex ("pass" is invariant)
 *
 * @throws UnsupportedPositionError for malformed or off-board vertices
 */
export function transformVertex(vertex: string, boardSize: number, symmetry: SymmetryIndex): string {
  return formatVertex(transformPoint(parseVertex(vertex, boardSize), boardSize, symmetry));
}
