/**
 * GTP coordinate conversion
 *
 * GTP vertices use column letters A-T with I skipped (left to right) and
 * 1-based row numbers (bottom to top): "D4", "Q16", "pass".
 */

import {
  SUPPORTED_BOARD_SIZES,
  type BoardSize,
  type Coordinate,
  type Point,
} from '@gobook/types';

import { UnsupportedPositionError } from '../errors.js';

/**
 * GTP column letters (I is skipped)
 */
export const GTP_COLUMNS = 'ABCDEFGHJKLMNOPQRST';

/**
 * Narrow a number to a supported board size
 */
export function isBoardSize(value: number): value is BoardSize {
  return SUPPORTED_BOARD_SIZES.some((size) => size === value);
}

/**
 * Check whether a point lies on a board of the given size
 */
export function isOnBoard(point: Point, boardSize: number): boolean {
  return point.x >= 0 && point.x < boardSize && point.y >= 0 && point.y < boardSize;
}

/**
 * Parse a GTP vertex ("Q16", "pass") into a coordinate.
 *
 * @throws UnsupportedPositionError for malformed or off-board vertices
 */
export function parseVertex(vertex: string, boardSize: number): Coordinate {
  const text = vertex.trim().toUpperCase();
  if (text === 'PASS') {
    return 'pass';
  }

  const match = /^([A-HJ-T])(\d{1,2})$/.exec(text);
  if (!match || match[1] === undefined || match[2] === undefined) {
    throw new UnsupportedPositionError(`Invalid GTP coordinate: ${vertex}`, vertex);
  }

  const point = { x: GTP_COLUMNS.indexOf(match[1]), y: parseInt(match[2], 10) - 1 };
  if (!isOnBoard(point, boardSize)) {
    throw new UnsupportedPositionError(
      `Coordinate ${vertex} out of bounds for ${boardSize}x${boardSize}`,
      vertex,
    );
  }
  return point;
}

/**
 * Format a coordinate as a GTP vertex
 */
export function formatVertex(coordinate: Coordinate): string {
  if (coordinate === 'pass') {
    return 'pass';
  }
  const column = GTP_COLUMNS[coordinate.x];
  if (column === undefined) {
    throw new RangeError(`Column index out of range: ${coordinate.x}`);
  }
  return `${column}${coordinate.y + 1}`;
}

/**
 * Compact map key for a point ("x,y")
 */
export function pointKey(point: Point): string {
  return `${point.x},${point.y}`;
}
