/**
 * Board geometry and move types
 */

/**
 * Board sizes the analyzer supports
 */
export const SUPPORTED_BOARD_SIZES = [9, 13, 19] as const;

/**
 * Supported board size
 */
export type BoardSize = (typeof SUPPORTED_BOARD_SIZES)[number];

/**
 * Stone color (GTP letters)
 */
export type StoneColor = 'B' | 'W';

/**
 * Board intersection, 0-based.
 * x runs left to right, y runs bottom to top (GTP row 1 is y = 0).
 */
export interface Point {
  readonly x: number;
  readonly y: number;
}

/**
 * A point on the board or a pass
 */
export type Coordinate = Point | 'pass';

/**
 * A single played move
 */
export interface Move {
  readonly color: StoneColor;
  readonly coordinate: Coordinate;
}

/**
 * Index of one of the eight dihedral symmetries of the square board.
 *
 * 0 identity, 1-3 rotations, 4-5 mirrors, 6-7 diagonal reflections.
 */
export type SymmetryIndex = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7;
