/**
 * Immutable board position built per query
 *
 * A position is the setup (board size, komi, handicap stones) plus the
 * played move sequence. Captures are not modelled: the occupied set is the
 * set of points stones were placed on.
 */

import type { BoardSize, Coordinate, Move, Point, StoneColor } from '@gobook/types';

import { UnsupportedPositionError } from '../errors.js';

import { formatVertex, isBoardSize, isOnBoard, parseVertex, pointKey } from './coordinates.js';
import { getHandicapVertices } from './handicap.js';

/**
 * Default komi for even games
 */
export const DEFAULT_KOMI = 7.5;

/**
 * Default komi when handicap stones are placed
 */
export const DEFAULT_HANDICAP_KOMI = 0.5;

/**
 * Input accepted by createPosition
 */
export interface PositionInput {
  boardSize: number;
  /** Defaults to 7.5, or 0.5 with handicap */
  komi?: number;
  /** Move objects, move texts ("B Q16"), or a whole move list string */
  moves?: readonly (Move | string)[] | string;
  /** Number of handicap stones (0, or 2-9) */
  handicap?: number;
}

/**
 * Stone placed on the board
 */
export interface PlacedStone {
  point: Point;
  color: StoneColor;
}

/**
 * Validated, immutable position
 */
export interface Position {
  readonly boardSize: BoardSize;
  readonly komi: number;
  readonly handicap: number;
  /** Handicap stones, as Black moves placed before play */
  readonly handicapStones: readonly Move[];
  /** Moves played after setup */
  readonly moves: readonly Move[];
  /** Handicap stones followed by played moves; what position keys are built from */
  readonly sequence: readonly Move[];
  /** Occupied points keyed by pointKey */
  readonly stones: ReadonlyMap<string, PlacedStone>;
  /** Occupied points as GTP vertices */
  readonly occupied: ReadonlySet<string>;
  readonly nextPlayer: StoneColor;
}

/**
 * Parse one move text: "B Q16", "W pass" or "B[Q16]" ("B[]" is a pass).
 *
 * @throws UnsupportedPositionError for malformed text or off-board vertices
 */
export function parseMoveText(text: string, boardSize: number): Move {
  const trimmed = text.trim();
  const match = /^([BbWw])(?:\s+(\S+)|\[([^\]]*)\])$/.exec(trimmed);
  if (!match || match[1] === undefined) {
    throw new UnsupportedPositionError(`Invalid move: "${text}"`, text);
  }

  const color: StoneColor = match[1].toUpperCase() === 'B' ? 'B' : 'W';
  const vertex = match[2] ?? match[3] ?? '';
  const coordinate: Coordinate = vertex === '' ? 'pass' : parseVertex(vertex, boardSize);
  return { color, coordinate };
}

/**
 * Parse a move list: "B E5, W C3", "B E5;W C3" or "B[E5];W[C3]".
 * An empty or blank string is the empty sequence.
 */
export function parseMoveList(text: string, boardSize: number): Move[] {
  return text
    .split(/[;,\n]/)
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .map((part) => parseMoveText(part, boardSize));
}

/**
 * Format a move as "B[Q16]"
 */
export function formatMoveKey(move: Move): string {
  return `${move.color}[${formatVertex(move.coordinate)}]`;
}

/**
 * Format a move as "B Q16"
 */
export function formatMoveText(move: Move): string {
  return `${move.color} ${formatVertex(move.coordinate)}`;
}

function resolveMoves(input: PositionInput['moves'], boardSize: number): Move[] {
  if (input === undefined) {
    return [];
  }
  if (typeof input === 'string') {
    return parseMoveList(input, boardSize);
  }
  return input.map((move) => (typeof move === 'string' ? parseMoveText(move, boardSize) : move));
}

function validateKomi(komi: number): number {
  if (!Number.isFinite(komi)) {
    throw new UnsupportedPositionError(`Komi must be a finite number, got ${komi}`);
  }
  return komi;
}

/**
 * Build and validate a position.
 *
 * @throws UnsupportedPositionError on unsupported board size, non-finite komi,
 *   invalid handicap, malformed moves, off-board or occupied coordinates
 */
export function createPosition(input: PositionInput): Position {
  const { boardSize } = input;
  if (!isBoardSize(boardSize)) {
    throw new UnsupportedPositionError(
      `Unsupported board size: ${boardSize} (supported: 9, 13, 19)`,
    );
  }

  const handicap = input.handicap ?? 0;
  if (!Number.isInteger(handicap) || handicap < 0 || handicap === 1 || handicap > 9) {
    throw new UnsupportedPositionError(`Handicap must be 0 or 2-9, got ${handicap}`);
  }

  const komi = validateKomi(
    input.komi ?? (handicap >= 2 ? DEFAULT_HANDICAP_KOMI : DEFAULT_KOMI),
  );

  const handicapStones: Move[] = getHandicapVertices(boardSize, handicap).map((vertex) => ({
    color: 'B',
    coordinate: parseVertex(vertex, boardSize),
  }));
  const moves = resolveMoves(input.moves, boardSize);

  const stones = new Map<string, PlacedStone>();
  const occupied = new Set<string>();
  for (const move of [...handicapStones, ...moves]) {
    const { coordinate } = move;
    if (coordinate === 'pass') {
      continue;
    }
    if (
      !Number.isInteger(coordinate.x) ||
      !Number.isInteger(coordinate.y) ||
      !isOnBoard(coordinate, boardSize)
    ) {
      throw new UnsupportedPositionError(
        `Coordinate (${coordinate.x}, ${coordinate.y}) out of bounds for ${boardSize}x${boardSize}`,
      );
    }
    const key = pointKey(coordinate);
    if (stones.has(key)) {
      throw new UnsupportedPositionError(
        `Point ${formatVertex(coordinate)} is already occupied`,
        formatMoveText(move),
      );
    }
    stones.set(key, { point: { x: coordinate.x, y: coordinate.y }, color: move.color });
    occupied.add(formatVertex(coordinate));
  }

  const lastMove = moves[moves.length - 1];
  let nextPlayer: StoneColor;
  if (lastMove) {
    nextPlayer = lastMove.color === 'B' ? 'W' : 'B';
  } else {
    nextPlayer = handicapStones.length > 0 ? 'W' : 'B';
  }

  return {
    boardSize,
    komi,
    handicap,
    handicapStones,
    moves,
    sequence: [...handicapStones, ...moves],
    stones,
    occupied,
    nextPlayer,
  };
}
