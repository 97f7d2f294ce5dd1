/**
 * Zobrist hashing tables for Go positions
 *
 * Each (color, point) combination gets a random 64-bit value and the
 * position hash is the XOR of the values of all stones on the board, plus
 * values for board size, side to move and komi.
 *
 * Points are indexed on a 19x19 grid (index = y * 19 + x) for every board
 * size; the board size value keeps sizes apart.
 */

// Use BigInt for true 64-bit values
type ZobristValue = bigint;

const MASK_64 = 0xffffffffffffffffn;

/**
 * Width of the point grid
 */
export const GRID_SIZE = 19;

/**
 * Komi range covered by the komi table; values outside are clamped
 */
export const KOMI_MIN = -100;
export const KOMI_MAX = 100;

/**
 * Color indices for Zobrist table lookup
 */
export const COLOR_INDICES = { B: 0, W: 1 } as const;

/**
 * Seed-based pseudo-random number generator for reproducible Zobrist values
 * Uses xorshift128+ algorithm
 */
class ZobristRNG {
  private state0: bigint;
  private state1: bigint;

  constructor(seed: bigint) {
    this.state0 = seed & MASK_64;
    this.state1 = (seed ^ 0xda3e39cb94b95bdbn) & MASK_64;
  }

  next(): bigint {
    let s1 = this.state0;
    const s0 = this.state1;
    this.state0 = s0;
    s1 ^= (s1 << 23n) & MASK_64;
    s1 ^= s1 >> 17n;
    s1 ^= s0;
    s1 ^= s0 >> 26n;
    this.state1 = s1;
    return (this.state0 + this.state1) & MASK_64;
  }
}

/**
 * Generate Zobrist tables with deterministic seed.
 * Values are identical across sessions, so hashes can be persisted.
 */
function generateZobristTables(): {
  stones: ZobristValue[][];
  boardSize: Map<number, ZobristValue>;
  sideToMove: ZobristValue;
  komi: ZobristValue[];
} {
  const rng = new ZobristRNG(0x60b00c5a11ce2024n);

  // 2 colors x 361 points
  const stones: ZobristValue[][] = [];
  for (let color = 0; color < 2; color++) {
    const row: ZobristValue[] = [];
    for (let point = 0; point < GRID_SIZE * GRID_SIZE; point++) {
      row.push(rng.next());
    }
    stones.push(row);
  }

  const boardSize = new Map<number, ZobristValue>();
  for (const size of [9, 13, 19]) {
    boardSize.set(size, rng.next());
  }

  // XOR when white is to move
  const sideToMove = rng.next();

  // Half-point steps from KOMI_MIN to KOMI_MAX
  const komi: ZobristValue[] = [];
  for (let i = 0; i <= (KOMI_MAX - KOMI_MIN) * 2; i++) {
    komi.push(rng.next());
  }

  return { stones, boardSize, sideToMove, komi };
}

// Pre-compute tables at module load time
const tables = generateZobristTables();

/**
 * Zobrist value to XOR when white is to move
 */
export const ZOBRIST_SIDE_TO_MOVE: ZobristValue = tables.sideToMove;

/**
 * Grid index of a point
 */
export function pointIndex(x: number, y: number): number {
  return y * GRID_SIZE + x;
}

/**
 * Quantize komi to the nearest half point and map it to a komi table index
 */
export function komiIndex(komi: number): number {
  const clamped = Math.min(KOMI_MAX, Math.max(KOMI_MIN, komi));
  return Math.round((clamped - KOMI_MIN) * 2);
}

/**
 * Get Zobrist value for a stone of a color on a point
 */
export function getZobristStone(color: 'B' | 'W', x: number, y: number): ZobristValue {
  const value = tables.stones[COLOR_INDICES[color]]?.[pointIndex(x, y)];
  if (value === undefined || x < 0 || x >= GRID_SIZE) {
    throw new Error(`Invalid stone point: (${x}, ${y})`);
  }
  return value;
}

/**
 * Get Zobrist value for a board size
 */
export function getZobristBoardSize(boardSize: number): ZobristValue {
  const value = tables.boardSize.get(boardSize);
  if (value === undefined) {
    throw new Error(`Invalid board size: ${boardSize}`);
  }
  return value;
}

/**
 * Get Zobrist value for a komi (quantized to 0.5)
 */
export function getZobristKomi(komi: number): ZobristValue {
  const value = tables.komi[komiIndex(komi)];
  if (value === undefined) {
    throw new Error(`Invalid komi: ${komi}`);
  }
  return value;
}
