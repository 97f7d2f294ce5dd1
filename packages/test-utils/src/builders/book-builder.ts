/**
 * Builder for opening book bundles
 */

import type { MoveCandidate } from '@gobook/types';

export interface BookEntryInput {
  /** Move sequence in key form ("B[E5];W[C3]") */
  moves?: string;
  boardSize?: number;
  komi?: number;
  topMoves: MoveCandidate[];
  effortVisits?: number;
  /** Hash hex or move key; defaults to the move key */
  key?: string;
}

interface StandardEntry {
  canonicalKeyOrMoveKey: string;
  boardSize: number;
  komi: number;
  moveSequence: string;
  topMoves: MoveCandidate[];
  effortVisits: number;
}

/**
 * Standard bundle shape
 */
export interface StandardBundle {
  metadata: { totalEntries: number; countsByBoardSize: Record<string, number> };
  entries: unknown[];
}

/**
 * Compact export bundle shape
 */
export interface CompactBundle {
  stats: { total_entries: number; by_board_size: Record<string, number> };
  entries: unknown[];
}

/**
 * Collects entries and emits them in either bundle format
 */
export class BookBundleBuilder {
  private readonly entries: StandardEntry[] = [];
  private readonly raw: unknown[] = [];

  /**
   * Add an entry
   */
  withEntry(input: BookEntryInput): this {
    const boardSize = input.boardSize ?? 9;
    const komi = input.komi ?? 7.5;
    const moveSequence = input.moves ?? '';
    this.entries.push({
      canonicalKeyOrMoveKey: input.key ?? `${boardSize}:${komi}:${moveSequence}`,
      boardSize,
      komi,
      moveSequence,
      topMoves: input.topMoves,
      effortVisits: input.effortVisits ?? 1000,
    });
    return this;
  }

  /**
   * Add a record as-is (for malformed-record tests)
   */
  withRawEntry(entry: unknown): this {
    this.raw.push(entry);
    return this;
  }

  private counts(): Record<string, number> {
    const counts: Record<string, number> = {};
    for (const entry of this.entries) {
      counts[String(entry.boardSize)] = (counts[String(entry.boardSize)] ?? 0) + 1;
    }
    return counts;
  }

  /**
   * Build a bundle in the standard format
   */
  build(): StandardBundle {
    return {
      metadata: { totalEntries: this.entries.length, countsByBoardSize: this.counts() },
      entries: [...this.entries, ...this.raw],
    };
  }

  /**
   * Build a bundle in the compact export format
   */
  buildCompact(): CompactBundle {
    return {
      stats: { total_entries: this.entries.length, by_board_size: this.counts() },
      entries: [
        ...this.entries.map((entry) => ({
          h: entry.canonicalKeyOrMoveKey,
          s: entry.boardSize,
          k: entry.komi,
          m: entry.moveSequence,
          t: entry.topMoves.map((move) => ({
            move: move.move,
            winrate: move.winProbability,
            score_lead: move.scoreLead,
            visits: move.visitCount,
          })),
          v: entry.effortVisits,
        })),
        ...this.raw,
      ],
    };
  }
}

/**
 * Create a new BookBundleBuilder
 */
export function bookBundle(): BookBundleBuilder {
  return new BookBundleBuilder();
}
