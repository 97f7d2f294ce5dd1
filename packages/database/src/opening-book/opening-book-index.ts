/**
 * Opening book index
 *
 * Holds a read-only bundle of precomputed analyses in memory, indexed by
 * move key and by canonical position hash. Lookups try every symmetric
 * variant of the move sequence, so one stored orientation answers all
 * eight.
 */

import {
  canonicalMoveKey,
  createPosition,
  excludeOccupied,
  expandCandidates,
  formatMoveKey,
  formatVertex,
  fromCanonicalOrientation,
  isBoardSize,
  isHashHex,
  moveKeyVariants,
  parseMoveList,
  parseVertex,
  sortCandidates,
  validSymmetries,
  type Position,
} from '@gobook/core';
import type {
  AnalysisResult,
  BoardSize,
  BookStats,
  CanonicalKey,
  Move,
  MoveCandidate,
} from '@gobook/types';

import { BookLoadError } from '../errors.js';
import { bookBundleSchema, bookEntrySchema, type BookBundle } from '../schemas.js';

import { describeBookSource, readBookSource, type BookSource } from './book-source.js';

/**
 * Model label of bundled entries
 */
export const BOOK_MODEL_LABEL = 'bundled_opening_book';

/**
 * Model label of synthesized first moves
 */
export const SYNTHETIC_MODEL_LABEL = 'synthetic';

/**
 * Default first move per board size when the empty board is missing from the book
 */
export const DEFAULT_FIRST_MOVES: Record<BoardSize, string> = {
  9: 'E5',
  13: 'G7',
  19: 'K10',
};

/**
 * Komi tolerance for hash lookups
 */
const KOMI_TOLERANCE = 0.1;

export interface OpeningBookOptions {
  /** Answer empty-board misses with a single synthesized move (default: true) */
  syntheticFallback?: boolean;
  /** First move per board size for synthesized answers */
  firstMoves?: Partial<Record<BoardSize, string>>;
  /** Visits reported for synthesized answers (default: 1000) */
  syntheticVisits?: number;
  /** Add 3-4 (komoku) and 3-3 (sansan) alternatives to empty-board answers (default: false) */
  openingAlternatives?: boolean;
}

/**
 * Corner points added to empty-board answers, rated against the best
 * candidate. The eight symmetries of the empty board spread each one over
 * every corner.
 */
const OPENING_ALTERNATIVES = [
  { point: { x: 2, y: 3 }, winRatio: 0.98, scoreDrop: 0.2 },
  { point: { x: 2, y: 2 }, winRatio: 0.96, scoreDrop: 0.4 },
] as const;

/**
 * Validated, normalized book entry
 */
interface BookRecord {
  key: string;
  boardSize: BoardSize;
  komi: number;
  moves: Move[];
  topMoves: MoveCandidate[];
  effortVisits: number;
}

interface BuiltIndex {
  hashIndex: Map<string, BookRecord>;
  moveIndex: Map<string, BookRecord>;
  totalEntries: number;
  byBoardSize: Record<number, number>;
  skipped: number;
}

/**
 * Keep the entry with the highest effort for a key
 */
function indexRecord(index: Map<string, BookRecord>, key: string, record: BookRecord): void {
  const existing = index.get(key);
  if (!existing || existing.effortVisits < record.effortVisits) {
    index.set(key, record);
  }
}

/**
 * Validate one raw entry. Throws on any malformed field.
 */
function toRecord(raw: unknown): BookRecord {
  const entry = bookEntrySchema.parse(raw);
  const { boardSize } = entry;
  if (!isBoardSize(boardSize)) {
    throw new Error(`unsupported board size ${boardSize}`);
  }
  return {
    key: entry.canonicalKeyOrMoveKey,
    boardSize,
    komi: entry.komi,
    moves: parseMoveList(entry.moveSequence, boardSize),
    topMoves: entry.topMoves.map((candidate) => ({
      ...candidate,
      move: formatVertex(parseVertex(candidate.move, boardSize)),
    })),
    effortVisits: entry.effortVisits,
  };
}

function buildIndex(bundle: BookBundle): BuiltIndex {
  const hashIndex = new Map<string, BookRecord>();
  const moveIndex = new Map<string, BookRecord>();
  const counted: Record<number, number> = {};
  let skipped = 0;
  let firstError: string | undefined;

  bundle.entries.forEach((raw, i) => {
    let record: BookRecord;
    try {
      record = toRecord(raw);
    } catch (err) {
      skipped++;
      firstError ??= `entry ${i}: ${err instanceof Error ? err.message : String(err)}`;
      return;
    }

    const hashKey = record.key.toLowerCase();
    if (isHashHex(hashKey)) {
      indexRecord(hashIndex, hashKey, record);
    }
    indexRecord(moveIndex, canonicalMoveKey(record.boardSize, record.komi, record.moves), record);
    counted[record.boardSize] = (counted[record.boardSize] ?? 0) + 1;
  });

  if (skipped > 0) {
    console.warn(`[OpeningBook] Skipped ${skipped} malformed entries (first: ${firstError ?? 'unknown'})`);
  }

  const declared = bundle.metadata
    ? { total: bundle.metadata.totalEntries, bySize: bundle.metadata.countsByBoardSize }
    : bundle.stats
      ? { total: bundle.stats.total_entries, bySize: bundle.stats.by_board_size }
      : undefined;

  let byBoardSize: Record<number, number> = counted;
  if (declared && Object.keys(declared.bySize).length > 0) {
    byBoardSize = {};
    for (const [size, count] of Object.entries(declared.bySize)) {
      byBoardSize[Number(size)] = count;
    }
  }

  return {
    hashIndex,
    moveIndex,
    totalEntries: declared?.total ?? bundle.entries.length - skipped,
    byBoardSize,
    skipped,
  };
}

/**
 * Komoku and sansan candidates derived from the best stored move.
 * Points the book already rates keep their stored values.
 */
function alternativesFor(candidates: readonly MoveCandidate[]): MoveCandidate[] {
  const best = sortCandidates(candidates)[0];
  if (!best) {
    return [];
  }
  return OPENING_ALTERNATIVES.map(({ point, winRatio, scoreDrop }) => ({
    move: formatVertex(point),
    winProbability: best.winProbability * winRatio,
    scoreLead: best.scoreLead - scoreDrop,
    visitCount: Math.round(best.visitCount * 0.8),
  }));
}

/**
 * In-memory opening book
 *
 * @example
 * const book = new OpeningBookIndex();
 * await book.load({ kind: 'file', path: 'opening_book.json.gz' });
 * const result = book.lookupByMoves(9, 7.5, []);
 */
export class OpeningBookIndex {
  private hashIndex = new Map<string, BookRecord>();
  private moveIndex = new Map<string, BookRecord>();
  private totalEntries = 0;
  private byBoardSize: Record<number, number> = {};
  private loaded = false;
  private loadError: string | undefined;
  private loading: Promise<void> | null = null;

  private readonly syntheticFallback: boolean;
  private readonly firstMoves: Record<BoardSize, string>;
  private readonly syntheticVisits: number;
  private readonly openingAlternatives: boolean;

  constructor(options: OpeningBookOptions = {}) {
    this.syntheticFallback = options.syntheticFallback ?? true;
    this.firstMoves = { ...DEFAULT_FIRST_MOVES, ...options.firstMoves };
    this.syntheticVisits = options.syntheticVisits ?? 1000;
    this.openingAlternatives = options.openingAlternatives ?? false;
  }

  get isLoaded(): boolean {
    return this.loaded;
  }

  /**
   * Load a bundle. A second call after a successful load does nothing.
   * On failure the index stays empty and the error is recorded.
   *
   * @throws BookLoadError when the bundle cannot be read or has the wrong shape
   */
  async load(source: BookSource): Promise<void> {
    if (this.loaded) {
      return;
    }
    const loading =
      this.loading ??
      this.loadFrom(source).finally(() => {
        this.loading = null;
      });
    this.loading = loading;
    return loading;
  }

  private async loadFrom(source: BookSource): Promise<void> {
    const name = describeBookSource(source);
    let built: BuiltIndex;
    try {
      const parsed = bookBundleSchema.safeParse(await readBookSource(source));
      if (!parsed.success) {
        throw new Error(parsed.error.issues[0]?.message ?? 'invalid bundle');
      }
      built = buildIndex(parsed.data);
    } catch (err) {
      const error = new BookLoadError(name, err instanceof Error ? err.message : String(err));
      this.loadError = error.message;
      throw error;
    }

    // Swap in only once fully built
    this.hashIndex = built.hashIndex;
    this.moveIndex = built.moveIndex;
    this.totalEntries = built.totalEntries;
    this.byBoardSize = built.byBoardSize;
    this.loaded = true;
    this.loadError = undefined;
  }

  /**
   * Look up a move sequence in any orientation
   */
  lookupByMoves(boardSize: number, komi: number, moves: readonly Move[]): AnalysisResult | undefined {
    return this.lookupPosition(createPosition({ boardSize, komi, moves }));
  }

  /**
   * Look up a position by its setup and move sequence.
   * Empty-board misses are answered with a synthesized first move.
   */
  lookupPosition(position: Position): AnalysisResult | undefined {
    if (!this.loaded) {
      return undefined;
    }

    const { boardSize, komi, sequence } = position;
    for (const variant of moveKeyVariants(boardSize, komi, sequence)) {
      const record = this.moveIndex.get(variant.key);
      if (record) {
        const candidates = fromCanonicalOrientation(record.topMoves, boardSize, variant.symmetry);
        return this.toResult(position, variant.key, record.effortVisits, candidates, BOOK_MODEL_LABEL);
      }
    }

    if (sequence.length === 0 && this.syntheticFallback) {
      const candidate: MoveCandidate = {
        move: this.firstMoves[boardSize],
        winProbability: 0.5,
        scoreLead: 0,
        visitCount: this.syntheticVisits,
      };
      return this.toResult(
        position,
        canonicalMoveKey(boardSize, komi, []),
        this.syntheticVisits,
        [candidate],
        SYNTHETIC_MODEL_LABEL,
      );
    }

    return undefined;
  }

  /**
   * Look up a position by canonical hash. Entries in the hash index are
   * stored in canonical orientation.
   */
  lookupByHash(key: CanonicalKey, position: Position): AnalysisResult | undefined {
    if (!this.loaded) {
      return undefined;
    }

    const record = this.hashIndex.get(key.hashHex);
    if (
      !record ||
      record.boardSize !== position.boardSize ||
      Math.abs(record.komi - position.komi) > KOMI_TOLERANCE
    ) {
      return undefined;
    }

    const candidates = fromCanonicalOrientation(record.topMoves, position.boardSize, key.symmetryIndex);
    return this.toResult(position, key.hashHex, record.effortVisits, candidates, BOOK_MODEL_LABEL);
  }

  /**
   * Check whether a move sequence is in the book in any orientation
   */
  containsMoves(boardSize: number, komi: number, moves: readonly Move[]): boolean {
    return moveKeyVariants(boardSize, komi, moves).some((variant) => this.moveIndex.has(variant.key));
  }

  /**
   * Entry count for a board size, as declared by the bundle
   */
  countForBoardSize(boardSize: number): number {
    return this.byBoardSize[boardSize] ?? 0;
  }

  getStats(): BookStats {
    const stats: BookStats = {
      isLoaded: this.loaded,
      totalEntries: this.totalEntries,
      hashIndexedEntries: this.hashIndex.size,
      moveIndexedEntries: this.moveIndex.size,
      byBoardSize: { ...this.byBoardSize },
    };
    if (this.loadError !== undefined) {
      stats.loadError = this.loadError;
    }
    return stats;
  }

  /**
   * Drop all entries. The index can be loaded again afterwards.
   */
  clear(): void {
    this.hashIndex = new Map();
    this.moveIndex = new Map();
    this.totalEntries = 0;
    this.byBoardSize = {};
    this.loaded = false;
    this.loadError = undefined;
  }

  /**
   * Re-expand candidates over the symmetries of the current position and
   * drop occupied points
   */
  private toResult(
    position: Position,
    positionKey: string,
    effortVisits: number,
    candidates: MoveCandidate[],
    modelLabel: string,
  ): AnalysisResult {
    const withAlternatives =
      this.openingAlternatives && position.sequence.length === 0
        ? [...candidates, ...alternativesFor(candidates)]
        : candidates;
    const expanded = expandCandidates(withAlternatives, position.boardSize, validSymmetries(position));
    return {
      positionKey,
      boardSize: position.boardSize,
      komi: position.komi,
      movesSequence: position.sequence.map(formatMoveKey).join(';'),
      topMoves: sortCandidates(excludeOccupied(expanded, position)),
      effortVisits,
      sourceLabel: 'openingBook',
      completeness: 'complete',
      modelLabel,
    };
  }
}
