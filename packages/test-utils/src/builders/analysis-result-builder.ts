/**
 * Fluent builder for AnalysisResult test data
 */

import type {
  AnalysisResult,
  BoardSize,
  Completeness,
  MoveCandidate,
  SourceLabel,
} from '@gobook/types';

/**
 * Shorthand for a candidate move
 */
export function candidate(
  move: string,
  winProbability: number,
  overrides: Partial<MoveCandidate> = {},
): MoveCandidate {
  return { move, winProbability, scoreLead: 0, visitCount: 100, ...overrides };
}

/**
 * Fluent builder for creating AnalysisResult instances
 */
export class AnalysisResultBuilder {
  private result: AnalysisResult;

  constructor() {
    this.result = {
      positionKey: '0000000000000000',
      boardSize: 9,
      komi: 7.5,
      movesSequence: '',
      topMoves: [candidate('E5', 0.5)],
      effortVisits: 500,
      sourceLabel: 'liveEngine',
      completeness: 'complete',
      modelLabel: 'test-model',
      createdAt: '2024-01-01T00:00:00.000Z',
    };
  }

  /**
   * Set the lookup key
   */
  withKey(positionKey: string): this {
    this.result.positionKey = positionKey;
    return this;
  }

  /**
   * Set board size and komi
   */
  onBoard(boardSize: BoardSize, komi = 7.5): this {
    this.result.boardSize = boardSize;
    this.result.komi = komi;
    return this;
  }

  /**
   * Set the move sequence in key form ("B[E5];W[C3]")
   */
  withMoves(movesSequence: string): this {
    this.result.movesSequence = movesSequence;
    return this;
  }

  /**
   * Set candidate moves
   */
  withTopMoves(...topMoves: MoveCandidate[]): this {
    this.result.topMoves = topMoves;
    return this;
  }

  /**
   * Set invested effort
   */
  withEffort(effortVisits: number): this {
    this.result.effortVisits = effortVisits;
    return this;
  }

  /**
   * Set completeness and, optionally, compute duration
   */
  withCompleteness(completeness: Completeness, computeDurationSeconds?: number): this {
    this.result.completeness = completeness;
    if (computeDurationSeconds !== undefined) {
      this.result.computeDurationSeconds = computeDurationSeconds;
    }
    return this;
  }

  /**
   * Set compute duration
   */
  withDuration(computeDurationSeconds: number): this {
    this.result.computeDurationSeconds = computeDurationSeconds;
    return this;
  }

  withModel(modelLabel: string): this {
    this.result.modelLabel = modelLabel;
    return this;
  }

  fromSource(sourceLabel: SourceLabel): this {
    this.result.sourceLabel = sourceLabel;
    return this;
  }

  /**
   * Build the result
   */
  build(): AnalysisResult {
    return { ...this.result, topMoves: this.result.topMoves.map((move) => ({ ...move })) };
  }
}

/**
 * Create a new AnalysisResultBuilder
 */
export function analysisResult(): AnalysisResultBuilder {
  return new AnalysisResultBuilder();
}
