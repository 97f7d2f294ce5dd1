/**
 * Custom assertions for analysis results
 */

import type { AnalysisResult, MoveCandidate, SourceLabel } from '@gobook/types';
import { expect } from 'vitest';

/**
 * Assert candidates are ordered by descending win probability
 */
export function assertSortedByWinProbability(candidates: MoveCandidate[]): void {
  for (let i = 1; i < candidates.length; i++) {
    const previous = candidates[i - 1];
    const current = candidates[i];
    if (previous === undefined || current === undefined) continue;
    expect(
      previous.winProbability,
      `Candidate ${i} (${current.move}) ranks above ${previous.move}`,
    ).toBeGreaterThanOrEqual(current.winProbability);
  }
}

/**
 * Assert no suggestion lands on an occupied point
 */
export function assertNoOccupiedSuggestions(result: AnalysisResult, occupied: string[]): void {
  const moves = result.topMoves.map((candidate) => candidate.move);
  for (const vertex of occupied) {
    expect(moves, `Suggested occupied point ${vertex}`).not.toContain(vertex);
  }
}

/**
 * Assert which layer answered and the candidate moves it gave, in order
 */
export function assertAnsweredBy(
  result: AnalysisResult | undefined,
  source: SourceLabel,
  moves?: string[],
): void {
  expect(result, `Expected a result from ${source}`).toBeDefined();
  expect(result?.sourceLabel).toBe(source);
  if (moves !== undefined) {
    expect(result?.topMoves.map((candidate) => candidate.move)).toEqual(moves);
  }
}
