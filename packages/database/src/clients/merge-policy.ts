/**
 * Rules for combining cache entries stored under the same key
 */

import { sortCandidates } from '@gobook/core';
import type { AnalysisResult, Completeness, MoveCandidate } from '@gobook/types';

/**
 * Outcome of a put
 */
export type PutOutcome = 'inserted' | 'replaced' | 'kept-existing' | 'unchanged';

/**
 * What the policy decided for a colliding entry
 */
export type MergeDecision = 'keep-existing' | 'replace';

/**
 * An existing entry survives when its compute time exceeds the incoming one by this factor
 */
export const DURATION_TOLERANCE = 1.1;

/**
 * The fields the policy reads
 */
export interface MergeSubject {
  completeness: Completeness;
  computeDurationSeconds?: number;
}

/**
 * Decide between an existing and an incoming entry; the first matching rule wins:
 * 1. existing complete, incoming partial: keep existing
 * 2. same completeness, both durations known, existing > incoming * 1.1: keep existing
 * 3. otherwise the incoming entry replaces the existing one
 */
export function decideMerge(existing: MergeSubject, incoming: MergeSubject): MergeDecision {
  if (existing.completeness === 'complete' && incoming.completeness === 'partial') {
    return 'keep-existing';
  }

  if (
    existing.completeness === incoming.completeness &&
    existing.computeDurationSeconds !== undefined &&
    incoming.computeDurationSeconds !== undefined &&
    existing.computeDurationSeconds > incoming.computeDurationSeconds * DURATION_TOLERANCE
  ) {
    return 'keep-existing';
  }

  return 'replace';
}

/**
 * Canonical JSON of a candidate list, as stored in the top_moves column
 */
export function serializeCandidates(candidates: readonly MoveCandidate[]): string {
  return JSON.stringify(
    candidates.map(({ move, winProbability, scoreLead, visitCount }) => ({
      move,
      winProbability,
      scoreLead,
      visitCount,
    })),
  );
}

/**
 * Whether two entries carry the same stored payload (creation time aside)
 */
export function samePayload(a: AnalysisResult, b: AnalysisResult): boolean {
  return (
    a.movesSequence === b.movesSequence &&
    a.boardSize === b.boardSize &&
    a.modelLabel === b.modelLabel &&
    a.completeness === b.completeness &&
    a.computeDurationSeconds === b.computeDurationSeconds &&
    serializeCandidates(a.topMoves) === serializeCandidates(b.topMoves)
  );
}

/**
 * Combine two analyses of the same position and effort from different databases.
 * Shared moves get averaged win probability and score lead, the rest are kept.
 */
export function mergeAnalyses(existing: AnalysisResult, incoming: AnalysisResult): AnalysisResult {
  const existingByMove = new Map(existing.topMoves.map((candidate) => [candidate.move, candidate]));
  const incomingMoves = new Set(incoming.topMoves.map((candidate) => candidate.move));

  const merged: MoveCandidate[] = incoming.topMoves.map((candidate) => {
    const previous = existingByMove.get(candidate.move);
    if (!previous) {
      return candidate;
    }
    return {
      move: candidate.move,
      winProbability: (previous.winProbability + candidate.winProbability) / 2,
      scoreLead: (previous.scoreLead + candidate.scoreLead) / 2,
      visitCount: candidate.visitCount,
    };
  });
  for (const candidate of existing.topMoves) {
    if (!incomingMoves.has(candidate.move)) {
      merged.push(candidate);
    }
  }

  return {
    ...existing,
    topMoves: sortCandidates(merged),
    modelLabel: `${incoming.modelLabel}+merged`,
    completeness:
      existing.completeness === 'complete' || incoming.completeness === 'complete'
        ? 'complete'
        : 'partial',
    createdAt: new Date().toISOString(),
  };
}
