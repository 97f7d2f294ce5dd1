/**
 * Record schemas for the opening book bundle and the cache table
 */

import { z } from 'zod';

/**
 * Candidate move as stored in bundles and cache rows
 */
export const candidateSchema = z.object({
  move: z.string().min(1),
  winProbability: z.number().min(0).max(1),
  scoreLead: z.number(),
  visitCount: z.number().int().nonnegative(),
});

/**
 * Candidate in the compact export format
 */
const compactCandidateSchema = z
  .object({
    move: z.string().min(1),
    winrate: z.number().min(0).max(1),
    score_lead: z.number().optional(),
    scoreLead: z.number().optional(),
    visits: z.number().int().nonnegative(),
  })
  .transform((candidate) => ({
    move: candidate.move,
    winProbability: candidate.winrate,
    scoreLead: candidate.scoreLead ?? candidate.score_lead ?? 0,
    visitCount: candidate.visits,
  }));

/**
 * Book entry in the standard format
 */
const standardEntrySchema = z.object({
  canonicalKeyOrMoveKey: z.string(),
  boardSize: z.number().int(),
  komi: z.number(),
  moveSequence: z.string(),
  topMoves: z.array(candidateSchema).min(1),
  effortVisits: z.number().int().nonnegative(),
});

/**
 * Book entry in the compact export format
 */
const compactEntrySchema = z
  .object({
    h: z.string(),
    s: z.number().int(),
    k: z.number(),
    m: z.string().default(''),
    t: z.array(compactCandidateSchema).min(1),
    v: z.number().int().nonnegative(),
  })
  .transform((entry) => ({
    canonicalKeyOrMoveKey: entry.h,
    boardSize: entry.s,
    komi: entry.k,
    moveSequence: entry.m,
    topMoves: entry.t,
    effortVisits: entry.v,
  }));

/**
 * A book entry in either format, normalized to the standard shape
 */
export const bookEntrySchema = z.union([standardEntrySchema, compactEntrySchema]);

const countsSchema = z.record(z.string(), z.number().int().nonnegative());

/**
 * Bundle envelope. Entries are validated one at a time so a bad record
 * does not reject the whole bundle.
 */
export const bookBundleSchema = z.object({
  metadata: z
    .object({
      totalEntries: z.number().int().nonnegative(),
      countsByBoardSize: countsSchema.default({}),
    })
    .optional(),
  stats: z
    .object({
      total_entries: z.number().int().nonnegative(),
      by_board_size: countsSchema.default({}),
    })
    .optional(),
  entries: z.array(z.unknown()),
});

export type BookBundle = z.infer<typeof bookBundleSchema>;

/**
 * Raw row from the analysis_cache table
 */
export const cacheRowSchema = z.object({
  id: z.number().int(),
  lookup_key: z.string(),
  moves_sequence: z.string(),
  board_size: z.number().int(),
  komi: z.number(),
  effort_visits: z.number().int().nonnegative(),
  top_moves: z.string(),
  model_label: z.string(),
  created_at: z.string(),
  compute_duration_seconds: z.number().nullable(),
  completeness: z.enum(['complete', 'partial']),
});

export type CacheRow = z.infer<typeof cacheRowSchema>;

/**
 * Decoded top_moves column
 */
export const storedCandidatesSchema = z.array(candidateSchema);

/**
 * Row of a GROUP BY count query
 */
export const countRowSchema = z.object({
  label: z.union([z.string(), z.number()]),
  count: z.number().int(),
});
