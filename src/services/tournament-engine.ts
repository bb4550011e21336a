/**
 * Tournament Engine
 *
 * Ranks hypotheses through pairwise debates scored with a confidence-weighted
 * Elo rule. The engine never talks to a model itself: the ranking agent hands
 * it a `judge` that runs one debate and returns the extracted outcome.
 *
 * Pair selection mixes three strategies so a round covers close competitors,
 * upsets and extremes:
 *  1. Adjacent pairs in rating order
 *  2. Random pairs sampled without replacement
 *  3. Bottom half against the reversed top half
 * The combined list is shuffled, de-duplicated and capped.
 *
 * Ratings are plain numbers keyed by hypothesis id. Every function here
 * returns a new table; inputs are never mutated.
 */

import {
  ELO_SCALE,
  INITIAL_RATING,
  K_FACTOR,
  MAX_MATCHES_PER_ROUND,
} from "../config/constants.ts";
import { errorMessage } from "../lib/errors.ts";
import {
  clamp,
  randomIndex,
  shuffle,
  unorderedPairKey,
  type RandomSource,
} from "../lib/math-utils.ts";
import type { RatingTable } from "../schemas/envelope.ts";
import type { DebateOutcome } from "./text-extraction.ts";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Anything with a stable id can enter the tournament */
export interface Contender {
  id: string;
}

export type Winner = DebateOutcome["winner"];

/** Runs one debate. `null` means the debate produced no usable winner. */
export type DebateJudge<T extends Contender> = (
  a: T,
  b: T,
) => Promise<DebateOutcome | null>;

export interface PairSelectionOptions {
  maxMatches?: number;
  random?: RandomSource;
}

export interface MatchRecord {
  hypothesisA: string;
  hypothesisB: string;
  /** null when the debate had no parseable winner or the judge failed */
  winner: Winner | null;
  confidence: number;
  ratingA: number;
  ratingB: number;
  error?: string;
}

export interface TournamentResult {
  ratings: RatingTable;
  /** Matches that produced a winner and moved ratings */
  matchesPlayed: number;
  matches: MatchRecord[];
}

// ---------------------------------------------------------------------------
// Ratings
// ---------------------------------------------------------------------------

/**
 * Add the baseline rating for every hypothesis not yet in the table.
 */
export function seedRatings(hypotheses: readonly Contender[], ratings: RatingTable): RatingTable {
  const seeded: RatingTable = { ...ratings };
  for (const h of hypotheses) {
    if (seeded[h.id] === undefined) {
      seeded[h.id] = INITIAL_RATING;
    }
  }
  return seeded;
}

export function ratingOf(ratings: RatingTable, id: string): number {
  return ratings[id] ?? INITIAL_RATING;
}

/** Probability that A beats B under the Elo model */
export function expectedScore(ratingA: number, ratingB: number): number {
  return 1 / (1 + Math.pow(10, (ratingB - ratingA) / ELO_SCALE));
}

/**
 * Apply one confidence-weighted Elo update.
 *
 * K scales with confidence, so a coin-flip verdict (confidence 0) leaves both
 * ratings where they were and a certain one applies the full K factor. The
 * two deltas always sum to zero.
 */
export function applyEloUpdate(
  ratings: RatingTable,
  idA: string,
  idB: string,
  winner: Winner,
  confidence: number,
): RatingTable {
  const ratingA = ratingOf(ratings, idA);
  const ratingB = ratingOf(ratings, idB);

  const expectedA = expectedScore(ratingA, ratingB);
  const expectedB = 1 - expectedA;
  const k = K_FACTOR * clamp(Number.isFinite(confidence) ? confidence : 0, 0, 1);

  const scoreA = winner === "A" ? 1 : 0;
  const scoreB = 1 - scoreA;

  return {
    ...ratings,
    [idA]: ratingA + k * (scoreA - expectedA),
    [idB]: ratingB + k * (scoreB - expectedB),
  };
}

/**
 * Ids ordered best first. Ties keep the input order.
 */
export function rankByRating<T extends Contender>(items: readonly T[], ratings: RatingTable): T[] {
  return [...items].sort((a, b) => ratingOf(ratings, b.id) - ratingOf(ratings, a.id));
}

// ---------------------------------------------------------------------------
// Pair Selection
// ---------------------------------------------------------------------------

function adjacentPairs<T>(sorted: readonly T[]): Array<[T, T]> {
  const pairs: Array<[T, T]> = [];
  for (let i = 0; i + 1 < sorted.length; i += 2) {
    pairs.push([sorted[i], sorted[i + 1]]);
  }
  return pairs;
}

function randomPairs<T>(sorted: readonly T[], random: RandomSource): Array<[T, T]> {
  const remaining = [...sorted];
  const pairs: Array<[T, T]> = [];
  while (remaining.length >= 2) {
    const [a] = remaining.splice(randomIndex(remaining.length, random), 1);
    const [b] = remaining.splice(randomIndex(remaining.length, random), 1);
    pairs.push([a, b]);
  }
  return pairs;
}

function extremePairs<T>(sorted: readonly T[]): Array<[T, T]> {
  const half = Math.floor(sorted.length / 2);
  const bottom = sorted.slice(0, half);
  const top = sorted.slice(half).reverse();
  return bottom.map((item, i): [T, T] => [item, top[i]]);
}

/**
 * Choose up to `maxMatches` debates for this round.
 *
 * Hypotheses are sorted ascending by rating (stable, so equal ratings keep
 * their input order). Duplicate unordered pairs are dropped after the
 * shuffle, so two hypotheses yield exactly one match.
 */
export function selectTournamentPairs<T extends Contender>(
  hypotheses: readonly T[],
  ratings: RatingTable,
  options: PairSelectionOptions = {},
): Array<[T, T]> {
  const maxMatches = options.maxMatches ?? MAX_MATCHES_PER_ROUND;
  const random = options.random ?? Math.random;

  if (hypotheses.length < 2 || maxMatches <= 0) return [];

  const sorted = [...hypotheses].sort(
    (a, b) => ratingOf(ratings, a.id) - ratingOf(ratings, b.id),
  );

  const candidates = shuffle(
    [...adjacentPairs(sorted), ...randomPairs(sorted, random), ...extremePairs(sorted)],
    random,
  );

  const seen = new Set<string>();
  const selected: Array<[T, T]> = [];
  for (const [a, b] of candidates) {
    if (a.id === b.id) continue;
    const key = unorderedPairKey(a.id, b.id);
    if (seen.has(key)) continue;
    seen.add(key);
    selected.push([a, b]);
    if (selected.length >= maxMatches) break;
  }
  return selected;
}

// ---------------------------------------------------------------------------
// Tournament Round
// ---------------------------------------------------------------------------

/**
 * Run one tournament round.
 *
 * All debates run concurrently; their outcomes are then applied in pair
 * order against the evolving table. A rejected judge call is logged and
 * treated like a debate without a winner.
 */
export async function runTournament<T extends Contender>(
  hypotheses: readonly T[],
  ratings: RatingTable,
  judge: DebateJudge<T>,
  options: PairSelectionOptions = {},
): Promise<TournamentResult> {
  let table = seedRatings(hypotheses, ratings);
  const pairs = selectTournamentPairs(hypotheses, table, options);

  if (pairs.length === 0) {
    return { ratings: table, matchesPlayed: 0, matches: [] };
  }

  const settled = await Promise.allSettled(pairs.map(([a, b]) => judge(a, b)));

  let matchesPlayed = 0;
  const matches: MatchRecord[] = [];

  settled.forEach((result, i) => {
    const [a, b] = pairs[i];

    if (result.status === "rejected") {
      const message = errorMessage(result.reason);
      console.warn(`[TournamentEngine] Debate ${a.id} vs ${b.id} failed: ${message}`);
      matches.push({
        hypothesisA: a.id,
        hypothesisB: b.id,
        winner: null,
        confidence: 0,
        ratingA: ratingOf(table, a.id),
        ratingB: ratingOf(table, b.id),
        error: message,
      });
      return;
    }

    const outcome = result.value;
    if (outcome === null) {
      matches.push({
        hypothesisA: a.id,
        hypothesisB: b.id,
        winner: null,
        confidence: 0,
        ratingA: ratingOf(table, a.id),
        ratingB: ratingOf(table, b.id),
      });
      return;
    }

    table = applyEloUpdate(table, a.id, b.id, outcome.winner, outcome.confidence);
    matchesPlayed++;
    matches.push({
      hypothesisA: a.id,
      hypothesisB: b.id,
      winner: outcome.winner,
      confidence: clamp(outcome.confidence, 0, 1),
      ratingA: ratingOf(table, a.id),
      ratingB: ratingOf(table, b.id),
    });
  });

  return { ratings: table, matchesPlayed, matches };
}
