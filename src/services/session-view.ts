/**
 * Session Views
 *
 * Read-only projections of an envelope for the HTTP API and the CLI:
 * a compact summary, the rating leaderboard, the similarity graph with its
 * clusters, and the latest research overview.
 */

import { researchOverviewSchema, type ResearchOverview } from "../agents/meta-review-agent.ts";
import { mean, round, round1 } from "../lib/math-utils.ts";
import {
  activeHypotheses,
  type Envelope,
  type Hypothesis,
  type SimilarityEdge,
} from "../schemas/envelope.ts";
import { clusterHypotheses, type HypothesisCluster } from "./similarity-graph.ts";
import { rankByRating, ratingOf } from "./tournament-engine.ts";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface LeaderboardEntry {
  rank: number;
  id: string;
  title: string;
  rating: number;
  source: Hypothesis["source"];
  parentIds: string[];
  reviewCount: number;
  /** Mean overall review score, null when unreviewed */
  averageScore: number | null;
}

export interface SessionSummary {
  sessionId: string;
  researchGoal: string;
  iteration: number;
  rounds: number;
  createdAt: string;
  updatedAt: string;
  hypotheses: { total: number; active: number; superseded: number };
  reviews: number;
  edges: number;
  statistics: Envelope["statistics"];
  topHypothesis: LeaderboardEntry | null;
  overview: ResearchOverview | null;
}

export interface SimilarityGraphView {
  nodes: Array<{ id: string; title: string; status: Hypothesis["status"] }>;
  edges: SimilarityEdge[];
  clusters: HypothesisCluster[];
}

// ---------------------------------------------------------------------------
// Projections
// ---------------------------------------------------------------------------

export function buildLeaderboard(envelope: Envelope, limit?: number): LeaderboardEntry[] {
  const ranked = rankByRating(activeHypotheses(envelope), envelope.ratings);
  const shown = limit !== undefined ? ranked.slice(0, limit) : ranked;

  return shown.map((h, i) => {
    const scores = envelope.reviews
      .filter((r) => r.hypothesisId === h.id)
      .map((r) => r.overallScore);
    return {
      rank: i + 1,
      id: h.id,
      title: h.title,
      rating: round1(ratingOf(envelope.ratings, h.id)),
      source: h.source,
      parentIds: h.parentIds,
      reviewCount: scores.length,
      averageScore: scores.length > 0 ? round(mean(scores), 2) : null,
    };
  });
}

/** Overview stored by the last successful meta-review, if any. */
export function latestOverview(envelope: Envelope): ResearchOverview | null {
  const stored = envelope.stepStates.meta_review?.overview;
  if (stored === undefined || stored === null) return null;
  const parsed = researchOverviewSchema.safeParse(stored);
  return parsed.success ? parsed.data : null;
}

export function summarizeSession(envelope: Envelope): SessionSummary {
  const active = activeHypotheses(envelope).length;
  return {
    sessionId: envelope.sessionId,
    researchGoal: envelope.researchGoal,
    iteration: envelope.iteration,
    rounds: envelope.rounds,
    createdAt: envelope.createdAt,
    updatedAt: envelope.updatedAt,
    hypotheses: {
      total: envelope.hypotheses.length,
      active,
      superseded: envelope.hypotheses.length - active,
    },
    reviews: envelope.reviews.length,
    edges: envelope.edges.length,
    statistics: envelope.statistics,
    topHypothesis: buildLeaderboard(envelope, 1)[0] ?? null,
    overview: latestOverview(envelope),
  };
}

export function buildGraphView(envelope: Envelope, threshold?: number): SimilarityGraphView {
  return {
    nodes: envelope.hypotheses.map((h) => ({ id: h.id, title: h.title, status: h.status })),
    edges: envelope.edges,
    clusters: clusterHypotheses(activeHypotheses(envelope), envelope.edges, threshold),
  };
}
