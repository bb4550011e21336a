/**
 * Session Envelope Schemas
 *
 * Zod schemas for every record the orchestration core persists. The envelope
 * is the complete state of one research session; anything that fails these
 * schemas on load is treated as corrupt storage.
 */

import { z } from "zod";
import { REVIEW_SCORE_MAX, REVIEW_SCORE_MIN } from "../config/constants.ts";

// ---------------------------------------------------------------------------
// Step vocabulary
// ---------------------------------------------------------------------------

/** Steps that do work against the envelope */
export const workStepEnum = z.enum([
  "generation",
  "reflection",
  "ranking",
  "evolution",
  "proximity",
  "meta_review",
]);

export type WorkStep = z.infer<typeof workStepEnum>;

/** Full vocabulary exchanged between the scheduler and the loop */
export const stepNameEnum = z.enum([
  "generation",
  "reflection",
  "ranking",
  "evolution",
  "proximity",
  "meta_review",
  "supervisor",
  "end",
]);

export type StepName = z.infer<typeof stepNameEnum>;

/** Steps that keep a last-seen state slot in the envelope */
export const STATEFUL_STEPS = [...workStepEnum.options, "supervisor"] as const;

export type StatefulStep = (typeof STATEFUL_STEPS)[number];

// ---------------------------------------------------------------------------
// Records
// ---------------------------------------------------------------------------

export const hypothesisSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  description: z.string(),
  /** Step that produced it */
  source: z.enum(["generation", "evolution"]),
  /** Hypotheses this one was evolved from */
  parentIds: z.array(z.string()).default([]),
  researchGoal: z.string(),
  /** 0-based creation order within the session */
  order: z.number().int().nonnegative(),
  createdAt: z.string(),
  /** Superseded hypotheses have an evolved child and leave the active set */
  status: z.enum(["active", "superseded"]).default("active"),
  supersededBy: z.array(z.string()).default([]),
  evolutionStrategies: z.array(z.string()).optional(),
  improvements: z.array(z.string()).optional(),
  validationApproach: z.string().optional(),
});

export type Hypothesis = z.infer<typeof hypothesisSchema>;

const criterionScore = z.number().min(REVIEW_SCORE_MIN).max(REVIEW_SCORE_MAX);

export const reviewScoresSchema = z.object({
  scientific_merit: criterionScore,
  novelty: criterionScore,
  testability: criterionScore,
  impact: criterionScore,
  limitations: criterionScore,
});

export type ReviewScores = z.infer<typeof reviewScoresSchema>;

export const recommendationEnum = z.enum(["accept", "revise", "reject"]);

export type Recommendation = z.infer<typeof recommendationEnum>;

export const reviewSchema = z.object({
  id: z.string().min(1),
  hypothesisId: z.string().min(1),
  scores: reviewScoresSchema,
  overallScore: z.number(),
  recommendation: recommendationEnum,
  justification: z.string(),
  createdAt: z.string(),
});

export type Review = z.infer<typeof reviewSchema>;

export const similarityEdgeSchema = z.object({
  id: z.string().min(1),
  source: z.string().min(1),
  target: z.string().min(1),
  similarity: z.number().min(0).max(1),
  order: z.number().int().nonnegative(),
  createdAt: z.string(),
});

export type SimilarityEdge = z.infer<typeof similarityEdgeSchema>;

export const ratingTableSchema = z.record(z.string(), z.number());

export type RatingTable = z.infer<typeof ratingTableSchema>;

export const statisticsSchema = z.object({
  hypothesesGenerated: z.number().int().nonnegative().default(0),
  hypothesesReviewed: z.number().int().nonnegative().default(0),
  tournamentMatches: z.number().int().nonnegative().default(0),
  hypothesesEvolved: z.number().int().nonnegative().default(0),
  similarityEdges: z.number().int().nonnegative().default(0),
});

export type SessionStatistics = z.infer<typeof statisticsSchema>;

export const stepStateSchema = z.record(z.string(), z.unknown());

export type StepState = z.infer<typeof stepStateSchema>;

// ---------------------------------------------------------------------------
// Envelope
// ---------------------------------------------------------------------------

export const ENVELOPE_VERSION = 1;

export const envelopeSchema = z.object({
  sessionId: z.string().min(1),
  version: z.literal(ENVELOPE_VERSION),
  createdAt: z.string(),
  updatedAt: z.string(),
  researchGoal: z.string(),
  hypotheses: z.array(hypothesisSchema),
  reviews: z.array(reviewSchema),
  ratings: ratingTableSchema,
  edges: z.array(similarityEdgeSchema),
  /** Completed meta-reviews; only the meta_review step advances it */
  iteration: z.number().int().nonnegative(),
  /** Completed scheduler rounds; drives the fallback plan */
  rounds: z.number().int().nonnegative().default(0),
  statistics: statisticsSchema,
  stepStates: z.record(z.string(), stepStateSchema).default({}),
});

export type Envelope = z.infer<typeof envelopeSchema>;

/**
 * Build a fresh, valid envelope for a session.
 */
export function createDefaultEnvelope(sessionId: string, researchGoal = ""): Envelope {
  const now = new Date().toISOString();
  return {
    sessionId,
    version: ENVELOPE_VERSION,
    createdAt: now,
    updatedAt: now,
    researchGoal,
    hypotheses: [],
    reviews: [],
    ratings: {},
    edges: [],
    iteration: 0,
    rounds: 0,
    statistics: {
      hypothesesGenerated: 0,
      hypothesesReviewed: 0,
      tournamentMatches: 0,
      hypothesesEvolved: 0,
      similarityEdges: 0,
    },
    stepStates: Object.fromEntries(STATEFUL_STEPS.map((step) => [step, {}])),
  };
}

/**
 * Hypotheses still in play: not superseded by an evolved child.
 */
export function activeHypotheses(envelope: Pick<Envelope, "hypotheses">): Hypothesis[] {
  return envelope.hypotheses.filter((h) => h.status === "active");
}
