// ---------------------------------------------------------------------------
// Tournament constants
// ---------------------------------------------------------------------------

/** Rating assigned to a hypothesis the first time the tournament sees it */
export const INITIAL_RATING = 1500;

/** Elo K-factor at full (100%) debate confidence */
export const K_FACTOR = 32;

/** Elo logistic scale: a 400-point gap means 10:1 expected odds */
export const ELO_SCALE = 400;

/** Max pairwise debates per ranking step */
export const MAX_MATCHES_PER_ROUND = 10;

/**
 * Confidence used when a debate names a winner but no CONFIDENCE line.
 * Neutral midpoint: half of the K-factor is applied.
 */
export const DEFAULT_DEBATE_CONFIDENCE = 0.5;

// ---------------------------------------------------------------------------
// Proximity constants
// ---------------------------------------------------------------------------

/** Max similarity comparisons per proximity step */
export const MAX_COMPARISONS_PER_ROUND = 20;

/** Edges at or above this similarity join two hypotheses into one cluster */
export const CLUSTER_SIMILARITY_THRESHOLD = 0.7;

// ---------------------------------------------------------------------------
// Review constants
// ---------------------------------------------------------------------------

/** Fixed review criteria, in prompt order */
export const REVIEW_CRITERIA = [
  "scientific_merit",
  "novelty",
  "testability",
  "impact",
  "limitations",
] as const;

export type ReviewCriterion = (typeof REVIEW_CRITERIA)[number];

/** Inclusive score bounds for every review criterion */
export const REVIEW_SCORE_MIN = 1;
export const REVIEW_SCORE_MAX = 10;

/** Hypotheses per reflection request; batches are reviewed concurrently */
export const REVIEW_BATCH_SIZE = 5;

// ---------------------------------------------------------------------------
// Step slice sizes
// ---------------------------------------------------------------------------

/** Hypotheses requested from the first generation step of a session */
export const INITIAL_GENERATION_COUNT = 5;

/** Hypotheses requested from every later generation step */
export const FOLLOWUP_GENERATION_COUNT = 3;

/** Top-rated hypotheses handed to the evolution step */
export const EVOLUTION_TOP_K = 3;

/** Top-rated hypotheses summarized by the meta-review step */
export const META_REVIEW_TOP_K = 5;

/** Every Nth planning round runs a meta-review only */
export const META_REVIEW_INTERVAL = 5;

// ---------------------------------------------------------------------------
// Capability defaults
// ---------------------------------------------------------------------------

export const DEFAULT_OPENAI_MODEL = "gpt-4o";
export const DEFAULT_ANTHROPIC_MODEL = "claude-sonnet-4-20250514";

/** Max output tokens per capability call */
export const MAX_OUTPUT_TOKENS = 4096;

/** Characters of raw model output kept in step state for diagnostics */
export const STEP_OUTPUT_PREVIEW_LENGTH = 4000;
