/**
 * Base Agent Types & Abstract Class
 *
 * Every processing step is run by an agent: a thin wrapper that turns an
 * envelope snapshot into prompts, sends them to the text-generation
 * capability, and turns the replies back into records via the extraction
 * layer.
 *
 * Agents never write to the Record Store. A step agent returns a StepDelta
 * describing what to add or change; the orchestrator merges it into the
 * envelope and saves once per step.
 */

import { STEP_OUTPUT_PREVIEW_LENGTH } from "../config/constants.ts";
import type { RandomSource } from "../lib/math-utils.ts";
import type {
  Envelope,
  Hypothesis,
  RatingTable,
  Review,
  SimilarityEdge,
  StepName,
  StepState,
  WorkStep,
} from "../schemas/envelope.ts";
import type { TextGenerator } from "./text-generator.ts";

// ---------------------------------------------------------------------------
// Core Types
// ---------------------------------------------------------------------------

/** Everything a step may read. The envelope is a private snapshot. */
export interface StepContext {
  envelope: Envelope;
  signal?: AbortSignal;
  /** Source of randomness for pair selection; defaults to Math.random */
  random?: RandomSource;
}

/** A parent and the evolved children that replace it in the active set */
export interface Supersession {
  parentId: string;
  childIds: string[];
}

/**
 * Changes one step wants applied to the envelope. Every field is optional;
 * an empty delta is a no-op.
 */
export interface StepDelta {
  addHypotheses?: Hypothesis[];
  supersede?: Supersession[];
  addReviews?: Review[];
  /** Ratings to overwrite; ids not listed keep their rating */
  ratings?: RatingTable;
  matchesPlayed?: number;
  /** Edges to append */
  addEdges?: SimilarityEdge[];
  incrementIteration?: boolean;
  /** Replaces the step's last-seen state slot */
  stepState?: StepState;
}

/** What a step reports besides its delta, for logs and API responses */
export interface StepDiagnostics {
  summary: string;
  /** Capability calls issued by the step */
  capabilityCalls: number;
  /** Capability calls that failed but did not fail the whole step */
  failedCalls: number;
}

export interface StepOutcome {
  delta: StepDelta;
  diagnostics: StepDiagnostics;
}

/** Configuration for a research agent */
export interface ResearchAgentConfig {
  /** Log tag, e.g. "GenerationAgent" */
  name: string;
  step: WorkStep | Extract<StepName, "supervisor">;
  /** Temperature for capability calls (0.0-1.0) */
  temperature: number;
  systemPrompt: string;
}

// ---------------------------------------------------------------------------
// Abstract Base Class
// ---------------------------------------------------------------------------

/**
 * Abstract base class for all research agents.
 *
 * Subclasses build prompts and interpret replies; the base class owns the
 * capability call and the shared helpers.
 */
export abstract class BaseResearchAgent<TResult = StepOutcome> {
  readonly config: ResearchAgentConfig;
  protected readonly generator: TextGenerator;

  constructor(config: ResearchAgentConfig, generator: TextGenerator) {
    this.config = config;
    this.generator = generator;
  }

  get name(): string {
    return this.config.name;
  }

  get step(): ResearchAgentConfig["step"] {
    return this.config.step;
  }

  abstract run(context: StepContext): Promise<TResult>;

  // -------------------------------------------------------------------------
  // Shared Helpers
  // -------------------------------------------------------------------------

  /**
   * One capability call with this agent's system prompt and temperature.
   * Rejects with a CapabilityError when the capability fails.
   */
  protected complete(prompt: string, signal?: AbortSignal): Promise<string> {
    return this.generator.generate({
      system: this.config.systemPrompt,
      prompt,
      temperature: this.config.temperature,
      signal,
    });
  }

  /** Outcome for a step that had nothing to do. */
  protected noop(summary: string): StepOutcome {
    console.log(`[${this.name}] ${summary}`);
    return {
      delta: {},
      diagnostics: { summary, capabilityCalls: 0, failedCalls: 0 },
    };
  }

  /** Raw output trimmed for the step-state slot. */
  protected preview(text: string): string {
    if (text.length <= STEP_OUTPUT_PREVIEW_LENGTH) return text;
    return `${text.slice(0, STEP_OUTPUT_PREVIEW_LENGTH)}\n...[truncated]`;
  }
}
