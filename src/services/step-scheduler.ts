/**
 * Step Scheduler
 *
 * Decides which steps a round runs and drains that queue one step at a time.
 *
 * A round's queue comes from a planning response when it parses into at
 * least one work step, and from a fixed rotation keyed by the round counter
 * otherwise, so a session always makes progress even when planning text is
 * useless.
 *
 * State machine:
 *
 *   drained ──plan()──▶ awaiting-step ──next()──▶ running-step
 *      ▲                    │    ▲                    │
 *      └──────next()────────┘    └─────complete()─────┘
 *         (queue empty)
 *
 * `drained` is where every round starts and ends. It re-enters planning
 * unless the round cap is reached or the plan asked to end the session.
 */

import {
  activeHypotheses,
  type Envelope,
  type StepName,
  type WorkStep,
} from "../schemas/envelope.ts";
import { META_REVIEW_INTERVAL } from "../config/constants.ts";
import { rankByRating } from "./tournament-engine.ts";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type SchedulerState = "awaiting-step" | "running-step" | "drained";

export interface StepDecision {
  queue: StepName[];
  /** Head of the queue, or "end" when the queue is empty */
  nextStep: StepName;
  source: "plan" | "fallback";
  /** The plan asked to stop after this queue */
  terminate: boolean;
}

export interface StateSummary {
  iteration: number;
  rounds: number;
  hypothesisCount: number;
  activeCount: number;
  unreviewedCount: number;
  ratedCount: number;
  topHypothesisTitle: string | null;
}

// ---------------------------------------------------------------------------
// Policy
// ---------------------------------------------------------------------------

/**
 * Deterministic rotation used whenever no usable plan exists.
 */
export function fallbackStepQueue(iteration: number): WorkStep[] {
  if (iteration === 0) return ["generation", "reflection", "ranking"];
  if (iteration % META_REVIEW_INTERVAL === 0) return ["meta_review"];

  switch (iteration % 3) {
    case 0:
      return ["evolution", "reflection", "ranking", "proximity"];
    case 1:
      return ["generation", "reflection", "ranking"];
    default:
      return ["proximity", "evolution", "reflection", "ranking"];
  }
}

/**
 * What the planner gets to see about the session.
 */
export function summarizeState(envelope: Envelope): StateSummary {
  const active = activeHypotheses(envelope);
  const reviewed = new Set(envelope.reviews.map((r) => r.hypothesisId));
  const rated = active.filter((h) => envelope.ratings[h.id] !== undefined);
  const [top] = rankByRating(rated, envelope.ratings);

  return {
    iteration: envelope.iteration,
    rounds: envelope.rounds,
    hypothesisCount: envelope.hypotheses.length,
    activeCount: active.length,
    unreviewedCount: active.filter((h) => !reviewed.has(h.id)).length,
    ratedCount: Object.keys(envelope.ratings).length,
    topHypothesisTitle: top?.title ?? null,
  };
}

/**
 * Turn a parsed plan into this round's queue.
 *
 * - Everything from the first "end" on is dropped and the session stops
 *   after the queue drains.
 * - Leading "supervisor" entries are dropped; a later one ends the round
 *   early so the next round replans.
 * - A plan with no work step before its end falls back to the rotation,
 *   unless it explicitly ended, in which case the queue is empty.
 */
export function decideSteps(plan: readonly StepName[], iteration: number): StepDecision {
  const endAt = plan.indexOf("end");
  const terminate = endAt !== -1;
  const head = terminate ? plan.slice(0, endAt) : [...plan];

  const firstWork = head.findIndex((step) => step !== "supervisor");
  if (firstWork === -1) {
    if (terminate) {
      return { queue: [], nextStep: "end", source: "plan", terminate: true };
    }
    const queue = fallbackStepQueue(iteration);
    return { queue, nextStep: queue[0] ?? "end", source: "fallback", terminate: false };
  }

  const queue = head.slice(firstWork);
  return { queue, nextStep: queue[0] ?? "end", source: "plan", terminate };
}

// ---------------------------------------------------------------------------
// State machine
// ---------------------------------------------------------------------------

export interface StepSchedulerOptions {
  maxRounds: number;
}

export class StepScheduler {
  private state: SchedulerState = "drained";
  private queue: StepName[] = [];
  private active: StepName | null = null;
  private roundsPlanned = 0;
  private terminated = false;
  private readonly maxRounds: number;

  constructor(options: StepSchedulerOptions) {
    this.maxRounds = Math.max(0, Math.floor(options.maxRounds));
  }

  get currentState(): SchedulerState {
    return this.state;
  }

  get activeStep(): StepName | null {
    return this.active;
  }

  get pendingSteps(): StepName[] {
    return [...this.queue];
  }

  get rounds(): number {
    return this.roundsPlanned;
  }

  /** True when drained and neither the round cap nor an "end" stops us. */
  canPlan(): boolean {
    return this.state === "drained" && !this.terminated && this.roundsPlanned < this.maxRounds;
  }

  /** Why planning stopped, or null while it can continue. */
  stopReason(): "end" | "round_cap" | null {
    if (this.terminated) return "end";
    if (this.roundsPlanned >= this.maxRounds) return "round_cap";
    return null;
  }

  /** drained → awaiting-step with a new round's queue. */
  plan(decision: StepDecision): void {
    this.assertState("drained", "plan");
    if (!this.canPlan()) {
      throw new Error(`Scheduler cannot plan another round (${this.stopReason() ?? "unknown"})`);
    }
    this.roundsPlanned++;
    this.queue = [...decision.queue];
    this.terminated = decision.terminate;
    this.state = "awaiting-step";
  }

  /**
   * awaiting-step → running-step with the popped head, or → drained when
   * the queue is empty (returns null).
   */
  next(): StepName | null {
    this.assertState("awaiting-step", "next");
    const step = this.queue.shift();
    if (step === undefined) {
      this.state = "drained";
      return null;
    }
    this.active = step;
    this.state = "running-step";
    return step;
  }

  /** running-step → awaiting-step. */
  complete(): void {
    this.assertState("running-step", "complete");
    this.active = null;
    this.state = "awaiting-step";
  }

  /** Drop the rest of this round's queue; the next next() drains. */
  discardRemaining(): StepName[] {
    const dropped = this.queue;
    this.queue = [];
    return dropped;
  }

  private assertState(expected: SchedulerState, action: string): void {
    if (this.state !== expected) {
      throw new Error(`Illegal scheduler transition: ${action}() in state ${this.state}`);
    }
  }
}
