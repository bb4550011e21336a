/**
 * Research Orchestrator
 *
 * Drives a research session round by round. This is the only component
 * that writes to the Record Store during a run.
 *
 * Architecture, per round:
 * 1. Load the envelope and plan the round (supervisor agent, or the fixed
 *    rotation when planning is disabled or fails)
 * 2. Drain the step queue one step at a time. Each step runs against a
 *    fresh snapshot and returns a StepDelta
 * 3. Merge each delta into the envelope and save, one write per step
 * 4. Count the round and start over, until the plan says "end" or the
 *    round cap is reached
 *
 * A failing step is recorded and skipped; it never aborts the session.
 */

import { randomUUID } from "crypto";
import { env } from "../config/env.ts";
import { errorMessage, throwApiError } from "../lib/errors.ts";
import type { RandomSource } from "../lib/math-utils.ts";
import type { Envelope, SessionStatistics, StepName, WorkStep } from "../schemas/envelope.ts";
import {
  appendEdges,
  appendHypotheses,
  appendReviews,
  supersedeHypotheses,
  type RecordStore,
} from "../services/record-store.ts";
import { withSessionLock } from "../services/session-lock.ts";
import { StepScheduler, type StepDecision } from "../services/step-scheduler.ts";
import type { BaseResearchAgent, StepDelta, StepOutcome } from "./base-agent.ts";
import { EvolutionAgent } from "./evolution-agent.ts";
import { GenerationAgent } from "./generation-agent.ts";
import { MetaReviewAgent } from "./meta-review-agent.ts";
import { ProximityAgent } from "./proximity-agent.ts";
import { RankingAgent } from "./ranking-agent.ts";
import { ReflectionAgent } from "./reflection-agent.ts";
import { SupervisorAgent, fallbackPlan, type PlanOutcome } from "./supervisor-agent.ts";
import type { TextGenerator } from "./text-generator.ts";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type StepAgents = Record<WorkStep, BaseResearchAgent<StepOutcome>>;

export interface StepResult {
  step: StepName;
  status: "completed" | "failed";
  summary?: string;
  error?: string;
  durationMs: number;
  capabilityCalls: number;
  failedCalls: number;
}

export interface RoundResult {
  /** Session-wide round number (0-based) */
  round: number;
  planSource: StepDecision["source"];
  planError?: string;
  plannedSteps: StepName[];
  steps: StepResult[];
  /** Steps dropped because a "supervisor" entry asked for a replan */
  discardedSteps: StepName[];
}

export type StopReason = "end" | "round_cap" | "aborted";

export interface SessionRunResult {
  runId: string;
  sessionId: string;
  startedAt: string;
  finishedAt: string;
  stopReason: StopReason;
  roundsCompleted: number;
  rounds: RoundResult[];
  iteration: number;
  statistics: SessionStatistics;
}

export interface OrchestratorOptions {
  store: RecordStore;
  generator: TextGenerator;
  /** "fallback" never asks the model for a plan */
  planner?: "llm" | "fallback";
  random?: RandomSource;
  /** Override individual step agents (tests, custom prompts) */
  agents?: Partial<StepAgents>;
}

export interface RunOptions {
  maxRounds?: number;
  /** Used only when the session has no goal yet */
  researchGoal?: string;
  signal?: AbortSignal;
}

// ---------------------------------------------------------------------------
// Delta Merging
// ---------------------------------------------------------------------------

/**
 * Merge one step's delta into a draft envelope in place.
 */
export function mergeStepDelta(draft: Envelope, step: StepName, delta: StepDelta): void {
  if (delta.addHypotheses) appendHypotheses(draft, delta.addHypotheses);
  if (delta.supersede) supersedeHypotheses(draft, delta.supersede);
  if (delta.addReviews) appendReviews(draft, delta.addReviews);
  if (delta.ratings) draft.ratings = { ...draft.ratings, ...delta.ratings };
  if (delta.matchesPlayed) draft.statistics.tournamentMatches += delta.matchesPlayed;
  if (delta.addEdges) appendEdges(draft, delta.addEdges);
  if (delta.incrementIteration) draft.iteration += 1;
  if (delta.stepState) {
    draft.stepStates[step] = { ...delta.stepState, status: "completed" };
  }
}

export function createStepAgents(generator: TextGenerator): StepAgents {
  return {
    generation: new GenerationAgent(generator),
    reflection: new ReflectionAgent(generator),
    ranking: new RankingAgent(generator),
    evolution: new EvolutionAgent(generator),
    proximity: new ProximityAgent(generator),
    meta_review: new MetaReviewAgent(generator),
  };
}

// ---------------------------------------------------------------------------
// Orchestrator
// ---------------------------------------------------------------------------

export class ResearchOrchestrator {
  private readonly store: RecordStore;
  private readonly planner: "llm" | "fallback";
  private readonly random?: RandomSource;
  private readonly agents: StepAgents;
  private readonly supervisor: SupervisorAgent;

  constructor(options: OrchestratorOptions) {
    this.store = options.store;
    this.planner = options.planner ?? env.PLANNER;
    this.random = options.random;
    this.agents = { ...createStepAgents(options.generator), ...options.agents };
    this.supervisor = new SupervisorAgent(options.generator);
  }

  get sessionId(): string {
    return this.store.sessionId;
  }

  async run(options: RunOptions = {}): Promise<SessionRunResult> {
    const runId = `run_${Date.now()}_${Math.random().toString(36).slice(2, 8)}`;
    const startedAt = new Date().toISOString();
    const maxRounds = options.maxRounds ?? env.MAX_ROUNDS;
    const scheduler = new StepScheduler({ maxRounds });
    const rounds: RoundResult[] = [];
    let aborted = false;

    console.log(
      `[Orchestrator] Starting ${runId} for session ${this.sessionId} (max ${maxRounds} rounds)`,
    );

    await this.ensureGoal(options.researchGoal);

    while (scheduler.canPlan()) {
      if (options.signal?.aborted) {
        aborted = true;
        break;
      }

      const round = await this.runRound(scheduler, options.signal);
      rounds.push(round);

      await this.store.update((draft) => {
        draft.rounds += 1;
      });
    }

    const final = await this.store.load();
    const stopReason: StopReason = aborted ? "aborted" : (scheduler.stopReason() ?? "round_cap");

    console.log(
      `[Orchestrator] ${runId} finished after ${rounds.length} rounds (${stopReason}); iteration ${final.iteration}, ${final.hypotheses.length} hypotheses`,
    );

    return {
      runId,
      sessionId: this.sessionId,
      startedAt,
      finishedAt: new Date().toISOString(),
      stopReason,
      roundsCompleted: rounds.length,
      rounds,
      iteration: final.iteration,
      statistics: final.statistics,
    };
  }

  // -------------------------------------------------------------------------
  // Rounds
  // -------------------------------------------------------------------------

  private async runRound(scheduler: StepScheduler, signal?: AbortSignal): Promise<RoundResult> {
    const envelope = await this.store.load();
    const { plan, planError } = await this.plan(envelope, signal);

    scheduler.plan(plan.decision);
    await this.store.update((draft) => {
      draft.stepStates.supervisor = {
        round: envelope.rounds,
        source: plan.decision.source,
        queue: plan.decision.queue,
        parsed: plan.parsed,
        terminate: plan.decision.terminate,
        state: { ...plan.state },
        rawPlan: plan.rawPlan,
        ...(planError !== undefined && { error: planError }),
        updatedAt: new Date().toISOString(),
      };
    });

    const round: RoundResult = {
      round: envelope.rounds,
      planSource: plan.decision.source,
      ...(planError !== undefined && { planError }),
      plannedSteps: [...plan.decision.queue],
      steps: [],
      discardedSteps: [],
    };

    for (let step = scheduler.next(); step !== null; step = scheduler.next()) {
      if (step === "supervisor" || step === "end") {
        round.discardedSteps.push(...scheduler.discardRemaining());
        round.steps.push({
          step,
          status: "completed",
          summary: "Replan requested; remaining steps discarded",
          durationMs: 0,
          capabilityCalls: 0,
          failedCalls: 0,
        });
      } else {
        round.steps.push(await this.runStep(step, signal));
      }
      scheduler.complete();

      if (signal?.aborted) {
        round.discardedSteps.push(...scheduler.discardRemaining());
      }
    }

    return round;
  }

  private async plan(
    envelope: Envelope,
    signal?: AbortSignal,
  ): Promise<{ plan: PlanOutcome; planError?: string }> {
    if (this.planner === "fallback") {
      return { plan: fallbackPlan(envelope) };
    }
    try {
      return { plan: await this.supervisor.run({ envelope, signal }) };
    } catch (err) {
      const planError = errorMessage(err);
      console.warn(`[Orchestrator] Planning failed, using fallback rotation: ${planError}`);
      return { plan: fallbackPlan(envelope), planError };
    }
  }

  // -------------------------------------------------------------------------
  // Steps
  // -------------------------------------------------------------------------

  private async runStep(step: WorkStep, signal?: AbortSignal): Promise<StepResult> {
    const started = Date.now();
    const snapshot = await this.store.load();

    try {
      const outcome = await this.agents[step].run({ envelope: snapshot, signal, random: this.random });
      await this.store.update((draft) => mergeStepDelta(draft, step, outcome.delta));

      return {
        step,
        status: "completed",
        summary: outcome.diagnostics.summary,
        durationMs: Date.now() - started,
        capabilityCalls: outcome.diagnostics.capabilityCalls,
        failedCalls: outcome.diagnostics.failedCalls,
      };
    } catch (err) {
      const error = errorMessage(err);
      console.error(`[Orchestrator] Step ${step} failed: ${error}`);

      await this.store.update((draft) => {
        draft.stepStates[step] = {
          ...draft.stepStates[step],
          status: "failed",
          error,
          updatedAt: new Date().toISOString(),
        };
      });

      return {
        step,
        status: "failed",
        error,
        durationMs: Date.now() - started,
        capabilityCalls: 0,
        failedCalls: 0,
      };
    }
  }

  private async ensureGoal(researchGoal: string | undefined): Promise<void> {
    const goal = researchGoal?.trim();
    if (!goal) return;

    const current = await this.store.getResearchGoal();
    if (!current) {
      await this.store.setResearchGoal(goal);
    } else if (current !== goal) {
      console.warn(
        `[Orchestrator] Session ${this.sessionId} already has a research goal; ignoring the new one`,
      );
    }
  }
}

// ---------------------------------------------------------------------------
// Locked Entry Point
// ---------------------------------------------------------------------------

/**
 * Run a session while holding its lock. Throws `session_busy` when another
 * run of the same session is in progress.
 */
export async function runResearchSession(
  options: OrchestratorOptions & RunOptions,
): Promise<SessionRunResult> {
  const orchestrator = new ResearchOrchestrator(options);
  const locked = await withSessionLock(options.store.sessionId, `orchestrator:${randomUUID()}`, () =>
    orchestrator.run(options),
  );

  if (!locked) {
    throwApiError("SESSION_BUSY", `session ${options.store.sessionId} is already running`);
  }
  return locked.result;
}
