/**
 * Record Store
 *
 * Durable, keyed storage for one research session's envelope: hypotheses,
 * reviews, tournament ratings, similarity edges and per-step state. It is the
 * single source of truth across iterations and across process restarts.
 *
 * Write discipline:
 * - Every mutation is a whole-envelope load → modify → save
 * - Callers only ever receive copies; nothing outside the store holds a
 *   live handle to the persisted envelope
 * - One writer per session (see session-lock.ts); there is no version token
 *
 * Recovery: if the stored document is unreadable or fails validation the
 * store logs a warning and REINITIALIZES the session to a fresh default
 * envelope. The previous contents are lost.
 */

import { env } from "../config/env.ts";
import { getDb } from "../db/index.ts";
import { errorMessage } from "../lib/errors.ts";
import { unorderedPairKey } from "../lib/math-utils.ts";
import {
  activeHypotheses,
  createDefaultEnvelope,
  envelopeSchema,
  type Envelope,
  type Hypothesis,
  type RatingTable,
  type Review,
  type SessionStatistics,
  type SimilarityEdge,
  type StatefulStep,
  type StepState,
} from "../schemas/envelope.ts";
import {
  FileEnvelopeBackend,
  PostgresEnvelopeBackend,
  type EnvelopeBackend,
} from "./store-backends.ts";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface LoadResult {
  envelope: Envelope;
  /** True when the stored document was missing and a default was written */
  created: boolean;
  /** True when the stored document was corrupt and has been replaced */
  reset: boolean;
}

// ---------------------------------------------------------------------------
// Envelope mutations
// ---------------------------------------------------------------------------
//
// Applied to a private draft inside `update`. The orchestrator uses the same
// helpers when it merges a step's delta, so counters stay consistent.

/** Append hypotheses, assigning creation order after the existing ones. */
export function appendHypotheses(draft: Envelope, list: Hypothesis[]): void {
  for (const h of list) {
    draft.hypotheses.push({ ...h, order: draft.hypotheses.length });
    draft.statistics.hypothesesGenerated += 1;
    if (h.source === "evolution") draft.statistics.hypothesesEvolved += 1;
  }
}

/** Mark parents superseded by their evolved children. Unknown ids are ignored. */
export function supersedeHypotheses(
  draft: Envelope,
  supersessions: Array<{ parentId: string; childIds: string[] }>,
): void {
  for (const { parentId, childIds } of supersessions) {
    const parent = draft.hypotheses.find((h) => h.id === parentId);
    if (!parent || childIds.length === 0) continue;
    parent.status = "superseded";
    parent.supersededBy = [...new Set([...parent.supersededBy, ...childIds])];
  }
}

export function appendReviews(draft: Envelope, list: Review[]): void {
  draft.reviews.push(...list);
  draft.statistics.hypothesesReviewed += list.length;
}

/** Append edges, skipping any unordered pair that already has one. */
export function appendEdges(draft: Envelope, list: SimilarityEdge[]): void {
  const present = new Set(draft.edges.map((e) => unorderedPairKey(e.source, e.target)));
  let nextOrder = draft.edges.reduce((max, e) => Math.max(max, e.order + 1), 0);
  for (const edge of list) {
    const key = unorderedPairKey(edge.source, edge.target);
    if (present.has(key)) continue;
    present.add(key);
    draft.edges.push({ ...edge, order: nextOrder++ });
  }
  draft.statistics.similarityEdges = draft.edges.length;
}

// ---------------------------------------------------------------------------
// Record Store
// ---------------------------------------------------------------------------

export class RecordStore {
  readonly sessionId: string;
  private readonly backend: EnvelopeBackend;

  constructor(sessionId: string, backend: EnvelopeBackend) {
    this.sessionId = sessionId;
    this.backend = backend;
  }

  // -------------------------------------------------------------------------
  // Envelope entry points
  // -------------------------------------------------------------------------

  /** Load the session envelope, creating or resetting it if needed. */
  async load(): Promise<Envelope> {
    const { envelope } = await this.loadWithStatus();
    return envelope;
  }

  async loadWithStatus(): Promise<LoadResult> {
    let raw: unknown;
    try {
      raw = await this.backend.read(this.sessionId);
    } catch (err) {
      console.warn(
        `[RecordStore] Session ${this.sessionId} is unreadable (${errorMessage(err)}). Reinitializing to an empty envelope.`,
      );
      return { envelope: await this.reinitialize(), created: false, reset: true };
    }

    if (raw === null) {
      return { envelope: await this.reinitialize(), created: true, reset: false };
    }

    const parsed = envelopeSchema.safeParse(raw);
    if (!parsed.success || parsed.data.sessionId !== this.sessionId) {
      const reason = parsed.success
        ? `session id mismatch (${parsed.data.sessionId})`
        : parsed.error.issues
            .slice(0, 3)
            .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
            .join("; ");
      console.warn(
        `[RecordStore] Session ${this.sessionId} failed validation (${reason}). Reinitializing to an empty envelope.`,
      );
      return { envelope: await this.reinitialize(), created: false, reset: true };
    }

    return { envelope: parsed.data, created: false, reset: false };
  }

  /** Persist a full envelope, stamping updatedAt. */
  async save(envelope: Envelope): Promise<void> {
    if (envelope.sessionId !== this.sessionId) {
      throw new Error(
        `Refusing to save envelope for session ${envelope.sessionId} into ${this.sessionId}`,
      );
    }
    const stamped: Envelope = { ...envelope, updatedAt: new Date().toISOString() };
    await this.backend.write(this.sessionId, stamped);
  }

  /**
   * Read-modify-write helper. The mutator edits a private copy in place.
   */
  async update(mutator: (draft: Envelope) => void): Promise<Envelope> {
    const draft = structuredClone(await this.load());
    mutator(draft);
    await this.save(draft);
    return draft;
  }

  /** Whether anything has ever been stored for this session. */
  async exists(): Promise<boolean> {
    return this.backend.exists(this.sessionId);
  }

  private async reinitialize(): Promise<Envelope> {
    const fresh = createDefaultEnvelope(this.sessionId);
    await this.backend.write(this.sessionId, fresh);
    return fresh;
  }

  // -------------------------------------------------------------------------
  // Narrow accessors
  // -------------------------------------------------------------------------

  async getResearchGoal(): Promise<string> {
    return (await this.load()).researchGoal;
  }

  async setResearchGoal(goal: string): Promise<void> {
    await this.update((draft) => {
      draft.researchGoal = goal;
    });
  }

  async getHypotheses(): Promise<Hypothesis[]> {
    return (await this.load()).hypotheses;
  }

  async getActiveHypotheses(): Promise<Hypothesis[]> {
    return activeHypotheses(await this.load());
  }

  async addHypotheses(list: Hypothesis[]): Promise<void> {
    if (list.length === 0) return;
    await this.update((draft) => appendHypotheses(draft, list));
  }

  async getReviews(): Promise<Review[]> {
    return (await this.load()).reviews;
  }

  async addReviews(list: Review[]): Promise<void> {
    if (list.length === 0) return;
    await this.update((draft) => appendReviews(draft, list));
  }

  async getRatings(): Promise<RatingTable> {
    return (await this.load()).ratings;
  }

  async setRatings(ratings: RatingTable, matchesPlayed = 0): Promise<void> {
    await this.update((draft) => {
      draft.ratings = { ...ratings };
      draft.statistics.tournamentMatches += matchesPlayed;
    });
  }

  async getEdges(): Promise<SimilarityEdge[]> {
    return (await this.load()).edges;
  }

  /** Replace the edge set, keeping the first edge of each unordered pair. */
  async setEdges(edges: SimilarityEdge[]): Promise<void> {
    const byPair = new Map<string, SimilarityEdge>();
    for (const edge of edges) {
      const key = unorderedPairKey(edge.source, edge.target);
      if (!byPair.has(key)) byPair.set(key, edge);
    }
    await this.update((draft) => {
      draft.edges = [...byPair.values()];
      draft.statistics.similarityEdges = draft.edges.length;
    });
  }

  async getStepState(name: StatefulStep): Promise<StepState> {
    return (await this.load()).stepStates[name] ?? {};
  }

  async setStepState(name: StatefulStep, state: StepState): Promise<void> {
    await this.update((draft) => {
      draft.stepStates[name] = state;
    });
  }

  async incrementIteration(): Promise<number> {
    const next = await this.update((draft) => {
      draft.iteration += 1;
    });
    return next.iteration;
  }

  async getIteration(): Promise<number> {
    return (await this.load()).iteration;
  }

  async getStatistics(): Promise<SessionStatistics> {
    return (await this.load()).statistics;
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

let sharedBackend: EnvelopeBackend | null = null;

/**
 * Backend selected by STORE_BACKEND. Shared so every store in the process
 * writes through the same connection pool or directory.
 */
export function getDefaultBackend(): EnvelopeBackend {
  if (!sharedBackend) {
    sharedBackend =
      env.STORE_BACKEND === "postgres"
        ? new PostgresEnvelopeBackend(getDb)
        : new FileEnvelopeBackend(env.STORE_DIR);
  }
  return sharedBackend;
}

export function createRecordStore(
  sessionId: string,
  backend: EnvelopeBackend = getDefaultBackend(),
): RecordStore {
  return new RecordStore(sessionId, backend);
}
