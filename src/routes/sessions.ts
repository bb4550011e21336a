/**
 * Research Session Routes
 *
 * Create sessions, run orchestration rounds against them, and read back the
 * results. Runs execute inside the request; a second run of a session that
 * is already running is refused with 409.
 */

import { randomUUID } from "crypto";
import { Hono } from "hono";
import { z } from "zod";
import { runResearchSession } from "../agents/orchestrator.ts";
import { createTextGenerator, type TextGenerator } from "../agents/text-generator.ts";
import { env } from "../config/env.ts";
import { apiError, handleError } from "../lib/errors.ts";
import type { RandomSource } from "../lib/math-utils.ts";
import { createRecordStore, getDefaultBackend } from "../services/record-store.ts";
import { getSessionLockStatus } from "../services/session-lock.ts";
import { buildGraphView, buildLeaderboard, summarizeSession } from "../services/session-view.ts";
import { isValidSessionId, type EnvelopeBackend } from "../services/store-backends.ts";

// ---------------------------------------------------------------------------
// Request schemas
// ---------------------------------------------------------------------------

const sessionIdSchema = z
  .string()
  .refine(isValidSessionId, "sessionId may only contain letters, digits, '_' and '-' (max 128)");

const createSessionSchema = z.object({
  researchGoal: z.string().trim().min(1, "researchGoal is required"),
  sessionId: sessionIdSchema.optional(),
});

const runSessionSchema = z.object({
  rounds: z.number().int().positive().max(100).optional(),
  planner: z.enum(["llm", "fallback"]).optional(),
});

const leaderboardQuerySchema = z.object({
  limit: z.coerce.number().int().positive().optional(),
});

const graphQuerySchema = z.object({
  threshold: z.coerce.number().min(0).max(1).optional(),
});

// ---------------------------------------------------------------------------
// Route factory
// ---------------------------------------------------------------------------

export interface SessionRouteOptions {
  /** Defaults to the backend selected by STORE_BACKEND */
  backend?: EnvelopeBackend;
  /** Defaults to the provider selected by LLM_PROVIDER */
  generator?: TextGenerator;
  planner?: "llm" | "fallback";
  /** Randomness for tournament pairing; defaults to Math.random */
  random?: RandomSource;
}

export function createSessionRoutes(options: SessionRouteOptions = {}) {
  const routes = new Hono();

  let generator: TextGenerator | null = options.generator ?? null;
  const getGenerator = (): TextGenerator => {
    if (!generator) generator = createTextGenerator();
    return generator;
  };
  const storeFor = (sessionId: string) =>
    createRecordStore(sessionId, options.backend ?? getDefaultBackend());

  // -------------------------------------------------------------------------
  // POST / -- Create a session
  // -------------------------------------------------------------------------

  routes.post("/", async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return apiError(c, "INVALID_JSON", "Request body must be valid JSON");
    }

    const parsed = createSessionSchema.safeParse(body);
    if (!parsed.success) {
      return apiError(c, "VALIDATION_FAILED", parsed.error.flatten());
    }

    try {
      const store = storeFor(parsed.data.sessionId ?? randomUUID());
      if (await store.exists()) {
        return apiError(c, "SESSION_EXISTS", `session ${store.sessionId} already exists`);
      }

      await store.setResearchGoal(parsed.data.researchGoal);
      console.log(`[Sessions] Created session ${store.sessionId}`);
      return c.json(summarizeSession(await store.load()), 201);
    } catch (err) {
      return handleError(c, err);
    }
  });

  // -------------------------------------------------------------------------
  // GET /:id -- Session summary
  // -------------------------------------------------------------------------

  routes.get("/:id", async (c) => {
    const sessionId = c.req.param("id");
    if (!isValidSessionId(sessionId)) {
      return apiError(c, "VALIDATION_FAILED", `invalid session id "${sessionId}"`);
    }

    try {
      const store = storeFor(sessionId);
      if (!(await store.exists())) {
        return apiError(c, "SESSION_NOT_FOUND", `session ${sessionId} does not exist`);
      }
      const running = getSessionLockStatus(sessionId).isLocked;
      return c.json({ ...summarizeSession(await store.load()), running });
    } catch (err) {
      return handleError(c, err);
    }
  });

  // -------------------------------------------------------------------------
  // POST /:id/run -- Run orchestration rounds
  // -------------------------------------------------------------------------

  routes.post("/:id/run", async (c) => {
    const sessionId = c.req.param("id");
    if (!isValidSessionId(sessionId)) {
      return apiError(c, "VALIDATION_FAILED", `invalid session id "${sessionId}"`);
    }

    // The body is optional; an empty one means "use the defaults"
    let body: unknown;
    try {
      const text = await c.req.text();
      body = text.trim() ? JSON.parse(text) : {};
    } catch {
      return apiError(c, "INVALID_JSON", "Request body must be valid JSON");
    }

    const parsed = runSessionSchema.safeParse(body);
    if (!parsed.success) {
      return apiError(c, "VALIDATION_FAILED", parsed.error.flatten());
    }

    try {
      const store = storeFor(sessionId);
      if (!(await store.exists())) {
        return apiError(c, "SESSION_NOT_FOUND", `session ${sessionId} does not exist`);
      }

      const result = await runResearchSession({
        store,
        generator: getGenerator(),
        planner: parsed.data.planner ?? options.planner ?? env.PLANNER,
        maxRounds: parsed.data.rounds,
        random: options.random,
        signal: c.req.raw.signal,
      });
      return c.json(result);
    } catch (err) {
      return handleError(c, err);
    }
  });

  // -------------------------------------------------------------------------
  // GET /:id/leaderboard -- Active hypotheses by rating
  // -------------------------------------------------------------------------

  routes.get("/:id/leaderboard", async (c) => {
    const sessionId = c.req.param("id");
    const query = leaderboardQuerySchema.safeParse(c.req.query());
    if (!isValidSessionId(sessionId) || !query.success) {
      return apiError(
        c,
        "VALIDATION_FAILED",
        query.success ? `invalid session id "${sessionId}"` : query.error.flatten(),
      );
    }

    try {
      const store = storeFor(sessionId);
      if (!(await store.exists())) {
        return apiError(c, "SESSION_NOT_FOUND", `session ${sessionId} does not exist`);
      }
      const envelope = await store.load();
      return c.json({
        sessionId,
        iteration: envelope.iteration,
        tournamentMatches: envelope.statistics.tournamentMatches,
        entries: buildLeaderboard(envelope, query.data.limit),
      });
    } catch (err) {
      return handleError(c, err);
    }
  });

  // -------------------------------------------------------------------------
  // GET /:id/graph -- Similarity edges and clusters
  // -------------------------------------------------------------------------

  routes.get("/:id/graph", async (c) => {
    const sessionId = c.req.param("id");
    const query = graphQuerySchema.safeParse(c.req.query());
    if (!isValidSessionId(sessionId) || !query.success) {
      return apiError(
        c,
        "VALIDATION_FAILED",
        query.success ? `invalid session id "${sessionId}"` : query.error.flatten(),
      );
    }

    try {
      const store = storeFor(sessionId);
      if (!(await store.exists())) {
        return apiError(c, "SESSION_NOT_FOUND", `session ${sessionId} does not exist`);
      }
      return c.json({ sessionId, ...buildGraphView(await store.load(), query.data.threshold) });
    } catch (err) {
      return handleError(c, err);
    }
  });

  return routes;
}
