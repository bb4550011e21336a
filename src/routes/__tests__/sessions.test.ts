/**
 * Session API Tests
 *
 * Drives the HTTP app in process with an in-memory backend and a scripted
 * text generator. Runs use the fallback planner.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createApp } from "../../app.ts";
import { ScriptedTextGenerator } from "../../services/__tests__/helpers.ts";
import { acquireSessionLock, forceReleaseAllSessionLocks } from "../../services/session-lock.ts";
import { InMemoryEnvelopeBackend } from "../../services/store-backends.ts";

function scriptedGenerator(): ScriptedTextGenerator {
  return new ScriptedTextGenerator([
    {
      system: /generate novel/,
      reply:
        "Hypothesis 1: Gut microbes modulate sleep\nMicrobial metabolites reach the brainstem.\n\nHypothesis 2: Light resets immune clocks\nRetinal input entrains immune cells.",
    },
    {
      system: /critically review/,
      reply: [
        "Hypothesis 1",
        "Scientific Merit: 8/10",
        "Novelty: 6/10",
        "Testability: 7/10",
        "Impact: 9/10",
        "Limitations: 5/10",
        "Recommendation: Accept",
        "",
        "Hypothesis 2",
        "Scientific Merit: 4/10",
        "Novelty: 4/10",
        "Testability: 4/10",
        "Impact: 4/10",
        "Limitations: 4/10",
        "Recommendation: Reject",
      ].join("\n"),
    },
    { system: /judge scientific debates/, reply: "WINNER: A\nCONFIDENCE: 100" },
  ]);
}

function jsonRequest(body: unknown): RequestInit {
  return {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: typeof body === "string" ? body : JSON.stringify(body),
  };
}

describe("Session Routes", () => {
  let app: ReturnType<typeof createApp>;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    app = createApp({
      backend: new InMemoryEnvelopeBackend(),
      generator: scriptedGenerator(),
      planner: "fallback",
      random: () => 0,
    });
  });

  afterEach(() => {
    forceReleaseAllSessionLocks();
    vi.restoreAllMocks();
  });

  const createSession = () =>
    app.request("/api/v1/sessions", jsonRequest({ researchGoal: " Why do we sleep? ", sessionId: "s-1" }));

  // -------------------------------------------------------------------------
  // Create
  // -------------------------------------------------------------------------

  describe("POST /api/v1/sessions", () => {
    it("should create a session with a trimmed goal", async () => {
      const res = await createSession();
      expect(res.status).toBe(201);

      const body = await res.json();
      expect(body).toMatchObject({
        sessionId: "s-1",
        researchGoal: "Why do we sleep?",
        iteration: 0,
        rounds: 0,
        hypotheses: { total: 0, active: 0, superseded: 0 },
        topHypothesis: null,
        overview: null,
      });
    });

    it("should refuse an existing session id", async () => {
      await createSession();
      const res = await createSession();

      expect(res.status).toBe(409);
      expect(await res.json()).toEqual({
        error: "session_exists",
        code: "session_exists",
        details: "session s-1 already exists",
      });
    });

    it("should reject a blank research goal", async () => {
      const res = await app.request("/api/v1/sessions", jsonRequest({ researchGoal: "   " }));

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ code: "validation_failed" });
    });

    it("should reject a body that is not JSON", async () => {
      const res = await app.request("/api/v1/sessions", jsonRequest("{"));

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: "invalid_json",
        code: "invalid_json",
        details: "Request body must be valid JSON",
      });
    });
  });

  // -------------------------------------------------------------------------
  // Read
  // -------------------------------------------------------------------------

  describe("GET /api/v1/sessions/:id", () => {
    it("should return 404 for an unknown session", async () => {
      const res = await app.request("/api/v1/sessions/nope");

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({
        error: "session_not_found",
        code: "session_not_found",
        details: "session nope does not exist",
      });
    });

    it("should report whether a run holds the session", async () => {
      await createSession();
      const idle = await (await app.request("/api/v1/sessions/s-1")).json();
      expect(idle).toMatchObject({ running: false });

      acquireSessionLock("s-1", "cli run");
      const busy = await (await app.request("/api/v1/sessions/s-1")).json();
      expect(busy).toMatchObject({ running: true });
    });

    it("should reject an id outside the allowed alphabet", async () => {
      const res = await app.request("/api/v1/sessions/bad.id");

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: "validation_failed",
        code: "validation_failed",
        details: 'invalid session id "bad.id"',
      });
    });
  });

  // -------------------------------------------------------------------------
  // Run
  // -------------------------------------------------------------------------

  describe("POST /api/v1/sessions/:id/run", () => {
    it("should run the requested rounds and expose the results", async () => {
      await createSession();

      const run = await app.request("/api/v1/sessions/s-1/run", jsonRequest({ rounds: 1 }));
      expect(run.status).toBe(200);
      expect(await run.json()).toMatchObject({
        sessionId: "s-1",
        stopReason: "round_cap",
        roundsCompleted: 1,
        iteration: 0,
      });

      const leaderboard = await app.request("/api/v1/sessions/s-1/leaderboard");
      expect(await leaderboard.json()).toMatchObject({
        sessionId: "s-1",
        iteration: 0,
        tournamentMatches: 1,
        entries: [
          { rank: 1, title: "Gut microbes modulate sleep", rating: 1516, reviewCount: 1, averageScore: 7 },
          { rank: 2, title: "Light resets immune clocks", rating: 1484, reviewCount: 1, averageScore: 4 },
        ],
      });

      const limited = await app.request("/api/v1/sessions/s-1/leaderboard?limit=1");
      expect(await limited.json()).toMatchObject({
        entries: [{ rank: 1, title: "Gut microbes modulate sleep" }],
      });

      const graph = await app.request("/api/v1/sessions/s-1/graph");
      expect(await graph.json()).toMatchObject({
        sessionId: "s-1",
        nodes: [{ title: "Gut microbes modulate sleep" }, { title: "Light resets immune clocks" }],
        edges: [],
        clusters: [{ cohesion: 0 }, { cohesion: 0 }],
      });

      const summary = await (await app.request("/api/v1/sessions/s-1")).json();
      expect(summary).toMatchObject({
        rounds: 1,
        reviews: 2,
        hypotheses: { total: 2, active: 2, superseded: 0 },
        topHypothesis: { title: "Gut microbes modulate sleep" },
      });
    });

    it("should accept an empty body", async () => {
      await createSession();

      const res = await app.request("/api/v1/sessions/s-1/run", { method: "POST" });

      expect(res.status).toBe(200);
    });

    it("should reject a round count out of range", async () => {
      await createSession();

      const res = await app.request("/api/v1/sessions/s-1/run", jsonRequest({ rounds: 0 }));

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ code: "validation_failed" });
    });

    it("should return 404 when running an unknown session", async () => {
      const res = await app.request("/api/v1/sessions/ghost/run", jsonRequest({ rounds: 1 }));
      expect(res.status).toBe(404);
    });

    it("should refuse a run while the session is busy", async () => {
      await createSession();
      acquireSessionLock("s-1", "cli run");

      const res = await app.request("/api/v1/sessions/s-1/run", jsonRequest({ rounds: 1 }));

      expect(res.status).toBe(409);
      expect(await res.json()).toEqual({
        error: "session_busy",
        code: "session_busy",
        details: "session s-1 is already running",
      });
    });
  });

  // -------------------------------------------------------------------------
  // App-level handlers
  // -------------------------------------------------------------------------

  it("should answer unknown routes with a structured 404", async () => {
    const res = await app.request("/nowhere");

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "Route GET /nowhere not found", code: "not_found", status: 404 });
  });

  it("should report health", async () => {
    const res = await app.request("/health");

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: "ok", activeRuns: 0 });
  });
});
