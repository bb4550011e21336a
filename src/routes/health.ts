import { Hono } from "hono";
import { env } from "../config/env.ts";
import { getDefaultBackend } from "../services/record-store.ts";
import { activeSessionLockCount } from "../services/session-lock.ts";

const healthRoutes = new Hono();

/** Track server start time for uptime calculation */
const serverStartTime = Date.now();

/**
 * GET /health - Liveness and configuration summary
 *
 * Returns:
 * - status: always "ok" once the process is serving
 * - uptime: milliseconds since server start
 * - store: the configured envelope backend
 * - llm: provider and whether its API key is present
 * - activeRuns: sessions currently holding a run lock
 */
healthRoutes.get("/", (c) => {
  const apiKey = env.LLM_PROVIDER === "anthropic" ? env.ANTHROPIC_API_KEY : env.OPENAI_API_KEY;

  return c.json({
    status: "ok",
    uptime: Date.now() - serverStartTime,
    store: getDefaultBackend().kind,
    llm: {
      provider: env.LLM_PROVIDER,
      configured: Boolean(apiKey),
    },
    activeRuns: activeSessionLockCount(),
    timestamp: new Date().toISOString(),
  });
});

export { healthRoutes };
