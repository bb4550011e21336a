import { Hono } from "hono";
import { globalErrorHandler, notFoundHandler } from "./middleware/error-handler.ts";
import { healthRoutes } from "./routes/health.ts";
import { createSessionRoutes, type SessionRouteOptions } from "./routes/sessions.ts";

/**
 * Build the HTTP app. Options are passed through to the session routes so
 * tests can swap in an in-memory backend and a scripted generator.
 */
export function createApp(options: SessionRouteOptions = {}) {
  const app = new Hono();

  app.onError(globalErrorHandler);
  app.notFound(notFoundHandler);

  // Health check (public)
  app.route("/health", healthRoutes);

  // Research sessions
  app.route("/api/v1/sessions", createSessionRoutes(options));

  return app;
}

const app = createApp();

export default app;
