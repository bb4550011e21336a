import { serve } from "@hono/node-server";
import app from "./app.ts";
import { env } from "./config/env.ts";

// Start server
serve(
  {
    fetch: app.fetch,
    port: env.PORT,
  },
  (info) => {
    console.log(
      `Hypothesis Lab API listening on port ${info.port} (store: ${env.STORE_BACKEND}, planner: ${env.PLANNER})`
    );
  }
);
