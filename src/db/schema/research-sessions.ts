/**
 * Research Sessions Schema
 *
 * One row per research session. The whole envelope (hypotheses, reviews,
 * ratings, similarity edges, step states) is stored as a single jsonb
 * document so every step commits with one write.
 */

import { pgTable, text, integer, jsonb, timestamp } from "drizzle-orm/pg-core";

export const researchSessions = pgTable("research_sessions", {
  /** Caller-supplied session identifier */
  sessionId: text("session_id").primaryKey(),

  /** The research goal, duplicated out of the envelope for listing */
  researchGoal: text("research_goal").notNull().default(""),

  /** Completed meta-review iterations, duplicated out of the envelope */
  iteration: integer("iteration").notNull().default(0),

  /** The serialized session envelope */
  envelope: jsonb("envelope").notNull(),

  createdAt: timestamp("created_at").defaultNow().notNull(),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
});
