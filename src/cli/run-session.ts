/**
 * Research Session CLI
 *
 * Runs orchestration rounds for one session from the terminal, then prints
 * the leaderboard and the latest research overview.
 *
 * Usage:
 *   npm run run-session -- --goal "Why do some bacteria survive antibiotics?"
 *   npm run run-session -- --session my-session --rounds 5
 *   npm run run-session -- --session my-session --planner fallback
 */

import { parseArgs } from "node:util";
import { runResearchSession } from "../agents/orchestrator.ts";
import { createTextGenerator } from "../agents/text-generator.ts";
import { env } from "../config/env.ts";
import { errorMessage } from "../lib/errors.ts";
import { createRecordStore } from "../services/record-store.ts";
import { buildLeaderboard, latestOverview } from "../services/session-view.ts";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function print(msg: string) {
  console.log(msg);
}

function printHeader(title: string) {
  print("");
  print("=".repeat(60));
  print(`  ${title}`);
  print("=".repeat(60));
  print("");
}

function usage(): never {
  print("Usage: run-session [--goal <text>] [--session <id>] [--rounds <n>] [--planner llm|fallback]");
  process.exit(1);
}

function parseRounds(raw: string | undefined): number {
  if (raw === undefined) return env.MAX_ROUNDS;
  const rounds = Number.parseInt(raw, 10);
  if (!Number.isInteger(rounds) || rounds < 1) {
    print(`--rounds must be a positive integer (got "${raw}")`);
    usage();
  }
  return rounds;
}

function parsePlanner(raw: string | undefined): "llm" | "fallback" {
  if (raw === undefined) return env.PLANNER;
  if (raw !== "llm" && raw !== "fallback") {
    print(`--planner must be "llm" or "fallback" (got "${raw}")`);
    usage();
  }
  return raw;
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

async function main() {
  const { values } = parseArgs({
    options: {
      goal: { type: "string", short: "g" },
      session: { type: "string", short: "s" },
      rounds: { type: "string", short: "r" },
      planner: { type: "string" },
      help: { type: "boolean", short: "h" },
    },
  });

  if (values.help) usage();

  const sessionId = values.session ?? `session_${Date.now()}`;
  const maxRounds = parseRounds(values.rounds);
  const planner = parsePlanner(values.planner);
  const store = createRecordStore(sessionId);

  if (!(await store.getResearchGoal()) && !values.goal) {
    print(`Session ${sessionId} has no research goal; pass --goal.`);
    usage();
  }

  printHeader(`Session ${sessionId}`);
  print(`  Provider: ${env.LLM_PROVIDER}   Planner: ${planner}   Rounds: ${maxRounds}`);

  const result = await runResearchSession({
    store,
    generator: createTextGenerator(),
    planner,
    maxRounds,
    researchGoal: values.goal,
  });

  for (const round of result.rounds) {
    print("");
    print(`  Round ${round.round} (${round.planSource}): ${round.plannedSteps.join(" -> ") || "(empty)"}`);
    for (const step of round.steps) {
      const detail = step.status === "completed" ? step.summary : step.error;
      print(`    [${step.status === "completed" ? "OK" : "FAIL"}] ${step.step}: ${detail ?? ""}`);
    }
  }

  const envelope = await store.load();

  printHeader("Leaderboard");
  const entries = buildLeaderboard(envelope, 10);
  if (entries.length === 0) print("  No hypotheses yet.");
  for (const entry of entries) {
    print(`  ${String(entry.rank).padStart(2)}. ${entry.rating.toFixed(1).padStart(7)}  ${entry.title}`);
  }

  printHeader("Research Overview");
  const overview = latestOverview(envelope);
  if (!overview) {
    print("  No overview yet. Run more rounds to reach a meta-review.");
  } else {
    print(overview.overview);
    if (overview.researchDirections.length > 0) {
      print("");
      print("  Research directions:");
      for (const direction of overview.researchDirections) print(`    - ${direction}`);
    }
  }

  print("");
  print(
    `  Stopped: ${result.stopReason} after ${result.roundsCompleted} rounds; iteration ${result.iteration}`,
  );
}

main().catch((err) => {
  console.error(`[RunSession] ${errorMessage(err)}`);
  process.exitCode = 1;
});
