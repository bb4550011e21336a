/**
 * Envelope Storage Backends
 *
 * A backend moves one serialized envelope per session id in and out of
 * durable storage. It knows nothing about the envelope's shape: validation
 * and corruption recovery live in the RecordStore.
 *
 * - file:     one pretty-printed JSON document per session (default)
 * - postgres: one row per session, envelope in a jsonb column
 * - memory:   process-local map, for tests and dry runs
 */

import { mkdir, readFile, rename, writeFile } from "fs/promises";
import { join } from "path";
import { eq } from "drizzle-orm";
import { researchSessions } from "../db/schema/research-sessions.ts";
import type { Database } from "../db/index.ts";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface EnvelopeBackend {
  readonly kind: "file" | "postgres" | "memory";
  /** Raw stored document, or null when the session has never been written */
  read(sessionId: string): Promise<unknown | null>;
  write(sessionId: string, envelope: Record<string, unknown>): Promise<void>;
  exists(sessionId: string): Promise<boolean>;
}

/** Session ids become file names, so keep them to a safe alphabet */
const SESSION_ID_PATTERN = /^[A-Za-z0-9_-]{1,128}$/;

export function isValidSessionId(sessionId: string): boolean {
  return SESSION_ID_PATTERN.test(sessionId);
}

function assertSessionId(sessionId: string): void {
  if (!isValidSessionId(sessionId)) {
    throw new Error(`validation_failed: invalid session id "${sessionId}"`);
  }
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

// ---------------------------------------------------------------------------
// File backend
// ---------------------------------------------------------------------------

export class FileEnvelopeBackend implements EnvelopeBackend {
  readonly kind = "file" as const;

  constructor(private readonly directory: string) {}

  pathFor(sessionId: string): string {
    assertSessionId(sessionId);
    return join(this.directory, `${sessionId}.json`);
  }

  /**
   * Returns the parsed document. Invalid JSON throws; the store treats that
   * the same way as any other unreadable document.
   */
  async read(sessionId: string): Promise<unknown | null> {
    let raw: string;
    try {
      raw = await readFile(this.pathFor(sessionId), "utf-8");
    } catch (err) {
      if (isMissingFile(err)) return null;
      throw err;
    }
    return JSON.parse(raw);
  }

  async write(sessionId: string, envelope: Record<string, unknown>): Promise<void> {
    const target = this.pathFor(sessionId);
    await mkdir(this.directory, { recursive: true });
    // Write-then-rename so a crash mid-write never leaves a truncated document
    const tmp = `${target}.${process.pid}.tmp`;
    await writeFile(tmp, JSON.stringify(envelope, null, 2), "utf-8");
    await rename(tmp, target);
  }

  async exists(sessionId: string): Promise<boolean> {
    try {
      await readFile(this.pathFor(sessionId), "utf-8");
      return true;
    } catch (err) {
      if (isMissingFile(err)) return false;
      throw err;
    }
  }
}

// ---------------------------------------------------------------------------
// Postgres backend
// ---------------------------------------------------------------------------

export class PostgresEnvelopeBackend implements EnvelopeBackend {
  readonly kind = "postgres" as const;

  constructor(private readonly getDb: () => Database) {}

  async read(sessionId: string): Promise<unknown | null> {
    const rows = await this.getDb()
      .select({ envelope: researchSessions.envelope })
      .from(researchSessions)
      .where(eq(researchSessions.sessionId, sessionId))
      .limit(1);
    return rows[0]?.envelope ?? null;
  }

  async write(sessionId: string, envelope: Record<string, unknown>): Promise<void> {
    const researchGoal = typeof envelope.researchGoal === "string" ? envelope.researchGoal : "";
    const iteration = typeof envelope.iteration === "number" ? envelope.iteration : 0;
    const now = new Date();

    await this.getDb()
      .insert(researchSessions)
      .values({ sessionId, researchGoal, iteration, envelope, updatedAt: now })
      .onConflictDoUpdate({
        target: researchSessions.sessionId,
        set: { researchGoal, iteration, envelope, updatedAt: now },
      });
  }

  async exists(sessionId: string): Promise<boolean> {
    const rows = await this.getDb()
      .select({ sessionId: researchSessions.sessionId })
      .from(researchSessions)
      .where(eq(researchSessions.sessionId, sessionId))
      .limit(1);
    return rows.length > 0;
  }
}

// ---------------------------------------------------------------------------
// In-memory backend
// ---------------------------------------------------------------------------

export class InMemoryEnvelopeBackend implements EnvelopeBackend {
  readonly kind = "memory" as const;

  /** Documents are held as JSON text so reads never alias a live object */
  private readonly documents = new Map<string, string>();

  async read(sessionId: string): Promise<unknown | null> {
    const raw = this.documents.get(sessionId);
    if (raw === undefined) return null;
    return JSON.parse(raw);
  }

  async write(sessionId: string, envelope: Record<string, unknown>): Promise<void> {
    this.documents.set(sessionId, JSON.stringify(envelope));
  }

  async exists(sessionId: string): Promise<boolean> {
    return this.documents.has(sessionId);
  }

  /** Overwrite the stored text verbatim (used to simulate corruption) */
  writeRaw(sessionId: string, raw: string): void {
    this.documents.set(sessionId, raw);
  }

  readRaw(sessionId: string): string | undefined {
    return this.documents.get(sessionId);
  }
}
