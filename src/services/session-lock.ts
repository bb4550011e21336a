/**
 * Session Lock
 *
 * Keeps each research session to a single writer inside this process. A run
 * acquires the session's lock before its first load and releases it after
 * its last save; a second run of the same session is refused rather than
 * queued.
 *
 * Features:
 * - Mutual exclusion per session id; different sessions never block each other
 * - TTL-based auto-release so a crashed run cannot wedge a session forever
 * - Lock status reporting for the HTTP layer
 *
 * The lock is in-memory only. Two processes sharing one store directory or
 * database are not coordinated.
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SessionLockInfo {
  sessionId: string;
  lockId: string;
  acquiredAt: string;
  expiresAt: string;
  holderInfo: string;
}

export interface SessionLockAcquisition {
  acquired: boolean;
  lockId: string | null;
  /** If not acquired, info about who holds the lock */
  existingLock: SessionLockInfo | null;
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

/** Lock TTL in milliseconds (60 minutes) */
const LOCK_TTL_MS = 60 * 60 * 1000;

// ---------------------------------------------------------------------------
// In-Memory Lock State
// ---------------------------------------------------------------------------

interface HeldLock {
  lockId: string;
  acquiredAt: number;
  expiresAt: number;
  holderInfo: string;
}

const locks = new Map<string, HeldLock>();

function generateLockId(): string {
  return `lock_${Date.now()}_${Math.random().toString(36).slice(2, 8)}`;
}

function toInfo(sessionId: string, lock: HeldLock): SessionLockInfo {
  return {
    sessionId,
    lockId: lock.lockId,
    acquiredAt: new Date(lock.acquiredAt).toISOString(),
    expiresAt: new Date(lock.expiresAt).toISOString(),
    holderInfo: lock.holderInfo,
  };
}

/** Current unexpired lock for a session; expired ones are dropped. */
function liveLock(sessionId: string): HeldLock | null {
  const lock = locks.get(sessionId);
  if (!lock) return null;
  if (Date.now() > lock.expiresAt) {
    console.log(`[SessionLock] Lock ${lock.lockId} on ${sessionId} expired, auto-releasing`);
    locks.delete(sessionId);
    return null;
  }
  return lock;
}

// ---------------------------------------------------------------------------
// Core Lock Operations
// ---------------------------------------------------------------------------

/**
 * Attempt to acquire a session's lock.
 *
 * Returns `{ acquired: true, lockId }` if successful.
 * Returns `{ acquired: false, existingLock }` if another run holds it.
 */
export function acquireSessionLock(
  sessionId: string,
  holderInfo: string,
  ttlMs: number = LOCK_TTL_MS,
): SessionLockAcquisition {
  const existing = liveLock(sessionId);
  if (existing) {
    console.log(
      `[SessionLock] ${sessionId} already held by "${existing.holderInfo}". Refusing "${holderInfo}".`,
    );
    return { acquired: false, lockId: null, existingLock: toInfo(sessionId, existing) };
  }

  const now = Date.now();
  const lock: HeldLock = {
    lockId: generateLockId(),
    acquiredAt: now,
    expiresAt: now + ttlMs,
    holderInfo,
  };
  locks.set(sessionId, lock);

  return { acquired: true, lockId: lock.lockId, existingLock: null };
}

/**
 * Release a session's lock. Only the holder (matching lockId) can release.
 */
export function releaseSessionLock(sessionId: string, lockId: string): boolean {
  const lock = locks.get(sessionId);
  if (!lock || lock.lockId !== lockId) {
    console.warn(
      `[SessionLock] Cannot release ${lockId} on ${sessionId}: not the current holder`,
    );
    return false;
  }
  locks.delete(sessionId);
  return true;
}

/**
 * Drop every lock. Test and shutdown use only.
 */
export function forceReleaseAllSessionLocks(): number {
  const count = locks.size;
  locks.clear();
  return count;
}

export function getSessionLockStatus(sessionId: string): {
  isLocked: boolean;
  lock: SessionLockInfo | null;
} {
  const lock = liveLock(sessionId);
  return lock
    ? { isLocked: true, lock: toInfo(sessionId, lock) }
    : { isLocked: false, lock: null };
}

/** Number of sessions with an unexpired lock. */
export function activeSessionLockCount(): number {
  let count = 0;
  for (const sessionId of [...locks.keys()]) {
    if (liveLock(sessionId)) count++;
  }
  return count;
}

// ---------------------------------------------------------------------------
// Higher-Level Helpers
// ---------------------------------------------------------------------------

/**
 * Execute a function while holding a session's lock.
 *
 * The lock is released after execution even if the function throws.
 * Returns null if the lock could not be acquired.
 */
export async function withSessionLock<T>(
  sessionId: string,
  holderInfo: string,
  fn: () => Promise<T>,
): Promise<{ result: T; lockId: string } | null> {
  const acquisition = acquireSessionLock(sessionId, holderInfo);

  if (!acquisition.acquired || !acquisition.lockId) {
    return null;
  }

  const lockId = acquisition.lockId;

  try {
    const result = await fn();
    return { result, lockId };
  } finally {
    releaseSessionLock(sessionId, lockId);
  }
}
