/**
 * Session Lock Tests
 *
 * Validates the per-session run lock:
 * - Lock acquisition and release
 * - Mutual exclusion per session, independence across sessions
 * - TTL-based auto-expiry
 * - withSessionLock helper
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  acquireSessionLock,
  activeSessionLockCount,
  forceReleaseAllSessionLocks,
  getSessionLockStatus,
  releaseSessionLock,
  withSessionLock,
} from "../session-lock.ts";

describe("Session Lock", () => {
  beforeEach(() => {
    forceReleaseAllSessionLocks();
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  describe("acquireSessionLock / releaseSessionLock", () => {
    it("should acquire a fresh lock", () => {
      const result = acquireSessionLock("s1", "run-1");
      expect(result.acquired).toBe(true);
      expect(result.lockId).not.toBeNull();
      expect(result.existingLock).toBeNull();
    });

    it("should refuse a second holder of the same session", () => {
      acquireSessionLock("s1", "run-1");
      const second = acquireSessionLock("s1", "run-2");
      expect(second.acquired).toBe(false);
      expect(second.existingLock?.holderInfo).toBe("run-1");
    });

    it("should not block other sessions", () => {
      acquireSessionLock("s1", "run-1");
      expect(acquireSessionLock("s2", "run-2").acquired).toBe(true);
      expect(activeSessionLockCount()).toBe(2);
    });

    it("should only release for the current holder", () => {
      const first = acquireSessionLock("s1", "run-1");
      expect(releaseSessionLock("s1", "lock_wrong")).toBe(false);
      expect(getSessionLockStatus("s1").isLocked).toBe(true);

      expect(releaseSessionLock("s1", first.lockId ?? "")).toBe(true);
      expect(acquireSessionLock("s1", "run-2").acquired).toBe(true);
    });

    it("should auto-release an expired lock", () => {
      vi.useFakeTimers();
      acquireSessionLock("s1", "stuck-run", 1000);

      vi.advanceTimersByTime(1001);

      expect(getSessionLockStatus("s1")).toEqual({ isLocked: false, lock: null });
      expect(acquireSessionLock("s1", "run-2").acquired).toBe(true);
    });
  });

  describe("withSessionLock", () => {
    it("should return the callback result and release the lock", async () => {
      const locked = await withSessionLock("s1", "run-1", async () => ({ value: 42 }));
      expect(locked?.result).toEqual({ value: 42 });
      expect(getSessionLockStatus("s1").isLocked).toBe(false);
    });

    it("should release the lock when the callback throws", async () => {
      await expect(
        withSessionLock("s1", "run-1", async () => {
          throw new Error("boom");
        }),
      ).rejects.toThrow("boom");
      expect(getSessionLockStatus("s1").isLocked).toBe(false);
    });

    it("should return null while the session is held", async () => {
      acquireSessionLock("s1", "blocker");
      const fn = vi.fn(async () => "never");
      expect(await withSessionLock("s1", "run-2", fn)).toBeNull();
      expect(fn).not.toHaveBeenCalled();
    });
  });
});
