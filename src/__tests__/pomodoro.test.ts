import fs from "fs/promises";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { InvalidStateError, ValidationError } from "../errors";
import { withLock } from "../lockedFile";
import { finishSession, loadActiveSession, pauseSession, resumeSession, sessionStatus, startSession, stopSession } from "../pomodoro";
import { Storage } from "../storage";
import { exists, FakeClock, makeTempDir, readJson, removeTempDirs, sessionContext } from "./helpers";

const T0 = "2026-01-05T09:00:00.000Z";

describe("pomodoro lifecycle", () => {
  let dir: string;
  let clock: FakeClock;

  beforeEach(async () => {
    dir = await makeTempDir();
    clock = new FakeClock(T0);
  });

  afterEach(removeTempDirs);

  it("runs start, pause, resume and stop with the nominal duration on the record", async () => {
    const ctx = sessionContext(dir, clock);
    const ended = vi.fn();
    ctx.hooks.onSessionEnd(ended);

    await startSession(ctx, { durationMin: 25, goalId: "g1" });
    expect(await sessionStatus(ctx)).toMatchObject({ state: "running", elapsedSec: 0, remainingSec: 1500 });

    clock.advance(300);
    const paused = await pauseSession(ctx);
    expect(paused).toMatchObject({ elapsedSec: 300, paused: true, lastStart: null });

    await resumeSession(ctx);
    clock.advance(200);
    const record = await stopSession(ctx);

    expect(record).toMatchObject({ goalId: "g1", start: T0, durationSec: 1500 });
    expect(record.id).toMatch(/^s_/);
    expect(await exists(ctx.sessionFile.filePath)).toBe(false);
    expect(ended).toHaveBeenCalledTimes(1);
    expect(ended.mock.calls[0][1]).toMatchObject({ elapsedSec: 500, paused: false });
  });

  it("writes the session file in its documented shape", async () => {
    const ctx = sessionContext(dir, clock);
    await startSession(ctx, { durationMin: 1 });
    expect(await readJson(path.join(dir, "session.json"))).toEqual({
      start: T0,
      duration_sec: 60,
      goal_id: null,
      elapsed_sec: 0,
      paused: false,
      last_start: T0
    });

    clock.advance(30);
    await pauseSession(ctx);
    expect(await readJson(path.join(dir, "session.json"))).toEqual({
      start: T0,
      duration_sec: 60,
      goal_id: null,
      elapsed_sec: 30,
      paused: true,
      last_start: null
    });
  });

  it("rejects transitions that the current state does not allow", async () => {
    const ctx = sessionContext(dir, clock);
    await expect(stopSession(ctx)).rejects.toThrow(new InvalidStateError("No active session"));
    await expect(pauseSession(ctx)).rejects.toThrow("No active session");
    await expect(resumeSession(ctx)).rejects.toThrow("No active session");

    await startSession(ctx);
    await expect(resumeSession(ctx)).rejects.toThrow(new InvalidStateError("Session is not paused"));
    await pauseSession(ctx);
    await expect(pauseSession(ctx)).rejects.toThrow(new InvalidStateError("Session already paused"));
  });

  it("accumulates only running time across pause and resume cycles", async () => {
    const ctx = sessionContext(dir, clock);
    await startSession(ctx, { durationMin: 60 });
    const running = [10, 45, 5];
    const pausedGaps = [100, 7, 3600];
    let expected = 0;
    for (const [index, seconds] of running.entries()) {
      clock.advance(seconds);
      expected += seconds;
      expect((await pauseSession(ctx)).elapsedSec).toBe(expected);
      clock.advance(pausedGaps[index]);
      expect(await sessionStatus(ctx)).toMatchObject({ state: "paused", elapsedSec: expected });
      await resumeSession(ctx);
    }
    expect((await loadActiveSession(ctx))?.elapsedSec).toBe(60);
  });

  it("truncates partial seconds", async () => {
    const ctx = sessionContext(dir, clock);
    await startSession(ctx);
    clock.advance(59.9);
    expect((await pauseSession(ctx)).elapsedSec).toBe(59);
  });

  it("floors the remaining time at zero", async () => {
    const ctx = sessionContext(dir, clock);
    await startSession(ctx, { durationMin: 1 });
    clock.advance(90);
    expect(await sessionStatus(ctx)).toMatchObject({ state: "running", elapsedSec: 90, remainingSec: 0 });
  });

  it("reports absence when no session file exists", async () => {
    const ctx = sessionContext(dir, clock);
    expect(await sessionStatus(ctx)).toEqual({ state: "absent" });
    expect(await loadActiveSession(ctx)).toBeNull();
  });

  it("reads legacy session files with defaults and leaves them untouched", async () => {
    const ctx = sessionContext(dir, clock);
    const legacy = JSON.stringify({ start: T0, duration_sec: 600, goal_id: null });
    await fs.writeFile(ctx.sessionFile.filePath, legacy, "utf-8");

    expect(await loadActiveSession(ctx)).toEqual({ goalId: null, start: T0, durationSec: 600, elapsedSec: 0, paused: false, lastStart: T0 });
    clock.advance(120);
    expect(await sessionStatus(ctx)).toMatchObject({ state: "running", elapsedSec: 120, remainingSec: 480 });
    expect(await fs.readFile(ctx.sessionFile.filePath, "utf-8")).toBe(legacy);
  });

  it("replaces an active session when started again", async () => {
    const ctx = sessionContext(dir, clock);
    await startSession(ctx, { durationMin: 25, goalId: "a" });
    clock.advance(60);
    await startSession(ctx, { durationMin: 10, goalId: "b" });

    expect(await loadActiveSession(ctx)).toEqual({
      goalId: "b",
      start: "2026-01-05T09:01:00.000Z",
      durationSec: 600,
      elapsedSec: 0,
      paused: false,
      lastStart: "2026-01-05T09:01:00.000Z"
    });
    expect(ctx.logger.warn).toHaveBeenCalledWith(`replaced active session started at ${T0}`);
  });

  it("takes the default duration from settings and validates explicit ones", async () => {
    const ctx = sessionContext(dir, clock, { pomoDurationMin: 50 });
    expect((await startSession(ctx)).durationSec).toBe(3000);
    await expect(startSession(ctx, { durationMin: 0 })).rejects.toThrow(ValidationError);
    await expect(startSession(ctx, { durationMin: 2.5 })).rejects.toThrow(ValidationError);
  });

  it("notifies new-session listeners until they unsubscribe", async () => {
    const ctx = sessionContext(dir, clock);
    const listener = vi.fn();
    const unsubscribe = ctx.hooks.onNewSession(listener);
    const first = await startSession(ctx);
    unsubscribe();
    await startSession(ctx);
    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith(first);
  });

  it("stops a paused session without adding more time", async () => {
    const ctx = sessionContext(dir, clock);
    const ended = vi.fn();
    ctx.hooks.onSessionEnd(ended);
    await startSession(ctx);
    clock.advance(40);
    await pauseSession(ctx);
    clock.advance(500);
    await stopSession(ctx);
    expect(ended.mock.calls[0][1]).toMatchObject({ elapsedSec: 40, paused: true, lastStart: null });
  });

  it("records the finished session in history", async () => {
    const storage = await Storage.open(path.join(dir, "db.json"), { now: clock.now });
    const ctx = { ...sessionContext(dir, clock), storage };
    await startSession(ctx, { durationMin: 25, goalId: "g1" });
    clock.advance(1500);
    const record = await finishSession(ctx);
    expect(await storage.sessions.list()).toEqual([record]);
    expect(record).toMatchObject({ goalId: "g1", start: T0, durationSec: 1500 });
  });

  it("keeps the history record when a session-end listener fails", async () => {
    const storage = await Storage.open(path.join(dir, "db.json"), { now: clock.now });
    const ctx = { ...sessionContext(dir, clock), storage };
    ctx.hooks.onSessionEnd(() => { throw new Error("reminder failed"); });
    await startSession(ctx, { goalId: "g1" });
    clock.advance(60);
    await expect(finishSession(ctx)).rejects.toThrow("reminder failed");
    expect(await storage.sessions.list()).toEqual([expect.objectContaining({ goalId: "g1", start: T0, durationSec: 1500 })]);
    expect(await exists(ctx.sessionFile.filePath)).toBe(false);
  });

  it("reads the clock only once the session lock is held", async () => {
    const ctx = sessionContext(dir, clock);
    await startSession(ctx);
    clock.advance(10);
    const pending = await withLock(ctx.sessionFile.filePath, async () => {
      const paused = pauseSession(ctx);
      clock.advance(20);
      return { paused };
    });
    expect((await pending.paused).elapsedSec).toBe(30);

    const resumed = await withLock(ctx.sessionFile.filePath, async () => {
      const resuming = resumeSession(ctx);
      clock.advance(5);
      return { resuming };
    });
    expect((await resumed.resuming).lastStart).toBe("2026-01-05T09:00:35.000Z");

    clock.advance(15);
    const ended = vi.fn();
    ctx.hooks.onSessionEnd(ended);
    const stopping = await withLock(ctx.sessionFile.filePath, async () => {
      const stopped = stopSession(ctx);
      clock.advance(7);
      return { stopped };
    });
    await stopping.stopped;
    expect(ended.mock.calls[0][1]).toMatchObject({ elapsedSec: 52, lastStart: "2026-01-05T09:00:57.000Z" });
  });
});
