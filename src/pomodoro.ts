import { randomUUID } from "crypto";
import { AppContext, SessionContext } from "./context";
import { InvalidStateError, ValidationError } from "./errors";
import { liveElapsed } from "./sessionState";
import { formatDuration } from "./time";
import { ActiveSession, PomodoroSession, SessionStatus } from "./types";

export interface StartOptions {
  durationMin?: number;
  goalId?: string | null;
}

function requireActive(current: ActiveSession | null) {
  if (!current) throw new InvalidStateError("No active session");
  return current;
}

/**
 * Starts a new timer. An existing active session is replaced, not rejected;
 * the replaced one is dropped without a history record.
 */
export async function startSession(ctx: SessionContext, options: StartOptions = {}) {
  const durationMin = options.durationMin ?? ctx.settings.pomoDurationMin;
  if (!Number.isInteger(durationMin) || durationMin < 1) throw new ValidationError("Duration must be a positive whole number of minutes");
  const { session, replaced } = await ctx.sessionFile.transition((current) => {
    const startedAt = ctx.now().toISOString();
    const next: ActiveSession = {
      goalId: options.goalId ?? null,
      start: startedAt,
      durationSec: durationMin * 60,
      elapsedSec: 0,
      paused: false,
      lastStart: startedAt
    };
    return { next, result: { session: next, replaced: current } };
  });
  if (replaced) ctx.logger.warn(`replaced active session started at ${replaced.start}`);
  ctx.logger.debug(`started ${durationMin}m session${session.goalId ? ` for ${session.goalId}` : ""}`);
  await ctx.hooks.emitNewSession(session);
  return session;
}

export async function pauseSession(ctx: SessionContext) {
  const paused = await ctx.sessionFile.transition((current) => {
    const session = requireActive(current);
    if (session.paused) throw new InvalidStateError("Session already paused");
    const next: ActiveSession = { ...session, elapsedSec: liveElapsed(session, ctx.now()), paused: true, lastStart: null };
    return { next, result: next };
  });
  ctx.logger.debug(`paused at ${formatDuration(paused.elapsedSec)}`);
  return paused;
}

export async function resumeSession(ctx: SessionContext) {
  const resumed = await ctx.sessionFile.transition((current) => {
    const session = requireActive(current);
    if (!session.paused) throw new InvalidStateError("Session is not paused");
    const next: ActiveSession = { ...session, paused: false, lastStart: ctx.now().toISOString() };
    return { next, result: next };
  });
  ctx.logger.debug(`resumed at ${formatDuration(resumed.elapsedSec)}`);
  return resumed;
}

/** Removes the session file and returns the record with the final folded state. */
async function closeSession(ctx: SessionContext) {
  const closed = await ctx.sessionFile.transition((current) => {
    const session = requireActive(current);
    const now = ctx.now();
    const final: ActiveSession = session.paused
      ? session
      : { ...session, elapsedSec: liveElapsed(session, now), lastStart: now.toISOString() };
    const record: PomodoroSession = { id: `s_${randomUUID()}`, goalId: session.goalId, start: session.start, durationSec: session.durationSec };
    return { next: null, result: { record, final } };
  });
  ctx.logger.debug(`stopped after ${formatDuration(closed.final.elapsedSec)} focused`);
  return closed;
}

/**
 * Ends the active session and removes its file. The record carries the
 * planned duration, not the focused time; listeners get both.
 */
export async function stopSession(ctx: SessionContext): Promise<PomodoroSession> {
  const { record, final } = await closeSession(ctx);
  await ctx.hooks.emitSessionEnd(record, final);
  return record;
}

export const loadActiveSession = (ctx: Pick<SessionContext, "sessionFile">) => ctx.sessionFile.load();

export async function sessionStatus(ctx: Pick<SessionContext, "sessionFile" | "now">): Promise<SessionStatus> {
  const session = await ctx.sessionFile.load();
  if (!session) return { state: "absent" };
  const elapsedSec = liveElapsed(session, ctx.now());
  return { state: session.paused ? "paused" : "running", session, elapsedSec, remainingSec: Math.max(session.durationSec - elapsedSec, 0) };
}

/** Stops the timer and appends the finished session to history before end listeners run. */
export async function finishSession(ctx: SessionContext & Pick<AppContext, "storage">) {
  const { record, final } = await closeSession(ctx);
  await ctx.storage.sessions.add(record);
  await ctx.hooks.emitSessionEnd(record, final);
  return record;
}
