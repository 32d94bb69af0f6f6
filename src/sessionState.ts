import { z } from "zod";
import { CorruptDataError } from "./errors";
import { readJsonFile, removeFile, withLock, writeJsonAtomic } from "./lockedFile";
import { secondsBetween } from "./time";
import { ActiveSession } from "./types";

// Files written before pause support lack the last three fields; they are
// defaulted in memory and only rewritten by the next transition.
const sessionFileSchema = z.object({
  start: z.string(),
  duration_sec: z.number().int(),
  goal_id: z.string().nullable().optional(),
  elapsed_sec: z.number().int().optional(),
  paused: z.boolean().optional(),
  last_start: z.string().nullable().optional()
}).transform((raw): ActiveSession => ({
  goalId: raw.goal_id ?? null,
  start: raw.start,
  durationSec: raw.duration_sec,
  elapsedSec: raw.elapsed_sec ?? 0,
  paused: raw.paused ?? false,
  lastStart: raw.last_start === undefined ? raw.start : raw.last_start
}));

const toFileData = (session: ActiveSession) => ({
  start: session.start,
  duration_sec: session.durationSec,
  goal_id: session.goalId,
  elapsed_sec: session.elapsedSec,
  paused: session.paused,
  last_start: session.lastStart
});

/** Accumulated seconds plus the running interval, if any. */
export function liveElapsed(session: ActiveSession, now: Date) {
  return session.elapsedSec + (!session.paused && session.lastStart ? secondsBetween(session.lastStart, now) : 0);
}

export interface Transition<T> {
  next: ActiveSession | null;
  result: T;
}

/** The single active session, present exactly while its file exists. */
export class SessionStateFile {
  constructor(readonly filePath: string) {}

  load() {
    return withLock(this.filePath, () => this.read());
  }

  /** One locked read-modify-write. `next: null` removes the file. */
  transition<T>(fn: (current: ActiveSession | null) => Transition<T>): Promise<T> {
    return withLock(this.filePath, async () => {
      const { next, result } = fn(await this.read());
      if (next) await writeJsonAtomic(this.filePath, toFileData(next));
      else await removeFile(this.filePath);
      return result;
    });
  }

  private async read() {
    const raw = await readJsonFile(this.filePath);
    if (raw === undefined) return null;
    const parsed = sessionFileSchema.safeParse(raw);
    if (!parsed.success) throw new CorruptDataError(this.filePath, parsed.error);
    return parsed.data;
  }
}
