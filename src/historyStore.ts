import { randomUUID } from "crypto";
import { parseISO } from "date-fns";
import { byId, decodeRow, DocumentDatabase, goalRowSchema, sessionRowSchema, sessionToRow, thoughtRowSchema, thoughtToRow } from "./dataStore";
import { InvalidStateError, NotFoundError } from "./errors";
import { PomodoroSession, SessionQuery, Thought, ThoughtQuery } from "./types";
import { normalizeThoughtText } from "./validation";

export const DEFAULT_THOUGHT_LIMIT = 10;

/** Completed focus sessions. Rows are never updated once written. */
export class SessionHistory {
  constructor(private readonly db: DocumentDatabase) {}

  async add(session: PomodoroSession) {
    await this.db.transact((table) => table("sessions").insert(sessionToRow(session)));
    return session;
  }

  async list(query: SessionQuery = {}) {
    const sessions = await this.db.read((table) => table("sessions").all().map((doc) => decodeRow(sessionRowSchema, doc, this.db.filePath)));
    return query.goalId === undefined ? sessions : sessions.filter((session) => session.goalId === query.goalId);
  }
}

export class ThoughtLog {
  constructor(private readonly db: DocumentDatabase, private readonly now: () => Date) {}

  async add(thought: Thought) {
    await this.db.transact((table) => table("thoughts").insert(thoughtToRow(thought)));
    return thought;
  }

  /** Records a new thought; an attached goal must exist and not be archived. */
  async jot(text: string, goalId: string | null = null) {
    const normalized = normalizeThoughtText(text);
    return this.db.transact((table) => {
      if (goalId !== null) {
        const doc = table("goals").find(byId(goalId));
        if (!doc) throw new NotFoundError(`Goal ${goalId} not found`);
        if (decodeRow(goalRowSchema, doc, this.db.filePath).archived) throw new InvalidStateError(`Goal ${goalId} is archived`);
      }
      const thought: Thought = { id: `th_${randomUUID()}`, text: normalized, timestamp: this.now().toISOString(), goalId };
      table("thoughts").insert(thoughtToRow(thought));
      return thought;
    });
  }

  /** Sorted by timestamp first, then cut to `limit` (default 10, `null` for everything). */
  async list(query: ThoughtQuery = {}) {
    const { goalId, limit = DEFAULT_THOUGHT_LIMIT, newestFirst = true } = query;
    const thoughts = await this.db.read((table) => table("thoughts").all().map((doc) => decodeRow(thoughtRowSchema, doc, this.db.filePath)));
    const direction = newestFirst ? -1 : 1;
    const sorted = thoughts
      .filter((thought) => goalId === undefined || thought.goalId === goalId)
      .sort((a, b) => direction * (parseISO(a.timestamp).getTime() - parseISO(b.timestamp).getTime()));
    return limit === null ? sorted : sorted.slice(0, Math.max(limit, 0));
  }

  async remove(id: string) {
    await this.db.transact((table) => {
      if (!table("thoughts").remove(byId(id))) throw new NotFoundError(`Thought ${id} not found`);
    });
  }
}
