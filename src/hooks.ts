import { ActiveSession, PomodoroSession } from "./types";

export type NewSessionListener = (session: ActiveSession) => void | Promise<void>;
export type SessionEndListener = (record: PomodoroSession, final: ActiveSession) => void | Promise<void>;

/**
 * Listeners for timer events, owned by one context. Consumers use these to
 * cancel stale reminders on start and schedule break reminders on stop.
 */
export class SessionHooks {
  private readonly newSession = new Set<NewSessionListener>();
  private readonly sessionEnd = new Set<SessionEndListener>();

  onNewSession(listener: NewSessionListener) {
    this.newSession.add(listener);
    return () => { this.newSession.delete(listener); };
  }

  onSessionEnd(listener: SessionEndListener) {
    this.sessionEnd.add(listener);
    return () => { this.sessionEnd.delete(listener); };
  }

  async emitNewSession(session: ActiveSession) {
    for (const listener of [...this.newSession]) await listener(session);
  }

  async emitSessionEnd(record: PomodoroSession, final: ActiveSession) {
    for (const listener of [...this.sessionEnd]) await listener(record, final);
  }
}
