import { DocumentDatabase } from "./dataStore";
import { GoalStore } from "./goalStore";
import { SessionHistory, ThoughtLog } from "./historyStore";
import { Logger, silentLogger } from "./logger";

export interface StorageOptions {
  now?: () => Date;
  logger?: Logger;
}

export class Storage {
  private constructor(
    readonly db: DocumentDatabase,
    readonly goals: GoalStore,
    readonly sessions: SessionHistory,
    readonly thoughts: ThoughtLog
  ) {}

  /** Opens the database file at `dbPath` and migrates legacy goal rows before returning. */
  static async open(dbPath: string, options: StorageOptions = {}) {
    const now = options.now ?? (() => new Date());
    const db = new DocumentDatabase(dbPath);
    const goals = new GoalStore(db, now, options.logger ?? silentLogger);
    await goals.migrate();
    return new Storage(db, goals, new SessionHistory(db), new ThoughtLog(db, now));
  }
}
