import { z } from "zod";
import { CorruptDataError } from "./errors";
import { readJsonFile, withLock, writeJsonAtomic } from "./lockedFile";
import { Goal, PomodoroSession, Thought } from "./types";

export type TableName = "goals" | "thoughts" | "sessions";
export type Document = Record<string, unknown>;
type Predicate = (doc: Document) => boolean;

const databaseSchema = z.record(z.string(), z.record(z.string(), z.record(z.string(), z.unknown())));
type DatabaseData = z.infer<typeof databaseSchema>;

export const prioritySchema = z.union([z.literal("low"), z.literal("medium"), z.literal("high")]);

export const goalRowSchema = z.object({
  id: z.string(),
  title: z.string(),
  created: z.string(),
  priority: prioritySchema.default("medium"),
  archived: z.boolean().default(false),
  tags: z.array(z.string()).default([]),
  parent_id: z.string().nullable().default(null),
  deadline: z.string().nullable().default(null),
  completed: z.boolean().default(false)
}).transform((row): Goal => ({
  id: row.id,
  title: row.title,
  created: row.created,
  priority: row.priority,
  archived: row.archived,
  completed: row.completed,
  tags: row.tags,
  parentId: row.parent_id,
  deadline: row.deadline
}));

export const sessionRowSchema = z.object({
  id: z.string(),
  goal_id: z.string().nullable().default(null),
  start: z.string(),
  duration_sec: z.number().int()
}).transform((row): PomodoroSession => ({ id: row.id, goalId: row.goal_id, start: row.start, durationSec: row.duration_sec }));

export const thoughtRowSchema = z.object({
  id: z.string(),
  text: z.string(),
  timestamp: z.string(),
  goal_id: z.string().nullable().default(null)
}).transform((row): Thought => ({ id: row.id, text: row.text, timestamp: row.timestamp, goalId: row.goal_id }));

export const goalToRow = (goal: Goal): Document => ({
  id: goal.id,
  title: goal.title,
  created: goal.created,
  priority: goal.priority,
  archived: goal.archived,
  tags: goal.tags,
  parent_id: goal.parentId,
  deadline: goal.deadline,
  completed: goal.completed
});

export const sessionToRow = (session: PomodoroSession): Document => ({ id: session.id, goal_id: session.goalId, start: session.start, duration_sec: session.durationSec });

export const thoughtToRow = (thought: Thought): Document => ({ id: thought.id, text: thought.text, timestamp: thought.timestamp, goal_id: thought.goalId });

export const byId = (id: string): Predicate => (doc) => doc.id === id;

export function decodeRow<S extends z.ZodTypeAny>(schema: S, doc: Document, filePath: string): z.output<S> {
  const parsed = schema.safeParse(doc);
  if (!parsed.success) throw new CorruptDataError(filePath, parsed.error);
  return parsed.data;
}

export interface TableView {
  readonly name: TableName;
  all: () => Document[];
  find: (predicate: Predicate) => Document | undefined;
}

/** Documents keyed by integer doc id; iteration follows insertion (ascending id) order. */
export class Table implements TableView {
  constructor(readonly name: TableName, private readonly docs: Record<string, Document>, private readonly touch: () => void) {}

  all() { return Object.values(this.docs); }

  find(predicate: Predicate) { return this.all().find(predicate); }

  insert(doc: Document) {
    const ids = Object.keys(this.docs).map(Number).filter(Number.isInteger);
    const docId = Math.max(0, ...ids) + 1;
    this.docs[String(docId)] = doc;
    this.touch();
    return docId;
  }

  /** `fn` returns the replacement document, or `undefined` to leave it as it is. */
  update(predicate: Predicate, fn: (doc: Document) => Document | undefined) {
    const updated: Document[] = [];
    for (const [key, doc] of Object.entries(this.docs)) {
      if (!predicate(doc)) continue;
      const next = fn(doc);
      if (!next) continue;
      this.docs[key] = next;
      updated.push(next);
    }
    if (updated.length) this.touch();
    return updated;
  }

  remove(predicate: Predicate) {
    const keys = Object.keys(this.docs).filter((key) => predicate(this.docs[key]));
    keys.forEach((key) => delete this.docs[key]);
    if (keys.length) this.touch();
    return keys.length;
  }
}

/**
 * One JSON file holding every table. Each call re-reads the file under its lock;
 * a transaction writes the whole file back only if it changed something.
 */
export class DocumentDatabase {
  constructor(readonly filePath: string) {}

  read<T>(fn: (table: (name: TableName) => TableView) => T): Promise<T> {
    return withLock(this.filePath, async () => {
      const data = await this.load();
      return fn((name) => new Table(name, data[name] ?? {}, () => undefined));
    });
  }

  transact<T>(fn: (table: (name: TableName) => Table) => T): Promise<T> {
    return withLock(this.filePath, async () => {
      const data = await this.load();
      let dirty = false;
      const result = fn((name) => new Table(name, (data[name] ??= {}), () => { dirty = true; }));
      if (dirty) await writeJsonAtomic(this.filePath, data);
      return result;
    });
  }

  private async load(): Promise<DatabaseData> {
    const raw = await readJsonFile(this.filePath);
    if (raw === undefined) return {};
    const parsed = databaseSchema.safeParse(raw);
    if (!parsed.success) throw new CorruptDataError(this.filePath, parsed.error);
    return parsed.data;
  }
}
