import { randomUUID } from "crypto";
import { byId, decodeRow, Document, DocumentDatabase, goalRowSchema, goalToRow, TableView } from "./dataStore";
import { InvalidStateError, NotFoundError } from "./errors";
import { Logger } from "./logger";
import { isDueSoon, isOverdue } from "./time";
import { Goal, GoalFilters, GoalPatch, NewGoalInput } from "./types";
import { normalizeDeadline, normalizeTag, normalizeTags, normalizeTitle } from "./validation";

const legacyDefaults = (): Document => ({ tags: [], parent_id: null, deadline: null, completed: false });

const sameTags = (a: string[], b: string[]) => a.length === b.length && a.every((tag, index) => tag === b[index]);

export function matchesFilters(goal: Goal, filters: GoalFilters) {
  if (filters.onlyArchived) {
    if (!goal.archived) return false;
  } else if (!filters.includeArchived && goal.archived) {
    return false;
  }
  if (filters.priority && goal.priority !== filters.priority) return false;
  if (filters.tags?.length && !filters.tags.every((tag) => goal.tags.includes(tag))) return false;
  if (filters.parentId !== undefined && goal.parentId !== filters.parentId) return false;
  return true;
}

/** Deadline post-filter: when both flags are set a goal matching either one stays. */
export function matchesDeadline(goal: Goal, filters: GoalFilters, now: Date) {
  if (!filters.dueSoon && !filters.overdue) return true;
  if (!goal.deadline) return false;
  return Boolean((filters.overdue && isOverdue(goal.deadline, now)) || (filters.dueSoon && isDueSoon(goal.deadline, now)));
}

export class GoalStore {
  constructor(private readonly db: DocumentDatabase, private readonly now: () => Date, private readonly logger: Logger) {}

  /** Writes defaults for fields added after a row was stored. Rows that have them are left alone. */
  async migrate() {
    const migrated = await this.db.transact((table) => table("goals").update(() => true, (doc) => {
      const missing = Object.entries(legacyDefaults()).filter(([key]) => !(key in doc));
      return missing.length ? { ...doc, ...Object.fromEntries(missing) } : undefined;
    }));
    if (migrated.length) this.logger.info(`migrated ${migrated.length} goal row(s) in ${this.db.filePath}`);
    return migrated.length;
  }

  /** Stores the goal as given; id uniqueness and title checks belong to the caller. */
  async add(goal: Goal) {
    await this.db.transact((table) => table("goals").insert(goalToRow(goal)));
    return goal;
  }

  async create(input: NewGoalInput) {
    const title = normalizeTitle(input.title);
    const tags = normalizeTags(input.tags ?? []);
    const deadline = normalizeDeadline(input.deadline);
    return this.db.transact((table) => {
      const goals = table("goals");
      const parentId = input.parentId ?? null;
      if (parentId !== null && !goals.find(byId(parentId))) throw new NotFoundError(`Parent goal ${parentId} not found`);
      const goal: Goal = {
        id: `g_${randomUUID()}`,
        title,
        created: this.now().toISOString(),
        priority: input.priority ?? "medium",
        archived: false,
        completed: false,
        tags,
        parentId,
        deadline
      };
      goals.insert(goalToRow(goal));
      return goal;
    });
  }

  async get(id: string) {
    return this.db.read((table) => this.decodeOrThrow(table("goals"), id));
  }

  async findByTitle(title: string) {
    return this.db.read((table) => {
      const doc = table("goals").find((row) => row.title === title);
      return doc ? this.decode(doc) : null;
    });
  }

  async update(goal: Goal) {
    await this.db.transact((table) => {
      const goals = table("goals");
      if (!goals.find(byId(goal.id))) throw new NotFoundError(`Goal ${goal.id} not found`);
      goals.update(byId(goal.id), () => goalToRow(goal));
    });
    return goal;
  }

  async edit(id: string, patch: GoalPatch) {
    const title = patch.title === undefined ? undefined : normalizeTitle(patch.title);
    const deadline = patch.deadline === undefined ? undefined : normalizeDeadline(patch.deadline);
    return this.mutate(id, (goal) => ({
      ...goal,
      title: title ?? goal.title,
      priority: patch.priority ?? goal.priority,
      deadline: deadline === undefined ? goal.deadline : deadline
    }));
  }

  async archive(id: string) {
    return this.mutate(id, (goal) => {
      if (goal.archived) throw new InvalidStateError(`Goal ${id} already archived`);
      return { ...goal, archived: true };
    });
  }

  async restore(id: string) {
    return this.mutate(id, (goal) => {
      if (!goal.archived) throw new InvalidStateError(`Goal ${id} is not archived`);
      return { ...goal, archived: false };
    });
  }

  async complete(id: string) {
    return this.mutate(id, (goal) => (goal.completed ? undefined : { ...goal, completed: true }));
  }

  async reopen(id: string) {
    return this.mutate(id, (goal) => (goal.completed ? { ...goal, completed: false } : undefined));
  }

  async addTags(id: string, tags: string[]) {
    const normalized = normalizeTags(tags);
    return this.mutate(id, (goal) => {
      const merged = [...new Set([...goal.tags, ...normalized])].sort();
      return sameTags(merged, goal.tags) ? undefined : { ...goal, tags: merged };
    });
  }

  /** Removing a tag the goal does not carry returns it unchanged. */
  async removeTag(id: string, tag: string) {
    const normalized = normalizeTag(tag);
    return this.mutate(id, (goal) => (goal.tags.includes(normalized) ? { ...goal, tags: goal.tags.filter((t) => t !== normalized) } : undefined));
  }

  async list(filters: GoalFilters = {}) {
    const now = this.now();
    return this.db.read((table) => table("goals").all()
      .map((doc) => this.decode(doc))
      .filter((goal) => matchesFilters(goal, filters))
      .filter((goal) => matchesDeadline(goal, filters, now)));
  }

  /** Hard delete. Children keep their `parentId`. */
  async remove(id: string) {
    await this.db.transact((table) => {
      if (!table("goals").remove(byId(id))) throw new NotFoundError(`Goal ${id} not found`);
    });
  }

  async listAllTags() {
    return this.db.read((table) => {
      const counts: Record<string, number> = {};
      for (const goal of table("goals").all().map((doc) => this.decode(doc))) {
        for (const tag of goal.tags) counts[tag] = (counts[tag] ?? 0) + 1;
      }
      return counts;
    });
  }

  private decode(doc: Document): Goal {
    return decodeRow(goalRowSchema, doc, this.db.filePath);
  }

  private decodeOrThrow(goals: TableView, id: string) {
    const doc = goals.find(byId(id));
    if (!doc) throw new NotFoundError(`Goal ${id} not found`);
    return this.decode(doc);
  }

  /** Read, transform, write back in one locked cycle. `fn` returning `undefined` means no change. */
  private mutate(id: string, fn: (goal: Goal) => Goal | undefined) {
    return this.db.transact((table) => {
      const goals = table("goals");
      const goal = this.decodeOrThrow(goals, id);
      const next = fn(goal);
      if (!next) return goal;
      goals.update(byId(id), () => goalToRow(next));
      return next;
    });
  }
}
