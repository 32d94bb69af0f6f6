export type Priority = "low" | "medium" | "high";

export interface Goal {
  id: string;
  title: string;
  created: string;
  priority: Priority;
  archived: boolean;
  completed: boolean;
  tags: string[];
  parentId: string | null;
  deadline: string | null;
}

export interface NewGoalInput {
  title: string;
  priority?: Priority;
  tags?: string[];
  parentId?: string | null;
  deadline?: string | null;
}

export interface GoalPatch {
  title?: string;
  priority?: Priority;
  deadline?: string | null;
}

export interface GoalFilters {
  includeArchived?: boolean;
  onlyArchived?: boolean;
  priority?: Priority;
  tags?: string[];
  parentId?: string;
  dueSoon?: boolean;
  overdue?: boolean;
}

export interface PomodoroSession {
  id: string;
  goalId: string | null;
  start: string;
  durationSec: number;
}

export interface ActiveSession {
  goalId: string | null;
  start: string;
  durationSec: number;
  elapsedSec: number;
  paused: boolean;
  lastStart: string | null;
}

export type SessionStatus =
  | { state: "absent" }
  | { state: "running" | "paused"; session: ActiveSession; elapsedSec: number; remainingSec: number };

export interface Thought {
  id: string;
  text: string;
  timestamp: string;
  goalId: string | null;
}

export interface ThoughtQuery {
  goalId?: string;
  limit?: number | null;
  newestFirst?: boolean;
}

export interface SessionQuery {
  goalId?: string;
}

export interface Settings {
  pomoDurationMin: number;
  quotesEnabled: boolean;
  remindersEnabled: boolean;
  reminderBreakMin: number;
  reminderIntervalMin: number;
}

export interface AppPaths {
  home: string;
  dbPath: string;
  sessionPath: string;
  configPath: string;
}
