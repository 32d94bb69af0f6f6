import { parseISO } from "date-fns";
import { Goal, Priority } from "./types";

export interface GoalNode {
  goal: Goal;
  children: GoalNode[];
}

export const priorityRank: Record<Priority, number> = { high: 0, medium: 1, low: 2 };

const createdAt = (goal: Goal) => parseISO(goal.created).getTime();
const byCreated = (a: Goal, b: Goal) => createdAt(a) - createdAt(b);

/** Active before archived, then by priority, then oldest first. */
export function sortForDisplay(goals: Goal[]) {
  return [...goals].sort((a, b) => Number(a.archived) - Number(b.archived) || priorityRank[a.priority] - priorityRank[b.priority] || byCreated(a, b));
}

/**
 * Nests goals under their parents. A goal whose parent is not in `goals`
 * (removed, or filtered out) is shown as a root, as is any goal reachable only
 * through a parent cycle.
 */
export function buildGoalTree(goals: Goal[]): GoalNode[] {
  const ids = new Set(goals.map((goal) => goal.id));
  const children = new Map<string, Goal[]>();
  const roots: Goal[] = [];
  for (const goal of goals) {
    if (goal.parentId && ids.has(goal.parentId)) {
      children.set(goal.parentId, [...(children.get(goal.parentId) ?? []), goal]);
    } else {
      roots.push(goal);
    }
  }

  const visited = new Set<string>();
  const toNode = (goal: Goal): GoalNode => {
    visited.add(goal.id);
    const kids = (children.get(goal.id) ?? []).filter((child) => !visited.has(child.id)).sort(byCreated);
    return { goal, children: kids.map(toNode) };
  };

  const tree = roots.sort(byCreated).map(toNode);
  for (const goal of [...goals].sort(byCreated)) {
    if (!visited.has(goal.id)) tree.push(toNode(goal));
  }
  return tree;
}
