import { addDays, differenceInSeconds, isValid, parseISO } from "date-fns";
import { ValidationError } from "./errors";

export const DUE_SOON_DAYS = 3;

export function formatDuration(seconds: number) {
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;
  return `${String(minutes).padStart(2, "0")}:${String(remainingSeconds).padStart(2, "0")}`;
}

/** Whole seconds from `from` to `to`, truncated, never negative. */
export function secondsBetween(from: string, to: Date) {
  return Math.max(differenceInSeconds(to, parseISO(from)), 0);
}

export function parseTimestamp(value: string) {
  const date = parseISO(value);
  if (!isValid(date)) throw new ValidationError(`Invalid timestamp '${value}'`);
  return date;
}

export function isOverdue(deadline: string, now: Date) {
  return parseISO(deadline).getTime() < now.getTime();
}

export function isDueSoon(deadline: string, now: Date, days = DUE_SOON_DAYS) {
  const due = parseISO(deadline).getTime();
  return due >= now.getTime() && due <= addDays(now, days).getTime();
}
