import { ValidationError } from "./errors";
import { parseTimestamp } from "./time";

const TAG_PATTERN = /^[a-z0-9][a-z0-9_-]{0,29}$/;
export const MAX_THOUGHT_LENGTH = 500;

export function normalizeTitle(title: string) {
  const trimmed = title.trim();
  if (!trimmed) throw new ValidationError("Title cannot be empty");
  return trimmed;
}

export function normalizeTag(tag: string) {
  const lowered = tag.trim().toLowerCase();
  if (!TAG_PATTERN.test(lowered)) {
    throw new ValidationError(`Invalid tag '${tag}'. Tags must match ${TAG_PATTERN.source}`);
  }
  return lowered;
}

export const normalizeTags = (tags: string[]) => [...new Set(tags.map(normalizeTag))].sort();

export function normalizeThoughtText(text: string) {
  const trimmed = text.trim();
  if (!trimmed) throw new ValidationError("Thought cannot be empty");
  if ([...trimmed].length > MAX_THOUGHT_LENGTH) throw new ValidationError(`Thought must be ${MAX_THOUGHT_LENGTH} characters or less`);
  return trimmed;
}

/** Deadlines are stored as full ISO-8601 instants. */
export const normalizeDeadline = (deadline: string | null | undefined) => (deadline ? parseTimestamp(deadline).toISOString() : null);
