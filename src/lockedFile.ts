import fs from "fs/promises";
import path from "path";
import { lock } from "proper-lockfile";
import { CorruptDataError } from "./errors";

const lockRetries = { retries: 200, factor: 1.2, minTimeout: 10, maxTimeout: 100 };
const staleLockMs = 10_000;

/** `db.json` is guarded by `db.lock` beside it. */
export function lockPathFor(filePath: string) {
  const parsed = path.parse(filePath);
  return path.join(parsed.dir, `${parsed.name}.lock`);
}

const isMissingFile = (error: unknown) => error instanceof Error && "code" in error && error.code === "ENOENT";

/**
 * Runs `fn` while holding the exclusive lock for `filePath`. The lock is advisory
 * and only serializes callers that also go through here.
 */
export async function withLock<T>(filePath: string, fn: () => Promise<T>): Promise<T> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const release = await lock(filePath, { realpath: false, lockfilePath: lockPathFor(filePath), stale: staleLockMs, retries: lockRetries });
  try {
    return await fn();
  } finally {
    await release();
  }
}

/** Parsed file contents, or `undefined` when the file does not exist. */
export async function readJsonFile(filePath: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    if (isMissingFile(error)) return undefined;
    throw error;
  }
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new CorruptDataError(filePath, error);
  }
}

export async function writeJsonAtomic(filePath: string, data: unknown) {
  const tempPath = `${filePath}.tmp`;
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(tempPath, JSON.stringify(data, null, 2), "utf-8");
  await fs.rename(tempPath, filePath);
}

export async function removeFile(filePath: string) {
  await fs.rm(filePath, { force: true });
}
