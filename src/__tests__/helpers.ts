import fs from "fs/promises";
import os from "os";
import path from "path";
import { vi } from "vitest";
import { defaultSettings } from "../config";
import { SessionContext } from "../context";
import { SessionHooks } from "../hooks";
import { Logger } from "../logger";
import { SessionStateFile } from "../sessionState";
import { Settings } from "../types";

const tempDirs: string[] = [];

export async function makeTempDir() {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "goalkeep-"));
  tempDirs.push(dir);
  return dir;
}

export async function removeTempDirs() {
  await Promise.all(tempDirs.splice(0).map((dir) => fs.rm(dir, { recursive: true, force: true })));
}

export class FakeClock {
  private current: number;

  constructor(start: string) { this.current = Date.parse(start); }

  now = () => new Date(this.current);

  advance(seconds: number) { this.current += seconds * 1000; }
}

export const fakeLogger = (): Logger => ({ debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() });

export function sessionContext(dir: string, clock: FakeClock, settings: Partial<Settings> = {}): SessionContext {
  return {
    settings: { ...defaultSettings, ...settings },
    sessionFile: new SessionStateFile(path.join(dir, "session.json")),
    hooks: new SessionHooks(),
    now: clock.now,
    logger: fakeLogger()
  };
}

export const readJson = async (filePath: string): Promise<unknown> => JSON.parse(await fs.readFile(filePath, "utf-8"));

export const exists = (filePath: string) => fs.access(filePath).then(() => true, () => false);
