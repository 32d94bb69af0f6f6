import os from "os";
import path from "path";
import { z } from "zod";
import { CorruptDataError, ValidationError } from "./errors";
import { readJsonFile, withLock, writeJsonAtomic } from "./lockedFile";
import { AppPaths, Settings } from "./types";

export const settingsSchema = z.object({
  pomoDurationMin: z.number().int().min(1).max(180),
  quotesEnabled: z.boolean(),
  remindersEnabled: z.boolean(),
  reminderBreakMin: z.number().int().min(1).max(120),
  reminderIntervalMin: z.number().int().min(1).max(120)
});

export const defaultSettings: Settings = {
  pomoDurationMin: 25,
  quotesEnabled: true,
  remindersEnabled: false,
  reminderBreakMin: 5,
  reminderIntervalMin: 30
};

export function resolvePaths(env: NodeJS.ProcessEnv = process.env, home?: string): AppPaths {
  const base = home ?? env.GOALKEEP_HOME ?? path.join(os.homedir(), ".goalkeep");
  const dbDir = env.GOALKEEP_DB_DIR ?? base;
  return {
    home: base,
    dbPath: path.join(dbDir, "db.json"),
    sessionPath: path.join(base, "session.json"),
    configPath: path.join(base, "config.json")
  };
}

function validateSettings(candidate: unknown): Settings {
  const parsed = settingsSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new ValidationError(parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; "));
  }
  return parsed.data;
}

async function readSettings(configPath: string): Promise<Settings> {
  const raw = await readJsonFile(configPath);
  if (raw === undefined) return { ...defaultSettings };
  const stored = z.record(z.string(), z.unknown()).safeParse(raw);
  if (!stored.success) throw new CorruptDataError(configPath, stored.error);
  return validateSettings({ ...defaultSettings, ...stored.data });
}

export const loadConfig = (configPath: string) => withLock(configPath, () => readSettings(configPath));

export async function saveConfig(configPath: string, settings: Settings) {
  const parsed = validateSettings(settings);
  await withLock(configPath, () => writeJsonAtomic(configPath, parsed));
  return parsed;
}

/** Merges `patch` over the stored settings; nothing is written if the result is invalid. */
export const updateConfig = (configPath: string, patch: Partial<Settings>) => withLock(configPath, async () => {
  const given = Object.fromEntries(Object.entries(patch).filter(([, value]) => value !== undefined));
  const next = validateSettings({ ...(await readSettings(configPath)), ...given });
  await writeJsonAtomic(configPath, next);
  return next;
});
