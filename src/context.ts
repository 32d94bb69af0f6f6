import { loadConfig, resolvePaths } from "./config";
import { SessionHooks } from "./hooks";
import { createLogger, Logger } from "./logger";
import { SessionStateFile } from "./sessionState";
import { Storage } from "./storage";
import { AppPaths, Settings } from "./types";

export interface AppContext {
  paths: AppPaths;
  settings: Settings;
  storage: Storage;
  sessionFile: SessionStateFile;
  hooks: SessionHooks;
  now: () => Date;
  logger: Logger;
}

/** What the timer lifecycle needs; `finishSession` also takes `storage`. */
export type SessionContext = Pick<AppContext, "settings" | "sessionFile" | "hooks" | "now" | "logger">;

export interface ContextOptions {
  env?: NodeJS.ProcessEnv;
  home?: string;
  now?: () => Date;
  logger?: Logger;
}

export async function createContext(options: ContextOptions = {}): Promise<AppContext> {
  const paths = resolvePaths(options.env, options.home);
  const now = options.now ?? (() => new Date());
  const logger = options.logger ?? createLogger("goalkeep");
  const settings = await loadConfig(paths.configPath);
  const storage = await Storage.open(paths.dbPath, { now, logger });
  return { paths, settings, storage, sessionFile: new SessionStateFile(paths.sessionPath), hooks: new SessionHooks(), now, logger };
}
