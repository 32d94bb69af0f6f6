export * from "./types";
export { AppError, CorruptDataError, InvalidStateError, NotFoundError, ValidationError, isAppError, runCommand } from "./errors";
export type { ErrorKind } from "./errors";
export { createLogger, silentLogger } from "./logger";
export type { Logger, LogLevel } from "./logger";
export { defaultSettings, loadConfig, resolvePaths, saveConfig, settingsSchema, updateConfig } from "./config";
export { createContext } from "./context";
export type { AppContext, ContextOptions, SessionContext } from "./context";
export { Storage } from "./storage";
export { GoalStore } from "./goalStore";
export { SessionHistory, ThoughtLog } from "./historyStore";
export { SessionStateFile, liveElapsed } from "./sessionState";
export { SessionHooks } from "./hooks";
export { finishSession, loadActiveSession, pauseSession, resumeSession, sessionStatus, startSession, stopSession } from "./pomodoro";
export type { StartOptions } from "./pomodoro";
export { buildGoalTree, sortForDisplay } from "./goalTree";
export type { GoalNode } from "./goalTree";
export { formatDuration } from "./time";
export { withLock } from "./lockedFile";
