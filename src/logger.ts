export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
}

const levelRank: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

const isLogLevel = (value: string): value is LogLevel => Object.prototype.hasOwnProperty.call(levelRank, value);

export function parseLogLevel(raw: string | undefined): LogLevel {
  const value = raw?.trim().toLowerCase() ?? "";
  return isLogLevel(value) ? value : "warn";
}

export function createLogger(scope: string, level: LogLevel = parseLogLevel(process.env.GOALKEEP_LOG_LEVEL)): Logger {
  const enabled = (target: LogLevel) => levelRank[target] >= levelRank[level];
  const prefix = `[${scope}]`;
  return {
    debug: (message) => { if (enabled("debug")) console.log(`${prefix} ${message}`); },
    info: (message) => { if (enabled("info")) console.log(`${prefix} ${message}`); },
    warn: (message) => { if (enabled("warn")) console.warn(`${prefix} ${message}`); },
    error: (message) => { if (enabled("error")) console.error(`${prefix} ${message}`); }
  };
}

export const silentLogger: Logger = createLogger("silent", "silent");
