import { Logger } from "./logger";

export type ErrorKind = "not_found" | "invalid_state" | "validation" | "corrupt_data";

export class AppError extends Error {
  constructor(readonly kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) { super("not_found", message); }
}

export class InvalidStateError extends AppError {
  constructor(message: string) { super("invalid_state", message); }
}

export class ValidationError extends AppError {
  constructor(message: string) { super("validation", message); }
}

/** The file exists but is not something we can read back; never recovered from. */
export class CorruptDataError extends AppError {
  constructor(readonly filePath: string, cause: unknown) {
    super("corrupt_data", `Corrupt data file ${filePath}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
  }
}

export const isAppError = (error: unknown): error is AppError => error instanceof AppError;

/**
 * Boundary for command-style consumers: domain errors become a clean message,
 * anything else a generic one. Both exit with 1.
 */
export async function runCommand(action: () => Promise<void>, logger: Logger): Promise<number> {
  try {
    await action();
    return 0;
  } catch (error) {
    if (isAppError(error)) {
      logger.error(`Error: ${error.message}`);
      return 1;
    }
    logger.error(`An unexpected error occurred: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }
}
