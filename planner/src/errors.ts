export type PlannerErrorCode =
  | "STORAGE_ERROR"
  | "INDEX_CORRUPTION"
  | "PROVIDER_UNAVAILABLE"
  | "INVALID_SCOPE"
  | "INVALID_INPUT"
  | "CONFLICT";

export class PlannerError extends Error {
  readonly code: PlannerErrorCode;

  constructor(code: PlannerErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Conversation persistence is unavailable. Fatal to the write path. */
export class StorageError extends PlannerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("STORAGE_ERROR", message, options);
  }
}

/** A vector or posting does not match what the index expects. */
export class IndexCorruptionError extends PlannerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("INDEX_CORRUPTION", message, options);
  }
}

/** The embedding provider failed or timed out. */
export class ProviderUnavailableError extends PlannerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("PROVIDER_UNAVAILABLE", message, options);
  }
}

/** A request named a project the user does not own. */
export class InvalidScopeError extends PlannerError {
  constructor(message: string) {
    super("INVALID_SCOPE", message);
  }
}

export class InvalidInputError extends PlannerError {
  constructor(message: string) {
    super("INVALID_INPUT", message);
  }
}

export class ConflictError extends PlannerError {
  constructor(message: string) {
    super("CONFLICT", message);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function isErrnoCode(err: unknown, code: string): boolean {
  return err !== null && typeof err === "object" && "code" in err && err.code === code;
}
