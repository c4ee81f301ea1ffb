/**
 * Structured error hierarchy for pagebrief.
 *
 * Every failure the service reports extends {@link PageBriefError}, so callers
 * can branch on `instanceof` or on the stable `code`:
 *
 * ```ts
 * const result = await service.summarize(token);
 * if (!result.success && result.error instanceof NotFoundError) { ... }
 * ```
 *
 * @module errors
 */

export type ErrorCode =
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "STORAGE_ERROR"
  | "COMPLETION_ERROR"
  | "CONFIG_ERROR";

/** Base error for all pagebrief errors. Includes an error code for programmatic matching. */
export class PageBriefError extends Error {
  readonly code: ErrorCode;
  constructor(code: ErrorCode, message: string, cause?: unknown) {
    super(message);
    this.name = "PageBriefError";
    this.code = code;
    this.cause = cause;
  }
}

/** Input was rejected, e.g. HTML with no visible text. Never retried. */
export class ValidationError extends PageBriefError {
  readonly field?: string;
  constructor(message: string, field?: string) {
    super("VALIDATION_ERROR", field ? `Invalid "${field}": ${message}` : message);
    this.name = "ValidationError";
    this.field = field;
  }
}

/** No live entry for the token: it never existed or has expired. */
export class NotFoundError extends PageBriefError {
  readonly token: string;
  constructor(token: string) {
    super("NOT_FOUND", "Token not found");
    this.name = "NotFoundError";
    this.token = token;
  }
}

/** The persistence layer is unreachable or a write failed. */
export class StorageError extends PageBriefError {
  constructor(message: string, cause?: unknown) {
    super("STORAGE_ERROR", message, cause);
    this.name = "StorageError";
  }
}

/** The language-model backend failed, timed out or answered with garbage. */
export class CompletionError extends PageBriefError {
  constructor(message: string, cause?: unknown) {
    super("COMPLETION_ERROR", message, cause);
    this.name = "CompletionError";
  }
}

/** Startup configuration is missing or invalid. */
export class ConfigError extends PageBriefError {
  readonly issues: string[];
  constructor(issues: string[]) {
    super("CONFIG_ERROR", `Invalid configuration:\n  ${issues.join("\n  ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
