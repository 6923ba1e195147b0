export class WScrapeError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "WScrapeError";
    this.code = code;
  }
}

// ── Domain errors ──

/** Fatal at construction: bad options, bad credential file, initial connect failure. */
export class ConfigurationError extends WScrapeError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "CONFIGURATION", options);
    this.name = "ConfigurationError";
  }
}

/** Remote session or exec channel failure. Recoverable per cycle. */
export class ConnectionError extends WScrapeError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "CONNECTION", options);
    this.name = "ConnectionError";
  }
}

export type PersistenceFailureKind = "duplicate" | "connectivity" | "rejected";

/** A single record's write failed. Recoverable per record. */
export class PersistenceError extends WScrapeError {
  readonly kind: PersistenceFailureKind;

  constructor(message: string, kind: PersistenceFailureKind, options?: ErrorOptions) {
    super(message, "PERSISTENCE", options);
    this.name = "PersistenceError";
    this.kind = kind;
  }
}

// ── Utilities ──

/** Coerce unknown thrown value to WScrapeError (preserves cause chain). */
export function toWScrapeError(value: unknown): WScrapeError {
  if (value instanceof WScrapeError) return value;
  if (value instanceof Error) return new WScrapeError(value.message, "UNKNOWN", { cause: value });
  return new WScrapeError(String(value ?? "Unknown error"), "UNKNOWN");
}

/** Extract error message string from unknown thrown value. */
export function errorMessage(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (value == null) return "Unknown error";
  return String(value);
}

export function isAbortError(value: unknown): boolean {
  return value instanceof Error && value.name === "AbortError";
}

/** Error raised when a pending operation is cancelled through an AbortSignal. */
export function abortError(message = "The operation was aborted"): Error {
  const err = new Error(message);
  err.name = "AbortError";
  return err;
}
