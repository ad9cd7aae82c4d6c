export type ErrorKind =
  | "SourceError"
  | "ExtractionError"
  | "ConfigError"
  | "LocatorNotFound"
  | "NetworkError"
  | "Timeout"
  | "ConfirmationMissing"
  | "FormValidationError"
  | "BrowserCrash"
  | "RecordTransition"
  | "Unexpected";

export class HireloopError extends Error {
  readonly kind: ErrorKind;
  readonly recoverable: boolean;

  constructor(kind: ErrorKind, message: string, recoverable: boolean, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
    this.recoverable = recoverable;
  }
}

export class SourceError extends HireloopError {
  readonly source: string;

  constructor(source: string, message: string, options?: { cause?: unknown }) {
    super("SourceError", message, true, options);
    this.source = source;
  }
}

export class ExtractionError extends HireloopError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("ExtractionError", message, false, options);
  }
}

export class ConfigError extends HireloopError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("ConfigError", message, false, options);
  }
}

export class LocatorNotFoundError extends HireloopError {
  readonly intent: string;

  constructor(intent: string, reason: string) {
    super("LocatorNotFound", `No target for "${intent}": ${reason}`, true);
    this.intent = intent;
  }
}

export class NetworkError extends HireloopError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("NetworkError", message, true, options);
  }
}

export class TimeoutError extends HireloopError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("Timeout", message, true, options);
  }
}

export class ConfirmationMissingError extends HireloopError {
  constructor(message = "No confirmation shown after submit") {
    super("ConfirmationMissing", message, true);
  }
}

export class FormValidationError extends HireloopError {
  constructor(message: string) {
    super("FormValidationError", message, false);
  }
}

export class BrowserCrashError extends HireloopError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("BrowserCrash", message, false, options);
  }
}

export class RecordTransitionError extends HireloopError {
  constructor(message: string) {
    super("RecordTransition", message, false);
  }
}

export class UnexpectedError extends HireloopError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("Unexpected", message, false, options);
  }
}

const CRASH_MARKERS = ["target closed", "browser has been closed", "page crashed", "target crashed", "browser closed"];

export function toHireloopError(error: unknown): HireloopError {
  if (error instanceof HireloopError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const name = error instanceof Error ? error.name : "";
  const lower = message.toLowerCase();

  if (name === "TimeoutError" || (lower.includes("timeout") && lower.includes("exceeded"))) {
    return new TimeoutError(message, { cause: error });
  }
  if (lower.includes("net::err_") || lower.includes("econnreset") || lower.includes("fetch failed")) {
    return new NetworkError(message, { cause: error });
  }
  if (CRASH_MARKERS.some((marker) => lower.includes(marker))) {
    return new BrowserCrashError(message, { cause: error });
  }
  return new UnexpectedError(message, { cause: error });
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
