export type ErrorKind = "configuration" | "data-access" | "persistence";

export class PlotError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.kind = kind;
    this.name = new.target.name;
  }
}

/** Unknown references, malformed definitions and ambiguous table cells. Aborts the whole document. */
export class ConfigurationError extends PlotError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("configuration", message, options);
  }
}

/** A dataset could not be fetched or iterated, or a predicate could not combine its operands. */
export class DataAccessError extends PlotError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("data-access", message, options);
  }
}

export class PersistenceError extends PlotError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("persistence", message, options);
  }
}

export function isPlotError(error: unknown): error is PlotError {
  return error instanceof PlotError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

/**
 * Prefixes the message with the entity the failure belongs to, keeping the
 * error's kind. Aborts pass through untouched; other errors that are not
 * PlotErrors become DataAccessErrors.
 */
export function wrapError(context: string, error: unknown): Error {
  if (isAbortError(error) && error instanceof Error) {
    return error;
  }
  const message = `${context}: ${errorMessage(error)}`;
  if (error instanceof ConfigurationError) {
    return new ConfigurationError(message, { cause: error });
  }
  if (error instanceof PersistenceError) {
    return new PersistenceError(message, { cause: error });
  }
  return new DataAccessError(message, { cause: error });
}

export function abortError(): Error {
  const error = new Error("The operation was aborted");
  error.name = "AbortError";
  return error;
}

export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw abortError();
  }
}
