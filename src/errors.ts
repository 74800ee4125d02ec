export type FetchFailure = "network" | "http" | "parse" | "not_found";

export class FetchError extends Error {
  readonly reason: FetchFailure;

  constructor(reason: FetchFailure, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "FetchError";
    this.reason = reason;
  }
}

export class StoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StoreError";
  }
}

/** Bad command-line flags or configuration values. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

/**
 * Raised when a page comes back without fields the next step depends on.
 */
export class MissingFieldsError extends FetchError {
  readonly missing: string[];

  constructor(missing: string[]) {
    super("parse", `Failed to extract essential fields: ${missing.join(", ")}.`);
    this.name = "MissingFieldsError";
    this.missing = missing;
  }
}
