/** Raised when the event history cannot anchor a computation, such as an
 * empty history or no menstruation event to count cycle days from.
 * - Deterministic: retrying with the same history fails the same way.
 */
export class InsufficientDataError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InsufficientDataError";
  }
}

/** Recipe catalog could not be read (missing directory, unreadable file). */
export class RecipeCatalogError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RecipeCatalogError";
  }
}

/** Recipe history store failed to read or record entries. */
export class RecipeHistoryError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RecipeHistoryError";
  }
}

/** Event registration input was rejected. */
export class EventValidationError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = "EventValidationError";
    this.issues = issues;
  }
}

export const describeError = (error: unknown): { errorType: string; error: string } =>
  error instanceof Error
    ? { errorType: error.name, error: error.message }
    : { errorType: typeof error, error: String(error) };
