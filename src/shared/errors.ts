export type MatchingErrorCode = "validation_failed" | "embedding_unavailable";

export class MatchingError extends Error {
  constructor(
    message: string,
    public readonly code: MatchingErrorCode,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends MatchingError {
  constructor(
    public readonly target: string,
    public readonly issues: ReadonlyArray<string>,
  ) {
    super(`Invalid ${target}: ${issues.join("; ")}`, "validation_failed");
  }
}

export class EmbeddingUnavailableError extends MatchingError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "embedding_unavailable");
    if (options && "cause" in options) {
      this.cause = options.cause;
    }
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}
