export type IndexErrorCode = "INVALID_INPUT" | "NOT_FOUND";

export class IndexError extends Error {
  constructor(
    readonly code: IndexErrorCode,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Duplicate or malformed document ids, malformed query modes, bad patterns. */
export class InvalidInputError extends IndexError {
  constructor(message: string) {
    super("INVALID_INPUT", message);
  }
}

export class NotFoundError extends IndexError {
  constructor(message: string) {
    super("NOT_FOUND", message);
  }
}

export function isIndexError(e: unknown): e is IndexError {
  return e instanceof IndexError;
}
