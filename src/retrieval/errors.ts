export type LookalikeErrorCode =
  | "FETCH_FAILURE"
  | "INDEX_OUT_OF_RANGE"
  | "EMPTY_COLLECTION"
  | "NUMERIC_ERROR"
  | "NO_CANDIDATES"
  | "REBUILD_IN_PROGRESS";

export class LookalikeError extends Error {
  readonly code: LookalikeErrorCode;

  constructor(code: LookalikeErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** An image could not be retrieved or decoded. Recovered by dropping the item. */
export class FetchFailureError extends LookalikeError {
  readonly location: string;
  readonly status?: number;

  constructor(location: string, message: string, options?: { status?: number; cause?: unknown }) {
    super("FETCH_FAILURE", message, { cause: options?.cause });
    this.location = location;
    this.status = options?.status;
  }
}

export class IndexOutOfRangeError extends LookalikeError {
  readonly index: number;
  readonly size: number;

  constructor(index: number, size: number) {
    super("INDEX_OUT_OF_RANGE", `Index ${index} is out of range for a collection of size ${size}`);
    this.index = index;
    this.size = size;
  }
}

export class EmptyCollectionError extends LookalikeError {
  constructor() {
    super("EMPTY_COLLECTION", "Collection is empty. Rebuild it with at least one reachable image first");
  }
}

/** Cosine similarity is undefined for the given vectors. */
export class NumericError extends LookalikeError {
  constructor(message: string) {
    super("NUMERIC_ERROR", message);
  }
}

export class NoCandidatesError extends LookalikeError {
  constructor(referenceIndex: number) {
    super(
      "NO_CANDIDATES",
      `Index ${referenceIndex} is the only record in the collection; there is nothing to compare against`
    );
  }
}

export class RebuildInProgressError extends LookalikeError {
  constructor() {
    super("REBUILD_IN_PROGRESS", "A rebuild is already running on this collection");
  }
}
