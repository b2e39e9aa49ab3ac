// Error taxonomy for the query path.

export type RagErrorCode =
  | "CONNECTIVITY"
  | "RETRIEVAL"
  | "GENERATION"
  | "SERIALIZATION";

export class RagError extends Error {
  readonly code: RagErrorCode;

  constructor(code: RagErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Backing store, vector index or generator is unreachable. */
export class ConnectivityError extends RagError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONNECTIVITY", message, options);
  }
}

/** Embedding or vector index call failed. */
export class RetrievalError extends RagError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("RETRIEVAL", message, options);
  }
}

export class GenerationError extends RagError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("GENERATION", message, options);
  }
}

/** A stored embedding or answer payload could not be decoded. */
export class SerializationError extends RagError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("SERIALIZATION", message, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
