export type RetrievalErrorCode =
  | "invalid_document"
  | "invalid_collection_name"
  | "embedding_failed";

export class RetrievalError extends Error {
  readonly code: RetrievalErrorCode;

  constructor(code: RetrievalErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidDocumentError extends RetrievalError {
  constructor(message: string) {
    super("invalid_document", message);
  }
}

export class InvalidCollectionNameError extends RetrievalError {
  constructor(collection: string) {
    super("invalid_collection_name", `Invalid collection name: ${collection}`);
  }
}

export class EmbeddingError extends RetrievalError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("embedding_failed", message, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
