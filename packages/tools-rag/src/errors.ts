export type RagErrorCode =
  | 'INVALID_CONFIG'
  | 'DOCUMENT_READ'
  | 'INVALID_DOCUMENT'
  | 'INVALID_QUESTION'
  | 'NO_DOCUMENT'
  | 'EMBEDDING_AUTH'
  | 'EMBEDDING_REQUEST'
  | 'EMBEDDING_UNAVAILABLE'
  | 'EMBEDDING_SHAPE'
  | 'COMPLETION_AUTH'
  | 'COMPLETION_REQUEST'
  | 'COMPLETION_UNAVAILABLE'
  | 'CACHE_WRITE'
  | 'CACHE_READ'
  | 'BUILD_TIMEOUT';

/** Structured context attached to a failure. */
export interface RagErrorDetails {
  fingerprint?: string;
  batchIndex?: number;
  attempts?: number;
  path?: string;
  status?: number;
  [key: string]: unknown;
}

export class RagError extends Error {
  public readonly code: RagErrorCode;
  public readonly details: RagErrorDetails;

  constructor(code: RagErrorCode, message: string, details: RagErrorDetails = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

export class InvalidConfigError extends RagError {
  constructor(message: string, details?: RagErrorDetails) {
    super('INVALID_CONFIG', message, details);
  }
}

/** The document bytes could not be read. */
export class DocumentReadError extends RagError {
  constructor(message: string, details?: RagErrorDetails, options?: { cause?: unknown }) {
    super('DOCUMENT_READ', message, details, options);
  }
}

export class InvalidDocumentError extends RagError {
  constructor(message: string, details?: RagErrorDetails, options?: { cause?: unknown }) {
    super('INVALID_DOCUMENT', message, details, options);
  }
}

export class InvalidQuestionError extends RagError {
  constructor(message: string) {
    super('INVALID_QUESTION', message);
  }
}

export class NoDocumentError extends RagError {
  constructor(message = 'No document has been processed yet.') {
    super('NO_DOCUMENT', message);
  }
}

export class EmbeddingAuthError extends RagError {
  constructor(message: string, details?: RagErrorDetails, options?: { cause?: unknown }) {
    super('EMBEDDING_AUTH', message, details, options);
  }
}

/** The embedding service rejected the request itself; retrying cannot help. */
export class EmbeddingRequestError extends RagError {
  constructor(message: string, details?: RagErrorDetails, options?: { cause?: unknown }) {
    super('EMBEDDING_REQUEST', message, details, options);
  }
}

/** Transient failures persisted through every attempt. `cause` is the last failure seen. */
export class EmbeddingUnavailableError extends RagError {
  constructor(message: string, details?: RagErrorDetails, options?: { cause?: unknown }) {
    super('EMBEDDING_UNAVAILABLE', message, details, options);
  }
}

export class EmbeddingShapeError extends RagError {
  constructor(message: string, details?: RagErrorDetails) {
    super('EMBEDDING_SHAPE', message, details);
  }
}

export class CompletionAuthError extends RagError {
  constructor(message: string, details?: RagErrorDetails, options?: { cause?: unknown }) {
    super('COMPLETION_AUTH', message, details, options);
  }
}

export class CompletionRequestError extends RagError {
  constructor(message: string, details?: RagErrorDetails, options?: { cause?: unknown }) {
    super('COMPLETION_REQUEST', message, details, options);
  }
}

export class CompletionUnavailableError extends RagError {
  constructor(message: string, details?: RagErrorDetails, options?: { cause?: unknown }) {
    super('COMPLETION_UNAVAILABLE', message, details, options);
  }
}

export class CacheWriteError extends RagError {
  constructor(message: string, details?: RagErrorDetails, options?: { cause?: unknown }) {
    super('CACHE_WRITE', message, details, options);
  }
}

/** A cache entry exists but cannot be trusted. Lookups report it and treat the entry as absent. */
export class CacheReadError extends RagError {
  constructor(message: string, details?: RagErrorDetails, options?: { cause?: unknown }) {
    super('CACHE_READ', message, details, options);
  }
}

export class BuildTimeoutError extends RagError {
  constructor(message: string, details?: RagErrorDetails) {
    super('BUILD_TIMEOUT', message, details);
  }
}

export function isRagError(value: unknown, code?: RagErrorCode): value is RagError {
  return value instanceof RagError && (code === undefined || value.code === code);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Non-2xx response from a remote service. */
export class HttpStatusError extends Error {
  constructor(
    public readonly status: number,
    message: string,
    public readonly body?: string,
  ) {
    super(message);
    this.name = 'HttpStatusError';
  }
}
