/**
 * Error codes carried by every kbchat error. All but `TIMEOUT` can reach the
 * chat boundary; a `TimeoutError` only travels as the cause of an
 * `EmbeddingError` or `GenerationError`.
 */
export enum ErrorCode {
  CONFIGURATION_INVALID = "CONFIGURATION_INVALID",
  DOCUMENT_LOAD_FAILED = "DOCUMENT_LOAD_FAILED",
  EMBEDDING_FAILED = "EMBEDDING_FAILED",
  DIMENSION_MISMATCH = "DIMENSION_MISMATCH",
  GENERATION_FAILED = "GENERATION_FAILED",
  TIMEOUT = "TIMEOUT",
  INVALID_REQUEST = "INVALID_REQUEST",
  UNKNOWN_ERROR = "UNKNOWN_ERROR"
}

export const UNKNOWN_ERROR_MESSAGE = "An internal error occurred";

export class KbChatError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    cause?: unknown
  ) {
    super(message);
    this.name = "KbChatError";
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

/** Invalid split, retrieval, context or model settings. Fatal at startup. */
export class ConfigurationError extends KbChatError {
  constructor(message: string) {
    super(ErrorCode.CONFIGURATION_INVALID, message);
    this.name = "ConfigurationError";
  }
}

export class LoaderError extends KbChatError {
  constructor(message: string, cause?: unknown) {
    super(ErrorCode.DOCUMENT_LOAD_FAILED, message, cause);
    this.name = "LoaderError";
  }
}

/** The embedding model failed, timed out, or returned a malformed vector. */
export class EmbeddingError extends KbChatError {
  constructor(message: string, cause?: unknown) {
    super(ErrorCode.EMBEDDING_FAILED, message, cause);
    this.name = "EmbeddingError";
  }
}

/** A vector does not match the dimension the index was built with. Halts indexing. */
export class DimensionMismatchError extends KbChatError {
  constructor(
    public readonly expected: number,
    public readonly actual: number
  ) {
    super(
      ErrorCode.DIMENSION_MISMATCH,
      `Embedding dimension mismatch: expected=${expected} actual=${actual}`
    );
    this.name = "DimensionMismatchError";
  }
}

export class GenerationError extends KbChatError {
  constructor(message: string, cause?: unknown) {
    super(ErrorCode.GENERATION_FAILED, message, cause);
    this.name = "GenerationError";
  }
}

export class TimeoutError extends KbChatError {
  constructor(
    public readonly label: string,
    public readonly timeoutMs: number
  ) {
    super(ErrorCode.TIMEOUT, `${label} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

export function getErrorCode(error: unknown): ErrorCode {
  return error instanceof KbChatError ? error.code : ErrorCode.UNKNOWN_ERROR;
}

/**
 * User-facing message for any thrown value. Errors we do not own are not
 * echoed back, since they may carry provider internals.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof KbChatError) {
    return error.message;
  }
  return UNKNOWN_ERROR_MESSAGE;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
