/**
 * Error type definitions for the docrag engine and CLI
 *
 * These custom error classes provide:
 * - Actionable error messages with recovery hints
 * - Exit codes for programmatic error handling
 * - Type safety for error handling logic
 */

/**
 * Base class for all docrag errors.
 *
 * hint tells the user how to fix the problem; code lets scripts
 * branch on the failure kind.
 */
export class CLIError extends Error {
  /** Recovery suggestion shown to the user */
  public readonly hint?: string;

  /** Exit code (1-255, 0 is reserved for success) */
  public readonly code: number;

  constructor(message: string, hint?: string, code: number = 1) {
    super(message);
    // Required for instanceof checks after transpilation
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'CLIError';
    this.hint = hint;
    this.code = code;
  }
}

/**
 * Thrown when a file doesn't exist.
 *
 * Exit code 3: File not found (following common Unix conventions)
 */
export class FileNotFoundError extends CLIError {
  constructor(path: string) {
    super(`File does not exist: ${path}`, 'Check the path and try again', 3);
    this.name = 'FileNotFoundError';
  }
}

/**
 * Thrown for configuration-related errors.
 *
 * Exit code 2: Configuration error
 */
export class ConfigError extends CLIError {
  constructor(message: string, hint?: string) {
    super(message, hint ?? 'Run: docrag config list  to see valid options', 2);
    this.name = 'ConfigError';
  }
}

/**
 * Thrown for database-related errors.
 *
 * Exit code 5: Database error
 */
export class DatabaseError extends CLIError {
  /**
   * @param cause - The original database error, kept for --verbose output
   */
  constructor(message: string, cause?: unknown, hint?: string) {
    super(message, hint ?? 'Check that the docrag data directory is writable', 5);
    this.name = 'DatabaseError';
    this.cause = cause;
  }
}

/**
 * Thrown when a document with the same content hash already exists.
 * Raised by the store on a UNIQUE(file_hash) conflict.
 */
export class DuplicateDocumentError extends CLIError {
  public readonly fileHash: string;

  constructor(fileHash: string) {
    super(
      `A document with hash ${fileHash.slice(0, 12)}… already exists`,
      'Re-run the ingestion to replace it',
      5
    );
    this.name = 'DuplicateDocumentError';
    this.fileHash = fileHash;
  }
}

/**
 * Thrown when input validation fails.
 *
 * Exit code 1: General error (validation is user input error)
 */
export class ValidationError extends CLIError {
  /** Individual validation issues */
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    const hint =
      issues.length > 0
        ? `Issues:\n  ${issues.join('\n  ')}`
        : 'Check your input and try again';
    super(message, hint, 1);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

// ============================================================================
// Ingestion errors (exit code 6)
// ============================================================================

export class UnsupportedFileTypeError extends CLIError {
  public readonly extension: string;

  constructor(extension: string, supported: readonly string[]) {
    const shown = extension ? `.${extension}` : '(none)';
    const list = supported.map((ext) => `.${ext}`).join(', ');
    super(
      `File type ${shown} is not supported. Supported types: ${list}`,
      'Convert the file to plain text or markdown',
      6
    );
    this.name = 'UnsupportedFileTypeError';
    this.extension = extension;
  }
}

export class UnreadableFileError extends CLIError {
  constructor(path: string, reason?: string) {
    super(
      `File is not readable: ${path}${reason ? ` (${reason})` : ''}`,
      'Check the file permissions',
      6
    );
    this.name = 'UnreadableFileError';
  }
}

export class EmptyFileError extends CLIError {
  constructor(path: string) {
    super(`File is empty: ${path}`, 'Nothing to ingest', 6);
    this.name = 'EmptyFileError';
  }
}

export class FileTooLargeError extends CLIError {
  public readonly sizeBytes: number;
  public readonly maxBytes: number;

  constructor(path: string, sizeBytes: number, maxBytes: number) {
    super(
      `File is too large: ${path} (${sizeBytes} bytes, limit ${maxBytes})`,
      'Split the file or raise ingestion.max_file_size_bytes',
      6
    );
    this.name = 'FileTooLargeError';
    this.sizeBytes = sizeBytes;
    this.maxBytes = maxBytes;
  }
}

// ============================================================================
// Provider errors (exit code 7)
// ============================================================================

/**
 * Why an embedding request failed.
 */
export type EmbeddingFailureKind =
  | 'unreachable'
  | 'model_not_loaded'
  | 'input_too_long'
  | 'invalid_response';

const EMBEDDING_HINTS: Record<EmbeddingFailureKind, string> = {
  unreachable: 'Start Ollama (ollama serve) or set OLLAMA_HOST',
  model_not_loaded: 'Pull the model first, e.g.: ollama pull nomic-embed-text',
  input_too_long: 'Lower chunking.max_tokens_per_chunk so chunks fit the model context',
  invalid_response: 'Run with --verbose to see the provider response',
};

export class EmbeddingProviderError extends CLIError {
  public readonly kind: EmbeddingFailureKind;

  constructor(kind: EmbeddingFailureKind, message: string) {
    super(message, EMBEDDING_HINTS[kind], 7);
    this.name = 'EmbeddingProviderError';
    this.kind = kind;
  }
}

export class RerankProviderError extends CLIError {
  constructor(message: string) {
    super(message, 'Reranking is optional; disable it with rerank.enabled = false', 7);
    this.name = 'RerankProviderError';
  }
}

/**
 * Two vectors of different lengths were compared. Logged, never thrown
 * out of a search.
 */
export class VectorDimensionMismatchError extends CLIError {
  constructor(expected: number, actual: number) {
    super(
      `Vector dimension mismatch: ${expected} vs ${actual}`,
      'Re-ingest documents embedded with a different model',
      5
    );
    this.name = 'VectorDimensionMismatchError';
  }
}
