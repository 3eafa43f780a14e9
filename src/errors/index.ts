/**
 * Error handling module for docrag
 *
 * Usage:
 *   import { ConfigError, handleError } from './errors/index.js';
 *
 *   throw new ConfigError('Invalid option', 'Try: docrag config list');
 */

export {
  CLIError,
  FileNotFoundError,
  ConfigError,
  DatabaseError,
  DuplicateDocumentError,
  ValidationError,
  UnsupportedFileTypeError,
  UnreadableFileError,
  EmptyFileError,
  FileTooLargeError,
  EmbeddingProviderError,
  RerankProviderError,
  VectorDimensionMismatchError,
  type EmbeddingFailureKind,
} from './types.js';

export {
  toCLIError,
  formatError,
  getExitCode,
  handleError,
  createGlobalErrorHandler,
  type ErrorHandlerOptions,
  type ErrorOutput,
} from './handler.js';
