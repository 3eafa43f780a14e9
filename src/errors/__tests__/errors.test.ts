/**
 * Tests for error handling system
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  CLIError,
  FileNotFoundError,
  ConfigError,
  DatabaseError,
  ValidationError,
  UnsupportedFileTypeError,
  FileTooLargeError,
  EmbeddingProviderError,
  RerankProviderError,
  formatError,
  getExitCode,
  handleError,
  toCLIError,
} from '../index.js';

// chalk may or may not colorize depending on the terminal
function plain(text: string): string {
  // eslint-disable-next-line no-control-regex
  return text.replace(/\x1B\[[0-9;]*m/g, '');
}

describe('Error Classes', () => {
  it('CLIError keeps message, hint and code', () => {
    const error = new CLIError('Something went wrong', 'Try this instead', 9);

    expect(error).toBeInstanceOf(Error);
    expect(error.message).toBe('Something went wrong');
    expect(error.hint).toBe('Try this instead');
    expect(error.code).toBe(9);
    expect(error.name).toBe('CLIError');
  });

  it('defaults to exit code 1 without a hint', () => {
    const error = new CLIError('oops');

    expect(error.code).toBe(1);
    expect(error.hint).toBeUndefined();
  });

  it('subclasses survive instanceof checks', () => {
    const error = new FileNotFoundError('/tmp/missing.md');

    expect(error).toBeInstanceOf(CLIError);
    expect(error).toBeInstanceOf(FileNotFoundError);
    expect(error.code).toBe(3);
    expect(error.message).toBe('File does not exist: /tmp/missing.md');
  });

  it('ConfigError uses a default hint', () => {
    expect(new ConfigError('bad').hint).toBe('Run: docrag config list  to see valid options');
    expect(new ConfigError('bad', 'custom').hint).toBe('custom');
    expect(new ConfigError('bad').code).toBe(2);
  });

  it('DatabaseError keeps the cause', () => {
    const cause = new Error('SQLITE_BUSY');
    const error = new DatabaseError('write failed', cause);

    expect(error.cause).toBe(cause);
    expect(error.code).toBe(5);
    expect(error.hint).toBe('Check that the docrag data directory is writable');
  });

  it('ValidationError lists issues in the hint', () => {
    const error = new ValidationError('Invalid input', ['a: required', 'b: too big']);

    expect(error.hint).toBe('Issues:\n  a: required\n  b: too big');
  });

  it('UnsupportedFileTypeError lists the supported types', () => {
    const error = new UnsupportedFileTypeError('pdf', ['txt', 'md', 'markdown']);

    expect(error.message).toBe(
      'File type .pdf is not supported. Supported types: .txt, .md, .markdown'
    );
    expect(error.extension).toBe('pdf');
    expect(error.code).toBe(6);
  });

  it('FileTooLargeError reports size and limit', () => {
    const error = new FileTooLargeError('big.txt', 20, 10);

    expect(error.message).toBe('File is too large: big.txt (20 bytes, limit 10)');
    expect(error.sizeBytes).toBe(20);
    expect(error.maxBytes).toBe(10);
  });

  it('EmbeddingProviderError picks a hint per failure kind', () => {
    const error = new EmbeddingProviderError('model_not_loaded', 'model missing');

    expect(error.kind).toBe('model_not_loaded');
    expect(error.hint).toBe('Pull the model first, e.g.: ollama pull nomic-embed-text');
    expect(error.code).toBe(7);
  });

  it('RerankProviderError has exit code 7', () => {
    expect(new RerankProviderError('down').code).toBe(7);
  });
});

describe('toCLIError', () => {
  it('returns CLIErrors unchanged', () => {
    const error = new ConfigError('x');
    expect(toCLIError(error)).toBe(error);
  });

  it('wraps plain errors and strings', () => {
    expect(toCLIError(new Error('boom')).message).toBe('boom');
    expect(toCLIError('text').message).toBe('text');
    expect(toCLIError(42).code).toBe(1);
  });
});

describe('formatError', () => {
  it('formats a CLIError with its hint', () => {
    const output = plain(formatError(new CLIError('Broken', 'Fix it')));

    expect(output).toBe('Error: Broken\nHint: Fix it');
  });

  it('suggests --verbose for plain errors', () => {
    const output = plain(formatError(new Error('boom')));

    expect(output).toBe('Error: boom\nHint: Run with --verbose for more details');
  });

  it('includes the stack trace in verbose mode', () => {
    const output = plain(formatError(new CLIError('Broken'), { verbose: true }));

    expect(output).toContain('Stack trace:');
  });

  it('formats JSON output', () => {
    const output = formatError(new FileNotFoundError('x.md'), { json: true });

    expect(JSON.parse(output)).toEqual({
      error: 'File does not exist: x.md',
      type: 'FileNotFoundError',
      code: 3,
      hint: 'Check the path and try again',
    });
  });

  it('formats non-error values', () => {
    expect(plain(formatError('just a string'))).toBe('Error: just a string');
  });
});

describe('getExitCode', () => {
  it('uses the CLIError code and 1 otherwise', () => {
    expect(getExitCode(new ConfigError('x'))).toBe(2);
    expect(getExitCode(new Error('x'))).toBe(1);
    expect(getExitCode('x')).toBe(1);
  });
});

describe('handleError', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints to stderr and exits with the error code', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('exit called');
    });

    expect(() => handleError(new ConfigError('bad config'))).toThrow('exit called');
    expect(exitSpy).toHaveBeenCalledWith(2);
    expect(plain(String(errorSpy.mock.calls[0]?.[0]))).toContain('Error: bad config');
  });
});
