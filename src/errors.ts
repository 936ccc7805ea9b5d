/**
 * Error types raised by vecnote. Every error carries a stable `code` so the
 * CLI and callers can branch without matching on messages.
 */

export class VecnoteError extends Error {
  code: string;

  constructor(message: string, code = 'UNKNOWN') {
    super(message);
    this.name = 'VecnoteError';
    this.code = code;
  }
}

/** Blob length is not a whole number of float32 values. */
export class MalformedBlobError extends VecnoteError {
  readonly byteLength: number;

  constructor(byteLength: number) {
    super(`Malformed embedding blob: ${byteLength} bytes is not a multiple of 4`, 'MALFORMED_BLOB');
    this.name = 'MalformedBlobError';
    this.byteLength = byteLength;
  }
}

/** The encoder could not produce a vector for the given text. */
export class EncodingFailedError extends VecnoteError {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message, 'ENCODING_FAILED');
    this.name = 'EncodingFailedError';
    this.status = status;
  }
}

export class DimensionMismatchError extends VecnoteError {
  readonly expected: number;
  readonly actual: number;

  constructor(expected: number, actual: number) {
    super(`Vector dimension mismatch: ${expected} vs ${actual}`, 'DIMENSION_MISMATCH');
    this.name = 'DimensionMismatchError';
    this.expected = expected;
    this.actual = actual;
  }
}

export class NotFoundError extends VecnoteError {
  constructor(what: string, key: string) {
    super(`${what} not found: ${key}`, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export class ConfigError extends VecnoteError {
  constructor(message: string) {
    super(message, 'CONFIG_INVALID');
    this.name = 'ConfigError';
  }
}
