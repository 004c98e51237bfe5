import { types } from 'util';

export type SkyVisionErrorCode =
  | 'PARSE_ERROR'
  | 'FETCH_ERROR'
  | 'MODEL_LOAD_ERROR'
  | 'MODEL_UNAVAILABLE'
  | 'EMBEDDING_ERROR'
  | 'DIMENSION_MISMATCH'
  | 'LOAD_ERROR'
  | 'QUERY_ERROR';

export abstract class SkyVisionError extends Error {
  abstract readonly code: SkyVisionErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Malformed input data. `row` is 1-based and counts the header line when the
 * file has one.
 */
export class ParseError extends SkyVisionError {
  readonly code = 'PARSE_ERROR';

  constructor(
    message: string,
    readonly file: string,
    readonly row?: number,
  ) {
    super(row === undefined ? `${file}: ${message}` : `${file}:${row}: ${message}`);
  }
}

export class FetchError extends SkyVisionError {
  readonly code = 'FETCH_ERROR';

  constructor(
    message: string,
    readonly url: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class ModelLoadError extends SkyVisionError {
  readonly code = 'MODEL_LOAD_ERROR';
}

export class ModelUnavailableError extends SkyVisionError {
  readonly code = 'MODEL_UNAVAILABLE';
}

export class EmbeddingError extends SkyVisionError {
  readonly code = 'EMBEDDING_ERROR';
}

export class DimensionMismatchError extends SkyVisionError {
  readonly code = 'DIMENSION_MISMATCH';

  constructor(
    readonly expected: number,
    readonly actual: number,
    where: string,
  ) {
    super(`${where}: embedding dimension ${actual} != configured ${expected}`);
  }
}

export class LoadError extends SkyVisionError {
  readonly code = 'LOAD_ERROR';
}

export class QueryError extends SkyVisionError {
  readonly code = 'QUERY_ERROR';
}

/**
 * True for errors from any realm. Errors thrown by Node built-ins inside a VM
 * context (Jest runs tests in one) fail `instanceof Error`.
 */
export function isError(value: unknown): value is Error {
  return value instanceof Error || types.isNativeError(value);
}

export function errorMessage(error: unknown): string {
  return isError(error) ? error.message : String(error);
}
