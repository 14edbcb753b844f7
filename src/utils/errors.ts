export enum ErrorCategory {
  OPTION_PARSE = 'option_parse',
  INTEGER_PARSE = 'integer_parse',
  INPUT_NOT_FOUND = 'input_not_found',
  OUTPUT_UNAVAILABLE = 'output_unavailable',
  UNEXPECTED = 'unexpected'
}

export abstract class CipherError extends Error {
  abstract readonly category: ErrorCategory;
}

/** Malformed token, unknown flag, bad dash usage or a missing value. */
export class OptionParseError extends CipherError {
  readonly category = ErrorCategory.OPTION_PARSE;

  constructor(message: string, readonly token: string) {
    super(message);
    this.name = 'OptionParseError';
  }
}

export class IntegerParseError extends CipherError {
  readonly category = ErrorCategory.INTEGER_PARSE;

  constructor(message: string, readonly token: string) {
    super(message);
    this.name = 'IntegerParseError';
  }
}

export class InputNotFoundError extends CipherError {
  readonly category = ErrorCategory.INPUT_NOT_FOUND;

  constructor(readonly path: string, options?: { cause?: unknown; reason?: string }) {
    super(`${options?.reason ?? 'Input file not found'}: ${path}`, { cause: options?.cause });
    this.name = 'InputNotFoundError';
  }
}

export class OutputUnavailableError extends CipherError {
  readonly category = ErrorCategory.OUTPUT_UNAVAILABLE;

  constructor(readonly path: string, options?: { cause?: unknown }) {
    super(`Output file cannot be opened for writing: ${path}`, options);
    this.name = 'OutputUnavailableError';
  }
}

export function isCipherError(value: unknown): value is CipherError {
  return value instanceof CipherError;
}

/** Node system errors carry a string `code` such as ENOENT. */
export function errnoCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}
