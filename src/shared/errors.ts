export type ErrorCode =
  | 'INVALID_PARAMS'
  | 'NOT_FOUND'
  | 'PARSE_ERROR'
  | 'VALIDATION_ERROR'
  | 'UNSUPPORTED'
  | 'INTERNAL_ERROR';

export class CodecError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public data?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'CodecError';
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      data: this.data,
    };
  }
}

export function invalidParams(message: string, data?: Record<string, unknown>): CodecError {
  return new CodecError('INVALID_PARAMS', message, data);
}

export function notFound(message: string, data?: Record<string, unknown>): CodecError {
  return new CodecError('NOT_FOUND', message, data);
}

/** Malformed block structure: bad header, non-integer count, missing lines. */
export function parseError(message: string, data?: Record<string, unknown>): CodecError {
  return new CodecError('PARSE_ERROR', message, data);
}

/** Declared and actual counts disagree, or a record breaks a schema invariant. */
export function validationError(message: string, data?: Record<string, unknown>): CodecError {
  return new CodecError('VALIDATION_ERROR', message, data);
}

export function unsupported(message: string, data?: Record<string, unknown>): CodecError {
  return new CodecError('UNSUPPORTED', message, data);
}

export function isCodecError(err: unknown, code?: ErrorCode): err is CodecError {
  return err instanceof CodecError && (code === undefined || err.code === code);
}
