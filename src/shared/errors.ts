export type ErrorCode =
  | 'INVALID_PARAMS'
  | 'NOT_FOUND'
  | 'FORMAT_ERROR'
  | 'UPSTREAM_ERROR'
  | 'INTERNAL_ERROR';

const RETRYABLE_BY_CODE: Record<ErrorCode, boolean> = {
  UPSTREAM_ERROR: true,
  INVALID_PARAMS: false,
  NOT_FOUND: false,
  FORMAT_ERROR: false,
  INTERNAL_ERROR: false,
};

export class DwarError extends Error {
  readonly retryable: boolean;

  constructor(
    public code: ErrorCode,
    message: string,
    public data?: unknown
  ) {
    super(message);
    this.name = 'DwarError';
    this.retryable = RETRYABLE_BY_CODE[code];
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      data: this.data,
    };
  }
}

export function invalidParams(message: string, data?: unknown): DwarError {
  return new DwarError('INVALID_PARAMS', message, data);
}

export function notFound(message: string, data?: unknown): DwarError {
  return new DwarError('NOT_FOUND', message, data);
}

/** The document carries neither of the DataWarrior file markers. */
export function formatError(message: string, data?: unknown): DwarError {
  return new DwarError('FORMAT_ERROR', message, data);
}

export function upstreamError(message: string, data?: unknown): DwarError {
  return new DwarError('UPSTREAM_ERROR', message, data);
}
