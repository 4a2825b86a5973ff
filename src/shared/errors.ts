export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'UNRESOLVED_IDENTIFIER'
  | 'NOT_FOUND'
  | 'AMBIGUOUS_MATCH'
  | 'QUERY_CONFLICT'
  | 'INVALID_PARAMS'
  | 'UPSTREAM_ERROR';

const RETRYABLE_BY_CODE: Record<ErrorCode, boolean> = {
  UPSTREAM_ERROR: true,
  VALIDATION_ERROR: false,
  UNRESOLVED_IDENTIFIER: false,
  NOT_FOUND: false,
  AMBIGUOUS_MATCH: false,
  QUERY_CONFLICT: false,
  INVALID_PARAMS: false,
};

export interface ValidationErrorData {
  field: string;
  expected: string;
  actual: unknown;
}

export class XrayDbError extends Error {
  readonly retryable: boolean;

  constructor(
    public code: ErrorCode,
    message: string,
    public data?: unknown
  ) {
    super(message);
    this.name = 'XrayDbError';
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

export function isXrayDbError(err: unknown, code?: ErrorCode): err is XrayDbError {
  return err instanceof XrayDbError && (code === undefined || err.code === code);
}

export function validationError(message: string, data: ValidationErrorData): XrayDbError {
  return new XrayDbError('VALIDATION_ERROR', message, data);
}

export function unresolvedIdentifier(kind: string, value: unknown): XrayDbError {
  return new XrayDbError('UNRESOLVED_IDENTIFIER', `Cannot classify ${kind} identifier: ${describeValue(value)}`, {
    kind,
    value,
  });
}

export function notFound(message: string, data?: unknown): XrayDbError {
  return new XrayDbError('NOT_FOUND', message, data);
}

export function ambiguousMatch(message: string, data?: unknown): XrayDbError {
  return new XrayDbError('AMBIGUOUS_MATCH', message, data);
}

export function queryConflict(message: string, data?: unknown): XrayDbError {
  return new XrayDbError('QUERY_CONFLICT', message, data);
}

export function invalidParams(message: string, data?: unknown): XrayDbError {
  return new XrayDbError('INVALID_PARAMS', message, data);
}

export function upstreamError(message: string, data?: unknown): XrayDbError {
  return new XrayDbError('UPSTREAM_ERROR', message, data);
}

export function describeValue(value: unknown): string {
  if (typeof value === 'string') return JSON.stringify(value);
  if (value === undefined) return 'undefined';
  if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
    const text = String(value);
    if (text !== '[object Object]') return text;
  }
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

export interface ErrorPayload {
  error: {
    code: ErrorCode | 'INTERNAL_ERROR';
    message: string;
    data?: Record<string, unknown>;
  };
}

export function formatError(err: unknown): ErrorPayload {
  if (err instanceof XrayDbError) {
    // Never leak SQL text to callers
    const data = isRecord(err.data) ? { ...err.data } : undefined;
    if (data && 'sql' in data) {
      delete data.sql;
    }
    return {
      error: {
        code: err.code,
        message: err.message,
        ...(data && Object.keys(data).length > 0 ? { data } : {}),
      },
    };
  }

  const message = err instanceof Error ? err.message : String(err);
  return {
    error: {
      code: 'INTERNAL_ERROR',
      message,
    },
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
