export type EngineErrorCode =
  | 'NOT_FOUND'
  | 'VALIDATION'
  | 'FORBIDDEN'
  | 'CONCURRENCY_CONFLICT'
  | 'DOWNSTREAM_UNAVAILABLE';

const STATUS_BY_CODE: Record<EngineErrorCode, number> = {
  NOT_FOUND: 404,
  VALIDATION: 400,
  FORBIDDEN: 403,
  CONCURRENCY_CONFLICT: 409,
  DOWNSTREAM_UNAVAILABLE: 503,
};

export class EngineError extends Error {
  readonly code: EngineErrorCode;
  readonly status: number;

  constructor(code: EngineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.status = STATUS_BY_CODE[code];
  }
}

export class NotFoundError extends EngineError {
  constructor(entity: string, id: string) {
    super('NOT_FOUND', `${entity} not found: ${id}`);
  }
}

export class ValidationError extends EngineError {
  constructor(message: string) {
    super('VALIDATION', message);
  }
}

export class ForbiddenError extends EngineError {
  constructor(message: string) {
    super('FORBIDDEN', message);
  }
}

/** Two writers raced on the same case; retry the whole operation. */
export class ConcurrencyConflictError extends EngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONCURRENCY_CONFLICT', message, options);
  }
}

export class DownstreamUnavailableError extends EngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('DOWNSTREAM_UNAVAILABLE', message, options);
  }
}

export function isEngineError(err: unknown): err is EngineError {
  return err instanceof EngineError;
}
