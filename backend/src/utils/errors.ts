export interface ErrorBody {
  error: string;
  details?: unknown;
}

export class HttpError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = new.target.name;
  }

  toBody(): ErrorBody {
    return this.details === undefined ? { error: this.message } : { error: this.message, details: this.details };
  }
}

export class ValidationError extends HttpError {
  constructor(details?: unknown) {
    super('Validation failed', 400, details);
  }
}

export class NotFoundError extends HttpError {
  constructor(message: string = 'Resource not found', details?: unknown) {
    super(message, 404, details);
  }
}

/**
 * SQLSTATE codes raised when a write carries a value the schema cannot hold:
 * out-of-range numbers, bad casts, and CHECK or NOT NULL violations.
 */
const REJECTED_INPUT_CODES: Record<string, string> = {
  '22003': 'numeric_value_out_of_range',
  '22P02': 'invalid_text_representation',
  '23502': 'not_null_violation',
  '23514': 'check_violation'
};

interface DatabaseErrorShape {
  code: string;
  constraint?: unknown;
  column?: unknown;
}

function hasSqlState(error: unknown): error is DatabaseErrorShape {
  return typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string';
}

/**
 * A database rejection of client-supplied values becomes a 400; anything else
 * (connection loss, syntax errors, foreign keys) is left for the caller.
 */
export function fromDatabaseError(error: unknown): ValidationError | null {
  if (!hasSqlState(error)) {
    return null;
  }
  const reason = REJECTED_INPUT_CODES[error.code];
  if (!reason) {
    return null;
  }
  const details: Record<string, string> = { reason };
  if (typeof error.constraint === 'string') details.constraint = error.constraint;
  if (typeof error.column === 'string') details.column = error.column;
  return new ValidationError(details);
}
