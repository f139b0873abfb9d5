export type PaybackErrorKind =
  | 'InvalidInput'
  | 'EmptyCandidateSet'
  | 'DegenerateInterpolation'
  | 'DataFileNotFound';

export class PaybackError extends Error {
  readonly kind: PaybackErrorKind;

  constructor(kind: PaybackErrorKind, message: string) {
    super(message);
    this.name = 'PaybackError';
    this.kind = kind;
  }
}

export function isPaybackError(e: unknown): e is PaybackError {
  return e instanceof PaybackError;
}

/**
 * Validate a strictly positive, finite number.
 *
 * @throws PaybackError (InvalidInput) naming the field otherwise
 */
export function requirePositive(value: unknown, field: string): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new PaybackError('InvalidInput', `${field} must be a finite number (got ${String(value)})`);
  }
  if (value <= 0) {
    throw new PaybackError('InvalidInput', `${field} must be > 0 (got ${value})`);
  }
  return value;
}

export function requireNonNegative(value: unknown, field: string): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new PaybackError('InvalidInput', `${field} must be a finite number (got ${String(value)})`);
  }
  if (value < 0) {
    throw new PaybackError('InvalidInput', `${field} must be >= 0 (got ${value})`);
  }
  return value;
}
