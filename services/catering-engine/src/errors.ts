/**
 * Engine error taxonomy. Neither class is user-recoverable: both mean the
 * caller or the catalog broke a contract, so they are thrown immediately
 * rather than folded into a zero that would reach a purchasing instruction.
 */

export const CateringErrorCode = {
  CONFIGURATION_ERROR: "CONFIGURATION_ERROR",
  INVARIANT_VIOLATION: "INVARIANT_VIOLATION",
} as const;

export type CateringErrorCodeType = (typeof CateringErrorCode)[keyof typeof CateringErrorCode];

export abstract class CateringError extends Error {
  abstract readonly code: CateringErrorCodeType;
  readonly details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.details = details;
  }
}

/** A selection has no catalog entry: the UI offered something the catalog does not know. */
export class ConfigurationError extends CateringError {
  readonly code = CateringErrorCode.CONFIGURATION_ERROR;
}

/** A precondition of the engine was broken (negative quantity, duplicate key, bad numeric input). */
export class InvariantViolation extends CateringError {
  readonly code = CateringErrorCode.INVARIANT_VIOLATION;
}

export function assertNonNegativeNumber(value: number, name: string): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new InvariantViolation(`${name} must be a finite non-negative number, got ${value}`, { [name]: value });
  }
}

export function assertPositiveNumber(value: number, name: string): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new InvariantViolation(`${name} must be a finite positive number, got ${value}`, { [name]: value });
  }
}

export function assertPositiveInteger(value: number, name: string): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new InvariantViolation(`${name} must be a positive integer, got ${value}`, { [name]: value });
  }
}
