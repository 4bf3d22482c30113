/**
 * Raised by the calculators when an argument violates its range.
 * `field` names the offending argument; `message` states the constraint.
 */
export class InvalidInputError extends Error {
  readonly field: string;

  constructor(field: string, message: string) {
    super(message);
    this.name = 'InvalidInputError';
    this.field = field;
  }
}

export function isInvalidInput(error: unknown): error is InvalidInputError {
  return error instanceof InvalidInputError;
}
