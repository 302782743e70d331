/**
 * Thrown when a caller breaks a construction precondition: an identity field
 * outside its range, a field above its bit width in strict mode, or a value
 * with no unsigned bit pattern at all.
 */
export class PreconditionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PreconditionError';
  }
}

export { DecodeError, EncodeError } from '../utils/crockford';
export type { DecodeErrorKind, EncodeErrorKind } from '../utils/crockford';
