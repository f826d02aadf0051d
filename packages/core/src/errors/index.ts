/**
 * Base domain error
 */
export abstract class DomainError extends Error {
  abstract readonly code: string;

  readonly context?: Record<string, unknown> | undefined;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message);
    this.context = context;
    this.name = this.constructor.name;
  }

  toJSON() {
    return {
      code: this.code,
      context: this.context,
      message: this.message,
      name: this.name,
    };
  }
}

export class ValidationError extends DomainError {
  readonly code = 'VALIDATION_ERROR';
}

/**
 * Raised for operations a variant does not define, e.g. the net amount of a generic transaction
 */
export class UnsupportedOperationError extends DomainError {
  readonly code = 'UNSUPPORTED_OPERATION';
}
