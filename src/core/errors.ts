/**
 * Custom Error Classes for the Option Edge Calculator
 *
 * Every failure a caller can observe is one of these. Messages are
 * written for the person who filled in the form.
 */

/**
 * Base class for all calculator errors
 */
export class CalculatorError extends Error {
  public readonly code: string;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'CalculatorError';
    this.code = code;
    this.timestamp = new Date();
    this.context = context;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp,
      context: this.context,
      stack: this.stack,
    };
  }
}

// ============================================================================
// VALIDATION ERRORS
// ============================================================================

export class ValidationError extends CalculatorError {
  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message, code, context);
    this.name = 'ValidationError';
  }
}

export class MissingFieldError extends ValidationError {
  public readonly fields: readonly string[];

  constructor(fields: readonly string[]) {
    super(`All fields are required: ${fields.join(', ')}`, 'MISSING_FIELD', { fields });
    this.name = 'MissingFieldError';
    this.fields = fields;
  }
}

export class ParseError extends ValidationError {
  public readonly field: string;

  constructor(field: string, value: string) {
    super(`Could not parse ${field}: '${value}' is not a number`, 'PARSE_ERROR', {
      field,
      value,
    });
    this.name = 'ParseError';
    this.field = field;
  }
}

export class InvalidInputError extends ValidationError {
  constructor(reason: string, context?: Record<string, unknown>) {
    super(reason, 'INVALID_INPUT', context);
    this.name = 'InvalidInputError';
  }
}

export class InvalidOptionTypeError extends ValidationError {
  constructor(optionType: string) {
    super("Invalid option type. Must be 'call' or 'put'", 'INVALID_OPTION_TYPE', {
      optionType,
    });
    this.name = 'InvalidOptionTypeError';
  }
}

// ============================================================================
// INTERNAL ERRORS
// ============================================================================

export class InternalError extends CalculatorError {
  constructor(context?: Record<string, unknown>) {
    super('An unexpected error occurred', 'INTERNAL_ERROR', context);
    this.name = 'InternalError';
  }
}

// ============================================================================
// CONFIGURATION ERRORS
// ============================================================================

export class ConfigurationError extends CalculatorError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', context);
    this.name = 'ConfigurationError';
  }
}

// ============================================================================
// ERROR UTILITY FUNCTIONS
// ============================================================================

export function isCalculatorError(error: unknown): error is CalculatorError {
  return error instanceof CalculatorError;
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

/**
 * Wrap unknown errors in InternalError
 */
export function wrapError(error: unknown): CalculatorError {
  if (isCalculatorError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new InternalError({
      originalName: error.name,
      originalMessage: error.message,
    });
  }

  return new InternalError({ originalError: String(error) });
}
