// ═══════════════════════════════════════════════════════════════════════════
// Error types shared by the conversion core, the rate loader and the routes
// ═══════════════════════════════════════════════════════════════════════════

export type CurrencyRole = 'source' | 'destination';

/**
 * Base application error with structured data
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    options: {
      code?: string;
      statusCode?: number;
      isOperational?: boolean;
      context?: Record<string, unknown>;
      cause?: Error;
    } = {},
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = options.code || 'INTERNAL_ERROR';
    this.statusCode = options.statusCode || 500;
    this.isOperational = options.isOperational ?? true;
    this.context = options.context;

    if (options.cause) {
      this.cause = options.cause;
    }

    Error.captureStackTrace(this, this.constructor);
  }
}

export type CurrencyNotFoundReason = 'unknown-currency' | 'no-current-rate' | 'invalid-code';

const NOT_FOUND_MESSAGES: Record<CurrencyNotFoundReason, (code: string, role?: CurrencyRole) => string> = {
  'unknown-currency': (code, role) => `${role === 'destination' ? 'Destination' : 'Source'} currency "${code}" not found`,
  'no-current-rate': (code, role) => `No current rate found for ${role ? `${role} ` : ''}currency "${code}"`,
  'invalid-code': (code) => `Invalid currency code "${code}". This is not a valid ISO 4217 currency code.`,
};

/**
 * A currency code the rate tables cannot serve: unknown, without a rate valid
 * now, or not an ISO 4217 code at all.
 */
export class CurrencyNotFoundError extends AppError {
  public readonly currencyCode: string;
  public readonly role?: CurrencyRole;
  public readonly reason: CurrencyNotFoundReason;

  constructor(currencyCode: string, reason: CurrencyNotFoundReason, role?: CurrencyRole) {
    super(NOT_FOUND_MESSAGES[reason](currencyCode, role), {
      code: 'CURRENCY_NOT_FOUND',
      statusCode: 404,
      context: { currencyCode, reason, role },
    });
    this.currencyCode = currencyCode;
    this.reason = reason;
    this.role = role;
  }
}

export class InvalidAmountError extends AppError {
  constructor(amount: string) {
    super('Amount must be a non-negative number', {
      code: 'INVALID_AMOUNT',
      statusCode: 422,
      context: { amount },
    });
  }
}

/**
 * A rate window that overlaps one already stored for the same currency.
 */
export class RateConflictError extends AppError {
  constructor(
    currencyCode: string,
    existing: { id: number; validFrom: Date; validTo: Date },
    incoming: { validFrom: Date; validTo: Date },
  ) {
    super(
      `Conflict detected for ${currencyCode}: existing rate (ID=${existing.id}) from ` +
        `${existing.validFrom.toISOString()} to ${existing.validTo.toISOString()} overlaps new range ` +
        `${incoming.validFrom.toISOString()} to ${incoming.validTo.toISOString()}.`,
      {
        code: 'RATE_CONFLICT',
        statusCode: 409,
        context: { currencyCode, existingId: existing.id },
      },
    );
  }
}

/** Malformed rate file: missing columns, bad dates, empty codes, bad values. */
export class RateFileError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, {
      code: 'RATE_FILE_ERROR',
      statusCode: 400,
      context,
    });
  }
}

/**
 * Safely extracts error message from unknown error type
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (typeof error === 'object' && error !== null && 'message' in error) {
    return String(error.message);
  }
  return 'Unknown error occurred';
}

/**
 * Creates a structured error object for logging
 */
export function toErrorObject(error: unknown): Record<string, unknown> {
  if (error instanceof AppError) {
    return {
      name: error.name,
      message: error.message,
      code: error.code,
      statusCode: error.statusCode,
      isOperational: error.isOperational,
      context: error.context,
    };
  }

  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return { message: getErrorMessage(error) };
}
