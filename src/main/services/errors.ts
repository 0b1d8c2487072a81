/**
 * Custom Error Classes for metadata lookups
 *
 * Categorized error types for each stage of a lookup, so sources can decide
 * which failures end a lookup and which only get logged.
 */

/**
 * Error categories matching the lookup stages.
 */
export type ErrorCategory = 'TransportError' | 'ResponseFormatError' | 'CacheError' | 'ContractError';

/** Context accepted by every LookupError */
export interface LookupErrorOptions {
  /** The item being looked up when the error occurred (if applicable) */
  item?: string;
  /** The lookup step where the error occurred */
  step?: string;
  /** The original error that caused this error (if wrapping) */
  cause?: Error;
}

/**
 * Base class for all lookup errors.
 */
export class LookupError extends Error {
  readonly category: ErrorCategory;
  /** Description of the item being looked up, if any */
  readonly item: string | null;
  readonly step: string;
  readonly cause: Error | null;
  readonly timestamp: Date;

  constructor(message: string, category: ErrorCategory, options?: LookupErrorOptions) {
    super(message);
    this.name = category;
    this.category = category;
    this.item = options?.item ?? null;
    this.step = options?.step ?? category;
    this.cause = options?.cause ?? null;
    this.timestamp = new Date();

    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Returns a structured object representation of the error for logging.
   */
  toLogObject(): {
    category: ErrorCategory;
    message: string;
    item: string | null;
    step: string;
    timestamp: string;
    stack: string | undefined;
    cause: string | null;
  } {
    return {
      category: this.category,
      message: this.message,
      item: this.item,
      step: this.step,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
      cause: this.cause?.message ?? null,
    };
  }

  /**
   * Returns a user-facing message without stack traces.
   */
  toUserMessage(): string {
    const itemInfo = this.item ? ` [${this.item}]` : '';
    return `${this.category}${itemInfo}: ${this.message}`;
  }
}

/**
 * Thrown when a request never got an answer from the online service.
 * Examples: DNS failure, connection reset, timeout.
 */
export class TransportError extends LookupError {
  /** HTTP status code (if a response arrived) */
  readonly statusCode: number | null;
  /** Endpoint path the request was sent to */
  readonly endpoint: string | null;

  constructor(message: string, options?: LookupErrorOptions & { statusCode?: number; endpoint?: string }) {
    super(message, 'TransportError', {
      step: 'request',
      ...options,
    });
    this.statusCode = options?.statusCode ?? null;
    this.endpoint = options?.endpoint ?? null;
  }

  override toLogObject(): ReturnType<LookupError['toLogObject']> & {
    statusCode: number | null;
    endpoint: string | null;
  } {
    return {
      ...super.toLogObject(),
      statusCode: this.statusCode,
      endpoint: this.endpoint,
    };
  }
}

/**
 * Thrown when a response body does not have the expected shape.
 */
export class ResponseFormatError extends LookupError {
  constructor(message: string, options?: LookupErrorOptions) {
    super(message, 'ResponseFormatError', {
      step: 'parsing',
      ...options,
    });
  }
}

/**
 * Thrown when the local metadata cache cannot be read or written.
 */
export class CacheError extends LookupError {
  constructor(message: string, options?: LookupErrorOptions) {
    super(message, 'CacheError', {
      step: 'cache',
      ...options,
    });
  }
}

/**
 * Thrown when a caller breaks a lookup precondition.
 * Sources never catch this one: it points at a bug in the calling code.
 */
export class ContractError extends LookupError {
  constructor(message: string, options?: LookupErrorOptions) {
    super(message, 'ContractError', {
      step: 'precondition',
      ...options,
    });
  }
}

/**
 * Type guard to check if an error is a LookupError.
 */
export function isLookupError(error: unknown): error is LookupError {
  return error instanceof LookupError;
}

/**
 * Returns the message of any thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Wraps a generic error in the appropriate LookupError category.
 * If the error is already a LookupError, it is returned as-is.
 *
 * @param error - The error to wrap
 * @param category - The error category to use
 * @param options - Additional context
 */
export function wrapError(
  error: unknown,
  category: ErrorCategory,
  options?: {
    item?: string;
    step?: string;
  },
): LookupError {
  if (error instanceof LookupError) {
    return error;
  }

  const cause = error instanceof Error ? error : new Error(String(error));
  const message = cause.message || 'Unknown error';

  switch (category) {
    case 'TransportError':
      return new TransportError(message, { ...options, cause });
    case 'ResponseFormatError':
      return new ResponseFormatError(message, { ...options, cause });
    case 'CacheError':
      return new CacheError(message, { ...options, cause });
    case 'ContractError':
      return new ContractError(message, { ...options, cause });
  }
}
