/**
 * conduit - Exception Filters and HTTP Exceptions
 *
 * Structured handling that turns faults escaping the middleware chain into
 * well-formed responses. The dispatcher's outermost fault boundary is an
 * {@link ExceptionFilterChain}; inline boundaries (`wrapErrors`,
 * `ErrorBoundaryMiddleware`) may use the same filters.
 */

import {
  ConduitResponse,
  HttpStatus,
  createErrorResponse,
} from '../../infrastructure/platform/types';

/**
 * Exception context containing the error and request information
 */
export interface ExceptionContext {
  /** The caught exception */
  error: Error;

  /** Request identifier (from `X-Request-ID` or generated) */
  requestId?: string;

  /** Request path */
  path: string;

  /** HTTP method */
  method: string;

  /** Timestamp when exception occurred */
  timestamp: Date;

  /** Additional metadata */
  metadata?: Record<string, unknown>;
}

/**
 * IExceptionFilter - Exception handling interface
 *
 * Implements the catch method to transform exceptions into responses.
 * Multiple filters can be registered to handle different exception types;
 * a filter that cannot handle an error rethrows it for the next one.
 *
 * @example
 * ```typescript
 * class TeapotFilter implements IExceptionFilter {
 *   async catch(ctx: ExceptionContext): Promise<ConduitResponse> {
 *     if (ctx.error instanceof TeapotError) {
 *       return { status: 418, headers: {}, body: 'short and stout' };
 *     }
 *     throw ctx.error;
 *   }
 * }
 * ```
 */
export interface IExceptionFilter {
  /**
   * Handle an exception and return a response
   *
   * @param ctx - Exception context
   * @returns Response to send to client, or throws to pass to next filter
   */
  catch(ctx: ExceptionContext): Promise<ConduitResponse>;
}

/**
 * Exception filter function type
 */
export type ExceptionFilterFunction = (
  ctx: ExceptionContext,
) => Promise<ConduitResponse>;

/**
 * Create an exception filter from a function
 */
export function createExceptionFilter(
  fn: ExceptionFilterFunction,
): IExceptionFilter {
  return { catch: fn };
}

/**
 * Normalize anything thrown into an Error instance
 */
export function toError(thrown: unknown): Error {
  if (thrown instanceof Error) {
    return thrown;
  }
  return new Error(typeof thrown === 'string' ? thrown : String(thrown));
}

// ==================== Built-in Exceptions ====================

/**
 * Base HTTP exception class
 */
export class HttpException extends Error {
  constructor(
    public readonly statusCode: number,
    message: string,
    public readonly details?: unknown,
    public readonly headers: Record<string, string> = {},
  ) {
    super(message);
    this.name = 'HttpException';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * 400 Bad Request
 */
export class BadRequestException extends HttpException {
  constructor(message: string = 'Bad Request', details?: unknown) {
    super(HttpStatus.BAD_REQUEST, message, details);
    this.name = 'BadRequestException';
  }
}

/**
 * 400 Bad Request raised when a captured path segment or query value does
 * not parse into the route's declared extractor type.
 */
export class ExtractionException extends HttpException {
  constructor(
    public readonly source: 'path' | 'query',
    message: string,
    public readonly issues: ReadonlyArray<ExtractionIssue> = [],
  ) {
    super(HttpStatus.BAD_REQUEST, message, issues);
    this.name = 'ExtractionException';
  }
}

/**
 * One failed field of an extraction
 */
export interface ExtractionIssue {
  path: string;
  message: string;
}

/**
 * 404 Not Found
 */
export class NotFoundException extends HttpException {
  constructor(message: string = 'Not Found', details?: unknown) {
    super(HttpStatus.NOT_FOUND, message, details);
    this.name = 'NotFoundException';
  }
}

/**
 * 405 Method Not Allowed, carrying the `Allow` list
 */
export class MethodNotAllowedException extends HttpException {
  constructor(
    public readonly allow: ReadonlyArray<string>,
    message: string = 'Method Not Allowed',
  ) {
    super(HttpStatus.METHOD_NOT_ALLOWED, message, { allow }, {
      Allow: allow.join(', '),
    });
    this.name = 'MethodNotAllowedException';
  }
}

/**
 * 406 Not Acceptable
 */
export class NotAcceptableException extends HttpException {
  constructor(message: string = 'Not Acceptable', details?: unknown) {
    super(HttpStatus.NOT_ACCEPTABLE, message, details);
    this.name = 'NotAcceptableException';
  }
}

/**
 * 409 Conflict
 */
export class ConflictException extends HttpException {
  constructor(message: string = 'Conflict', details?: unknown) {
    super(HttpStatus.CONFLICT, message, details);
    this.name = 'ConflictException';
  }
}

/**
 * 415 Unsupported Media Type
 */
export class UnsupportedMediaTypeException extends HttpException {
  constructor(message: string = 'Unsupported Media Type', details?: unknown) {
    super(HttpStatus.UNSUPPORTED_MEDIA_TYPE, message, details);
    this.name = 'UnsupportedMediaTypeException';
  }
}

/**
 * 422 Unprocessable Entity (Validation Error)
 */
export class ValidationException extends HttpException {
  constructor(
    message: string = 'Validation Failed',
    public readonly errors: Record<string, string[]> = {},
  ) {
    super(HttpStatus.UNPROCESSABLE_ENTITY, message, errors);
    this.name = 'ValidationException';
  }
}

/**
 * 429 Too Many Requests
 */
export class TooManyRequestsException extends HttpException {
  constructor(
    message: string = 'Too Many Requests',
    public readonly retryAfter?: number,
  ) {
    super(
      HttpStatus.TOO_MANY_REQUESTS,
      message,
      { retryAfter },
      retryAfter !== undefined ? { 'Retry-After': String(retryAfter) } : {},
    );
    this.name = 'TooManyRequestsException';
  }
}

/**
 * 499 Client Closed Request: the request was cancelled before a response
 * was produced.
 */
export class RequestCancelledException extends HttpException {
  constructor(message: string = 'Request Cancelled') {
    super(HttpStatus.CLIENT_CLOSED_REQUEST, message);
    this.name = 'RequestCancelledException';
  }
}

/**
 * 503 Service Unavailable
 */
export class ServiceUnavailableException extends HttpException {
  constructor(message: string = 'Service Unavailable', details?: unknown) {
    super(HttpStatus.SERVICE_UNAVAILABLE, message, details);
    this.name = 'ServiceUnavailableException';
  }
}

/**
 * Human-readable error label for an exception name:
 * `MethodNotAllowedException` becomes `Method Not Allowed`.
 */
export function errorLabel(error: Error): string {
  return error.name
    .replace('Exception', '')
    .replace(/([A-Z])/g, ' $1')
    .trim();
}

// ==================== Built-in Exception Filters ====================

/**
 * Options for {@link DefaultExceptionFilter}
 */
export interface DefaultExceptionFilterOptions {
  includeStack?: boolean;
  includeDetails?: boolean;
}

/**
 * Default exception filter - handles all exceptions
 */
export class DefaultExceptionFilter implements IExceptionFilter {
  private readonly options: Required<DefaultExceptionFilterOptions>;

  constructor(options: DefaultExceptionFilterOptions = {}) {
    this.options = {
      includeStack: process.env.NODE_ENV !== 'production',
      includeDetails: process.env.NODE_ENV !== 'production',
      ...options,
    };
  }

  async catch(ctx: ExceptionContext): Promise<ConduitResponse> {
    const { error, requestId, path, timestamp } = ctx;

    if (error instanceof HttpException) {
      return {
        status: error.statusCode,
        headers: { 'Content-Type': 'application/json', ...error.headers },
        body: {
          error: errorLabel(error),
          message: error.message,
          statusCode: error.statusCode,
          requestId,
          timestamp: timestamp.toISOString(),
          path,
          ...(this.options.includeDetails &&
            error.details !== undefined && { details: error.details }),
          ...(this.options.includeStack && { stack: error.stack }),
        },
      };
    }

    return {
      status: HttpStatus.INTERNAL_SERVER_ERROR,
      headers: { 'Content-Type': 'application/json' },
      body: {
        error: 'Internal Server Error',
        message: this.options.includeDetails
          ? error.message
          : 'An unexpected error occurred',
        statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
        requestId,
        timestamp: timestamp.toISOString(),
        path,
        ...(this.options.includeStack && { stack: error.stack }),
      },
    };
  }
}

/**
 * HTTP exception filter - only handles HttpException instances
 */
export class HttpExceptionFilter implements IExceptionFilter {
  async catch(ctx: ExceptionContext): Promise<ConduitResponse> {
    const { error, requestId, path, timestamp } = ctx;

    if (!(error instanceof HttpException)) {
      throw error;
    }

    return {
      status: error.statusCode,
      headers: { 'Content-Type': 'application/json', ...error.headers },
      body: {
        error: errorLabel(error),
        message: error.message,
        statusCode: error.statusCode,
        requestId,
        timestamp: timestamp.toISOString(),
        path,
        ...(error.details !== undefined && { details: error.details }),
      },
    };
  }
}

/**
 * Validation exception filter - handles ValidationException
 */
export class ValidationExceptionFilter implements IExceptionFilter {
  async catch(ctx: ExceptionContext): Promise<ConduitResponse> {
    const { error, requestId, path, timestamp } = ctx;

    if (!(error instanceof ValidationException)) {
      throw error;
    }

    return {
      status: error.statusCode,
      headers: { 'Content-Type': 'application/json' },
      body: {
        error: 'Validation Error',
        message: error.message,
        statusCode: error.statusCode,
        errors: error.errors,
        requestId,
        timestamp: timestamp.toISOString(),
        path,
      },
    };
  }
}

/**
 * Exception filter chain - runs filters in order until one produces a
 * response
 */
export class ExceptionFilterChain implements IExceptionFilter {
  private filters: IExceptionFilter[] = [];

  /**
   * Add a filter to the chain
   */
  addFilter(filter: IExceptionFilter): this {
    this.filters.push(filter);
    return this;
  }

  /**
   * Add multiple filters
   */
  addFilters(filters: IExceptionFilter[]): this {
    this.filters.push(...filters);
    return this;
  }

  get length(): number {
    return this.filters.length;
  }

  async catch(ctx: ExceptionContext): Promise<ConduitResponse> {
    let lastError: Error = ctx.error;

    for (const filter of this.filters) {
      try {
        return await filter.catch({ ...ctx, error: lastError });
      } catch (error) {
        lastError = toError(error);
      }
    }

    if (lastError instanceof HttpException) {
      const fallback = createErrorResponse(
        lastError.statusCode,
        errorLabel(lastError),
        lastError.message,
      );
      return {
        ...fallback,
        headers: { ...fallback.headers, ...lastError.headers },
      };
    }

    return createErrorResponse(
      HttpStatus.INTERNAL_SERVER_ERROR,
      'Internal Server Error',
      process.env.NODE_ENV === 'production' ? 'An unexpected error occurred' : lastError.message,
    );
  }
}
