/**
 * conduit - Platform Types
 *
 * Request and response shapes exchanged between transport adapters and the
 * dispatcher. The core consumes only a parsed request (method, path,
 * headers, a body handle) and produces a response value.
 */

/**
 * HTTP Status codes
 */
export enum HttpStatus {
  // 2xx Success
  OK = 200,
  CREATED = 201,
  ACCEPTED = 202,
  NO_CONTENT = 204,

  // 3xx Redirection
  MOVED_PERMANENTLY = 301,
  FOUND = 302,
  NOT_MODIFIED = 304,
  TEMPORARY_REDIRECT = 307,
  PERMANENT_REDIRECT = 308,

  // 4xx Client Errors
  BAD_REQUEST = 400,
  UNAUTHORIZED = 401,
  FORBIDDEN = 403,
  NOT_FOUND = 404,
  METHOD_NOT_ALLOWED = 405,
  NOT_ACCEPTABLE = 406,
  CONFLICT = 409,
  GONE = 410,
  UNSUPPORTED_MEDIA_TYPE = 415,
  UNPROCESSABLE_ENTITY = 422,
  TOO_MANY_REQUESTS = 429,
  CLIENT_CLOSED_REQUEST = 499,

  // 5xx Server Errors
  INTERNAL_SERVER_ERROR = 500,
  NOT_IMPLEMENTED = 501,
  BAD_GATEWAY = 502,
  SERVICE_UNAVAILABLE = 503,
  GATEWAY_TIMEOUT = 504,
}

/**
 * Standard request methods
 */
export type HttpMethod =
  | 'GET'
  | 'HEAD'
  | 'POST'
  | 'PUT'
  | 'PATCH'
  | 'DELETE'
  | 'OPTIONS'
  | 'CONNECT'
  | 'TRACE';

/**
 * Request header map. Adapters provide lower-cased names.
 */
export type RequestHeaders = Record<string, string | string[] | undefined>;

/**
 * Response header map
 */
export type ResponseHeaders = Record<string, string | string[]>;

/**
 * Abstract Request - what a transport adapter hands to the dispatcher
 */
export interface ConduitRequest<TBody = unknown> {
  /** Request method, upper case */
  method: string;

  /** Request path, without the query string */
  path: string;

  /** Raw query string, without the leading `?` */
  query?: string;

  /** Request headers */
  headers: RequestHeaders;

  /** Request body handle (stream, buffer or decoded value) */
  body?: TBody;

  /** Client address */
  remoteAddress?: string;

  /** Raw underlying request (node:http IncomingMessage, etc.) */
  raw?: unknown;
}

/**
 * Abstract Response - what the dispatcher hands back to the adapter
 */
export interface ConduitResponse<T = unknown> {
  /** Response status code */
  status: number;

  /** Response headers */
  headers: ResponseHeaders;

  /** Response body */
  body?: T;
}

/**
 * Build a request from a method and a URL path that may carry a query
 * string.
 *
 * @example
 * ```typescript
 * createRequest('GET', '/search?q=conduit');
 * // { method: 'GET', path: '/search', query: 'q=conduit', headers: {} }
 * ```
 */
export function createRequest<TBody = unknown>(
  method: string,
  url: string,
  init: Partial<Omit<ConduitRequest<TBody>, 'method' | 'path'>> = {},
): ConduitRequest<TBody> {
  const queryStart = url.indexOf('?');
  const path = queryStart === -1 ? url : url.slice(0, queryStart);
  const query = queryStart === -1 ? init.query : url.slice(queryStart + 1);

  return {
    headers: {},
    ...init,
    method: method.toUpperCase(),
    path,
    ...(query !== undefined && { query }),
  };
}

/**
 * Case-insensitive single header lookup. Repeated headers are joined with
 * `, `.
 */
export function getHeader(
  headers: RequestHeaders,
  name: string,
): string | undefined {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted && value !== undefined) {
      return Array.isArray(value) ? value.join(', ') : value;
    }
  }
  return undefined;
}

/**
 * Case-insensitive response header lookup
 */
export function getResponseHeader(
  response: ConduitResponse,
  name: string,
): string | string[] | undefined {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(response.headers)) {
    if (key.toLowerCase() === wanted) {
      return value;
    }
  }
  return undefined;
}

/**
 * Response builder for fluent API
 */
export class ResponseBuilder<T = unknown> {
  private response: ConduitResponse<T>;

  constructor() {
    this.response = {
      status: HttpStatus.OK,
      headers: {},
    };
  }

  /**
   * Set status code
   */
  status(code: number): this {
    this.response.status = code;
    return this;
  }

  /**
   * Set OK status (200)
   */
  ok(): this {
    return this.status(HttpStatus.OK);
  }

  /**
   * Set Created status (201)
   */
  created(): this {
    return this.status(HttpStatus.CREATED);
  }

  /**
   * Set No Content status (204)
   */
  noContent(): this {
    return this.status(HttpStatus.NO_CONTENT);
  }

  /**
   * Set Bad Request status (400)
   */
  badRequest(): this {
    return this.status(HttpStatus.BAD_REQUEST);
  }

  /**
   * Set Not Found status (404)
   */
  notFound(): this {
    return this.status(HttpStatus.NOT_FOUND);
  }

  /**
   * Set a header
   */
  header(name: string, value: string | string[]): this {
    this.response.headers[name] = value;
    return this;
  }

  /**
   * Set multiple headers
   */
  headers(headers: ResponseHeaders): this {
    Object.assign(this.response.headers, headers);
    return this;
  }

  /**
   * Set content type
   */
  contentType(type: string): this {
    this.response.headers['Content-Type'] = type;
    return this;
  }

  /**
   * Set JSON content type
   */
  json(): this {
    return this.contentType('application/json');
  }

  /**
   * Set plain text content type
   */
  text(): this {
    return this.contentType('text/plain; charset=utf-8');
  }

  /**
   * Set body
   */
  body(data: T): this {
    this.response.body = data;
    return this;
  }

  /**
   * Build the response
   */
  build(): ConduitResponse<T> {
    return { ...this.response, headers: { ...this.response.headers } };
  }
}

/**
 * Create a new response builder
 */
export function response<T = unknown>(): ResponseBuilder<T> {
  return new ResponseBuilder<T>();
}

/**
 * Error response structure
 */
export interface ErrorResponse {
  error: string;
  message: string;
  statusCode: number;
  details?: unknown;
  requestId?: string;
  timestamp?: string;
  path?: string;
}

/**
 * Create an error response
 */
export function createErrorResponse(
  status: number,
  error: string,
  message: string,
  details?: unknown,
): ConduitResponse<ErrorResponse> {
  return {
    status,
    headers: { 'Content-Type': 'application/json' },
    body: {
      error,
      message,
      statusCode: status,
      ...(details !== undefined && { details }),
      timestamp: new Date().toISOString(),
    },
  };
}

/**
 * Copy of `response` with `headers` merged over its own
 */
export function withHeaders<T>(
  response: ConduitResponse<T>,
  headers: ResponseHeaders,
): ConduitResponse<T> {
  return { ...response, headers: { ...response.headers, ...headers } };
}
