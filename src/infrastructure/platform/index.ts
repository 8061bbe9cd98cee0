/**
 * conduit - Platform Module
 *
 * Request/response shapes and the middleware contract
 */

// Types
export {
  HttpStatus,
  ResponseBuilder,
  response,
  createRequest,
  createErrorResponse,
  getHeader,
  getResponseHeader,
  withHeaders,
} from './types';

export type {
  HttpMethod,
  RequestHeaders,
  ResponseHeaders,
  ConduitRequest,
  ConduitResponse,
  ErrorResponse,
} from './types';

// Middleware
export {
  isMiddleware,
  createMiddleware,
  ConduitMiddlewareBase,
  LoggingMiddleware,
  TimingMiddleware,
  ErrorBoundaryMiddleware,
  CorsMiddleware,
  SecurityHeadersMiddleware,
  StateMiddleware,
} from './middleware';

export type {
  IConduitMiddleware,
  MiddlewareFunction,
  MiddlewareContext,
  NextFunction,
  LoggingMiddlewareOptions,
  CorsOptions,
} from './middleware';
